import { describe, expect, it, vi } from 'vitest'
import type { ResolverServices } from '../resolver/index'
import type { GeoFix, Result, ReverseGeocodeResult } from '../types'
import { runForwardBatch, runReverseBatch, toReverseOutcome } from './index'

const CANAL: GeoFix = {
  latitude: 29.9527,
  longitude: -90.0686,
  displayName: '100 Canal St, New Orleans, LA'
}

function createServices(answers: Record<string, GeoFix>): ResolverServices {
  return {
    geocode: async (query: string): Promise<Result<GeoFix | null>> => ({
      ok: true,
      value: answers[query] ?? null
    }),
    findAddress: null
  }
}

describe('Batch Runner', () => {
  describe('runForwardBatch', () => {
    it('writes a resolved row for a directly geocoded address', async () => {
      const services = createServices({ '100 Canal St, New Orleans, Louisiana': CANAL })

      const result = await runForwardBatch(
        [{ businessName: 'Corner Store', apparentAddress: '100 Canal St' }],
        services
      )

      expect(result.unresolved).toEqual([])
      expect(result.resolved).toHaveLength(1)
      expect(result.resolved[0]).toMatchObject({
        latitude: '29.9527',
        longitude: '-90.0686',
        associated_shop: 'Corner Store',
        street_address: '100 Canal St',
        notes: 'geocoded:direct_address | 100 Canal St, New Orleans, LA'
      })
    })

    it('routes records no strategy can resolve to the failures rows only', async () => {
      const result = await runForwardBatch(
        [{ businessName: 'Ghost Shop', apparentAddress: '1 Nowhere St' }],
        createServices({})
      )

      expect(result.resolved).toEqual([])
      expect(result.unresolved).toEqual([
        {
          associated_shop: 'Ghost Shop',
          street_address: '1 Nowhere St',
          notes: 'manual geocoding needed'
        }
      ])
    })

    it('partitions in input order with one outcome per record', async () => {
      const services = createServices({
        'A, New Orleans, Louisiana': CANAL,
        'C, New Orleans, Louisiana': { ...CANAL, latitude: 29.96 }
      })

      const result = await runForwardBatch(
        [
          { businessName: 'A', apparentAddress: '' },
          { businessName: 'B', apparentAddress: '' },
          { businessName: 'C', apparentAddress: '' },
          { businessName: 'D', apparentAddress: '' }
        ],
        services
      )

      expect(result.outcomes.map((o) => o.kind)).toEqual([
        'resolved',
        'unresolved',
        'resolved',
        'unresolved'
      ])
      expect(result.resolved.map((r) => r.associated_shop)).toEqual(['A', 'C'])
      expect(result.resolved.map((r) => r.latitude)).toEqual(['29.9527', '29.96'])
      expect(result.unresolved.map((r) => r.associated_shop)).toEqual(['B', 'D'])
    })

    it('processes records one at a time', async () => {
      let inFlight = 0
      let maxInFlight = 0
      const services: ResolverServices = {
        geocode: async () => {
          inFlight++
          maxInFlight = Math.max(maxInFlight, inFlight)
          await new Promise((resolve) => setTimeout(resolve, 1))
          inFlight--
          return { ok: true, value: null }
        },
        findAddress: null
      }

      await runForwardBatch(
        [
          { businessName: 'A', apparentAddress: '1 Royal St' },
          { businessName: 'B', apparentAddress: '2 Royal St' }
        ],
        services
      )

      expect(maxInFlight).toBe(1)
    })

    it('reports progress around each record', async () => {
      const events: string[] = []

      await runForwardBatch(
        [
          { businessName: 'A', apparentAddress: '' },
          { businessName: 'B', apparentAddress: '' }
        ],
        createServices({ 'A, New Orleans, Louisiana': CANAL }),
        {
          onRecordStart: ({ index, total, record }) =>
            events.push(`start ${index + 1}/${total} ${record.businessName}`),
          onRecordComplete: ({ index, outcome }) => events.push(`done ${index + 1} ${outcome.kind}`)
        }
      )

      expect(events).toEqual([
        'start 1/2 A',
        'done 1 resolved',
        'start 2/2 B',
        'done 2 unresolved'
      ])
    })

    it('handles an empty input', async () => {
      const result = await runForwardBatch([], createServices({}))

      expect(result).toEqual({ resolved: [], unresolved: [], outcomes: [] })
    })
  })

  describe('toReverseOutcome', () => {
    it('classifies results', () => {
      expect(toReverseOutcome({ ok: true, value: { streetAddress: 'Canal St', displayName: 'x' } })).toEqual({
        kind: 'resolved',
        streetAddress: 'Canal St',
        evidence: 'x'
      })
      expect(toReverseOutcome({ ok: true, value: null })).toEqual({
        kind: 'unresolved',
        reason: 'UNRESOLVED: reverse geocoding failed'
      })
      expect(
        toReverseOutcome({ ok: false, error: { type: 'network', message: 'Network error: x' } })
      ).toEqual({
        kind: 'unresolved',
        reason: 'UNRESOLVED: reverse geocoding failed',
        error: { type: 'network', message: 'Network error: x' }
      })
    })
  })

  describe('runReverseBatch', () => {
    const options = { cameraType: 'nopd', batchTag: 'reverse_import_2026-02-27' }

    it('writes the synthesized street address', async () => {
      const reverseGeocode = vi.fn(
        async (): Promise<Result<ReverseGeocodeResult | null>> => ({
          ok: true,
          value: { streetAddress: 'Canal St', displayName: 'Canal Street, New Orleans' }
        })
      )

      const result = await runReverseBatch(
        [{ latitude: 29.9511, longitude: -90.0715 }],
        { reverseGeocode },
        options
      )

      expect(reverseGeocode).toHaveBeenCalledWith(29.9511, -90.0715)
      expect(result.unresolved).toEqual([])
      expect(result.resolved[0]).toMatchObject({
        street_address: 'Canal St',
        latitude: '29.9511',
        longitude: '-90.0715',
        camera_type: 'nopd',
        status: 'vetted',
        reported_by: 'reverse_import_2026-02-27'
      })
    })

    it('partitions failed lookups into unresolved rows', async () => {
      const reverseGeocode = vi
        .fn<(lat: number, lon: number) => Promise<Result<ReverseGeocodeResult | null>>>()
        .mockResolvedValueOnce({ ok: true, value: null })
        .mockResolvedValueOnce({ ok: true, value: { streetAddress: '1 Royal St', displayName: 'y' } })

      const result = await runReverseBatch(
        [
          { latitude: 29.1, longitude: -90.1 },
          { latitude: 29.2, longitude: -90.2 }
        ],
        { reverseGeocode },
        options
      )

      expect(result.unresolved.map((r) => r.latitude)).toEqual(['29.1'])
      expect(result.resolved.map((r) => r.latitude)).toEqual(['29.2'])
      expect(result.outcomes.map((o) => o.kind)).toEqual(['unresolved', 'resolved'])
    })
  })
})
