import { describe, expect, it, vi } from 'vitest'
import type { GeoFix, Result } from '../types'
import { type ResolverServices, resolveRecord, STRATEGY_ORDER, UNRESOLVED_REASON } from './index'

const CANAL: GeoFix = {
  latitude: 29.9527,
  longitude: -90.0686,
  displayName: '100 Canal St, New Orleans, LA'
}

/**
 * Geocoder stub answering only the given queries.
 */
function stubGeocoder(answers: Record<string, GeoFix>) {
  return vi.fn(async (query: string): Promise<Result<GeoFix | null>> => {
    return { ok: true, value: answers[query] ?? null }
  })
}

function stubSearch(address: string | null) {
  return vi.fn(async (_name: string): Promise<Result<string | null>> => {
    return { ok: true, value: address }
  })
}

function createServices(overrides: Partial<ResolverServices> = {}): ResolverServices {
  return { geocode: stubGeocoder({}), findAddress: stubSearch(null), ...overrides }
}

describe('Strategy Resolver', () => {
  it('tries strategies in a fixed order', () => {
    expect(STRATEGY_ORDER).toEqual(['direct_address', 'business_name', 'web_search_fallback'])
  })

  describe('direct_address', () => {
    it('resolves from the normalized address and keeps the original text', async () => {
      const geocode = stubGeocoder({ '1200 Tchoupitoulas St, New Orleans, Louisiana': CANAL })

      const outcome = await resolveRecord(
        { businessName: 'Corner Store', apparentAddress: '1200 Tchoup St' },
        createServices({ geocode })
      )

      expect(outcome.kind).toBe('resolved')
      if (outcome.kind === 'resolved') {
        expect(outcome.strategy).toBe('direct_address')
        expect(outcome.streetAddress).toBe('1200 Tchoup St')
        expect(outcome.fix).toEqual(CANAL)
        expect(outcome.evidence).toBe('100 Canal St, New Orleans, LA')
      }
      expect(geocode).toHaveBeenCalledTimes(1)
    })

    it('short-circuits the remaining strategies', async () => {
      const findAddress = stubSearch('100 Canal St')
      const geocode = stubGeocoder({ '100 Canal St, New Orleans, Louisiana': CANAL })

      await resolveRecord(
        { businessName: 'Corner Store', apparentAddress: '100 Canal St' },
        createServices({ geocode, findAddress })
      )

      expect(geocode).toHaveBeenCalledTimes(1)
      expect(findAddress).not.toHaveBeenCalled()
    })

    it('is skipped when the address is blank', async () => {
      const geocode = stubGeocoder({})

      await resolveRecord({ businessName: 'Corner Store', apparentAddress: '   ' }, createServices({ geocode }))

      expect(geocode).toHaveBeenCalledTimes(1)
      expect(geocode).toHaveBeenCalledWith('Corner Store, New Orleans, Louisiana')
    })
  })

  describe('business_name', () => {
    it('resolves by name and keeps the apparent address', async () => {
      const geocode = stubGeocoder({ 'Corner Store, New Orleans, Louisiana': CANAL })

      const outcome = await resolveRecord(
        { businessName: 'Corner Store', apparentAddress: 'near the levee' },
        createServices({ geocode })
      )

      expect(outcome).toMatchObject({
        kind: 'resolved',
        strategy: 'business_name',
        streetAddress: 'near the levee'
      })
      expect(geocode.mock.calls.map((call) => call[0])).toEqual([
        'near the levee, New Orleans, Louisiana',
        'Corner Store, New Orleans, Louisiana'
      ])
    })

    it('allows an empty street address', async () => {
      const geocode = stubGeocoder({ 'Corner Store, New Orleans, Louisiana': CANAL })

      const outcome = await resolveRecord(
        { businessName: 'Corner Store', apparentAddress: '' },
        createServices({ geocode })
      )

      expect(outcome).toMatchObject({ kind: 'resolved', strategy: 'business_name', streetAddress: '' })
    })
  })

  describe('web_search_fallback', () => {
    it('geocodes the address found by search and keeps the found text', async () => {
      const findAddress = stubSearch('456 N. Roberston St')
      const geocode = stubGeocoder({
        '456 North Robertson St, New Orleans, Louisiana': CANAL
      })

      const outcome = await resolveRecord(
        { businessName: 'Corner Store', apparentAddress: '1 Wrong Way' },
        createServices({ geocode, findAddress })
      )

      expect(outcome).toMatchObject({
        kind: 'resolved',
        strategy: 'web_search_fallback',
        streetAddress: '456 N. Roberston St',
        evidence: '100 Canal St, New Orleans, LA'
      })
      expect(findAddress).toHaveBeenCalledWith('Corner Store')
    })

    it('is not attempted when web search is unavailable', async () => {
      const geocode = stubGeocoder({})

      const outcome = await resolveRecord(
        { businessName: 'Corner Store', apparentAddress: '' },
        createServices({ geocode, findAddress: null })
      )

      expect(outcome.kind).toBe('unresolved')
      expect(outcome.attempts.map((a) => a.service)).toEqual(['geocoder'])
    })

    it('does not geocode again when search finds nothing', async () => {
      const geocode = stubGeocoder({})

      await resolveRecord(
        { businessName: 'Corner Store', apparentAddress: '' },
        createServices({ geocode, findAddress: stubSearch(null) })
      )

      expect(geocode).toHaveBeenCalledTimes(1)
    })

    it('treats a search error as no candidate', async () => {
      const findAddress = vi.fn(
        async (): Promise<Result<string | null>> => ({
          ok: false,
          error: { type: 'network', message: 'Network error: offline' }
        })
      )

      const outcome = await resolveRecord(
        { businessName: 'Corner Store', apparentAddress: '' },
        createServices({ findAddress })
      )

      expect(outcome.kind).toBe('unresolved')
      expect(outcome.attempts[1]).toEqual({
        strategy: 'web_search_fallback',
        service: 'web_search',
        query: 'Corner Store',
        error: { type: 'network', message: 'Network error: offline' }
      })
    })
  })

  describe('unresolved', () => {
    it('reports the reason and the partial address when every strategy fails', async () => {
      const outcome = await resolveRecord(
        { businessName: 'Corner Store', apparentAddress: '100 Nowhere St' },
        createServices({ findAddress: stubSearch('200 Nowhere St') })
      )

      expect(outcome).toEqual({
        kind: 'unresolved',
        reason: UNRESOLVED_REASON,
        partialStreetAddress: '100 Nowhere St',
        attempts: [
          {
            strategy: 'direct_address',
            service: 'geocoder',
            query: '100 Nowhere St, New Orleans, Louisiana',
            error: undefined
          },
          {
            strategy: 'business_name',
            service: 'geocoder',
            query: 'Corner Store, New Orleans, Louisiana',
            error: undefined
          },
          {
            strategy: 'web_search_fallback',
            service: 'web_search',
            query: 'Corner Store',
            error: undefined
          },
          {
            strategy: 'web_search_fallback',
            service: 'geocoder',
            query: '200 Nowhere St, New Orleans, Louisiana',
            error: undefined
          }
        ]
      })
      expect(UNRESOLVED_REASON).toBe('manual geocoding needed')
    })

    it('treats geocoder errors as a failed strategy and keeps going', async () => {
      const geocode = vi.fn(
        async (query: string): Promise<Result<GeoFix | null>> =>
          query.startsWith('100 Canal')
            ? { ok: false, error: { type: 'network', message: 'Network error: request timed out' } }
            : { ok: true, value: CANAL }
      )

      const outcome = await resolveRecord(
        { businessName: 'Corner Store', apparentAddress: '100 Canal St' },
        createServices({ geocode })
      )

      expect(outcome).toMatchObject({ kind: 'resolved', strategy: 'business_name' })
      expect(outcome.attempts[0]?.error?.message).toBe('Network error: request timed out')
    })

    it('makes no calls for a record without any input', async () => {
      const geocode = stubGeocoder({})
      const findAddress = stubSearch('100 Canal St')

      const outcome = await resolveRecord(
        { businessName: '', apparentAddress: '' },
        createServices({ geocode, findAddress })
      )

      expect(outcome).toMatchObject({ kind: 'unresolved', partialStreetAddress: '' })
      expect(geocode).not.toHaveBeenCalled()
      expect(findAddress).not.toHaveBeenCalled()
    })
  })
})
