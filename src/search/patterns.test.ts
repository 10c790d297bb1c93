import { describe, expect, it } from 'vitest'
import type { LocaleProfile } from '../locale/index'
import { buildAddressPattern, matchAddress } from './patterns'

describe('Address Patterns', () => {
  describe('matchAddress', () => {
    it('finds a number and street with a standard suffix', () => {
      expect(matchAddress('Find us at 100 Canal St today')).toBe('100 Canal St')
    })

    it('accepts a directional prefix with a period', () => {
      expect(matchAddress('Now open: 456 N. Robertson St.')).toBe('456 N. Robertson St')
    })

    it('accepts multi-word street names', () => {
      expect(matchAddress('Located at 2000 Martin Luther King Blvd, New Orleans')).toBe(
        '2000 Martin Luther King Blvd'
      )
    })

    it('accepts long suffix spellings, ignoring case', () => {
      expect(matchAddress('at 123 main street near the river')).toBe('123 main street')
      expect(matchAddress('3300 Magazine Avenue')).toBe('3300 Magazine Avenue')
    })

    it('accepts known local street names in the suffix position', () => {
      expect(matchAddress('Shop at 1200 Upper Tchoupitoulas')).toBe('1200 Upper Tchoupitoulas')
      expect(matchAddress('See 700 Rue Bourbon for details')).toBe('700 Rue Bourbon')
    })

    it('returns the first address in the text', () => {
      expect(matchAddress('Moved to 300 Bourbon Street 200 Royal St')).toBe('300 Bourbon Street')
    })

    it('rejects house numbers longer than five digits', () => {
      expect(matchAddress('Order 123456 Main St')).toBeNull()
    })

    it('returns null when nothing looks like an address', () => {
      expect(matchAddress('Best po-boys in town, open late')).toBeNull()
      expect(matchAddress('')).toBeNull()
    })
  })

  describe('buildAddressPattern', () => {
    it('uses the locale street names', () => {
      const locale: LocaleProfile = {
        city: 'Lafayette',
        region: 'Louisiana',
        country: 'US',
        expansions: [],
        streetNames: ['Johnston']
      }
      const pattern = buildAddressPattern(locale)

      expect(matchAddress('at 4500 West Johnston', pattern)).toBe('4500 West Johnston')
      expect(matchAddress('at 700 Rue Bourbon', pattern)).toBeNull()
    })

    it('is not stateful between calls', () => {
      const pattern = buildAddressPattern()

      expect(matchAddress('100 Canal St', pattern)).toBe('100 Canal St')
      expect(matchAddress('100 Canal St', pattern)).toBe('100 Canal St')
    })
  })
})
