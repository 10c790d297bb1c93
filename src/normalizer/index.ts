/**
 * Address Normalizer
 *
 * Rewrites known local abbreviations/typos and makes sure a forward-geocoding
 * query carries the locality. Pure functions.
 */

import { DEFAULT_LOCALE, formatLocality, type LocaleProfile } from '../locale/index'

/**
 * Apply the locale's expansions, in order.
 */
export function expandAbbreviations(address: string, locale: LocaleProfile = DEFAULT_LOCALE): string {
  let result = address
  for (const { pattern, replacement } of locale.expansions) {
    result = result.replace(pattern, replacement)
  }
  return result
}

/**
 * Whether the text already names the city or region (case-insensitive).
 */
export function mentionsLocality(text: string, locale: LocaleProfile = DEFAULT_LOCALE): boolean {
  const lower = text.toLowerCase()
  return lower.includes(locale.city.toLowerCase()) || lower.includes(locale.region.toLowerCase())
}

/**
 * Expand abbreviations and append ", <City>, <Region>" unless the locality is already present.
 *
 * Idempotent: expansions never re-match their own output and the suffix check
 * sees the appended locality.
 */
export function normalizeAddress(address: string, locale: LocaleProfile = DEFAULT_LOCALE): string {
  const expanded = expandAbbreviations(address, locale)
  if (mentionsLocality(expanded, locale)) {
    return expanded
  }
  return `${expanded}, ${formatLocality(locale)}`
}
