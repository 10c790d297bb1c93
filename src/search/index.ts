/**
 * Web Search Fallback
 *
 * Finds a street address for a business by scanning web search snippets
 * with the locale's address pattern.
 */

import { DEFAULT_LOCALE, type LocaleProfile } from '../locale/index'
import type { Result, WebSearchConfig, WebSearchResult } from '../types'
import { searchGoogle } from './google'
import { buildAddressPattern, matchAddress } from './patterns'

export { MAX_SEARCH_RESULTS, searchGoogle } from './google'
export { buildAddressPattern, matchAddress } from './patterns'

/**
 * "<name> <City> address"
 */
export function buildAddressQuery(
  businessName: string,
  locale: LocaleProfile = DEFAULT_LOCALE
): string {
  return `${businessName} ${locale.city} address`
}

/**
 * Scan results in ranking order; body is checked before title within a result.
 */
export function findAddressInResults(
  results: readonly WebSearchResult[],
  pattern: RegExp = buildAddressPattern()
): string | null {
  for (const result of results) {
    const found = matchAddress(`${result.snippet} ${result.title}`, pattern)
    if (found) return found
  }
  return null
}

/**
 * Search the web for a business and extract a street address from the snippets.
 *
 * @returns the first address found, null when no snippet has one, or the search error
 */
export async function searchBusinessAddress(
  businessName: string,
  config: WebSearchConfig,
  locale: LocaleProfile = DEFAULT_LOCALE
): Promise<Result<string | null>> {
  const result = await searchGoogle(buildAddressQuery(businessName, locale), config)
  if (!result.ok) {
    return result
  }
  return { ok: true, value: findAddressInResults(result.value, buildAddressPattern(locale)) }
}
