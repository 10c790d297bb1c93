/**
 * Address Patterns
 *
 * Locale-tuned street address matcher for free text such as search snippets.
 * Matches "123 Main St", "456 N. Robertson St", "600 Decatur", etc.
 */

import { DEFAULT_LOCALE, type LocaleProfile } from '../locale/index'

const STREET_SUFFIXES = [
  'St(?:reet)?',
  'Ave(?:nue)?',
  'Blvd',
  'Rd',
  'Dr',
  'Ct',
  'Ln',
  'Pl',
  'Way',
  'Hwy',
  'Pkwy'
]

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

/**
 * Build the house-number-plus-street pattern for a locale.
 *
 * Local street names are accepted in the suffix position because snippets
 * often write them without "St".
 */
export function buildAddressPattern(locale: LocaleProfile = DEFAULT_LOCALE): RegExp {
  const endings = [...STREET_SUFFIXES, ...locale.streetNames.map(escapeRegExp)].join('|')
  return new RegExp(
    `\\b\\d{1,5}\\s+(?:[NSEW]\\.?\\s+)?[A-Z][a-zA-Z]+(?:\\s+[A-Z][a-zA-Z]+)*\\s+(?:${endings})\\b`,
    'i'
  )
}

/**
 * First street address in the text, trimmed, or null.
 */
export function matchAddress(text: string, pattern: RegExp = buildAddressPattern()): string | null {
  const match = pattern.exec(text)
  return match ? match[0].trim() : null
}
