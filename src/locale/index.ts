/**
 * Locale Profiles
 *
 * Everything locale-specific the pipeline knows: the locality appended to
 * queries, known abbreviations/misspellings, and local street names that
 * appear without a standard street-type suffix.
 */

export interface AddressExpansion {
  /** Whole-word, case-insensitive, global */
  readonly pattern: RegExp
  readonly replacement: string
}

export interface LocaleProfile {
  readonly city: string
  readonly region: string
  /** Country name or ISO 3166-1 alpha-2 code used to restrict forward geocoding */
  readonly country: string
  /** Applied in order */
  readonly expansions: readonly AddressExpansion[]
  readonly streetNames: readonly string[]
}

export const NEW_ORLEANS: LocaleProfile = {
  city: 'New Orleans',
  region: 'Louisiana',
  country: 'US',
  expansions: [
    { pattern: /\bTchoup\b/gi, replacement: 'Tchoupitoulas' },
    { pattern: /\bSt\.?\s+Phillip\b/gi, replacement: 'St Philip' },
    { pattern: /\bRoberston\b/gi, replacement: 'Robertson' },
    { pattern: /\bS\.\s+Peters\b/gi, replacement: 'South Peters' },
    { pattern: /\bN\.\s+Robertson\b/gi, replacement: 'North Robertson' }
  ],
  streetNames: [
    'Bienville',
    'Bourbon',
    'Decatur',
    'Frenchmen',
    'Chartres',
    'Royal',
    'Toulouse',
    'Burgundy',
    'Iberville',
    'Canal',
    'Tchoupitoulas',
    'Tchoup'
  ]
}

export const DEFAULT_LOCALE = NEW_ORLEANS

/**
 * "<City>, <Region>" as appended to forward-geocoding queries.
 */
export function formatLocality(locale: LocaleProfile): string {
  return `${locale.city}, ${locale.region}`
}
