/**
 * Camera Locator Core Library
 *
 * Turn hand-collected surveillance-camera records into import-ready map rows.
 *
 * Design principle: no file IO, no progress reporting, no orchestration.
 * The CLI drives these functions; the only side effects are calls to external services.
 *
 * @license AGPL-3.0
 */

// Batch runner
export {
  type ForwardBatchResult,
  type RecordProgressInfo,
  type ReverseBatchResult,
  type ReverseServices,
  runForwardBatch,
  runReverseBatch,
  toReverseOutcome
} from './batch/index'
// Export module
export {
  escapeCSV,
  exportToCSV,
  formatProvenance,
  GEOCODED_PREFIX,
  MAX_EVIDENCE_LENGTH,
  REVERSE_GEOCODED_PREFIX,
  REVERSE_UNRESOLVED_NOTE,
  type ReverseRowOptions,
  toResolvedRow,
  toReverseRow,
  toUnresolvedRow,
  truncateEvidence,
  UNIDENTIFIED_CAMERA_LABEL
} from './export/index'
// Geocoder module
export {
  countryToRegionCode,
  DEFAULT_NOMINATIM_URL,
  formatStreetAddress,
  geocodeText,
  reverseGeocode
} from './geocoder/index'
// Input tables
export { type ParsedInput, parseCoordinateTable, parseForwardTable } from './input/index'
// Locale profiles
export {
  type AddressExpansion,
  DEFAULT_LOCALE,
  formatLocality,
  type LocaleProfile,
  NEW_ORLEANS
} from './locale/index'
// Normalizer
export { expandAbbreviations, mentionsLocality, normalizeAddress } from './normalizer/index'
// Rate limiting
export {
  type Clock,
  createUnlimited,
  DEFAULT_MIN_INTERVAL_MS,
  RateLimiter,
  systemClock
} from './rate-limiter/index'
// Strategy resolver
export {
  type ResolverServices,
  resolveRecord,
  STRATEGY_ORDER,
  UNRESOLVED_REASON
} from './resolver/index'
// Web search fallback
export {
  buildAddressPattern,
  buildAddressQuery,
  findAddressInResults,
  matchAddress,
  searchBusinessAddress,
  searchGoogle
} from './search/index'
// Types
export * from './types'

export const VERSION = '0.1.0'
