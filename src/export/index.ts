/**
 * Export Module
 *
 * Import rows and their CSV serialization.
 */

export { escapeCSV, exportToCSV } from './csv'
export {
  GEOCODED_PREFIX,
  REVERSE_GEOCODED_PREFIX,
  REVERSE_SOURCE_TAG,
  REVERSE_UNRESOLVED_NOTE,
  type ReverseRowOptions,
  toResolvedRow,
  toReverseRow,
  toUnresolvedRow,
  UNIDENTIFIED_CAMERA_LABEL
} from './rows'
export { formatDate, formatProvenance, MAX_EVIDENCE_LENGTH, truncateEvidence } from './utils'
