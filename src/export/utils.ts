/**
 * Export Utilities
 *
 * Shared helpers for building import rows.
 */

/** Evidence kept in provenance notes, in characters */
export const MAX_EVIDENCE_LENGTH = 80

/**
 * Format a date as YYYY-MM-DD.
 */
export function formatDate(date: Date): string {
  return date.toISOString().split('T')[0] ?? ''
}

/**
 * Cut evidence to the first 80 characters (code points, so surrogate pairs
 * stay whole). No ellipsis, no word boundaries: downstream consumers rely on
 * the exact prefix.
 */
export function truncateEvidence(evidence: string): string {
  return Array.from(evidence).slice(0, MAX_EVIDENCE_LENGTH).join('')
}

/**
 * "<prefix>:<tag> | <evidence truncated to 80 characters>"
 */
export function formatProvenance(prefix: string, tag: string, evidence: string): string {
  return `${prefix}:${tag} | ${truncateEvidence(evidence)}`
}
