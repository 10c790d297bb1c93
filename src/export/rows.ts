/**
 * Import Rows
 *
 * Flatten outcomes into rows matching the destination import schema.
 * Every row carries every column of its schema.
 */

import type {
  CoordinateInputRecord,
  ForwardInputRecord,
  ResolutionOutcome,
  ResolvedRow,
  ReverseOutcome,
  ReverseRow,
  UnresolvedRow
} from '../types'
import { formatProvenance } from './utils'

export const GEOCODED_PREFIX = 'geocoded'
export const REVERSE_GEOCODED_PREFIX = 'reverse_geocoded'
/** Provenance tag for reverse lookups */
export const REVERSE_SOURCE_TAG = 'nominatim'
export const REVERSE_UNRESOLVED_NOTE = 'UNRESOLVED: reverse geocoding failed'
/** associated_shop for reverse rows whose address could not be found */
export const UNIDENTIFIED_CAMERA_LABEL = 'Unidentified Camera'

/** The pipeline never infers facial recognition. */
const FACIAL_RECOGNITION = 'False'

export interface ReverseRowOptions {
  readonly cameraType: string
  readonly batchTag: string
}

/**
 * Row for a resolved shop/address record.
 */
export function toResolvedRow(
  record: ForwardInputRecord,
  outcome: Extract<ResolutionOutcome, { kind: 'resolved' }>
): ResolvedRow {
  return {
    id: '',
    cross_road: '',
    street_address: outcome.streetAddress,
    latitude: String(outcome.fix.latitude),
    longitude: String(outcome.fix.longitude),
    facial_recognition: FACIAL_RECOGNITION,
    associated_shop: record.businessName,
    status: 'pending',
    reported_by: '',
    reported_at: '',
    vetted_at: '',
    vetted_by: '',
    notes: formatProvenance(GEOCODED_PREFIX, outcome.strategy, outcome.evidence)
  }
}

/**
 * Row for the manual follow-up table.
 */
export function toUnresolvedRow(
  record: ForwardInputRecord,
  outcome: Extract<ResolutionOutcome, { kind: 'unresolved' }>
): UnresolvedRow {
  return {
    associated_shop: record.businessName,
    street_address: outcome.partialStreetAddress,
    notes: outcome.reason
  }
}

/**
 * Row for a coordinate record. Unresolved rows keep their coordinates so
 * they can be imported once the address is filled in by hand.
 */
export function toReverseRow(
  record: CoordinateInputRecord,
  outcome: ReverseOutcome,
  options: ReverseRowOptions
): ReverseRow {
  const resolved = outcome.kind === 'resolved'
  return {
    id: '',
    cross_road: '',
    street_address: resolved ? outcome.streetAddress : '',
    latitude: String(record.latitude),
    longitude: String(record.longitude),
    facial_recognition: FACIAL_RECOGNITION,
    associated_shop: resolved ? '' : UNIDENTIFIED_CAMERA_LABEL,
    camera_type: options.cameraType,
    status: 'vetted',
    reported_by: options.batchTag,
    reported_at: '',
    vetted_at: '',
    vetted_by: '',
    notes: resolved
      ? formatProvenance(REVERSE_GEOCODED_PREFIX, REVERSE_SOURCE_TAG, outcome.evidence)
      : outcome.reason
  }
}
