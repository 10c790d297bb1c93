/**
 * Batch Runner
 *
 * Drives the resolver (or the reverse geocoder) over every record, one at a
 * time and in input order, then partitions the results into resolved and
 * unresolved rows.
 */

import {
  REVERSE_UNRESOLVED_NOTE,
  type ReverseRowOptions,
  toResolvedRow,
  toReverseRow,
  toUnresolvedRow
} from '../export/index'
import { type ResolverServices, resolveRecord } from '../resolver/index'
import type {
  CoordinateInputRecord,
  ForwardInputRecord,
  ResolutionOutcome,
  ResolvedRow,
  Result,
  ReverseGeocodeResult,
  ReverseOutcome,
  ReverseRow,
  UnresolvedRow
} from '../types'

/**
 * Progress callback info.
 */
export interface RecordProgressInfo<R, O> {
  /** Record index (0-based) */
  readonly index: number
  /** Total number of records */
  readonly total: number
  readonly record: R
  /** Outcome, once the record is done */
  readonly outcome: O
}

interface BatchCallbacks<R, O> {
  /** Called before a record is processed */
  readonly onRecordStart?: ((info: Omit<RecordProgressInfo<R, O>, 'outcome'>) => void) | undefined
  /** Called after a record is processed */
  readonly onRecordComplete?: ((info: RecordProgressInfo<R, O>) => void) | undefined
}

export interface ForwardBatchResult {
  readonly resolved: ResolvedRow[]
  readonly unresolved: UnresolvedRow[]
  /** One per input record, in input order */
  readonly outcomes: ResolutionOutcome[]
}

export interface ReverseBatchResult {
  readonly resolved: ReverseRow[]
  readonly unresolved: ReverseRow[]
  readonly outcomes: ReverseOutcome[]
}

export interface ReverseServices {
  readonly reverseGeocode: (
    latitude: number,
    longitude: number
  ) => Promise<Result<ReverseGeocodeResult | null>>
}

/**
 * Resolve every shop/address record sequentially.
 */
export async function runForwardBatch(
  records: readonly ForwardInputRecord[],
  services: ResolverServices,
  callbacks: BatchCallbacks<ForwardInputRecord, ResolutionOutcome> = {}
): Promise<ForwardBatchResult> {
  const result: ForwardBatchResult = { resolved: [], unresolved: [], outcomes: [] }
  const total = records.length

  for (const [index, record] of records.entries()) {
    callbacks.onRecordStart?.({ index, total, record })
    const outcome = await resolveRecord(record, services)

    result.outcomes.push(outcome)
    if (outcome.kind === 'resolved') {
      result.resolved.push(toResolvedRow(record, outcome))
    } else {
      result.unresolved.push(toUnresolvedRow(record, outcome))
    }

    callbacks.onRecordComplete?.({ index, total, record, outcome })
  }

  return result
}

/**
 * Classify one reverse lookup. Zero results and errors are both unresolved.
 */
export function toReverseOutcome(result: Result<ReverseGeocodeResult | null>): ReverseOutcome {
  if (!result.ok) {
    return { kind: 'unresolved', reason: REVERSE_UNRESOLVED_NOTE, error: result.error }
  }
  if (!result.value) {
    return { kind: 'unresolved', reason: REVERSE_UNRESOLVED_NOTE }
  }
  return {
    kind: 'resolved',
    streetAddress: result.value.streetAddress,
    evidence: result.value.displayName
  }
}

/**
 * Reverse geocode every coordinate record sequentially.
 */
export async function runReverseBatch(
  records: readonly CoordinateInputRecord[],
  services: ReverseServices,
  options: ReverseRowOptions & BatchCallbacks<CoordinateInputRecord, ReverseOutcome>
): Promise<ReverseBatchResult> {
  const result: ReverseBatchResult = { resolved: [], unresolved: [], outcomes: [] }
  const total = records.length

  for (const [index, record] of records.entries()) {
    options.onRecordStart?.({ index, total, record })
    const outcome = toReverseOutcome(
      await services.reverseGeocode(record.latitude, record.longitude)
    )

    result.outcomes.push(outcome)
    const row = toReverseRow(record, outcome, options)
    if (outcome.kind === 'resolved') {
      result.resolved.push(row)
    } else {
      result.unresolved.push(row)
    }

    options.onRecordComplete?.({ index, total, record, outcome })
  }

  return result
}
