/**
 * Record Types
 *
 * Input rows, per-record resolution outcomes and the flat rows written for import.
 */

import type { ApiError } from './common'
import type { GeoFix } from './geocoder'

/** A shop/address row from the forward-geocoding table. */
export interface ForwardInputRecord {
  readonly businessName: string
  readonly apparentAddress: string
}

/** A row from the coordinate-only table. */
export interface CoordinateInputRecord {
  readonly latitude: number
  readonly longitude: number
}

export type StrategyTag = 'direct_address' | 'business_name' | 'web_search_fallback'

/**
 * One external lookup made while resolving a record.
 */
export interface ResolutionAttempt {
  readonly strategy: StrategyTag
  readonly service: 'geocoder' | 'web_search'
  readonly query: string
  /** Present when the lookup failed at the transport/provider level */
  readonly error?: ApiError | undefined
}

export type ResolutionOutcome =
  | {
      readonly kind: 'resolved'
      readonly fix: GeoFix
      readonly streetAddress: string
      readonly strategy: StrategyTag
      readonly evidence: string
      readonly attempts: readonly ResolutionAttempt[]
    }
  | {
      readonly kind: 'unresolved'
      readonly reason: string
      readonly partialStreetAddress: string
      readonly attempts: readonly ResolutionAttempt[]
    }

export type ReverseOutcome =
  | { readonly kind: 'resolved'; readonly streetAddress: string; readonly evidence: string }
  | { readonly kind: 'unresolved'; readonly reason: string; readonly error?: ApiError | undefined }

export const RESOLVED_COLUMNS = [
  'id',
  'cross_road',
  'street_address',
  'latitude',
  'longitude',
  'facial_recognition',
  'associated_shop',
  'status',
  'reported_by',
  'reported_at',
  'vetted_at',
  'vetted_by',
  'notes'
] as const

export const UNRESOLVED_COLUMNS = ['associated_shop', 'street_address', 'notes'] as const

export const REVERSE_COLUMNS = [
  'id',
  'cross_road',
  'street_address',
  'latitude',
  'longitude',
  'facial_recognition',
  'associated_shop',
  'camera_type',
  'status',
  'reported_by',
  'reported_at',
  'vetted_at',
  'vetted_by',
  'notes'
] as const

export type ResolvedRow = Record<(typeof RESOLVED_COLUMNS)[number], string>
export type UnresolvedRow = Record<(typeof UNRESOLVED_COLUMNS)[number], string>
export type ReverseRow = Record<(typeof REVERSE_COLUMNS)[number], string>
