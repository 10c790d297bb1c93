/**
 * Geocoder Types
 *
 * Types for forward/reverse geocoding and the services behind them.
 */

import type { RateLimiter } from '../rate-limiter/index'

/**
 * A single successful forward lookup.
 */
export interface GeoFix {
  readonly latitude: number
  readonly longitude: number
  /** Provider's full formatted address */
  readonly displayName: string
}

export interface ReverseGeocodeResult {
  /** "<house number> <road>", the road alone, or empty when no road was returned */
  readonly streetAddress: string
  readonly displayName: string
}

export interface GeocoderConfig {
  /** Base URL of the Nominatim-compatible service */
  readonly baseUrl: string
  /** Sent as User-Agent; Nominatim's usage policy requires an identifying value */
  readonly userAgent: string
  /** Country name or ISO 3166-1 alpha-2 code restricting forward results */
  readonly country: string
  readonly timeoutMs: number
  /** Shared gate for every call to this service */
  readonly limiter: RateLimiter
}

export interface WebSearchConfig {
  readonly apiKey: string
  readonly cx: string
  readonly timeoutMs: number
  readonly limiter: RateLimiter
}

/**
 * A single web search hit.
 */
export interface WebSearchResult {
  readonly title: string
  readonly url: string
  /** Result body text */
  readonly snippet: string
}
