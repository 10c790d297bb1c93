/**
 * Geocoder Module
 *
 * Forward and reverse geocoding against a Nominatim-compatible service.
 * Every call passes through the service's rate limiter first.
 */

import countries from 'i18n-iso-countries'
import en from 'i18n-iso-countries/langs/en.json'
import {
  handleHttpError,
  handleNetworkError,
  httpFetch,
  invalidResponseError,
  isRecord,
  readJsonBody
} from '../http'
import type { GeocoderConfig, GeoFix, Result, ReverseGeocodeResult } from '../types'

countries.registerLocale(en)

export const DEFAULT_NOMINATIM_URL = 'https://nominatim.openstreetmap.org'

/**
 * Convert a country name or code to a lowercase ISO 3166-1 alpha-2 code.
 */
export function countryToRegionCode(country: string): string | null {
  const trimmed = country.trim()
  if (/^[a-z]{2}$/i.test(trimmed) && countries.isValid(trimmed.toUpperCase())) {
    return trimmed.toLowerCase()
  }
  const code = countries.getAlpha2Code(trimmed, 'en')
  return code?.toLowerCase() ?? null
}

function requestHeaders(config: GeocoderConfig): Record<string, string> {
  return { 'User-Agent': config.userAgent, Accept: 'application/json' }
}

function parseCoordinate(value: unknown): number | null {
  const parsed = typeof value === 'number' ? value : Number.parseFloat(String(value))
  return Number.isFinite(parsed) ? parsed : null
}

/**
 * Parse a /search payload. Zero results is a successful null.
 */
function parseSearchResponse(data: unknown): Result<GeoFix | null> {
  if (!Array.isArray(data)) {
    return invalidResponseError('expected an array of places')
  }
  const first: unknown = data[0]
  if (first === undefined) {
    return { ok: true, value: null }
  }
  if (!isRecord(first)) {
    return invalidResponseError('place is not an object')
  }

  const latitude = parseCoordinate(first.lat)
  const longitude = parseCoordinate(first.lon)
  if (latitude === null || longitude === null) {
    return invalidResponseError('place has no usable lat/lon')
  }

  return {
    ok: true,
    value: {
      latitude,
      longitude,
      displayName: typeof first.display_name === 'string' ? first.display_name : ''
    }
  }
}

/**
 * Build "<house_number> <road>", the road alone, or "" without a road.
 */
export function formatStreetAddress(address: Record<string, unknown>): string {
  const road = typeof address.road === 'string' ? address.road : ''
  if (!road) {
    return ''
  }
  const houseNumber = typeof address.house_number === 'string' ? address.house_number : ''
  return houseNumber ? `${houseNumber} ${road}`.trim() : road
}

/**
 * Parse a /reverse payload. Empty payloads and provider-reported errors are a successful null.
 */
function parseReverseResponse(data: unknown): Result<ReverseGeocodeResult | null> {
  if (!isRecord(data)) {
    return invalidResponseError('expected a place object')
  }
  if (Object.keys(data).length === 0 || 'error' in data) {
    return { ok: true, value: null }
  }

  const address = isRecord(data.address) ? data.address : {}
  return {
    ok: true,
    value: {
      streetAddress: formatStreetAddress(address),
      displayName: typeof data.display_name === 'string' ? data.display_name : ''
    }
  }
}

/**
 * Resolve free text to a single place.
 *
 * @returns the first place, null when the service has no match, or an error
 */
export async function geocodeText(
  query: string,
  config: GeocoderConfig
): Promise<Result<GeoFix | null>> {
  const params = new URLSearchParams({
    q: query,
    format: 'json',
    limit: '1',
    addressdetails: '1'
  })
  const regionCode = countryToRegionCode(config.country)
  if (regionCode) {
    params.set('countrycodes', regionCode)
  }

  await config.limiter.wait()

  try {
    const response = await httpFetch(`${config.baseUrl}/search?${params.toString()}`, {
      headers: requestHeaders(config),
      timeoutMs: config.timeoutMs
    })

    if (!response.ok) {
      return handleHttpError(response)
    }

    const body = await readJsonBody(response)
    if (!body.ok) {
      return body
    }
    return parseSearchResponse(body.value)
  } catch (error) {
    return handleNetworkError(error)
  }
}

/**
 * Resolve a coordinate pair to a street address.
 *
 * Coordinates are expected in range; they are not validated here.
 */
export async function reverseGeocode(
  latitude: number,
  longitude: number,
  config: GeocoderConfig
): Promise<Result<ReverseGeocodeResult | null>> {
  const params = new URLSearchParams({
    lat: String(latitude),
    lon: String(longitude),
    format: 'json',
    addressdetails: '1'
  })

  await config.limiter.wait()

  try {
    const response = await httpFetch(`${config.baseUrl}/reverse?${params.toString()}`, {
      headers: requestHeaders(config),
      timeoutMs: config.timeoutMs
    })

    if (!response.ok) {
      return handleHttpError(response)
    }

    const body = await readJsonBody(response)
    if (!body.ok) {
      return body
    }
    return parseReverseResponse(body.value)
  } catch (error) {
    return handleNetworkError(error)
  }
}
