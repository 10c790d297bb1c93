/**
 * Service Context
 *
 * Builds the geocoder and web search configs for one command run. Each
 * external service gets its own rate limiter, shared by every call to it.
 */

import { countryToRegionCode, geocodeText, reverseGeocode } from '../geocoder/index'
import { DEFAULT_LOCALE, type LocaleProfile } from '../locale/index'
import { RateLimiter } from '../rate-limiter/index'
import type { ResolverServices } from '../resolver/index'
import { searchBusinessAddress } from '../search/index'
import type { GeocoderConfig, WebSearchConfig } from '../types'
import type { ReverseServices } from '../batch/index'
import type { Settings } from './config'

export interface ServiceContext {
  readonly geocoder: GeocoderConfig
  /** Null when the web search fallback is unavailable */
  readonly webSearch: WebSearchConfig | null
  /** Why web search is unavailable, when it is */
  readonly webSearchDisabledReason: string | null
  /** Set when the configured country has no ISO code, so searches are not restricted */
  readonly countryWarning: string | null
  readonly locale: LocaleProfile
}

interface ContextOptions {
  /** False when the user turned the fallback off */
  readonly webSearch: boolean
  readonly locale?: LocaleProfile | undefined
}

function resolveWebSearch(
  settings: Settings,
  options: ContextOptions
): Pick<ServiceContext, 'webSearch' | 'webSearchDisabledReason'> {
  if (!options.webSearch) {
    return { webSearch: null, webSearchDisabledReason: '--no-web-search given' }
  }
  if (!settings.googleSearchApiKey || !settings.googleSearchCx) {
    return {
      webSearch: null,
      webSearchDisabledReason: 'set GOOGLE_SEARCH_API_KEY and GOOGLE_SEARCH_CX to enable it'
    }
  }
  return {
    webSearch: {
      apiKey: settings.googleSearchApiKey,
      cx: settings.googleSearchCx,
      timeoutMs: settings.requestTimeoutMs,
      limiter: new RateLimiter(settings.requestIntervalMs)
    },
    webSearchDisabledReason: null
  }
}

export function createServiceContext(settings: Settings, options: ContextOptions): ServiceContext {
  return {
    geocoder: {
      baseUrl: settings.nominatimUrl,
      userAgent: settings.userAgent,
      country: settings.country,
      timeoutMs: settings.requestTimeoutMs,
      limiter: new RateLimiter(settings.requestIntervalMs)
    },
    ...resolveWebSearch(settings, options),
    countryWarning: countryToRegionCode(settings.country)
      ? null
      : `Unknown country "${settings.country}": forward geocoding is not restricted to one country`,
    locale: options.locale ?? DEFAULT_LOCALE
  }
}

/**
 * Bind the forward resolver to the context's services.
 */
export function createResolverServices(ctx: ServiceContext): ResolverServices {
  const { webSearch, locale } = ctx
  return {
    geocode: (query) => geocodeText(query, ctx.geocoder),
    findAddress: webSearch
      ? (businessName) => searchBusinessAddress(businessName, webSearch, locale)
      : null,
    locale
  }
}

/**
 * Bind the reverse batch to the context's geocoder.
 */
export function createReverseServices(ctx: ServiceContext): ReverseServices {
  return {
    reverseGeocode: (latitude, longitude) => reverseGeocode(latitude, longitude, ctx.geocoder)
  }
}
