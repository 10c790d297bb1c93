/**
 * Strategy Resolver
 *
 * Resolves one shop/address record to a location by trying an ordered chain
 * of strategies, stopping at the first that yields a fix:
 * 1. The apparent address, normalized
 * 2. The business name with the locality
 * 3. An address found by web search for the business, normalized
 *
 * Each strategy is gated only by its own input being present, never by how
 * an earlier strategy failed.
 */

import { DEFAULT_LOCALE, formatLocality, type LocaleProfile } from '../locale/index'
import { normalizeAddress } from '../normalizer/index'
import type {
  ForwardInputRecord,
  GeoFix,
  ResolutionAttempt,
  ResolutionOutcome,
  Result,
  StrategyTag
} from '../types'

export const UNRESOLVED_REASON = 'manual geocoding needed'

/**
 * External lookups the resolver depends on.
 */
export interface ResolverServices {
  /** Forward geocode a query */
  readonly geocode: (query: string) => Promise<Result<GeoFix | null>>
  /** Find a street address for a business; null when web search is unavailable */
  readonly findAddress: ((businessName: string) => Promise<Result<string | null>>) | null
  readonly locale?: LocaleProfile | undefined
}

interface StrategyHit {
  readonly fix: GeoFix
  readonly streetAddress: string
}

/**
 * What a strategy may do; every call is recorded as an attempt.
 */
interface StrategyContext {
  readonly locale: LocaleProfile
  lookup(query: string): Promise<GeoFix | null>
  findAddress(businessName: string): Promise<string | null>
}

interface Strategy {
  readonly tag: StrategyTag
  run(record: ForwardInputRecord, ctx: StrategyContext): Promise<StrategyHit | null>
}

const STRATEGIES: readonly Strategy[] = [
  {
    tag: 'direct_address',
    async run(record, ctx) {
      if (!record.apparentAddress.trim()) return null
      const fix = await ctx.lookup(normalizeAddress(record.apparentAddress, ctx.locale))
      // The normalized form is only the query; keep what the reporter wrote
      return fix ? { fix, streetAddress: record.apparentAddress } : null
    }
  },
  {
    tag: 'business_name',
    async run(record, ctx) {
      if (!record.businessName.trim()) return null
      const fix = await ctx.lookup(`${record.businessName}, ${formatLocality(ctx.locale)}`)
      return fix ? { fix, streetAddress: record.apparentAddress } : null
    }
  },
  {
    tag: 'web_search_fallback',
    async run(record, ctx) {
      if (!record.businessName.trim()) return null
      const candidate = await ctx.findAddress(record.businessName)
      if (!candidate) return null
      const fix = await ctx.lookup(normalizeAddress(candidate, ctx.locale))
      return fix ? { fix, streetAddress: candidate } : null
    }
  }
]

/**
 * The strategy tags, in the order they are tried.
 */
export const STRATEGY_ORDER: readonly StrategyTag[] = STRATEGIES.map((s) => s.tag)

function createStrategyContext(
  tag: StrategyTag,
  services: ResolverServices,
  attempts: ResolutionAttempt[]
): StrategyContext {
  const { findAddress } = services
  return {
    locale: services.locale ?? DEFAULT_LOCALE,
    async lookup(query) {
      const result = await services.geocode(query)
      attempts.push({
        strategy: tag,
        service: 'geocoder',
        query,
        error: result.ok ? undefined : result.error
      })
      return result.ok ? result.value : null
    },
    async findAddress(businessName) {
      if (!findAddress) return null
      const result = await findAddress(businessName)
      attempts.push({
        strategy: tag,
        service: 'web_search',
        query: businessName,
        error: result.ok ? undefined : result.error
      })
      return result.ok ? result.value : null
    }
  }
}

/**
 * Resolve a single record. Always produces exactly one terminal outcome.
 */
export async function resolveRecord(
  record: ForwardInputRecord,
  services: ResolverServices
): Promise<ResolutionOutcome> {
  const attempts: ResolutionAttempt[] = []

  for (const strategy of STRATEGIES) {
    const hit = await strategy.run(record, createStrategyContext(strategy.tag, services, attempts))
    if (hit) {
      return {
        kind: 'resolved',
        fix: hit.fix,
        streetAddress: hit.streetAddress,
        strategy: strategy.tag,
        evidence: hit.fix.displayName,
        attempts
      }
    }
  }

  return {
    kind: 'unresolved',
    reason: UNRESOLVED_REASON,
    partialStreetAddress: record.apparentAddress,
    attempts
  }
}
