/**
 * Google Programmable Search API Integration
 *
 * General web search used as the last-resort source of a street address.
 */

import {
  handleHttpError,
  handleNetworkError,
  httpFetch,
  invalidResponseError,
  isRecord,
  readJsonBody
} from '../http'
import type { Result, WebSearchConfig, WebSearchResult } from '../types'

const GOOGLE_SEARCH_API = 'https://www.googleapis.com/customsearch/v1'

/** Results requested per query */
export const MAX_SEARCH_RESULTS = 5

function toSearchResult(item: unknown): WebSearchResult | null {
  if (!isRecord(item)) return null
  return {
    title: typeof item.title === 'string' ? item.title : '',
    url: typeof item.link === 'string' ? item.link : '',
    snippet: typeof item.snippet === 'string' ? item.snippet : ''
  }
}

/**
 * Search Google using Programmable Search API.
 *
 * @returns up to 5 results, in ranking order
 */
export async function searchGoogle(
  query: string,
  config: WebSearchConfig
): Promise<Result<WebSearchResult[]>> {
  const params = new URLSearchParams({
    key: config.apiKey,
    cx: config.cx,
    q: query,
    num: String(MAX_SEARCH_RESULTS)
  })

  await config.limiter.wait()

  try {
    const response = await httpFetch(`${GOOGLE_SEARCH_API}?${params.toString()}`, {
      timeoutMs: config.timeoutMs
    })

    if (!response.ok) {
      return handleHttpError(response)
    }

    const body = await readJsonBody(response)
    if (!body.ok) {
      return body
    }
    const data = body.value
    if (!isRecord(data)) {
      return invalidResponseError('expected a search response object')
    }

    // No "items" key means zero results
    const items = Array.isArray(data.items) ? data.items : []
    const results: WebSearchResult[] = []
    for (const item of items.slice(0, MAX_SEARCH_RESULTS)) {
      const result = toSearchResult(item)
      if (result) results.push(result)
    }
    return { ok: true, value: results }
  } catch (error) {
    return handleNetworkError(error)
  }
}
