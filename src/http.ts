/**
 * HTTP Utilities
 *
 * Thin fetch wrapper plus uniform mapping of HTTP and network failures
 * onto Result errors for every external service module.
 */

import type { Result } from './types'

/**
 * Check if running under the test runner.
 */
function isTestMode(): boolean {
  return process.env.VITEST === 'true'
}

/**
 * Error thrown when a live HTTP request is attempted from a test.
 */
class LiveHttpRequestError extends Error {
  constructor(url: string) {
    super(
      `Live HTTP request to ${url} blocked: running under the test runner. ` +
        'Stub httpFetch in the test instead.'
    )
    this.name = 'LiveHttpRequestError'
  }
}

/**
 * Minimal response surface used by the service modules.
 */
export interface HttpResponse {
  ok: boolean
  status: number
  headers: {
    get(name: string): string | null
  }
  text(): Promise<string>
  json(): Promise<unknown>
}

/**
 * Perform a fetch request with a timeout.
 *
 * @throws LiveHttpRequestError when called from a test
 */
export async function httpFetch(
  url: string,
  options: { headers?: Record<string, string>; timeoutMs: number }
): Promise<HttpResponse> {
  if (isTestMode()) {
    throw new LiveHttpRequestError(url)
  }
  return fetch(url, {
    headers: options.headers ?? {},
    signal: AbortSignal.timeout(options.timeoutMs)
  })
}

/**
 * Handle HTTP error responses uniformly across all API modules.
 */
export async function handleHttpError(response: HttpResponse): Promise<Result<never>> {
  const errorText = await response.text()

  if (response.status === 429) {
    const retryAfter = response.headers.get('retry-after')
    return {
      ok: false,
      error: {
        type: 'rate_limit',
        message: `Rate limited: ${errorText}`,
        retryAfter: retryAfter ? Number.parseInt(retryAfter, 10) : undefined
      }
    }
  }

  if (response.status === 401 || response.status === 403) {
    return { ok: false, error: { type: 'auth', message: `Authentication failed: ${errorText}` } }
  }

  return {
    ok: false,
    error: { type: 'network', message: `API error ${response.status}: ${errorText}` }
  }
}

/**
 * Handle network errors (including timeouts) uniformly across all API modules.
 */
export function handleNetworkError(error: unknown): Result<never> {
  if (error instanceof Error && error.name === 'TimeoutError') {
    return { ok: false, error: { type: 'network', message: 'Network error: request timed out' } }
  }
  const message = error instanceof Error ? error.message : String(error)
  return { ok: false, error: { type: 'network', message: `Network error: ${message}` } }
}

/**
 * Create an error result for a payload that does not have the expected shape.
 */
export function invalidResponseError(detail: string): Result<never> {
  return { ok: false, error: { type: 'invalid_response', message: `Malformed response: ${detail}` } }
}

/**
 * Read a successful response body as JSON.
 * A body that is not JSON becomes an invalid_response error; other failures propagate.
 */
export async function readJsonBody(response: HttpResponse): Promise<Result<unknown>> {
  try {
    return { ok: true, value: await response.json() }
  } catch (error) {
    if (error instanceof SyntaxError) {
      return invalidResponseError(`body is not JSON (${error.message})`)
    }
    throw error
  }
}

/**
 * Narrow an unknown JSON value to a plain object.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
