/**
 * HTTP Utilities
 *
 * Helper types and functions shared by the geocoding provider clients.
 */

import type { Result } from './types'

/**
 * Check if running in CI environment.
 */
function isCI(): boolean {
  return process.env.CI === 'true'
}

/**
 * Check if running tests.
 */
function isTestMode(): boolean {
  return process.env.NODE_ENV === 'test' || process.env.VITEST === 'true'
}

/**
 * Check if HTTP requests should be blocked (tests running in CI).
 */
function shouldBlockHttpRequests(): boolean {
  return isCI() && isTestMode()
}

/**
 * Error thrown when a real HTTP request is attempted while tests run in CI.
 */
export class BlockedHttpRequestError extends Error {
  constructor(url: string) {
    super(
      `HTTP request to ${url} blocked: running tests in CI. ` +
        'Provider clients must be stubbed in tests.'
    )
    this.name = 'BlockedHttpRequestError'
  }
}

/**
 * Minimal HTTP response interface for API calls.
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
 * Perform a fetch request and return a typed response.
 *
 * @throws BlockedHttpRequestError when HTTP requests are blocked
 */
export async function httpFetch(url: string, init?: RequestInit): Promise<HttpResponse> {
  if (shouldBlockHttpRequests()) {
    throw new BlockedHttpRequestError(url)
  }
  return fetch(url, init)
}

/**
 * Handle HTTP error responses uniformly across all provider clients.
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
 * Handle network errors uniformly. Aborted requests are reported as timeouts.
 */
export function handleNetworkError(error: unknown): Result<never> {
  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return { ok: false, error: { type: 'timeout', message: `Request timed out: ${error.message}` } }
  }
  const message = error instanceof Error ? error.message : String(error)
  return { ok: false, error: { type: 'network', message: `Network error: ${message}` } }
}

/**
 * Create an error result for unparseable API responses.
 */
export function invalidResponseError(detail: string): Result<never> {
  return { ok: false, error: { type: 'invalid_response', message: `Invalid response: ${detail}` } }
}
