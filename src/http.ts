/**
 * HTTP Utilities
 *
 * Fetch types and a guarded fetch that refuses real requests in CI test runs.
 */

import { errorMessage, fail, type Result } from './types'

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
 * Check if HTTP requests should be blocked.
 * True when running tests in CI: every request there must go through a stub.
 */
function shouldBlockHttpRequests(): boolean {
  return isCI() && isTestMode()
}

/**
 * Error thrown when a real HTTP request is made while requests are blocked.
 */
export class BlockedHttpRequestError extends Error {
  constructor(url: string) {
    super(
      `HTTP request to ${url} blocked: running tests in CI. ` +
        'Pass a fetch stub to the code under test.'
    )
    this.name = 'BlockedHttpRequestError'
  }
}

/**
 * The part of a fetch response the scraper reads.
 * Node's Response satisfies it, and so do test stubs.
 */
export interface HttpResponse {
  readonly ok: boolean
  readonly status: number
  readonly url?: string
  text(): Promise<string>
}

/**
 * Fetch function type for dependency injection.
 */
export type FetchFn = (url: string, init?: RequestInit) => Promise<HttpResponse>

/**
 * Guarded fetch - throws when HTTP requests are blocked.
 * Use this as the default instead of global fetch.
 */
export const guardedFetch: FetchFn = async (url, init) => {
  if (shouldBlockHttpRequests()) {
    throw new BlockedHttpRequestError(url)
  }
  return fetch(url, init)
}

/**
 * Turn a non-2xx response into an error result.
 */
export function httpStatusError(response: HttpResponse, url: string): Result<never> {
  return fail({
    type: 'http',
    message: `HTTP ${response.status}`,
    status: response.status,
    url
  })
}

/**
 * Turn a thrown fetch error into an error result.
 */
export function handleNetworkError(error: unknown, url: string): Result<never> {
  return fail({ type: 'network', message: `Network error: ${errorMessage(error)}`, url })
}

/**
 * Turn a failed body read into an error result.
 */
export function handleDecodingError(error: unknown, url: string): Result<never> {
  return fail({ type: 'decoding', message: `Decoding error: ${errorMessage(error)}`, url })
}
