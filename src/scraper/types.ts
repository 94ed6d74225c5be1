/**
 * Scraper Types
 *
 * Types for fetching and scraping course pages.
 */

import type { ResponseCache } from '../caching/types'
import type { FetchFn } from '../http'
import type { Result } from '../types'

/**
 * Receives progress messages from scraping code.
 * The CLI logger satisfies this.
 */
export interface Reporter {
  log(msg: string): void
  warn(msg: string): void
}

/** Reporter that drops everything */
export const SILENT_REPORTER: Reporter = {
  log: () => {},
  warn: () => {}
}

/**
 * Configuration for the page fetcher.
 */
export interface ScraperConfig {
  /** User agent string for requests */
  readonly userAgent?: string | undefined
  /** Timeout in milliseconds (default: 10000) */
  readonly timeout?: number | undefined
  /** Custom fetch function for testing/mocking */
  readonly fetch?: FetchFn | undefined
  /** Cache for page bodies; nothing is cached when absent */
  readonly cache?: ResponseCache | undefined
  /** Max age of a cached page in seconds (default: 24 hours) */
  readonly maxAgeSeconds?: number | undefined
  /** Clock for cache age checks */
  readonly now?: (() => number) | undefined
}

export interface FetchPageOptions {
  /** Fail on non-2xx responses (default: true) */
  readonly checkStatus?: boolean | undefined
}

/**
 * Fetches a page body.
 */
export type PageFetcher = (url: string, options?: FetchPageOptions) => Promise<Result<string>>
