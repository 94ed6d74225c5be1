/**
 * Page Fetcher
 *
 * Fetches page bodies with a timeout, optionally through a ResponseCache.
 * Only successful bodies are cached; failures are retried on the next run.
 */

import { generateUrlCacheKey } from '../caching/key'
import {
  guardedFetch,
  handleDecodingError,
  handleNetworkError,
  type HttpResponse,
  httpStatusError
} from '../http'
import { ok, type Result } from '../types'
import type { FetchPageOptions, PageFetcher, ScraperConfig } from './types'

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36'

const DEFAULT_TIMEOUT_MS = 10_000

/** Cache TTL for fetched pages (24 hours) */
const DEFAULT_MAX_AGE_SECONDS = 24 * 60 * 60

/**
 * Create standard HTML fetch headers.
 */
export function createHtmlFetchHeaders(userAgent: string): Record<string, string> {
  return {
    'User-Agent': userAgent,
    Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
    'Accept-Language': 'en-US,en;q=0.9,it;q=0.8'
  }
}

/**
 * Create a page fetcher from scraper configuration.
 */
export function createPageFetcher(config: ScraperConfig = {}): PageFetcher {
  const fetchFn = config.fetch ?? guardedFetch
  const timeout = config.timeout ?? DEFAULT_TIMEOUT_MS
  const headers = createHtmlFetchHeaders(config.userAgent ?? DEFAULT_USER_AGENT)
  const maxAgeMs = (config.maxAgeSeconds ?? DEFAULT_MAX_AGE_SECONDS) * 1000
  const now = config.now ?? Date.now
  const cache = config.cache

  return async (url: string, options: FetchPageOptions = {}): Promise<Result<string>> => {
    const checkStatus = options.checkStatus ?? true
    const cacheKey = generateUrlCacheKey(url)

    if (cache) {
      const cached = await cache.get(cacheKey)
      if (cached && now() - cached.cachedAt <= maxAgeMs) {
        return ok(cached.data)
      }
    }

    let response: HttpResponse
    try {
      response = await fetchFn(url, { signal: AbortSignal.timeout(timeout), headers })
    } catch (error) {
      return handleNetworkError(error, url)
    }

    if (checkStatus && !response.ok) {
      return httpStatusError(response, url)
    }

    let body: string
    try {
      body = await response.text()
    } catch (error) {
      return handleDecodingError(error, url)
    }

    if (cache && response.ok) {
      await cache.set(cacheKey, { data: body, cachedAt: now() })
    }
    return ok(body)
  }
}
