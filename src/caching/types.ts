/**
 * Page Response Caching Types
 *
 * Pluggable caching interface for fetched page bodies, so that repeated runs
 * don't hit the same pages again.
 */

/**
 * Cached response wrapper with metadata
 */
export interface CachedResponse {
  /** Response body */
  readonly data: string
  /** Epoch milliseconds at which the body was fetched */
  readonly cachedAt: number
}

/**
 * Pluggable cache interface for page responses.
 *
 * Entries are kept until removed; callers decide how old an entry may be
 * by looking at cachedAt.
 */
export interface ResponseCache {
  /**
   * Get cached response by key
   * @returns Cached response or null if not found
   */
  get(key: string): Promise<CachedResponse | null>

  /**
   * Store response in cache
   */
  set(key: string, response: CachedResponse): Promise<void>
}

/**
 * Cache key components for generating deterministic hash
 */
export interface CacheKeyComponents {
  /** Service name, e.g. 'http' */
  readonly service: string
  /** Method or endpoint, e.g. 'GET' */
  readonly model: string
  /** Request payload (will be JSON stringified and sorted) */
  readonly payload: unknown
}
