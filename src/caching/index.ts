/**
 * Cache Module
 *
 * Pluggable page response caching to avoid fetching the same page twice.
 */

export { FilesystemCache } from './filesystem'
export { generateCacheKey, generateUrlCacheKey } from './key'
export type { CachedResponse, CacheKeyComponents, ResponseCache } from './types'
