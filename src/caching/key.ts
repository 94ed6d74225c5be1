/**
 * Cache Key Generation
 *
 * Generates deterministic keys for page request caching.
 */

import { createHash } from 'node:crypto'
import type { CacheKeyComponents } from './types'

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

/**
 * Sort object keys recursively for deterministic JSON stringification
 */
function sortKeys(obj: unknown): unknown {
  if (Array.isArray(obj)) {
    return obj.map(sortKeys)
  }
  if (!isRecord(obj)) {
    return obj
  }

  const sorted: Record<string, unknown> = {}
  for (const key of Object.keys(obj).sort()) {
    sorted[key] = sortKeys(obj[key])
  }
  return sorted
}

/**
 * Generate a deterministic cache key from request components.
 *
 * The key is a SHA256 hash of: service:model:normalized_payload
 *
 * @example
 * ```ts
 * const key = generateCacheKey({
 *   service: 'http',
 *   model: 'GET',
 *   payload: { url: 'https://example.org' }
 * })
 * // Returns: '3a7bd3e2...' (64 char hex string)
 * ```
 */
export function generateCacheKey(components: CacheKeyComponents): string {
  const { service, model, payload } = components
  const normalized = JSON.stringify(sortKeys(payload))
  const input = `${service}:${model}:${normalized}`

  return createHash('sha256').update(input).digest('hex')
}

/**
 * Generate cache key for a page URL.
 * Creates readable filename: sanitized URL + short hash suffix.
 * Path: web/<sanitized_url>_<hash>.json
 */
export function generateUrlCacheKey(url: string): string {
  // Sanitize URL for filename: replace invalid chars with _, collapse multiple _
  const sanitized = url
    .replace(/[^a-zA-Z0-9_-]/g, '_')
    .replace(/_+/g, '_')
    .replace(/^_|_$/g, '')
    .slice(0, 80)
  // Add short hash of full URL for uniqueness
  const hash = generateCacheKey({ service: 'http', model: 'GET', payload: { url } }).slice(0, 8)
  return `web/${sanitized}_${hash}`
}
