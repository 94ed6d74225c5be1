/**
 * Filesystem-based Response Cache for CLI
 *
 * Stores cached page responses as JSON files organized by key prefix.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs'
import { homedir } from 'node:os'
import { dirname, join } from 'node:path'
import type { CachedResponse, ResponseCache } from './types'

/**
 * Throws if tests try to access the user's real cache directory.
 * Tests must use isolated temp directories.
 */
function guardAgainstUserCache(cacheDir: string): void {
  const isTest = process.env['VITEST'] === 'true' || process.env['NODE_ENV'] === 'test'
  if (!isTest) return

  const realCacheDir = join(homedir(), '.cache', 'course-descriptions')
  if (cacheDir.startsWith(realCacheDir)) {
    throw new Error(
      `TEST ERROR: Attempted to access user's real cache directory!\n` +
        `  Cache dir: ${cacheDir}\n` +
        `  Tests must use isolated temp directories, not ~/.cache/course-descriptions/`
    )
  }
}

function parseEntry(raw: string): CachedResponse | null {
  const parsed: unknown = JSON.parse(raw)
  if (parsed === null || typeof parsed !== 'object' || !('response' in parsed)) {
    return null
  }
  const response: unknown = parsed.response
  if (
    response === null ||
    typeof response !== 'object' ||
    !('data' in response) ||
    !('cachedAt' in response)
  ) {
    return null
  }
  const { data, cachedAt } = response
  if (typeof data !== 'string' || typeof cachedAt !== 'number') {
    return null
  }
  return { data, cachedAt }
}

/**
 * Filesystem-based cache implementation for CLI usage.
 *
 * Directory structure:
 * ```
 * ~/.cache/course-descriptions/requests/
 * ├── web/
 * │   └── https_corsi_example_org_..._1a2b3c4d.json
 * ├── ab/
 * │   └── abcd1234...json
 * ```
 *
 * Keys containing '/' are used as paths; other keys use their first 2 chars
 * as subdirectory to avoid too many files in one dir.
 */
export class FilesystemCache implements ResponseCache {
  constructor(private readonly cacheDir: string) {
    guardAgainstUserCache(cacheDir)
  }

  async get(key: string): Promise<CachedResponse | null> {
    const path = this.getCachePath(key)

    if (!existsSync(path)) {
      return null
    }

    try {
      return parseEntry(readFileSync(path, 'utf-8'))
    } catch {
      // Corrupt entry: treat as a miss, it will be overwritten
      return null
    }
  }

  async set(key: string, response: CachedResponse): Promise<void> {
    const path = this.getCachePath(key)

    const dir = dirname(path)
    if (dir.startsWith('--')) {
      throw new Error(`FilesystemCache.set called with flag-like dir: "${dir}"`)
    }
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true })
    }

    writeFileSync(path, JSON.stringify({ response }, null, 2))
  }

  /**
   * Get the file path for a cache entry.
   */
  private getCachePath(key: string): string {
    if (key.includes('/')) {
      return join(this.cacheDir, 'requests', `${key}.json`)
    }
    const prefix = key.slice(0, 2)
    return join(this.cacheDir, 'requests', prefix, `${key}.json`)
  }
}
