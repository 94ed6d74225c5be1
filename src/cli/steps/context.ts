/**
 * Pipeline Context
 *
 * Shared context for all pipeline steps: page fetcher, cache and logger.
 */

import { homedir } from 'node:os'
import { join } from 'node:path'
import { FilesystemCache } from '../../caching/filesystem'
import type { FetchFn } from '../../http'
import { createPageFetcher } from '../../scraper/page-fetcher'
import type { PageFetcher } from '../../scraper/types'
import type { Logger } from '../logger'

/**
 * Options for initializing the pipeline context.
 */
interface InitContextOptions {
  /** Skip the page cache and fetch everything again */
  readonly noCache?: boolean | undefined
  /** Custom cache directory (overrides env var and default) */
  readonly cacheDir?: string | undefined
  /** Timeout per page in ms */
  readonly timeout?: number | undefined
  /** Fetch function (tests pass a stub) */
  readonly fetch?: FetchFn | undefined
}

/**
 * Pipeline context passed to all steps.
 */
export interface PipelineContext {
  /** Fetches pages through the cache */
  readonly fetchPage: PageFetcher
  /** Logger for output */
  readonly logger: Logger
  /** Cache directory */
  readonly cacheDir: string
  /** Skip cache and fetch every page again */
  readonly noCache: boolean
}

/**
 * Get the cache directory: CLI arg > env var > default.
 */
export function getCacheDir(override?: string): string {
  return (
    override ??
    process.env.COURSE_DESCRIPTIONS_CACHE_DIR ??
    join(homedir(), '.cache', 'course-descriptions')
  )
}

/**
 * Initialize the pipeline context.
 */
export function initContext(logger: Logger, options: InitContextOptions = {}): PipelineContext {
  const cacheDir = getCacheDir(options.cacheDir)
  const noCache = options.noCache ?? false

  const fetchPage = createPageFetcher({
    fetch: options.fetch,
    timeout: options.timeout,
    cache: noCache ? undefined : new FilesystemCache(cacheDir)
  })

  logger.verbose(noCache ? 'Page cache disabled (--no-cache)' : `Page cache: ${cacheDir}`)

  return { fetchPage, logger, cacheDir, noCache }
}
