/**
 * Scrape Command
 *
 * Resolve the configured degrees, scrape their courses and write the
 * AsciiDoc documents plus the index page.
 */

import { VERSION } from '../../index'
import type { FetchFn } from '../../http'
import type { CLIArgs } from '../args'
import type { Logger } from '../logger'
import { analyzeDegree, initContext, stepResolve, writeCourses } from '../steps'

/**
 * Overrides for tests.
 */
export interface CommandDeps {
  readonly fetch?: FetchFn | undefined
  /** Reference date for the academic year */
  readonly now?: Date | undefined
  /** Courses website root */
  readonly baseUrl?: string | undefined
}

type ScrapeArgs = Pick<
  CLIArgs,
  | 'cacheDir'
  | 'noCache'
  | 'degreesPath'
  | 'outputDir'
  | 'years'
  | 'concurrency'
  | 'timeout'
  | 'docsUrl'
  | 'title'
>

export async function cmdScrape(
  args: ScrapeArgs,
  logger: Logger,
  deps: CommandDeps = {}
): Promise<void> {
  logger.log(`\ncourse-descriptions scrape v${VERSION}`)

  const ctx = initContext(logger, {
    cacheDir: args.cacheDir,
    noCache: args.noCache,
    timeout: args.timeout,
    fetch: deps.fetch
  })

  const degrees = await stepResolve(ctx, {
    degreesPath: args.degreesPath,
    years: args.years,
    baseUrl: deps.baseUrl,
    now: deps.now
  })

  const { files } = await writeCourses(
    logger,
    args.outputDir,
    degrees,
    (degree) => analyzeDegree(ctx, degree, { concurrency: args.concurrency }),
    { title: args.title, docsUrl: args.docsUrl }
  )

  logger.log(`\n✨ Scraped ${degrees.length} degrees into ${files.length} files`)
}
