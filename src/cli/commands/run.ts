/**
 * Run Command
 *
 * Full pipeline: scrape → build-site
 */

import type { CLIArgs } from '../args'
import type { Logger } from '../logger'
import { cmdBuildSite } from './build-site'
import { type CommandDeps, cmdScrape } from './scrape'

export async function cmdRun(args: CLIArgs, logger: Logger, deps: CommandDeps = {}): Promise<void> {
  await cmdScrape(args, logger, deps)
  await cmdBuildSite(args, logger)
}
