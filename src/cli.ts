#!/usr/bin/env node
/**
 * Course Descriptions CLI
 *
 * Local orchestrator for the core library.
 * Handles file I/O, parallelization and progress reporting.
 *
 * @license AGPL-3.0
 */

import { type CLIArgs, parseCliArgs } from './cli/args'
import { cmdBuildSite } from './cli/commands/build-site'
import { cmdRun } from './cli/commands/run'
import { cmdScrape } from './cli/commands/scrape'
import { createLogger, type Logger } from './cli/logger'

function fail(logger: Logger, error: unknown, verbose: boolean): never {
  const msg = error instanceof Error ? error.message : String(error)
  logger.error(msg)
  if (verbose && error instanceof Error && error.stack) {
    console.error(error.stack)
  }
  process.exit(1)
}

async function main(): Promise<void> {
  let args: CLIArgs
  try {
    args = parseCliArgs()
  } catch (error) {
    fail(createLogger(false, false), error, false)
  }
  const logger = createLogger(args.quiet, args.verbose)

  try {
    switch (args.command) {
      case 'scrape':
        await cmdScrape(args, logger)
        break

      case 'build-site':
        await cmdBuildSite(args, logger)
        break

      case 'run':
        await cmdRun(args, logger)
        break

      default:
        logger.error("Unknown command. Run 'course-descriptions --help' for usage.")
        process.exit(1)
    }
  } catch (error) {
    fail(logger, error, args.verbose)
  }
}

void main()
