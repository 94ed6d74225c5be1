/**
 * Build Site Command
 *
 * Convert the scraped AsciiDoc documents into the static site.
 */

import { VERSION } from '../../index'
import type { CLIArgs } from '../args'
import type { Logger } from '../logger'
import { buildSite } from '../steps'

export async function cmdBuildSite(
  args: Pick<CLIArgs, 'inputDir' | 'siteDir' | 'formats'>,
  logger: Logger
): Promise<void> {
  logger.log(`\ncourse-descriptions build-site v${VERSION}`)
  logger.log(`\n📁 ${args.inputDir} → ${args.siteDir}`)

  const { sourceCount } = await buildSite(logger, args.inputDir, args.siteDir, {
    formats: args.formats
  })
  if (sourceCount === 0) {
    logger.warn(`No .adoc files in ${args.inputDir}`)
  }
}
