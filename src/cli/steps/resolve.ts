/**
 * Resolve Step
 *
 * Load the degree list and look up the course page of each enrollment year.
 */

import { loadDegreeEntries, resolveDegrees, scrapedYears } from '../../degrees'
import type { Degree } from '../../types'
import type { PipelineContext } from './context'

interface ResolveStepOptions {
  /** Degree list JSON file */
  readonly degreesPath: string
  /** Enrollment years per degree */
  readonly years?: number | undefined
  /** Courses website root */
  readonly baseUrl?: string | undefined
  /** Reference date for the academic year (default: now) */
  readonly now?: Date | undefined
}

/**
 * Run the resolve step. Throws when the degree list cannot be loaded.
 */
export async function stepResolve(
  ctx: PipelineContext,
  options: ResolveStepOptions
): Promise<Degree[]> {
  const { logger, fetchPage } = ctx

  const entries = await loadDegreeEntries(options.degreesPath)
  if (!entries.ok) {
    throw new Error(entries.error.message)
  }

  const years = scrapedYears(options.now, options.years)
  logger.log(`\n🎓 ${entries.value.length} degrees, enrollment years ${years.join(', ')}`)

  return resolveDegrees(entries.value, {
    fetchPage,
    reporter: logger,
    years,
    baseUrl: options.baseUrl
  })
}
