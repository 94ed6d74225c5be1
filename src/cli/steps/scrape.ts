/**
 * Scrape Step
 *
 * Scrape every course of a degree's yearly structure pages into year documents.
 * Courses of a year are scraped in parallel; their sections keep table order.
 */

import { fetchCourseCells, resolveUrl, scrapeTeaching, yearTitle } from '../../scraper'
import type { CourseCell, Degree, YearDocument } from '../../types'
import { runWorkerPool } from '../worker-pool'
import type { PipelineContext } from './context'

const DEFAULT_CONCURRENCY = 4

export interface ScrapeStepOptions {
  /** Max concurrent course scrapes (default 4) */
  readonly concurrency?: number | undefined
}

/**
 * Render one course as a section of the year document.
 * Returns null when the course is skipped.
 */
export async function renderCourse(
  ctx: PipelineContext,
  cell: CourseCell,
  slug: string,
  year: number
): Promise<string | null> {
  const { logger, fetchPage } = ctx
  logger.log(`Visiting ${cell.name}`)

  if (cell.href === null) {
    logger.warn(`Missing link: ${cell.name}`)
    return null
  }

  const section = await scrapeTeaching(cell.href, slug, year, fetchPage)
  if (!section.ok) {
    logger.warn(`Cannot get description: ${section.error.message}`)
    return null
  }
  return section.value
}

/**
 * Build the document of one enrollment year.
 * Returns null when the structure page cannot be loaded.
 */
export async function analyzeYear(
  ctx: PipelineContext,
  degree: Degree,
  year: number,
  url: string,
  options: ScrapeStepOptions = {}
): Promise<YearDocument | null> {
  const { logger, fetchPage } = ctx
  logger.log(`Analysing ${year} link: ${url}`)

  const cells = await fetchCourseCells(url, fetchPage)
  if (!cells.ok) {
    logger.warn(`Skipping ${degree.name} (${year}): ${cells.error.message}`)
    return null
  }

  // Course links may be relative to the structure page
  const courses = cells.value.map((cell) => ({
    name: cell.name,
    href: cell.href === null ? null : resolveUrl(cell.href, url)
  }))

  const { results, errors } = await runWorkerPool(
    courses,
    (cell) => renderCourse(ctx, cell, degree.slug, year),
    {
      concurrency: options.concurrency ?? DEFAULT_CONCURRENCY,
      onProgress: ({ completed, total }) =>
        logger.progress(`${degree.name} (${year})`, completed, total)
    }
  )
  for (const { index, error } of errors) {
    logger.warn(`Cannot get description: ${courses[index]?.name ?? index}: ${error.message}`)
  }

  const sections = results.filter((section): section is string => typeof section === 'string')
  logger.success(`${degree.name} (${year}): ${sections.length}/${courses.length} courses`)

  return { year, content: yearTitle(degree.name, year) + sections.join('') }
}

/**
 * Build the documents of every resolved year of a degree, oldest first.
 */
export async function analyzeDegree(
  ctx: PipelineContext,
  degree: Degree,
  options: ScrapeStepOptions = {}
): Promise<YearDocument[]> {
  ctx.logger.log(`\n📚 ${degree.name}`)

  const years = [...degree.yearUrls.entries()].sort(([a], [b]) => a - b)
  const documents: YearDocument[] = []
  for (const [year, url] of years) {
    const document = await analyzeYear(ctx, degree, year, url, options)
    if (document) documents.push(document)
  }
  return documents
}
