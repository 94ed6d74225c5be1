/**
 * Course Scraper
 *
 * Turn degree structure pages and teaching pages into AsciiDoc.
 *
 * Flow for one enrollment year:
 * - structure page → course cells (name + link)
 * - course link → Italian teaching page → English teaching page
 * - English page → title + description → AsciiDoc section
 */

import { ok, type CourseCell, type Result } from '../types'
import { extractCourseCells, resolveUrl } from './structure'
import {
  extractEnglishUrl,
  extractLearningSection,
  parseTeachingPage,
  renderTeachingSection
} from './teaching'
import { renderDescription } from './translations'
import type { PageFetcher } from './types'

export { createPageFetcher, DEFAULT_USER_AGENT } from './page-fetcher'
export { extractCourseCells, extractStructureLink, resolveUrl } from './structure'
export {
  extractEnglishUrl,
  extractLearningSection,
  parseTeachingPage,
  renderTeachingSection
} from './teaching'
export { MISSING_TRANSLATIONS, renderDescription } from './translations'
export type { FetchPageOptions, PageFetcher, Reporter, ScraperConfig } from './types'
export { SILENT_REPORTER } from './types'

/**
 * Title of a year document.
 */
export function yearTitle(degreeName: string, year: number): string {
  return `= ${degreeName} (${year})\n\n`
}

/**
 * Fetch a degree structure page and list its courses.
 */
export async function fetchCourseCells(
  url: string,
  fetchPage: PageFetcher
): Promise<Result<CourseCell[]>> {
  const page = await fetchPage(url)
  if (!page.ok) return page
  return ok(extractCourseCells(page.value))
}

/**
 * Scrape a teaching and render it as a section of the year document.
 *
 * The teaching link points at the Italian page; its English twin is the
 * one parsed. Neither page's status code is checked: the parse fails on
 * error pages anyway.
 */
export async function scrapeTeaching(
  url: string,
  slug: string,
  year: number,
  fetchPage: PageFetcher
): Promise<Result<string>> {
  const italianPage = await fetchPage(url, { checkStatus: false })
  if (!italianPage.ok) return italianPage

  const englishHref = extractEnglishUrl(italianPage.value)
  if (!englishHref.ok) return englishHref

  const teachingUrl = resolveUrl(englishHref.value, url) ?? englishHref.value
  const englishPage = await fetchPage(teachingUrl, { checkStatus: false })
  if (!englishPage.ok) return englishPage

  const teaching = parseTeachingPage(englishPage.value)
  if (!teaching.ok) return teaching

  const { title, description } = teaching.value
  const body = extractLearningSection(title, description)
  if (!body.ok) return body

  return ok(renderDescription(renderTeachingSection(teachingUrl, title, body.value, slug, year)))
}
