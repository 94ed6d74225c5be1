/**
 * Degrees
 *
 * Turn degree entries from the config file into the metadata needed for
 * scraping: the URL of each recent enrollment year's course page.
 */

import { extractStructureLink, resolveUrl } from '../scraper/structure'
import { type PageFetcher, type Reporter, SILENT_REPORTER } from '../scraper/types'
import type { Degree, DegreeEntry, DegreeLevel } from '../types'
import { scrapedYears } from './academic-year'
import { nameAndCodeToSlug, nameToLevel } from './slug'

export { currentAcademicYear, scrapedYears, YEARS_PER_DEGREE } from './academic-year'
export { DEFAULT_DEGREES_PATH, loadDegreeEntries, parseDegreeEntries } from './config'
export { nameAndCodeToSlug, nameToLevel } from './slug'

export const DEFAULT_COURSES_BASE_URL = 'https://corsi.unibo.it'

export interface ResolveDegreeOptions {
  readonly fetchPage: PageFetcher
  readonly reporter?: Reporter | undefined
  /** Enrollment years to look up (default: scrapedYears()) */
  readonly years?: readonly number[] | undefined
  /** Courses website root (default: DEFAULT_COURSES_BASE_URL) */
  readonly baseUrl?: string | undefined
}

/**
 * URL of the page listing a degree's study plans for an enrollment year.
 */
export function structureListUrl(
  level: DegreeLevel,
  slug: string,
  year: number,
  baseUrl: string = DEFAULT_COURSES_BASE_URL
): string {
  return `${baseUrl}/${level}/${slug}/insegnamenti?year=${year}`
}

/**
 * Look up the course page URL for each year.
 * Years whose page fails to load or has no plan link are left out.
 */
async function resolveYearUrls(
  level: DegreeLevel,
  websiteSlug: string,
  options: ResolveDegreeOptions
): Promise<Map<number, string>> {
  const reporter = options.reporter ?? SILENT_REPORTER
  const years = options.years ?? scrapedYears()
  const yearUrls = new Map<number, string>()

  for (const year of years) {
    const url = structureListUrl(level, websiteSlug, year, options.baseUrl)
    reporter.log(`Visiting: ${url}`)

    const page = await options.fetchPage(url)
    if (!page.ok) {
      reporter.warn(`Skipping ${year}: ${page.error.message}`)
      continue
    }

    const href = extractStructureLink(page.value)
    const link = href === null ? null : resolveUrl(href, url)
    if (link === null) {
      reporter.warn(`Skipping ${year}: no study plan link`)
      continue
    }

    reporter.log(`Got link: ${link}`)
    yearUrls.set(year, link)
  }

  return yearUrls
}

/**
 * Resolve a degree entry. Returns null when any of its fields is empty.
 */
export async function resolveDegree(
  entry: DegreeEntry,
  options: ResolveDegreeOptions
): Promise<Degree | null> {
  const { id, name, code } = entry
  if (!id || !name || !code) {
    return null
  }

  const yearUrls = await resolveYearUrls(
    nameToLevel(name),
    nameAndCodeToSlug(name, code),
    options
  )
  return { name, slug: id, yearUrls }
}

/**
 * Resolve every degree entry in order, dropping the ones that can't be resolved.
 */
export async function resolveDegrees(
  entries: readonly DegreeEntry[],
  options: ResolveDegreeOptions
): Promise<Degree[]> {
  const degrees: Degree[] = []
  for (const entry of entries) {
    const degree = await resolveDegree(entry, options)
    if (degree) degrees.push(degree)
  }
  return degrees
}
