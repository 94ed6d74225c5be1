/**
 * Degree Structure Pages
 *
 * Reads the per-enrollment-year pages listing a degree's courses.
 */

import { load } from 'cheerio'
import type { CourseCell } from '../types'

/** First study plan in the list of plans for an enrollment year */
const FIRST_PLAN_LINK = '.no-bullet > li:first-child > a'

/** Table cells holding course names */
const COURSE_CELL = 'td.title'

/**
 * Resolve a possibly relative href against the page it was found on.
 * Returns null for hrefs that don't form a valid URL.
 */
export function resolveUrl(href: string, base: string): string | null {
  try {
    return new URL(href, base).href
  } catch {
    return null
  }
}

/**
 * Get the href of the first study plan link, or null if there is none.
 */
export function extractStructureLink(html: string): string | null {
  const $ = load(html)
  return $(FIRST_PLAN_LINK).first().attr('href') ?? null
}

/**
 * Get every course cell in document order.
 * A cell's link is its first direct <a> child.
 */
export function extractCourseCells(html: string): CourseCell[] {
  const $ = load(html)
  return $(COURSE_CELL)
    .toArray()
    .map((cell) => {
      const $cell = $(cell)
      return {
        name: $cell.text().trim(),
        href: $cell.children('a').first().attr('href') ?? null
      }
    })
}
