/**
 * Teaching Pages
 *
 * Parse a single course ("teaching") page and cut out the part of its
 * description worth keeping: from the learning outcomes up to the readings.
 */

import { load } from 'cheerio'
import { fail, ok, type Result, type TeachingPage } from '../types'

const ENGLISH_VERSION = 'li.language-en'
const TEACHING_TITLE = 'div#u-content-intro>h1'
const DESCRIPTION = 'div.description-text'

/** Where the kept part of a description starts */
const START_MARKER = 'Learning outcomes'

/**
 * Pages whose title contains the pattern end their kept part at the marker
 * (or at the end of the description when the marker is missing).
 */
const SPECIAL_END_MARKERS: ReadonlyArray<readonly [pattern: string, marker: string]> = [
  ['Numerical Computing', 'Teaching'],
  ['History of Informatics', 'Office']
]

/** End of the kept part for every other page; required */
const DEFAULT_END_MARKER = 'Readings'

/** Characters dropped before the end marker */
const END_MARKER_OFFSET = 2

function parseError(message: string): Result<never> {
  return fail({ type: 'parse', message })
}

/**
 * Get the URL of the English version of a teaching page.
 */
export function extractEnglishUrl(html: string): Result<string> {
  const $ = load(html)
  const href = $(ENGLISH_VERSION).first().find('a').first().attr('href')
  return href ? ok(href) : parseError('Cannot get english url')
}

/**
 * Read the title and full description of an English teaching page.
 */
export function parseTeachingPage(html: string): Result<TeachingPage> {
  const $ = load(html)

  const title = $(TEACHING_TITLE).first()
  if (title.length === 0) return parseError('Cannot parse teaching title')

  const description = $(DESCRIPTION).first()
  if (description.length === 0) return parseError('Cannot parse teaching description')

  return ok({ title: title.text().trim(), description: description.text() })
}

function findEndMarker(title: string, description: string): number | null {
  const special = SPECIAL_END_MARKERS.find(([pattern]) => title.includes(pattern))
  if (special) {
    const index = description.indexOf(special[1])
    return index === -1 ? description.length : index
  }
  const index = description.indexOf(DEFAULT_END_MARKER)
  return index === -1 ? null : index
}

/**
 * Cut the kept part out of a description and normalize it into paragraphs:
 * one per non-blank line, trimmed.
 */
export function extractLearningSection(title: string, description: string): Result<string> {
  const startIndex = description.indexOf(START_MARKER)
  const start = startIndex === -1 ? description.length : startIndex

  const endMarker = findEndMarker(title, description)
  if (endMarker === null) {
    return parseError('No description end marker defined for this page content')
  }
  const end = Math.max(endMarker - END_MARKER_OFFSET, 0)

  const kept = end > start ? description.slice(start, end) : ''
  const body = kept
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .join('\n\n')
  return ok(body.trim())
}

/**
 * Render a teaching as a level-1 AsciiDoc section titled with a link to its page.
 */
export function renderTeachingSection(
  teachingUrl: string,
  title: string,
  body: string,
  slug: string,
  year: number
): string {
  const doc = `degree-${slug}-${year}`
  return `\n== ${teachingUrl}[${title}]\n\nlink:${doc}.pdf[PDF], xref:${doc}.adoc[ADOC].\n\n${body}`
}
