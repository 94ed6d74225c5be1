/**
 * AsciiDoc Writer
 *
 * Render the index page and name the per-year documents.
 * Writing to disk is left to the CLI.
 */

import type { Degree, YearDocument } from '../types'

export const INDEX_FILE_NAME = 'index.adoc'

export const DEFAULT_INDEX_TITLE = 'Unified Course Descriptions for Some UNIBO Degrees'

export interface IndexOptions {
  /** Index document title */
  readonly title?: string | undefined
  /** Link to the project documentation, listed under the title */
  readonly docsUrl?: string | undefined
}

/**
 * Base name (without extension) of a year document.
 */
export function yearDocumentName(slug: string, year: number): string {
  return `degree-${slug}-${year}`
}

/**
 * File name of a year document.
 */
export function yearFileName(slug: string, year: number): string {
  return `${yearDocumentName(slug, year)}.adoc`
}

/**
 * Index entry linking to a year document in every published format.
 */
export function renderYearIndexEntry(name: string, slug: string, year: number): string {
  const doc = yearDocumentName(slug, year)
  return `\n\n== ${name} (${year})\n\nxref:${doc}.adoc[web] | link:${doc}.pdf[PDF] | link:${doc}.adoc[Asciidoc]\n\n`
}

/**
 * Index block for a degree: one entry per year, oldest first.
 */
export function renderDegreeIndexBlock(
  degree: Pick<Degree, 'name' | 'slug'>,
  documents: readonly YearDocument[]
): string {
  return [...documents]
    .sort((a, b) => a.year - b.year)
    .map(({ year }) => renderYearIndexEntry(degree.name, degree.slug, year))
    .join('')
}

/**
 * Render the index document from per-degree blocks.
 */
export function renderIndex(blocks: readonly string[], options: IndexOptions = {}): string {
  const title = options.title ?? DEFAULT_INDEX_TITLE
  const docs = options.docsUrl ? `${options.docsUrl}[Documentation]\n\n` : ''
  return `= ${title}\n\n${docs}${blocks.join('\n')}`
}
