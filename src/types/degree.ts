/**
 * Degree Types
 *
 * Types for degree metadata and the documents scraped for them.
 */

/**
 * A degree as listed in the degrees config file.
 * Only the fields below are read; anything else in the file is ignored.
 */
export interface DegreeEntry {
  /** Unique kebab-case id, used in output file names */
  readonly id: string
  /** Human-readable name of the degree */
  readonly name: string
  /** University code for the degree, usually in the format 1234/567 */
  readonly code: string
}

/** Degree level slug: 'laurea' for a B.Sc., 'magistrale' for a M.Sc. */
export type DegreeLevel = 'laurea' | 'magistrale'

/**
 * Degree metadata needed for scraping.
 * Part of it changes every year, so it is resolved at run time.
 */
export interface Degree {
  readonly name: string
  /** Same as DegreeEntry.id */
  readonly slug: string
  /**
   * For each recent academic year, the URL of the page describing the courses
   * for students enrolled that year. Keyed by the calendar year in which the
   * academic year started.
   */
  readonly yearUrls: ReadonlyMap<number, string>
}

/**
 * A course row in a degree structure page.
 */
export interface CourseCell {
  /** Trimmed cell text */
  readonly name: string
  /** Link to the course page, if the cell has one */
  readonly href: string | null
}

export interface TeachingPage {
  readonly title: string
  /** Full text of the description block */
  readonly description: string
}

/**
 * The AsciiDoc page for one enrollment year of a degree.
 */
export interface YearDocument {
  readonly year: number
  readonly content: string
}
