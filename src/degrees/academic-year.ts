/**
 * Academic Years
 *
 * Academic years start in September and are named after the calendar year
 * in which they start.
 */

/** September, as a 0-based JS month index */
const SEPTEMBER = 8

/** Number of enrollment years to scrape for each degree */
export const YEARS_PER_DEGREE = 3

/**
 * The calendar year in which the academic year containing `now` started.
 */
export function currentAcademicYear(now: Date = new Date()): number {
  const year = now.getFullYear()
  return now.getMonth() >= SEPTEMBER ? year : year - 1
}

/**
 * Enrollment years to scrape, oldest first.
 *
 * The audience is B.Sc. students applying for a M.Sc., who usually don't
 * apply in their first or second year, so the current and previous academic
 * years are left out.
 */
export function scrapedYears(now: Date = new Date(), yearsPerDegree = YEARS_PER_DEGREE): number[] {
  const previousAcademicYear = currentAcademicYear(now) - 1
  const firstScrapedYear = previousAcademicYear - yearsPerDegree
  return Array.from({ length: Math.max(yearsPerDegree, 0) }, (_, i) => firstScrapedYear + i)
}
