/**
 * Course Descriptions Core Library
 *
 * Scrape university course pages into unified AsciiDoc documents and
 * convert them into HTML and PDF.
 *
 * Design principle: Pure functions only. No filesystem IO, no orchestration.
 * Page fetches go through an injectable fetch function.
 *
 * @license AGPL-3.0
 */

// Cache module
export type { CachedResponse, CacheKeyComponents, ResponseCache } from './caching/index'
export { FilesystemCache, generateCacheKey, generateUrlCacheKey } from './caching/index'
// Degrees module
export {
  currentAcademicYear,
  DEFAULT_COURSES_BASE_URL,
  DEFAULT_DEGREES_PATH,
  loadDegreeEntries,
  nameAndCodeToSlug,
  nameToLevel,
  parseDegreeEntries,
  type ResolveDegreeOptions,
  resolveDegree,
  resolveDegrees,
  scrapedYears,
  structureListUrl,
  YEARS_PER_DEGREE
} from './degrees/index'
// HTTP utilities
export { BlockedHttpRequestError, type FetchFn, guardedFetch, type HttpResponse } from './http'
// Scraper module
export {
  createPageFetcher,
  DEFAULT_USER_AGENT,
  extractCourseCells,
  extractEnglishUrl,
  extractLearningSection,
  extractStructureLink,
  type FetchPageOptions,
  fetchCourseCells,
  MISSING_TRANSLATIONS,
  type PageFetcher,
  parseTeachingPage,
  type Reporter,
  renderDescription,
  renderTeachingSection,
  resolveUrl,
  SILENT_REPORTER,
  type ScraperConfig,
  scrapeTeaching,
  yearTitle
} from './scraper/index'
// Site module
export {
  type AsciiDocument,
  convertToHtml,
  convertToPdf,
  isSiteFormat,
  loadDocument,
  type PdfBlock,
  type PdfOutline,
  renderPdf,
  SITE_FORMATS,
  type SiteFormat,
  toPdfOutline
} from './site/index'
// Types
export type {
  ApiError,
  ApiErrorType,
  CourseCell,
  Degree,
  DegreeEntry,
  DegreeLevel,
  Result,
  TeachingPage,
  YearDocument
} from './types'
// Writer module
export {
  DEFAULT_INDEX_TITLE,
  INDEX_FILE_NAME,
  type IndexOptions,
  renderDegreeIndexBlock,
  renderIndex,
  renderYearIndexEntry,
  yearDocumentName,
  yearFileName
} from './writer/index'

export const VERSION = '0.1.0'
