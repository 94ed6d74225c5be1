/**
 * Pipeline Steps
 *
 * resolve → scrape → write, then site.
 */

export { getCacheDir, initContext, type PipelineContext } from './context'
export { stepResolve } from './resolve'
export { analyzeDegree, analyzeYear, renderCourse, type ScrapeStepOptions } from './scrape'
export { buildSite, listAdocFiles } from './site'
export { type AnalyzeDegree, writeCourses } from './write'
