/**
 * Test Support Module
 *
 * In-process stand-ins for the network and the cache, plus builders for the
 * HTML pages the scraper reads.
 */

import type { CachedResponse, ResponseCache } from '../caching/types'
import type { Logger } from '../cli/logger'
import type { FetchFn, HttpResponse } from '../http'
import type { Reporter } from '../scraper/types'

/**
 * A canned response. A string is a 200 response with that body.
 */
export type StubPage = string | { readonly status: number; readonly body?: string }

export interface StubFetch {
  readonly fetch: FetchFn
  /** URLs requested so far, in order */
  readonly requests: string[]
}

/**
 * Create a fetch stub serving the given pages by exact URL.
 * Unknown URLs reject like an unreachable host.
 */
export function createStubFetch(pages: Readonly<Record<string, StubPage>>): StubFetch {
  const requests: string[] = []
  const fetch: FetchFn = async (url) => {
    requests.push(url)
    const page = pages[url]
    if (page === undefined) {
      throw new Error(`getaddrinfo ENOTFOUND ${url}`)
    }
    const { status, body } = typeof page === 'string' ? { status: 200, body: page } : page
    const response: HttpResponse = {
      ok: status >= 200 && status < 300,
      status,
      url,
      text: async () => body ?? ''
    }
    return response
  }
  return { fetch, requests }
}

/**
 * In-memory ResponseCache.
 */
export class MemoryCache implements ResponseCache {
  readonly entries = new Map<string, CachedResponse>()

  async get(key: string): Promise<CachedResponse | null> {
    return this.entries.get(key) ?? null
  }

  async set(key: string, response: CachedResponse): Promise<void> {
    this.entries.set(key, response)
  }
}

/**
 * Reporter that records every message.
 */
export function createRecordingReporter(): Reporter & { logs: string[]; warnings: string[] } {
  const logs: string[] = []
  const warnings: string[] = []
  return {
    logs,
    warnings,
    log: (msg) => logs.push(msg),
    warn: (msg) => warnings.push(msg)
  }
}

/**
 * CLI logger that records messages instead of printing them.
 * Debug lines are dropped. Progress updates are kept as `<msg> <current>/<total>`.
 */
export function createRecordingLogger(): Logger & {
  logs: string[]
  successes: string[]
  warnings: string[]
  errors: string[]
  progress: string[]
} {
  const logs: string[] = []
  const successes: string[] = []
  const warnings: string[] = []
  const errors: string[] = []
  const progress: string[] = []
  return {
    logs,
    successes,
    warnings,
    errors,
    progress,
    log: (msg) => logs.push(msg),
    verbose: () => {},
    success: (msg) => successes.push(msg),
    warn: (msg) => warnings.push(msg),
    error: (msg) => errors.push(msg),
    progress: (msg, current, total) => progress.push(`${msg} ${current}/${total}`)
  }
}

/**
 * Page listing the study plans of a degree for one enrollment year.
 */
export function structureListHtml(planHrefs: readonly string[]): string {
  const items = planHrefs.map((href) => `<li><a href="${href}">Plan</a></li>`).join('\n')
  return `<html><body><ul class="no-bullet">\n${items}\n</ul></body></html>`
}

/**
 * Degree structure page with one table row per course.
 * A course without href gets a cell with no link.
 */
export function structureHtml(
  courses: ReadonlyArray<{ readonly name: string; readonly href?: string }>
): string {
  const rows = courses
    .map(({ name, href }) =>
      href === undefined
        ? `<tr><td class="title">${name}</td></tr>`
        : `<tr><td class="title"><a href="${href}">${name}</a></td></tr>`
    )
    .join('\n')
  return `<html><body><table>\n${rows}\n</table></body></html>`
}

/**
 * Italian teaching page linking to its English version.
 */
export function italianTeachingHtml(englishUrl: string): string {
  return `<html><body><ul class="languages">
<li class="language-it">Italiano</li>
<li class="language-en"><a href="${englishUrl}">English</a></li>
</ul></body></html>`
}

/**
 * English teaching page with a title and a description block.
 */
export function englishTeachingHtml(title: string, description: string): string {
  return `<html><body>
<div id="u-content-intro"><h1>${title}</h1></div>
<div class="description-text">${description}</div>
</body></html>`
}
