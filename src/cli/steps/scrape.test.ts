import { describe, expect, it } from 'vitest'
import { createPageFetcher } from '../../scraper/page-fetcher'
import {
  createRecordingLogger,
  createStubFetch,
  englishTeachingHtml,
  italianTeachingHtml,
  type StubPage,
  structureHtml
} from '../../test-support'
import type { Degree } from '../../types'
import type { PipelineContext } from './context'
import { analyzeDegree, analyzeYear, renderCourse } from './scrape'

const STRUCTURE_URL = 'https://corsi.example.org/laurea/informatica/insegnamenti/piano/2023'
const ITALIAN_URL = 'https://www.example.org/it/teaching/2023/1'
const ENGLISH_URL = 'https://www.example.org/en/teaching/2023/1'
const BROKEN_URL = 'https://www.example.org/it/teaching/2023/9'

const DESCRIPTION = [
  'Learning outcomes',
  'At the end of the course the student knows graphs.',
  'Teaching contents',
  'Sorting',
  '',
  'Readings/Bibliography',
  'A book'
].join('\n')

const ALGORITHMS_SECTION =
  `\n\n== ${ENGLISH_URL}[ALGORITHMS]\n\n` +
  'link:degree-informatica-2023.pdf[PDF], xref:degree-informatica-2023.adoc[ADOC].\n\n' +
  '=== Learning outcomes\n\nAt the end of the course the student knows graphs.\n\n' +
  '=== Teaching contents\n\nSorting'

const TEACHING_PAGES: Record<string, StubPage> = {
  [ITALIAN_URL]: italianTeachingHtml(ENGLISH_URL),
  [ENGLISH_URL]: englishTeachingHtml('ALGORITHMS', DESCRIPTION)
}

const DEGREE: Degree = { name: 'Informatica', slug: 'informatica', yearUrls: new Map() }

function createContext(pages: Record<string, StubPage>) {
  const logger = createRecordingLogger()
  const { fetch, requests } = createStubFetch(pages)
  const ctx: PipelineContext = {
    fetchPage: createPageFetcher({ fetch }),
    logger,
    cacheDir: '/nonexistent',
    noCache: true
  }
  return { ctx, logger, requests }
}

describe('renderCourse', () => {
  it('renders a course with a link', async () => {
    const { ctx, logger } = createContext(TEACHING_PAGES)

    const section = await renderCourse(
      ctx,
      { name: 'ALGORITHMS', href: ITALIAN_URL },
      'informatica',
      2023
    )

    expect(section).toBe(ALGORITHMS_SECTION)
    expect(logger.logs).toEqual(['Visiting ALGORITHMS'])
  })

  it('skips a course without a link', async () => {
    const { ctx, logger, requests } = createContext({})

    expect(await renderCourse(ctx, { name: 'THESIS', href: null }, 'informatica', 2023)).toBeNull()
    expect(logger.warnings).toEqual(['Missing link: THESIS'])
    expect(requests).toEqual([])
  })

  it('skips a course whose description cannot be scraped', async () => {
    const { ctx, logger } = createContext({ [ITALIAN_URL]: '<p>Pagina</p>' })

    const section = await renderCourse(
      ctx,
      { name: 'ALGORITHMS', href: ITALIAN_URL },
      'informatica',
      2023
    )

    expect(section).toBeNull()
    expect(logger.warnings).toEqual(['Cannot get description: Cannot get english url'])
  })
})

describe('analyzeYear', () => {
  it('joins the courses that could be scraped, in table order', async () => {
    const { ctx, logger } = createContext({
      ...TEACHING_PAGES,
      [STRUCTURE_URL]: structureHtml([
        { name: 'ALGORITHMS', href: ITALIAN_URL },
        { name: 'THESIS' },
        { name: 'BROKEN', href: BROKEN_URL }
      ])
    })

    const document = await analyzeYear(ctx, DEGREE, 2023, STRUCTURE_URL, { concurrency: 1 })

    expect(document).toEqual({
      year: 2023,
      content: `= Informatica (2023)\n\n${ALGORITHMS_SECTION}`
    })
    expect(logger.logs).toEqual([
      `Analysing 2023 link: ${STRUCTURE_URL}`,
      'Visiting ALGORITHMS',
      'Visiting THESIS',
      'Visiting BROKEN'
    ])
    expect(logger.warnings).toEqual([
      'Missing link: THESIS',
      `Cannot get description: Network error: getaddrinfo ENOTFOUND ${BROKEN_URL}`
    ])
    expect(logger.successes).toEqual(['Informatica (2023): 1/3 courses'])
    expect(logger.progress).toEqual([
      'Informatica (2023) 1/3',
      'Informatica (2023) 2/3',
      'Informatica (2023) 3/3'
    ])
  })

  it('keeps table order when courses run concurrently', async () => {
    const secondItalian = 'https://www.example.org/it/teaching/2023/2'
    const secondEnglish = 'https://www.example.org/en/teaching/2023/2'
    const { ctx } = createContext({
      ...TEACHING_PAGES,
      [secondItalian]: italianTeachingHtml(secondEnglish),
      [secondEnglish]: englishTeachingHtml('THEORY', DESCRIPTION),
      [STRUCTURE_URL]: structureHtml([
        { name: 'ALGORITHMS', href: ITALIAN_URL },
        { name: 'THEORY', href: secondItalian }
      ])
    })

    const document = await analyzeYear(ctx, DEGREE, 2023, STRUCTURE_URL, { concurrency: 4 })

    const headings = document?.content.split('\n').filter((line) => line.startsWith('== '))
    expect(headings).toEqual([`== ${ENGLISH_URL}[ALGORITHMS]`, `== ${secondEnglish}[THEORY]`])
  })

  it('resolves relative course links against the structure page', async () => {
    const { ctx, requests } = createContext({
      ...TEACHING_PAGES,
      [STRUCTURE_URL]: structureHtml([{ name: 'ALGORITHMS', href: '//www.example.org/it/teaching/2023/1' }])
    })

    await analyzeYear(ctx, DEGREE, 2023, STRUCTURE_URL)

    expect(requests).toEqual([STRUCTURE_URL, ITALIAN_URL, ENGLISH_URL])
  })

  it('skips the year when the structure page fails', async () => {
    const { ctx, logger } = createContext({ [STRUCTURE_URL]: { status: 500 } })

    expect(await analyzeYear(ctx, DEGREE, 2023, STRUCTURE_URL)).toBeNull()
    expect(logger.warnings).toEqual(['Skipping Informatica (2023): HTTP 500'])
  })
})

describe('analyzeDegree', () => {
  it('returns the documents of the years that could be scraped, oldest first', async () => {
    const url2022 = 'https://corsi.example.org/laurea/informatica/insegnamenti/piano/2022'
    const url2024 = 'https://corsi.example.org/laurea/informatica/insegnamenti/piano/2024'
    const { ctx, logger } = createContext({
      [url2022]: structureHtml([]),
      [STRUCTURE_URL]: structureHtml([]),
      [url2024]: { status: 404 }
    })
    const degree: Degree = {
      ...DEGREE,
      yearUrls: new Map([
        [2024, url2024],
        [2023, STRUCTURE_URL],
        [2022, url2022]
      ])
    }

    const documents = await analyzeDegree(ctx, degree)

    expect(documents).toEqual([
      { year: 2022, content: '= Informatica (2022)\n\n' },
      { year: 2023, content: '= Informatica (2023)\n\n' }
    ])
    expect(logger.logs).toEqual([
      '\n📚 Informatica',
      `Analysing 2022 link: ${url2022}`,
      `Analysing 2023 link: ${STRUCTURE_URL}`,
      `Analysing 2024 link: ${url2024}`
    ])
  })
})
