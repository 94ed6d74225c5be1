/**
 * Write Step
 *
 * Write year documents and the index page to the output directory.
 */

import { mkdir, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import type { Degree, YearDocument } from '../../types'
import {
  INDEX_FILE_NAME,
  type IndexOptions,
  renderDegreeIndexBlock,
  renderIndex,
  yearFileName
} from '../../writer'
import type { Logger } from '../logger'

/**
 * Produces the year documents of a degree.
 */
export type AnalyzeDegree = (degree: Degree) => Promise<YearDocument[]>

interface WriteStepResult {
  /** Paths written, index last */
  readonly files: readonly string[]
}

/**
 * Analyse each degree in turn, writing its year files as soon as they are
 * ready, then write the index. Write failures are thrown.
 */
export async function writeCourses(
  logger: Logger,
  outputDir: string,
  degrees: readonly Degree[],
  analyze: AnalyzeDegree,
  indexOptions: IndexOptions = {}
): Promise<WriteStepResult> {
  await mkdir(outputDir, { recursive: true })

  const files: string[] = []
  const blocks: string[] = []

  for (const degree of degrees) {
    const documents = await analyze(degree)
    for (const { year, content } of documents) {
      const path = join(outputDir, yearFileName(degree.slug, year))
      await writeFile(path, content)
      logger.verbose(`Wrote ${path}`)
      files.push(path)
    }
    blocks.push(renderDegreeIndexBlock(degree, documents))
  }

  const indexPath = join(outputDir, INDEX_FILE_NAME)
  await writeFile(indexPath, renderIndex(blocks, indexOptions))
  files.push(indexPath)
  logger.success(`Wrote ${files.length} files to ${outputDir}`)

  return { files }
}
