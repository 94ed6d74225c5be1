/**
 * Site Step
 *
 * Convert every AsciiDoc file of a directory into the published formats.
 */

import { copyFile, mkdir, readdir, readFile, writeFile } from 'node:fs/promises'
import { basename, join } from 'node:path'
import { convertToHtml, convertToPdf, SITE_FORMATS, type SiteFormat } from '../../site'
import type { Logger } from '../logger'

const ADOC_EXTENSION = '.adoc'

interface BuildSiteOptions {
  /** Formats to publish (default: all) */
  readonly formats?: readonly SiteFormat[] | undefined
}

interface BuildSiteStats {
  /** Number of .adoc sources converted */
  readonly sourceCount: number
  /** Paths written, grouped by format */
  readonly written: Readonly<Record<SiteFormat, readonly string[]>>
}

/**
 * List the .adoc files of a directory (not recursive), sorted by name.
 */
export async function listAdocFiles(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true })
  return entries
    .filter((entry) => entry.isFile() && entry.name.endsWith(ADOC_EXTENSION))
    .map((entry) => entry.name)
    .sort()
}

/**
 * Build the site. Any failed conversion aborts the build.
 */
export async function buildSite(
  logger: Logger,
  inputDir: string,
  siteDir: string,
  options: BuildSiteOptions = {}
): Promise<BuildSiteStats> {
  const formats = options.formats ?? SITE_FORMATS
  const files = await listAdocFiles(inputDir)
  await mkdir(siteDir, { recursive: true })

  const written: Record<SiteFormat, string[]> = { adoc: [], html: [], pdf: [] }

  for (const file of files) {
    const source = join(inputDir, file)
    const base = basename(file, ADOC_EXTENSION)
    const content = formats.some((f) => f !== 'adoc') ? await readFile(source, 'utf-8') : ''

    for (const format of formats) {
      const target = join(siteDir, `${base}.${format}`)
      if (format === 'adoc') {
        await copyFile(source, target)
      } else if (format === 'html') {
        await writeFile(target, convertToHtml(content))
      } else {
        await writeFile(target, await convertToPdf(content))
      }
      written[format].push(target)
    }
    logger.verbose(`Converted ${file}`)
  }

  logger.success(`Built ${files.length} documents into ${siteDir} (${formats.join(', ')})`)
  return { sourceCount: files.length, written }
}
