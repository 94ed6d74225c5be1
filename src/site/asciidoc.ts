/**
 * Asciidoctor Processor
 *
 * Shared Asciidoctor.js instance and the document types derived from it.
 */

import asciidoctor from '@asciidoctor/core'

/** Options applied to every conversion: no file access outside the document's dir */
const PROCESSOR_OPTIONS = { safe: 'safe' } as const

export const processor = asciidoctor()

export type AsciiDocument = ReturnType<typeof processor.load>
export type AsciiBlock = ReturnType<AsciiDocument['getBlocks']>[number]

/**
 * Parse an AsciiDoc source into a document tree.
 */
export function loadDocument(source: string): AsciiDocument {
  return processor.load(source, { ...PROCESSOR_OPTIONS })
}

/**
 * Convert an AsciiDoc source into a standalone HTML5 page.
 * Inter-document xrefs to `x.adoc` link to `x.html`.
 */
export function convertToHtml(source: string): string {
  const converted = processor.convert(source, { ...PROCESSOR_OPTIONS, standalone: true })
  if (typeof converted !== 'string') {
    throw new Error('Asciidoctor returned a document instead of HTML')
  }
  return converted
}
