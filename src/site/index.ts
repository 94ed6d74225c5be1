/**
 * Site
 *
 * Convert AsciiDoc documents into the published formats.
 */

export type SiteFormat = 'adoc' | 'html' | 'pdf'

export const SITE_FORMATS: readonly SiteFormat[] = ['adoc', 'html', 'pdf']

export function isSiteFormat(value: string): value is SiteFormat {
  return SITE_FORMATS.some((format) => format === value)
}

export { type AsciiDocument, convertToHtml, loadDocument } from './asciidoc'
export { convertToPdf, type PdfBlock, type PdfOutline, renderPdf, toPdfOutline } from './pdf'
