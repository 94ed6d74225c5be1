/**
 * PDF Export
 *
 * Render AsciiDoc course documents to PDF using pdfkit.
 * The AsciiDoc tree is flattened into headings and paragraphs first, so the
 * layout code never sees Asciidoctor types. List items become paragraphs
 * prefixed with their bullet or number.
 */

import { decode } from 'html-entities'
import PDFDocument from 'pdfkit'
import { type AsciiBlock, loadDocument } from './asciidoc'

export type PdfBlock =
  | {
      readonly kind: 'heading'
      /** Section level: 1 for `==`, 2 for `===`, ... */
      readonly level: number
      readonly text: string
      /** Target of the link making up the heading, if any */
      readonly link: string | null
    }
  | { readonly kind: 'paragraph'; readonly text: string }

export interface PdfOutline {
  readonly title: string
  readonly blocks: readonly PdfBlock[]
}

const HEADING_FONT_SIZES: Record<number, number> = { 0: 22, 1: 16, 2: 13 }
const DEFAULT_HEADING_FONT_SIZE = 12
const BODY_FONT_SIZE = 10.5

/**
 * Strip tags from converted inline content and decode entities.
 */
function toPlainText(html: string): string {
  return decode(html.replace(/<[^>]+>/g, '')).trim()
}

function firstLinkTarget(html: string): string | null {
  const match = html.match(/<a href="([^"]*)"/)
  return match?.[1] === undefined ? null : decode(match[1])
}

function isAsciiBlock(node: unknown): node is AsciiBlock {
  return typeof node === 'object' && node !== null && 'getContext' in node && 'getBlocks' in node
}

/**
 * Text of a list item or description list term, as plain text.
 */
function itemText(item: AsciiBlock): string {
  if (!('getText' in item) || typeof item.getText !== 'function') return ''
  const text: unknown = item.getText()
  return typeof text === 'string' ? toPlainText(text) : ''
}

function collectList(list: AsciiBlock, out: PdfBlock[]): void {
  const ordered = list.getContext() === 'olist'
  list.getBlocks().forEach((item: AsciiBlock, index: number) => {
    const text = itemText(item)
    if (text) {
      out.push({ kind: 'paragraph', text: `${ordered ? `${index + 1}.` : '•'} ${text}` })
    }
    collectBlocks(item.getBlocks(), out)
  })
}

/**
 * Description list entries are [terms, description] pairs, not blocks.
 */
function collectDescriptionList(list: AsciiBlock, out: PdfBlock[]): void {
  const entries: readonly unknown[] = list.getBlocks()
  for (const entry of entries) {
    if (!Array.isArray(entry)) continue
    const [terms, description]: readonly unknown[] = entry
    const termItems: readonly unknown[] = Array.isArray(terms) ? terms : []
    const term = termItems.filter(isAsciiBlock).map(itemText).filter(Boolean).join(', ')
    const detail = isAsciiBlock(description) ? itemText(description) : ''

    const text = [term, detail].filter(Boolean).join(': ')
    if (text) {
      out.push({ kind: 'paragraph', text })
    }
    if (isAsciiBlock(description)) {
      collectBlocks(description.getBlocks(), out)
    }
  }
}

function collectBlocks(blocks: readonly AsciiBlock[], out: PdfBlock[]): void {
  for (const block of blocks) {
    const context = block.getContext()

    if (context === 'section') {
      const title: unknown = block.getTitle()
      const html = typeof title === 'string' ? title : ''
      out.push({
        kind: 'heading',
        level: block.getLevel(),
        text: toPlainText(html),
        link: firstLinkTarget(html)
      })
      collectBlocks(block.getBlocks(), out)
      continue
    }

    if (context === 'ulist' || context === 'olist') {
      collectList(block, out)
      continue
    }

    if (context === 'dlist') {
      collectDescriptionList(block, out)
      continue
    }

    const children = block.getBlocks()
    if (children.length > 0) {
      collectBlocks(children, out)
      continue
    }

    const content: unknown = block.getContent()
    const text = typeof content === 'string' ? toPlainText(content) : ''
    if (text) {
      out.push({ kind: 'paragraph', text })
    }
  }
}

/**
 * Flatten an AsciiDoc source into the title, headings and paragraphs to print.
 */
export function toPdfOutline(source: string): PdfOutline {
  const doc = loadDocument(source)
  const title: unknown = doc.getAttribute('doctitle')
  const blocks: PdfBlock[] = []
  collectBlocks(doc.getBlocks(), blocks)
  return { title: typeof title === 'string' ? toPlainText(title) : '', blocks }
}

function renderHeading(doc: PDFKit.PDFDocument, text: string, level: number, link: string | null) {
  const size = HEADING_FONT_SIZES[level] ?? DEFAULT_HEADING_FONT_SIZE
  doc.moveDown(level <= 1 ? 1 : 0.6)
  doc.font('Helvetica-Bold').fontSize(size)
  if (link) {
    doc.fillColor('#1a4f8b').text(text, { link, underline: true }).fillColor('black')
  } else {
    doc.text(text)
  }
  doc.moveDown(0.3)
}

/**
 * Render an outline to PDF.
 *
 * @returns PDF file as Uint8Array
 */
export async function renderPdf(outline: PdfOutline): Promise<Uint8Array> {
  const doc = new PDFDocument({
    size: 'A4',
    margin: 50,
    info: { Title: outline.title, Subject: 'Course descriptions' }
  })

  // Collect chunks in a buffer
  const chunks: Uint8Array[] = []
  doc.on('data', (chunk: Buffer) => {
    chunks.push(new Uint8Array(chunk))
  })

  const docFinished = new Promise<Uint8Array>((resolve, reject) => {
    doc.on('error', reject)
    doc.on('end', () => {
      const totalLength = chunks.reduce((sum, chunk) => sum + chunk.length, 0)
      const result = new Uint8Array(totalLength)
      let offset = 0
      for (const chunk of chunks) {
        result.set(chunk, offset)
        offset += chunk.length
      }
      resolve(result)
    })
  })

  if (outline.title) {
    renderHeading(doc, outline.title, 0, null)
  }

  for (const block of outline.blocks) {
    if (block.kind === 'heading') {
      renderHeading(doc, block.text, block.level, block.link)
    } else {
      doc.font('Helvetica').fontSize(BODY_FONT_SIZE).text(block.text, { align: 'left' })
      doc.moveDown(0.5)
    }
  }

  doc.end()
  return docFinished
}

/**
 * Convert an AsciiDoc source straight to PDF.
 */
export async function convertToPdf(source: string): Promise<Uint8Array> {
  return renderPdf(toPdfOutline(source))
}
