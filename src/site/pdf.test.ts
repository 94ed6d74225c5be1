import { describe, expect, it } from 'vitest'
import { convertToPdf, renderPdf, toPdfOutline } from './pdf'

const SOURCE = [
  '= Informatica (2023)',
  '',
  '',
  '== https://www.example.org/en/teaching/1[ALGORITHMS]',
  '',
  'link:degree-informatica-2023.pdf[PDF], xref:degree-informatica-2023.adoc[ADOC].',
  '',
  '=== Learning outcomes',
  '',
  'Graphs & trees',
  ''
].join('\n')

function header(bytes: Uint8Array): string {
  return new TextDecoder().decode(bytes.subarray(0, 5))
}

describe('toPdfOutline', () => {
  it('flattens sections and paragraphs in document order', () => {
    expect(toPdfOutline(SOURCE)).toEqual({
      title: 'Informatica (2023)',
      blocks: [
        {
          kind: 'heading',
          level: 1,
          text: 'ALGORITHMS',
          link: 'https://www.example.org/en/teaching/1'
        },
        { kind: 'paragraph', text: 'PDF, ADOC.' },
        { kind: 'heading', level: 2, text: 'Learning outcomes', link: null },
        { kind: 'paragraph', text: 'Graphs & trees' }
      ]
    })
  })

  it('keeps list items, numbered or bulleted', () => {
    const source = [
      '= Informatica (2023)',
      '',
      '== https://www.example.org/en/teaching/1[ALGORITHMS]',
      '',
      '=== Teaching contents',
      '',
      '1. Graph algorithms',
      '',
      '2. Dynamic programming',
      '',
      '=== Teaching tools',
      '',
      '- Sorting networks',
      '- Slides & notes',
      ''
    ].join('\n')

    expect(toPdfOutline(source).blocks).toEqual([
      {
        kind: 'heading',
        level: 1,
        text: 'ALGORITHMS',
        link: 'https://www.example.org/en/teaching/1'
      },
      { kind: 'heading', level: 2, text: 'Teaching contents', link: null },
      { kind: 'paragraph', text: '1. Graph algorithms' },
      { kind: 'paragraph', text: '2. Dynamic programming' },
      { kind: 'heading', level: 2, text: 'Teaching tools', link: null },
      { kind: 'paragraph', text: '• Sorting networks' },
      { kind: 'paragraph', text: '• Slides & notes' }
    ])
  })

  it('keeps nested list items after their parent', () => {
    const source = ['1. Graph algorithms', '** Shortest paths', '2. Dynamic programming', ''].join(
      '\n'
    )

    expect(toPdfOutline(source).blocks).toEqual([
      { kind: 'paragraph', text: '1. Graph algorithms' },
      { kind: 'paragraph', text: '• Shortest paths' },
      { kind: 'paragraph', text: '2. Dynamic programming' }
    ])
  })

  it('joins description list terms and descriptions', () => {
    expect(toPdfOutline('Graph theory:: Paths and trees\n').blocks).toEqual([
      { kind: 'paragraph', text: 'Graph theory: Paths and trees' }
    ])
  })

  it('handles a document without title', () => {
    expect(toPdfOutline('Just text')).toEqual({
      title: '',
      blocks: [{ kind: 'paragraph', text: 'Just text' }]
    })
  })
})

describe('renderPdf', () => {
  it('produces a PDF file', async () => {
    const bytes = await renderPdf({
      title: 'Informatica (2023)',
      blocks: [
        { kind: 'heading', level: 1, text: 'ALGORITHMS', link: 'https://www.example.org/1' },
        { kind: 'paragraph', text: 'Graphs' }
      ]
    })

    expect(header(bytes)).toBe('%PDF-')
  })

  it('renders an empty outline', async () => {
    const bytes = await renderPdf({ title: '', blocks: [] })

    expect(header(bytes)).toBe('%PDF-')
  })
})

describe('convertToPdf', () => {
  it('converts AsciiDoc to PDF', async () => {
    expect(header(await convertToPdf(SOURCE))).toBe('%PDF-')
  })
})
