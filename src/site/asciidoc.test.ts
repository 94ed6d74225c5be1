import { describe, expect, it } from 'vitest'
import { convertToHtml, loadDocument } from './asciidoc'

const SOURCE = [
  '= Informatica (2024)',
  '',
  '== https://www.example.org/en/teaching/1[ALGORITHMS]',
  '',
  'link:degree-informatica-2024.pdf[PDF], xref:degree-informatica-2024.adoc[ADOC].',
  ''
].join('\n')

describe('loadDocument', () => {
  it('parses the document title', () => {
    expect(loadDocument(SOURCE).getAttribute('doctitle')).toBe('Informatica (2024)')
  })
})

describe('convertToHtml', () => {
  it('renders a standalone page', () => {
    const html = convertToHtml(SOURCE)

    expect(html.startsWith('<!DOCTYPE html>')).toBe(true)
    expect(html).toContain('<h1>Informatica (2024)</h1>')
  })

  it('points cross references at the HTML pages', () => {
    const html = convertToHtml(SOURCE)

    expect(html).toContain('<a href="degree-informatica-2024.html">ADOC</a>')
    expect(html).toContain('<a href="degree-informatica-2024.pdf">PDF</a>')
  })
})
