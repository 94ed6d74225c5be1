import { describe, expect, it } from 'vitest'
import { generateCacheKey, generateUrlCacheKey } from './key'

describe('generateCacheKey', () => {
  it('returns a 64 char hex string', () => {
    const key = generateCacheKey({ service: 'http', model: 'GET', payload: { url: 'a' } })
    expect(key).toMatch(/^[0-9a-f]{64}$/)
  })

  it('ignores payload key order', () => {
    const a = generateCacheKey({ service: 'http', model: 'GET', payload: { a: 1, b: [{ x: 1, y: 2 }] } })
    const b = generateCacheKey({ service: 'http', model: 'GET', payload: { b: [{ y: 2, x: 1 }], a: 1 } })
    expect(a).toBe(b)
  })

  it('differs by service and model', () => {
    const payload = { url: 'https://example.org' }
    const get = generateCacheKey({ service: 'http', model: 'GET', payload })
    const head = generateCacheKey({ service: 'http', model: 'HEAD', payload })
    expect(get).not.toBe(head)
  })
})

describe('generateUrlCacheKey', () => {
  it('builds a readable path under web/', () => {
    const key = generateUrlCacheKey('https://corsi.example.org/laurea/informatica?year=2022')
    expect(key).toMatch(/^web\/https_corsi_example_org_laurea_informatica_year_2022_[0-9a-f]{8}$/)
  })

  it('truncates long URLs to 80 sanitized chars', () => {
    const key = generateUrlCacheKey(`https://example.org/${'a'.repeat(200)}`)
    const [, name] = key.split('/')
    expect(name?.length).toBe(80 + 1 + 8)
  })

  it('keeps URLs that sanitize alike apart', () => {
    expect(generateUrlCacheKey('https://example.org/a?b')).not.toBe(
      generateUrlCacheKey('https://example.org/a/b')
    )
  })
})
