import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs'
import { homedir, tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { FilesystemCache } from './filesystem'

describe('FilesystemCache', () => {
  let testDir: string
  let cache: FilesystemCache

  beforeEach(() => {
    testDir = join(tmpdir(), `cache-test-${Date.now()}-${Math.random().toString(36).slice(2)}`)
    mkdirSync(testDir, { recursive: true })
    cache = new FilesystemCache(testDir)
  })

  afterEach(() => {
    if (existsSync(testDir)) {
      rmSync(testDir, { recursive: true, force: true })
    }
  })

  describe('get', () => {
    it('should return null for non-existent key', async () => {
      expect(await cache.get('nonexistent')).toBeNull()
    })

    it('should return cached value', async () => {
      await cache.set('abc123', { data: '<html></html>', cachedAt: 1700000000000 })

      expect(await cache.get('abc123')).toEqual({
        data: '<html></html>',
        cachedAt: 1700000000000
      })
    })

    it('should return null for a corrupt entry', async () => {
      const dir = join(testDir, 'requests', 'co')
      mkdirSync(dir, { recursive: true })
      writeFileSync(join(dir, 'corrupt.json'), '{not json')

      expect(await cache.get('corrupt')).toBeNull()
    })

    it('should return null for an entry with the wrong shape', async () => {
      const dir = join(testDir, 'requests', 'sh')
      mkdirSync(dir, { recursive: true })
      writeFileSync(join(dir, 'shape.json'), JSON.stringify({ response: { data: 42 } }))

      expect(await cache.get('shape')).toBeNull()
    })
  })

  describe('set', () => {
    it('should create cache directory if not exists', async () => {
      await cache.set('newdir123', { data: 'test', cachedAt: 1 })

      expect(existsSync(join(testDir, 'requests', 'ne'))).toBe(true)
    })

    it('should use keys containing a slash as paths', async () => {
      await cache.set('web/example_org_1a2b3c4d', { data: 'page', cachedAt: 1 })

      const path = join(testDir, 'requests', 'web', 'example_org_1a2b3c4d.json')
      expect(existsSync(path)).toBe(true)
      expect(JSON.parse(readFileSync(path, 'utf-8'))).toEqual({
        response: { data: 'page', cachedAt: 1 }
      })
    })

    it('should overwrite existing entry', async () => {
      await cache.set('overwrite123', { data: 'first', cachedAt: 1 })
      await cache.set('overwrite123', { data: 'second', cachedAt: 2 })

      expect(await cache.get('overwrite123')).toEqual({ data: 'second', cachedAt: 2 })
    })
  })

  it('refuses the real user cache directory during tests', () => {
    expect(() => new FilesystemCache(join(homedir(), '.cache', 'course-descriptions'))).toThrow(
      "Attempted to access user's real cache directory"
    )
  })
})
