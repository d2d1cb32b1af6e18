import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdtempSync, rmSync, existsSync, readFileSync, writeFileSync, readdirSync } from 'fs'
import { tmpdir } from 'os'
import path from 'path'
import { loadJson, moveToBackup, readJson, repairTruncated, saveJson } from '../json-store.js'

describe('json-store', () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), 'habitus-json-'))
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
    rmSync(dir, { recursive: true, force: true })
  })

  describe('loadJson', () => {
    it('returns the fallback for a missing file', async () => {
      expect(await loadJson(path.join(dir, 'absent.json'), { sessions: [] })).toEqual({ sessions: [] })
    })

    it('returns the fallback for unrecoverable content', async () => {
      const file = path.join(dir, 'garbage.json')
      writeFileSync(file, 'definitely not json')
      expect(await loadJson(file, 'fallback')).toBe('fallback')
    })

    it('recovers the longest parseable prefix of a truncated file', async () => {
      const file = path.join(dir, 'truncated.json')
      writeFileSync(file, '{"a": 1}\n{"b"')

      const outcome = await readJson(file)
      expect(outcome).toEqual({ status: 'repaired', value: { a: 1 }, discarded: 5 })
      expect(await loadJson(file, null)).toEqual({ a: 1 })
    })
  })

  describe('repairTruncated', () => {
    it('returns null when no prefix parses', () => {
      expect(repairTruncated('{"sessions": [{"x": 1')).toBeNull()
    })

    it('walks back past closers that do not end a valid prefix', () => {
      expect(repairTruncated('[1, 2] trailing }')).toEqual({ value: [1, 2], discarded: 11 })
    })
  })

  describe('saveJson', () => {
    it('writes indented JSON with a trailing newline and leaves no temp file', async () => {
      const file = path.join(dir, 'nested', 'doc.json')
      const result = await saveJson(file, { count: 1 })

      expect(result).toEqual({ ok: true, attempts: 1 })
      expect(readFileSync(file, 'utf-8')).toBe('{\n  "count": 1\n}\n')
      expect(existsSync(`${file}.tmp`)).toBe(false)
    })

    it('overwrites an existing document', async () => {
      const file = path.join(dir, 'doc.json')
      await saveJson(file, { version: 1 })
      await saveJson(file, { version: 2 })
      expect(await loadJson(file, null)).toEqual({ version: 2 })
    })

    it('reports failure after its retries and leaves the original untouched', async () => {
      const file = path.join(dir, 'doc.json')
      writeFileSync(file, '{"kept": true}\n')

      const result = await saveJson(file, { value: BigInt(1) }, { maxRetries: 2, backoffMs: 0 })

      expect(result.ok).toBe(false)
      expect(result.attempts).toBe(2)
      expect(readFileSync(file, 'utf-8')).toBe('{"kept": true}\n')
      expect(existsSync(`${file}.tmp`)).toBe(false)
    })

    it('rejects documents with no JSON form', async () => {
      const result = await saveJson(path.join(dir, 'doc.json'), undefined, { maxRetries: 1 })
      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error.message).toBe('Document is not JSON-serializable')
      }
    })
  })

  describe('moveToBackup', () => {
    const now = new Date('2025-03-04T05:06:07Z')

    it('moves the file into a sibling .backup directory with a timestamped name', async () => {
      const file = path.join(dir, 'sessions-2025-03.json')
      writeFileSync(file, 'broken')

      const result = await moveToBackup(file, undefined, now)

      expect(result).toEqual({ ok: true, backupPath: path.join(dir, '.backup', 'sessions-2025-03_20250304_050607.json') })
      expect(existsSync(file)).toBe(false)
    })

    it('never overwrites an earlier backup with the same stamp', async () => {
      const file = path.join(dir, 'index.json')
      writeFileSync(file, 'first')
      await moveToBackup(file, undefined, now)
      writeFileSync(file, 'second')
      await moveToBackup(file, undefined, now)

      expect(readdirSync(path.join(dir, '.backup')).sort()).toEqual([
        'index_20250304_050607.json',
        'index_20250304_050607_1.json'
      ])
    })

    it('fails for a missing file', async () => {
      const result = await moveToBackup(path.join(dir, 'absent.json'))
      expect(result.ok).toBe(false)
    })
  })
})
