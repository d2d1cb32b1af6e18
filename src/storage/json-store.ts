import { copyFile, mkdir, open, readFile, rename, rm } from 'node:fs/promises'
import { existsSync } from 'node:fs'
import path from 'node:path'
import { setTimeout as sleep } from 'node:timers/promises'
import { createLogger } from '../logger.js'
import { backupStamp } from '../time.js'

const log = createLogger('storage')

export const DEFAULT_MAX_RETRIES = 3
export const DEFAULT_BACKOFF_MS = 100

export type ReadOutcome =
  | { status: 'ok'; value: unknown }
  | { status: 'repaired'; value: unknown; discarded: number }
  | { status: 'missing' }
  | { status: 'corrupt'; error: Error }

export interface SaveOptions {
  maxRetries?: number
  backoffMs?: number
}

export type SaveResult =
  | { ok: true; attempts: number }
  | { ok: false; error: Error; attempts: number }

export type BackupResult =
  | { ok: true; backupPath: string }
  | { ok: false; error: Error }

function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e))
}

function isMissing(e: unknown): boolean {
  return e instanceof Error && 'code' in e && e.code === 'ENOENT'
}

/**
 * Best-effort recovery of a truncated document: walk back from the end and
 * parse the longest prefix ending in `}` or `]`. Whatever follows that prefix
 * is lost.
 */
export function repairTruncated(content: string): { value: unknown; discarded: number } | null {
  for (let i = content.length - 1; i >= 0; i--) {
    const ch = content[i]
    if (ch !== '}' && ch !== ']') continue
    try {
      const value: unknown = JSON.parse(content.slice(0, i + 1))
      return { value, discarded: content.length - (i + 1) }
    } catch {
      continue
    }
  }
  return null
}

export async function readJson(filePath: string): Promise<ReadOutcome> {
  let content: string
  try {
    content = await readFile(filePath, 'utf-8')
  } catch (e) {
    if (isMissing(e)) return { status: 'missing' }
    log.warn(`Error loading ${filePath}: ${toError(e).message}`)
    return { status: 'corrupt', error: toError(e) }
  }

  try {
    return { status: 'ok', value: JSON.parse(content) }
  } catch (e) {
    log.warn(`Corrupted JSON in ${filePath}: ${toError(e).message}`)
    const repaired = repairTruncated(content)
    if (repaired) {
      log.warn(`Recovered ${filePath} by truncation, discarded ${repaired.discarded} trailing character(s)`)
      return { status: 'repaired', value: repaired.value, discarded: repaired.discarded }
    }
    return { status: 'corrupt', error: toError(e) }
  }
}

/**
 * Load a document, degrading to `fallback` when the file is absent or cannot
 * be parsed even after repair. Never throws.
 */
export async function loadJson(filePath: string, fallback: unknown): Promise<unknown> {
  const outcome = await readJson(filePath)
  switch (outcome.status) {
    case 'ok':
    case 'repaired':
      return outcome.value
    case 'missing':
    case 'corrupt':
      return fallback
  }
}

async function writeVerified(filePath: string, tempPath: string, document: unknown): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true })

  const text = JSON.stringify(document, null, 2)
  if (text === undefined) {
    throw new Error('Document is not JSON-serializable')
  }

  const handle = await open(tempPath, 'w')
  try {
    await handle.writeFile(text + '\n', 'utf-8')
    await handle.sync()
  } finally {
    await handle.close()
  }

  // Re-read what actually reached the disk before it can replace anything
  const written = await readFile(tempPath, 'utf-8')
  try {
    JSON.parse(written)
  } catch (e) {
    throw new Error(`Generated invalid JSON: ${toError(e).message}`)
  }

  await rename(tempPath, filePath)
}

/**
 * Atomic save: write a sibling `.tmp`, fsync, verify, rename over the target.
 * The target is never touched unless the rename succeeds, so a failed result
 * means "not updated", never "damaged".
 */
export async function saveJson(filePath: string, document: unknown, options: SaveOptions = {}): Promise<SaveResult> {
  const maxRetries = Math.max(1, options.maxRetries ?? DEFAULT_MAX_RETRIES)
  const backoffMs = options.backoffMs ?? DEFAULT_BACKOFF_MS
  const tempPath = `${filePath}.tmp`

  let lastError: Error = new Error('No save attempted')
  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      await writeVerified(filePath, tempPath, document)
      return { ok: true, attempts: attempt }
    } catch (e) {
      lastError = toError(e)
      await rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        log.warn(`Could not remove ${tempPath}: ${toError(cleanupError).message}`)
      })

      if (attempt < maxRetries) {
        log.warn(`Save attempt ${attempt} for ${filePath} failed, retrying: ${lastError.message}`)
        await sleep(backoffMs * attempt)
      }
    }
  }

  log.error(`Error saving ${filePath} after ${maxRetries} attempts`, lastError)
  return { ok: false, error: lastError, attempts: maxRetries }
}

function nextFreePath(dir: string, stem: string, ext: string, stamp: string): string {
  let candidate = path.join(dir, `${stem}_${stamp}${ext}`)
  for (let n = 1; existsSync(candidate); n++) {
    candidate = path.join(dir, `${stem}_${stamp}_${n}${ext}`)
  }
  return candidate
}

/**
 * Move a file aside to `<dir>/.backup/<stem>_<stamp><ext>` for post-mortem.
 */
export async function moveToBackup(filePath: string, backupDir?: string, now: Date = new Date()): Promise<BackupResult> {
  if (!existsSync(filePath)) {
    return { ok: false, error: new Error(`File not found: ${filePath}`) }
  }

  const dir = backupDir ?? path.join(path.dirname(filePath), '.backup')
  const { name, ext } = path.parse(filePath)

  try {
    await mkdir(dir, { recursive: true })
    const backupPath = nextFreePath(dir, name, ext, backupStamp(now))
    try {
      await rename(filePath, backupPath)
    } catch (e) {
      if (!(e instanceof Error && 'code' in e && e.code === 'EXDEV')) throw e
      await copyFile(filePath, backupPath)
      await rm(filePath)
    }
    return { ok: true, backupPath }
  } catch (e) {
    return { ok: false, error: toError(e) }
  }
}
