import { existsSync } from 'node:fs'
import { cp, mkdir, readdir, rm } from 'node:fs/promises'
import path from 'node:path'
import { createLogger } from '../logger.js'
import { Deadline } from '../deadline.js'
import { backupStamp, isoTimestamp, parseTimestamp } from '../time.js'
import type { HabitusConfig } from '../config.js'
import type { MemoryPaths } from '../paths.js'
import { JsonObject, isJsonObject, readString } from '../memory/types.js'
import { EpisodicStore } from '../storage/episodic-store.js'
import { BackupResult, SaveOptions, loadJson, moveToBackup } from '../storage/json-store.js'
import { extractPatterns } from '../extraction/extractor.js'
import { CategoryCounts, countByCategory, reportCorruptPartitions, writeSemanticKnowledge } from '../extraction/semantic.js'

const log = createLogger('recovery')

// Stand-in returned by loadJson when a document could not be read at all
const UNREADABLE = Symbol('unreadable')

export interface ValidationReport {
  ok: boolean
  errors: string[]
}

export type RebuildOutcome =
  | { status: 'ok'; patternCount: number; sessionCount: number; counts: CategoryCounts }
  | { status: 'no-episodes'; message: string }
  | { status: 'no-patterns'; message: string }
  | { status: 'save-failed'; message: string }

export type ResetOutcome =
  | { ok: true; episodicBackup: string | null; removed: string[] }
  | { ok: false; error: Error }

export interface RecoveryManagerOptions {
  paths: MemoryPaths
  config: Readonly<HabitusConfig>
  saveOptions?: SaveOptions
  now?: () => Date
}

/**
 * Newest episode timestamp in the log. Rebuild stamps derived files with it
 * so that rebuilding an unchanged log twice writes identical bytes.
 */
export function latestEpisodeTimestamp(sessions: readonly JsonObject[]): string | null {
  let latest: Date | null = null
  for (const session of sessions) {
    const raw = readString(session, 'timestamp')
    const date = raw ? parseTimestamp(raw) : null
    if (date && (!latest || date > latest)) latest = date
  }
  return latest ? isoTimestamp(latest) : null
}

export class RecoveryManager {
  private paths: MemoryPaths
  private config: Readonly<HabitusConfig>
  private saveOptions: SaveOptions
  private now: () => Date

  constructor(options: RecoveryManagerOptions) {
    this.paths = options.paths
    this.config = options.config
    this.saveOptions = options.saveOptions ?? {}
    this.now = options.now ?? (() => new Date())
  }

  /**
   * Re-read every stored document and report everything wrong with it. Never
   * stops at the first problem.
   */
  async validate(): Promise<ValidationReport> {
    const errors: string[] = []
    const { root, episodic, semantic, procedural } = this.paths

    if (!existsSync(root)) {
      return { ok: false, errors: ['Memory directory not initialized'] }
    }

    if (existsSync(episodic)) {
      const store = new EpisodicStore(episodic)
      for (const file of await store.listPartitions()) {
        const data = await loadJson(file, UNREADABLE)
        if (data === UNREADABLE) {
          errors.push(`Corrupted: ${file}`)
        } else if (!isJsonObject(data) || !('sessions' in data)) {
          errors.push(`Missing 'sessions' key: ${file}`)
        } else if (!Array.isArray(data.sessions)) {
          errors.push(`'sessions' is not a list: ${file}`)
        }
      }

      await this.checkReadable(this.paths.index, errors)
    }

    if (existsSync(semantic)) {
      for (const file of Object.values(this.paths.semanticFiles)) {
        await this.checkReadable(file, errors)
      }
    }

    if (existsSync(procedural)) {
      await this.checkReadable(this.paths.rulesMetadata, errors)
    }

    if (errors.length > 0) {
      log.warn(`Validation failed - ${errors.length} error(s):`)
      for (const error of errors) log.warn(`  - ${error}`)
    }

    return { ok: errors.length === 0, errors }
  }

  /**
   * Recompute every semantic file from the episode log.
   */
  async rebuild(deadline: Deadline = Deadline.none('Rebuild')): Promise<RebuildOutcome> {
    if (!existsSync(this.paths.episodic)) {
      return { status: 'no-episodes', message: 'No episodic directory found' }
    }

    const store = new EpisodicStore(this.paths.episodic, this.saveOptions)
    const { sessions, corruptPartitions } = await store.loadAll(deadline)
    reportCorruptPartitions(corruptPartitions)

    if (sessions.length === 0) {
      return { status: 'no-episodes', message: 'No episodic records found' }
    }
    log.info(`Loaded ${sessions.length} episodic records`)

    const asOf = latestEpisodeTimestamp(sessions) ?? isoTimestamp(this.now())
    const patterns = extractPatterns(sessions, this.config.thresholds, { deadline, detectedAt: asOf })
    if (patterns.length === 0) {
      return { status: 'no-patterns', message: 'No patterns detected' }
    }

    const written = await writeSemanticKnowledge(this.paths, patterns, asOf, this.saveOptions)
    if (!written.ok) {
      return { status: 'save-failed', message: `Failed to save semantic knowledge: ${written.failed.join(', ')}` }
    }

    const counts = countByCategory(patterns)
    log.info(`Rebuilt semantic knowledge: ${counts.preferences} preferences, ${counts.codePatterns} code patterns, ${counts.antiPatterns} anti-patterns`)
    return { status: 'ok', patternCount: patterns.length, sessionCount: sessions.length, counts }
  }

  /**
   * Remove derived state, and the episode log too unless `keepEpisodic`.
   * Derived directories go first so an interrupted reset never leaves
   * patterns pointing at a log that is already gone.
   */
  async reset(options: { keepEpisodic: boolean }): Promise<ResetOutcome> {
    const { root, episodic, semantic, procedural, rules } = this.paths
    const removed: string[] = []
    let episodicBackup: string | null = null

    if (!existsSync(root)) {
      log.info('Memory not initialized - nothing to reset')
      return { ok: true, episodicBackup, removed }
    }

    try {
      if (options.keepEpisodic && existsSync(episodic)) {
        const backupRoot = path.join(path.dirname(root), `${path.basename(root)}_backup_episodic`)
        await mkdir(backupRoot, { recursive: true })
        episodicBackup = path.join(backupRoot, `episodic_${backupStamp(this.now())}`)
        await cp(episodic, episodicBackup, { recursive: true })
        log.info(`Backed up episodic records to: ${episodicBackup}`)
      }

      for (const dir of [semantic, procedural, rules]) {
        if (existsSync(dir)) {
          await rm(dir, { recursive: true, force: true })
          removed.push(dir)
        }
      }

      if (!options.keepEpisodic) {
        await rm(root, { recursive: true, force: true })
        removed.push(root)
      }
    } catch (e) {
      const error = e instanceof Error ? e : new Error(String(e))
      log.error('Error resetting memory', error)
      return { ok: false, error }
    }

    return { ok: true, episodicBackup, removed }
  }

  async backupCorrupt(filePath: string, backupDir?: string): Promise<BackupResult> {
    const result = await moveToBackup(filePath, backupDir, this.now())
    if (result.ok) {
      log.info(`Backed up corrupted file: ${filePath} -> ${result.backupPath}`)
    } else {
      log.warn(`Error backing up file: ${result.error.message}`)
    }
    return result
  }

  async listBackups(dir: string = this.paths.episodic): Promise<string[]> {
    const backupDir = path.join(dir, '.backup')
    if (!existsSync(backupDir)) return []
    return (await readdir(backupDir)).sort().map(name => path.join(backupDir, name))
  }

  private async checkReadable(file: string, errors: string[]): Promise<void> {
    if (!existsSync(file)) return
    const data = await loadJson(file, UNREADABLE)
    if (data === UNREADABLE) {
      errors.push(`Corrupted: ${file}`)
    }
  }
}
