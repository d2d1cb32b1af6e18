import { readdir } from 'node:fs/promises'
import path from 'node:path'
import { createLogger } from '../logger.js'
import { Deadline } from '../deadline.js'
import { parseTimestamp } from '../time.js'
import {
  JsonObject,
  JsonValue,
  Partition,
  EpisodeIndex,
  episodeHeaderSchema,
  isJsonObject,
  partitionShapeSchema
} from '../memory/types.js'
import { SaveOptions, loadJson, moveToBackup, readJson, saveJson } from './json-store.js'

const log = createLogger('episodic')

const PARTITION_FILE_RE = /^sessions-\d{4}-\d{2}\.json$/

export type AppendResult =
  | { ok: true; partition: string; indexed: boolean }
  | { ok: false; error: Error }

export interface LoadAllResult {
  sessions: JsonObject[]
  corruptPartitions: string[]
}

export function partitionNameFor(timestamp: string): string {
  const date = parseTimestamp(timestamp)
  if (!date) {
    throw new Error(`Invalid episode timestamp: ${timestamp}`)
  }
  const month = String(date.getUTCMonth() + 1).padStart(2, '0')
  return `sessions-${date.getUTCFullYear()}-${month}`
}

export function emptyPartition(): Partition {
  return { sessions: [], count: 0, last_updated: null }
}

export class EpisodicStore {
  readonly dir: string
  private saveOptions: SaveOptions

  constructor(dir: string, saveOptions: SaveOptions = {}) {
    this.dir = dir
    this.saveOptions = saveOptions
  }

  get indexPath(): string {
    return path.join(this.dir, 'index.json')
  }

  partitionPath(name: string): string {
    return path.join(this.dir, `${name}.json`)
  }

  /**
   * Append an already validated (and redacted) episode to its monthly
   * partition, then record it in the index. The two saves are independent:
   * a failure between them leaves the episode stored but unindexed.
   */
  async append(episode: JsonObject): Promise<AppendResult> {
    const header = episodeHeaderSchema.safeParse(episode)
    if (!header.success) {
      return { ok: false, error: new Error('Episode is missing session_id or timestamp') }
    }
    const { session_id: sessionId, timestamp } = header.data

    let partition: string
    try {
      partition = partitionNameFor(timestamp)
    } catch (e) {
      return { ok: false, error: e instanceof Error ? e : new Error(String(e)) }
    }

    const filePath = this.partitionPath(partition)
    const existing = await this.loadPartitionForAppend(filePath)

    const sessions = [...existing.sessions, episode]
    const document: Partition = {
      sessions,
      count: sessions.length,
      last_updated: timestamp
    }

    const saved = await saveJson(filePath, document, this.saveOptions)
    if (!saved.ok) {
      return { ok: false, error: saved.error }
    }

    const indexed = await this.updateIndex(sessionId, partition)
    return { ok: true, partition, indexed }
  }

  async listPartitions(): Promise<string[]> {
    let entries: string[]
    try {
      entries = await readdir(this.dir)
    } catch {
      return []
    }
    return entries.filter(name => PARTITION_FILE_RE.test(name)).sort().map(name => path.join(this.dir, name))
  }

  /**
   * Read every partition. Unreadable or malformed partitions are reported and
   * skipped; one bad month never hides the others.
   */
  async loadAll(deadline: Deadline = Deadline.none()): Promise<LoadAllResult> {
    const sessions: JsonObject[] = []
    const corruptPartitions: string[] = []

    for (const file of await this.listPartitions()) {
      const data = await loadJson(file, null)
      const shape = partitionShapeSchema.safeParse(data)

      if (data === null) {
        corruptPartitions.push(file)
        log.warn(`Corrupted file: ${file}`)
      } else if (!isJsonObject(data) || !('sessions' in data)) {
        corruptPartitions.push(file)
        log.warn(`Invalid structure (missing 'sessions' key): ${file}`)
      } else if (!shape.success) {
        corruptPartitions.push(file)
        log.warn(`Invalid structure ('sessions' not a list): ${file}`)
      } else {
        let skipped = 0
        for (const entry of shape.data.sessions) {
          if (isJsonObject(entry)) {
            sessions.push(entry)
          } else {
            skipped++
          }
        }
        if (skipped > 0) {
          log.warn(`Skipped ${skipped} non-object session entr${skipped === 1 ? 'y' : 'ies'} in ${file}`)
        }
      }

      deadline.check()
    }

    return { sessions, corruptPartitions }
  }

  /**
   * Entries whose value is not a partition name are dropped with a warning;
   * the rest of the index is kept.
   */
  async readIndex(): Promise<EpisodeIndex> {
    const data = await loadJson(this.indexPath, {})
    if (!isJsonObject(data)) {
      log.warn(`Index ${this.indexPath} is not a flat id → partition map, treating as empty`)
      return {}
    }

    const index: EpisodeIndex = {}
    const dropped: string[] = []
    for (const [sessionId, partition] of Object.entries(data)) {
      if (typeof partition === 'string') {
        index[sessionId] = partition
      } else {
        dropped.push(sessionId)
      }
    }
    if (dropped.length > 0) {
      log.warn(`Index ${this.indexPath} has non-string entries, ignoring: ${dropped.join(', ')}`)
    }
    return index
  }

  /**
   * Find an episode by session id. The index is only a hint: a stale or
   * missing entry falls back to scanning the partitions.
   */
  async lookup(sessionId: string): Promise<JsonObject | null> {
    const index = await this.readIndex()
    const hinted = index[sessionId]
    if (hinted) {
      const found = await this.findIn(this.partitionPath(hinted), sessionId)
      if (found) return found
    }

    for (const file of await this.listPartitions()) {
      const found = await this.findIn(file, sessionId)
      if (found) return found
    }
    return null
  }

  private async findIn(file: string, sessionId: string): Promise<JsonObject | null> {
    const shape = partitionShapeSchema.safeParse(await loadJson(file, null))
    if (!shape.success) return null
    for (const entry of shape.data.sessions) {
      if (isJsonObject(entry) && entry.session_id === sessionId) return entry
    }
    return null
  }

  private async loadPartitionForAppend(filePath: string): Promise<{ sessions: JsonValue[] }> {
    const outcome = await readJson(filePath)
    if (outcome.status === 'missing') return emptyPartition()

    const shape = outcome.status === 'corrupt' ? null : partitionShapeSchema.safeParse(outcome.value)
    if (shape?.success) {
      const stray = shape.data.sessions.filter(entry => !isJsonObject(entry)).length
      if (stray > 0) {
        log.warn(`Keeping ${stray} non-object session entr${stray === 1 ? 'y' : 'ies'} in ${filePath}`)
      }
      return { sessions: shape.data.sessions }
    }

    // Never write over a damaged month in place; keep the original for post-mortem
    const backup = await moveToBackup(filePath)
    if (backup.ok) {
      log.warn(`Partition ${filePath} was unusable, moved to ${backup.backupPath} and started fresh`)
    } else {
      log.warn(`Partition ${filePath} was unusable and could not be backed up (${backup.error.message}), starting fresh`)
    }
    return emptyPartition()
  }

  private async updateIndex(sessionId: string, partition: string): Promise<boolean> {
    const index = await this.readIndex()
    index[sessionId] = partition
    const saved = await saveJson(this.indexPath, index, this.saveOptions)
    if (!saved.ok) {
      log.warn(`Episode ${sessionId} stored in ${partition} but index update failed: ${saved.error.message}`)
    }
    return saved.ok
  }
}
