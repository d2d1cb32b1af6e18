import { existsSync } from 'node:fs'
import { z } from 'zod'
import { createLogger } from '../logger.js'
import { Deadline, DeadlineExceededError } from '../deadline.js'
import { isoTimestamp } from '../time.js'
import type { HabitusConfig } from '../config.js'
import type { MemoryPaths } from '../paths.js'
import { Pattern, patternSchema } from '../memory/types.js'
import { EpisodicStore } from '../storage/episodic-store.js'
import { SaveOptions, loadJson, saveJson } from '../storage/json-store.js'
import { byCategory, extractPatterns, isRuleWorthy } from './extractor.js'

const log = createLogger('extract')

export interface CategoryCounts {
  preferences: number
  codePatterns: number
  antiPatterns: number
}

export type ExtractionOutcome =
  | { status: 'ok'; patterns: Pattern[]; sessionCount: number; corruptPartitions: string[]; counts: CategoryCounts; strongCount: number }
  | { status: 'no-episodes'; message: string }
  | { status: 'insufficient-sessions'; sessionCount: number; required: number; corruptPartitions: string[] }
  | { status: 'timeout'; message: string }
  | { status: 'save-failed'; message: string }

export interface RunExtractionOptions {
  paths: MemoryPaths
  config: Readonly<HabitusConfig>
  minSessions?: number
  deadline?: Deadline
  now?: () => Date
  saveOptions?: SaveOptions
}

export function countByCategory(patterns: readonly Pattern[]): CategoryCounts {
  return {
    preferences: byCategory(patterns, 'preference').length,
    codePatterns: byCategory(patterns, 'code_pattern').length,
    antiPatterns: byCategory(patterns, 'anti_pattern').length
  }
}

export function reportCorruptPartitions(corrupt: readonly string[]): void {
  if (corrupt.length === 0) return
  log.warn(`Skipped ${corrupt.length} corrupted file(s):`)
  for (const file of corrupt.slice(0, 5)) {
    log.warn(`  - ${file}`)
  }
  if (corrupt.length > 5) {
    log.warn(`  ... and ${corrupt.length - 5} more`)
  }
}

/**
 * Overwrite the four derived files. Patterns are recomputed wholesale each
 * run, so nothing from a previous run is merged in.
 */
export async function writeSemanticKnowledge(
  paths: MemoryPaths,
  patterns: readonly Pattern[],
  timestamp: string,
  saveOptions: SaveOptions = {}
): Promise<{ ok: boolean; failed: string[] }> {
  const preferences = byCategory(patterns, 'preference')
  const codePatterns = byCategory(patterns, 'code_pattern')
  const antiPatterns = byCategory(patterns, 'anti_pattern')
  const files = paths.semanticFiles

  const writes: [string, unknown][] = [
    [files.patterns, { patterns, count: patterns.length, last_updated: timestamp }],
    [files.preferences, { preferences, count: preferences.length, last_updated: timestamp }],
    [files.codePatterns, { code_patterns: codePatterns, count: codePatterns.length, last_updated: timestamp }],
    [files.antiPatterns, { anti_patterns: antiPatterns, count: antiPatterns.length, last_updated: timestamp }]
  ]

  const failed: string[] = []
  for (const [file, document] of writes) {
    const result = await saveJson(file, document, saveOptions)
    if (!result.ok) failed.push(file)
  }
  return { ok: failed.length === 0, failed }
}

const patternsFileSchema = z.object({
  patterns: z.array(z.unknown())
}).passthrough()

/**
 * Patterns from the last extraction run. Entries that do not match the
 * pattern shape are skipped with a warning.
 */
export async function readPatterns(paths: MemoryPaths): Promise<Pattern[] | null> {
  const file = paths.semanticFiles.patterns
  if (!existsSync(file)) return null

  const parsed = patternsFileSchema.safeParse(await loadJson(file, null))
  if (!parsed.success) {
    log.warn(`Unreadable patterns file: ${file}`)
    return null
  }

  const patterns: Pattern[] = []
  let skipped = 0
  for (const entry of parsed.data.patterns) {
    const pattern = patternSchema.safeParse(entry)
    if (pattern.success) {
      patterns.push(pattern.data)
    } else {
      skipped++
    }
  }
  if (skipped > 0) {
    log.warn(`Skipped ${skipped} malformed pattern(s) in ${file}`)
  }
  return patterns
}

/**
 * One full extraction run under a deadline. On timeout nothing is written:
 * a partial pattern set would break the rule that semantic files are always
 * a complete recomputation.
 */
export async function runExtraction(options: RunExtractionOptions): Promise<ExtractionOutcome> {
  const { paths, config } = options
  const deadline = options.deadline ?? Deadline.after(config.timeouts.extract, 'Semantic extraction')
  const minSessions = options.minSessions ?? config.thresholds.minSessions
  const now = options.now ?? (() => new Date())

  if (!existsSync(paths.episodic)) {
    return { status: 'no-episodes', message: 'No episodic records found - run encode first' }
  }

  try {
    const store = new EpisodicStore(paths.episodic, options.saveOptions)
    const { sessions, corruptPartitions } = await store.loadAll(deadline)
    reportCorruptPartitions(corruptPartitions)

    if (sessions.length < minSessions) {
      log.info(`Insufficient sessions (${sessions.length}/${minSessions}). Continue working to accumulate more data.`)
      return { status: 'insufficient-sessions', sessionCount: sessions.length, required: minSessions, corruptPartitions }
    }

    log.info(`Analyzing ${sessions.length} episodic records...`)
    const timestamp = isoTimestamp(now())
    const patterns = extractPatterns(sessions, config.thresholds, { deadline, detectedAt: timestamp })
    const counts = countByCategory(patterns)

    log.info(`Detected ${patterns.length} patterns`)
    log.info(`  - ${counts.preferences} preferences`)
    log.info(`  - ${counts.codePatterns} code patterns`)
    log.info(`  - ${counts.antiPatterns} anti-patterns`)

    // Last point at which the run may still be abandoned without side effects
    deadline.check()

    const written = await writeSemanticKnowledge(paths, patterns, timestamp, options.saveOptions)
    if (!written.ok) {
      return { status: 'save-failed', message: `Failed to save semantic knowledge: ${written.failed.join(', ')}` }
    }

    return {
      status: 'ok',
      patterns,
      sessionCount: sessions.length,
      corruptPartitions,
      counts,
      strongCount: patterns.filter(isRuleWorthy).length
    }
  } catch (e) {
    if (e instanceof DeadlineExceededError) {
      log.error(`Extraction timeout: ${e.message}`)
      return { status: 'timeout', message: e.message }
    }
    throw e
  }
}
