import { mkdir, writeFile } from 'node:fs/promises'
import path from 'node:path'
import { createLogger } from '../logger.js'
import { Deadline, DeadlineExceededError } from '../deadline.js'
import { isoTimestamp } from '../time.js'
import type { MemoryPaths } from '../paths.js'
import { Pattern, PatternCategory, PatternStrength } from '../memory/types.js'
import { STRENGTH_RANK, byCategory, isRuleWorthy } from '../extraction/extractor.js'
import { readPatterns } from '../extraction/semantic.js'
import { SaveOptions, saveJson } from '../storage/json-store.js'

const log = createLogger('synthesize')

const IMPERATIVE_PREFIXES = ['always', 'never', 'avoid', 'prefer', 'use']

export const RULE_FILES: readonly { file: string; category: PatternCategory; title: string }[] = [
  { file: 'user-preferences.md', category: 'preference', title: 'User Preferences' },
  { file: 'code-patterns.md', category: 'code_pattern', title: 'Code Patterns' },
  { file: 'anti-patterns.md', category: 'anti_pattern', title: 'Anti-Patterns' }
]

export type SynthesisOutcome =
  | { status: 'ok'; written: string[]; failed: { file: string; reason: string }[]; patternCount: number; metadataSaved: boolean }
  | { status: 'no-patterns'; message: string }
  | { status: 'no-strong-patterns'; message: string }
  | { status: 'write-failed'; failed: { file: string; reason: string }[] }
  | { status: 'timeout'; written: string[]; message: string }

export interface SynthesizeOptions {
  paths: MemoryPaths
  deadline?: Deadline
  now?: () => Date
  saveOptions?: SaveOptions
}

/**
 * The strong and critical patterns, strongest and most frequent first.
 */
export function selectRulePatterns(patterns: readonly Pattern[]): Pattern[] {
  return patterns
    .filter(isRuleWorthy)
    .sort((a, b) => STRENGTH_RANK[b.strength] - STRENGTH_RANK[a.strength] || b.occurrences - a.occurrences)
}

export function toRuleText(description: string, strength: PatternStrength): string {
  if (strength !== 'strong' && strength !== 'critical') return description
  const lower = description.toLowerCase()
  if (IMPERATIVE_PREFIXES.some(prefix => lower.startsWith(prefix))) return description
  return `Follow this pattern: ${description}`
}

function formatGeneratedAt(date: Date): string {
  return `${date.toISOString().slice(0, 16).replace('T', ' ')} UTC`
}

export function renderRules(patterns: readonly Pattern[], title: string, now: Date = new Date()): string {
  const confidence = patterns.some(p => p.strength === 'critical') ? 'High' : 'Medium'
  const lines = [
    `# ${title}`,
    '',
    `<!-- Generated by habitus on ${formatGeneratedAt(now)} -->`,
    `<!-- Pattern Count: ${patterns.length} | Confidence: ${confidence} -->`,
    ''
  ]

  for (const pattern of selectRulePatterns(patterns)) {
    lines.push(`**${toRuleText(pattern.description, pattern.strength)}**`)
    lines.push(`- Observed ${pattern.occurrences} times (${pattern.strength} pattern)`)
    if (pattern.evidence.length > 0) {
      lines.push(`- Evidence: ${pattern.evidence.slice(0, 5).join(', ')}`)
      if (pattern.evidence.length > 5) {
        lines.push(`  (and ${pattern.evidence.length - 5} more)`)
      }
    }
    lines.push('')
  }

  return lines.join('\n')
}

function describeWriteError(e: unknown): string {
  if (e instanceof Error && 'code' in e && (e.code === 'EACCES' || e.code === 'EPERM')) return 'Permission denied'
  return e instanceof Error ? e.message : String(e)
}

/**
 * Render rule files from the last extraction run. Each file succeeds or fails
 * on its own; the run succeeds when at least one was written. Files written
 * before a deadline expires are kept.
 */
export async function synthesizeRules(options: SynthesizeOptions): Promise<SynthesisOutcome> {
  const { paths } = options
  const deadline = options.deadline ?? Deadline.none('Rule synthesis')
  const now = (options.now ?? (() => new Date()))()

  const patterns = await readPatterns(paths)
  if (!patterns || patterns.length === 0) {
    return { status: 'no-patterns', message: 'No patterns found. Run extraction first.' }
  }

  const strong = selectRulePatterns(patterns)
  if (strong.length === 0) {
    return { status: 'no-strong-patterns', message: "No strong patterns found (need strength 'strong' or 'critical')" }
  }
  log.info(`Found ${strong.length} strong patterns for rule generation`)

  const written: string[] = []
  const failed: { file: string; reason: string }[] = []

  try {
    await mkdir(paths.rules, { recursive: true })
  } catch (e) {
    const reason = describeWriteError(e)
    log.error(`Cannot create rules directory ${paths.rules}: ${reason}`)
    return { status: 'write-failed', failed: RULE_FILES.map(r => ({ file: r.file, reason })) }
  }

  for (const { file, category, title } of RULE_FILES) {
    const inCategory = byCategory(strong, category)
    if (inCategory.length === 0) continue

    try {
      deadline.check()
      await writeFile(path.join(paths.rules, file), renderRules(inCategory, title, now), 'utf-8')
      written.push(file)
      log.info(`Generated: ${file}`)
    } catch (e) {
      if (e instanceof DeadlineExceededError) {
        log.error(`Synthesis timeout: ${e.message}`)
        return { status: 'timeout', written, message: e.message }
      }
      const reason = describeWriteError(e)
      log.warn(`Failed to write ${file}: ${reason}`)
      failed.push({ file, reason })
    }
  }

  if (written.length === 0) {
    return { status: 'write-failed', failed }
  }

  const metadataSaved = await writeRulesMetadata(paths, strong, written, failed, now, options.saveOptions)
  return { status: 'ok', written, failed, patternCount: strong.length, metadataSaved }
}

async function writeRulesMetadata(
  paths: MemoryPaths,
  strong: readonly Pattern[],
  written: readonly string[],
  failed: readonly { file: string; reason: string }[],
  now: Date,
  saveOptions: SaveOptions = {}
): Promise<boolean> {
  const timestamp = isoTimestamp(now)
  const files: Record<string, { created: string; pattern_count: number; confidence: 'high' | 'medium' }> = {}

  for (const { file, category } of RULE_FILES) {
    if (!written.includes(file)) continue
    const inCategory = byCategory(strong, category)
    files[file] = {
      created: timestamp,
      pattern_count: inCategory.length,
      confidence: inCategory.some(p => p.strength === 'critical') ? 'high' : 'medium'
    }
  }

  const result = await saveJson(paths.rulesMetadata, {
    last_synthesis: timestamp,
    rule_files: written,
    pattern_count: strong.length,
    breakdown: {
      preferences: byCategory(strong, 'preference').length,
      code_patterns: byCategory(strong, 'code_pattern').length,
      anti_patterns: byCategory(strong, 'anti_pattern').length
    },
    files,
    failed_files: failed
  }, saveOptions)

  if (!result.ok) {
    log.warn(`Failed to save rules metadata: ${result.error.message}`)
  }
  return result.ok
}
