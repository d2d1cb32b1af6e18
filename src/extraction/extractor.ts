import { createHash } from 'node:crypto'
import { Deadline } from '../deadline.js'
import { isoTimestamp } from '../time.js'
import {
  JsonObject,
  Pattern,
  PatternCategory,
  PatternStrength,
  Thresholds,
  isJsonObject,
  readArray,
  readString
} from '../memory/types.js'

export const MAX_EVIDENCE = 10

// Annotation list read for each category, and the id prefix its patterns get
export const CATEGORY_SOURCES: readonly { category: PatternCategory; field: string; prefix: string }[] = [
  { category: 'preference', field: 'user_preferences', prefix: 'pref' },
  { category: 'code_pattern', field: 'code_patterns', prefix: 'code' },
  { category: 'anti_pattern', field: 'anti_patterns', prefix: 'anti' }
]

export const STRENGTH_RANK: Record<PatternStrength, number> = {
  weak: 0,
  emerging: 1,
  strong: 2,
  critical: 3
}

/**
 * Stable across processes and implementations: SHA-256 over
 * `category + "\0" + description`, first 16 hex digits.
 */
export function patternId(category: PatternCategory, description: string): string {
  const source = CATEGORY_SOURCES.find(s => s.category === category)
  const prefix = source ? source.prefix : category
  const digest = createHash('sha256').update(`${category}\u0000${description}`, 'utf8').digest('hex')
  return `${prefix}_${digest.slice(0, 16)}`
}

export function classifyStrength(occurrences: number, thresholds: Thresholds): PatternStrength {
  if (occurrences >= thresholds.critical) return 'critical'
  if (occurrences >= thresholds.strong) return 'strong'
  if (occurrences >= thresholds.emerging) return 'emerging'
  return 'weak'
}

function annotationDescription(annotation: unknown): string | null {
  if (typeof annotation === 'string') return annotation
  if (isJsonObject(annotation)) return readString(annotation, 'description') ?? null
  return null
}

/**
 * description → contributing session ids, in first-encounter order. Each
 * mention counts, so an episode repeating a description adds one entry per
 * repetition.
 */
export function collectEvidence(
  episodes: readonly JsonObject[],
  field: string,
  deadline: Deadline = Deadline.none()
): Map<string, string[]> {
  const evidence = new Map<string, string[]>()

  for (const episode of episodes) {
    const sessionId = readString(episode, 'session_id') ?? 'unknown'
    for (const annotation of readArray(episode, field) ?? []) {
      const description = annotationDescription(annotation)
      if (description === null) continue
      const ids = evidence.get(description)
      if (ids) {
        ids.push(sessionId)
      } else {
        evidence.set(description, [sessionId])
      }
    }
    deadline.check()
  }

  return evidence
}

export interface ExtractOptions {
  deadline?: Deadline
  detectedAt?: string
}

/**
 * Turn episode annotations into patterns. Anything seen fewer than
 * `thresholds.emerging` times is left out, so extraction never yields `weak`.
 */
export function extractPatterns(
  episodes: readonly JsonObject[],
  thresholds: Thresholds,
  options: ExtractOptions = {}
): Pattern[] {
  const deadline = options.deadline ?? Deadline.none()
  const detectedAt = options.detectedAt ?? isoTimestamp()
  const patterns: Pattern[] = []

  for (const { category, field } of CATEGORY_SOURCES) {
    const evidence = collectEvidence(episodes, field, deadline)
    for (const [description, sessionIds] of evidence) {
      const occurrences = sessionIds.length
      if (occurrences < thresholds.emerging) continue

      patterns.push({
        pattern_id: patternId(category, description),
        description,
        category,
        strength: classifyStrength(occurrences, thresholds),
        occurrences,
        evidence: sessionIds.slice(0, MAX_EVIDENCE),
        detected_at: detectedAt
      })
    }
  }

  return patterns
}

export function byCategory(patterns: readonly Pattern[], category: PatternCategory): Pattern[] {
  return patterns.filter(p => p.category === category)
}

export function isRuleWorthy(pattern: Pattern): boolean {
  return pattern.strength === 'strong' || pattern.strength === 'critical'
}
