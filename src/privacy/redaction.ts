import { createLogger } from '../logger.js'
import type { JsonObject, JsonValue } from '../memory/types.js'

const log = createLogger('redaction')

export interface RedactionPattern {
  matcher: RegExp
  replacement: string
}

export interface RedactionResult<T> {
  value: T
  count: number
}

export const REDACTION_MARKER = '[REDACTED]'
export const FALLBACK_MARKER = '[REDACTED - redaction error]'

// Top-level fields wiped wholesale when scrubbing itself fails
export const SENSITIVE_FIELDS = ['work_summary', 'challenges', 'solutions'] as const

function pattern(source: string, flags: string, replacement: string): RedactionPattern {
  return { matcher: new RegExp(source, flags), replacement }
}

export const DEFAULT_PATTERNS: readonly RedactionPattern[] = [
  // Long opaque tokens
  pattern('\\b[A-Za-z0-9_-]{20,}\\b', 'g', '[REDACTED_TOKEN]'),
  pattern('api[_-]?key[\'"\\s:=]+[\\w-]+', 'gi', 'api_key=[REDACTED]'),
  pattern('access[_-]?token[\'"\\s:=]+[\\w-]+', 'gi', 'access_token=[REDACTED]'),
  pattern('secret[_-]?key[\'"\\s:=]+[\\w-]+', 'gi', 'secret_key=[REDACTED]'),
  pattern('auth[_-]?token[\'"\\s:=]+[\\w-]+', 'gi', 'auth_token=[REDACTED]'),
  pattern('password[\'"\\s:=]+[^\\s\'",}]+', 'gi', 'password=[REDACTED]'),
  pattern('passwd[\'"\\s:=]+[^\\s\'",}]+', 'gi', 'passwd=[REDACTED]'),
  pattern('credentials?[\'"\\s:=]+[^\\s\'",}]+', 'gi', 'credentials=[REDACTED]'),
  pattern('Bearer\\s+[\\w-]+', 'gi', 'Bearer [REDACTED]'),
  // PEM blocks span lines; the lazy body stops at the first END marker
  pattern(
    '-----BEGIN\\s+(?:RSA\\s+)?PRIVATE\\s+KEY-----[\\s\\S]*?-----END\\s+(?:RSA\\s+)?PRIVATE\\s+KEY-----',
    'g',
    '[REDACTED_PRIVATE_KEY]'
  )
]

/**
 * Apply every pattern in order. Patterns are independent, so text matched by
 * two of them is counted twice.
 */
export function redactText(text: string, patterns: readonly RedactionPattern[] = DEFAULT_PATTERNS): RedactionResult<string> {
  let value = text
  let count = 0

  for (const { matcher, replacement } of patterns) {
    const global = matcher.global ? matcher : new RegExp(matcher.source, matcher.flags + 'g')
    const matches = value.match(global)
    if (matches && matches.length > 0) {
      count += matches.length
      value = value.replace(global, replacement)
    }
  }

  return { value, count }
}

export function scrub(value: JsonValue, patterns: readonly RedactionPattern[] = DEFAULT_PATTERNS): RedactionResult<JsonValue> {
  if (typeof value === 'string') {
    return redactText(value, patterns)
  }

  if (Array.isArray(value)) {
    let count = 0
    const items = value.map(item => {
      const result = scrub(item, patterns)
      count += result.count
      return result.value
    })
    return { value: items, count }
  }

  if (value !== null && typeof value === 'object') {
    const result = scrubObject(value, patterns)
    return { value: result.value, count: result.count }
  }

  return { value, count: 0 }
}

export function scrubObject(record: JsonObject, patterns: readonly RedactionPattern[] = DEFAULT_PATTERNS): RedactionResult<JsonObject> {
  let count = 0
  const out: JsonObject = {}
  for (const [key, child] of Object.entries(record)) {
    const result = scrub(child, patterns)
    out[key] = result.value
    count += result.count
  }
  return { value: out, count }
}

export function compileCustomPatterns(sources: readonly string[]): RedactionPattern[] {
  const compiled: RedactionPattern[] = []
  for (const source of sources) {
    try {
      compiled.push({ matcher: new RegExp(source, 'gi'), replacement: REDACTION_MARKER })
    } catch (e) {
      log.warn(`Dropping invalid custom redaction pattern ${JSON.stringify(source)}: ${e instanceof Error ? e.message : String(e)}`)
    }
  }
  return compiled
}

export function getAllPatterns(custom: readonly string[] = []): RedactionPattern[] {
  return [...DEFAULT_PATTERNS, ...compileCustomPatterns(custom)]
}

/**
 * Blunt fallback for when scrubbing throws: wipe the known free-text fields
 * instead of letting a half-scrubbed record reach disk.
 */
export function overRedact(record: JsonObject): RedactionResult<JsonObject> {
  const out: JsonObject = { ...record }
  let count = 0

  for (const field of SENSITIVE_FIELDS) {
    const current = out[field]
    if (typeof current === 'string') {
      out[field] = FALLBACK_MARKER
      count++
    } else if (Array.isArray(current)) {
      out[field] = current.map(() => FALLBACK_MARKER)
      count++
    }
  }

  return { value: out, count }
}
