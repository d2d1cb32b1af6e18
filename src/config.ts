import { readFileSync, existsSync, mkdirSync, writeFileSync } from 'node:fs'
import path from 'node:path'
import { z } from 'zod'
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml'
import { createLogger } from './logger.js'

const log = createLogger('config')

export interface HabitusConfig {
  triggers: {
    precompact: boolean
    sessionEnd: boolean
    stop: boolean
  }
  processing: {
    continuousMode: boolean
    autoSynthesize: boolean
  }
  thresholds: {
    minSessions: number
    emerging: number
    strong: number
    critical: number
  }
  encoding: {
    preferContext: boolean
    fallbackJsonl: boolean
  }
  privacy: {
    redactSensitive: boolean
    customRedactionPatterns: string[]
  }
  // Seconds
  timeouts: {
    encode: number
    extract: number
    synthesize: number
  }
}

export const LIMITS = {
  minSessions: { min: 1, max: 1000 },
  pattern: { min: 1, max: 100 },
  encode: { min: 5, max: 300 },
  extract: { min: 5, max: 600 },
  synthesize: { min: 5, max: 300 }
} as const

export const DEFAULT_CONFIG: HabitusConfig = {
  triggers: {
    precompact: true,
    sessionEnd: true,
    stop: false
  },
  processing: {
    continuousMode: true,
    autoSynthesize: false
  },
  thresholds: {
    minSessions: 10,
    emerging: 2,
    strong: 3,
    critical: 5
  },
  encoding: {
    preferContext: true,
    fallbackJsonl: true
  },
  privacy: {
    redactSensitive: true,
    customRedactionPatterns: []
  },
  timeouts: {
    encode: 30,
    extract: 60,
    synthesize: 45
  }
}

export class ConfigError extends Error {
  readonly field: string

  constructor(field: string, message: string) {
    super(message)
    this.name = 'ConfigError'
    this.field = field
  }
}

function coerceBool(value: unknown): unknown {
  if (typeof value === 'boolean') return value
  if (typeof value === 'number') return value === 1 ? true : value === 0 ? false : undefined
  if (typeof value === 'string') {
    const v = value.trim().toLowerCase()
    if (['true', 'yes', 'on', '1'].includes(v)) return true
    if (['false', 'no', 'off', '0'].includes(v)) return false
  }
  return undefined
}

function coerceInt(value: unknown): unknown {
  if (typeof value === 'number' && Number.isFinite(value)) return Math.trunc(value)
  if (typeof value === 'string' && /^\s*-?\d+\s*$/.test(value)) return parseInt(value, 10)
  return undefined
}

const flag = (fallback: boolean) => z.preprocess(coerceBool, z.boolean()).catch(fallback)

const bounded = (fallback: number, min: number, max: number) =>
  z.preprocess(coerceInt, z.number().int())
    .transform(v => Math.max(min, Math.min(v, max)))
    .catch(fallback)

// Keys are matched by their leaf name wherever they sit in the frontmatter
const frontmatterSchema = z.object({
  precompact: flag(DEFAULT_CONFIG.triggers.precompact),
  session_end: flag(DEFAULT_CONFIG.triggers.sessionEnd),
  stop: flag(DEFAULT_CONFIG.triggers.stop),
  continuous_mode: flag(DEFAULT_CONFIG.processing.continuousMode),
  auto_synthesize: flag(DEFAULT_CONFIG.processing.autoSynthesize),
  min_sessions: bounded(DEFAULT_CONFIG.thresholds.minSessions, LIMITS.minSessions.min, LIMITS.minSessions.max),
  emerging_pattern: bounded(DEFAULT_CONFIG.thresholds.emerging, LIMITS.pattern.min, LIMITS.pattern.max),
  strong_pattern: bounded(DEFAULT_CONFIG.thresholds.strong, LIMITS.pattern.min, LIMITS.pattern.max),
  critical_pattern: bounded(DEFAULT_CONFIG.thresholds.critical, LIMITS.pattern.min, LIMITS.pattern.max),
  prefer_context: flag(DEFAULT_CONFIG.encoding.preferContext),
  fallback_jsonl: flag(DEFAULT_CONFIG.encoding.fallbackJsonl),
  redact_sensitive: flag(DEFAULT_CONFIG.privacy.redactSensitive),
  custom_redaction_patterns: z.preprocess(
    v => (Array.isArray(v) ? v.filter((p): p is string => typeof p === 'string') : undefined),
    z.array(z.string())
  ).catch([]),
  encode: bounded(DEFAULT_CONFIG.timeouts.encode, LIMITS.encode.min, LIMITS.encode.max),
  extract: bounded(DEFAULT_CONFIG.timeouts.extract, LIMITS.extract.min, LIMITS.extract.max),
  synthesize: bounded(DEFAULT_CONFIG.timeouts.synthesize, LIMITS.synthesize.min, LIMITS.synthesize.max)
})

const FRONTMATTER_RE = /^---[ \t]*\r?\n([\s\S]*?)\r?\n---/m

export function extractFrontmatter(content: string): string | null {
  const match = FRONTMATTER_RE.exec(content)
  return match ? match[1] : null
}

function flattenLeaves(value: unknown, into: Record<string, unknown> = {}): Record<string, unknown> {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) return into
  for (const [key, child] of Object.entries(value)) {
    if (child !== null && typeof child === 'object' && !Array.isArray(child)) {
      flattenLeaves(child, into)
    } else {
      into[key] = child
    }
  }
  return into
}

function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const child of Object.values(obj)) {
    if (child !== null && typeof child === 'object') deepFreeze(child)
  }
  return Object.freeze(obj)
}

function cloneDefaults(): HabitusConfig {
  return structuredClone(DEFAULT_CONFIG)
}

export function parseConfig(content: string): HabitusConfig {
  const yamlContent = extractFrontmatter(content)
  if (yamlContent === null) return cloneDefaults()

  const leaves = flattenLeaves(parseYaml(yamlContent))
  const fm = frontmatterSchema.parse(leaves)

  return {
    triggers: { precompact: fm.precompact, sessionEnd: fm.session_end, stop: fm.stop },
    processing: { continuousMode: fm.continuous_mode, autoSynthesize: fm.auto_synthesize },
    thresholds: {
      minSessions: fm.min_sessions,
      emerging: fm.emerging_pattern,
      strong: fm.strong_pattern,
      critical: fm.critical_pattern
    },
    encoding: { preferContext: fm.prefer_context, fallbackJsonl: fm.fallback_jsonl },
    privacy: { redactSensitive: fm.redact_sensitive, customRedactionPatterns: fm.custom_redaction_patterns },
    timeouts: { encode: fm.encode, extract: fm.extract, synthesize: fm.synthesize }
  }
}

function checkRange(errors: ConfigError[], field: string, value: number, min: number, max: number): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    errors.push(new ConfigError(field, `${field} must be an integer between ${min} and ${max} (got ${value})`))
  }
}

export function validateConfig(config: HabitusConfig): ConfigError[] {
  const errors: ConfigError[] = []
  const { thresholds, timeouts } = config

  if (!(thresholds.emerging <= thresholds.strong && thresholds.strong <= thresholds.critical)) {
    errors.push(new ConfigError(
      'thresholds',
      `Pattern thresholds must satisfy emerging <= strong <= critical (got ${thresholds.emerging}, ${thresholds.strong}, ${thresholds.critical})`
    ))
  }

  checkRange(errors, 'thresholds.minSessions', thresholds.minSessions, LIMITS.minSessions.min, LIMITS.minSessions.max)
  checkRange(errors, 'thresholds.emerging', thresholds.emerging, LIMITS.pattern.min, LIMITS.pattern.max)
  checkRange(errors, 'thresholds.strong', thresholds.strong, LIMITS.pattern.min, LIMITS.pattern.max)
  checkRange(errors, 'thresholds.critical', thresholds.critical, LIMITS.pattern.min, LIMITS.pattern.max)
  checkRange(errors, 'timeouts.encode', timeouts.encode, LIMITS.encode.min, LIMITS.encode.max)
  checkRange(errors, 'timeouts.extract', timeouts.extract, LIMITS.extract.min, LIMITS.extract.max)
  checkRange(errors, 'timeouts.synthesize', timeouts.synthesize, LIMITS.synthesize.min, LIMITS.synthesize.max)

  return errors
}

/**
 * Load the project config from its YAML frontmatter. Anything unreadable
 * falls back to defaults; the result is frozen for the rest of the run.
 */
export function loadConfig(configFile: string): Readonly<HabitusConfig> {
  let config = cloneDefaults()

  if (existsSync(configFile)) {
    try {
      config = parseConfig(readFileSync(configFile, 'utf-8'))
    } catch (e) {
      log.warn(`Error loading config, using defaults: ${e instanceof Error ? e.message : String(e)}`)
      config = cloneDefaults()
    }
  }

  const errors = validateConfig(config)
  if (errors.length > 0) {
    for (const err of errors) log.warn(err.message)
    log.warn('Using default pattern thresholds')
    config.thresholds = { ...DEFAULT_CONFIG.thresholds, minSessions: config.thresholds.minSessions }
  }

  return deepFreeze(config)
}

export function renderConfig(config: HabitusConfig = DEFAULT_CONFIG): string {
  const frontmatter = stringifyYaml({
    triggers: {
      precompact: config.triggers.precompact,
      session_end: config.triggers.sessionEnd,
      stop: config.triggers.stop
    },
    continuous_mode: config.processing.continuousMode,
    auto_synthesize: config.processing.autoSynthesize,
    thresholds: {
      min_sessions: config.thresholds.minSessions,
      emerging_pattern: config.thresholds.emerging,
      strong_pattern: config.thresholds.strong,
      critical_pattern: config.thresholds.critical
    },
    encoding: {
      prefer_context: config.encoding.preferContext,
      fallback_jsonl: config.encoding.fallbackJsonl
    },
    privacy: {
      redact_sensitive: config.privacy.redactSensitive,
      custom_redaction_patterns: config.privacy.customRedactionPatterns
    },
    timeouts: {
      encode: config.timeouts.encode,
      extract: config.timeouts.extract,
      synthesize: config.timeouts.synthesize
    }
  })

  return `---\n${frontmatter}---\n\n# habitus\n\nProject settings for session memory capture and pattern extraction.\n`
}

export function writeDefaultConfig(configFile: string): boolean {
  if (existsSync(configFile)) return false
  mkdirSync(path.dirname(configFile), { recursive: true })
  writeFileSync(configFile, renderConfig())
  return true
}
