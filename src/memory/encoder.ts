import { homedir } from 'node:os'
import path from 'node:path'
import { nanoid } from 'nanoid'
import { z } from 'zod'
import { createLogger } from '../logger.js'
import { Deadline, DeadlineExceededError } from '../deadline.js'
import { isoTimestamp } from '../time.js'
import { getGitBranch } from '../git.js'
import type { HabitusConfig } from '../config.js'
import type { MemoryPaths } from '../paths.js'
import { EpisodicStore } from '../storage/episodic-store.js'
import { SaveOptions } from '../storage/json-store.js'
import { RedactionPattern, getAllPatterns, overRedact, scrubObject } from '../privacy/redaction.js'
import { scanTranscripts, summarizeTranscript } from './transcript.js'
import { EncodingMode, JsonObject, Trigger, annotationSchema, validateEpisode } from './types.js'

const log = createLogger('encode')

// Generated by the encoder itself, never scrubbed: the long-token pattern
// would otherwise eat session ids. Paths and branch names are user input.
const IDENTITY_FIELDS: readonly string[] = ['session_id', 'timestamp', 'trigger', 'encoding_mode']

export const sessionContextSchema = z.object({
  task_summary: z.string().optional(),
  work_summary: z.string().optional(),
  design_decisions: z.array(z.string()).default([]),
  challenges: z.array(z.string()).default([]),
  solutions: z.array(z.string()).default([]),
  user_preferences: z.array(annotationSchema).default([]),
  code_patterns: z.array(annotationSchema).default([]),
  anti_patterns: z.array(annotationSchema).default([]),
  technologies: z.array(z.string()).default([]),
  files_modified: z.array(z.string()).default([]),
  tools_used: z.array(z.string()).default([])
})

export type SessionContext = z.infer<typeof sessionContextSchema>
export type SessionContextInput = z.input<typeof sessionContextSchema>

export type EncodeOutcome =
  | { status: 'ok'; sessionId: string; partition: string; encodingMode: EncodingMode; redactions: number; indexed: boolean }
  | { status: 'timeout'; sessionId: string; partition: string | null }
  | { status: 'failed'; sessionId: string; errors: string[] }

export interface EncodeOptions {
  paths: MemoryPaths
  config: Readonly<HabitusConfig>
  trigger: Trigger
  sessionId?: string
  deadline?: Deadline
  // Live session analysis from the host; absent when only a transcript is available
  contextFn?: () => Promise<SessionContextInput>
  transcriptDir?: string
  redactionPatterns?: RedactionPattern[]
  // Looked up with git when not given
  gitBranch?: string | null
  now?: () => Date
  saveOptions?: SaveOptions
}

export function defaultTranscriptDir(): string {
  return process.env.HABITUS_TRANSCRIPT_DIR?.trim() || path.join(homedir(), '.habitus', 'transcripts')
}

interface RecordBase {
  sessionId: string
  timestamp: string
  projectPath: string
  gitBranch: string | null
  trigger: Trigger
}

function baseFields(base: RecordBase, mode: EncodingMode): JsonObject {
  return {
    session_id: base.sessionId,
    timestamp: base.timestamp,
    project_path: base.projectPath,
    git_branch: base.gitBranch,
    trigger: base.trigger,
    encoding_mode: mode
  }
}

export function buildContextRecord(base: RecordBase, context: SessionContext): JsonObject {
  const record: JsonObject = {
    ...baseFields(base, 'context'),
    task_summary: context.task_summary ?? '',
    work_summary: context.work_summary ?? '',
    design_decisions: context.design_decisions,
    challenges: context.challenges,
    solutions: context.solutions,
    user_preferences: context.user_preferences,
    code_patterns: context.code_patterns,
    anti_patterns: context.anti_patterns,
    context: {
      technologies: context.technologies,
      files_modified: context.files_modified,
      tools_used: context.tools_used
    }
  }

  if (!context.task_summary) {
    record.limitations = [
      'Context incomplete - best-effort record created',
      'Some session details may be missing'
    ]
    log.warn('Context incomplete - created best-effort record')
  }
  return record
}

export async function buildTranscriptRecord(base: RecordBase, dir: string, deadline: Deadline): Promise<JsonObject | null> {
  const scan = await scanTranscripts(dir, { deadline })
  if (!scan) return null

  const summary = summarizeTranscript(scan.records)
  const tools = Object.keys(summary.toolCounts)

  const record: JsonObject = {
    ...baseFields(base, 'jsonl_fallback'),
    task_summary: `Session with ${scan.validLines} transcript records`,
    work_summary: `Used tools: ${tools.length > 0 ? tools.join(', ') : 'none detected'}`,
    design_decisions: [],
    challenges: summary.errors,
    solutions: [],
    user_preferences: [],
    code_patterns: [],
    anti_patterns: [],
    context: {
      technologies: [],
      files_modified: summary.filesModified,
      tools_used: tools,
      tool_counts: summary.toolCounts
    },
    transcript: {
      path: scan.path,
      record_count: scan.validLines,
      malformed_lines: scan.malformedLines
    }
  }

  const limitations: string[] = []
  if (scan.malformedLines > 0) limitations.push(`Skipped ${scan.malformedLines} malformed JSONL lines`)
  if (scan.validLines < 10) limitations.push(`Limited data: only ${scan.validLines} valid records`)
  if (limitations.length > 0) record.limitations = limitations

  return record
}

export function buildPartialRecord(base: RecordBase, timeoutSeconds: number): JsonObject {
  return {
    ...baseFields(base, 'partial_timeout'),
    task_summary: `[TIMEOUT] Encoding exceeded ${timeoutSeconds}s`,
    limitations: [`Encoding timeout at ${timeoutSeconds}s`, 'Partial record only']
  }
}

function redactRecord(record: JsonObject, patterns: RedactionPattern[]): { record: JsonObject; count: number } {
  const identity: JsonObject = {}
  const content: JsonObject = {}
  for (const [key, value] of Object.entries(record)) {
    if (IDENTITY_FIELDS.includes(key)) {
      identity[key] = value
    } else {
      content[key] = value
    }
  }

  try {
    const result = scrubObject(content, patterns)
    if (result.count > 0) log.info(`Redacted ${result.count} sensitive items`)
    return { record: { ...identity, ...result.value }, count: result.count }
  } catch (e) {
    // Destroy rather than risk storing a half-scrubbed record
    log.warn(`Redaction failed, applying conservative over-redaction: ${e instanceof Error ? e.message : String(e)}`)
    const result = overRedact(content)
    log.warn(`Applied conservative redaction to ${result.count} fields`)
    return { record: { ...identity, ...result.value }, count: result.count }
  }
}

async function encodeRecord(options: EncodeOptions, base: RecordBase, deadline: Deadline): Promise<{ record: JsonObject | null; errors: string[] }> {
  const { config } = options
  const errors: string[] = []

  if (config.encoding.preferContext && options.contextFn) {
    try {
      const context = sessionContextSchema.parse(await options.contextFn())
      deadline.check()
      return { record: buildContextRecord(base, context), errors }
    } catch (e) {
      if (e instanceof DeadlineExceededError) throw e
      const message = e instanceof Error ? e.message : String(e)
      errors.push(`Context encoding failed: ${message}`)
      log.warn(`Context encoding failed, trying fallback: ${message}`)
    }
  }

  if (config.encoding.fallbackJsonl) {
    try {
      const record = await buildTranscriptRecord(base, options.transcriptDir ?? defaultTranscriptDir(), deadline)
      if (record) return { record, errors }
      errors.push('JSONL encoding failed: no transcript records found')
    } catch (e) {
      if (e instanceof DeadlineExceededError) throw e
      const message = e instanceof Error ? e.message : String(e)
      errors.push(`JSONL encoding failed: ${message}`)
      log.warn(`JSONL encoding failed: ${message}`)
    }
  }

  return { record: null, errors }
}

/**
 * Capture one session as an episode: build it (live context first, transcript
 * second), scrub it, validate it, append it. If the deadline passes first, a
 * minimal partial record is stored so the session still leaves a trace.
 */
export async function encodeSession(options: EncodeOptions): Promise<EncodeOutcome> {
  const { paths, config, trigger } = options
  const now = options.now ?? (() => new Date())
  const deadline = options.deadline ?? Deadline.after(config.timeouts.encode, 'Encoding')
  const store = new EpisodicStore(paths.episodic, options.saveOptions)

  const base: RecordBase = {
    sessionId: options.sessionId ?? nanoid(),
    timestamp: isoTimestamp(now()),
    projectPath: paths.projectPath,
    gitBranch: options.gitBranch !== undefined ? options.gitBranch : getGitBranch(paths.projectPath),
    trigger
  }

  try {
    const { record, errors } = await encodeRecord(options, base, deadline)
    if (!record) {
      log.error('All encoding methods failed')
      for (const error of errors) log.error(`  - ${error}`)
      return { status: 'failed', sessionId: base.sessionId, errors: errors.length > 0 ? errors : ['No encoding method enabled'] }
    }

    let episode = record
    let redactions = 0
    if (config.privacy.redactSensitive) {
      const patterns = options.redactionPatterns ?? getAllPatterns(config.privacy.customRedactionPatterns)
      const redacted = redactRecord(record, patterns)
      episode = redacted.record
      redactions = redacted.count
    }
    deadline.check()

    const issues = validateEpisode(episode)
    if (issues.length > 0) {
      return { status: 'failed', sessionId: base.sessionId, errors: issues.map(i => `Invalid episode: ${i}`) }
    }

    const appended = await store.append(episode)
    if (!appended.ok) {
      log.error('Failed to save episodic record', appended.error)
      return { status: 'failed', sessionId: base.sessionId, errors: [appended.error.message] }
    }

    log.info(`Episodic record saved: ${appended.partition}`)
    const encodingMode = episode.encoding_mode === 'jsonl_fallback' ? 'jsonl_fallback' : 'context'
    return { status: 'ok', sessionId: base.sessionId, partition: appended.partition, encodingMode, redactions, indexed: appended.indexed }
  } catch (e) {
    if (!(e instanceof DeadlineExceededError)) throw e

    log.error(`Encoding timeout (${Math.round(deadline.timeoutMs / 1000)}s exceeded), saving partial record`)
    const partial = buildPartialRecord({ ...base, timestamp: isoTimestamp(now()) }, Math.round(deadline.timeoutMs / 1000))
    const appended = await store.append(partial)
    if (!appended.ok) {
      log.error('Failed to save partial record', appended.error)
      return { status: 'timeout', sessionId: base.sessionId, partition: null }
    }
    log.warn(`Saved partial record due to timeout: ${appended.partition}`)
    return { status: 'timeout', sessionId: base.sessionId, partition: appended.partition }
  }
}
