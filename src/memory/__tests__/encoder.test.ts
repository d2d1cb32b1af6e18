import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdtempSync, rmSync, writeFileSync, mkdirSync } from 'fs'
import { tmpdir } from 'os'
import path from 'path'
import { encodeSession, buildPartialRecord } from '../encoder.js'
import { DEFAULT_CONFIG, HabitusConfig } from '../../config.js'
import { Deadline } from '../../deadline.js'
import { MemoryPaths, resolveMemoryPaths } from '../../paths.js'
import { EpisodicStore } from '../../storage/episodic-store.js'
import { FALLBACK_MARKER } from '../../privacy/redaction.js'

const now = () => new Date('2025-06-10T12:00:00.000Z')

// Simulates a regex engine failure in the middle of scrubbing
class BrokenPattern extends RegExp {
  [Symbol.match](): RegExpMatchArray | null {
    throw new Error('engine failure')
  }
}

describe('encodeSession', () => {
  let projectDir: string
  let transcriptDir: string
  let paths: MemoryPaths
  let store: EpisodicStore

  beforeEach(() => {
    projectDir = mkdtempSync(path.join(tmpdir(), 'hb-enc-'))
    transcriptDir = path.join(projectDir, 'transcripts')
    paths = resolveMemoryPaths(projectDir)
    store = new EpisodicStore(paths.episodic)
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
    rmSync(projectDir, { recursive: true, force: true })
  })

  function withEncoding(encoding: HabitusConfig['encoding']): HabitusConfig {
    return { ...DEFAULT_CONFIG, encoding }
  }

  it('encodes the live session context and redacts it', async () => {
    const outcome = await encodeSession({
      paths,
      config: DEFAULT_CONFIG,
      trigger: 'session-end',
      sessionId: 's-ctx',
      gitBranch: 'main',
      now,
      contextFn: async () => ({
        task_summary: 'Add the status command',
        work_summary: 'password: hunter2',
        user_preferences: ['Prefer pnpm'],
        code_patterns: [{ description: 'Early returns', confidence: 'high' }]
      })
    })

    expect(outcome).toEqual({
      status: 'ok',
      sessionId: 's-ctx',
      partition: 'sessions-2025-06',
      encodingMode: 'context',
      redactions: 1,
      indexed: true
    })

    const stored = await store.lookup('s-ctx')
    expect(stored).toMatchObject({
      session_id: 's-ctx',
      timestamp: '2025-06-10T12:00:00Z',
      project_path: projectDir,
      git_branch: 'main',
      trigger: 'session-end',
      encoding_mode: 'context',
      task_summary: 'Add the status command',
      work_summary: 'password=[REDACTED]',
      user_preferences: ['Prefer pnpm'],
      code_patterns: [{ description: 'Early returns', confidence: 'high' }]
    })
    expect(stored?.limitations).toBeUndefined()
  })

  it('scrubs a branch name that looks like a token', async () => {
    const outcome = await encodeSession({
      paths,
      config: DEFAULT_CONFIG,
      trigger: 'manual',
      sessionId: 's-branch',
      gitBranch: 'feature/abcdefghijklmnopqrstuvwxyz',
      now,
      contextFn: async () => ({ task_summary: 'Anything' })
    })

    expect(outcome).toMatchObject({ status: 'ok', redactions: 1 })
    expect((await store.lookup('s-branch'))?.git_branch).toBe('feature/[REDACTED_TOKEN]')
  })

  it('never scrubs the generated session id', async () => {
    const outcome = await encodeSession({
      paths,
      config: DEFAULT_CONFIG,
      trigger: 'manual',
      gitBranch: null,
      now,
      contextFn: async () => ({ task_summary: 'Anything' })
    })

    expect(outcome.status).toBe('ok')
    expect(outcome.sessionId).toHaveLength(21)
    expect((await store.lookup(outcome.sessionId))?.session_id).toBe(outcome.sessionId)
  })

  it('marks a record built from incomplete context', async () => {
    const outcome = await encodeSession({
      paths,
      config: DEFAULT_CONFIG,
      trigger: 'stop',
      sessionId: 's-thin',
      gitBranch: null,
      now,
      contextFn: async () => ({ work_summary: 'Poked at things' })
    })

    expect(outcome.status).toBe('ok')
    expect((await store.lookup('s-thin'))?.limitations).toEqual([
      'Context incomplete - best-effort record created',
      'Some session details may be missing'
    ])
  })

  it('falls back to the newest JSONL transcript', async () => {
    mkdirSync(transcriptDir, { recursive: true })
    writeFileSync(path.join(transcriptDir, 'session.jsonl'), [
      '{"tool_name": "Edit", "tool_input": {"file_path": "src/a.ts"}}',
      '{"tool_name": "Edit", "tool_input": {"file_path": "src/a.ts"}}',
      'not json',
      '{"tool_name": "Bash", "error": "exit 1"}'
    ].join('\n'))

    const outcome = await encodeSession({
      paths,
      config: DEFAULT_CONFIG,
      trigger: 'precompact',
      sessionId: 's-jsonl',
      gitBranch: null,
      now,
      transcriptDir
    })

    expect(outcome.status).toBe('ok')
    if (outcome.status !== 'ok') return
    expect(outcome.encodingMode).toBe('jsonl_fallback')

    const stored = await store.lookup('s-jsonl')
    expect(stored).toMatchObject({
      encoding_mode: 'jsonl_fallback',
      task_summary: 'Session with 3 transcript records',
      work_summary: 'Used tools: Edit, Bash',
      challenges: ['exit 1'],
      context: { files_modified: ['src/a.ts'], tools_used: ['Edit', 'Bash'], tool_counts: { Edit: 2, Bash: 1 } },
      limitations: ['Skipped 1 malformed JSONL lines', 'Limited data: only 3 valid records']
    })
  })

  it('falls back to the transcript when the context cannot be read', async () => {
    mkdirSync(transcriptDir, { recursive: true })
    writeFileSync(path.join(transcriptDir, 'session.jsonl'), '{"tool_name": "Read"}\n')

    const outcome = await encodeSession({
      paths,
      config: DEFAULT_CONFIG,
      trigger: 'manual',
      sessionId: 's-1',
      gitBranch: null,
      now,
      transcriptDir,
      contextFn: async () => { throw new Error('host went away') }
    })

    expect(outcome.status).toBe('ok')
    if (outcome.status !== 'ok') return
    expect(outcome.encodingMode).toBe('jsonl_fallback')
  })

  it('fails with every reason when no method produces a record', async () => {
    const outcome = await encodeSession({
      paths,
      config: withEncoding({ preferContext: true, fallbackJsonl: true }),
      trigger: 'manual',
      sessionId: 's-none',
      gitBranch: null,
      now,
      transcriptDir,
      contextFn: async () => { throw new Error('host went away') }
    })

    expect(outcome).toEqual({
      status: 'failed',
      sessionId: 's-none',
      errors: ['Context encoding failed: host went away', 'JSONL encoding failed: no transcript records found']
    })
    expect(await store.listPartitions()).toEqual([])
  })

  it('over-redacts the free-text fields when scrubbing throws', async () => {
    const outcome = await encodeSession({
      paths,
      config: DEFAULT_CONFIG,
      trigger: 'manual',
      sessionId: 's-broken',
      gitBranch: null,
      now,
      redactionPatterns: [{ matcher: new BrokenPattern('x', 'g'), replacement: 'y' }],
      contextFn: async () => ({
        task_summary: 'Rotate keys',
        work_summary: 'token is test-secret',
        challenges: ['flaky test']
      })
    })

    expect(outcome.status).toBe('ok')
    const stored = await store.lookup('s-broken')
    expect(stored).toMatchObject({
      session_id: 's-broken',
      task_summary: 'Rotate keys',
      work_summary: FALLBACK_MARKER,
      challenges: [FALLBACK_MARKER],
      solutions: []
    })
  })

  it('leaves the record untouched when redaction is disabled', async () => {
    await encodeSession({
      paths,
      config: { ...DEFAULT_CONFIG, privacy: { redactSensitive: false, customRedactionPatterns: [] } },
      trigger: 'manual',
      sessionId: 's-raw',
      gitBranch: null,
      now,
      contextFn: async () => ({ task_summary: 'Local only', work_summary: 'password: hunter2' })
    })

    expect((await store.lookup('s-raw'))?.work_summary).toBe('password: hunter2')
  })

  it('stores a partial record when the deadline passes', async () => {
    const outcome = await encodeSession({
      paths,
      config: DEFAULT_CONFIG,
      trigger: 'precompact',
      sessionId: 's-slow',
      gitBranch: null,
      now,
      deadline: new Deadline('Encoding', 0),
      contextFn: async () => ({ task_summary: 'Never finishes' })
    })

    expect(outcome).toEqual({ status: 'timeout', sessionId: 's-slow', partition: 'sessions-2025-06' })
    expect(await store.lookup('s-slow')).toMatchObject({
      encoding_mode: 'partial_timeout',
      task_summary: '[TIMEOUT] Encoding exceeded 0s'
    })
  })
})

describe('buildPartialRecord', () => {
  it('keeps only the identity fields and the timeout note', () => {
    const record = buildPartialRecord({
      sessionId: 's-1',
      timestamp: '2025-06-10T12:00:00Z',
      projectPath: '/work/app',
      gitBranch: null,
      trigger: 'stop'
    }, 30)

    expect(record).toEqual({
      session_id: 's-1',
      timestamp: '2025-06-10T12:00:00Z',
      project_path: '/work/app',
      git_branch: null,
      trigger: 'stop',
      encoding_mode: 'partial_timeout',
      task_summary: '[TIMEOUT] Encoding exceeded 30s',
      limitations: ['Encoding timeout at 30s', 'Partial record only']
    })
  })
})
