import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdtempSync, rmSync, existsSync, readFileSync, mkdirSync } from 'fs'
import { tmpdir } from 'os'
import path from 'path'
import { renderRules, selectRulePatterns, synthesizeRules, toRuleText } from '../synthesizer.js'
import { writeSemanticKnowledge } from '../../extraction/semantic.js'
import { Deadline } from '../../deadline.js'
import { MemoryPaths, resolveMemoryPaths } from '../../paths.js'
import type { Pattern } from '../../memory/types.js'

const now = () => new Date('2025-06-10T12:34:56.000Z')

function pattern(overrides: Partial<Pattern> & Pick<Pattern, 'description' | 'strength' | 'occurrences'>): Pattern {
  return {
    pattern_id: `pref_${overrides.description.length}`,
    category: 'preference',
    evidence: Array.from({ length: Math.min(overrides.occurrences, 10) }, (_, i) => `s-${i + 1}`),
    detected_at: '2025-06-10T12:00:00Z',
    ...overrides
  }
}

describe('toRuleText', () => {
  it('keeps imperative descriptions as they are', () => {
    expect(toRuleText('Never commit generated files', 'strong')).toBe('Never commit generated files')
    expect(toRuleText('prefer named exports', 'critical')).toBe('prefer named exports')
  })

  it('turns other descriptions into an instruction', () => {
    expect(toRuleText('Small focused modules', 'strong')).toBe('Follow this pattern: Small focused modules')
  })
})

describe('selectRulePatterns', () => {
  it('keeps strong and critical patterns, strongest and most frequent first', () => {
    const selected = selectRulePatterns([
      pattern({ description: 'a', strength: 'strong', occurrences: 3 }),
      pattern({ description: 'b', strength: 'emerging', occurrences: 2 }),
      pattern({ description: 'c', strength: 'strong', occurrences: 4 }),
      pattern({ description: 'd', strength: 'critical', occurrences: 5 })
    ])
    expect(selected.map(p => p.description)).toEqual(['d', 'c', 'a'])
  })
})

describe('renderRules', () => {
  it('renders a header and one block per pattern', () => {
    const markdown = renderRules([
      pattern({ description: 'tabs over spaces', strength: 'strong', occurrences: 3 }),
      pattern({ description: 'Always run the linter', strength: 'critical', occurrences: 7 })
    ], 'User Preferences', now())

    expect(markdown).toBe([
      '# User Preferences',
      '',
      '<!-- Generated by habitus on 2025-06-10 12:34 UTC -->',
      '<!-- Pattern Count: 2 | Confidence: High -->',
      '',
      '**Always run the linter**',
      '- Observed 7 times (critical pattern)',
      '- Evidence: s-1, s-2, s-3, s-4, s-5',
      '  (and 2 more)',
      '',
      '**Follow this pattern: tabs over spaces**',
      '- Observed 3 times (strong pattern)',
      '- Evidence: s-1, s-2, s-3',
      ''
    ].join('\n'))
  })

  it('reports medium confidence without critical patterns', () => {
    const markdown = renderRules([pattern({ description: 'x', strength: 'strong', occurrences: 3 })], 'Code Patterns', now())
    expect(markdown.split('\n')[3]).toBe('<!-- Pattern Count: 1 | Confidence: Medium -->')
  })
})

describe('synthesizeRules', () => {
  let projectDir: string
  let paths: MemoryPaths

  beforeEach(() => {
    projectDir = mkdtempSync(path.join(tmpdir(), 'habitus-synth-'))
    paths = resolveMemoryPaths(projectDir)
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
    rmSync(projectDir, { recursive: true, force: true })
  })

  const patterns: Pattern[] = [
    pattern({ description: 'Prefer pnpm', strength: 'critical', occurrences: 6 }),
    pattern({ description: 'Early returns', category: 'code_pattern', strength: 'emerging', occurrences: 2 }),
    pattern({ description: 'Avoid default exports', category: 'anti_pattern', strength: 'strong', occurrences: 3 })
  ]

  it('asks for an extraction run when there are no patterns', async () => {
    expect(await synthesizeRules({ paths, now })).toEqual({ status: 'no-patterns', message: 'No patterns found. Run extraction first.' })
  })

  it('writes nothing while every pattern is still emerging', async () => {
    await writeSemanticKnowledge(paths, [patterns[1]], '2025-06-10T12:00:00Z')

    const outcome = await synthesizeRules({ paths, now })

    expect(outcome.status).toBe('no-strong-patterns')
    expect(existsSync(paths.rules)).toBe(false)
  })

  it('writes one rule file per category with strong patterns and records metadata', async () => {
    await writeSemanticKnowledge(paths, patterns, '2025-06-10T12:00:00Z')

    const outcome = await synthesizeRules({ paths, now })

    expect(outcome).toEqual({
      status: 'ok',
      written: ['user-preferences.md', 'anti-patterns.md'],
      failed: [],
      patternCount: 2,
      metadataSaved: true
    })
    expect(existsSync(path.join(paths.rules, 'code-patterns.md'))).toBe(false)
    expect(readFileSync(path.join(paths.rules, 'anti-patterns.md'), 'utf-8')).toContain('**Avoid default exports**\n')

    const metadata = JSON.parse(readFileSync(paths.rulesMetadata, 'utf-8'))
    expect(metadata.last_synthesis).toBe('2025-06-10T12:34:56Z')
    expect(metadata.breakdown).toEqual({ preferences: 1, code_patterns: 0, anti_patterns: 1 })
    expect(metadata.files['user-preferences.md']).toEqual({ created: '2025-06-10T12:34:56Z', pattern_count: 1, confidence: 'high' })
  })

  it('keeps going when one rule file cannot be written', async () => {
    await writeSemanticKnowledge(paths, patterns, '2025-06-10T12:00:00Z')
    mkdirSync(path.join(paths.rules, 'user-preferences.md'), { recursive: true })

    const outcome = await synthesizeRules({ paths, now })

    expect(outcome.status).toBe('ok')
    if (outcome.status !== 'ok') return
    expect(outcome.written).toEqual(['anti-patterns.md'])
    expect(outcome.failed.map(f => f.file)).toEqual(['user-preferences.md'])
  })

  it('stops writing once the deadline passes', async () => {
    await writeSemanticKnowledge(paths, patterns, '2025-06-10T12:00:00Z')

    const outcome = await synthesizeRules({ paths, now, deadline: new Deadline('Rule synthesis', 0) })

    expect(outcome).toEqual({ status: 'timeout', written: [], message: 'Rule synthesis exceeded 0s timeout' })
    expect(existsSync(paths.rulesMetadata)).toBe(false)
  })
})
