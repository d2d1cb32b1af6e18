import { existsSync } from 'node:fs'
import { mkdir, readFile } from 'node:fs/promises'
import path from 'node:path'
import { HabitusConfig, loadConfig, writeDefaultConfig } from '../config.js'
import { Deadline } from '../deadline.js'
import { MemoryPaths, getProjectPath, resolveMemoryPaths } from '../paths.js'
import { Trigger, TRIGGERS } from '../memory/types.js'
import { encodeSession, sessionContextSchema } from '../memory/encoder.js'
import { readPatterns, runExtraction } from '../extraction/semantic.js'
import { RULE_FILES, synthesizeRules } from '../synthesis/synthesizer.js'
import { RecoveryManager } from '../recovery/manager.js'
import { EpisodicStore } from '../storage/episodic-store.js'

interface ProjectOptions {
  projectPath?: string
}

function resolvePaths(options: ProjectOptions): MemoryPaths {
  return resolveMemoryPaths(path.resolve(options.projectPath ?? getProjectPath()))
}

function isTrigger(value: string): value is Trigger {
  return TRIGGERS.some(t => t === value)
}

// Hooks fire on every trigger; the config decides which ones record a session
function triggerEnabled(trigger: Trigger, config: Readonly<HabitusConfig>): boolean {
  switch (trigger) {
    case 'precompact': return config.triggers.precompact
    case 'session-end': return config.triggers.sessionEnd
    case 'stop': return config.triggers.stop
    case 'manual': return true
  }
}

function fail(message: string): void {
  console.error(message)
  process.exitCode = 1
}

export async function initCommand(options: ProjectOptions): Promise<void> {
  const paths = resolvePaths(options)
  for (const dir of [paths.episodic, paths.semantic, paths.procedural, paths.rules]) {
    await mkdir(dir, { recursive: true })
  }
  if (writeDefaultConfig(paths.configFile)) {
    console.log(`Wrote default configuration to ${paths.configFile}`)
  }
  console.log(`Memory initialized at ${paths.root}`)
}

export async function encodeCommand(options: ProjectOptions & {
  trigger: string
  sessionId?: string
  context?: string
  transcriptDir?: string
}): Promise<void> {
  if (!isTrigger(options.trigger)) {
    fail(`Unknown trigger '${options.trigger}'. Expected one of: ${TRIGGERS.join(', ')}`)
    return
  }

  const paths = resolvePaths(options)
  const config = loadConfig(paths.configFile)
  if (!triggerEnabled(options.trigger, config)) {
    console.log(`Trigger '${options.trigger}' is disabled in ${paths.configFile}; nothing recorded.`)
    return
  }
  const contextFile = options.context

  const outcome = await encodeSession({
    paths,
    config,
    trigger: options.trigger,
    sessionId: options.sessionId,
    transcriptDir: options.transcriptDir,
    contextFn: contextFile
      ? async () => sessionContextSchema.parse(JSON.parse(await readFile(contextFile, 'utf-8')))
      : undefined
  })

  switch (outcome.status) {
    case 'ok':
      console.log(`Encoded session ${outcome.sessionId} (${outcome.encodingMode}) into ${outcome.partition}`)
      if (outcome.redactions > 0) console.log(`  ${outcome.redactions} sensitive items redacted`)
      if (!outcome.indexed) console.log('  Index update failed; lookups will fall back to a scan')
      if (config.processing.continuousMode) {
        await extractCommand({ projectPath: options.projectPath })
      }
      return
    case 'timeout':
      fail(outcome.partition
        ? `Encoding timed out; partial record saved to ${outcome.partition}`
        : 'Encoding timed out and the partial record could not be saved')
      return
    case 'failed':
      fail(`Encoding failed for session ${outcome.sessionId}:\n${outcome.errors.map(e => `  - ${e}`).join('\n')}`)
  }
}

export async function extractCommand(options: ProjectOptions & { minSessions?: string }): Promise<void> {
  const paths = resolvePaths(options)
  const config = loadConfig(paths.configFile)

  let minSessions: number | undefined
  if (options.minSessions !== undefined) {
    minSessions = parseInt(options.minSessions, 10)
    if (isNaN(minSessions) || minSessions < 1) {
      fail(`Invalid --min-sessions value: ${options.minSessions}`)
      return
    }
  }

  const outcome = await runExtraction({ paths, config, minSessions })
  switch (outcome.status) {
    case 'ok':
      console.log(`Extracted ${outcome.patterns.length} patterns from ${outcome.sessionCount} sessions (${outcome.strongCount} strong or critical)`)
      if (config.processing.autoSynthesize && outcome.strongCount > 0) {
        await synthesizeCommand(options)
      }
      return
    case 'insufficient-sessions':
      console.log(`Only ${outcome.sessionCount} of ${outcome.required} sessions recorded; nothing extracted yet.`)
      return
    case 'no-episodes':
      console.log(outcome.message)
      return
    case 'timeout':
    case 'save-failed':
      fail(outcome.message)
  }
}

export async function synthesizeCommand(options: ProjectOptions): Promise<void> {
  const paths = resolvePaths(options)
  const config = loadConfig(paths.configFile)
  const outcome = await synthesizeRules({
    paths,
    deadline: Deadline.after(config.timeouts.synthesize, 'Rule synthesis')
  })

  switch (outcome.status) {
    case 'ok':
      console.log(`Generated ${outcome.written.length} rule file(s) from ${outcome.patternCount} patterns in ${paths.rules}`)
      for (const { file, reason } of outcome.failed) console.log(`  Skipped ${file}: ${reason}`)
      return
    case 'no-patterns':
    case 'no-strong-patterns':
      console.log(outcome.message)
      return
    case 'timeout':
      fail(`${outcome.message}; kept ${outcome.written.length} rule file(s) already written`)
      return
    case 'write-failed':
      fail(`Failed to write rule files:\n${outcome.failed.map(f => `  - ${f.file}: ${f.reason}`).join('\n')}`)
  }
}

export async function statusCommand(options: ProjectOptions): Promise<void> {
  const paths = resolvePaths(options)
  if (!existsSync(paths.root)) {
    console.log('Memory not initialized. Run \'habitus init\' or \'habitus encode\' first.')
    return
  }

  const store = new EpisodicStore(paths.episodic)
  const partitions = await store.listPartitions()
  const index = await store.readIndex()
  const patterns = await readPatterns(paths)
  const rules = RULE_FILES.filter(r => existsSync(path.join(paths.rules, r.file)))

  console.log('')
  console.log('  Habitus Memory Status')
  console.log('  ---------------------')
  console.log(`  Project:           ${paths.projectPath}`)
  console.log(`  Partitions:        ${partitions.length}`)
  console.log(`  Indexed sessions:  ${Object.keys(index).length}`)
  console.log(`  Patterns:          ${patterns ? patterns.length : 'not extracted'}`)
  console.log(`  Rule files:        ${rules.length > 0 ? rules.map(r => r.file).join(', ') : 'none'}`)
  console.log('')
}

export async function validateCommand(options: ProjectOptions): Promise<void> {
  const paths = resolvePaths(options)
  const manager = new RecoveryManager({ paths, config: loadConfig(paths.configFile) })
  const report = await manager.validate()

  if (report.ok) {
    console.log('Memory is valid.')
    return
  }
  fail(`Found ${report.errors.length} problem(s):\n${report.errors.map(e => `  - ${e}`).join('\n')}`)
}

export async function rebuildCommand(options: ProjectOptions): Promise<void> {
  const paths = resolvePaths(options)
  const manager = new RecoveryManager({ paths, config: loadConfig(paths.configFile) })
  const outcome = await manager.rebuild()

  if (outcome.status === 'ok') {
    console.log(`Rebuilt ${outcome.patternCount} patterns from ${outcome.sessionCount} sessions`)
    return
  }
  fail(outcome.message)
}

export async function resetCommand(options: ProjectOptions & { removeEpisodic?: boolean }): Promise<void> {
  const paths = resolvePaths(options)
  const manager = new RecoveryManager({ paths, config: loadConfig(paths.configFile) })
  const outcome = await manager.reset({ keepEpisodic: !options.removeEpisodic })

  if (!outcome.ok) {
    fail(`Reset failed: ${outcome.error.message}`)
    return
  }
  if (outcome.episodicBackup) console.log(`Episodic records backed up to ${outcome.episodicBackup}`)
  console.log(outcome.removed.length > 0 ? `Removed:\n${outcome.removed.map(d => `  - ${d}`).join('\n')}` : 'Nothing to remove.')
}

export async function backupCommand(file: string, options: ProjectOptions & { dir?: string }): Promise<void> {
  const paths = resolvePaths(options)
  const manager = new RecoveryManager({ paths, config: loadConfig(paths.configFile) })
  const result = await manager.backupCorrupt(path.resolve(file), options.dir)

  if (result.ok) {
    console.log(`Moved ${file} to ${result.backupPath}`)
    return
  }
  fail(`Backup failed: ${result.error.message}`)
}
