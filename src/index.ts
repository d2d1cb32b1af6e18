#!/usr/bin/env node

import { Command } from 'commander'
import {
  initCommand,
  encodeCommand,
  extractCommand,
  synthesizeCommand,
  statusCommand,
  validateCommand,
  rebuildCommand,
  resetCommand,
  backupCommand
} from './cli/commands.js'

const program = new Command()

program
  .name('habitus')
  .description('Session memory that turns recurring working habits into project rules')
  .version('0.1.0')
  .option('--project-path <path>', 'Project whose .habitus directory to use (default: $HABITUS_PROJECT_PATH or cwd)')

function projectPath(): { projectPath?: string } {
  return { projectPath: program.opts<{ projectPath?: string }>().projectPath }
}

program
  .command('init')
  .description('Create the memory directories and a default config')
  .action(async () => {
    await initCommand(projectPath())
  })

program
  .command('encode')
  .description('Record the current session as an episode')
  .requiredOption('--trigger <trigger>', 'What ended the session: precompact, session-end, stop or manual')
  .option('--session-id <id>', 'Session identifier (generated when omitted)')
  .option('--context <file>', 'JSON file with the session context')
  .option('--transcript-dir <dir>', 'Where to look for JSONL transcripts')
  .action(async (options: { trigger: string; sessionId?: string; context?: string; transcriptDir?: string }) => {
    await encodeCommand({ ...projectPath(), ...options })
  })

program
  .command('extract')
  .description('Detect recurring patterns across recorded sessions')
  .option('--min-sessions <n>', 'Sessions required before extracting (default from config)')
  .action(async (options: { minSessions?: string }) => {
    await extractCommand({ ...projectPath(), ...options })
  })

program
  .command('synthesize')
  .description('Write rule files from strong and critical patterns')
  .action(async () => {
    await synthesizeCommand(projectPath())
  })

program
  .command('status')
  .description('Show memory statistics')
  .action(async () => {
    await statusCommand(projectPath())
  })

program
  .command('validate')
  .description('Check every stored document for corruption')
  .action(async () => {
    await validateCommand(projectPath())
  })

program
  .command('rebuild')
  .description('Recompute semantic knowledge from the episode log')
  .action(async () => {
    await rebuildCommand(projectPath())
  })

program
  .command('reset')
  .description('Remove derived memory, backing up episodes first')
  .option('--remove-episodic', 'Also delete the episode log')
  .action(async (options: { removeEpisodic?: boolean }) => {
    await resetCommand({ ...projectPath(), ...options })
  })

program
  .command('backup <file>')
  .description('Move a corrupted file aside into a .backup directory')
  .option('--dir <dir>', 'Directory to move the file into (default: a .backup folder beside the file)')
  .action(async (file: string, options: { dir?: string }) => {
    await backupCommand(file, { ...projectPath(), ...options })
  })

program.parseAsync(process.argv).catch((err) => {
  console.error(err)
  process.exit(1)
})
