import { readdir, readFile, stat } from 'node:fs/promises'
import path from 'node:path'
import { createLogger } from '../logger.js'
import { Deadline } from '../deadline.js'
import { JsonObject, isJsonObject, readString } from './types.js'

const log = createLogger('transcript')

export const MAX_TRANSCRIPT_RECORDS = 1000
const MAX_LOGGED_MALFORMED = 5

export interface TranscriptScan {
  path: string
  records: JsonObject[]
  validLines: number
  malformedLines: number
}

export interface TranscriptSummary {
  toolCounts: Record<string, number>
  filesModified: string[]
  errors: string[]
}

async function findTranscripts(dir: string): Promise<string[]> {
  let entries: string[]
  try {
    entries = await readdir(dir, { recursive: true })
  } catch {
    return []
  }

  const files = entries.filter(name => name.endsWith('.jsonl')).map(name => path.join(dir, name))
  const settled = await Promise.allSettled(files.map(async file => ({ file, mtime: (await stat(file)).mtimeMs })))

  const withTimes: { file: string; mtime: number }[] = []
  settled.forEach((result, i) => {
    if (result.status === 'fulfilled') {
      withTimes.push(result.value)
    } else {
      const reason: unknown = result.reason
      log.warn(`Skipping transcript ${files[i]}: ${reason instanceof Error ? reason.message : String(reason)}`)
    }
  })
  return withTimes.sort((a, b) => b.mtime - a.mtime).map(entry => entry.file)
}

/**
 * Parse one JSONL transcript, skipping lines that are not JSON objects.
 */
export function parseTranscript(content: string, file: string, limit: number = MAX_TRANSCRIPT_RECORDS): Omit<TranscriptScan, 'path'> {
  const records: JsonObject[] = []
  let malformedLines = 0

  const lines = content.split(/\r?\n/)
  for (let i = 0; i < lines.length && records.length < limit; i++) {
    const line = lines[i].trim()
    if (!line) continue
    try {
      const parsed: unknown = JSON.parse(line)
      if (!isJsonObject(parsed)) throw new Error('not an object')
      records.push(parsed)
    } catch (e) {
      malformedLines++
      if (malformedLines <= MAX_LOGGED_MALFORMED) {
        log.warn(`Malformed JSONL at ${file}:${i + 1}: ${e instanceof Error ? e.message : String(e)}`)
      }
    }
  }

  return { records, validLines: records.length, malformedLines }
}

/**
 * Newest transcript under `dir` that yields at least one record, or null.
 */
export async function scanTranscripts(
  dir: string,
  options: { limit?: number; deadline?: Deadline } = {}
): Promise<TranscriptScan | null> {
  const deadline = options.deadline ?? Deadline.none()
  const transcripts = await findTranscripts(dir)
  if (transcripts.length === 0) {
    log.warn(`No JSONL transcripts found under ${dir}`)
    return null
  }

  for (const file of transcripts) {
    let content: string
    try {
      content = await readFile(file, 'utf-8')
    } catch (e) {
      log.warn(`Error reading transcript ${file}: ${e instanceof Error ? e.message : String(e)}`)
      continue
    }

    const scan = parseTranscript(content, file, options.limit)
    deadline.check()
    if (scan.malformedLines > 0) {
      log.warn(`Skipped ${scan.malformedLines} malformed JSONL lines, processed ${scan.validLines} valid lines`)
    }
    if (scan.records.length > 0) {
      return { path: file, ...scan }
    }
  }

  log.warn('No JSONL transcript records found')
  return null
}

export function summarizeTranscript(records: readonly JsonObject[]): TranscriptSummary {
  const toolCounts: Record<string, number> = {}
  const files = new Set<string>()
  const errors: string[] = []

  for (const record of records) {
    const tool = readString(record, 'tool_name')
    if (tool) toolCounts[tool] = (toolCounts[tool] ?? 0) + 1

    const input = record.tool_input
    if (isJsonObject(input)) {
      const file = readString(input, 'file_path')
      if (file) files.add(file)
    }

    if ('error' in record && record.error !== null) {
      const error = record.error
      errors.push(typeof error === 'string' ? error : JSON.stringify(error))
    }
  }

  return {
    toolCounts,
    filesModified: [...files].slice(0, 20),
    errors: errors.slice(0, 5)
  }
}
