import { z } from 'zod'

export type JsonPrimitive = string | number | boolean | null
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue }
export type JsonObject = { [key: string]: JsonValue }

const jsonPrimitiveSchema = z.union([z.string(), z.number(), z.boolean(), z.null()])

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([jsonPrimitiveSchema, z.array(jsonValueSchema), z.record(jsonValueSchema)])
)

export const jsonObjectSchema: z.ZodType<JsonObject> = z.record(jsonValueSchema)

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function readString(record: JsonObject, key: string): string | undefined {
  const value = record[key]
  return typeof value === 'string' ? value : undefined
}

export function readArray(record: JsonObject, key: string): JsonValue[] | undefined {
  const value = record[key]
  return Array.isArray(value) ? value : undefined
}

// --- Episodes ---

export const TRIGGERS = ['precompact', 'session-end', 'stop', 'manual'] as const
export type Trigger = typeof TRIGGERS[number]

export const ENCODING_MODES = ['context', 'jsonl_fallback', 'partial_timeout'] as const
export type EncodingMode = typeof ENCODING_MODES[number]

export const annotationSchema = z.union([
  z.string(),
  z.object({ description: z.string() }).catchall(jsonValueSchema)
])

export const episodeSchema = z.object({
  session_id: z.string().min(1),
  timestamp: z.string().min(1).refine(v => !isNaN(new Date(v).getTime()), 'must be an ISO-8601 timestamp'),
  trigger: z.enum(TRIGGERS),
  encoding_mode: z.enum(ENCODING_MODES),
  user_preferences: z.array(annotationSchema).optional(),
  code_patterns: z.array(annotationSchema).optional(),
  anti_patterns: z.array(annotationSchema).optional(),
  limitations: z.array(z.string()).optional()
}).catchall(jsonValueSchema)

export type Episode = z.infer<typeof episodeSchema>

// Just enough of an episode for the store to route it
export const episodeHeaderSchema = z.object({
  session_id: z.string().min(1),
  timestamp: z.string().min(1)
}).passthrough()

export function validateEpisode(record: unknown): string[] {
  const result = episodeSchema.safeParse(record)
  if (result.success) return []
  return result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`)
}

// --- Partitions and index ---

export interface Partition {
  sessions: JsonValue[]
  count: number
  last_updated: string | null
}

export const partitionShapeSchema = z.object({
  sessions: z.array(jsonValueSchema)
}).passthrough()

export const indexSchema = z.record(z.string())
export type EpisodeIndex = z.infer<typeof indexSchema>

// --- Patterns ---

export const CATEGORIES = ['preference', 'code_pattern', 'anti_pattern'] as const
export type PatternCategory = typeof CATEGORIES[number]

export const STRENGTHS = ['weak', 'emerging', 'strong', 'critical'] as const
export type PatternStrength = typeof STRENGTHS[number]

export const patternSchema = z.object({
  pattern_id: z.string(),
  description: z.string(),
  category: z.enum(CATEGORIES),
  strength: z.enum(STRENGTHS),
  occurrences: z.number().int().min(1),
  evidence: z.array(z.string()),
  detected_at: z.string()
})

export type Pattern = z.infer<typeof patternSchema>

export interface Thresholds {
  emerging: number
  strong: number
  critical: number
}
