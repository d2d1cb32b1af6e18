// Second-precision UTC instant, e.g. 2025-12-31T01:23:45Z
export function isoTimestamp(date: Date = new Date()): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z')
}

// Compact stamp used in backup file names, e.g. 20251231_012345
export function backupStamp(date: Date = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, '0')
  return `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
}

export function parseTimestamp(value: string): Date | null {
  const date = new Date(value)
  return isNaN(date.getTime()) ? null : date
}
