export interface Logger {
  info(message: string): void
  warn(message: string): void
  error(message: string, cause?: unknown): void
}

function describe(cause: unknown): string {
  if (cause instanceof Error) return cause.message
  return String(cause)
}

export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`
  return {
    info: (message) => console.log(`${prefix} ${message}`),
    warn: (message) => console.warn(`${prefix} ${message}`),
    error: (message, cause) => {
      if (cause === undefined) {
        console.error(`${prefix} ${message}`)
      } else {
        console.error(`${prefix} ${message}: ${describe(cause)}`)
      }
    }
  }
}
