export type Clock = () => number

export class DeadlineExceededError extends Error {
  readonly label: string
  readonly timeoutMs: number

  constructor(label: string, timeoutMs: number) {
    super(`${label} exceeded ${Math.round(timeoutMs / 1000)}s timeout`)
    this.name = 'DeadlineExceededError'
    this.label = label
    this.timeoutMs = timeoutMs
  }
}

/**
 * A wall-clock budget owned by the caller and threaded through long-running
 * operations. Nothing interrupts the work; it calls `check()` at its own yield
 * points and unwinds with a DeadlineExceededError once the budget is spent.
 */
export class Deadline {
  private readonly expiresAt: number
  private readonly clock: Clock

  readonly label: string
  readonly timeoutMs: number

  constructor(label: string, timeoutMs: number, clock: Clock = Date.now) {
    this.label = label
    this.timeoutMs = timeoutMs
    this.clock = clock
    this.expiresAt = clock() + timeoutMs
  }

  static after(seconds: number, label: string, clock?: Clock): Deadline {
    return new Deadline(label, seconds * 1000, clock)
  }

  static none(label = 'operation'): Deadline {
    return new Deadline(label, Number.POSITIVE_INFINITY)
  }

  get remainingMs(): number {
    return Math.max(0, this.expiresAt - this.clock())
  }

  get expired(): boolean {
    return this.clock() >= this.expiresAt
  }

  check(): void {
    if (this.expired) {
      throw new DeadlineExceededError(this.label, this.timeoutMs)
    }
  }
}
