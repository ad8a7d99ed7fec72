import type { DgtBoardReconnectConfig } from './types.js'

export interface ReconnectSupervisorDeps {
  /** One full pass over every candidate; rejects when none could be opened. */
  attempt: () => Promise<unknown>
  onAttemptFailed: (err: unknown) => void
  onScheduled: (attempt: number, delayMs: number) => void
  /** A hook above threw; retries carry on regardless. */
  onHookError: (err: unknown) => void
}

export function backoffDelay(cfg: DgtBoardReconnectConfig, attempt: number): number {
  return Math.min(cfg.baseDelayMs * 2 ** (attempt - 1), cfg.maxDelayMs)
}

/**
 * Retries `attempt` until it succeeds: immediately, then after
 * base, 2*base, 4*base, ... capped at `maxDelayMs`.
 *
 * `start()` re-arms after a success (the connection calls it again on
 * every unexpected disconnect). `stop()` is terminal.
 */
export class ReconnectSupervisor {
  private readonly cfg: DgtBoardReconnectConfig
  private readonly deps: ReconnectSupervisorDeps

  private timer: NodeJS.Timeout | null = null
  private failures = 0
  private running = false
  private stopped = false

  constructor(cfg: DgtBoardReconnectConfig, deps: ReconnectSupervisorDeps) {
    this.cfg = cfg
    this.deps = deps
  }

  /** True while a pass is in flight or a retry is scheduled. */
  get active(): boolean {
    return this.running
  }

  get isStopped(): boolean {
    return this.stopped
  }

  start(): void {
    if (this.stopped || this.running) return
    this.running = true
    this.failures = 0
    this.launch()
  }

  stop(): void {
    this.stopped = true
    this.running = false
    this.clearTimer()
  }

  private launch(): void {
    this.runAttempt().catch((err: unknown) => this.deps.onHookError(err))
  }

  private async runAttempt(): Promise<void> {
    if (this.stopped) return

    try {
      await this.deps.attempt()
    } catch (err) {
      if (this.stopped) return
      this.callHook(() => this.deps.onAttemptFailed(err))
      this.scheduleRetry()
      return
    }

    this.running = false
    this.failures = 0
  }

  private scheduleRetry(): void {
    this.clearTimer()
    this.failures += 1
    const attempt = this.failures
    const delay = backoffDelay(this.cfg, attempt)

    this.timer = setTimeout(() => {
      this.timer = null
      if (this.stopped) return
      this.launch()
    }, delay)
    this.callHook(() => this.deps.onScheduled(attempt, delay))
  }

  private callHook(hook: () => void): void {
    try {
      hook()
    } catch (err) {
      this.deps.onHookError(err)
    }
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer)
      this.timer = null
    }
  }
}
