/**
 * Periodic refresh of the exporter's snapshot.
 *
 * The coordinator owns the only shared mutable value in the service: the
 * current {@link CycleReport}. A cycle writes it with one reference swap when
 * it completes; readers always get the last complete report, or a not-ready
 * view before the first one exists.
 *
 * Cycles never overlap. A timer tick that arrives while a cycle is still
 * running is dropped; the next tick after completion starts the next cycle.
 * A cycle that fails with a {@link CycleError} is retried with backoff inside
 * the same tick, a few more times for the first cycle than for later ones.
 */

import { computeBackoffMs, sleep, type BackoffPolicy } from '../backend/backoff.js'
import { CycleError } from '../backend/errors.js'
import { errorMessage } from '../error-utils.js'
import { silentLogger, type Logger } from '../logger.js'
import type { CoordinatorState, CycleReport, SnapshotView } from '../types.js'

/** Produces one report. Once `signal` aborts it must start no new work and cancel its backend requests. */
export type CycleRunner = (signal: AbortSignal) => Promise<CycleReport>

export interface CycleRetryPolicy extends BackoffPolicy {
  /** Attempts while no snapshot exists yet. */
  readonly initialAttempts: number
  /** Attempts once a snapshot exists. */
  readonly attempts: number
}

export interface RefreshCoordinatorOptions {
  readonly runCycle: CycleRunner
  readonly intervalMs: number
  /** Omit to run every cycle once. */
  readonly retry?: CycleRetryPolicy
  readonly logger?: Logger
}

const NO_RETRY: CycleRetryPolicy = { initialAttempts: 1, attempts: 1, baseDelayMs: 0, maxDelayMs: 0 }

/** Result of {@link RefreshCoordinator.stop}. */
export type StopOutcome = 'idle' | 'drained' | 'abandoned'

export interface CycleStats {
  readonly completed: number
  readonly failed: number
  readonly skippedTicks: number
  readonly lastError?: string
}

export class RefreshCoordinator {
  private readonly _runCycle: CycleRunner
  private readonly _intervalMs: number
  private readonly _retry: CycleRetryPolicy
  private readonly _logger: Logger
  /** Aborted by `stop()` to cut a pending retry delay short. */
  private readonly _stopping = new AbortController()

  private _snapshot: CycleReport | null = null
  private _inFlight: Promise<void> | null = null
  private _abort: AbortController | null = null
  private _timer: ReturnType<typeof setInterval> | null = null
  private _stopped = false

  private _completed = 0
  private _failed = 0
  private _skippedTicks = 0
  private _lastError: string | undefined

  constructor(options: RefreshCoordinatorOptions) {
    this._runCycle = options.runCycle
    this._intervalMs = options.intervalMs
    this._retry = options.retry ?? NO_RETRY
    this._logger = options.logger ?? silentLogger
  }

  get state(): CoordinatorState {
    if (this._inFlight !== null) return 'refreshing'
    return this._snapshot === null ? 'uninitialized' : 'ready'
  }

  get stats(): CycleStats {
    return {
      completed: this._completed,
      failed: this._failed,
      skippedTicks: this._skippedTicks,
      ...(this._lastError !== undefined ? { lastError: this._lastError } : {}),
    }
  }

  /** Never blocks and never triggers a cycle. */
  currentReport(): SnapshotView {
    const report = this._snapshot
    const state = this.state
    return report === null ? { ready: false, state } : { ready: true, state, report }
  }

  /**
   * Starts the first cycle right away and then one per interval.
   * Calling it again while running is a no-op.
   */
  start(): void {
    if (this._timer !== null || this._stopped) return
    this._logger.info(`coordinator: starting, refresh every ${this._intervalMs / 1000}s`)
    this.tick()
    this._timer = setInterval(() => this.tick(), this._intervalMs)
  }

  /**
   * Starts a cycle unless one is already running.
   *
   * @returns false when the tick was absorbed by a running cycle or the
   *   coordinator is stopped.
   */
  tick(): boolean {
    if (this._stopped) return false
    if (this._inFlight !== null) {
      this._skippedTicks++
      this._logger.warn('coordinator: previous cycle still running, tick skipped')
      return false
    }

    const abort = new AbortController()
    this._abort = abort
    this._inFlight = this._runOnce(abort.signal).finally(() => {
      this._inFlight = null
      this._abort = null
    })
    return true
  }

  /** Resolves when the cycle in flight (if any) has settled. */
  async whenIdle(): Promise<void> {
    await this._inFlight
  }

  /**
   * Stops ticking and waits up to `drainMs` for the cycle in flight. A cycle
   * still running after that is aborted and its result is never published.
   */
  async stop(drainMs: number): Promise<StopOutcome> {
    this._stopped = true
    this._stopping.abort()
    if (this._timer !== null) {
      clearInterval(this._timer)
      this._timer = null
    }

    const inFlight = this._inFlight
    if (inFlight === null) return 'idle'

    let drainTimer: ReturnType<typeof setTimeout> | undefined
    const timedOut = new Promise<'abandoned'>((resolve) => {
      drainTimer = setTimeout(() => resolve('abandoned'), drainMs)
    })
    const outcome = await Promise.race([inFlight.then(() => 'drained' as const), timedOut])
    clearTimeout(drainTimer)

    if (outcome === 'abandoned') {
      this._logger.warn(`coordinator: cycle still running after ${drainMs}ms, abandoning it`)
      this._abort?.abort()
    }
    return outcome
  }

  private async _runOnce(signal: AbortSignal): Promise<void> {
    const startedAt = Date.now()
    const maxAttempts = Math.max(1, this._snapshot === null ? this._retry.initialAttempts : this._retry.attempts)

    for (let attempt = 1; ; attempt++) {
      try {
        const report = await this._runCycle(signal)
        if (this._stopped && signal.aborted) return
        this._snapshot = report
        this._completed++
        this._lastError = undefined
        this._logger.info(
          `coordinator: snapshot updated (${report.counts.selected} metrics, ${report.counts.failed} failed) ` +
          `in ${((Date.now() - startedAt) / 1000).toFixed(1)}s`,
        )
        return
      } catch (err) {
        if (signal.aborted) {
          this._failed++
          this._lastError = errorMessage(err)
          this._logger.info('coordinator: cycle abandoned during shutdown')
          return
        }
        if (err instanceof CycleError && attempt < maxAttempts && !this._stopped) {
          const delayMs = computeBackoffMs(attempt, this._retry)
          this._logger.warn(
            `coordinator: cycle failed (${errorMessage(err)}), retrying in ${delayMs}ms (attempt ${attempt}/${maxAttempts})`,
          )
          await sleep(delayMs, this._stopping.signal)
          if (!this._stopped) continue
        }
        this._failed++
        this._lastError = errorMessage(err)
        this._logger.error(
          `coordinator: cycle failed, ${this._snapshot === null ? 'no snapshot yet' : 'keeping previous snapshot'}: ${this._lastError}`,
        )
        return
      }
    }
  }
}
