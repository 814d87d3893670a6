/**
 * Bounded fan-out of per-metric work.
 *
 * All names are queued up front; `min(concurrency, names.length)` workers
 * take the next index from the shared queue until it is empty. A failing or
 * throwing worker call only affects its own metric. The pool always drains
 * before `dispatchMetrics` returns.
 */

import { toFailureRecord } from '../backend/errors.js'
import { silentLogger, type Logger } from '../logger.js'
import type { FailureRecord, MetricName, MetricRateResult, RateOutcome } from '../types.js'

export type MetricWorker = (name: MetricName) => Promise<RateOutcome>

export interface DispatchOptions {
  /** Worker count. Values below 1 are treated as 1. */
  readonly concurrency: number
  /**
   * When aborted, no new names are started, and a worker call that throws
   * after the abort leaves its name unprocessed.
   */
  readonly signal?: AbortSignal
  /** Called after each metric with the number of completed and total names. */
  readonly onProgress?: (completed: number, total: number) => void
  readonly logger?: Logger
}

export interface DispatchResult {
  /** Successful results in completion order. */
  readonly results: readonly MetricRateResult[]
  readonly failures: readonly FailureRecord[]
  /** Wall time per processed metric, in completion order. */
  readonly durationsMs: readonly number[]
  readonly effectiveWorkers: number
}

export class DispatchAbortedError extends Error {
  constructor(
    readonly completed: number,
    readonly total: number,
  ) {
    super(`Dispatch aborted after ${completed}/${total} metrics`)
    this.name = 'DispatchAbortedError'
  }
}

/**
 * Runs `worker` once for every distinct name in `names`.
 *
 * @throws {DispatchAbortedError} if `options.signal` aborted before every
 *   name was processed. Nothing else escapes: worker errors become failures.
 */
export async function dispatchMetrics(
  names: readonly MetricName[],
  worker: MetricWorker,
  options: DispatchOptions,
): Promise<DispatchResult> {
  const logger = options.logger ?? silentLogger
  const queue = [...new Set(names)]
  if (queue.length !== names.length) {
    logger.warn(`dispatcher: ${names.length - queue.length} duplicate metric name(s) dropped`)
  }

  const results: MetricRateResult[] = []
  const failures: FailureRecord[] = []
  const durationsMs: number[] = []
  const concurrency = Math.max(1, Math.floor(options.concurrency))
  const effectiveWorkers = Math.min(concurrency, queue.length)
  let next = 0
  let completed = 0

  async function runWorker(): Promise<void> {
    while (next < queue.length && !options.signal?.aborted) {
      const name = queue[next++]
      if (name === undefined) continue

      const startedAt = performance.now()
      let outcome: RateOutcome
      try {
        outcome = await worker(name)
      } catch (err) {
        if (options.signal?.aborted) return
        outcome = { ok: false, failure: toFailureRecord(name, err) }
      }
      durationsMs.push(performance.now() - startedAt)

      if (outcome.ok) {
        results.push(outcome.result)
      } else {
        failures.push(outcome.failure)
        logger.warn(
          `dispatcher: ${name} failed (${outcome.failure.kind}, ${outcome.failure.attempts} attempt(s)): ${outcome.failure.message}`,
        )
      }

      completed++
      options.onProgress?.(completed, queue.length)
    }
  }

  logger.info(`dispatcher: processing ${queue.length} metrics with ${effectiveWorkers} worker(s)`)
  await Promise.all(Array.from({ length: effectiveWorkers }, () => runWorker()))

  if (completed < queue.length) {
    throw new DispatchAbortedError(completed, queue.length)
  }

  return { results, failures, durationsMs, effectiveWorkers }
}
