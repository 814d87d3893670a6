/**
 * Attempt-count retry loop used by every backend call.
 *
 * The loop only decides *whether* to retry; the delay comes from the pure
 * {@link computeBackoffMs} so the schedule can be tested on its own.
 */

import { computeBackoffMs, sleep, type BackoffPolicy } from './backoff.js'
import { BackendError, QueryFailedError, RequestAbortedError } from './errors.js'
import { errorMessage } from '../error-utils.js'

export interface RetryPolicy extends BackoffPolicy {
  /** Total attempts including the first one. Values below 1 are treated as 1. */
  readonly maxAttempts: number
}

export interface RetryHooks {
  /** Called before sleeping ahead of attempt `attempt + 1`. */
  readonly onRetry?: (info: { attempt: number; delayMs: number; error: BackendError }) => void
  /** Once aborted, no further attempt starts and a pending backoff ends early. */
  readonly signal?: AbortSignal
}

/**
 * Runs `operation` until it succeeds, fails permanently, or `maxAttempts`
 * attempts have been made.
 *
 * Errors that are not a retryable {@link BackendError} end the loop at once.
 *
 * @throws {QueryFailedError} carrying the last error's kind and the number of
 *   attempts made; the last error is kept as `cause`.
 * @throws {RequestAbortedError} once `hooks.signal` has aborted.
 */
export async function withRetry<T>(
  label: string,
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  hooks: RetryHooks = {},
): Promise<T> {
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts))
  const { signal } = hooks

  for (let attempt = 1; ; attempt++) {
    if (signal?.aborted) throw new RequestAbortedError(label)
    try {
      return await operation(attempt)
    } catch (err) {
      if (err instanceof RequestAbortedError) throw err
      if (signal?.aborted) throw new RequestAbortedError(label, { cause: err })
      if (!(err instanceof BackendError)) {
        throw new QueryFailedError('internal', attempt, `${label} failed: ${errorMessage(err)}`, { cause: err })
      }
      if (!err.retryable) {
        throw new QueryFailedError(err.kind, attempt, `${label} failed: ${err.message}`, { cause: err })
      }
      if (attempt >= maxAttempts) {
        throw new QueryFailedError(
          err.kind,
          attempt,
          `${label} failed after ${attempt} attempts: ${err.message}`,
          { cause: err },
        )
      }
      const delayMs = computeBackoffMs(attempt, policy)
      hooks.onRetry?.({ attempt, delayMs, error: err })
      await sleep(delayMs, signal)
    }
  }
}
