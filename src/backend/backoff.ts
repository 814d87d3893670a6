/**
 * Exponential backoff for the backend client's retry loop.
 */

export interface BackoffPolicy {
  /** Delay before the second attempt. Doubles for every further attempt. */
  readonly baseDelayMs: number
  /** Upper bound for a single delay. */
  readonly maxDelayMs: number
}

/**
 * Delay to wait after failed attempt number `attempt` (1-based):
 * `baseDelayMs * 2^(attempt - 1)`, capped at `maxDelayMs`.
 * Attempts below 1 are treated as 1.
 */
export function computeBackoffMs(attempt: number, policy: BackoffPolicy): number {
  const exponent = Math.max(0, Math.floor(attempt) - 1)
  return Math.min(policy.baseDelayMs * 2 ** exponent, policy.maxDelayMs)
}

/** Resolves after `ms`, or as soon as `signal` aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve()
      return
    }
    const onAbort = (): void => {
      clearTimeout(timer)
      resolve()
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve()
    }, ms)
    signal?.addEventListener('abort', onAbort, { once: true })
  })
}
