/**
 * Typed backend error classes.
 *
 * Every failure the query client can raise is a {@link BackendError} carrying
 * its {@link FailureKind} and whether a retry may help. The retry loop and the
 * rate calculator branch on these fields, never on message text.
 */

import type { FailureKind, FailureRecord, MetricName } from '../types.js'
import { errorMessage } from '../error-utils.js'

export abstract class BackendError extends Error {
  abstract readonly kind: FailureKind
  abstract readonly retryable: boolean
}

/** The request did not complete within the per-request timeout. */
export class BackendTimeoutError extends BackendError {
  readonly kind = 'timeout' as const
  readonly retryable = true

  constructor(message: string) {
    super(message)
    this.name = 'BackendTimeoutError'
  }
}

/** DNS, connection refused/reset and other failures below HTTP. */
export class BackendUnreachableError extends BackendError {
  readonly kind = 'network' as const
  readonly retryable = true

  constructor(message: string) {
    super(message)
    this.name = 'BackendUnreachableError'
  }
}

/** HTTP 429. */
export class RateLimitError extends BackendError {
  readonly kind = 'rate-limit' as const
  readonly retryable = true

  constructor(message: string) {
    super(message)
    this.name = 'RateLimitError'
  }
}

/** Any other non-2xx response. Only 5xx is retried. */
export class BackendHttpError extends BackendError {
  readonly kind = 'http' as const
  readonly retryable: boolean

  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message)
    this.name = 'BackendHttpError'
    this.retryable = status >= 500
  }
}

/** Body was not JSON, did not match the API envelope, or carried `status: "error"`. */
export class MalformedResponseError extends BackendError {
  readonly kind = 'malformed' as const
  readonly retryable = false

  constructor(message: string) {
    super(message)
    this.name = 'MalformedResponseError'
  }
}

/**
 * Final error of a backend call once the retry policy gave up, either because
 * the failure was permanent or because every attempt was used.
 */
export class QueryFailedError extends Error {
  constructor(
    readonly kind: FailureKind,
    readonly attempts: number,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'QueryFailedError'
  }
}

/** The caller's signal aborted the request or its retry loop. Never retried or recorded. */
export class RequestAbortedError extends Error {
  constructor(label: string, options?: { cause?: unknown }) {
    super(`${label} aborted`, options)
    this.name = 'RequestAbortedError'
  }
}

/** Raised when discovery or rules listing fails, which aborts the whole cycle. */
export class CycleError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'CycleError'
  }
}

/** Maps a retry-loop error onto the failure kind it should be recorded as. */
export function failureKindOf(err: unknown): FailureKind {
  if (err instanceof QueryFailedError) return err.kind
  if (err instanceof BackendError) return err.kind
  return 'internal'
}

/** Builds the per-metric failure record for an error raised while evaluating `name`. */
export function toFailureRecord(name: MetricName, err: unknown): FailureRecord {
  return {
    name,
    kind: failureKindOf(err),
    attempts: err instanceof QueryFailedError ? err.attempts : 1,
    message: errorMessage(err),
  }
}
