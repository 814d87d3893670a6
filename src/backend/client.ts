/**
 * Read-only client for a Prometheus-compatible backend.
 *
 * Three request shapes are supported: metric-name listing, aggregation-rule
 * listing and instant queries. Each call authenticates with basic auth,
 * applies its own timeout and runs inside {@link withRetry}.
 *
 * The client keeps no per-call state, so one instance is shared by every
 * dispatcher worker.
 *
 * Error types thrown (always wrapped in `QueryFailedError` by the retry loop):
 *   - `BackendTimeoutError`     — the per-request timeout elapsed
 *   - `BackendUnreachableError` — network-level failures (ECONNREFUSED, DNS, ...)
 *   - `RateLimitError`          — HTTP 429
 *   - `BackendHttpError`        — any other non-2xx status
 *   - `MalformedResponseError`  — body is not the expected JSON
 *
 * A caller signal that aborts surfaces as `RequestAbortedError`, unwrapped.
 */

import {
  BackendHttpError,
  BackendTimeoutError,
  BackendUnreachableError,
  RateLimitError,
  RequestAbortedError,
} from './errors.js'
import { withRetry, type RetryPolicy } from './retry.js'
import {
  parseInstantQueryResponse,
  parseLabelValuesResponse,
  parseRulesResponse,
  type QuerySample,
} from './response.js'
import { errorMessage } from '../error-utils.js'
import { silentLogger, type Logger } from '../logger.js'
import type { MetricName } from '../types.js'

export interface BackendCredentials {
  readonly username: string
  readonly apiKey: string
}

export interface BackendClientOptions {
  /** Base URL of the backend, e.g. `https://prometheus.example.net`. */
  readonly endpoint: string
  /** Omit to send unauthenticated requests. */
  readonly credentials?: BackendCredentials
  /** Prefix in front of `/api/v1/...` paths. */
  readonly apiPrefix: string
  /** Path of the aggregation-rules listing, relative to `endpoint`. */
  readonly rulesPath: string
  readonly timeoutMs: number
  readonly retry: RetryPolicy
  readonly logger?: Logger
}

/** Every call takes an optional signal that cancels the request and its retries. */
export interface BackendClient {
  listMetricNames(signal?: AbortSignal): Promise<readonly MetricName[]>
  listAggregationRuleNames(signal?: AbortSignal): Promise<ReadonlySet<MetricName>>
  instantQuery(expression: string, signal?: AbortSignal): Promise<readonly QuerySample[]>
}

/** Joins `endpoint` and `path` with exactly one slash between them. */
export function joinUrl(endpoint: string, path: string): string {
  const base = endpoint.replace(/\/+$/, '')
  const suffix = path.replace(/^\/+/, '')
  return suffix === '' ? base : `${base}/${suffix}`
}

function basicAuthHeader(credentials: BackendCredentials): string {
  const token = Buffer.from(`${credentials.username}:${credentials.apiKey}`).toString('base64')
  return `Basic ${token}`
}

function isTimeout(err: unknown): boolean {
  return err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError')
}

export function createBackendClient(options: BackendClientOptions): BackendClient {
  const { credentials, timeoutMs, retry } = options
  const logger = options.logger ?? silentLogger
  const apiBase = joinUrl(options.endpoint, options.apiPrefix)
  const labelValuesUrl = joinUrl(apiBase, '/api/v1/label/__name__/values')
  const queryUrl = joinUrl(apiBase, '/api/v1/query')
  const rulesUrl = joinUrl(options.endpoint, options.rulesPath)

  const headers: Record<string, string> = { Accept: 'application/json' }
  if (credentials) {
    headers['Authorization'] = basicAuthHeader(credentials)
  }

  /** One HTTP attempt. Returns the body of a 2xx response or throws a BackendError. */
  async function getOnce(url: string, label: string, signal?: AbortSignal): Promise<string> {
    const timeout = AbortSignal.timeout(timeoutMs)
    let response: Response
    try {
      response = await fetch(url, {
        method: 'GET',
        headers,
        signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
      })
    } catch (err) {
      if (signal?.aborted) throw new RequestAbortedError(label, { cause: err })
      if (isTimeout(err)) {
        throw new BackendTimeoutError(`${label} timed out after ${timeoutMs}ms`)
      }
      throw new BackendUnreachableError(`${label} unreachable: ${errorMessage(err)}`)
    }

    let body: string
    try {
      body = await response.text()
    } catch (err) {
      if (signal?.aborted) throw new RequestAbortedError(label, { cause: err })
      if (isTimeout(err)) {
        throw new BackendTimeoutError(`${label} timed out after ${timeoutMs}ms while reading the body`)
      }
      throw new BackendUnreachableError(`${label} body could not be read: ${errorMessage(err)}`)
    }

    if (response.status === 429) {
      throw new RateLimitError(`${label} rate limited (429): ${body.slice(0, 200)}`)
    }
    if (!response.ok) {
      throw new BackendHttpError(response.status, `${label} error (${response.status}): ${body.slice(0, 200)}`)
    }
    return body
  }

  /** Fetches and parses inside the retry loop, so a malformed body is reported with its attempt count. */
  function getWithRetry<T>(
    url: string,
    label: string,
    parse: (body: string) => T,
    signal: AbortSignal | undefined,
  ): Promise<T> {
    return withRetry(
      label,
      async () => parse(await getOnce(url, label, signal)),
      retry,
      {
        ...(signal ? { signal } : {}),
        onRetry: ({ attempt, delayMs, error }) => {
          logger.debug(
            `backend: ${label} failed (${error.name}: ${error.message}), retrying in ${delayMs}ms (attempt ${attempt}/${retry.maxAttempts})`,
          )
        },
      },
    )
  }

  return {
    listMetricNames(signal?: AbortSignal) {
      return getWithRetry(labelValuesUrl, 'metric name listing', parseLabelValuesResponse, signal)
    },

    listAggregationRuleNames(signal?: AbortSignal) {
      return getWithRetry(rulesUrl, 'aggregation rule listing', parseRulesResponse, signal)
    },

    instantQuery(expression: string, signal?: AbortSignal) {
      const url = `${queryUrl}?${new URLSearchParams({ query: expression }).toString()}`
      return getWithRetry(url, `query ${expression}`, parseInstantQueryResponse, signal)
    },
  }
}
