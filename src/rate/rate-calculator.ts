/**
 * Per-metric rate estimation.
 *
 * The DPM query samples the last `windowMinutes` of data and divides the
 * point count by the window length. Two optional supplementary queries add
 * the active series count (and with it the impact score) and the labels of
 * the busiest series. Only a failure of the DPM query itself makes the metric
 * a failure; the supplementary queries degrade to absent fields.
 */

import type { BackendClient } from '../backend/client.js'
import { MalformedResponseError, RequestAbortedError, toFailureRecord } from '../backend/errors.js'
import type { QuerySample } from '../backend/response.js'
import { errorMessage } from '../error-utils.js'
import { silentLogger, type Logger } from '../logger.js'
import type { MetricName, MetricRateResult, RateOutcome } from '../types.js'

export interface RateOptions {
  readonly windowMinutes: number
  readonly withSeriesCount: boolean
  readonly withLabels: boolean
  /**
   * Adds `{__ignore_usage__=""}` to every selector so that the rate queries
   * themselves are not billed as usage by hosted backends that honour it.
   */
  readonly ignoreUsageSelector: boolean
  /** Cancels every query of this metric. */
  readonly signal?: AbortSignal
  readonly logger?: Logger
}

// ---------------------------------------------------------------------------
// Query builders
// ---------------------------------------------------------------------------

export function buildSelector(name: MetricName, ignoreUsageSelector: boolean): string {
  return ignoreUsageSelector ? `${name}{__ignore_usage__=""}` : name
}

export function buildDpmQuery(name: MetricName, windowMinutes: number, ignoreUsageSelector: boolean): string {
  return `count_over_time(${buildSelector(name, ignoreUsageSelector)}[${windowMinutes}m]) / ${windowMinutes}`
}

export function buildSeriesCountQuery(name: MetricName, ignoreUsageSelector: boolean): string {
  return `count by (__name__) (${buildSelector(name, ignoreUsageSelector)})`
}

export function buildLabelsQuery(name: MetricName, windowMinutes: number, ignoreUsageSelector: boolean): string {
  return `topk(1, count_over_time(${buildSelector(name, ignoreUsageSelector)}[${windowMinutes}m]))`
}

// ---------------------------------------------------------------------------
// Computation
// ---------------------------------------------------------------------------

/**
 * Reads the DPM from the first sample. No samples means the metric had no
 * points in the window, which is a DPM of 0.
 *
 * @throws {MalformedResponseError} for NaN, infinite or negative values.
 */
export function dpmFromSamples(samples: readonly QuerySample[]): number {
  const first = samples[0]
  if (first === undefined) return 0
  if (!Number.isFinite(first.value) || first.value < 0) {
    throw new MalformedResponseError(`DPM query returned an invalid value: ${first.value}`)
  }
  return first.value
}

async function fetchActiveSeries(
  client: BackendClient,
  name: MetricName,
  options: RateOptions,
  logger: Logger,
): Promise<number | undefined> {
  try {
    const samples = await client.instantQuery(
      buildSeriesCountQuery(name, options.ignoreUsageSelector),
      options.signal,
    )
    const value = samples[0]?.value
    if (value === undefined || !Number.isFinite(value) || value < 0) return undefined
    return value
  } catch (err) {
    if (err instanceof RequestAbortedError) throw err
    logger.debug(`rate: series count for ${name} unavailable: ${errorMessage(err)}`)
    return undefined
  }
}

async function fetchLabels(
  client: BackendClient,
  name: MetricName,
  options: RateOptions,
  logger: Logger,
): Promise<Readonly<Record<string, string>> | undefined> {
  try {
    const samples = await client.instantQuery(
      buildLabelsQuery(name, options.windowMinutes, options.ignoreUsageSelector),
      options.signal,
    )
    const first = samples[0]
    if (first === undefined) return undefined
    const { __name__: _ignored, ...labels } = first.labels
    return labels
  } catch (err) {
    if (err instanceof RequestAbortedError) throw err
    logger.debug(`rate: labels for ${name} unavailable: ${errorMessage(err)}`)
    return undefined
  }
}

/**
 * Estimates the rate of one metric. Every error of the DPM query becomes the
 * failure branch of the outcome.
 *
 * @throws {RequestAbortedError} when `options.signal` aborts; an aborted
 *   metric has no outcome.
 */
export async function computeRate(
  client: BackendClient,
  name: MetricName,
  options: RateOptions,
): Promise<RateOutcome> {
  const logger = options.logger ?? silentLogger

  let dpm: number
  try {
    const samples = await client.instantQuery(
      buildDpmQuery(name, options.windowMinutes, options.ignoreUsageSelector),
      options.signal,
    )
    dpm = dpmFromSamples(samples)
  } catch (err) {
    if (err instanceof RequestAbortedError) throw err
    return { ok: false, failure: toFailureRecord(name, err) }
  }

  const [activeSeries, labels] = await Promise.all([
    options.withSeriesCount ? fetchActiveSeries(client, name, options, logger) : Promise.resolve(undefined),
    options.withLabels ? fetchLabels(client, name, options, logger) : Promise.resolve(undefined),
  ])

  const result: MetricRateResult = {
    name,
    dpm,
    ...(activeSeries !== undefined ? { activeSeries, impactScore: dpm * activeSeries } : {}),
    ...(labels !== undefined ? { labels } : {}),
  }
  return { ok: true, result }
}

