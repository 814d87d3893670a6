/**
 * One complete discovery → filter → dispatch → select pass.
 *
 * Shared by the one-shot command and the exporter's refresh coordinator.
 * Discovery and rules listing are the only steps whose failure aborts the
 * cycle; per-metric failures are collected in the report.
 */

import type { BackendClient } from '../backend/client.js'
import { CycleError, RequestAbortedError } from '../backend/errors.js'
import type { DpmConfig } from '../config.js'
import { dispatchMetrics } from '../dispatch/dispatcher.js'
import { errorMessage } from '../error-utils.js'
import { filterMetricNames } from '../filter/metric-filter.js'
import { silentLogger, type Logger } from '../logger.js'
import { parseLabelPattern } from '../rate/label-pattern.js'
import { computeRate } from '../rate/rate-calculator.js'
import { selectResults } from '../select/selector.js'
import {
  DPM_WINDOW_MINUTES,
  FAILURE_KINDS,
  type CyclePerformance,
  type CycleReport,
  type FailureKind,
  type FailureRecord,
  type MetricName,
} from '../types.js'

export interface CycleParams {
  readonly client: BackendClient
  readonly config: DpmConfig
  readonly logger?: Logger
  /** Aborting cancels the backend requests in flight and stops the dispatcher. */
  readonly signal?: AbortSignal
  /** Clock in epoch milliseconds. */
  readonly now?: () => number
}

/** Counts failures per kind, omitting kinds that did not occur. */
export function summarizeFailures(failures: readonly FailureRecord[]): Partial<Record<FailureKind, number>> {
  const summary: Partial<Record<FailureKind, number>> = {}
  for (const failure of failures) {
    summary[failure.kind] = (summary[failure.kind] ?? 0) + 1
  }
  return summary
}

function formatFailureSummary(failures: readonly FailureRecord[]): string {
  const summary = summarizeFailures(failures)
  return FAILURE_KINDS.filter((kind) => summary[kind] !== undefined)
    .map((kind) => `${kind}=${summary[kind]}`)
    .join(', ')
}

/**
 * Derives the run-performance figures. A zero runtime yields a rate of 0
 * rather than Infinity.
 */
export function computePerformance(
  totalRuntimeMs: number,
  durationsMs: readonly number[],
  processed: number,
  effectiveWorkers: number,
): CyclePerformance {
  const totalRuntimeSeconds = totalRuntimeMs / 1000
  const avgMetricSeconds =
    durationsMs.length === 0 ? 0 : durationsMs.reduce((sum, ms) => sum + ms, 0) / durationsMs.length / 1000
  return {
    totalRuntimeSeconds,
    avgMetricSeconds,
    metricsPerSecond: totalRuntimeSeconds > 0 ? processed / totalRuntimeSeconds : 0,
    effectiveWorkers,
  }
}

async function discover(
  client: BackendClient,
  signal: AbortSignal | undefined,
): Promise<{ universe: readonly MetricName[]; rules: ReadonlySet<MetricName> }> {
  // The first listing to fail cancels the other one.
  const sibling = new AbortController()
  const listingSignal = signal ? AbortSignal.any([signal, sibling.signal]) : sibling.signal
  try {
    const [universe, rules] = await Promise.all([
      client.listMetricNames(listingSignal),
      client.listAggregationRuleNames(listingSignal),
    ])
    return { universe, rules }
  } catch (err) {
    sibling.abort()
    if (err instanceof RequestAbortedError) throw err
    throw new CycleError(`metric discovery failed: ${errorMessage(err)}`, { cause: err })
  }
}

/**
 * Runs one cycle and returns its frozen report.
 *
 * @throws {CycleError} when the metric universe or rule set cannot be listed.
 * @throws {RequestAbortedError} when `signal` aborts during discovery.
 * @throws {DispatchAbortedError} when `signal` aborts mid-dispatch.
 */
export async function runCycle(params: CycleParams): Promise<CycleReport> {
  const { client, config, signal } = params
  const logger = params.logger ?? silentLogger
  const now = params.now ?? Date.now
  const startedMs = now()

  const { universe, rules } = await discover(client, signal)
  logger.info(`cycle: found ${universe.length} metrics, ${rules.size} with aggregation rules`)

  const filtered = filterMetricNames(universe, rules, config.filter)
  logger.info(
    `cycle: filtered to ${filtered.kept.length} metrics ` +
    `(excluded ${filtered.excludedBy.suffix} by suffix, ${filtered.excludedBy.prefix} by prefix, ` +
    `${filtered.excludedBy['aggregation-rule']} by aggregation rule)`,
  )

  const dispatched = await dispatchMetrics(
    filtered.kept,
    (name) =>
      computeRate(client, name, {
        windowMinutes: DPM_WINDOW_MINUTES,
        withSeriesCount: config.rate.withSeriesCount,
        withLabels: config.rate.withLabels,
        ignoreUsageSelector: config.backend.ignoreUsageSelector,
        logger,
        ...(signal ? { signal } : {}),
      }),
    {
      concurrency: config.dispatch.threads,
      logger,
      onProgress: (completed, total) => logger.debug(`cycle: processed ${completed}/${total} metrics`),
      ...(signal ? { signal } : {}),
    },
  )

  if (dispatched.failures.length > 0) {
    logger.warn(
      `cycle: ${dispatched.failures.length}/${filtered.kept.length} metrics failed (${formatFailureSummary(dispatched.failures)})`,
    )
  }

  const { labelFilter, minDpm, topN, sortBy } = config.selection
  const selected = selectResults(dispatched.results, {
    minDpm,
    sortBy,
    ...(labelFilter !== undefined ? { labelPattern: parseLabelPattern(labelFilter) } : {}),
    ...(topN !== undefined ? { topN } : {}),
  })

  const finishedMs = now()
  const performance = computePerformance(
    finishedMs - startedMs,
    dispatched.durationsMs,
    filtered.kept.length,
    dispatched.effectiveWorkers,
  )

  logger.info(
    `cycle: ${selected.length} metrics with DPM > ${minDpm}; ` +
    `runtime ${performance.totalRuntimeSeconds.toFixed(2)}s, ` +
    `avg ${performance.avgMetricSeconds.toFixed(3)}s/metric, ` +
    `${performance.metricsPerSecond.toFixed(1)} metrics/s, ${performance.effectiveWorkers} worker(s)`,
  )

  return freezeReport({
    results: selected,
    failures: dispatched.failures,
    startedAt: new Date(startedMs).toISOString(),
    finishedAt: new Date(finishedMs).toISOString(),
    counts: {
      discovered: universe.length,
      filteredOut: filtered.excluded.length,
      processed: filtered.kept.length,
      succeeded: dispatched.results.length,
      failed: dispatched.failures.length,
      selected: selected.length,
    },
    performance,
  })
}

/** Freezes the report and everything it references. */
export function freezeReport(report: CycleReport): CycleReport {
  for (const result of report.results) {
    if (result.labels) Object.freeze(result.labels)
    Object.freeze(result)
  }
  report.failures.forEach((failure) => Object.freeze(failure))
  Object.freeze(report.results)
  Object.freeze(report.failures)
  Object.freeze(report.counts)
  Object.freeze(report.performance)
  return Object.freeze(report)
}
