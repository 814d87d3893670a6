/**
 * Prometheus exposition of a snapshot.
 *
 * Every render builds a fresh prom-client `Registry` from a single snapshot
 * read, so one scrape never mixes values from two cycles. The one-shot `prom`
 * report uses the same gauges without the readiness gauge.
 */

import { Counter, Gauge, Registry } from 'prom-client'
import type { CycleReport, SnapshotView } from '../types.js'

export const EXPORTER_VERSION = '1.0.0'

/** Static facts about the running exporter, published as an info metric. */
export interface ExporterInfo {
  readonly version: string
  readonly minDpmThreshold: number
  readonly updateIntervalSeconds: number
  readonly threadCount: number
}

/** Label values keep `-`, `.` and `:` out of metric names, as earlier reports did. */
export function sanitizeMetricNameLabel(name: string): string {
  return name.replace(/[-.:]/g, '_')
}

interface RegistryOptions {
  readonly info?: ExporterInfo
  readonly withReadiness: boolean
}

function buildRegistry(view: SnapshotView, options: RegistryOptions): Registry {
  const { info } = options
  const registry = new Registry()
  const registers = [registry]

  if (info !== undefined) {
    new Gauge({
      name: 'dpm_finder_exporter_info',
      help: 'Information about the DPM finder exporter',
      labelNames: ['version', 'min_dpm_threshold', 'update_interval_seconds', 'thread_count'] as const,
      registers,
    }).set(
      {
        version: info.version,
        min_dpm_threshold: String(info.minDpmThreshold),
        update_interval_seconds: String(info.updateIntervalSeconds),
        thread_count: String(info.threadCount),
      },
      1,
    )
  }

  if (options.withReadiness) {
    new Gauge({
      name: 'dpm_finder_ready',
      help: 'Whether at least one DPM calculation has completed (1) or not (0)',
      registers,
    }).set(view.ready ? 1 : 0)
  }

  if (!view.ready) return registry
  const { report } = view

  const dpm = new Gauge({
    name: 'metric_dpm_rate',
    help: 'Data points per minute for each metric',
    labelNames: ['metric_name'] as const,
    registers,
  })
  for (const result of report.results) {
    dpm.set({ metric_name: sanitizeMetricNameLabel(result.name) }, result.dpm)
  }

  const withSeries = report.results.filter((r) => r.activeSeries !== undefined)
  if (withSeries.length > 0) {
    const series = new Gauge({
      name: 'metric_active_series',
      help: 'Active series count for each metric',
      labelNames: ['metric_name'] as const,
      registers,
    })
    const impact = new Gauge({
      name: 'metric_impact_score',
      help: 'Data points per minute multiplied by active series count',
      labelNames: ['metric_name'] as const,
      registers,
    })
    for (const result of withSeries) {
      const labels = { metric_name: sanitizeMetricNameLabel(result.name) }
      series.set(labels, result.activeSeries ?? 0)
      impact.set(labels, result.impactScore ?? 0)
    }
  }

  const { performance, counts } = report
  new Gauge({
    name: 'dpm_finder_runtime_seconds',
    help: 'Total runtime of the last DPM calculation',
    registers,
  }).set(performance.totalRuntimeSeconds)
  new Gauge({
    name: 'dpm_finder_avg_metric_process_seconds',
    help: 'Average time to process each metric',
    registers,
  }).set(performance.avgMetricSeconds)
  new Counter({
    name: 'dpm_finder_metrics_processed_total',
    help: 'Total number of metrics processed',
    registers,
  }).inc(counts.processed)
  new Gauge({
    name: 'dpm_finder_metrics_failed',
    help: 'Metrics whose rate could not be calculated in the last run',
    registers,
  }).set(counts.failed)
  new Gauge({
    name: 'dpm_finder_processing_rate_metrics_per_second',
    help: 'Rate of metric processing',
    registers,
  }).set(performance.metricsPerSecond)
  new Gauge({
    name: 'dpm_finder_last_update_timestamp',
    help: 'Unix timestamp of last metrics update',
    registers,
  }).set(Date.parse(report.finishedAt) / 1000)

  return registry
}

/** Exposition-format text for `view`. */
export async function renderExposition(view: SnapshotView, info?: ExporterInfo): Promise<string> {
  return buildRegistry(view, { withReadiness: true, ...(info !== undefined ? { info } : {}) }).metrics()
}

/** Exposition-format text for a one-shot report file. */
export async function renderReportExposition(report: CycleReport): Promise<string> {
  return buildRegistry({ ready: true, state: 'ready', report }, { withReadiness: false }).metrics()
}

/** Content type of {@link renderExposition} output. */
export const EXPOSITION_CONTENT_TYPE = new Registry().contentType
