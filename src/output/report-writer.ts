/**
 * One-shot report rendering: CSV, JSON, plain text and exposition format.
 */

import type { OutputFormat } from '../config.js'
import { renderReportExposition } from '../service/exposition.js'
import type { CycleReport, MetricRateResult } from '../types.js'
import { atomicWrite } from '../utils/fs.js'

const EXTENSIONS: Record<OutputFormat, string> = {
  csv: 'csv',
  json: 'json',
  prom: 'prom',
  text: 'txt',
  txt: 'txt',
}

/** `metric_rates.<ext>` for the given format. */
export function defaultReportPath(format: OutputFormat): string {
  return `metric_rates.${EXTENSIONS[format]}`
}

function round(value: number, digits: number): number {
  const factor = 10 ** digits
  return Math.round(value * factor) / factor
}

function hasSeriesCounts(results: readonly MetricRateResult[]): boolean {
  return results.some((r) => r.activeSeries !== undefined)
}

/** Quotes a CSV field when it contains a delimiter, quote or newline. */
function csvField(value: string): string {
  return /[",\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value
}

export function renderCsv(report: CycleReport): string {
  const withSeries = hasSeriesCounts(report.results)
  const header = withSeries ? 'metric_name,dpm,active_series,impact_score' : 'metric_name,dpm'
  const rows = report.results.map((r) => {
    const cells = [csvField(r.name), String(r.dpm)]
    if (withSeries) {
      cells.push(r.activeSeries === undefined ? '' : String(r.activeSeries))
      cells.push(r.impactScore === undefined ? '' : String(r.impactScore))
    }
    return cells.join(',')
  })
  return [header, ...rows].join('\n') + '\n'
}

export function renderJson(report: CycleReport): string {
  const { performance, counts } = report
  const output = {
    metrics: report.results.map((r) => ({
      metric_name: r.name,
      dpm: r.dpm,
      ...(r.activeSeries !== undefined ? { active_series: r.activeSeries } : {}),
      ...(r.impactScore !== undefined ? { impact_score: r.impactScore } : {}),
      ...(r.labels !== undefined ? { labels: r.labels } : {}),
    })),
    total_metrics_above_threshold: counts.selected,
    failed_metrics: report.failures.map((f) => ({
      metric_name: f.name,
      kind: f.kind,
      attempts: f.attempts,
    })),
    performance_metrics: {
      total_runtime_seconds: round(performance.totalRuntimeSeconds, 2),
      average_metric_processing_seconds: round(performance.avgMetricSeconds, 3),
      total_metrics_processed: counts.processed,
      metrics_per_second: round(performance.metricsPerSecond, 1),
    },
  }
  return JSON.stringify(output, null, 2) + '\n'
}

export function renderText(report: CycleReport): string {
  const { performance, counts } = report
  const lines = [
    'Metrics and their DPM values:',
    ...report.results.map((r) => `${r.name}: ${r.dpm}`),
    '',
    'Performance Metrics:',
    `Total runtime: ${performance.totalRuntimeSeconds.toFixed(2)} seconds`,
    `Average time per metric: ${performance.avgMetricSeconds.toFixed(3)} seconds`,
    `Total metrics processed: ${counts.processed}`,
    `Metrics processing rate: ${performance.metricsPerSecond.toFixed(1)} metrics/second`,
  ]
  if (counts.failed > 0) {
    lines.push(`Failed metrics: ${counts.failed}`)
  }
  return lines.join('\n') + '\n'
}

export async function renderReport(report: CycleReport, format: OutputFormat): Promise<string> {
  switch (format) {
    case 'csv':
      return renderCsv(report)
    case 'json':
      return renderJson(report)
    case 'prom':
      return renderReportExposition(report)
    case 'text':
    case 'txt':
      return renderText(report)
  }
}

/** Renders `report` and writes it atomically to `path`. Returns the rendered text. */
export async function writeReport(report: CycleReport, format: OutputFormat, path: string): Promise<string> {
  const content = await renderReport(report, format)
  await atomicWrite(path, content)
  return content
}
