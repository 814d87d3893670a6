/**
 * Turns the unordered dispatcher output into the presented result list.
 *
 * Steps, in order:
 *   1. drop results with `dpm <= minDpm` (a result exactly at the threshold is dropped)
 *   2. with a label pattern, drop results whose labels do not match it or are unknown
 *   3. sort by DPM descending or by name ascending; DPM ties break by name
 *   4. keep the first `topN`
 *
 * A result without `labels` (its label query failed or found no series) never
 * matches a pattern. Configuration refuses a label filter without label
 * enrichment, so with a pattern set every result had its labels looked up.
 */

import { matchesLabelPattern, type LabelPattern } from '../rate/label-pattern.js'
import type { MetricRateResult } from '../types.js'

export const SORT_KEYS = ['dpm', 'name'] as const

export type SortKey = (typeof SORT_KEYS)[number]

export interface SelectionOptions {
  readonly minDpm: number
  readonly labelPattern?: LabelPattern
  readonly topN?: number
  readonly sortBy: SortKey
}

function compareNames(a: MetricRateResult, b: MetricRateResult): number {
  if (a.name < b.name) return -1
  if (a.name > b.name) return 1
  return 0
}

function compareByDpm(a: MetricRateResult, b: MetricRateResult): number {
  return b.dpm - a.dpm || compareNames(a, b)
}

/** Pure: never mutates `results`. */
export function selectResults(
  results: readonly MetricRateResult[],
  options: SelectionOptions,
): readonly MetricRateResult[] {
  const { minDpm, labelPattern, topN, sortBy } = options

  const selected = results
    .filter((r) => r.dpm > minDpm)
    .filter((r) => labelPattern === undefined || (r.labels !== undefined && matchesLabelPattern(r.labels, labelPattern)))
    .sort(sortBy === 'name' ? compareNames : compareByDpm)

  return topN === undefined ? selected : selected.slice(0, Math.max(0, topN))
}
