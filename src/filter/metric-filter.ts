/**
 * Decides which discovered metrics are worth a rate query.
 *
 * Histogram/summary component series, the backend's own internal metrics and
 * metrics produced by aggregation rules are excluded. Pure: no I/O.
 */

import type { MetricName } from '../types.js'

export const DEFAULT_EXCLUDE_SUFFIXES = ['_count', '_bucket', '_sum'] as const
export const DEFAULT_EXCLUDE_PREFIXES = ['grafana_'] as const

export interface MetricFilterOptions {
  readonly excludeSuffixes: readonly string[]
  readonly excludePrefixes: readonly string[]
}

export type ExclusionReason = 'suffix' | 'prefix' | 'aggregation-rule'

/**
 * Returns the first exclusion rule `name` matches, or null when it is kept.
 * Rules are checked in order: suffix, prefix, aggregation rule.
 */
export function exclusionReason(
  name: MetricName,
  aggregationRuleNames: ReadonlySet<MetricName>,
  options: MetricFilterOptions,
): ExclusionReason | null {
  if (options.excludeSuffixes.some((suffix) => name.endsWith(suffix))) return 'suffix'
  if (options.excludePrefixes.some((prefix) => name.startsWith(prefix))) return 'prefix'
  if (aggregationRuleNames.has(name)) return 'aggregation-rule'
  return null
}

export function shouldExclude(
  name: MetricName,
  aggregationRuleNames: ReadonlySet<MetricName>,
  options: MetricFilterOptions,
): boolean {
  return exclusionReason(name, aggregationRuleNames, options) !== null
}

export interface FilterOutcome {
  /** Names to query, in discovery order, without duplicates. */
  readonly kept: readonly MetricName[]
  readonly excluded: readonly MetricName[]
  readonly excludedBy: Readonly<Record<ExclusionReason, number>>
}

/** Partitions the metric universe. A name listed twice is only kept once. */
export function filterMetricNames(
  universe: readonly MetricName[],
  aggregationRuleNames: ReadonlySet<MetricName>,
  options: MetricFilterOptions,
): FilterOutcome {
  const seen = new Set<MetricName>()
  const kept: MetricName[] = []
  const excluded: MetricName[] = []
  const excludedBy: Record<ExclusionReason, number> = { suffix: 0, prefix: 0, 'aggregation-rule': 0 }

  for (const name of universe) {
    if (seen.has(name)) continue
    seen.add(name)

    const reason = exclusionReason(name, aggregationRuleNames, options)
    if (reason === null) {
      kept.push(name)
    } else {
      excluded.push(name)
      excludedBy[reason]++
    }
  }

  return { kept, excluded, excludedBy }
}
