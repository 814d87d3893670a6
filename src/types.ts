/**
 * Shared domain types for dpm-finder.
 *
 * Everything a cycle produces is plain, readonly data so that a completed
 * {@link CycleReport} can be frozen and handed to any number of readers.
 */

// ---------------------------------------------------------------------------
// Metrics
// ---------------------------------------------------------------------------

/** Opaque metric identifier as returned by backend discovery. */
export type MetricName = string

/** Length of the sampled window used by every DPM query, in minutes. */
export const DPM_WINDOW_MINUTES = 5

/** Rate estimate for one metric that survived filtering and was queried successfully. */
export interface MetricRateResult {
  readonly name: MetricName
  /** Data points per minute. Always finite and >= 0. */
  readonly dpm: number
  /** Active series count. Only present in series-count mode. */
  readonly activeSeries?: number
  /** `dpm * activeSeries`. Present iff `activeSeries` is present. */
  readonly impactScore?: number
  /** Labels of the metric's highest-volume series. Only present with label enrichment. */
  readonly labels?: Readonly<Record<string, string>>
}

// ---------------------------------------------------------------------------
// Failures
// ---------------------------------------------------------------------------

export const FAILURE_KINDS = ['timeout', 'http', 'rate-limit', 'network', 'malformed', 'internal'] as const

export type FailureKind = (typeof FAILURE_KINDS)[number]

/** A metric that could not be evaluated. Its name never appears in the results. */
export interface FailureRecord {
  readonly name: MetricName
  readonly kind: FailureKind
  /** Attempts made before giving up (1 for non-retryable failures). */
  readonly attempts: number
  readonly message: string
}

/** Outcome of evaluating one metric. Zero DPM is a success, never a failure. */
export type RateOutcome =
  | { readonly ok: true; readonly result: MetricRateResult }
  | { readonly ok: false; readonly failure: FailureRecord }

// ---------------------------------------------------------------------------
// Cycle report
// ---------------------------------------------------------------------------

export interface CycleCounts {
  /** Metric names returned by discovery. */
  readonly discovered: number
  /** Names removed by the metric filter. */
  readonly filteredOut: number
  /** Names handed to the dispatcher. */
  readonly processed: number
  readonly succeeded: number
  readonly failed: number
  /** Results left after selection. */
  readonly selected: number
}

export interface CyclePerformance {
  readonly totalRuntimeSeconds: number
  /** Mean wall time spent on one metric, retries included. */
  readonly avgMetricSeconds: number
  readonly metricsPerSecond: number
  readonly effectiveWorkers: number
}

/** Immutable result of one discovery → filter → dispatch → select pass. */
export interface CycleReport {
  readonly results: readonly MetricRateResult[]
  readonly failures: readonly FailureRecord[]
  readonly startedAt: string
  readonly finishedAt: string
  readonly counts: CycleCounts
  readonly performance: CyclePerformance
}

// ---------------------------------------------------------------------------
// Service snapshot
// ---------------------------------------------------------------------------

export type CoordinatorState = 'uninitialized' | 'refreshing' | 'ready'

/**
 * What a reader of the service snapshot sees. `state` is `refreshing` while a
 * new cycle is in flight; the report shown is still the previous complete one.
 */
export type SnapshotView =
  | { readonly ready: true; readonly state: CoordinatorState; readonly report: CycleReport }
  | { readonly ready: false; readonly state: CoordinatorState }
