export { parseConfig, dpmConfigSchema, ConfigValidationError, OUTPUT_FORMATS } from './config.js'
export type { DpmConfig, OutputFormat, ParseConfigOptions } from './config.js'
export { loadConfigFile, mergeConfigLayers, ConfigFileError } from './config-file.js'
export type { RawConfig } from './config-file.js'
export { parseBackendEnv, loadBackendEnv, EnvValidationError } from './env.js'
export type { BackendEnv } from './env.js'

export { DPM_WINDOW_MINUTES, FAILURE_KINDS } from './types.js'
export type {
  MetricName,
  MetricRateResult,
  FailureKind,
  FailureRecord,
  RateOutcome,
  CycleCounts,
  CyclePerformance,
  CycleReport,
  CoordinatorState,
  SnapshotView,
} from './types.js'

export { createConsoleLogger, silentLogger, resolveLogLevel, LOG_LEVELS } from './logger.js'
export type { Logger, LogLevel } from './logger.js'

export { createBackendClient, joinUrl } from './backend/client.js'
export type { BackendClient, BackendClientOptions, BackendCredentials } from './backend/client.js'
export {
  BackendError,
  BackendTimeoutError,
  BackendUnreachableError,
  RateLimitError,
  BackendHttpError,
  MalformedResponseError,
  QueryFailedError,
  RequestAbortedError,
  CycleError,
} from './backend/errors.js'
export { withRetry } from './backend/retry.js'
export type { RetryPolicy } from './backend/retry.js'

export { filterMetricNames, shouldExclude } from './filter/metric-filter.js'
export { parseLabelPattern, matchesLabelPattern, LabelPatternError } from './rate/label-pattern.js'
export type { LabelPattern } from './rate/label-pattern.js'
export { computeRate, buildDpmQuery } from './rate/rate-calculator.js'
export { dispatchMetrics, DispatchAbortedError } from './dispatch/dispatcher.js'
export { selectResults, SORT_KEYS } from './select/selector.js'
export type { SelectionOptions, SortKey } from './select/selector.js'

export { runCycle } from './cycle/run-cycle.js'
export { runOnce } from './one-shot.js'
export { renderReport, writeReport, defaultReportPath } from './output/report-writer.js'

export { RefreshCoordinator } from './service/refresh-coordinator.js'
export type { StopOutcome, CycleStats, CycleRetryPolicy } from './service/refresh-coordinator.js'
export { renderExposition, renderReportExposition, sanitizeMetricNameLabel } from './service/exposition.js'
export { createServiceApp, startService, stopOnSignals } from './service/server.js'
export type { ServiceHandle } from './service/server.js'

export { runCli, buildProgram } from './cli.js'
