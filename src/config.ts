import { z } from 'zod'
import { formatZodErrors } from './error-utils.js'
import { DEFAULT_EXCLUDE_PREFIXES, DEFAULT_EXCLUDE_SUFFIXES } from './filter/metric-filter.js'
import { LabelPatternError, parseLabelPattern } from './rate/label-pattern.js'
import { SORT_KEYS } from './select/selector.js'

// ---------------------------------------------------------------------------
// Sub-schemas
// ---------------------------------------------------------------------------

/**
 * How the backend is reached and how hard each request is retried.
 */
const backendSchema = z
  .object({
    /**
     * Per-request timeout in seconds. A hung backend turns the affected
     * metric into a timeout failure instead of stalling the cycle.
     * @default 60
     */
    timeoutSeconds: z
      .number()
      .int()
      .min(1, 'backend.timeoutSeconds must be at least 1')
      .max(3_600, 'backend.timeoutSeconds must be at most 3600')
      .default(60),
    /** Total attempts per request, the first one included. */
    maxAttempts: z
      .number()
      .int()
      .min(1, 'backend.maxAttempts must be at least 1')
      .max(20, 'backend.maxAttempts must be at most 20')
      .default(10),
    /** Delay before the first retry; doubles on every further retry. */
    baseDelayMs: z
      .number()
      .int()
      .min(0, 'backend.baseDelayMs must be >= 0')
      .default(2_000),
    /** Cap for a single retry delay. */
    maxDelayMs: z
      .number()
      .int()
      .min(0, 'backend.maxDelayMs must be >= 0')
      .default(60_000),
    /** Prefix in front of the `/api/v1/...` paths. Grafana Cloud serves them under `/api/prom`. */
    apiPrefix: z.string().default('/api/prom'),
    /** Aggregation-rules listing, relative to the endpoint. */
    rulesPath: z.string().min(1, 'backend.rulesPath must not be empty').default('/aggregations/rules'),
    /** Add `{__ignore_usage__=""}` to rate-query selectors. */
    ignoreUsageSelector: z.boolean().default(true),
  })
  .strip()

/** Optional supplementary queries per metric. */
const rateSchema = z
  .object({
    /** Query active series counts and compute impact scores. */
    withSeriesCount: z.boolean().default(false),
    /** Attach the labels of each metric's busiest series. Required by `selection.labelFilter`. */
    withLabels: z.boolean().default(false),
  })
  .strip()

/** Which discovered metrics are skipped before any rate query. */
const filterSchema = z
  .object({
    excludeSuffixes: z
      .array(z.string().min(1, 'filter.excludeSuffixes entries must not be empty'))
      .default([...DEFAULT_EXCLUDE_SUFFIXES]),
    excludePrefixes: z
      .array(z.string().min(1, 'filter.excludePrefixes entries must not be empty'))
      .default([...DEFAULT_EXCLUDE_PREFIXES]),
  })
  .strip()

const labelFilterField = z.string().superRefine((value, ctx) => {
  try {
    parseLabelPattern(value)
  } catch (err) {
    if (!(err instanceof LabelPatternError)) throw err
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: err.message })
  }
})

/** Threshold, label pattern, ordering and truncation applied to the results. */
const selectionSchema = z
  .object({
    /** Only metrics with DPM strictly above this value are reported. */
    minDpm: z.number().min(0, 'selection.minDpm must be >= 0').default(1.0),
    /** `key=value` or `key=~regex`, matched against enriched labels. */
    labelFilter: labelFilterField.optional(),
    /** Keep only the first N results after sorting. */
    topN: z.number().int().positive('selection.topN must be a positive integer').optional(),
    sortBy: z.enum(SORT_KEYS).default('dpm'),
  })
  .strip()

const dispatchSchema = z
  .object({
    /**
     * Concurrent rate queries. Values below 1 are clamped to 1 by
     * {@link parseConfig}.
     */
    threads: z.number().int().default(10),
  })
  .strip()

/** Exporter (service) mode. */
const serviceSchema = z
  .object({
    port: z
      .number()
      .int()
      .min(1, 'service.port must be between 1 and 65535')
      .max(65_535, 'service.port must be between 1 and 65535')
      .default(9966),
    /** Seconds between refresh cycles. @default 86400 (one day) */
    updateIntervalSeconds: z
      .number()
      .int()
      .min(1, 'service.updateIntervalSeconds must be at least 1')
      .default(86_400),
    /** How long shutdown waits for an in-flight cycle before abandoning it. */
    shutdownDrainSeconds: z
      .number()
      .int()
      .min(0, 'service.shutdownDrainSeconds must be >= 0')
      .default(30),
    /** Attempts for the first cycle when it fails with a discovery error. */
    initialCycleAttempts: z
      .number()
      .int()
      .min(1, 'service.initialCycleAttempts must be at least 1')
      .default(5),
    /** Attempts for every later cycle. */
    cycleAttempts: z
      .number()
      .int()
      .min(1, 'service.cycleAttempts must be at least 1')
      .default(3),
    /** Delay before the second cycle attempt; doubles per further attempt. */
    cycleRetryBaseDelayMs: z
      .number()
      .int()
      .min(0, 'service.cycleRetryBaseDelayMs must be >= 0')
      .default(2_000),
    cycleRetryMaxDelayMs: z
      .number()
      .int()
      .min(0, 'service.cycleRetryMaxDelayMs must be >= 0')
      .default(60_000),
  })
  .strip()

export const OUTPUT_FORMATS = ['csv', 'text', 'txt', 'json', 'prom'] as const

export type OutputFormat = (typeof OUTPUT_FORMATS)[number]

/** One-shot report output. */
const outputSchema = z
  .object({
    /** `text` and `txt` are synonyms. */
    format: z.enum(OUTPUT_FORMATS).default('csv'),
    /** Report file. Defaults to `metric_rates.<ext>` in the working directory. */
    path: z.string().min(1, 'output.path must not be empty').optional(),
  })
  .strip()

// ---------------------------------------------------------------------------
// Root schema
// ---------------------------------------------------------------------------

export const dpmConfigSchema = z
  .object({
    backend: backendSchema.default({}),
    rate: rateSchema.default({}),
    filter: filterSchema.default({}),
    selection: selectionSchema.default({}),
    dispatch: dispatchSchema.default({}),
    service: serviceSchema.default({}),
    output: outputSchema.default({}),
  })
  .strip()
  .superRefine((config, ctx) => {
    if (config.selection.labelFilter !== undefined && !config.rate.withLabels) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['selection', 'labelFilter'],
        message: 'selection.labelFilter requires rate.withLabels to be enabled',
      })
    }
    if (config.backend.maxDelayMs < config.backend.baseDelayMs) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['backend', 'maxDelayMs'],
        message: 'backend.maxDelayMs must be >= backend.baseDelayMs',
      })
    }
  })

// ---------------------------------------------------------------------------
// Unknown-key helpers for parseConfig
// ---------------------------------------------------------------------------

/** Known keys of each sub-schema, used to report typos one level deep. */
const SUB_SCHEMA_SHAPES: Record<string, ReadonlySet<string>> = {
  backend: new Set(Object.keys(backendSchema.shape)),
  rate: new Set(Object.keys(rateSchema.shape)),
  filter: new Set(Object.keys(filterSchema.shape)),
  selection: new Set(Object.keys(selectionSchema.shape)),
  dispatch: new Set(Object.keys(dispatchSchema.shape)),
  service: new Set(Object.keys(serviceSchema.shape)),
  output: new Set(Object.keys(outputSchema.shape)),
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

/**
 * Returns unknown key paths in `raw` at the top level and one level deep
 * inside recognised sections (e.g. `"selection.minDPM"`).
 */
function collectUnknownConfigKeys(raw: Record<string, unknown>): readonly string[] {
  const result: string[] = []
  for (const [key, nested] of Object.entries(raw)) {
    const subShape = SUB_SCHEMA_SHAPES[key]
    if (subShape === undefined) {
      result.push(key)
      continue
    }
    if (!isPlainObject(nested)) continue
    for (const subKey of Object.keys(nested)) {
      if (!subShape.has(subKey)) result.push(`${key}.${subKey}`)
    }
  }
  return result
}

/** Options accepted by {@link parseConfig}. */
export interface ParseConfigOptions {
  /**
   * Called with all unknown key paths (e.g. `["unknownTop", "backend.typo"]`)
   * when the raw input contains keys the schema does not recognise.
   * @example
   *   parseConfig(raw, {
   *     onUnknownKeys: (keys) => logger.warn(`config: unknown keys ${keys.join(', ')}`)
   *   })
   */
  onUnknownKeys?: (keys: readonly string[]) => void
  /** Receives warnings about values that were accepted but adjusted or look risky. */
  onWarning?: (message: string) => void
}

// ---------------------------------------------------------------------------
// Exported types
// ---------------------------------------------------------------------------

/** Utility: recursively marks all fields and nested arrays readonly. */
type DeepReadonly<T> =
  T extends (infer U)[]
    ? ReadonlyArray<DeepReadonly<U>>
    : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T

/** Fully-resolved configuration with all defaults applied. Immutable. */
export type DpmConfig = DeepReadonly<z.infer<typeof dpmConfigSchema>>

// ---------------------------------------------------------------------------
// ConfigValidationError
// ---------------------------------------------------------------------------

/**
 * Thrown by `parseConfig` when the input contains invalid values.
 *
 * The message lists every failing field with its path; the original
 * `ZodError` is kept as `cause`.
 */
export class ConfigValidationError extends Error {
  /** Structured list of validation failures, one per invalid field. */
  readonly issues: readonly z.ZodIssue[]

  constructor(zodError: z.ZodError) {
    super(`dpm-finder configuration is invalid:\n${formatZodErrors(zodError.errors)}`, { cause: zodError })
    this.name = 'ConfigValidationError'
    this.issues = zodError.errors
  }
}

// ---------------------------------------------------------------------------
// Parse function
// ---------------------------------------------------------------------------

/** Below this many seconds between cycles the backend sees near-constant query load. */
const SHORT_UPDATE_INTERVAL_SECONDS = 30

/**
 * Parses and validates raw (unknown) config input, applying all defaults.
 *
 * - Unknown keys are stripped and reported through `options.onUnknownKeys`.
 * - `dispatch.threads` below 1 is clamped to 1 with a warning.
 * - An update interval under 30 seconds is accepted with a warning.
 *
 * @throws {ConfigValidationError} if the input contains invalid values.
 */
export function parseConfig(raw: unknown, options: ParseConfigOptions = {}): DpmConfig {
  const result = dpmConfigSchema.safeParse(raw ?? {})
  if (!result.success) {
    throw new ConfigValidationError(result.error)
  }

  if (isPlainObject(raw) && options.onUnknownKeys !== undefined) {
    const unknownKeys = collectUnknownConfigKeys(raw)
    if (unknownKeys.length > 0) options.onUnknownKeys(unknownKeys)
  }

  const warn = options.onWarning ?? (() => {})
  let validated = result.data

  if (validated.dispatch.threads < 1) {
    warn(`config: thread count ${validated.dispatch.threads} is less than 1, using 1`)
    validated = { ...validated, dispatch: { ...validated.dispatch, threads: 1 } }
  }

  if (validated.service.updateIntervalSeconds < SHORT_UPDATE_INTERVAL_SECONDS) {
    warn(
      `config: update interval ${validated.service.updateIntervalSeconds}s is very short, ` +
      `consider using ${SHORT_UPDATE_INTERVAL_SECONDS}s or more`,
    )
  }

  return validated
}
