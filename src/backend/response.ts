/**
 * Zod schemas for the three Prometheus HTTP API response shapes the client
 * consumes, and parsers that turn a raw body into typed data or a
 * {@link MalformedResponseError}.
 */

import { z } from 'zod'
import { MalformedResponseError } from './errors.js'
import { formatZodErrors } from '../error-utils.js'
import type { MetricName } from '../types.js'

/** One element of an instant-query result. A scalar result has empty labels. */
export interface QuerySample {
  readonly labels: Readonly<Record<string, string>>
  /** Parsed sample value. May be NaN or ±Infinity; callers decide what that means. */
  readonly value: number
}

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const errorEnvelopeSchema = z.object({
  status: z.literal('error'),
  errorType: z.string().optional(),
  error: z.string().optional(),
})

const labelValuesSchema = z.object({
  status: z.literal('success'),
  data: z.array(z.string()),
})

/** `[unixSeconds, "value"]` as used by the Prometheus API. */
const samplePairSchema = z.tuple([z.number(), z.string()])

const vectorDataSchema = z.object({
  resultType: z.literal('vector'),
  result: z.array(
    z.object({
      metric: z.record(z.string()),
      value: samplePairSchema,
    }),
  ),
})

const scalarDataSchema = z.object({
  resultType: z.literal('scalar'),
  result: samplePairSchema,
})

const querySchema = z.object({
  status: z.literal('success'),
  data: z.discriminatedUnion('resultType', [vectorDataSchema, scalarDataSchema]),
})

/**
 * Aggregation rules are a bare array of rule objects. Only the `metric` field
 * is read; entries without one are ignored.
 */
const ruleEntrySchema = z.object({ metric: z.string() }).passthrough()
const rulesSchema = z.array(z.unknown())

// ---------------------------------------------------------------------------
// Parsers
// ---------------------------------------------------------------------------

function decodeJson(body: string, label: string): unknown {
  try {
    return JSON.parse(body) as unknown
  } catch {
    throw new MalformedResponseError(`${label} returned non-JSON body: ${body.slice(0, 200)}`)
  }
}

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: string, label: string): T {
  const json = decodeJson(body, label)

  const apiError = errorEnvelopeSchema.safeParse(json)
  if (apiError.success) {
    const { errorType = 'unknown', error = 'no error message' } = apiError.data
    throw new MalformedResponseError(`${label} returned an error (${errorType}): ${error}`)
  }

  const parsed = schema.safeParse(json)
  if (!parsed.success) {
    throw new MalformedResponseError(
      `${label} returned an unexpected response shape:\n${formatZodErrors(parsed.error.errors)}`,
    )
  }
  return parsed.data
}

export function parseLabelValuesResponse(body: string): readonly MetricName[] {
  return parseWith(labelValuesSchema, body, 'label values').data
}

export function parseInstantQueryResponse(body: string): readonly QuerySample[] {
  const { data } = parseWith(querySchema, body, 'instant query')
  if (data.resultType === 'scalar') {
    return [{ labels: {}, value: Number(data.result[1]) }]
  }
  return data.result.map((entry) => ({ labels: entry.metric, value: Number(entry.value[1]) }))
}

export function parseRulesResponse(body: string): ReadonlySet<MetricName> {
  const rules = parseWith(rulesSchema, body, 'aggregation rules')
  const names = new Set<MetricName>()
  for (const rule of rules) {
    const entry = ruleEntrySchema.safeParse(rule)
    if (entry.success) names.add(entry.data.metric)
  }
  return names
}
