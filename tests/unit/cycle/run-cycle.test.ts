import { describe, it, expect, vi, afterEach } from 'vitest'

vi.mock('../../../src/backend/backoff.js', () => ({
  computeBackoffMs: vi.fn().mockReturnValue(0),
  sleep: vi.fn().mockResolvedValue(undefined),
}))

import { createBackendClient, type BackendClient } from '../../../src/backend/client.js'
import { CycleError, RequestAbortedError } from '../../../src/backend/errors.js'
import { parseConfig } from '../../../src/config.js'
import { computePerformance, runCycle, summarizeFailures } from '../../../src/cycle/run-cycle.js'
import { DispatchAbortedError } from '../../../src/dispatch/dispatcher.js'
import { createFakeBackend, type FakeBackendData } from '../../helpers/fake-backend.js'
import { recordingLogger } from '../../helpers/recording-logger.js'

function clientFor(data: FakeBackendData, maxAttempts = 3): BackendClient {
  const backend = createFakeBackend(data)
  vi.stubGlobal('fetch', vi.fn(backend.fetch))
  return createBackendClient({
    endpoint: 'https://prometheus.example.test',
    credentials: { username: 'test-user', apiKey: 'test-secret' },
    apiPrefix: '/api/prom',
    rulesPath: '/aggregations/rules',
    timeoutMs: 1_000,
    retry: { maxAttempts, baseDelayMs: 0, maxDelayMs: 0 },
  })
}

/** Clock that advances one second per reading. */
function steppingClock(): () => number {
  let t = 0
  return () => (t += 1_000)
}

afterEach(() => {
  vi.unstubAllGlobals()
})

describe('runCycle', () => {
  it('discovers, filters, rates and selects metrics', async () => {
    const client = clientFor({
      metrics: {
        http_requests_total: { points: 300 },
        http_requests_count: { points: 100 },
        grafana_build_info: { points: 50 },
        custom_metric: { points: 10 },
        low_metric: { points: 4 },
        idle_metric: {},
        slow_metric: { points: 100, fail: 'timeout' },
        aggregated_metric: { points: 500 },
      },
      rules: ['aggregated_metric'],
    })
    const config = parseConfig({ backend: { maxAttempts: 3 }, dispatch: { threads: 3 } })

    const report = await runCycle({ client, config, now: steppingClock() })

    expect(report.results).toEqual([
      { name: 'http_requests_total', dpm: 60 },
      { name: 'custom_metric', dpm: 2 },
    ])
    expect(report.failures).toEqual([
      expect.objectContaining({ name: 'slow_metric', kind: 'timeout', attempts: 3 }),
    ])
    expect(report.counts).toEqual({
      discovered: 8,
      filteredOut: 3,
      processed: 5,
      succeeded: 4,
      failed: 1,
      selected: 2,
    })
    expect(report.startedAt).toBe('1970-01-01T00:00:01.000Z')
    expect(report.finishedAt).toBe('1970-01-01T00:00:02.000Z')
    expect(report.performance.totalRuntimeSeconds).toBe(1)
    expect(report.performance.metricsPerSecond).toBe(5)
    expect(report.performance.effectiveWorkers).toBe(3)
  })

  it('returns a frozen report', async () => {
    const client = clientFor({ metrics: { up: { points: 30 } } })
    const report = await runCycle({ client, config: parseConfig({}) })

    expect(Object.isFrozen(report)).toBe(true)
    expect(Object.isFrozen(report.results)).toBe(true)
    expect(Object.isFrozen(report.results[0])).toBe(true)
    expect(Object.isFrozen(report.counts)).toBe(true)
  })

  it('adds series counts and impact scores when enabled', async () => {
    const client = clientFor({ metrics: { up: { points: 300, series: 3 } } })
    const config = parseConfig({ rate: { withSeriesCount: true } })

    const report = await runCycle({ client, config })
    expect(report.results).toEqual([{ name: 'up', dpm: 60, activeSeries: 3, impactScore: 180 }])
  })

  it('applies the label filter to enriched results', async () => {
    const client = clientFor({
      metrics: {
        api_requests_total: { points: 100, labels: { job: 'api' } },
        db_queries_total: { points: 200, labels: { job: 'db' } },
      },
    })
    const config = parseConfig({ rate: { withLabels: true }, selection: { labelFilter: 'job=api' } })

    const report = await runCycle({ client, config })
    expect(report.results).toEqual([{ name: 'api_requests_total', dpm: 20, labels: { job: 'api' } }])
  })

  it('applies topN and name ordering', async () => {
    const client = clientFor({
      metrics: { c_total: { points: 50 }, a_total: { points: 100 }, b_total: { points: 150 } },
    })
    const config = parseConfig({ selection: { sortBy: 'name', topN: 2 } })

    const report = await runCycle({ client, config })
    expect(report.results.map((r) => r.name)).toEqual(['a_total', 'b_total'])
    expect(report.counts.selected).toBe(2)
  })

  it('raises CycleError when discovery fails', async () => {
    const client = clientFor({ metrics: { up: { points: 30 } }, listingStatus: 500 }, 2)

    const run = runCycle({ client, config: parseConfig({}) })
    await expect(run).rejects.toBeInstanceOf(CycleError)
    await expect(run).rejects.toThrow(
      'metric discovery failed: metric name listing failed after 2 attempts: ' +
        'metric name listing error (500): listing unavailable',
    )
  })

  it('raises CycleError when the aggregation rule listing fails', async () => {
    const backend = createFakeBackend({ metrics: { up: { points: 30 } }, rulesStatus: 503 })
    vi.stubGlobal('fetch', vi.fn(backend.fetch))
    const client = createBackendClient({
      endpoint: 'https://prometheus.example.test',
      apiPrefix: '/api/prom',
      rulesPath: '/aggregations/rules',
      timeoutMs: 1_000,
      retry: { maxAttempts: 2, baseDelayMs: 0, maxDelayMs: 0 },
    })

    const run = runCycle({ client, config: parseConfig({}) })
    await expect(run).rejects.toBeInstanceOf(CycleError)
    await expect(run).rejects.toThrow(
      'metric discovery failed: aggregation rule listing failed after 2 attempts: ' +
        'aggregation rule listing error (503): rules unavailable',
    )
    expect(backend.queries).toEqual([])
  })

  it('drops metrics whose labels could not be looked up from a label-filtered report', async () => {
    const client = clientFor({
      metrics: {
        prod_metric: { points: 100, labels: { env: 'prod' } },
        unknown_metric: { points: 250, labelsStatus: 503 },
      },
    })
    const config = parseConfig({ rate: { withLabels: true }, selection: { labelFilter: 'env=prod' } })

    const report = await runCycle({ client, config })
    expect(report.results).toEqual([{ name: 'prod_metric', dpm: 20, labels: { env: 'prod' } }])
    expect(report.counts.succeeded).toBe(2)
  })

  it('sends no request when the signal is already aborted', async () => {
    const client = clientFor({ metrics: { up: { points: 30 }, node_load1: { points: 60 } } })

    await expect(
      runCycle({ client, config: parseConfig({}), signal: AbortSignal.abort() }),
    ).rejects.toBeInstanceOf(RequestAbortedError)
    expect(fetch).not.toHaveBeenCalled()
  })

  it('stops retrying a metric once the signal aborts', async () => {
    const backend = createFakeBackend({ metrics: { up: { points: 30, fail: 503 } } })
    const abort = new AbortController()
    vi.stubGlobal(
      'fetch',
      vi.fn(async (input: string | URL | Request) => {
        const response = await backend.fetch(input)
        if (backend.dpmAttempts.get('up') === 2) abort.abort()
        return response
      }),
    )
    const client = createBackendClient({
      endpoint: 'https://prometheus.example.test',
      apiPrefix: '/api/prom',
      rulesPath: '/aggregations/rules',
      timeoutMs: 1_000,
      retry: { maxAttempts: 10, baseDelayMs: 0, maxDelayMs: 0 },
    })

    await expect(
      runCycle({ client, config: parseConfig({}), signal: abort.signal }),
    ).rejects.toBeInstanceOf(DispatchAbortedError)
    expect(backend.dpmAttempts.get('up')).toBe(2)
  })

  it('logs dispatch progress at debug level', async () => {
    const client = clientFor({ metrics: { a_total: { points: 10 }, b_total: { points: 20 } } })
    const logger = recordingLogger()

    await runCycle({ client, config: parseConfig({ dispatch: { threads: 1 } }), logger })
    expect(logger.debug).toHaveBeenCalledWith('cycle: processed 1/2 metrics')
    expect(logger.debug).toHaveBeenCalledWith('cycle: processed 2/2 metrics')
  })

  it('sends the usage-ignoring selector by default', async () => {
    const backend = createFakeBackend({ metrics: { up: { points: 30 } } })
    vi.stubGlobal('fetch', vi.fn(backend.fetch))
    const client = createBackendClient({
      endpoint: 'https://prometheus.example.test',
      apiPrefix: '/api/prom',
      rulesPath: '/aggregations/rules',
      timeoutMs: 1_000,
      retry: { maxAttempts: 1, baseDelayMs: 0, maxDelayMs: 0 },
    })

    await runCycle({ client, config: parseConfig({}) })
    expect(backend.queries).toEqual(['count_over_time(up{__ignore_usage__=""}[5m]) / 5'])
  })
})

describe('summarizeFailures', () => {
  it('counts failures per kind', () => {
    expect(
      summarizeFailures([
        { name: 'a', kind: 'timeout', attempts: 3, message: '' },
        { name: 'b', kind: 'timeout', attempts: 3, message: '' },
        { name: 'c', kind: 'http', attempts: 1, message: '' },
      ]),
    ).toEqual({ timeout: 2, http: 1 })
  })
})

describe('computePerformance', () => {
  it('derives runtime, average and rate', () => {
    expect(computePerformance(2_000, [100, 300], 4, 2)).toEqual({
      totalRuntimeSeconds: 2,
      avgMetricSeconds: 0.2,
      metricsPerSecond: 2,
      effectiveWorkers: 2,
    })
  })

  it('reports a zero rate for a zero runtime', () => {
    expect(computePerformance(0, [], 0, 0)).toEqual({
      totalRuntimeSeconds: 0,
      avgMetricSeconds: 0,
      metricsPerSecond: 0,
      effectiveWorkers: 0,
    })
  })
})
