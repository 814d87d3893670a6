import { vi, describe, it, expect, afterEach } from 'vitest'

vi.mock('../../src/backend/backoff.js', () => ({
  computeBackoffMs: vi.fn().mockReturnValue(0),
  sleep: vi.fn().mockResolvedValue(undefined),
}))

import { createClientFromConfig } from '../../src/cli.js'
import { parseConfig } from '../../src/config.js'
import { runCycle } from '../../src/cycle/run-cycle.js'
import { silentLogger } from '../../src/logger.js'
import { RefreshCoordinator } from '../../src/service/refresh-coordinator.js'
import { createServiceApp, exporterInfoFromConfig } from '../../src/service/server.js'
import { createFakeBackend, type FakeBackendData } from '../helpers/fake-backend.js'

const config = parseConfig({ backend: { maxAttempts: 2 }, rate: { withSeriesCount: true } })
const env = { endpoint: 'https://prometheus.example.test' }

function serveBackend(data: FakeBackendData): void {
  vi.stubGlobal('fetch', vi.fn(createFakeBackend(data).fetch))
}

function setup() {
  const client = createClientFromConfig(env, config, silentLogger)
  const coordinator = new RefreshCoordinator({
    runCycle: (signal) => runCycle({ client, config, signal }),
    intervalMs: 60_000,
  })
  const app = createServiceApp(coordinator, exporterInfoFromConfig(config))
  return { coordinator, app }
}

async function metricLines(app: ReturnType<typeof setup>['app']): Promise<string[]> {
  const res = await app.request('/metrics')
  return (await res.text()).split('\n')
}

afterEach(() => {
  vi.unstubAllGlobals()
})

describe('exporter', () => {
  it('is not ready before the first cycle completes', async () => {
    serveBackend({ metrics: { up: { points: 300 } } })
    const { app } = setup()

    const res = await app.request('/ready')
    expect(res.status).toBe(503)
    expect(await metricLines(app)).toContain('dpm_finder_ready 0')
  })

  it('publishes a completed cycle and refreshes it', async () => {
    serveBackend({
      metrics: {
        http_requests_total: { points: 300, series: 2 },
        'app:requests_total': { points: 50 },
        http_requests_bucket: { points: 3000 },
      },
    })
    const { coordinator, app } = setup()

    coordinator.tick()
    await coordinator.whenIdle()

    let lines = await metricLines(app)
    expect(lines).toContain('dpm_finder_ready 1')
    expect(lines).toContain('metric_dpm_rate{metric_name="http_requests_total"} 60')
    expect(lines).toContain('metric_dpm_rate{metric_name="app_requests_total"} 10')
    expect(lines).toContain('metric_active_series{metric_name="http_requests_total"} 2')
    expect(lines).toContain('metric_impact_score{metric_name="http_requests_total"} 120')
    expect(lines).toContain('dpm_finder_metrics_processed_total 2')
    expect(lines.some((line) => line.includes('http_requests_bucket'))).toBe(false)

    serveBackend({ metrics: { http_requests_total: { points: 600, series: 2 } } })
    coordinator.tick()
    await coordinator.whenIdle()

    lines = await metricLines(app)
    expect(lines).toContain('metric_dpm_rate{metric_name="http_requests_total"} 120')
    expect(lines.some((line) => line.startsWith('metric_dpm_rate{metric_name="app_requests_total"}'))).toBe(false)
    expect((await app.request('/ready')).status).toBe(200)
  })

  it('keeps serving the previous snapshot when discovery fails', async () => {
    serveBackend({ metrics: { up: { points: 300 } } })
    const { coordinator, app } = setup()
    coordinator.tick()
    await coordinator.whenIdle()

    serveBackend({ metrics: {}, listingStatus: 502 })
    coordinator.tick()
    await coordinator.whenIdle()

    expect(await metricLines(app)).toContain('metric_dpm_rate{metric_name="up"} 60')
    const health = await app.request('/health')
    expect(await health.json()).toMatchObject({ status: 'ok', state: 'ready', cycles: { completed: 1, failed: 1 } })
  })

  it('keeps serving the previous snapshot when the aggregation rule listing fails', async () => {
    serveBackend({ metrics: { up: { points: 300 } } })
    const { coordinator, app } = setup()
    coordinator.tick()
    await coordinator.whenIdle()

    serveBackend({ metrics: { up: { points: 900 } }, rulesStatus: 503 })
    coordinator.tick()
    await coordinator.whenIdle()

    expect(await metricLines(app)).toContain('metric_dpm_rate{metric_name="up"} 60')
    expect(coordinator.stats).toEqual({
      completed: 1,
      failed: 1,
      skippedTicks: 0,
      lastError:
        'metric discovery failed: aggregation rule listing failed after 2 attempts: ' +
        'aggregation rule listing error (503): rules unavailable',
    })
  })
})
