/**
 * Exporter HTTP surface and process wiring.
 *
 * Routes only read the coordinator's snapshot; a scrape never starts a cycle.
 *   GET /metrics — exposition format of the current snapshot
 *   GET /health  — liveness, always 200
 *   GET /ready   — 200 once a snapshot exists, 503 before
 */

import { serve } from '@hono/node-server'
import { Hono } from 'hono'
import type { BackendClient } from '../backend/client.js'
import type { DpmConfig } from '../config.js'
import { runCycle } from '../cycle/run-cycle.js'
import { silentLogger, type Logger } from '../logger.js'
import {
  EXPORTER_VERSION,
  EXPOSITION_CONTENT_TYPE,
  renderExposition,
  type ExporterInfo,
} from './exposition.js'
import { RefreshCoordinator, type StopOutcome } from './refresh-coordinator.js'

/** The part of the coordinator the routes need. */
export type SnapshotSource = Pick<RefreshCoordinator, 'currentReport' | 'stats'>

export function createServiceApp(source: SnapshotSource, info: ExporterInfo): Hono {
  const app = new Hono()

  app.get('/metrics', async (c) => {
    const body = await renderExposition(source.currentReport(), info)
    return c.body(body, 200, { 'Content-Type': EXPOSITION_CONTENT_TYPE })
  })

  app.get('/health', (c) => {
    const view = source.currentReport()
    return c.json({ status: 'ok', state: view.state, cycles: source.stats })
  })

  app.get('/ready', (c) => {
    const view = source.currentReport()
    if (!view.ready) {
      return c.json({ ready: false, state: view.state }, 503)
    }
    return c.json({
      ready: true,
      state: view.state,
      lastUpdate: view.report.finishedAt,
      metrics: view.report.counts.selected,
    })
  })

  return app
}

export function exporterInfoFromConfig(config: DpmConfig): ExporterInfo {
  return {
    version: EXPORTER_VERSION,
    minDpmThreshold: config.selection.minDpm,
    updateIntervalSeconds: config.service.updateIntervalSeconds,
    threadCount: config.dispatch.threads,
  }
}

export interface ServiceParams {
  readonly client: BackendClient
  readonly config: DpmConfig
  readonly logger?: Logger
}

export interface ServiceHandle {
  readonly coordinator: RefreshCoordinator
  /** Stops refreshing (bounded drain) and closes the listener. */
  stop(): Promise<StopOutcome>
}

/**
 * Starts the HTTP listener first, then the refresh loop, so probes answer
 * while the first cycle is still running.
 */
export function startService(params: ServiceParams): ServiceHandle {
  const { client, config } = params
  const logger = params.logger ?? silentLogger

  const coordinator = new RefreshCoordinator({
    runCycle: (signal) => runCycle({ client, config, logger, signal }),
    intervalMs: config.service.updateIntervalSeconds * 1000,
    retry: {
      initialAttempts: config.service.initialCycleAttempts,
      attempts: config.service.cycleAttempts,
      baseDelayMs: config.service.cycleRetryBaseDelayMs,
      maxDelayMs: config.service.cycleRetryMaxDelayMs,
    },
    logger,
  })
  const app = createServiceApp(coordinator, exporterInfoFromConfig(config))

  const { port } = config.service
  const server = serve({ fetch: app.fetch, port }, () => {
    logger.info(`service: exporter listening on http://0.0.0.0:${port}/metrics`)
  })

  coordinator.start()

  let stopping: Promise<StopOutcome> | null = null
  const stop = (): Promise<StopOutcome> => {
    if (stopping !== null) return stopping
    stopping = (async () => {
      const outcome = await coordinator.stop(config.service.shutdownDrainSeconds * 1000)
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()))
      })
      logger.info(`service: stopped (${outcome})`)
      return outcome
    })()
    return stopping
  }

  return { coordinator, stop }
}

/**
 * Stops `handle` on SIGINT/SIGTERM and resolves once it has stopped.
 */
export function stopOnSignals(handle: ServiceHandle, logger: Logger = silentLogger): Promise<StopOutcome> {
  return new Promise((resolve, reject) => {
    const onSignal = (signal: NodeJS.Signals): void => {
      logger.info(`service: received ${signal}, shutting down`)
      process.off('SIGINT', onSignal)
      process.off('SIGTERM', onSignal)
      handle.stop().then(resolve, reject)
    }
    process.on('SIGINT', onSignal)
    process.on('SIGTERM', onSignal)
  })
}
