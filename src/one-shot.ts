/**
 * One-shot mode: run a single cycle and write the report.
 */

import type { BackendClient } from './backend/client.js'
import type { DpmConfig } from './config.js'
import { runCycle } from './cycle/run-cycle.js'
import { silentLogger, type Logger } from './logger.js'
import { defaultReportPath, writeReport } from './output/report-writer.js'
import type { CycleReport } from './types.js'

export interface RunOnceParams {
  readonly client: BackendClient
  readonly config: DpmConfig
  readonly logger?: Logger
  /** Receives the rendered report; omit to skip printing. */
  readonly print?: (text: string) => void
}

export interface RunOnceResult {
  readonly report: CycleReport
  readonly path: string
}

/**
 * @throws {CycleError} when discovery fails; nothing is written then.
 */
export async function runOnce(params: RunOnceParams): Promise<RunOnceResult> {
  const { client, config } = params
  const logger = params.logger ?? silentLogger

  const report = await runCycle({ client, config, logger })

  const { format } = config.output
  const path = config.output.path ?? defaultReportPath(format)
  const content = await writeReport(report, format, path)
  logger.info(`report: wrote ${report.counts.selected} metrics to ${path}`)

  params.print?.(content)
  return { report, path }
}
