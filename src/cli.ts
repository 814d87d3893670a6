/**
 * `dpm-finder` command line.
 *
 * Config layers, lowest precedence first: schema defaults, the YAML file
 * named by `--config`, then flags. Flags without a value on the command line
 * leave the lower layers untouched.
 */

import { Command, CommanderError, InvalidArgumentError } from 'commander'
import { createBackendClient, type BackendClient } from './backend/client.js'
import { CycleError } from './backend/errors.js'
import { ConfigValidationError, OUTPUT_FORMATS, parseConfig, type DpmConfig } from './config.js'
import { ConfigFileError, loadConfigFile, mergeConfigLayers, type RawConfig } from './config-file.js'
import { EnvValidationError, loadBackendEnv, type BackendEnv } from './env.js'
import { createConsoleLogger, resolveLogLevel, type Logger } from './logger.js'
import { runOnce } from './one-shot.js'
import { SORT_KEYS } from './select/selector.js'
import { EXPORTER_VERSION } from './service/exposition.js'
import { startService, stopOnSignals } from './service/server.js'

/** Parsed flags. Every field is absent unless given on the command line. */
export type CliOptions = {
  format?: string
  minDpm?: number
  quiet?: boolean
  verbose?: boolean
  threads?: number
  exporter?: boolean
  port?: number
  updateInterval?: number
  timeout?: number
  maxAttempts?: number
  topN?: number
  sortBy?: string
  labelFilter?: string
  seriesCount?: boolean
  labels?: boolean
  output?: string
  config?: string
}

function parseNumber(value: string): number {
  const parsed = Number(value)
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError(`"${value}" is not a number.`)
  }
  return parsed
}

export function buildProgram(): Command {
  return new Command('dpm-finder')
    .description('Find metrics with high data points per minute (DPM) on a Prometheus-compatible backend.')
    .version(EXPORTER_VERSION)
    .option('-f, --format <format>', `report format: ${OUTPUT_FORMATS.join('|')} (default: csv)`)
    .option('-m, --min-dpm <dpm>', 'only report metrics with DPM above this value (default: 1.0)', parseNumber)
    .option('-q, --quiet', 'only log errors and do not print the report')
    .option('-v, --verbose', 'log debug output')
    .option('-t, --threads <n>', 'concurrent rate queries (default: 10)', parseNumber)
    .option('-e, --exporter', 'run as a Prometheus exporter instead of writing a report')
    .option('-p, --port <port>', 'exporter listen port (default: 9966)', parseNumber)
    .option('-u, --update-interval <seconds>', 'seconds between exporter refreshes (default: 86400)', parseNumber)
    .option('--timeout <seconds>', 'per-request timeout in seconds (default: 60)', parseNumber)
    .option('--max-attempts <n>', 'attempts per backend request, first one included (default: 10)', parseNumber)
    .option('--top-n <n>', 'only report the first N metrics after sorting', parseNumber)
    .option('--sort-by <key>', `sort order: ${SORT_KEYS.join('|')} (default: dpm)`)
    .option('--label-filter <pattern>', 'key=value or key=~regex matched against metric labels (needs --labels)')
    .option('--series-count', 'query active series counts and impact scores')
    .option('--labels', 'attach the labels of each metric\'s busiest series')
    .option('-o, --output <path>', 'report file (default: metric_rates.<ext>)')
    .option('-c, --config <path>', 'YAML config file')
}

/** Maps flags onto the config tree. Absent flags produce no keys. */
export function cliOverrides(opts: CliOptions): RawConfig {
  return {
    backend: { timeoutSeconds: opts.timeout, maxAttempts: opts.maxAttempts },
    rate: { withSeriesCount: opts.seriesCount, withLabels: opts.labels },
    selection: { minDpm: opts.minDpm, labelFilter: opts.labelFilter, topN: opts.topN, sortBy: opts.sortBy },
    dispatch: { threads: opts.threads },
    service: { port: opts.port, updateIntervalSeconds: opts.updateInterval },
    output: { format: opts.format, path: opts.output },
  }
}

export function createClientFromConfig(env: BackendEnv, config: DpmConfig, logger: Logger): BackendClient {
  const { backend } = config
  return createBackendClient({
    endpoint: env.endpoint,
    ...(env.credentials !== undefined ? { credentials: env.credentials } : {}),
    apiPrefix: backend.apiPrefix,
    rulesPath: backend.rulesPath,
    timeoutMs: backend.timeoutSeconds * 1000,
    retry: {
      maxAttempts: backend.maxAttempts,
      baseDelayMs: backend.baseDelayMs,
      maxDelayMs: backend.maxDelayMs,
    },
    logger,
  })
}

export interface CliDeps {
  readonly logger?: Logger
  readonly loadEnv?: () => BackendEnv
  /** Where the rendered report is printed. */
  readonly stdout?: (text: string) => void
}

/**
 * Runs the command line and resolves with the process exit code.
 *
 * One-shot mode resolves 0 once the report is written. Exporter mode
 * resolves 0 after SIGINT/SIGTERM has stopped the service. Invalid flags,
 * configuration or environment, and failed discovery, resolve 1.
 */
export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const program = buildProgram().exitOverride()
  try {
    await program.parseAsync([...argv], { from: 'user' })
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode
    throw err
  }

  const opts = program.opts<CliOptions>()
  const logger = deps.logger ?? createConsoleLogger(resolveLogLevel(opts))

  try {
    const fileLayer = opts.config !== undefined ? await loadConfigFile(opts.config) : {}
    const config = parseConfig(mergeConfigLayers(fileLayer, cliOverrides(opts)), {
      onUnknownKeys: (keys) => logger.warn(`config: ignoring unknown keys ${keys.join(', ')}`),
      onWarning: (message) => logger.warn(message),
    })
    const env = (deps.loadEnv ?? loadBackendEnv)()
    const client = createClientFromConfig(env, config, logger)

    if (opts.exporter) {
      const handle = startService({ client, config, logger })
      await stopOnSignals(handle, logger)
      return 0
    }

    const print = deps.stdout ?? ((text: string) => {
      process.stdout.write(text)
    })
    await runOnce({ client, config, logger, ...(opts.quiet ? {} : { print }) })
    return 0
  } catch (err) {
    if (
      err instanceof ConfigFileError ||
      err instanceof ConfigValidationError ||
      err instanceof EnvValidationError
    ) {
      logger.error(err.message)
      return 1
    }
    if (err instanceof CycleError) {
      logger.error(`cycle failed: ${err.message}`)
      return 1
    }
    throw err
  }
}
