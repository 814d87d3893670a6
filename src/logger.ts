/**
 * Console logging for dpm-finder.
 *
 * Every line carries the `[dpm]` prefix; callers add their component tag
 * (`dispatcher: ...`) to the message. Levels only gate output, they never
 * change the destination: debug/info go to stdout, warn/error to stderr.
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

export interface Logger {
  debug(message: string, ...details: unknown[]): void
  info(message: string, ...details: unknown[]): void
  warn(message: string, ...details: unknown[]): void
  error(message: string, ...details: unknown[]): void
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

const PREFIX = '[dpm]'

export function createConsoleLogger(level: LogLevel = 'info'): Logger {
  const threshold = LEVEL_RANK[level]
  const enabled = (l: Exclude<LogLevel, 'silent'>): boolean => LEVEL_RANK[l] >= threshold

  return {
    debug(message, ...details) {
      if (enabled('debug')) console.debug(`${PREFIX} ${message}`, ...details)
    },
    info(message, ...details) {
      if (enabled('info')) console.log(`${PREFIX} ${message}`, ...details)
    },
    warn(message, ...details) {
      if (enabled('warn')) console.warn(`${PREFIX} ${message}`, ...details)
    },
    error(message, ...details) {
      if (enabled('error')) console.error(`${PREFIX} ${message}`, ...details)
    },
  }
}

/** Discards everything. Used by tests and by library callers that bring no logger. */
export const silentLogger: Logger = createConsoleLogger('silent')

/** Maps the CLI's quiet/verbose switches onto a level; quiet wins. */
export function resolveLogLevel(flags: { readonly quiet?: boolean; readonly verbose?: boolean }): LogLevel {
  if (flags.quiet) return 'error'
  if (flags.verbose) return 'debug'
  return 'info'
}
