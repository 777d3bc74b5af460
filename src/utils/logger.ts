/**
 * pino loggers for sector-analyst modules.
 *
 * Logs go to stderr: stdout carries command output and the NDJSON event
 * stream. Loggers created without an explicit level follow `setLogLevel`,
 * which the CLI calls with `global.log_level` once the config has loaded.
 */

import pino from 'pino'
import type { Logger } from 'pino'
import { PINO_REDACT_PATHS } from './masking.js'

const STDERR = 2

export interface LoggerOptions {
  level?: string
  pretty?: boolean
}

const tracked = new Set<Logger>()
let configuredLevel: string | undefined

function defaultLevel(): string {
  if (configuredLevel !== undefined) return configuredLevel
  const envLevel = process.env.LOG_LEVEL
  if (envLevel) return envLevel
  switch (process.env.NODE_ENV) {
    case 'production':
      return 'info'
    case 'development':
    case 'test':
      return 'debug'
    default:
      // Plain CLI use
      return 'warn'
  }
}

function isPrettyMode(): boolean {
  if (process.env.LOG_PRETTY !== undefined) return process.env.LOG_PRETTY === 'true'
  return process.env.NODE_ENV === 'development' || process.env.NODE_ENV === 'test'
}

/**
 * Create a named module logger.
 * @param name - module identifier, e.g. `scheduler` or `data:csv`
 */
export function createLogger(name: string, options: LoggerOptions = {}): Logger {
  const settings: pino.LoggerOptions = {
    name,
    level: options.level ?? defaultLevel(),
    redact: PINO_REDACT_PATHS,
    formatters: {
      level(label) {
        return { level: label }
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: { pid: process.pid },
  }

  const logger =
    (options.pretty ?? isPrettyMode())
      ? pino({
          ...settings,
          transport: {
            target: 'pino-pretty',
            options: { colorize: true, translateTime: 'SYS:standard', ignore: 'pid,hostname', destination: STDERR },
          },
        })
      : pino(settings, pino.destination(STDERR))

  if (options.level === undefined) tracked.add(logger)
  return logger
}

/** Apply a level to every logger that was not given one explicitly, now and later */
export function setLogLevel(level: string): void {
  configuredLevel = level
  for (const logger of tracked) logger.level = level
}

export const logger = createLogger('sector-analyst')

/** Child logger bound to run or role context */
export function childLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
  return parent.child(bindings)
}
