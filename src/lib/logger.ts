/**
 * Structured logger utility.
 *
 * - `debug()`: Only logs in development or when `HEATMAP_LOG_LEVEL=debug`
 * - `info()`: Logs unless the level is `warn` or `error`
 * - `warn()`: Logs recoverable issues (skipped records, unknown categories)
 * - `error()`: Always logs errors
 *
 * Usage:
 * ```ts
 * import { logger } from '@/lib/logger'
 * logger.debug('[aggregate]', 'Shard finalized', { categories })
 *
 * const log = createLogger('score')
 * log.warn('Unknown category', { category })
 * ```
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER
}

/** Resolved on every call so tests and long-running processes can change it. */
function currentLevel(): LogLevel {
  const configured = (process.env.HEATMAP_LOG_LEVEL || '').toLowerCase()
  if (isLogLevel(configured)) return configured
  return process.env.NODE_ENV === 'development' ? 'debug' : 'info'
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel()]
}

export interface Logger {
  debug: (...args: unknown[]) => void
  info: (...args: unknown[]) => void
  warn: (...args: unknown[]) => void
  error: (...args: unknown[]) => void
}

export const logger: Logger = {
  /** Debug logs - verbose tracing, silenced outside development. */
  debug: (...args: unknown[]) => {
    if (enabled('debug')) console.log(...args)
  },

  /** Info logs - important operational messages (runs finished, sets loaded). */
  info: (...args: unknown[]) => {
    if (enabled('info')) console.log(...args)
  },

  /** Warning logs - recoverable issues. */
  warn: (...args: unknown[]) => {
    if (enabled('warn')) console.warn(...args)
  },

  /** Error logs - failures and exceptions. */
  error: (...args: unknown[]) => {
    if (enabled('error')) console.error(...args)
  },
}

/**
 * Logger that prefixes every line with `[scope]`, matching the
 * `logger.info('[scope]', ...)` convention used across the codebase.
 */
export function createLogger(scope: string): Logger {
  const tag = `[${scope}]`
  return {
    debug: (...args: unknown[]) => logger.debug(tag, ...args),
    info: (...args: unknown[]) => logger.info(tag, ...args),
    warn: (...args: unknown[]) => logger.warn(tag, ...args),
    error: (...args: unknown[]) => logger.error(tag, ...args),
  }
}
