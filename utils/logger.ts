/**
 * Logger utility for drivepath
 *
 * Provides a simple logger factory that creates namespaced, leveled loggers
 * for the different components of drivepath.
 */

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug'

export interface Logger {
  info: (...args: unknown[]) => void
  warn: (...args: unknown[]) => void
  error: (...args: unknown[]) => void
  debug: (...args: unknown[]) => void
  /** Current threshold; messages below it are dropped */
  readonly level: LogLevel
  setLevel: (level: LogLevel) => void
}

export interface LoggerOptions {
  level?: LogLevel
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
}

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'error', 'warn', 'info', 'debug']

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value)
}

/**
 * Resolve the default level from the environment.
 *
 * DRIVEPATH_LOG_LEVEL wins; otherwise DRIVEPATH_DEBUG=1 turns on debug output.
 */
export function defaultLogLevel(env: Record<string, string | undefined> = process.env): LogLevel {
  const configured = env.DRIVEPATH_LOG_LEVEL
  if (isLogLevel(configured)) return configured
  if (env.DRIVEPATH_DEBUG) return 'debug'
  return 'info'
}

/**
 * Create a namespaced logger instance.
 *
 * @param prefix - Prefix to prepend to all log messages (e.g., '[drivepath-cli]')
 * @returns Logger instance with info, warn, error, and debug methods
 *
 * @example
 * ```typescript
 * const logger = createLogger('[drivepath-cli]')
 * logger.info('Starting up...')  // [drivepath-cli] Starting up...
 * logger.error('Fatal error:', err)
 * ```
 */
export function createLogger(prefix: string, options: LoggerOptions = {}): Logger {
  let level = options.level ?? defaultLogLevel()
  const enabled = (wanted: LogLevel) => LEVEL_ORDER[level] >= LEVEL_ORDER[wanted]

  return {
    info: (...args: unknown[]) => {
      if (enabled('info')) console.info(prefix, ...args)
    },
    warn: (...args: unknown[]) => {
      if (enabled('warn')) console.warn(prefix, ...args)
    },
    error: (...args: unknown[]) => {
      if (enabled('error')) console.error(prefix, ...args)
    },
    debug: (...args: unknown[]) => {
      if (enabled('debug')) console.debug(prefix, ...args)
    },
    get level() {
      return level
    },
    setLevel: (next: LogLevel) => {
      level = next
    },
  }
}

