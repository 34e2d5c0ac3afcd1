/**
 * Diagnostics logger.
 *
 * stdout carries protocol frames, so every diagnostic line goes to stderr
 * (or the injected `write` function). One logger is created at startup and
 * passed down; library code never builds its own.
 *
 * @module
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent']

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
}

/** Tag prepended to every diagnostic line. */
export const LOG_TAG = '[stdio-bridge]'

export interface Logger {
  readonly level: LogLevel
  debug(message: string, meta?: Record<string, unknown>): void
  info(message: string, meta?: Record<string, unknown>): void
  warn(message: string, meta?: Record<string, unknown>): void
  error(message: string, meta?: Record<string, unknown>): void
  isEnabled(level: LogLevel): boolean
}

export interface LoggerOptions {
  /** Minimum level that is written. Defaults to `error`. */
  readonly level?: LogLevel
  /** Line sink. Defaults to `process.stderr.write`. */
  readonly write?: (line: string) => void
  /** Timestamp source. Defaults to `() => new Date()`. */
  readonly clock?: () => Date
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value)
}

/**
 * Create a level-gated logger.
 *
 * Output format:
 * `[stdio-bridge] <ISO timestamp> <LEVEL> <message>[ <meta as JSON>]\n`
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'error'
  const write = options.write ?? ((line: string) => void process.stderr.write(line))
  const clock = options.clock ?? (() => new Date())

  const isEnabled = (candidate: LogLevel): boolean =>
    candidate !== 'silent' && LEVEL_RANK[candidate] >= LEVEL_RANK[level]

  const emit = (candidate: LogLevel, message: string, meta?: Record<string, unknown>): void => {
    if (!isEnabled(candidate)) return
    const metaStr = meta && Object.keys(meta).length > 0 ? ` ${safeStringify(meta)}` : ''
    write(`${LOG_TAG} ${clock().toISOString()} ${candidate.toUpperCase()} ${message}${metaStr}\n`)
  }

  return {
    level,
    debug: (message, meta) => emit('debug', message, meta),
    info: (message, meta) => emit('info', message, meta),
    warn: (message, meta) => emit('warn', message, meta),
    error: (message, meta) => emit('error', message, meta),
    isEnabled
  }
}

/**
 * JSON.stringify that tolerates cycles and bigint values in log metadata.
 */
function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value, (_key, v: unknown) => (typeof v === 'bigint' ? v.toString() : v))
  } catch {
    return '"[unserializable]"'
  }
}
