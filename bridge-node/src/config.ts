/**
 * Bridge configuration from environment variables.
 *
 * - `STDIO_BRIDGE_URI`: server URI; skips descriptor discovery when set
 * - `STDIO_BRIDGE_LOG_LEVEL`: debug | info | warn | error | silent (default error)
 * - `STDIO_BRIDGE_MAX_MESSAGE_SIZE`: per-message byte limit (default: none)
 * - `STDIO_BRIDGE_SIGNALS`: comma-separated interrupt signals (default SIGINT)
 *
 * Malformed values never abort startup: they are reported through
 * `onWarning` and replaced by the default.
 *
 * @module
 */
import { isLogLevel, type LogLevel } from './log.js'

export const DEFAULT_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT']

const KNOWN_SIGNALS: ReadonlySet<string> = new Set([
  'SIGINT',
  'SIGTERM',
  'SIGHUP',
  'SIGQUIT',
  'SIGBREAK',
  'SIGUSR1',
  'SIGUSR2'
])

export interface BridgeConfig {
  /** Explicit server URI, or undefined to discover it from `cwd`. */
  readonly uri: string | undefined
  readonly logLevel: LogLevel
  /** Per-message byte limit, or undefined for no limit. */
  readonly maxMessageSize: number | undefined
  readonly signals: readonly NodeJS.Signals[]
  readonly cwd: string
}

function isSignal(name: string): name is NodeJS.Signals {
  return KNOWN_SIGNALS.has(name)
}

/**
 * Read configuration from an environment map.
 *
 * @param env - Environment variables (usually `process.env`)
 * @param cwd - Directory discovery starts from
 * @param onWarning - Receives one message per ignored value
 */
export function readBridgeConfig(
  env: NodeJS.ProcessEnv,
  cwd: string,
  onWarning: (msg: string) => void
): BridgeConfig {
  const rawUri = env.STDIO_BRIDGE_URI?.trim()
  const uri = rawUri !== undefined && rawUri !== '' ? rawUri : undefined

  let logLevel: LogLevel = 'error'
  const rawLevel = env.STDIO_BRIDGE_LOG_LEVEL?.trim().toLowerCase()
  if (rawLevel !== undefined && rawLevel !== '') {
    if (isLogLevel(rawLevel)) {
      logLevel = rawLevel
    } else {
      onWarning(`ignoring STDIO_BRIDGE_LOG_LEVEL=${rawLevel}; expected debug, info, warn, error or silent`)
    }
  }

  let maxMessageSize: number | undefined
  const rawSize = env.STDIO_BRIDGE_MAX_MESSAGE_SIZE?.trim()
  if (rawSize !== undefined && rawSize !== '') {
    const parsed = /^\d+$/.test(rawSize) ? Number.parseInt(rawSize, 10) : Number.NaN
    if (Number.isSafeInteger(parsed) && parsed > 0) {
      maxMessageSize = parsed
    } else {
      onWarning(`ignoring STDIO_BRIDGE_MAX_MESSAGE_SIZE=${rawSize}; expected a positive integer`)
    }
  }

  let signals = DEFAULT_SIGNALS
  const rawSignals = env.STDIO_BRIDGE_SIGNALS?.trim()
  if (rawSignals !== undefined && rawSignals !== '') {
    const names = rawSignals
      .split(',')
      .map((s) => s.trim().toUpperCase())
      .filter((s) => s !== '')
    const unknown = names.filter((n) => !isSignal(n))
    const valid = names.filter(isSignal)
    if (unknown.length > 0) {
      onWarning(`ignoring unknown signals in STDIO_BRIDGE_SIGNALS: ${unknown.join(', ')}`)
    }
    if (valid.length > 0) {
      signals = [...new Set(valid)]
    }
  }

  return { uri, logLevel, maxMessageSize, signals, cwd }
}
