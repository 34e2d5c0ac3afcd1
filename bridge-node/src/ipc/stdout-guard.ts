/**
 * Exclusive claim on stdout for relayed frames.
 *
 * The client reads our stdout with its own framer, so a single byte from a
 * stray `console.log` between two frames would be taken as the start of a
 * header block. Claiming stdout keeps the real write for the writer pump and
 * reroutes every other stdout write to stderr, prefixed with a notice.
 *
 * @module
 */
import type { Writable } from 'node:stream'
import { LOG_TAG } from '../log.js'

type WriteCallback = (error?: Error | null) => void

/** Longest excerpt of a stray write quoted in the notice. */
const EXCERPT_LENGTH = 200

export type StdoutClaim = {
  /** Stream used for state checks and `drain`/`error` events. */
  readonly stream: Writable
  /** Writes straight to the stdout descriptor, past the redirect. */
  readonly write: (data: Uint8Array) => boolean
}

// Set while a claim is held; undoes the redirect
let release: (() => void) | null = null

/**
 * One-line excerpt of a stray write: newlines shown as `\n`, truncated.
 */
export function strayExcerpt(chunk: Uint8Array | string): string {
  const text = typeof chunk === 'string' ? chunk : Buffer.from(chunk).toString('utf-8')
  return text.replace(/\n/g, '\\n').slice(0, EXCERPT_LENGTH)
}

function redirectToStderr(
  chunk: Uint8Array | string,
  encodingOrCallback?: BufferEncoding | WriteCallback,
  callback?: WriteCallback
): boolean {
  process.stderr.write(`${LOG_TAG} stray stdout write moved to stderr: ${strayExcerpt(chunk)}\n`)
  if (typeof encodingOrCallback === 'function') {
    process.stderr.write(chunk, encodingOrCallback)
  } else {
    process.stderr.write(chunk, encodingOrCallback, callback)
  }
  // The bytes went to stderr; a caller waiting on stdout 'drain' would hang
  return true
}

/**
 * Take stdout for the relay.
 *
 * @throws Error if stdout is already claimed; a second claim would capture
 *   the redirect instead of the real write
 */
export function claimStdout(): StdoutClaim {
  if (release) {
    throw new Error('stdout is already claimed by this process')
  }

  const stdout = process.stdout
  const original = stdout.write
  const direct = original.bind(stdout)
  const write = (data: Uint8Array): boolean => direct(data)

  stdout.write = redirectToStderr as typeof stdout.write
  release = () => {
    stdout.write = original
    release = null
  }

  return { stream: stdout, write }
}

/**
 * Drop the claim and restore `process.stdout.write`. Test-only.
 * @internal
 */
export function releaseStdoutForTest(): void {
  release?.()
}
