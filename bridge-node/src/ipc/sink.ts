/**
 * Byte sinks with backpressure.
 *
 * A write resolves only once the stream has accepted the bytes, waiting for
 * `drain` when the stream's buffer is full. A pump awaiting its writes is
 * therefore held back by a slow consumer, and nothing is buffered without
 * bound.
 *
 * @remarks
 * **Single-writer assumption**: concurrent `write()` calls on one sink can
 * interleave bytes. Each pump owns its sink and awaits every write.
 *
 * @module
 */
import type { Writable } from 'node:stream'
import { BridgeError } from '../errors.js'

/**
 * Something a pump can write bytes to.
 */
export interface ByteSink {
  write(data: Uint8Array): Promise<void>
}

/**
 * Error thrown when the output stream is closed or finished unexpectedly.
 */
export class StreamClosedError extends BridgeError {
  readonly kind = 'IoFailure' as const

  constructor(reason: 'destroyed' | 'ended' | 'close' | 'finish') {
    super(`Output stream unavailable: ${reason}`)
    this.name = 'StreamClosedError'
  }
}

/**
 * Write a buffer to a stream with backpressure handling.
 * Resolves only from a single code path to avoid double-resolution.
 *
 * @param stream - The writable stream (used for state checks and event listening)
 * @param data - The data to write
 * @param writeFn - Function that performs the actual write, returning false on backpressure.
 *   Separated from `stream` so callers can bypass a patched `stream.write`
 *   (stdout after `claimStdout()`) while still listening for drain events on the real stream.
 * @throws StreamClosedError if the stream is closed/finished
 * @throws Error if the stream emits an error
 */
export function writeWithBackpressure(
  stream: Writable,
  data: Uint8Array,
  writeFn: (data: Uint8Array) => boolean
): Promise<void> {
  return new Promise((resolve, reject) => {
    if (stream.destroyed) {
      reject(new StreamClosedError('destroyed'))
      return
    }
    if (stream.writableEnded || stream.writableFinished) {
      reject(new StreamClosedError('ended'))
      return
    }

    let settled = false

    const settle = (fn: () => void) => {
      if (settled) return
      settled = true
      cleanup()
      fn()
    }

    const onError = (err: Error) => settle(() => reject(err))
    const onClose = () => settle(() => reject(new StreamClosedError('close')))
    const onFinish = () => settle(() => reject(new StreamClosedError('finish')))
    const onDrain = () => settle(() => resolve())

    const cleanup = () => {
      stream.off('error', onError)
      stream.off('close', onClose)
      stream.off('finish', onFinish)
      stream.off('drain', onDrain)
    }

    // Attach listeners before write to catch synchronous errors
    stream.on('error', onError)
    stream.on('close', onClose)
    stream.on('finish', onFinish)

    let canContinue: boolean
    try {
      canContinue = writeFn(data)
    } catch (err) {
      settle(() => reject(err))
      return
    }

    if (canContinue) {
      // Accepted; resolve on the next turn so a synchronous error from write() wins
      setImmediate(() => settle(() => resolve()))
    } else {
      stream.on('drain', onDrain)
    }
  })
}

/**
 * ByteSink over a writable stream (stdout in production).
 *
 * Keeps a standing `error` listener on the stream: an asynchronous failure
 * (EPIPE after the reader went away) that arrives between writes is held
 * and rethrown by the next `write()` instead of crashing the process.
 * First failure wins.
 */
export class StreamSink implements ByteSink {
  private readonly writeFn: (data: Uint8Array) => boolean
  private failure: Error | null = null

  /**
   * @param output - The writable stream (used for state checks and event listening)
   * @param writeFn - Optional function for actual writes. Defaults to
   *   `output.write()`. Lets the caller bypass a patched `output.write`
   *   while still using `output` for backpressure events and stream state.
   */
  constructor(
    private readonly output: Writable,
    writeFn?: (data: Uint8Array) => boolean
  ) {
    this.writeFn = writeFn ?? ((data) => output.write(data))
    output.on('error', this.onError)
  }

  async write(data: Uint8Array): Promise<void> {
    if (this.failure) throw this.failure
    await writeWithBackpressure(this.output, data, this.writeFn)
  }

  private readonly onError = (err: Error): void => {
    this.failure ??= err
  }
}
