/**
 * Pull-based byte sources.
 *
 * The framer pulls one chunk at a time and awaits the next, the way a
 * blocking reader would. `StreamByteSource` turns a Node Readable (stdin,
 * a socket) into that shape using paused-mode `read()`.
 *
 * @module
 */
import type { Readable } from 'node:stream'

/**
 * Something the framer can pull bytes from.
 */
export interface ByteSource {
  /**
   * Resolve with the next non-empty chunk, or null at end of stream.
   * Rejects if the underlying stream failed.
   */
  read(): Promise<Buffer | null>
}

/**
 * ByteSource over a Readable stream.
 *
 * `end` and `close` both count as end of stream: a destroyed socket emits
 * only `close`. An `error` is delivered to the pending read, or to the next
 * one if no read is pending.
 *
 * Single-reader: concurrent `read()` calls are not supported.
 */
export class StreamByteSource implements ByteSource {
  private ended = false
  private failure: Error | null = null
  private wake: (() => void) | null = null

  constructor(private readonly stream: Readable) {
    stream.on('readable', this.notify)
    stream.on('end', this.onEnd)
    stream.on('close', this.onEnd)
    stream.on('error', this.onError)
  }

  async read(): Promise<Buffer | null> {
    while (true) {
      const chunk: unknown = this.stream.read()
      if (chunk !== null) {
        const buf = toBuffer(chunk)
        if (buf.length > 0) return buf
        continue
      }
      if (this.failure) throw this.failure
      if (this.ended || this.stream.destroyed) return null
      await new Promise<void>((resolve) => {
        this.wake = resolve
      })
    }
  }

  private readonly notify = (): void => {
    const wake = this.wake
    this.wake = null
    wake?.()
  }

  private readonly onEnd = (): void => {
    this.ended = true
    this.notify()
  }

  private readonly onError = (err: Error): void => {
    this.failure ??= err
    this.notify()
  }
}

function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) return chunk
  if (typeof chunk === 'string') return Buffer.from(chunk, 'utf-8')
  if (chunk instanceof Uint8Array) return Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength)
  throw new TypeError(`Unsupported chunk type from stream: ${typeof chunk}`)
}
