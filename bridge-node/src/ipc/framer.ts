/**
 * MessageFramer: incremental recognizer of header+body messages.
 *
 * The header block carries no length the bridge can trust, so the end of a
 * message is found from the body's own syntax:
 *
 * 1. Header scan: bytes accumulate until the trailing four are `\r\n\r\n`.
 * 2. Body scan: each byte is classified. Outside quoted sections `{` and
 *    `}` move a depth counter; inside them a backslash escapes the next
 *    byte and `"` closes the section, so braces in string literals never
 *    count. When depth returns to zero the body must decode as UTF-8 and
 *    parse as JSON; then the frame is emitted.
 *
 * Sources deliver whole chunks, so a chunk can end mid-message or carry the
 * start of the next one. Bytes past a frame boundary stay in the framer and
 * are consumed by the next `readMessage()` call; splitting the same input
 * differently never changes the frames produced.
 *
 * Invariants:
 * - `braceDepth` is only consulted when `inString` is false
 * - State is owned by one framer and one reader; never shared
 * - A body that balances but fails validation is fatal: no resynchronization
 *
 * @module
 */
import {
  BridgeError,
  errorMessage,
  FrameSizeError,
  IoFailureError,
  isTransientError,
  MalformedMessageError,
  UnexpectedEofError
} from '../errors.js'
import type { ByteSource } from './byte-source.js'
import { type Frame, HEADER_TERMINATOR } from './frame.js'

const CR = 0x0d
const QUOTE = 0x22
const BACKSLASH = 0x5c
const OPEN_BRACE = 0x7b
const CLOSE_BRACE = 0x7d

// Rejects invalid UTF-8 instead of substituting U+FFFD
const utf8 = new TextDecoder('utf-8', { fatal: true })

export type FramerPhase = 'headers' | 'body'

export interface MessageFramerOptions {
  /** Largest accepted message (headers + body) in bytes. Unbounded if unset. */
  readonly maxMessageSize?: number
}

/**
 * Growable byte buffer built from chunk slices.
 */
class ByteAccumulator {
  private chunks: Buffer[] = []
  private size = 0

  get length(): number {
    return this.size
  }

  append(bytes: Buffer): void {
    if (bytes.length === 0) return
    this.chunks.push(bytes)
    this.size += bytes.length
  }

  /** Copy out the accumulated bytes and clear. */
  take(): Buffer {
    const out = Buffer.concat(this.chunks, this.size)
    this.chunks = []
    this.size = 0
    return out
  }
}

type BodyStep = 'more' | 'balanced' | 'underflow'

/**
 * Pulls bytes from a ByteSource and yields complete frames, one per call.
 *
 * @remarks
 * **Single-reader**: `readMessage()` must not be called again before the
 * previous call settles.
 */
export class MessageFramer {
  private phase: FramerPhase = 'headers'
  private readonly headerBuffer = new ByteAccumulator()
  private readonly bodyBuffer = new ByteAccumulator()
  /** Completed header block of the frame whose body is being scanned. */
  private headers: Buffer | null = null
  /** Length of the terminator prefix matched by the latest header bytes. */
  private terminatorMatched = 0
  private braceDepth = 0
  private inString = false
  private escapeNext = false

  /** Current source chunk and the index of its first unconsumed byte. */
  private pending: Buffer = Buffer.alloc(0)
  private offset = 0

  private readonly maxMessageSize: number | undefined

  constructor(
    private readonly source: ByteSource,
    options: MessageFramerOptions = {}
  ) {
    this.maxMessageSize = options.maxMessageSize
  }

  /**
   * Read the next complete frame.
   *
   * @throws UnexpectedEofError if the source ends before a frame is complete
   * @throws MalformedMessageError if a balanced body is not valid JSON
   * @throws FrameSizeError if a limit is set and the message outgrows it
   * @throws IoFailureError (or the source's BridgeError) on read failure
   */
  async readMessage(): Promise<Frame> {
    while (true) {
      const frame = this.scan()
      if (frame) return frame

      const chunk = await this.pull()
      if (chunk === null) {
        throw new UnexpectedEofError(this.phase, this.bufferedSize() > 0)
      }
      this.pending = chunk
      this.offset = 0
    }
  }

  /**
   * Current parser phase. Exposed for diagnostics.
   */
  get currentPhase(): FramerPhase {
    return this.phase
  }

  /**
   * Run the state machine over the unconsumed part of the current chunk.
   * Returns a frame as soon as one completes, leaving the rest of the chunk
   * for the next call; returns null once the chunk is exhausted.
   */
  private scan(): Frame | null {
    const buf = this.pending
    let segmentStart = this.offset

    for (let i = this.offset; i < buf.length; i++) {
      const byte = buf[i]

      if (this.phase === 'headers') {
        if (this.scanHeaderByte(byte)) {
          this.headerBuffer.append(buf.subarray(segmentStart, i + 1))
          this.headers = this.headerBuffer.take()
          this.phase = 'body'
          segmentStart = i + 1
        }
        continue
      }

      const step = this.scanBodyByte(byte)
      if (step === 'more') continue

      this.bodyBuffer.append(buf.subarray(segmentStart, i + 1))
      this.offset = i + 1
      if (step === 'underflow') {
        const body = this.bodyBuffer.take()
        this.reset()
        throw new MalformedMessageError('closing brace without a matching opening brace', body)
      }
      return this.finishFrame()
    }

    const rest = buf.subarray(segmentStart)
    if (this.phase === 'headers') {
      this.headerBuffer.append(rest)
    } else {
      this.bodyBuffer.append(rest)
    }
    this.offset = buf.length
    this.checkSize(this.bufferedSize())
    return null
  }

  /**
   * Feed one header byte. True when the header block just completed.
   *
   * Tracks how much of `\r\n\r\n` the most recent bytes match; on a
   * mismatch the only prefix that can still be in play is a lone `\r`.
   */
  private scanHeaderByte(byte: number): boolean {
    if (byte === HEADER_TERMINATOR[this.terminatorMatched]) {
      this.terminatorMatched++
    } else {
      this.terminatorMatched = byte === CR ? 1 : 0
    }
    if (this.terminatorMatched === HEADER_TERMINATOR.length) {
      this.terminatorMatched = 0
      return true
    }
    return false
  }

  /**
   * Feed one body byte through the quote/escape/brace classifier.
   * Depth can only reach zero from one, so `balanced` implies at least one
   * opening brace was seen.
   */
  private scanBodyByte(byte: number): BodyStep {
    if (this.inString) {
      if (this.escapeNext) {
        this.escapeNext = false
      } else if (byte === BACKSLASH) {
        this.escapeNext = true
      } else if (byte === QUOTE) {
        this.inString = false
      }
      return 'more'
    }

    if (byte === QUOTE) {
      this.inString = true
    } else if (byte === OPEN_BRACE) {
      this.braceDepth++
    } else if (byte === CLOSE_BRACE) {
      this.braceDepth--
      if (this.braceDepth < 0) return 'underflow'
      if (this.braceDepth === 0) return 'balanced'
    }
    return 'more'
  }

  private finishFrame(): Frame {
    const headers = this.headers ?? Buffer.alloc(0)
    const body = this.bodyBuffer.take()
    this.reset()

    this.checkSize(headers.length + body.length)

    try {
      JSON.parse(utf8.decode(body))
    } catch (err) {
      throw new MalformedMessageError(errorMessage(err), body)
    }

    return { headers, body }
  }

  private reset(): void {
    this.phase = 'headers'
    this.headers = null
    this.terminatorMatched = 0
    this.braceDepth = 0
    this.inString = false
    this.escapeNext = false
  }

  private bufferedSize(): number {
    return this.headerBuffer.length + (this.headers?.length ?? 0) + this.bodyBuffer.length
  }

  private checkSize(size: number): void {
    if (this.maxMessageSize !== undefined && size > this.maxMessageSize) {
      throw new FrameSizeError(size, this.maxMessageSize)
    }
  }

  /**
   * Pull the next chunk, retrying reads that failed transiently.
   */
  private async pull(): Promise<Buffer | null> {
    while (true) {
      try {
        return await this.source.read()
      } catch (err) {
        if (isTransientError(err)) continue
        throw err instanceof BridgeError ? err : new IoFailureError('read failed', err)
      }
    }
  }
}
