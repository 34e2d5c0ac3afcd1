/**
 * Message frames as they travel through the bridge.
 *
 * Wire shape:
 * - header block: opaque lines, terminated by a blank line (`\r\n\r\n`)
 * - body: a JSON object whose end is found from its own brace structure
 *
 * The bridge never interprets header lines; a frame is relayed byte for
 * byte exactly as it was read.
 *
 * @module
 */
import type { ByteSink } from './sink.js'

/** Blank-line sequence that ends a header block. */
export const HEADER_TERMINATOR: Buffer = Buffer.from('\r\n\r\n', 'latin1')

/**
 * A fully recognized message.
 */
export interface Frame {
  /** Raw header bytes, including the terminating blank line. */
  readonly headers: Buffer
  /** Raw body bytes; on its own a complete JSON value. */
  readonly body: Buffer
}

/**
 * Concatenate a frame back into wire bytes.
 */
export function encodeFrame(frame: Frame): Buffer {
  return Buffer.concat([frame.headers, frame.body])
}

/**
 * Write a frame's header bytes, then its body bytes, awaiting each write.
 */
export async function writeFrame(sink: ByteSink, frame: Frame): Promise<void> {
  await sink.write(frame.headers)
  await sink.write(frame.body)
}

/**
 * Render a frame for debug logs: the non-empty header lines and the body
 * decoded as UTF-8 (invalid sequences replaced).
 */
export function describeFrame(frame: Frame): string {
  const headers = frame.headers
    .toString('latin1')
    .split('\r\n')
    .filter((line) => line !== '')
  return `Frame(${JSON.stringify(headers)}, ${JSON.stringify(frame.body.toString('utf-8'))})`
}
