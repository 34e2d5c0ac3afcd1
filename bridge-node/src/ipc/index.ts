/**
 * Byte-level plumbing: sources, sinks, framing and the stdout guard.
 *
 * @module
 */

export { type ByteSource, StreamByteSource } from './byte-source.js'
export { describeFrame, encodeFrame, type Frame, HEADER_TERMINATOR, writeFrame } from './frame.js'
export { type FramerPhase, MessageFramer, type MessageFramerOptions } from './framer.js'
export { type ByteSink, StreamClosedError, StreamSink, writeWithBackpressure } from './sink.js'
export { claimStdout, type StdoutClaim, strayExcerpt } from './stdout-guard.js'
