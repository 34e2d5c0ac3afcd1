/**
 * Duplex relay: two framer-driven pumps over one connection.
 *
 * - `reader`: stdin → connection
 * - `writer`: connection → stdout
 *
 * Each pump reads whole frames and writes them out unchanged, headers then
 * body, until anything fails. A failing pump shuts the shared connection
 * down in both directions, which ends the other pump's pending socket read,
 * and signals completion. Frames keep their order within one direction;
 * there is no ordering across directions.
 *
 * @module
 */
import type { CompletionSignal } from './completion.js'
import { errorMessage } from './errors.js'
import type { ByteSource } from './ipc/byte-source.js'
import { describeFrame, writeFrame } from './ipc/frame.js'
import { MessageFramer } from './ipc/framer.js'
import type { ByteSink } from './ipc/sink.js'
import type { Logger } from './log.js'
import type { ShutdownTarget } from './shutdown.js'

/**
 * Why a pump stopped. Pumps only stop on failure; a clean end of stream is
 * reported as an UnexpectedEofError.
 */
export type PumpOutcome = {
  readonly name: string
  readonly error: Error
  /** Frames relayed before the failure. */
  readonly frames: number
}

export interface PumpOptions {
  /** Task name used in log lines. */
  readonly name: string
  readonly source: ByteSource
  readonly sink: ByteSink
  /** Handle shut down in both directions when the pump fails. */
  readonly connection: ShutdownTarget
  readonly completion: CompletionSignal<PumpOutcome>
  readonly logger: Logger
  readonly maxMessageSize?: number
}

/**
 * A connection handle as the relay uses it.
 */
export type RelayConnection = ByteSource & ByteSink & ShutdownTarget

export interface RelayOptions {
  readonly stdin: ByteSource
  readonly stdout: ByteSink
  /** Handle the reader pump writes to. */
  readonly readerConnection: RelayConnection
  /** Handle the writer pump reads from. */
  readonly writerConnection: RelayConnection
  readonly completion: CompletionSignal<PumpOutcome>
  readonly logger: Logger
  readonly maxMessageSize?: number
}

/**
 * Relay frames from `source` to `sink` until something fails.
 *
 * Resolves with the failure; never rejects.
 */
export async function runPump(options: PumpOptions): Promise<PumpOutcome> {
  const { name, source, sink, connection, completion, logger } = options
  const framer = new MessageFramer(source, { maxMessageSize: options.maxMessageSize })
  let frames = 0

  try {
    while (true) {
      const frame = await framer.readMessage()
      if (logger.isEnabled('debug')) {
        logger.debug(`${name}: relaying ${describeFrame(frame)}`)
      }
      await writeFrame(sink, frame)
      frames++
    }
  } catch (err) {
    const error = err instanceof Error ? err : new Error(errorMessage(err))
    logger.error(`${name}: could not relay message: ${error.message}`, { frames })

    try {
      connection.shutdown('both')
    } catch (shutdownErr) {
      logger.debug(`${name}: connection shutdown failed: ${errorMessage(shutdownErr)}`)
    }

    const outcome: PumpOutcome = { name, error, frames }
    completion.signal(outcome)
    return outcome
  }
}

/**
 * Start both pumps concurrently.
 *
 * @returns Promise that settles once both pumps have stopped. Callers
 *   normally wait on `completion` instead, which fires with the first one.
 */
export function startRelay(options: RelayOptions): Promise<[PumpOutcome, PumpOutcome]> {
  const { stdin, stdout, readerConnection, writerConnection, completion, logger, maxMessageSize } =
    options

  const reader = runPump({
    name: 'reader',
    source: stdin,
    sink: readerConnection,
    connection: readerConnection,
    completion,
    logger,
    maxMessageSize
  })
  const writer = runPump({
    name: 'writer',
    source: writerConnection,
    sink: stdout,
    connection: writerConnection,
    completion,
    logger,
    maxMessageSize
  })

  return Promise.all([reader, writer])
}
