/**
 * Process wiring: resolve the server, connect, and start the relay.
 *
 * Startup order:
 * 1. Server URI from configuration, else discovery from the working directory
 * 2. Connect
 * 3. Duplicate the handle for the writer pump and for the interrupt path
 * 4. Claim stdout, then install the interrupt handler
 * 5. Start both pumps
 *
 * Any failure before step 5 propagates to the caller (exit 1 in the CLI).
 * After step 5 failures stay inside the pumps and surface only through the
 * completion signal.
 *
 * @module
 */
import type { Readable } from 'node:stream'
import { CompletionSignal } from './completion.js'
import type { BridgeConfig } from './config.js'
import { discoverServerUri } from './discovery.js'
import { StreamByteSource } from './ipc/byte-source.js'
import { StreamSink } from './ipc/sink.js'
import { claimStdout, type StdoutClaim } from './ipc/stdout-guard.js'
import type { Logger } from './log.js'
import { type PumpOutcome, startRelay } from './relay.js'
import { ShutdownCoordinator, type SignalSource } from './shutdown.js'
import { type Connection, connect, type DialFn } from './transport/connection.js'

export interface OpenBridgeOptions {
  readonly config: BridgeConfig
  readonly logger: Logger
  /** Frames from the client. Defaults to `process.stdin`. */
  readonly stdin?: Readable
  /** Claims the output stream for relayed frames. Defaults to `claimStdout`. */
  readonly claimOutput?: () => StdoutClaim
  /** Defaults to `process`. */
  readonly signalSource?: SignalSource
  readonly dial?: DialFn
}

export interface Bridge {
  readonly connection: Connection
  /** Fires with the first pump to stop. */
  readonly completion: CompletionSignal<PumpOutcome>
  /** Settles once both pumps have stopped. */
  readonly finished: Promise<[PumpOutcome, PumpOutcome]>
  readonly interrupts: ShutdownCoordinator
}

/**
 * The configured URI, or the one named by the nearest server descriptor.
 */
export async function resolveServerUri(config: BridgeConfig, logger: Logger): Promise<string> {
  if (config.uri !== undefined) {
    logger.debug('using server URI from STDIO_BRIDGE_URI', { uri: config.uri })
    return config.uri
  }
  const uri = await discoverServerUri(config.cwd)
  logger.debug('discovered server URI', { uri, cwd: config.cwd })
  return uri
}

/**
 * Connect to the server and start relaying.
 *
 * @throws ConfigNotFoundError, InvalidConfigError, InvalidAddressError,
 *   IoFailureError or InterruptRegistrationError on startup failure
 */
export async function openBridge(options: OpenBridgeOptions): Promise<Bridge> {
  const { config, logger } = options

  const uri = await resolveServerUri(config, logger)
  const connection = await connect(uri, { dial: options.dial, logger })
  logger.info(`connected to ${connection.describe()}`)

  const writerConnection = connection.duplicate()
  const interruptConnection = connection.duplicate()

  let output: StdoutClaim
  const interrupts = new ShutdownCoordinator({
    target: interruptConnection,
    logger,
    signals: config.signals,
    source: options.signalSource
  })
  try {
    output = (options.claimOutput ?? claimStdout)()
    interrupts.install()
  } catch (err) {
    connection.shutdown('both')
    throw err
  }

  const completion = new CompletionSignal<PumpOutcome>()
  const finished = startRelay({
    stdin: new StreamByteSource(options.stdin ?? process.stdin),
    stdout: new StreamSink(output.stream, output.write),
    readerConnection: connection,
    writerConnection,
    completion,
    logger,
    maxMessageSize: config.maxMessageSize
  })

  return { connection, completion, finished, interrupts }
}
