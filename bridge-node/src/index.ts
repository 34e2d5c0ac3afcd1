/**
 * stdio-bridge
 *
 * Relays framed messages between a process's stdin/stdout and a build
 * server listening on a TCP or Unix domain socket.
 *
 * @packageDocumentation
 */

// Wiring
export { type Bridge, openBridge, type OpenBridgeOptions, resolveServerUri } from './bridge.js'
export { CompletionSignal } from './completion.js'
export {
  type BridgeConfig,
  DEFAULT_SIGNALS,
  readBridgeConfig
} from './config.js'
export {
  ACTIVE_FILE_PATH,
  type ActiveDescriptor,
  discoverServerUri,
  findActiveFile,
  parseActive
} from './discovery.js'

// Errors
export {
  BridgeError,
  type BridgeErrorKind,
  ConfigNotFoundError,
  FrameSizeError,
  InterruptRegistrationError,
  InvalidAddressError,
  InvalidConfigError,
  IoFailureError,
  MalformedMessageError,
  UnexpectedEofError
} from './errors.js'

// Framing and streams
export {
  type ByteSink,
  type ByteSource,
  describeFrame,
  encodeFrame,
  type Frame,
  MessageFramer,
  type MessageFramerOptions,
  StreamByteSource,
  StreamClosedError,
  StreamSink,
  writeFrame
} from './ipc/index.js'
export { createLogger, type Logger, type LoggerOptions, type LogLevel } from './log.js'

// Relay and shutdown
export { type PumpOptions, type PumpOutcome, type RelayOptions, runPump, startRelay } from './relay.js'
export { ShutdownCoordinator, type ShutdownTarget, type SignalSource } from './shutdown.js'

// Transport
export {
  type Connection,
  connect,
  type Endpoint,
  LocalConnection,
  parseServerUri,
  TcpConnection
} from './transport/index.js'
