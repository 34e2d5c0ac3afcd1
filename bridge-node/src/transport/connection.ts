/**
 * Connection handles over TCP and Unix domain sockets.
 *
 * A handle wraps one `net.Socket` and exposes it as a ByteSource (for a
 * framer) and a ByteSink (for relayed frames). `duplicate()` returns a new
 * handle over the same socket so that each pump, and the interrupt handler,
 * can own one. Shutting down through any handle affects them all.
 *
 * @module
 */
import { connect as netConnect, type Socket } from 'node:net'
import { errorCode, IoFailureError } from '../errors.js'
import { type ByteSource, StreamByteSource } from '../ipc/byte-source.js'
import { type ByteSink, StreamSink } from '../ipc/sink.js'
import { createLogger, type Logger } from '../log.js'
import {
  describeEndpoint,
  type Endpoint,
  type LocalEndpoint,
  parseServerUri,
  type TcpEndpoint
} from './endpoint.js'

export type ShutdownDirection = 'read' | 'write' | 'both'

/**
 * Opens a socket toward an endpoint. The socket may still be connecting.
 */
export type DialFn = (endpoint: Endpoint) => Socket

export interface ConnectOptions {
  /** Replaces the default `net.connect` dialer. */
  readonly dial?: DialFn
  /** Receives socket-level diagnostics. Defaults to a silent logger. */
  readonly logger?: Logger
}

/**
 * State shared by every handle duplicated from one connection.
 *
 * The socket has exactly one ByteSource and one ByteSink; handles delegate
 * to them so that duplicates never race each other for `readable` events.
 */
export class SocketChannel {
  readonly source: StreamByteSource
  readonly sink: StreamSink

  constructor(
    readonly socket: Socket,
    private readonly logger: Logger
  ) {
    this.source = new StreamByteSource(socket)
    this.sink = new StreamSink(socket)
    socket.on('error', this.onError)
  }

  private readonly onError = (err: Error): void => {
    this.logger.debug('socket error', { code: errorCode(err), message: err.message })
  }
}

function defaultDial(endpoint: Endpoint): Socket {
  return endpoint.kind === 'tcp'
    ? netConnect({ host: endpoint.host, port: endpoint.port })
    : netConnect({ path: endpoint.path })
}

function tcpHint(code: string | undefined): string | undefined {
  switch (code) {
    case 'ECONNREFUSED':
      return 'nothing is listening on that port'
    case 'ECONNRESET':
      return 'connection reset by peer'
    case 'ETIMEDOUT':
      return 'connection timed out'
    case 'ENOTFOUND':
    case 'EAI_AGAIN':
      return 'host name could not be resolved'
    default:
      return undefined
  }
}

function localHint(code: string | undefined): string | undefined {
  switch (code) {
    case 'ENOENT':
      return 'socket file does not exist'
    case 'ECONNREFUSED':
      return 'no server is accepting on the socket'
    case 'EACCES':
      return 'permission denied on the socket'
    case 'EPIPE':
      return 'server closed the socket'
    default:
      return undefined
  }
}

function transportError(endpoint: Endpoint, action: string, cause: unknown): IoFailureError {
  const code = errorCode(cause)
  const hint = endpoint.kind === 'tcp' ? tcpHint(code) : localHint(code)
  const target = `${action} ${describeEndpoint(endpoint)}`
  return new IoFailureError(hint === undefined ? target : `${target} (${hint})`, cause)
}

/**
 * Behavior common to both socket kinds.
 */
export abstract class SocketConnection<E extends Endpoint> implements ByteSource, ByteSink {
  abstract readonly kind: E['kind']

  constructor(
    readonly endpoint: E,
    protected readonly channel: SocketChannel
  ) {}

  /** Endpoint name for logs, e.g. `tcp 127.0.0.1:5000`. */
  describe(): string {
    return describeEndpoint(this.endpoint)
  }

  /**
   * Next chunk of bytes from the server, or null once the socket is closed
   * for reading.
   *
   * @throws IoFailureError on socket failure
   */
  async read(): Promise<Buffer | null> {
    try {
      return await this.channel.source.read()
    } catch (err) {
      throw transportError(this.endpoint, 'could not read from', err)
    }
  }

  /**
   * @throws IoFailureError if the socket is closed or fails
   */
  async write(data: Uint8Array): Promise<void> {
    try {
      await this.channel.sink.write(data)
    } catch (err) {
      throw transportError(this.endpoint, 'could not write to', err)
    }
  }

  /**
   * Close one or both directions. Idempotent.
   *
   * `'write'` sends FIN and keeps receiving. A Node socket cannot stop
   * receiving while it can still send, so `'read'` and `'both'` destroy it;
   * any pending read then resolves with end of stream.
   */
  shutdown(direction: ShutdownDirection): void {
    const socket = this.channel.socket
    if (socket.destroyed) return
    if (direction === 'write') {
      if (!socket.writableEnded) socket.end()
      return
    }
    socket.destroy()
  }

  /** True once the socket has been torn down. */
  get closed(): boolean {
    return this.channel.socket.destroyed
  }

  abstract duplicate(): Connection
}

export class TcpConnection extends SocketConnection<TcpEndpoint> {
  readonly kind = 'tcp' as const

  duplicate(): TcpConnection {
    return new TcpConnection(this.endpoint, this.channel)
  }
}

export class LocalConnection extends SocketConnection<LocalEndpoint> {
  readonly kind = 'local' as const

  duplicate(): LocalConnection {
    return new LocalConnection(this.endpoint, this.channel)
  }
}

export type Connection = TcpConnection | LocalConnection

/**
 * Resolve once the socket is connected; reject on its first error.
 */
function waitForConnect(socket: Socket): Promise<void> {
  return new Promise((resolve, reject) => {
    if (!socket.connecting) {
      if (socket.destroyed) {
        reject(new Error('socket was destroyed before connecting'))
      } else {
        resolve()
      }
      return
    }

    let settled = false

    const settle = (fn: () => void) => {
      if (settled) return
      settled = true
      socket.off('connect', onConnect)
      socket.off('error', onError)
      fn()
    }

    const onConnect = () => settle(() => resolve())
    const onError = (err: Error) => settle(() => reject(err))

    socket.on('connect', onConnect)
    socket.on('error', onError)
  })
}

/**
 * Parse a server URI and open a connection to it.
 *
 * @throws InvalidAddressError if the URI is malformed or unsupported (no
 *   dial is attempted)
 * @throws IoFailureError if the endpoint cannot be reached
 */
export async function connect(uri: string, options: ConnectOptions = {}): Promise<Connection> {
  const endpoint = parseServerUri(uri)
  const dial = options.dial ?? defaultDial
  const logger = options.logger ?? createLogger({ level: 'silent' })

  let socket: Socket
  try {
    socket = dial(endpoint)
  } catch (err) {
    throw transportError(endpoint, 'could not connect to', err)
  }

  try {
    await waitForConnect(socket)
  } catch (err) {
    socket.destroy()
    throw transportError(endpoint, 'could not connect to', err)
  }

  const channel = new SocketChannel(socket, logger)
  logger.debug('connected', { endpoint: describeEndpoint(endpoint) })
  return endpoint.kind === 'tcp'
    ? new TcpConnection(endpoint, channel)
    : new LocalConnection(endpoint, channel)
}
