/**
 * Socket transports: address parsing and connection handles.
 *
 * @module
 */

export {
  type Connection,
  type ConnectOptions,
  connect,
  type DialFn,
  LocalConnection,
  type ShutdownDirection,
  SocketChannel,
  SocketConnection,
  TcpConnection
} from './connection.js'
export {
  describeEndpoint,
  type Endpoint,
  type LocalEndpoint,
  parseServerUri,
  type TcpEndpoint
} from './endpoint.js'
