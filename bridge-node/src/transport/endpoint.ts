/**
 * Server address parsing.
 *
 * Two URI shapes are recognized:
 * - `tcp://<host>:<port>`: stream socket over TCP
 * - `local://<path>` or `local:<path>`: Unix domain socket at `<path>`
 *
 * Everything else is rejected here, before any dial is attempted.
 *
 * @module
 */
import { InvalidAddressError } from '../errors.js'

export type TcpEndpoint = {
  readonly kind: 'tcp'
  readonly host: string
  readonly port: number
}

export type LocalEndpoint = {
  readonly kind: 'local'
  readonly path: string
}

export type Endpoint = TcpEndpoint | LocalEndpoint

/**
 * Parse a server URI into an endpoint.
 *
 * @throws InvalidAddressError for malformed URIs, unsupported schemes, a
 *   missing host or port, or an empty socket path
 */
export function parseServerUri(uri: string): Endpoint {
  let url: URL
  try {
    url = new URL(uri)
  } catch {
    throw new InvalidAddressError(uri, 'not a valid URI')
  }

  switch (url.protocol) {
    case 'tcp:':
      return parseTcp(uri, url)
    case 'local:':
      return parseLocal(uri, url)
    default:
      throw new InvalidAddressError(uri, `unsupported scheme "${url.protocol.slice(0, -1)}"`)
  }
}

function parseTcp(uri: string, url: URL): TcpEndpoint {
  // IPv6 literals keep their brackets in URL.hostname
  const host = url.hostname.replace(/^\[(.*)\]$/, '$1')
  if (host === '') {
    throw new InvalidAddressError(uri, 'missing host')
  }
  if (url.port === '') {
    throw new InvalidAddressError(uri, 'missing port')
  }
  const port = Number(url.port)
  if (port < 1 || port > 65535) {
    throw new InvalidAddressError(uri, 'port must be between 1 and 65535')
  }
  return { kind: 'tcp', host, port }
}

function parseLocal(uri: string, url: URL): LocalEndpoint {
  let path: string
  try {
    path = decodeURIComponent(url.pathname)
  } catch {
    throw new InvalidAddressError(uri, 'socket path is not valid percent-encoding')
  }
  if (path === '') {
    throw new InvalidAddressError(uri, 'missing socket path')
  }
  return { kind: 'local', path }
}

/**
 * Human-readable endpoint name used in error messages and logs.
 */
export function describeEndpoint(endpoint: Endpoint): string {
  if (endpoint.kind === 'local') {
    return `local socket ${endpoint.path}`
  }
  const host = endpoint.host.includes(':') ? `[${endpoint.host}]` : endpoint.host
  return `tcp ${host}:${endpoint.port}`
}
