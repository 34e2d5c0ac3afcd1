import { connect as netConnect, type Socket } from 'node:net'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, describe, expect, it, vi } from 'vitest'
import { InvalidAddressError, IoFailureError } from '../../src/errors.js'
import { type Connection, connect, type DialFn } from '../../src/transport/connection.js'
import {
  echo,
  readBytes,
  readToEnd,
  recordingLogger,
  startServer,
  type TestServer,
  tick
} from '../_harness.js'

const servers: TestServer[] = []
const connections: Connection[] = []

async function serve(...args: Parameters<typeof startServer>): Promise<TestServer> {
  const server = await startServer(...args)
  servers.push(server)
  return server
}

async function open(uri: string, options?: Parameters<typeof connect>[1]): Promise<Connection> {
  const conn = await connect(uri, options)
  connections.push(conn)
  return conn
}

function socketPath(): string {
  return join(tmpdir(), `stdio-bridge-${process.pid}-${Date.now()}-${servers.length}.sock`)
}

function portOf(uri: string): number {
  return Number(uri.slice(uri.lastIndexOf(':') + 1))
}

afterEach(async () => {
  for (const conn of connections.splice(0)) conn.shutdown('both')
  await Promise.all(servers.splice(0).map((s) => s.close()))
})

describe('connect', () => {
  it('opens a TCP connection that carries bytes both ways', async () => {
    const server = await serve({ port: 0 }, echo)

    const conn = await open(server.uri)
    await conn.write(Buffer.from('{"ping":1}'))

    expect(conn.kind).toBe('tcp')
    expect(conn.describe()).toBe(`tcp 127.0.0.1:${portOf(server.uri)}`)
    expect((await readBytes(conn, 10)).toString('utf-8')).toBe('{"ping":1}')
  })

  it('opens a Unix domain socket connection', async () => {
    const path = socketPath()
    const server = await serve({ path }, echo)

    const conn = await open(server.uri)
    await conn.write(Buffer.from('{}'))

    expect(conn.kind).toBe('local')
    expect(conn.describe()).toBe(`local socket ${path}`)
    expect((await readBytes(conn, 2)).toString('utf-8')).toBe('{}')
  })

  it('dials the parsed endpoint', async () => {
    const server = await serve({ port: 0 }, echo)
    const port = portOf(server.uri)
    const dial = vi.fn<DialFn>(() => netConnect({ host: '127.0.0.1', port }))

    await open(`tcp://127.0.0.1:${port}`, { dial })

    expect(dial).toHaveBeenCalledWith({ kind: 'tcp', host: '127.0.0.1', port })
  })

  it('rejects an unsupported scheme without dialing', async () => {
    const dial = vi.fn<DialFn>()

    await expect(connect('ftp://host', { dial })).rejects.toBeInstanceOf(InvalidAddressError)
    expect(dial).not.toHaveBeenCalled()
  })

  it('reports a refused TCP connection with a hint', async () => {
    const probe = await startServer({ port: 0 }, echo)
    const port = portOf(probe.uri)
    await probe.close()

    const attempt = connect(`tcp://127.0.0.1:${port}`)

    await expect(attempt).rejects.toBeInstanceOf(IoFailureError)
    await expect(attempt).rejects.toMatchObject({ kind: 'IoFailure', code: 'ECONNREFUSED' })
    await expect(attempt).rejects.toThrow(
      `could not connect to tcp 127.0.0.1:${port} (nothing is listening on that port)`
    )
  })

  it('reports a missing socket file with a hint', async () => {
    const path = join(tmpdir(), `stdio-bridge-missing-${process.pid}.sock`)

    const attempt = connect(`local://${path}`)

    await expect(attempt).rejects.toMatchObject({ code: 'ENOENT' })
    await expect(attempt).rejects.toThrow(
      `could not connect to local socket ${path} (socket file does not exist)`
    )
  })

  it('wraps a dialer that throws', async () => {
    const dial: DialFn = () => {
      throw new Error('dial exploded')
    }

    await expect(connect('tcp://127.0.0.1:9000', { dial })).rejects.toThrow(
      'could not connect to tcp 127.0.0.1:9000: dial exploded'
    )
  })
})

describe('Connection', () => {
  it('duplicates share one socket', async () => {
    const server = await serve({ port: 0 }, echo)
    const conn = await open(server.uri)

    const dup = conn.duplicate()
    await dup.write(Buffer.from('abc'))

    expect(dup).not.toBe(conn)
    expect(dup.kind).toBe('tcp')
    expect((await readBytes(conn, 3)).toString('utf-8')).toBe('abc')

    dup.shutdown('both')

    expect(conn.closed).toBe(true)
    expect(await conn.read()).toBeNull()
  })

  it('shutdown("both") ends a pending read', async () => {
    const server = await serve({ port: 0 }, echo)
    const conn = await open(server.uri)
    const interrupt = conn.duplicate()

    const pending = conn.read()
    await tick()
    interrupt.shutdown('both')

    expect(await pending).toBeNull()
  })

  it('shutdown("write") half-closes and keeps receiving', async () => {
    const server = await serve(
      { port: 0 },
      (socket) => {
        const chunks: Buffer[] = []
        socket.on('data', (c: Buffer) => chunks.push(c))
        socket.on('end', () => socket.end(Buffer.concat([Buffer.from('got '), ...chunks])))
      },
      { allowHalfOpen: true }
    )
    const conn = await open(server.uri)

    await conn.write(Buffer.from('hello'))
    conn.shutdown('write')

    expect(conn.closed).toBe(false)
    expect((await readToEnd(conn)).toString('utf-8')).toBe('got hello')
  })

  it('shutdown is idempotent', async () => {
    const server = await serve({ port: 0 }, echo)
    const conn = await open(server.uri)

    conn.shutdown('write')
    conn.shutdown('write')
    conn.shutdown('both')
    conn.shutdown('both')
    conn.shutdown('read')

    expect(conn.closed).toBe(true)
  })

  it('fails writes after shutdown', async () => {
    const server = await serve({ port: 0 }, echo)
    const conn = await open(server.uri)

    conn.shutdown('both')

    const attempt = conn.write(Buffer.from('{}'))
    await expect(attempt).rejects.toBeInstanceOf(IoFailureError)
    await expect(attempt).rejects.toThrow(
      `could not write to ${conn.describe()}: Output stream unavailable: destroyed`
    )
  })

  it('returns null once the server closes', async () => {
    const server = await serve({ port: 0 }, (socket) => socket.end('bye'))
    const conn = await open(server.uri)

    expect((await readToEnd(conn)).toString('utf-8')).toBe('bye')
    expect(await conn.read()).toBeNull()
  })

  it('logs a socket error and rethrows it from the next read', async () => {
    const server = await serve({ port: 0 }, echo)
    const dialed: Socket[] = []
    const dial: DialFn = () => {
      const socket = netConnect({ host: '127.0.0.1', port: portOf(server.uri) })
      dialed.push(socket)
      return socket
    }
    const { logger, lines } = recordingLogger()
    const conn = await open(server.uri, { dial, logger })

    dialed[0].destroy(new Error('boom'))
    await tick()

    expect(lines).toContain(
      '[stdio-bridge] 2024-01-01T00:00:00.000Z DEBUG socket error {"message":"boom"}\n'
    )
    await expect(conn.read()).rejects.toThrow(`could not read from ${conn.describe()}: boom`)
  })
})
