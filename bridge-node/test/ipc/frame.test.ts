import { describe, expect, it } from 'vitest'
import { describeFrame, encodeFrame, type Frame, HEADER_TERMINATOR, writeFrame } from '../../src/ipc/frame.js'
import { CollectingSink } from '../_harness.js'

function makeFrame(headers = 'Content-Length: 8\r\n\r\n', body = '{"id":1}'): Frame {
  return { headers: Buffer.from(headers, 'latin1'), body: Buffer.from(body, 'utf-8') }
}

describe('HEADER_TERMINATOR', () => {
  it('is a blank line', () => {
    expect([...HEADER_TERMINATOR]).toEqual([0x0d, 0x0a, 0x0d, 0x0a])
  })
})

describe('encodeFrame', () => {
  it('concatenates headers and body', () => {
    expect(encodeFrame(makeFrame()).toString('latin1')).toBe('Content-Length: 8\r\n\r\n{"id":1}')
  })
})

describe('writeFrame', () => {
  it('writes headers, then body, as two writes', async () => {
    const sink = new CollectingSink()

    await writeFrame(sink, makeFrame())

    expect(sink.writes.map((w) => w.toString('latin1'))).toEqual([
      'Content-Length: 8\r\n\r\n',
      '{"id":1}'
    ])
  })

  it('does not write the body if the header write fails', async () => {
    const writes: Uint8Array[] = []
    let calls = 0
    const sink = {
      async write(data: Uint8Array): Promise<void> {
        calls++
        if (calls === 1) throw new Error('broken pipe')
        writes.push(data)
      }
    }

    await expect(writeFrame(sink, makeFrame())).rejects.toThrow('broken pipe')
    expect(writes).toHaveLength(0)
  })
})

describe('describeFrame', () => {
  it('lists non-empty header lines and the body text', () => {
    const frame = makeFrame('Content-Length: 8\r\nContent-Type: json\r\n\r\n')

    expect(describeFrame(frame)).toBe(
      'Frame(["Content-Length: 8","Content-Type: json"], "{\\"id\\":1}")'
    )
  })

  it('replaces invalid UTF-8 in the body', () => {
    const frame: Frame = {
      headers: Buffer.from('H: 1\r\n\r\n', 'latin1'),
      body: Buffer.from([0x7b, 0xff, 0x7d])
    }

    expect(describeFrame(frame)).toBe('Frame(["H: 1"], "{�}")')
  })
})
