import { afterEach, describe, expect, it, vi } from 'vitest'
import { claimStdout, releaseStdoutForTest, strayExcerpt } from '../../src/ipc/stdout-guard.js'

afterEach(() => {
  releaseStdoutForTest()
  vi.restoreAllMocks()
})

describe('claimStdout', () => {
  it('write goes to the real stdout.write', () => {
    const stdoutSpy = vi.spyOn(process.stdout, 'write').mockReturnValue(true)

    const { write } = claimStdout()
    const data = Buffer.from('Content-Length: 2\r\n\r\n{}', 'latin1')
    write(data)

    expect(stdoutSpy).toHaveBeenCalledTimes(1)
    expect(stdoutSpy).toHaveBeenCalledWith(data)
  })

  it('write reports backpressure from stdout', () => {
    vi.spyOn(process.stdout, 'write').mockReturnValue(false)

    const { write } = claimStdout()

    expect(write(Buffer.from('{}'))).toBe(false)
  })

  it('exposes process.stdout for stream events', () => {
    expect(claimStdout().stream).toBe(process.stdout)
  })

  it('moves stray stdout writes to stderr behind a notice', () => {
    const stderrSpy = vi.spyOn(process.stderr, 'write').mockReturnValue(true)

    claimStdout()
    process.stdout.write('debug output from a dependency\n')

    expect(stderrSpy.mock.calls.map((call) => call[0])).toEqual([
      '[stdio-bridge] stray stdout write moved to stderr: debug output from a dependency\\n\n',
      'debug output from a dependency\n'
    ])
  })

  it('forwards the encoding and callback of a stray write', () => {
    const stderrSpy = vi.spyOn(process.stderr, 'write').mockReturnValue(true)
    const cb = vi.fn()

    claimStdout()
    process.stdout.write('test', 'utf-8', cb)

    expect(stderrSpy.mock.calls[1]).toEqual(['test', 'utf-8', cb])
  })

  it('forwards a callback passed in place of the encoding', () => {
    const stderrSpy = vi.spyOn(process.stderr, 'write').mockReturnValue(true)
    const cb = vi.fn()

    claimStdout()
    process.stdout.write('test', cb)

    expect(stderrSpy.mock.calls[1]).toEqual(['test', cb])
  })

  it('reports stray writes as accepted even when stderr is full', () => {
    vi.spyOn(process.stderr, 'write').mockReturnValue(false)

    claimStdout()

    expect(process.stdout.write('stray data')).toBe(true)
  })

  it('refuses a second claim', () => {
    claimStdout()

    expect(() => claimStdout()).toThrow('stdout is already claimed by this process')
  })

  it('restores stdout.write on release', () => {
    const before = process.stdout.write

    claimStdout()
    expect(process.stdout.write).not.toBe(before)

    releaseStdoutForTest()
    expect(process.stdout.write).toBe(before)
    expect(() => claimStdout()).not.toThrow()
  })
})

describe('strayExcerpt', () => {
  it('escapes newlines', () => {
    expect(strayExcerpt('a\nb\n')).toBe('a\\nb\\n')
  })

  it('decodes binary chunks as UTF-8', () => {
    expect(strayExcerpt(Buffer.from('line1\nline2'))).toBe('line1\\nline2')
  })

  it('keeps at most 200 characters', () => {
    expect(strayExcerpt('x'.repeat(500))).toBe('x'.repeat(200))
  })
})
