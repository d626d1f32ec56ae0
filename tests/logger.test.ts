/**
 * Tests for log-level filtering.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { logger, setLogLevel, getLogLevel, describeError } from '../src/logger.ts'

function silence(stream: NodeJS.WriteStream) {
  return vi.spyOn(stream, 'write').mockImplementation(() => true)
}

describe('Logger level filtering', () => {
  let stderrWrite: ReturnType<typeof silence>
  let stdoutWrite: ReturnType<typeof silence>

  beforeEach(() => {
    stderrWrite = silence(process.stderr)
    stdoutWrite = silence(process.stdout)
  })

  afterEach(() => {
    stderrWrite.mockRestore()
    stdoutWrite.mockRestore()
    setLogLevel('error')
  })

  it('suppresses debug and info when level=warn', () => {
    setLogLevel('warn')
    logger.debug('hidden')
    logger.info('hidden')
    expect(stderrWrite).not.toHaveBeenCalled()
  })

  it('emits warn and error when level=warn', () => {
    setLogLevel('warn')
    logger.warn('visible')
    logger.error('visible')
    expect(stderrWrite).toHaveBeenCalledTimes(2)
  })

  it('emits all levels to stderr only when level=debug', () => {
    setLogLevel('debug')
    logger.debug('d')
    logger.info('i')
    logger.warn('w')
    logger.error('e')
    expect(stderrWrite).toHaveBeenCalledTimes(4)
    expect(stdoutWrite).not.toHaveBeenCalled()
  })

  it('writes one JSON line with level, msg and context', () => {
    setLogLevel('info')
    logger.info('scan done', { bytes: 12 })
    const line = String(stderrWrite.mock.calls[0]?.[0])
    expect(line.endsWith('\n')).toBe(true)
    const parsed: unknown = JSON.parse(line)
    expect(parsed).toMatchObject({ level: 'info', msg: 'scan done', bytes: 12 })
  })

  it('getLogLevel returns the current level', () => {
    setLogLevel('error')
    expect(getLogLevel()).toBe('error')
    setLogLevel('debug')
    expect(getLogLevel()).toBe('debug')
  })
})

describe('describeError', () => {
  it('uses the message of an Error and stringifies anything else', () => {
    expect(describeError(new Error('boom'))).toBe('boom')
    expect(describeError(42)).toBe('42')
  })
})
