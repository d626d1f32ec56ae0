/**
 * Tests for config loading.
 */

import { describe, it, expect } from 'vitest'
import { loadConfig } from '../src/config.ts'
import { bundledDictionaryPath } from '../src/corpus/dictionary.ts'

describe('loadConfig', () => {
  it('defaults to warn and the bundled dictionary', () => {
    const result = loadConfig({})
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value.logLevel).toBe('warn')
    expect(result.value.dictionaryPath).toBe(bundledDictionaryPath())
  })

  it('accepts every valid LOG_LEVEL', () => {
    for (const level of ['debug', 'info', 'warn', 'error'] as const) {
      const result = loadConfig({ LOG_LEVEL: level })
      expect(result.ok).toBe(true)
      if (result.ok) expect(result.value.logLevel).toBe(level)
    }
  })

  it('falls back to warn for an unknown LOG_LEVEL', () => {
    const result = loadConfig({ LOG_LEVEL: 'verbose' })
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value.logLevel).toBe('warn')
  })

  it('uses CAESAR_DICTIONARY when set', () => {
    const result = loadConfig({ CAESAR_DICTIONARY: '/tmp/words.txt' })
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value.dictionaryPath).toBe('/tmp/words.txt')
  })

  it('rejects an empty CAESAR_DICTIONARY', () => {
    const result = loadConfig({ CAESAR_DICTIONARY: '  ' })
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.message).toContain('CAESAR_DICTIONARY')
  })

  it('reads bundledDictionaryPath as a .txt file inside data/', () => {
    expect(bundledDictionaryPath().endsWith('/data/popular-words.txt')).toBe(true)
  })
})
