/**
 * Word-list loading for the dictionary attack.
 *
 * A word list is newline-separated text. Each line becomes exactly one set
 * entry, byte for byte: nothing is trimmed or case-folded, so a CRLF file
 * yields entries ending in '\r' and a capitalised entry never matches (the
 * attack lowercases candidate words before lookup). A trailing newline does
 * not produce an extra empty entry.
 */

import { fileURLToPath } from 'node:url'
import { drainSource } from '../byte-source.ts'
import { logger } from '../logger.ts'
import type { ByteSource } from '../types.ts'

const BUNDLED_DICTIONARY_URL = new URL('../../data/popular-words.txt', import.meta.url)

/** Absolute path of the popular-English-words list shipped with the package. */
export function bundledDictionaryPath(): string {
  return fileURLToPath(BUNDLED_DICTIONARY_URL)
}

/**
 * Splits a byte stream into '\n'-terminated lines, holding back a partial
 * line across chunk boundaries until the next chunk or `flush()`.
 */
export class LineSplitter {
  private pending = ''

  /** Returns the lines completed by this chunk (may be empty). */
  processChunk(chunk: Uint8Array): string[] {
    this.pending += Buffer.from(chunk).toString('latin1')
    const lines = this.pending.split('\n')
    this.pending = lines.pop() ?? ''
    return lines
  }

  /** Returns the unterminated final line, if any. */
  flush(): string[] {
    if (this.pending.length === 0) return []
    const last = this.pending
    this.pending = ''
    return [last]
  }
}

export async function loadWordSet(source: ByteSource): Promise<ReadonlySet<string>> {
  const words = new Set<string>()
  const splitter = new LineSplitter()
  const bytes = await drainSource(
    source,
    (chunk) => {
      for (const line of splitter.processChunk(chunk)) words.add(line)
    },
    'dictionary',
  )
  for (const line of splitter.flush()) words.add(line)

  logger.debug('Dictionary loaded', { bytes, words: words.size })
  return words
}
