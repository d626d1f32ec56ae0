/**
 * Byte-source draining.
 *
 * Attacks read their input exactly once, front to back. A source that throws
 * (unreadable file, destroyed stream, I/O fault mid-read) is treated as having
 * ended at that point: whatever was read before the failure still counts, and
 * a source that fails before yielding anything reads as empty.
 */

import { describeError, logger } from './logger.ts'
import type { ByteSource } from './types.ts'

/**
 * Feeds every chunk of `source` to `onChunk` in order and returns the total
 * number of bytes delivered. Never rejects because of the source.
 */
export async function drainSource(
  source: ByteSource,
  onChunk: (chunk: Uint8Array) => void,
  label = 'input',
): Promise<number> {
  let bytesRead = 0
  try {
    for await (const chunk of source) {
      onChunk(chunk)
      bytesRead += chunk.length
    }
  } catch (e) {
    logger.warn('Byte source failed; treating as end of input', {
      source: label,
      bytesRead,
      error: describeError(e),
    })
  }
  return bytesRead
}

/** One-chunk source over a latin1 string (one byte per character). */
export function fromText(text: string): ByteSource {
  return fromBytes(Buffer.from(text, 'latin1'))
}

export function fromBytes(bytes: Uint8Array): ByteSource {
  return bytes.length === 0 ? [] : [bytes]
}
