/**
 * ASCII Caesar cipher.
 *
 * Every byte is shifted by the key modulo the 128-symbol ASCII alphabet:
 *
 *   E(b) = (b + k) mod 128
 *   D(b) = (b + (128 - k)) mod 128
 *
 * The modulo is Euclidean, so a negative key is the same as its positive
 * complement and `applyCaesarCipher(x, -k)` undoes `applyCaesarCipher(x, k)`.
 */

import type { Writable } from 'node:stream'
import { finished } from 'node:stream/promises'
import { describeError, logger } from '../logger.ts'
import { err, ok } from '../types.ts'
import type { ByteSource, CipherError, CipherFailure, Result } from '../types.ts'

/** Number of ASCII code points; every ordinal is taken modulo this value. */
export const ASCII_ALPHABET_SIZE = 128

/** Reduces any integer key into [0, 127]. */
export function normalizeKey(key: number): number {
  return ((key % ASCII_ALPHABET_SIZE) + ASCII_ALPHABET_SIZE) % ASCII_ALPHABET_SIZE
}

/** The key that decrypts text enciphered with `key`. */
export function inverseKey(key: number): number {
  return (ASCII_ALPHABET_SIZE - normalizeKey(key)) % ASCII_ALPHABET_SIZE
}

export function shiftByte(byte: number, key: number): number {
  return (byte + normalizeKey(key)) % ASCII_ALPHABET_SIZE
}

export function applyCaesarCipher(bytes: Uint8Array, key: number): Uint8Array {
  const shift = normalizeKey(key)
  const out = new Uint8Array(bytes.length)
  for (let i = 0; i < bytes.length; i++) {
    out[i] = ((bytes[i] ?? 0) + shift) % ASCII_ALPHABET_SIZE
  }
  return out
}

/** String convenience wrapper; characters are read and written as latin1. */
export function applyCaesarCipherToText(text: string, key: number): string {
  const shifted = applyCaesarCipher(Buffer.from(text, 'latin1'), key)
  return Buffer.from(shifted).toString('latin1')
}

// ── Streaming ───────────────────────────────────────────────────────────────

function writeChunk(sink: Writable, chunk: Uint8Array): Promise<Result<void>> {
  return new Promise((resolve) => {
    sink.write(chunk, (e) => {
      resolve(e === undefined || e === null ? ok(undefined) : err(e))
    })
  })
}

const CIPHER_FAILURE_MESSAGES: Readonly<Record<CipherFailure, string>> = {
  'bad-input-stream': 'bad input stream',
  'bad-output-stream': 'bad output stream',
}

/** Resolves once a destroyed sink has emitted 'close'. */
async function waitForClose(sink: Writable): Promise<void> {
  try {
    await finished(sink)
  } catch (e) {
    logger.debug('Cipher output stream closed', { error: describeError(e) })
  }
}

/**
 * Enciphers `source` chunk by chunk into `sink`. Returns the number of bytes
 * written. An empty source succeeds with 0.
 *
 * The sink is not ended, so callers may pass process.stdout.
 */
export async function caesarCipherStream(
  source: ByteSource,
  sink: Writable,
  key: number,
): Promise<Result<number, CipherError>> {
  if (sink.destroyed || !sink.writable) {
    return err({ kind: 'bad-output-stream', message: CIPHER_FAILURE_MESSAGES['bad-output-stream'] })
  }

  // A failed write is reported through the write callback. The listener
  // stays attached until the sink has closed, since a file stream emits its
  // 'error' only after releasing the descriptor.
  let sinkError: unknown = null
  const onSinkError = (e: unknown): void => {
    sinkError = e
  }
  sink.on('error', onSinkError)

  let failure: CipherFailure | null = null
  let written = 0
  try {
    for await (const chunk of source) {
      const shifted = applyCaesarCipher(chunk, key)
      const result = await writeChunk(sink, shifted)
      if (!result.ok) {
        logger.warn('Cipher output write failed', { written, error: result.error.message })
        failure = 'bad-output-stream'
        break
      }
      written += shifted.length
    }
  } catch (e) {
    logger.warn('Cipher input read failed', { written, error: describeError(e) })
    failure = 'bad-input-stream'
  }

  if (failure === null && sinkError !== null) {
    logger.warn('Cipher output stream errored', { written, error: describeError(sinkError) })
    failure = 'bad-output-stream'
  }
  if (failure === 'bad-output-stream' && sink.destroyed) {
    await waitForClose(sink)
  }
  sink.off('error', onSinkError)

  if (failure !== null) {
    return err({ kind: failure, message: CIPHER_FAILURE_MESSAGES[failure] })
  }

  logger.debug('Cipher stream complete', { bytes: written })
  return ok(written)
}
