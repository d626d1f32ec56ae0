/**
 * Frequency-analysis attack.
 *
 * One pass builds a 128-bucket histogram for each of the 128 key hypotheses.
 * Each histogram is normalised by the byte count and compared to the
 * reference English distribution with the Manhattan (L1) distance. Every key
 * whose distance equals the minimum survives with score 1; equality is exact
 * floating-point equality, evaluated over keys in ascending order.
 */

import { ASCII_ALPHABET_SIZE, inverseKey } from '../cipher/caesar.ts'
import { drainSource } from '../byte-source.ts'
import { ASCII_ENGLISH_FREQUENCIES } from '../corpus/frequencies.ts'
import { logger } from '../logger.ts'
import type { ByteSource, MinDistanceScores } from '../types.ts'

const DECRYPT_SHIFTS: readonly number[] = Array.from(
  { length: ASCII_ALPHABET_SIZE },
  (_, key) => inverseKey(key),
)

/** Sum of absolute bucket differences, accumulated in bucket order. */
export function manhattanDistance(
  observed: ArrayLike<number>,
  reference: readonly number[] = ASCII_ENGLISH_FREQUENCIES,
): number {
  let sum = 0
  for (let i = 0; i < ASCII_ALPHABET_SIZE; i++) {
    sum += Math.abs((observed[i] ?? 0) - (reference[i] ?? 0))
  }
  return sum
}

export class FrequencyScanner {
  /** Row `key` holds the histogram of the decryption under that key. */
  private readonly counts = new Uint32Array(ASCII_ALPHABET_SIZE * ASCII_ALPHABET_SIZE)
  private total = 0

  processChunk(chunk: Uint8Array): void {
    for (const byte of chunk) {
      for (let key = 0; key < ASCII_ALPHABET_SIZE; key++) {
        const shifted = (byte + (DECRYPT_SHIFTS[key] ?? 0)) % ASCII_ALPHABET_SIZE
        const bucket = key * ASCII_ALPHABET_SIZE + shifted
        this.counts[bucket] = (this.counts[bucket] ?? 0) + 1
      }
    }
    this.total += chunk.length
  }

  /** Normalised distribution of the decryption under `key`. */
  distribution(key: number): Float64Array {
    const row = this.counts.subarray(key * ASCII_ALPHABET_SIZE, (key + 1) * ASCII_ALPHABET_SIZE)
    const freqs = new Float64Array(ASCII_ALPHABET_SIZE)
    row.forEach((count, i) => {
      freqs[i] = count / this.total
    })
    return freqs
  }

  finish(): MinDistanceScores {
    if (this.total === 0) {
      return { kind: 'min-distance', scores: new Map(), distance: null }
    }

    const scores = new Map<number, number>()
    let minDistance = Number.POSITIVE_INFINITY
    for (let key = 0; key < ASCII_ALPHABET_SIZE; key++) {
      const distance = manhattanDistance(this.distribution(key))
      if (distance < minDistance) {
        scores.clear()
        scores.set(key, 1)
        minDistance = distance
      } else if (distance === minDistance) {
        scores.set(key, 1)
      }
    }
    return { kind: 'min-distance', scores, distance: minDistance }
  }
}

/**
 * Returns the key(s) whose decryption of `ciphertext` is closest to English
 * by character distribution. Empty or unreadable input yields an empty map.
 */
export async function asciiFrequencyAnalysisAttack(
  ciphertext: ByteSource,
): Promise<MinDistanceScores> {
  const scanner = new FrequencyScanner()
  const bytes = await drainSource(ciphertext, (chunk) => scanner.processChunk(chunk), 'ciphertext')
  const result = scanner.finish()

  logger.debug('Frequency attack complete', {
    bytes,
    keys: [...result.scores.keys()],
    distance: result.distance,
  })
  return result
}
