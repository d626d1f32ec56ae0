/**
 * Reference ASCII character distribution of English text.
 *
 * 128 relative frequencies, one per code point, summing to ~1. Printable
 * characters that rarely occur in prose and all control characters except
 * newline sit at or near zero; space dominates at ~0.168.
 *
 * The table is read once from data/ascii-char-frequencies.json at module
 * load, validated, and frozen.
 */

import { readFileSync } from 'node:fs'
import { ASCII_ALPHABET_SIZE } from '../cipher/caesar.ts'

const TABLE_URL = new URL('../../data/ascii-char-frequencies.json', import.meta.url)

/**
 * Validates a parsed JSON value as a 128-entry frequency table.
 * Throws on a malformed table: the file ships with the package, so a bad
 * table is a packaging defect, not a runtime condition.
 */
export function parseFrequencyTable(value: unknown): readonly number[] {
  if (!Array.isArray(value) || value.length !== ASCII_ALPHABET_SIZE) {
    throw new Error(`Frequency table must be an array of ${ASCII_ALPHABET_SIZE} numbers`)
  }
  const table: number[] = []
  for (const entry of value) {
    if (typeof entry !== 'number' || !Number.isFinite(entry) || entry < 0) {
      throw new Error(`Frequency table entry ${table.length} is not a non-negative number`)
    }
    table.push(entry)
  }
  return Object.freeze(table)
}

export const ASCII_ENGLISH_FREQUENCIES: readonly number[] = parseFrequencyTable(
  JSON.parse(readFileSync(TABLE_URL, 'utf-8')),
)
