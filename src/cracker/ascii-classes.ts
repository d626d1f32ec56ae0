/**
 * C-locale character classes over the 128 ASCII code points, as lookup
 * tables so the per-byte, per-key inner loops stay branch-light.
 */

import { ASCII_ALPHABET_SIZE } from '../cipher/caesar.ts'

function buildTable(predicate: (code: number) => boolean): readonly boolean[] {
  return Object.freeze(Array.from({ length: ASCII_ALPHABET_SIZE }, (_, code) => predicate(code)))
}

/** [0-9A-Za-z] */
export const IS_ALNUM = buildTable(
  (c) => (c >= 0x30 && c <= 0x39) || (c >= 0x41 && c <= 0x5a) || (c >= 0x61 && c <= 0x7a),
)

/** Space, \t, \n, \v, \f, \r */
export const IS_SPACE = buildTable((c) => c === 0x20 || (c >= 0x09 && c <= 0x0d))

/** Lowercased single-character string for each of the 128 code points. */
export const LOWER_CHAR: readonly string[] = Object.freeze(
  Array.from({ length: ASCII_ALPHABET_SIZE }, (_, c) => String.fromCharCode(c).toLowerCase()),
)
