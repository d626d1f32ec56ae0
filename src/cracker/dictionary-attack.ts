/**
 * Dictionary attack.
 *
 * Runs all 128 key hypotheses side by side in one pass over the ciphertext.
 * Each hypothesis keeps its own in-progress word: alphanumeric characters of
 * its decryption are lowercased and appended, and a whitespace character
 * closes the word, scoring it if the dictionary holds it. Any other
 * character (punctuation, control codes) neither closes nor extends the
 * word, so "foo,bar " scores as the single word "foobar".
 *
 * When the input ends, every hypothesis with a non-empty word scores it once
 * more without needing trailing whitespace.
 */

import { ASCII_ALPHABET_SIZE, inverseKey } from '../cipher/caesar.ts'
import { drainSource } from '../byte-source.ts'
import { loadWordSet } from '../corpus/dictionary.ts'
import { logger } from '../logger.ts'
import { IS_ALNUM, IS_SPACE, LOWER_CHAR } from './ascii-classes.ts'
import type { ByteSource, KeyScoreMap, WordHitScores } from '../types.ts'

/** Decryption shift for each candidate key, indexed by key. */
const DECRYPT_SHIFTS: readonly number[] = Array.from(
  { length: ASCII_ALPHABET_SIZE },
  (_, key) => inverseKey(key),
)

export class DictionaryScanner {
  private readonly dictionary: ReadonlySet<string>
  private readonly words: string[] = new Array<string>(ASCII_ALPHABET_SIZE).fill('')
  private readonly hits = new Uint32Array(ASCII_ALPHABET_SIZE)

  constructor(dictionary: ReadonlySet<string>) {
    this.dictionary = dictionary
  }

  processChunk(chunk: Uint8Array): void {
    for (const byte of chunk) {
      for (let key = 0; key < ASCII_ALPHABET_SIZE; key++) {
        const shifted = (byte + (DECRYPT_SHIFTS[key] ?? 0)) % ASCII_ALPHABET_SIZE
        const word = this.words[key] ?? ''

        if (IS_ALNUM[shifted] === true) {
          this.words[key] = word + (LOWER_CHAR[shifted] ?? '')
        } else if (word !== '' && IS_SPACE[shifted] === true) {
          this.score(key, word)
          this.words[key] = ''
        }
      }
    }
  }

  /** Scores the trailing words and returns the sparse result. */
  flush(): KeyScoreMap {
    for (let key = 0; key < ASCII_ALPHABET_SIZE; key++) {
      const word = this.words[key] ?? ''
      if (word !== '') this.score(key, word)
      this.words[key] = ''
    }

    const scores = new Map<number, number>()
    this.hits.forEach((count, key) => {
      if (count > 0) scores.set(key, count)
    })
    return scores
  }

  private score(key: number, word: string): void {
    if (this.dictionary.has(word)) {
      this.hits[key] = (this.hits[key] ?? 0) + 1
    }
  }
}

/**
 * Scores every candidate key by the number of dictionary words its
 * decryption of `ciphertext` produces.
 *
 * The dictionary is read in full first. An empty or unreadable dictionary,
 * or an empty or unreadable ciphertext, yields an empty map; nothing throws.
 */
export async function asciiDictionaryAttack(
  ciphertext: ByteSource,
  wordlist: ByteSource,
): Promise<WordHitScores> {
  const dictionary = await loadWordSet(wordlist)
  if (dictionary.size === 0) {
    logger.debug('Dictionary is empty; no key can score')
    return { kind: 'word-hits', scores: new Map() }
  }

  const scanner = new DictionaryScanner(dictionary)
  const bytes = await drainSource(ciphertext, (chunk) => scanner.processChunk(chunk), 'ciphertext')
  const scores = scanner.flush()

  logger.debug('Dictionary attack complete', { bytes, keysScored: scores.size })
  return { kind: 'word-hits', scores }
}
