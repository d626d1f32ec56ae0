/**
 * `crack`: recover the most probable key(s) of ASCII Caesar ciphertext.
 *
 * Reads ciphertext from a file or stdin, runs exactly one attack, and prints
 * every key tied for the best score. Frequency analysis is the default; a
 * dictionary attack runs only when a word list is requested.
 */

import { parseArgs } from 'node:util'
import type { Readable } from 'node:stream'
import { applyCaesarCipher, inverseKey } from '../cipher/caesar.ts'
import { asciiDictionaryAttack } from '../cracker/dictionary-attack.ts'
import { asciiFrequencyAnalysisAttack } from '../cracker/frequency-attack.ts'
import { findProbableKeys } from '../cracker/selection.ts'
import { describeError, logger } from '../logger.ts'
import { openInputFile, printError, recordingSource } from './io.ts'
import type { Config } from '../config.ts'
import type { CliIO } from './io.ts'
import type { AttackScores, ByteSource } from '../types.ts'

export const CRACK_USAGE = [
  'usage: crack [OPTION]...',
  'find the key(s) with the highest probability of deciphering the ciphertext',
  '\t-c, --ciphertext FILE\n\t\tfile containing ciphertext (default: stdin)',
  '\t-d, --dict-attack DICT_FILE\n\t\tperform a dictionary attack',
  '\t-b, --bundled-dict\n\t\tperform a dictionary attack with the bundled word list',
  '\t-f, --freq-attack\n\t\tperform a frequency analysis attack (default)',
  '\t-p, --plaintext\n\t\tprint the decryption under each probable key',
  '\t-h, --help\n\t\tprint this help page',
].join('\n')

function parseCrackArgs(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    options: {
      ciphertext: { type: 'string', short: 'c' },
      'dict-attack': { type: 'string', short: 'd' },
      'bundled-dict': { type: 'boolean', short: 'b' },
      'freq-attack': { type: 'boolean', short: 'f' },
      plaintext: { type: 'boolean', short: 'p' },
      help: { type: 'boolean', short: 'h' },
    },
    strict: true,
    allowPositionals: false,
  })
}

export function formatProbableKeys(keys: readonly number[]): string {
  if (keys.length === 0) return 'no viable key found'
  return `most probable key(s): ${keys.join(' ')}`
}

export async function runCrack(argv: readonly string[], io: CliIO, config: Config): Promise<number> {
  let parsed: ReturnType<typeof parseCrackArgs>
  try {
    parsed = parseCrackArgs(argv)
  } catch (e) {
    printError(io, describeError(e))
    return 1
  }
  const { values } = parsed

  if (values.help === true) {
    io.stdout.write(CRACK_USAGE + '\n')
    return 0
  }

  const dictFile = values['dict-attack']
  const attacksRequested = [dictFile !== undefined, values['bundled-dict'] === true, values['freq-attack'] === true]
    .filter(Boolean).length
  if (attacksRequested > 1) {
    printError(io, 'you can only specify one attack algorithm per run')
    return 1
  }

  let ciphertextStream: Readable | undefined
  let ciphertext: ByteSource = io.stdin
  if (values.ciphertext !== undefined) {
    const opened = await openInputFile(values.ciphertext)
    if (!opened.ok) {
      printError(io, `unable to open ciphertext file "${values.ciphertext}"`)
      return 1
    }
    ciphertextStream = opened.value
    ciphertext = ciphertextStream
  }

  const recorded: Uint8Array[] = []
  if (values.plaintext === true) {
    ciphertext = recordingSource(ciphertext, recorded)
  }

  const dictionaryPath = dictFile ?? (values['bundled-dict'] === true ? config.dictionaryPath : undefined)
  let scores: AttackScores
  if (dictionaryPath !== undefined) {
    const dictionary = await openInputFile(dictionaryPath)
    if (!dictionary.ok) {
      ciphertextStream?.destroy()
      printError(io, `unable to open dictionary file "${dictionaryPath}", verify you gave a valid path`)
      return 1
    }
    logger.info('Running dictionary attack', { dictionary: dictionaryPath })
    scores = await asciiDictionaryAttack(ciphertext, dictionary.value)
    // An empty word list ends the attack before the ciphertext is read.
    ciphertextStream?.destroy()
  } else {
    logger.info('Running frequency analysis attack')
    scores = await asciiFrequencyAnalysisAttack(ciphertext)
  }

  const keys = findProbableKeys(scores.scores)
  io.stdout.write(formatProbableKeys(keys) + '\n')

  if (values.plaintext === true && keys.length > 0) {
    const bytes = Buffer.concat(recorded)
    for (const key of keys) {
      const plain = Buffer.from(applyCaesarCipher(bytes, inverseKey(key))).toString('latin1')
      io.stdout.write(`key ${key}: ${plain}\n`)
    }
  }
  return 0
}
