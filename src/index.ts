export {
  ASCII_ALPHABET_SIZE,
  applyCaesarCipher,
  applyCaesarCipherToText,
  caesarCipherStream,
  inverseKey,
  normalizeKey,
  shiftByte,
} from './cipher/caesar.ts'
export { asciiDictionaryAttack, DictionaryScanner } from './cracker/dictionary-attack.ts'
export { asciiFrequencyAnalysisAttack, FrequencyScanner, manhattanDistance } from './cracker/frequency-attack.ts'
export { findProbableKeys } from './cracker/selection.ts'
export { ASCII_ENGLISH_FREQUENCIES } from './corpus/frequencies.ts'
export { bundledDictionaryPath, loadWordSet } from './corpus/dictionary.ts'
export { drainSource, fromBytes, fromText } from './byte-source.ts'
export { loadConfig } from './config.ts'
export type { Config } from './config.ts'
export { logger, setLogLevel, getLogLevel } from './logger.ts'
export type { LogLevel } from './logger.ts'
export { ok, err } from './types.ts'
export type {
  AttackScores,
  ByteSource,
  CipherError,
  CipherFailure,
  KeyScoreMap,
  MinDistanceScores,
  Result,
  WordHitScores,
} from './types.ts'
