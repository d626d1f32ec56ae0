/**
 * Configuration loader.
 *
 * Optional env vars:
 *   LOG_LEVEL          – debug | info | warn | error (default warn)
 *   CAESAR_DICTIONARY  – word list used by `crack --bundled-dict`
 *                        (default data/popular-words.txt)
 */

import { bundledDictionaryPath } from './corpus/dictionary.ts'
import { err, ok } from './types.ts'
import type { Result } from './types.ts'

export interface Config {
  readonly logLevel: 'debug' | 'info' | 'warn' | 'error'
  readonly dictionaryPath: string
}

type LogLevel = Config['logLevel']
const LOG_LEVELS: ReadonlySet<string> = new Set<LogLevel>(['debug', 'info', 'warn', 'error'])

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.has(value)
}

const DEFAULT_LOG_LEVEL: LogLevel = 'warn'

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Result<Config> {
  const rawLevel = env.LOG_LEVEL ?? DEFAULT_LOG_LEVEL
  const logLevel: LogLevel = isLogLevel(rawLevel) ? rawLevel : DEFAULT_LOG_LEVEL

  const dictionaryPath = env.CAESAR_DICTIONARY ?? bundledDictionaryPath()
  if (dictionaryPath.trim() === '') {
    return err(new Error('CAESAR_DICTIONARY must name a file when set'))
  }

  return ok({ logLevel, dictionaryPath })
}
