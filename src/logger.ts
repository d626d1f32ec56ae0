/**
 * Minimal structured logger.
 *
 * Every entry goes to stderr as one JSON line: stdout belongs to command
 * output (recovered keys, ciphertext), so diagnostics must never mix into it.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

interface LogEntry {
  readonly level: LogLevel
  readonly msg: string
  readonly time: string
  readonly [key: string]: unknown
}

const LEVEL_PRIORITY: Readonly<Record<LogLevel, number>> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

let currentLevel: LogLevel = 'warn'

export function setLogLevel(level: LogLevel): void {
  currentLevel = level
}

export function getLogLevel(): LogLevel {
  return currentLevel
}

function writeLog(level: LogLevel, msg: string, ctx?: Record<string, unknown>): void {
  if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[currentLevel]) return

  const entry: LogEntry = {
    level,
    msg,
    time: new Date().toISOString(),
    ...ctx,
  }
  process.stderr.write(JSON.stringify(entry) + '\n')
}

export const logger = {
  debug(msg: string, ctx?: Record<string, unknown>): void {
    writeLog('debug', msg, ctx)
  },
  info(msg: string, ctx?: Record<string, unknown>): void {
    writeLog('info', msg, ctx)
  },
  warn(msg: string, ctx?: Record<string, unknown>): void {
    writeLog('warn', msg, ctx)
  },
  error(msg: string, ctx?: Record<string, unknown>): void {
    writeLog('error', msg, ctx)
  },
}

/** Renders an unknown thrown value for a log context field. */
export function describeError(e: unknown): string {
  return e instanceof Error ? e.message : String(e)
}
