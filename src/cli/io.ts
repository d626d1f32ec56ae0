/**
 * File and standard-stream plumbing shared by the command-line tools.
 */

import { open } from 'node:fs/promises'
import type { Readable, Writable } from 'node:stream'
import { finished } from 'node:stream/promises'
import { describeError, logger } from '../logger.ts'
import { err, ok } from '../types.ts'
import type { ByteSource, Result } from '../types.ts'

/** Standard streams of a command invocation, injectable for tests. */
export interface CliIO {
  readonly stdin: ByteSource
  readonly stdout: Writable
  readonly stderr: Writable
}

export function printError(io: CliIO, msg: string): void {
  io.stderr.write(`error: ${msg}\n`)
}

/** Type guard for Node.js filesystem errors with a `code` property. */
export function isErrnoException(value: unknown): value is NodeJS.ErrnoException {
  return value instanceof Error && 'code' in value
}

function errorCode(e: unknown): string {
  return isErrnoException(e) && e.code !== undefined ? e.code : describeError(e)
}

/** Opens `path` for reading. The stream closes its handle once drained or destroyed. */
export async function openInputFile(path: string): Promise<Result<Readable>> {
  try {
    const handle = await open(path, 'r')
    return ok(handle.createReadStream())
  } catch (e) {
    logger.debug('Open for reading failed', { path, code: errorCode(e) })
    return err(e instanceof Error ? e : new Error(String(e)))
  }
}

/** Opens (creating or truncating) `path` for writing. */
export async function openOutputFile(path: string): Promise<Result<Writable>> {
  try {
    const handle = await open(path, 'w')
    return ok(handle.createWriteStream())
  } catch (e) {
    logger.debug('Open for writing failed', { path, code: errorCode(e) })
    return err(e instanceof Error ? e : new Error(String(e)))
  }
}

/**
 * Ends a file stream and waits until it has flushed and closed. An error
 * raised while flushing, or one the stream already hit, is returned.
 */
export async function closeOutput(stream: Writable): Promise<Result<void>> {
  stream.end()
  try {
    await finished(stream)
    return ok(undefined)
  } catch (e) {
    logger.debug('Output stream closed with error', { code: errorCode(e) })
    return err(e instanceof Error ? e : new Error(String(e)))
  }
}

/** Yields the chunks of `source` unchanged while keeping a copy of each. */
export async function* recordingSource(
  source: ByteSource,
  recorded: Uint8Array[],
): AsyncGenerator<Uint8Array> {
  for await (const chunk of source) {
    recorded.push(chunk)
    yield chunk
  }
}
