/**
 * Shared test data and utilities.
 */

import { Writable } from 'node:stream'
import type { CliIO } from '../../src/cli/io.ts'
import type { ByteSource } from '../../src/types.ts'

/** Ordinary English prose, long enough for frequency analysis. */
export const ENGLISH_PASSAGE =
  'The people of the old town came down to the river every morning to watch the boats go by. ' +
  'Some of them would sit on the rocks near the water and talk about the weather, the farm, ' +
  'and the children who were at school. When the sun was high, the men went back to work in ' +
  'the field, and the women made food for the family. At night the whole town would look up ' +
  'at the stars and think about the great world that was far from their small home. It was a ' +
  'simple life, but they were happy, and they did not want it to change.'

/** Newline-separated word list as a byte source. */
export function wordList(words: readonly string[]): ByteSource {
  return [Buffer.from(words.join('\n') + '\n', 'latin1')]
}

/** A source that yields `chunks` and then fails, like a stream hitting an I/O fault. */
export async function* failingSource(
  chunks: readonly Uint8Array[] = [],
  message = 'simulated read failure',
): AsyncGenerator<Uint8Array> {
  for (const chunk of chunks) {
    yield chunk
  }
  throw new Error(message)
}

export interface CapturedStream {
  readonly stream: Writable
  text(): string
}

export function captureStream(): CapturedStream {
  const chunks: Buffer[] = []
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk)
      callback()
    },
  })
  return { stream, text: () => Buffer.concat(chunks).toString('latin1') }
}

export interface TestIO extends CliIO {
  out(): string
  errOut(): string
}

export function makeIO(stdin: ByteSource = []): TestIO {
  const stdout = captureStream()
  const stderr = captureStream()
  return {
    stdin,
    stdout: stdout.stream,
    stderr: stderr.stream,
    out: () => stdout.text(),
    errOut: () => stderr.text(),
  }
}
