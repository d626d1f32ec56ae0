/**
 * `encipher`: apply an ASCII Caesar cipher to a file or stdin.
 */

import { parseArgs } from 'node:util'
import type { Readable, Writable } from 'node:stream'
import { caesarCipherStream, inverseKey } from '../cipher/caesar.ts'
import { describeError } from '../logger.ts'
import { err, ok } from '../types.ts'
import { closeOutput, openInputFile, openOutputFile, printError } from './io.ts'
import type { CliIO } from './io.ts'
import type { ByteSource, Result } from '../types.ts'

export const ENCIPHER_USAGE = [
  'usage: encipher --key KEY [OPTION]...',
  'encrypt/decrypt ASCII text via Caesar Cipher',
  '\t-k, --key KEY\n\t\tcipher key (REQUIRED)',
  '\t-i, --infile FILE\n\t\tinput file path (default: stdin)',
  '\t-o, --outfile FILE\n\t\toutput file path (default: stdout)',
  '\t-x, --decrypt\n\t\tapply the inverse of KEY',
  '\t-h, --help\n\t\tprint this help page',
].join('\n')

const INTEGER = /^[+-]?\d+$/

export function parseKey(raw: string): Result<number> {
  if (!INTEGER.test(raw.trim())) {
    return err(new Error(`invalid cipher key "${raw}"`))
  }
  const key = Number.parseInt(raw, 10)
  if (!Number.isSafeInteger(key)) {
    return err(new Error(`cipher key out of range "${raw}"`))
  }
  return ok(key)
}

function parseEncipherArgs(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    options: {
      key: { type: 'string', short: 'k' },
      infile: { type: 'string', short: 'i' },
      outfile: { type: 'string', short: 'o' },
      decrypt: { type: 'boolean', short: 'x' },
      help: { type: 'boolean', short: 'h' },
    },
    strict: true,
    allowPositionals: false,
  })
}

export async function runEncipher(argv: readonly string[], io: CliIO): Promise<number> {
  let parsed: ReturnType<typeof parseEncipherArgs>
  try {
    parsed = parseEncipherArgs(argv)
  } catch (e) {
    printError(io, describeError(e))
    return 1
  }
  const { values } = parsed

  if (values.help === true) {
    io.stdout.write(ENCIPHER_USAGE + '\n')
    return 0
  }

  if (values.key === undefined) {
    printError(io, "missing cipher key (include the '--key KEY' option)")
    return 1
  }
  const keyResult = parseKey(values.key)
  if (!keyResult.ok) {
    printError(io, keyResult.error.message)
    return 1
  }
  const key = values.decrypt === true ? inverseKey(keyResult.value) : keyResult.value

  let input: ByteSource = io.stdin
  let inputStream: Readable | undefined
  if (values.infile !== undefined) {
    const opened = await openInputFile(values.infile)
    if (!opened.ok) {
      printError(io, `unable to open infile "${values.infile}"`)
      return 1
    }
    inputStream = opened.value
    input = inputStream
  }

  let output: Writable = io.stdout
  let ownsOutput = false
  if (values.outfile !== undefined) {
    const opened = await openOutputFile(values.outfile)
    if (!opened.ok) {
      inputStream?.destroy()
      printError(io, `unable to open outfile "${values.outfile}"`)
      return 1
    }
    output = opened.value
    ownsOutput = true
  }

  const result = await caesarCipherStream(input, output, key)
  const closed = ownsOutput ? await closeOutput(output) : ok(undefined)
  if (!result.ok) {
    inputStream?.destroy()
    printError(io, result.error.message)
    return 1
  }
  if (!closed.ok) {
    printError(io, 'bad output stream')
    return 1
  }
  return 0
}
