/**
 * ASCII Caesar cipher.
 *
 * Run with:
 *   npm run encipher -- -k 27 -i plain.txt -o cipher.txt
 *   npm run encipher -- -k 27 -x < cipher.txt
 */

import { loadConfig } from './config.ts'
import { logger, setLogLevel } from './logger.ts'
import { runEncipher } from './cli/encipher-command.ts'

const configResult = loadConfig()
if (!configResult.ok) {
  logger.error('Configuration error', { error: configResult.error.message })
  process.stderr.write(`error: ${configResult.error.message}\n`)
  process.exit(1)
}

setLogLevel(configResult.value.logLevel)

process.exitCode = await runEncipher(process.argv.slice(2), {
  stdin: process.stdin,
  stdout: process.stdout,
  stderr: process.stderr,
})
