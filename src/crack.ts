/**
 * ASCII Caesar cracker.
 *
 * Run with:
 *   npm run crack -- -c ciphertext.txt            # frequency analysis
 *   npm run crack -- -c ciphertext.txt -d words   # dictionary attack
 *   cat ciphertext.txt | npm run crack -- -b      # bundled word list
 */

import { loadConfig } from './config.ts'
import { logger, setLogLevel } from './logger.ts'
import { runCrack } from './cli/crack-command.ts'

const configResult = loadConfig()
if (!configResult.ok) {
  logger.error('Configuration error', { error: configResult.error.message })
  process.stderr.write(`error: ${configResult.error.message}\n`)
  process.exit(1)
}

const config = configResult.value
setLogLevel(config.logLevel)

process.exitCode = await runCrack(
  process.argv.slice(2),
  { stdin: process.stdin, stdout: process.stdout, stderr: process.stderr },
  config,
)
