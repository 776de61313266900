#!/usr/bin/env node
import { logger } from './helpers/loggers.js'
import { getErrorMessage } from './helpers/errors.js'
import { runScreen } from './services/pipelines/screen.js'

const main = async () => {
  process.exitCode = await runScreen(process.argv.slice(2))
}

main().catch((error) => {
  logger.error(`i19.screen failed: ${getErrorMessage(error)}`)
  process.exitCode = 1
})
