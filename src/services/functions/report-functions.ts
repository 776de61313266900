import { logger } from '../../helpers/loggers.js'
import { ScreenFailure } from '../../helpers/errors.js'
import type { ScreenSession } from '../../types/index.js'
import {
  screenFiles,
  runSessionTool,
  logCompleted,
  describeFailure
} from './screen-utils.js'

const createReport = async (session: ScreenSession): Promise<void> => {
  logger.info('\nCreating report...')
  const result = await runSessionTool(session, 'dials.report', [
    screenFiles.profileExperiments,
    screenFiles.indexed
  ])
  if (result.exitCode !== 0) {
    throw new ScreenFailure('report', describeFailure(result))
  }
  logCompleted(result)
}

const predictReflections = async (session: ScreenSession): Promise<boolean> => {
  logger.info('\nPredicting reflections...')
  const result = await runSessionTool(session, 'dials.predict', [
    screenFiles.profileExperiments
  ])
  if (result.exitCode !== 0) {
    logger.warn(describeFailure(result))
    return false
  }
  logger.info('To view predicted reflections run:')
  logger.info(
    `  dials.image_viewer ${screenFiles.profileExperiments} ${screenFiles.predicted}`
  )
  logCompleted(result)
  return true
}

export { createReport, predictReflections }
