import { logger } from '../../helpers/loggers.js'
import { ScreenFailure } from '../../helpers/errors.js'
import type { ScreenSession } from '../../types/index.js'
import {
  screenFiles,
  runSessionTool,
  logCompleted,
  describeFailure
} from './screen-utils.js'

const RULE = '-'.repeat(60)

const renderSpotCountsPerImage = async (
  session: ScreenSession
): Promise<string | null> => {
  const result = await runSessionTool(session, 'dials.spot_counts_per_image', [
    session.jsonFile,
    screenFiles.strongSpots
  ])
  if (result.exitCode !== 0) {
    logger.warn(
      `Could not summarise spot counts per image. ${describeFailure(result)}`
    )
    return null
  }
  return result.stdout.trimEnd()
}

/**
 * Find strong spots on all images. `additionalParameters` tightens the search
 * on a retry, e.g. `sigma_strong=15`.
 */
const findSpots = async (
  session: ScreenSession,
  additionalParameters: string[] = []
): Promise<void> => {
  logger.info('\nSpot finding...')
  const result = await runSessionTool(session, 'dials.find_spots', [
    session.jsonFile,
    `nproc=${session.nproc}`,
    ...additionalParameters
  ])
  if (result.exitCode !== 0) {
    throw new ScreenFailure('find_spots', describeFailure(result))
  }

  const summary = await renderSpotCountsPerImage(session)
  if (summary !== null) {
    logger.info(RULE)
    logger.info(summary)
    logger.info(RULE)
  }
  logCompleted(result)
}

export { findSpots }
