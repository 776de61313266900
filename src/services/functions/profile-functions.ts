import path from 'path'
import fs from 'fs-extra'
import { ValidationError } from 'yup'
import { logger } from '../../helpers/loggers.js'
import { ScreenFailure, getErrorMessage } from '../../helpers/errors.js'
import { experimentListSchema } from '../../validation/index.js'
import type { ScanMetadata, ScreenSession } from '../../types/index.js'
import {
  screenFiles,
  runSessionTool,
  logCompleted,
  describeFailure
} from './screen-utils.js'

/**
 * Scan and profile parameters of the first experiment in a serialised
 * experiment list.
 */
const readScanMetadata = async (file: string): Promise<ScanMetadata> => {
  const raw: unknown = await fs.readJson(file)
  const experiments = await experimentListSchema.validate(raw)
  const experiment = experiments.experiment[0]
  const scan = experiments.scan[experiment.scan]
  if (!scan) {
    throw new Error(`Experiment refers to missing scan ${experiment.scan}`)
  }
  const [firstImage, lastImage] = scan.image_range
  return {
    numImages: lastImage - firstImage + 1,
    oscillation: scan.oscillation[1],
    sigmaM: experiment.profile.sigma_m
  }
}

const createProfileModel = async (session: ScreenSession): Promise<boolean> => {
  logger.info('\nCreating profile model...')
  const result = await runSessionTool(session, 'dials.create_profile_model', [
    screenFiles.experiments,
    screenFiles.indexed
  ])
  if (result.exitCode !== 0) {
    logger.warn(describeFailure(result))
    return false
  }

  const modelFile = path.join(session.workDir, screenFiles.profileExperiments)
  try {
    session.scan = await readScanMetadata(modelFile)
  } catch (error) {
    const reason =
      error instanceof ValidationError
        ? error.errors.join('; ')
        : getErrorMessage(error)
    throw new ScreenFailure(
      'profile_model',
      `Could not read ${screenFiles.profileExperiments}: ${reason}`
    )
  }

  const { numImages, oscillation, sigmaM } = session.scan
  logger.info(
    `${numImages} images, ${oscillation} deg. oscillation, sigma_m=${sigmaM.toFixed(3)}`
  )
  logCompleted(result)
  return true
}

export { readScanMetadata, createProfileModel }
