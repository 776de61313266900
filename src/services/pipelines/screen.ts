import path from 'path'
import fs from 'fs-extra'
import { logger, configureLogFiles } from '../../helpers/loggers.js'
import { config } from '../../config/config.js'
import { ScreenFailure } from '../../helpers/errors.js'
import type { ScreenSession } from '../../types/index.js'
import { screenFiles } from '../functions/screen-utils.js'
import {
  getVersionInformation,
  countProcessors,
  importImages
} from '../functions/import-functions.js'
import { findSpots } from '../functions/spotfinding-functions.js'
import {
  indexSpots,
  refineExperiments,
  refineBravaisSettings
} from '../functions/indexing-functions.js'
import { createProfileModel } from '../functions/profile-functions.js'
import {
  createReport,
  predictReflections
} from '../functions/report-functions.js'
import { checkIntensities } from '../functions/intensity-functions.js'

const helpMessage = `
This program processes screening data obtained at Diamond Light Source
Beamline I19-1.

Examples:

  i19.screen datablock.json

  i19.screen *.cbf

  i19.screen /path/to/data/
`

const indexingGuidance = (jsonFile: string) => `
Could not find an indexing solution. You may want to have a look
at the reciprocal space by running:

  dials.reciprocal_lattice_viewer ${jsonFile} ${screenFiles.allSpots}

or, to only include stronger spots:

  dials.reciprocal_lattice_viewer ${jsonFile} ${screenFiles.strongSpots}
`

const profileModelGuidance = `
The identified indexing solution may not be correct. You may want to have a look
at the reciprocal space by running:

  dials.reciprocal_lattice_viewer ${screenFiles.experiments} ${screenFiles.indexed}
`

type ScreenOptions = {
  workDir?: string
}

const runPipeline = async (
  args: string[],
  workDir: string
): Promise<void> => {
  const nproc = await countProcessors({ workDir })

  const jsonFile =
    args.length === 1 && args[0].endsWith('.json')
      ? args[0]
      : await importImages({ workDir }, args)

  const session: ScreenSession = { workDir, jsonFile, nproc }

  await findSpots(session)
  if (!(await indexSpots(session))) {
    logger.info('\nRetrying for stronger spots only...')
    // TODO: the full spot list is moved aside here and never restored if the
    // stricter pass fails as well; decide whether to put it back
    await fs.rename(
      path.join(workDir, screenFiles.strongSpots),
      path.join(workDir, screenFiles.allSpots)
    )
    await findSpots(session, ['sigma_strong=15'])
    if (!(await indexSpots(session))) {
      throw new ScreenFailure('index', 'Giving up.', indexingGuidance(jsonFile))
    }
  }

  if (!(await createProfileModel(session))) {
    logger.info('\nRefining model to attempt to increase number of valid spots...')
    await refineExperiments(session)
    if (!(await createProfileModel(session))) {
      throw new ScreenFailure('profile_model', 'Giving up.', profileModelGuidance)
    }
  }

  await createReport(session)
  await predictReflections(session)
  await checkIntensities(session)
  await refineBravaisSettings(session)
}

/**
 * Run a screening session over the given image paths or datablock.
 * Resolves to the process exit code.
 */
const runScreen = async (
  args: string[],
  opts: ScreenOptions = {}
): Promise<number> => {
  const workDir = opts.workDir ?? process.cwd()
  const versionInformation = await getVersionInformation()

  if (args.length === 0) {
    console.log(helpMessage)
    console.log(versionInformation)
    return 0
  }

  configureLogFiles(
    path.join(workDir, config.infoLogFile),
    path.join(workDir, config.debugLogFile)
  )
  logger.info(versionInformation)

  try {
    await runPipeline(args, workDir)
    return 0
  } catch (error) {
    if (error instanceof ScreenFailure) {
      logger.warn(error.message)
      logger.debug(`Screening stopped in stage ${error.stage}`)
      if (error.guidance) {
        logger.info(error.guidance)
      }
    } else if (error instanceof Error) {
      logger.error(`Unexpected error: ${error.message}`)
      if (error.stack) logger.debug(error.stack)
    } else {
      logger.error(`Unexpected error: ${String(error)}`)
    }
    return 1
  }
}

export { runScreen, helpMessage }
