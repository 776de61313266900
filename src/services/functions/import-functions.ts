import path from 'path'
import fs from 'fs-extra'
import { logger } from '../../helpers/loggers.js'
import { ScreenFailure } from '../../helpers/errors.js'
import { screenVersion } from '../../version.js'
import type { ScreenSession } from '../../types/index.js'
import {
  screenFiles,
  runTool,
  runSessionTool,
  logCompleted,
  describeFailure
} from './screen-utils.js'

const getVersionInformation = async (): Promise<string> => {
  const result = await runTool('dials.version', [])
  const suiteVersion =
    result.exitCode === 0
      ? result.stdout.split('\n').find((line) => line.trim() !== '')
      : undefined
  return `i19.screen ${screenVersion} using ${suiteVersion?.trim() ?? 'DIALS (version unknown)'}`
}

const countProcessors = async (
  session: Pick<ScreenSession, 'workDir'>
): Promise<number> => {
  const result = await runSessionTool(
    session,
    'libtbx.show_number_of_processors',
    []
  )
  if (result.exitCode !== 0) {
    throw new ScreenFailure(
      'nproc',
      `Could not determine number of available processors. Error code ${result.exitCode}`
    )
  }
  const text = result.stdout.trim()
  const nproc = /^\d+$/.test(text) ? parseInt(text, 10) : NaN
  if (!(nproc > 0)) {
    throw new ScreenFailure(
      'nproc',
      `Could not determine number of available processors from "${text}"`
    )
  }
  logger.debug(`Using ${nproc} processors`)
  return nproc
}

/**
 * Import image files or directories into a datablock. The import tool can
 * exit cleanly without writing anything when it finds no images, so the
 * datablock itself is checked too.
 */
const importImages = async (
  session: Pick<ScreenSession, 'workDir'>,
  files: string[]
): Promise<string> => {
  logger.info('\nImporting data...')
  const result = await runSessionTool(session, 'dials.import', files)
  if (result.exitCode !== 0) {
    throw new ScreenFailure('import', describeFailure(result))
  }
  if (!(await fs.pathExists(path.join(session.workDir, screenFiles.datablock)))) {
    throw new ScreenFailure(
      'import',
      'Could not import images. Do the specified images exist at that location?'
    )
  }
  logCompleted(result)
  return screenFiles.datablock
}

export { getVersionInformation, countProcessors, importImages }
