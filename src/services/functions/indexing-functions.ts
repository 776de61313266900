import path from 'path'
import fs from 'fs-extra'
import { logger } from '../../helpers/loggers.js'
import { ScreenFailure } from '../../helpers/errors.js'
import type { ScreenSession } from '../../types/index.js'
import {
  screenFiles,
  runSessionTool,
  logCompleted,
  describeFailure
} from './screen-utils.js'
import {
  parseIndexingSolution,
  parseBravaisTable
} from './tool-output-parsers.js'

type IndexingStrategy = {
  message: string
  extraArgs: string[]
}

// Tried in this order until one succeeds
const indexingStrategies: IndexingStrategy[] = [
  { message: 'Indexing', extraArgs: [] },
  { message: 'Retrying with max_cell constraint', extraArgs: ['max_cell=20'] },
  { message: 'Retrying with 1D FFT', extraArgs: ['indexing.method=fft1d'] }
]

/**
 * Index the strong spots, falling back through the indexing strategies.
 * Returns false once every strategy has failed; the caller decides what
 * happens next.
 */
const indexSpots = async (session: ScreenSession): Promise<boolean> => {
  const baseArgs = [
    session.jsonFile,
    screenFiles.strongSpots,
    `indexing.nproc=${session.nproc}`
  ]

  for (const { message, extraArgs } of indexingStrategies) {
    logger.info(`\n${message}...`)
    const result = await runSessionTool(session, 'dials.index', [
      ...baseArgs,
      ...extraArgs
    ])
    if (result.exitCode !== 0) {
      logger.warn(describeFailure(result))
      continue
    }

    const solution = parseIndexingSolution(result.stdout)
    if (solution.ok) {
      const { spaceGroup, unitCell, reflections } = solution.value
      logger.info(
        `Found primitive solution: ${spaceGroup} (${unitCell}) using ${reflections} reflections`
      )
    } else {
      logger.warn(`Indexing succeeded but ${solution.error.toLowerCase()}`)
    }
    logCompleted(result)
    return true
  }
  return false
}

/**
 * Refine the indexed model and promote the refined files to the canonical
 * names. The renames are not transactional.
 */
const refineExperiments = async (session: ScreenSession): Promise<void> => {
  logger.info('\nRefining...')
  const result = await runSessionTool(session, 'dials.refine', [
    screenFiles.experiments,
    screenFiles.indexed
  ])
  if (result.exitCode !== 0) {
    throw new ScreenFailure('refine', `${describeFailure(result)}. Giving up.`)
  }
  logCompleted(result, 'refined')

  const inWorkDir = (file: string) => path.join(session.workDir, file)
  const renames: [string, string][] = [
    [screenFiles.experiments, screenFiles.unrefinedExperiments],
    [screenFiles.indexed, screenFiles.unrefinedIndexed],
    [screenFiles.refinedExperiments, screenFiles.experiments],
    [screenFiles.refined, screenFiles.indexed]
  ]
  for (const [from, to] of renames) {
    logger.debug(`rename ${from} -> ${to}`)
    await fs.rename(inWorkDir(from), inWorkDir(to))
  }
}

const refineBravaisSettings = async (session: ScreenSession): Promise<void> => {
  logger.info('\nRefining bravais settings...')
  const result = await runSessionTool(session, 'dials.refine_bravais_settings', [
    screenFiles.experiments,
    screenFiles.indexed
  ])
  if (result.exitCode !== 0) {
    throw new ScreenFailure('refine_bravais', describeFailure(result))
  }
  const table = parseBravaisTable(result.stdout)
  if (table.ok) {
    logger.info(table.value)
  } else {
    logger.warn(table.error)
  }
  logCompleted(result)
}

export { indexingStrategies, indexSpots, refineExperiments, refineBravaisSettings }
