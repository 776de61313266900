import path from 'path'
import { logger } from '../../helpers/loggers.js'
import { config } from '../../config/config.js'
import {
  runProcess,
  type ProcessResult,
  type RunProcessOptions
} from '../../helpers/runProcess.js'
import type { ScreenSession } from '../../types/index.js'

// Files handed from one tool to the next through the working directory
const screenFiles = {
  datablock: 'datablock.json',
  strongSpots: 'strong.pickle',
  allSpots: 'all_spots.pickle',
  experiments: 'experiments.json',
  indexed: 'indexed.pickle',
  unrefinedExperiments: 'experiments.unrefined.json',
  unrefinedIndexed: 'indexed.unrefined.pickle',
  refinedExperiments: 'refined_experiments.json',
  refined: 'refined.pickle',
  profileExperiments: 'experiments_with_profile_model.json',
  predicted: 'predicted.pickle',
  overload: 'overload.json'
} as const

/**
 * Render a flat record for the debug log, one `key: value` per line. Lines
 * after the first in a multi-line value are indented past the key.
 */
const formatResult = (record: object): string => {
  const lines = Object.entries(record).map(([key, value]) => {
    const indent = '\n' + ' '.repeat(4 + key.length)
    return `  ${key}: ${String(value).split('\n').join(indent)}`
  })
  return `{\n${lines.join('\n')}\n}`
}

const resolveTool = (tool: string): string =>
  config.installRoot ? path.join(config.installRoot, 'build', 'bin', tool) : tool

const runTool = async (
  tool: string,
  args: string[],
  opts: RunProcessOptions = {}
): Promise<ProcessResult> => {
  const command = resolveTool(tool)
  logger.debug(`running ${[command, ...args].join(' ')}`)
  const result = await runProcess(command, args, opts)
  logger.debug(`result = ${formatResult(result)}`)
  return result
}

/** Run a tool inside the session's working directory */
const runSessionTool = (
  session: Pick<ScreenSession, 'workDir'>,
  tool: string,
  args: string[],
  opts: Omit<RunProcessOptions, 'cwd'> = {}
): Promise<ProcessResult> => runTool(tool, args, { ...opts, cwd: session.workDir })

const logCompleted = (result: ProcessResult, what = 'completed') => {
  logger.info(`Successfully ${what} (${result.runtime.toFixed(1)} sec)`)
}

const describeFailure = (result: ProcessResult): string =>
  result.timedOut
    ? `Timed out after ${result.runtime.toFixed(1)} sec`
    : `Failed with exit code ${result.exitCode}`

export {
  screenFiles,
  formatResult,
  resolveTool,
  runTool,
  runSessionTool,
  logCompleted,
  describeFailure
}
