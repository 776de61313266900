import path from 'path'
import fs from 'fs-extra'
import type {
  ProcessResult,
  RunProcessOptions
} from '../src/helpers/runProcess.js'

export type ToolCall = { tool: string; args: string[]; stdin?: string }

export type FakeToolchainOptions = {
  /** Exit codes handed out per tool, one per call; missing entries mean 0 */
  exitCodes?: Record<string, number[]>
  sigmaM?: number
  oscillation?: number
  imageRange?: [number, number]
  overload?: { bin_count: number; bins: number[]; scale_factor: number }
  indexStdout?: string
  bravaisStdout?: string
  plotStdout?: string
}

export const indexStdout = `Refined crystal models:
model 1 (1423 reflections):
Crystal:
    Unit cell: (5.412, 5.412, 5.412, 90.000, 90.000, 90.000)
    Space group: P 1
    U matrix:  {{ 0.1, 0.2, 0.3}}
`

export const bravaisStdout = `Chiral space groups corresponding to each Bravais lattice:
-------------------------------------------------------
Solution Metric fit  rmsd  min/max cc #spots lattice
-------------------------------------------------------
*     2     0.0000 0.040 0.912/0.912   1200     cF
*     1     0.0000 0.039    -/-        1423     aP
-------------------------------------------------------
Saving solutions
`

export const plotStdout = `
   100 +-----+
       |  *  |
       |     |
     1 +-----+
`

const result = (exitCode: number, stdout = ''): ProcessResult => ({
  exitCode,
  stdout,
  stderr: exitCode === 0 ? '' : 'tool failed',
  runtime: 0.5,
  timedOut: false
})

/**
 * Stand-in for the processing suite: each tool writes the files the real
 * tool would leave in its working directory.
 */
export const createFakeToolchain = (opts: FakeToolchainOptions = {}) => {
  const calls: ToolCall[] = []
  const exitCodes = Object.fromEntries(
    Object.entries(opts.exitCodes ?? {}).map(([tool, codes]) => [tool, [...codes]])
  )

  const run = async (
    command: string,
    args: string[] = [],
    runOpts: RunProcessOptions = {}
  ): Promise<ProcessResult> => {
    const tool = path.basename(command)
    calls.push({ tool, args, stdin: runOpts.stdin })
    const exitCode = exitCodes[tool]?.shift() ?? 0
    if (exitCode !== 0) return result(exitCode)

    const cwd = runOpts.cwd ?? process.cwd()
    const write = (file: string, content = 'data') =>
      fs.writeFile(path.join(cwd, file), content)

    switch (tool) {
      case 'dials.version':
        return result(0, 'DIALS 1.5.1\nPython 2.7\n')
      case 'libtbx.show_number_of_processors':
        return result(0, '4\n')
      case 'dials.import':
        await write('datablock.json', '{}')
        return result(0)
      case 'dials.find_spots':
        await write('strong.pickle')
        return result(0)
      case 'dials.spot_counts_per_image':
        return result(0, '| image | #spots |\n|     1 |    120 |\n')
      case 'dials.index':
        await write('experiments.json', '{}')
        await write('indexed.pickle')
        return result(0, opts.indexStdout ?? indexStdout)
      case 'dials.refine':
        await write('refined_experiments.json', '{"refined": true}')
        await write('refined.pickle')
        return result(0)
      case 'dials.create_profile_model':
        await fs.writeJson(path.join(cwd, 'experiments_with_profile_model.json'), {
          __id__: 'ExperimentList',
          experiment: [
            {
              __id__: 'Experiment',
              scan: 0,
              profile: { __id__: 'gaussian_rs', n_sigma: 3, sigma_b: 0.03, sigma_m: opts.sigmaM ?? 0.05 }
            }
          ],
          scan: [
            {
              image_range: opts.imageRange ?? [1, 10],
              oscillation: [0.0, opts.oscillation ?? 0.5]
            }
          ]
        })
        return result(0)
      case 'xia2.overload':
        await fs.writeJson(
          path.join(cwd, 'overload.json'),
          opts.overload ?? { bin_count: 6, bins: [0, 20, 0, 0, 0, 10], scale_factor: 0.015 }
        )
        return result(0)
      case 'dials.refine_bravais_settings':
        return result(0, opts.bravaisStdout ?? bravaisStdout)
      case 'gnuplot':
        return result(0, opts.plotStdout ?? plotStdout)
      default:
        return result(0)
    }
  }

  const toolsCalled = () => calls.map((call) => call.tool)

  return { run, calls, toolsCalled }
}
