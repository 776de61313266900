import { logger } from '../../helpers/loggers.js'
import { config } from '../../config/config.js'
import type { IntensityHistogram } from '../../types/index.js'
import { runTool, describeFailure } from './screen-utils.js'

const MARKER = '*'

type TerminalSize = { rows: number; columns: number }

type TerminalStream = { isTTY?: boolean; rows?: number; columns?: number }

const terminalSize = (stream: TerminalStream = process.stdout): TerminalSize => {
  if (stream.isTTY && stream.rows && stream.columns) {
    return { rows: stream.rows, columns: stream.columns }
  }
  return { rows: 25, columns: 80 }
}

const sortedBuckets = (histogram: IntensityHistogram): [number, number][] =>
  [...histogram.entries()].sort(([a], [b]) => a - b)

const buildPlotCommands = (
  histogram: IntensityHistogram,
  size: TerminalSize
): string[] => [
  `set term dumb ${size.columns} ${size.rows - 2}`,
  "set title 'Spot intensity distribution'",
  "set xlabel '% of maximum'",
  "set ylabel 'Number of observed pixels'",
  'set logscale y',
  'set boxwidth 1.0',
  'set xtics out nomirror',
  'set ytics out',
  "plot '-' using 1:2 title '' with boxes",
  ...sortedBuckets(histogram).map(
    ([bucket, count]) => `${bucket.toFixed(6)} ${count}`
  ),
  'e'
]

/**
 * Turn the single-point markers of a dumb-terminal box plot into solid bars.
 * A column that has shown a marker stays filled on every following line
 * until a line without markers (or a blank line) clears the tracked
 * columns. Blank lines are dropped.
 */
const fillBars = (plot: string): string[] => {
  const filled: string[] = []
  let columns = new Set<number>()
  for (const line of plot.split('\n')) {
    if (line.trim() === '') {
      columns = new Set()
      continue
    }
    const markers = line.split('').flatMap((char, i) => (char === MARKER ? [i] : []))
    if (markers.length === 0) {
      columns = new Set()
      filled.push(line)
      continue
    }
    markers.forEach((column) => columns.add(column))
    const chars = line.padEnd(Math.max(...columns) + 1).split('')
    columns.forEach((column) => {
      chars[column] = MARKER
    })
    filled.push(chars.join(''))
  }
  return filled
}

const plotHistogram = async (
  histogram: IntensityHistogram,
  size: TerminalSize = terminalSize()
): Promise<boolean> => {
  const commands = buildPlotCommands(histogram, size)
  logger.debug(`running gnuplot with:\n  ${commands.join('\n  ')}\n`)

  const result = await runTool('gnuplot', [], {
    stdin: commands.join('\n') + '\n',
    timeoutMs: config.plotTimeoutMs
  })
  if (result.exitCode !== 0) {
    logger.warn(
      `Error running gnuplot. Can not plot intensity distribution. ${describeFailure(result)}`
    )
    return false
  }
  fillBars(result.stdout).forEach((line) => logger.info(line))
  return true
}

export { terminalSize, sortedBuckets, buildPlotCommands, fillBars, plotHistogram }
export type { TerminalSize }
