import path from 'path'
import fs from 'fs-extra'
import erf from '@stdlib/math-base-special-erf'
import { ValidationError } from 'yup'
import { logger } from '../../helpers/loggers.js'
import { ScreenFailure, getErrorMessage } from '../../helpers/errors.js'
import { overloadSchema, type OverloadData } from '../../validation/index.js'
import type {
  IntensityCheckResult,
  IntensityHistogram,
  ScreenSession
} from '../../types/index.js'
import {
  screenFiles,
  runSessionTool,
  logCompleted,
  describeFailure
} from './screen-utils.js'
import { plotHistogram, sortedBuckets } from './plot-functions.js'

const formatHistogram = (histogram: IntensityHistogram): string =>
  `{ ${sortedBuckets(histogram)
    .map(([bucket, count]) => `${bucket}:${count}`)
    .join(', ')} }`

/** Non-empty bins of the overload histogram with their totals */
const buildHistogram = (data: OverloadData) => {
  const histogram: IntensityHistogram = new Map()
  let pixelCount = 0
  let countSum = 0
  for (let bin = 0; bin < data.bin_count; bin++) {
    const count = data.bins[bin]
    if (count > 0) {
      histogram.set(bin, count)
      pixelCount += count
      countSum += bin * count
    }
  }
  return { histogram, pixelCount, countSum }
}

/**
 * Fraction of a reflection's rocking curve recorded on one image. Tends to
 * the oscillation width once sigma_m is much larger than it.
 */
const mosaicityFactor = (oscillation: number, sigmaM: number): number =>
  Math.sqrt(Math.PI) * sigmaM * erf(oscillation / (2 * sigmaM))

const intensityScale = (
  scaleFactor: number,
  oscillation: number,
  sigmaM: number
): number => (100 * scaleFactor) / mosaicityFactor(oscillation, sigmaM)

/**
 * Rescale buckets to percent of the count rate limit. Buckets that land on
 * the same value are summed and the zero bucket is dropped.
 */
const rescaleHistogram = (
  histogram: IntensityHistogram,
  scale: number
): IntensityHistogram => {
  const rescaled: IntensityHistogram = new Map()
  for (const [bucket, count] of sortedBuckets(histogram)) {
    const target = Math.trunc(bucket * scale)
    rescaled.set(target, (rescaled.get(target) ?? 0) + count)
  }
  rescaled.delete(0)
  return rescaled
}

const loadOverloadData = async (file: string): Promise<OverloadData> => {
  try {
    const raw: unknown = await fs.readJson(file)
    return await overloadSchema.validate(raw)
  } catch (error) {
    const reason =
      error instanceof ValidationError
        ? error.errors.join('; ')
        : getErrorMessage(error)
    throw new ScreenFailure('overload', `Could not read ${path.basename(file)}: ${reason}`)
  }
}

const checkIntensities = async (
  session: ScreenSession
): Promise<IntensityCheckResult> => {
  logger.info('\nTesting pixel intensities...')
  const { scan } = session
  if (!scan) {
    throw new ScreenFailure(
      'overload',
      'No scan metadata available. The profile model must be created first.'
    )
  }

  const result = await runSessionTool(session, 'xia2.overload', [session.jsonFile])
  if (result.exitCode !== 0) {
    throw new ScreenFailure('overload', describeFailure(result))
  }

  const data = await loadOverloadData(
    path.join(session.workDir, screenFiles.overload)
  )
  logger.info('Pixel intensity distribution:')
  const { histogram, pixelCount, countSum } = buildHistogram(data)

  const factor = mosaicityFactor(scan.oscillation, scan.sigmaM)
  logger.info(`Mosaicity factor: ${factor.toFixed(6)}`)
  const scale = intensityScale(data.scale_factor, scan.oscillation, scan.sigmaM)
  logger.info(`Determined scale factor for intensities as ${scale.toFixed(6)}`)
  logger.debug(`intensity histogram: ${formatHistogram(histogram)}`)

  const rescaled = rescaleHistogram(histogram, scale)
  logger.debug(`rescaled histogram: ${formatHistogram(rescaled)}`)

  let maximum: number | null = null
  if (rescaled.size > 0) {
    await plotHistogram(rescaled)
    maximum = Math.max(...rescaled.keys())
    const text = `Strongest pixel reaches ${maximum.toFixed(1)} % of the detector count rate limit`
    if (maximum > 100) {
      logger.warn(`Warning: ${text}!`)
    } else {
      logger.info(text)
    }
  } else {
    logger.info('No pixels above the lowest intensity bucket')
  }

  const possibleOverloads = pixelCount % scan.numImages !== 0
  if (possibleOverloads) {
    logger.warn('Warning: There may be undetected overloads above the upper bound!')
  }

  logger.info(`Total sum of counts in dataset: ${countSum}`)
  logCompleted(result)

  return {
    scale,
    histogram: rescaled,
    maximum,
    saturated: maximum !== null && maximum > 100,
    possibleOverloads,
    countSum
  }
}

export {
  buildHistogram,
  mosaicityFactor,
  intensityScale,
  rescaleHistogram,
  checkIntensities
}
