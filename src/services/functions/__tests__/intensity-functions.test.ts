import os from 'os'
import path from 'path'
import fs from 'fs-extra'
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import {
  buildHistogram,
  mosaicityFactor,
  intensityScale,
  rescaleHistogram,
  checkIntensities
} from '../intensity-functions.js'
import { runProcess } from '../../../helpers/runProcess.js'
import { logger } from '../../../helpers/loggers.js'
import { ScreenFailure } from '../../../helpers/errors.js'
import type { ScreenSession } from '../../../types/index.js'
import {
  createFakeToolchain,
  type FakeToolchainOptions
} from '../../../../test/fakeToolchain.js'

vi.mock('../../../helpers/runProcess.js', () => ({
  runProcess: vi.fn()
}))

describe('intensity-functions', () => {
  describe('buildHistogram', () => {
    it('keeps non-empty bins below bin_count and totals them', () => {
      const { histogram, pixelCount, countSum } = buildHistogram({
        bin_count: 4,
        bins: [5, 0, 3, 2, 9],
        scale_factor: 1
      })
      expect(histogram).toEqual(
        new Map([
          [0, 5],
          [2, 3],
          [3, 2]
        ])
      )
      expect(pixelCount).toBe(10)
      expect(countSum).toBe(12)
    })
  })

  describe('mosaicityFactor', () => {
    it('tends to the oscillation width when sigma_m is much larger', () => {
      expect(mosaicityFactor(0.1, 1000)).toBeCloseTo(0.1, 9)
    })

    it('keeps the scale finite and positive for a very small sigma_m', () => {
      const scale = intensityScale(0.02, 0.5, 1e-3)
      expect(Number.isFinite(scale)).toBe(true)
      expect(scale).toBeGreaterThan(0)
    })
  })

  describe('rescaleHistogram', () => {
    it('sums colliding buckets and drops the zero bucket', () => {
      const rescaled = rescaleHistogram(
        new Map([
          [1, 4],
          [2, 5],
          [3, 6]
        ]),
        0.5
      )
      expect(rescaled).toEqual(new Map([[1, 11]]))
      expect(rescaled.has(0)).toBe(false)
    })

    it('truncates rescaled buckets towards zero', () => {
      expect(rescaleHistogram(new Map([[3, 1]]), 1.99)).toEqual(new Map([[5, 1]]))
    })
  })

  describe('checkIntensities', () => {
    let workDir: string
    let session: ScreenSession

    const useToolchain = (opts: FakeToolchainOptions = {}) => {
      const toolchain = createFakeToolchain(opts)
      vi.mocked(runProcess).mockImplementation(toolchain.run)
      return toolchain
    }

    beforeEach(async () => {
      vi.clearAllMocks()
      workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'screen-overload-'))
      session = {
        workDir,
        jsonFile: 'datablock.json',
        nproc: 4,
        scan: { numImages: 10, oscillation: 0.5, sigmaM: 0.05 }
      }
    })

    afterEach(async () => {
      await fs.remove(workDir)
    })

    it('reports the strongest pixel within the count rate limit', async () => {
      const toolchain = useToolchain()
      const result = await checkIntensities(session)
      expect(result.histogram).toEqual(
        new Map([
          [16, 20],
          [84, 10]
        ])
      )
      expect(result.maximum).toBe(84)
      expect(result.saturated).toBe(false)
      expect(result.possibleOverloads).toBe(false)
      expect(result.countSum).toBe(70)
      expect(logger.info).toHaveBeenCalledWith(
        'Strongest pixel reaches 84.0 % of the detector count rate limit'
      )
      expect(toolchain.toolsCalled()).toEqual(['xia2.overload', 'gnuplot'])
      expect(toolchain.calls[0].args).toEqual(['datablock.json'])
    })

    it('warns when the strongest pixel exceeds the count rate limit', async () => {
      useToolchain({
        overload: {
          bin_count: 6,
          bins: [0, 20, 0, 0, 0, 10],
          scale_factor: 0.0243712404
        }
      })
      const result = await checkIntensities(session)
      expect(result.maximum).toBe(137)
      expect(result.saturated).toBe(true)
      expect(result.histogram).toEqual(
        new Map([
          [27, 20],
          [137, 10]
        ])
      )
      expect(logger.warn).toHaveBeenCalledWith(
        'Warning: Strongest pixel reaches 137.0 % of the detector count rate limit!'
      )
    })

    it('warns about possible undetected overloads', async () => {
      useToolchain({
        overload: { bin_count: 2, bins: [0, 7], scale_factor: 0.015 }
      })
      const result = await checkIntensities(session)
      expect(result.possibleOverloads).toBe(true)
      expect(logger.warn).toHaveBeenCalledWith(
        'Warning: There may be undetected overloads above the upper bound!'
      )
    })

    it('skips the plot when nothing is left after rescaling', async () => {
      const toolchain = useToolchain({
        overload: { bin_count: 2, bins: [10, 0], scale_factor: 0.015 }
      })
      const result = await checkIntensities(session)
      expect(result.maximum).toBeNull()
      expect(result.histogram.size).toBe(0)
      expect(toolchain.toolsCalled()).toEqual(['xia2.overload'])
    })

    it('requires the scan metadata from profile modelling', async () => {
      useToolchain()
      const { scan: _scan, ...withoutScan } = session
      await expect(checkIntensities(withoutScan)).rejects.toBeInstanceOf(
        ScreenFailure
      )
      expect(runProcess).not.toHaveBeenCalled()
    })

    it('fails when the overload tool fails', async () => {
      useToolchain({ exitCodes: { 'xia2.overload': [2] } })
      await expect(checkIntensities(session)).rejects.toThrow(
        'Failed with exit code 2'
      )
    })

    it('fails on a malformed overload histogram', async () => {
      useToolchain({
        overload: { bin_count: 5, bins: [0, 1], scale_factor: 0.015 }
      })
      await expect(checkIntensities(session)).rejects.toThrow(
        'Could not read overload.json: bins must hold at least bin_count entries'
      )
    })
  })
})
