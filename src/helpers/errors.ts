import type { StageName } from '../types/index.js'

const getErrorMessage = (e: unknown): string =>
  e instanceof Error ? e.message : typeof e === 'string' ? e : JSON.stringify(e)

/**
 * A stage failure that ends the screening run. `guidance` is printed for the
 * operator after the failure itself.
 */
class ScreenFailure extends Error {
  readonly stage: StageName
  readonly guidance?: string

  constructor(stage: StageName, message: string, guidance?: string) {
    super(message)
    this.name = 'ScreenFailure'
    this.stage = stage
    this.guidance = guidance
  }
}

export { ScreenFailure, getErrorMessage }
