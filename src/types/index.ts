type ScanMetadata = {
  numImages: number
  /** Oscillation width per image, degrees */
  oscillation: number
  sigmaM: number
}

type ScreenSession = {
  workDir: string
  /** Datablock or experiment list handed to spot finding and indexing */
  jsonFile: string
  nproc: number
  /** Set once profile modelling has succeeded */
  scan?: ScanMetadata
}

type StageName =
  | 'import'
  | 'nproc'
  | 'find_spots'
  | 'index'
  | 'refine'
  | 'profile_model'
  | 'refine_bravais'
  | 'report'
  | 'overload'

type ParseResult<T> = { ok: true; value: T } | { ok: false; error: string }

type IndexingSolution = {
  reflections: number
  /** Unit cell as printed by the indexer */
  unitCell: string
  spaceGroup: string
}

/** Integer intensity bucket to number of observed pixels */
type IntensityHistogram = Map<number, number>

type IntensityCheckResult = {
  scale: number
  histogram: IntensityHistogram
  maximum: number | null
  saturated: boolean
  possibleOverloads: boolean
  countSum: number
}

export type {
  ScanMetadata,
  ScreenSession,
  StageName,
  ParseResult,
  IndexingSolution,
  IntensityHistogram,
  IntensityCheckResult
}
