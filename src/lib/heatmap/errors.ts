/**
 * Heatmap error taxonomy.
 *
 * Geometry and resolution errors are fatal to the operation that raised them.
 * Unknown categories at query time are reported as `UnknownCategoryWarning`
 * values on the score, never thrown.
 */

export type HeatmapErrorCode =
  | 'invalid_box'
  | 'resolution_mismatch'
  | 'empty_corpus'
  | 'category_mismatch'
  | 'aggregation_cancelled'
  | 'heatmap_set_format'

export abstract class HeatmapError extends Error {
  abstract readonly code: HeatmapErrorCode

  constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

export interface Resolution {
  rows: number
  cols: number
}

/** Malformed or out-of-bounds box geometry, or a category outside the configured set. */
export class InvalidBoxError extends HeatmapError {
  readonly code = 'invalid_box' as const

  constructor(message: string, readonly reason: 'geometry' | 'canvas' | 'out-of-bounds' | 'category') {
    super(message)
  }
}

export class ResolutionMismatchError extends HeatmapError {
  readonly code = 'resolution_mismatch' as const

  constructor(readonly expected: Resolution, readonly actual: Resolution) {
    super(
      `Grid resolution ${actual.rows}x${actual.cols} does not match ${expected.rows}x${expected.cols}`
    )
  }
}

export class EmptyCorpusError extends HeatmapError {
  readonly code = 'empty_corpus' as const

  constructor() {
    super('Aggregation ran over an empty corpus')
  }
}

export class CategoryMismatchError extends HeatmapError {
  readonly code = 'category_mismatch' as const

  constructor(readonly expected: string, readonly actual: string) {
    super(`Accumulator for "${expected}" cannot absorb a "${actual}" box`)
  }
}

export class AggregationCancelledError extends HeatmapError {
  readonly code = 'aggregation_cancelled' as const

  constructor(readonly absorbed: number) {
    super(`Aggregation cancelled after ${absorbed} records`)
  }
}

/** Persisted heatmap data that fails validation on load. */
export class HeatmapSetFormatError extends HeatmapError {
  readonly code = 'heatmap_set_format' as const

  constructor(message: string, readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message)
  }
}

/** Non-fatal: a scored element's category never appeared in the corpus. */
export interface UnknownCategoryWarning {
  kind: 'unknown_category'
  category: string
  elementIndex: number
}
