/**
 * Layout scoring against finalized heatmaps.
 * Read-only over an immutable FinalizedHeatmapSet, so one scorer can serve any
 * number of concurrent queries.
 */

import { createLogger } from '@/lib/logger'
import type { Resolution, UnknownCategoryWarning } from '../errors'
import { DEFAULT_DEGENERATE_EPSILON, mapBoxToCells, type CellWeight } from '../map/gridMapper'
import type { BoxRecord, NormalizedBBox } from '../schema/boxRecord'
import { assertSameResolution, type Grid } from '../schema/grid'
import type { FinalizedHeatmapSet } from '../schema/heatmapSet'

const log = createLogger('score')

export type ScoreCombination = 'mean' | 'min' | 'weighted'

export interface LayoutScorerOptions {
  /** How element scores roll up into the layout score. Default `mean`. */
  combination?: ScoreCombination
  /** Per-category weights for `weighted`; missing categories weigh 1. */
  categoryWeights?: Readonly<Record<string, number>>
  /** Score for elements whose category has no learned grid. Default 0. */
  neutralScore?: number
  /** Resolution the caller expects; must match the set. */
  resolution?: Resolution
  degenerateEpsilon?: number
}

export type ElementScoreStatus = 'scored' | 'no-data' | 'unknown-category'

export interface ElementScore {
  index: number
  category: string
  score: number
  status: ElementScoreStatus
}

export interface LayoutScore {
  /** For ranking layouts against each other; not a probability. */
  score: number
  combination: ScoreCombination
  elements: ElementScore[]
  warnings: UnknownCategoryWarning[]
}

export interface Region {
  row: number
  col: number
  value: number
  bounds: NormalizedBBox
}

export interface Placement {
  category: string
  bbox: NormalizedBBox
  score: number
}

export class LayoutScorer {
  private readonly combination: ScoreCombination
  private readonly neutralScore: number
  private readonly degenerateEpsilon: number

  constructor(
    readonly heatmaps: FinalizedHeatmapSet,
    private readonly options: LayoutScorerOptions = {}
  ) {
    if (options.resolution) assertSameResolution(heatmaps, options.resolution)
    this.combination = options.combination ?? 'mean'
    this.neutralScore = options.neutralScore ?? 0
    this.degenerateEpsilon = options.degenerateEpsilon ?? DEFAULT_DEGENERATE_EPSILON
  }

  /**
   * Score every element of a candidate layout and combine the results.
   * Throws `InvalidBoxError` for boxes off the canvas and
   * `ResolutionMismatchError` when `query.resolution` differs from the set.
   */
  score(layout: readonly BoxRecord[], query: { resolution?: Resolution } = {}): LayoutScore {
    if (query.resolution) assertSameResolution(this.heatmaps, query.resolution)

    const elements: ElementScore[] = []
    const warnings: UnknownCategoryWarning[] = []

    layout.forEach((box, index) => {
      const grid = this.gridFor(box.category)
      // Mapped even for unknown categories so malformed geometry is always reported.
      const cells = mapBoxToCells(box, this.heatmaps.rows, this.heatmaps.cols, {
        degenerateEpsilon: this.degenerateEpsilon,
      })

      if (!grid) {
        warnings.push({ kind: 'unknown_category', category: box.category, elementIndex: index })
        elements.push({ index, category: box.category, score: this.neutralScore, status: 'unknown-category' })
        return
      }
      if (grid.sampleCount === 0) {
        elements.push({ index, category: box.category, score: this.neutralScore, status: 'no-data' })
        return
      }
      elements.push({ index, category: box.category, score: weightedValue(grid, cells), status: 'scored' })
    })

    if (warnings.length > 0) {
      log.debug('Unknown categories in layout', { categories: warnings.map((w) => w.category) })
    }

    return {
      score: this.combine(elements),
      combination: this.combination,
      elements,
      warnings,
    }
  }

  /**
   * The k highest-density cells for a category, best first.
   * Ties keep row-major order; empty cells are never suggested.
   */
  topCategoryRegions(category: string, k: number): Region[] {
    const grid = this.gridFor(category)
    if (!grid || k <= 0) return []

    const candidates: Region[] = []
    grid.cells.forEach((value, i) => {
      if (value <= 0) return
      const row = Math.floor(i / grid.cols)
      const col = i % grid.cols
      candidates.push({ row, col, value, bounds: this.cellBounds(row, col) })
    })
    // Array.prototype.sort is stable, so equal values stay in row-major order.
    candidates.sort((a, b) => b.value - a.value)
    return candidates.slice(0, Math.floor(k))
  }

  /**
   * Best cell-aligned position for a box of the given normalized size.
   * Returns null when the category has no learned density.
   */
  suggestPlacement(category: string, size: { width: number; height: number }): Placement | null {
    const grid = this.gridFor(category)
    if (!grid || grid.sampleCount === 0) return null
    if (!(size.width > 0 && size.width <= 1 && size.height > 0 && size.height <= 1)) {
      throw new RangeError(`Placement size must be within (0, 1], got ${size.width}x${size.height}`)
    }

    const { rows, cols } = grid
    let best: Placement | null = null
    for (let row = 0; row < rows; row++) {
      const y = row / rows
      if (y + size.height > 1 + 1e-9) break
      for (let col = 0; col < cols; col++) {
        const x = col / cols
        if (x + size.width > 1 + 1e-9) break
        const candidate: BoxRecord = {
          category,
          xMin: x,
          yMin: y,
          xMax: Math.min(1, x + size.width),
          yMax: Math.min(1, y + size.height),
          canvasWidth: 1,
          canvasHeight: 1,
        }
        const score = weightedValue(
          grid,
          mapBoxToCells(candidate, rows, cols, { degenerateEpsilon: this.degenerateEpsilon })
        )
        if (!best || score > best.score) {
          best = { category, bbox: { x, y, width: size.width, height: size.height }, score }
        }
      }
    }
    return best
  }

  private gridFor(category: string): Grid | undefined {
    return this.heatmaps.grids.get(category)
  }

  private cellBounds(row: number, col: number): NormalizedBBox {
    const { rows, cols } = this.heatmaps
    return { x: col / cols, y: row / rows, width: 1 / cols, height: 1 / rows }
  }

  private combine(elements: ElementScore[]): number {
    if (elements.length === 0) return this.neutralScore

    switch (this.combination) {
      case 'min':
        return Math.min(...elements.map((e) => e.score))
      case 'weighted': {
        const weights = this.options.categoryWeights ?? {}
        let total = 0
        let weightSum = 0
        for (const e of elements) {
          const w = Object.hasOwn(weights, e.category) ? (weights[e.category] ?? 1) : 1
          total += w * e.score
          weightSum += w
        }
        return weightSum > 0 ? total / weightSum : this.neutralScore
      }
      case 'mean':
        return elements.reduce((sum, e) => sum + e.score, 0) / elements.length
    }
  }
}

/** Coverage-weighted average of grid values; divides by the covered share for clipped boxes. */
function weightedValue(grid: Grid, cells: CellWeight[]): number {
  let total = 0
  let weightSum = 0
  for (const { row, col, weight } of cells) {
    total += weight * (grid.cells[row * grid.cols + col] ?? 0)
    weightSum += weight
  }
  return weightSum > 0 ? total / weightSum : 0
}
