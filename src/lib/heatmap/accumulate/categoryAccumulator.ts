/**
 * Running density grid for a single category.
 * Append-only: absorbing a box never decreases a cell, so a corpus can be
 * folded in one streamed pass.
 */

import { CategoryMismatchError } from '../errors'
import { mapBoxToCells, type GridMapperOptions } from '../map/gridMapper'
import type { BoxRecord } from '../schema/boxRecord'
import { assertResolution, assertSameResolution, freezeGrid, type Grid } from '../schema/grid'

export class CategoryAccumulator {
  private readonly cells: Float64Array
  private readonly layoutIds = new Set<string>()
  private samples = 0

  constructor(
    readonly category: string,
    readonly rows: number,
    readonly cols: number,
    private readonly mapperOptions: GridMapperOptions = {}
  ) {
    assertResolution(rows, cols)
    this.cells = new Float64Array(rows * cols)
  }

  get sampleCount(): number {
    return this.samples
  }

  get layoutCount(): number {
    return this.layoutIds.size
  }

  /**
   * Add a box's areal coverage to the grid.
   * Mapping runs before any mutation, so a box that throws leaves the grid untouched.
   */
  absorb(box: BoxRecord): void {
    if (box.category !== this.category) {
      throw new CategoryMismatchError(this.category, box.category)
    }
    const weights = mapBoxToCells(box, this.rows, this.cols, this.mapperOptions)
    for (const { row, col, weight } of weights) {
      this.cells[row * this.cols + col] += weight
    }
    this.samples++
    if (box.layoutId !== undefined) this.layoutIds.add(box.layoutId)
  }

  /** Fold another shard's accumulator for the same category into this one. */
  merge(other: CategoryAccumulator): void {
    if (other.category !== this.category) {
      throw new CategoryMismatchError(this.category, other.category)
    }
    assertSameResolution(this, other)
    for (let i = 0; i < this.cells.length; i++) {
      this.cells[i] += other.cells[i] ?? 0
    }
    this.samples += other.samples
    for (const id of other.layoutIds) this.layoutIds.add(id)
  }

  /** Layout ids seen so far, in first-seen order. */
  layouts(): string[] {
    return [...this.layoutIds]
  }

  /** Copy of the raw (un-normalized) accumulated grid. */
  finalize(): Grid {
    return freezeGrid({
      rows: this.rows,
      cols: this.cols,
      cells: Array.from(this.cells),
      sampleCount: this.samples,
      layoutCount: this.layoutIds.size,
    })
  }
}
