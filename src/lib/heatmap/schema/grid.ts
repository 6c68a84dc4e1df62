/**
 * Grid — fixed-resolution density values for one category, stored row-major.
 */

import { ResolutionMismatchError, type Resolution } from '../errors'

export interface Grid {
  readonly rows: number
  readonly cols: number
  /** Row-major, length rows * cols, all values >= 0. */
  readonly cells: readonly number[]
  /** Number of box records absorbed. */
  readonly sampleCount: number
  /** Number of distinct source layouts that contributed boxes. */
  readonly layoutCount: number
}

export function assertResolution(rows: number, cols: number): void {
  if (!Number.isInteger(rows) || !Number.isInteger(cols) || rows <= 0 || cols <= 0) {
    throw new RangeError(`Grid resolution must be positive integers, got ${rows}x${cols}`)
  }
}

export function assertSameResolution(expected: Resolution, actual: Resolution): void {
  if (expected.rows !== actual.rows || expected.cols !== actual.cols) {
    throw new ResolutionMismatchError(
      { rows: expected.rows, cols: expected.cols },
      { rows: actual.rows, cols: actual.cols }
    )
  }
}

export function freezeGrid(grid: Grid): Grid {
  return Object.freeze({
    rows: grid.rows,
    cols: grid.cols,
    cells: Object.freeze([...grid.cells]),
    sampleCount: grid.sampleCount,
    layoutCount: grid.layoutCount,
  })
}

export function createEmptyGrid(rows: number, cols: number): Grid {
  assertResolution(rows, cols)
  return freezeGrid({
    rows,
    cols,
    cells: new Array<number>(rows * cols).fill(0),
    sampleCount: 0,
    layoutCount: 0,
  })
}

export function getCell(grid: Grid, row: number, col: number): number {
  if (row < 0 || row >= grid.rows || col < 0 || col >= grid.cols) {
    throw new RangeError(`Cell (${row}, ${col}) is outside a ${grid.rows}x${grid.cols} grid`)
  }
  return grid.cells[row * grid.cols + col] ?? 0
}

export function gridMax(grid: Grid): number {
  let max = 0
  for (const v of grid.cells) if (v > max) max = v
  return max
}

/**
 * Rescale so the largest cell is 1.0. An all-zero grid stays all-zero.
 * Normalizing an already-normalized grid returns identical values.
 */
export function normalizeGrid(grid: Grid): Grid {
  const max = gridMax(grid)
  if (max === 0) return freezeGrid(grid)
  return freezeGrid({ ...grid, cells: grid.cells.map((v) => v / max) })
}

export function gridToMatrix(grid: Grid): number[][] {
  const matrix: number[][] = []
  for (let r = 0; r < grid.rows; r++) {
    matrix.push(grid.cells.slice(r * grid.cols, (r + 1) * grid.cols))
  }
  return matrix
}

// ─── Gaussian smoothing ───────────────────────────────────────

function gaussianKernel(sigma: number): number[] {
  const radius = Math.floor(4 * sigma + 0.5)
  const weights: number[] = []
  let total = 0
  for (let i = -radius; i <= radius; i++) {
    const w = Math.exp((-0.5 * i * i) / (sigma * sigma))
    weights.push(w)
    total += w
  }
  return weights.map((w) => w / total)
}

/** Mirror index into [0, n) with the edge sample repeated (d c b a | a b c d | d c b a). */
function reflectIndex(i: number, n: number): number {
  const period = 2 * n
  const m = ((i % period) + period) % period
  return m < n ? m : period - 1 - m
}

function convolve(
  cells: readonly number[],
  rows: number,
  cols: number,
  kernel: number[],
  axis: 'rows' | 'cols'
): number[] {
  const radius = (kernel.length - 1) / 2
  const out = new Array<number>(rows * cols).fill(0)
  for (let r = 0; r < rows; r++) {
    for (let c = 0; c < cols; c++) {
      let acc = 0
      for (let k = -radius; k <= radius; k++) {
        const src =
          axis === 'rows'
            ? reflectIndex(r + k, rows) * cols + c
            : r * cols + reflectIndex(c + k, cols)
        acc += (kernel[k + radius] ?? 0) * (cells[src] ?? 0)
      }
      out[r * cols + c] = acc
    }
  }
  return out
}

/**
 * Separable Gaussian blur, radius round(4σ), reflecting at the grid edges.
 * Sigma is in grid cells; `sigma <= 0` returns the grid unchanged.
 */
export function smoothGrid(grid: Grid, sigma: number): Grid {
  if (!(sigma > 0)) return freezeGrid(grid)
  const kernel = gaussianKernel(sigma)
  const vertical = convolve(grid.cells, grid.rows, grid.cols, kernel, 'rows')
  const both = convolve(vertical, grid.rows, grid.cols, kernel, 'cols')
  return freezeGrid({ ...grid, cells: both })
}
