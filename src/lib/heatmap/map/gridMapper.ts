/**
 * Grid mapper: spreads one box over the cells of a rows x cols grid laid over
 * the unit square, weighting each cell by the share of the box's area inside it.
 * Independent of the source canvas's absolute size.
 */

import { InvalidBoxError } from '../errors'
import type { BoxRecord } from '../schema/boxRecord'
import { assertResolution } from '../schema/grid'

export interface CellWeight {
  row: number
  col: number
  /** Fraction of the box's normalized area that falls in this cell. */
  weight: number
}

export interface GridMapperOptions {
  /** Normalized area below which a box votes for a single cell. */
  degenerateEpsilon?: number
}

export const DEFAULT_DEGENERATE_EPSILON = 1e-12

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value))
}

/**
 * Map a box to `(row, col, weight)` triples in row-major order.
 *
 * Weights sum to 1 for boxes inside the canvas. Parts of a box hanging off the
 * canvas are clipped and their share dropped. A box that misses the canvas
 * entirely throws `InvalidBoxError`.
 */
export function mapBoxToCells(
  box: BoxRecord,
  rows: number,
  cols: number,
  options: GridMapperOptions = {}
): CellWeight[] {
  assertResolution(rows, cols)
  const epsilon = options.degenerateEpsilon ?? DEFAULT_DEGENERATE_EPSILON

  const x0 = box.xMin / box.canvasWidth
  const x1 = box.xMax / box.canvasWidth
  const y0 = box.yMin / box.canvasHeight
  const y1 = box.yMax / box.canvasHeight

  const cx0 = Math.max(0, x0)
  const cx1 = Math.min(1, x1)
  const cy0 = Math.max(0, y0)
  const cy1 = Math.min(1, y1)

  if (!(cx1 > cx0) || !(cy1 > cy0)) {
    throw new InvalidBoxError(
      `Box (${box.xMin}, ${box.yMin}) -> (${box.xMax}, ${box.yMax}) lies outside its ` +
        `${box.canvasWidth}x${box.canvasHeight} canvas`,
      'out-of-bounds'
    )
  }

  const nearestCell = (): CellWeight[] => {
    const centerX = clamp((x0 + x1) / 2, 0, 1)
    const centerY = clamp((y0 + y1) / 2, 0, 1)
    return [
      {
        row: Math.min(rows - 1, Math.floor(centerY * rows)),
        col: Math.min(cols - 1, Math.floor(centerX * cols)),
        weight: 1,
      },
    ]
  }

  const area = (x1 - x0) * (y1 - y0)
  if (area < epsilon) return nearestCell()

  const r0 = Math.min(rows - 1, Math.floor(cy0 * rows))
  const r1 = Math.min(rows - 1, Math.ceil(cy1 * rows) - 1)
  const c0 = Math.min(cols - 1, Math.floor(cx0 * cols))
  const c1 = Math.min(cols - 1, Math.ceil(cx1 * cols) - 1)

  const cells: CellWeight[] = []
  for (let row = r0; row <= r1; row++) {
    const overlapY = Math.min(cy1, (row + 1) / rows) - Math.max(cy0, row / rows)
    if (overlapY <= 0) continue
    for (let col = c0; col <= c1; col++) {
      const overlapX = Math.min(cx1, (col + 1) / cols) - Math.max(cx0, col / cols)
      if (overlapX <= 0) continue
      cells.push({ row, col, weight: (overlapX * overlapY) / area })
    }
  }
  // Rounding can leave a sliver with no positive overlap anywhere.
  return cells.length > 0 ? cells : nearestCell()
}
