/**
 * BoxRecord — one annotated element: category, bounding box in source-canvas
 * units, and the size of the canvas it was drawn on.
 * Immutable once created; consumed by the grid mapper and discarded.
 */

import { z } from 'zod'
import { InvalidBoxError } from '../errors'

export interface BoxRecord {
  readonly category: string
  readonly xMin: number
  readonly yMin: number
  readonly xMax: number
  readonly yMax: number
  readonly canvasWidth: number
  readonly canvasHeight: number
  /** Source layout (poster / annotation task). Drives `layoutCount`. */
  readonly layoutId?: string
}

/** Rectangle in the unit square, origin upper-left. */
export interface NormalizedBBox {
  x: number
  y: number
  width: number
  height: number
}

export const BoxRecordSchema = z.object({
  category: z.string().min(1, 'category is required'),
  xMin: z.number().finite(),
  yMin: z.number().finite(),
  xMax: z.number().finite(),
  yMax: z.number().finite(),
  canvasWidth: z.number().finite(),
  canvasHeight: z.number().finite(),
  layoutId: z.string().min(1).optional(),
})

export type BoxRecordInput = z.input<typeof BoxRecordSchema>

/**
 * Validate and freeze a box record.
 * Throws `InvalidBoxError` for non-finite values, inverted coordinates or an empty canvas.
 */
export function createBoxRecord(input: BoxRecordInput): BoxRecord {
  const parsed = BoxRecordSchema.safeParse(input)
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')
    throw new InvalidBoxError(`Invalid box record (${detail})`, 'geometry')
  }

  const box = parsed.data
  if (box.canvasWidth <= 0 || box.canvasHeight <= 0) {
    throw new InvalidBoxError(
      `Canvas must have positive size, got ${box.canvasWidth}x${box.canvasHeight}`,
      'canvas'
    )
  }
  if (box.xMin >= box.xMax || box.yMin >= box.yMax) {
    throw new InvalidBoxError(
      `Box corners are inverted or collapsed: (${box.xMin}, ${box.yMin}) -> (${box.xMax}, ${box.yMax})`,
      'geometry'
    )
  }

  const record: BoxRecord = {
    category: box.category,
    xMin: box.xMin,
    yMin: box.yMin,
    xMax: box.xMax,
    yMax: box.yMax,
    canvasWidth: box.canvasWidth,
    canvasHeight: box.canvasHeight,
    ...(box.layoutId !== undefined ? { layoutId: box.layoutId } : {}),
  }
  return Object.freeze(record)
}
