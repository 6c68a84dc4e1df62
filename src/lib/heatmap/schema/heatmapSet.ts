/**
 * FinalizedHeatmapSet — normalized per-category grids from one aggregation run,
 * plus corpus metadata. Frozen on creation and shared read-only by scorers.
 */

import { z } from 'zod'
import { HeatmapSetFormatError } from '../errors'
import { freezeGrid, type Grid } from './grid'

export const HEATMAP_SET_VERSION = '1.0.0'

export interface CanvasStats {
  minWidth: number
  maxWidth: number
  meanWidth: number
  minHeight: number
  maxHeight: number
  meanHeight: number
}

export interface HeatmapSetMetadata {
  /** Box records absorbed across all categories. */
  sampleCount: number
  /** Distinct source layouts across all categories. */
  layoutCount: number
  /** Records dropped under the `skip` malformed-record policy. */
  skippedCount: number
  /** Canvas sizes of absorbed records; null when nothing was absorbed. */
  canvas: CanvasStats | null
  smoothingSigma: number
  /** ISO timestamp of the run. */
  builtAt: string
}

export interface FinalizedHeatmapSet {
  readonly version: string
  readonly rows: number
  readonly cols: number
  /** Declared categories first, then any others in first-seen order. */
  readonly categories: readonly string[]
  /** Keyed by category; category names are arbitrary strings. */
  readonly grids: ReadonlyMap<string, Grid>
  readonly metadata: Readonly<HeatmapSetMetadata>
}

export function freezeHeatmapSet(set: FinalizedHeatmapSet): FinalizedHeatmapSet {
  const grids = new Map<string, Grid>()
  for (const category of set.categories) {
    const grid = set.grids.get(category)
    if (grid) grids.set(category, freezeGrid(grid))
  }
  return Object.freeze({
    version: set.version,
    rows: set.rows,
    cols: set.cols,
    categories: Object.freeze([...set.categories]),
    grids: Object.freeze(grids),
    metadata: Object.freeze({
      ...set.metadata,
      canvas: set.metadata.canvas ? Object.freeze({ ...set.metadata.canvas }) : null,
    }),
  })
}

// ─── Persistence format ───────────────────────────────────────

const CanvasStatsSchema = z.object({
  minWidth: z.number(),
  maxWidth: z.number(),
  meanWidth: z.number(),
  minHeight: z.number(),
  maxHeight: z.number(),
  meanHeight: z.number(),
})

const SerializedGridSchema = z.object({
  cells: z.array(z.number().finite().nonnegative()),
  sampleCount: z.number().int().nonnegative(),
  layoutCount: z.number().int().nonnegative(),
})

// Grids are read as own [category, grid] entries; `__proto__` is an ordinary
// category here.
const GridEntriesSchema = z.preprocess(
  (value) => (typeof value === 'object' && value !== null && !Array.isArray(value) ? Object.entries(value) : value),
  z.array(z.tuple([z.string().min(1), SerializedGridSchema]))
)

export const SerializedHeatmapSetSchema = z.object({
  version: z.string().min(1),
  resolution: z.object({
    rows: z.number().int().positive(),
    cols: z.number().int().positive(),
  }),
  categories: z.array(z.string().min(1)),
  grids: GridEntriesSchema,
  metadata: z.object({
    sampleCount: z.number().int().nonnegative(),
    layoutCount: z.number().int().nonnegative(),
    skippedCount: z.number().int().nonnegative().default(0),
    canvas: CanvasStatsSchema.nullable().default(null),
    smoothingSigma: z.number().nonnegative().default(0),
    builtAt: z.string().min(1),
  }),
})

export type SerializedGrid = z.infer<typeof SerializedGridSchema>

export interface SerializedHeatmapSet {
  version: string
  resolution: { rows: number; cols: number }
  categories: string[]
  grids: Record<string, SerializedGrid>
  metadata: HeatmapSetMetadata
}

/** Self-describing JSON structure: resolution, categories, row-major cells, metadata. */
export function serializeHeatmapSet(set: FinalizedHeatmapSet): SerializedHeatmapSet {
  const entries: Array<[string, SerializedGrid]> = []
  for (const category of set.categories) {
    const grid = set.grids.get(category)
    if (!grid) continue
    entries.push([category, { cells: [...grid.cells], sampleCount: grid.sampleCount, layoutCount: grid.layoutCount }])
  }
  return {
    version: set.version,
    resolution: { rows: set.rows, cols: set.cols },
    categories: [...set.categories],
    // fromEntries defines own properties, so a `__proto__` category stays data.
    grids: Object.fromEntries(entries),
    metadata: {
      ...set.metadata,
      canvas: set.metadata.canvas ? { ...set.metadata.canvas } : null,
    },
  }
}

/**
 * Validate a previously serialized set and rebuild the frozen value.
 * Throws `HeatmapSetFormatError` listing every problem found.
 */
export function parseHeatmapSet(json: unknown): FinalizedHeatmapSet {
  const parsed = SerializedHeatmapSetSchema.safeParse(json)
  if (!parsed.success) {
    throw new HeatmapSetFormatError(
      'Invalid heatmap set',
      parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
    )
  }

  const data = parsed.data
  const { rows, cols } = data.resolution
  const serializedGrids = new Map(data.grids)
  const issues: string[] = []

  if (new Set(data.categories).size !== data.categories.length) {
    issues.push('categories: duplicate entries')
  }
  for (const category of data.categories) {
    const grid = serializedGrids.get(category)
    if (!grid) {
      issues.push(`grids.${category}: missing`)
    } else if (grid.cells.length !== rows * cols) {
      issues.push(`grids.${category}: expected ${rows * cols} cells, got ${grid.cells.length}`)
    }
  }
  for (const category of serializedGrids.keys()) {
    if (!data.categories.includes(category)) {
      issues.push(`grids.${category}: not listed in categories`)
    }
  }
  if (issues.length > 0) throw new HeatmapSetFormatError('Invalid heatmap set', issues)

  const grids = new Map<string, Grid>()
  for (const category of data.categories) {
    const grid = serializedGrids.get(category)
    if (grid) grids.set(category, { rows, cols, ...grid })
  }

  return freezeHeatmapSet({
    version: data.version,
    rows,
    cols,
    categories: data.categories,
    grids,
    metadata: data.metadata,
  })
}
