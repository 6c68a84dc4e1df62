/**
 * Heatmap configuration
 *
 * Reads grid resolution, categories and policies from environment variables.
 * Resolution has no default: a set built at one resolution cannot be queried
 * at another, so it must be chosen explicitly.
 */

import { z } from 'zod'

/** Poster element labels used by the annotation project. */
export const DEFAULT_CATEGORIES = [
  'Title',
  'Location',
  'Time',
  'Host/organization',
  'Call-To-Action/Purpose',
  'Text descriptions/details',
] as const

export const HeatmapConfigSchema = z.object({
  rows: z.number().int().positive(),
  cols: z.number().int().positive(),
  categorySet: z
    .array(z.string().min(1))
    .min(1, 'at least one category is required')
    .refine((list) => new Set(list).size === list.length, 'categories must be unique'),
  malformedPolicy: z.enum(['skip', 'fail_fast']).default('fail_fast'),
  scoreCombination: z.enum(['mean', 'min', 'weighted']).default('mean'),
  categoryWeights: z.record(z.number().nonnegative()).default({}),
  smoothingSigma: z.number().nonnegative().default(0),
  degenerateEpsilon: z.number().positive().default(1e-12),
})

export type HeatmapConfig = z.infer<typeof HeatmapConfigSchema>
export type HeatmapConfigInput = z.input<typeof HeatmapConfigSchema>

export class HeatmapConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid heatmap configuration: ${issues.join('; ')}`)
    this.name = 'HeatmapConfigError'
  }
}

export function parseHeatmapConfig(input: HeatmapConfigInput): HeatmapConfig {
  const result = HeatmapConfigSchema.safeParse(input)
  if (!result.success) {
    throw new HeatmapConfigError(
      result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
    )
  }
  return result.data
}

function splitList(value: string | undefined): string[] | undefined {
  if (!value) return undefined
  const items = value.split('|').map((s) => s.trim()).filter(Boolean)
  return items.length > 0 ? items : undefined
}

function numberOrUndefined(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined
  return Number(value)
}

/** `Title=2|Time=0.5` -> { Title: 2, Time: 0.5 } */
function parseWeights(value: string | undefined): Record<string, number> | undefined {
  const entries = splitList(value)
  if (!entries) return undefined
  const weights = new Map<string, number>()
  for (const entry of entries) {
    const eq = entry.lastIndexOf('=')
    if (eq <= 0) throw new HeatmapConfigError([`HEATMAP_CATEGORY_WEIGHTS: "${entry}" is not category=weight`])
    weights.set(entry.slice(0, eq).trim(), Number(entry.slice(eq + 1)))
  }
  return Object.fromEntries(weights)
}

/**
 * Load configuration from environment variables:
 *
 *   HEATMAP_ROWS, HEATMAP_COLS        required grid resolution
 *   HEATMAP_CATEGORIES                `|`-separated labels (default: poster labels)
 *   HEATMAP_MALFORMED_POLICY          skip | fail_fast (default fail_fast)
 *   HEATMAP_SCORE_COMBINATION         mean | min | weighted (default mean)
 *   HEATMAP_CATEGORY_WEIGHTS          `Title=2|Time=0.5`
 *   HEATMAP_SMOOTHING_SIGMA           Gaussian blur in cells (default 0)
 *   HEATMAP_DEGENERATE_EPSILON        area below which a box votes for one cell
 */
export function loadHeatmapConfig(env: NodeJS.ProcessEnv = process.env): HeatmapConfig {
  const rows = numberOrUndefined(env.HEATMAP_ROWS)
  const cols = numberOrUndefined(env.HEATMAP_COLS)
  const missing: string[] = []
  if (rows === undefined) missing.push('HEATMAP_ROWS is required')
  if (cols === undefined) missing.push('HEATMAP_COLS is required')
  if (rows === undefined || cols === undefined) throw new HeatmapConfigError(missing)

  return parseHeatmapConfig({
    rows,
    cols,
    categorySet: splitList(env.HEATMAP_CATEGORIES) ?? [...DEFAULT_CATEGORIES],
    malformedPolicy: parseEnum(env.HEATMAP_MALFORMED_POLICY, ['skip', 'fail_fast'], 'HEATMAP_MALFORMED_POLICY'),
    scoreCombination: parseEnum(
      env.HEATMAP_SCORE_COMBINATION,
      ['mean', 'min', 'weighted'],
      'HEATMAP_SCORE_COMBINATION'
    ),
    categoryWeights: parseWeights(env.HEATMAP_CATEGORY_WEIGHTS),
    smoothingSigma: numberOrUndefined(env.HEATMAP_SMOOTHING_SIGMA),
    degenerateEpsilon: numberOrUndefined(env.HEATMAP_DEGENERATE_EPSILON),
  })
}

function parseEnum<T extends string>(value: string | undefined, allowed: readonly T[], name: string): T | undefined {
  if (value === undefined || value.trim() === '') return undefined
  const normalized = value.trim().toLowerCase()
  const match = allowed.find((a) => a === normalized)
  if (!match) throw new HeatmapConfigError([`${name}: expected one of ${allowed.join(', ')}, got "${value}"`])
  return match
}
