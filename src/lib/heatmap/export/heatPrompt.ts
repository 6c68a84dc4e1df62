/**
 * `<LAYOUT_HEAT>` text block: the line format the layout prompt uses to hand
 * heatmaps to a language model.
 *
 *   <LAYOUT_HEAT>
 *   FRAME_PCT 100 100
 *   title_heat 1.0 0.4 0.0 ...
 *
 * One line per category, row-major, one decimal per cell.
 */

import type { FinalizedHeatmapSet } from '../schema/heatmapSet'

export const HEAT_BLOCK_HEADER = '<LAYOUT_HEAT>'
export const FRAME_LINE = 'FRAME_PCT 100 100'

/** "Call-To-Action/Purpose" -> "call-to-action_purpose_heat" */
export function heatTag(category: string): string {
  return `${category.toLowerCase().trim().replace(/[\s/]+/g, '_')}_heat`
}

/** Round to the nearest integer, ties to even. */
function roundHalfEven(value: number): number {
  const rounded = Math.round(value)
  return Math.abs(value % 1) === 0.5 && rounded % 2 !== 0 ? rounded - 1 : rounded
}

/** One decimal, ties to even: 0.25 -> "0.2", 0.75 -> "0.8". */
export function formatHeatValue(value: number): string {
  return (roundHalfEven(value * 10) / 10).toFixed(1)
}

export function formatHeatLine(category: string, cells: readonly number[]): string {
  return `${heatTag(category)} ${cells.map(formatHeatValue).join(' ')}`
}

export function formatHeatPromptBlock(set: FinalizedHeatmapSet): string {
  const lines = [HEAT_BLOCK_HEADER, FRAME_LINE]
  for (const category of set.categories) {
    const grid = set.grids.get(category)
    if (grid) lines.push(formatHeatLine(category, grid.cells))
  }
  return lines.join('\n')
}

export interface ParseHeatBlockOptions {
  rows: number
  cols: number
  /** Maps tags back to display names; unknown tags are dropped when given. */
  categories?: readonly string[]
}

/**
 * Read heat lines back into row-major cell arrays keyed by category.
 * Lines with the wrong number of values, or that are not heat lines, are ignored.
 */
export function parseHeatPromptBlock(text: string, options: ParseHeatBlockOptions): Record<string, number[]> {
  const byTag = new Map<string, string>()
  for (const category of options.categories ?? []) byTag.set(heatTag(category), category)

  const expected = options.rows * options.cols
  const out = new Map<string, number[]>()
  for (const line of text.split(/\r?\n/)) {
    const [rawTag, ...values] = line.trim().split(/\s+/)
    if (!rawTag || values.length === 0) continue
    const tag = rawTag.toLowerCase()
    if (!tag.endsWith('_heat')) continue

    const category = options.categories ? byTag.get(tag) : tag.slice(0, -'_heat'.length)
    if (!category) continue

    const cells = values.map(Number)
    if (cells.length !== expected || cells.some((v) => !Number.isFinite(v))) continue
    out.set(category, cells)
  }
  return Object.fromEntries(out)
}
