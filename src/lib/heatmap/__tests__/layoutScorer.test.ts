import { describe, expect, it } from 'vitest'
import { HeatmapAggregator } from '../aggregate/heatmapAggregator'
import { InvalidBoxError, ResolutionMismatchError } from '../errors'
import { LayoutScorer } from '../score/layoutScorer'
import { createBoxRecord, type BoxRecord } from '../schema/boxRecord'
import type { FinalizedHeatmapSet } from '../schema/heatmapSet'

function box(category: string, xMin: number, yMin: number, xMax: number, yMax: number): BoxRecord {
  return createBoxRecord({ category, xMin, yMin, xMax, yMax, canvasWidth: 100, canvasHeight: 100 })
}

/** 2x2 title grid [[1, 0], [0, 0.5]] and date grid [[1, 0], [0, 0]]. */
async function buildSet(): Promise<FinalizedHeatmapSet> {
  return new HeatmapAggregator({ rows: 2, cols: 2 }).run([
    box('title', 0, 0, 50, 50),
    box('title', 0, 0, 50, 50),
    box('title', 50, 50, 100, 100),
    box('date', 0, 0, 50, 50),
  ])
}

describe('LayoutScorer.score', () => {
  it('scores the hot cell 1 and the empty cell 0', async () => {
    const heatmaps = await new HeatmapAggregator({ rows: 2, cols: 2 }).run([
      box('title', 0, 0, 50, 50),
      box('title', 0, 0, 50, 50),
      box('title', 0, 0, 50, 50),
    ])
    const scorer = new LayoutScorer(heatmaps)

    expect(scorer.score([box('title', 0, 0, 50, 50)]).score).toBe(1)
    expect(scorer.score([box('title', 50, 50, 100, 100)]).score).toBe(0)
  })

  it('averages grid values by coverage for boxes spanning several cells', async () => {
    const scorer = new LayoutScorer(await buildSet())
    const result = scorer.score([box('title', 0, 0, 100, 100)])
    expect(result.elements[0]?.score).toBeCloseTo(0.375, 12)
    expect(result.elements[0]?.status).toBe('scored')
  })

  it('gives unknown categories the neutral score and a warning', async () => {
    const scorer = new LayoutScorer(await buildSet())
    const result = scorer.score([box('title', 0, 0, 50, 50), box('logo', 0, 0, 50, 50)])

    expect(result.elements.map((e) => [e.category, e.score, e.status])).toEqual([
      ['title', 1, 'scored'],
      ['logo', 0, 'unknown-category'],
    ])
    expect(result.warnings).toEqual([{ kind: 'unknown_category', category: 'logo', elementIndex: 1 }])
    expect(result.score).toBe(0.5)
  })

  it('treats categories named after object members as ordinary keys', async () => {
    const heatmaps = await new HeatmapAggregator({ rows: 2, cols: 2 }).run([
      box('constructor', 0, 0, 50, 50),
      box('title', 0, 0, 50, 50),
    ])
    const scorer = new LayoutScorer(heatmaps, { combination: 'weighted', categoryWeights: { title: 2 } })
    const result = scorer.score([box('constructor', 0, 0, 50, 50), box('title', 0, 0, 50, 50)])

    expect(result.elements.map((e) => [e.score, e.status])).toEqual([
      [1, 'scored'],
      [1, 'scored'],
    ])
    expect(result.score).toBe(1)
  })

  it('returns neutral scores against heatmaps built from nothing', async () => {
    const heatmaps = await new HeatmapAggregator({ rows: 2, cols: 2, categorySet: ['title', 'date'] }).run([])
    const result = new LayoutScorer(heatmaps).score([box('title', 0, 0, 50, 50), box('date', 50, 50, 100, 100)])

    expect(result.score).toBe(0)
    expect(result.elements.map((e) => e.status)).toEqual(['no-data', 'no-data'])
    expect(result.warnings).toEqual([])
  })

  it('combines element scores by mean, min or category weight', async () => {
    const heatmaps = await buildSet()
    const layout = [box('title', 0, 0, 50, 50), box('date', 50, 50, 100, 100)]

    expect(new LayoutScorer(heatmaps).score(layout).score).toBe(0.5)
    expect(new LayoutScorer(heatmaps, { combination: 'min' }).score(layout).score).toBe(0)
    expect(
      new LayoutScorer(heatmaps, { combination: 'weighted', categoryWeights: { title: 3 } }).score(layout).score
    ).toBe(0.75)
  })

  it('scores an empty layout as neutral', async () => {
    const scorer = new LayoutScorer(await buildSet(), { neutralScore: 0.1 })
    expect(scorer.score([]).score).toBe(0.1)
  })

  it('ranks layouts built from the corpus above layouts in empty regions', async () => {
    const corpus = [box('title', 0, 0, 50, 50), box('title', 0, 0, 50, 50), box('title', 50, 50, 100, 100)]
    const scorer = new LayoutScorer(await new HeatmapAggregator({ rows: 2, cols: 2 }).run(corpus))

    const historical = scorer.score(corpus)
    const empty = scorer.score([box('title', 50, 0, 100, 50)])
    for (const element of historical.elements) {
      expect(element.score).toBeGreaterThanOrEqual(empty.score)
    }
  })

  it('rejects a resolution that differs from the heatmaps', async () => {
    const heatmaps = await buildSet()
    expect(() => new LayoutScorer(heatmaps, { resolution: { rows: 21, cols: 12 } })).toThrow(
      ResolutionMismatchError
    )
    expect(() => new LayoutScorer(heatmaps).score([], { resolution: { rows: 3, cols: 2 } })).toThrow(
      ResolutionMismatchError
    )
  })

  it('rejects elements outside the canvas, even of unknown categories', async () => {
    const scorer = new LayoutScorer(await buildSet())
    expect(() => scorer.score([box('logo', 120, 0, 140, 20)])).toThrow(InvalidBoxError)
  })

  it('does not modify the heatmaps', async () => {
    const heatmaps = await buildSet()
    const before = [...(heatmaps.grids.get('title')?.cells ?? [])]
    new LayoutScorer(heatmaps).score([box('title', 0, 0, 100, 100)])

    expect(heatmaps.grids.get('title')?.cells).toEqual(before)
    expect(Object.isFrozen(heatmaps.grids.get('title')?.cells)).toBe(true)
  })
})

describe('LayoutScorer.topCategoryRegions', () => {
  it('returns the densest non-empty cells first with their bounds', async () => {
    const scorer = new LayoutScorer(await buildSet())
    expect(scorer.topCategoryRegions('title', 3)).toEqual([
      { row: 0, col: 0, value: 1, bounds: { x: 0, y: 0, width: 0.5, height: 0.5 } },
      { row: 1, col: 1, value: 0.5, bounds: { x: 0.5, y: 0.5, width: 0.5, height: 0.5 } },
    ])
    expect(scorer.topCategoryRegions('title', 1)).toHaveLength(1)
  })

  it('returns nothing for unknown categories or k <= 0', async () => {
    const scorer = new LayoutScorer(await buildSet())
    expect(scorer.topCategoryRegions('logo', 3)).toEqual([])
    expect(scorer.topCategoryRegions('title', 0)).toEqual([])
  })
})

describe('LayoutScorer.suggestPlacement', () => {
  it('picks the cell-aligned position with the highest density', async () => {
    const scorer = new LayoutScorer(await buildSet())
    expect(scorer.suggestPlacement('title', { width: 0.5, height: 0.5 })).toEqual({
      category: 'title',
      bbox: { x: 0, y: 0, width: 0.5, height: 0.5 },
      score: 1,
    })
    expect(scorer.suggestPlacement('title', { width: 1, height: 0.5 })).toEqual({
      category: 'title',
      bbox: { x: 0, y: 0, width: 1, height: 0.5 },
      score: 0.5,
    })
  })

  it('returns null without learned density', async () => {
    const scorer = new LayoutScorer(await buildSet())
    expect(scorer.suggestPlacement('logo', { width: 0.5, height: 0.5 })).toBeNull()
  })

  it('rejects sizes outside the unit square', async () => {
    const scorer = new LayoutScorer(await buildSet())
    expect(() => scorer.suggestPlacement('title', { width: 1.5, height: 0.5 })).toThrow(RangeError)
  })
})
