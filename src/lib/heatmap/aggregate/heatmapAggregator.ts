/**
 * Heatmap aggregation: one streamed pass over an annotation corpus, routing each
 * box to its category's accumulator, then smoothing and max-normalizing every
 * grid into a FinalizedHeatmapSet.
 *
 * Large corpora can be split into shards: `accumulate` each shard, combine with
 * `mergeShards` (cell-wise sums, any order), and `finalize` once.
 */

import { createLogger } from '@/lib/logger'
import { CategoryAccumulator } from '../accumulate/categoryAccumulator'
import {
  AggregationCancelledError,
  EmptyCorpusError,
  InvalidBoxError,
} from '../errors'
import { DEFAULT_DEGENERATE_EPSILON } from '../map/gridMapper'
import { createBoxRecord, type BoxRecordInput } from '../schema/boxRecord'
import {
  assertResolution,
  assertSameResolution,
  createEmptyGrid,
  normalizeGrid,
  smoothGrid,
  type Grid,
} from '../schema/grid'
import {
  freezeHeatmapSet,
  HEATMAP_SET_VERSION,
  type CanvasStats,
  type FinalizedHeatmapSet,
} from '../schema/heatmapSet'

const log = createLogger('aggregate')

export type MalformedPolicy = 'skip' | 'fail_fast'

/** Any one-pass producer of box records; plain objects are validated on the way in. */
export type BoxCorpus = Iterable<BoxRecordInput> | AsyncIterable<BoxRecordInput>

export interface AggregatorOptions {
  rows: number
  cols: number
  /** Declared categories. When set, boxes of other categories are malformed. */
  categorySet?: readonly string[]
  malformedPolicy?: MalformedPolicy
  /** Gaussian blur in grid cells, applied before normalization. 0 disables it. */
  smoothingSigma?: number
  degenerateEpsilon?: number
  /** `reject` throws EmptyCorpusError when nothing was absorbed. */
  emptyCorpus?: 'allow' | 'reject'
  /** Checked before each record; returning true aborts the run. */
  shouldCancel?: () => boolean
  now?: () => Date
}

interface CanvasTally {
  count: number
  sumWidth: number
  minWidth: number
  maxWidth: number
  sumHeight: number
  minHeight: number
  maxHeight: number
}

/** Un-normalized accumulation state for one slice of the corpus. */
export interface HeatmapShard {
  rows: number
  cols: number
  /** Insertion order is first-seen category order. */
  accumulators: Map<string, CategoryAccumulator>
  recordCount: number
  skippedCount: number
  canvas: CanvasTally
}

function emptyTally(): CanvasTally {
  return {
    count: 0,
    sumWidth: 0,
    minWidth: Infinity,
    maxWidth: -Infinity,
    sumHeight: 0,
    minHeight: Infinity,
    maxHeight: -Infinity,
  }
}

function mergeTally(into: CanvasTally, from: CanvasTally): void {
  into.count += from.count
  into.sumWidth += from.sumWidth
  into.minWidth = Math.min(into.minWidth, from.minWidth)
  into.maxWidth = Math.max(into.maxWidth, from.maxWidth)
  into.sumHeight += from.sumHeight
  into.minHeight = Math.min(into.minHeight, from.minHeight)
  into.maxHeight = Math.max(into.maxHeight, from.maxHeight)
}

function tallyToStats(tally: CanvasTally): CanvasStats | null {
  if (tally.count === 0) return null
  return {
    minWidth: tally.minWidth,
    maxWidth: tally.maxWidth,
    meanWidth: tally.sumWidth / tally.count,
    minHeight: tally.minHeight,
    maxHeight: tally.maxHeight,
    meanHeight: tally.sumHeight / tally.count,
  }
}

export class HeatmapAggregator {
  readonly rows: number
  readonly cols: number
  private readonly categorySet: readonly string[] | undefined
  private readonly malformedPolicy: MalformedPolicy
  private readonly smoothingSigma: number
  private readonly degenerateEpsilon: number

  constructor(private readonly options: AggregatorOptions) {
    assertResolution(options.rows, options.cols)
    if (options.smoothingSigma !== undefined && !(options.smoothingSigma >= 0)) {
      throw new RangeError(`smoothingSigma must be >= 0, got ${options.smoothingSigma}`)
    }
    this.rows = options.rows
    this.cols = options.cols
    this.categorySet = options.categorySet ? [...new Set(options.categorySet)] : undefined
    this.malformedPolicy = options.malformedPolicy ?? 'fail_fast'
    this.smoothingSigma = options.smoothingSigma ?? 0
    this.degenerateEpsilon = options.degenerateEpsilon ?? DEFAULT_DEGENERATE_EPSILON
  }

  /** Aggregate a whole corpus. Either returns a complete set or throws. */
  async run(corpus: BoxCorpus): Promise<FinalizedHeatmapSet> {
    return this.finalize(await this.accumulate(corpus))
  }

  /** Fold a corpus (or one shard of it) without normalizing. */
  async accumulate(corpus: BoxCorpus): Promise<HeatmapShard> {
    const shard: HeatmapShard = {
      rows: this.rows,
      cols: this.cols,
      accumulators: new Map(),
      recordCount: 0,
      skippedCount: 0,
      canvas: emptyTally(),
    }
    const declared = this.categorySet ? new Set(this.categorySet) : undefined

    let index = 0
    for await (const item of corpus) {
      if (this.options.shouldCancel?.()) {
        log.warn('Cancelled', { absorbed: shard.recordCount, skipped: shard.skippedCount })
        throw new AggregationCancelledError(shard.recordCount)
      }
      try {
        const box = createBoxRecord(item)
        if (declared && !declared.has(box.category)) {
          throw new InvalidBoxError(`Category "${box.category}" is not in the configured set`, 'category')
        }
        let accumulator = shard.accumulators.get(box.category)
        if (!accumulator) {
          accumulator = new CategoryAccumulator(box.category, this.rows, this.cols, {
            degenerateEpsilon: this.degenerateEpsilon,
          })
        }
        accumulator.absorb(box)
        // Registered only after a successful absorb so a failed first box leaves no empty entry.
        shard.accumulators.set(box.category, accumulator)

        shard.recordCount++
        shard.canvas.count++
        shard.canvas.sumWidth += box.canvasWidth
        shard.canvas.minWidth = Math.min(shard.canvas.minWidth, box.canvasWidth)
        shard.canvas.maxWidth = Math.max(shard.canvas.maxWidth, box.canvasWidth)
        shard.canvas.sumHeight += box.canvasHeight
        shard.canvas.minHeight = Math.min(shard.canvas.minHeight, box.canvasHeight)
        shard.canvas.maxHeight = Math.max(shard.canvas.maxHeight, box.canvasHeight)
      } catch (error) {
        if (error instanceof InvalidBoxError && this.malformedPolicy === 'skip') {
          shard.skippedCount++
          log.warn('Skipping malformed record', { index, reason: error.reason, message: error.message })
        } else {
          throw error
        }
      }
      index++
    }

    log.debug('Shard accumulated', {
      records: shard.recordCount,
      skipped: shard.skippedCount,
      categories: [...shard.accumulators.keys()],
    })
    return shard
  }

  /**
   * Combine shards into a new shard. Inputs are left untouched.
   * Shards of different resolutions throw `ResolutionMismatchError`.
   */
  static mergeShards(shards: readonly HeatmapShard[]): HeatmapShard {
    const first = shards[0]
    if (!first) throw new RangeError('mergeShards needs at least one shard')

    const merged: HeatmapShard = {
      rows: first.rows,
      cols: first.cols,
      accumulators: new Map(),
      recordCount: 0,
      skippedCount: 0,
      canvas: emptyTally(),
    }
    for (const shard of shards) {
      assertSameResolution(merged, shard)
      for (const [category, accumulator] of shard.accumulators) {
        let target = merged.accumulators.get(category)
        if (!target) {
          target = new CategoryAccumulator(category, merged.rows, merged.cols)
          merged.accumulators.set(category, target)
        }
        target.merge(accumulator)
      }
      merged.recordCount += shard.recordCount
      merged.skippedCount += shard.skippedCount
      mergeTally(merged.canvas, shard.canvas)
    }
    return merged
  }

  /** Smooth and normalize every category grid. The only place normalization happens. */
  finalize(shard: HeatmapShard): FinalizedHeatmapSet {
    assertSameResolution(this, shard)

    if (shard.recordCount === 0 && this.options.emptyCorpus === 'reject') {
      throw new EmptyCorpusError()
    }

    const categories = [...(this.categorySet ?? [])]
    for (const category of shard.accumulators.keys()) {
      if (!categories.includes(category)) categories.push(category)
    }

    const grids = new Map<string, Grid>()
    const layouts = new Set<string>()
    for (const category of categories) {
      const accumulator = shard.accumulators.get(category)
      const raw = accumulator ? accumulator.finalize() : createEmptyGrid(this.rows, this.cols)
      grids.set(category, normalizeGrid(smoothGrid(raw, this.smoothingSigma)))
      if (accumulator) for (const id of accumulator.layouts()) layouts.add(id)
    }

    const set = freezeHeatmapSet({
      version: HEATMAP_SET_VERSION,
      rows: this.rows,
      cols: this.cols,
      categories,
      grids,
      metadata: {
        sampleCount: shard.recordCount,
        layoutCount: layouts.size,
        skippedCount: shard.skippedCount,
        canvas: tallyToStats(shard.canvas),
        smoothingSigma: this.smoothingSigma,
        builtAt: (this.options.now?.() ?? new Date()).toISOString(),
      },
    })

    log.info('Heatmaps finalized', {
      resolution: `${this.rows}x${this.cols}`,
      categories: categories.length,
      samples: set.metadata.sampleCount,
      layouts: set.metadata.layoutCount,
      skipped: set.metadata.skippedCount,
    })
    return set
  }
}
