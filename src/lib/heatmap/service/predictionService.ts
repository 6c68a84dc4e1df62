/**
 * Prediction boundary: validates request bodies, runs queries against a loaded
 * heatmap set, and turns failures into distinguishable response states.
 * Transport-agnostic; an HTTP layer only needs to forward `status` and the body.
 */

import { z } from 'zod'
import { classifyErrorContext, type ErrorCategory } from '@/lib/errors/classification'
import { createLogger } from '@/lib/logger'
import type { HeatmapConfig } from '../config'
import { HeatmapSetFormatError } from '../errors'
import { LayoutScorer, type LayoutScore, type Placement, type Region } from '../score/layoutScorer'
import { BoxRecordSchema, createBoxRecord } from '../schema/boxRecord'
import type { FinalizedHeatmapSet } from '../schema/heatmapSet'
import type { HeatmapSetStore } from '../store/heatmapStore'

const log = createLogger('prediction')

// ─── Request Schemas ──────────────────────────────────────────

const ResolutionSchema = z.object({
  rows: z.number().int().positive(),
  cols: z.number().int().positive(),
})

export const ScoreRequestSchema = z.object({
  layout: z.array(BoxRecordSchema).max(1000, 'layout has too many elements'),
  resolution: ResolutionSchema.optional(),
})

export const TopRegionsRequestSchema = z.object({
  category: z.string().min(1, 'category is required'),
  k: z.number().int().positive().max(10000).default(3),
})

export const SuggestPlacementRequestSchema = z.object({
  category: z.string().min(1, 'category is required'),
  width: z.number().gt(0).lte(1),
  height: z.number().gt(0).lte(1),
})

// ─── Responses ────────────────────────────────────────────────

export type SuccessState = 'ok' | 'no_data'

export interface ServiceSuccess<T> {
  ok: true
  status: 200
  state: SuccessState
  data: T
}

export interface ServiceFailure {
  ok: false
  status: number
  state: ErrorCategory
  error: {
    message: string
    label: string
    details?: Array<{ path: string; message: string }>
  }
}

export type ServiceResponse<T> = ServiceSuccess<T> | ServiceFailure

function invalidBody(error: z.ZodError): ServiceFailure {
  return {
    ok: false,
    status: 400,
    state: 'invalid_request',
    error: {
      message: 'Invalid request body',
      label: 'Invalid Request',
      details: error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
    },
  }
}

function failure(error: unknown, route: string): ServiceFailure {
  const context = classifyErrorContext(error, { route })
  const { classification } = context
  if (classification.category === 'internal') {
    log.error('Request failed', context, error)
  } else {
    log.warn('Request rejected', context)
  }
  return {
    ok: false,
    status: classification.httpStatus,
    state: classification.category,
    error: { message: context.message, label: classification.label },
  }
}

export class PredictionService {
  private readonly scorer: LayoutScorer

  constructor(readonly heatmaps: FinalizedHeatmapSet, config: HeatmapConfig) {
    this.scorer = new LayoutScorer(heatmaps, {
      combination: config.scoreCombination,
      categoryWeights: config.categoryWeights,
      resolution: { rows: config.rows, cols: config.cols },
      degenerateEpsilon: config.degenerateEpsilon,
    })
  }

  /** Load the persisted set once; the service never reloads or mutates it. */
  static async fromStore(store: HeatmapSetStore, config: HeatmapConfig): Promise<PredictionService> {
    const set = await store.load()
    if (!set) throw new HeatmapSetFormatError('No heatmap set has been saved yet')
    log.info('Loaded heatmap set', {
      resolution: `${set.rows}x${set.cols}`,
      categories: set.categories.length,
      builtAt: set.metadata.builtAt,
    })
    return new PredictionService(set, config)
  }

  handleScore(body: unknown): ServiceResponse<LayoutScore> {
    const parsed = ScoreRequestSchema.safeParse(body)
    if (!parsed.success) return invalidBody(parsed.error)

    try {
      const layout = parsed.data.layout.map((box) => createBoxRecord(box))
      const result = this.scorer.score(layout, { resolution: parsed.data.resolution })
      const anyScored = result.elements.some((e) => e.status === 'scored')
      return {
        ok: true,
        status: 200,
        state: layout.length > 0 && !anyScored ? 'no_data' : 'ok',
        data: result,
      }
    } catch (error) {
      return failure(error, 'score')
    }
  }

  handleTopRegions(body: unknown): ServiceResponse<Region[]> {
    const parsed = TopRegionsRequestSchema.safeParse(body)
    if (!parsed.success) return invalidBody(parsed.error)

    try {
      const { category, k } = parsed.data
      const regions = this.scorer.topCategoryRegions(category, k)
      return { ok: true, status: 200, state: this.hasData(category) ? 'ok' : 'no_data', data: regions }
    } catch (error) {
      return failure(error, 'top-regions')
    }
  }

  handleSuggestPlacement(body: unknown): ServiceResponse<Placement | null> {
    const parsed = SuggestPlacementRequestSchema.safeParse(body)
    if (!parsed.success) return invalidBody(parsed.error)

    try {
      const { category, width, height } = parsed.data
      const placement = this.scorer.suggestPlacement(category, { width, height })
      return { ok: true, status: 200, state: placement ? 'ok' : 'no_data', data: placement }
    } catch (error) {
      return failure(error, 'suggest-placement')
    }
  }

  private hasData(category: string): boolean {
    const grid = this.heatmaps.grids.get(category)
    return grid !== undefined && grid.sampleCount > 0
  }
}
