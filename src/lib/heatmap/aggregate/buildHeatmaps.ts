/**
 * Build pipeline: configured aggregation over a corpus, persisted only once the
 * whole set is finalized.
 */

import type { HeatmapConfig } from '../config'
import type { FinalizedHeatmapSet } from '../schema/heatmapSet'
import type { HeatmapSetStore } from '../store/heatmapStore'
import { HeatmapAggregator, type AggregatorOptions, type BoxCorpus } from './heatmapAggregator'

export interface BuildOptions {
  store?: HeatmapSetStore
  shouldCancel?: () => boolean
  emptyCorpus?: AggregatorOptions['emptyCorpus']
  now?: () => Date
}

export function createAggregator(
  config: HeatmapConfig,
  options: Omit<BuildOptions, 'store'> = {}
): HeatmapAggregator {
  return new HeatmapAggregator({
    rows: config.rows,
    cols: config.cols,
    categorySet: config.categorySet,
    malformedPolicy: config.malformedPolicy,
    smoothingSigma: config.smoothingSigma,
    degenerateEpsilon: config.degenerateEpsilon,
    emptyCorpus: options.emptyCorpus,
    shouldCancel: options.shouldCancel,
    now: options.now,
  })
}

/**
 * Aggregate the corpus and, when a store is given, save the result.
 * A failed or cancelled run saves nothing, so a previously stored set stays intact.
 */
export async function buildHeatmaps(
  corpus: BoxCorpus,
  config: HeatmapConfig,
  options: BuildOptions = {}
): Promise<FinalizedHeatmapSet> {
  const { store, ...aggregatorOptions } = options
  const set = await createAggregator(config, aggregatorOptions).run(corpus)
  if (store) await store.save(set)
  return set
}
