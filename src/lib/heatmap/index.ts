/**
 * Layout heatmaps — per-category placement density learned from annotated
 * posters, and scoring of new layouts against it.
 */

export * from './errors'
export * from './config'
export * from './schema'
export { mapBoxToCells, DEFAULT_DEGENERATE_EPSILON } from './map/gridMapper'
export type { CellWeight, GridMapperOptions } from './map/gridMapper'
export { CategoryAccumulator } from './accumulate/categoryAccumulator'
export { HeatmapAggregator } from './aggregate/heatmapAggregator'
export { buildHeatmaps, createAggregator } from './aggregate/buildHeatmaps'
export type { BuildOptions } from './aggregate/buildHeatmaps'
export type { AggregatorOptions, BoxCorpus, HeatmapShard, MalformedPolicy } from './aggregate/heatmapAggregator'
export { LayoutScorer } from './score/layoutScorer'
export type {
  ElementScore,
  ElementScoreStatus,
  LayoutScore,
  LayoutScorerOptions,
  Placement,
  Region,
  ScoreCombination,
} from './score/layoutScorer'
export * from './ingest/labelStudioIngest'
export * from './export/heatPrompt'
export * from './store/heatmapStore'
export * from './service/predictionService'
