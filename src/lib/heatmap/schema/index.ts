export * from './boxRecord'
export * from './grid'
export * from './heatmapSet'
