import { describe, expect, it } from 'vitest'
import { HeatmapAggregator } from '../aggregate/heatmapAggregator'
import { parseHeatmapConfig } from '../config'
import { HeatmapSetFormatError, ResolutionMismatchError } from '../errors'
import { PredictionService } from '../service/predictionService'
import { InMemoryHeatmapSetStore } from '../store/heatmapStore'

const config = parseHeatmapConfig({ rows: 2, cols: 2, categorySet: ['title', 'date'] })

function element(category: string, xMin: number, yMin: number, xMax: number, yMax: number) {
  return { category, xMin, yMin, xMax, yMax, canvasWidth: 100, canvasHeight: 100 }
}

async function createService(): Promise<PredictionService> {
  const store = new InMemoryHeatmapSetStore()
  await store.save(
    await new HeatmapAggregator({ rows: 2, cols: 2, categorySet: ['title', 'date'] }).run([
      element('title', 0, 0, 50, 50),
      element('title', 0, 0, 50, 50),
      element('title', 50, 50, 100, 100),
    ])
  )
  return PredictionService.fromStore(store, config)
}

describe('PredictionService.fromStore', () => {
  it('fails when nothing has been saved', async () => {
    await expect(PredictionService.fromStore(new InMemoryHeatmapSetStore(), config)).rejects.toBeInstanceOf(
      HeatmapSetFormatError
    )
  })

  it('fails when the configured resolution differs from the stored set', async () => {
    const store = new InMemoryHeatmapSetStore()
    await store.save(await new HeatmapAggregator({ rows: 21, cols: 12 }).run([element('title', 0, 0, 50, 50)]))
    await expect(PredictionService.fromStore(store, config)).rejects.toBeInstanceOf(ResolutionMismatchError)
  })
})

describe('PredictionService.handleScore', () => {
  it('scores a valid layout', async () => {
    const service = await createService()
    const response = service.handleScore({ layout: [element('title', 0, 0, 50, 50)] })

    expect(response.ok).toBe(true)
    expect(response.status).toBe(200)
    expect(response.state).toBe('ok')
    if (response.ok) expect(response.data.score).toBe(1)
  })

  it('reports no_data when no element has learned density', async () => {
    const service = await createService()
    const response = service.handleScore({
      layout: [element('date', 0, 0, 50, 50), element('logo', 0, 0, 50, 50)],
    })

    expect(response.status).toBe(200)
    expect(response.state).toBe('no_data')
    if (response.ok) expect(response.data.warnings.map((w) => w.category)).toEqual(['logo'])
  })

  it('rejects bodies that fail validation', async () => {
    const service = await createService()
    const response = service.handleScore({ layout: [{ category: 'title', xMin: 'left' }] })

    expect(response.ok).toBe(false)
    expect(response.status).toBe(400)
    expect(response.state).toBe('invalid_request')
    if (!response.ok) expect(response.error.details?.some((d) => d.path === 'layout.0.xMin')).toBe(true)
  })

  it('rejects boxes off the canvas as invalid requests', async () => {
    const service = await createService()
    const response = service.handleScore({ layout: [element('title', 150, 150, 190, 190)] })

    expect(response.status).toBe(400)
    expect(response.state).toBe('invalid_request')
  })

  it('reports a resolution mismatch separately', async () => {
    const service = await createService()
    const response = service.handleScore({
      layout: [element('title', 0, 0, 50, 50)],
      resolution: { rows: 21, cols: 12 },
    })

    expect(response.status).toBe(409)
    expect(response.state).toBe('resolution_mismatch')
  })
})

describe('PredictionService.handleTopRegions', () => {
  it('returns regions for a learned category', async () => {
    const service = await createService()
    const response = service.handleTopRegions({ category: 'title', k: 1 })

    expect(response.state).toBe('ok')
    if (response.ok) expect(response.data.map((r) => [r.row, r.col, r.value])).toEqual([[0, 0, 1]])
  })

  it('distinguishes categories without data', async () => {
    const service = await createService()
    expect(service.handleTopRegions({ category: 'date' }).state).toBe('no_data')
    expect(service.handleTopRegions({ category: 'logo' }).state).toBe('no_data')
    expect(service.handleTopRegions({ category: '' }).state).toBe('invalid_request')
  })
})

describe('PredictionService.handleSuggestPlacement', () => {
  it('suggests the densest position', async () => {
    const service = await createService()
    const response = service.handleSuggestPlacement({ category: 'title', width: 0.5, height: 0.5 })

    expect(response.state).toBe('ok')
    if (response.ok) expect(response.data?.bbox).toEqual({ x: 0, y: 0, width: 0.5, height: 0.5 })
  })

  it('reports no_data for unlearned categories and rejects bad sizes', async () => {
    const service = await createService()
    expect(service.handleSuggestPlacement({ category: 'date', width: 0.5, height: 0.5 }).state).toBe('no_data')
    expect(service.handleSuggestPlacement({ category: 'title', width: 0, height: 0.5 }).status).toBe(400)
  })
})
