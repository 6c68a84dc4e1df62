/**
 * Persistence for finalized heatmap sets.
 * A store only ever holds a complete serialized set: file writes go to a
 * temporary path first and are renamed into place.
 */

import { mkdir, readFile, rename, rm, writeFile } from 'fs/promises'
import path from 'path'
import { createLogger } from '@/lib/logger'
import { HeatmapSetFormatError } from '../errors'
import {
  parseHeatmapSet,
  serializeHeatmapSet,
  type FinalizedHeatmapSet,
  type SerializedHeatmapSet,
} from '../schema/heatmapSet'

const log = createLogger('store')

export interface HeatmapSetStore {
  save(set: FinalizedHeatmapSet): Promise<void>
  /** The last saved set, or null if nothing has been saved yet. */
  load(): Promise<FinalizedHeatmapSet | null>
}

export class InMemoryHeatmapSetStore implements HeatmapSetStore {
  private snapshot: SerializedHeatmapSet | null = null

  async save(set: FinalizedHeatmapSet): Promise<void> {
    this.snapshot = serializeHeatmapSet(set)
  }

  async load(): Promise<FinalizedHeatmapSet | null> {
    return this.snapshot ? parseHeatmapSet(this.snapshot) : null
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

export class FileHeatmapSetStore implements HeatmapSetStore {
  constructor(readonly filePath: string) {}

  async save(set: FinalizedHeatmapSet): Promise<void> {
    const json = JSON.stringify(serializeHeatmapSet(set), null, 2)
    const tmpPath = `${this.filePath}.${process.pid}.${Date.now()}.tmp`
    await mkdir(path.dirname(this.filePath), { recursive: true })
    try {
      await writeFile(tmpPath, json, 'utf-8')
      await rename(tmpPath, this.filePath)
    } catch (error) {
      await rm(tmpPath, { force: true })
      throw error
    }
    log.info('Saved heatmap set', {
      path: this.filePath,
      resolution: `${set.rows}x${set.cols}`,
      categories: set.categories.length,
    })
  }

  async load(): Promise<FinalizedHeatmapSet | null> {
    let text: string
    try {
      text = await readFile(this.filePath, 'utf-8')
    } catch (error) {
      if (isNotFound(error)) return null
      throw error
    }

    let json: unknown
    try {
      json = JSON.parse(text)
    } catch (error) {
      throw new HeatmapSetFormatError(
        `Heatmap file ${this.filePath} is not valid JSON`,
        [error instanceof Error ? error.message : String(error)]
      )
    }
    return parseHeatmapSet(json)
  }
}
