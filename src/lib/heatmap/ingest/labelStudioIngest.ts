/**
 * Label Studio ingestion: turn decoded annotation tasks into box records.
 * Handles the three export flavours (flat `result`, per-file `annotation.result`,
 * bulk `annotations[0].result`). Rectangles are taken as drawn; polygons become
 * the bounding box of their points. Coordinates are percentages, so every box
 * is placed on a 100x100 canvas. Reading the export from disk is the caller's job.
 */

import { z } from 'zod'
import { createLogger } from '@/lib/logger'
import { InvalidBoxError } from '../errors'
import { createBoxRecord, type BoxRecord } from '../schema/boxRecord'

const log = createLogger('ingest')

const PERCENT_CANVAS = 100

const RectangleResultSchema = z.object({
  value: z.object({
    x: z.number(),
    y: z.number(),
    width: z.number(),
    height: z.number(),
    rectanglelabels: z.array(z.string()).min(1),
  }),
})

const PolygonResultSchema = z.object({
  value: z.object({
    points: z.array(z.tuple([z.number(), z.number()])).min(1),
    polygonlabels: z.array(z.string()).min(1),
  }),
})

interface LabelledRect {
  label: string
  x: number
  y: number
  width: number
  height: number
}

function toLabelledRect(raw: unknown): LabelledRect | null {
  const rect = RectangleResultSchema.safeParse(raw)
  if (rect.success) {
    const { x, y, width, height, rectanglelabels } = rect.data.value
    return { label: rectanglelabels[0] ?? '', x, y, width, height }
  }
  const polygon = PolygonResultSchema.safeParse(raw)
  if (polygon.success) {
    const { points, polygonlabels } = polygon.data.value
    const xs = points.map(([x]) => x)
    const ys = points.map(([, y]) => y)
    const x = Math.min(...xs)
    const y = Math.min(...ys)
    return { label: polygonlabels[0] ?? '', x, y, width: Math.max(...xs) - x, height: Math.max(...ys) - y }
  }
  return null
}

const ResultListSchema = z.array(z.unknown())

export const LabelStudioTaskSchema = z
  .object({
    id: z.union([z.number(), z.string()]).optional(),
    task_id: z.union([z.number(), z.string()]).optional(),
    result: ResultListSchema.optional(),
    annotation: z.object({ result: ResultListSchema.optional() }).passthrough().optional(),
    annotations: z.array(z.object({ result: ResultListSchema }).passthrough()).optional(),
  })
  .passthrough()

export type LabelStudioTask = z.input<typeof LabelStudioTaskSchema>

export interface LabelStudioIngestOptions {
  /** Labels to keep. Others are skipped, as the dataset build does. */
  categorySet?: readonly string[]
  /**
   * Match labels ignoring case. Kept labels take the spelling from `categorySet`,
   * or are lower-cased when no set is given.
   */
  ignoreCase?: boolean
  /** Overrides the layout id taken from the task's `task_id` / `id`. */
  layoutId?: string
}

export interface LabelStudioIngestResult {
  records: BoxRecord[]
  /** Labels skipped because they are outside the category set. */
  ignoredLabels: string[]
  /** Results that are neither rectangles nor polygons, or have broken geometry. */
  errors: Array<{ index: number; error: string }>
}

/** The rectangle result list, whichever export flavour the task came from. */
export function getResultList(task: z.infer<typeof LabelStudioTaskSchema>): unknown[] {
  if (task.result) return task.result
  if (task.annotation?.result) return task.annotation.result
  const first = task.annotations?.[0]
  if (first) return first.result
  throw new InvalidBoxError("Could not find a 'result' list in the Label Studio task", 'geometry')
}

/** Decode one task. Invalid tasks throw; individual bad results are collected in `errors`. */
export function labelStudioTaskToBoxRecords(
  input: unknown,
  options: LabelStudioIngestOptions = {}
): LabelStudioIngestResult {
  const parsed = LabelStudioTaskSchema.safeParse(input)
  if (!parsed.success) {
    throw new InvalidBoxError(
      `Invalid Label Studio task (${parsed.error.issues.map((i) => i.message).join('; ')})`,
      'geometry'
    )
  }
  const task = parsed.data
  const taskId = task.task_id ?? task.id
  const layoutId = options.layoutId ?? (taskId !== undefined ? String(taskId) : undefined)
  const fold = (label: string) => (options.ignoreCase ? label.toLowerCase() : label)
  const allowed = options.categorySet
    ? new Map(options.categorySet.map((category) => [fold(category), category]))
    : undefined

  const records: BoxRecord[] = []
  const ignoredLabels: string[] = []
  const errors: Array<{ index: number; error: string }> = []

  getResultList(task).forEach((raw, index) => {
    const rect = toLabelledRect(raw)
    if (!rect) {
      errors.push({ index, error: 'Not a rectangle or polygon label result' })
      return
    }
    const { label, x, y, width, height } = rect
    const category = allowed ? allowed.get(fold(label)) : fold(label)
    if (category === undefined) {
      ignoredLabels.push(label)
      return
    }
    try {
      records.push(
        createBoxRecord({
          category,
          xMin: x,
          yMin: y,
          xMax: x + width,
          yMax: y + height,
          canvasWidth: PERCENT_CANVAS,
          canvasHeight: PERCENT_CANVAS,
          layoutId,
        })
      )
    } catch (e) {
      errors.push({ index, error: e instanceof Error ? e.message : String(e) })
    }
  })

  if (errors.length > 0) {
    log.warn('Task had unusable results', { layoutId, errors: errors.length })
  }
  return { records, ignoredLabels, errors }
}

/**
 * Stream box records out of a sequence of decoded tasks.
 * Broken results inside a task are logged and dropped; the aggregator's
 * malformed-record policy still applies to the records yielded.
 */
export async function* labelStudioCorpus(
  tasks: Iterable<unknown> | AsyncIterable<unknown>,
  options: Omit<LabelStudioIngestOptions, 'layoutId'> = {}
): AsyncGenerator<BoxRecord> {
  for await (const task of tasks) {
    const { records } = labelStudioTaskToBoxRecords(task, options)
    yield* records
  }
}
