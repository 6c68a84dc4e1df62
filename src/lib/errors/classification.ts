/**
 * Error Classification for Prediction Responses
 *
 * Maps heatmap errors to response states with semantically correct HTTP status
 * codes, so a caller can tell these apart:
 *
 *   200 no_data             — the category has no samples (weak signal, not a failure)
 *   400 invalid_request     — malformed request body or box geometry (client bug)
 *   409 resolution_mismatch — query resolution differs from the loaded heatmaps
 *   503 not_loaded          — persisted heatmaps are missing or unreadable
 *   500 internal            — unexpected / our bug
 */

import { HeatmapError } from '../heatmap/errors'

export type ErrorCategory =
  | 'invalid_request'      // 400 — schema failure, InvalidBoxError
  | 'resolution_mismatch'  // 409 — ResolutionMismatchError
  | 'not_loaded'           // 503 — HeatmapSetFormatError, EmptyCorpusError at load
  | 'cancelled'            // 499 — AggregationCancelledError
  | 'internal'             // 500 — unexpected / our bug

export interface ClassifiedError {
  /** Semantic category of the error */
  category: ErrorCategory
  /** HTTP status code to return */
  httpStatus: number
  /** Whether the client should retry */
  isRetryable: boolean
  /** Human-readable label for dashboards */
  label: string
}

const INVALID_REQUEST: ClassifiedError = {
  category: 'invalid_request',
  httpStatus: 400,
  isRetryable: false,
  label: 'Invalid Request',
}

const INTERNAL: ClassifiedError = {
  category: 'internal',
  httpStatus: 500,
  isRetryable: false,
  label: 'Internal Error',
}

/**
 * Classify an error into a response category.
 * Heatmap errors are matched on their `code`; anything else is internal.
 */
export function classifyHeatmapError(error: unknown): ClassifiedError {
  if (!(error instanceof HeatmapError)) return INTERNAL

  switch (error.code) {
    case 'invalid_box':
    case 'category_mismatch':
      return INVALID_REQUEST
    case 'resolution_mismatch':
      return {
        category: 'resolution_mismatch',
        httpStatus: 409,
        isRetryable: false,
        label: 'Resolution Mismatch',
      }
    case 'heatmap_set_format':
    case 'empty_corpus':
      // Retrying helps once a valid set has been rebuilt and persisted.
      return {
        category: 'not_loaded',
        httpStatus: 503,
        isRetryable: true,
        label: 'Heatmaps Not Loaded',
      }
    case 'aggregation_cancelled':
      return {
        category: 'cancelled',
        httpStatus: 499,
        isRetryable: true,
        label: 'Aggregation Cancelled',
      }
  }
}

/**
 * Classify an error and return a structured context object for logging.
 * Includes the original error message plus classification metadata.
 */
export function classifyErrorContext(
  error: unknown,
  extra?: Record<string, unknown>
): {
  message: string
  classification: ClassifiedError
} & Record<string, unknown> {
  const message = error instanceof Error ? (error.message || 'Unknown error') : String(error)
  return {
    message,
    classification: classifyHeatmapError(error),
    ...(extra || {}),
  }
}
