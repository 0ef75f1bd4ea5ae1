/**
 * Shared serialization helpers for the web API layer.
 * Converts aggregator results to JSON-safe objects and maps error types to HTTP status codes.
 */

import type { AggregateResult, AnalysisResult, NotFoundResult, ProviderAttempt } from '../core/aggregator.js';
import type { CanonicalPeriod, ProviderName, TickerReference, Timeframe } from '../core/types.js';
import { summarizePeriod } from '../processing/metrics.js';

// ── Error Mapping ─────────────────────────────────────────────────────

export type ApiErrorType = 'not_found' | 'validation' | 'not_authenticated' | 'not_configured' | 'upstream' | 'internal';

const ERROR_STATUS_MAP: Record<ApiErrorType, number> = {
  not_found: 404,
  validation: 400,
  not_authenticated: 401,
  not_configured: 503,
  upstream: 502,
  internal: 500,
};

export function errorToHttpStatus(errorType: ApiErrorType): number {
  return ERROR_STATUS_MAP[errorType];
}

export interface ApiError {
  error: {
    type: ApiErrorType;
    message: string;
    attempts?: ProviderAttempt[];
  };
}

export function apiError(type: ApiErrorType, message: string): ApiError {
  return { error: { type, message } };
}

export function serializeNotFound(result: NotFoundResult): ApiError {
  return { error: { type: 'not_found', message: result.error.message, attempts: result.error.attempts } };
}

// ── Result Serializers ────────────────────────────────────────────────

export function serializeFinancials(
  result: Extract<AggregateResult<CanonicalPeriod[]>, { success: true }>,
  timeframe: Timeframe
) {
  const periods = result.data.map(summarizePeriod);
  return {
    ticker: periods[0]?.ticker,
    timeframe,
    provider: result.provider,
    periods: periods.map(p => ({ ...p, date: p.end_date })),
    attempts: result.attempts,
  };
}

export function serializeMetrics(result: Extract<AnalysisResult, { success: true }>) {
  return {
    ...result.metrics,
    provider: result.provider,
    reference_provider: result.referenceProvider,
  };
}

export function serializeReference(reference: TickerReference, provider: ProviderName) {
  return { ...reference, provider };
}
