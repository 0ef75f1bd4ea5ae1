import { z } from 'zod';
import { MAX_PERIODS, type NotFoundResult } from '../core/aggregator.js';
import { listProviders, type Services } from '../core/services.js';
import { PROVIDER_NAMES } from '../core/types.js';
import { serializeFinancials, serializeMetrics } from '../web/serialization.js';

/**
 * MCP tool definitions and handlers. Handlers return MCP tool results and
 * never throw for a ticker that no provider knows.
 */

export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

export const getFinancialsShape = {
  ticker: z.string().min(1).max(12).describe('Stock ticker symbol (e.g., AAPL)'),
  timeframe: z.enum(['annual', 'quarterly']).optional().default('annual').describe('Annual or quarterly statements'),
  limit: z.number().int().min(1).max(MAX_PERIODS).optional().default(1).describe(`Number of periods, most recent first (1-${MAX_PERIODS}, default 1)`),
  provider: z.enum(PROVIDER_NAMES).optional().describe('Data provider; omit to use the configured default'),
};

export const getMetricsShape = {
  ticker: getFinancialsShape.ticker,
  timeframe: getFinancialsShape.timeframe,
  provider: getFinancialsShape.provider,
};

const getFinancialsArgs = z.object(getFinancialsShape);
const getMetricsArgs = z.object(getMetricsShape);

function jsonResult(value: unknown): ToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(value, null, 2) }] };
}

function notFoundResult(result: NotFoundResult): ToolResult {
  const tried = result.error.attempts
    .map(a => `  ${a.provider}: ${a.outcome}${a.message ? ` (${a.message})` : ''}`)
    .join('\n');
  return {
    content: [{ type: 'text', text: tried ? `${result.error.message}\n\nProviders tried:\n${tried}` : result.error.message }],
    isError: true,
  };
}

export async function handleGetFinancials(
  services: Services,
  args: z.input<typeof getFinancialsArgs>
): Promise<ToolResult> {
  const { ticker, timeframe, limit, provider } = getFinancialsArgs.parse(args);
  const result = await services.aggregator.getFinancials(ticker, timeframe, limit, provider);
  if (!result.success) return notFoundResult(result);
  return jsonResult(serializeFinancials(result, timeframe));
}

export async function handleGetMetrics(
  services: Services,
  args: z.input<typeof getMetricsArgs>
): Promise<ToolResult> {
  const { ticker, timeframe, provider } = getMetricsArgs.parse(args);
  const result = await services.aggregator.analyzeTicker(ticker, timeframe, provider);
  if (!result.success) return notFoundResult(result);
  return jsonResult(serializeMetrics(result));
}

export function handleListProviders(services: Services): ToolResult {
  return jsonResult({
    providers: listProviders(services),
    fallback_enabled: services.config.enableFallback,
  });
}
