import type { FastifyInstance, FastifyReply } from 'fastify';
import { z } from 'zod';
import { MAX_PERIODS } from '../../core/aggregator.js';
import { parseProvider } from '../../core/config.js';
import type { Services } from '../../core/services.js';
import type { ProviderName } from '../../core/types.js';
import {
  apiError,
  errorToHttpStatus,
  serializeFinancials,
  serializeMetrics,
  serializeNotFound,
  serializeReference,
} from '../serialization.js';

const tickerParams = z.object({
  ticker: z.string().trim().min(1).max(12),
});

const financialsQuery = z.object({
  timeframe: z.enum(['annual', 'quarterly']).default('annual'),
  limit: z.coerce.number().int().min(1).max(MAX_PERIODS).default(1),
  provider: z.string().optional(),
});

const metricsQuery = financialsQuery.omit({ limit: true });
const referenceQuery = z.object({ provider: z.string().optional() });

function validationFailed(reply: FastifyReply, error: z.ZodError) {
  const message = error.issues.map(i => `${i.path.join('.') || 'request'}: ${i.message}`).join('; ');
  return reply.status(errorToHttpStatus('validation')).send(apiError('validation', message));
}

/** undefined = no override; null = an override that names no known provider */
function providerOverride(value: string | undefined): ProviderName | undefined | null {
  if (value === undefined || value === '') return undefined;
  return parseProvider(value) ?? null;
}

function unknownProvider(reply: FastifyReply, value: string | undefined) {
  return reply.status(errorToHttpStatus('validation')).send(
    apiError('validation', `Unknown provider "${value}". Expected polygon, yahoo or alphavantage.`)
  );
}

export function registerFinancialRoutes(server: FastifyInstance, { aggregator }: Services) {
  server.get('/api/v1/financials/:ticker', async (request, reply) => {
    const params = tickerParams.safeParse(request.params);
    if (!params.success) return validationFailed(reply, params.error);
    const query = financialsQuery.safeParse(request.query);
    if (!query.success) return validationFailed(reply, query.error);

    const provider = providerOverride(query.data.provider);
    if (provider === null) return unknownProvider(reply, query.data.provider);

    const result = await aggregator.getFinancials(params.data.ticker, query.data.timeframe, query.data.limit, provider);
    if (!result.success) {
      return reply.status(errorToHttpStatus('not_found')).send(serializeNotFound(result));
    }
    return reply.send(serializeFinancials(result, query.data.timeframe));
  });

  server.get('/api/v1/metrics/:ticker', async (request, reply) => {
    const params = tickerParams.safeParse(request.params);
    if (!params.success) return validationFailed(reply, params.error);
    const query = metricsQuery.safeParse(request.query);
    if (!query.success) return validationFailed(reply, query.error);

    const provider = providerOverride(query.data.provider);
    if (provider === null) return unknownProvider(reply, query.data.provider);

    const result = await aggregator.analyzeTicker(params.data.ticker, query.data.timeframe, provider);
    if (!result.success) {
      return reply.status(errorToHttpStatus('not_found')).send(serializeNotFound(result));
    }
    return reply.send(serializeMetrics(result));
  });

  server.get('/api/v1/reference/:ticker', async (request, reply) => {
    const params = tickerParams.safeParse(request.params);
    if (!params.success) return validationFailed(reply, params.error);
    const query = referenceQuery.safeParse(request.query);
    if (!query.success) return validationFailed(reply, query.error);

    const provider = providerOverride(query.data.provider);
    if (provider === null) return unknownProvider(reply, query.data.provider);

    const result = await aggregator.getReference(params.data.ticker, provider);
    if (!result.success) {
      return reply.status(errorToHttpStatus('not_found')).send(serializeNotFound(result));
    }
    return reply.send(serializeReference(result.data, result.provider));
  });
}
