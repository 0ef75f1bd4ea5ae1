import type { FastifyInstance } from 'fastify';
import { FALLBACK_PROVIDER, PROVIDER_PRIORITY } from '../../core/aggregator.js';
import { listProviders, type Services } from '../../core/services.js';

export function registerMetaRoutes(server: FastifyInstance, services: Services) {
  server.get('/api/v1/health', async () => {
    return {
      status: 'healthy',
      service: 'roce-yield',
      provider: services.aggregator.resolveProvider(),
    };
  });

  server.get('/api/v1/providers', async () => {
    return {
      providers: listProviders(services),
      default: services.aggregator.resolveProvider(),
      priority: PROVIDER_PRIORITY,
      fallback: services.config.enableFallback ? FALLBACK_PROVIDER : null,
    };
  });
}
