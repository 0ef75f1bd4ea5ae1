import Fastify, { type FastifyInstance } from 'fastify';
import type { Services } from '../core/services.js';
import { registerFinancialRoutes } from './routes/financials.js';
import { registerMetaRoutes } from './routes/meta.js';
import { registerOAuthRoutes } from './routes/oauth.js';
import { apiError } from './serialization.js';

/** Build the REST API without listening, so tests can drive it with `inject` */
export function buildServer(services: Services): FastifyInstance {
  const server = Fastify({ logger: false });

  registerMetaRoutes(server, services);
  registerFinancialRoutes(server, services);
  registerOAuthRoutes(server, services);

  // Global error handler
  server.setErrorHandler((error: Error, _request, reply) => {
    console.error('Server error:', error.message);
    reply.status(500).send(apiError('internal', 'Internal server error'));
  });

  server.setNotFoundHandler((request, reply) => {
    reply.status(404).send(apiError('not_found', `Route ${request.method} ${request.url} not found`));
  });

  return server;
}
