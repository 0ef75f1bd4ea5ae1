import type { FastifyInstance, FastifyReply } from 'fastify';
import { z } from 'zod';
import { ProviderError } from '../../core/errors.js';
import type { Services } from '../../core/services.js';
import { apiError, errorToHttpStatus, type ApiErrorType } from '../serialization.js';

/**
 * Schwab OAuth flow. The callback path is the redirect URI registered with
 * Schwab, so the /oauth prefix has to stay as it is.
 */

const callbackQuery = z.object({
  code: z.string().optional(),
  error: z.string().optional(),
});

const symbolParams = z.object({ symbol: z.string().trim().min(1).max(12) });
const symbolsQuery = z.object({ symbols: z.string().trim().min(1) });

const NOT_CONFIGURED = 'Schwab is not configured. Set SCHWAB_APP_KEY, SCHWAB_APP_SECRET, SCHWAB_REDIRECT_URI and SCHWAB_ENCRYPTION_KEY.';

function schwabFailure(reply: FastifyReply, err: unknown) {
  if (!(err instanceof ProviderError)) throw err;
  const type: ApiErrorType = err.kind === 'auth'
    ? 'not_authenticated'
    : err.kind === 'not_found' ? 'not_found' : 'upstream';
  return reply.status(errorToHttpStatus(type)).send(apiError(type, err.message));
}

export function registerOAuthRoutes(server: FastifyInstance, { schwab, tokens, config }: Services) {
  const frontendRedirect = (params: Record<string, string>) =>
    `${config.frontendUrl}/?${new URLSearchParams(params)}`;

  server.get('/api/v1/oauth/connect', async (_request, reply) => {
    if (!schwab) {
      return reply.status(errorToHttpStatus('not_configured')).send(apiError('not_configured', NOT_CONFIGURED));
    }
    return reply.send({ auth_url: schwab.authorizationUrl() });
  });

  server.get('/api/v1/oauth/callback', async (request, reply) => {
    const query = callbackQuery.safeParse(request.query);
    const { code, error } = query.success ? query.data : { code: undefined, error: undefined };

    if (error) return reply.redirect(frontendRedirect({ schwab: 'denied', error }));
    if (!code) return reply.redirect(frontendRedirect({ schwab: 'error', message: 'no_code' }));
    if (!schwab) return reply.redirect(frontendRedirect({ schwab: 'error', message: 'not_configured' }));

    try {
      await schwab.exchangeCode(code);
      return reply.redirect(frontendRedirect({ schwab: 'connected' }));
    } catch (err) {
      if (!(err instanceof ProviderError)) throw err;
      return reply.redirect(frontendRedirect({ schwab: 'error', message: err.message }));
    }
  });

  server.get('/api/v1/oauth/status', async () => {
    const stored = tokens?.load();
    if (!tokens || !stored) {
      return { connected: false, expires_at: null, needs_refresh: false, message: 'Not connected to Schwab' };
    }

    const expired = tokens.isAccessExpired();
    if (expired && !tokens.isRefreshValid()) {
      return { connected: false, expires_at: stored.expires_at ?? null, needs_refresh: false, message: 'Session expired - please reconnect' };
    }

    return {
      connected: true,
      expires_at: stored.expires_at ?? null,
      needs_refresh: expired,
      message: expired ? 'Token will be refreshed automatically' : 'Connected to Schwab',
    };
  });

  server.post('/api/v1/oauth/disconnect', async () => {
    const removed = tokens?.clear() ?? false;
    return { message: removed ? 'Disconnected from Schwab successfully' : 'No active connection to disconnect' };
  });

  server.post('/api/v1/oauth/refresh', async (_request, reply) => {
    if (!schwab) {
      return reply.status(errorToHttpStatus('not_configured')).send(apiError('not_configured', NOT_CONFIGURED));
    }
    try {
      const refreshed = await schwab.refreshAccessToken();
      return reply.send({ message: 'Tokens refreshed successfully', expires_at: refreshed.expires_at ?? null });
    } catch (err) {
      return schwabFailure(reply, err);
    }
  });

  server.get('/api/v1/oauth/quote/:symbol', async (request, reply) => {
    if (!schwab) {
      return reply.status(errorToHttpStatus('not_configured')).send(apiError('not_configured', NOT_CONFIGURED));
    }
    const params = symbolParams.safeParse(request.params);
    if (!params.success) {
      return reply.status(errorToHttpStatus('validation')).send(apiError('validation', 'symbol is required'));
    }
    try {
      return reply.send(await schwab.getQuote(params.data.symbol));
    } catch (err) {
      return schwabFailure(reply, err);
    }
  });

  server.get('/api/v1/oauth/quotes', async (request, reply) => {
    if (!schwab) {
      return reply.status(errorToHttpStatus('not_configured')).send(apiError('not_configured', NOT_CONFIGURED));
    }
    const query = symbolsQuery.safeParse(request.query);
    if (!query.success) {
      return reply.status(errorToHttpStatus('validation')).send(apiError('validation', 'symbols is required'));
    }
    try {
      return reply.send(await schwab.getQuotes(query.data.symbols.split(',').filter(s => s.trim() !== '')));
    } catch (err) {
      return schwabFailure(reply, err);
    }
  });
}
