import { AuthError, NotFoundError, RateLimitError, TransientError } from './errors.js';
import type { ProviderName } from './types.js';

/**
 * Thin JSON-over-HTTP helper shared by the provider adapters.
 *
 * Maps HTTP failures onto the provider error taxonomy. There is no retry
 * loop here: a failed provider is retried by falling back to another
 * provider, never by calling the same one again.
 */

const DEFAULT_TIMEOUT_MS = 10_000;
const USER_AGENT = 'roce-yield/0.1';

export interface RequestOptions {
  provider: ProviderName | 'schwab';
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: string;
  timeoutMs?: number;
  /** Used in the NotFoundError message, e.g. the ticker */
  subject?: string;
}

export async function fetchJson(url: string, options: RequestOptions): Promise<unknown> {
  const body = await fetchText(url, options);
  try {
    return JSON.parse(body);
  } catch (err) {
    throw new TransientError(
      options.provider,
      `Failed to parse ${options.provider} response from ${redactUrl(url)}. The API format may have changed.`,
      { cause: err }
    );
  }
}

export async function fetchText(url: string, options: RequestOptions): Promise<string> {
  const { provider, method = 'GET', headers = {}, body, timeoutMs = DEFAULT_TIMEOUT_MS } = options;
  const safeUrl = redactUrl(url);

  let response: Response;
  try {
    response = await fetch(url, {
      method,
      body,
      headers: {
        'User-Agent': USER_AGENT,
        'Accept': 'application/json',
        ...headers,
      },
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (err) {
    if (err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError')) {
      throw new TransientError(provider, `Request to ${provider} timed out after ${timeoutMs}ms: ${safeUrl}`, { cause: err });
    }
    throw new TransientError(
      provider,
      `Connection error to ${provider}: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err }
    );
  }

  if (response.ok) {
    return response.text();
  }

  switch (response.status) {
    case 401:
    case 403:
      throw new AuthError(provider, `${provider} rejected the request credentials (HTTP ${response.status}). Check the API key configuration.`);
    case 404:
      throw new NotFoundError(provider, options.subject ? `${options.subject} (${provider})` : safeUrl);
    case 429:
      throw new RateLimitError(provider, `${provider} rate limit exceeded. Wait before retrying or use another provider.`);
    default:
      throw new TransientError(provider, `${provider} API error (HTTP ${response.status} ${response.statusText})`);
  }
}

/** Strip credentials from a URL before it reaches an error message */
export function redactUrl(url: string): string {
  return url.replace(/([?&](?:apiKey|apikey|api_key|token)=)[^&]*/g, '$1***');
}
