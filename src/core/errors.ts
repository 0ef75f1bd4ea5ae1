/**
 * Custom error types for upstream provider interactions.
 * The aggregator inspects `kind` to decide how a failure is reported;
 * none of these escape past it.
 */

import type { ProviderName } from './types.js';

export type ProviderErrorKind = 'not_found' | 'rate_limited' | 'auth' | 'transient';

export class ProviderError extends Error {
  constructor(
    message: string,
    public readonly provider: ProviderName | 'schwab',
    public readonly kind: ProviderErrorKind,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ProviderError';
  }
}

/** Ticker unknown to the provider. Not retriable against the same provider. */
export class NotFoundError extends ProviderError {
  constructor(provider: ProviderName | 'schwab', detail: string, options?: { cause?: unknown }) {
    super(`Not found: ${detail}`, provider, 'not_found', options);
    this.name = 'NotFoundError';
  }
}

/** Provider-side throttling or a self-imposed quota. */
export class RateLimitError extends ProviderError {
  constructor(provider: ProviderName | 'schwab', detail: string, options?: { cause?: unknown }) {
    super(detail, provider, 'rate_limited', options);
    this.name = 'RateLimitError';
  }
}

/** Missing or rejected credentials. */
export class AuthError extends ProviderError {
  constructor(provider: ProviderName | 'schwab', detail: string, options?: { cause?: unknown }) {
    super(detail, provider, 'auth', options);
    this.name = 'AuthError';
  }
}

/** Timeouts, connection failures and unexpected upstream responses. */
export class TransientError extends ProviderError {
  constructor(provider: ProviderName | 'schwab', detail: string, options?: { cause?: unknown }) {
    super(detail, provider, 'transient', options);
    this.name = 'TransientError';
  }
}

export class DataParseError extends Error {
  constructor(message: string, public readonly source: string) {
    super(message);
    this.name = 'DataParseError';
  }
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
  }
}
