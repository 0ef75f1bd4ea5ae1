import { describe, it, expect } from 'vitest';
import {
  AuthError,
  ConfigError,
  DataParseError,
  NotFoundError,
  ProviderError,
  RateLimitError,
  TransientError,
} from '../src/core/errors.js';

describe('Custom Error Types', () => {
  it('ProviderError carries provider and kind', () => {
    const err = new ProviderError('boom', 'polygon', 'transient');
    expect(err.provider).toBe('polygon');
    expect(err.kind).toBe('transient');
    expect(err.name).toBe('ProviderError');
    expect(err instanceof Error).toBe(true);
  });

  it('NotFoundError is a not_found ProviderError', () => {
    const err = new NotFoundError('yahoo', 'ZZZZ (yahoo)');
    expect(err.kind).toBe('not_found');
    expect(err.message).toBe('Not found: ZZZZ (yahoo)');
    expect(err instanceof ProviderError).toBe(true);
  });

  it('RateLimitError, AuthError and TransientError map to their kinds', () => {
    expect(new RateLimitError('alphavantage', 'slow down').kind).toBe('rate_limited');
    expect(new AuthError('schwab', 'no key').kind).toBe('auth');
    expect(new TransientError('polygon', 'timeout').kind).toBe('transient');
  });

  it('keeps the underlying cause', () => {
    const cause = new Error('socket hang up');
    const err = new TransientError('yahoo', 'Connection error', { cause });
    expect(err.cause).toBe(cause);
  });

  it('DataParseError has source', () => {
    const err = new DataParseError('bad json', 'https://example.com');
    expect(err.source).toBe('https://example.com');
    expect(err.name).toBe('DataParseError');
  });

  it('ConfigError lists its issues in the message', () => {
    const err = new ConfigError('Invalid configuration', ['PORT: Expected number', 'DEFAULT_PROVIDER: Unknown provider']);
    expect(err.message).toBe('Invalid configuration: PORT: Expected number; DEFAULT_PROVIDER: Unknown provider');
    expect(err.issues).toHaveLength(2);
  });
});
