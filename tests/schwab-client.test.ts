import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { AUTHORIZATION_URL, SchwabClient, TOKEN_URL } from '../src/auth/schwab-client.js';
import { TokenManager } from '../src/auth/token-manager.js';
import { AuthError } from '../src/core/errors.js';
import { calledUrl, jsonResponse, stubFetch } from './fetch-stub.js';

const SETTINGS = {
  appKey: 'test-key',
  appSecret: 'test-secret',
  redirectUri: 'https://127.0.0.1:8000/api/v1/oauth/callback',
};

const BASIC = `Basic ${Buffer.from('test-key:test-secret').toString('base64')}`;

function requestInit(mock: ReturnType<typeof stubFetch>, index = 0): RequestInit {
  const call = mock.mock.calls[index];
  if (!call?.[1]) throw new Error(`fetch call ${index} had no init`);
  return call[1];
}

describe('SchwabClient', () => {
  let tempDir: string;
  let now: Date;
  let tokens: TokenManager;
  let client: SchwabClient;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'roce-yield-schwab-'));
    now = new Date('2024-06-01T12:00:00.000Z');
    tokens = new TokenManager('test-secret', join(tempDir, 'tokens.db'), { now: () => now });
    client = new SchwabClient(SETTINGS, tokens);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    tokens.close();
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('builds the authorization URL', () => {
    const url = new URL(client.authorizationUrl());
    expect(`${url.origin}${url.pathname}`).toBe(AUTHORIZATION_URL);
    expect(url.searchParams.get('client_id')).toBe('test-key');
    expect(url.searchParams.get('redirect_uri')).toBe(SETTINGS.redirectUri);
    expect(url.searchParams.get('response_type')).toBe('code');
  });

  it('exchanges an authorization code with Basic credentials and a form body', async () => {
    const fetchMock = stubFetch(() => jsonResponse({
      access_token: 'test-access',
      refresh_token: 'test-refresh',
      expires_in: 1800,
      token_type: 'Bearer',
    }));

    const stored = await client.exchangeCode('test-code');

    expect(calledUrl(fetchMock).href).toBe(TOKEN_URL);
    const init = requestInit(fetchMock);
    expect(init.method).toBe('POST');
    const headers = new Headers(init.headers);
    expect(headers.get('Authorization')).toBe(BASIC);
    expect(headers.get('Content-Type')).toBe('application/x-www-form-urlencoded');
    expect(init.body).toBe(
      'grant_type=authorization_code&code=test-code&redirect_uri=https%3A%2F%2F127.0.0.1%3A8000%2Fapi%2Fv1%2Foauth%2Fcallback'
    );

    expect(stored.access_token).toBe('test-access');
    expect(stored.expires_at).toBe('2024-06-01T12:30:00.000Z');
    expect(tokens.load()?.refresh_token).toBe('test-refresh');
  });

  it('wraps a rejected exchange as an auth error', async () => {
    stubFetch(() => jsonResponse({ error: 'invalid_grant' }, 400));

    const exchange = client.exchangeCode('bad-code');
    await expect(exchange).rejects.toBeInstanceOf(AuthError);
    await expect(exchange).rejects.toThrow(/^Token exchange failed: /);
    expect(tokens.load()).toBeNull();
  });

  it('rejects a token response without an access token', async () => {
    stubFetch(() => jsonResponse({ token_type: 'Bearer' }));
    await expect(client.exchangeCode('test-code')).rejects.toThrow('Token exchange failed: unexpected token response');
  });

  it('keeps the previous refresh token when the refresh response omits one', async () => {
    tokens.save({ access_token: 'old-access', refresh_token: 'test-refresh', expires_in: 1800 });
    const fetchMock = stubFetch(() => jsonResponse({ access_token: 'new-access', expires_in: 1800 }));

    const refreshed = await client.refreshAccessToken();

    expect(requestInit(fetchMock).body).toBe('grant_type=refresh_token&refresh_token=test-refresh');
    expect(refreshed.access_token).toBe('new-access');
    expect(refreshed.refresh_token).toBe('test-refresh');
  });

  it('refuses to refresh without a refresh token', async () => {
    const fetchMock = stubFetch(() => jsonResponse({}));
    tokens.save({ access_token: 'old-access', expires_in: 1800 });

    await expect(client.refreshAccessToken()).rejects.toThrow('No refresh token available');
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('returns the stored access token while it is fresh', async () => {
    const fetchMock = stubFetch(() => jsonResponse({}));
    tokens.save({ access_token: 'test-access', refresh_token: 'test-refresh', expires_in: 1800 });

    await expect(client.getValidAccessToken()).resolves.toBe('test-access');
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('refreshes an access token that is about to expire', async () => {
    stubFetch(() => jsonResponse({ access_token: 'new-access', expires_in: 1800 }));
    tokens.save({ access_token: 'old-access', refresh_token: 'test-refresh', expires_in: 1800 });
    now = new Date('2024-06-01T12:26:00.000Z');

    await expect(client.getValidAccessToken()).resolves.toBe('new-access');
  });

  it('requires a connection before requesting quotes', async () => {
    const fetchMock = stubFetch(() => jsonResponse({}));

    await expect(client.getQuote('AAPL')).rejects.toThrow('No valid tokens available. Connect to Schwab first.');
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('requests a single quote with the bearer token', async () => {
    tokens.save({ access_token: 'test-access', expires_in: 1800 });
    const fetchMock = stubFetch(() => jsonResponse({ AAPL: { quote: { lastPrice: 190.5 } } }));

    const quote = await client.getQuote(' aapl ');

    const url = calledUrl(fetchMock);
    expect(url.pathname).toBe('/marketdata/v1/AAPL/quotes');
    expect(new Headers(requestInit(fetchMock).headers).get('Authorization')).toBe('Bearer test-access');
    expect(quote).toEqual({ AAPL: { quote: { lastPrice: 190.5 } } });
  });

  it('requests several quotes at once', async () => {
    tokens.save({ access_token: 'test-access', expires_in: 1800 });
    const fetchMock = stubFetch(() => jsonResponse({}));

    await client.getQuotes(['aapl', 'msft']);

    const url = calledUrl(fetchMock);
    expect(url.pathname).toBe('/marketdata/v1/quotes');
    expect(url.searchParams.get('symbols')).toBe('AAPL,MSFT');
  });

  it('disconnects by clearing stored tokens', () => {
    tokens.save({ access_token: 'test-access' });
    expect(client.disconnect()).toBe(true);
    expect(tokens.load()).toBeNull();
  });
});
