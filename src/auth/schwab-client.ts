import { AuthError, ProviderError, TransientError } from '../core/errors.js';
import type { SchwabSettings } from '../core/config.js';
import { fetchJson } from '../core/http-client.js';
import { tokenSetSchema, type StoredTokens, type TokenManager } from './token-manager.js';

/**
 * Schwab OAuth 2.0 authorization-code flow and the quotes endpoint.
 * The token endpoint takes HTTP Basic credentials (app key / app secret)
 * and form-encoded bodies.
 */

export const AUTHORIZATION_URL = 'https://api.schwabapi.com/v1/oauth/authorize';
export const TOKEN_URL = 'https://api.schwabapi.com/v1/oauth/token';
const API_BASE_URL = 'https://api.schwabapi.com';

export class SchwabClient {
  constructor(
    private readonly settings: SchwabSettings,
    private readonly tokens: TokenManager,
    private readonly apiBaseUrl: string = API_BASE_URL
  ) {}

  /** Where to send the user to grant access */
  authorizationUrl(): string {
    const params = new URLSearchParams({
      client_id: this.settings.appKey,
      redirect_uri: this.settings.redirectUri,
      response_type: 'code',
    });
    return `${AUTHORIZATION_URL}?${params}`;
  }

  async exchangeCode(code: string): Promise<StoredTokens> {
    return this.requestTokens(
      { grant_type: 'authorization_code', code, redirect_uri: this.settings.redirectUri },
      'Token exchange failed'
    );
  }

  async refreshAccessToken(): Promise<StoredTokens> {
    const current = this.tokens.load();
    if (!current?.refresh_token) {
      throw new AuthError('schwab', 'No refresh token available');
    }
    return this.requestTokens(
      { grant_type: 'refresh_token', refresh_token: current.refresh_token },
      'Token refresh failed',
      current.refresh_token
    );
  }

  /** Current access token, refreshed first when it is about to expire */
  async getValidAccessToken(): Promise<string> {
    if (this.tokens.isAccessExpired()) {
      if (this.tokens.isRefreshValid()) {
        return (await this.refreshAccessToken()).access_token;
      }
      throw new AuthError('schwab', 'No valid tokens available. Connect to Schwab first.');
    }

    const tokens = this.tokens.load();
    if (!tokens) {
      throw new AuthError('schwab', 'No valid tokens available. Connect to Schwab first.');
    }
    return tokens.access_token;
  }

  async getQuote(symbol: string): Promise<unknown> {
    const accessToken = await this.getValidAccessToken();
    const ticker = symbol.trim().toUpperCase();
    return fetchJson(`${this.apiBaseUrl}/marketdata/v1/${encodeURIComponent(ticker)}/quotes`, {
      provider: 'schwab',
      subject: ticker,
      headers: { Authorization: `Bearer ${accessToken}` },
    });
  }

  async getQuotes(symbols: string[]): Promise<unknown> {
    const accessToken = await this.getValidAccessToken();
    const params = new URLSearchParams({ symbols: symbols.map(s => s.trim().toUpperCase()).join(',') });
    return fetchJson(`${this.apiBaseUrl}/marketdata/v1/quotes?${params}`, {
      provider: 'schwab',
      headers: { Authorization: `Bearer ${accessToken}` },
    });
  }

  /** Local disconnect; Schwab has no revocation endpoint */
  disconnect(): boolean {
    return this.tokens.clear();
  }

  private async requestTokens(
    form: Record<string, string>,
    failure: string,
    previousRefreshToken?: string
  ): Promise<StoredTokens> {
    const basic = Buffer.from(`${this.settings.appKey}:${this.settings.appSecret}`).toString('base64');

    let body: unknown;
    try {
      body = await fetchJson(TOKEN_URL, {
        provider: 'schwab',
        method: 'POST',
        headers: {
          'Authorization': `Basic ${basic}`,
          'Content-Type': 'application/x-www-form-urlencoded',
        },
        body: new URLSearchParams(form).toString(),
      });
    } catch (err) {
      if (err instanceof ProviderError) {
        throw new AuthError('schwab', `${failure}: ${err.message}`, { cause: err });
      }
      throw err;
    }

    const parsed = tokenSetSchema.safeParse(body);
    if (!parsed.success) {
      throw new AuthError('schwab', `${failure}: unexpected token response`, {
        cause: new TransientError('schwab', parsed.error.message),
      });
    }

    // A refresh response may omit the refresh token; keep the one we have
    const refreshToken = parsed.data.refresh_token ?? previousRefreshToken;
    return this.tokens.save({ ...parsed.data, refresh_token: refreshToken });
  }
}
