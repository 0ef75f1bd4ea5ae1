import { z } from 'zod';
import { join } from 'node:path';
import { homedir } from 'node:os';
import { ConfigError } from './errors.js';
import { PROVIDER_NAMES, type ProviderName, type Timeframe } from './types.js';

/**
 * Application settings, read once from the environment.
 */

const optionalSecret = z
  .string()
  .transform(s => s.trim())
  .transform(s => (s.length > 0 ? s : undefined))
  .optional();

const booleanFlag = z
  .string()
  .transform(s => !['false', '0', 'no', 'off'].includes(s.trim().toLowerCase()));

const envSchema = z.object({
  POLYGON_API_KEY: optionalSecret,
  ALPHA_VANTAGE_API_KEY: optionalSecret,
  DEFAULT_PROVIDER: z
    .string()
    .transform((s, ctx) => {
      if (s.trim() === '') return undefined;
      const provider = parseProvider(s);
      if (!provider) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Unknown provider "${s}". Expected one of: ${PROVIDER_NAMES.join(', ')}`,
        });
        return z.NEVER;
      }
      return provider;
    })
    .optional(),
  ENABLE_FALLBACK: booleanFlag.optional(),
  PORT: z.coerce.number().int().min(1).max(65535).optional(),
  SCHWAB_APP_KEY: optionalSecret,
  SCHWAB_APP_SECRET: optionalSecret,
  SCHWAB_REDIRECT_URI: optionalSecret,
  SCHWAB_ENCRYPTION_KEY: optionalSecret,
  FRONTEND_URL: z.string().url().optional(),
  ROCE_YIELD_HOME: optionalSecret,
});

export interface SchwabSettings {
  appKey: string;
  appSecret: string;
  redirectUri: string;
}

export interface AppConfig {
  polygonApiKey?: string;
  alphaVantageApiKey?: string;
  defaultProvider?: ProviderName;
  enableFallback: boolean;
  port: number;
  schwab?: SchwabSettings;
  encryptionKey?: string;
  frontendUrl: string;
  dataDir: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      'Invalid configuration',
      parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`)
    );
  }
  const e = parsed.data;

  const schwab = e.SCHWAB_APP_KEY && e.SCHWAB_APP_SECRET && e.SCHWAB_REDIRECT_URI
    ? { appKey: e.SCHWAB_APP_KEY, appSecret: e.SCHWAB_APP_SECRET, redirectUri: e.SCHWAB_REDIRECT_URI }
    : undefined;

  return {
    polygonApiKey: e.POLYGON_API_KEY,
    alphaVantageApiKey: e.ALPHA_VANTAGE_API_KEY,
    defaultProvider: e.DEFAULT_PROVIDER,
    enableFallback: e.ENABLE_FALLBACK ?? true,
    port: e.PORT ?? 3005,
    schwab,
    encryptionKey: e.SCHWAB_ENCRYPTION_KEY,
    frontendUrl: e.FRONTEND_URL ?? 'http://localhost:5173',
    dataDir: e.ROCE_YIELD_HOME ?? join(homedir(), '.roce-yield'),
  };
}

const PROVIDER_ALIASES: Readonly<Partial<Record<string, ProviderName>>> = {
  yfinance: 'yahoo',
  alpha_vantage: 'alphavantage',
};

/** Resolve a loosely-typed provider string at a boundary; undefined when unknown */
export function parseProvider(value: string | undefined | null): ProviderName | undefined {
  if (!value) return undefined;
  const lower = value.trim().toLowerCase();
  return PROVIDER_NAMES.find(p => p === lower) ?? PROVIDER_ALIASES[lower];
}

/** 'annual' or 'quarterly'; 'quarter' is accepted as shorthand */
export function parseTimeframe(value: string | undefined | null): Timeframe | undefined {
  if (!value) return undefined;
  const lower = value.trim().toLowerCase();
  if (lower === 'annual') return 'annual';
  if (lower === 'quarterly' || lower === 'quarter') return 'quarterly';
  return undefined;
}
