import { join } from 'node:path';
import { FinancialDataAggregator, PROVIDER_PRIORITY, type AggregatorObserver } from './aggregator.js';
import type { AppConfig } from './config.js';
import { PROVIDER_NAMES, type ProviderName } from './types.js';
import { AlphaVantageAdapter } from '../providers/alphavantage.js';
import { createProviders, PROVIDER_LABELS, type ProviderRegistry } from '../providers/index.js';
import { SchwabClient } from '../auth/schwab-client.js';
import { TokenManager } from '../auth/token-manager.js';

/**
 * Wires configuration into the objects each surface (CLI, web, MCP) uses.
 * Schwab support is present only when its app credentials and an
 * encryption key are configured.
 */

export interface Services {
  config: AppConfig;
  providers: ProviderRegistry;
  aggregator: FinancialDataAggregator;
  tokens?: TokenManager;
  schwab?: SchwabClient;
}

export const TOKEN_DB_FILE = 'tokens.db';

export function createServices(
  config: AppConfig,
  observer?: AggregatorObserver,
  providers: ProviderRegistry = createProviders(config)
): Services {
  const aggregator = new FinancialDataAggregator(providers, {
    defaultProvider: config.defaultProvider,
    enableFallback: config.enableFallback,
    observer,
  });

  const tokens = config.encryptionKey
    ? new TokenManager(config.encryptionKey, join(config.dataDir, TOKEN_DB_FILE))
    : undefined;
  const schwab = tokens && config.schwab ? new SchwabClient(config.schwab, tokens) : undefined;

  return { config, providers, aggregator, tokens, schwab };
}

export function closeServices(services: Services): void {
  services.tokens?.close();
}

export interface ProviderStatus {
  name: ProviderName;
  label: string;
  configured: boolean;
  active: boolean;
  /** Position in automatic selection, 1 = tried first */
  priority: number;
  /** Requests left today, for providers with a daily quota */
  remaining_quota?: number;
}

export function listProviders(services: Services): ProviderStatus[] {
  const active = services.aggregator.resolveProvider();
  return PROVIDER_NAMES.map(name => {
    const adapter = services.providers[name];
    const quota = adapter instanceof AlphaVantageAdapter ? adapter.remainingQuota() : null;
    return {
      name,
      label: PROVIDER_LABELS[name],
      configured: adapter.isConfigured(),
      active: name === active,
      priority: PROVIDER_PRIORITY.indexOf(name) + 1,
      remaining_quota: quota ?? undefined,
    };
  });
}
