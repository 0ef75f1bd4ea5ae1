import type { AppConfig } from '../core/config.js';
import type { ProviderName } from '../core/types.js';
import { AlphaVantageAdapter } from './alphavantage.js';
import { loadFieldMaps, type FieldMaps } from './field-maps.js';
import { PolygonAdapter } from './polygon.js';
import type { ProviderAdapter } from './provider.js';
import { YahooAdapter } from './yahoo.js';

export type ProviderRegistry = Readonly<Record<ProviderName, ProviderAdapter>>;

export const PROVIDER_LABELS: Readonly<Record<ProviderName, string>> = {
  polygon: 'Polygon.io',
  yahoo: 'Yahoo Finance',
  alphavantage: 'Alpha Vantage',
};

/** Build one adapter per provider, each with its own field map, memo and throttle */
export function createProviders(
  config: Pick<AppConfig, 'polygonApiKey' | 'alphaVantageApiKey'>,
  fieldMaps: FieldMaps = loadFieldMaps()
): ProviderRegistry {
  return Object.freeze({
    polygon: new PolygonAdapter(fieldMaps.polygon, { apiKey: config.polygonApiKey }),
    yahoo: new YahooAdapter(fieldMaps.yahoo),
    alphavantage: new AlphaVantageAdapter(fieldMaps.alphavantage, { apiKey: config.alphaVantageApiKey }),
  });
}
