#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { MAX_PERIODS, type NotFoundResult } from './core/aggregator.js';
import { loadConfig, parseProvider, parseTimeframe } from './core/config.js';
import { ConfigError } from './core/errors.js';
import { closeServices, createServices, listProviders, type Services } from './core/services.js';
import type { ProviderName, Timeframe } from './core/types.js';
import { createConsoleObserver } from './output/console-observer.js';
import { renderJson } from './output/json-renderer.js';
import { renderFinancialsTable, renderMetricsTable, renderReferenceTable } from './output/table-renderer.js';
import { summarizePeriod } from './processing/metrics.js';
import { serializeFinancials, serializeMetrics, serializeReference } from './web/serialization.js';

class UsageError extends Error {}

interface CommonOptions {
  timeframe?: string;
  provider?: string;
  json?: boolean;
}

async function run(action: (services: Services) => Promise<void> | void): Promise<void> {
  let services: Services | undefined;
  try {
    services = createServices(loadConfig(), createConsoleObserver());
    await action(services);
  } catch (err) {
    if (err instanceof ConfigError || err instanceof UsageError) {
      console.error(chalk.red(err.message));
    } else {
      console.error(chalk.red(`Error: ${err instanceof Error ? err.message : String(err)}`));
    }
    process.exitCode = 1;
  } finally {
    if (services) closeServices(services);
  }
}

function timeframeOption(value: string | undefined): Timeframe {
  if (value === undefined) return 'annual';
  const timeframe = parseTimeframe(value);
  if (!timeframe) throw new UsageError(`Invalid timeframe "${value}". Use annual or quarterly.`);
  return timeframe;
}

function providerOption(value: string | undefined): ProviderName | undefined {
  if (value === undefined) return undefined;
  const provider = parseProvider(value);
  if (!provider) throw new UsageError(`Unknown provider "${value}". Use polygon, yahoo or alphavantage.`);
  return provider;
}

function limitOption(value: string | undefined): number {
  if (value === undefined) return 1;
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit < 1 || limit > MAX_PERIODS) {
    throw new UsageError(`Invalid limit "${value}". Use a whole number from 1 to ${MAX_PERIODS}.`);
  }
  return limit;
}

function reportNotFound(result: NotFoundResult): void {
  console.error(chalk.red(result.error.message));
  for (const attempt of result.error.attempts) {
    console.error(chalk.dim(`  ${attempt.provider}: ${attempt.outcome}${attempt.message ? ` (${attempt.message})` : ''}`));
  }
  process.exitCode = 1;
}

const program = new Command();

program
  .name('roce-yield')
  .description('ROCE and earnings yield from multiple market-data providers')
  .version('0.1.0');

program
  .command('financials')
  .alias('fin')
  .description('Show income statement and balance sheet figures for a ticker')
  .argument('<ticker>', 'Stock ticker (e.g., AAPL)')
  .option('-t, --timeframe <timeframe>', 'annual or quarterly', 'annual')
  .option('-l, --limit <n>', `Number of periods (1-${MAX_PERIODS})`, '1')
  .option('-p, --provider <provider>', 'polygon, yahoo or alphavantage')
  .option('-j, --json', 'Output as JSON instead of table')
  .action(async (ticker: string, options: CommonOptions & { limit?: string }) => {
    await run(async ({ aggregator }) => {
      const timeframe = timeframeOption(options.timeframe);
      const result = await aggregator.getFinancials(
        ticker,
        timeframe,
        limitOption(options.limit),
        providerOption(options.provider)
      );
      if (!result.success) return reportNotFound(result);

      if (options.json) {
        console.log(renderJson(serializeFinancials(result, timeframe)));
      } else {
        console.log('');
        console.log(renderFinancialsTable(ticker.trim().toUpperCase(), result.data.map(summarizePeriod), result.provider));
        console.log('');
      }
    });
  });

program
  .command('metrics')
  .alias('m')
  .description('Calculate ROCE, enterprise value and earnings yield for a ticker')
  .argument('<ticker>', 'Stock ticker (e.g., AAPL)')
  .option('-t, --timeframe <timeframe>', 'annual or quarterly', 'annual')
  .option('-p, --provider <provider>', 'polygon, yahoo or alphavantage')
  .option('-j, --json', 'Output as JSON instead of table')
  .action(async (ticker: string, options: CommonOptions) => {
    await run(async ({ aggregator }) => {
      const result = await aggregator.analyzeTicker(
        ticker,
        timeframeOption(options.timeframe),
        providerOption(options.provider)
      );
      if (!result.success) return reportNotFound(result);

      if (options.json) {
        console.log(renderJson(serializeMetrics(result)));
      } else {
        console.log('');
        console.log(renderMetricsTable(result.metrics, result.provider, result.referenceProvider));
        console.log('');
      }
    });
  });

program
  .command('reference')
  .alias('ref')
  .description('Show market capitalization and shares outstanding for a ticker')
  .argument('<ticker>', 'Stock ticker (e.g., AAPL)')
  .option('-p, --provider <provider>', 'polygon, yahoo or alphavantage')
  .option('-j, --json', 'Output as JSON instead of table')
  .action(async (ticker: string, options: CommonOptions) => {
    await run(async ({ aggregator }) => {
      const result = await aggregator.getReference(ticker, providerOption(options.provider));
      if (!result.success) return reportNotFound(result);

      if (options.json) {
        console.log(renderJson(serializeReference(result.data, result.provider)));
      } else {
        console.log('');
        console.log(renderReferenceTable(result.data, result.provider));
        console.log('');
      }
    });
  });

program
  .command('providers')
  .description('List data providers and whether they are configured')
  .option('-j, --json', 'Output as JSON')
  .action(async (options: { json?: boolean }) => {
    await run(services => {
      const statuses = listProviders(services);
      if (options.json) {
        console.log(renderJson({ providers: statuses, fallback_enabled: services.config.enableFallback }));
        return;
      }

      console.log(chalk.bold('\nData Providers\n'));
      for (const s of statuses) {
        const state = s.configured ? chalk.green('configured') : chalk.dim('not configured');
        const marker = s.active ? chalk.cyan(' (active)') : '';
        const quota = s.remaining_quota !== undefined ? chalk.dim(`  ${s.remaining_quota} requests left today`) : '';
        console.log(`  ${chalk.cyan(s.name.padEnd(14))} ${s.label.padEnd(16)} ${state}${marker}${quota}`);
      }
      console.log(chalk.dim(`\n  Fallback to Yahoo Finance: ${services.config.enableFallback ? 'enabled' : 'disabled'}\n`));
    });
  });

const auth = program
  .command('auth')
  .description('Manage the Schwab brokerage connection');

auth
  .command('status')
  .description('Show whether Schwab tokens are stored and valid')
  .action(async () => {
    await run(({ tokens }) => {
      if (!tokens) {
        console.log(chalk.dim('Schwab is not configured (set SCHWAB_ENCRYPTION_KEY and the SCHWAB_APP_* variables).'));
        return;
      }
      const stored = tokens.load();
      if (!stored) {
        console.log('Not connected to Schwab');
      } else if (tokens.isAccessExpired() && !tokens.isRefreshValid()) {
        console.log(chalk.yellow('Session expired - please reconnect'));
      } else {
        console.log(chalk.green('Connected to Schwab'));
        if (stored.expires_at) console.log(chalk.dim(`  Access token expires ${stored.expires_at}`));
        if (tokens.isAccessExpired()) console.log(chalk.dim('  Token will be refreshed automatically'));
      }
    });
  });

auth
  .command('url')
  .description('Print the Schwab authorization URL')
  .action(async () => {
    await run(({ schwab }) => {
      if (!schwab) throw new UsageError('Schwab is not configured (set SCHWAB_APP_KEY, SCHWAB_APP_SECRET, SCHWAB_REDIRECT_URI and SCHWAB_ENCRYPTION_KEY).');
      console.log(schwab.authorizationUrl());
    });
  });

auth
  .command('logout')
  .description('Delete stored Schwab tokens')
  .action(async () => {
    await run(({ tokens }) => {
      if (tokens?.clear()) {
        console.log(chalk.green('Disconnected from Schwab.'));
      } else {
        console.log('No active connection to disconnect');
      }
    });
  });

await program.parseAsync();
