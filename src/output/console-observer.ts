import chalk from 'chalk';
import type { AggregatorObserver } from '../core/aggregator.js';
import { PROVIDER_LABELS } from '../providers/index.js';

/**
 * Prints aggregator diagnostics as dim/yellow lines on stderr so that
 * stdout stays clean for tables and JSON.
 */
export function createConsoleObserver(write: (line: string) => void = line => console.error(line)): AggregatorObserver {
  return {
    onProviderFailure(event) {
      const label = PROVIDER_LABELS[event.provider];
      if (event.outcome === 'empty') {
        write(chalk.dim(`${label} returned no ${event.operation} data for ${event.ticker}`));
        return;
      }
      const detail = event.error instanceof Error ? event.error.message : event.outcome;
      write(chalk.yellow(`${label} ${event.operation} request for ${event.ticker} failed (${event.outcome}): ${detail}`));
    },
    onFallback(event) {
      write(chalk.dim(`Falling back from ${PROVIDER_LABELS[event.from]} to ${PROVIDER_LABELS[event.to]}`));
    },
  };
}
