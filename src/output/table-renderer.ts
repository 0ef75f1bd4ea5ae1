import chalk from 'chalk';
import type { MetricsResult, PeriodSummary, ProviderName, TickerReference } from '../core/types.js';
import { PROVIDER_LABELS } from '../providers/index.js';
import {
  formatCurrency,
  formatPeriodLabel,
  formatPrice,
  formatShareCount,
  padRight,
} from './format-utils.js';

/**
 * Renders aggregator results as terminal tables.
 * Periods are columns, most recent first; line items are rows.
 */

const LABEL_WIDTH = 26;
const COLUMN_WIDTH = 16;

type PeriodRow = [label: string, pick: (p: PeriodSummary) => string];

const PERIOD_ROWS: PeriodRow[] = [
  ['Revenue', p => formatCurrency(p.revenues)],
  ['Gross Profit', p => formatCurrency(p.gross_profit)],
  ['Operating Income', p => formatCurrency(p.operating_income)],
  ['Net Income', p => formatCurrency(p.net_income)],
  ['Current Assets', p => formatCurrency(p.current_assets)],
  ['Current Liabilities', p => formatCurrency(p.current_liabilities)],
  ['Total Assets', p => formatCurrency(p.total_assets)],
  ['Total Liabilities', p => formatCurrency(p.total_liabilities)],
  ['Equity', p => formatCurrency(p.equity)],
  ['Cash & Equivalents', p => formatCurrency(p.cash_and_equivalents)],
  ['Working Capital', p => formatCurrency(p.working_capital)],
  ['ROCE', p => p.roce_percent ?? '--'],
];

export function renderFinancialsTable(ticker: string, periods: PeriodSummary[], provider: ProviderName): string {
  const lines: string[] = [];
  const isQuarterly = periods.some(p => p.fiscal_period !== 'FY');
  const header = `${ticker}: ${isQuarterly ? 'Quarterly' : 'Annual'} Financials (${PROVIDER_LABELS[provider]})`;
  lines.push(chalk.bold(header));
  lines.push(chalk.dim('='.repeat(header.length)));
  lines.push('');

  const heading = periods.map(p => chalk.underline(padRight(formatPeriodLabel(p.fiscal_period, p.fiscal_year), COLUMN_WIDTH)));
  lines.push(`  ${chalk.underline(padRight('', LABEL_WIDTH))}${heading.join('')}`);

  for (const [label, pick] of PERIOD_ROWS) {
    lines.push(`  ${padRight(label, LABEL_WIDTH)}${periods.map(p => padRight(pick(p), COLUMN_WIDTH)).join('')}`);
  }

  lines.push('');
  lines.push(chalk.dim(`  Period end: ${periods.map(p => p.end_date).join(', ')}`));
  return lines.join('\n');
}

export function renderMetricsTable(
  metrics: MetricsResult,
  provider: ProviderName,
  referenceProvider?: ProviderName
): string {
  const lines: string[] = [];
  const header = `${metrics.ticker}: ROCE & Earnings Yield (${metrics.period}, ${metrics.date})`;
  lines.push(chalk.bold(header));
  lines.push(chalk.dim('='.repeat(header.length)));
  lines.push('');

  const row = (label: string, value: string) => `  ${padRight(label, LABEL_WIDTH)}${value}`;

  lines.push(chalk.bold('  Return on Capital Employed'));
  lines.push(row('ROCE', metrics.roce_percent ? chalk.bold(metrics.roce_percent) : '--'));
  lines.push(row('Capital Employed', formatCurrency(metrics.capital_employed)));
  lines.push(row('Working Capital', formatCurrency(metrics.working_capital)));
  lines.push(row('Total Assets', formatCurrency(metrics.total_assets)));
  lines.push(row('Current Liabilities', formatCurrency(metrics.current_liabilities)));
  lines.push('');

  lines.push(chalk.bold('  Earnings Yield'));
  lines.push(row('Earnings Yield', metrics.earnings_yield_percent ? chalk.bold(metrics.earnings_yield_percent) : '--'));
  lines.push(row('EBIT', formatCurrency(metrics.ebit)));
  lines.push(row('Enterprise Value', formatCurrency(metrics.enterprise_value)));
  lines.push(row('Market Cap', formatCurrency(metrics.market_cap)));
  lines.push(row('Total Debt', formatCurrency(metrics.total_debt)));
  lines.push(row('Cash & Equivalents', formatCurrency(metrics.cash_and_equivalents)));
  lines.push(row('Stock Price', formatPrice(metrics.stock_price)));
  lines.push(row('Shares Outstanding', formatShareCount(metrics.shares_outstanding)));
  lines.push('');

  lines.push(chalk.dim('  -- Sources ' + '-'.repeat(48)));
  lines.push(chalk.dim(`  Financials: ${PROVIDER_LABELS[provider]}`));
  lines.push(chalk.dim(`  Market:     ${referenceProvider ? PROVIDER_LABELS[referenceProvider] : 'unavailable'}`));
  if (metrics.notes.length > 0) {
    lines.push(chalk.dim(`  Notes:      ${metrics.notes.join('\n              ')}`));
  }

  return lines.join('\n');
}

export function renderReferenceTable(reference: TickerReference, provider: ProviderName): string {
  const lines: string[] = [];
  const header = `${reference.ticker}: Market Data (${PROVIDER_LABELS[provider]})`;
  lines.push(chalk.bold(header));
  lines.push(chalk.dim('='.repeat(header.length)));
  lines.push(`  ${padRight('Market Cap', LABEL_WIDTH)}${formatCurrency(reference.market_cap)}`);
  lines.push(`  ${padRight('Weighted Shares', LABEL_WIDTH)}${formatShareCount(reference.weighted_shares_outstanding)}`);
  lines.push(`  ${padRight('Share Class Shares', LABEL_WIDTH)}${formatShareCount(reference.share_class_shares_outstanding)}`);
  return lines.join('\n');
}
