/**
 * Core data model for roce-yield.
 *
 * Design principles:
 * - Canonical periods are built fresh per request and frozen once returned
 * - Absent values are `undefined`, never NaN, null or a sentinel string
 * - Metrics reference canonical periods, never mutate them
 * - Every substitution made while calculating is recorded in `notes`
 */

export const PROVIDER_NAMES = ['polygon', 'yahoo', 'alphavantage'] as const;

export type ProviderName = typeof PROVIDER_NAMES[number];

export type Timeframe = 'annual' | 'quarterly';

export type FiscalPeriod = 'FY' | 'Q1' | 'Q2' | 'Q3' | 'Q4';

export const INCOME_FIELDS = [
  'revenues',
  'operating_income',
  'net_income',
  'cost_of_revenue',
  'gross_profit',
  'operating_expenses',
  'ebitda',
  'ebit',
  'interest_expense',
] as const;

export const BALANCE_FIELDS = [
  'current_assets',
  'current_liabilities',
  'fixed_assets',
  'total_assets',
  'total_liabilities',
  'equity',
  'cash_and_equivalents',
  'short_long_term_debt_total',
  'current_debt',
  'short_term_debt',
  'current_long_term_debt',
  'long_term_debt',
  'long_term_debt_noncurrent',
] as const;

export type IncomeField = typeof INCOME_FIELDS[number];
export type BalanceField = typeof BALANCE_FIELDS[number];

export type IncomeFields = Partial<Record<IncomeField, number>>;
export type BalanceFields = Partial<Record<BalanceField, number>>;

/** Provider-native period record, most recent first in any sequence */
export interface RawPeriod {
  end_date: string;
  fiscal_period: FiscalPeriod;
  fiscal_year: string;
  income_statement: Record<string, unknown>;
  balance_sheet: Record<string, unknown>;
}

/** One reporting period's financials for one ticker, provider-agnostic */
export interface CanonicalPeriod extends IncomeFields, BalanceFields {
  ticker: string;
  end_date: string;
  fiscal_period: FiscalPeriod;
  fiscal_year: string;
}

export interface TickerReference {
  ticker: string;
  market_cap?: number;
  share_class_shares_outstanding?: number;
  weighted_shares_outstanding?: number;
}

export interface MetricsResult {
  ticker: string;
  date: string;
  period: Timeframe;

  working_capital: number;
  capital_employed: number;
  roce?: number;
  roce_percent?: string;

  ebit?: number;
  enterprise_value?: number;
  market_cap?: number;
  stock_price?: number;
  shares_outstanding?: number;
  total_debt: number;
  cash_and_equivalents?: number;
  earnings_yield?: number;
  earnings_yield_percent?: string;

  total_assets: number;
  current_liabilities: number;

  short_long_term_debt_total?: number;
  current_debt?: number;
  short_term_debt?: number;
  current_long_term_debt?: number;
  long_term_debt?: number;
  long_term_debt_noncurrent?: number;

  notes: string[];
}

/** Canonical period plus the headline figures shown alongside raw financials */
export interface PeriodSummary extends CanonicalPeriod {
  working_capital: number;
  roce?: number;
  roce_percent?: string;
}
