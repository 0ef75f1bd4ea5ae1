import type {
  CanonicalPeriod,
  MetricsResult,
  PeriodSummary,
  TickerReference,
  Timeframe,
} from '../core/types.js';

/**
 * Derived valuation metrics: ROCE, enterprise value and earnings yield.
 *
 * Everything here is pure. Missing inputs never throw; they leave the
 * affected field undefined and append an explanation to `notes`.
 */

export const NOTES = {
  operatingIncomeMissing: 'Operating income not available',
  capitalEmployedZero: 'Capital employed is zero - cannot calculate ROCE',
  currentDebtFromShortTerm: 'Current debt using short_term_debt (synonymous terms)',
  noncurrentFromTotal: 'Long-term debt noncurrent calculated from total_debt - current_debt',
  noncurrentFromLongTerm: 'Long-term debt noncurrent calculated from long_term_debt - current_long_term_debt',
  cashMissing: 'Cash and cash equivalents not reported separately - EV calculation may be overstated',
  enterpriseValueMissing: 'Enterprise value not available - cannot calculate earnings yield',
  ebitMissing: 'EBIT not available - cannot calculate earnings yield',
} as const;

/**
 * Return on Capital Employed = operating income / capital employed.
 * Undefined when capital employed is zero.
 */
export function calculateRoce(operatingIncome: number, capitalEmployed: number): number | undefined {
  if (capitalEmployed === 0) return undefined;
  return operatingIncome / capitalEmployed;
}

/** Prefer the reported total; otherwise current + long-term, absent parts counted as 0 */
export function calculateTotalDebt(
  currentDebt: number | undefined,
  longTermDebt: number | undefined,
  reportedTotal?: number
): number {
  if (reportedTotal !== undefined) return reportedTotal;
  return (currentDebt ?? 0) + (longTermDebt ?? 0);
}

/** Market cap + total debt - cash. Undefined without a (non-zero) market cap. */
export function calculateEnterpriseValue(
  marketCap: number | undefined,
  totalDebt: number,
  cash: number | undefined
): number | undefined {
  if (!marketCap) return undefined;
  return marketCap + totalDebt - (cash ?? 0);
}

/** EBIT / EV. Undefined when either operand is absent or zero. */
export function calculateEarningsYield(ebit: number | undefined, enterpriseValue: number | undefined): number | undefined {
  if (!ebit || !enterpriseValue) return undefined;
  return ebit / enterpriseValue;
}

export function calculateStockPrice(marketCap: number | undefined, shares: number | undefined): number | undefined {
  if (!marketCap || shares === undefined || shares <= 0) return undefined;
  return marketCap / shares;
}

/**
 * Format a decimal ratio as a percent string, e.g. 0.125 → "12.50%".
 * Zero, like an absent value, produces no string.
 */
export function formatPercent(value: number | undefined): string | undefined {
  if (!value) return undefined;
  return `${(value * 100).toFixed(2)}%`;
}

export function timeframeOf(period: CanonicalPeriod): Timeframe {
  return period.fiscal_period === 'FY' ? 'annual' : 'quarterly';
}

export function computeMetrics(
  period: CanonicalPeriod,
  reference?: TickerReference,
  timeframe: Timeframe = timeframeOf(period)
): MetricsResult {
  const notes: string[] = [];

  // ROCE
  const operatingIncome = period.operating_income;
  const currentAssets = period.current_assets ?? 0;
  const currentLiabilities = period.current_liabilities ?? 0;
  const totalAssets = period.total_assets ?? 0;

  const workingCapital = currentAssets - currentLiabilities;
  const capitalEmployed = totalAssets - currentLiabilities;

  let roce: number | undefined;
  if (operatingIncome === undefined) {
    notes.push(NOTES.operatingIncomeMissing);
  } else if (capitalEmployed === 0) {
    notes.push(NOTES.capitalEmployedZero);
  } else {
    roce = calculateRoce(operatingIncome, capitalEmployed);
  }

  // Debt reconciliation
  const reportedTotal = period.short_long_term_debt_total;
  const shortTermDebt = period.short_term_debt;
  const currentLongTermDebt = period.current_long_term_debt;
  const longTermDebt = period.long_term_debt;
  let currentDebt = period.current_debt;
  let longTermDebtNoncurrent = period.long_term_debt_noncurrent;

  if (currentDebt === undefined && shortTermDebt !== undefined) {
    currentDebt = shortTermDebt;
    notes.push(NOTES.currentDebtFromShortTerm);
  }

  // A non-positive derived value is kept but not called out
  if (longTermDebtNoncurrent === undefined) {
    if (reportedTotal !== undefined && currentDebt !== undefined) {
      longTermDebtNoncurrent = reportedTotal - currentDebt;
      if (longTermDebtNoncurrent > 0) notes.push(NOTES.noncurrentFromTotal);
    } else if (longTermDebt !== undefined && currentLongTermDebt !== undefined) {
      longTermDebtNoncurrent = longTermDebt - currentLongTermDebt;
      if (longTermDebtNoncurrent > 0) notes.push(NOTES.noncurrentFromLongTerm);
    }
  }

  // Market data
  const marketCap = reference?.market_cap;
  const sharesOutstanding = reference?.weighted_shares_outstanding ?? reference?.share_class_shares_outstanding;
  const stockPrice = calculateStockPrice(marketCap, sharesOutstanding);

  // Enterprise value
  const cash = period.cash_and_equivalents;
  const totalDebt = calculateTotalDebt(currentDebt, longTermDebt, reportedTotal);
  const enterpriseValue = calculateEnterpriseValue(marketCap, totalDebt, cash);
  if (!cash) {
    notes.push(NOTES.cashMissing);
  }

  // Earnings yield
  const ebit = operatingIncome;
  const earningsYield = calculateEarningsYield(ebit, enterpriseValue);
  if (earningsYield === undefined) {
    if (!enterpriseValue) notes.push(NOTES.enterpriseValueMissing);
    else if (!ebit) notes.push(NOTES.ebitMissing);
  }

  return {
    ticker: period.ticker,
    date: period.end_date,
    period: timeframe,

    working_capital: workingCapital,
    capital_employed: capitalEmployed,
    roce,
    roce_percent: formatPercent(roce),

    ebit,
    enterprise_value: enterpriseValue,
    market_cap: marketCap,
    stock_price: stockPrice,
    shares_outstanding: sharesOutstanding,
    total_debt: totalDebt,
    cash_and_equivalents: cash,
    earnings_yield: earningsYield,
    earnings_yield_percent: formatPercent(earningsYield),

    total_assets: totalAssets,
    current_liabilities: currentLiabilities,

    short_long_term_debt_total: reportedTotal,
    current_debt: currentDebt,
    short_term_debt: shortTermDebt,
    current_long_term_debt: currentLongTermDebt,
    long_term_debt: longTermDebt,
    long_term_debt_noncurrent: longTermDebtNoncurrent,

    notes,
  };
}

/**
 * A canonical period with working capital and ROCE alongside it.
 * ROCE is only reported when the period has both operating income and total assets.
 */
export function summarizePeriod(period: CanonicalPeriod): PeriodSummary {
  const metrics = computeMetrics(period);
  const roce = period.operating_income && period.total_assets ? metrics.roce : undefined;
  return {
    ...period,
    working_capital: metrics.working_capital,
    roce,
    roce_percent: formatPercent(roce),
  };
}
