import type {
  FundamentalsProvider,
  FundamentalsRecord,
  FundamentalsResult,
  FundamentalsTable,
  MetricKey,
  StatementField,
  StatementPeriod
} from '../../types.ts';
import { EmptyResultError, InvalidTickerError, errorKindOf, errorMessageOf } from '../utils/retry.ts';
import { pctChange, round2, safeDivide, toMillions } from '../utils/financialUtils.ts';
import { CANONICAL_METRICS } from './metrics.ts';
import { renderFundamentalsHtml } from './table.ts';

/** Periods kept in the final table. */
export const RETAINED_PERIODS = 4;
/** Quarters back for a year-over-year comparison. */
const YOY_OFFSET = 4;

const TICKER_PATTERN = /^[A-Z0-9][A-Z0-9.\-]{0,9}$/;

export const normalizeTicker = (raw: string): string => {
  const ticker = raw.trim().toUpperCase();
  if (!ticker) throw new InvalidTickerError('Ticker symbol must not be empty');
  if (!TICKER_PATTERN.test(ticker)) throw new InvalidTickerError(`Invalid ticker symbol: ${raw}`);
  return ticker;
};

const value = (period: StatementPeriod | undefined, field: StatementField): number | null =>
  period?.values[field] ?? null;

const pct = (ratio: number | null) => (ratio == null ? null : ratio * 100);

/**
 * Turns raw provider periods into canonical records: derived ratios, QoQ/YoY
 * deltas, USD in millions, two decimals. Deltas are computed on the full
 * history before trimming to the retained periods, so YoY can reach back.
 */
export function buildFundamentals(ticker: string, periods: StatementPeriod[]): FundamentalsRecord[] {
  const seen = new Set<string>();
  const history = [...periods]
    .sort((a, b) => b.fiscalDateEnding.localeCompare(a.fiscalDateEnding))
    .filter(period => {
      if (seen.has(period.fiscalDateEnding)) return false;
      seen.add(period.fiscalDateEnding);
      return true;
    });

  return history.slice(0, RETAINED_PERIODS).map((period, i) => {
    const previous = history[i + 1];
    const yearAgo = history[i + YOY_OFFSET];
    const get = (field: StatementField) => value(period, field);

    const operatingCashFlow = get('operatingCashFlow');
    const capitalExpenditure = get('capitalExpenditure');
    const freeCashFlow = get('freeCashFlow') ??
      (operatingCashFlow != null && capitalExpenditure != null ? operatingCashFlow - capitalExpenditure : null);

    const equity = get('shareholderEquity');
    const totalAssets = get('totalAssets');
    const totalLiabilities = get('totalLiabilities');
    const currentAssets = get('totalCurrentAssets');
    const currentLiabilities = get('totalCurrentLiabilities');
    const inventory = get('inventory');

    const raw: Record<MetricKey, number | null> = {
      reportedEPS: get('reportedEPS'),
      estimatedEPS: get('estimatedEPS'),
      surprisePercentage: get('surprisePercentage'),
      epsChangeQoQ: pctChange(get('reportedEPS'), value(previous, 'reportedEPS')),
      epsChangeYoY: pctChange(get('reportedEPS'), value(yearAgo, 'reportedEPS')),
      revenue: toMillions(get('revenue')),
      revenueChangeQoQ: pctChange(get('revenue'), value(previous, 'revenue')),
      revenueChangeYoY: pctChange(get('revenue'), value(yearAgo, 'revenue')),
      netIncome: toMillions(get('netIncome')),
      netIncomeChangeQoQ: pctChange(get('netIncome'), value(previous, 'netIncome')),
      netIncomeChangeYoY: pctChange(get('netIncome'), value(yearAgo, 'netIncome')),
      bookValuePerShare: safeDivide(equity, get('sharesOutstanding')),
      returnOnEquity: pct(safeDivide(get('netIncome'), equity)),
      returnOnAssets: pct(safeDivide(get('netIncome'), totalAssets)),
      totalAssets: toMillions(totalAssets),
      totalLiabilities: toMillions(totalLiabilities),
      totalCurrentAssets: toMillions(currentAssets),
      totalCurrentLiabilities: toMillions(currentLiabilities),
      inventory: toMillions(inventory),
      shareholderEquity: toMillions(equity),
      sharesOutstanding: get('sharesOutstanding'),
      operatingCashFlow: toMillions(operatingCashFlow),
      capitalExpenditure: toMillions(capitalExpenditure),
      freeCashFlow: toMillions(freeCashFlow),
      debtToEquity: safeDivide(totalLiabilities, equity),
      currentRatio: safeDivide(currentAssets, currentLiabilities),
      quickRatio: safeDivide(
        currentAssets != null && inventory != null ? currentAssets - inventory : null,
        currentLiabilities
      ),
      leverageRatio: safeDivide(totalLiabilities, totalAssets)
    };

    const metrics = { ...raw };
    for (const { key } of CANONICAL_METRICS) {
      metrics[key] = round2(raw[key]);
    }

    return { ticker, fiscalDateEnding: period.fiscalDateEnding, metrics };
  });
}

export function toFundamentalsTable(ticker: string, records: FundamentalsRecord[]): FundamentalsTable {
  return {
    ticker,
    periods: records.map(record => record.fiscalDateEnding),
    rows: CANONICAL_METRICS.map(({ key, label, unit }) => ({
      metric: key,
      label,
      unit,
      values: records.map(record => record.metrics[key])
    }))
  };
}

/**
 * Fetches and normalizes quarterly fundamentals. Provider failures come back
 * as `{ ok: false }` with a classified error; only an invalid ticker throws.
 */
export async function gatherFundamentals(provider: FundamentalsProvider, rawTicker: string): Promise<FundamentalsResult> {
  const ticker = normalizeTicker(rawTicker);

  try {
    console.log(`[Fundamentals] Fetching ${ticker} from ${provider.name}...`);
    const periods = await provider.fetchFundamentals(ticker);
    if (periods.length === 0) {
      throw new EmptyResultError(`${provider.name} returned no statements for ${ticker}`);
    }

    const records = buildFundamentals(ticker, periods);
    const table = toFundamentalsTable(ticker, records);
    return { ok: true, ticker, provider: provider.name, records, table, html: renderFundamentalsHtml(table) };
  } catch (error) {
    const kind = errorKindOf(error);
    console.warn(`[Fundamentals] ${ticker} failed (${kind}): ${errorMessageOf(error)}`);
    return { ok: false, ticker, provider: provider.name, error: { kind, message: errorMessageOf(error) } };
  }
}
