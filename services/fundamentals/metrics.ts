import type { MetricKey, MetricUnit } from '../../types.ts';

export interface MetricDefinition {
  key: MetricKey;
  label: string;
  unit: MetricUnit;
}

/** Canonical metrics in table order. */
export const CANONICAL_METRICS: readonly MetricDefinition[] = [
  { key: 'reportedEPS', label: 'Reported EPS', unit: 'USD/share' },
  { key: 'estimatedEPS', label: 'Estimated EPS', unit: 'USD/share' },
  { key: 'surprisePercentage', label: 'EPS Surprise', unit: '%' },
  { key: 'epsChangeQoQ', label: 'EPS Change QoQ', unit: '%' },
  { key: 'epsChangeYoY', label: 'EPS Change YoY', unit: '%' },
  { key: 'revenue', label: 'Revenue', unit: 'USD (M)' },
  { key: 'revenueChangeQoQ', label: 'Revenue Change QoQ', unit: '%' },
  { key: 'revenueChangeYoY', label: 'Revenue Change YoY', unit: '%' },
  { key: 'netIncome', label: 'Net Income', unit: 'USD (M)' },
  { key: 'netIncomeChangeQoQ', label: 'Net Income Change QoQ', unit: '%' },
  { key: 'netIncomeChangeYoY', label: 'Net Income Change YoY', unit: '%' },
  { key: 'bookValuePerShare', label: 'Book Value per Share', unit: 'USD/share' },
  { key: 'returnOnEquity', label: 'Return on Equity', unit: '%' },
  { key: 'returnOnAssets', label: 'Return on Assets', unit: '%' },
  { key: 'totalAssets', label: 'Total Assets', unit: 'USD (M)' },
  { key: 'totalLiabilities', label: 'Total Liabilities', unit: 'USD (M)' },
  { key: 'totalCurrentAssets', label: 'Total Current Assets', unit: 'USD (M)' },
  { key: 'totalCurrentLiabilities', label: 'Total Current Liabilities', unit: 'USD (M)' },
  { key: 'inventory', label: 'Inventory', unit: 'USD (M)' },
  { key: 'shareholderEquity', label: 'Shareholder Equity', unit: 'USD (M)' },
  { key: 'sharesOutstanding', label: 'Shares Outstanding', unit: 'shares' },
  { key: 'operatingCashFlow', label: 'Operating Cash Flow', unit: 'USD (M)' },
  { key: 'capitalExpenditure', label: 'Capital Expenditure', unit: 'USD (M)' },
  { key: 'freeCashFlow', label: 'Free Cash Flow', unit: 'USD (M)' },
  { key: 'debtToEquity', label: 'Debt to Equity', unit: 'x' },
  { key: 'currentRatio', label: 'Current Ratio', unit: 'x' },
  { key: 'quickRatio', label: 'Quick Ratio', unit: 'x' },
  { key: 'leverageRatio', label: 'Leverage Ratio', unit: 'x' }
];
