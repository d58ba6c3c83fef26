// ============ ERRORS ============

export type ErrorKind =
  | 'ProviderAuthError'
  | 'ProviderRateLimitError'
  | 'ProviderNotFoundError'
  | 'ProviderTransientError'
  | 'LLMParseError'
  | 'LLMTimeoutError'
  | 'EmptyResultError'
  | 'InvalidTickerError';

export interface StageError {
  kind: ErrorKind;
  message: string;
}

// ============ FUNDAMENTALS ============

/** Fields a provider reports directly, in raw currency units. */
export type StatementField =
  | 'reportedEPS'
  | 'estimatedEPS'
  | 'surprisePercentage'
  | 'revenue'
  | 'netIncome'
  | 'operatingCashFlow'
  | 'capitalExpenditure'
  | 'freeCashFlow'
  | 'totalAssets'
  | 'totalLiabilities'
  | 'totalCurrentAssets'
  | 'totalCurrentLiabilities'
  | 'inventory'
  | 'shareholderEquity'
  | 'sharesOutstanding';

/** Fields computed from the statement fields. */
export type DerivedField =
  | 'epsChangeQoQ'
  | 'epsChangeYoY'
  | 'netIncomeChangeQoQ'
  | 'netIncomeChangeYoY'
  | 'revenueChangeQoQ'
  | 'revenueChangeYoY'
  | 'bookValuePerShare'
  | 'returnOnEquity'
  | 'returnOnAssets'
  | 'debtToEquity'
  | 'currentRatio'
  | 'quickRatio'
  | 'leverageRatio';

export type MetricKey = StatementField | DerivedField;

export type MetricUnit = 'USD (M)' | 'USD/share' | '%' | 'x' | 'shares';

export interface StatementPeriod {
  fiscalDateEnding: string; // YYYY-MM-DD
  values: Partial<Record<StatementField, number | null>>;
}

export interface FundamentalsRecord {
  ticker: string;
  fiscalDateEnding: string;
  metrics: Record<MetricKey, number | null>;
}

export interface FundamentalsRow {
  metric: MetricKey;
  label: string;
  unit: MetricUnit;
  values: (number | null)[]; // aligned with FundamentalsTable.periods
}

export interface FundamentalsTable {
  ticker: string;
  periods: string[]; // most recent first
  rows: FundamentalsRow[];
}

export type FundamentalsResult =
  | {
      ok: true;
      ticker: string;
      provider: string;
      records: FundamentalsRecord[];
      table: FundamentalsTable;
      html: string;
    }
  | {
      ok: false;
      ticker: string;
      provider: string;
      error: StageError;
    };

export interface CompanyMeta {
  symbol: string;
  name: string | null;
  sector: string | null;
  industry: string | null;
  exchange: string | null;
  currency: string | null;
  marketCap: number | null;
}

export interface FundamentalsProvider {
  readonly name: string;
  fetchFundamentals(ticker: string): Promise<StatementPeriod[]>;
  fetchCompanyMeta(ticker: string): Promise<CompanyMeta>;
}

// ============ NEWS & SENTIMENT ============

export type SentimentScope = 'company' | 'sector';

export type SentimentLabel =
  | 'Very Negative'
  | 'Negative'
  | 'Slightly Negative'
  | 'Neutral'
  | 'Slightly Positive'
  | 'Positive'
  | 'Very Positive';

export interface NewsQuery {
  ticker: string;
  text: string;
  lookbackDays: number;
  maxResults: number;
}

export interface NewsSearchHit {
  title: string;
  url: string;
  publishedDate: string | null;
  source: string;
  content: string | null; // full body when the provider returns one
  snippet: string | null;
}

export interface NewsProvider {
  readonly name: string;
  searchCompany(query: NewsQuery): Promise<NewsSearchHit[]>;
  searchSector(query: NewsQuery): Promise<NewsSearchHit[]>;
}

export interface NewsArticle {
  title: string;
  url: string;
  publishedDate: string | null;
  source: string;
  scope: SentimentScope;
  searchQuery: string;
  content: string;
  summary: string | null;
  sentimentLabel: SentimentLabel | null;
  sentimentScore: number | null; // -5..+5
  collectedAt: string;
}

export interface SentimentAggregate {
  scope: SentimentScope;
  target: string;
  score: number; // -5..+5
  label: SentimentLabel;
  text: string;
  articleCount: number;
  placeholder: boolean; // true when no usable news or the LLM failed
}

export interface StockSentiment {
  ticker: string;
  companyName: string;
  sector: string | null;
  companySentiment: SentimentAggregate;
  sectorSentiment: SentimentAggregate;
  articles: NewsArticle[];
}

// ============ RATING ============

export const RATINGS = ['Strong Buy', 'Buy', 'Hold', 'Sell', 'Strong Sell'] as const;

export type Rating = (typeof RATINGS)[number];

export interface RatingResult {
  rating: Rating;
  confidence: number; // 0..1
  reasoning: string;
  keyFactors: string[];
  riskFactors: string[];
  recommendationSummary: string;
}

export type RatingOutcome =
  | { status: 'ok'; result: RatingResult }
  | { status: 'fallback'; result: RatingResult; reason: string };

export interface RatingInput {
  financialDataHtml: string;
  companySentiment: string;
  sectorSentiment: string;
  companyName: string;
}

// ============ ANALYSIS ============

export interface AnalysisResult {
  ticker: string;
  analysisDate: string; // ISO
  success: boolean;
  companyName: string | null;
  fundamentals: FundamentalsTable | null;
  financialDataHtml: string;
  sentiment: StockSentiment | null;
  rating: RatingOutcome | null;
  error: StageError | null;
  processingTimeMs: number;
}

export interface BatchSummary {
  total: number;
  succeeded: number;
  failed: number;
  ratings: Partial<Record<Rating, number>>;
}

// ============ SCREENING ============

export type ScreenView = 'Overview' | 'Valuation' | 'Financial' | 'Ownership' | 'Performance' | 'Technical';

export interface ScreenRequest {
  name: string;
  filters: string[];
  view: ScreenView;
}

export interface ScreenerRow {
  ticker: string;
  company: string | null;
  sector: string | null;
  industry: string | null;
  country: string | null;
  marketCap: number | null; // USD millions
  pe: number | null;
  forwardPe: number | null;
  peg: number | null;
  pb: number | null;
  ps: number | null;
  dividendYield: number | null; // %
  price: number | null;
  change: number | null; // %
  volume: number | null;
  raw: Record<string, string>;
}

export type ScreenerNumericField =
  | 'marketCap'
  | 'pe'
  | 'forwardPe'
  | 'peg'
  | 'pb'
  | 'ps'
  | 'dividendYield'
  | 'price'
  | 'change'
  | 'volume';

export interface ScreenResult {
  request: ScreenRequest;
  rows: ScreenerRow[];
  totalResults: number | null;
  pagesFetched: number;
  scrapedAt: string;
}

export interface ScreenSummary {
  totalStocks: number;
  sampleTickers: string[];
  averagePe: number | null;
  sectors: Record<string, number>;
  topPerformers: string[];
}
