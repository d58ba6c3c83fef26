import type {
  AnalysisResult,
  BatchSummary,
  FundamentalsProvider,
  FundamentalsResult,
  RatingOutcome,
  StageError,
  StockSentiment
} from '../types.ts';
import { gatherFundamentals } from './fundamentals/gatherer.ts';
import { formatSentiment, type SentimentCollator } from './sentiment/collator.ts';
import type { StockRater } from './rating/rater.ts';
import { errorKindOf, errorMessageOf } from './utils/retry.ts';
import { pLimit } from './utils/pLimit.ts';

export interface PipelineDeps {
  fundamentals: FundamentalsProvider;
  collator: SentimentCollator;
  rater: StockRater;
  now?: () => Date;
}

type GatheredFundamentals = Extract<FundamentalsResult, { ok: true }>;

/** State handed from stage to stage; a set `error` stops the run. */
interface AnalysisContext {
  ticker: string;
  fundamentals: GatheredFundamentals | null;
  sentiment: StockSentiment | null;
  rating: RatingOutcome | null;
  error: StageError | null;
}

type Stage = (ctx: AnalysisContext, deps: PipelineDeps) => Promise<AnalysisContext>;

const fundamentalsStage: Stage = async (ctx, deps) => {
  const result = await gatherFundamentals(deps.fundamentals, ctx.ticker);
  if (!result.ok) return { ...ctx, ticker: result.ticker, error: result.error };
  return { ...ctx, ticker: result.ticker, fundamentals: result };
};

const sentimentStage: Stage = async (ctx, deps) => ({
  ...ctx,
  sentiment: await deps.collator.getStockSentiment(ctx.ticker)
});

const ratingStage: Stage = async (ctx, deps) => {
  if (!ctx.fundamentals || !ctx.sentiment) return ctx;
  const rating = await deps.rater.rateStock({
    financialDataHtml: ctx.fundamentals.html,
    companySentiment: formatSentiment(ctx.sentiment.companySentiment),
    sectorSentiment: formatSentiment(ctx.sentiment.sectorSentiment),
    companyName: ctx.sentiment.companyName
  });
  return { ...ctx, rating };
};

const STAGES: [string, Stage][] = [
  ['fundamentals', fundamentalsStage],
  ['sentiment', sentimentStage],
  ['rating', ratingStage]
];

/**
 * Fundamentals, then sentiment, then rating, strictly in order. A failed
 * fundamentals stage ends the run with `success: false`; sentiment and rating
 * always produce a value.
 */
export async function analyzeStock(rawTicker: string, deps: PipelineDeps): Promise<AnalysisResult> {
  const now = deps.now ?? (() => new Date());
  const started = now();

  let ctx: AnalysisContext = {
    ticker: rawTicker.trim().toUpperCase(),
    fundamentals: null,
    sentiment: null,
    rating: null,
    error: null
  };

  console.log(`[Pipeline] Analyzing ${ctx.ticker || '(empty ticker)'}...`);
  for (const [name, stage] of STAGES) {
    try {
      ctx = await stage(ctx, deps);
    } catch (error) {
      ctx = { ...ctx, error: { kind: errorKindOf(error), message: errorMessageOf(error) } };
    }
    if (ctx.error) {
      console.error(`[Pipeline] ${ctx.ticker || '(empty ticker)'} failed at ${name}: ${ctx.error.kind}: ${ctx.error.message}`);
      break;
    }
  }

  const success = ctx.error == null && ctx.rating != null;
  return {
    ticker: ctx.ticker,
    analysisDate: started.toISOString(),
    success,
    companyName: ctx.sentiment?.companyName ?? null,
    fundamentals: ctx.fundamentals?.table ?? null,
    financialDataHtml: ctx.fundamentals?.html ?? '',
    sentiment: ctx.sentiment,
    rating: ctx.rating,
    error: ctx.error,
    processingTimeMs: Math.max(0, now().getTime() - started.getTime())
  };
}

export interface BatchOptions {
  concurrency?: number;
}

/**
 * Analyzes every ticker independently; results keep the input order.
 */
export async function analyzeBatch(
  tickers: string[],
  deps: PipelineDeps,
  options: BatchOptions = {}
): Promise<AnalysisResult[]> {
  const limit = pLimit(options.concurrency ?? 1);
  let done = 0;

  return Promise.all(
    tickers.map(ticker =>
      limit(async () => {
        const result = await analyzeStock(ticker, deps);
        done++;
        console.log(`[Pipeline] (${done}/${tickers.length}) ${result.ticker}: ${result.success ? 'ok' : 'failed'}`);
        return result;
      })
    )
  );
}

export function summarizeBatch(results: AnalysisResult[]): BatchSummary {
  const summary: BatchSummary = { total: results.length, succeeded: 0, failed: 0, ratings: {} };
  for (const result of results) {
    if (!result.success) {
      summary.failed++;
      continue;
    }
    summary.succeeded++;
    if (result.rating) {
      const rating = result.rating.result.rating;
      summary.ratings[rating] = (summary.ratings[rating] ?? 0) + 1;
    }
  }
  return summary;
}
