import { z } from 'zod';
import type {
  FundamentalsProvider,
  NewsArticle,
  NewsProvider,
  NewsQuery,
  NewsSearchHit,
  SentimentAggregate,
  SentimentLabel,
  SentimentScope,
  StockSentiment
} from '../../types.ts';
import { LlmError, errorMessageOf, fetchWithRetry, type RetryOptions } from '../utils/retry.ts';
import type { HtmlFetcher } from '../utils/http.ts';
import { STRICT_JSON_SYSTEM_PROMPT, parseJSON, type LlmClient } from '../ai/llm.ts';
import { MAX_ARTICLE_CHARS, fetchArticleText } from './articleContent.ts';
import {
  SUMMARY_SYSTEM_PROMPT,
  buildAggregatePrompt,
  buildArticleScorePrompt,
  buildSummaryPrompt,
  type AggregateItem
} from './prompts.ts';

export interface CollatorOptions {
  lookbackDays: number;
  maxResults: number;
  summaryThresholdChars: number;
}

export interface SentimentCollatorDeps {
  newsProviders: NewsProvider[];
  llm: LlmClient;
  meta: Pick<FundamentalsProvider, 'fetchCompanyMeta'>;
  options: CollatorOptions;
  /** Fetches article pages when a provider returns no body. */
  fetchHtml?: HtmlFetcher;
  /** Retry policy for each LLM call (default: one retry). */
  retry?: RetryOptions;
  now?: () => Date;
}

export interface SentimentCollator {
  getStockSentiment(ticker: string): Promise<StockSentiment>;
}

export const UNKNOWN_SECTOR = 'Unknown';

/** Numbers and numeric strings only; null, booleans and blanks are invalid. */
const Score = z
  .preprocess(value => (typeof value === 'string' && value.trim() !== '' ? Number(value) : value), z.number().finite().min(-5).max(5))
  .transform(value => Math.round(value));

const ArticleScoreSchema = z.object({ score: Score });

const AggregateSchema = z.object({
  score: Score,
  statement: z.string().trim().min(1)
});

export function labelForScore(score: number): SentimentLabel {
  if (score <= -5) return 'Very Negative';
  if (score <= -3) return 'Negative';
  if (score <= -1) return 'Slightly Negative';
  if (score === 0) return 'Neutral';
  if (score <= 2) return 'Slightly Positive';
  if (score <= 4) return 'Positive';
  return 'Very Positive';
}

export const formatScore = (score: number) => (score > 0 ? `+${score}` : String(score));

/** Rendering used in the rating prompt and reports. */
export const formatSentiment = (aggregate: SentimentAggregate): string =>
  `Score: ${formatScore(aggregate.score)} (${aggregate.label})\n${aggregate.text}`;

export const neutralAggregate = (
  scope: SentimentScope,
  target: string,
  text: string,
  articleCount = 0
): SentimentAggregate => ({
  scope,
  target,
  score: 0,
  label: 'Neutral',
  text,
  articleCount,
  placeholder: true
});

export const createSentimentCollator = (deps: SentimentCollatorDeps): SentimentCollator => {
  const { newsProviders, llm, meta, options, fetchHtml } = deps;
  const now = deps.now ?? (() => new Date());
  const retry: RetryOptions = {
    maxRetries: 1,
    delayMs: 1000,
    label: 'Collator',
    shouldRetry: () => true,
    ...deps.retry
  };

  const askText = (system: string, prompt: string) =>
    fetchWithRetry(() => llm.generate({ system, prompt }), retry);

  const askJson = <T>(prompt: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>) =>
    fetchWithRetry(async () => {
      const raw = await llm.generate({ system: STRICT_JSON_SYSTEM_PROMPT, prompt, json: true });
      const parsed = schema.safeParse(parseJSON(raw));
      if (!parsed.success) {
        throw new LlmError('PARSE', `LLM reply failed validation: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
      }
      return parsed.data;
    }, retry);

  const search = async (scope: SentimentScope, query: NewsQuery): Promise<NewsSearchHit[]> => {
    const settled = await Promise.allSettled(
      newsProviders.map(provider =>
        scope === 'company' ? provider.searchCompany(query) : provider.searchSector(query)
      )
    );

    const hits: NewsSearchHit[] = [];
    settled.forEach((outcome, i) => {
      if (outcome.status === 'fulfilled') {
        hits.push(...outcome.value);
      } else {
        console.warn(`[Collator] ${newsProviders[i]?.name ?? 'news'} ${scope} search failed: ${errorMessageOf(outcome.reason)}`);
      }
    });
    return hits;
  };

  const toArticle = async (hit: NewsSearchHit, scope: SentimentScope, searchQuery: string): Promise<NewsArticle> => {
    const fetched = hit.content ?? (fetchHtml ? await fetchArticleText(fetchHtml, hit.url) : null);
    const content = (fetched ?? hit.snippet ?? hit.title).slice(0, MAX_ARTICLE_CHARS);
    return {
      title: hit.title,
      url: hit.url,
      publishedDate: hit.publishedDate,
      source: hit.source,
      scope,
      searchQuery,
      content,
      summary: null,
      sentimentLabel: null,
      sentimentScore: null,
      collectedAt: now().toISOString()
    };
  };

  const summarize = async (article: NewsArticle): Promise<string | null> => {
    if (article.content.length <= options.summaryThresholdChars) return null;
    try {
      return (await askText(SUMMARY_SYSTEM_PROMPT, buildSummaryPrompt(article.title, article.content))).trim();
    } catch (error) {
      console.warn(`[Collator] Summary failed for "${article.title}", scoring raw content: ${errorMessageOf(error)}`);
      return null;
    }
  };

  const scoreArticle = async (article: NewsArticle, target: string): Promise<NewsArticle> => {
    const summary = await summarize(article);
    const text = summary ?? article.content;
    try {
      const { score } = await askJson(buildArticleScorePrompt(article.scope, target, article.title, text), ArticleScoreSchema);
      return { ...article, summary, sentimentScore: score, sentimentLabel: labelForScore(score) };
    } catch (error) {
      console.warn(`[Collator] Could not score "${article.title}": ${errorMessageOf(error)}`);
      return { ...article, summary };
    }
  };

  const aggregate = async (scope: SentimentScope, target: string, articles: NewsArticle[]): Promise<SentimentAggregate> => {
    if (articles.length === 0) {
      return neutralAggregate(scope, target, `No recent news found for ${target}.`);
    }

    const items: AggregateItem[] = articles.map(article => ({
      title: article.title,
      text: article.summary ?? article.content,
      score: article.sentimentScore
    }));

    try {
      const { score, statement } = await askJson(buildAggregatePrompt(scope, target, items), AggregateSchema);
      return {
        scope,
        target,
        score,
        label: labelForScore(score),
        text: statement,
        articleCount: articles.length,
        placeholder: false
      };
    } catch (error) {
      console.warn(`[Collator] ${scope} sentiment for ${target} fell back to neutral: ${errorMessageOf(error)}`);
      return neutralAggregate(scope, target, `Sentiment unavailable for ${target}; treated as neutral.`, articles.length);
    }
  };

  const collect = async (ticker: string): Promise<StockSentiment> => {
    let companyName = ticker;
    let sector: string | null = null;
    try {
      const company = await meta.fetchCompanyMeta(ticker);
      companyName = company.name ?? ticker;
      sector = company.sector;
    } catch (error) {
      console.warn(`[Collator] No company profile for ${ticker}, using the ticker as name: ${errorMessageOf(error)}`);
    }

    const base = { ticker, lookbackDays: options.lookbackDays, maxResults: options.maxResults };
    const companyQuery: NewsQuery = { ...base, text: `${companyName} (${ticker}) stock news` };
    const sectorQuery: NewsQuery | null = sector ? { ...base, text: `${sector} sector stock market news` } : null;

    const companyHits = await search('company', companyQuery);
    const sectorHits = sectorQuery ? await search('sector', sectorQuery) : [];

    // One article per URL per run; company results win.
    const seen = new Set<string>();
    const unique = (hits: NewsSearchHit[]) =>
      hits
        .filter(hit => {
          if (seen.has(hit.url)) return false;
          seen.add(hit.url);
          return true;
        })
        .slice(0, options.maxResults);

    const companyArticles: NewsArticle[] = [];
    for (const hit of unique(companyHits)) {
      companyArticles.push(await scoreArticle(await toArticle(hit, 'company', companyQuery.text), companyName));
    }
    const sectorArticles: NewsArticle[] = [];
    if (sectorQuery && sector) {
      for (const hit of unique(sectorHits)) {
        sectorArticles.push(await scoreArticle(await toArticle(hit, 'sector', sectorQuery.text), sector));
      }
    }

    console.log(`[Collator] ${ticker}: ${companyArticles.length} company and ${sectorArticles.length} sector articles`);

    const companySentiment = await aggregate('company', companyName, companyArticles);
    const sectorSentiment = sector
      ? await aggregate('sector', sector, sectorArticles)
      : neutralAggregate('sector', UNKNOWN_SECTOR, 'Sector unknown; no sector news searched.');

    return {
      ticker,
      companyName,
      sector,
      companySentiment,
      sectorSentiment,
      articles: [...companyArticles, ...sectorArticles]
    };
  };

  return {
    async getStockSentiment(ticker: string): Promise<StockSentiment> {
      try {
        return await collect(ticker);
      } catch (error) {
        console.warn(`[Collator] Sentiment collection failed for ${ticker}, using neutral: ${errorMessageOf(error)}`);
        return {
          ticker,
          companyName: ticker,
          sector: null,
          companySentiment: neutralAggregate('company', ticker, `Sentiment unavailable for ${ticker}; treated as neutral.`),
          sectorSentiment: neutralAggregate('sector', UNKNOWN_SECTOR, 'Sector unknown; no sector news searched.'),
          articles: []
        };
      }
    }
  };
};
