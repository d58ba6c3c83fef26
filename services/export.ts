import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { AnalysisResult } from '../types.ts';
import { renderFundamentalsText } from './fundamentals/table.ts';
import { formatSentiment } from './sentiment/collator.ts';
import { formatRatingSummary } from './rating/rater.ts';

export type ReportFormat = 'text' | 'json';

const pad = (n: number) => String(n).padStart(2, '0');

/** Local-time stamp, e.g. 20240506_090307. */
export const timestamp = (date: Date) =>
  `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
  `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;

/** Failed results keep the raw input ticker, so anything path-like is flattened. */
const safeFileStem = (ticker: string) => ticker.replace(/[^A-Za-z0-9.\-]/g, '_') || 'UNKNOWN';

export const defaultExportName = (ticker: string, format: ReportFormat, date: Date = new Date()) =>
  `${safeFileStem(ticker)}_${timestamp(date)}.${format === 'json' ? 'json' : 'txt'}`;

const seconds = (ms: number) => (ms / 1000).toFixed(2);

/** Human-readable report; failed analyses report their terminal error. */
export function formatAnalysisReport(result: AnalysisResult): string {
  if (!result.success || !result.rating) {
    const error = result.error ? `${result.error.kind}: ${result.error.message}` : 'Unknown error';
    return [
      'STOCK ANALYSIS FAILED',
      '=====================',
      '',
      `Stock: ${result.ticker}`,
      `Analysis Date: ${result.analysisDate}`,
      `Error: ${error}`,
      `Processing Time: ${seconds(result.processingTimeMs)} seconds`,
      ''
    ].join('\n');
  }

  const lines = [
    'COMPLETE STOCK ANALYSIS',
    '=======================',
    '',
    `Stock Symbol: ${result.ticker}`,
    `Company: ${result.companyName ?? result.ticker}`,
    `Analysis Date: ${result.analysisDate}`,
    `Processing Time: ${seconds(result.processingTimeMs)} seconds`,
    '',
    formatRatingSummary(result.rating.result)
  ];

  if (result.rating.status === 'fallback') {
    lines.push('', `NOTE: fallback rating (${result.rating.reason})`);
  }

  if (result.sentiment) {
    lines.push(
      '',
      'SENTIMENT ANALYSIS',
      '==================',
      '',
      'Company Sentiment:',
      formatSentiment(result.sentiment.companySentiment),
      '',
      `Sector Sentiment (${result.sentiment.sectorSentiment.target}):`,
      formatSentiment(result.sentiment.sectorSentiment)
    );
  }

  if (result.fundamentals) {
    lines.push('', 'FINANCIAL DATA', '==============', renderFundamentalsText(result.fundamentals));
  }

  return `${lines.join('\n')}\n`;
}

/** JSON export shape: the rating fields flattened, the rest as collected. */
export function toExportJson(result: AnalysisResult) {
  const rating = result.rating?.result ?? null;
  return {
    ticker: result.ticker,
    companyName: result.companyName,
    analysisDate: result.analysisDate,
    success: result.success,
    rating: rating?.rating ?? null,
    confidence: rating?.confidence ?? null,
    reasoning: rating?.reasoning ?? null,
    keyFactors: rating?.keyFactors ?? [],
    riskFactors: rating?.riskFactors ?? [],
    recommendationSummary: rating?.recommendationSummary ?? null,
    ratingStatus: result.rating?.status ?? null,
    fallbackReason: result.rating?.status === 'fallback' ? result.rating.reason : null,
    companySentiment: result.sentiment?.companySentiment ?? null,
    sectorSentiment: result.sentiment?.sectorSentiment ?? null,
    fundamentals: result.fundamentals,
    error: result.error,
    processingTimeMs: result.processingTimeMs
  };
}

export interface ExportOptions {
  format?: ReportFormat;
  /** Exact output path; wins over `dir`. */
  filePath?: string;
  dir?: string;
  now?: Date;
}

/** Writes one analysis to disk and returns the path written. */
export async function exportAnalysis(result: AnalysisResult, options: ExportOptions = {}): Promise<string> {
  const format = options.format ?? 'text';
  const filePath = options.filePath ?? path.join(options.dir ?? '.', defaultExportName(result.ticker, format, options.now));

  await mkdir(path.dirname(filePath), { recursive: true });
  const body = format === 'json' ? `${JSON.stringify(toExportJson(result), null, 2)}\n` : formatAnalysisReport(result);
  await writeFile(filePath, body, 'utf-8');
  return filePath;
}
