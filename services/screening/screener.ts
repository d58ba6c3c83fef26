import { writeFile } from 'node:fs/promises';
import type { ScreenRequest, ScreenResult, ScreenSummary, ScreenerNumericField, ScreenerRow } from '../../types.ts';
import type { HtmlFetcher } from '../utils/http.ts';
import { delay, errorMessageOf } from '../utils/retry.ts';
import { round2 } from '../utils/financialUtils.ts';
import { ROWS_PER_PAGE, scrapeScreenerPage, type ScreenerPage } from './finviz.ts';

/** Hard cap on pages per screen. */
export const MAX_PAGES = 50;

export interface ScreenOptions {
  maxRows?: number;
  maxPages?: number;
  pageDelayMs?: number;
  now?: () => Date;
}

/**
 * Pages through the screener until `maxRows` rows are collected, a short or
 * empty page arrives, or the page cap is hit. A failure on the first page
 * throws; a failure later keeps the rows collected so far.
 */
export async function runScreen(
  fetchHtml: HtmlFetcher,
  request: ScreenRequest,
  options: ScreenOptions = {}
): Promise<ScreenResult> {
  const { maxRows = Infinity, pageDelayMs = 1000 } = options;
  const maxPages = Math.min(options.maxPages ?? MAX_PAGES, MAX_PAGES);
  const now = options.now ?? (() => new Date());

  console.log(`[Screener] Running "${request.name}" (${request.view}) with filters: ${request.filters.join(',') || '(none)'}`);

  const rows: ScreenerRow[] = [];
  const seen = new Set<string>();
  let totalResults: number | null = null;
  let pagesFetched = 0;

  for (let page = 1; page <= maxPages; page++) {
    let result: ScreenerPage;
    try {
      result = await scrapeScreenerPage(fetchHtml, request, page);
    } catch (error) {
      if (page === 1) throw error;
      console.warn(`[Screener] Page ${page} failed, keeping ${rows.length} rows: ${errorMessageOf(error)}`);
      break;
    }
    pagesFetched++;
    if (page === 1) totalResults = result.totalResults;

    if (result.rows.length === 0) {
      console.log(`[Screener] No more data at page ${page}`);
      break;
    }

    for (const row of result.rows) {
      if (seen.has(row.ticker)) continue;
      seen.add(row.ticker);
      rows.push(row);
    }
    console.log(`[Screener] Page ${page}: ${result.rows.length} stocks`);

    if (rows.length >= maxRows || result.rows.length < ROWS_PER_PAGE) break;
    if (page < maxPages && pageDelayMs > 0) await delay(pageDelayMs);
  }

  return {
    request,
    rows: Number.isFinite(maxRows) ? rows.slice(0, maxRows) : rows,
    totalResults,
    pagesFetched,
    scrapedAt: now().toISOString()
  };
}

export interface TopNOptions {
  sortBy?: ScreenerNumericField;
  direction?: 'asc' | 'desc';
}

/**
 * First `n` rows, optionally ranked by a numeric column. Rows missing that
 * column sort last either way.
 */
export function topN(result: ScreenResult, n: number, options: TopNOptions = {}): ScreenerRow[] {
  const { sortBy, direction = 'desc' } = options;
  if (!sortBy) return result.rows.slice(0, n);

  const sign = direction === 'desc' ? -1 : 1;
  return [...result.rows]
    .sort((a, b) => {
      const x = a[sortBy];
      const y = b[sortBy];
      if (x == null && y == null) return 0;
      if (x == null) return 1;
      if (y == null) return -1;
      return sign * (x - y);
    })
    .slice(0, n);
}

export function summarizeScreen(result: ScreenResult): ScreenSummary {
  const { rows } = result;

  const peValues = rows.map(row => row.pe).filter((pe): pe is number => pe != null);
  const averagePe = peValues.length > 0 ? round2(peValues.reduce((sum, pe) => sum + pe, 0) / peValues.length) : null;

  const sectors: Record<string, number> = {};
  for (const row of rows) {
    if (row.sector) sectors[row.sector] = (sectors[row.sector] ?? 0) + 1;
  }

  return {
    totalStocks: rows.length,
    sampleTickers: rows.slice(0, 10).map(row => row.ticker),
    averagePe,
    sectors,
    topPerformers: topN(result, 5, { sortBy: 'change' })
      .filter(row => row.change != null)
      .map(row => row.ticker)
  };
}

export const findRow = (result: ScreenResult, ticker: string): ScreenerRow | null =>
  result.rows.find(row => row.ticker === ticker.trim().toUpperCase()) ?? null;

const csvCell = (value: string) => (/[",\n\r]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value);

/** CSV of the raw screener columns, in the order the screener showed them. */
export function toCsv(rows: ScreenerRow[]): string {
  const columns: string[] = [];
  for (const row of rows) {
    for (const column of Object.keys(row.raw)) {
      if (!columns.includes(column)) columns.push(column);
    }
  }
  const lines = [columns.map(csvCell).join(',')];
  for (const row of rows) {
    lines.push(columns.map(column => csvCell(row.raw[column] ?? '')).join(','));
  }
  return `${lines.join('\n')}\n`;
}

export type ScreenExportFormat = 'csv' | 'json';

export const exportFormatFor = (filePath: string): ScreenExportFormat =>
  filePath.toLowerCase().endsWith('.json') ? 'json' : 'csv';

export async function exportScreen(
  result: ScreenResult,
  filePath: string,
  format: ScreenExportFormat = exportFormatFor(filePath)
): Promise<string> {
  if (result.rows.length === 0) {
    throw new Error('No screening results to export');
  }
  const body = format === 'json' ? `${JSON.stringify(result, null, 2)}\n` : toCsv(result.rows);
  await writeFile(filePath, body, 'utf-8');
  console.log(`[Screener] Exported ${result.rows.length} rows to ${filePath}`);
  return filePath;
}
