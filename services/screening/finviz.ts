import * as cheerio from 'cheerio';
import type { ScreenRequest, ScreenerNumericField, ScreenerRow } from '../../types.ts';
import type { HtmlFetcher } from '../utils/http.ts';
import { parseAbbreviatedMillions, toNumber } from '../utils/financialUtils.ts';
import { SCREEN_VIEW_CODES } from './strategies.ts';

export const FINVIZ_SCREENER_URL = 'https://finviz.com/screener.ashx';
export const ROWS_PER_PAGE = 20;

const TICKER_OK = /^[A-Z][A-Z0-9.-]*$/;

export interface ScreenerPage {
  rows: ScreenerRow[];
  totalResults: number | null;
}

const normalizeHeader = (header: string) => header.toLowerCase().replace(/\s+/g, ' ').trim();

/** Header names (normalized) per numeric field, first match wins. */
const NUMERIC_COLUMNS: Record<Exclude<ScreenerNumericField, 'marketCap'>, string[]> = {
  pe: ['p/e'],
  forwardPe: ['fwd p/e'],
  peg: ['peg'],
  pb: ['p/b'],
  ps: ['p/s'],
  dividendYield: ['dividend', 'dividend %', 'div yield'],
  price: ['price'],
  change: ['change', 'change %'],
  volume: ['volume']
};

const pick = (cells: Map<string, string>, names: string[]): string | null => {
  for (const name of names) {
    const value = cells.get(name);
    if (value !== undefined && value !== '' && value !== '-') return value;
  }
  return null;
};

/**
 * Builds a uniform row from one screener table row keyed by its header text.
 * Columns the current view does not show come out as null.
 */
export function toScreenerRow(ticker: string, raw: Record<string, string>): ScreenerRow {
  const cells = new Map(Object.entries(raw).map(([header, value]) => [normalizeHeader(header), value]));
  const numeric = (field: keyof typeof NUMERIC_COLUMNS) => toNumber(pick(cells, NUMERIC_COLUMNS[field]));

  return {
    ticker,
    company: pick(cells, ['company']),
    sector: pick(cells, ['sector']),
    industry: pick(cells, ['industry']),
    country: pick(cells, ['country']),
    marketCap: parseAbbreviatedMillions(pick(cells, ['market cap'])),
    pe: numeric('pe'),
    forwardPe: numeric('forwardPe'),
    peg: numeric('peg'),
    pb: numeric('pb'),
    ps: numeric('ps'),
    dividendYield: numeric('dividendYield'),
    price: numeric('price'),
    change: numeric('change'),
    volume: numeric('volume'),
    raw
  };
}

/**
 * Index of the screener results table: the `screener_table` class when
 * present, otherwise the table with quote links and the most rows.
 */
const findTableIndex = ($: cheerio.CheerioAPI): number => {
  const tables = $('table');
  let best = -1;
  let bestScore = 0;

  tables.each((i, el) => {
    const table = $(el);
    if (table.hasClass('screener_table')) {
      best = i;
      return false;
    }
    const headerText = table.find('tr').first().text().toLowerCase();
    const hasTicker = headerText.includes('ticker') || table.find('a[href*="quote.ashx"]').length > 0;
    const score = (hasTicker ? 1000 : 0) + table.find('tr').length;
    if (hasTicker && score > bestScore) {
      best = i;
      bestScore = score;
    }
    return undefined;
  });
  return best;
};

const parseTotal = (text: string): number | null => {
  const match = text.match(/Total:\s*([\d,]+)/) ?? text.match(/\/\s*([\d,]+)\s*Total/);
  return match?.[1] ? toNumber(match[1]) : null;
};

export function parseScreenerPage(html: string): ScreenerPage {
  const $ = cheerio.load(html);
  const totalResults = parseTotal($('body').text());

  const index = findTableIndex($);
  if (index === -1) return { rows: [], totalResults };

  const table = $('table').eq(index);
  const rowsSelection = table.find('tr');
  const headers = rowsSelection
    .first()
    .find('th, td')
    .map((_, cell) => $(cell).text().trim())
    .get();
  const tickerColumn = headers.findIndex(header => normalizeHeader(header) === 'ticker');

  const seen = new Set<string>();
  const rows: ScreenerRow[] = [];

  rowsSelection.slice(1).each((_, tr) => {
    const cells = $(tr).find('td');
    if (cells.length !== headers.length) return;

    const values = cells.map((_, td) => $(td).text().trim()).get();
    const link = $(tr).find('a[href*="quote.ashx?t="]').first();
    let ticker = link.length ? link.text().trim() : '';
    if (!TICKER_OK.test(ticker) && tickerColumn >= 0) ticker = values[tickerColumn] ?? '';
    if (!TICKER_OK.test(ticker) || seen.has(ticker)) return;
    seen.add(ticker);

    const raw: Record<string, string> = {};
    headers.forEach((header, i) => {
      raw[header] = values[i] ?? '';
    });
    rows.push(toScreenerRow(ticker, raw));
  });

  return { rows, totalResults };
}

export const pageParams = (request: ScreenRequest, page: number): Record<string, string> => ({
  v: SCREEN_VIEW_CODES[request.view],
  ...(request.filters.length > 0 ? { f: request.filters.join(',') } : {}),
  r: String((page - 1) * ROWS_PER_PAGE + 1)
});

export async function scrapeScreenerPage(fetchHtml: HtmlFetcher, request: ScreenRequest, page: number): Promise<ScreenerPage> {
  const html = await fetchHtml(FINVIZ_SCREENER_URL, pageParams(request, page));
  return parseScreenerPage(html);
}
