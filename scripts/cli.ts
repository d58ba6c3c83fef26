import 'dotenv/config';
import { pathToFileURL } from 'node:url';
import Table from 'cli-table3';
import type { AnalysisResult, ScreenRequest, ScreenResult } from '../types.ts';
import { ConfigError, loadConfig, type AppConfig } from '../config/env.ts';
import { EXAMPLE_TICKERS } from '../data/tickers.ts';
import { createServices, type Services } from '../services/factory.ts';
import { analyzeBatch, summarizeBatch } from '../services/pipeline.ts';
import { gatherFundamentals } from '../services/fundamentals/gatherer.ts';
import { renderFundamentalsText } from '../services/fundamentals/table.ts';
import { exportAnalysis, formatAnalysisReport, toExportJson, type ReportFormat } from '../services/export.ts';
import { runScreen, summarizeScreen, topN, exportScreen } from '../services/screening/screener.ts';
import {
  SCREEN_VIEWS,
  STRATEGY_NAMES,
  customRequest,
  describeStrategy,
  isStrategyName,
  parseView,
  strategyRequest
} from '../services/screening/strategies.ts';
import { errorMessageOf } from '../services/utils/retry.ts';

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_USAGE = 2;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const USAGE = `
Usage: npm run cli -- <command> [options]

Commands:
  analyze <TICKER...>   Rate one or more stocks
      --export | --export=FILE | -o FILE   write the report (default name <TICKER>_<timestamp>)
      --format text|json                   output and export format (default text)
      --concurrency N                      tickers analyzed in parallel
  batch <TICKER...>     Rate several stocks and print a summary table
      --export-dir DIR                     write one report per ticker into DIR
      --format text|json
      --concurrency N
  info <TICKER>         Company profile and quarterly fundamentals
  list-examples         Example tickers to try
  screen <STRATEGY|custom>  Finviz screen (${STRATEGY_NAMES.join(', ')})
      --filters a,b,c                      filter codes (required for custom, added to a strategy)
      --table VIEW                         ${SCREEN_VIEWS.join(', ')} (custom only)
      --limit N                            rows to collect (default 20)
      --pages N                            page cap (max 50)
      --export=FILE | -o FILE              write rows as .csv or .json
`.trim();

const VALUE_FLAGS = new Set(['export', 'export-dir', 'format', 'concurrency', 'filters', 'table', 'limit', 'pages']);
const BOOLEAN_FLAGS = new Set(['help']);

export interface CliArgs {
  command: string | undefined;
  positionals: string[];
  flags: Map<string, string | true>;
}

/**
 * Splits argv into command, positionals and flags. `--export` is the one flag
 * that may stand alone; it takes a value only as `--export=FILE` (or `-o FILE`).
 */
export function parseCliArgs(argv: string[]): CliArgs {
  const positionals: string[] = [];
  const flags = new Map<string, string | true>();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    if (arg === '-o') {
      const value = argv[++i];
      if (value === undefined) throw new UsageError('-o needs a file name');
      flags.set('export', value);
    } else if (arg === '-h') {
      flags.set('help', true);
    } else if (arg.startsWith('--')) {
      const [name = '', inline] = arg.slice(2).split(/=(.*)/s, 2);
      if (inline !== undefined) {
        flags.set(name, inline);
      } else if (BOOLEAN_FLAGS.has(name) || name === 'export') {
        flags.set(name, true);
      } else if (VALUE_FLAGS.has(name)) {
        const value = argv[++i];
        if (value === undefined) throw new UsageError(`--${name} needs a value`);
        flags.set(name, value);
      } else {
        throw new UsageError(`Unknown option: ${arg}`);
      }
    } else {
      positionals.push(arg);
    }
  }

  const [command, ...rest] = positionals;
  return { command, positionals: rest, flags };
}

const stringFlag = (args: CliArgs, name: string): string | undefined => {
  const value = args.flags.get(name);
  return typeof value === 'string' ? value : undefined;
};

const intFlag = (args: CliArgs, name: string): number | undefined => {
  const raw = stringFlag(args, name);
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) throw new UsageError(`--${name} must be a positive integer`);
  return value;
};

const formatFlag = (args: CliArgs): ReportFormat => {
  const format = stringFlag(args, 'format') ?? 'text';
  if (format !== 'text' && format !== 'json') throw new UsageError('--format must be text or json');
  return format;
};

const requireTickers = (args: CliArgs, command: string): string[] => {
  if (args.positionals.length === 0) throw new UsageError(`${command} needs at least one ticker`);
  return args.positionals;
};

const statusLine = (result: AnalysisResult) =>
  result.success && result.rating
    ? `✅ ${result.ticker}: ${result.rating.result.rating} (confidence ${(result.rating.result.confidence * 100).toFixed(1)}%)` +
      (result.rating.status === 'fallback' ? ' [fallback]' : '')
    : `❌ ${result.ticker}: ${result.error ? `${result.error.kind}: ${result.error.message}` : 'failed'}`;

const exitCodeFor = (results: AnalysisResult[]) =>
  results.length > 0 && results.every(result => !result.success) ? EXIT_FAILED : EXIT_OK;

export interface CliDeps {
  loadConfig?: () => Readonly<AppConfig>;
  createServices?: (config: Readonly<AppConfig>) => Services;
}

export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (error) {
    console.error(`${errorMessageOf(error)}\n\n${USAGE}`);
    return EXIT_USAGE;
  }

  if (!args.command || args.flags.has('help') || args.command === 'help') {
    console.log(USAGE);
    return args.command || args.flags.has('help') ? EXIT_OK : EXIT_USAGE;
  }

  let config: Readonly<AppConfig> | null = null;
  let services: Services | null = null;
  const getConfig = (): Readonly<AppConfig> => {
    if (!config) config = (deps.loadConfig ?? loadConfig)();
    return config;
  };
  const getServices = (): Services => {
    if (!services) services = (deps.createServices ?? createServices)(getConfig());
    return services;
  };

  try {
    switch (args.command) {
      case 'analyze':
        return await analyzeCommand(args, getServices, getConfig);
      case 'batch':
        return await batchCommand(args, getServices, getConfig);
      case 'info':
        return await infoCommand(args, getServices);
      case 'list-examples':
        return listExamplesCommand();
      case 'screen':
        return await screenCommand(args, getServices);
      default:
        throw new UsageError(`Unknown command: ${args.command}`);
    }
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(`${error.message}\n\n${USAGE}`);
      return EXIT_USAGE;
    }
    if (error instanceof ConfigError) {
      console.error(`❌ ${error.message}`);
      return EXIT_FAILED;
    }
    console.error(`❌ ${errorMessageOf(error)}`);
    return EXIT_FAILED;
  }
}

async function analyzeCommand(
  args: CliArgs,
  getServices: () => Services,
  config: () => Readonly<AppConfig>
): Promise<number> {
  const tickers = requireTickers(args, 'analyze');
  const format = formatFlag(args);
  const exportFlag = args.flags.get('export');
  if (typeof exportFlag === 'string' && tickers.length > 1) {
    throw new UsageError('--export=FILE / -o FILE takes a single ticker; use batch --export-dir for several');
  }
  const concurrency = intFlag(args, 'concurrency') ?? config().batchConcurrency;

  console.log(`🔍 Analyzing ${tickers.join(', ')}`);
  const results = await analyzeBatch(tickers, getServices(), { concurrency });

  for (const result of results) {
    console.log(`\n${statusLine(result)}`);
    if (format === 'text') console.log(formatAnalysisReport(result));
  }
  if (format === 'json') {
    const payload = results.map(toExportJson);
    console.log(JSON.stringify(payload.length === 1 ? payload[0] : payload, null, 2));
  }

  if (exportFlag !== undefined) {
    for (const result of results) {
      const written = await exportAnalysis(result, {
        format,
        filePath: typeof exportFlag === 'string' ? exportFlag : undefined
      });
      console.log(`📄 ${result.ticker} exported to ${written}`);
    }
  }

  return exitCodeFor(results);
}

async function batchCommand(
  args: CliArgs,
  getServices: () => Services,
  config: () => Readonly<AppConfig>
): Promise<number> {
  const tickers = requireTickers(args, 'batch');
  const format = formatFlag(args);
  const exportDir = stringFlag(args, 'export-dir');
  const concurrency = intFlag(args, 'concurrency') ?? config().batchConcurrency;

  console.log(`🔍 Analyzing ${tickers.length} stocks: ${tickers.join(', ')}`);
  const results = await analyzeBatch(tickers, getServices(), { concurrency });

  const table = new Table({
    head: ['Ticker', 'Status', 'Rating', 'Confidence', 'Note'],
    colWidths: [10, 10, 13, 12, 60],
    wordWrap: true
  });
  for (const result of results) {
    const rating = result.rating?.result;
    table.push([
      result.ticker,
      result.success ? 'ok' : 'failed',
      rating?.rating ?? '—',
      rating ? `${(rating.confidence * 100).toFixed(1)}%` : '—',
      result.error
        ? `${result.error.kind}: ${result.error.message}`
        : result.rating?.status === 'fallback'
          ? result.rating.reason
          : rating?.recommendationSummary ?? ''
    ]);
  }

  if (format === 'json') {
    console.log(JSON.stringify(results.map(toExportJson), null, 2));
  } else {
    console.log(`\n${table.toString()}`);
  }

  const summary = summarizeBatch(results);
  console.log(`\n📊 ${summary.succeeded}/${summary.total} succeeded, ${summary.failed} failed`);
  for (const [rating, count] of Object.entries(summary.ratings)) {
    console.log(`   ${rating}: ${count}`);
  }

  if (exportDir) {
    for (const result of results) {
      const written = await exportAnalysis(result, { format, dir: exportDir });
      console.log(`📄 ${result.ticker} exported to ${written}`);
    }
  }

  return exitCodeFor(results);
}

async function infoCommand(args: CliArgs, getServices: () => Services): Promise<number> {
  const [ticker] = args.positionals;
  if (!ticker || args.positionals.length > 1) throw new UsageError('info takes exactly one ticker');

  const { fundamentals } = getServices();
  const result = await gatherFundamentals(fundamentals, ticker);

  try {
    const meta = await fundamentals.fetchCompanyMeta(result.ticker);
    const profile = new Table();
    profile.push(
      { Symbol: meta.symbol },
      { Name: meta.name ?? '—' },
      { Sector: meta.sector ?? '—' },
      { Industry: meta.industry ?? '—' },
      { Exchange: meta.exchange ?? '—' },
      { Currency: meta.currency ?? '—' },
      { 'Market Cap': meta.marketCap == null ? '—' : meta.marketCap.toLocaleString('en-US') }
    );
    console.log(profile.toString());
  } catch (error) {
    console.warn(`⚠️  No company profile for ${result.ticker}: ${errorMessageOf(error)}`);
  }

  if (!result.ok) {
    console.error(`❌ ${result.ticker}: ${result.error.kind}: ${result.error.message}`);
    return EXIT_FAILED;
  }
  console.log(`\nQuarterly fundamentals (${result.provider})`);
  console.log(renderFundamentalsText(result.table));
  return EXIT_OK;
}

function listExamplesCommand(): number {
  const table = new Table({ head: ['Ticker', 'Company', 'Sector'] });
  for (const example of EXAMPLE_TICKERS) {
    table.push([example.symbol, example.name, example.sector]);
  }
  console.log(table.toString());
  console.log(`\nTry: npm run cli -- analyze ${EXAMPLE_TICKERS.slice(0, 3).map(e => e.symbol).join(' ')}`);
  return EXIT_OK;
}

const cell = (value: number | string | null) => (value == null ? '—' : String(value));

function printScreen(result: ScreenResult, limit: number) {
  const table = new Table({
    head: ['Ticker', 'Company', 'Sector', 'Mkt Cap (M)', 'P/E', 'Price', 'Change %'],
    colWidths: [8, 30, 22, 13, 8, 10, 10],
    wordWrap: true
  });
  for (const row of topN(result, limit)) {
    table.push([row.ticker, cell(row.company), cell(row.sector), cell(row.marketCap), cell(row.pe), cell(row.price), cell(row.change)]);
  }
  console.log(table.toString());

  const summary = summarizeScreen(result);
  console.log(`\nTotal stocks: ${summary.totalStocks}${result.totalResults != null ? ` of ${result.totalResults}` : ''}`);
  console.log(`Average P/E: ${cell(summary.averagePe)}`);
  if (summary.topPerformers.length > 0) console.log(`Top performers: ${summary.topPerformers.join(', ')}`);
  for (const [sector, count] of Object.entries(summary.sectors)) {
    console.log(`   ${sector}: ${count}`);
  }
}

async function screenCommand(args: CliArgs, getServices: () => Services): Promise<number> {
  const [name] = args.positionals;
  if (!name) throw new UsageError('screen needs a strategy name or "custom"');

  const filters = (stringFlag(args, 'filters') ?? '').split(',').map(f => f.trim()).filter(Boolean);
  const limit = intFlag(args, 'limit') ?? 20;
  const maxPages = intFlag(args, 'pages');

  let request: ScreenRequest;
  if (name === 'custom') {
    if (filters.length === 0) throw new UsageError('screen custom needs --filters');
    const viewName = stringFlag(args, 'table') ?? 'Overview';
    const view = parseView(viewName);
    if (!view) throw new UsageError(`Unknown table view: ${viewName}`);
    request = customRequest(filters, view);
  } else if (isStrategyName(name)) {
    console.log(`📋 ${describeStrategy(name)}`);
    request = strategyRequest(name, {}, filters);
  } else {
    throw new UsageError(`Unknown strategy: ${name}`);
  }

  const result = await runScreen(getServices().fetchHtml, request, { maxRows: limit, maxPages });
  if (result.rows.length === 0) {
    console.log('No stocks matched the screen.');
    return EXIT_OK;
  }
  printScreen(result, limit);

  const exportPath = stringFlag(args, 'export');
  if (exportPath) {
    console.log(`\n📄 Results exported to ${await exportScreen(result, exportPath)}`);
  }
  return EXIT_OK;
}

const isEntryPoint = process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href;

if (isEntryPoint) {
  runCli(process.argv.slice(2)).then(
    code => {
      process.exitCode = code;
    },
    error => {
      console.error(error);
      process.exitCode = EXIT_FAILED;
    }
  );
}
