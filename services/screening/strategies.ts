import type { ScreenRequest, ScreenView } from '../../types.ts';

/** Finviz `v=` codes per table view. */
export const SCREEN_VIEW_CODES: Record<ScreenView, string> = {
  Overview: '111',
  Valuation: '121',
  Ownership: '131',
  Performance: '141',
  Financial: '161',
  Technical: '171'
};

export const SCREEN_VIEWS = Object.keys(SCREEN_VIEW_CODES);

export const STRATEGY_NAMES = ['value', 'growth', 'dividend', 'momentum', 'buffett', 'lynch', 'aristocrat'] as const;
export type StrategyName = (typeof STRATEGY_NAMES)[number];

export interface StrategyParams {
  /** Market-cap filter suffix, e.g. `largeover`, `midover`. */
  marketCap?: string;
  /** Minimum dividend yield in percent (dividend strategy). */
  minYield?: number;
}

interface StrategyDefinition {
  description: string;
  view: ScreenView;
  filters: (params: Required<StrategyParams>) => string[];
}

const STRATEGIES: Record<StrategyName, StrategyDefinition> = {
  value: {
    description: 'Undervalued large caps: low P/E, P/B and P/FCF with solid returns and low debt',
    view: 'Valuation',
    filters: ({ marketCap }) => [
      `cap_${marketCap}`,
      'exch_nasd',
      'fa_pe_u15',
      'fa_pb_u2',
      'fa_pfcf_u15',
      'fa_roe_o10',
      'fa_roa_o5',
      'fa_debt_u0.5'
    ]
  },
  growth: {
    description: 'Quality growth: positive EPS growth, sales growth over 5%, ROE over 15%, P/E under 25',
    view: 'Overview',
    filters: ({ marketCap }) => [
      `cap_${marketCap}`,
      'exch_nasd',
      'fa_epsyoyttm_pos',
      'fa_evebitda_o10',
      'fa_pe_u25',
      'fa_roa_o10',
      'fa_roe_o15',
      'fa_salesyoyttm_o5'
    ]
  },
  dividend: {
    description: 'Dividend growth: yield above the minimum, payout under 60%, P/E under 20',
    view: 'Financial',
    filters: ({ marketCap, minYield }) => [
      `cap_${marketCap}`,
      'exch_nasd',
      'fa_div_pos',
      `fa_div_o${Math.trunc(minYield)}`,
      'fa_pe_u20',
      'fa_roe_o10',
      'fa_payoutratio_u60'
    ]
  },
  momentum: {
    description: 'Momentum: strong 13/26-week performance above the 20 and 50-day averages, RSI not overbought',
    view: 'Performance',
    filters: ({ marketCap }) => [
      `cap_${marketCap}`,
      'exch_nasd',
      'ta_perf_13w_o10',
      'ta_perf_26w_o20',
      'ta_rsi_nob60',
      'fa_epsyoyttm_o20',
      'ta_sma20_pa',
      'ta_sma50_pa'
    ]
  },
  buffett: {
    description: 'Buffett style: large caps with ROE over 15%, P/E under 20, low debt, steady EPS growth',
    view: 'Overview',
    filters: ({ marketCap }) => [
      `cap_${marketCap}`,
      'fa_roe_o15',
      'fa_pe_u20',
      'fa_debt_u0.4',
      'fa_eps5years_o10',
      'fa_epsyoy_o5'
    ]
  },
  lynch: {
    description: 'Lynch style: EPS growth over 15% at a PEG under 1.5',
    view: 'Overview',
    filters: () => ['cap_midover', 'fa_epsyoy_o15', 'fa_pe_u25', 'fa_peg_u1.5', 'ta_perf_52w_o10']
  },
  aristocrat: {
    description: 'Dividend aristocrat style: large caps yielding over 2% with payout under 60%',
    view: 'Financial',
    filters: ({ marketCap }) => [`cap_${marketCap}`, 'fa_div_pos', 'fa_div_o2', 'fa_payoutratio_u60', 'fa_roe_o12']
  }
};

const DEFAULT_PARAMS: Required<StrategyParams> = { marketCap: 'largeover', minYield: 2 };

export const isStrategyName = (name: string): name is StrategyName =>
  STRATEGY_NAMES.some(strategy => strategy === name);

export const describeStrategy = (name: StrategyName) => STRATEGIES[name].description;

export function strategyRequest(name: StrategyName, params: StrategyParams = {}, baseFilters: string[] = []): ScreenRequest {
  const strategy = STRATEGIES[name];
  const resolved = { ...DEFAULT_PARAMS, ...params };
  return {
    name,
    filters: [...baseFilters, ...strategy.filters(resolved)],
    view: strategy.view
  };
}

/** Case-insensitive view lookup; null for an unknown view name. */
export function parseView(name: string): ScreenView | null {
  const wanted = name.trim().toLowerCase();
  for (const view of Object.keys(SCREEN_VIEW_CODES)) {
    if (view.toLowerCase() === wanted && isScreenView(view)) return view;
  }
  return null;
}

const isScreenView = (name: string): name is ScreenView => name in SCREEN_VIEW_CODES;

export function customRequest(filters: string[], view: ScreenView = 'Overview', baseFilters: string[] = []): ScreenRequest {
  return {
    name: 'custom',
    filters: [...baseFilters, ...filters.map(filter => filter.trim()).filter(Boolean)],
    view
  };
}
