export interface ExampleTicker {
    symbol: string;
    name: string;
    sector: string;
}

/** Well-covered large caps for trying the pipeline out. */
export const EXAMPLE_TICKERS: ExampleTicker[] = [
    // --- MEGA CAP TECH ---
    { symbol: 'AAPL', name: 'Apple Inc.', sector: 'Technology' },
    { symbol: 'MSFT', name: 'Microsoft Corporation', sector: 'Technology' },
    { symbol: 'GOOGL', name: 'Alphabet Inc.', sector: 'Communication Services' },
    { symbol: 'AMZN', name: 'Amazon.com, Inc.', sector: 'Consumer Cyclical' },
    { symbol: 'NVDA', name: 'NVIDIA Corporation', sector: 'Technology' },
    { symbol: 'META', name: 'Meta Platforms, Inc.', sector: 'Communication Services' },

    // --- FINANCIALS ---
    { symbol: 'JPM', name: 'JPMorgan Chase & Co.', sector: 'Financial Services' },
    { symbol: 'V', name: 'Visa Inc.', sector: 'Financial Services' },

    // --- HEALTHCARE & STAPLES ---
    { symbol: 'JNJ', name: 'Johnson & Johnson', sector: 'Healthcare' },
    { symbol: 'PG', name: 'The Procter & Gamble Company', sector: 'Consumer Defensive' },
    { symbol: 'KO', name: 'The Coca-Cola Company', sector: 'Consumer Defensive' },

    // --- ENERGY & INDUSTRIALS ---
    { symbol: 'XOM', name: 'Exxon Mobil Corporation', sector: 'Energy' },
    { symbol: 'CAT', name: 'Caterpillar Inc.', sector: 'Industrials' }
];
