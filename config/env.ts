/**
 * Process-wide configuration.
 *
 * Read once from the environment at startup (the CLI imports `dotenv/config`
 * first), validated, then frozen and passed explicitly to every client.
 */

import { z } from 'zod';

export const NEWS_PROVIDER_NAMES = ['finnhub', 'tavily'] as const;
export type NewsProviderName = (typeof NEWS_PROVIDER_NAMES)[number];

export const DEFAULT_MODELS = {
    gemini: 'gemini-2.0-flash',
    ollama: 'llama3.1'
} as const;

const blankToUndefined = (value: unknown) =>
    typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalString = z.preprocess(blankToUndefined, z.string().trim().optional());
const positiveInt = (fallback: number) => z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(fallback));
const nonNegativeInt = (fallback: number) => z.preprocess(blankToUndefined, z.coerce.number().int().min(0).default(fallback));

const EnvSchema = z.object({
    FUNDAMENTALS_PROVIDER: z.preprocess(blankToUndefined, z.enum(['fmp', 'alphavantage']).default('fmp')),
    FMP_API_KEY: optionalString,
    FMP_BASE_URL: z.preprocess(blankToUndefined, z.string().url().default('https://financialmodelingprep.com/stable')),
    ALPHAVANTAGE_API_KEY: optionalString,
    FINNHUB_API_KEY: optionalString,
    TAVILY_API_KEY: optionalString,
    NEWS_PROVIDERS: z.preprocess(
        blankToUndefined,
        z.string()
            .default('finnhub,tavily')
            .transform(list => list.split(',').map(name => name.trim().toLowerCase()).filter(Boolean))
            .pipe(z.array(z.enum(NEWS_PROVIDER_NAMES)))
    ),
    AI_PROVIDER: z.preprocess(blankToUndefined, z.enum(['gemini', 'ollama']).default('gemini')),
    GEMINI_API_KEY: optionalString,
    LLM_MODEL: optionalString,
    OLLAMA_HOST: z.preprocess(blankToUndefined, z.string().url().default('http://127.0.0.1:11434')),
    HTTP_TIMEOUT_MS: positiveInt(15_000),
    LLM_TIMEOUT_MS: positiveInt(60_000),
    LLM_MIN_INTERVAL_MS: nonNegativeInt(0),
    NEWS_LOOKBACK_DAYS: positiveInt(7),
    NEWS_MAX_RESULTS: positiveInt(5),
    SUMMARY_THRESHOLD_CHARS: positiveInt(1500),
    BATCH_CONCURRENCY: positiveInt(1)
});

export interface AppConfig {
    fundamentalsProvider: 'fmp' | 'alphavantage';
    fmp: { apiKey?: string; baseUrl: string };
    alphaVantage: { apiKey?: string };
    finnhub: { apiKey?: string };
    tavily: { apiKey?: string };
    newsProviders: readonly NewsProviderName[];
    llm: {
        provider: 'gemini' | 'ollama';
        apiKey?: string;
        model: string;
        ollamaHost: string;
        timeoutMs: number;
        minIntervalMs: number;
    };
    httpTimeoutMs: number;
    news: {
        lookbackDays: number;
        maxResults: number;
        summaryThresholdChars: number;
    };
    batchConcurrency: number;
}

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): Readonly<AppConfig> => {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        const problems = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        throw new ConfigError(`Invalid configuration: ${problems.join('; ')}`);
    }
    const e = parsed.data;

    return Object.freeze({
        fundamentalsProvider: e.FUNDAMENTALS_PROVIDER,
        fmp: Object.freeze({ apiKey: e.FMP_API_KEY, baseUrl: e.FMP_BASE_URL }),
        alphaVantage: Object.freeze({ apiKey: e.ALPHAVANTAGE_API_KEY }),
        finnhub: Object.freeze({ apiKey: e.FINNHUB_API_KEY }),
        tavily: Object.freeze({ apiKey: e.TAVILY_API_KEY }),
        newsProviders: Object.freeze([...new Set(e.NEWS_PROVIDERS)]),
        llm: Object.freeze({
            provider: e.AI_PROVIDER,
            apiKey: e.GEMINI_API_KEY,
            model: e.LLM_MODEL ?? DEFAULT_MODELS[e.AI_PROVIDER],
            ollamaHost: e.OLLAMA_HOST.replace(/\/+$/, ''),
            timeoutMs: e.LLM_TIMEOUT_MS,
            minIntervalMs: e.LLM_MIN_INTERVAL_MS
        }),
        httpTimeoutMs: e.HTTP_TIMEOUT_MS,
        news: Object.freeze({
            lookbackDays: e.NEWS_LOOKBACK_DAYS,
            maxResults: e.NEWS_MAX_RESULTS,
            summaryThresholdChars: e.SUMMARY_THRESHOLD_CHARS
        }),
        batchConcurrency: e.BATCH_CONCURRENCY
    });
};
