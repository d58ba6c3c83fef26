import type { ErrorKind } from '../../types.ts';

export type ApiErrorCode = 'MISSING_KEY' | 'AUTH' | 'RATE_LIMIT' | 'NOT_FOUND' | 'TRANSIENT';

export class ApiError extends Error {
  constructor(
    public code: ApiErrorCode,
    message: string,
    public provider?: string
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

export type LlmErrorCode = 'PARSE' | 'TIMEOUT' | 'PROVIDER';

export class LlmError extends Error {
  constructor(
    public code: LlmErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'LlmError';
  }
}

export class EmptyResultError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EmptyResultError';
  }
}

export class InvalidTickerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidTickerError';
  }
}

/**
 * Maps an HTTP status to an ApiError. 402 counts as auth: FMP answers it for
 * endpoints outside the key's plan.
 */
export const apiErrorFromStatus = (provider: string, status: number, detail = ''): ApiError => {
  const suffix = detail ? `: ${detail}` : '';
  if (status === 401 || status === 402 || status === 403) {
    return new ApiError('AUTH', `${provider} rejected the API key (${status})${suffix}`, provider);
  }
  if (status === 404) {
    return new ApiError('NOT_FOUND', `${provider} resource not found (404)${suffix}`, provider);
  }
  if (status === 429) {
    return new ApiError('RATE_LIMIT', `${provider} rate limit exceeded (429)${suffix}`, provider);
  }
  if (status === 408 || status >= 500) {
    return new ApiError('TRANSIENT', `${provider} error ${status}${suffix}`, provider);
  }
  return new ApiError('NOT_FOUND', `${provider} rejected the request (${status})${suffix}`, provider);
};

export const errorKindOf = (error: unknown): ErrorKind => {
  if (error instanceof ApiError) {
    switch (error.code) {
      case 'MISSING_KEY':
      case 'AUTH':
        return 'ProviderAuthError';
      case 'RATE_LIMIT':
        return 'ProviderRateLimitError';
      case 'NOT_FOUND':
        return 'ProviderNotFoundError';
      case 'TRANSIENT':
        return 'ProviderTransientError';
    }
  }
  if (error instanceof LlmError) {
    if (error.code === 'PARSE') return 'LLMParseError';
    if (error.code === 'TIMEOUT') return 'LLMTimeoutError';
    return 'ProviderTransientError';
  }
  if (error instanceof EmptyResultError) return 'EmptyResultError';
  if (error instanceof InvalidTickerError) return 'InvalidTickerError';
  return 'ProviderTransientError';
};

export const errorMessageOf = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const delay = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * Rejects with `onTimeout()` when `promise` has not settled within `ms`.
 */
export const withTimeout = <T>(promise: Promise<T>, ms: number, onTimeout: () => Error): Promise<T> => {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
};

export interface RetryOptions {
  maxRetries?: number;
  delayMs?: number;
  backoffMultiplier?: number;
  shouldRetry?: (error: unknown) => boolean;
  label?: string;
}

export const isRetryable = (error: unknown): boolean => {
  if (error instanceof ApiError) {
    return error.code === 'RATE_LIMIT' || error.code === 'TRANSIENT';
  }
  if (error instanceof LlmError) {
    return error.code !== 'PARSE';
  }
  return !(error instanceof InvalidTickerError);
};

export const fetchWithRetry = async <T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> => {
  const {
    maxRetries = 3,
    delayMs = 1000,
    backoffMultiplier = 2,
    shouldRetry = isRetryable,
    label = 'Retry'
  } = options;

  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (!shouldRetry(error) || attempt === maxRetries) {
        throw error;
      }

      const wait = delayMs * Math.pow(backoffMultiplier, attempt);
      console.warn(`[${label}] Attempt ${attempt + 1} failed (${errorMessageOf(error)}), retrying in ${wait}ms...`);
      await delay(wait);
    }
  }

  throw lastError;
};
