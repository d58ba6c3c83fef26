import axios from 'axios';
import { ApiError, apiErrorFromStatus, errorMessageOf } from './retry.ts';

export const BROWSER_HEADERS = {
  'User-Agent': 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.9',
  'Cache-Control': 'no-cache'
};

/**
 * fetch() with a hard timeout. Network failures and timeouts surface as
 * TRANSIENT ApiErrors so callers only ever deal with one error type.
 */
export const timedFetch = async (
  provider: string,
  url: string,
  timeoutMs: number,
  init: RequestInit = {}
): Promise<Response> => {
  try {
    return await fetch(url, { ...init, signal: AbortSignal.timeout(timeoutMs) });
  } catch (error) {
    if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
      throw new ApiError('TRANSIENT', `${provider} request timed out after ${timeoutMs}ms`, provider);
    }
    throw new ApiError('TRANSIENT', `${provider} network error: ${errorMessageOf(error)}`, provider);
  }
};

export const readJson = async (provider: string, res: Response): Promise<unknown> => {
  try {
    return await res.json();
  } catch (error) {
    throw new ApiError('TRANSIENT', `${provider} returned invalid JSON: ${errorMessageOf(error)}`, provider);
  }
};

export type HtmlFetcher = (url: string, params?: Record<string, string>) => Promise<string>;

export const createHtmlFetcher = (provider: string, timeoutMs: number): HtmlFetcher => {
  const client = axios.create({ timeout: timeoutMs, headers: BROWSER_HEADERS, responseType: 'text' });

  return async (url, params) => {
    try {
      const response = await client.get<string>(url, { params });
      return typeof response.data === 'string' ? response.data : String(response.data);
    } catch (error) {
      if (axios.isAxiosError(error) && error.response) {
        throw apiErrorFromStatus(provider, error.response.status, url);
      }
      throw new ApiError('TRANSIENT', `${provider} request failed: ${errorMessageOf(error)}`, provider);
    }
  };
};
