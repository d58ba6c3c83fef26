import { GoogleGenAI, type GenerateContentParameters } from '@google/genai';
import type { LlmClient, LlmRequest } from './llm.ts';
import { LlmError, delay, errorMessageOf, withTimeout } from '../utils/retry.ts';

/** The slice of the SDK this client calls; tests pass a fake. */
export interface GenerateContentApi {
  generateContent(params: GenerateContentParameters): Promise<{ text?: string | undefined }>;
}

export interface GeminiOptions {
  apiKey?: string;
  model: string;
  timeoutMs: number;
  /** Minimum gap between two requests (free tier: 15 RPM). */
  minIntervalMs: number;
  api?: GenerateContentApi;
}

/**
 * Gemini behind a serial request queue: one call in flight at a time, spaced
 * by `minIntervalMs`. A timed-out call is aborted before the next one starts.
 * 429s are not retried here; callers own their retry policy.
 */
export const createGeminiClient = (options: GeminiOptions): LlmClient => {
  const { apiKey, model, timeoutMs, minIntervalMs } = options;

  let api = options.api;
  if (!api && apiKey) {
    api = new GoogleGenAI({ apiKey }).models;
  }
  if (!api) console.warn('[Gemini] GEMINI_API_KEY is not set');

  let lastRequestTime = 0;
  const requestQueue: (() => Promise<void>)[] = [];
  let isProcessingQueue = false;

  async function processQueue() {
    if (isProcessingQueue) return;
    isProcessingQueue = true;

    while (requestQueue.length > 0) {
      const task = requestQueue.shift();
      if (!task) continue;

      const wait = Math.max(0, minIntervalMs - (Date.now() - lastRequestTime));
      if (wait > 0) await delay(wait);

      await task();
      lastRequestTime = Date.now();
    }
    isProcessingQueue = false;
  }

  const call = async (request: LlmRequest): Promise<string> => {
    if (!api) throw new LlmError('PROVIDER', 'GEMINI_API_KEY not configured');

    const controller = new AbortController();
    let result: { text?: string | undefined };
    try {
      result = await withTimeout(
        api.generateContent({
          model,
          contents: [{ role: 'user', parts: [{ text: request.prompt }] }],
          config: {
            systemInstruction: request.system,
            temperature: request.temperature ?? 0,
            responseMimeType: request.json ? 'application/json' : undefined,
            abortSignal: controller.signal
          }
        }),
        timeoutMs,
        () => {
          controller.abort();
          return new LlmError('TIMEOUT', `Gemini did not answer within ${timeoutMs}ms`);
        }
      );
    } catch (error) {
      if (error instanceof LlmError) throw error;
      throw new LlmError('PROVIDER', `Gemini request failed: ${errorMessageOf(error)}`);
    }

    const text = result.text?.trim();
    if (!text) throw new LlmError('PROVIDER', 'Gemini returned an empty response');
    return text;
  };

  return {
    name: 'gemini',
    model,
    generate(request: LlmRequest): Promise<string> {
      return new Promise<string>((resolve, reject) => {
        requestQueue.push(() => call(request).then(resolve, reject));
        void processQueue();
      });
    }
  };
};
