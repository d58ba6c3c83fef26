import JSON5 from 'json5';
import type { AppConfig } from '../../config/env.ts';
import { LlmError } from '../utils/retry.ts';
import { createGeminiClient } from './gemini.ts';
import { createOllamaClient } from './ollama.ts';

export interface LlmRequest {
  prompt: string;
  system?: string;
  /** Ask the model for a JSON-only reply (native JSON mode where supported). */
  json?: boolean;
  temperature?: number;
}

export interface LlmClient {
  readonly name: string;
  readonly model: string;
  generate(request: LlmRequest): Promise<string>;
}

// Strict JSON System Prompt
export const STRICT_JSON_SYSTEM_PROMPT = `
You are a backend analysis engine used only by another program.
The program will fail if you do not follow these rules exactly.

Your ONLY job is to return a SINGLE VALID JSON OBJECT that matches the schema you are given.

ABSOLUTE OUTPUT RULES:

1. You MUST return exactly ONE JSON object.
   - No markdown, no prose, no comments.
   - Do NOT wrap the JSON in \`\`\` or \`\`\`json.
   - The first non-whitespace character in your entire reply MUST be "{".
   - The last non-whitespace character in your entire reply MUST be "}".

2. VALID JSON ONLY
   - All keys and string values MUST use double quotes.
   - Do NOT use NaN, Infinity, -Infinity, or undefined.
   - Do NOT use trailing commas.

3. SCHEMA COMPLIANCE
   - You MUST include ALL required keys.
   - Do NOT rename, remove, or add keys.
   - Keep text fields concise and factual.

Reply with ONLY the JSON object and nothing else.
`;

/**
 * Finds the end of the first balanced object or array starting at `start`.
 * Brackets inside string literals are ignored.
 */
const findClosing = (text: string, start: number): number => {
  let depth = 0;
  let quote: string | null = null;

  for (let i = start; i < text.length; i++) {
    const char = text[i];
    if (quote) {
      if (char === '\\') i++;
      else if (char === quote) quote = null;
      continue;
    }
    if (char === '"' || char === "'") {
      quote = char;
    } else if (char === '{' || char === '[') {
      depth++;
    } else if (char === '}' || char === ']') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
};

/**
 * Lenient JSON extraction from model output: strips markdown fences and
 * surrounding prose, keeps the first complete object or array, then parses
 * with JSON5. Throws an LlmError('PARSE') when nothing parseable remains.
 */
export function parseJSON(raw: string): unknown {
  const text = raw.replace(/```[a-zA-Z]*\n?/g, '').replace(/```/g, '').trim();
  if (!text) {
    throw new LlmError('PARSE', 'LLM returned an empty response');
  }

  const firstBrace = text.indexOf('{');
  const firstBracket = text.indexOf('[');
  const candidates = [firstBrace, firstBracket].filter(i => i !== -1);
  if (candidates.length === 0) {
    throw new LlmError('PARSE', `LLM response contains no JSON: ${text.slice(0, 80)}`);
  }

  const start = Math.min(...candidates);
  const end = findClosing(text, start);
  const body = end === -1 ? text.slice(start) : text.slice(start, end + 1);

  try {
    return JSON5.parse(body);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new LlmError('PARSE', `Could not parse LLM JSON (${reason}): ${body.slice(0, 80)}`);
  }
}

export const createLlmClient = (config: AppConfig['llm']): LlmClient =>
  config.provider === 'ollama'
    ? createOllamaClient({ host: config.ollamaHost, model: config.model, timeoutMs: config.timeoutMs })
    : createGeminiClient({
        apiKey: config.apiKey,
        model: config.model,
        timeoutMs: config.timeoutMs,
        minIntervalMs: config.minIntervalMs
      });
