import type { LlmClient, LlmRequest } from './llm.ts';
import { LlmError, errorMessageOf } from '../utils/retry.ts';
import { isRecord } from '../utils/financialUtils.ts';

export interface OllamaOptions {
    host: string;
    model: string;
    timeoutMs: number;
}

/**
 * Local Ollama server over its chat API.
 */
export const createOllamaClient = (options: OllamaOptions): LlmClient => {
    const { host, model, timeoutMs } = options;

    return {
        name: 'ollama',
        model,

        async generate(request: LlmRequest): Promise<string> {
            const messages = [
                ...(request.system ? [{ role: 'system', content: request.system }] : []),
                { role: 'user', content: request.prompt }
            ];
            const payload = {
                model,
                messages,
                stream: false,
                format: request.json ? 'json' : undefined, // native JSON mode
                options: {
                    temperature: request.temperature ?? 0.1,
                    num_ctx: 8192
                }
            };

            console.log(`[Ollama] Connecting to ${host} with model ${model}...`);

            let response: Response;
            try {
                response = await fetch(`${host}/api/chat`, {
                    method: 'POST',
                    headers: { 'Content-Type': 'application/json' },
                    body: JSON.stringify(payload),
                    signal: AbortSignal.timeout(timeoutMs)
                });
            } catch (error) {
                if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
                    throw new LlmError('TIMEOUT', `Ollama did not answer within ${timeoutMs}ms`);
                }
                throw new LlmError('PROVIDER', `Ollama request failed: ${errorMessageOf(error)}`);
            }

            if (!response.ok) {
                throw new LlmError('PROVIDER', `Ollama API Error: ${response.status} ${response.statusText}`);
            }

            let data: unknown;
            try {
                data = await response.json();
            } catch (error) {
                throw new LlmError('PROVIDER', `Ollama returned invalid JSON: ${errorMessageOf(error)}`);
            }
            const message = isRecord(data) && isRecord(data.message) ? data.message.content : undefined;
            if (typeof message !== 'string' || !message.trim()) {
                throw new LlmError('PROVIDER', 'Ollama returned an empty response');
            }
            return message;
        }
    };
};
