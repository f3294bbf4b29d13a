// src/providers/api-provider-base.ts

import { ProviderError } from '../errors';
import { GenerateOptions, LLMCompletion, LLMProvider } from './llm-provider.interface';

export interface ApiCallParams {
    url: string;
    headers: Record<string, string>;
    body: Record<string, unknown>;
}

export abstract class ApiProviderBase implements LLMProvider {
    abstract readonly name: string;

    constructor(
        protected readonly host: string,
        readonly model: string,
        public maxOutputTokens: number,
        protected readonly apiKey?: string
    ) {}

    protected abstract buildApiCallParams(prompt: string): ApiCallParams;
    protected abstract parseResponse(data: unknown, prompt: string): LLMCompletion;

    async generateReview(prompt: string, options: GenerateOptions = {}): Promise<LLMCompletion> {
        const { url, headers, body } = this.buildApiCallParams(prompt);
        const { signal } = options;

        let response: Response;
        try {
            response = await fetch(url, {
                method: 'POST',
                headers: {
                    'Content-Type': 'application/json',
                    ...headers,
                },
                body: JSON.stringify(body),
                signal,
            });
        } catch (error) {
            throw this.classifyFetchError(error, signal);
        }

        if (!response.ok) {
            const errorText = await response.text().catch(() => '');
            const kind = response.status === 429 ? 'rate_limited' : 'http';
            throw new ProviderError(
                `LLM API Error (${this.name}): ${response.status} - ${response.statusText}. Response: ${errorText.slice(0, 500)}`,
                kind,
                this.name,
                { status: response.status }
            );
        }

        let data: unknown;
        try {
            data = await response.json();
        } catch (error) {
            if (signal?.aborted) {
                throw this.classifyFetchError(error, signal);
            }
            throw new ProviderError(`LLM API Error (${this.name}): response body is not JSON`, 'malformed_response', this.name, { cause: error });
        }

        return this.parseResponse(data, prompt);
    }

    private classifyFetchError(error: unknown, signal?: AbortSignal): ProviderError {
        if (signal?.aborted) {
            return new ProviderError(`LLM call to ${this.name} was aborted`, 'aborted', this.name, { cause: signal.reason ?? error });
        }
        if (error instanceof Error && error.name === 'TimeoutError') {
            return new ProviderError(`LLM call to ${this.name} timed out`, 'timeout', this.name, { cause: error });
        }
        const message = error instanceof Error ? error.message : String(error);
        return new ProviderError(`LLM call to ${this.name} failed: ${message}`, 'network', this.name, { cause: error });
    }
}
