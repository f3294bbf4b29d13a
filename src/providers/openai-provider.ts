// src/providers/openai-provider.ts

import { ProviderError } from '../errors';
import { estimateTokens } from '../utils/diff-utils';
import { ApiCallParams, ApiProviderBase } from './api-provider-base';
import { LLMCompletion } from './llm-provider.interface';

export const OPENAI_BASE_URL = 'https://api.openai.com/v1';

export const SYSTEM_PROMPT =
    'You are an expert code reviewer. Respond only with the JSON object the user asks for, with no markdown and no explanation.';

interface ChatCompletionBody {
    choices?: { message?: { content?: unknown } }[];
    usage?: { total_tokens?: unknown };
}

function isChatCompletionBody(data: unknown): data is ChatCompletionBody {
    return typeof data === 'object' && data !== null && 'choices' in data && Array.isArray(data.choices);
}

/**
 * Chat-completions client. Any OpenAI-compatible endpoint works by passing
 * its base URL as `host`.
 */
export class OpenAIProvider extends ApiProviderBase {
    readonly name: string = 'OpenAI';

    constructor(
        host: string,
        model: string,
        maxOutputTokens: number,
        apiKey: string,
        private readonly temperature: number = 0.1
    ) {
        super(host.replace(/\/+$/, ''), model, maxOutputTokens, apiKey);
    }

    protected buildApiCallParams(prompt: string): ApiCallParams {
        return {
            url: `${this.host}/chat/completions`,
            headers: {
                Authorization: `Bearer ${this.apiKey ?? ''}`,
            },
            body: {
                model: this.model,
                messages: [
                    { role: 'system', content: SYSTEM_PROMPT },
                    { role: 'user', content: prompt },
                ],
                temperature: this.temperature,
                max_tokens: this.maxOutputTokens,
            },
        };
    }

    protected parseResponse(data: unknown, prompt: string): LLMCompletion {
        const content = isChatCompletionBody(data) ? data.choices?.[0]?.message?.content : undefined;

        if (typeof content !== 'string' || content.trim().length === 0) {
            throw new ProviderError(
                `${this.name} returned an unexpected or empty response body: ${JSON.stringify(data).slice(0, 300)}`,
                'malformed_response',
                this.name
            );
        }

        const reported = isChatCompletionBody(data) ? data.usage?.total_tokens : undefined;
        const tokensUsed = typeof reported === 'number' && Number.isFinite(reported)
            ? reported
            : estimateTokens(prompt) + estimateTokens(content);

        return { text: content.trim(), tokensUsed };
    }
}
