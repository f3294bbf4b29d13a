// src/providers/index.ts

import { LLMProviderName, ReviewSettings } from '../config/settings';
import { ApiProviderBase } from './api-provider-base';
import { GroqProvider, GROQ_BASE_URL } from './groq-provider';
import { OpenAIProvider, OPENAI_BASE_URL } from './openai-provider';

export * from './llm-provider.interface';
export { ApiProviderBase } from './api-provider-base';
export { OpenAIProvider } from './openai-provider';
export { GroqProvider } from './groq-provider';

type ProviderConstructor = new (
    host: string,
    model: string,
    maxOutputTokens: number,
    apiKey: string,
    temperature?: number
) => ApiProviderBase;

const ProviderMap: Record<LLMProviderName, { ctor: ProviderConstructor; defaultHost: string }> = {
    openai: { ctor: OpenAIProvider, defaultHost: OPENAI_BASE_URL },
    groq: { ctor: GroqProvider, defaultHost: GROQ_BASE_URL },
};

export function createProvider(
    settings: Pick<ReviewSettings, 'llmProvider' | 'llmModel' | 'llmApiKey' | 'llmBaseUrl' | 'llmMaxOutputTokens'>,
    options: { configuredHost?: string; temperature?: number } = {}
): ApiProviderBase {
    const { ctor, defaultHost } = ProviderMap[settings.llmProvider];
    const host = settings.llmBaseUrl ?? options.configuredHost ?? defaultHost;
    return new ctor(host, settings.llmModel, settings.llmMaxOutputTokens, settings.llmApiKey, options.temperature);
}
