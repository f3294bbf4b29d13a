// src/providers/groq-provider.ts

import { OpenAIProvider } from './openai-provider';

export const GROQ_BASE_URL = 'https://api.groq.com/openai/v1';

// Groq serves the OpenAI chat-completions wire format.
export class GroqProvider extends OpenAIProvider {
    readonly name: string = 'Groq';
}
