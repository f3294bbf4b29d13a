// src/providers/llm-provider.interface.ts

export interface LLMCompletion {
  text: string;
  tokensUsed: number;
}

export interface GenerateOptions {
  signal?: AbortSignal;
}

export interface LLMProvider {
  readonly name: string;
  readonly model: string;
  maxOutputTokens: number;
  generateReview(prompt: string, options?: GenerateOptions): Promise<LLMCompletion>;
}
