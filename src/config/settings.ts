// src/config/settings.ts

import { z } from 'zod';
import { ConfigError } from '../errors';
import { LOG_LEVELS, LogLevel } from '../logger';

export const LLM_PROVIDERS = ['openai', 'groq'] as const;

export type LLMProviderName = (typeof LLM_PROVIDERS)[number];

export interface ReviewSettings {
  readonly llmProvider: LLMProviderName;
  readonly llmModel: string;
  readonly llmApiKey: string;
  readonly llmBaseUrl?: string;
  readonly llmMaxOutputTokens: number;
  readonly reviewApiKey: string;
  readonly rateLimitPerMinute: number;
  readonly maxFindingsPerReview: number;
  readonly requestTimeoutSeconds: number;
  readonly maxDiffSizeBytes: number;
  readonly logLevel: LogLevel;
  readonly configDir: string;
  readonly port: number;
}

// Limits applied when running on a hosted free tier.
const HOSTED_TIER_LIMITS = {
  rateLimitPerMinute: 5,
  requestTimeoutSeconds: 90,
  maxFindingsPerReview: 15,
};

const envSchema = z.object({
  LLM_PROVIDER: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(LLM_PROVIDERS))
    .default('openai'),
  OPENAI_API_KEY: z.string().trim().default(''),
  OPENAI_MODEL: z.string().trim().min(1).default('gpt-4o-mini'),
  OPENAI_BASE_URL: z.string().url().optional(),
  GROQ_API_KEY: z.string().trim().default(''),
  GROQ_MODEL: z.string().trim().min(1).default('llama-3.3-70b-versatile'),
  GROQ_BASE_URL: z.string().url().optional(),
  LLM_MAX_OUTPUT_TOKENS: z.coerce.number().int().min(256).max(32768).default(4096),
  REVIEW_API_KEY: z.string({ required_error: 'REVIEW_API_KEY is required' }).trim().min(1, 'REVIEW_API_KEY is required'),
  RATE_LIMIT_PER_MINUTE: z.coerce.number().int().min(1).max(100).default(10),
  MAX_FINDINGS_PER_REVIEW: z.coerce.number().int().min(1).max(100).default(20),
  REQUEST_TIMEOUT_SECONDS: z.coerce.number().int().min(30).max(300).default(120),
  MAX_DIFF_SIZE_BYTES: z.coerce.number().int().min(1024).max(10_485_760).default(1_048_576),
  LOG_LEVEL: z.string().trim().toLowerCase().pipe(z.enum(LOG_LEVELS)).default('info'),
  CONFIG_DIR: z.string().trim().min(1).default('config'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  SPACE_ID: z.string().optional(),
  SPACE_REPO_NAME: z.string().optional(),
});

export function isHostedFreeTier(env: NodeJS.ProcessEnv): boolean {
  return Boolean(env.SPACE_ID || env.SPACE_REPO_NAME);
}

/**
 * Parses the process environment once into an immutable settings value.
 * Throws ConfigError listing every invalid variable.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): ReviewSettings {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map(issue => `${issue.path.join('.') || 'env'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${problems}`);
  }

  const vars = parsed.data;
  const isGroq = vars.LLM_PROVIDER === 'groq';
  const llmApiKey = isGroq ? vars.GROQ_API_KEY : vars.OPENAI_API_KEY;
  if (!llmApiKey) {
    throw new ConfigError(`${isGroq ? 'GROQ_API_KEY' : 'OPENAI_API_KEY'} is required when LLM_PROVIDER=${vars.LLM_PROVIDER}`);
  }

  let rateLimitPerMinute = vars.RATE_LIMIT_PER_MINUTE;
  let requestTimeoutSeconds = vars.REQUEST_TIMEOUT_SECONDS;
  let maxFindingsPerReview = vars.MAX_FINDINGS_PER_REVIEW;

  if (isHostedFreeTier(env)) {
    rateLimitPerMinute = Math.min(rateLimitPerMinute, HOSTED_TIER_LIMITS.rateLimitPerMinute);
    requestTimeoutSeconds = Math.min(requestTimeoutSeconds, HOSTED_TIER_LIMITS.requestTimeoutSeconds);
    maxFindingsPerReview = Math.min(maxFindingsPerReview, HOSTED_TIER_LIMITS.maxFindingsPerReview);
  }

  return Object.freeze({
    llmProvider: vars.LLM_PROVIDER,
    llmModel: isGroq ? vars.GROQ_MODEL : vars.OPENAI_MODEL,
    llmApiKey,
    llmBaseUrl: isGroq ? vars.GROQ_BASE_URL : vars.OPENAI_BASE_URL,
    llmMaxOutputTokens: vars.LLM_MAX_OUTPUT_TOKENS,
    reviewApiKey: vars.REVIEW_API_KEY,
    rateLimitPerMinute,
    maxFindingsPerReview,
    requestTimeoutSeconds,
    maxDiffSizeBytes: vars.MAX_DIFF_SIZE_BYTES,
    logLevel: vars.LOG_LEVEL,
    configDir: vars.CONFIG_DIR,
    port: vars.PORT,
  });
}
