// src/agents/finding-schema.ts

import { z } from 'zod';
import {
  FINDING_CATEGORIES,
  FINDING_SEVERITIES,
  FindingCategory,
  FindingSeverity,
} from './review-engine-types';

export const SCORE_MIN = 0;
export const SCORE_MAX = 10;

export const findingCategorySchema = z.enum(FINDING_CATEGORIES);
export const findingSeveritySchema = z.enum(FINDING_SEVERITIES);

export const findingSchema = z.object({
  category: findingCategorySchema,
  severity: findingSeveritySchema,
  file: z.string().min(1).optional(),
  line: z.number().int().positive().optional(),
  message: z.string().trim().min(1),
  suggestion: z.string().min(1).optional(),
});

export const reviewMetadataSchema = z.object({
  execution_time_ms: z.number().int().nonnegative(),
  tokens_used: z.number().int().nonnegative(),
  agent_count: z.number().int().nonnegative(),
  model: z.string(),
  guardrails_applied: z.array(z.string()),
  failed_analyzers: z.array(
    z.object({ role: z.string(), kind: z.string(), error: z.string() }),
  ),
  synthesis: z.enum(['model', 'fallback']),
  request_id: z.string().optional(),
});

export const reviewResultSchema = z.object({
  summary: z.string(),
  score: z.number().min(SCORE_MIN).max(SCORE_MAX),
  findings: z.array(findingSchema),
  metadata: reviewMetadataSchema,
});

const contextValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const reviewRequestSchema = z.object({
  diff: z.string({ required_error: 'diff is required' }),
  language: z.string().trim().min(1).max(40).optional(),
  context: z.record(z.string(), contextValueSchema).optional(),
});

const CATEGORY_ALIASES = new Map<string, FindingCategory>(Object.entries({
  bug: 'logic',
  bugs: 'logic',
  correctness: 'logic',
  'code-quality': 'quality',
  code_quality: 'quality',
  codequality: 'quality',
  complexity: 'quality',
  design: 'architecture',
  structure: 'architecture',
  perf: 'performance',
  efficiency: 'performance',
  scalability: 'performance',
  vulnerability: 'security',
  readability: 'style',
  formatting: 'style',
  naming: 'style',
  docs: 'documentation',
} satisfies Record<string, FindingCategory>));

export function normalizeCategory(value: unknown): FindingCategory | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }
  const key = value.trim().toLowerCase();
  const parsed = findingCategorySchema.safeParse(key);
  if (parsed.success) {
    return parsed.data;
  }
  return CATEGORY_ALIASES.get(key);
}

/** Anything outside the closed set falls back to `low`. */
export function normalizeSeverity(value: unknown): FindingSeverity {
  if (typeof value !== 'string') {
    return 'low';
  }
  const parsed = findingSeveritySchema.safeParse(value.trim().toLowerCase());
  return parsed.success ? parsed.data : 'low';
}

export function severityRank(severity: FindingSeverity): number {
  return FINDING_SEVERITIES.indexOf(severity);
}
