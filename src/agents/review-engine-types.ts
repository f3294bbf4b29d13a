// src/agents/review-engine-types.ts

export const FINDING_CATEGORIES = [
  'security',
  'performance',
  'quality',
  'style',
  'architecture',
  'logic',
  'maintainability',
  'documentation',
] as const;

export type FindingCategory = (typeof FINDING_CATEGORIES)[number];

// Ordered from least to most severe.
export const FINDING_SEVERITIES = ['low', 'medium', 'high', 'critical'] as const;

export type FindingSeverity = (typeof FINDING_SEVERITIES)[number];

export interface Finding {
  category: FindingCategory;
  severity: FindingSeverity;
  file?: string;
  line?: number;
  message: string;
  suggestion?: string;
}

export type ReviewContextValue = string | number | boolean | null;

export interface ReviewRequest {
  diff: string;
  language?: string;
  context?: Record<string, ReviewContextValue>;
}

export interface AnalyzerFailureRecord {
  role: string;
  kind: string;
  error: string;
}

export interface ReviewMetadata {
  execution_time_ms: number;
  tokens_used: number;
  agent_count: number;
  model: string;
  guardrails_applied: string[];
  failed_analyzers: AnalyzerFailureRecord[];
  synthesis: 'model' | 'fallback';
  request_id?: string;
}

export interface ReviewResult {
  summary: string;
  score: number;
  findings: Finding[];
  metadata: ReviewMetadata;
}

/**
 * Model output before guardrails have run. Any field may be missing or
 * carry a value outside its closed set.
 */
export interface RawReviewResult {
  summary: unknown;
  score: unknown;
  findings: readonly unknown[];
  metadata: ReviewMetadata;
}

export interface AgentOutput {
  role: string;
  findings: unknown[];
  tokensUsed: number;
}
