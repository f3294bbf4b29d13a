// src/guardrails/guardrail.ts

import { Finding } from '../agents/review-engine-types';

export interface ReviewDraft {
  summary: string;
  score: number;
  findings: Finding[];
}

export interface GuardrailContext {
  diff: string;
  maxFindings: number;
}

export interface GuardrailOutcome {
  draft: ReviewDraft;
  changed: boolean;
}

/**
 * A pure correction over a schema-valid draft. `changed` is true only when
 * the returned draft differs from the input.
 */
export interface Guardrail {
  readonly name: string;
  apply(draft: ReviewDraft, context: GuardrailContext): GuardrailOutcome;
}
