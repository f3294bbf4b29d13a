// src/guardrails/guardrail-pipeline.ts

import { RawReviewResult, ReviewResult } from '../agents/review-engine-types';
import { Logger } from '../logger';
import { duplicateDetection } from './duplicate-detection';
import { fileValidation } from './file-validation';
import { Guardrail, GuardrailContext } from './guardrail';
import { maxFindings, scoreClamp, severityOrder } from './limits';
import { SCHEMA_ENFORCEMENT, enforceSchema } from './schema-enforcement';
import { severityValidation } from './severity-validation';

export const DEFAULT_GUARDRAILS: readonly Guardrail[] = [
  fileValidation,
  duplicateDetection,
  severityValidation,
  severityOrder,
  maxFindings, // after ordering, so the cap keeps the most severe findings
  scoreClamp,
];

export interface GuardrailPipelineOptions {
  maxFindingsPerReview: number;
  guardrails?: readonly Guardrail[];
}

/**
 * Deterministic post-processing of synthesized output. Never throws on bad
 * model output: every correction is recorded in
 * `metadata.guardrails_applied` instead.
 */
export class GuardrailPipeline {
  private readonly guardrails: readonly Guardrail[];

  constructor(
    private readonly options: GuardrailPipelineOptions,
    private readonly logger: Logger,
  ) {
    this.guardrails = options.guardrails ?? DEFAULT_GUARDRAILS;
  }

  get names(): string[] {
    return [SCHEMA_ENFORCEMENT, ...this.guardrails.map(g => g.name)];
  }

  apply(raw: RawReviewResult, context: { diff: string }): ReviewResult {
    const applied = [...raw.metadata.guardrails_applied];
    const record = (name: string, detail: Record<string, unknown>): void => {
      if (!applied.includes(name)) applied.push(name);
      this.logger.info({ guardrail: name, ...detail }, 'Guardrail corrected review output');
    };

    const guardrailContext: GuardrailContext = {
      diff: context.diff,
      maxFindings: this.options.maxFindingsPerReview,
    };

    const schema = enforceSchema(raw);
    let draft = schema.draft;
    if (schema.changed) {
      record(SCHEMA_ENFORCEMENT, { rawFindings: raw.findings.length, findings: draft.findings.length });
    }

    for (const guardrail of this.guardrails) {
      const outcome = guardrail.apply(draft, guardrailContext);
      if (outcome.changed) {
        record(guardrail.name, {
          findingsBefore: draft.findings.length,
          findingsAfter: outcome.draft.findings.length,
        });
      }
      draft = outcome.draft;
    }

    return {
      summary: draft.summary,
      score: draft.score,
      findings: draft.findings,
      metadata: { ...raw.metadata, guardrails_applied: applied },
    };
  }
}
