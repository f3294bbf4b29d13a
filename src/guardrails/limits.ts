// src/guardrails/limits.ts

import { SCORE_MAX, SCORE_MIN, severityRank } from '../agents/finding-schema';
import { Guardrail } from './guardrail';

/** Stable sort, most severe first. */
export const severityOrder: Guardrail = {
  name: 'severity_order',
  apply(draft) {
    const findings = draft.findings
      .map((finding, index) => ({ finding, index }))
      .sort((a, b) => severityRank(b.finding.severity) - severityRank(a.finding.severity) || a.index - b.index)
      .map(entry => entry.finding);

    const changed = findings.some((finding, index) => finding !== draft.findings[index]);
    return changed ? { draft: { ...draft, findings }, changed } : { draft, changed };
  },
};

// Runs after severityOrder, so truncation keeps the most severe findings.
export const maxFindings: Guardrail = {
  name: 'max_findings',
  apply(draft, context) {
    if (draft.findings.length <= context.maxFindings) {
      return { draft, changed: false };
    }
    return { draft: { ...draft, findings: draft.findings.slice(0, context.maxFindings) }, changed: true };
  },
};

export const scoreClamp: Guardrail = {
  name: 'score_clamp',
  apply(draft) {
    const score = Math.min(SCORE_MAX, Math.max(SCORE_MIN, draft.score));
    return score === draft.score ? { draft, changed: false } : { draft: { ...draft, score }, changed: true };
  },
};
