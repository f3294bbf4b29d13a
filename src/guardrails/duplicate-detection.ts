// src/guardrails/duplicate-detection.ts

import { severityRank } from '../agents/finding-schema';
import { Finding } from '../agents/review-engine-types';
import { Guardrail } from './guardrail';

export const MESSAGE_SIMILARITY_THRESHOLD = 0.75;

function words(text: string): Set<string> {
  return new Set(text.toLowerCase().split(/[^\p{L}\p{N}]+/u).filter(Boolean));
}

/** Jaccard similarity of the two messages' lowercase word sets. */
export function messageSimilarity(a: string, b: string): number {
  const left = words(a);
  const right = words(b);
  if (left.size === 0 && right.size === 0) return a.trim() === b.trim() ? 1 : 0;

  let shared = 0;
  for (const word of left) {
    if (right.has(word)) shared++;
  }
  return shared / (left.size + right.size - shared);
}

export function isDuplicate(a: Finding, b: Finding): boolean {
  return (
    a.category === b.category &&
    a.file === b.file &&
    a.line === b.line &&
    messageSimilarity(a.message, b.message) >= MESSAGE_SIMILARITY_THRESHOLD
  );
}

/**
 * Higher severity wins (the earlier finding on a tie) and the longer
 * suggestion is kept.
 */
export function mergeFindings(existing: Finding, incoming: Finding): Finding {
  const winner = severityRank(incoming.severity) > severityRank(existing.severity) ? incoming : existing;
  const suggestion =
    (incoming.suggestion?.length ?? 0) > (existing.suggestion?.length ?? 0) ? incoming.suggestion : existing.suggestion;

  const merged: Finding = { ...winner };
  delete merged.suggestion;
  if (suggestion) merged.suggestion = suggestion;
  return merged;
}

function collapseOnce(findings: readonly Finding[]): { findings: Finding[]; merged: boolean } {
  const kept: Finding[] = [];
  let merged = false;

  for (const finding of findings) {
    const index = kept.findIndex(existing => isDuplicate(existing, finding));
    if (index === -1) {
      kept.push(finding);
    } else {
      kept[index] = mergeFindings(kept[index], finding);
      merged = true;
    }
  }
  return { findings: kept, merged };
}

export const duplicateDetection: Guardrail = {
  name: 'duplicate_detection',
  apply(draft) {
    let findings = draft.findings;
    let changed = false;

    // A merge can swap in a different message, so repeat until stable.
    for (;;) {
      const pass = collapseOnce(findings);
      if (!pass.merged) break;
      findings = pass.findings;
      changed = true;
    }

    return changed ? { draft: { ...draft, findings }, changed } : { draft, changed };
  },
};
