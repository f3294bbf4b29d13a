// src/guardrails/severity-validation.ts

import { Guardrail } from './guardrail';

const SERIOUS_KEYWORDS = [
  'injection',
  'xss',
  'sql',
  'authentication',
  'authorization',
  'credential',
  'password',
  'secret',
  'token',
];

/** Raises low-severity security findings that describe a serious class of issue. */
export const severityValidation: Guardrail = {
  name: 'severity_validation',
  apply(draft) {
    let changed = false;
    const findings = draft.findings.map(finding => {
      if (finding.category !== 'security' || finding.severity !== 'low') {
        return finding;
      }
      const message = finding.message.toLowerCase();
      if (!SERIOUS_KEYWORDS.some(keyword => message.includes(keyword))) {
        return finding;
      }
      changed = true;
      return { ...finding, severity: 'medium' as const };
    });

    return changed ? { draft: { ...draft, findings }, changed } : { draft, changed };
  },
};
