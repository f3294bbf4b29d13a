// src/guardrails/file-validation.ts

import { extractFilesFromDiff } from '../utils/diff-utils';
import { Guardrail } from './guardrail';

/** Drops findings that point at a file the diff never touches. */
export const fileValidation: Guardrail = {
  name: 'file_validation',
  apply(draft, context) {
    const validFiles = new Set(extractFilesFromDiff(context.diff));
    if (validFiles.size === 0) {
      return { draft, changed: false };
    }

    const findings = draft.findings.filter(f => f.file === undefined || validFiles.has(f.file));
    if (findings.length === draft.findings.length) {
      return { draft, changed: false };
    }
    return { draft: { ...draft, findings }, changed: true };
  },
};
