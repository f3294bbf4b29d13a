// src/agents/agent-task-spec.ts

import { FindingCategory, ReviewContextValue } from './review-engine-types';

/**
 * One role-scoped analysis pass. The four analyzers differ only in these
 * values; they share the prompt template and control flow.
 */
export interface AnalyzerTaskSpec {
  role: string;
  title: string;
  goal: string;
  backstory: string;
  focusAreas: string[];
  // First entry is the analyzer's primary category.
  categories: [FindingCategory, ...FindingCategory[]];
}

export interface SynthesizerTaskSpec {
  role: string;
  title: string;
  goal: string;
  backstory: string;
}

export interface PromptInput {
  diff: string;
  language: string;
  context?: Record<string, ReviewContextValue>;
}

export interface SynthesisPromptInput extends PromptInput {
  analyses: { role: string; findings: unknown[] }[];
  maxFindings: number;
}

function renderContext(context?: Record<string, ReviewContextValue>): string {
  const entries = Object.entries(context ?? {});
  if (entries.length === 0) {
    return 'None provided';
  }
  return entries.map(([key, value]) => `- ${key}: ${value === null ? 'null' : String(value)}`).join('\n');
}

// Single pass, so placeholder-like text inside a diff is never expanded.
function fill(template: string, values: Record<string, string>): string {
  return template.replace(/\[([A-Z_]+)\]/g, (placeholder: string, key: string) =>
    Object.hasOwn(values, key) ? values[key] : placeholder,
  );
}

export function buildAnalyzerPrompt(template: string, spec: AnalyzerTaskSpec, input: PromptInput): string {
  return fill(template, {
    ROLE: spec.title,
    GOAL: spec.goal,
    BACKSTORY: spec.backstory,
    FOCUS_AREAS: spec.focusAreas.map(area => `- ${area}`).join('\n'),
    CATEGORIES: spec.categories.join(', '),
    LANGUAGE: input.language,
    CONTEXT: renderContext(input.context),
    DIFF: input.diff,
  });
}

export function buildSynthesisPrompt(
  template: string,
  spec: SynthesizerTaskSpec,
  input: SynthesisPromptInput,
): string {
  const analyses = input.analyses
    .map(analysis => `### ${analysis.role}\n${JSON.stringify(analysis.findings, null, 2)}`)
    .join('\n\n');

  return fill(template, {
    ROLE: spec.title,
    GOAL: spec.goal,
    BACKSTORY: spec.backstory,
    LANGUAGE: input.language,
    CONTEXT: renderContext(input.context),
    MAX_FINDINGS: String(input.maxFindings),
    ANALYSES: analyses,
    DIFF: input.diff,
  });
}
