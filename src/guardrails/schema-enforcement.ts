// src/guardrails/schema-enforcement.ts

import { normalizeCategory, normalizeSeverity } from '../agents/finding-schema';
import { Finding } from '../agents/review-engine-types';
import { GuardrailOutcome } from './guardrail';

export const SCHEMA_ENFORCEMENT = 'schema_enforcement';

export const DEFAULT_SUMMARY = 'Code review completed';
export const DEFAULT_SCORE = 8;

const PLACEHOLDER_FILES = new Set(['unknown', 'n/a', 'none', '-']);
const NUMERIC = /^\s*-?\d+(?:\.\d+)?\s*$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function normalizeText(value: unknown): string | undefined {
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function normalizeFile(value: unknown): string | undefined {
  const file = normalizeText(value)?.replace(/^(?:\.\/)+/, '');
  return file && !PLACEHOLDER_FILES.has(file.toLowerCase()) ? file : undefined;
}

function normalizeLine(value: unknown): number | undefined {
  const line = typeof value === 'string' && /^\s*\d+\s*$/.test(value) ? Number(value) : value;
  return typeof line === 'number' && Number.isInteger(line) && line > 0 ? line : undefined;
}

/**
 * Returns undefined when the finding lacks a usable category or message.
 */
export function normalizeFinding(raw: unknown): Finding | undefined {
  if (!isRecord(raw)) return undefined;

  const category = normalizeCategory(raw.category);
  const message = normalizeText(raw.message);
  if (!category || !message) return undefined;

  const finding: Finding = { category, severity: normalizeSeverity(raw.severity), message };
  const file = normalizeFile(raw.file);
  const line = normalizeLine(raw.line);
  const suggestion = normalizeText(raw.suggestion);
  if (file) finding.file = file;
  if (line !== undefined) finding.line = line;
  if (suggestion) finding.suggestion = suggestion;
  return finding;
}

function differs(raw: Record<string, unknown>, normalized: Finding): boolean {
  const next: Record<string, unknown> = { ...normalized };
  const keys = new Set([...Object.keys(raw), ...Object.keys(next)]);
  for (const key of keys) {
    if (raw[key] !== next[key]) return true;
  }
  return false;
}

function normalizeScore(value: unknown): number {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && NUMERIC.test(value)) return Number(value);
  return DEFAULT_SCORE;
}

/**
 * First pipeline stage: turns untyped model output into a draft whose
 * findings all belong to the closed category and severity sets.
 */
export function enforceSchema(raw: { summary: unknown; score: unknown; findings: readonly unknown[] }): GuardrailOutcome {
  let changed = false;
  const findings: Finding[] = [];

  for (const candidate of raw.findings) {
    const finding = normalizeFinding(candidate);
    if (!finding) {
      changed = true;
      continue;
    }
    if (isRecord(candidate) && differs(candidate, finding)) {
      changed = true;
    }
    findings.push(finding);
  }

  const summary = normalizeText(raw.summary) ?? DEFAULT_SUMMARY;
  const score = normalizeScore(raw.score);
  if (summary !== raw.summary || score !== raw.score) {
    changed = true;
  }

  return { draft: { summary, score, findings }, changed };
}
