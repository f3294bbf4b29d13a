// src/utils/diff-utils.ts

import { randomUUID, createHash } from 'node:crypto';

const MAX_LINE_LENGTH = 1000;
const REQUEST_ID_LENGTH = 16;
const CHARS_PER_TOKEN = 4;

export const UNSPECIFIED_LANGUAGE = 'not specified';

const FILE_HEADER_PATTERNS = [
  /^diff --git a\/(.*?) b\//,
  /^\+\+\+ b\/(.*)$/,
  /^--- a\/(.*)$/,
];

const EXTENSION_LANGUAGES = new Map<string, string>(Object.entries({
  py: 'python',
  js: 'javascript',
  jsx: 'javascript',
  mjs: 'javascript',
  cjs: 'javascript',
  ts: 'typescript',
  tsx: 'typescript',
  java: 'java',
  go: 'go',
  rs: 'rust',
  cpp: 'c++',
  cc: 'c++',
  c: 'c',
  rb: 'ruby',
  php: 'php',
  swift: 'swift',
  kt: 'kotlin',
  scala: 'scala',
  cs: 'csharp',
}));

/**
 * Paths named by the diff's file headers, sorted and without `/dev/null`.
 */
export function extractFilesFromDiff(diff: string): string[] {
  const files = new Set<string>();

  for (const line of diff.split(/\r?\n/)) {
    for (const pattern of FILE_HEADER_PATTERNS) {
      const match = pattern.exec(line);
      if (match && match[1] !== '/dev/null') {
        files.add(match[1].trim());
      }
    }
  }

  return [...files].sort();
}

export function sanitizeDiff(diff: string): string {
  return diff
    .replace(/\u0000/g, '')
    .split(/\r?\n/)
    .map(line => line.slice(0, MAX_LINE_LENGTH))
    .join('\n');
}

/**
 * Most common language among the diff's files wins; ties go to the
 * language seen first in path order.
 */
export function detectLanguage(diff: string): string | undefined {
  const counts = new Map<string, number>();

  for (const file of extractFilesFromDiff(diff)) {
    const dot = file.lastIndexOf('.');
    if (dot === -1) continue;
    const language = EXTENSION_LANGUAGES.get(file.slice(dot + 1).toLowerCase());
    if (!language) continue;
    counts.set(language, (counts.get(language) ?? 0) + 1);
  }

  let best: string | undefined;
  let bestCount = 0;
  for (const [language, count] of counts) {
    if (count > bestCount) {
      best = language;
      bestCount = count;
    }
  }
  return best;
}

export function resolveLanguage(requested: string | undefined, diff: string): string {
  const hint = requested?.trim().toLowerCase();
  if (hint && hint !== 'auto') {
    return hint;
  }
  return detectLanguage(diff) ?? UNSPECIFIED_LANGUAGE;
}

export function estimateTokens(text: string): number {
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

export function generateRequestId(): string {
  return createHash('sha256')
    .update(`${Date.now()}-${randomUUID()}`)
    .digest('hex')
    .slice(0, REQUEST_ID_LENGTH);
}

export function utf8ByteLength(text: string): number {
  return Buffer.byteLength(text, 'utf8');
}
