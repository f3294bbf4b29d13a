// src/agents/output-parser.ts

export class MalformedOutputError extends Error {
  constructor(message: string, readonly snippet: string) {
    super(message);
    this.name = 'MalformedOutputError';
  }
}

export interface ParsedSynthesis {
  summary: unknown;
  score: unknown;
  findings: unknown[];
}

function snippetOf(text: string): string {
  return text.slice(0, 300);
}

/**
 * Pulls the outermost JSON object or array out of model text, tolerating
 * markdown fences and prose before or after it.
 */
export function extractJson(rawResponse: string, shape: 'object' | 'any' = 'any'): unknown {
  let jsonString = String(rawResponse ?? '').trim();
  if (!jsonString) {
    throw new MalformedOutputError('Model returned an empty response.', '');
  }

  jsonString = jsonString.replace(/^```(?:json)?\s*/i, '').replace(/\s*```$/i, '');

  const objectSlice = slice(jsonString, '{', '}');
  const arraySlice = shape === 'any' ? slice(jsonString, '[', ']') : undefined;
  // The earlier opener goes first; prose before the JSON may hold a stray bracket.
  const candidates = [objectSlice, arraySlice]
    .filter((c): c is { start: number; text: string } => c !== undefined)
    .sort((a, b) => a.start - b.start);

  if (candidates.length === 0) {
    throw new MalformedOutputError('Cannot find JSON boundaries in model response.', snippetOf(jsonString));
  }

  let firstError: unknown;
  for (const candidate of candidates) {
    try {
      return JSON.parse(candidate.text);
    } catch (error) {
      if (firstError === undefined) firstError = error;
    }
  }
  const reason = firstError instanceof Error ? firstError.message : String(firstError);
  throw new MalformedOutputError(`JSON syntax error in model response: ${reason}`, snippetOf(candidates[0].text));
}

function slice(text: string, open: string, close: string): { start: number; text: string } | undefined {
  const start = text.indexOf(open);
  const end = text.lastIndexOf(close);
  return start === -1 || end <= start ? undefined : { start, text: text.slice(start, end + 1) };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Analyzers may answer with `{"findings": [...]}` or a bare array. */
export function parseAnalyzerOutput(rawResponse: string): unknown[] {
  const data = extractJson(rawResponse);
  if (Array.isArray(data)) {
    return data;
  }
  if (isRecord(data) && Array.isArray(data.findings)) {
    return data.findings;
  }
  throw new MalformedOutputError('Analyzer output has no findings list.', snippetOf(rawResponse));
}

export function parseSynthesisOutput(rawResponse: string): ParsedSynthesis {
  const data = extractJson(rawResponse, 'object');
  if (!isRecord(data)) {
    throw new MalformedOutputError('Synthesis output is not a JSON object.', snippetOf(rawResponse));
  }
  if (data.findings !== undefined && !Array.isArray(data.findings)) {
    throw new MalformedOutputError('Synthesis output has an invalid findings list.', snippetOf(rawResponse));
  }
  return {
    summary: data.summary,
    score: data.score,
    findings: Array.isArray(data.findings) ? data.findings : [],
  };
}
