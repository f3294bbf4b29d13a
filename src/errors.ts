// src/errors.ts

import { AnalyzerFailureRecord } from './agents/review-engine-types';

export type ReviewErrorCode =
  | 'validation_error'
  | 'auth_error'
  | 'rate_limit_error'
  | 'analysis_failure'
  | 'timeout_error';

/**
 * Base class for every failure the review service surfaces to a caller.
 * `statusCode` is the HTTP status the gateway answers with.
 */
export abstract class ReviewError extends Error {
  abstract readonly code: ReviewErrorCode;
  abstract readonly statusCode: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  details(): Record<string, unknown> | undefined {
    return undefined;
  }
}

export class ValidationError extends ReviewError {
  readonly code = 'validation_error';
  readonly statusCode: number;

  constructor(message: string, readonly reason: 'malformed' | 'too_large' = 'malformed') {
    super(message);
    this.statusCode = reason === 'too_large' ? 413 : 400;
  }
}

export class AuthError extends ReviewError {
  readonly code = 'auth_error';
  readonly statusCode = 401;
}

export class RateLimitError extends ReviewError {
  readonly code = 'rate_limit_error';
  readonly statusCode = 429;

  constructor(message: string, readonly retryAfterSeconds: number) {
    super(message);
  }
}

export class AnalysisFailure extends ReviewError {
  readonly code = 'analysis_failure';
  readonly statusCode = 500;

  constructor(readonly failures: AnalyzerFailureRecord[]) {
    super(`All ${failures.length} analyzers failed: ${failures.map(f => `${f.role} (${f.kind})`).join(', ')}`);
  }

  details(): Record<string, unknown> {
    return { failed_analyzers: this.failures };
  }
}

export class TimeoutError extends ReviewError {
  readonly code = 'timeout_error';
  readonly statusCode = 504;

  constructor(readonly timeoutSeconds: number) {
    super(`Review timed out after ${timeoutSeconds} seconds`);
  }
}

/** Invalid settings or agent configuration; fails startup. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export type ProviderErrorKind =
  | 'timeout'
  | 'aborted'
  | 'rate_limited'
  | 'http'
  | 'malformed_response'
  | 'network';

export class ProviderError extends Error {
  readonly status?: number;

  constructor(
    message: string,
    readonly kind: ProviderErrorKind,
    readonly provider: string,
    options?: { cause?: unknown; status?: number },
  ) {
    super(message, { cause: options?.cause });
    this.name = 'ProviderError';
    this.status = options?.status;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
