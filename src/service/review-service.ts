// src/service/review-service.ts

import { timingSafeEqual, createHash } from 'node:crypto';
import { reviewRequestSchema, reviewResultSchema } from '../agents/finding-schema';
import { OrchestratedReview, OrchestratorRequest, ReviewOrchestrator } from '../agents/review-orchestrator';
import { RawReviewResult, ReviewRequest, ReviewResult } from '../agents/review-engine-types';
import { ReviewSettings } from '../config/settings';
import { AuthError, RateLimitError, TimeoutError, ValidationError } from '../errors';
import { GuardrailPipeline } from '../guardrails/guardrail-pipeline';
import { Logger } from '../logger';
import { resolveLanguage, sanitizeDiff, utf8ByteLength } from '../utils/diff-utils';
import { SlidingWindowRateLimiter } from './rate-limiter';

export type ReviewServiceSettings = Pick<
  ReviewSettings,
  'reviewApiKey' | 'rateLimitPerMinute' | 'requestTimeoutSeconds' | 'maxDiffSizeBytes'
>;

export interface ReviewServiceDeps {
  orchestrator: Pick<ReviewOrchestrator, 'model' | 'run'>;
  guardrails: GuardrailPipeline;
  settings: ReviewServiceSettings;
  logger: Logger;
  rateLimiter?: SlidingWindowRateLimiter;
}

function digest(value: string): Buffer {
  return createHash('sha256').update(value).digest();
}

/**
 * Entry point for a review. `review` enforces the caller-facing policy
 * (credential, quota, payload shape) before any model call; `execute` is
 * the trusted path that runs the orchestration under one deadline.
 */
export class ReviewService {
  private readonly orchestrator: ReviewServiceDeps['orchestrator'];
  private readonly guardrails: GuardrailPipeline;
  private readonly settings: ReviewServiceSettings;
  private readonly logger: Logger;
  private readonly rateLimiter: SlidingWindowRateLimiter;

  constructor(deps: ReviewServiceDeps) {
    this.orchestrator = deps.orchestrator;
    this.guardrails = deps.guardrails;
    this.settings = deps.settings;
    this.logger = deps.logger;
    this.rateLimiter = deps.rateLimiter ?? new SlidingWindowRateLimiter(deps.settings.rateLimitPerMinute);
  }

  get model(): string {
    return this.orchestrator.model;
  }

  async review(payload: unknown, credential: string | undefined, requestId?: string): Promise<ReviewResult> {
    this.authenticate(credential);
    this.enforceRateLimit(credential);
    const request = this.validate(payload);
    return this.execute(request, requestId);
  }

  authenticate(credential: string | undefined): asserts credential is string {
    if (!credential) {
      throw new AuthError('Missing API key');
    }
    if (!timingSafeEqual(digest(credential), digest(this.settings.reviewApiKey))) {
      this.logger.warn({ keyPrefix: credential.slice(0, 4) }, 'Invalid API key attempt');
      throw new AuthError('Invalid API key');
    }
  }

  private enforceRateLimit(credential: string): void {
    const decision = this.rateLimiter.check(credential);
    if (!decision.allowed) {
      this.logger.warn({ retryAfterSeconds: decision.retryAfterSeconds }, 'Rate limit exceeded');
      throw new RateLimitError(
        `Rate limit exceeded. Maximum ${this.settings.rateLimitPerMinute} requests per minute.`,
        decision.retryAfterSeconds,
      );
    }
  }

  validate(payload: unknown): ReviewRequest {
    const parsed = reviewRequestSchema.safeParse(payload);
    if (!parsed.success) {
      const problems = parsed.error.issues.map(i => `${i.path.join('.') || 'body'}: ${i.message}`).join('; ');
      throw new ValidationError(`Invalid review request: ${problems}`);
    }

    const request = parsed.data;
    if (request.diff.trim().length === 0) {
      throw new ValidationError('Invalid review request: diff must not be empty');
    }
    this.assertWithinSizeLimit(request.diff);
    return request;
  }

  private assertWithinSizeLimit(diff: string): void {
    const size = utf8ByteLength(diff);
    if (size > this.settings.maxDiffSizeBytes) {
      throw new ValidationError(
        `Diff exceeds maximum size of ${this.settings.maxDiffSizeBytes} bytes (got ${size})`,
        'too_large',
      );
    }
  }

  async execute(request: ReviewRequest, requestId?: string): Promise<ReviewResult> {
    const startedAt = Date.now();
    const log = requestId ? this.logger.child({ requestId }) : this.logger;

    const diff = sanitizeDiff(request.diff);
    // Trusted callers skip validate(), the size limit still applies.
    this.assertWithinSizeLimit(diff);
    const orchestratorRequest: OrchestratorRequest = {
      diff,
      language: resolveLanguage(request.language, diff),
      context: request.context,
    };
    log.info(
      { language: orchestratorRequest.language, diffChars: diff.length },
      'Starting code review',
    );

    const outcome = await this.withDeadline(signal => this.orchestrator.run(orchestratorRequest, signal));

    const raw: RawReviewResult = {
      ...outcome.raw,
      metadata: {
        execution_time_ms: Date.now() - startedAt,
        tokens_used: outcome.tokensUsed,
        agent_count: outcome.agentCount,
        model: this.orchestrator.model,
        guardrails_applied: [],
        failed_analyzers: outcome.failures,
        synthesis: outcome.synthesis,
        ...(requestId ? { request_id: requestId } : {}),
      },
    };

    const result = this.guardrails.apply(raw, { diff });
    const checked = reviewResultSchema.safeParse(result);
    if (!checked.success) {
      throw new Error(`Guardrails produced an invalid review: ${checked.error.message}`);
    }

    log.info(
      {
        findings: result.findings.length,
        score: result.score,
        timeMs: result.metadata.execution_time_ms,
        tokens: result.metadata.tokens_used,
        guardrails: result.metadata.guardrails_applied,
        failedAnalyzers: outcome.failures.length,
      },
      'Review completed',
    );
    return result;
  }

  private async withDeadline(work: (signal: AbortSignal) => Promise<OrchestratedReview>): Promise<OrchestratedReview> {
    const timeoutSeconds = this.settings.requestTimeoutSeconds;
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const error = new TimeoutError(timeoutSeconds);
        this.logger.error({ timeoutSeconds }, 'Review timed out, cancelling in-flight agent calls');
        controller.abort(error);
        reject(error);
      }, timeoutSeconds * 1000);
    });

    try {
      return await Promise.race([work(controller.signal), deadline]);
    } finally {
      clearTimeout(timer);
    }
  }
}
