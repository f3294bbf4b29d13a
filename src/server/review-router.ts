// src/server/review-router.ts

import express, { NextFunction, Request, Response, Router } from 'express';
import { ReviewSettings } from '../config/settings';
import { RateLimitError, ReviewError } from '../errors';
import { Logger } from '../logger';
import { ReviewService } from '../service/review-service';
import { generateRequestId } from '../utils/diff-utils';

export interface ReviewRouterOptions {
  service: Pick<ReviewService, 'review' | 'model'>;
  settings: Pick<ReviewSettings, 'llmProvider' | 'maxDiffSizeBytes'>;
  logger: Logger;
  version: string;
}

interface ErrorBody {
  error: string;
  status_code: number;
  request_id: string;
  details?: Record<string, unknown>;
}

// JSON escaping can inflate a diff, so the body limit leaves headroom above the diff limit.
const BODY_LIMIT_FACTOR = 2;

function requestIdOf(res: Response): string {
  const id: unknown = res.locals.requestId;
  return typeof id === 'string' ? id : 'unknown';
}

function bearerToken(req: Request): string | undefined {
  const header = req.get('authorization');
  const match = header ? /^Bearer\s+(.+)$/i.exec(header.trim()) : null;
  return match ? match[1].trim() : undefined;
}

function isBodyParserError(err: unknown): err is Error & { status: number; type: string } {
  return (
    err instanceof Error &&
    'status' in err &&
    typeof err.status === 'number' &&
    'type' in err &&
    typeof err.type === 'string'
  );
}

export function createReviewRouter(options: ReviewRouterOptions): Router {
  const { service, settings, logger, version } = options;
  const router = express.Router();

  router.use((req: Request, res: Response, next: NextFunction) => {
    const requestId = generateRequestId();
    const startedAt = Date.now();
    res.locals.requestId = requestId;
    res.setHeader('X-Request-Id', requestId);

    logger.info({ requestId, method: req.method, path: req.path, client: req.ip ?? 'unknown' }, 'Request received');
    res.on('finish', () => {
      logger.info(
        { requestId, status: res.statusCode, durationMs: Date.now() - startedAt },
        'Request completed',
      );
    });
    next();
  });

  router.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      version,
      llm_provider: settings.llmProvider,
      model: service.model,
    });
  });

  router.post(
    '/review',
    express.json({ limit: settings.maxDiffSizeBytes * BODY_LIMIT_FACTOR }),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const payload: unknown = req.body;
        const result = await service.review(payload, bearerToken(req), requestIdOf(res));
        res.json(result);
      } catch (error) {
        next(error);
      }
    },
  );

  router.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const requestId = requestIdOf(res);
    let body: ErrorBody;

    if (err instanceof ReviewError) {
      body = { error: err.message, status_code: err.statusCode, request_id: requestId };
      const details = err.details();
      if (details) body.details = details;

      if (err.statusCode === 401) {
        res.setHeader('WWW-Authenticate', 'Bearer');
      }
      if (err instanceof RateLimitError) {
        res.setHeader('Retry-After', String(err.retryAfterSeconds));
      }
      if (err.statusCode >= 500) {
        logger.error({ requestId, err }, 'Review failed');
      }
    } else if (isBodyParserError(err) && err.status < 500) {
      const message = err.type === 'entity.too.large' ? 'Request body too large' : 'Malformed JSON body';
      body = { error: message, status_code: err.status, request_id: requestId };
    } else {
      logger.error({ requestId, err }, 'Unhandled exception');
      body = { error: 'Internal server error', status_code: 500, request_id: requestId };
    }

    res.status(body.status_code).json(body);
  });

  return router;
}
