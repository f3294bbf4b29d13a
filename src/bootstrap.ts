// src/bootstrap.ts

import { Router } from 'express';
import { LlmExecutionEngine } from './agents/execution-engine';
import { ReviewOrchestrator } from './agents/review-orchestrator';
import { ConfigLoader, loadEnvironment } from './config/config-loader';
import { ReviewSettings, loadSettings } from './config/settings';
import { PullRequestReviewer } from './github/pr-reviewer';
import { GuardrailPipeline } from './guardrails/guardrail-pipeline';
import { Logger, createLogger } from './logger';
import { createProvider } from './providers';
import { createReviewRouter } from './server/review-router';
import { ReviewService } from './service/review-service';
import { VERSION } from './version';

export interface ReviewGateway {
  settings: ReviewSettings;
  logger: Logger;
  service: ReviewService;
  reviewer: PullRequestReviewer;
  createRouter(): Router;
}

/**
 * Wires the review pipeline from the environment and the config directory.
 * Throws ConfigError when either is invalid.
 */
export function createReviewGateway(env: NodeJS.ProcessEnv = process.env): ReviewGateway {
  loadEnvironment(env.CONFIG_DIR ?? 'config');
  const settings = loadSettings(env);
  const logger = createLogger(settings.logLevel);

  const configLoader = new ConfigLoader(settings.configDir, logger.child({ component: 'config' }));
  const llm = createProvider(settings, {
    configuredHost: configLoader.getProviderBaseUrl(settings.llmProvider),
    temperature: configLoader.getTemperature(),
  });
  logger.info({ provider: llm.name, model: llm.model }, 'LLM provider initialized');

  const orchestrator = new ReviewOrchestrator(
    new LlmExecutionEngine(llm, logger.child({ component: 'engine' })),
    {
      analyzers: configLoader.getAnalyzerSpecs(),
      synthesizer: configLoader.getSynthesizerSpec(),
      analyzerTemplate: configLoader.getPromptTemplate('analyzer'),
      synthesizerTemplate: configLoader.getPromptTemplate('synthesizer'),
      maxFindings: settings.maxFindingsPerReview,
    },
    logger.child({ component: 'orchestrator' }),
  );

  const service = new ReviewService({
    orchestrator,
    guardrails: new GuardrailPipeline(
      { maxFindingsPerReview: settings.maxFindingsPerReview },
      logger.child({ component: 'guardrails' }),
    ),
    settings,
    logger: logger.child({ component: 'service' }),
  });

  const reviewer = new PullRequestReviewer(
    service,
    configLoader.getIgnorePatterns(),
    logger.child({ component: 'pr-reviewer' }),
  );

  return {
    settings,
    logger,
    service,
    reviewer,
    createRouter: () =>
      createReviewRouter({ service, settings, logger: logger.child({ component: 'http' }), version: VERSION }),
  };
}
