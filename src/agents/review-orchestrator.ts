// src/agents/review-orchestrator.ts

import { AnalysisFailure, ProviderError, errorMessage } from '../errors';
import { Logger } from '../logger';
import {
  AnalyzerTaskSpec,
  SynthesizerTaskSpec,
  buildAnalyzerPrompt,
  buildSynthesisPrompt,
} from './agent-task-spec';
import { AgentExecutionEngine, AgentTask } from './execution-engine';
import { normalizeCategory, normalizeSeverity } from './finding-schema';
import { MalformedOutputError, parseAnalyzerOutput, parseSynthesisOutput } from './output-parser';
import { AgentOutput, AnalyzerFailureRecord, FindingSeverity, ReviewContextValue } from './review-engine-types';

export interface OrchestratorRequest {
  diff: string;
  language: string;
  context?: Record<string, ReviewContextValue>;
}

export interface OrchestratorOptions {
  analyzers: AnalyzerTaskSpec[];
  synthesizer: SynthesizerTaskSpec;
  analyzerTemplate: string;
  synthesizerTemplate: string;
  maxFindings: number;
}

export interface OrchestratedReview {
  raw: { summary: unknown; score: unknown; findings: unknown[] };
  analyses: AgentOutput[];
  failures: AnalyzerFailureRecord[];
  synthesis: 'model' | 'fallback';
  tokensUsed: number;
  agentCount: number;
}

const FALLBACK_PENALTY: Record<FindingSeverity, number> = {
  critical: 3,
  high: 2,
  medium: 1,
  low: 0.5,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Keeps an analyzer to its own categories. A finding with no category gets
 * the analyzer's primary one; unrecognised categories are left for
 * schema enforcement.
 */
export function scopeFindings(spec: Pick<AnalyzerTaskSpec, 'categories'>, findings: readonly unknown[]): unknown[] {
  const primary = spec.categories[0];
  const scoped: unknown[] = [];

  for (const finding of findings) {
    if (!isRecord(finding)) {
      scoped.push(finding);
      continue;
    }
    if (!finding.category) {
      scoped.push({ ...finding, category: primary });
      continue;
    }
    const category = normalizeCategory(finding.category);
    if (category && !spec.categories.includes(category)) continue;
    scoped.push(finding);
  }
  return scoped;
}

/** Score used when synthesis is unavailable: 10 minus a per-severity penalty. */
export function computeFallbackScore(findings: readonly unknown[]): number {
  const penalty = findings.reduce<number>(
    (total, finding) => total + (isRecord(finding) ? FALLBACK_PENALTY[normalizeSeverity(finding.severity)] : 0),
    0,
  );
  return Math.max(0, 10 - penalty);
}

function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw signal.reason instanceof Error ? signal.reason : new Error('Review aborted');
  }
}

function failureKind(error: unknown): string {
  if (error instanceof ProviderError) return error.kind;
  if (error instanceof MalformedOutputError) return 'malformed_output';
  return 'error';
}

/**
 * Fan-out/fan-in review: every analyzer runs concurrently, then one
 * synthesis task sees all of their settled output.
 */
export class ReviewOrchestrator {
  constructor(
    private readonly engine: AgentExecutionEngine,
    private readonly options: OrchestratorOptions,
    private readonly logger: Logger,
  ) {}

  get model(): string {
    return this.engine.model;
  }

  async run(request: OrchestratorRequest, signal?: AbortSignal): Promise<OrchestratedReview> {
    const { analyses, failures, tokensUsed: analysisTokens } = await this.runAnalyzers(request, signal);
    throwIfAborted(signal);

    if (analyses.length === 0) {
      this.logger.error({ failures }, 'Every analyzer failed, skipping synthesis');
      throw new AnalysisFailure(failures);
    }
    if (failures.length > 0) {
      this.logger.warn(
        { failed: failures.map(f => f.role), succeeded: analyses.map(a => a.role) },
        'Partial analysis degradation, synthesizing from surviving analyzers',
      );
    }

    const synthesisTask: AgentTask = {
      id: this.options.synthesizer.role,
      role: this.options.synthesizer.role,
      prompt: buildSynthesisPrompt(this.options.synthesizerTemplate, this.options.synthesizer, {
        ...request,
        analyses: analyses.map(a => ({ role: a.role, findings: a.findings })),
        maxFindings: this.options.maxFindings,
      }),
    };

    try {
      const output = await this.engine.runTask(synthesisTask, signal);
      throwIfAborted(signal);
      const parsed = parseSynthesisOutput(output.text);
      return {
        raw: parsed,
        analyses,
        failures,
        synthesis: 'model',
        tokensUsed: analysisTokens + output.tokensUsed,
        agentCount: analyses.length + 1,
      };
    } catch (error) {
      throwIfAborted(signal);
      this.logger.warn(
        { err: error, kind: failureKind(error) },
        'Synthesis unavailable, merging analyzer findings instead',
      );
      const findings = analyses.flatMap(a => a.findings);
      return {
        raw: {
          summary: `Synthesis unavailable (${errorMessage(error)}); findings merged from ${analyses.length} analyzer(s).`,
          score: computeFallbackScore(findings),
          findings,
        },
        analyses,
        failures,
        synthesis: 'fallback',
        tokensUsed: analysisTokens,
        agentCount: analyses.length,
      };
    }
  }

  private async runAnalyzers(
    request: OrchestratorRequest,
    signal?: AbortSignal,
  ): Promise<{ analyses: AgentOutput[]; failures: AnalyzerFailureRecord[]; tokensUsed: number }> {
    const specs = new Map(this.options.analyzers.map(spec => [spec.role, spec]));
    const tasks: AgentTask[] = this.options.analyzers.map(spec => ({
      id: spec.role,
      role: spec.role,
      prompt: buildAnalyzerPrompt(this.options.analyzerTemplate, spec, request),
    }));

    this.logger.info({ analyzers: tasks.map(t => t.role) }, 'Running analyzers in parallel');
    const outcomes = await this.engine.runParallel(tasks, signal);

    const analyses: AgentOutput[] = [];
    const failures: AnalyzerFailureRecord[] = [];
    let tokensUsed = 0;

    for (const outcome of outcomes) {
      const role = outcome.task.role;
      if (outcome.status === 'rejected') {
        failures.push({ role, kind: failureKind(outcome.error), error: outcome.error.message });
        continue;
      }

      tokensUsed += outcome.output.tokensUsed;
      try {
        const parsed = parseAnalyzerOutput(outcome.output.text);
        const spec = specs.get(role);
        const findings = spec ? scopeFindings(spec, parsed) : parsed;
        if (findings.length < parsed.length) {
          this.logger.warn(
            { role, dropped: parsed.length - findings.length, categories: spec?.categories },
            'Dropped analyzer findings outside its categories',
          );
        }
        analyses.push({ role, findings, tokensUsed: outcome.output.tokensUsed });
      } catch (error) {
        failures.push({ role, kind: failureKind(error), error: errorMessage(error) });
      }
    }

    return { analyses, failures, tokensUsed };
  }
}
