// src/agents/execution-engine.ts

import { Logger } from '../logger';
import { LLMProvider } from '../providers';

export interface AgentTask {
  id: string;
  role: string;
  prompt: string;
}

export interface TaskOutput {
  taskId: string;
  role: string;
  text: string;
  tokensUsed: number;
  durationMs: number;
}

export type TaskOutcome =
  | { status: 'fulfilled'; task: AgentTask; output: TaskOutput }
  | { status: 'rejected'; task: AgentTask; error: Error };

/**
 * Runs role-scoped prompt tasks: a batch concurrently, or one on its own.
 * Callers sequence the phases; the engine keeps no state between calls.
 */
export interface AgentExecutionEngine {
  readonly model: string;
  runParallel(tasks: readonly AgentTask[], signal?: AbortSignal): Promise<TaskOutcome[]>;
  runTask(task: AgentTask, signal?: AbortSignal): Promise<TaskOutput>;
}

function toError(reason: unknown): Error {
  return reason instanceof Error ? reason : new Error(String(reason));
}

export class LlmExecutionEngine implements AgentExecutionEngine {
  constructor(
    private readonly llm: LLMProvider,
    private readonly logger: Logger,
  ) {}

  get model(): string {
    return this.llm.model;
  }

  async runTask(task: AgentTask, signal?: AbortSignal): Promise<TaskOutput> {
    const startedAt = Date.now();
    this.logger.debug({ task: task.id, promptChars: task.prompt.length }, 'Starting agent task');

    const completion = await this.llm.generateReview(task.prompt, { signal });
    const durationMs = Date.now() - startedAt;

    this.logger.debug(
      { task: task.id, durationMs, responseChars: completion.text.length, tokens: completion.tokensUsed },
      'Agent task completed',
    );
    return {
      taskId: task.id,
      role: task.role,
      text: completion.text,
      tokensUsed: completion.tokensUsed,
      durationMs,
    };
  }

  async runParallel(tasks: readonly AgentTask[], signal?: AbortSignal): Promise<TaskOutcome[]> {
    const settled = await Promise.allSettled(tasks.map(task => this.runTask(task, signal)));

    return settled.map((result, index): TaskOutcome => {
      const task = tasks[index];
      if (result.status === 'fulfilled') {
        return { status: 'fulfilled', task, output: result.value };
      }
      return { status: 'rejected', task, error: toError(result.reason) };
    });
  }
}
