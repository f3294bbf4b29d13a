import test from 'node:test';
import assert from 'node:assert/strict';
import { ProviderError } from '../../errors';
import { silentLogger } from '../../logger';
import { GenerateOptions, LLMCompletion, LLMProvider } from '../../providers';
import { LlmExecutionEngine } from '../execution-engine';

class ScriptedProvider implements LLMProvider {
  readonly name = 'Scripted';
  readonly model = 'scripted-model';
  maxOutputTokens = 1024;
  readonly signals: (AbortSignal | undefined)[] = [];

  constructor(private readonly reply: (prompt: string) => Promise<LLMCompletion>) {}

  generateReview(prompt: string, options: GenerateOptions = {}): Promise<LLMCompletion> {
    this.signals.push(options.signal);
    return this.reply(prompt);
  }
}

test('runTask returns the completion tagged with the task', async () => {
  const engine = new LlmExecutionEngine(
    new ScriptedProvider(async prompt => ({ text: `echo:${prompt}`, tokensUsed: 12 })),
    silentLogger(),
  );

  const output = await engine.runTask({ id: 't1', role: 'code_analyzer', prompt: 'hello' });
  assert.equal(output.taskId, 't1');
  assert.equal(output.role, 'code_analyzer');
  assert.equal(output.text, 'echo:hello');
  assert.equal(output.tokensUsed, 12);
  assert.equal(engine.model, 'scripted-model');
});

test('runParallel settles every task and keeps input order', async () => {
  const provider = new ScriptedProvider(async prompt => {
    if (prompt === 'bad') {
      throw new ProviderError('LLM API Error (Scripted): 500', 'http', 'Scripted', { status: 500 });
    }
    if (prompt === 'slow') {
      await new Promise(resolve => setTimeout(resolve, 20));
    }
    return { text: prompt, tokensUsed: 1 };
  });
  const engine = new LlmExecutionEngine(provider, silentLogger());
  const controller = new AbortController();

  const outcomes = await engine.runParallel(
    [
      { id: 'a', role: 'a', prompt: 'slow' },
      { id: 'b', role: 'b', prompt: 'bad' },
      { id: 'c', role: 'c', prompt: 'fast' },
    ],
    controller.signal,
  );

  assert.deepEqual(
    outcomes.map(o => [o.task.id, o.status]),
    [
      ['a', 'fulfilled'],
      ['b', 'rejected'],
      ['c', 'fulfilled'],
    ],
  );
  const rejected = outcomes[1];
  assert.equal(rejected.status, 'rejected');
  if (rejected.status === 'rejected') {
    assert.ok(rejected.error instanceof ProviderError);
    assert.equal(rejected.error.kind, 'http');
  }
  assert.deepEqual(provider.signals, [controller.signal, controller.signal, controller.signal]);
});

test('runParallel wraps non-Error rejections', async () => {
  const engine = new LlmExecutionEngine(
    new ScriptedProvider(() => Promise.reject('boom')),
    silentLogger(),
  );
  const [outcome] = await engine.runParallel([{ id: 'x', role: 'x', prompt: 'p' }]);
  assert.equal(outcome.status, 'rejected');
  if (outcome.status === 'rejected') {
    assert.equal(outcome.error.message, 'boom');
  }
});
