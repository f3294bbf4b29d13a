import test from 'node:test';
import assert from 'node:assert/strict';
import { AnalyzerTaskSpec, buildAnalyzerPrompt, buildSynthesisPrompt } from '../agent-task-spec';

const securitySpec: AnalyzerTaskSpec = {
  role: 'security_reviewer',
  title: 'Application Security Engineer',
  goal: 'Find vulnerabilities',
  backstory: 'Penetration tester.',
  focusAreas: ['Injection', 'Secrets'],
  categories: ['security'],
};

test('buildAnalyzerPrompt fills every placeholder', () => {
  const template = '[ROLE]|[GOAL]|[BACKSTORY]\n[FOCUS_AREAS]\n[CATEGORIES]|[LANGUAGE]\n[CONTEXT]\n[DIFF]';
  const prompt = buildAnalyzerPrompt(template, securitySpec, {
    diff: '+x = 1',
    language: 'python',
    context: { repo: 'octo/app', pr_number: 3, branch: null },
  });

  assert.equal(
    prompt,
    'Application Security Engineer|Find vulnerabilities|Penetration tester.\n' +
      '- Injection\n- Secrets\n' +
      'security|python\n' +
      '- repo: octo/app\n- pr_number: 3\n- branch: null\n' +
      '+x = 1',
  );
});

test('buildAnalyzerPrompt renders a missing context and leaves unknown placeholders alone', () => {
  const prompt = buildAnalyzerPrompt('[CONTEXT] [UNKNOWN]', securitySpec, { diff: '', language: 'go' });
  assert.equal(prompt, 'None provided [UNKNOWN]');
});

test('placeholder text inside the diff is not expanded', () => {
  const prompt = buildAnalyzerPrompt('[DIFF] / [ROLE]', securitySpec, { diff: '+// [ROLE] [GOAL]', language: 'ts' });
  assert.equal(prompt, '+// [ROLE] [GOAL] / Application Security Engineer');
});

test('buildSynthesisPrompt lists every analysis and the findings cap', () => {
  const prompt = buildSynthesisPrompt(
    '[ROLE]: keep [MAX_FINDINGS]\n[ANALYSES]',
    { role: 'review_synthesizer', title: 'Review Lead', goal: 'g', backstory: 'b' },
    {
      diff: '',
      language: 'python',
      maxFindings: 20,
      analyses: [
        { role: 'code_analyzer', findings: [] },
        { role: 'security_reviewer', findings: [{ message: 'm' }] },
      ],
    },
  );
  assert.equal(
    prompt,
    'Review Lead: keep 20\n### code_analyzer\n[]\n\n### security_reviewer\n[\n  {\n    "message": "m"\n  }\n]',
  );
});
