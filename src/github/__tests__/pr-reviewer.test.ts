import test from 'node:test';
import assert from 'node:assert/strict';
import { ReviewRequest, ReviewResult } from '../../agents/review-engine-types';
import { silentLogger } from '../../logger';
import {
  InlineComment,
  PullRequestClient,
  PullRequestFile,
  PullRequestRef,
  PullRequestReviewer,
  ReviewEvent,
  buildUnifiedDiff,
  filterFiles,
  isLineInHunk,
} from '../pr-reviewer';

const AUTH_PATCH = [
  '@@ -20,3 +20,6 @@ def login(name):',
  '     user = None',
  '+    query = f"SELECT * FROM users WHERE name = \'{name}\'"',
  '+    cursor.execute(query)',
].join('\n');

const PR: PullRequestRef = {
  owner: 'octo',
  repo: 'app',
  number: 7,
  headSha: 'abc123',
  author: 'dev',
  branch: 'feature/login',
};

function file(filename: string, overrides: Partial<PullRequestFile> = {}): PullRequestFile {
  return { filename, status: 'modified', additions: 3, deletions: 1, changes: 4, patch: '@@ -1 +1 @@', ...overrides };
}

function reviewResult(findings: ReviewResult['findings']): ReviewResult {
  return {
    summary: 'Summary',
    score: 4,
    findings,
    metadata: {
      execution_time_ms: 10,
      tokens_used: 100,
      agent_count: 5,
      model: 'test-model',
      guardrails_applied: [],
      failed_analyzers: [],
      synthesis: 'model',
    },
  };
}

class FakeClient implements PullRequestClient {
  comments: string[] = [];
  reviews: { body: string; event: ReviewEvent; comments: InlineComment[] }[] = [];

  constructor(private readonly files: PullRequestFile[]) {}

  async listFiles(): Promise<PullRequestFile[]> {
    return this.files;
  }

  async createComment(_pr: PullRequestRef, body: string): Promise<void> {
    this.comments.push(body);
  }

  async createReview(
    _pr: PullRequestRef,
    review: { body: string; event: ReviewEvent; comments: InlineComment[] },
  ): Promise<void> {
    this.reviews.push(review);
  }
}

function reviewer(execute: (request: ReviewRequest) => Promise<ReviewResult>) {
  return new PullRequestReviewer({ execute }, [/package-lock\.json$/], silentLogger());
}

test('isLineInHunk checks the new-file range of every hunk', () => {
  const patch = `${AUTH_PATCH}\n@@ -40 +45 @@\n+x`;
  assert.equal(isLineInHunk(patch, 20), true);
  assert.equal(isLineInHunk(patch, 25), true);
  assert.equal(isLineInHunk(patch, 26), false);
  assert.equal(isLineInHunk(patch, 45), true);
  assert.equal(isLineInHunk(patch, 46), false);
});

test('filterFiles drops ignored, oversized and patch-less files and caps the count', () => {
  const files = [
    file('package-lock.json'),
    file('big.ts', { changes: 800 }),
    file('logo.png', { patch: undefined }),
    ...Array.from({ length: 16 }, (_, i) => file(`src/f${i}.ts`)),
  ];

  const { files: kept, stats } = filterFiles(files, [/package-lock\.json$/]);
  assert.equal(kept.length, 15);
  assert.equal(kept[0].filename, 'src/f0.ts');
  assert.equal(kept[14].filename, 'src/f14.ts');
  assert.deepEqual(stats, { total: 19, reviewed: 15, ignored: 1, tooLarge: 1, noPatch: 1 });
});

test('buildUnifiedDiff prefixes each patch with git file headers', () => {
  assert.equal(
    buildUnifiedDiff([file('a.py', { patch: '@@ -1 +1 @@\n+x' }), file('b.py', { patch: '@@ -2 +2 @@\n-y' })]),
    'diff --git a/a.py b/a.py\n--- a/a.py\n+++ b/a.py\n@@ -1 +1 @@\n+x\n' +
      'diff --git a/b.py b/b.py\n--- a/b.py\n+++ b/b.py\n@@ -2 +2 @@\n-y',
  );
});

test('posts a blocking review with inline comments on changed lines', async () => {
  const client = new FakeClient([
    file('app/auth.py', { patch: AUTH_PATCH }),
    file('package-lock.json', { changes: 150 }),
  ]);
  const requests: ReviewRequest[] = [];
  const status = await reviewer(async request => {
    requests.push(request);
    return reviewResult([
      {
        category: 'security',
        severity: 'critical',
        file: 'app/auth.py',
        line: 24,
        message: 'SQL injection through an f-string query',
        suggestion: 'Use a parameterized query',
      },
      { category: 'style', severity: 'low', file: 'app/auth.py', line: 90, message: 'Trailing whitespace' },
    ]);
  }).review(client, PR);

  assert.equal(status, 'reviewed');
  assert.deepEqual(requests, [
    {
      diff: `diff --git a/app/auth.py b/app/auth.py\n--- a/app/auth.py\n+++ b/app/auth.py\n${AUTH_PATCH}`,
      context: { repo: 'octo/app', pr_number: 7, commit_sha: 'abc123', author: 'dev', branch: 'feature/login' },
    },
  ]);

  assert.equal(client.comments.length, 0);
  assert.equal(client.reviews.length, 1);
  const [review] = client.reviews;
  assert.equal(review.event, 'REQUEST_CHANGES');
  assert.deepEqual(review.comments, [
    {
      path: 'app/auth.py',
      line: 24,
      side: 'RIGHT',
      body: '**[CRITICAL - SECURITY]** SQL injection through an f-string query\n\n💡 *Suggestion*: Use a parameterized query',
    },
  ]);
  assert.ok(review.body.startsWith('📊 **Coverage:** Reviewed 1 of 2 files (1 ignored)\n\n# 🤖 AI Code Review Report'));
});

test('uses a non-blocking review when nothing is high or critical', async () => {
  const client = new FakeClient([file('app/auth.py', { patch: AUTH_PATCH })]);
  await reviewer(async () =>
    reviewResult([{ category: 'style', severity: 'medium', file: 'app/auth.py', line: 21, message: 'Rename user' }]),
  ).review(client, PR);

  assert.equal(client.reviews[0].event, 'COMMENT');
  assert.equal(client.reviews[0].comments[0].body, '**[MEDIUM - STYLE]** Rename user\n\n💡 *Suggestion*: Review and address this issue.');
});

test('falls back to a plain comment when no finding lands on a changed line', async () => {
  const client = new FakeClient([file('app/auth.py', { patch: AUTH_PATCH })]);
  const status = await reviewer(async () =>
    reviewResult([{ category: 'logic', severity: 'high', file: 'app/auth.py', message: 'Missing return' }]),
  ).review(client, PR);

  assert.equal(status, 'reviewed');
  assert.equal(client.reviews.length, 0);
  assert.equal(client.comments.length, 1);
  assert.ok(client.comments[0].startsWith('# 🤖 AI Code Review Report\n'));
});

test('skips pull requests with nothing reviewable', async () => {
  const client = new FakeClient([file('package-lock.json')]);
  let called = false;
  const status = await reviewer(async () => {
    called = true;
    return reviewResult([]);
  }).review(client, PR);

  assert.equal(status, 'skipped');
  assert.equal(called, false);
  assert.deepEqual(client.comments, []);
});

test('reports a failed review as a comment', async () => {
  const client = new FakeClient([file('app/auth.py', { patch: AUTH_PATCH })]);
  const status = await reviewer(async () => {
    throw new Error('All 4 analyzers failed');
  }).review(client, PR);

  assert.equal(status, 'failed');
  assert.deepEqual(client.comments, [
    '🤖 **AI Code Review Error**\n\n⚠️ Failed to review PR: **All 4 analyzers failed**\n\nPlease check the application logs for details.',
  ]);
});

test('ignores a second event for a pull request already under review', async () => {
  const client = new FakeClient([file('app/auth.py', { patch: AUTH_PATCH })]);
  let release: (result: ReviewResult) => void = () => undefined;
  const pending = new Promise<ReviewResult>(resolve => {
    release = resolve;
  });
  const prReviewer = reviewer(() => pending);

  const first = prReviewer.review(client, PR);
  assert.equal(await prReviewer.review(client, PR), 'busy');
  release(reviewResult([]));
  assert.equal(await first, 'reviewed');
  assert.equal(await prReviewer.review(client, { ...PR }), 'reviewed');
});
