import test from 'node:test';
import assert from 'node:assert/strict';
import {
  detectLanguage,
  estimateTokens,
  extractFilesFromDiff,
  generateRequestId,
  resolveLanguage,
  sanitizeDiff,
  utf8ByteLength,
} from '../diff-utils';

const MULTI_FILE_DIFF = [
  'diff --git a/src/app.ts b/src/app.ts',
  '--- a/src/app.ts',
  '+++ b/src/app.ts',
  '@@ -1,2 +1,3 @@',
  '+import x from "y";',
  'diff --git a/scripts/seed.py b/scripts/seed.py',
  'new file mode 100644',
  '--- /dev/null',
  '+++ b/scripts/seed.py',
  '@@ -0,0 +1 @@',
  '+print("seed")',
  'diff --git a/src/util.ts b/src/util.ts',
  '--- a/src/util.ts',
  '+++ b/src/util.ts',
].join('\n');

test('extractFilesFromDiff lists every touched file once, sorted', () => {
  assert.deepEqual(extractFilesFromDiff(MULTI_FILE_DIFF), ['scripts/seed.py', 'src/app.ts', 'src/util.ts']);
  assert.deepEqual(extractFilesFromDiff('+just a line'), []);
});

test('sanitizeDiff strips NUL bytes and truncates long lines', () => {
  const sanitized = sanitizeDiff(`+a\u0000b\r\n+${'x'.repeat(1500)}`);
  const lines = sanitized.split('\n');
  assert.equal(lines[0], '+ab');
  assert.equal(lines[1].length, 1000);
});

test('detectLanguage picks the most common language', () => {
  assert.equal(detectLanguage(MULTI_FILE_DIFF), 'typescript');
  assert.equal(detectLanguage('diff --git a/Makefile b/Makefile'), undefined);
});

test('detectLanguage breaks ties by path order', () => {
  const diff = ['diff --git a/b/main.go b/b/main.go', 'diff --git a/a/app.py b/a/app.py'].join('\n');
  assert.equal(detectLanguage(diff), 'python');
});

test('resolveLanguage honours a hint unless it is auto', () => {
  assert.equal(resolveLanguage(' Kotlin ', MULTI_FILE_DIFF), 'kotlin');
  assert.equal(resolveLanguage('auto', MULTI_FILE_DIFF), 'typescript');
  assert.equal(resolveLanguage(undefined, MULTI_FILE_DIFF), 'typescript');
  assert.equal(resolveLanguage('auto', 'diff --git a/Makefile b/Makefile'), 'not specified');
});

test('estimateTokens uses four characters per token', () => {
  assert.equal(estimateTokens(''), 0);
  assert.equal(estimateTokens('abcde'), 2);
});

test('generateRequestId returns 16 hex characters', () => {
  const id = generateRequestId();
  assert.match(id, /^[0-9a-f]{16}$/);
  assert.notEqual(generateRequestId(), id);
});

test('utf8ByteLength counts encoded bytes', () => {
  assert.equal(utf8ByteLength('abc'), 3);
  assert.equal(utf8ByteLength('é'), 2);
});
