import test from 'node:test';
import assert from 'node:assert/strict';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { silentLogger } from '../../logger';
import { AGENTS_CONFIG_FILE, ConfigLoader } from '../config-loader';

const REPO_CONFIG_DIR = path.resolve(__dirname, '../../../config');

const MINIMAL_CONFIG = `
version: 1
llm:
  providers:
    openai:
      base_url: https://llm.test/v1
agents:
  analyzers:
    - role: code_analyzer
      title: Engineer
      goal: Find bugs
      backstory: Experienced.
      focus_areas: [Logic]
      categories: [logic, quality]
  synthesizer:
    role: review_synthesizer
    title: Lead
    goal: Merge
    backstory: Coordinates reviews.
`;

function tempConfigDir(files: Record<string, string>): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'review-config-'));
  for (const [name, content] of Object.entries(files)) {
    const target = path.join(dir, name);
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, content);
  }
  return dir;
}

const PROMPTS = { 'prompts/analyzer.md': '[ROLE] [DIFF]', 'prompts/synthesizer.md': '[ANALYSES]' };

test('loads the bundled agent configuration', () => {
  const loader = new ConfigLoader(REPO_CONFIG_DIR, silentLogger());

  assert.deepEqual(
    loader.getAnalyzerSpecs().map(spec => [spec.role, spec.categories[0]]),
    [
      ['code_analyzer', 'quality'],
      ['security_reviewer', 'security'],
      ['performance_reviewer', 'performance'],
      ['style_reviewer', 'style'],
    ],
  );
  assert.equal(loader.getSynthesizerSpec().role, 'review_synthesizer');
  assert.equal(loader.getTemperature(), 0.1);
  assert.equal(loader.getProviderBaseUrl('groq'), 'https://api.groq.com/openai/v1');
  assert.ok(loader.getPromptTemplate('analyzer').includes('[DIFF]'));
  assert.ok(loader.getPromptTemplate('synthesizer').includes('[ANALYSES]'));

  const ignore = loader.getIgnorePatterns();
  assert.equal(ignore.some(pattern => pattern.test('web/package-lock.json')), true);
  assert.equal(ignore.some(pattern => pattern.test('app/auth.py')), false);
});

test('fills defaults and maps snake_case fields', () => {
  const dir = tempConfigDir({ [AGENTS_CONFIG_FILE]: MINIMAL_CONFIG, ...PROMPTS });
  const loader = new ConfigLoader(dir, silentLogger());

  assert.equal(loader.getTemperature(), 0.1);
  assert.deepEqual(loader.getAnalyzerSpecs(), [
    {
      role: 'code_analyzer',
      title: 'Engineer',
      goal: 'Find bugs',
      backstory: 'Experienced.',
      focusAreas: ['Logic'],
      categories: ['logic', 'quality'],
    },
  ]);
  assert.throws(() => loader.getProviderBaseUrl('groq'), { message: "Provider 'groq' not found in configuration." });
});

test('falls back to default ignore patterns when the file is missing', () => {
  const dir = tempConfigDir({ [AGENTS_CONFIG_FILE]: MINIMAL_CONFIG, ...PROMPTS });
  const patterns = new ConfigLoader(dir, silentLogger()).getIgnorePatterns();
  assert.deepEqual(
    patterns.map(p => p.source),
    ['package-lock\\.json$', 'yarn\\.lock$', 'pnpm-lock\\.yaml$', '.*\\.min\\.js$', '.*\\.map$'],
  );
});

test('reads ignore patterns, skipping comments and blank lines', () => {
  const dir = tempConfigDir({
    [AGENTS_CONFIG_FILE]: MINIMAL_CONFIG,
    ...PROMPTS,
    'ignore-files.txt': '# generated\n\n\\.lock$\n  ^vendor/  \n',
  });
  const patterns = new ConfigLoader(dir, silentLogger()).getIgnorePatterns();
  assert.deepEqual(
    patterns.map(p => p.source),
    ['\\.lock$', '^vendor\\/'],
  );
});

test('rejects a missing file, invalid structure and missing prompts', () => {
  const empty = tempConfigDir({});
  assert.throws(() => new ConfigLoader(empty, silentLogger()), {
    name: 'ConfigError',
    message: `Configuration file not found at: ${path.join(empty, AGENTS_CONFIG_FILE)}`,
  });

  const duplicated = MINIMAL_CONFIG.replace(
    '  synthesizer:',
    [
      '    - role: code_analyzer',
      '      title: Again',
      '      goal: Again',
      '      backstory: Again.',
      '      focus_areas: [Logic]',
      '      categories: [logic]',
      '  synthesizer:',
    ].join('\n'),
  );
  assert.throws(
    () => new ConfigLoader(tempConfigDir({ [AGENTS_CONFIG_FILE]: duplicated, ...PROMPTS }), silentLogger()),
    /agents\.analyzers: analyzer roles must be unique/,
  );

  assert.throws(
    () => new ConfigLoader(tempConfigDir({ [AGENTS_CONFIG_FILE]: MINIMAL_CONFIG.replace('[logic, quality]', '[testing]') }), silentLogger()),
    /Invalid configuration structure/,
  );

  assert.throws(
    () => new ConfigLoader(tempConfigDir({ [AGENTS_CONFIG_FILE]: MINIMAL_CONFIG }), silentLogger()),
    /^ConfigError: Failed to load prompt template 'analyzer'/,
  );

  assert.throws(
    () =>
      new ConfigLoader(
        tempConfigDir({ [AGENTS_CONFIG_FILE]: MINIMAL_CONFIG, 'prompts/analyzer.md': '  \n', 'prompts/synthesizer.md': 'x' }),
        silentLogger(),
      ),
    /Prompt template 'analyzer' at .* is empty/,
  );
});
