// src/config/config-loader.ts

import * as path from 'node:path';
import * as fs from 'node:fs';
import * as dotenv from 'dotenv';
import yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigError, errorMessage } from '../errors';
import { Logger } from '../logger';
import { findingCategorySchema } from '../agents/finding-schema';
import { AnalyzerTaskSpec, SynthesizerTaskSpec } from '../agents/agent-task-spec';
import { LLMProviderName } from './settings';

export const AGENTS_CONFIG_FILE = 'review-agents.yml';

export type PromptName = 'analyzer' | 'synthesizer';

const agentTextSchema = z.string().trim().min(1);

const analyzerSchema = z.object({
  role: z.string().regex(/^[a-z][a-z0-9_]*$/, 'role must be snake_case'),
  title: agentTextSchema,
  goal: agentTextSchema,
  backstory: agentTextSchema,
  focus_areas: z.array(agentTextSchema).min(1),
  categories: z.array(findingCategorySchema).nonempty(),
});

const agentsConfigSchema = z.object({
  version: z.union([z.string(), z.number()]),
  llm: z.object({
    temperature: z.number().min(0).max(2).default(0.1),
    providers: z.record(
      z.string(),
      z.object({ base_url: z.string().url() }),
    ),
  }),
  agents: z.object({
    analyzers: z
      .array(analyzerSchema)
      .min(1)
      .refine(list => new Set(list.map(a => a.role)).size === list.length, 'analyzer roles must be unique'),
    synthesizer: analyzerSchema.pick({ role: true, title: true, goal: true, backstory: true }),
  }),
});

export type AgentsConfig = z.infer<typeof agentsConfigSchema>;

const DEFAULT_IGNORE_PATTERNS = [
  /package-lock\.json$/,
  /yarn\.lock$/,
  /pnpm-lock\.yaml$/,
  /.*\.min\.js$/,
  /.*\.map$/,
];

/**
 * Loads `.env` files from the working directory and the config directory.
 * Values in `<configDir>/.env.agent` override the root `.env`.
 */
export function loadEnvironment(configDir: string, logger?: Logger): void {
  dotenv.config();
  const envAgentPath = path.resolve(process.cwd(), configDir, '.env.agent');
  if (fs.existsSync(envAgentPath)) {
    dotenv.config({ path: envAgentPath, override: true });
    logger?.info({ path: envAgentPath }, 'Loaded agent environment overrides');
  }
}

export class ConfigLoader {
  private readonly configDirRoot: string;
  private readonly config: AgentsConfig;
  private readonly prompts = new Map<PromptName, string>();

  constructor(baseDir: string, private readonly logger: Logger) {
    this.configDirRoot = path.resolve(process.cwd(), baseDir);
    this.config = this.load(path.join(this.configDirRoot, AGENTS_CONFIG_FILE));
    for (const name of ['analyzer', 'synthesizer'] as const) {
      this.prompts.set(name, this.readPrompt(name));
    }
  }

  private load(configPath: string): AgentsConfig {
    if (!fs.existsSync(configPath)) {
      throw new ConfigError(`Configuration file not found at: ${configPath}`);
    }

    let raw: unknown;
    try {
      raw = yaml.load(fs.readFileSync(configPath, 'utf8'));
    } catch (e) {
      throw new ConfigError(`Could not parse ${configPath}: ${errorMessage(e)}`);
    }

    const parsed = agentsConfigSchema.safeParse(raw);
    if (!parsed.success) {
      const problems = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new ConfigError(`Invalid configuration structure loaded from ${configPath}: ${problems}`);
    }

    this.logger.info(
      { path: configPath, analyzers: parsed.data.agents.analyzers.map(a => a.role) },
      'Loaded review agent configuration',
    );
    return parsed.data;
  }

  private readPrompt(name: PromptName): string {
    const promptPath = path.join(this.configDirRoot, 'prompts', `${name}.md`);
    let template: string;
    try {
      template = fs.readFileSync(promptPath, 'utf8');
    } catch (e) {
      throw new ConfigError(`Failed to load prompt template '${name}': ${errorMessage(e)}`);
    }
    if (template.trim().length === 0) {
      throw new ConfigError(`Prompt template '${name}' at ${promptPath} is empty`);
    }
    return template;
  }

  getAnalyzerSpecs(): AnalyzerTaskSpec[] {
    return this.config.agents.analyzers.map(a => ({
      role: a.role,
      title: a.title,
      goal: a.goal,
      backstory: a.backstory,
      focusAreas: a.focus_areas,
      categories: a.categories,
    }));
  }

  getSynthesizerSpec(): SynthesizerTaskSpec {
    return { ...this.config.agents.synthesizer };
  }

  getPromptTemplate(name: PromptName): string {
    const template = this.prompts.get(name);
    if (template === undefined) {
      throw new ConfigError(`Prompt template '${name}' was not loaded`);
    }
    return template;
  }

  getTemperature(): number {
    return this.config.llm.temperature;
  }

  getProviderBaseUrl(provider: LLMProviderName): string {
    const details = this.config.llm.providers[provider];
    if (!details) {
      throw new ConfigError(`Provider '${provider}' not found in configuration.`);
    }
    return details.base_url;
  }

  getIgnorePatterns(): RegExp[] {
    const filePath = path.join(this.configDirRoot, 'ignore-files.txt');

    let content: string;
    try {
      content = fs.readFileSync(filePath, 'utf8');
    } catch (e) {
      this.logger.warn({ path: filePath, err: e }, 'Could not load ignore patterns, using defaults');
      return [...DEFAULT_IGNORE_PATTERNS];
    }

    return content
      .split(/\r?\n/)
      .map(line => line.trim())
      .filter(line => line.length > 0 && !line.startsWith('#'))
      .map(pattern => new RegExp(pattern));
  }
}
