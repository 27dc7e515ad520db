import { existsSync } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';
import { RelayError } from '@reasoning-relay/chat-contract';
import {
  DEFAULT_ANSWER_API_URL,
  DEFAULT_ANSWER_MAX_TOKENS,
  DEFAULT_ANSWER_MODEL,
  DEFAULT_ANSWER_TEMPERATURE,
  DEFAULT_REASONING_API_URL,
  DEFAULT_REASONING_MODEL,
} from '@reasoning-relay/chat-llm';
import { DEFAULT_RELAY_TIMEOUT_MS, MAX_TIMER_DELAY_MS } from '@reasoning-relay/chat-orchestrator';
import { loadRelayEnv, type EnvRecord } from './env';
import { formatIssues } from './validation';

export const DEFAULT_CONFIG_FILE = 'relay.config.yml';

export const ANSWER_PROVIDERS = ['openai-compatible', 'openai', 'anthropic'] as const;

export type AnswerProviderKind = (typeof ANSWER_PROVIDERS)[number];

export const RelayConfigSchema = z.object({
  reasoning: z.object({
    apiKey: z.string().min(1),
    apiUrl: z.string().url().default(DEFAULT_REASONING_API_URL),
    model: z.string().min(1).default(DEFAULT_REASONING_MODEL),
    channel: z.enum(['field', 'marker']).optional(),
  }),
  answer: z.object({
    provider: z.enum(ANSWER_PROVIDERS).default('openai-compatible'),
    apiKey: z.string().min(1),
    /** Base URL for the SDK providers; full endpoint for `openai-compatible`. */
    apiUrl: z.string().url().optional(),
    model: z.string().min(1).default(DEFAULT_ANSWER_MODEL),
    maxTokens: z.coerce.number().int().positive().default(DEFAULT_ANSWER_MAX_TOKENS),
    temperature: z.coerce.number().min(0).max(2).default(DEFAULT_ANSWER_TEMPERATURE),
    referer: z.string().optional(),
    title: z.string().optional(),
  }),
  timeoutMs: z.coerce.number().int().nonnegative().max(MAX_TIMER_DELAY_MS).default(DEFAULT_RELAY_TIMEOUT_MS),
});

export type RelayConfig = z.infer<typeof RelayConfigSchema>;

export type LoadRelayConfigOptions = {
  env?: EnvRecord;
  cwd?: string;
  envFiles?: string[];
  /** Overrides RELAY_CONFIG_FILE and the default relay.config.yml lookup. */
  configFile?: string;
};

type Section = Record<string, unknown>;

const REASONING_ENV_KEYS: Record<string, string> = {
  apiKey: 'REASONING_API_KEY',
  apiUrl: 'REASONING_API_URL',
  model: 'REASONING_MODEL',
  channel: 'REASONING_CHANNEL',
};

const ANSWER_ENV_KEYS: Record<string, string> = {
  provider: 'ANSWER_PROVIDER',
  apiKey: 'ANSWER_API_KEY',
  apiUrl: 'ANSWER_API_URL',
  model: 'ANSWER_MODEL',
  maxTokens: 'ANSWER_MAX_TOKENS',
  temperature: 'ANSWER_TEMPERATURE',
  referer: 'ANSWER_HTTP_REFERER',
  title: 'ANSWER_X_TITLE',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readSection(value: unknown): Section {
  return isRecord(value) ? { ...value } : {};
}

function overlayEnv(section: Section, env: EnvRecord, keys: Record<string, string>): Section {
  for (const [field, envKey] of Object.entries(keys)) {
    const value = env[envKey]?.trim();
    if (value) {
      section[field] = value;
    }
  }
  return section;
}

function requireSetting(section: Section, field: string, envKey: string) {
  const value = section[field];
  if (typeof value !== 'string' || !value.trim()) {
    throw new RelayError('invalid_config', `${envKey} is required`, { details: { key: envKey } });
  }
}

export async function loadConfigFile(configPath: string): Promise<unknown> {
  const ext = path.extname(configPath).toLowerCase();
  const contents = await fs.readFile(configPath, 'utf-8');

  if (ext === '.json') {
    return JSON.parse(contents);
  }
  if (ext === '.yml' || ext === '.yaml') {
    return YAML.parse(contents);
  }

  throw new RelayError('invalid_config', `Unsupported config format for ${configPath}. Use .json or .yaml`);
}

function resolveConfigPath(explicit: string | undefined, cwd: string): string | null {
  if (explicit) {
    const absolute = path.resolve(cwd, explicit);
    if (!existsSync(absolute)) {
      throw new RelayError('invalid_config', `Config file not found: ${explicit}`);
    }
    return absolute;
  }
  const fallback = path.resolve(cwd, DEFAULT_CONFIG_FILE);
  return existsSync(fallback) ? fallback : null;
}

/**
 * Resolves the relay configuration from env files, an optional JSON/YAML
 * file and the environment, in increasing order of precedence.
 */
export async function loadRelayConfig(options: LoadRelayConfigOptions = {}): Promise<RelayConfig> {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  loadRelayEnv({ files: options.envFiles, cwd, env });

  const configPath = resolveConfigPath(options.configFile ?? env.RELAY_CONFIG_FILE, cwd);
  const fileValues = readSection(configPath ? await loadConfigFile(configPath) : undefined);

  const reasoning = overlayEnv(readSection(fileValues.reasoning), env, REASONING_ENV_KEYS);
  const answer = overlayEnv(readSection(fileValues.answer), env, ANSWER_ENV_KEYS);
  const timeoutMs = env.RELAY_TIMEOUT_MS?.trim() || fileValues.timeoutMs;

  requireSetting(reasoning, 'apiKey', 'REASONING_API_KEY');
  requireSetting(answer, 'apiKey', 'ANSWER_API_KEY');

  const parsed = RelayConfigSchema.safeParse({ reasoning, answer, timeoutMs });
  if (!parsed.success) {
    throw new RelayError('invalid_config', `Invalid relay configuration: ${formatIssues(parsed.error)}`, {
      details: { issues: parsed.error.issues },
    });
  }
  return parsed.data;
}

export function resolveAnswerApiUrl(config: RelayConfig['answer']): string {
  return config.apiUrl ?? DEFAULT_ANSWER_API_URL;
}
