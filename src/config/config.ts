import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { parse as parseDotenv } from 'dotenv';
import { ZodError } from 'zod';
import { RelayConfigSchema, type RelayConfig, type RelaySecrets, type ProviderName } from './schema.js';
import { ConfigurationError } from '../errors.js';

export interface LoadConfigOptions {
  overrides?: Record<string, unknown>;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  /** Load `.env` from `cwd` into `env` first. Default true. */
  dotenv?: boolean;
}

/**
 * Load config with priority: CLI overrides > env vars > relay.json > user json > defaults.
 * The result is frozen; it is built once and passed to everything that needs it.
 */
export async function loadConfig(opts: LoadConfigOptions = {}): Promise<Readonly<RelayConfig>> {
  const env = opts.env ?? process.env;
  const cwd = opts.cwd ?? '.';

  if (opts.dotenv ?? true) {
    await applyDotenv(resolve(cwd, '.env'), env);
  }

  const workspaceConfig = await loadJSON(resolve(cwd, 'relay.json'));

  const home = env.HOME || env.USERPROFILE || '';
  const userConfig = home ? await loadJSON(resolve(home, '.chat-relay', 'config.json')) : {};

  const merged = deepMerge(userConfig, workspaceConfig, loadEnvVars(env), opts.overrides ?? {});

  try {
    return Object.freeze(RelayConfigSchema.parse(merged));
  } catch (err) {
    if (err instanceof ZodError) {
      const issues = err.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
      throw new ConfigurationError(`Invalid configuration: ${issues}`);
    }
    throw err;
  }
}

const KEY_VARS: ReadonlyArray<[string, ProviderName]> = [
  ['GEMINI_API_KEY', 'gemini'],
  ['OPENROUTER_API_KEY', 'openrouter'],
  ['ANTHROPIC_API_KEY', 'anthropic'],
  ['OPENAI_API_KEY', 'openai'],
  ['DEEPSEEK_API_KEY', 'deepseek'],
  ['GROQ_API_KEY', 'groq'],
];

export function loadEnvVars(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  // Priority follows KEY_VARS order; the first key found also picks the provider
  const found = KEY_VARS.find(([name]) => env[name]);

  const llm: Record<string, unknown> = {
    ...(found ? { apiKey: env[found[0]], provider: found[1] } : {}),
    ...(env.RELAY_MODEL ? { model: env.RELAY_MODEL } : {}),
    ...(env.RELAY_API_BASE ? { apiBase: env.RELAY_API_BASE } : {}),
  };
  if (Object.keys(llm).length > 0) result.llm = llm;

  const token = env.TELEGRAM_TOKEN || env.TELEGRAM_BOT_TOKEN;
  if (token) {
    result.telegram = { token };
  }

  if (env.LOG_LEVEL) {
    result.logLevel = env.LOG_LEVEL.toLowerCase();
  }

  return result;
}

/**
 * Extract the required secrets, or fail naming every one that is missing.
 */
export function requireSecrets(config: RelayConfig): RelaySecrets {
  const missing: string[] = [];
  if (!config.telegram.token) missing.push('TELEGRAM_TOKEN');
  if (!config.llm.apiKey) missing.push(apiKeyVar(config.llm.provider));

  if (!config.telegram.token || !config.llm.apiKey) {
    throw new ConfigurationError(`Missing required environment variable(s): ${missing.join(', ')}`, missing);
  }

  return Object.freeze({ telegramToken: config.telegram.token, apiKey: config.llm.apiKey });
}

/** The provider key alone, for local modes that never talk to Telegram. */
export function requireApiKey(config: RelayConfig): string {
  if (!config.llm.apiKey) {
    const name = apiKeyVar(config.llm.provider);
    throw new ConfigurationError(`Missing required environment variable(s): ${name}`, [name]);
  }
  return config.llm.apiKey;
}

export function apiKeyVar(provider: ProviderName): string {
  return `${provider.toUpperCase()}_API_KEY`;
}

/** Copy `.env` entries into `env`; variables already set win. */
async function applyDotenv(path: string, env: NodeJS.ProcessEnv): Promise<void> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch {
    return;
  }
  for (const [key, value] of Object.entries(parseDotenv(content))) {
    if (env[key] === undefined) env[key] = value;
  }
}

async function loadJSON(path: string): Promise<Record<string, unknown>> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch {
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(content);
    return isRecord(parsed) ? parsed : {};
  } catch (err) {
    throw new ConfigurationError(`Invalid JSON in ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge(...objects: Record<string, unknown>[]): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const obj of objects) {
    for (const [key, value] of Object.entries(obj)) {
      const existing = result[key];
      if (isRecord(value) && isRecord(existing)) {
        result[key] = deepMerge(existing, value);
      } else if (value !== undefined) {
        result[key] = value;
      }
    }
  }
  return result;
}
