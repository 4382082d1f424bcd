import { z } from 'zod';

/** Telegram's hard limit on the length of one message. */
export const MAX_CHUNK_LEN = 4096;

export const PROVIDERS = ['gemini', 'openai', 'openrouter', 'deepseek', 'groq', 'anthropic'] as const;
export type ProviderName = (typeof PROVIDERS)[number];

const TelegramSchema = z.object({
  token: z.string().optional(),
  allowlist: z.array(z.string()).default([]),
});

const LLMSchema = z.object({
  provider: z.enum(PROVIDERS).default('gemini'),
  apiKey: z.string().optional(),
  apiBase: z.string().optional(),
  model: z.string().default('gemini-2.5-flash'),
  maxTokens: z.number().int().positive().optional(),
});

const RelaySchema = z.object({
  maxChunkLength: z.number().int().min(1).max(MAX_CHUNK_LEN).default(MAX_CHUNK_LEN),
  previewLength: z.number().int().min(1).default(50),
});

const MetricsSchema = z.object({
  cpuSampleMs: z.number().int().min(0).default(1000),
  diskPath: z.string().default('/'),
});

export const RelayConfigSchema = z.object({
  telegram: TelegramSchema.optional().transform(v => TelegramSchema.parse(v ?? {})),
  llm: LLMSchema.optional().transform(v => LLMSchema.parse(v ?? {})),
  relay: RelaySchema.optional().transform(v => RelaySchema.parse(v ?? {})),
  metrics: MetricsSchema.optional().transform(v => MetricsSchema.parse(v ?? {})),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type RelayConfig = z.infer<typeof RelayConfigSchema>;

/** The two secrets the relay cannot start without. */
export interface RelaySecrets {
  readonly telegramToken: string;
  readonly apiKey: string;
}
