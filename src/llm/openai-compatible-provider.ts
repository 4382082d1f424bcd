import OpenAI from 'openai';
import type { LLMProvider } from './types.js';
import type { ProviderName } from '../config/schema.js';
import { AnthropicProvider } from './anthropic-provider.js';
import { ProviderError } from '../errors.js';
import * as log from '../utils/logger.js';

const PROVIDER_DEFAULTS: Record<Exclude<ProviderName, 'anthropic'>, { apiBase: string }> = {
  gemini: {
    apiBase: 'https://generativelanguage.googleapis.com/v1beta/openai/',
  },
  openrouter: {
    apiBase: 'https://openrouter.ai/api/v1',
  },
  openai: {
    apiBase: 'https://api.openai.com/v1',
  },
  deepseek: {
    apiBase: 'https://api.deepseek.com/v1',
  },
  groq: {
    apiBase: 'https://api.groq.com/openai/v1',
  },
};

/** The part of the OpenAI client the provider calls; `OpenAI` satisfies it. */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(params: OpenAI.ChatCompletionCreateParamsNonStreaming): Promise<{
        choices: Array<{ message: { content: string | null }; finish_reason: string | null }>;
        usage?: { total_tokens: number } | null;
      }>;
    };
  };
}

/**
 * OpenAI-compatible provider using the official OpenAI SDK.
 * Gemini is reached through Google's OpenAI-compatible endpoint.
 * Retries are disabled: a failed generation is reported once, never repeated.
 */
export class OpenAICompatibleProvider implements LLMProvider {
  readonly name: string;
  private client: ChatCompletionsClient;
  private maxTokens?: number;

  constructor(config: {
    apiKey: string;
    apiBase: string;
    name: string;
    maxTokens?: number;
    client?: ChatCompletionsClient;
  }) {
    this.client = config.client ?? new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.apiBase,
      maxRetries: 0,
    });
    this.name = config.name;
    this.maxTokens = config.maxTokens;
  }

  async generate(model: string, text: string): Promise<string> {
    log.debug(`LLM [${this.name}]: model=${model}, chars=${text.length}`);

    let response: Awaited<ReturnType<ChatCompletionsClient['chat']['completions']['create']>>;
    try {
      response = await this.client.chat.completions.create({
        model,
        messages: [{ role: 'user', content: text }],
        ...(this.maxTokens ? { max_tokens: this.maxTokens } : {}),
      });
    } catch (err) {
      throw wrapOpenAIError(this.name, err);
    }

    const choice = response.choices[0];
    if (!choice) {
      throw new Error(`No choices in ${this.name} response`);
    }

    log.debug(`LLM [${this.name}]: finish=${choice.finish_reason}, tokens=${response.usage?.total_tokens ?? '?'}`);

    return choice.message.content ?? '';
  }
}

/**
 * HTTP-level API errors become ProviderError. Connection failures and
 * anything else pass through untouched.
 */
export function wrapOpenAIError(provider: string, err: unknown): unknown {
  if (err instanceof OpenAI.APIConnectionError) return err;
  if (err instanceof OpenAI.APIError) {
    return new ProviderError(provider, err.message, { status: err.status, cause: err });
  }
  return err;
}

/**
 * Create the right provider based on config.
 */
export function createProvider(opts: {
  provider: ProviderName;
  apiKey: string;
  apiBase?: string;
  maxTokens?: number;
}): LLMProvider {
  if (opts.provider === 'anthropic') {
    return new AnthropicProvider({
      apiKey: opts.apiKey,
      apiBase: opts.apiBase,
      maxTokens: opts.maxTokens,
    });
  }

  return new OpenAICompatibleProvider({
    apiKey: opts.apiKey,
    apiBase: opts.apiBase ?? PROVIDER_DEFAULTS[opts.provider].apiBase,
    name: opts.provider,
    maxTokens: opts.maxTokens,
  });
}
