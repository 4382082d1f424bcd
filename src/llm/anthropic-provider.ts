import Anthropic from '@anthropic-ai/sdk';
import type { LLMProvider } from './types.js';
import { ProviderError } from '../errors.js';
import * as log from '../utils/logger.js';

const DEFAULT_MAX_TOKENS = 4096;

/** The part of the Anthropic client the provider calls; `Anthropic` satisfies it. */
export interface MessagesClient {
  messages: {
    create(params: Anthropic.MessageCreateParamsNonStreaming): Promise<{
      content: ReadonlyArray<{ type: string }>;
      stop_reason: string | null;
      usage: { input_tokens: number; output_tokens: number };
    }>;
  };
}

function isTextBlock(block: { type: string }): block is { type: 'text'; text: string } {
  return block.type === 'text' && 'text' in block && typeof block.text === 'string';
}

/**
 * Anthropic Messages API provider using the official SDK.
 */
export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic';
  private client: MessagesClient;
  private maxTokens: number;

  constructor(config: { apiKey: string; apiBase?: string; maxTokens?: number; client?: MessagesClient }) {
    this.client = config.client ?? new Anthropic({
      apiKey: config.apiKey,
      baseURL: config.apiBase,
      maxRetries: 0,
    });
    this.maxTokens = config.maxTokens ?? DEFAULT_MAX_TOKENS;
  }

  async generate(model: string, text: string): Promise<string> {
    const modelId = model.replace(/^anthropic\//, '');
    log.debug(`LLM [anthropic]: model=${modelId}, chars=${text.length}`);

    let response: Awaited<ReturnType<MessagesClient['messages']['create']>>;
    try {
      response = await this.client.messages.create({
        model: modelId,
        max_tokens: this.maxTokens,
        messages: [{ role: 'user', content: text }],
      });
    } catch (err) {
      throw wrapAnthropicError(err);
    }

    let content = '';
    for (const block of response.content) {
      if (isTextBlock(block)) content += block.text;
    }

    log.debug(`LLM [anthropic]: stop=${response.stop_reason}, tokens=${response.usage.input_tokens + response.usage.output_tokens}`);

    return content;
  }
}

export function wrapAnthropicError(err: unknown): unknown {
  if (err instanceof Anthropic.APIConnectionError) return err;
  if (err instanceof Anthropic.APIError) {
    return new ProviderError('anthropic', err.message, { status: err.status, cause: err });
  }
  return err;
}
