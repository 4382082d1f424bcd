import type { LLMProvider, GenerationOutcome } from '../llm/types.js';
import type { InboundMessage, ReplyTransport, PipelineResult } from './types.js';
import { generateOnce } from '../llm/generate.js';
import { chunkText, preview } from './chunker.js';
import * as log from '../utils/logger.js';

export const PROVIDER_APOLOGY =
  'An error occurred while communicating with the AI provider. Please try again later.';
export const UNEXPECTED_APOLOGY =
  'An unexpected error occurred. Please check the bot logs.';

export interface PipelineDeps {
  provider: LLMProvider;
  model: string;
  maxChunkLength: number;
  previewLength: number;
}

/**
 * Message pipeline: one inbound message in, ordered reply chunks out.
 *
 * Flow:
 * 1. typing indicator (best-effort)
 * 2. exactly one generation call
 * 3. trim, chunk
 * 4. send chunks one by one, each awaited
 *
 * Every failure ends in a single apology chunk; nothing is re-raised.
 */
export class MessagePipeline {
  private deps: PipelineDeps;

  constructor(deps: PipelineDeps) {
    this.deps = deps;
  }

  async handle(msg: InboundMessage, transport: ReplyTransport): Promise<PipelineResult> {
    const { provider, model, previewLength } = this.deps;
    const chatId = msg.conversationId;

    log.info(`Received message from chat ${chatId}: '${preview(msg.text, previewLength)}'`);

    try {
      await transport.sendTyping(chatId);
    } catch (err) {
      log.debug(`Typing indicator failed for chat ${chatId}: ${log.errorMessage(err)}`);
    }

    const outcome = await generateOnce(provider, model, msg.text);
    const chunks = this.replyFor(outcome);

    if (outcome.kind !== 'ok') {
      this.logFailure(msg, outcome);
      await this.deliverApology(chatId, transport, chunks[0]);
      return { outcome: outcome.kind, chunks };
    }

    const sent: string[] = [];
    try {
      for (const chunk of chunks) {
        await transport.send(chatId, chunk);
        sent.push(chunk);
      }
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      this.logFailure(msg, { kind: 'unexpected_error', error });
      await this.deliverApology(chatId, transport, UNEXPECTED_APOLOGY);
      return { outcome: 'unexpected_error', chunks: [...sent, UNEXPECTED_APOLOGY] };
    }

    log.info(`Replied to chat ${chatId} with ${provider.name} text (sent ${chunks.length} chunk(s))`);
    return { outcome: 'replied', chunks };
  }

  /** Chunks to send for a generation outcome. */
  replyFor(outcome: GenerationOutcome): string[] {
    switch (outcome.kind) {
      case 'ok':
        return chunkText(outcome.text.trim(), this.deps.maxChunkLength);
      case 'provider_error':
        return [PROVIDER_APOLOGY];
      case 'unexpected_error':
        return [UNEXPECTED_APOLOGY];
    }
  }

  private logFailure(msg: InboundMessage, outcome: Exclude<GenerationOutcome, { kind: 'ok' }>): void {
    const label = outcome.kind === 'provider_error' ? `${this.deps.provider.name} API error` : 'Unexpected error';
    log.error(
      `${label} for chat ${msg.conversationId} (message '${preview(msg.text, this.deps.previewLength)}'): ${outcome.error.message}`,
    );
  }

  private async deliverApology(chatId: string, transport: ReplyTransport, text: string): Promise<void> {
    try {
      await transport.send(chatId, text);
    } catch (err) {
      log.error(`Failed to deliver apology to chat ${chatId}: ${log.errorMessage(err)}`);
    }
  }
}
