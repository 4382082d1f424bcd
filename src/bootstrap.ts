/**
 * Shared bootstrap: creates all dependencies, wires them together.
 * Used by the gateway, the interactive chat and single-message mode.
 */

import type { RelayConfig } from './config/schema.js';
import type { LLMProvider } from './llm/types.js';
import type { MetricsSource } from './metrics/system-metrics.js';
import { createProvider } from './llm/openai-compatible-provider.js';
import { HostMetricsSource } from './metrics/system-metrics.js';
import { MessagePipeline } from './relay/pipeline.js';
import { CommandDispatcher } from './relay/commands.js';
import { MessageRouter } from './relay/router.js';

export interface AppDeps {
  config: Readonly<RelayConfig>;
  provider: LLMProvider;
  metrics: MetricsSource;
  pipeline: MessagePipeline;
  commands: CommandDispatcher;
  router: MessageRouter;
}

export interface AppOverrides {
  provider?: LLMProvider;
  metrics?: MetricsSource;
}

export function createApp(config: Readonly<RelayConfig>, apiKey: string, overrides: AppOverrides = {}): AppDeps {
  const provider = overrides.provider ?? createProvider({
    provider: config.llm.provider,
    apiKey,
    apiBase: config.llm.apiBase,
    maxTokens: config.llm.maxTokens,
  });

  const metrics = overrides.metrics ?? new HostMetricsSource(config.metrics);

  const pipeline = new MessagePipeline({
    provider,
    model: config.llm.model,
    maxChunkLength: config.relay.maxChunkLength,
    previewLength: config.relay.previewLength,
  });
  const commands = new CommandDispatcher({ model: config.llm.model, metrics });
  const router = new MessageRouter({ commands, pipeline });

  return { config, provider, metrics, pipeline, commands, router };
}
