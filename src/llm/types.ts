/**
 * Stateless text-in, text-out client. One call per inbound message; shared
 * across concurrent conversations, so implementations keep no per-call state.
 * Provider-side failures reject with ProviderError.
 */
export interface LLMProvider {
  readonly name: string;
  generate(model: string, text: string): Promise<string>;
}

export type GenerationOutcome =
  | { kind: 'ok'; text: string }
  | { kind: 'provider_error'; error: Error }
  | { kind: 'unexpected_error'; error: Error };
