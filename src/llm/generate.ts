import type { LLMProvider, GenerationOutcome } from './types.js';
import { ProviderError } from '../errors.js';

/**
 * Run exactly one generation and fold every failure into the outcome.
 * Never rejects.
 */
export async function generateOnce(provider: LLMProvider, model: string, text: string): Promise<GenerationOutcome> {
  try {
    const generated = await provider.generate(model, text);
    return { kind: 'ok', text: generated };
  } catch (err) {
    if (err instanceof ProviderError) {
      return { kind: 'provider_error', error: err };
    }
    return { kind: 'unexpected_error', error: err instanceof Error ? err : new Error(String(err)) };
  }
}
