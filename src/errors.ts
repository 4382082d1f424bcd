/**
 * Raised at startup when configuration is missing or invalid.
 * The process exits before serving any traffic.
 */
export class ConfigurationError extends Error {
  readonly missing: string[];

  constructor(message: string, missing: string[] = []) {
    super(message);
    this.name = 'ConfigurationError';
    this.missing = missing;
  }
}

/**
 * A failure reported by the AI provider itself (rate limit, quota,
 * malformed request, auth). Providers wrap their SDK errors in this.
 */
export class ProviderError extends Error {
  readonly provider: string;
  readonly status?: number;

  constructor(provider: string, message: string, opts: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: opts.cause });
    this.name = 'ProviderError';
    this.provider = provider;
    this.status = opts.status;
  }
}
