/**
 * Defaults for the completion call and prompt size.
 */

export const DEFAULTS = {
  model: 'gpt-4o-mini',
  /** Upper bound on one completion request */
  timeoutMs: 30_000,
  /** Retries applied by the SDK; zero keeps one call per request */
  maxRetries: 0,
  /** Cap on serialized schema text; 0 disables */
  schemaMaxChars: 32_000,
} as const;
