/**
 * A completion backend: one prompt in, raw model text out.
 * Implementations throw ExternalServiceError on failure.
 */
export interface CompletionProvider {
  readonly model: string;
  generate(prompt: string): Promise<string>;
}
