/**
 * OpenAI provider for SQL generation.
 * Works with any OpenAI-compatible chat completions endpoint via baseURL.
 */

import OpenAI, {
  APIConnectionError,
  AuthenticationError,
  PermissionDeniedError,
  RateLimitError,
} from 'openai';
import { DEFAULTS } from '../db/defaults.js';
import { ExternalServiceError, errorMessage } from '../errors.js';
import { buildMessages, type ChatMessage } from './prompt.js';
import type { CompletionProvider } from './provider.js';

export interface ChatRequest {
  model: string;
  messages: ChatMessage[];
  temperature: number;
}

export interface ChatResponse {
  choices: Array<{ message: { content: string | null } }>;
}

/** The slice of the SDK this provider calls; tests pass a fake. */
export interface ChatClient {
  chat: {
    completions: {
      create(body: ChatRequest): PromiseLike<ChatResponse>;
    };
  };
}

export interface OpenAIProviderOptions {
  apiKey?: string;
  baseURL?: string;
  model?: string;
  timeoutMs?: number;
  maxRetries?: number;
  client?: ChatClient;
}

function sdkClient(opts: OpenAIProviderOptions): ChatClient {
  if (!opts.apiKey) {
    throw new ExternalServiceError(
      'auth',
      'Completion API key is not configured. Set ASKDB_API_KEY (or OPENAI_API_KEY) in your shell.',
    );
  }
  const sdk = new OpenAI({
    apiKey: opts.apiKey,
    baseURL: opts.baseURL,
    timeout: opts.timeoutMs ?? DEFAULTS.timeoutMs,
    maxRetries: opts.maxRetries ?? DEFAULTS.maxRetries,
  });
  return {
    chat: {
      completions: {
        create: (body) => sdk.chat.completions.create(body),
      },
    },
  };
}

export function toExternalServiceError(err: unknown): ExternalServiceError {
  if (err instanceof ExternalServiceError) return err;
  const message = errorMessage(err);
  if (err instanceof AuthenticationError || err instanceof PermissionDeniedError) {
    return new ExternalServiceError('auth', `Completion API rejected credentials: ${message}`, { cause: err });
  }
  if (err instanceof RateLimitError) {
    return new ExternalServiceError('quota', `Completion API quota or rate limit exceeded: ${message}`, { cause: err });
  }
  if (err instanceof APIConnectionError) {
    return new ExternalServiceError('network', `Completion API unreachable: ${message}`, { cause: err });
  }
  return new ExternalServiceError('unknown', `Completion API call failed: ${message}`, { cause: err });
}

export class OpenAIProvider implements CompletionProvider {
  readonly model: string;
  private client: ChatClient;

  constructor(opts: OpenAIProviderOptions = {}) {
    this.model = opts.model || DEFAULTS.model;
    this.client = opts.client ?? sdkClient(opts);
  }

  async generate(prompt: string): Promise<string> {
    let content: string | null | undefined;
    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages: buildMessages(prompt),
        temperature: 0,
      });
      content = response.choices[0]?.message.content;
    } catch (err: unknown) {
      throw toExternalServiceError(err);
    }

    const text = content?.trim();
    if (!text) {
      throw new ExternalServiceError('empty', 'Completion API returned an empty response.');
    }
    return text;
  }
}
