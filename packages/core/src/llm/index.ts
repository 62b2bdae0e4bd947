/**
 * LLM module barrel export.
 */

export type { CompletionProvider } from './provider.js';
export { OpenAIProvider, toExternalServiceError } from './openai.js';
export type { ChatClient, ChatRequest, ChatResponse, OpenAIProviderOptions } from './openai.js';
export { buildPrompt, buildMessages } from './prompt.js';
export type { ChatMessage } from './prompt.js';
