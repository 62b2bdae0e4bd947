/**
 * Text-to-SQL pipeline for one request:
 * introspect → build prompt → generate → sanitize → validate → execute.
 *
 * ConnectionError and ExternalServiceError propagate; everything after
 * generation is folded into the returned result.
 */

import { DEFAULTS } from './db/defaults.js';
import type { DatabaseConnection } from './db/types.js';
import { ValidationError } from './errors.js';
import type { CompletionProvider } from './llm/provider.js';
import { buildPrompt } from './llm/prompt.js';
import { noopLogger, type Logger } from './logger.js';
import type { StatementPolicy } from './policy/guard.js';
import { executeWithValidation, type ExecutionResult } from './query/execute.js';
import { cleanSql } from './query/sanitize.js';
import type { ValidationOutcome } from './query/validate.js';
import { describeSchema, serializeSchema } from './schema/introspect.js';

export type PipelineState =
  | 'Idle'
  | 'SchemaFetched'
  | 'PromptBuilt'
  | 'ResponseReceived'
  | 'Sanitized'
  | 'Validated'
  | 'Executed'
  | 'Reported';

export interface GeneratedQuery {
  raw: string;
  sql: string;
}

export interface PipelineOptions {
  connection: DatabaseConnection;
  provider: CompletionProvider;
  logger?: Logger;
  policy?: StatementPolicy;
  schemaMaxChars?: number;
}

export interface AskResult {
  request: string;
  model: string;
  schemaText: string;
  prompt: string;
  generated: GeneratedQuery;
  validation: ValidationOutcome;
  blocked: boolean;
  result: ExecutionResult;
}

export class Text2SqlPipeline {
  private readonly connection: DatabaseConnection;
  private readonly provider: CompletionProvider;
  private readonly logger: Logger;
  private readonly policy?: StatementPolicy;
  private readonly schemaMaxChars: number;

  constructor(opts: PipelineOptions) {
    this.connection = opts.connection;
    this.provider = opts.provider;
    this.logger = opts.logger ?? noopLogger;
    this.policy = opts.policy;
    this.schemaMaxChars = opts.schemaMaxChars ?? DEFAULTS.schemaMaxChars;
  }

  async ask(request: string): Promise<AskResult> {
    if (!request.trim()) {
      throw new ValidationError('Request is empty.');
    }
    this.transition('Idle');

    const schemaText = serializeSchema(describeSchema(this.connection), {
      maxChars: this.schemaMaxChars,
    });
    this.transition('SchemaFetched', { chars: schemaText.length });

    const prompt = buildPrompt(schemaText, request);
    this.transition('PromptBuilt', { chars: prompt.length });

    const raw = await this.provider.generate(prompt);
    this.transition('ResponseReceived', { model: this.provider.model });

    const sql = cleanSql(raw);
    this.transition('Sanitized', { sql });

    const { validation, blocked, result } = executeWithValidation(sql, this.connection, {
      policy: this.policy,
    });
    this.transition('Validated', validation.valid ? { valid: true } : { valid: false, diagnostic: validation.diagnostic });
    if (validation.valid && !blocked) {
      this.transition('Executed', { kind: result.kind });
    }
    this.transition('Reported');

    return {
      request,
      model: this.provider.model,
      schemaText,
      prompt,
      generated: { raw, sql },
      validation,
      blocked,
      result,
    };
  }

  private transition(state: PipelineState, meta?: Record<string, unknown>): void {
    this.logger.debug(`pipeline: ${state}`, meta);
  }
}
