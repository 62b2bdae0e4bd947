/**
 * Error taxonomy for askdb core.
 *
 * Only failures upstream of generation are thrown. Validation and execution
 * failures are carried as values (ValidationOutcome / ExecutionResult).
 */

export type AskdbErrorCode =
  | 'DB_CONN_FAILED'
  | 'LLM_FAILED'
  | 'INVALID_CONFIG'
  | 'INVALID_REQUEST';

export class AskdbError extends Error {
  readonly code: AskdbErrorCode;
  readonly details?: unknown;

  constructor(code: AskdbErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

/** Database handle unusable: open failure, closed handle, catalog query error. */
export class ConnectionError extends AskdbError {
  constructor(message: string, details?: unknown) {
    super('DB_CONN_FAILED', message, details);
  }
}

export type ExternalServiceReason = 'auth' | 'network' | 'quota' | 'empty' | 'unknown';

/** Completion API call failed. Never retried beyond the configured maxRetries. */
export class ExternalServiceError extends AskdbError {
  readonly reason: ExternalServiceReason;

  constructor(reason: ExternalServiceReason, message: string, details?: unknown) {
    super('LLM_FAILED', message, details);
    this.reason = reason;
  }
}

export class ConfigError extends AskdbError {
  constructor(message: string, details?: unknown) {
    super('INVALID_CONFIG', message, details);
  }
}

export class ValidationError extends AskdbError {
  constructor(message: string, details?: unknown) {
    super('INVALID_REQUEST', message, details);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
