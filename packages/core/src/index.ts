/**
 * @askdb/core — barrel export
 *
 * Text-to-SQL pipeline shared by the CLI and any other host.
 */

// Errors and logging
export {
  AskdbError,
  ConnectionError,
  ExternalServiceError,
  ConfigError,
  ValidationError,
  errorMessage,
} from './errors.js';
export type { AskdbErrorCode, ExternalServiceReason } from './errors.js';
export { noopLogger } from './logger.js';
export type { Logger } from './logger.js';

// Database
export type {
  SqlValue,
  Row,
  RowEntry,
  ColumnDescriptor,
  ForeignKeyDescriptor,
  TableDescriptor,
  SchemaDescriptor,
  QueryRows,
  WriteOutcome,
  DatabaseConnection,
} from './db/types.js';
export { SqliteConnection, quoteIdent } from './db/adapters/sqlite.js';
export type { SqliteOpenOptions } from './db/adapters/sqlite.js';
export { DEFAULTS } from './db/defaults.js';

// Schema introspection
export { describeSchema, serializeSchema } from './schema/introspect.js';
export type { SerializeOpts } from './schema/introspect.js';

// LLM module
export { OpenAIProvider, toExternalServiceError, buildPrompt, buildMessages } from './llm/index.js';
export type {
  CompletionProvider,
  ChatClient,
  ChatRequest,
  ChatResponse,
  ChatMessage,
  OpenAIProviderOptions,
} from './llm/index.js';

// Sanitize, validate, execute
export { cleanSql } from './query/sanitize.js';
export { classifyStatement, leadingKeyword } from './query/classify.js';
export type { ClassifyHints, StatementClass } from './query/classify.js';
export { validateQuery } from './query/validate.js';
export type { ValidationOutcome } from './query/validate.js';
export {
  executeQuery,
  executeWithValidation,
  rowToObject,
  rowValue,
  WRITE_SUCCESS_MESSAGE,
} from './query/execute.js';
export type { ExecutionResult, ExecuteOptions, ValidatedExecution } from './query/execute.js';

// Statement policy
export { checkStatement, isRestrictive, UNRESTRICTED_POLICY } from './policy/guard.js';
export type { StatementPolicy, PolicyDecision } from './policy/guard.js';
export { parseSql } from './policy/parse.js';
export type { ParseOutcome, ParseResult, SqlKind } from './policy/parse.js';

// Pipeline
export { Text2SqlPipeline } from './pipeline.js';
export type { AskResult, GeneratedQuery, PipelineOptions, PipelineState } from './pipeline.js';

// Configuration
export {
  loadConfig,
  parseFileConfig,
  requireApiKey,
  requireDatabasePath,
  defaultConfigDir,
  defaultConfigPath,
  defaultHistoryPath,
} from './config.js';
export type { AppConfig, ConfigFlags, Env, FileConfig, LoadConfigInput } from './config.js';

// Turn history
export { HistoryStore } from './storage/history.js';
export type { NewTurn, StoredTurn, ResultKind } from './storage/history.js';
