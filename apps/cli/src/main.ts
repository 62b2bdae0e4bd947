#!/usr/bin/env node

/**
 * askdb CLI entrypoint.
 * Hosts the text-to-SQL pipeline: takes requests, shows generated SQL and results.
 */

import { Command } from 'commander';
import { createInterface } from 'node:readline';
import {
  ConnectionError,
  HistoryStore,
  OpenAIProvider,
  SqliteConnection,
  Text2SqlPipeline,
  classifyStatement,
  cleanSql,
  describeSchema,
  executeWithValidation,
  isRestrictive,
  loadConfig,
  requireApiKey,
  requireDatabasePath,
  serializeSchema,
  validateQuery,
  type AppConfig,
  type AskResult,
  type Row,
  type StatementPolicy,
  type ValidatedExecution,
} from '@askdb/core';
import {
  EXIT_CODE_POLICY,
  EXIT_CODE_RUNTIME,
  EXIT_CODE_SUCCESS,
  toExitCode,
  usageError,
  runtimeError,
} from './errors.js';
import {
  createConsoleLogger,
  outputOptionsFromCommand,
  printCommandSuccess,
  printError,
  printHuman,
  printHumanTable,
  printResult,
  printWarning,
  resultToJson,
  type OutputOptions,
} from './output.js';

const VERSION = '0.1.0';

interface GlobalOptions {
  db?: string;
  config?: string;
  model?: string;
  baseUrl?: string;
  readOnly?: boolean;
}

// ── Helpers ──────────────────────────────────────────────────────────

function resolveConfig(command: Command): AppConfig {
  const opts = command.optsWithGlobals<GlobalOptions>();
  return loadConfig({
    configPath: opts.config,
    flags: {
      databasePath: opts.db,
      model: opts.model,
      baseUrl: opts.baseUrl,
      readOnly: opts.readOnly ? true : undefined,
    },
  });
}

function policyFromConfig(config: AppConfig): StatementPolicy {
  return { readOnly: config.readOnly, allow: config.allow };
}

function openConnection(config: AppConfig): SqliteConnection {
  return SqliteConnection.open(requireDatabasePath(config));
}

function createPipeline(config: AppConfig, connection: SqliteConnection, output: OutputOptions): Text2SqlPipeline {
  const provider = new OpenAIProvider({
    apiKey: requireApiKey(config),
    baseURL: config.baseUrl,
    model: config.model,
    timeoutMs: config.timeoutMs,
    maxRetries: config.maxRetries,
  });
  return new Text2SqlPipeline({
    connection,
    provider,
    logger: createConsoleLogger(output),
    policy: policyFromConfig(config),
    schemaMaxChars: config.schemaMaxChars,
  });
}

function isValidWrite(sql: string, connection: SqliteConnection): boolean {
  if (!validateQuery(sql, connection).valid) return false;
  return classifyStatement(sql, { returnsData: connection.returnsData(sql) }) === 'write';
}

/** Exit status for a finished turn: policy refusals 3, invalid or failed SQL 2. */
function exitCodeForResult(execution: Pick<ValidatedExecution, 'blocked' | 'result'>): number {
  if (execution.blocked) return EXIT_CODE_POLICY;
  return execution.result.kind === 'error' ? EXIT_CODE_RUNTIME : EXIT_CODE_SUCCESS;
}

function reportTurn(turn: AskResult, output: OutputOptions, turnId?: string): void {
  if (output.json) {
    printCommandSuccess(
      {
        turnId: turnId ?? null,
        request: turn.request,
        model: turn.model,
        raw: turn.generated.raw,
        sql: turn.generated.sql,
        validation: turn.validation,
        blocked: turn.blocked,
        result: resultToJson(turn.result),
      },
      output,
    );
    return;
  }
  printHuman(`Generated SQL Query: ${turn.generated.sql}`, output);
  printResult(turn.result, output);
}

function recordTurn(config: AppConfig, databasePath: string, turn: AskResult, output: OutputOptions): string | undefined {
  const store = new HistoryStore(config.historyPath);
  try {
    store.migrate();
    return store.recordTurn({
      databasePath,
      request: turn.request,
      model: turn.model,
      generatedSql: turn.generated.sql,
      result: turn.result,
    });
  } catch (err: unknown) {
    printWarning(`could not record history: ${err instanceof Error ? err.message : String(err)}`, output);
    return undefined;
  } finally {
    store.close();
  }
}

async function runCommand(
  command: Command,
  fn: (output: OutputOptions) => Promise<void> | void,
): Promise<void> {
  const output = outputOptionsFromCommand(command);
  try {
    await fn(output);
  } catch (error: unknown) {
    printError(error, output);
    process.exitCode = toExitCode(error);
  }
}

function withExamples(cmd: Command, lines: string[]): Command {
  const rendered = lines.map((line) => `  ${line}`).join('\n');
  cmd.addHelpText('after', `\nExamples:\n${rendered}\n`);
  return cmd;
}

// ── Program ──────────────────────────────────────────────────────────

const program = new Command();

program
  .name('askdb')
  .description('askdb — ask a SQLite database questions in plain language')
  .option('--db <path>', 'SQLite database file (or ASKDB_DATABASE)')
  .option('--config <path>', 'JSON config file (or ASKDB_CONFIG)')
  .option('--model <id>', 'Completion model identifier (or ASKDB_MODEL)')
  .option('--base-url <url>', 'OpenAI-compatible API base URL (or ASKDB_BASE_URL)')
  .option('--read-only', 'Refuse statements that are not SELECT queries')
  .option('--json', 'Machine-readable JSON output', false)
  .option('--quiet', 'Suppress non-essential logs', false)
  .option('--verbose', 'Show pipeline progress', false)
  .option('--debug', 'Show internal error details and stacks', false)
  .showHelpAfterError('(run with --help for usage)')
  .helpOption('-h, --help', 'display help')
  .version(VERSION, '-v, --version', 'Show version number');

program.exitOverride();

// ── ask ──────────────────────────────────────────────────────────────

withExamples(
  program
    .command('ask')
    .description('Translate a request into SQL, validate it, and execute it')
    .argument('<request>', 'Natural language request')
    .option('--no-history', 'Do not record this turn in history')
    .action(async function (this: Command, request: string, opts: { history: boolean }) {
      await runCommand(this, async (output) => {
        const config = resolveConfig(this);
        const connection = openConnection(config);
        try {
          const pipeline = createPipeline(config, connection, output);
          const turn = await pipeline.ask(request);
          const turnId = opts.history ? recordTurn(config, connection.path, turn, output) : undefined;
          reportTurn(turn, output, turnId);
          process.exitCode = exitCodeForResult(turn);
        } finally {
          connection.close();
        }
      });
    }),
  [
    'askdb --db chinook.db ask "list all tracks"',
    'askdb --db chinook.db --read-only ask "top 5 customers by total spend"',
    'askdb --db chinook.db --json ask "albums by AC/DC"',
  ],
);

// ── chat ─────────────────────────────────────────────────────────────

withExamples(
  program
    .command('chat')
    .description('Interactive session: one request per line, "exit" to quit')
    .option('--no-history', 'Do not record turns in history')
    .action(async function (this: Command, opts: { history: boolean }) {
      await runCommand(this, async (output) => {
        const config = resolveConfig(this);
        const connection = openConnection(config);
        const rl = createInterface({ input: process.stdin, output: process.stdout });
        try {
          const pipeline = createPipeline(config, connection, output);
          rl.setPrompt('askdb> ');
          rl.prompt();
          for await (const line of rl) {
            const request = line.trim();
            if (request === 'exit' || request === 'quit') break;
            if (request) {
              try {
                const turn = await pipeline.ask(request);
                if (opts.history) recordTurn(config, connection.path, turn, output);
                reportTurn(turn, output);
              } catch (err: unknown) {
                // A lost database ends the session; anything else only ends the turn.
                if (err instanceof ConnectionError) throw err;
                printError(err, output);
              }
            }
            rl.prompt();
          }
        } finally {
          rl.close();
          connection.close();
        }
      });
    }),
  ['askdb --db chinook.db chat'],
);

// ── schema ───────────────────────────────────────────────────────────

withExamples(
  program
    .command('schema')
    .description('Print the schema text that is sent to the model')
    .action(async function (this: Command) {
      await runCommand(this, (output) => {
        const config = resolveConfig(this);
        const connection = openConnection(config);
        try {
          const schema = describeSchema(connection);
          if (output.json) {
            printCommandSuccess(schema, output);
            return;
          }
          printHuman(serializeSchema(schema, { maxChars: config.schemaMaxChars }).trimEnd(), output);
        } finally {
          connection.close();
        }
      });
    }),
  ['askdb --db chinook.db schema', 'askdb --db chinook.db schema --json'],
);

// ── validate ─────────────────────────────────────────────────────────

withExamples(
  program
    .command('validate')
    .description('Dry-run a SQL statement (EXPLAIN QUERY PLAN) without executing it')
    .argument('<sql>', 'SQL statement')
    .action(async function (this: Command, sql: string) {
      await runCommand(this, (output) => {
        const config = resolveConfig(this);
        const connection = openConnection(config);
        try {
          const outcome = validateQuery(cleanSql(sql), connection);
          if (!outcome.valid) {
            throw runtimeError(`Invalid SQL Query: ${outcome.diagnostic}`, 'INVALID_SQL', outcome);
          }
          printCommandSuccess(outcome, output, 'valid');
        } finally {
          connection.close();
        }
      });
    }),
  ['askdb --db chinook.db validate "SELECT * FROM tracks"'],
);

// ── run ──────────────────────────────────────────────────────────────

withExamples(
  program
    .command('run')
    .description('Validate and execute SQL you supply, under the same policy as ask')
    .argument('<sql>', 'SQL statement (code fences are stripped)')
    .action(async function (this: Command, input: string) {
      await runCommand(this, (output) => {
        const config = resolveConfig(this);
        const connection = openConnection(config);
        try {
          const sql = cleanSql(input);
          const policy = policyFromConfig(config);
          if (!isRestrictive(policy) && isValidWrite(sql, connection)) {
            printWarning('no statement policy set; this write will be committed.', output);
          }
          const execution = executeWithValidation(sql, connection, { policy });
          if (output.json) {
            printCommandSuccess({ sql, validation: execution.validation, blocked: execution.blocked, result: resultToJson(execution.result) }, output);
          } else {
            printResult(execution.result, output);
          }
          process.exitCode = exitCodeForResult(execution);
        } finally {
          connection.close();
        }
      });
    }),
  ['askdb --db chinook.db run "SELECT Name FROM tracks LIMIT 5"'],
);

// ── history ─────────────────────────────────────────────────────────

const history = program.command('history').description('Turn history');

withExamples(
  history
    .command('list')
    .description('List recent turns')
    .option('--limit <n>', 'Number of items', '20')
    .action(async function (this: Command, opts: { limit: string }) {
      await runCommand(this, (output) => {
        const config = resolveConfig(this);
        const limit = Number.parseInt(opts.limit, 10);
        if (!Number.isInteger(limit) || limit <= 0) {
          throw usageError(`--limit must be a positive integer, got "${opts.limit}".`);
        }
        const store = new HistoryStore(config.historyPath);
        try {
          store.migrate();
          const turns = store.listTurns(limit);
          if (output.json) {
            printCommandSuccess(turns, output);
            return;
          }
          if (turns.length === 0) {
            printHuman('No turns in history. Use "askdb ask" to run a request.', output);
            return;
          }
          const columns = ['id', 'asked_at', 'request', 'result', 'rows'];
          const rows = turns.map((t): Row => [
            ['id', t.id],
            ['asked_at', t.askedAt],
            ['request', t.request],
            ['result', t.resultKind],
            ['rows', t.rowCount],
          ]);
          printHumanTable(columns, rows, output);
        } finally {
          store.close();
        }
      });
    }),
  ['askdb history list', 'askdb history list --limit 5 --json'],
);

withExamples(
  history
    .command('show')
    .description('Show one turn')
    .argument('<id>', 'Turn id')
    .action(async function (this: Command, id: string) {
      await runCommand(this, (output) => {
        const config = resolveConfig(this);
        const store = new HistoryStore(config.historyPath);
        try {
          store.migrate();
          const turn = store.getTurn(id);
          if (!turn) {
            throw usageError(`Turn "${id}" not found.`, 'TURN_NOT_FOUND');
          }
          if (output.json) {
            printCommandSuccess(turn, output);
            return;
          }
          printHuman(`Asked:    ${turn.askedAt}`, output);
          printHuman(`Database: ${turn.databasePath}`, output);
          printHuman(`Model:    ${turn.model}`, output);
          printHuman(`Request:  ${turn.request}`, output);
          printHuman(`SQL:      ${turn.generatedSql}`, output);
          printHuman(`Result:   ${turn.resultKind}${turn.rowCount !== null ? ` (${turn.rowCount})` : ''}`, output);
          if (turn.message) {
            printHuman(`Message:  ${turn.message}`, output);
          }
        } finally {
          store.close();
        }
      });
    }),
  ['askdb history show 3f0c…'],
);

// ── parse ────────────────────────────────────────────────────────────

function commanderCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
    if (process.exitCode === undefined) {
      process.exitCode = EXIT_CODE_SUCCESS;
    }
  } catch (error: unknown) {
    const output = outputOptionsFromCommand(program);
    const code = commanderCode(error);
    // Commander wraps usage/validation failures as CommanderError
    if (code === 'commander.helpDisplayed' || code === 'commander.help' || code === 'commander.version') {
      process.exitCode = EXIT_CODE_SUCCESS;
      return;
    }
    if (code?.startsWith('commander.')) {
      printError(usageError(error instanceof Error ? error.message : String(error)), output);
      process.exitCode = 1;
      return;
    }
    printError(error, output);
    process.exitCode = toExitCode(error);
  }
}

void main();
