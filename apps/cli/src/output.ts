import type { Command } from 'commander';
import type { ExecutionResult, Logger, Row } from '@askdb/core';
import { formatTable } from './util/table.js';
import { CliError, errorCode } from './errors.js';

export interface OutputOptions {
  json: boolean;
  quiet: boolean;
  verbose: boolean;
  debug: boolean;
}

export function outputOptionsFromCommand(command: Command): OutputOptions {
  const opts = command.optsWithGlobals();
  return {
    json: Boolean(opts.json),
    quiet: Boolean(opts.quiet),
    verbose: Boolean(opts.verbose),
    debug: Boolean(opts.debug),
  };
}

export function printHuman(message: string, output: OutputOptions): void {
  if (!output.quiet) {
    console.log(message);
  }
}

export function printWarning(message: string, output: OutputOptions): void {
  if (!output.quiet) {
    console.warn(`Warning: ${message}`);
  }
}

/** SQLite integers beyond 2^53 arrive as bigint, which JSON.stringify rejects. */
function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, jsonReplacer, 2));
}

export function printHumanTable(columns: string[], rows: Row[], output: OutputOptions): void {
  if (output.quiet) return;
  console.log(formatTable(columns, rows));
}

/** JSON shape for a result: rows become value arrays aligned with `columns`. */
export function resultToJson(result: ExecutionResult): Record<string, unknown> {
  if (result.kind === 'rows') {
    return {
      kind: 'rows',
      columns: result.columns,
      rows: result.rows.map((row) => row.map(([, value]) => value)),
    };
  }
  return { ...result };
}

export function printResult(result: ExecutionResult, output: OutputOptions): void {
  if (result.kind !== 'rows') {
    printHuman(`Query Result: ${result.message}`, output);
    return;
  }
  if (result.rows.length === 0) {
    printHuman('Query Result: No records found.', output);
    return;
  }
  printHuman('Query Result:', output);
  printHumanTable(result.columns, result.rows, output);
  printHuman(`${result.rows.length} row${result.rows.length !== 1 ? 's' : ''} returned`, output);
}

export function printError(error: unknown, output: OutputOptions): void {
  const message = error instanceof Error ? error.message : String(error);
  const details = error instanceof CliError || hasDetails(error) ? error.details : undefined;

  if (output.json) {
    const payload: Record<string, unknown> = {
      ok: false,
      code: errorCode(error),
      message,
    };
    if (output.debug) {
      payload.details = details !== undefined
        ? details
        : error instanceof Error
          ? { stack: error.stack }
          : { raw: String(error) };
    }
    printJson(payload);
    return;
  }

  console.error(`Error: ${message}`);
  if (output.debug) {
    if (details !== undefined) {
      console.error('Details:', JSON.stringify(details, jsonReplacer, 2));
    } else if (error instanceof Error && error.stack) {
      console.error(error.stack);
    }
  }
}

function hasDetails(error: unknown): error is { details: unknown } {
  return typeof error === 'object' && error !== null && 'details' in error;
}

export function printCommandSuccess(value: unknown, output: OutputOptions, humanMessage?: string): void {
  if (output.json) {
    printJson({ ok: true, data: value });
    return;
  }
  if (humanMessage && !output.quiet) {
    console.log(humanMessage);
  }
}

/**
 * Core pipeline logger routed to stderr so stdout stays parseable.
 * debug needs --verbose or --debug; info is silenced by --quiet.
 */
export function createConsoleLogger(output: OutputOptions): Logger {
  const format = (message: string, meta?: Record<string, unknown>): string =>
    meta && Object.keys(meta).length > 0 ? `${message} ${JSON.stringify(meta, jsonReplacer)}` : message;
  return {
    debug(message, meta) {
      if (output.verbose || output.debug) console.error(`[debug] ${format(message, meta)}`);
    },
    info(message, meta) {
      if (!output.quiet) console.error(format(message, meta));
    },
    warn(message, meta) {
      console.warn(`Warning: ${format(message, meta)}`);
    },
    error(message, meta) {
      console.error(`Error: ${format(message, meta)}`);
    },
  };
}
