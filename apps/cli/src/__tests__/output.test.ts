import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { createConsoleLogger, printJson, printResult, resultToJson, type OutputOptions } from '../output.js';

const human: OutputOptions = { json: false, quiet: false, verbose: false, debug: false };

describe('resultToJson', () => {
  it('flattens rows to value arrays', () => {
    assert.deepEqual(
      resultToJson({
        kind: 'rows',
        columns: ['id', 'id'],
        rows: [[['id', 1], ['id', 2]]],
      }),
      { kind: 'rows', columns: ['id', 'id'], rows: [[1, 2]] },
    );
  });

  it('passes status and error results through', () => {
    assert.deepEqual(resultToJson({ kind: 'status', message: 'ok', changes: 3 }), {
      kind: 'status',
      message: 'ok',
      changes: 3,
    });
    assert.deepEqual(resultToJson({ kind: 'error', message: 'no such table: t' }), {
      kind: 'error',
      message: 'no such table: t',
    });
  });
});

describe('printJson', () => {
  it('renders large integers as exact strings', (t) => {
    const log = t.mock.method(console, 'log', () => {});
    const json = resultToJson({ kind: 'rows', columns: ['big'], rows: [[['big', 9007199254740993n]]] });
    printJson({ rows: json.rows });
    assert.deepEqual(log.mock.calls[0]?.arguments, ['{\n  "rows": [\n    [\n      "9007199254740993"\n    ]\n  ]\n}']);
  });
});

describe('printResult', () => {
  it('announces empty row sets', (t) => {
    const log = t.mock.method(console, 'log', () => {});
    printResult({ kind: 'rows', columns: ['id'], rows: [] }, human);
    assert.deepEqual(
      log.mock.calls.map((c) => c.arguments),
      [['Query Result: No records found.']],
    );
  });

  it('prints the table and a row count', (t) => {
    const log = t.mock.method(console, 'log', () => {});
    printResult({ kind: 'rows', columns: ['id'], rows: [[['id', 7]]] }, human);
    assert.deepEqual(
      log.mock.calls.map((c) => c.arguments),
      [['Query Result:'], ['id\n--\n7 '], ['1 row returned']],
    );
  });

  it('stays silent under --quiet', (t) => {
    const log = t.mock.method(console, 'log', () => {});
    printResult({ kind: 'status', message: 'Query executed successfully.', changes: 1 }, { ...human, quiet: true });
    assert.equal(log.mock.callCount(), 0);
  });
});

describe('createConsoleLogger', () => {
  it('drops debug output unless verbose', (t) => {
    const err = t.mock.method(console, 'error', () => {});
    createConsoleLogger(human).debug('pipeline: Idle');
    assert.equal(err.mock.callCount(), 0);

    createConsoleLogger({ ...human, verbose: true }).debug('pipeline: Sanitized', { sql: 'SELECT 1' });
    assert.deepEqual(err.mock.calls[0]?.arguments, ['[debug] pipeline: Sanitized {"sql":"SELECT 1"}']);
  });

  it('writes errors to stderr even when quiet', (t) => {
    const err = t.mock.method(console, 'error', () => {});
    createConsoleLogger({ ...human, quiet: true }).error('history write failed');
    assert.deepEqual(err.mock.calls[0]?.arguments, ['Error: history write failed']);
  });
});
