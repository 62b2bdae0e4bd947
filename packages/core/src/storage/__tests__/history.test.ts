import { afterEach, beforeEach, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { HistoryStore } from '../history.js';

describe('HistoryStore', () => {
  let store: HistoryStore;

  beforeEach(() => {
    store = new HistoryStore(':memory:');
    store.migrate();
  });

  afterEach(() => {
    store.close();
  });

  it('migrates idempotently', () => {
    store.migrate();
    assert.deepEqual(store.listTurns(), []);
  });

  it('records a row result as a count only', () => {
    const id = store.recordTurn({
      databasePath: '/data/chinook.db',
      request: 'list all tracks',
      model: 'test-model',
      generatedSql: 'SELECT * FROM tracks;',
      result: {
        kind: 'rows',
        columns: ['TrackId'],
        rows: [[['TrackId', 1]], [['TrackId', 2]]],
      },
    });

    const turn = store.getTurn(id);
    assert.ok(turn);
    assert.equal(turn.id, id);
    assert.equal(turn.databasePath, '/data/chinook.db');
    assert.equal(turn.request, 'list all tracks');
    assert.equal(turn.model, 'test-model');
    assert.equal(turn.generatedSql, 'SELECT * FROM tracks;');
    assert.equal(turn.resultKind, 'rows');
    assert.equal(turn.rowCount, 2);
    assert.equal(turn.message, null);
    assert.match(turn.askedAt, /^\d{4}-\d{2}-\d{2}T/);
  });

  it('records status and error results with their message', () => {
    const statusId = store.recordTurn({
      databasePath: 'db',
      request: 'add a track',
      model: 'm',
      generatedSql: "INSERT INTO tracks (Name) VALUES ('x')",
      result: { kind: 'status', message: 'Query executed successfully.', changes: 1 },
    });
    const errorId = store.recordTurn({
      databasePath: 'db',
      request: 'bad',
      model: 'm',
      generatedSql: 'SELEC',
      result: { kind: 'error', message: 'Invalid SQL Query: near "SELEC": syntax error' },
    });

    const status = store.getTurn(statusId);
    assert.equal(status?.resultKind, 'status');
    assert.equal(status?.rowCount, 1);
    assert.equal(status?.message, 'Query executed successfully.');

    const error = store.getTurn(errorId);
    assert.equal(error?.resultKind, 'error');
    assert.equal(error?.rowCount, null);
    assert.equal(error?.message, 'Invalid SQL Query: near "SELEC": syntax error');
  });

  it('lists the most recent turns first, up to the limit', () => {
    const ids = ['first', 'second', 'third'].map((request) =>
      store.recordTurn({
        databasePath: 'db',
        request,
        model: 'm',
        generatedSql: 'SELECT 1',
        result: { kind: 'rows', columns: ['1'], rows: [] },
      }),
    );

    const listed = store.listTurns(2);
    assert.deepEqual(
      listed.map((t) => t.id),
      [ids[2], ids[1]],
    );
  });

  it('returns undefined for an unknown id', () => {
    assert.equal(store.getTurn('missing'), undefined);
  });
});
