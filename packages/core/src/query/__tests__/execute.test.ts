import { afterEach, beforeEach, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { SqliteConnection } from '../../db/adapters/sqlite.js';
import { createFixtureDb, TRACKS_DDL, type FixtureDb } from '../../__tests__/fixture-db.js';
import {
  executeQuery,
  executeWithValidation,
  rowToObject,
  rowValue,
  WRITE_SUCCESS_MESSAGE,
} from '../execute.js';
import { validateQuery } from '../validate.js';

describe('sqlite query execution', () => {
  let fixture: FixtureDb;
  let conn: SqliteConnection;

  beforeEach(() => {
    fixture = createFixtureDb(TRACKS_DDL);
    conn = SqliteConnection.open(fixture.path);
  });

  afterEach(() => {
    conn.close();
    fixture.cleanup();
  });

  describe('validateQuery', () => {
    it('accepts a valid statement', () => {
      assert.deepEqual(validateQuery('SELECT Name FROM tracks', conn), { valid: true });
    });

    it('reports syntax errors', () => {
      const outcome = validateQuery('SELEC Name FROM tracks', conn);
      assert.equal(outcome.valid, false);
      if (!outcome.valid) {
        assert.match(outcome.diagnostic, /syntax error/);
      }
    });

    it('reports unknown tables', () => {
      assert.deepEqual(validateQuery('SELECT * FROM nope', conn), {
        valid: false,
        diagnostic: 'no such table: nope',
      });
    });

    it('never changes rows or schema', () => {
      for (const sql of [
        'DELETE FROM tracks',
        "INSERT INTO tracks (Name) VALUES ('x')",
        'DROP TABLE tracks',
        'INSERT INTO nope VALUES (1)',
        'UPDATE tracks SET Nme = 1',
      ]) {
        validateQuery(sql, conn);
      }
      assert.equal(fixture.count('tracks'), 2);
      assert.deepEqual(validateQuery('SELECT TrackId FROM tracks', conn), { valid: true });
    });
  });

  describe('executeQuery', () => {
    it('returns ordered rows for a read', () => {
      const result = executeQuery('SELECT TrackId, Name FROM tracks ORDER BY TrackId', conn);
      assert.deepEqual(result, {
        kind: 'rows',
        columns: ['TrackId', 'Name'],
        rows: [
          [['TrackId', 1], ['Name', 'Intro']],
          [['TrackId', 2], ['Name', 'Outro']],
        ],
      });
    });

    it('returns an empty row list when nothing matches', () => {
      const result = executeQuery("SELECT * FROM tracks WHERE Name = 'none'", conn);
      assert.deepEqual(result, { kind: 'rows', columns: ['TrackId', 'Name', 'Composer'], rows: [] });
    });

    it('keeps repeated column names as separate entries', () => {
      const result = executeQuery('SELECT TrackId, TrackId FROM tracks ORDER BY TrackId LIMIT 1', conn);
      assert.equal(result.kind, 'rows');
      if (result.kind === 'rows') {
        assert.deepEqual(result.rows[0], [['TrackId', 1], ['TrackId', 1]]);
      }
    });

    it('commits a write and a later read sees it', () => {
      const write = executeQuery("INSERT INTO tracks (Name) VALUES ('Bonus')", conn);
      assert.deepEqual(write, { kind: 'status', message: WRITE_SUCCESS_MESSAGE, changes: 1 });

      const read = executeQuery('SELECT COUNT(*) AS n FROM tracks', conn);
      assert.deepEqual(read, { kind: 'rows', columns: ['n'], rows: [[['n', 3]]] });

      // visible to another handle, so it was committed
      assert.equal(fixture.count('tracks'), 3);
    });

    it('reports success for DDL', () => {
      const result = executeQuery('CREATE TABLE albums (AlbumId INTEGER PRIMARY KEY, Title TEXT)', conn);
      assert.deepEqual(result, { kind: 'status', message: 'Query executed successfully.', changes: 0 });
    });

    it('commits a write led by a WITH clause', () => {
      const result = executeQuery("WITH n(x) AS (SELECT 'New') INSERT INTO tracks (Name) SELECT x FROM n", conn);
      assert.deepEqual(result, { kind: 'status', message: WRITE_SUCCESS_MESSAGE, changes: 1 });
      assert.equal(fixture.count('tracks'), 3);
    });

    it('returns rows for WITH and VALUES reads', () => {
      assert.deepEqual(executeQuery('WITH n(x) AS (SELECT 5) SELECT x FROM n', conn), {
        kind: 'rows',
        columns: ['x'],
        rows: [[['x', 5]]],
      });
      assert.deepEqual(executeQuery("VALUES (1, 'a')", conn), {
        kind: 'rows',
        columns: ['column1', 'column2'],
        rows: [[['column1', 1], ['column2', 'a']]],
      });
    });

    it('runs statements that SQLite refuses inside a transaction', () => {
      for (const sql of ['VACUUM', 'PRAGMA journal_mode = WAL']) {
        const result = executeQuery(sql, conn);
        assert.equal(result.kind, 'status', JSON.stringify(result));
      }
    });

    it('reads integers beyond 2^53 exactly', () => {
      const result = executeQuery('SELECT 9007199254740993 AS big, 7 AS small', conn);
      assert.deepEqual(result, {
        kind: 'rows',
        columns: ['big', 'small'],
        rows: [[['big', 9007199254740993n], ['small', 7]]],
      });
    });

    // Leading-keyword heuristic: a comment hides the SELECT, so it runs as a write.
    it('treats a comment-led SELECT as a write', () => {
      assert.deepEqual(executeQuery('-- note\nSELECT 1', conn), {
        kind: 'status',
        message: WRITE_SUCCESS_MESSAGE,
        changes: 0,
      });
    });

    it('returns an error for invalid SQL and leaves data alone', () => {
      const result = executeQuery('DELET FROM tracks', conn);
      assert.equal(result.kind, 'error');
      if (result.kind === 'error') {
        assert.ok(result.message.startsWith('Invalid SQL Query: '), result.message);
      }
      assert.equal(fixture.count('tracks'), 2);
    });

    it('converts run-time engine errors', () => {
      const result = executeQuery('INSERT INTO tracks (Name) VALUES (NULL)', conn);
      assert.deepEqual(result, {
        kind: 'error',
        message: 'SQL execution error: NOT NULL constraint failed: tracks.Name',
      });
      assert.equal(fixture.count('tracks'), 2);
    });

    it('does not throw on a closed connection', () => {
      conn.close();
      const result = executeQuery('SELECT 1', conn);
      assert.equal(result.kind, 'error');
      if (result.kind === 'error') {
        assert.ok(result.message.startsWith('Invalid SQL Query: '), result.message);
      }
    });
  });

  describe('executeWithValidation with a policy', () => {
    it('blocks writes in read-only mode after validation', () => {
      const execution = executeWithValidation('DELETE FROM tracks', conn, { policy: { readOnly: true } });
      assert.deepEqual(execution.validation, { valid: true });
      assert.equal(execution.blocked, true);
      assert.equal(execution.result.kind, 'error');
      if (execution.result.kind === 'error') {
        assert.match(execution.result.message, /^Query blocked by policy: /);
      }
      assert.equal(fixture.count('tracks'), 2);
    });

    it('reports invalid SQL before consulting the policy', () => {
      const execution = executeWithValidation('SELEC 1', conn, { policy: { readOnly: true } });
      assert.equal(execution.blocked, false);
      assert.equal(execution.validation.valid, false);
    });

    it('runs reads in read-only mode', () => {
      const execution = executeWithValidation('SELECT Name FROM tracks ORDER BY TrackId', conn, {
        policy: { readOnly: true },
      });
      assert.equal(execution.blocked, false);
      assert.deepEqual(execution.result, {
        kind: 'rows',
        columns: ['Name'],
        rows: [[['Name', 'Intro']], [['Name', 'Outro']]],
      });
    });
  });
});

describe('row helpers', () => {
  const row = [
    ['id', 1],
    ['name', 'a'],
    ['id', 2],
  ] as const;

  it('rowToObject lets the last duplicate win', () => {
    assert.deepEqual(rowToObject(row), { id: 2, name: 'a' });
  });

  it('rowValue returns the first match', () => {
    assert.equal(rowValue(row, 'id'), 1);
    assert.equal(rowValue(row, 'missing'), undefined);
  });
});

describe('SqliteConnection.open', () => {
  it('refuses a missing file instead of creating one', () => {
    assert.throws(() => SqliteConnection.open('/nonexistent/askdb/none.sqlite'), {
      name: 'ConnectionError',
    });
  });

  it('opens an in-memory database', () => {
    const mem = SqliteConnection.open(':memory:');
    try {
      assert.equal(mem.isOpen(), true);
      assert.deepEqual(mem.listTables(), []);
    } finally {
      mem.close();
    }
    assert.equal(mem.isOpen(), false);
  });

  it('rejects more than one statement per call', () => {
    const mem = SqliteConnection.open(':memory:');
    try {
      assert.equal(executeQuery('SELECT 1; SELECT 2', mem).kind, 'error');
    } finally {
      mem.close();
    }
  });
});
