import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Database, OPEN_READWRITE } from '../database.js';
import { DatabaseError, StepError } from '../errors.js';
import type { Statement } from '../statement.js';

let db: Database;
let statement: Statement;

beforeEach(() => {
  db = new Database(':memory:', OPEN_READWRITE);
});

afterEach(() => {
  statement.close();
  db.close();
});

describe('stored types', () => {
  beforeEach(() => {
    statement = db.prepare("SELECT 1 AS i, 1.5 AS f, 'text' AS t, x'0102' AS b, NULL AS n");
    statement.executeStep();
  });

  it('reports the engine type of each cell', () => {
    const types = [0, 1, 2, 3, 4].map((index) => {
      const column = statement.getColumn(index);
      const type = column.getType();
      column.release();
      return type;
    });
    expect(types).toEqual(['integer', 'float', 'text', 'blob', 'null']);
  });

  it('answers the type tests', () => {
    const [i, f, t, b, n] = [0, 1, 2, 3, 4].map((index) => statement.getColumn(index));
    expect([i.isInteger(), i.isFloat()]).toEqual([true, false]);
    expect([f.isFloat(), f.isText()]).toEqual([true, false]);
    expect([t.isText(), t.isBlob()]).toEqual([true, false]);
    expect([b.isBlob(), b.isNull()]).toEqual([true, false]);
    expect([n.isNull(), n.isInteger()]).toEqual([true, false]);
    for (const column of [i, f, t, b, n]) column.release();
  });

  it('knows its name and index', () => {
    const column = statement.getColumn('t');
    expect(column.getName()).toBe('t');
    expect(column.getIndex()).toBe(2);
    column.release();
  });

  it('exposes the value as a tagged union', () => {
    const column = statement.getColumn(0);
    expect(column.getValue()).toEqual({ type: 'integer', value: 1n });
    column.release();
  });

  it('coerces between types instead of failing', () => {
    const [i, f, t, b, n] = [0, 1, 2, 3, 4].map((index) => statement.getColumn(index));

    expect(i.getText()).toBe('1');
    expect(i.getDouble()).toBe(1);
    expect(f.getText()).toBe('1.5');
    expect(f.getInt()).toBe(1);
    expect(t.getInt()).toBe(0);
    expect(t.getBlob()).toEqual(Buffer.from('text'));
    expect(b.getText()).toBe('\x01\x02');
    expect(n.getInt64()).toBe(0n);
    expect(n.getText()).toBe('');
    expect(n.getBlob()).toEqual(Buffer.alloc(0));

    for (const column of [i, f, t, b, n]) column.release();
  });

  it('reports byte sizes', () => {
    const sizes = [0, 1, 2, 3, 4].map((index) => {
      const column = statement.getColumn(index);
      const bytes = column.getBytes();
      column.release();
      return bytes;
    });
    expect(sizes).toEqual([1, 3, 4, 2, 0]);
  });

  it('renders as text', () => {
    const column = statement.getColumn(1);
    const chunks: string[] = [];
    column.writeTo({ write: (chunk: string) => chunks.push(chunk) });

    expect(chunks).toEqual(['1.5']);
    expect(`${column}`).toBe('1.5');
    column.release();
  });

  it('returns a blob copy that does not alias the row', () => {
    const column = statement.getColumn(3);
    const blob = column.getBlob();
    blob[0] = 0xff;
    expect(column.getBlob()).toEqual(Buffer.from([1, 2]));
    column.release();
  });
});

describe('lazy reads against the current row', () => {
  beforeEach(() => {
    db.exec("CREATE TABLE t (a INTEGER, b TEXT); INSERT INTO t VALUES (1, 'one'), (2, 'two')");
    statement = db.prepare('SELECT a, b FROM t ORDER BY a');
  });

  it('reads the row the statement is on, not the one it was drawn from', () => {
    statement.executeStep();
    const a = statement.getColumn(0);
    const b = statement.getColumn(1);
    expect(a.getInt()).toBe(1);
    expect(b.getText()).toBe('one');

    statement.executeStep();
    expect(a.getInt()).toBe(2);
    expect(b.getText()).toBe('two');

    a.release();
    b.release();
  });

  it('reads NULL once the statement is done', () => {
    statement.executeStep();
    const a = statement.getColumn(0);
    statement.executeStep();
    expect(statement.executeStep()).toBe(false);

    expect(a.isNull()).toBe(true);
    expect(a.getInt()).toBe(0);
    a.release();
  });

  it('reads NULL after reset and the first row again after stepping', () => {
    statement.executeStep();
    statement.executeStep();
    const a = statement.getColumn(0);
    expect(a.getInt()).toBe(2);

    statement.reset();
    expect(a.isNull()).toBe(true);

    statement.executeStep();
    expect(a.getInt()).toBe(1);
    a.release();
  });

  it('can be drawn before the first step', () => {
    const a = statement.getColumn(0);
    expect(a.isNull()).toBe(true);
    statement.executeStep();
    expect(a.getInt()).toBe(1);
    a.release();
  });
});

describe('error message', () => {
  beforeEach(() => {
    statement = db.prepare('SELECT json(?) AS j');
  });

  it('reports the latest engine failure of its statement', () => {
    const column = statement.getColumn(0);
    expect(column.getErrorMessage()).toBe('not an error');

    statement.bind(1, '{');
    expect(() => statement.executeStep()).toThrow(StepError);
    expect(column.getErrorMessage()).toBe('malformed JSON');
    expect(statement.getErrorMessage()).toBe('malformed JSON');

    statement.reset().bind(1, '{}');
    expect(statement.executeStep()).toBe(true);
    expect(column.getErrorMessage()).toBe('not an error');
    column.release();
  });
});

describe('shared ownership', () => {
  beforeEach(() => {
    statement = db.prepare("SELECT 'kept' AS v");
    statement.executeStep();
  });

  it('keeps the handle alive after the statement is closed', () => {
    const column = statement.getColumn(0);
    statement.close();

    expect(db.getStats().finalized).toBe(0);
    expect(column.getText()).toBe('kept');

    column.release();
    expect(db.getStats()).toMatchObject({ finalized: 1, live: 0 });
  });

  it('finalizes once after every copy is released, whatever the order', () => {
    const first = statement.getColumn(0);
    const second = first.copy();
    const third = second.copy();

    second.release();
    statement.close();
    first.release();
    first.release();
    expect(db.getStats().finalized).toBe(0);
    expect(third.getText()).toBe('kept');

    third.release();
    expect(db.getStats()).toMatchObject({ prepared: 1, finalized: 1, live: 0 });
  });

  it('refuses reads after its own release', () => {
    const column = statement.getColumn(0);
    column.release();

    expect(column.isReleased).toBe(true);
    expect(() => column.getText()).toThrow(DatabaseError);
    expect(() => column.copy()).toThrow('statement reference has been released');
  });
});
