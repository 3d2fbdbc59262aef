import { describe, it, expect, beforeAll, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import chalk from 'chalk';
import { Database, OPEN_CREATE, OPEN_READWRITE } from '@sqlcell/sqlite';
import { runCli } from '../lib/program.js';

let tmpDir: string;
let dbPath: string;

function createIO() {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    io: {
      out: (line: string) => {
        out.push(line);
      },
      err: (line: string) => {
        err.push(line);
      },
    },
  };
}

function seed(): void {
  const db = new Database(dbPath, OPEN_READWRITE | OPEN_CREATE);
  db.exec("CREATE TABLE users (id INTEGER PRIMARY KEY, name TEXT); INSERT INTO users (name) VALUES ('ann'), ('bob')");
  db.close();
}

beforeAll(() => {
  chalk.level = 0;
});

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'sqlcell-cli-'));
  dbPath = path.join(tmpDir, 'app.db');
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe('sqlcell exec', () => {
  it('creates the file with --create and reports changed rows', async () => {
    const { out, io } = createIO();
    const code = await runCli(
      ['node', 'sqlcell', '--create', 'exec', dbPath, "CREATE TABLE t (a); INSERT INTO t VALUES (1), (2)"],
      io,
    );

    expect(code).toBe(0);
    expect(out).toEqual(['✓ 2 rows changed']);
    expect(fs.existsSync(dbPath)).toBe(true);
  });

  it('reports a summary as JSON', async () => {
    seed();
    const { out, io } = createIO();
    const code = await runCli(['node', 'sqlcell', 'exec', dbPath, "INSERT INTO users (name) VALUES ('cy')", '--json'], io);

    expect(code).toBe(0);
    expect(JSON.parse(out[0])).toEqual({ success: true, changes: 1, totalChanges: 1, lastInsertRowid: '3' });
  });

  it('fails with exit code 1 when the file is missing and --create is not given', async () => {
    const { err, io } = createIO();
    const code = await runCli(['node', 'sqlcell', 'exec', dbPath, 'CREATE TABLE t (a)'], io);

    expect(code).toBe(1);
    expect(err[0]).toMatch(/^✗ .* \(SQLITE_CANTOPEN[A-Z_]*\)$/);
    expect(fs.existsSync(dbPath)).toBe(false);
  });

  it('refuses writes with --readonly', async () => {
    seed();
    const { err, io } = createIO();
    const code = await runCli(['node', 'sqlcell', '--readonly', 'exec', dbPath, 'DELETE FROM users'], io);

    expect(code).toBe(1);
    expect(err[0]).toMatch(/\(SQLITE_READONLY[A-Z_]*\)$/);
  });
});

describe('sqlcell query', () => {
  beforeEach(() => {
    seed();
  });

  it('prints rows as a table', async () => {
    const { out, io } = createIO();
    const code = await runCli(['node', 'sqlcell', 'query', dbPath, 'SELECT id, name FROM users ORDER BY id'], io);

    expect(code).toBe(0);
    expect(out).toEqual(['id | name', '---+-----', '1  | ann', '2  | bob', '(2 rows)']);
  });

  it('binds --param values and prints JSON', async () => {
    const { out, io } = createIO();
    const code = await runCli(
      ['node', 'sqlcell', 'query', dbPath, 'SELECT id, name FROM users WHERE id = ?', '--param', '2', '--json'],
      io,
    );

    expect(code).toBe(0);
    expect(JSON.parse(out[0])).toEqual([{ id: 2, name: 'bob' }]);
  });

  it('infers parameter types', async () => {
    const { out, io } = createIO();
    await runCli(
      [
        'node',
        'sqlcell',
        'query',
        dbPath,
        'SELECT typeof(?) AS a, typeof(?) AS b, typeof(?) AS c, typeof(?) AS d',
        '--param',
        '7',
        '2.5',
        'null',
        'hi',
        '--json',
      ],
      io,
    );

    expect(JSON.parse(out[0])).toEqual([{ a: 'integer', b: 'real', c: 'null', d: 'text' }]);
  });

  it('renders engine errors as JSON with exit code 1', async () => {
    const { out, io } = createIO();
    const code = await runCli(['node', 'sqlcell', 'query', dbPath, 'SELECT * FROM missing', '--json'], io);

    expect(code).toBe(1);
    expect(out).toEqual(['{"success":false,"error":"no such table: missing","code":"SQLITE_ERROR"}']);
  });

  it('logs every statement with --verbose', async () => {
    const { err, io } = createIO();
    await runCli(['node', 'sqlcell', '--verbose', 'query', dbPath, 'SELECT 1'], io);

    expect(err).toContainEqual(expect.stringMatching(/^\[info\] \[sqlite\]( \[SLOW\])? \d+ms: SELECT 1$/));
  });
});

describe('sqlcell tables', () => {
  it('lists user tables', async () => {
    seed();
    const { out, io } = createIO();
    const code = await runCli(['node', 'sqlcell', 'tables', dbPath, '--json'], io);

    expect(code).toBe(0);
    expect(out).toEqual(['["users"]']);
  });
});

describe('program', () => {
  it('prints its version', async () => {
    const { out, io } = createIO();
    expect(await runCli(['node', 'sqlcell', '--version'], io)).toBe(0);
    expect(out).toEqual(['0.1.0']);
  });

  it('rejects an invalid --timeout', async () => {
    const { err, io } = createIO();
    const code = await runCli(['node', 'sqlcell', '--timeout', 'soon', 'tables', dbPath], io);

    expect(code).toBe(1);
    expect(err.join('\n')).toMatch(/non-negative integer/);
  });
});
