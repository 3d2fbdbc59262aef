import { describe, it, expect, vi } from 'vitest';
import { Database, OPEN_READWRITE } from '../database.js';
import { scoped } from '../scope.js';

describe('scoped', () => {
  it('returns the callback result and cleans up', () => {
    const resource = { dispose: vi.fn() };
    expect(scoped(resource, () => 42)).toBe(42);
    expect(resource.dispose).toHaveBeenCalledTimes(1);
  });

  it('cleans up when the callback throws', () => {
    const resource = { close: vi.fn() };
    expect(() =>
      scoped(resource, () => {
        throw new Error('boom');
      }),
    ).toThrow('boom');
    expect(resource.close).toHaveBeenCalledTimes(1);
  });

  it('releases resources that only know release', () => {
    const resource = { release: vi.fn() };
    scoped(resource, () => undefined);
    expect(resource.release).toHaveBeenCalledTimes(1);
  });

  it('closes a statement at scope exit', () => {
    const db = new Database(':memory:', OPEN_READWRITE);
    const text = scoped(db.prepare("SELECT 'scoped'"), (statement) => {
      statement.executeStep();
      return scoped(statement.getColumn(0), (column) => column.getText());
    });

    expect(text).toBe('scoped');
    expect(db.getStats()).toMatchObject({ prepared: 1, finalized: 1, live: 0 });
    db.close();
  });
});
