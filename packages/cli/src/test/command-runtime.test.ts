import { describe, it, expect, vi } from 'vitest';
import { CloseError } from '@sqlcell/sqlite';
import { withCommandDatabase } from '../lib/command-runtime.js';

function createLoggerSpy() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

describe('withCommandDatabase', () => {
  it('returns the callback result and closes the database', () => {
    const logger = createLoggerSpy();
    let opened = false;
    const result = withCommandDatabase(':memory:', {}, logger, (db) => {
      opened = db.isOpen();
      return db.tableExists('missing');
    });

    expect(opened).toBe(true);
    expect(result).toBe(false);
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('rethrows the callback error when closing is refused on the way out', () => {
    const logger = createLoggerSpy();

    expect(() =>
      withCommandDatabase(':memory:', {}, logger, (db) => {
        const statement = db.prepare('SELECT 1');
        statement.executeStep();
        throw new Error('boom');
      }),
    ).toThrow('boom');

    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith('[sqlite] close failed', {
      filename: ':memory:',
      error: expect.any(String),
    });
  });

  it('surfaces a refused close when the callback succeeded', () => {
    const logger = createLoggerSpy();

    expect(() =>
      withCommandDatabase(':memory:', {}, logger, (db) => {
        db.prepare('SELECT 1').executeStep();
      }),
    ).toThrow(CloseError);
  });
});
