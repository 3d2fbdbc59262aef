import type { Database, TransactionControl } from './database.js';
import { BeginError, CommitError, misuse, translateError } from './errors.js';
import { scoped } from './scope.js';

export type TransactionMode = 'DEFERRED' | 'IMMEDIATE' | 'EXCLUSIVE';

export type TransactionState = 'active' | 'committed' | 'rolled_back';

function getBeginStatement(mode: TransactionMode): TransactionControl {
  if (mode === 'IMMEDIATE') return 'BEGIN IMMEDIATE';
  if (mode === 'EXCLUSIVE') return 'BEGIN EXCLUSIVE';
  return 'BEGIN';
}

/**
 * A transaction scope on one Database.
 *
 * It begins on construction. `commit()` ends it; otherwise `dispose()` rolls
 * it back. `dispose()` never throws, so it is safe on every exit path,
 * including while another error propagates.
 */
export class Transaction {
  private state: TransactionState = 'active';

  /**
   * @throws BeginError when a transaction is already open or the engine refuses
   */
  constructor(
    private readonly db: Database,
    mode: TransactionMode = 'DEFERRED',
  ) {
    try {
      db.execTransactionControl(getBeginStatement(mode));
    } catch (error) {
      throw translateError(BeginError, error);
    }
  }

  getState(): TransactionState {
    return this.state;
  }

  isActive(): boolean {
    return this.state === 'active';
  }

  /**
   * @throws CommitError when already committed or rolled back, or when the
   *   engine rejects the COMMIT (the transaction then stays active)
   */
  commit(): void {
    if (this.state === 'committed') {
      throw misuse(CommitError, 'transaction already committed');
    }
    if (this.state === 'rolled_back') {
      throw misuse(CommitError, 'transaction already rolled back');
    }

    try {
      this.db.execTransactionControl('COMMIT');
    } catch (error) {
      throw translateError(CommitError, error);
    }
    this.state = 'committed';
  }

  /**
   * Roll back if still active. A failing ROLLBACK is logged, not thrown.
   */
  dispose(): void {
    if (this.state !== 'active') return;
    this.state = 'rolled_back';

    try {
      this.db.execTransactionControl('ROLLBACK');
    } catch (error) {
      this.db.getLogger().warn('[sqlite] rollback failed', {
        filename: this.db.getFilename(),
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

/**
 * Run `fn` inside a transaction that is rolled back unless `fn` commits it.
 *
 * Nothing is committed implicitly: call `tx.commit()` inside `fn`.
 */
export function withTransaction<T>(
  db: Database,
  fn: (tx: Transaction) => T,
  mode?: TransactionMode,
): T {
  return scoped(new Transaction(db, mode), fn);
}
