import { ReliableMessagingError } from './error';

/**
 * A unit of work for the in-memory stores. Writes are staged and only applied
 * on commit. The same transaction can be shared by the in-memory outbox and
 * inbox stores and your own in-memory business state.
 */
export interface InMemoryTransaction {
  readonly state: 'open' | 'committed' | 'rolled-back';
  /** Register an action that is executed when the transaction commits. */
  onCommit(action: () => void): void;
  /** Register an action that is executed when the transaction is rolled back. */
  onRollback(action: () => void): void;
  commit(): void;
  rollback(): void;
}

export const createInMemoryTransaction = (): InMemoryTransaction => {
  const commitActions: (() => void)[] = [];
  const rollbackActions: (() => void)[] = [];
  let state: InMemoryTransaction['state'] = 'open';
  const ensureOpen = () => {
    if (state !== 'open') {
      throw new ReliableMessagingError(
        `The in-memory transaction is already ${state}.`,
        'DB_ERROR',
      );
    }
  };
  return {
    get state() {
      return state;
    },
    onCommit(action) {
      ensureOpen();
      commitActions.push(action);
    },
    onRollback(action) {
      ensureOpen();
      rollbackActions.push(action);
    },
    commit() {
      ensureOpen();
      state = 'committed';
      commitActions.forEach((action) => action());
    },
    rollback() {
      ensureOpen();
      state = 'rolled-back';
      rollbackActions.forEach((action) => action());
    },
  };
};

/**
 * Open an in-memory transaction and execute the callback as part of it. The
 * staged writes are applied when the callback resolves and discarded when it
 * throws.
 * @returns The result of the callback (if any).
 * @throws Any error from the callback.
 */
export const executeInMemoryTransaction = async <T>(
  callback: (transaction: InMemoryTransaction) => Promise<T>,
): Promise<T> => {
  const transaction = createInMemoryTransaction();
  try {
    const result = await callback(transaction);
    transaction.commit();
    return result;
  } catch (error) {
    if (transaction.state === 'open') {
      transaction.rollback();
    }
    throw error;
  }
};
