import { InboxRecord } from '../message/message';

/** How `add` reacts when the record identity exists already. */
export type InboxConflictAction = 'throw' | 'ignore';

/**
 * The inbox storage capability. `TTransaction` is the storage specific
 * transaction context that the message handler uses for its side effects so
 * they commit together with the inbox record.
 */
export interface InboxStore<TTransaction> {
  /**
   * Check if the command was already processed for the context key. Within a
   * transaction the records added by that transaction are visible.
   */
  exists(
    commandId: string,
    contextKey: string,
    transaction?: TTransaction,
  ): Promise<boolean>;

  /**
   * Store the record of a processed message.
   * @param onConflict "throw" raises a DuplicateKeyError, "ignore" skips the insert
   * @returns True if the record was inserted.
   * @throws DuplicateKeyError if the identity exists and `onConflict` is "throw".
   */
  add(
    record: InboxRecord,
    transaction?: TTransaction,
    onConflict?: InboxConflictAction,
  ): Promise<boolean>;

  /**
   * Open a storage transaction and run the callback within it. The
   * transaction is committed when the callback resolves and rolled back when
   * it throws.
   */
  executeTransaction<T>(
    callback: (transaction: TTransaction) => Promise<T>,
  ): Promise<T>;

  /**
   * Delete the records whose `expireAfterInSec` passed at the given time.
   * @returns The number of deleted records.
   */
  deleteExpired(now: Date): Promise<number>;
}
