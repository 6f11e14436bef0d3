import { Message, StoredOutboxMessage } from '../message/message';

export interface DispatchFailure {
  /** When the failure happened */
  failedAt: Date;
  /** The earliest time to retry the message. Ignored for poisoned messages. */
  nextAttemptAt: Date | null;
  /** Stop retrying the message - it needs operator attention */
  poisoned: boolean;
}

/**
 * The outbox operations the dispatcher needs. They do not take part in a
 * caller transaction.
 */
export interface OutboxDispatchStore {
  /**
   * Get the pending messages ordered by their `createdId`. Poisoned messages
   * and messages that wait for their backoff to pass are excluded.
   * @param maxCount The maximum number of messages to return
   * @param olderThan Exclude messages created after this time. Protects against reading rows of transactions that did not commit yet.
   */
  getUndispatched(
    maxCount: number,
    olderThan?: Date,
  ): Promise<StoredOutboxMessage[]>;

  /** Load the messages with the given ids ordered by their `createdId`. */
  getByIds(ids: string[]): Promise<StoredOutboxMessage[]>;

  /**
   * Compare-and-set the dispatched time: only messages that are still pending
   * are updated. Marking an already dispatched message is not an error.
   * @returns The ids of the messages that were updated by this call.
   */
  markDispatched(ids: string[], dispatchedAt: Date): Promise<string[]>;

  /** Increment the failed attempts and store when to retry or that the message is poisoned. */
  recordDispatchFailure(
    messageId: string,
    failure: DispatchFailure,
  ): Promise<void>;

  /** Get the pending messages that were poisoned ordered by their `createdId`. */
  getPoisoned(maxCount: number): Promise<StoredOutboxMessage[]>;

  /**
   * Delete messages that were dispatched before the given time.
   * @returns The number of deleted messages.
   */
  deleteDispatched(olderThan: Date): Promise<number>;
}

/**
 * The outbox storage capability. `TTransaction` is the storage specific
 * transaction context of the caller, e.g. a PostgreSQL client with an active
 * transaction.
 */
export interface OutboxStore<TTransaction> extends OutboxDispatchStore {
  /**
   * Insert the message as part of the caller's transaction so it commits
   * together with the business changes.
   * @throws StorageError if the message id exists already.
   */
  deposit(message: Message, transaction: TTransaction): Promise<void>;
}
