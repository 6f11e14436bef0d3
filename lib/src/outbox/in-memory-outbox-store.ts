import { StorageError } from '../common/error';
import { InMemoryTransaction } from '../common/in-memory-transaction';
import { Message, StoredOutboxMessage } from '../message/message';
import { DispatchFailure, OutboxStore } from './outbox-store';

export interface InMemoryOutboxStore extends OutboxStore<InMemoryTransaction> {
  /** All stored messages ordered by their `createdId`. */
  readonly messages: readonly StoredOutboxMessage[];
}

/**
 * An outbox store that keeps the messages in memory. Deposited messages
 * become visible when the in-memory transaction commits.
 * @param now The clock used for the created dates.
 */
export const createInMemoryOutboxStore = (
  now: () => Date = () => new Date(),
): InMemoryOutboxStore => {
  const rows = new Map<string, StoredOutboxMessage>();
  const reserved = new Set<string>();
  let sequence = 0;

  const sorted = () =>
    Array.from(rows.values()).sort((a, b) => a.createdId - b.createdId);
  const copy = (row: StoredOutboxMessage): StoredOutboxMessage => ({
    ...row,
    headerBag: { ...row.headerBag },
    baggage: row.baggage ? { ...row.baggage } : undefined,
    body: Buffer.from(row.body),
  });
  const isPending = (row: StoredOutboxMessage, at: Date) =>
    row.dispatched === null &&
    row.poisonedAt === null &&
    (row.nextAttemptAt === null || new Date(row.nextAttemptAt) <= at);
  // An earlier message of the same group in backoff or poisoned holds back the later ones
  const isBlocked = (
    row: StoredOutboxMessage,
    all: StoredOutboxMessage[],
    at: Date,
  ) =>
    row.partitionKey !== undefined &&
    all.some(
      (earlier) =>
        earlier.createdId < row.createdId &&
        earlier.topic === row.topic &&
        earlier.partitionKey === row.partitionKey &&
        earlier.dispatched === null &&
        !isPending(earlier, at),
    );

  return {
    get messages() {
      return sorted().map(copy);
    },

    async deposit(message: Message, transaction: InMemoryTransaction) {
      const { messageId } = message;
      if (rows.has(messageId) || reserved.has(messageId)) {
        throw new StorageError(
          `The outbox message with id ${messageId} exists already.`,
        );
      }
      reserved.add(messageId);
      transaction.onRollback(() => reserved.delete(messageId));
      transaction.onCommit(() => {
        reserved.delete(messageId);
        rows.set(messageId, {
          ...message,
          headerBag: { ...message.headerBag },
          baggage: message.baggage ? { ...message.baggage } : undefined,
          body: Buffer.from(message.body),
          dispatched: null,
          created: now().toISOString(),
          createdId: ++sequence,
          dispatchAttempts: 0,
          nextAttemptAt: null,
          poisonedAt: null,
        });
      });
    },

    async getUndispatched(maxCount: number, olderThan?: Date) {
      const at = now();
      const all = sorted();
      return all
        .filter(
          (row) =>
            isPending(row, at) &&
            !isBlocked(row, all, at) &&
            (!olderThan || new Date(row.created) <= olderThan),
        )
        .slice(0, maxCount)
        .map(copy);
    },

    async getByIds(ids: string[]) {
      return sorted()
        .filter((row) => ids.includes(row.messageId))
        .map(copy);
    },

    async markDispatched(ids: string[], dispatchedAt: Date) {
      const updated: string[] = [];
      for (const id of ids) {
        const row = rows.get(id);
        if (row && row.dispatched === null) {
          row.dispatched = dispatchedAt.toISOString();
          updated.push(id);
        }
      }
      return updated;
    },

    async recordDispatchFailure(messageId: string, failure: DispatchFailure) {
      const row = rows.get(messageId);
      if (!row || row.dispatched !== null) {
        return;
      }
      row.dispatchAttempts++;
      row.nextAttemptAt = failure.poisoned
        ? null
        : failure.nextAttemptAt?.toISOString() ?? null;
      row.poisonedAt = failure.poisoned ? failure.failedAt.toISOString() : null;
    },

    async getPoisoned(maxCount: number) {
      return sorted()
        .filter((row) => row.dispatched === null && row.poisonedAt !== null)
        .slice(0, maxCount)
        .map(copy);
    },

    async deleteDispatched(olderThan: Date) {
      let deleted = 0;
      for (const [id, row] of rows) {
        if (row.dispatched !== null && new Date(row.dispatched) < olderThan) {
          rows.delete(id);
          deleted++;
        }
      }
      return deleted;
    },
  };
};
