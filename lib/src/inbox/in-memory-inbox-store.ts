import { DuplicateKeyError } from '../common/error';
import {
  InMemoryTransaction,
  executeInMemoryTransaction,
} from '../common/in-memory-transaction';
import { InboxRecord } from '../message/message';
import { InboxConflictAction, InboxStore } from './inbox-store';

export interface InMemoryInboxStore extends InboxStore<InMemoryTransaction> {
  /** All committed records. */
  readonly records: readonly InboxRecord[];
}

const keyOf = (commandId: string, contextKey: string) =>
  JSON.stringify([contextKey, commandId]);

/**
 * An inbox store that keeps the records in memory. A record that is added in
 * an open transaction reserves its identity: a concurrent add from another
 * transaction fails right away instead of waiting for the first one to
 * finish. The reservation is released on rollback.
 */
export const createInMemoryInboxStore = (): InMemoryInboxStore => {
  const records = new Map<string, InboxRecord>();
  const reservations = new Map<string, InMemoryTransaction>();

  return {
    get records() {
      return Array.from(records.values()).map((r) => ({ ...r }));
    },

    async exists(commandId, contextKey, transaction) {
      const key = keyOf(commandId, contextKey);
      return (
        records.has(key) ||
        (transaction !== undefined && reservations.get(key) === transaction)
      );
    },

    async add(
      record: InboxRecord,
      transaction?: InMemoryTransaction,
      onConflict: InboxConflictAction = 'throw',
    ) {
      const key = keyOf(record.commandId, record.contextKey);
      if (records.has(key) || reservations.has(key)) {
        if (onConflict === 'ignore') {
          return false;
        }
        throw new DuplicateKeyError(record.commandId, record.contextKey);
      }
      const stored = { ...record };
      if (!transaction) {
        records.set(key, stored);
        return true;
      }
      reservations.set(key, transaction);
      transaction.onRollback(() => reservations.delete(key));
      transaction.onCommit(() => {
        reservations.delete(key);
        records.set(key, stored);
      });
      return true;
    },

    executeTransaction: executeInMemoryTransaction,

    async deleteExpired(now: Date) {
      let deleted = 0;
      for (const [key, record] of records) {
        if (
          record.expireAfterInSec !== undefined &&
          new Date(record.timestamp).getTime() +
            record.expireAfterInSec * 1000 <
            now.getTime()
        ) {
          records.delete(key);
          deleted++;
        }
      }
      return deleted;
    },
  };
};
