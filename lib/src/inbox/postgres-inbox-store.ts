import { Pool } from 'pg';
import {
  DatabaseClient,
  getClient,
  isPgSerializationError,
  isPgUniqueViolation,
} from '../common/database';
import {
  defineEnvSettings,
  fallbackEnvPrefix,
  inboxEnvPrefix,
} from '../common/env-settings';
import {
  DuplicateKeyError,
  ReliableMessagingError,
  StorageError,
} from '../common/error';
import { MessagingLogger } from '../common/logger';
import {
  IsolationLevel,
  executeTransaction as runTransaction,
  sleep,
} from '../common/utils';
import { InboxRecord } from '../message/message';
import { InboxConflictAction, InboxStore } from './inbox-store';

export interface PostgresInboxStoreSettings {
  /** The database schema name where the inbox table is located */
  dbSchema: string;
  /** The name of the inbox table */
  dbTable: string;
  /** The isolation level of the handler transactions. Uses the PostgreSQL default if not set. */
  isolationLevel?: IsolationLevel;
}

const inboxStoreSettings = defineEnvSettings<PostgresInboxStoreSettings>(
  inboxEnvPrefix,
  fallbackEnvPrefix,
  (read) => {
    const isolationLevel = read.oneOf<'DEFAULT' | IsolationLevel>(
      'ISOLATION_LEVEL',
      ['DEFAULT', ...Object.values(IsolationLevel)],
      'DEFAULT',
    );
    return {
      dbSchema: read.string('DB_SCHEMA', 'public'),
      dbTable: read.string('DB_TABLE', 'inbox', { skipFallback: true }),
      isolationLevel:
        isolationLevel === 'DEFAULT' ? undefined : isolationLevel,
    };
  },
);

/** Loads the inbox table settings from the "MSG_INBOX_" ENV variables. */
export const getPostgresInboxStoreSettings = inboxStoreSettings.load;
/** Prints the inbox table ENV variables with their default values. */
export const getPostgresInboxStoreEnvTemplate = inboxStoreSettings.template;

const maxSerializationAttempts = 3;

/**
 * An inbox store based on a PostgreSQL table with the columns `command_id`,
 * `context_key`, `timestamp`, `command_type`, `command_body` (bytea) and
 * `expire_after_in_sec`. The unique constraint on (command_id, context_key)
 * is required: a concurrent insert waits for the other transaction and fails
 * with a unique violation if that one committed. Transactions that fail with
 * a serialization failure or a deadlock are run again up to three times.
 * @param pool The pool that provides the clients for the handler transactions.
 * @param settings The inbox table location.
 * @param logger A logger for the storage failures.
 */
export const createPostgresInboxStore = (
  pool: Pool,
  { dbSchema, dbTable, isolationLevel }: PostgresInboxStoreSettings,
  logger: MessagingLogger,
): InboxStore<DatabaseClient> => {
  const table = `${dbSchema}.${dbTable}`;

  const query = (sql: string, values: unknown[], client?: DatabaseClient) =>
    client ? client.query(sql, values) : pool.query(sql, values);

  const toStorageError = (operation: string, error: unknown) => {
    if (error instanceof ReliableMessagingError) {
      return error;
    }
    const storageError = new StorageError(
      `The inbox operation "${operation}" failed.`,
      error,
    );
    logger.error(storageError, storageError.message);
    return storageError;
  };

  return {
    async exists(commandId, contextKey, client) {
      try {
        const result = await query(
          /* sql */ `SELECT 1 FROM ${table} WHERE command_id = $1 AND context_key = $2;`,
          [commandId, contextKey],
          client,
        );
        return (result.rowCount ?? 0) > 0;
      } catch (error) {
        throw toStorageError('exists', error);
      }
    },

    async add(
      record: InboxRecord,
      client?: DatabaseClient,
      onConflict: InboxConflictAction = 'throw',
    ) {
      const conflictClause =
        onConflict === 'ignore'
          ? /* sql */ ' ON CONFLICT (command_id, context_key) DO NOTHING'
          : '';
      try {
        const result = await query(
          /* sql */ `
          INSERT INTO ${table}
            (command_id, context_key, timestamp, command_type, command_body, expire_after_in_sec)
            VALUES ($1, $2, $3, $4, $5, $6)${conflictClause};`,
          [
            record.commandId,
            record.contextKey,
            record.timestamp,
            record.commandType,
            record.commandBody,
            record.expireAfterInSec ?? null,
          ],
          client,
        );
        return (result.rowCount ?? 0) > 0;
      } catch (error) {
        if (isPgUniqueViolation(error)) {
          throw new DuplicateKeyError(
            record.commandId,
            record.contextKey,
            error,
          );
        }
        throw toStorageError('add', error);
      }
    },

    async executeTransaction<T>(
      callback: (client: DatabaseClient) => Promise<T>,
    ) {
      for (let attempt = 1; ; attempt++) {
        const client = await getClient(pool, logger);
        try {
          return await runTransaction(client, callback, isolationLevel);
        } catch (error) {
          // serialization failure = 40001 and deadlock detected = 40P01
          if (
            attempt >= maxSerializationAttempts ||
            !isPgSerializationError(error)
          ) {
            throw error;
          }
          logger.debug(
            `Retrying the inbox transaction after a serialization failure (attempt ${attempt}).`,
          );
          await sleep(attempt * 100);
        }
      }
    },

    async deleteExpired(now: Date) {
      try {
        const result = await pool.query(
          /* sql */ `
          DELETE FROM ${table}
            WHERE expire_after_in_sec IS NOT NULL
              AND timestamp + expire_after_in_sec * INTERVAL '1 second' < $1;`,
          [now],
        );
        return result.rowCount ?? 0;
      } catch (error) {
        throw toStorageError('deleteExpired', error);
      }
    },
  };
};
