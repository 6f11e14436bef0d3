import { Pool } from 'pg';
import { DatabaseClient } from '../common/database';
import {
  defineEnvSettings,
  fallbackEnvPrefix,
  outboxEnvPrefix,
} from '../common/env-settings';
import { ReliableMessagingError, StorageError } from '../common/error';
import { MessagingLogger } from '../common/logger';
import { HeaderBag, Message, StoredOutboxMessage } from '../message/message';
import { DispatchFailure, OutboxStore } from './outbox-store';

export interface PostgresOutboxStoreSettings {
  /** The database schema name where the outbox table is located */
  dbSchema: string;
  /** The name of the outbox table */
  dbTable: string;
}

const outboxStoreSettings = defineEnvSettings<PostgresOutboxStoreSettings>(
  outboxEnvPrefix,
  fallbackEnvPrefix,
  (read) => ({
    dbSchema: read.string('DB_SCHEMA', 'public'),
    dbTable: read.string('DB_TABLE', 'outbox', { skipFallback: true }),
  }),
);

/** Loads the outbox table settings from the "MSG_OUTBOX_" ENV variables. */
export const getPostgresOutboxStoreSettings = outboxStoreSettings.load;
/** Prints the outbox table ENV variables with their default values. */
export const getPostgresOutboxStoreEnvTemplate = outboxStoreSettings.template;

type OutboxRow = {
  message_id: string;
  topic: string;
  message_type: string;
  timestamp: Date;
  correlation_id: string | null;
  reply_to: string | null;
  content_type: string | null;
  partition_key: string | null;
  workflow_id: string | null;
  job_id: string | null;
  source: string | null;
  type: string | null;
  data_schema: string | null;
  subject: string | null;
  trace_parent: string | null;
  trace_state: string | null;
  baggage: Record<string, string> | null;
  header_bag: HeaderBag | null;
  body: Buffer;
  dispatched: Date | null;
  created: Date;
  created_id: string;
  dispatch_attempts: number;
  next_attempt_at: Date | null;
  poisoned_at: Date | null;
};

const columns = /* sql */ `message_id, topic, message_type, timestamp,
  correlation_id, reply_to, content_type, partition_key, workflow_id, job_id,
  source, type, data_schema, subject, trace_parent, trace_state, baggage,
  header_bag, body, dispatched, created, created_id, dispatch_attempts,
  next_attempt_at, poisoned_at`;

const toIso = (date: Date | null): string | null =>
  date ? date.toISOString() : null;

const optional = <T>(value: T | null): T | undefined => value ?? undefined;

/** Maps the snake_case database row to the stored outbox message. */
const mapRow = (row: OutboxRow): StoredOutboxMessage => ({
  messageId: row.message_id,
  topic: row.topic,
  messageType: row.message_type,
  timestamp: row.timestamp.toISOString(),
  correlationId: optional(row.correlation_id),
  replyTo: optional(row.reply_to),
  contentType: optional(row.content_type),
  partitionKey: optional(row.partition_key),
  workflowId: optional(row.workflow_id),
  jobId: optional(row.job_id),
  source: optional(row.source),
  type: optional(row.type),
  dataSchema: optional(row.data_schema),
  subject: optional(row.subject),
  traceParent: optional(row.trace_parent),
  traceState: optional(row.trace_state),
  baggage: optional(row.baggage),
  headerBag: row.header_bag ?? {},
  body: row.body,
  dispatched: toIso(row.dispatched),
  created: row.created.toISOString(),
  // bigserial values are returned as strings by the pg driver
  createdId: Number(row.created_id),
  dispatchAttempts: row.dispatch_attempts,
  nextAttemptAt: toIso(row.next_attempt_at),
  poisonedAt: toIso(row.poisoned_at),
});

/**
 * An outbox store based on a PostgreSQL table. The table is expected to exist
 * with the columns of the `StoredOutboxMessage` in snake_case, `created_id`
 * as `bigserial`, `baggage` and `header_bag` as `json` (keeps the key order)
 * and `body` as `bytea`.
 * @param pool The pool for the queries that are not part of a caller transaction.
 * @param settings The outbox table location.
 * @param logger A logger for the storage failures.
 */
export const createPostgresOutboxStore = (
  pool: Pool,
  { dbSchema, dbTable }: PostgresOutboxStoreSettings,
  logger: MessagingLogger,
): OutboxStore<DatabaseClient> => {
  const table = `${dbSchema}.${dbTable}`;

  const run = async <T>(
    operation: string,
    action: () => Promise<T>,
  ): Promise<T> => {
    try {
      return await action();
    } catch (error) {
      if (error instanceof ReliableMessagingError) {
        throw error;
      }
      const storageError = new StorageError(
        `The outbox operation "${operation}" failed.`,
        error,
      );
      logger.error(storageError, storageError.message);
      throw storageError;
    }
  };

  return {
    deposit: (message: Message, client: DatabaseClient) =>
      run('deposit', async () => {
        await client.query(
          /* sql */ `
          INSERT INTO ${table}
            (message_id, topic, message_type, timestamp, correlation_id,
             reply_to, content_type, partition_key, workflow_id, job_id,
             source, type, data_schema, subject, trace_parent, trace_state,
             baggage, header_bag, body)
          VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13,
                  $14, $15, $16, $17, $18, $19);`,
          [
            message.messageId,
            message.topic,
            message.messageType,
            message.timestamp,
            message.correlationId,
            message.replyTo,
            message.contentType,
            message.partitionKey,
            message.workflowId,
            message.jobId,
            message.source,
            message.type,
            message.dataSchema,
            message.subject,
            message.traceParent,
            message.traceState,
            message.baggage ? JSON.stringify(message.baggage) : null,
            JSON.stringify(message.headerBag),
            message.body,
          ],
        );
      }),

    getUndispatched: (maxCount: number, olderThan?: Date) =>
      run('getUndispatched', async () => {
        const values: unknown[] = [maxCount];
        let createdFilter = '';
        if (olderThan) {
          values.push(olderThan);
          createdFilter = /* sql */ `AND created <= $2`;
        }
        const result = await pool.query<OutboxRow>(
          /* sql */ `
          SELECT ${columns} FROM ${table} AS pending
            WHERE dispatched IS NULL AND poisoned_at IS NULL
              AND (next_attempt_at IS NULL OR next_attempt_at <= NOW())
              ${createdFilter}
              AND NOT EXISTS (SELECT 1 FROM ${table} AS earlier
                WHERE earlier.topic = pending.topic
                  AND earlier.partition_key = pending.partition_key
                  AND earlier.created_id < pending.created_id
                  AND earlier.dispatched IS NULL
                  AND (earlier.poisoned_at IS NOT NULL OR earlier.next_attempt_at > NOW()))
            ORDER BY created_id ASC
            LIMIT $1;`,
          values,
        );
        return result.rows.map(mapRow);
      }),

    getByIds: (ids: string[]) =>
      run('getByIds', async () => {
        const result = await pool.query<OutboxRow>(
          /* sql */ `
          SELECT ${columns} FROM ${table}
            WHERE message_id = ANY($1::text[])
            ORDER BY created_id ASC;`,
          [ids],
        );
        return result.rows.map(mapRow);
      }),

    markDispatched: (ids: string[], dispatchedAt: Date) =>
      run('markDispatched', async () => {
        if (ids.length === 0) {
          return [];
        }
        const result = await pool.query<{ message_id: string }>(
          /* sql */ `
          UPDATE ${table} SET dispatched = $2
            WHERE message_id = ANY($1::text[]) AND dispatched IS NULL
            RETURNING message_id;`,
          [ids, dispatchedAt],
        );
        return result.rows.map((row) => row.message_id);
      }),

    recordDispatchFailure: (
      messageId: string,
      { failedAt, nextAttemptAt, poisoned }: DispatchFailure,
    ) =>
      run('recordDispatchFailure', async () => {
        await pool.query(
          /* sql */ `
          UPDATE ${table}
            SET dispatch_attempts = dispatch_attempts + 1,
                next_attempt_at = $2, poisoned_at = $3
            WHERE message_id = $1 AND dispatched IS NULL;`,
          [messageId, poisoned ? null : nextAttemptAt, poisoned ? failedAt : null],
        );
      }),

    getPoisoned: (maxCount: number) =>
      run('getPoisoned', async () => {
        const result = await pool.query<OutboxRow>(
          /* sql */ `
          SELECT ${columns} FROM ${table}
            WHERE dispatched IS NULL AND poisoned_at IS NOT NULL
            ORDER BY created_id ASC
            LIMIT $1;`,
          [maxCount],
        );
        return result.rows.map(mapRow);
      }),

    deleteDispatched: (olderThan: Date) =>
      run('deleteDispatched', async () => {
        const result = await pool.query(
          /* sql */ `DELETE FROM ${table} WHERE dispatched < $1;`,
          [olderThan],
        );
        return result.rowCount ?? 0;
      }),
  };
};
