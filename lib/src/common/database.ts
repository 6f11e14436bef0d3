import { ClientBase, Pool, PoolClient } from 'pg';
import { ensureExtendedError } from './error';
import { MessagingLogger } from './logger';

/**
 * A PostgreSQL client from the "pg" library. Pool clients and plain clients
 * both qualify. Store operations that take part in a caller transaction get
 * the client that started the transaction.
 */
export type DatabaseClient = ClientBase;

/** Check if the given error is based on a PostgreSQL serialization or deadlock error. */
export const isPgSerializationError = (error: unknown): boolean =>
  // Trx Rollback: serialization failure = 40001 deadlock detected = 40P01
  hasPgErrorCode(error, '40001') || hasPgErrorCode(error, '40P01');

/** Check if the given error is a PostgreSQL unique constraint violation. */
export const isPgUniqueViolation = (error: unknown): boolean =>
  hasPgErrorCode(error, '23505');

const hasPgErrorCode = (error: unknown, code: string): boolean =>
  !!error &&
  typeof error === 'object' &&
  'code' in error &&
  error.code === code;

/**
 * Creates a PoolClient from the given pool and attaches the logger for error
 * logging. The pool can return a new or an old client - existing error
 * listeners are replaced.
 * @param pool A PostgreSQL database pool from which clients can be created.
 * @param logger A logger that will be registered for the on-error event of the client.
 * @returns The PoolClient object
 */
export const getClient = async (
  pool: Pool,
  logger: MessagingLogger,
): Promise<PoolClient> => {
  const client = await pool.connect();
  client.removeAllListeners('error');
  client.on('error', (err) => {
    logger.error(ensureExtendedError(err, 'DB_ERROR'), 'PostgreSQL client error');
  });
  return client;
};
