import { PoolClient } from 'pg';
import { DatabaseClient } from './database';
import { TransportError, ensureExtendedError } from './error';

/**
 * Sleep for a given amount of milliseconds. An aborted signal ends the sleep
 * early and clears the timer.
 * @param milliseconds The time in milliseconds to sleep
 * @param signal Optional signal to wake up before the time passed
 * @returns The (void) promise to await
 */
export const sleep = async (
  milliseconds: number,
  signal?: AbortSignal,
): Promise<void> =>
  new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timeout);
      resolve();
    };
    const timeout = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, milliseconds);
    signal?.addEventListener('abort', onAbort, { once: true });
  });

/**
 * Run a promise but make sure to wait only a maximum amount of time for it to finish.
 * @param promise The promise to execute
 * @param timeoutInMs The amount of time in milliseconds to wait for the promise to finish
 * @param failureMessage The message for the error if the timeout was reached
 * @returns The promise return value or a timeout error is thrown
 */
export const awaitWithTimeout = <T>(
  promise: () => Promise<T>,
  timeoutInMs: number,
  failureMessage?: string,
): Promise<T> => {
  let timeoutHandle: NodeJS.Timeout | undefined;
  const timeoutPromise = new Promise<never>((_resolve, reject) => {
    timeoutHandle = setTimeout(
      () => reject(new TransportError(failureMessage ?? 'Timeout', 'TIMEOUT')),
      timeoutInMs,
    );
  });

  return Promise.race([promise(), timeoutPromise]).finally(() =>
    clearTimeout(timeoutHandle),
  );
};

/**
 * PostgreSQL available isolation levels. The isolation level "Read uncommitted"
 * is the same as "Read committed" in PostgreSQL. The readonly variants are
 * not usable as the inbox record is written in the handler transaction.
 */
export enum IsolationLevel {
  /** Highest protection - no serialization anomaly */
  Serializable = 'SERIALIZABLE',
  /** Second highest protection - no non-repeatable read */
  RepeatableRead = 'REPEATABLE READ',
  /** Lowest protection (same as read uncommitted in PG) - non-repeatable reads possible */
  ReadCommitted = 'READ COMMITTED',
}

/**
 * Open a transaction and execute the callback as part of the transaction. The
 * pool client is released afterwards.
 * @param client The PostgreSQL pool client
 * @param callback The callback to execute DB commands with.
 * @param isolationLevel The database transaction isolation level. Falls back to the default PostgreSQL transaction level if not provided.
 * @returns The result of the callback (if any).
 * @throws Any error from the database or the callback.
 */
export const executeTransaction = async <T>(
  client: PoolClient,
  callback: (client: DatabaseClient) => Promise<T>,
  isolationLevel?: IsolationLevel,
): Promise<T> => {
  const isolation = Object.values<string>(IsolationLevel).includes(
    isolationLevel ?? '',
  )
    ? isolationLevel
    : undefined;
  try {
    await client.query(
      isolation ? `START TRANSACTION ISOLATION LEVEL ${isolation}` : 'BEGIN',
    );
    const result = await callback(client);
    await client.query('COMMIT');
    client.release();
    return result;
  } catch (err) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackError) {
      const error = ensureExtendedError(err, 'DB_ERROR');
      error.innerError = ensureExtendedError(rollbackError, 'DB_ERROR');
      client.release(error);
      throw error;
    }
    client.release();
    throw err;
  }
};
