import { ConfigurationError, ExtendedError } from '../common/error';
import { StoredOutboxMessage } from '../message/message';
import { DispatchFailure } from '../outbox/outbox-store';
import { FullOutboxDispatcherConfig } from './config';

/**
 * Decides when a message that could not be published is tried again or if it
 * is poisoned. The failed attempts before the current one are available in
 * the message object.
 */
export interface DispatchRetryStrategy {
  (
    message: StoredOutboxMessage,
    error: ExtendedError,
    failedAt: Date,
  ): DispatchFailure;
}

/**
 * Get the default dispatch retry strategy. Configuration errors poison the
 * message right away. Other errors are retried with an exponential backoff
 * (`backoffBaseInMs` doubled per attempt up to `backoffMaxInMs`) until
 * `maxDispatchAttempts` is reached.
 */
export const defaultDispatchRetryStrategy = ({
  settings: { maxDispatchAttempts, backoffBaseInMs, backoffMaxInMs },
}: FullOutboxDispatcherConfig): DispatchRetryStrategy => {
  return (
    message: StoredOutboxMessage,
    error: ExtendedError,
    failedAt: Date,
  ): DispatchFailure => {
    const attempt = message.dispatchAttempts + 1;
    if (error instanceof ConfigurationError || attempt >= maxDispatchAttempts) {
      return { failedAt, nextAttemptAt: null, poisoned: true };
    }
    const backoff = Math.min(
      backoffBaseInMs * Math.pow(2, attempt - 1),
      backoffMaxInMs,
    );
    return {
      failedAt,
      nextAttemptAt: new Date(failedAt.getTime() + backoff),
      poisoned: false,
    };
  };
};
