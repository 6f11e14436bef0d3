import { ConfigurationError, ExtendedError } from '../common/error';
import { LockedMessage } from '../gateway/messaging-gateway';
import { FullConsumerPumpConfig } from './config';

/**
 * Decides if a message should be received again after its handler failed.
 * The attempts including the current one are available as receive count.
 * @returns true if the message should be retried, false to dead-letter it.
 */
export interface MessageRetryStrategy {
  (locked: LockedMessage, error: ExtendedError): boolean;
}

/**
 * Get the default message retry strategy. Configuration errors are never
 * retried. Other errors are retried until the receive count reaches the
 * `config.settings.maxAttempts` value.
 */
export const defaultMessageRetryStrategy = (
  config: FullConsumerPumpConfig,
): MessageRetryStrategy => {
  return (locked: LockedMessage, error: ExtendedError): boolean => {
    if (error instanceof ConfigurationError) {
      return false;
    }
    return locked.receiveCount < config.settings.maxAttempts;
  };
};
