import { StoredOutboxMessage } from '../message/message';
import { FullOutboxDispatcherConfig } from './config';

/**
 * Defines how much time in milliseconds the publish of a given message may
 * take before it counts as failed.
 * @param message The outbox message
 * @returns The time in milliseconds for the timeout
 */
export interface PublishTimeoutStrategy {
  (message: StoredOutboxMessage): number;
}

/**
 * Get the default publish timeout strategy which uses the
 * `publishTimeoutInMs` setting.
 */
export const defaultPublishTimeoutStrategy =
  (config: FullOutboxDispatcherConfig): PublishTimeoutStrategy =>
  () => {
    return config.settings.publishTimeoutInMs;
  };
