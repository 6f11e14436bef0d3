import { ConcurrencyController } from '../concurrency-controller/concurrency-controller';
import { StoredOutboxMessage } from '../message/message';
import { DispatchRetryStrategy } from './dispatch-retry-strategy';
import { PublishTimeoutStrategy } from './publish-timeout-strategy';

export interface DispatcherStrategies {
  /** Decides between a retry with backoff and poisoning a failed message. */
  dispatchRetryStrategy: DispatchRetryStrategy;
  /** The timeout for publishing a single message. */
  publishTimeoutStrategy: PublishTimeoutStrategy;
  /**
   * Acquired once per message group with the first message of the group. The
   * default is a semaphore with `maxParallelGroups` slots.
   */
  groupConcurrencyController: ConcurrencyController<StoredOutboxMessage>;
}
