import { ConcurrencyController } from '../concurrency-controller/concurrency-controller';
import { LockedMessage } from '../gateway/messaging-gateway';
import { MessageRetryStrategy } from './message-retry-strategy';

export interface ConsumerStrategies {
  /**
   * Decides if a message is received again or dead-lettered after its
   * handler failed.
   */
  messageRetryStrategy: MessageRetryStrategy;

  /**
   * Defines how the received messages are processed in parallel. The default
   * serializes the messages of one group on FIFO channels and allows full
   * parallelism on standard channels.
   */
  concurrencyController: ConcurrencyController<LockedMessage>;
}
