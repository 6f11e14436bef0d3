import { isFifoChannel } from '../channel/channel-descriptor';
import { ChannelResolver, ResolvedChannel } from '../channel/channel-resolver';
import {
  ConfigurationError,
  DeferMessageError,
  DuplicateKeyError,
  ExtendedError,
  ensureExtendedError,
} from '../common/error';
import { MessagingLogger } from '../common/logger';
import { Scheduler, createTimerScheduler } from '../common/scheduler';
import { sleep } from '../common/utils';
import { createDiscriminatingMutexConcurrencyController } from '../concurrency-controller/create-discriminating-mutex-concurrency-controller';
import { createFullConcurrencyController } from '../concurrency-controller/create-full-concurrency-controller';
import { LockedMessage, MessagingGateway } from '../gateway/messaging-gateway';
import { GeneralMessageHandler } from '../handler/general-message-handler';
import { messageHandlerSelector } from '../handler/message-handler-selector';
import { MessageTypeHandler } from '../handler/message-type-handler';
import { InboxStore } from '../inbox/inbox-store';
import { GuardOutcome, createOnceOnlyGuard } from '../inbox/once-only-guard';
import {
  ConsumerPumpConfig,
  FullConsumerPumpConfig,
  applyDefaultConsumerPumpConfigValues,
} from './config';
import { ConsumerStrategies } from './consumer-strategies';
import { defaultMessageRetryStrategy } from './message-retry-strategy';

/**
 * - acked: the handler succeeded and the message was completed
 * - duplicate: the inbox knew the message and it was completed without calling the handler
 * - nacked: the message is received again, right away or after a delay
 * - dead-lettered: the message was moved to the dead-letter queue
 * - discarded: the message should be dead-lettered but the queue has no dead-letter queue
 * - abandoned: the shutdown grace period passed before the handler finished
 * - unsettled: the backend rejected the ack, delete or dead-letter call and the message is received again after its lock expired
 */
export type ConsumeOutcome =
  | 'acked'
  | 'duplicate'
  | 'nacked'
  | 'dead-lettered'
  | 'discarded'
  | 'abandoned'
  | 'unsettled';

export interface ConsumerPump {
  /**
   * Resolve the queue and start the receive loops.
   * @throws ChannelNotFoundError or ConfigurationError if the queue cannot be resolved.
   */
  start(): Promise<void>;
  /**
   * Receive a single message and process it. Useful without the receive
   * loops, e.g. when the application has its own loop.
   * @returns The outcome or undefined if no message was available.
   */
  receiveAndProcess(): Promise<ConsumeOutcome | undefined>;
  /**
   * Stop receiving and wait for the in-flight messages. Messages that are not
   * finished after the grace period are abandoned and received again later.
   */
  shutdown(): Promise<void>;
}

/**
 * Initialize the consumer that receives the messages of a queue, runs the
 * message handlers at most once per message with the help of the inbox and
 * acknowledges, releases or dead-letters the messages.
 * @param config The queue routing key, the consumer settings and an optional scheduler.
 * @param gateway The messaging backend to receive the messages from.
 * @param resolver Resolves the queue routing key to its channel.
 * @param inbox The inbox store for the message deduplication.
 * @param messageHandlers A list of message handlers to handle specific message types or a single general message handler that handles all messages.
 * @param logger A logger instance for logging trace up to error logs
 * @param strategies Strategies to provide custom logic for handling specific scenarios
 * @returns The started consumer.
 */
export const initializeConsumerPump = async <TTransaction>(
  config: ConsumerPumpConfig,
  gateway: MessagingGateway,
  resolver: ChannelResolver,
  inbox: InboxStore<TTransaction>,
  messageHandlers:
    | MessageTypeHandler<TTransaction>[]
    | GeneralMessageHandler<TTransaction>,
  logger: MessagingLogger,
  strategies?: Partial<ConsumerStrategies>,
): Promise<ConsumerPump> => {
  const pump = createConsumerPump(
    config,
    gateway,
    resolver,
    inbox,
    messageHandlers,
    logger,
    strategies,
  );
  await pump.start();
  return pump;
};

/**
 * Creates the consumer without starting it. See `initializeConsumerPump`.
 * @throws ConfigurationError if the queue routing key is unknown or the handlers conflict.
 */
export const createConsumerPump = <TTransaction>(
  config: ConsumerPumpConfig,
  gateway: MessagingGateway,
  resolver: ChannelResolver,
  inbox: InboxStore<TTransaction>,
  messageHandlers:
    | MessageTypeHandler<TTransaction>[]
    | GeneralMessageHandler<TTransaction>,
  logger: MessagingLogger,
  strategies?: Partial<ConsumerStrategies>,
): ConsumerPump => {
  const fullConfig = applyDefaultConsumerPumpConfigValues(config);
  const { settings, channel: routingKey, now } = fullConfig;
  const descriptor = resolver.getDescriptor(routingKey);
  const allStrategies = applyDefaultStrategies(
    strategies,
    fullConfig,
    isFifoChannel(descriptor),
  );
  const selectHandler = messageHandlerSelector(messageHandlers);
  const guard = createOnceOnlyGuard(
    inbox,
    {
      contextKey: settings.contextKey,
      onceOnlyAction: settings.onceOnlyAction,
      inboxScope: settings.inboxScope,
      inboxExpireAfterInSec:
        settings.inboxExpireAfterInSec > 0
          ? settings.inboxExpireAfterInSec
          : undefined,
    },
    logger,
    now,
  );
  const inFlight = new Map<string, Promise<ConsumeOutcome>>();
  const abandoned = new Set<string>();
  let loops: Promise<void>[] = [];
  let loopSignal: AbortController | undefined;
  let stopCleanup: (() => Promise<void>) | undefined;

  const getQueue = (): Promise<ResolvedChannel> => resolver.resolve(descriptor);

  /**
   * Runs a backend call that settles the message. Failures are logged as the
   * lock expires anyway.
   * @returns false if the backend call failed.
   */
  const settle = async (
    locked: LockedMessage,
    operation: string,
    action: () => Promise<void>,
  ): Promise<boolean> => {
    try {
      await action();
      return true;
    } catch (e) {
      logger.warn(
        ensureExtendedError(e, 'TRANSPORT_ERROR', locked.message),
        `Could not ${operation} the message with id ${locked.message.messageId}. It is received again after its lock expired.`,
      );
      return false;
    }
  };

  const deadLetter = async (
    locked: LockedMessage,
    reason: string,
    error?: ExtendedError,
  ): Promise<ConsumeOutcome> => {
    const { messageId } = locked.message;
    let moved: boolean;
    try {
      moved = await gateway.deadLetter(locked.lockToken, reason);
    } catch (e) {
      logger.error(
        ensureExtendedError(e, 'TRANSPORT_ERROR', locked.message),
        `Could not move the message with id ${messageId} to the dead-letter queue: ${reason} It is received again after its lock expired.`,
      );
      return 'unsettled';
    }
    if (moved) {
      logger.error(
        error ?? { messageId },
        `The message with id ${messageId} was moved to the dead-letter queue: ${reason}`,
      );
      return 'dead-lettered';
    }
    logger.error(
      error ?? { messageId },
      `The message with id ${messageId} is discarded as the channel "${routingKey}" has no dead-letter queue: ${reason}`,
    );
    const deleted = await settle(locked, 'delete', () =>
      gateway.delete(locked.lockToken),
    );
    return deleted ? 'discarded' : 'unsettled';
  };

  const startLockRenewal = (locked: LockedMessage): (() => void) => {
    if (settings.lockRenewalIntervalInMs <= 0) {
      return () => {
        // lock renewal is disabled
      };
    }
    const interval = setInterval(() => {
      gateway
        .changeLockDuration(locked.lockToken, settings.lockDurationInMs)
        .catch((e) => {
          logger.warn(
            ensureExtendedError(e, 'LOCK_LOST', locked.message),
            `Could not extend the lock of the message with id ${locked.message.messageId}.`,
          );
        });
    }, settings.lockRenewalIntervalInMs);
    return () => clearInterval(interval);
  };

  const handleFailure = async (
    locked: LockedMessage,
    handler: GeneralMessageHandler<TTransaction>,
    e: unknown,
  ): Promise<ConsumeOutcome> => {
    const { message } = locked;
    if (e instanceof DeferMessageError) {
      logger.debug(
        `The handler deferred the message with id ${message.messageId}.`,
      );
      await settle(locked, 'release', () =>
        gateway.nack(locked.lockToken, e.delayInMs),
      );
      return 'nacked';
    }
    const error = ensureExtendedError(e, 'MESSAGE_HANDLING_FAILED', message);
    const retry = allStrategies.messageRetryStrategy(locked, error);
    logger.warn(
      error,
      `Message processing error for the message with id ${message.messageId} and type ${message.messageType}.`,
    );
    if (handler.handleError) {
      try {
        await handler.handleError(error, message, retry);
      } catch (handleErrorError) {
        logger.error(
          ensureExtendedError(handleErrorError, 'MESSAGE_HANDLING_FAILED', message),
          `The error handler failed for the message with id ${message.messageId}.`,
        );
      }
    }
    if (retry) {
      await settle(locked, 'release', () => gateway.nack(locked.lockToken));
      return 'nacked';
    }
    return deadLetter(
      locked,
      error instanceof ConfigurationError
        ? error.message
        : `The message handling failed ${locked.receiveCount} times.`,
      error,
    );
  };

  /** Runs the handler within the once-only guard. A known message is a duplicate for every once-only action. */
  const runHandler = async (
    { message, receiveCount }: LockedMessage,
    handler: GeneralMessageHandler<TTransaction>,
  ): Promise<GuardOutcome> => {
    logger.debug(
      `Executing the message handler for the message with id ${message.messageId}.`,
    );
    try {
      return await guard.run(message, handler.kind ?? 'command', (transaction) =>
        handler.handle(message, { transaction, receiveCount, channel: routingKey }),
      );
    } catch (e) {
      if (e instanceof DuplicateKeyError) {
        logger.warn(e, e.message);
        return 'duplicate';
      }
      throw e;
    }
  };

  const handle = async (locked: LockedMessage): Promise<ConsumeOutcome> => {
    const { message, receiveCount } = locked;
    if (receiveCount > settings.maxAttempts) {
      // The earlier attempts did not finish, e.g. the process crashed
      return deadLetter(
        locked,
        `The message was received ${receiveCount} times which exceeds the maximum of ${settings.maxAttempts} attempts.`,
      );
    }
    const handler = selectHandler(message);
    if (!handler) {
      const error = new ConfigurationError(
        `No message handler is registered for the message type "${message.messageType}".`,
      );
      return deadLetter(locked, error.message, error);
    }

    const stopLockRenewal = startLockRenewal(locked);
    let processed: GuardOutcome;
    try {
      processed = await runHandler(locked, handler);
    } catch (e) {
      return abandoned.has(locked.lockToken)
        ? 'abandoned'
        : handleFailure(locked, handler, e);
    } finally {
      stopLockRenewal();
    }

    if (abandoned.has(locked.lockToken)) {
      return 'abandoned';
    }
    const acked = await settle(locked, 'acknowledge', () =>
      gateway.ack(locked.lockToken),
    );
    if (!acked) {
      return 'unsettled';
    }
    logger.trace(
      `Finished processing the message with id ${message.messageId} and type ${message.messageType}.`,
    );
    return processed === 'duplicate' ? 'duplicate' : 'acked';
  };

  const processLocked = async (locked: LockedMessage): Promise<ConsumeOutcome> => {
    const release = await allStrategies.concurrencyController.acquire(locked);
    try {
      return await handle(locked);
    } finally {
      release();
      abandoned.delete(locked.lockToken);
    }
  };

  const receiveAndProcess = async (): Promise<ConsumeOutcome | undefined> => {
    const queue = await getQueue();
    const locked = await gateway.receive(queue.reference, {
      lockDurationInMs: settings.lockDurationInMs,
    });
    if (!locked) {
      return undefined;
    }
    const processing = processLocked(locked);
    inFlight.set(locked.lockToken, processing);
    try {
      return await processing;
    } finally {
      inFlight.delete(locked.lockToken);
    }
  };

  const receiveLoop = async (signal: AbortSignal) => {
    while (!signal.aborted) {
      try {
        const outcome = await receiveAndProcess();
        if (outcome === undefined) {
          await sleep(settings.emptyReceiveDelayInMs, signal);
        }
      } catch (e) {
        logger.error(
          ensureExtendedError(e, 'LISTENER_STOPPED'),
          `Error when receiving messages from the channel "${routingKey}".`,
        );
        await sleep(settings.emptyReceiveDelayInMs, signal);
      }
    }
  };

  const cleanupInbox = async () => {
    try {
      const deleted = await inbox.deleteExpired(now());
      if (deleted > 0) {
        logger.info(`Deleted ${deleted} expired inbox records during cleanup.`);
      } else {
        logger.trace('Deleted no inbox records during cleanup.');
      }
    } catch (e) {
      const err = ensureExtendedError(e, 'MESSAGE_CLEANUP_ERROR');
      logger.warn(err, 'Could not run the inbox cleanup logic.');
    }
  };

  return {
    receiveAndProcess,

    async start() {
      if (loopSignal) {
        return;
      }
      const queue = await getQueue();
      loopSignal = new AbortController();
      const { signal } = loopSignal;
      loops = Array.from({ length: settings.parallelism }, () =>
        receiveLoop(signal),
      );
      if (settings.inboxCleanupIntervalInMs > 0) {
        const scheduler: Scheduler =
          fullConfig.scheduler ??
          createTimerScheduler((e) => {
            logger.error(
              ensureExtendedError(e, 'MESSAGE_CLEANUP_ERROR'),
              'Error when cleaning up the inbox.',
            );
          });
        stopCleanup = scheduler.schedule(
          cleanupInbox,
          settings.inboxCleanupIntervalInMs,
        );
      }
      logger.debug(
        `Started ${settings.parallelism} receive loops for the channel "${routingKey}" (${queue.reference}).`,
      );
    },

    async shutdown() {
      loopSignal?.abort();
      await stopCleanup?.();
      const grace = new AbortController();
      const drained = await Promise.race([
        Promise.allSettled([...loops, ...inFlight.values()]).then(() => true),
        sleep(settings.shutdownGracePeriodInMs, grace.signal).then(() => false),
      ]);
      grace.abort();
      if (!drained) {
        const tokens = Array.from(inFlight.keys());
        logger.warn(
          `Abandoned ${tokens.length} in-flight messages after the shutdown grace period of ${settings.shutdownGracePeriodInMs} milliseconds.`,
        );
        await Promise.all(
          tokens.map((lockToken) => {
            abandoned.add(lockToken);
            return gateway.nack(lockToken).catch((e) => {
              logger.warn(
                ensureExtendedError(e, 'TRANSPORT_ERROR'),
                `Could not release the abandoned lock ${lockToken}.`,
              );
            });
          }),
        );
      }
      loops = [];
      logger.debug(`Stopped the consumer of the channel "${routingKey}".`);
    },
  };
};

const applyDefaultStrategies = (
  strategies: Partial<ConsumerStrategies> | undefined,
  config: FullConsumerPumpConfig,
  fifo: boolean,
): ConsumerStrategies => ({
  messageRetryStrategy:
    strategies?.messageRetryStrategy ?? defaultMessageRetryStrategy(config),
  concurrencyController:
    strategies?.concurrencyController ??
    (fifo
      ? createDiscriminatingMutexConcurrencyController(
          (locked: LockedMessage) => locked.groupKey ?? '',
        )
      : createFullConcurrencyController<LockedMessage>()),
});
