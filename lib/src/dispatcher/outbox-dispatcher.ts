import { ChannelResolver } from '../channel/channel-resolver';
import { ensureExtendedError } from '../common/error';
import { MessagingLogger } from '../common/logger';
import { Scheduler, createTimerScheduler } from '../common/scheduler';
import { awaitWithTimeout } from '../common/utils';
import { createSemaphoreConcurrencyController } from '../concurrency-controller/create-semaphore-concurrency-controller';
import { MessagingGateway } from '../gateway/messaging-gateway';
import { Message, StoredOutboxMessage } from '../message/message';
import { OutboxDispatchStore } from '../outbox/outbox-store';
import {
  FullOutboxDispatcherConfig,
  OutboxDispatcherConfig,
  applyDefaultOutboxDispatcherConfigValues,
} from './config';
import { defaultDispatchRetryStrategy } from './dispatch-retry-strategy';
import { DispatcherStrategies } from './dispatcher-strategies';
import { defaultPublishTimeoutStrategy } from './publish-timeout-strategy';

export interface DispatchResult {
  /** Published and marked as dispatched by this call */
  dispatched: number;
  /** Published but another dispatcher marked the message first */
  alreadyDispatched: number;
  /** Not published - retried in a later sweep */
  failed: number;
  /** Not published - needs operator attention */
  poisoned: number;
  /** Not attempted because an earlier message of the group failed or the dispatcher stopped */
  skipped: number;
}

type DispatchOutcome = Exclude<keyof DispatchResult, 'skipped'>;

export interface OutboxDispatcher {
  /** Publish the next batch of undispatched messages. */
  sweep(signal?: AbortSignal): Promise<DispatchResult>;
  /**
   * Publish the given messages right away if they are not dispatched yet.
   * Poisoned messages are included which allows an operator to replay them.
   */
  clearOutbox(messageIds: string[]): Promise<DispatchResult>;
  /** Stop the scheduled cycles and wait for the running ones to finish. */
  shutdown(): Promise<void>;
}

/**
 * Initialize the dispatcher that publishes the deposited outbox messages.
 * All configured channels are resolved first so a missing channel fails the
 * startup and not the first publish. Afterwards the sweep and the optional
 * cleanup of dispatched messages run on the scheduler.
 * @param config The dispatcher settings and an optional scheduler.
 * @param store The outbox store to read the messages from.
 * @param gateway The messaging backend to publish the messages to.
 * @param resolver Resolves the routing key of a message to its channel.
 * @param logger A logger instance for logging trace up to error logs
 * @param strategies Strategies to provide custom logic for handling specific scenarios
 * @returns The dispatcher to sweep manually, replay messages and shut down.
 * @throws ChannelNotFoundError or ConfigurationError if a configured channel cannot be resolved.
 */
export const initializeOutboxDispatcher = async (
  config: OutboxDispatcherConfig,
  store: OutboxDispatchStore,
  gateway: MessagingGateway,
  resolver: ChannelResolver,
  logger: MessagingLogger,
  strategies?: Partial<DispatcherStrategies>,
): Promise<OutboxDispatcher> => {
  const dispatcher = createOutboxDispatcher(
    config,
    store,
    gateway,
    resolver,
    logger,
    strategies,
  );
  const resolved = await resolver.validate();
  logger.info(
    `The outbox dispatcher resolved ${resolved.length} configured channels.`,
  );
  dispatcher.start();
  return dispatcher;
};

/**
 * Creates the dispatcher without resolving the channels and without
 * scheduling the cycles. Call `start` to schedule them.
 */
export const createOutboxDispatcher = (
  config: OutboxDispatcherConfig,
  store: OutboxDispatchStore,
  gateway: MessagingGateway,
  resolver: ChannelResolver,
  logger: MessagingLogger,
  strategies?: Partial<DispatcherStrategies>,
): OutboxDispatcher & { start(): void } => {
  const fullConfig = applyDefaultOutboxDispatcherConfigValues(config);
  const allStrategies = applyDefaultStrategies(strategies, fullConfig);
  const { settings, now } = fullConfig;
  const stops: (() => Promise<void>)[] = [];

  const publish = async (row: StoredOutboxMessage): Promise<DispatchOutcome> => {
    try {
      const channel = await resolver.resolveRoutingKey(row.topic);
      const timeout = allStrategies.publishTimeoutStrategy(row);
      await awaitWithTimeout(
        () => gateway.publish(channel.reference, toMessage(row)),
        timeout,
        `Could not publish the outbox message with id ${row.messageId} within the timeout of ${timeout} milliseconds.`,
      );
    } catch (e) {
      const error = ensureExtendedError(e, 'TRANSPORT_ERROR', row);
      const failure = allStrategies.dispatchRetryStrategy(row, error, now());
      await store.recordDispatchFailure(row.messageId, failure);
      if (failure.poisoned) {
        logger.error(
          error,
          `The outbox message with id ${row.messageId} is poisoned after ${row.dispatchAttempts + 1} failed attempts and requires operator attention.`,
        );
        return 'poisoned';
      }
      logger.warn(
        error,
        `Could not publish the outbox message with id ${row.messageId}. It is retried after ${failure.nextAttemptAt?.toISOString()}.`,
      );
      return 'failed';
    }
    const marked = await store.markDispatched([row.messageId], now());
    if (marked.length === 0) {
      logger.debug(
        `The outbox message with id ${row.messageId} was already marked as dispatched by another dispatcher.`,
      );
      return 'alreadyDispatched';
    }
    logger.trace(
      `Published the outbox message with id ${row.messageId} and type ${row.messageType}.`,
    );
    return 'dispatched';
  };

  const dispatchGroup = async (
    group: StoredOutboxMessage[],
    result: DispatchResult,
    signal?: AbortSignal,
  ) => {
    const release = await allStrategies.groupConcurrencyController.acquire(
      group[0],
    );
    try {
      for (let i = 0; i < group.length; i++) {
        if (signal?.aborted) {
          result.skipped += group.length - i;
          return;
        }
        const outcome = await publish(group[i]);
        result[outcome]++;
        if (outcome === 'failed' || outcome === 'poisoned') {
          // Later messages of the group must not overtake the failed one
          result.skipped += group.length - i - 1;
          return;
        }
      }
    } finally {
      release();
    }
  };

  const dispatch = async (
    rows: StoredOutboxMessage[],
    signal?: AbortSignal,
  ): Promise<DispatchResult> => {
    const result: DispatchResult = {
      dispatched: 0,
      alreadyDispatched: 0,
      failed: 0,
      poisoned: 0,
      skipped: 0,
    };
    const settled = await Promise.allSettled(
      groupMessages(rows).map((group) => dispatchGroup(group, result, signal)),
    );
    for (const outcome of settled) {
      if (outcome.status === 'rejected') {
        throw outcome.reason;
      }
    }
    return result;
  };

  const sweep = async (signal?: AbortSignal): Promise<DispatchResult> => {
    const rows = await store.getUndispatched(
      settings.batchSize,
      new Date(now().getTime() - settings.minAgeInMs),
    );
    if (rows.length > 0) {
      logger.debug(`Dispatching ${rows.length} outbox messages.`);
    }
    return dispatch(rows, signal);
  };

  const cleanup = async () => {
    try {
      const deleted = await store.deleteDispatched(
        new Date(now().getTime() - settings.dispatchedRetentionInSec * 1000),
      );
      if (deleted > 0) {
        logger.info(`Deleted ${deleted} dispatched outbox messages during cleanup.`);
      } else {
        logger.trace('Deleted no dispatched outbox messages during cleanup.');
      }
    } catch (e) {
      const err = ensureExtendedError(e, 'MESSAGE_CLEANUP_ERROR');
      logger.warn(err, 'Could not run the outbox cleanup logic.');
    }
  };

  return {
    sweep,

    async clearOutbox(messageIds: string[]) {
      const rows = await store.getByIds(messageIds);
      return dispatch(rows.filter((row) => row.dispatched === null));
    },

    start() {
      const scheduler: Scheduler =
        fullConfig.scheduler ??
        createTimerScheduler((e) => {
          logger.error(
            ensureExtendedError(e, 'BATCH_PROCESSING_ERROR'),
            'Error when dispatching a batch of outbox messages.',
          );
        });
      stops.push(
        scheduler.schedule(async (signal) => {
          await sweep(signal);
        }, settings.sweepIntervalInMs),
      );
      if (settings.cleanupIntervalInMs > 0) {
        stops.push(scheduler.schedule(cleanup, settings.cleanupIntervalInMs));
      }
      logger.debug('Started the outbox dispatcher.');
    },

    async shutdown() {
      await Promise.all(stops.splice(0).map((stop) => stop()));
      logger.debug('Stopped the outbox dispatcher.');
    },
  };
};

/**
 * Groups the messages that must be published in order: messages with the
 * same topic and partition key. Messages without a partition key are
 * independent. The input order (by created id) is kept within a group.
 */
export const groupMessages = (
  rows: StoredOutboxMessage[],
): StoredOutboxMessage[][] => {
  const groups = new Map<string, StoredOutboxMessage[]>();
  for (const row of rows) {
    const key =
      row.partitionKey === undefined
        ? `message:${row.messageId}`
        : `group:${row.topic}:${row.partitionKey}`;
    const group = groups.get(key);
    if (group) {
      group.push(row);
    } else {
      groups.set(key, [row]);
    }
  }
  return Array.from(groups.values());
};

/** Removes the outbox bookkeeping fields before the message is published. */
const toMessage = ({
  dispatched,
  created,
  createdId,
  dispatchAttempts,
  nextAttemptAt,
  poisonedAt,
  ...message
}: StoredOutboxMessage): Message => message;

const applyDefaultStrategies = (
  strategies: Partial<DispatcherStrategies> | undefined,
  config: FullOutboxDispatcherConfig,
): DispatcherStrategies => ({
  dispatchRetryStrategy:
    strategies?.dispatchRetryStrategy ?? defaultDispatchRetryStrategy(config),
  publishTimeoutStrategy:
    strategies?.publishTimeoutStrategy ?? defaultPublishTimeoutStrategy(config),
  groupConcurrencyController:
    strategies?.groupConcurrencyController ??
    createSemaphoreConcurrencyController(config.settings.maxParallelGroups),
});
