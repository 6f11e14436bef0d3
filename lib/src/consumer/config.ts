import {
  defineEnvSettings,
  fallbackEnvPrefix,
  inboxEnvPrefix,
} from '../common/env-settings';
import { Scheduler } from '../common/scheduler';
import { InboxScope, OnceOnlyAction } from '../inbox/once-only-guard';

export interface ConsumerPumpConfig {
  /** The routing key of the queue to consume */
  channel: string;
  /** Consumer specific settings */
  settings: ConsumerPumpSettings;
  /** Runs the inbox cleanup. Defaults to a timer based scheduler. */
  scheduler?: Scheduler;
  /** The clock for the inbox records and the cleanup. */
  now?: () => Date;
}

export interface ConsumerPumpSettings {
  /** Distinguishes the consumers of the same message in the inbox, e.g. the service name */
  contextKey: string;
  /** The number of parallel receive loops. Default is 1. */
  parallelism?: number;
  /**
   * How long a received message is locked for this consumer. Handlers that
   * take longer risk that another worker receives the message as well.
   * Default is 30 seconds.
   */
  lockDurationInMs?: number;
  /**
   * The maximum number of attempts to handle a received message. Defaults to
   * 5 which means a message is handled once initially and up to four more
   * times for retries before it is dead-lettered.
   */
  maxAttempts?: number;
  /** What to do with a message the inbox already contains. Default is "warn". */
  onceOnlyAction?: OnceOnlyAction;
  /** Which messages are deduplicated by the inbox. Default is "commands". */
  inboxScope?: InboxScope;
  /** Inbox records may be deleted after this many seconds. Kept forever with 0 which is the default. */
  inboxExpireAfterInSec?: number;
  /** The interval to delete expired inbox records. Disabled with 0 which is the default. */
  inboxCleanupIntervalInMs?: number;
  /** How long to wait for in-flight messages on shutdown before they are abandoned. Default is 10 seconds. */
  shutdownGracePeriodInMs?: number;
  /** The time to wait after a receive call returned no message. Default is 1 second. */
  emptyReceiveDelayInMs?: number;
  /** Extend the lock of in-flight messages in this interval. Disabled with 0 which is the default. */
  lockRenewalIntervalInMs?: number;
}

export type FullConsumerPumpSettings = Required<ConsumerPumpSettings>;

export interface FullConsumerPumpConfig {
  channel: string;
  settings: FullConsumerPumpSettings;
  scheduler?: Scheduler;
  now: () => Date;
}

const defaultSettings: Omit<FullConsumerPumpSettings, 'contextKey'> = {
  parallelism: 1,
  lockDurationInMs: 30_000,
  maxAttempts: 5,
  onceOnlyAction: 'warn',
  inboxScope: 'commands',
  inboxExpireAfterInSec: 0,
  inboxCleanupIntervalInMs: 0,
  shutdownGracePeriodInMs: 10_000,
  emptyReceiveDelayInMs: 1000,
  lockRenewalIntervalInMs: 0,
};

export const applyDefaultConsumerPumpConfigValues = (
  config: ConsumerPumpConfig,
): FullConsumerPumpConfig => ({
  channel: config.channel,
  scheduler: config.scheduler,
  now: config.now ?? (() => new Date()),
  settings: {
    ...defaultSettings,
    ...config.settings,
  },
});

const consumerSettings = defineEnvSettings<FullConsumerPumpSettings>(
  inboxEnvPrefix,
  fallbackEnvPrefix,
  (read) => ({
    contextKey: read.string('CONTEXT_KEY', undefined, { skipFallback: true }),
    parallelism: read.number('PARALLELISM', defaultSettings.parallelism),
    lockDurationInMs: read.number(
      'LOCK_DURATION_IN_MS',
      defaultSettings.lockDurationInMs,
    ),
    maxAttempts: read.number('MAX_ATTEMPTS', defaultSettings.maxAttempts),
    onceOnlyAction: read.oneOf<OnceOnlyAction>(
      'ONCE_ONLY_ACTION',
      ['throw', 'warn', 'ignore'],
      defaultSettings.onceOnlyAction,
      { skipFallback: true },
    ),
    inboxScope: read.oneOf<InboxScope>(
      'INBOX_SCOPE',
      ['commands', 'all'],
      defaultSettings.inboxScope,
      { skipFallback: true },
    ),
    inboxExpireAfterInSec: read.number(
      'EXPIRE_AFTER_IN_SEC',
      defaultSettings.inboxExpireAfterInSec,
      { skipFallback: true },
    ),
    inboxCleanupIntervalInMs: read.number(
      'CLEANUP_INTERVAL_IN_MS',
      defaultSettings.inboxCleanupIntervalInMs,
    ),
    shutdownGracePeriodInMs: read.number(
      'SHUTDOWN_GRACE_PERIOD_IN_MS',
      defaultSettings.shutdownGracePeriodInMs,
    ),
    emptyReceiveDelayInMs: read.number(
      'EMPTY_RECEIVE_DELAY_IN_MS',
      defaultSettings.emptyReceiveDelayInMs,
      { skipFallback: true },
    ),
    lockRenewalIntervalInMs: read.number(
      'LOCK_RENEWAL_INTERVAL_IN_MS',
      defaultSettings.lockRenewalIntervalInMs,
      { skipFallback: true },
    ),
  }),
);

/**
 * Loads the environment variables into the consumer settings object. It
 * supports reading an inbox specific setting or a general one. The context
 * key is required.
 * @example
 * MSG_INBOX_CONTEXT_KEY=billing-service
 * MSG_INBOX_PARALLELISM=4
 * MSG_MAX_ATTEMPTS=3
 * @param env The process.env variable or a custom object.
 * @returns The consumer settings object filled with the ENV variables
 * @throws Error if the context key is missing or a value is invalid.
 */
export const getConsumerPumpSettings = consumerSettings.load;

/** Prints the consumer ENV variables with their default values. */
export const getConsumerPumpEnvTemplate = consumerSettings.template;
