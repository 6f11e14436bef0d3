import {
  defineEnvSettings,
  fallbackEnvPrefix,
  outboxEnvPrefix,
} from '../common/env-settings';
import { Scheduler } from '../common/scheduler';

export interface OutboxDispatcherConfig {
  /** Dispatcher specific settings */
  settings: OutboxDispatcherSettings;
  /** Runs the sweep and cleanup cycles. Defaults to a timer based scheduler. */
  scheduler?: Scheduler;
  /** The clock for the dispatch, backoff and retention times. */
  now?: () => Date;
}

export interface OutboxDispatcherSettings {
  /** The maximum number of outbox messages loaded per sweep. Default is 100. */
  batchSize?: number;
  /**
   * Only messages that were created at least this long ago are dispatched.
   * Rows of slow transactions with a lower created id are not skipped this
   * way. Default is 1 second.
   */
  minAgeInMs?: number;
  /** The time between two sweeps. Default is 500ms. */
  sweepIntervalInMs?: number;
  /**
   * The number of publish attempts after which a message is poisoned and
   * needs operator attention. Default is 5.
   */
  maxDispatchAttempts?: number;
  /** The backoff of the first retry. It doubles with every attempt. Default is 1 second. */
  backoffBaseInMs?: number;
  /** The maximum backoff between two publish attempts. Default is 60 seconds. */
  backoffMaxInMs?: number;
  /** A publish that does not finish in this time counts as failed. Default is 15 seconds. */
  publishTimeoutInMs?: number;
  /**
   * How many message groups (topic and partition key) are published in
   * parallel. Messages of one group are always published in order. Default is 10.
   */
  maxParallelGroups?: number;
  /** The interval to delete old dispatched messages. Disabled with 0 which is the default. */
  cleanupIntervalInMs?: number;
  /** Dispatched messages older than this are deleted by the cleanup. Default is 7 days. */
  dispatchedRetentionInSec?: number;
}

export type FullOutboxDispatcherSettings = Required<OutboxDispatcherSettings>;

export interface FullOutboxDispatcherConfig {
  settings: FullOutboxDispatcherSettings;
  scheduler?: Scheduler;
  now: () => Date;
}

const defaultSettings: FullOutboxDispatcherSettings = {
  batchSize: 100,
  minAgeInMs: 1000,
  sweepIntervalInMs: 500,
  maxDispatchAttempts: 5,
  backoffBaseInMs: 1000,
  backoffMaxInMs: 60_000,
  publishTimeoutInMs: 15_000,
  maxParallelGroups: 10,
  cleanupIntervalInMs: 0,
  dispatchedRetentionInSec: 7 * 24 * 60 * 60,
};

export const applyDefaultOutboxDispatcherConfigValues = (
  config: OutboxDispatcherConfig,
): FullOutboxDispatcherConfig => ({
  scheduler: config.scheduler,
  now: config.now ?? (() => new Date()),
  settings: {
    ...defaultSettings,
    ...config.settings,
  },
});

const dispatcherSettings = defineEnvSettings<FullOutboxDispatcherSettings>(
  outboxEnvPrefix,
  fallbackEnvPrefix,
  (read) => ({
    batchSize: read.number('BATCH_SIZE', defaultSettings.batchSize),
    minAgeInMs: read.number('MIN_AGE_IN_MS', defaultSettings.minAgeInMs, {
      skipFallback: true,
    }),
    sweepIntervalInMs: read.number(
      'SWEEP_INTERVAL_IN_MS',
      defaultSettings.sweepIntervalInMs,
      { skipFallback: true },
    ),
    maxDispatchAttempts: read.number(
      'MAX_DISPATCH_ATTEMPTS',
      defaultSettings.maxDispatchAttempts,
      { skipFallback: true },
    ),
    backoffBaseInMs: read.number(
      'BACKOFF_BASE_IN_MS',
      defaultSettings.backoffBaseInMs,
    ),
    backoffMaxInMs: read.number('BACKOFF_MAX_IN_MS', defaultSettings.backoffMaxInMs),
    publishTimeoutInMs: read.number(
      'PUBLISH_TIMEOUT_IN_MS',
      defaultSettings.publishTimeoutInMs,
      { skipFallback: true },
    ),
    maxParallelGroups: read.number(
      'MAX_PARALLEL_GROUPS',
      defaultSettings.maxParallelGroups,
    ),
    cleanupIntervalInMs: read.number(
      'CLEANUP_INTERVAL_IN_MS',
      defaultSettings.cleanupIntervalInMs,
    ),
    dispatchedRetentionInSec: read.number(
      'DISPATCHED_RETENTION_IN_SEC',
      defaultSettings.dispatchedRetentionInSec,
      { skipFallback: true },
    ),
  }),
);

/**
 * Loads the environment variables into the dispatcher settings object. It
 * supports reading an outbox specific setting or a general one for the
 * settings that are shared with the consumer.
 * @example
 * MSG_OUTBOX_BATCH_SIZE=50
 * MSG_BACKOFF_MAX_IN_MS=30000
 * @param env The process.env variable or a custom object.
 * @returns The dispatcher settings object filled with the ENV variables
 */
export const getOutboxDispatcherSettings = dispatcherSettings.load;

/** Prints the dispatcher ENV variables with their default values. */
export const getOutboxDispatcherEnvTemplate = dispatcherSettings.template;
