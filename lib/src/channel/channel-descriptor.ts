import { ConfigurationError } from '../common/error';

export type ChannelKind = 'topic' | 'queue';

/** How the backend reference of a channel is found - ordered from cheapest to most expensive */
export type ResolutionStrategy =
  | 'by-direct-reference'
  | 'by-convention'
  | 'by-enumeration';

/**
 * - create: issue an idempotent create call without checking existence first
 * - validate: resolve the channel and fail with a ChannelNotFoundError if it is missing
 * - assume: trust the reference without any backend call
 */
export type CreationPolicy = 'create' | 'validate' | 'assume';

export type OrderingMode = 'standard' | 'fifo';

export type DeduplicationScope = 'queue' | 'message-group';

export interface DeadLetterPolicy {
  /** The backend reference of the dead-letter queue */
  reference: string;
  /** Messages that were received more often are moved to the dead-letter queue */
  maxReceiveCount: number;
}

/** Backend attributes that are used when a channel is created. */
export interface ChannelAttributes {
  ordering: OrderingMode;
  /** Drop a publish with an already seen message id. FIFO channels only. */
  deduplicationScope?: DeduplicationScope;
  retentionInSec?: number;
  /** The visibility timeout of received messages */
  lockDurationInMs?: number;
  longPollInMs?: number;
  deadLetter?: DeadLetterPolicy;
}

/**
 * Describes a topic or queue by its routing key. Descriptors are part of the
 * configuration and are resolved lazily.
 */
export interface ChannelDescriptor {
  /** The logical name the outbox messages use as `topic` */
  routingKey: string;
  kind: ChannelKind;
  /** The backend channel name. Defaults to the routing key. */
  name?: string;
  /** The fully qualified backend reference (e.g. an ARN or queue URL) */
  reference?: string;
  resolution: ResolutionStrategy;
  creation: CreationPolicy;
  /** Queues only: the routing key of the topic the queue is subscribed to when it is created */
  subscribesTo?: string;
  attributes?: ChannelAttributes;
}

export const defaultChannelAttributes: ChannelAttributes = {
  ordering: 'standard',
};

/** The backend channel name of the descriptor. */
export const getChannelName = (descriptor: ChannelDescriptor): string =>
  descriptor.name ?? descriptor.routingKey;

export const isFifoChannel = (descriptor: ChannelDescriptor): boolean =>
  descriptor.attributes?.ordering === 'fifo';

/**
 * Verify that the descriptor can be resolved at all. This does not call the
 * messaging backend.
 * @throws ConfigurationError for a malformed descriptor.
 */
export const validateChannelDescriptor = (
  descriptor: ChannelDescriptor,
): void => {
  const { routingKey, resolution, creation, reference, attributes } =
    descriptor;
  const fail = (problem: string) => {
    throw new ConfigurationError(
      `The channel descriptor "${routingKey}" is invalid: ${problem}`,
    );
  };
  if (!routingKey) {
    fail('the routing key is empty.');
  }
  if (resolution === 'by-direct-reference' && !reference) {
    fail('the resolution by direct reference requires a reference.');
  }
  if (resolution === 'by-enumeration' && creation === 'assume') {
    fail('an enumerated channel cannot be assumed to exist.');
  }
  if (descriptor.subscribesTo && descriptor.kind !== 'queue') {
    fail('only queues can subscribe to a topic.');
  }
  if (attributes?.deduplicationScope && attributes.ordering !== 'fifo') {
    fail('deduplication is only available for FIFO channels.');
  }
  if (attributes?.deadLetter && attributes.deadLetter.maxReceiveCount < 1) {
    fail('the dead-letter maximum receive count must be at least 1.');
  }
};
