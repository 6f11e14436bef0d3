import { v4 as uuid } from 'uuid';
import { ChannelAttributes, ChannelKind } from '../channel/channel-descriptor';
import {
  ChannelNamingConvention,
  deriveChannelReference,
} from '../channel/naming-convention';
import { TransportError } from '../common/error';
import { Message } from '../message/message';
import {
  ChannelInfo,
  LockedMessage,
  MessagingGateway,
  ReceiveOptions,
} from './messaging-gateway';

export type GatewayOperation = keyof MessagingGateway;

export interface DeadLetteredMessage {
  message: Message;
  reason: string;
  /** The reference of the queue the message was moved from */
  source: string;
}

export interface InMemoryMessagingGatewayOptions {
  /** The clock that drives lock expiry. */
  now?: () => Date;
  /** Derives the references of created channels. */
  convention?: ChannelNamingConvention;
  /** The lock duration for queues without a configured one. */
  defaultLockDurationInMs?: number;
}

export interface InMemoryMessagingGateway extends MessagingGateway {
  /** The number of calls per gateway operation. */
  readonly calls: Readonly<Record<GatewayOperation, number>>;
  /** Every message that was published to the channel (topics and queues). */
  published(reference: string): Message[];
  /** The messages in the queue that were not acked, deleted or dead-lettered. */
  queued(reference: string): Message[];
  /** The messages that were moved to the dead-letter queue with their reason. */
  deadLettered(reference: string): DeadLetteredMessage[];
  /** Let every following call fail with a TransportError until it is reset. */
  setUnavailable(unavailable: boolean): void;
}

interface Delivery {
  message: Message;
  groupKey?: string;
  receiveCount: number;
  visibleAt: number;
  lockToken?: string;
}

interface Channel {
  info: ChannelInfo;
  deliveries: Delivery[];
  published: Message[];
  subscribers: Set<string>;
  deadLettered: DeadLetteredMessage[];
}

export const localConvention: ChannelNamingConvention = {
  partition: 'aws',
  region: 'local',
  accountId: '000000000000',
};

/**
 * A messaging backend that runs in the current process. It follows the
 * behavior of queue based brokers: received messages are invisible until
 * their lock expires, FIFO queues deliver only the oldest message of a group
 * while it is in flight, topics fan out to their subscribed queues and queues
 * with a dead-letter policy move messages that were received too often.
 */
export const createInMemoryMessagingGateway = ({
  now = () => new Date(),
  convention = localConvention,
  defaultLockDurationInMs = 30_000,
}: InMemoryMessagingGatewayOptions = {}): InMemoryMessagingGateway => {
  const channels = new Map<string, Channel>();
  const locks = new Map<string, { channel: Channel; delivery: Delivery }>();
  const deduplication = new Map<string, Set<string>>();
  const calls: Record<GatewayOperation, number> = {
    getChannel: 0,
    createChannel: 0,
    listChannels: 0,
    subscribe: 0,
    publish: 0,
    receive: 0,
    ack: 0,
    nack: 0,
    changeLockDuration: 0,
    delete: 0,
    deadLetter: 0,
  };
  let unavailable = false;

  const call = (operation: GatewayOperation) => {
    calls[operation]++;
    if (unavailable) {
      throw new TransportError(
        `The messaging backend is unavailable for the "${operation}" call.`,
      );
    }
  };

  const getExisting = (reference: string): Channel => {
    const channel = channels.get(reference);
    if (!channel) {
      throw new TransportError(`The channel ${reference} does not exist.`);
    }
    return channel;
  };

  const getLock = (lockToken: string) => {
    const lock = locks.get(lockToken);
    if (!lock || lock.delivery.lockToken !== lockToken) {
      throw new TransportError(
        `The lock token ${lockToken} is not valid anymore.`,
        'LOCK_LOST',
      );
    }
    return lock;
  };

  const release = (lockToken: string) => {
    const { channel, delivery } = getLock(lockToken);
    locks.delete(lockToken);
    delivery.lockToken = undefined;
    return { channel, delivery };
  };

  const remove = (channel: Channel, delivery: Delivery) => {
    channel.deliveries = channel.deliveries.filter((d) => d !== delivery);
  };

  const enqueue = (channel: Channel, message: Message) => {
    channel.published.push(message);
    if (channel.info.kind === 'topic') {
      channel.subscribers.forEach((queueReference) =>
        enqueue(getExisting(queueReference), message),
      );
      return;
    }
    const fifo = channel.info.attributes.ordering === 'fifo';
    channel.deliveries.push({
      message: { ...message },
      groupKey: fifo ? message.partitionKey ?? '' : undefined,
      receiveCount: 0,
      visibleAt: 0,
    });
  };

  const moveToDeadLetter = (
    channel: Channel,
    delivery: Delivery,
    reason: string,
  ): boolean => {
    const policy = channel.info.attributes.deadLetter;
    if (!policy) {
      return false;
    }
    const target = getExisting(policy.reference);
    remove(channel, delivery);
    if (delivery.lockToken) {
      locks.delete(delivery.lockToken);
    }
    target.deadLettered.push({
      message: delivery.message,
      reason,
      source: channel.info.reference,
    });
    enqueue(target, delivery.message);
    return true;
  };

  /** FIFO queues only deliver the oldest message of a group. */
  const isGroupHead = (channel: Channel, delivery: Delivery) =>
    delivery.groupKey === undefined ||
    channel.deliveries.find((d) => d.groupKey === delivery.groupKey) ===
      delivery;

  return {
    get calls() {
      return { ...calls };
    },

    published: (reference) => [...(channels.get(reference)?.published ?? [])],

    queued: (reference) =>
      (channels.get(reference)?.deliveries ?? []).map((d) => d.message),

    deadLettered: (reference) => [
      ...(channels.get(reference)?.deadLettered ?? []),
    ],

    setUnavailable(value: boolean) {
      unavailable = value;
    },

    async getChannel(reference) {
      call('getChannel');
      const channel = channels.get(reference);
      return channel ? { ...channel.info } : undefined;
    },

    async createChannel(
      name: string,
      kind: ChannelKind,
      attributes: ChannelAttributes,
    ) {
      call('createChannel');
      const reference = deriveChannelReference(
        convention,
        kind,
        name,
        attributes.ordering === 'fifo',
      );
      if (!channels.has(reference)) {
        channels.set(reference, {
          info: {
            reference,
            name: reference.slice(reference.lastIndexOf(':') + 1),
            kind,
            attributes: { ...attributes },
          },
          deliveries: [],
          published: [],
          subscribers: new Set(),
          deadLettered: [],
        });
      }
      return reference;
    },

    async listChannels() {
      call('listChannels');
      return Array.from(channels.values()).map((c) => ({ ...c.info }));
    },

    async subscribe(topicReference, queueReference) {
      call('subscribe');
      const topic = getExisting(topicReference);
      const queue = getExisting(queueReference);
      if (topic.info.kind !== 'topic' || queue.info.kind !== 'queue') {
        throw new TransportError(
          `Only queues can subscribe to topics: ${queueReference} to ${topicReference}.`,
        );
      }
      topic.subscribers.add(queueReference);
    },

    async publish(reference, message) {
      call('publish');
      const channel = getExisting(reference);
      if (channel.info.attributes.deduplicationScope) {
        const seen = deduplication.get(reference) ?? new Set<string>();
        deduplication.set(reference, seen);
        if (seen.has(message.messageId)) {
          return `${reference}/${message.messageId}`;
        }
        seen.add(message.messageId);
      }
      enqueue(channel, message);
      return `${reference}/${message.messageId}`;
    },

    async receive(
      queueReference: string,
      options?: ReceiveOptions,
    ): Promise<LockedMessage | undefined> {
      call('receive');
      const channel = getExisting(queueReference);
      const at = now().getTime();
      const maxReceiveCount =
        channel.info.attributes.deadLetter?.maxReceiveCount;
      for (const delivery of [...channel.deliveries]) {
        if (delivery.visibleAt > at || !isGroupHead(channel, delivery)) {
          continue;
        }
        if (
          maxReceiveCount !== undefined &&
          delivery.receiveCount >= maxReceiveCount
        ) {
          moveToDeadLetter(
            channel,
            delivery,
            `The message was received more than ${maxReceiveCount} times.`,
          );
          continue;
        }
        if (delivery.lockToken) {
          locks.delete(delivery.lockToken);
        }
        const lockToken = uuid();
        delivery.lockToken = lockToken;
        delivery.receiveCount++;
        delivery.visibleAt =
          at +
          (options?.lockDurationInMs ??
            channel.info.attributes.lockDurationInMs ??
            defaultLockDurationInMs);
        locks.set(lockToken, { channel, delivery });
        return {
          lockToken,
          receiveCount: delivery.receiveCount,
          message: { ...delivery.message },
          groupKey: delivery.groupKey,
        };
      }
      return undefined;
    },

    async ack(lockToken) {
      call('ack');
      const { channel, delivery } = release(lockToken);
      remove(channel, delivery);
    },

    async nack(lockToken, delayInMs = 0) {
      call('nack');
      const { delivery } = release(lockToken);
      delivery.visibleAt = now().getTime() + delayInMs;
    },

    async changeLockDuration(lockToken, durationInMs) {
      call('changeLockDuration');
      const { delivery } = getLock(lockToken);
      delivery.visibleAt = now().getTime() + durationInMs;
    },

    async delete(lockToken) {
      call('delete');
      const { channel, delivery } = release(lockToken);
      remove(channel, delivery);
    },

    async deadLetter(lockToken, reason) {
      call('deadLetter');
      const { channel, delivery } = getLock(lockToken);
      return moveToDeadLetter(channel, delivery, reason);
    },
  };
};
