import { ChannelAttributes, ChannelKind } from '../channel/channel-descriptor';
import { Message } from '../message/message';

export interface ChannelInfo {
  reference: string;
  name: string;
  kind: ChannelKind;
  attributes: ChannelAttributes;
}

/** A received message that is locked for the receiver until the lock expires. */
export interface LockedMessage {
  /** Identifies this delivery. It becomes stale when the message is received again. */
  lockToken: string;
  /** How often the message was received including this delivery */
  receiveCount: number;
  message: Message;
  /** The message group on FIFO channels */
  groupKey?: string;
}

export interface ReceiveOptions {
  /** The lock duration for the received message. Uses the channel lock duration if not set. */
  lockDurationInMs?: number;
}

/**
 * The operations the library needs from a message-oriented middleware. The
 * operations raise a TransportError when the backend is unavailable or
 * rejects the call, and a TransportError with the "LOCK_LOST" code for a
 * stale lock token.
 */
export interface MessagingGateway {
  /** Fetch the channel attributes. A missing channel is `undefined`, not an error. */
  getChannel(reference: string): Promise<ChannelInfo | undefined>;

  /**
   * Create the channel. Creating an existing channel is not an error.
   * @returns The backend reference of the channel.
   */
  createChannel(
    name: string,
    kind: ChannelKind,
    attributes: ChannelAttributes,
  ): Promise<string>;

  /** Enumerate all channels. Expensive and rate limited by the backends. */
  listChannels(): Promise<ChannelInfo[]>;

  /** Deliver all messages published to the topic to the queue as well. Idempotent. */
  subscribe(topicReference: string, queueReference: string): Promise<void>;

  /** @returns The delivery token of the backend. */
  publish(reference: string, message: Message): Promise<string>;

  /** Receive and lock the next available message, `undefined` if there is none. */
  receive(
    queueReference: string,
    options?: ReceiveOptions,
  ): Promise<LockedMessage | undefined>;

  /** Complete the message - it is removed from the queue. */
  ack(lockToken: string): Promise<void>;

  /** Release the lock so the message can be received again, optionally after a delay. */
  nack(lockToken: string, delayInMs?: number): Promise<void>;

  /** Extend or shorten the lock of the message counted from now. */
  changeLockDuration(lockToken: string, durationInMs: number): Promise<void>;

  /** Remove the message without completing it. */
  delete(lockToken: string): Promise<void>;

  /**
   * Move the message to the dead-letter queue of its channel.
   * @returns False if the channel has no dead-letter queue configured - the message stays locked.
   */
  deadLetter(lockToken: string, reason: string): Promise<boolean>;
}
