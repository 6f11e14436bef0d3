/**
 * Header values are passed through verbatim. The insertion order of the keys
 * is kept, which is why the PostgreSQL stores use `json` and not `jsonb`.
 */
export type HeaderBag = Record<string, unknown>;

/** The message that is deposited in the outbox and sent over the messaging backend */
export interface Message {
  /** The unique identifier of the message, generated by the caller. Used to ensure a message is only processed once */
  messageId: string;
  /** The routing key of the channel the message is published to */
  topic: string;
  /** The type name of the event or command */
  messageType: string;
  /** The date and time in ISO 8601 "internet time" UTC format (e.g. "2023-10-17T11:48:14Z") when the message was created */
  timestamp: string;
  correlationId?: string;
  replyTo?: string;
  contentType?: string;
  /** Groups messages that must be delivered in order on FIFO channels */
  partitionKey?: string;
  workflowId?: string;
  jobId?: string;
  /** CloudEvents style attributes - opaque to the library */
  source?: string;
  type?: string;
  dataSchema?: string;
  subject?: string;
  /** W3C trace context - opaque to the library */
  traceParent?: string;
  traceState?: string;
  baggage?: Record<string, string>;
  headerBag: HeaderBag;
  /** The opaque message body */
  body: Buffer;
}

/** The outbox message when stored in the database includes dispatch information. */
export interface StoredOutboxMessage extends Message {
  /** The date and time in ISO 8601 format when the message was published. Null while it is pending. */
  dispatched: string | null;
  /** The date and time in ISO 8601 format when the message was inserted */
  created: string;
  /** Strictly increasing insertion sequence. This is the only ordering key of the outbox. */
  createdId: number;
  /** The number of failed publish attempts */
  dispatchAttempts: number;
  /** The earliest date and time in ISO 8601 format when a failed message is published again */
  nextAttemptAt: string | null;
  /** Set when the message exceeded the publish attempts and requires operator attention */
  poisonedAt: string | null;
}

/** The record of an already processed inbound message */
export interface InboxRecord {
  /** The message id of the processed message */
  commandId: string;
  /** Distinguishes multiple consumers of the same message, e.g. the consuming service or queue */
  contextKey: string;
  /** The date and time in ISO 8601 format when the message was processed */
  timestamp: string;
  commandType: string;
  commandBody: Buffer;
  /** The record can be deleted after this many seconds. Kept forever if undefined. */
  expireAfterInSec?: number;
}
