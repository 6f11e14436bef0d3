import { Message } from '../message/message';

export type ErrorCode =
  | 'DB_ERROR'
  | 'STORAGE_ERROR'
  | 'DUPLICATE_KEY'
  | 'CONFIGURATION_ERROR'
  | 'BACKEND_NOT_REGISTERED'
  | 'TRANSPORT_ERROR'
  | 'LOCK_LOST'
  | 'CHANNEL_NOT_FOUND'
  | 'TIMEOUT'
  | 'MESSAGE_HANDLING_FAILED'
  | 'MESSAGE_DEFERRED'
  | 'CONFLICTING_MESSAGE_HANDLERS'
  | 'NO_MESSAGE_HANDLER_REGISTERED'
  | 'LISTENER_STOPPED'
  | 'BATCH_PROCESSING_ERROR'
  | 'MESSAGE_CLEANUP_ERROR';

export interface ExtendedError extends Error {
  errorCode: ErrorCode;
  innerError?: Error;
}

/** An error that was raised from the reliable messaging library. Includes an error code. */
export class ReliableMessagingError extends Error implements ExtendedError {
  public innerError?: Error;
  constructor(
    message: string,
    public errorCode: ErrorCode,
    innerError?: unknown,
  ) {
    super(message);
    this.name = this.constructor.name;
    this.innerError = ensureError(innerError);
  }
}

/** An error that was raised when storing, dispatching or handling a message. */
export class MessageError<
  T extends Pick<Message, 'messageId'>,
> extends ReliableMessagingError {
  constructor(
    message: string,
    errorCode: ErrorCode,
    public messageObject: T,
    innerError?: unknown,
  ) {
    super(message, errorCode, innerError);
    this.name = this.constructor.name;
  }
}

/**
 * Fatal and non-retriable, e.g. a malformed channel descriptor or a message
 * type without a handler. Affected inbound messages go straight to the
 * dead-letter destination and affected outbox messages are poisoned.
 */
export class ConfigurationError extends ReliableMessagingError {
  constructor(
    message: string,
    innerError?: unknown,
    errorCode: 'CONFIGURATION_ERROR' | 'BACKEND_NOT_REGISTERED' = 'CONFIGURATION_ERROR',
  ) {
    super(message, errorCode, innerError);
  }
}

/** The inbox already contains a record for the command and context key. */
export class DuplicateKeyError extends ReliableMessagingError {
  constructor(
    public commandId: string,
    public contextKey: string,
    innerError?: unknown,
  ) {
    super(
      `The inbox already contains the command ${commandId} for the context "${contextKey}".`,
      'DUPLICATE_KEY',
      innerError,
    );
  }
}

/** The messaging backend is unavailable, rate limited or rejected a lock token. */
export class TransportError extends ReliableMessagingError {
  constructor(
    message: string,
    errorCode: 'TRANSPORT_ERROR' | 'LOCK_LOST' | 'TIMEOUT' = 'TRANSPORT_ERROR',
    innerError?: unknown,
  ) {
    super(message, errorCode, innerError);
  }
}

/** A channel with the creation policy "validate" does not exist. */
export class ChannelNotFoundError extends ReliableMessagingError {
  constructor(
    public routingKey: string,
    public reference?: string,
  ) {
    super(
      reference
        ? `The channel "${routingKey}" was not found with the reference ${reference}.`
        : `The channel "${routingKey}" was not found.`,
      'CHANNEL_NOT_FOUND',
    );
  }
}

/** A storage level integrity violation like a duplicate message id. */
export class StorageError extends ReliableMessagingError {
  constructor(message: string, innerError?: unknown) {
    super(message, 'STORAGE_ERROR', innerError);
  }
}

/**
 * Thrown by a message handler to release the message lock without completing
 * it. The message becomes receivable again right away or after `delayInMs`.
 */
export class DeferMessageError extends ReliableMessagingError {
  constructor(public delayInMs?: number) {
    super('The message handler deferred the message.', 'MESSAGE_DEFERRED');
  }
}

/**
 * Returns the error as verified ExtendedError or wraps the input in one with
 * the fallback error code. When a message is given, a non-library error is
 * wrapped in a MessageError that references it.
 * @param error The error variable to check
 * @param fallbackErrorCode The error code to use if the error is not from this library
 * @param message The message that was processed when the error was thrown
 */
export const ensureExtendedError = (
  error: unknown,
  fallbackErrorCode: ErrorCode,
  message?: Pick<Message, 'messageId'>,
): ExtendedError => {
  if (error instanceof ReliableMessagingError) {
    return error;
  }
  const err = ensureError(error) ?? new Error('Unknown error');
  if (message) {
    return new MessageError(err.message, fallbackErrorCode, message, err);
  }
  return new ReliableMessagingError(err.message, fallbackErrorCode, err);
};

const ensureError = (error: unknown): Error | undefined => {
  if (error === null || error === undefined) {
    return undefined;
  }
  if (error instanceof Error) {
    return error;
  }
  return new Error(String(error));
};
