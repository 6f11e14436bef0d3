import { ExtendedError } from '../common/error';
import { MessageKind } from '../inbox/once-only-guard';
import { Message } from '../message/message';

export interface MessageHandlerContext<TTransaction> {
  /**
   * The storage transaction of the inbox record. Use it for the handler side
   * effects so they commit or roll back together with the record.
   */
  transaction: TTransaction;
  /** How often the message was received including this delivery */
  receiveCount: number;
  /** The routing key of the queue the message was received from */
  channel: string;
}

/**
 * Message handler for handling all message types.
 */
export interface GeneralMessageHandler<TTransaction> {
  /**
   * Commands are deduplicated by the inbox in both inbox scopes, events only
   * in the "all" scope. Defaults to "command".
   */
  kind?: MessageKind;

  /**
   * Custom business logic to handle a received message. It is fine to throw
   * an error if the message cannot be processed. Throw a `DeferMessageError`
   * to release the message without counting it as a failure.
   * @param message The received message.
   * @param context The transaction and delivery details.
   * @throws If something failed and the message should NOT be acknowledged - throw an error.
   */
  handle: (
    message: Message,
    context: MessageHandlerContext<TTransaction>,
  ) => Promise<void>;

  /**
   * Custom (optional) business logic to handle an error that was caused by the
   * "handle" method. Errors thrown here are logged and do not change the
   * outcome of the message.
   * @param error The error that was thrown in the handle method.
   * @param message The message that was attempted to be handled.
   * @param retry True if the message is received again, false if it is dead-lettered.
   */
  handleError?: (
    error: ExtendedError,
    message: Message,
    retry: boolean,
  ) => Promise<void>;
}
