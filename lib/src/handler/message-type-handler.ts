import { GeneralMessageHandler } from './general-message-handler';

/**
 * Message handler for a specific message type.
 */
export interface MessageTypeHandler<TTransaction>
  extends GeneralMessageHandler<TTransaction> {
  /** The name of the event or command this handler handles. */
  messageType: string;
}
