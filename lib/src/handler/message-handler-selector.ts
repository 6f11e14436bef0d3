import { ReliableMessagingError } from '../common/error';
import { Message } from '../message/message';
import { GeneralMessageHandler } from './general-message-handler';
import { MessageTypeHandler } from './message-type-handler';

export const messageHandlerSelector = <TTransaction>(
  messageHandlers:
    | MessageTypeHandler<TTransaction>[]
    | GeneralMessageHandler<TTransaction>,
): ((message: Message) => GeneralMessageHandler<TTransaction> | undefined) => {
  if (!Array.isArray(messageHandlers)) {
    return () => messageHandlers;
  }
  const handlers = createMessageHandlerMap(messageHandlers);
  return (message: Message): GeneralMessageHandler<TTransaction> | undefined =>
    handlers.get(message.messageType);
};

const createMessageHandlerMap = <TTransaction>(
  messageHandlers: MessageTypeHandler<TTransaction>[],
): Map<string, MessageTypeHandler<TTransaction>> => {
  const handlers = new Map<string, MessageTypeHandler<TTransaction>>();
  for (const handler of messageHandlers) {
    if (handlers.has(handler.messageType)) {
      throw new ReliableMessagingError(
        `Only one message handler can handle one message type. Multiple message handlers try to handle the message type "${handler.messageType}".`,
        'CONFLICTING_MESSAGE_HANDLERS',
      );
    }
    handlers.set(handler.messageType, handler);
  }

  if (handlers.size === 0) {
    throw new ReliableMessagingError(
      'At least one message handler must be provided.',
      'NO_MESSAGE_HANDLER_REGISTERED',
    );
  }

  return handlers;
};
