import { Message } from '../message/message';
import { GeneralMessageHandler } from './general-message-handler';
import { messageHandlerSelector } from './message-handler-selector';
import { MessageTypeHandler } from './message-type-handler';

const message: Message = {
  messageId: '2ddf1d9b-2c05-413e-bf52-d50a84cf3079',
  topic: 'orders',
  messageType: 'order_created',
  timestamp: '2024-01-01T10:00:00.000Z',
  headerBag: {},
  body: Buffer.from('{}'),
};

describe('messageHandlerSelector', () => {
  const messageHandlers: MessageTypeHandler<unknown>[] = [
    {
      messageType: 'order_created',
      handle: jest.fn(),
    },
    {
      messageType: 'order_updated',
      handle: jest.fn(),
    },
  ];

  const generalMessageHandler: GeneralMessageHandler<unknown> = {
    handle: jest.fn(),
  };

  it('should return the general message handler for a message', () => {
    const selector = messageHandlerSelector(generalMessageHandler);
    const handler = selector(message);
    expect(handler).toBe(generalMessageHandler);
  });

  it('should return a message type handler if a matching one is found', () => {
    const selector = messageHandlerSelector(messageHandlers);
    const handler = selector(message);
    expect(handler).toBe(messageHandlers[0]);
  });

  it('should not return a message type handler if no matching one is found', () => {
    const selector = messageHandlerSelector(messageHandlers);
    const handler = selector({ ...message, messageType: 'not-found' });
    expect(handler).toBeUndefined();
  });

  it('should throw an error if multiple message handlers try to handle the same message type', () => {
    const messageHandlersWithConflict: MessageTypeHandler<unknown>[] = [
      ...messageHandlers,
      {
        messageType: 'order_created',
        handle: jest.fn(),
      },
    ];
    expect(() => messageHandlerSelector(messageHandlersWithConflict)).toThrow(
      'Only one message handler can handle one message type. Multiple message handlers try to handle the message type "order_created".',
    );
  });

  it('should throw an error if no message handler is provided', () => {
    expect(() => messageHandlerSelector([])).toThrow(
      'At least one message handler must be provided.',
    );
  });
});
