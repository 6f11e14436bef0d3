import {
  ChannelAttributes,
  ChannelDescriptor,
} from '../channel/channel-descriptor';
import { createChannelResolver } from '../channel/channel-resolver';
import { DeferMessageError, ExtendedError, TransportError } from '../common/error';
import { InMemoryTransaction } from '../common/in-memory-transaction';
import { getInMemoryLogger } from '../common/logger';
import { createManualScheduler } from '../common/scheduler';
import { sleep } from '../common/utils';
import {
  createInMemoryMessagingGateway,
  localConvention,
} from '../gateway/in-memory-messaging-gateway';
import { MessagingGateway } from '../gateway/messaging-gateway';
import { GeneralMessageHandler } from '../handler/general-message-handler';
import { MessageTypeHandler } from '../handler/message-type-handler';
import { createInMemoryInboxStore } from '../inbox/in-memory-inbox-store';
import { Message } from '../message/message';
import { ConsumerPumpSettings } from './config';
import { createConsumerPump, initializeConsumerPump } from './consumer-pump';

const queueReference = 'arn:aws:sqs:local:000000000000:billing';
const fifoQueueReference = 'arn:aws:sqs:local:000000000000:billing.fifo';
const dlqReference = 'arn:aws:sqs:local:000000000000:billing-dlq';

const createMessage = (
  messageId: string,
  messageType = 'invoice_requested',
  partitionKey?: string,
): Message => ({
  messageId,
  topic: 'billing',
  messageType,
  timestamp: '2024-01-01T10:00:00.000Z',
  partitionKey,
  headerBag: {},
  body: Buffer.from(`{"id":"${messageId}"}`),
});

type Handlers =
  | MessageTypeHandler<InMemoryTransaction>[]
  | GeneralMessageHandler<InMemoryTransaction>;

interface SetupOptions {
  settings?: Omit<ConsumerPumpSettings, 'contextKey'>;
  attributes?: ChannelAttributes;
  wrapGateway?: (gateway: MessagingGateway) => MessagingGateway;
}

describe('Consumer pump', () => {
  let time: number;
  const now = () => new Date(time);

  beforeEach(() => {
    time = Date.parse('2024-01-01T10:00:00.000Z');
  });

  const setup = async (
    handlers: Handlers,
    { settings, attributes, wrapGateway }: SetupOptions = {},
  ) => {
    const gateway = createInMemoryMessagingGateway({ now });
    await gateway.createChannel('billing-dlq', 'queue', { ordering: 'standard' });
    const [logger, logs] = getInMemoryLogger('consumer');
    const billingQueue: ChannelDescriptor = {
      routingKey: 'billing',
      kind: 'queue',
      resolution: 'by-convention',
      creation: 'create',
      attributes: attributes ?? { ordering: 'standard' },
    };
    const resolver = createChannelResolver(
      gateway,
      { channels: [billingQueue], convention: localConvention },
      logger,
    );
    const { reference } = await resolver.resolve(billingQueue);
    const inbox = createInMemoryInboxStore();
    const scheduler = createManualScheduler();
    const pump = createConsumerPump(
      {
        channel: 'billing',
        settings: { contextKey: 'billing-service', ...settings },
        scheduler,
        now,
      },
      wrapGateway ? wrapGateway(gateway) : gateway,
      resolver,
      inbox,
      handlers,
      logger,
    );
    const publish = async (...messages: Message[]) => {
      for (const message of messages) {
        await gateway.publish(reference, message);
      }
    };
    return { gateway, logs, inbox, scheduler, pump, publish, resolver };
  };

  const withDlq: ChannelAttributes = {
    ordering: 'standard',
    deadLetter: { reference: dlqReference, maxReceiveCount: 10 },
  };

  it('should handle a message, record it in the inbox and acknowledge it', async () => {
    // Arrange
    const contexts: unknown[] = [];
    const { gateway, inbox, pump, publish } = await setup([
      {
        messageType: 'invoice_requested',
        handle: async (_message, context) => {
          contexts.push(context);
        },
      },
    ]);
    await publish(createMessage('c1'));

    // Act
    const outcome = await pump.receiveAndProcess();

    // Assert
    expect(outcome).toBe('acked');
    expect(contexts).toEqual([
      { transaction: expect.anything(), receiveCount: 1, channel: 'billing' },
    ]);
    expect(inbox.records).toEqual([
      {
        commandId: 'c1',
        contextKey: 'billing-service',
        timestamp: '2024-01-01T10:00:00.000Z',
        commandType: 'invoice_requested',
        commandBody: Buffer.from('{"id":"c1"}'),
        expireAfterInSec: undefined,
      },
    ]);
    expect(gateway.queued(queueReference)).toHaveLength(0);
  });

  it('should return undefined when no message is available', async () => {
    // Arrange
    const { pump } = await setup({ handle: jest.fn() });

    // Act
    const outcome = await pump.receiveAndProcess();

    // Assert
    expect(outcome).toBeUndefined();
  });

  it.each(['warn' as const, 'throw' as const])(
    'should acknowledge a duplicate without calling the handler with the "%s" action',
    async (onceOnlyAction) => {
      // Arrange
      const handle = jest.fn().mockResolvedValue(undefined);
      const { gateway, logs, pump, publish } = await setup(
        { handle },
        { settings: { onceOnlyAction } },
      );
      await publish(createMessage('c1'), createMessage('c1'));

      // Act
      const first = await pump.receiveAndProcess();
      const second = await pump.receiveAndProcess();

      // Assert
      expect(first).toBe('acked');
      expect(second).toBe('duplicate');
      expect(handle).toHaveBeenCalledTimes(1);
      expect(logs.filter((log) => log.type === 'warn')).toHaveLength(1);
      expect(gateway.queued(queueReference)).toHaveLength(0);
    },
  );

  it('should not deduplicate events in the "commands" inbox scope', async () => {
    // Arrange
    const handle = jest.fn().mockResolvedValue(undefined);
    const { inbox, pump, publish } = await setup({ kind: 'event', handle });
    await publish(createMessage('e1'), createMessage('e1'));

    // Act
    const first = await pump.receiveAndProcess();
    const second = await pump.receiveAndProcess();

    // Assert
    expect([first, second]).toEqual(['acked', 'acked']);
    expect(handle).toHaveBeenCalledTimes(2);
    expect(inbox.records).toHaveLength(0);
  });

  it('should release a failed message, roll back the inbox record and dead-letter it after the maximum attempts', async () => {
    // Arrange
    const retries: boolean[] = [];
    const { gateway, inbox, pump, publish } = await setup(
      {
        handle: async () => {
          throw new Error('invoice service unavailable');
        },
        handleError: async (_error: ExtendedError, _message, retry) => {
          retries.push(retry);
        },
      },
      { settings: { maxAttempts: 3 }, attributes: withDlq },
    );
    await publish(createMessage('c1'));

    // Act
    const outcomes = [
      await pump.receiveAndProcess(),
      await pump.receiveAndProcess(),
      await pump.receiveAndProcess(),
    ];

    // Assert
    expect(outcomes).toEqual(['nacked', 'nacked', 'dead-lettered']);
    expect(retries).toEqual([true, true, false]);
    expect(inbox.records).toHaveLength(0);
    expect(gateway.queued(queueReference)).toHaveLength(0);
    expect(gateway.deadLettered(dlqReference)).toEqual([
      {
        message: expect.objectContaining({ messageId: 'c1' }),
        reason: 'The message handling failed 3 times.',
        source: queueReference,
      },
    ]);
  });

  it('should discard a message that must be dead-lettered when no dead-letter queue is configured', async () => {
    // Arrange
    const { gateway, logs, pump, publish } = await setup(
      {
        handle: async () => {
          throw new Error('broken');
        },
      },
      { settings: { maxAttempts: 1 } },
    );
    await publish(createMessage('c1'));

    // Act
    const outcome = await pump.receiveAndProcess();

    // Assert
    expect(outcome).toBe('discarded');
    expect(gateway.queued(queueReference)).toHaveLength(0);
    const errors = logs.filter((log) => log.type === 'error');
    expect(errors).toHaveLength(1);
    expect(errors[0].args[1]).toBe(
      'The message with id c1 is discarded as the channel "billing" has no dead-letter queue: The message handling failed 1 times.',
    );
  });

  it('should dead-letter a message without a handler right away', async () => {
    // Arrange
    const handle = jest.fn();
    const { gateway, pump, publish } = await setup(
      [{ messageType: 'invoice_requested', handle }],
      { attributes: withDlq },
    );
    await publish(createMessage('c1', 'unknown'));

    // Act
    const outcome = await pump.receiveAndProcess();

    // Assert
    expect(outcome).toBe('dead-lettered');
    expect(handle).not.toHaveBeenCalled();
    expect(gateway.deadLettered(dlqReference).map((d) => d.reason)).toEqual([
      'No message handler is registered for the message type "unknown".',
    ]);
  });

  it('should log the message id when the dead-letter call fails', async () => {
    // Arrange
    const handle = jest.fn();
    const failure = new TransportError('The backend is unavailable.');
    const { gateway, logs, pump, publish } = await setup(
      [{ messageType: 'invoice_requested', handle }],
      {
        attributes: withDlq,
        wrapGateway: (gateway) => ({
          ...gateway,
          deadLetter: async () => {
            throw failure;
          },
        }),
      },
    );
    await publish(createMessage('msg-42', 'unknown'));

    // Act
    const outcome = await pump.receiveAndProcess();

    // Assert
    expect(outcome).toBe('unsettled');
    expect(gateway.deadLettered(dlqReference)).toHaveLength(0);
    const errors = logs.filter((log) => log.type === 'error');
    expect(errors).toHaveLength(1);
    expect(errors[0].args).toEqual([
      failure,
      'Could not move the message with id msg-42 to the dead-letter queue: No message handler is registered for the message type "unknown". It is received again after its lock expired.',
    ]);
  });

  it('should report a discarded message as unsettled when the delete call fails', async () => {
    // Arrange
    const { gateway, pump, publish } = await setup(
      {
        handle: async () => {
          throw new Error('broken');
        },
      },
      {
        settings: { maxAttempts: 1 },
        wrapGateway: (gateway) => ({
          ...gateway,
          delete: async () => {
            throw new TransportError('The lock is lost.', 'LOCK_LOST');
          },
        }),
      },
    );
    await publish(createMessage('c1'));

    // Act
    const outcome = await pump.receiveAndProcess();

    // Assert
    expect(outcome).toBe('unsettled');
    expect(gateway.queued(queueReference)).toHaveLength(1);
  });

  it('should dead-letter a message that was received more often than the maximum attempts', async () => {
    // Arrange
    const handle = jest.fn();
    const { gateway, pump, publish } = await setup(
      { handle },
      { settings: { maxAttempts: 1 }, attributes: withDlq },
    );
    await publish(createMessage('c1'));
    // an earlier attempt that never finished
    const crashed = await gateway.receive(queueReference);
    await gateway.nack(crashed?.lockToken ?? '');

    // Act
    const outcome = await pump.receiveAndProcess();

    // Assert
    expect(outcome).toBe('dead-lettered');
    expect(handle).not.toHaveBeenCalled();
    expect(gateway.deadLettered(dlqReference).map((d) => d.reason)).toEqual([
      'The message was received 2 times which exceeds the maximum of 1 attempts.',
    ]);
  });

  it('should make a deferred message receivable again after the delay', async () => {
    // Arrange
    const handle = jest
      .fn()
      .mockRejectedValueOnce(new DeferMessageError(5000))
      .mockResolvedValueOnce(undefined);
    const { inbox, pump, publish } = await setup({ handle });
    await publish(createMessage('c1'));

    // Act
    const deferred = await pump.receiveAndProcess();
    const duringDelay = await pump.receiveAndProcess();
    time += 5000;
    const afterDelay = await pump.receiveAndProcess();

    // Assert
    expect(deferred).toBe('nacked');
    expect(duringDelay).toBeUndefined();
    expect(afterDelay).toBe('acked');
    expect(handle).toHaveBeenCalledTimes(2);
    expect(inbox.records).toHaveLength(1);
  });

  it('should skip the handler on redelivery when the acknowledgement failed after the inbox commit', async () => {
    // Arrange
    let failAck = true;
    const handle = jest.fn().mockResolvedValue(undefined);
    const { logs, pump, publish } = await setup(
      { handle },
      {
        wrapGateway: (gateway) => ({
          ...gateway,
          ack: async (lockToken) => {
            if (failAck) {
              throw new TransportError('The backend is unavailable.');
            }
            return gateway.ack(lockToken);
          },
        }),
      },
    );
    await publish(createMessage('c1'));

    // Act
    const first = await pump.receiveAndProcess();
    failAck = false;
    time += 30_000;
    const redelivered = await pump.receiveAndProcess();

    // Assert
    expect(first).toBe('unsettled');
    expect(logs.filter((log) => log.type === 'warn')[0].args[1]).toBe(
      'Could not acknowledge the message with id c1. It is received again after its lock expired.',
    );
    expect(redelivered).toBe('duplicate');
    expect(handle).toHaveBeenCalledTimes(1);
  });

  it('should process the messages of one FIFO group in publish order', async () => {
    // Arrange
    const order: string[] = [];
    const { pump, publish } = await setup(
      {
        handle: async (message) => {
          await sleep(5);
          order.push(message.messageId);
        },
      },
      {
        settings: { parallelism: 3, emptyReceiveDelayInMs: 2 },
        attributes: { ordering: 'fifo' },
      },
    );
    await publish(
      createMessage('A', 'invoice_requested', 'customer-1'),
      createMessage('B', 'invoice_requested', 'customer-1'),
      createMessage('C', 'invoice_requested', 'customer-1'),
    );

    // Act
    await pump.start();
    while (order.length < 3) {
      await sleep(5);
    }
    await pump.shutdown();

    // Assert
    expect(order).toEqual(['A', 'B', 'C']);
  });

  it('should abandon an in-flight message after the shutdown grace period', async () => {
    // Arrange
    let started: () => void = () => undefined;
    const handlerStarted = new Promise<void>((resolve) => (started = resolve));
    let finish: () => void = () => undefined;
    const handlerGate = new Promise<void>((resolve) => (finish = resolve));
    const handle = jest.fn(async () => {
      started();
      await handlerGate;
    });
    const { gateway, logs, pump, publish } = await setup(
      { handle },
      { settings: { shutdownGracePeriodInMs: 20, emptyReceiveDelayInMs: 2 } },
    );
    await publish(createMessage('c1'));
    await pump.start();
    await handlerStarted;

    // Act
    await pump.shutdown();
    const releasedByShutdown = gateway.calls.nack;
    finish();
    await sleep(10);
    const redelivered = await pump.receiveAndProcess();

    // Assert
    expect(logs.map((log) => log.args[0])).toContain(
      'Abandoned 1 in-flight messages after the shutdown grace period of 20 milliseconds.',
    );
    expect(releasedByShutdown).toBe(1);
    expect(redelivered).toBe('duplicate');
    expect(handle).toHaveBeenCalledTimes(1);
  });

  it('should extend the lock while the handler runs', async () => {
    // Arrange
    const { gateway, pump, publish } = await setup(
      {
        handle: async () => {
          await sleep(50);
        },
      },
      { settings: { lockRenewalIntervalInMs: 10 } },
    );
    await publish(createMessage('c1'));

    // Act
    const outcome = await pump.receiveAndProcess();

    // Assert
    expect(outcome).toBe('acked');
    expect(gateway.calls.changeLockDuration).toBeGreaterThanOrEqual(1);
  });

  it('should delete the expired inbox records on the cleanup schedule', async () => {
    // Arrange
    const { inbox, scheduler, pump, publish } = await setup(
      { handle: jest.fn().mockResolvedValue(undefined) },
      {
        settings: {
          inboxExpireAfterInSec: 60,
          inboxCleanupIntervalInMs: 1000,
          emptyReceiveDelayInMs: 2,
        },
      },
    );
    await publish(createMessage('c1'));
    await pump.receiveAndProcess();
    await pump.start();
    time += 61_000;

    // Act
    await scheduler.tick();
    await pump.shutdown();

    // Assert
    expect(inbox.records).toHaveLength(0);
    expect(scheduler.activeSchedules).toBe(0);
  });

  it('should fail to start for a queue that does not exist', async () => {
    // Arrange
    const gateway = createInMemoryMessagingGateway({ now });
    const [logger] = getInMemoryLogger('consumer');
    const resolver = createChannelResolver(
      gateway,
      {
        channels: [
          {
            routingKey: 'billing',
            kind: 'queue',
            resolution: 'by-convention',
            creation: 'validate',
          },
        ],
        convention: localConvention,
      },
      logger,
    );

    // Act
    const initialize = initializeConsumerPump(
      { channel: 'billing', settings: { contextKey: 'billing-service' } },
      gateway,
      resolver,
      createInMemoryInboxStore(),
      { handle: jest.fn() },
      logger,
    );

    // Assert
    await expect(initialize).rejects.toThrow(
      'The channel "billing" was not found with the reference arn:aws:sqs:local:000000000000:billing.',
    );
  });

  it('should use the FIFO queue reference for FIFO channels', async () => {
    // Arrange
    const { resolver } = await setup(
      { handle: jest.fn() },
      { attributes: { ordering: 'fifo' } },
    );

    // Act
    const resolved = await resolver.resolveRoutingKey('billing');

    // Assert
    expect(resolved.reference).toBe(fifoQueueReference);
  });
});
