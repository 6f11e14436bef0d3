import { DuplicateKeyError } from '../common/error';
import { MessagingLogger } from '../common/logger';
import { InboxRecord, Message } from '../message/message';
import { InboxStore } from './inbox-store';

/**
 * What to do when the inbox already contains the message:
 * - throw: raise a DuplicateKeyError without calling the handler
 * - warn: log a warning and skip the handler
 * - ignore: call the handler anyway (no deduplication)
 */
export type OnceOnlyAction = 'throw' | 'warn' | 'ignore';

/** Which messages are deduplicated: only commands or all message kinds. */
export type InboxScope = 'commands' | 'all';

/** Commands are deduplicated in both inbox scopes, events only with "all". */
export type MessageKind = 'command' | 'event';

export interface OnceOnlyGuardSettings {
  /** Distinguishes the consumers of the same message, e.g. the service name */
  contextKey: string;
  onceOnlyAction: OnceOnlyAction;
  inboxScope: InboxScope;
  /** Inbox records may be deleted after this many seconds. Kept forever if not set. */
  inboxExpireAfterInSec?: number;
}

/** "duplicate" means the handler was not called as the message was processed before. */
export type GuardOutcome = 'processed' | 'duplicate';

export interface OnceOnlyGuard<TTransaction> {
  /**
   * Run the handler at most once per message id and context key. The inbox
   * probe, the handler and the inbox record share one storage transaction so
   * the record commits together with the handler side effects.
   * @throws DuplicateKeyError for a processed message with the "throw" action. Any error from the handler.
   */
  run(
    message: Message,
    kind: MessageKind,
    handler: (transaction: TTransaction) => Promise<void>,
  ): Promise<GuardOutcome>;
}

/**
 * Creates the once-only guard that the consumer uses around every handler
 * invocation.
 * @param inbox The inbox store with the records of the processed messages.
 * @param settings The context key and the deduplication policy.
 * @param logger Logs the skipped duplicates.
 * @param now The clock for the record timestamp.
 */
export const createOnceOnlyGuard = <TTransaction>(
  inbox: InboxStore<TTransaction>,
  {
    contextKey,
    onceOnlyAction,
    inboxScope,
    inboxExpireAfterInSec,
  }: OnceOnlyGuardSettings,
  logger: MessagingLogger,
  now: () => Date = () => new Date(),
): OnceOnlyGuard<TTransaction> => {
  const createRecord = (message: Message): InboxRecord => ({
    commandId: message.messageId,
    contextKey,
    timestamp: now().toISOString(),
    commandType: message.messageType,
    commandBody: message.body,
    expireAfterInSec: inboxExpireAfterInSec,
  });

  const skipDuplicate = (message: Message): GuardOutcome => {
    logger.warn(
      { messageId: message.messageId, contextKey },
      `The message with id ${message.messageId} was already processed for the context "${contextKey}" - the handler is skipped.`,
    );
    return 'duplicate';
  };

  return {
    async run(message, kind, handler) {
      if (inboxScope === 'commands' && kind !== 'command') {
        await inbox.executeTransaction(handler);
        return 'processed';
      }

      if (onceOnlyAction === 'ignore') {
        await inbox.executeTransaction(async (transaction) => {
          await handler(transaction);
          await inbox.add(createRecord(message), transaction, 'ignore');
        });
        return 'processed';
      }

      try {
        return await inbox.executeTransaction(
          async (transaction): Promise<GuardOutcome> => {
            const processed = await inbox.exists(
              message.messageId,
              contextKey,
              transaction,
            );
            if (processed) {
              if (onceOnlyAction === 'throw') {
                throw new DuplicateKeyError(message.messageId, contextKey);
              }
              return skipDuplicate(message);
            }
            await handler(transaction);
            await inbox.add(createRecord(message), transaction);
            return 'processed';
          },
        );
      } catch (error) {
        // A concurrent worker committed the record first: the handler side
        // effects of this attempt were rolled back.
        if (error instanceof DuplicateKeyError && onceOnlyAction === 'warn') {
          return skipDuplicate(message);
        }
        throw error;
      }
    },
  };
};
