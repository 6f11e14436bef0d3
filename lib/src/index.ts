export {
  ChannelAttributes,
  ChannelDescriptor,
  ChannelKind,
  CreationPolicy,
  DeadLetterPolicy,
  DeduplicationScope,
  OrderingMode,
  ResolutionStrategy,
  defaultChannelAttributes,
  getChannelName,
  isFifoChannel,
  validateChannelDescriptor,
} from './channel/channel-descriptor';
export {
  ChannelResolver,
  ChannelResolverSettings,
  EnsureChannelResult,
  EnsureChannelStatus,
  ResolvedChannel,
  createChannelResolver,
} from './channel/channel-resolver';
export {
  ChannelNamingConvention,
  deriveChannelReference,
  sanitizeChannelName,
} from './channel/naming-convention';
export {
  DatabaseClient,
  isPgSerializationError,
  isPgUniqueViolation,
} from './common/database';
export {
  Env,
  fallbackEnvPrefix,
  inboxEnvPrefix,
  outboxEnvPrefix,
} from './common/env-settings';
export {
  ChannelNotFoundError,
  ConfigurationError,
  DeferMessageError,
  DuplicateKeyError,
  ErrorCode,
  ExtendedError,
  MessageError,
  ReliableMessagingError,
  StorageError,
  TransportError,
  ensureExtendedError,
} from './common/error';
export {
  InMemoryTransaction,
  createInMemoryTransaction,
  executeInMemoryTransaction,
} from './common/in-memory-transaction';
export {
  InMemoryLogEntry,
  MessagingLogger,
  getDefaultLogger,
  getDisabledLogger,
  getInMemoryLogger,
} from './common/logger';
export {
  ManualScheduler,
  ScheduledTask,
  Scheduler,
  createManualScheduler,
  createTimerScheduler,
} from './common/scheduler';
export { IsolationLevel, executeTransaction } from './common/utils';
export { ConcurrencyController } from './concurrency-controller/concurrency-controller';
export { createDiscriminatingMutexConcurrencyController } from './concurrency-controller/create-discriminating-mutex-concurrency-controller';
export { createFullConcurrencyController } from './concurrency-controller/create-full-concurrency-controller';
export { createSemaphoreConcurrencyController } from './concurrency-controller/create-semaphore-concurrency-controller';
export {
  ConsumerPumpConfig,
  ConsumerPumpSettings,
  getConsumerPumpEnvTemplate,
  getConsumerPumpSettings,
} from './consumer/config';
export {
  ConsumeOutcome,
  ConsumerPump,
  createConsumerPump,
  initializeConsumerPump,
} from './consumer/consumer-pump';
export { ConsumerStrategies } from './consumer/consumer-strategies';
export {
  MessageRetryStrategy,
  defaultMessageRetryStrategy,
} from './consumer/message-retry-strategy';
export {
  OutboxDispatcherConfig,
  OutboxDispatcherSettings,
  getOutboxDispatcherEnvTemplate,
  getOutboxDispatcherSettings,
} from './dispatcher/config';
export {
  DispatchRetryStrategy,
  defaultDispatchRetryStrategy,
} from './dispatcher/dispatch-retry-strategy';
export { DispatcherStrategies } from './dispatcher/dispatcher-strategies';
export {
  DispatchResult,
  OutboxDispatcher,
  createOutboxDispatcher,
  initializeOutboxDispatcher,
} from './dispatcher/outbox-dispatcher';
export {
  PublishTimeoutStrategy,
  defaultPublishTimeoutStrategy,
} from './dispatcher/publish-timeout-strategy';
export {
  DeadLetteredMessage,
  InMemoryMessagingGateway,
  InMemoryMessagingGatewayOptions,
  createInMemoryMessagingGateway,
  localConvention,
} from './gateway/in-memory-messaging-gateway';
export {
  ChannelInfo,
  LockedMessage,
  MessagingGateway,
  ReceiveOptions,
} from './gateway/messaging-gateway';
export {
  GeneralMessageHandler,
  MessageHandlerContext,
} from './handler/general-message-handler';
export { MessageTypeHandler } from './handler/message-type-handler';
export {
  InMemoryInboxStore,
  createInMemoryInboxStore,
} from './inbox/in-memory-inbox-store';
export { InboxConflictAction, InboxStore } from './inbox/inbox-store';
export {
  GuardOutcome,
  InboxScope,
  MessageKind,
  OnceOnlyAction,
  OnceOnlyGuard,
  OnceOnlyGuardSettings,
  createOnceOnlyGuard,
} from './inbox/once-only-guard';
export {
  PostgresInboxStoreSettings,
  createPostgresInboxStore,
  getPostgresInboxStoreEnvTemplate,
  getPostgresInboxStoreSettings,
} from './inbox/postgres-inbox-store';
export {
  HeaderBag,
  InboxRecord,
  Message,
  StoredOutboxMessage,
} from './message/message';
export {
  InMemoryOutboxStore,
  createInMemoryOutboxStore,
} from './outbox/in-memory-outbox-store';
export {
  DispatchFailure,
  OutboxDispatchStore,
  OutboxStore,
} from './outbox/outbox-store';
export {
  PostgresOutboxStoreSettings,
  createPostgresOutboxStore,
  getPostgresOutboxStoreEnvTemplate,
  getPostgresOutboxStoreSettings,
} from './outbox/postgres-outbox-store';
export {
  BackendOptions,
  BackendRegistry,
  StorageBackend,
  StorageBackendFactory,
  TransportBackendFactory,
  createBackendRegistry,
  createDefaultBackendRegistry,
} from './registry/backend-registry';
