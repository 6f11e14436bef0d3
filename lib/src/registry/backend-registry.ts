import { Pool } from 'pg';
import { ChannelNamingConvention } from '../channel/naming-convention';
import { Env } from '../common/env-settings';
import { ConfigurationError } from '../common/error';
import { MessagingLogger } from '../common/logger';
import { createInMemoryMessagingGateway } from '../gateway/in-memory-messaging-gateway';
import { MessagingGateway } from '../gateway/messaging-gateway';
import { createInMemoryInboxStore } from '../inbox/in-memory-inbox-store';
import { InboxStore } from '../inbox/inbox-store';
import {
  createPostgresInboxStore,
  getPostgresInboxStoreSettings,
} from '../inbox/postgres-inbox-store';
import { createInMemoryOutboxStore } from '../outbox/in-memory-outbox-store';
import { OutboxStore } from '../outbox/outbox-store';
import {
  createPostgresOutboxStore,
  getPostgresOutboxStoreSettings,
} from '../outbox/postgres-outbox-store';

/**
 * The outbox and inbox stores of one storage backend. They share the
 * transaction type so a handler can deposit outbox messages in the same
 * transaction that records the inbox entry.
 */
export interface StorageBackend<TTransaction> {
  outbox: OutboxStore<TTransaction>;
  inbox: InboxStore<TTransaction>;
}

export interface BackendOptions {
  logger: MessagingLogger;
  /** Read the backend settings from this object instead of process.env */
  env?: Env;
  /** The clock of the in-memory backends */
  now?: () => Date;
  /** Required by the "postgres" storage backend */
  pool?: Pool;
  /** Derives the channel references of the in-memory transport */
  convention?: ChannelNamingConvention;
}

/**
 * Creates a storage backend. The transaction type is only known to the code
 * that registered the backend so it is `unknown` for a lookup by id.
 */
export type StorageBackendFactory = (
  options: BackendOptions,
) => StorageBackend<unknown>;

export type TransportBackendFactory = (
  options: BackendOptions,
) => MessagingGateway;

export interface BackendRegistry {
  /** Register a storage backend. An existing registration with the same id is replaced. */
  registerStorage(id: string, factory: StorageBackendFactory): void;
  /** Register a transport backend. An existing registration with the same id is replaced. */
  registerTransport(id: string, factory: TransportBackendFactory): void;
  /** @throws ConfigurationError with the code BACKEND_NOT_REGISTERED for an unknown id. */
  createStorage(id: string, options: BackendOptions): StorageBackend<unknown>;
  /** @throws ConfigurationError with the code BACKEND_NOT_REGISTERED for an unknown id. */
  createTransport(id: string, options: BackendOptions): MessagingGateway;
  readonly storageIds: string[];
  readonly transportIds: string[];
}

/**
 * Creates an empty registry that maps backend ids from the configuration to
 * the factories of the storage and transport backends.
 */
export const createBackendRegistry = (): BackendRegistry => {
  const storages = new Map<string, StorageBackendFactory>();
  const transports = new Map<string, TransportBackendFactory>();

  const lookup = <T>(
    factories: Map<string, T>,
    kind: 'storage' | 'transport',
    id: string,
  ): T => {
    const factory = factories.get(id);
    if (!factory) {
      throw new ConfigurationError(
        `No ${kind} backend is registered with the id "${id}". Registered are: ${Array.from(factories.keys()).join(', ') || 'none'}.`,
        undefined,
        'BACKEND_NOT_REGISTERED',
      );
    }
    return factory;
  };

  return {
    registerStorage(id, factory) {
      storages.set(id, factory);
    },
    registerTransport(id, factory) {
      transports.set(id, factory);
    },
    createStorage(id, options) {
      return lookup(storages, 'storage', id)(options);
    },
    createTransport(id, options) {
      return lookup(transports, 'transport', id)(options);
    },
    get storageIds() {
      return Array.from(storages.keys());
    },
    get transportIds() {
      return Array.from(transports.keys());
    },
  };
};

/** The PostgreSQL stores with the table settings from the ENV variables. */
export const postgresStorageBackend: StorageBackendFactory = ({
  pool,
  env,
  logger,
}) => {
  if (!pool) {
    throw new ConfigurationError(
      'The "postgres" storage backend requires a database pool.',
    );
  }
  return {
    outbox: createPostgresOutboxStore(
      pool,
      getPostgresOutboxStoreSettings(env),
      logger,
    ),
    inbox: createPostgresInboxStore(
      pool,
      getPostgresInboxStoreSettings(env),
      logger,
    ),
  };
};

export const inMemoryStorageBackend: StorageBackendFactory = ({ now }) => ({
  outbox: createInMemoryOutboxStore(now),
  inbox: createInMemoryInboxStore(),
});

export const inMemoryTransportBackend: TransportBackendFactory = ({
  now,
  convention,
}) => createInMemoryMessagingGateway({ now, convention });

/**
 * Creates a registry with the built-in backends: the "postgres" and
 * "in-memory" storage and the "in-memory" transport.
 */
export const createDefaultBackendRegistry = (): BackendRegistry => {
  const registry = createBackendRegistry();
  registry.registerStorage('postgres', postgresStorageBackend);
  registry.registerStorage('in-memory', inMemoryStorageBackend);
  registry.registerTransport('in-memory', inMemoryTransportBackend);
  return registry;
};
