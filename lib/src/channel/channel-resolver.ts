import { Mutex } from 'async-mutex';
import { ChannelNotFoundError, ConfigurationError } from '../common/error';
import { MessagingLogger } from '../common/logger';
import { sleep } from '../common/utils';
import { MessagingGateway } from '../gateway/messaging-gateway';
import {
  ChannelDescriptor,
  defaultChannelAttributes,
  getChannelName,
  isFifoChannel,
  validateChannelDescriptor,
} from './channel-descriptor';
import {
  ChannelNamingConvention,
  deriveChannelReference,
  sanitizeChannelName,
} from './naming-convention';

export type EnsureChannelStatus = 'exists' | 'created' | 'notfound' | 'assumed';

export interface EnsureChannelResult {
  status: EnsureChannelStatus;
  /** The backend reference - undefined if the channel was not found */
  reference?: string;
}

export interface ResolvedChannel {
  routingKey: string;
  reference: string;
  status: Exclude<EnsureChannelStatus, 'notfound'>;
  descriptor: ChannelDescriptor;
}

export interface ChannelResolverSettings {
  /** The known channels by their routing key */
  channels: ChannelDescriptor[];
  /** The template for routing keys without a channel descriptor. Unknown routing keys are a configuration error if not set. */
  defaultChannel?: Omit<ChannelDescriptor, 'routingKey' | 'name' | 'reference'>;
  /** Required to resolve channels by convention */
  convention?: ChannelNamingConvention;
  /** The minimum time between two channel enumerations. Default is 1 second. */
  enumerationMinIntervalInMs?: number;
}

export interface ChannelResolver {
  /**
   * Check or provision the channel as defined by its creation policy. A
   * missing channel is reported with the "notfound" status and not thrown.
   * @throws ConfigurationError for a descriptor that cannot be resolved.
   */
  ensureChannel(descriptor: ChannelDescriptor): Promise<EnsureChannelResult>;

  /**
   * Resolve the channel once per process. Concurrent callers share the same
   * resolution and failed resolutions are not cached.
   * @throws ChannelNotFoundError if the channel does not exist.
   */
  resolve(descriptor: ChannelDescriptor): Promise<ResolvedChannel>;

  /** Find the descriptor of the routing key and resolve it. */
  resolveRoutingKey(routingKey: string): Promise<ResolvedChannel>;

  /**
   * The configured descriptor or one created from the default channel template.
   * @throws ConfigurationError if the routing key is unknown.
   */
  getDescriptor(routingKey: string): ChannelDescriptor;

  /**
   * Resolve all the descriptors on startup so missing channels are reported
   * before the first message is handled.
   * @throws ChannelNotFoundError or ConfigurationError for the first failed channel.
   */
  validate(descriptors?: ChannelDescriptor[]): Promise<ResolvedChannel[]>;

  /** Forget the cached resolution of one routing key or of all of them. */
  clearCache(routingKey?: string): void;
}

/**
 * Creates the channel resolver that answers whether a channel exists and
 * creates it if needed. The backend enumeration is only used for channels
 * that are configured for it and the calls are serialized and spaced.
 * @param gateway The messaging backend.
 * @param settings The channel descriptors and the resolution settings.
 * @param logger A logger for the resolution results.
 */
export const createChannelResolver = (
  gateway: MessagingGateway,
  {
    channels,
    defaultChannel,
    convention,
    enumerationMinIntervalInMs = 1000,
  }: ChannelResolverSettings,
  logger: MessagingLogger,
): ChannelResolver => {
  const descriptors = new Map<string, ChannelDescriptor>();
  for (const descriptor of channels) {
    validateChannelDescriptor(descriptor);
    if (descriptors.has(descriptor.routingKey)) {
      throw new ConfigurationError(
        `The channel "${descriptor.routingKey}" is configured more than once.`,
      );
    }
    descriptors.set(descriptor.routingKey, descriptor);
  }
  const cache = new Map<string, Promise<ResolvedChannel>>();
  const enumerationMutex = new Mutex();
  let lastEnumeration: number | undefined;

  const getDescriptor = (routingKey: string): ChannelDescriptor => {
    const descriptor = descriptors.get(routingKey);
    if (descriptor) {
      return descriptor;
    }
    if (!defaultChannel) {
      throw new ConfigurationError(
        `No channel is configured for the routing key "${routingKey}".`,
      );
    }
    return { ...defaultChannel, routingKey };
  };

  const conventionReference = (descriptor: ChannelDescriptor) => {
    if (!convention) {
      throw new ConfigurationError(
        `The channel "${descriptor.routingKey}" is resolved by convention but no naming convention is configured.`,
      );
    }
    return deriveChannelReference(
      convention,
      descriptor.kind,
      getChannelName(descriptor),
      isFifoChannel(descriptor),
    );
  };

  const enumerate = (descriptor: ChannelDescriptor) =>
    enumerationMutex.runExclusive(async () => {
      if (lastEnumeration !== undefined) {
        const wait = lastEnumeration + enumerationMinIntervalInMs - Date.now();
        if (wait > 0) {
          await sleep(wait);
        }
      }
      try {
        const name = sanitizeChannelName(
          getChannelName(descriptor),
          isFifoChannel(descriptor),
        );
        logger.debug(
          { routingKey: descriptor.routingKey },
          `Enumerating the channels to find "${name}".`,
        );
        const found = await gateway.listChannels();
        return found.find((c) => c.kind === descriptor.kind && c.name === name)
          ?.reference;
      } finally {
        lastEnumeration = Date.now();
      }
    });

  const findReference = async (
    descriptor: ChannelDescriptor,
  ): Promise<EnsureChannelResult> => {
    let reference: string | undefined;
    switch (descriptor.resolution) {
      case 'by-direct-reference':
        reference = descriptor.reference;
        break;
      case 'by-convention':
        reference = conventionReference(descriptor);
        break;
      case 'by-enumeration':
        reference = await enumerate(descriptor);
        if (!reference) {
          return { status: 'notfound' };
        }
        return { status: 'exists', reference };
    }
    if (!reference) {
      return { status: 'notfound' };
    }
    const info = await gateway.getChannel(reference);
    return info
      ? { status: 'exists', reference }
      : { status: 'notfound', reference };
  };

  const ensureChannel = async (
    descriptor: ChannelDescriptor,
  ): Promise<EnsureChannelResult> => {
    validateChannelDescriptor(descriptor);
    switch (descriptor.creation) {
      case 'assume':
        return {
          status: 'assumed',
          reference: descriptor.reference ?? conventionReference(descriptor),
        };
      case 'create': {
        const reference = await gateway.createChannel(
          getChannelName(descriptor),
          descriptor.kind,
          descriptor.attributes ?? defaultChannelAttributes,
        );
        if (descriptor.subscribesTo) {
          const topic = await resolve(getDescriptor(descriptor.subscribesTo));
          await gateway.subscribe(topic.reference, reference);
        }
        logger.debug(
          { routingKey: descriptor.routingKey, reference },
          `The channel "${descriptor.routingKey}" was created or exists already.`,
        );
        return { status: 'created', reference };
      }
      case 'validate':
        return findReference(descriptor);
    }
  };

  const resolveUncached = async (
    descriptor: ChannelDescriptor,
  ): Promise<ResolvedChannel> => {
    const { status, reference } = await ensureChannel(descriptor);
    if (status === 'notfound' || !reference) {
      throw new ChannelNotFoundError(descriptor.routingKey, reference);
    }
    return { routingKey: descriptor.routingKey, reference, status, descriptor };
  };

  const resolve = (descriptor: ChannelDescriptor): Promise<ResolvedChannel> => {
    const cached = cache.get(descriptor.routingKey);
    if (cached) {
      return cached;
    }
    const resolution = resolveUncached(descriptor);
    cache.set(descriptor.routingKey, resolution);
    resolution.catch(() => {
      // Only evict the own failed resolution and not a newer one
      if (cache.get(descriptor.routingKey) === resolution) {
        cache.delete(descriptor.routingKey);
      }
    });
    return resolution;
  };

  return {
    ensureChannel,
    resolve,
    resolveRoutingKey: (routingKey) => resolve(getDescriptor(routingKey)),
    getDescriptor,

    async validate(toValidate = Array.from(descriptors.values())) {
      const results = await Promise.allSettled(toValidate.map(resolve));
      const resolved: ResolvedChannel[] = [];
      let firstError: unknown;
      results.forEach((result, index) => {
        if (result.status === 'fulfilled') {
          resolved.push(result.value);
          return;
        }
        logger.error(
          result.reason,
          `The channel "${toValidate[index].routingKey}" could not be resolved.`,
        );
        if (firstError === undefined) {
          firstError = result.reason;
        }
      });
      if (firstError !== undefined) {
        throw firstError;
      }
      return resolved;
    },

    clearCache(routingKey?: string) {
      if (routingKey === undefined) {
        cache.clear();
      } else {
        cache.delete(routingKey);
      }
    },
  };
};
