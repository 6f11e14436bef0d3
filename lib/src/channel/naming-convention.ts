import { ChannelKind } from './channel-descriptor';

/** The context that turns a short channel name into a backend reference. */
export interface ChannelNamingConvention {
  partition: string;
  region: string;
  accountId: string;
}

const maxNameLength = 80;
const fifoSuffix = '.fifo';

/**
 * Replace the characters the backend does not accept in channel names, add
 * the ".fifo" suffix for FIFO channels and cut the name to the maximum
 * length.
 */
export const sanitizeChannelName = (name: string, fifo: boolean): string => {
  const base = name.endsWith(fifoSuffix)
    ? name.slice(0, -fifoSuffix.length)
    : name;
  const sanitized = base.replace(/[^A-Za-z0-9_-]/g, '-');
  if (!fifo) {
    return sanitized.slice(0, maxNameLength);
  }
  return `${sanitized.slice(0, maxNameLength - fifoSuffix.length)}${fifoSuffix}`;
};

/**
 * Derive the backend reference from the convention, e.g.
 * "arn:aws:sqs:eu-central-1:123456789012:orders". No backend call is needed.
 */
export const deriveChannelReference = (
  { partition, region, accountId }: ChannelNamingConvention,
  kind: ChannelKind,
  name: string,
  fifo: boolean,
): string => {
  const service = kind === 'topic' ? 'sns' : 'sqs';
  return `arn:${partition}:${service}:${region}:${accountId}:${sanitizeChannelName(name, fifo)}`;
};
