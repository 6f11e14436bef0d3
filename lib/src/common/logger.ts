/* eslint-disable @typescript-eslint/no-empty-function */
import pino, { BaseLogger } from 'pino';

export type MessagingLogger = BaseLogger;

export const getDefaultLogger = (name = 'reliable-messaging'): MessagingLogger =>
  pino({ name, timestamp: pino.stdTimeFunctions.isoTime });

/**
 * Disable the logger.
 */
export const getDisabledLogger = (): MessagingLogger => ({
  fatal: () => {},
  error: () => {},
  warn: () => {},
  info: () => {},
  debug: () => {},
  trace: () => {},
  silent: () => {},
  level: 'silent',
  msgPrefix: undefined,
});

/**
 * Writes all logs to an array that is returned from this call.
 * @param context Add this to every log entry
 * @returns The logger instance and the array of in-memory logs
 */
export const getInMemoryLogger = (
  context: string,
): [logger: MessagingLogger, logs: InMemoryLogEntry[]] => {
  const logs: InMemoryLogEntry[] = [];
  const l =
    (type: string) =>
    (...args: unknown[]) => {
      logs.push({ type, args, date: new Date().toISOString(), context });
    };
  const logger: MessagingLogger = {
    fatal: l('fatal'),
    error: l('error'),
    warn: l('warn'),
    info: l('info'),
    debug: l('debug'),
    trace: l('trace'),
    silent: l('silent'),
    level: 'trace',
    msgPrefix: undefined,
  };
  return [logger, logs];
};

export interface InMemoryLogEntry {
  context: string;
  type: string;
  date: string;
  args: unknown[];
}
