import pino, { type Logger } from 'pino';

/** Logging hook used by the brokers: one formatted message per call. */
export type BrokerLogger = Pick<Logger, 'info'>;

/**
 * Creates the logger a broker uses when logging is enabled and none was supplied.
 */
export function createLogger(name: string): Logger {
  return pino({
    name,
    level: process.env.LOG_LEVEL || 'info',
    base: undefined,
  });
}
