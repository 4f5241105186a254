import { pino } from 'pino';

/**
 * The subset of a pino logger that hashdial writes to. Any pino
 * instance (or child) satisfies it.
 */
export interface RingLogger {
  debug(obj: object, msg: string): void;
  info(obj: object, msg: string): void;
  warn(obj: object, msg: string): void;
  error(obj: object, msg: string): void;
  child(bindings: Record<string, unknown>): RingLogger;
}

export const logger: RingLogger = pino({
  level: process.env.LOG_LEVEL || 'info',
  base: { service: 'hashdial' },
});
