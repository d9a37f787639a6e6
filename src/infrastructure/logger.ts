import pino from 'pino';
import type { Logger } from 'pino';

/**
 * Default logger for a component that was not handed one.
 *
 * Level comes from `LOG_LEVEL`; applications that already own a pino
 * instance should pass `log: parent.child({ ... })` instead.
 */
export function createLogger(name: string): Logger {
  return pino({ name, level: process.env['LOG_LEVEL'] ?? 'info' });
}
