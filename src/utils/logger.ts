/**
 * Module Logger
 *
 * winston logger factory shared by every service of the factory.
 * Each module gets its own logger tagged with a `service` field.
 */

import { createLogger, transports, format, Logger } from 'winston';

/**
 * Create a logger for a single module
 *
 * @param service - Value written to the `service` field of every entry
 */
export function createModuleLogger(service: string): Logger {
  const level = process.env.LOG_LEVEL || 'info';

  return createLogger({
    level: level === 'silent' ? 'error' : level,
    silent: level === 'silent',
    format: format.combine(
      format.timestamp(),
      format.json()
    ),
    defaultMeta: { service },
    transports: [
      new transports.Console({
        format: format.combine(
          format.colorize(),
          format.simple()
        ),
      }),
    ],
  });
}

/**
 * Message of an unknown thrown value, for log metadata
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
