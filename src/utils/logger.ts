/**
 * Logging
 *
 * Root pino logger plus per-module children. Silent under Jest unless
 * LOG_LEVEL says otherwise.
 *
 * Usage:
 *   const log = createLogger('sqliteBackend');
 *   log.info({ dbPath }, '[sqliteBackend] Schema ready');
 */

import pino from 'pino';

export type Logger = pino.Logger;

export const logger: Logger = pino({
  name: 'dmo-core',
  level: process.env.LOG_LEVEL ?? (process.env.NODE_ENV === 'test' ? 'silent' : 'info'),
});

export function createLogger(module: string, parent: Logger = logger): Logger {
  return parent.child({ module });
}
