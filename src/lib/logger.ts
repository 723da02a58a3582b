/**
 * Structured logging with Pino.
 * One root logger; modules take a child so every line carries `module`.
 */

import pino from 'pino';
import type { Logger } from 'pino';

const level = process.env.LOG_LEVEL || (process.env.NODE_ENV === 'production' ? 'info' : 'debug');

const logger: Logger = pino({
  level,
  base: { app: 'mill-ledger-sync' },
  formatters: {
    level: (label: string) => ({ level: label }),
  },
});

export const syncLogger: Logger = logger.child({ module: 'sync' });
export const ledgerLogger: Logger = logger.child({ module: 'ledger' });
export const queueLogger: Logger = logger.child({ module: 'queue' });
export const inventoryLogger: Logger = logger.child({ module: 'inventory' });
export const remoteLogger: Logger = logger.child({ module: 'remote' });

export type { Logger };
export default logger;
