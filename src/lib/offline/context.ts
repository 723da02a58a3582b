/**
 * Collaborators shared by the domain operations, the queue and the
 * sync engine, plus the unit-of-work helper that ties them together.
 */

import type { OfflineEventBus } from '@/lib/realtime';
import type { LedgerDatabase } from './db';
import type { Clock, IdAllocator } from './ids';

export interface OfflineDeps {
  db: LedgerDatabase;
  clock: Clock;
  ids: IdAllocator;
  bus: OfflineEventBus;
  /** Retry budget given to new mutation records. */
  maxRetries: number;
}

/** An open read-write unit of work over the whole ledger. */
export interface LedgerTx extends OfflineDeps {
  /** Same instant for every row written in this unit. */
  now: Date;
  afterCommit(callback: () => void): void;
}

/**
 * Run `work` in one Dexie rw transaction over every table.
 * A throw anywhere rolls back every write; post-commit callbacks
 * (event publication) run only when the transaction committed.
 */
export async function withLedgerTransaction<T>(
  deps: OfflineDeps,
  work: (tx: LedgerTx) => Promise<T>
): Promise<T> {
  const callbacks: Array<() => void> = [];
  const tx: LedgerTx = {
    ...deps,
    now: deps.clock(),
    afterCommit: (callback) => {
      callbacks.push(callback);
    },
  };

  // The scope must itself be an async function: Dexie only carries its
  // transaction zone across native awaits (nested async helpers) for those.
  const result = await deps.db.transaction('rw', deps.db.tables, async () => await work(tx));
  for (const callback of callbacks) callback();
  return result;
}
