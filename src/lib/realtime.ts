/**
 * Offline Event System
 *
 * In-process EventEmitter bus. The queue announces new work here, the sync
 * engine publishes state changes and sync outcomes, the stock ledger raises
 * low-stock alerts. UI layers subscribe; nothing here crosses the process.
 */

import { EventEmitter } from 'events';
import logger from '@/lib/logger';
import type { EntityType, MutationStatus, Operation } from '@/lib/offline/mutation-record';
import type { SyncState } from '@/lib/offline/sync-engine';

// ─── Event Types ─────────────────────────────────────────

export interface MutationEventData {
  recordId: string;
  entityType: EntityType;
  entityId: number;
  operation: Operation;
}

export interface SyncIssueEventData extends MutationEventData {
  status: Extract<MutationStatus, 'failed' | 'conflict'>;
  message: string;
}

export interface InventoryAlertData {
  inventoryItemLocalId: number;
  itemName: string;
  currentQuantity: number;
  minQuantity: number;
}

export interface OfflineEventMap {
  'mutation:enqueued': MutationEventData;
  'sync:state': SyncState;
  'sync:conflict': SyncIssueEventData;
  'sync:failed': SyncIssueEventData;
  'inventory:alert': InventoryAlertData;
}

export type OfflineEvent = keyof OfflineEventMap;

// ─── In-Process Event Bus ────────────────────────────────

export class OfflineEventBus extends EventEmitter {
  constructor() {
    super();
    this.setMaxListeners(100);
  }

  publish<K extends OfflineEvent>(event: K, data: OfflineEventMap[K]): void {
    try {
      this.emit(event, data);
    } catch (error) {
      logger.error({ err: error, event }, 'Event listener threw');
    }
  }

  subscribe<K extends OfflineEvent>(
    event: K,
    listener: (data: OfflineEventMap[K]) => void
  ): () => void {
    this.on(event, listener);
    return () => {
      this.off(event, listener);
    };
  }
}

// Global singleton
declare global {
  // eslint-disable-next-line no-var
  var offlineEventBus: OfflineEventBus | undefined;
}

export const eventBus: OfflineEventBus = globalThis.offlineEventBus ?? new OfflineEventBus();
if (process.env.NODE_ENV !== 'production') globalThis.offlineEventBus = eventBus;
