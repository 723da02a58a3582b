/**
 * LOCAL DATABASE: IndexedDB via Dexie
 *
 * This is the SINGLE SOURCE OF TRUTH for the application.
 * The remote system of record is a sync target, not a dependency.
 *
 * Architecture:
 *   UI ←→ LedgerDatabase (IndexedDB) ←→ SyncEngine → Remote
 *
 * Every read comes from here. Every write goes here FIRST,
 * in the same transaction as the mutation record that will replay it.
 *
 * Under Node the IndexedDB implementation is passed in through the
 * `indexedDB` / `IDBKeyRange` options (tests load fake-indexeddb).
 */

import Dexie, { type Table } from 'dexie';
import type { MutationRecord, NewMutationRecord } from './mutation-record';

// ─── Offline Metadata ────────────────────────────────────

export const SYNC_STATUSES = ['pending', 'syncing', 'synced', 'failed', 'conflict'] as const;
export type SyncStatus = (typeof SYNC_STATUSES)[number];

/** Carried by every ledger row that is replicated to the remote. */
export interface SyncMetadata {
  localId: number;
  _serverId?: string;
  _syncStatus: SyncStatus;
  _isDeleted: boolean;
  _lastSyncedAt?: string;
  createdAt: string;
  updatedAt: string;
}

/** Row shape accepted by `add`: the store assigns `localId`. */
export type NewRow<T extends { localId: number }> = Omit<T, 'localId'>;

export function isSynced(entity: Pick<SyncMetadata, '_syncStatus'>): boolean {
  return entity._syncStatus === 'synced';
}

// ─── Local Entity Types ──────────────────────────────────

export const CUSTOMER_TYPES = ['farmer', 'trader', 'retailer', 'wholesaler', 'other'] as const;
export type CustomerType = (typeof CUSTOMER_TYPES)[number];

export interface LocalCustomer extends SyncMetadata {
  name: string;
  phone: string;            // digits only
  address?: string;
  type: CustomerType;
  balance: number;          // + they owe us, − we owe them
  totalPurchases: number;
  totalSales: number;
}

export const ITEM_TYPES = ['paddy', 'rice', 'bran', 'husk'] as const;
export type ItemType = (typeof ITEM_TYPES)[number];

export interface LocalInventoryItem extends SyncMetadata {
  type: ItemType;
  variety: string;
  currentQuantity: number;  // kg
  currentBags: number;
  averagePricePerKg: number;
  minQuantity: number;      // low-stock threshold
}

export const TRANSACTION_TYPES = ['buy', 'sell'] as const;
export type TransactionType = (typeof TRANSACTION_TYPES)[number];
export type TransactionStatus = 'completed' | 'cancelled';
export type PaymentStatus = 'pending' | 'partial' | 'completed' | 'cancelled';

export const PAYMENT_METHODS = ['cash', 'bank_transfer', 'cheque', 'credit', 'mobile'] as const;
export type PaymentMethod = (typeof PAYMENT_METHODS)[number];

export interface LocalTransaction extends SyncMetadata {
  transactionNumber: string;
  type: TransactionType;
  status: TransactionStatus;
  customerLocalId: number;
  customerName: string;
  subtotal: number;
  discount: number;
  totalAmount: number;
  paidAmount: number;
  dueAmount: number;
  paymentStatus: PaymentStatus;
  paymentMethod?: PaymentMethod;
  notes?: string;
  cancelReason?: string;
  transactionDate: string;
}

export interface LocalTransactionItem {
  localId: number;
  _serverId?: string;
  transactionLocalId: number;
  inventoryItemLocalId: number;
  itemType: ItemType;
  variety: string;
  bags: number;
  quantity: number;
  pricePerKg: number;
  totalAmount: number;
}

export interface LocalPayment extends SyncMetadata {
  transactionLocalId: number;
  amount: number;
  method: PaymentMethod;
  notes?: string;
  paidAt: string;
}

export interface LocalMillingRecord extends SyncMetadata {
  paddyItemLocalId: number;
  riceItemLocalId: number;
  paddyQuantity: number;
  paddyBags: number;
  riceQuantity: number;
  riceBags: number;
  wastageQuantity: number;
  notes?: string;
  milledAt: string;
}

export const MOVEMENT_TYPES = [
  'initial',
  'buy',
  'sell',
  'buy_reversal',
  'sell_reversal',
  'milling_in',
  'milling_out',
  'adjustment',
  'remote_reconcile',
] as const;
export type MovementType = (typeof MOVEMENT_TYPES)[number];
export type MovementReference = 'transaction' | 'milling' | 'adjustment';

/** Local audit trail. Never synced as a row of its own. */
export interface StockMovement {
  localId: number;
  inventoryItemLocalId: number;
  movementType: MovementType;
  quantityDelta: number;
  bagsDelta: number;
  pricePerKg?: number;
  referenceType?: MovementReference;
  referenceLocalId?: number;
  notes?: string;
  createdAt: string;
}

/**
 * SyncMeta: pull cursors per entity type
 */
export interface SyncMeta {
  key: string;              // "lastPullAt:customers", ...
  value: string;            // ISO timestamp
}

// ─── Ledger Tables ───────────────────────────────────────

export interface LedgerRowMap {
  customers: LocalCustomer;
  inventoryItems: LocalInventoryItem;
  transactions: LocalTransaction;
  payments: LocalPayment;
  millingRecords: LocalMillingRecord;
}

/** Tables whose rows carry offline metadata. */
export type LedgerTable = keyof LedgerRowMap;

// ─── Database Definition ─────────────────────────────────

export type LedgerDatabaseOptions = ConstructorParameters<typeof Dexie>[1];

export class LedgerDatabase extends Dexie {
  customers!: Table<LocalCustomer, number, NewRow<LocalCustomer>>;
  inventoryItems!: Table<LocalInventoryItem, number, NewRow<LocalInventoryItem>>;
  transactions!: Table<LocalTransaction, number, NewRow<LocalTransaction>>;
  transactionItems!: Table<LocalTransactionItem, number, NewRow<LocalTransactionItem>>;
  payments!: Table<LocalPayment, number, NewRow<LocalPayment>>;
  millingRecords!: Table<LocalMillingRecord, number, NewRow<LocalMillingRecord>>;
  stockMovements!: Table<StockMovement, number, NewRow<StockMovement>>;
  mutations!: Table<MutationRecord, number, NewMutationRecord>;
  syncMeta!: Table<SyncMeta, string>;

  constructor(name: string, options?: LedgerDatabaseOptions) {
    super(name, options);

    this.version(1).stores({
      customers: '++localId, _serverId, phone, _syncStatus, updatedAt',
      inventoryItems: '++localId, _serverId, type, _syncStatus, updatedAt',
      transactions: '++localId, _serverId, transactionNumber, customerLocalId, _syncStatus, updatedAt',
      transactionItems: '++localId, transactionLocalId, inventoryItemLocalId',
      payments: '++localId, _serverId, transactionLocalId, _syncStatus, updatedAt',
      millingRecords: '++localId, _serverId, _syncStatus, updatedAt',
      stockMovements: '++localId, inventoryItemLocalId, [referenceType+referenceLocalId]',
      mutations: '++seq, &id, status, [entityType+entityId], createdAt',
      syncMeta: 'key',
    });
  }

  ledger<K extends LedgerTable>(table: K): Table<LedgerRowMap[K], number, NewRow<LedgerRowMap[K]>> {
    return this.table(table);
  }

  /** Any ledger table, viewed through its offline metadata only. */
  syncMetadata(table: LedgerTable): Table<SyncMetadata, number> {
    return this.table(table);
  }
}

export function openLedgerDatabase(name: string, options?: LedgerDatabaseOptions): LedgerDatabase {
  return new LedgerDatabase(name, options);
}

// ─── Singleton ───────────────────────────────────────────

let dbInstance: LedgerDatabase | null = null;

export function getLocalDB(name = process.env.LOCAL_DB_NAME || 'mill-ledger'): LedgerDatabase {
  if (!dbInstance) {
    dbInstance = new LedgerDatabase(name);
  }
  return dbInstance;
}

/**
 * Clear all local data (logout or company switch)
 */
export async function clearLocalDB(db: LedgerDatabase = getLocalDB()): Promise<void> {
  await db.transaction('rw', db.tables, async () => {
    await Promise.all(db.tables.map((table) => table.clear()));
  });
}

// ─── Ledger Queries ──────────────────────────────────────

/** Rows that have local changes the remote has not confirmed. */
export async function getUnsyncedEntities<K extends LedgerTable>(
  db: LedgerDatabase,
  table: K
): Promise<LedgerRowMap[K][]> {
  return db
    .ledger(table)
    .where('_syncStatus')
    .anyOf(['pending', 'syncing', 'failed', 'conflict'])
    .sortBy('localId');
}

export async function getEntitiesUpdatedAfter<K extends LedgerTable>(
  db: LedgerDatabase,
  table: K,
  iso: string
): Promise<LedgerRowMap[K][]> {
  return db.ledger(table).where('updatedAt').above(iso).sortBy('updatedAt');
}

export async function findByServerId<K extends LedgerTable>(
  db: LedgerDatabase,
  table: K,
  serverId: string
): Promise<LedgerRowMap[K] | undefined> {
  return db.ledger(table).where('_serverId').equals(serverId).first();
}

export default LedgerDatabase;
