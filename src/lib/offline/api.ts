/**
 * Sync API: what the UI and domain layer call.
 *
 * Wires the ledger database, the remote and the sync engine together and
 * exposes domain operations plus sync controls. Success payloads are
 * ledger views; mutation records never leave this module.
 */

import { loadConfig, type AppConfig } from '@/config/env';
import { ok, type Failure, type NotFoundFailure, type Result, type ValidationFailure } from '@/lib/errors';
import { eventBus, type OfflineEventBus } from '@/lib/realtime';
import {
  addPayment,
  adjustStock,
  cancelTransaction,
  createBuyTransaction,
  createCustomer,
  createInventoryItem,
  createSellTransaction,
  deleteCustomer,
  deleteInventoryItem,
  recordMilling,
  updateCustomer,
  updateInventoryItem,
  type AddPaymentInput,
  type AdjustStockInput,
  type CreateCustomerInput,
  type CreateInventoryItemInput,
  type CreateTransactionInput,
  type MillingView,
  type PaymentView,
  type RecordMillingInput,
  type TransactionView,
  type UpdateCustomerInput,
  type UpdateInventoryItemInput,
} from './actions';
import { resolveConflict, type ConflictStrategy } from './conflicts';
import { withLedgerTransaction, type OfflineDeps } from './context';
import {
  getLocalDB,
  openLedgerDatabase,
  type LedgerDatabase,
  type LedgerDatabaseOptions,
  type LocalCustomer,
  type LocalInventoryItem,
  type StockMovement,
} from './db';
import { HttpRemoteApi, type AuthTokenProvider } from './http-remote';
import { systemClock, uuidAllocator, type Clock, type IdAllocator } from './ids';
import type { EntityType, Operation } from './mutation-record';
import {
  getCustomerTransactions,
  getInventorySummary,
  getLowStockItems,
  getStockMovementHistory,
  searchCustomers,
  type InventorySummary,
} from './queries';
import type { RemoteApi } from './remote';
import { SyncEngine, type Connectivity, type SyncPassResult, type SyncState } from './sync-engine';
import { getMutationsByStatus, getPendingSyncCount, resetForRetry } from './sync-queue';

export interface SyncApiOptions {
  config?: AppConfig;
  db?: LedgerDatabase;
  /**
   * Dexie options for the database opened when `db` is not given. Outside
   * a browser there is no global IndexedDB: pass `{ indexedDB, IDBKeyRange }`.
   */
  dbOptions?: LedgerDatabaseOptions;
  remote?: RemoteApi;
  clock?: Clock;
  ids?: IdAllocator;
  bus?: OfflineEventBus;
  connectivity?: Connectivity;
  /** Used by the default HTTP remote only. */
  getAuthToken?: AuthTokenProvider;
}

/** A record that needs a person: retry budget spent, or rejected by the remote. */
export interface SyncIssue {
  recordId: string;
  entityType: EntityType;
  entityId: number;
  operation: Operation;
  status: 'failed' | 'conflict';
  message: string | null;
  retryCount: number;
  lastAttemptAt: string | null;
  createdAt: string;
}

export interface SyncApi {
  createCustomer(input: CreateCustomerInput): Promise<Result<LocalCustomer>>;
  updateCustomer(localId: number, changes: UpdateCustomerInput): Promise<Result<LocalCustomer>>;
  deleteCustomer(localId: number): Promise<Result<LocalCustomer>>;
  createInventoryItem(input: CreateInventoryItemInput): Promise<Result<LocalInventoryItem>>;
  updateInventoryItem(localId: number, changes: UpdateInventoryItemInput): Promise<Result<LocalInventoryItem>>;
  deleteInventoryItem(localId: number): Promise<Result<LocalInventoryItem>>;
  adjustStock(localId: number, input: AdjustStockInput): Promise<Result<LocalInventoryItem>>;
  createBuyTransaction(input: CreateTransactionInput): Promise<Result<TransactionView>>;
  createSellTransaction(input: CreateTransactionInput): Promise<Result<TransactionView>>;
  cancelTransaction(localId: number, reason: string): Promise<Result<TransactionView>>;
  addPayment(transactionLocalId: number, input: AddPaymentInput): Promise<Result<PaymentView>>;
  recordMilling(input: RecordMillingInput): Promise<Result<MillingView>>;

  searchCustomers(query: string): Promise<LocalCustomer[]>;
  getCustomerTransactions(customerLocalId: number): Promise<TransactionView[]>;
  getLowStockItems(): Promise<LocalInventoryItem[]>;
  getStockMovementHistory(inventoryItemLocalId: number): Promise<StockMovement[]>;
  getInventorySummary(): Promise<InventorySummary>;

  syncNow(): Promise<SyncPassResult>;
  getPendingSyncCount(): Promise<number>;
  getSyncIssues(): Promise<SyncIssue[]>;
  resetForRetry(recordId: string): Promise<Result<void, NotFoundFailure | ValidationFailure>>;
  resolveConflict(recordId: string, strategy: ConflictStrategy): Promise<Result<void, Failure>>;
  getSyncState(): SyncState;
  onSyncStateChange(listener: (state: SyncState) => void): () => void;
  start(): void;
  stop(): void;
}

export function createSyncApi(options: SyncApiOptions = {}): SyncApi {
  const config = options.config ?? loadConfig();
  const db =
    options.db ??
    (options.dbOptions ? openLedgerDatabase(config.localDbName, options.dbOptions) : getLocalDB(config.localDbName));
  const remote =
    options.remote ??
    new HttpRemoteApi({
      baseUrl: config.apiBaseUrl,
      timeoutMs: config.remoteTimeoutMs,
      getAuthToken: options.getAuthToken,
    });

  const deps: OfflineDeps = {
    db,
    clock: options.clock ?? systemClock,
    ids: options.ids ?? uuidAllocator,
    bus: options.bus ?? eventBus,
    maxRetries: config.sync.maxRetries,
  };
  const engine = new SyncEngine({ ...deps, remote, config: config.sync, connectivity: options.connectivity });

  return {
    createCustomer: (input) => createCustomer(deps, input),
    updateCustomer: (localId, changes) => updateCustomer(deps, localId, changes),
    deleteCustomer: (localId) => deleteCustomer(deps, localId),
    createInventoryItem: (input) => createInventoryItem(deps, input),
    updateInventoryItem: (localId, changes) => updateInventoryItem(deps, localId, changes),
    deleteInventoryItem: (localId) => deleteInventoryItem(deps, localId),
    adjustStock: (localId, input) => adjustStock(deps, localId, input),
    createBuyTransaction: (input) => createBuyTransaction(deps, input),
    createSellTransaction: (input) => createSellTransaction(deps, input),
    cancelTransaction: (localId, reason) => cancelTransaction(deps, localId, reason),
    addPayment: (transactionLocalId, input) => addPayment(deps, transactionLocalId, input),
    recordMilling: (input) => recordMilling(deps, input),

    searchCustomers: (query) => searchCustomers(db, query),
    getCustomerTransactions: (customerLocalId) => getCustomerTransactions(db, customerLocalId),
    getLowStockItems: () => getLowStockItems(db),
    getStockMovementHistory: (inventoryItemLocalId) => getStockMovementHistory(db, inventoryItemLocalId),
    getInventorySummary: () => getInventorySummary(db),

    syncNow: () => engine.syncNow(),
    getPendingSyncCount: () => getPendingSyncCount(db),

    getSyncIssues: async () => {
      const records = [...(await getMutationsByStatus(db, 'failed')), ...(await getMutationsByStatus(db, 'conflict'))];
      return records
        .sort((a, b) => a.seq - b.seq)
        .map((record): SyncIssue => ({
          recordId: record.id,
          entityType: record.entityType,
          entityId: record.entityId,
          operation: record.operation,
          status: record.status === 'failed' ? 'failed' : 'conflict',
          message: record.errorMessage,
          retryCount: record.retryCount,
          lastAttemptAt: record.lastAttemptAt,
          createdAt: record.createdAt,
        }));
    },

    resetForRetry: async (recordId) => {
      const result = await withLedgerTransaction(deps, (tx) => resetForRetry(tx, recordId));
      return result.ok ? ok(undefined) : result;
    },
    resolveConflict: (recordId, strategy) => resolveConflict(deps, remote, recordId, strategy),

    getSyncState: () => engine.getState(),
    onSyncStateChange: (listener) => engine.onStateChange(listener),
    start: () => engine.start(),
    stop: () => engine.stop(),
  };
}
