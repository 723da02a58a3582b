/**
 * OFFLINE MODULE: Public API
 *
 * Import everything from here:
 *   import { createSyncApi, getLocalDB, ... } from '@/lib/offline';
 */

// Sync API
export { createSyncApi } from './api';
export type { SyncApi, SyncApiOptions, SyncIssue } from './api';

// Database
export {
  getLocalDB,
  openLedgerDatabase,
  clearLocalDB,
  isSynced,
  getUnsyncedEntities,
  getEntitiesUpdatedAfter,
  LedgerDatabase,
} from './db';
export type {
  LedgerDatabaseOptions,
  LocalCustomer,
  LocalInventoryItem,
  LocalTransaction,
  LocalTransactionItem,
  LocalPayment,
  LocalMillingRecord,
  StockMovement,
  SyncStatus,
} from './db';

// Identity and time
export { systemClock, uuidAllocator, sequenceAllocator } from './ids';
export type { Clock, IdAllocator } from './ids';

// Mutation records
export { computeBackoffMinutes, MUTATION_STATUS_TRANSITIONS } from './mutation-record';
export type { EntityType, MutationStatus, Operation, Priority } from './mutation-record';

// Sync Queue
export { getPendingSyncCount, getMutationCounts, purgeSyncedMutations } from './sync-queue';

// Read queries
export {
  searchCustomers,
  getCustomerTransactions,
  getLowStockItems,
  getStockMovementHistory,
  getInventorySummary,
  isLowStock,
} from './queries';
export type { InventorySummary, StockTotals } from './queries';

// Conflict resolution
export { resolveConflict, CONFLICT_STRATEGIES } from './conflicts';
export type { ConflictStrategy } from './conflicts';

// Stock ledger
export { verifyStockLedger, calculateNewAveragePrice } from './stock-ledger';

// Remote
export { HttpRemoteApi } from './http-remote';
export { classifyRemoteResult, API_ENDPOINTS } from './remote';
export type { RemoteApi, RemoteResponse, RemoteResult } from './remote';

// Sync Engine
export { SyncEngine, alwaysOnline } from './sync-engine';
export type { ConnectionStatus, Connectivity, SyncPassResult, SyncState } from './sync-engine';

// Offline Actions (Optimistic UI)
export {
  createCustomer,
  updateCustomer,
  deleteCustomer,
  createInventoryItem,
  updateInventoryItem,
  deleteInventoryItem,
  adjustStock,
  createBuyTransaction,
  createSellTransaction,
  cancelTransaction,
  addPayment,
  recordMilling,
} from './actions';
export type {
  CreateCustomerInput,
  CreateInventoryItemInput,
  CreateTransactionInput,
  AddPaymentInput,
  RecordMillingInput,
  TransactionView,
  PaymentView,
  MillingView,
} from './actions';
