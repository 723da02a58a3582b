/**
 * PULL: Remote changes into the ledger
 *
 * Runs after the push half of a pass, per collection, from the cursor
 * kept in syncMeta. Last-writer-wins on updatedAt, except that an entity
 * with outstanding local records always keeps its local state.
 * Inventory quantities only move through remote_reconcile movements so
 * the stock ledger stays exact.
 */

import { z } from 'zod';
import { AuthFailure, errorMessage } from '@/lib/errors';
import { syncLogger as log } from '@/lib/logger';
import { withLedgerTransaction, type LedgerTx, type OfflineDeps } from './context';
import {
  CUSTOMER_TYPES,
  ITEM_TYPES,
  PAYMENT_METHODS,
  TRANSACTION_TYPES,
  findByServerId,
  type LedgerDatabase,
  type LocalInventoryItem,
  type LocalTransactionItem,
} from './db';
import type { EntityType, MutationStatus } from './mutation-record';
import { API_ENDPOINTS, withSince, type RemoteApi } from './remote';
import { decimalSchema, serverIdSchema } from './reconcile';
import { applyStockMovement, roundQuantity } from './stock-ledger';
import { getOutstandingForEntity } from './sync-queue';

// ─── Remote Rows ─────────────────────────────────────────

const remoteCustomerSchema = z.object({
  id: serverIdSchema,
  name: z.string().min(1),
  phone: z.string(),
  address: z.string().nullish(),
  type: z.enum(CUSTOMER_TYPES).catch('other'),
  balance: decimalSchema.default(0),
  totalPurchases: decimalSchema.default(0),
  totalSales: decimalSchema.default(0),
  isDeleted: z.boolean().default(false),
  createdAt: z.string().optional(),
  updatedAt: z.string(),
});

/** Stock can never be negative locally, so such a level is a malformed row. */
const stockLevelSchema = decimalSchema.pipe(z.number().finite().min(0));

const remoteInventoryItemSchema = z.object({
  id: serverIdSchema,
  type: z.enum(ITEM_TYPES),
  variety: z.string().min(1),
  currentQuantity: stockLevelSchema,
  currentBags: stockLevelSchema.default(0),
  averagePricePerKg: stockLevelSchema.default(0),
  minQuantity: stockLevelSchema.default(0),
  isDeleted: z.boolean().default(false),
  createdAt: z.string().optional(),
  updatedAt: z.string(),
});

const remoteTransactionLineSchema = z.object({
  id: serverIdSchema.optional(),
  inventoryItemId: serverIdSchema,
  itemType: z.enum(ITEM_TYPES),
  variety: z.string(),
  bags: decimalSchema.default(0),
  quantity: decimalSchema,
  pricePerKg: decimalSchema,
  totalAmount: decimalSchema,
});

const remoteTransactionSchema = z.object({
  id: serverIdSchema,
  transactionNumber: z.string(),
  type: z.enum(TRANSACTION_TYPES),
  status: z.enum(['completed', 'cancelled']).catch('completed'),
  customerId: serverIdSchema,
  customerName: z.string(),
  subtotal: decimalSchema,
  discount: decimalSchema.default(0),
  totalAmount: decimalSchema,
  paidAmount: decimalSchema.default(0),
  dueAmount: decimalSchema.default(0),
  paymentStatus: z.enum(['pending', 'partial', 'completed', 'cancelled']).catch('pending'),
  paymentMethod: z.enum(PAYMENT_METHODS).nullish(),
  notes: z.string().nullish(),
  cancelReason: z.string().nullish(),
  transactionDate: z.string(),
  createdAt: z.string().optional(),
  updatedAt: z.string(),
  items: z.array(remoteTransactionLineSchema).default([]),
});

type RemoteCustomer = z.infer<typeof remoteCustomerSchema>;
type RemoteInventoryItem = z.infer<typeof remoteInventoryItemSchema>;
type RemoteTransaction = z.infer<typeof remoteTransactionSchema>;

/** Lists arrive bare, under `data`, or under the collection name. */
function unwrapList(data: unknown, key: string): unknown[] {
  if (Array.isArray(data)) return data;
  const wrapped = z.record(z.unknown()).safeParse(data);
  if (!wrapped.success) return [];
  const inner = wrapped.data[key] ?? wrapped.data.data;
  return Array.isArray(inner) ? inner : [];
}

function parseRows<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, rows: unknown[], collection: string): T[] {
  const parsed: T[] = [];
  for (const row of rows) {
    const result = schema.safeParse(row);
    if (result.success) {
      parsed.push(result.data);
    } else {
      log.warn({ collection, issues: result.error.issues.length }, 'Skipping malformed remote row');
    }
  }
  return parsed;
}

function isNewer(remoteIso: string, localIso: string): boolean {
  const remote = Date.parse(remoteIso);
  const local = Date.parse(localIso);
  if (Number.isNaN(remote)) return false;
  return Number.isNaN(local) || remote > local;
}

async function hasOutstanding(db: LedgerDatabase, entityType: EntityType, entityId: number): Promise<boolean> {
  return (await getOutstandingForEntity(db, entityType, entityId)).length > 0;
}

const OUTSTANDING: MutationStatus[] = ['pending', 'syncing', 'failed', 'conflict'];

/** Balances are server aggregates; only trust them once local documents are confirmed. */
async function documentsSettled(db: LedgerDatabase): Promise<boolean> {
  const open = await db.mutations
    .where('status')
    .anyOf(OUTSTANDING)
    .filter((record) => record.entityType === 'transaction' || record.entityType === 'payment')
    .count();
  return open === 0;
}

// ─── Merge ───────────────────────────────────────────────

/** `force` takes the remote row even over newer or unconfirmed local state. */
interface MergeOptions {
  force?: boolean;
}

async function mergeCustomer(
  tx: LedgerTx,
  remote: RemoteCustomer,
  takeBalance: boolean,
  { force = false }: MergeOptions = {}
): Promise<boolean> {
  const nowIso = tx.now.toISOString();
  const local = await findByServerId(tx.db, 'customers', remote.id);

  if (!local) {
    if (remote.isDeleted) return false;
    await tx.db.customers.add({
      _serverId: remote.id,
      _syncStatus: 'synced',
      _isDeleted: false,
      _lastSyncedAt: nowIso,
      name: remote.name,
      phone: remote.phone.replace(/\D/g, ''),
      address: remote.address ?? undefined,
      type: remote.type,
      balance: remote.balance,
      totalPurchases: remote.totalPurchases,
      totalSales: remote.totalSales,
      createdAt: remote.createdAt ?? remote.updatedAt,
      updatedAt: remote.updatedAt,
    });
    return true;
  }

  if (!force) {
    if (await hasOutstanding(tx.db, 'customer', local.localId)) return false;
    if (!isNewer(remote.updatedAt, local.updatedAt)) return false;
  }

  if (remote.isDeleted) {
    await tx.db.customers.delete(local.localId);
    return true;
  }

  await tx.db.customers.put({
    ...local,
    name: remote.name,
    phone: remote.phone.replace(/\D/g, ''),
    address: remote.address ?? undefined,
    type: remote.type,
    balance: takeBalance ? remote.balance : local.balance,
    totalPurchases: takeBalance ? remote.totalPurchases : local.totalPurchases,
    totalSales: takeBalance ? remote.totalSales : local.totalSales,
    _syncStatus: 'synced',
    _lastSyncedAt: nowIso,
    updatedAt: remote.updatedAt,
  });
  return true;
}

/** Move local stock to the remote level through the ledger. */
async function reconcileStock(tx: LedgerTx, item: LocalInventoryItem, remote: RemoteInventoryItem): Promise<LocalInventoryItem> {
  const quantityDelta = roundQuantity(remote.currentQuantity - item.currentQuantity);
  const bagsDelta = Math.round(remote.currentBags) - item.currentBags;
  if (quantityDelta === 0 && bagsDelta === 0) return item;

  const applied = await applyStockMovement(tx, item, {
    movementType: 'remote_reconcile',
    quantityDelta,
    bagsDelta,
    notes: `Remote level ${remote.currentQuantity} kg`,
  });
  return applied.item;
}

async function mergeInventoryItem(
  tx: LedgerTx,
  remote: RemoteInventoryItem,
  { force = false }: MergeOptions = {}
): Promise<boolean> {
  const nowIso = tx.now.toISOString();
  const local = await findByServerId(tx.db, 'inventoryItems', remote.id);

  if (!local) {
    if (remote.isDeleted) return false;
    const localId = await tx.db.inventoryItems.add({
      _serverId: remote.id,
      _syncStatus: 'synced',
      _isDeleted: false,
      _lastSyncedAt: nowIso,
      type: remote.type,
      variety: remote.variety,
      currentQuantity: 0,
      currentBags: 0,
      averagePricePerKg: 0,
      minQuantity: remote.minQuantity,
      createdAt: remote.createdAt ?? remote.updatedAt,
      updatedAt: remote.updatedAt,
    });
    const created = await tx.db.inventoryItems.get(localId);
    if (!created) return false;
    const stocked = await reconcileStock(tx, created, remote);
    await tx.db.inventoryItems.put({
      ...stocked,
      averagePricePerKg: remote.averagePricePerKg,
      updatedAt: remote.updatedAt,
    });
    return true;
  }

  if (!force) {
    if (await hasOutstanding(tx.db, 'inventory', local.localId)) return false;
    if (!isNewer(remote.updatedAt, local.updatedAt)) return false;
  }

  if (remote.isDeleted) {
    await tx.db.inventoryItems.delete(local.localId);
    return true;
  }

  const stocked = await reconcileStock(tx, local, remote);
  await tx.db.inventoryItems.put({
    ...stocked,
    variety: remote.variety,
    minQuantity: remote.minQuantity,
    averagePricePerKg: remote.averagePricePerKg,
    _syncStatus: 'synced',
    _lastSyncedAt: nowIso,
    updatedAt: remote.updatedAt,
  });
  return true;
}

async function mergeTransaction(tx: LedgerTx, remote: RemoteTransaction): Promise<boolean> {
  const nowIso = tx.now.toISOString();
  const local = await findByServerId(tx.db, 'transactions', remote.id);

  if (local) {
    if (await hasOutstanding(tx.db, 'transaction', local.localId)) return false;
    if (!isNewer(remote.updatedAt, local.updatedAt)) return false;
    await tx.db.transactions.put({
      ...local,
      transactionNumber: remote.transactionNumber,
      status: remote.status,
      totalAmount: remote.totalAmount,
      paidAmount: remote.paidAmount,
      dueAmount: remote.dueAmount,
      paymentStatus: remote.paymentStatus,
      notes: remote.notes ?? undefined,
      cancelReason: remote.cancelReason ?? undefined,
      _syncStatus: 'synced',
      _lastSyncedAt: nowIso,
      updatedAt: remote.updatedAt,
    });
    return true;
  }

  // Documents created elsewhere: their stock effect arrives with the
  // inventory pull, so only the document itself is stored.
  const customer = await findByServerId(tx.db, 'customers', remote.customerId);
  if (!customer) {
    log.debug({ transactionId: remote.id }, 'Skipping transaction for unknown customer');
    return false;
  }

  const lines: Array<Omit<LocalTransactionItem, 'localId' | 'transactionLocalId'>> = [];
  for (const line of remote.items) {
    const item = await findByServerId(tx.db, 'inventoryItems', line.inventoryItemId);
    if (!item) {
      log.debug({ transactionId: remote.id }, 'Skipping transaction for unknown inventory item');
      return false;
    }
    lines.push({
      _serverId: line.id,
      inventoryItemLocalId: item.localId,
      itemType: line.itemType,
      variety: line.variety,
      bags: Math.round(line.bags),
      quantity: line.quantity,
      pricePerKg: line.pricePerKg,
      totalAmount: line.totalAmount,
    });
  }

  const transactionLocalId = await tx.db.transactions.add({
    _serverId: remote.id,
    _syncStatus: 'synced',
    _isDeleted: false,
    _lastSyncedAt: nowIso,
    transactionNumber: remote.transactionNumber,
    type: remote.type,
    status: remote.status,
    customerLocalId: customer.localId,
    customerName: remote.customerName,
    subtotal: remote.subtotal,
    discount: remote.discount,
    totalAmount: remote.totalAmount,
    paidAmount: remote.paidAmount,
    dueAmount: remote.dueAmount,
    paymentStatus: remote.paymentStatus,
    paymentMethod: remote.paymentMethod ?? undefined,
    notes: remote.notes ?? undefined,
    cancelReason: remote.cancelReason ?? undefined,
    transactionDate: remote.transactionDate,
    createdAt: remote.createdAt ?? remote.updatedAt,
    updatedAt: remote.updatedAt,
  });
  await tx.db.transactionItems.bulkAdd(lines.map((line) => ({ ...line, transactionLocalId })));
  return true;
}

// ─── Server Copy ─────────────────────────────────────────

export type ServerCopyEntity = 'customer' | 'inventory';

/**
 * Overwrite one local entity with the remote's row, bypassing
 * last-writer-wins. Returns false when the row does not parse.
 */
export async function applyServerCopy(tx: LedgerTx, entityType: ServerCopyEntity, row: unknown): Promise<boolean> {
  if (entityType === 'customer') {
    const parsed = remoteCustomerSchema.safeParse(row);
    if (!parsed.success) return false;
    return mergeCustomer(tx, parsed.data, await documentsSettled(tx.db), { force: true });
  }
  const parsed = remoteInventoryItemSchema.safeParse(row);
  if (!parsed.success) return false;
  return mergeInventoryItem(tx, parsed.data, { force: true });
}

// ─── Pull Pass ───────────────────────────────────────────

export interface PullSummary {
  applied: number;
  authRequired: boolean;
}

interface Collection {
  table: 'customers' | 'inventoryItems' | 'transactions';
  endpoint: string;
  key: string;
  apply: (tx: LedgerTx, rows: unknown[]) => Promise<number>;
}

const COLLECTIONS: Collection[] = [
  {
    table: 'customers',
    endpoint: API_ENDPOINTS.customersUpdates,
    key: 'customers',
    apply: async (tx, rows) => {
      const takeBalance = await documentsSettled(tx.db);
      let applied = 0;
      for (const row of parseRows(remoteCustomerSchema, rows, 'customers')) {
        if (await mergeCustomer(tx, row, takeBalance)) applied++;
      }
      return applied;
    },
  },
  {
    table: 'inventoryItems',
    endpoint: API_ENDPOINTS.inventoryUpdates,
    key: 'items',
    apply: async (tx, rows) => {
      let applied = 0;
      for (const row of parseRows(remoteInventoryItemSchema, rows, 'inventory')) {
        if (await mergeInventoryItem(tx, row)) applied++;
      }
      return applied;
    },
  },
  {
    table: 'transactions',
    endpoint: API_ENDPOINTS.transactionsUpdates,
    key: 'transactions',
    apply: async (tx, rows) => {
      let applied = 0;
      for (const row of parseRows(remoteTransactionSchema, rows, 'transactions')) {
        if (await mergeTransaction(tx, row)) applied++;
      }
      return applied;
    },
  },
];

export function pullCursorKey(table: Collection['table']): string {
  return `lastPullAt:${table}`;
}

/**
 * Pull every collection in dependency order. A failed collection keeps
 * its cursor and is retried next pass; an auth failure stops the pull.
 */
export async function pullRemoteChanges(
  deps: OfflineDeps,
  remote: RemoteApi,
  signal?: AbortSignal
): Promise<PullSummary> {
  let applied = 0;

  for (const collection of COLLECTIONS) {
    if (signal?.aborted) break;

    const cursorKey = pullCursorKey(collection.table);
    const cursor = await deps.db.syncMeta.get(cursorKey);
    const startedAt = deps.clock().toISOString();

    const result = await remote.get(withSince(collection.endpoint, cursor?.value ?? null), { signal });
    if (!result.ok) {
      if (result.error instanceof AuthFailure) return { applied, authRequired: true };
      log.warn({ collection: collection.table, err: result.error.message }, 'Pull failed');
      continue;
    }

    const rows = unwrapList(result.value.data, collection.key);
    try {
      applied += await withLedgerTransaction(deps, async (tx) => {
        const count = await collection.apply(tx, rows);
        await tx.db.syncMeta.put({ key: cursorKey, value: startedAt });
        return count;
      });
    } catch (error) {
      log.warn({ collection: collection.table, err: errorMessage(error) }, 'Pulled rows could not be applied');
    }
  }

  if (applied > 0) log.info({ applied }, 'Remote changes applied');
  return { applied, authRequired: false };
}
