/**
 * RECONCILIATION: Server-confirmed values back into the ledger
 *
 * The sync engine's only write authority over ledger rows:
 *   - fill _serverId (never replace one that is already set)
 *   - flip _syncStatus
 *   - take whitelisted canonical fields from the response
 * Stock levels are never taken from a push response; they only move
 * through stock movements.
 */

import { z } from 'zod';
import { syncLogger as log } from '@/lib/logger';
import type { LedgerTx } from './context';
import { getUnsyncedEntities, type LocalTransaction } from './db';
import {
  markConflict,
  markSynced,
  type EntityType,
  type MutationRecord,
} from './mutation-record';
import {
  customerSnapshot,
  inventoryItemSnapshot,
  millingSnapshot,
  paymentSnapshot,
  transactionSnapshot,
  type MutationPayload,
} from './payloads';
import {
  enqueueMutation,
  getOutstandingForEntity,
  refreshEntitySyncStatus,
  saveMutation,
} from './sync-queue';

// ─── Response Parsing ────────────────────────────────────

export const serverIdSchema = z.union([z.string().min(1), z.number()]).transform(String);

/** Decimals arrive as strings. */
export const decimalSchema = z.union([
  z.number(),
  z
    .string()
    .regex(/^-?\d+(\.\d+)?$/)
    .transform(Number),
]);

const serverRecordSchema = z.object({ id: serverIdSchema }).passthrough();

const RESPONSE_KEYS: Record<EntityType, string> = {
  customer: 'customer',
  inventory: 'item',
  transaction: 'transaction',
  payment: 'payment',
  milling: 'milling',
  user: 'user',
};

/** The created row, either bare or wrapped under its entity name. */
export function extractServerRecord(
  data: unknown,
  entityType: EntityType
): z.output<typeof serverRecordSchema> | null {
  const direct = serverRecordSchema.safeParse(data);
  if (direct.success) return direct.data;

  const wrapped = z.record(z.unknown()).safeParse(data);
  if (!wrapped.success) return null;
  const nested = serverRecordSchema.safeParse(wrapped.data[RESPONSE_KEYS[entityType]]);
  return nested.success ? nested.data : null;
}

const customerCanonicalSchema = z.object({
  name: z.string().min(1).optional(),
  phone: z.string().min(1).optional(),
  address: z.string().nullish(),
});

const inventoryCanonicalSchema = z.object({
  variety: z.string().min(1).optional(),
});

const transactionCanonicalSchema = z.object({
  transactionNumber: z.string().min(1).optional(),
  totalAmount: decimalSchema.optional(),
  items: z.array(z.object({ id: serverIdSchema })).optional(),
});

// ─── Success ─────────────────────────────────────────────

export type CommitOutcome = 'synced' | 'conflict';

/**
 * Apply a confirmed record: merge the response, mark the record Synced
 * and refresh the entity. A Delete that reaches Synced removes the row.
 * A Create the remote answered without an id cannot be reconciled and
 * becomes a conflict.
 */
export async function commitSuccess(
  tx: LedgerTx,
  record: MutationRecord,
  payload: MutationPayload,
  data: unknown,
  serverIdHint: string | null = null
): Promise<CommitOutcome> {
  const server = extractServerRecord(data, record.entityType);
  const serverId = await mergeIntoLedger(tx, record, server, serverIdHint);

  if (record.operation === 'create' && serverId === null && payload.kind !== 'stockMovement') {
    const conflicted = markConflict(record, 'Remote accepted the create but returned no id', tx.now);
    await saveMutation(tx.db, conflicted);
    await refreshEntitySyncStatus(tx.db, record.entityType, record.entityId, tx.now);
    return 'conflict';
  }

  await saveMutation(tx.db, markSynced(record, tx.now, serverId));

  if (record.operation === 'delete') {
    await removeConfirmedDelete(tx, record);
  } else {
    await refreshEntitySyncStatus(tx.db, record.entityType, record.entityId, tx.now);
  }
  return 'synced';
}

/** Returns the entity's serverId after the merge. */
async function mergeIntoLedger(
  tx: LedgerTx,
  record: MutationRecord,
  server: z.output<typeof serverRecordSchema> | null,
  serverIdHint: string | null
): Promise<string | null> {
  const incomingId = record.operation === 'create' ? (server?.id ?? serverIdHint) : null;
  const nowIso = tx.now.toISOString();

  switch (record.entityType) {
    case 'customer': {
      const row = await tx.db.customers.get(record.entityId);
      if (!row) return record.entityServerId;
      const canonical = customerCanonicalSchema.safeParse(server ?? {});
      const fields = canonical.success ? canonical.data : {};
      await tx.db.customers.put({
        ...row,
        _serverId: row._serverId ?? incomingId ?? undefined,
        name: fields.name ?? row.name,
        phone: fields.phone ? fields.phone.replace(/\D/g, '') : row.phone,
        address: fields.address === undefined ? row.address : (fields.address ?? undefined),
        _lastSyncedAt: nowIso,
      });
      return row._serverId ?? incomingId;
    }

    case 'inventory': {
      const row = await tx.db.inventoryItems.get(record.entityId);
      if (!row) return record.entityServerId;
      const canonical = inventoryCanonicalSchema.safeParse(server ?? {});
      const fields = canonical.success ? canonical.data : {};
      await tx.db.inventoryItems.put({
        ...row,
        _serverId: row._serverId ?? incomingId ?? undefined,
        variety: fields.variety ?? row.variety,
        _lastSyncedAt: nowIso,
      });
      return row._serverId ?? incomingId;
    }

    case 'transaction': {
      const row = await tx.db.transactions.get(record.entityId);
      if (!row) return record.entityServerId;
      const canonical = transactionCanonicalSchema.safeParse(server ?? {});
      const fields = canonical.success ? canonical.data : {};
      const merged: LocalTransaction = {
        ...row,
        _serverId: row._serverId ?? incomingId ?? undefined,
        transactionNumber: fields.transactionNumber ?? row.transactionNumber,
        _lastSyncedAt: nowIso,
      };
      if (fields.totalAmount !== undefined && fields.totalAmount !== row.totalAmount) {
        merged.totalAmount = fields.totalAmount;
        merged.dueAmount = Math.round((fields.totalAmount - row.paidAmount) * 100) / 100;
      }
      await tx.db.transactions.put(merged);

      if (fields.items && record.operation === 'create') {
        const lines = await tx.db.transactionItems.where('transactionLocalId').equals(row.localId).sortBy('localId');
        for (const [index, line] of lines.entries()) {
          const remoteLine = fields.items[index];
          if (remoteLine && !line._serverId) {
            await tx.db.transactionItems.put({ ...line, _serverId: remoteLine.id });
          }
        }
      }
      return merged._serverId ?? null;
    }

    case 'payment': {
      const row = await tx.db.payments.get(record.entityId);
      if (!row) return record.entityServerId;
      await tx.db.payments.put({ ...row, _serverId: row._serverId ?? incomingId ?? undefined, _lastSyncedAt: nowIso });
      return row._serverId ?? incomingId;
    }

    case 'milling': {
      const row = await tx.db.millingRecords.get(record.entityId);
      if (!row) return record.entityServerId;
      await tx.db.millingRecords.put({ ...row, _serverId: row._serverId ?? incomingId ?? undefined, _lastSyncedAt: nowIso });
      return row._serverId ?? incomingId;
    }

    case 'user':
      return record.entityServerId ?? incomingId;
  }
}

async function removeConfirmedDelete(tx: LedgerTx, record: MutationRecord): Promise<void> {
  const outstanding = await getOutstandingForEntity(tx.db, record.entityType, record.entityId);
  if (outstanding.length > 0) {
    await refreshEntitySyncStatus(tx.db, record.entityType, record.entityId, tx.now);
    return;
  }

  if (record.entityType === 'customer') await tx.db.customers.delete(record.entityId);
  if (record.entityType === 'inventory') await tx.db.inventoryItems.delete(record.entityId);
  log.debug({ entityType: record.entityType, entityId: record.entityId }, 'Deleted entity removed locally');
}

// ─── Self-Healing ────────────────────────────────────────

async function hasOutstanding(tx: LedgerTx, entityType: EntityType, entityId: number): Promise<boolean> {
  return (await getOutstandingForEntity(tx.db, entityType, entityId)).length > 0;
}

/**
 * Enqueue a snapshot for every unsynced entity that has no outstanding
 * record (an enqueue lost to a crash or an older client). Returns how
 * many entities were repaired.
 */
export async function healMissingMutations(tx: LedgerTx): Promise<number> {
  let healed = 0;

  for (const customer of await getUnsyncedEntities(tx.db, 'customers')) {
    if (await hasOutstanding(tx, 'customer', customer.localId)) continue;
    healed++;
    if (customer._isDeleted && !customer._serverId) {
      // Never reached the remote; nothing to replay.
      await tx.db.customers.delete(customer.localId);
      continue;
    }
    await enqueueMutation(tx, {
      entityType: 'customer',
      entityId: customer.localId,
      operation: customer._isDeleted ? 'delete' : customer._serverId ? 'update' : 'create',
      entityServerId: customer._serverId ?? null,
      payload: customerSnapshot(customer),
    });
  }

  for (const item of await getUnsyncedEntities(tx.db, 'inventoryItems')) {
    if (await hasOutstanding(tx, 'inventory', item.localId)) continue;
    healed++;
    if (item._isDeleted && !item._serverId) {
      await tx.db.inventoryItems.delete(item.localId);
      continue;
    }
    await enqueueMutation(tx, {
      entityType: 'inventory',
      entityId: item.localId,
      operation: item._isDeleted ? 'delete' : item._serverId ? 'update' : 'create',
      entityServerId: item._serverId ?? null,
      payload: inventoryItemSnapshot(item),
    });
  }

  for (const transaction of await getUnsyncedEntities(tx.db, 'transactions')) {
    if (await hasOutstanding(tx, 'transaction', transaction.localId)) continue;
    healed++;
    if (!transaction._serverId) {
      const lines = await tx.db.transactionItems
        .where('transactionLocalId')
        .equals(transaction.localId)
        .sortBy('localId');
      await enqueueMutation(tx, {
        entityType: 'transaction',
        entityId: transaction.localId,
        operation: 'create',
        payload: transactionSnapshot(transaction, lines),
      });
    }
    if (transaction.status === 'cancelled') {
      await enqueueMutation(tx, {
        entityType: 'transaction',
        entityId: transaction.localId,
        operation: 'update',
        priority: 'high',
        entityServerId: transaction._serverId ?? null,
        payload: { kind: 'transactionCancel', reason: transaction.cancelReason ?? '' },
      });
    } else if (transaction._serverId) {
      await refreshEntitySyncStatus(tx.db, 'transaction', transaction.localId, tx.now);
    }
  }

  for (const payment of await getUnsyncedEntities(tx.db, 'payments')) {
    if (await hasOutstanding(tx, 'payment', payment.localId)) continue;
    healed++;
    if (payment._serverId) {
      await refreshEntitySyncStatus(tx.db, 'payment', payment.localId, tx.now);
      continue;
    }
    await enqueueMutation(tx, {
      entityType: 'payment',
      entityId: payment.localId,
      operation: 'create',
      payload: paymentSnapshot(payment),
    });
  }

  for (const milling of await getUnsyncedEntities(tx.db, 'millingRecords')) {
    if (await hasOutstanding(tx, 'milling', milling.localId)) continue;
    healed++;
    if (milling._serverId) {
      await refreshEntitySyncStatus(tx.db, 'milling', milling.localId, tx.now);
      continue;
    }
    await enqueueMutation(tx, {
      entityType: 'milling',
      entityId: milling.localId,
      operation: 'create',
      payload: millingSnapshot(milling),
    });
  }

  if (healed > 0) log.warn({ healed }, 'Re-enqueued entities missing from the queue');
  return healed;
}
