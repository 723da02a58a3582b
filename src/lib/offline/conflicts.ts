/**
 * CONFLICT RESOLUTION
 *
 * A record the remote rejected stays in Conflict until someone picks a side:
 *
 *   keep_local   resend, with the entity's current state as the payload
 *   keep_server  drop the local change and take the remote's copy; an
 *                entity the remote never accepted is removed locally
 *
 * Taking the server copy is limited to customers and inventory items,
 * the entities the remote serves one at a time.
 */

import {
  NotFoundFailure,
  ValidationFailure,
  err,
  isFailure,
  ok,
  toFailure,
  type Failure,
  type Result,
} from '@/lib/errors';
import { queueLogger as log } from '@/lib/logger';
import { withLedgerTransaction, type LedgerTx, type OfflineDeps } from './context';
import type { LedgerDatabase } from './db';
import { resetForRetry as resetRecord, type MutationRecord } from './mutation-record';
import { customerSnapshot, inventoryItemSnapshot, serializePayload } from './payloads';
import { applyServerCopy, type ServerCopyEntity } from './pull';
import { extractServerRecord } from './reconcile';
import { API_ENDPOINTS, type RemoteApi } from './remote';
import { findMutation, getOutstandingForEntity, refreshEntitySyncStatus, saveMutation } from './sync-queue';

export const CONFLICT_STRATEGIES = ['keep_local', 'keep_server'] as const;
export type ConflictStrategy = (typeof CONFLICT_STRATEGIES)[number];

async function loadConflict(db: LedgerDatabase, recordId: string): Promise<MutationRecord> {
  const record = await findMutation(db, recordId);
  if (!record) throw new NotFoundFailure('Mutation record', recordId);
  if (record.status !== 'conflict') {
    throw new ValidationFailure(`Record ${recordId} is ${record.status}, not conflict`, { field: 'status' });
  }
  return record;
}

/** Whole-entity payloads are rebuilt from the row; deltas and documents resend as recorded. */
async function currentPayloadJson(tx: LedgerTx, record: MutationRecord): Promise<string> {
  if (record.payloadKind === 'customer') {
    const customer = await tx.db.customers.get(record.entityId);
    return customer ? serializePayload(customerSnapshot(customer)) : record.payloadJson;
  }
  if (record.payloadKind === 'inventoryItem') {
    const item = await tx.db.inventoryItems.get(record.entityId);
    return item ? serializePayload(inventoryItemSnapshot(item)) : record.payloadJson;
  }
  return record.payloadJson;
}

async function keepLocal(tx: LedgerTx, recordId: string): Promise<void> {
  const record = await loadConflict(tx.db, recordId);
  const resent: MutationRecord = { ...resetRecord(record, tx.now), payloadJson: await currentPayloadJson(tx, record) };
  await saveMutation(tx.db, resent);
  await refreshEntitySyncStatus(tx.db, resent.entityType, resent.entityId, tx.now);

  tx.afterCommit(() =>
    tx.bus.publish('mutation:enqueued', {
      recordId: resent.id,
      entityType: resent.entityType,
      entityId: resent.entityId,
      operation: resent.operation,
    })
  );
  log.info({ recordId, entityType: resent.entityType, entityId: resent.entityId }, 'Conflict resolved: keep local');
}

function serverCopyEntity(record: MutationRecord): ServerCopyEntity {
  if (record.entityType === 'customer' || record.entityType === 'inventory') return record.entityType;
  throw new ValidationFailure('Only customers and inventory items can take the server copy', { field: 'entityType' });
}

/** Other unconfirmed changes would be lost or double-applied under the server copy. */
async function assertOnlyOutstanding(tx: LedgerTx, record: MutationRecord): Promise<void> {
  const others = (await getOutstandingForEntity(tx.db, record.entityType, record.entityId)).filter(
    (other) => other.id !== record.id
  );
  if (others.length > 0) {
    throw new ValidationFailure(`${record.entityType} ${record.entityId} has other unsynced changes`, {
      field: 'entityId',
    });
  }
}

/** The entity never reached the remote: remove it with every record it queued. */
async function discardLocalEntity(tx: LedgerTx, record: MutationRecord, entityType: ServerCopyEntity): Promise<void> {
  if (entityType === 'customer') {
    const used = await tx.db.transactions.where('customerLocalId').equals(record.entityId).count();
    if (used > 0) {
      throw new ValidationFailure('Customer has transactions; keep the local copy instead', { field: 'entityId' });
    }
    await tx.db.customers.delete(record.entityId);
  } else {
    const lines = await tx.db.transactionItems.where('inventoryItemLocalId').equals(record.entityId).count();
    const millings = await tx.db.millingRecords
      .filter((milling) => milling.paddyItemLocalId === record.entityId || milling.riceItemLocalId === record.entityId)
      .count();
    if (lines + millings > 0) {
      throw new ValidationFailure('Inventory item has transactions or milling; keep the local copy instead', {
        field: 'entityId',
      });
    }
    await tx.db.stockMovements.where('inventoryItemLocalId').equals(record.entityId).delete();
    await tx.db.inventoryItems.delete(record.entityId);
  }
  await tx.db.mutations.where('[entityType+entityId]').equals([record.entityType, record.entityId]).delete();
}

async function keepServer(deps: OfflineDeps, remote: RemoteApi, recordId: string): Promise<void> {
  const record = await loadConflict(deps.db, recordId);
  const entityType = serverCopyEntity(record);
  const entity =
    entityType === 'customer'
      ? await deps.db.customers.get(record.entityId)
      : await deps.db.inventoryItems.get(record.entityId);
  const serverId = entity?._serverId ?? null;

  // Fetched before the unit of work: no network inside an open transaction.
  let serverRow: unknown = null;
  if (serverId) {
    const path = entityType === 'customer' ? API_ENDPOINTS.customer(serverId) : API_ENDPOINTS.inventoryItem(serverId);
    const fetched = await remote.get(path);
    if (!fetched.ok) throw fetched.error;
    serverRow = extractServerRecord(fetched.value.data, entityType);
    if (!serverRow) throw new ValidationFailure('Remote returned no usable row', { field: 'data' });
  }

  await withLedgerTransaction(deps, async (tx) => {
    const current = await loadConflict(tx.db, recordId);
    if (!serverId) {
      await discardLocalEntity(tx, current, entityType);
      return;
    }

    await assertOnlyOutstanding(tx, current);
    await tx.db.mutations.delete(current.seq);
    if (!(await applyServerCopy(tx, entityType, serverRow))) {
      throw new ValidationFailure('Remote row could not be applied', { field: 'data' });
    }
    await refreshEntitySyncStatus(tx.db, current.entityType, current.entityId, tx.now);
  });
  log.info(
    { recordId, entityType: record.entityType, entityId: record.entityId, discarded: !serverId },
    'Conflict resolved: keep server'
  );
}

export async function resolveConflict(
  deps: OfflineDeps,
  remote: RemoteApi,
  recordId: string,
  strategy: ConflictStrategy
): Promise<Result<void, Failure>> {
  try {
    if (strategy === 'keep_local') {
      await withLedgerTransaction(deps, (tx) => keepLocal(tx, recordId));
    } else {
      await keepServer(deps, remote, recordId);
    }
    return ok(undefined);
  } catch (error) {
    if (isFailure(error)) return err(error);
    log.error({ err: error, recordId, strategy }, 'Conflict resolution failed');
    return err(toFailure(error));
  }
}
