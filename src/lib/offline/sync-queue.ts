/**
 * SYNC QUEUE: Durable, ordered mutation records
 *
 * Every local write enqueues its record in the SAME transaction as the
 * ledger rows it describes, so a crash can never leave one without
 * the other.
 *
 * Ordering:
 *   priority desc → createdAt asc → seq asc
 *   and per entity strictly by seq: a record is eligible only when every
 *   earlier record for the same entity has been confirmed (or purged).
 */

import { NotFoundFailure, ValidationFailure, err, ok, type Result } from '@/lib/errors';
import { queueLogger as log } from '@/lib/logger';
import type { LedgerDatabase, SyncStatus } from './db';
import type { LedgerTx } from './context';
import {
  MUTATION_STATUSES,
  PRIORITY_RANK,
  entityKey,
  isOutstanding,
  isReadyForRetry,
  releaseInterrupted,
  resetForRetry as resetRecord,
  type EntityType,
  type MutationRecord,
  type MutationStatus,
  type NewMutationRecord,
  type Operation,
  type Priority,
} from './mutation-record';
import {
  COALESCIBLE_KINDS,
  ENTITY_TABLE,
  PAYLOAD_ENTITY_TYPE,
  serializePayload,
  type MutationPayload,
} from './payloads';

const OUTSTANDING: MutationStatus[] = ['pending', 'syncing', 'failed', 'conflict'];

// ─── Enqueue ─────────────────────────────────────────────

export interface EnqueueInput {
  entityType: EntityType;
  entityId: number;
  operation: Operation;
  payload: MutationPayload;
  priority?: Priority;
  entityServerId?: string | null;
}

/**
 * Add a record to the queue, or fold a whole-entity snapshot into the
 * entity's latest record when that record has never been attempted.
 * This is the ONLY way mutations should enter the system.
 */
export async function enqueueMutation(tx: LedgerTx, input: EnqueueInput): Promise<MutationRecord> {
  const expected = PAYLOAD_ENTITY_TYPE[input.payload.kind];
  if (expected !== input.entityType) {
    throw new ValidationFailure(
      `Payload "${input.payload.kind}" belongs to ${expected}, not ${input.entityType}`,
      { field: 'entityType' }
    );
  }

  const payloadJson = serializePayload(input.payload);
  const nowIso = tx.now.toISOString();

  const coalesced = isCoalescible(input) ? await coalesceIntoPending(tx.db, input, payloadJson, nowIso) : null;
  if (coalesced) {
    await refreshEntitySyncStatus(tx.db, input.entityType, input.entityId, tx.now);
    log.debug({ recordId: coalesced.id, entityType: input.entityType, entityId: input.entityId }, 'Coalesced into pending record');
    return coalesced;
  }

  const record: NewMutationRecord = {
    id: tx.ids.nextId(),
    entityType: input.entityType,
    entityId: input.entityId,
    entityServerId: input.entityServerId ?? null,
    operation: input.operation,
    payloadKind: input.payload.kind,
    payloadJson,
    status: 'pending',
    priority: input.priority ?? 'normal',
    retryCount: 0,
    maxRetries: tx.maxRetries,
    lastAttemptAt: null,
    nextRetryAt: null,
    errorMessage: null,
    syncedAt: null,
    createdAt: nowIso,
    updatedAt: nowIso,
  };

  const seq = await tx.db.mutations.add(record);
  await refreshEntitySyncStatus(tx.db, input.entityType, input.entityId, tx.now);

  tx.afterCommit(() =>
    tx.bus.publish('mutation:enqueued', {
      recordId: record.id,
      entityType: record.entityType,
      entityId: record.entityId,
      operation: record.operation,
    })
  );

  log.debug(
    { recordId: record.id, entityType: record.entityType, entityId: record.entityId, operation: record.operation },
    'Mutation enqueued'
  );
  return { ...record, seq };
}

function isCoalescible(input: EnqueueInput): boolean {
  return input.operation === 'update' && COALESCIBLE_KINDS.includes(input.payload.kind);
}

async function coalesceIntoPending(
  db: LedgerDatabase,
  input: EnqueueInput,
  payloadJson: string,
  nowIso: string
): Promise<MutationRecord | null> {
  const outstanding = await getOutstandingForEntity(db, input.entityType, input.entityId);
  const latest = outstanding[outstanding.length - 1];
  if (
    !latest ||
    latest.status !== 'pending' ||
    latest.lastAttemptAt !== null ||
    latest.operation === 'delete' ||
    latest.payloadKind !== input.payload.kind
  ) {
    return null;
  }

  const updated: MutationRecord = { ...latest, payloadJson, updatedAt: nowIso };
  await db.mutations.put(updated);
  return updated;
}

// ─── Selection ───────────────────────────────────────────

/**
 * Pick the next records to transmit.
 * `records` must contain every outstanding record, not only pending ones:
 * earlier syncing/failed/conflict records block their entity.
 */
export function selectEligible(
  records: readonly MutationRecord[],
  now: Date,
  limit: number,
  excludeIds: ReadonlySet<string> = new Set()
): MutationRecord[] {
  const head = new Map<string, number>();
  for (const record of records) {
    if (record.status === 'synced') continue;
    const key = entityKey(record);
    const current = head.get(key);
    if (current === undefined || record.seq < current) head.set(key, record.seq);
  }

  return records
    .filter(
      (record) =>
        record.status === 'pending' &&
        !excludeIds.has(record.id) &&
        head.get(entityKey(record)) === record.seq &&
        isReadyForRetry(record, now)
    )
    .sort(
      (a, b) =>
        PRIORITY_RANK[b.priority] - PRIORITY_RANK[a.priority] ||
        a.createdAt.localeCompare(b.createdAt) ||
        a.seq - b.seq
    )
    .slice(0, limit);
}

export async function getEligibleMutations(
  db: LedgerDatabase,
  now: Date,
  limit: number,
  excludeIds: ReadonlySet<string> = new Set()
): Promise<MutationRecord[]> {
  const outstanding = await db.mutations.where('status').anyOf(OUTSTANDING).toArray();
  return selectEligible(outstanding, now, limit, excludeIds);
}

// ─── Query ───────────────────────────────────────────────

/** Everything the remote has not confirmed yet. */
export async function getPendingSyncCount(db: LedgerDatabase): Promise<number> {
  return db.mutations.where('status').anyOf(OUTSTANDING).count();
}

export async function getMutationCounts(db: LedgerDatabase): Promise<Record<MutationStatus, number>> {
  const counts: Record<MutationStatus, number> = {
    pending: 0,
    syncing: 0,
    synced: 0,
    failed: 0,
    conflict: 0,
  };
  await Promise.all(
    MUTATION_STATUSES.map(async (status) => {
      counts[status] = await db.mutations.where('status').equals(status).count();
    })
  );
  return counts;
}

export async function getMutationsByStatus(
  db: LedgerDatabase,
  status: MutationStatus
): Promise<MutationRecord[]> {
  return db.mutations.where('status').equals(status).sortBy('seq');
}

export async function getOutstandingForEntity(
  db: LedgerDatabase,
  entityType: EntityType,
  entityId: number
): Promise<MutationRecord[]> {
  const records = await db.mutations
    .where('[entityType+entityId]')
    .equals([entityType, entityId])
    .sortBy('seq');
  return records.filter((record) => isOutstanding(record.status));
}

export async function findMutation(db: LedgerDatabase, recordId: string): Promise<MutationRecord | undefined> {
  return db.mutations.where('id').equals(recordId).first();
}

export async function saveMutation(db: LedgerDatabase, record: MutationRecord): Promise<void> {
  await db.mutations.put(record);
}

// ─── Entity Status ───────────────────────────────────────

export function deriveEntitySyncStatus(outstanding: readonly MutationRecord[]): SyncStatus {
  if (outstanding.length === 0) return 'synced';
  const statuses = new Set(outstanding.map((record) => record.status));
  if (statuses.has('conflict')) return 'conflict';
  if (statuses.has('failed')) return 'failed';
  if (statuses.has('syncing')) return 'syncing';
  return 'pending';
}

/** Mirror the entity's outstanding records onto its `_syncStatus`. */
export async function refreshEntitySyncStatus(
  db: LedgerDatabase,
  entityType: EntityType,
  entityId: number,
  now: Date
): Promise<SyncStatus | null> {
  const table = ENTITY_TABLE[entityType];
  if (!table) return null;

  const status = deriveEntitySyncStatus(await getOutstandingForEntity(db, entityType, entityId));
  const updated = await db
    .syncMetadata(table)
    .update(entityId, status === 'synced' ? { _syncStatus: status, _lastSyncedAt: now.toISOString() } : { _syncStatus: status });
  return updated ? status : null;
}

// ─── Recovery ────────────────────────────────────────────

/** The only path out of Failed/Conflict. */
export async function resetForRetry(
  tx: LedgerTx,
  recordId: string
): Promise<Result<MutationRecord, NotFoundFailure | ValidationFailure>> {
  const record = await findMutation(tx.db, recordId);
  if (!record) return err(new NotFoundFailure('Mutation record', recordId));
  if (record.status !== 'failed' && record.status !== 'conflict') {
    return err(new ValidationFailure(`Record ${recordId} is ${record.status}, not failed or conflict`, { field: 'status' }));
  }

  const reset = resetRecord(record, tx.now);
  await saveMutation(tx.db, reset);
  await refreshEntitySyncStatus(tx.db, reset.entityType, reset.entityId, tx.now);

  tx.afterCommit(() =>
    tx.bus.publish('mutation:enqueued', {
      recordId: reset.id,
      entityType: reset.entityType,
      entityId: reset.entityId,
      operation: reset.operation,
    })
  );
  log.info({ recordId, entityType: reset.entityType, entityId: reset.entityId }, 'Record reset for retry');
  return ok(reset);
}

/** Syncing rows left behind by a crash go back to Pending. */
export async function recoverInterruptedMutations(db: LedgerDatabase, now: Date): Promise<number> {
  const stuck = await db.mutations.where('status').equals('syncing').toArray();
  for (const record of stuck) {
    const released = releaseInterrupted(record, now);
    await saveMutation(db, released);
    await refreshEntitySyncStatus(db, released.entityType, released.entityId, now);
  }
  if (stuck.length > 0) log.warn({ count: stuck.length }, 'Recovered interrupted records');
  return stuck.length;
}

// ─── Cleanup ─────────────────────────────────────────────

/**
 * Remove synced records confirmed before the cutoff (keep DB lean)
 */
export async function purgeSyncedMutations(db: LedgerDatabase, olderThanIso: string): Promise<number> {
  const old = await db.mutations
    .where('status')
    .equals('synced')
    .filter((record) => record.syncedAt !== null && record.syncedAt < olderThanIso)
    .primaryKeys();

  await db.mutations.bulkDelete(old);
  return old.length;
}
