/**
 * MUTATION RECORD: One queued change to one ledger entity
 *
 * Record lifecycle:
 *   pending → syncing → synced
 *                     → pending (transient failure, backoff)
 *                     → failed  (retry budget exhausted)
 *                     → conflict (remote disagrees)
 *   failed | conflict → pending only through resetForRetry
 *
 * Every function here is pure: it returns a new record and throws
 * InvalidTransitionError for an edge the table below does not allow.
 */

import { InvalidTransitionError } from '@/lib/errors';
import type { PayloadKind } from './payloads';

// ─── Enums ───────────────────────────────────────────────

export const ENTITY_TYPES = ['customer', 'inventory', 'transaction', 'payment', 'milling', 'user'] as const;
export type EntityType = (typeof ENTITY_TYPES)[number];

export const OPERATIONS = ['create', 'update', 'delete'] as const;
export type Operation = (typeof OPERATIONS)[number];

export const MUTATION_STATUSES = ['pending', 'syncing', 'synced', 'failed', 'conflict'] as const;
export type MutationStatus = (typeof MUTATION_STATUSES)[number];

export const PRIORITIES = ['low', 'normal', 'high', 'critical'] as const;
export type Priority = (typeof PRIORITIES)[number];

export const PRIORITY_RANK: Record<Priority, number> = {
  low: 0,
  normal: 1,
  high: 2,
  critical: 3,
};

export const MAX_BACKOFF_MINUTES = 60;

// ─── Record ──────────────────────────────────────────────

export interface MutationRecord {
  seq: number;                      // store-assigned, breaks createdAt ties
  id: string;
  entityType: EntityType;
  entityId: number;                 // localId of the entity
  entityServerId: string | null;
  operation: Operation;
  payloadKind: PayloadKind;
  payloadJson: string;              // serialized snapshot, see payloads.ts
  status: MutationStatus;
  priority: Priority;
  retryCount: number;
  maxRetries: number;
  lastAttemptAt: string | null;
  nextRetryAt: string | null;
  errorMessage: string | null;
  syncedAt: string | null;
  createdAt: string;
  updatedAt: string;
}

export type NewMutationRecord = Omit<MutationRecord, 'seq'>;

// ─── Transitions ─────────────────────────────────────────

export const MUTATION_STATUS_TRANSITIONS: Record<MutationStatus, readonly MutationStatus[]> = {
  pending: ['syncing'],
  syncing: ['synced', 'pending', 'failed', 'conflict'],
  synced: [],
  failed: ['pending'],
  conflict: ['pending'],
};

export const TERMINAL_STATUSES: readonly MutationStatus[] = ['synced', 'failed', 'conflict'];

export function isValidTransition(from: MutationStatus, to: MutationStatus): boolean {
  return MUTATION_STATUS_TRANSITIONS[from].includes(to);
}

export function isTerminal(status: MutationStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

/** Not yet confirmed by the remote. */
export function isOutstanding(status: MutationStatus): boolean {
  return status !== 'synced';
}

function assertTransition(record: MutationRecord, to: MutationStatus): void {
  if (!isValidTransition(record.status, to)) {
    throw new InvalidTransitionError(record.status, to, record.id);
  }
}

/** Backoff after the n-th consecutive transient failure, in minutes. */
export function computeBackoffMinutes(retryCount: number): number {
  return Math.min(MAX_BACKOFF_MINUTES, Math.max(1, 2 ** retryCount));
}

function addMinutes(date: Date, minutes: number): string {
  return new Date(date.getTime() + minutes * 60_000).toISOString();
}

export function markSyncing(record: MutationRecord, now: Date): MutationRecord {
  assertTransition(record, 'syncing');
  return {
    ...record,
    status: 'syncing',
    lastAttemptAt: now.toISOString(),
    updatedAt: now.toISOString(),
  };
}

/** An entityServerId already on the record is never replaced. */
export function markSynced(record: MutationRecord, now: Date, serverId?: string | null): MutationRecord {
  assertTransition(record, 'synced');
  return {
    ...record,
    status: 'synced',
    entityServerId: record.entityServerId ?? serverId ?? null,
    nextRetryAt: null,
    errorMessage: null,
    syncedAt: now.toISOString(),
    updatedAt: now.toISOString(),
  };
}

export function markTransientFailure(record: MutationRecord, error: string, now: Date): MutationRecord {
  const retryCount = record.retryCount + 1;
  const exhausted = retryCount >= record.maxRetries;
  assertTransition(record, exhausted ? 'failed' : 'pending');

  return {
    ...record,
    status: exhausted ? 'failed' : 'pending',
    retryCount,
    nextRetryAt: exhausted ? null : addMinutes(now, computeBackoffMinutes(retryCount)),
    errorMessage: error,
    updatedAt: now.toISOString(),
  };
}

/** Does not consume retry budget. */
export function markConflict(record: MutationRecord, details: string, now: Date): MutationRecord {
  assertTransition(record, 'conflict');
  return {
    ...record,
    status: 'conflict',
    nextRetryAt: null,
    errorMessage: details,
    updatedAt: now.toISOString(),
  };
}

/**
 * Syncing → Pending without touching the retry budget.
 * Used when the call was cancelled, the session expired, or the
 * process died mid-call.
 */
export function releaseInterrupted(record: MutationRecord, now: Date): MutationRecord {
  assertTransition(record, 'pending');
  if (record.status !== 'syncing') {
    throw new InvalidTransitionError(record.status, 'pending', record.id);
  }
  return {
    ...record,
    status: 'pending',
    nextRetryAt: null,
    updatedAt: now.toISOString(),
  };
}

/** Failed | Conflict → Pending. The only way out of a terminal failure. */
export function resetForRetry(record: MutationRecord, now: Date): MutationRecord {
  if (record.status !== 'failed' && record.status !== 'conflict') {
    throw new InvalidTransitionError(record.status, 'pending', record.id);
  }
  return {
    ...record,
    status: 'pending',
    retryCount: 0,
    nextRetryAt: null,
    errorMessage: null,
    updatedAt: now.toISOString(),
  };
}

export function isReadyForRetry(record: MutationRecord, now: Date): boolean {
  return record.nextRetryAt === null || Date.parse(record.nextRetryAt) <= now.getTime();
}

export function entityKey(record: Pick<MutationRecord, 'entityType' | 'entityId'>): string {
  return `${record.entityType}:${record.entityId}`;
}
