/**
 * SYNC ENGINE: Background synchronization
 *
 * Responsibilities:
 *   1. Push mutation records to the remote (in queue order)
 *   2. Reconcile confirmed records back into the ledger
 *   3. Route failures: transient → backoff, semantic → conflict
 *   4. Re-enqueue entities whose records were lost
 *   5. Pull remote changes into the ledger
 *   6. Track online/offline status
 *
 * Design principles:
 *   - Never throws: every per-record failure becomes a state transition
 *   - Passes never overlap
 *   - At most one record per entity in flight
 *   - A record whose dependencies have no serverId yet is deferred, not sent
 */

import { z } from 'zod';
import { errorMessage } from '@/lib/errors';
import { syncLogger as log } from '@/lib/logger';
import type { SyncConfig } from '@/config/env';
import { withLedgerTransaction, type OfflineDeps } from './context';
import type { LedgerTable } from './db';
import {
  entityKey,
  markConflict,
  markSyncing,
  markTransientFailure,
  releaseInterrupted,
  type MutationRecord,
} from './mutation-record';
import {
  parsePayload,
  payloadDependencies,
  type MutationPayload,
  type PayloadKind,
} from './payloads';
import { pullRemoteChanges } from './pull';
import { commitSuccess, healMissingMutations } from './reconcile';
import {
  API_ENDPOINTS,
  buildPushRequest,
  classifyRemoteResult,
  sendPushRequest,
  transactionBody,
  type RemoteApi,
  type RemoteResult,
  type ServerIdLookup,
  type SyncOutcome,
} from './remote';
import {
  findMutation,
  getEligibleMutations,
  getMutationCounts,
  purgeSyncedMutations,
  recoverInterruptedMutations,
  refreshEntitySyncStatus,
  saveMutation,
} from './sync-queue';

// ─── Types ───────────────────────────────────────────────

export type ConnectionStatus = 'online' | 'offline' | 'syncing';

export interface SyncState {
  status: ConnectionStatus;
  pendingCount: number;
  failedCount: number;
  conflictCount: number;
  lastSyncAt: string | null;
  lastError: string | null;
}

type SyncStateListener = (state: SyncState) => void;

export interface SyncPassResult {
  attempted: number;
  succeeded: number;
  /** Transient failures, including those that exhausted their budget. */
  failed: number;
  exhausted: number;
  conflicted: number;
  /** Records left untouched because a dependency has no serverId yet. */
  deferred: number;
  authRequired: boolean;
  cancelled: boolean;
  offline: boolean;
  healed: number;
  pulled: number;
  startedAt: string;
  finishedAt: string;
}

export type TransmitOutcome =
  | 'synced'
  | 'transient'
  | 'failed'
  | 'conflict'
  | 'deferred'
  | 'auth'
  | 'cancelled'
  | 'skipped';

export interface Connectivity {
  isOnline(): boolean;
  onChange(listener: (online: boolean) => void): () => void;
}

export const alwaysOnline: Connectivity = {
  isOnline: () => true,
  onChange: () => () => undefined,
};

export interface SyncEngineOptions extends OfflineDeps {
  remote: RemoteApi;
  config: SyncConfig;
  connectivity?: Connectivity;
}

type Resolution =
  | { kind: 'ready'; lookup: ServerIdLookup }
  | { kind: 'deferred'; table: LedgerTable; localId: number }
  | { kind: 'missing'; table: LedgerTable; localId: number };

/** A record claimed for transmission together with its decoded payload. */
interface Claim {
  record: MutationRecord;
  payload: MutationPayload;
  lookup: ServerIdLookup;
}

const BATCH_KINDS: Partial<Record<PayloadKind, { path: string; key: string }>> = {
  customer: { path: API_ENDPOINTS.customersSync, key: 'customers' },
  inventoryItem: { path: API_ENDPOINTS.inventorySync, key: 'inventory' },
  transaction: { path: API_ENDPOINTS.transactionsSync, key: 'transactions' },
};

const batchResponseSchema = z.object({
  synced: z.array(
    z.object({
      localId: z.coerce.number().int(),
      id: z.union([z.string().min(1), z.number()]).transform(String),
    })
  ),
});

function emptyResult(startedAt: string): SyncPassResult {
  return {
    attempted: 0,
    succeeded: 0,
    failed: 0,
    exhausted: 0,
    conflicted: 0,
    deferred: 0,
    authRequired: false,
    cancelled: false,
    offline: false,
    healed: 0,
    pulled: 0,
    startedAt,
    finishedAt: startedAt,
  };
}

function failureMessage(result: RemoteResult): string {
  if (!result.ok) return result.error.message;
  return result.value.message ?? `HTTP ${result.value.statusCode}`;
}

// ─── Engine ──────────────────────────────────────────────

export class SyncEngine {
  private readonly deps: OfflineDeps;
  private readonly remote: RemoteApi;
  private readonly config: SyncConfig;
  private readonly connectivity: Connectivity;

  private state: SyncState;
  private readonly listeners = new Set<SyncStateListener>();
  private readonly lockedEntities = new Set<string>();

  private inFlight: Promise<SyncPassResult> | null = null;
  private exclusive: Promise<unknown> = Promise.resolve();
  private controller: AbortController | null = null;

  private interval: ReturnType<typeof setInterval> | null = null;
  private debounce: ReturnType<typeof setTimeout> | null = null;
  private unsubscribers: Array<() => void> = [];

  constructor(options: SyncEngineOptions) {
    const { remote, config, connectivity, ...deps } = options;
    this.deps = deps;
    this.remote = remote;
    this.config = config;
    this.connectivity = connectivity ?? alwaysOnline;
    this.state = {
      status: this.connectivity.isOnline() ? 'online' : 'offline',
      pendingCount: 0,
      failedCount: 0,
      conflictCount: 0,
      lastSyncAt: null,
      lastError: null,
    };
  }

  // ─── State ─────────────────────────────────────────────

  getState(): SyncState {
    return { ...this.state };
  }

  /**
   * Subscribe to sync state changes
   */
  onStateChange(listener: SyncStateListener): () => void {
    this.listeners.add(listener);
    listener(this.getState());
    return () => {
      this.listeners.delete(listener);
    };
  }

  private setState(partial: Partial<SyncState>): void {
    this.state = { ...this.state, ...partial };
    const snapshot = this.getState();
    for (const listener of this.listeners) {
      try {
        listener(snapshot);
      } catch (error) {
        log.error({ err: errorMessage(error) }, 'Sync state listener threw');
      }
    }
    this.deps.bus.publish('sync:state', snapshot);
  }

  private async refreshCounts(partial: Partial<SyncState> = {}): Promise<void> {
    const counts = await getMutationCounts(this.deps.db);
    this.setState({
      ...partial,
      pendingCount: counts.pending + counts.syncing,
      failedCount: counts.failed,
      conflictCount: counts.conflict,
    });
  }

  // ─── Lifecycle ─────────────────────────────────────────

  /**
   * Start periodic, connectivity and enqueue-triggered passes.
   */
  start(): void {
    if (this.interval) return;

    this.unsubscribers.push(
      this.deps.bus.subscribe('mutation:enqueued', () => this.scheduleDebouncedPass()),
      this.connectivity.onChange((online) => {
        if (online) {
          this.setState({ status: 'online' });
          this.trigger('connectivity');
        } else {
          this.cancel();
          this.setState({ status: 'offline' });
        }
      })
    );
    this.interval = setInterval(() => this.trigger('interval'), this.config.intervalMs);
    this.trigger('startup');
    log.info({ intervalMs: this.config.intervalMs }, 'Sync engine started');
  }

  /**
   * Stop timers and abort the in-flight call
   */
  stop(): void {
    if (this.interval) clearInterval(this.interval);
    if (this.debounce) clearTimeout(this.debounce);
    this.interval = null;
    this.debounce = null;
    for (const unsubscribe of this.unsubscribers) unsubscribe();
    this.unsubscribers = [];
    this.cancel();
    log.info('Sync engine stopped');
  }

  /** Abort the in-flight remote call; its record goes back to Pending. */
  cancel(): void {
    this.controller?.abort();
  }

  private scheduleDebouncedPass(): void {
    if (this.debounce) clearTimeout(this.debounce);
    this.debounce = setTimeout(() => {
      this.debounce = null;
      this.trigger('enqueue');
    }, this.config.debounceMs);
  }

  private trigger(reason: string): void {
    if (!this.connectivity.isOnline()) return;
    this.runSyncPass().catch((error: unknown) => {
      log.error({ reason, err: errorMessage(error) }, 'Triggered sync pass rejected');
    });
  }

  /**
   * Explicit user request. Offline returns at once without remote calls.
   */
  async syncNow(): Promise<SyncPassResult> {
    if (!this.connectivity.isOnline()) {
      const result = emptyResult(this.deps.clock().toISOString());
      result.offline = true;
      await this.refreshCounts({ status: 'offline' });
      return result;
    }
    log.info('Manual sync requested');
    return this.runSyncPass();
  }

  // ─── Pass ──────────────────────────────────────────────

  /** A second call while a pass is running joins that pass. */
  runSyncPass(): Promise<SyncPassResult> {
    if (!this.inFlight) {
      this.inFlight = this.serialize(() => this.executePass()).finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  private serialize<T>(work: () => Promise<T>): Promise<T> {
    const run = this.exclusive.then(work, work);
    this.exclusive = run.catch((error: unknown) => {
      log.error({ err: errorMessage(error) }, 'Serialized sync work failed');
    });
    return run;
  }

  private async executePass(): Promise<SyncPassResult> {
    const result = emptyResult(this.deps.clock().toISOString());
    if (!this.connectivity.isOnline()) {
      result.offline = true;
      return result;
    }

    const controller = new AbortController();
    this.controller = controller;
    this.setState({ status: 'syncing' });
    let lastError: string | null = null;

    try {
      await recoverInterruptedMutations(this.deps.db, this.deps.clock());
      result.healed = await withLedgerTransaction(this.deps, (tx) => healMissingMutations(tx));

      await this.pushBatches(result, controller.signal);

      if (!result.authRequired && !result.cancelled && !controller.signal.aborted) {
        const pull = await pullRemoteChanges(this.deps, this.remote, controller.signal);
        result.pulled = pull.applied;
        result.authRequired = pull.authRequired;
      }

      const cutoff = new Date(this.deps.clock().getTime() - this.config.purgeAfterHours * 3_600_000);
      await purgeSyncedMutations(this.deps.db, cutoff.toISOString());
    } catch (error) {
      lastError = errorMessage(error);
      log.error({ err: lastError }, 'Sync pass aborted');
    } finally {
      this.controller = null;
    }

    if (controller.signal.aborted) result.cancelled = true;
    if (result.authRequired) lastError = 'Authentication required';
    result.finishedAt = this.deps.clock().toISOString();

    try {
      await this.refreshCounts({
        status: this.connectivity.isOnline() ? 'online' : 'offline',
        lastSyncAt: lastError === null && !result.cancelled ? result.finishedAt : this.state.lastSyncAt,
        lastError,
      });
    } catch (error) {
      log.error({ err: errorMessage(error) }, 'Could not refresh sync counts');
    }

    log.info(
      {
        attempted: result.attempted,
        succeeded: result.succeeded,
        failed: result.failed,
        conflicted: result.conflicted,
        deferred: result.deferred,
        pulled: result.pulled,
      },
      'Sync pass finished'
    );
    return result;
  }

  private async pushBatches(result: SyncPassResult, signal: AbortSignal): Promise<void> {
    const deferred = new Set<string>();
    const attempted = new Set<string>();

    for (let batch = 0; batch < this.config.maxBatchesPerPass; batch++) {
      if (signal.aborted) break;

      const records = await getEligibleMutations(this.deps.db, this.deps.clock(), this.config.batchSize, deferred);
      if (records.length === 0) break;

      let progressed = false;
      const tally = (record: MutationRecord, outcome: TransmitOutcome): void => {
        if (outcome === 'deferred') {
          deferred.add(record.id);
          return;
        }
        if (outcome === 'skipped') return;
        progressed = true;
        attempted.add(record.id);
        result.attempted++;
        if (outcome === 'synced') result.succeeded++;
        if (outcome === 'transient' || outcome === 'failed') result.failed++;
        if (outcome === 'failed') result.exhausted++;
        if (outcome === 'conflict') result.conflicted++;
        if (outcome === 'auth') result.authRequired = true;
        if (outcome === 'cancelled') result.cancelled = true;
      };

      const batched = this.config.useBatchEndpoints
        ? records.filter((record) => record.operation === 'create' && BATCH_KINDS[record.payloadKind])
        : [];
      const batchedIds = new Set(batched.map((record) => record.id));

      for (const [record, outcome] of await this.transmitBatched(batched, signal)) {
        tally(record, outcome);
      }
      if (result.authRequired || result.cancelled) break;

      for (const record of records) {
        if (batchedIds.has(record.id)) continue;
        tally(record, await this.transmit(record, signal));
        if (result.authRequired || result.cancelled) break;
      }
      if (result.authRequired || result.cancelled) break;

      // Records deferred on a parent that has since synced get another chance.
      if (progressed) deferred.clear();
    }

    result.deferred = [...deferred].filter((id) => !attempted.has(id)).length;
  }

  // ─── Single Record ─────────────────────────────────────

  /**
   * Transmit one record outside a pass. A record already Synced is
   * skipped, so a duplicate delivery never touches the ledger again.
   */
  transmitRecord(recordId: string): Promise<TransmitOutcome> {
    return this.serialize(async () => {
      const record = await findMutation(this.deps.db, recordId);
      if (!record || record.status !== 'pending') return 'skipped';

      const controller = new AbortController();
      this.controller = controller;
      try {
        return await this.transmit(record, controller.signal);
      } finally {
        this.controller = null;
        await this.refreshCounts();
      }
    });
  }

  private async transmit(record: MutationRecord, signal: AbortSignal): Promise<TransmitOutcome> {
    const key = entityKey(record);
    if (this.lockedEntities.has(key)) return 'deferred';
    this.lockedEntities.add(key);

    try {
      const claim = await this.claim(record);
      if (typeof claim === 'string') return claim;

      const request = buildPushRequest(claim.record, claim.payload, claim.lookup);
      const response = await sendPushRequest(this.remote, request, { signal, clientMutationId: record.id });

      if (signal.aborted) return await this.release(claim.record);
      const data = response.ok ? response.value.data : null;
      return await this.settle(claim, classifyRemoteResult(response, record.operation), failureMessage(response), data, null);
    } catch (error) {
      log.error({ recordId: record.id, err: errorMessage(error) }, 'Unexpected error while transmitting');
      return this.failUnexpected(record.id, errorMessage(error));
    } finally {
      this.lockedEntities.delete(key);
    }
  }

  /**
   * Decode, resolve dependencies and mark Syncing.
   * Returns an outcome instead when the record cannot be sent now.
   */
  private async claim(record: MutationRecord): Promise<Claim | TransmitOutcome> {
    const decoded = parsePayload(record.payloadJson);
    if (!decoded.ok) {
      return this.conflictFromPending(record, decoded.error.message);
    }
    const payload = decoded.value;

    const resolution = await this.resolveServerIds(record, payload);
    if (resolution.kind === 'deferred') {
      log.debug(
        { recordId: record.id, waitingOn: `${resolution.table}#${resolution.localId}` },
        'Deferred until dependency syncs'
      );
      return 'deferred';
    }
    if (resolution.kind === 'missing') {
      return this.conflictFromPending(record, `${resolution.table} #${resolution.localId} no longer exists locally`);
    }

    const syncing = await withLedgerTransaction(this.deps, async (tx) => {
      const next = markSyncing(record, tx.now);
      await saveMutation(tx.db, next);
      await refreshEntitySyncStatus(tx.db, next.entityType, next.entityId, tx.now);
      return next;
    });
    return { record: syncing, payload, lookup: resolution.lookup };
  }

  private async resolveServerIds(record: MutationRecord, payload: MutationPayload): Promise<Resolution> {
    const known = new Map<string, string>();

    for (const ref of payloadDependencies(payload, record.operation, record.entityType, record.entityId)) {
      const row = await this.deps.db.syncMetadata(ref.table).get(ref.localId);
      if (!row) return { kind: 'missing', table: ref.table, localId: ref.localId };
      if (!row._serverId) return { kind: 'deferred', table: ref.table, localId: ref.localId };
      known.set(`${ref.table}:${ref.localId}`, row._serverId);
    }

    // Optional link: sent when known, never waited for.
    if (payload.kind === 'stockMovement' && payload.referenceType === 'transaction' && payload.referenceLocalId !== null) {
      const transaction = await this.deps.db.transactions.get(payload.referenceLocalId);
      if (transaction?._serverId) known.set(`transactions:${payload.referenceLocalId}`, transaction._serverId);
    }

    return { kind: 'ready', lookup: (table, localId) => known.get(`${table}:${localId}`) ?? null };
  }

  /** Apply a classified outcome to a Syncing record. */
  private async settle(
    claim: Claim,
    outcome: SyncOutcome,
    message: string,
    data: unknown,
    serverIdHint: string | null
  ): Promise<TransmitOutcome> {
    const { record, payload } = claim;

    switch (outcome) {
      case 'success': {
        const committed = await withLedgerTransaction(this.deps, (tx) =>
          commitSuccess(tx, record, payload, data, serverIdHint)
        );
        if (committed === 'conflict') {
          this.publishIssue(record, 'conflict', 'Remote accepted the create but returned no id');
          return 'conflict';
        }
        log.debug({ recordId: record.id, entityType: record.entityType }, 'Record synced');
        return 'synced';
      }

      case 'transient': {
        const next = await this.persist(markTransientFailure(record, message, this.deps.clock()));
        if (next.status === 'failed') {
          log.warn({ recordId: record.id, retryCount: next.retryCount, err: message }, 'Retry budget exhausted');
          this.publishIssue(next, 'failed', message);
          return 'failed';
        }
        log.debug({ recordId: record.id, nextRetryAt: next.nextRetryAt, err: message }, 'Transient failure');
        return 'transient';
      }

      case 'conflict': {
        await this.persist(markConflict(record, message, this.deps.clock()));
        log.warn({ recordId: record.id, entityType: record.entityType, err: message }, 'Sync conflict');
        this.publishIssue(record, 'conflict', message);
        return 'conflict';
      }

      case 'auth': {
        await this.persist(releaseInterrupted(record, this.deps.clock()));
        log.warn({ recordId: record.id }, 'Remote rejected the session');
        return 'auth';
      }
    }
  }

  private async release(record: MutationRecord): Promise<TransmitOutcome> {
    await this.persist(releaseInterrupted(record, this.deps.clock()));
    log.info({ recordId: record.id }, 'Transmission cancelled');
    return 'cancelled';
  }

  private async persist(record: MutationRecord): Promise<MutationRecord> {
    return withLedgerTransaction(this.deps, async (tx) => {
      await saveMutation(tx.db, record);
      await refreshEntitySyncStatus(tx.db, record.entityType, record.entityId, tx.now);
      return record;
    });
  }

  /** A record that can never be sent as stored goes straight to Conflict. */
  private async conflictFromPending(record: MutationRecord, message: string): Promise<TransmitOutcome> {
    const now = this.deps.clock();
    await this.persist(markConflict(markSyncing(record, now), message, now));
    log.warn({ recordId: record.id, err: message }, 'Record cannot be transmitted');
    this.publishIssue(record, 'conflict', message);
    return 'conflict';
  }

  private async failUnexpected(recordId: string, message: string): Promise<TransmitOutcome> {
    try {
      const current = await findMutation(this.deps.db, recordId);
      if (!current || current.status !== 'syncing') return 'transient';
      const next = await this.persist(markTransientFailure(current, message, this.deps.clock()));
      if (next.status === 'failed') {
        this.publishIssue(next, 'failed', message);
        return 'failed';
      }
      return 'transient';
    } catch (error) {
      log.error({ recordId, err: errorMessage(error) }, 'Could not record the failure');
      return 'transient';
    }
  }

  private publishIssue(record: MutationRecord, status: 'failed' | 'conflict', message: string): void {
    this.deps.bus.publish(status === 'failed' ? 'sync:failed' : 'sync:conflict', {
      recordId: record.id,
      entityType: record.entityType,
      entityId: record.entityId,
      operation: record.operation,
      status,
      message,
    });
  }

  // ─── Batch Endpoints ───────────────────────────────────

  /**
   * Send Create records through the /sync endpoints, one call per kind.
   * Records the response does not confirm take a transient failure.
   */
  private async transmitBatched(
    records: readonly MutationRecord[],
    signal: AbortSignal
  ): Promise<Array<[MutationRecord, TransmitOutcome]>> {
    const outcomes: Array<[MutationRecord, TransmitOutcome]> = [];
    const groups = new Map<PayloadKind, MutationRecord[]>();
    for (const record of records) {
      groups.set(record.payloadKind, [...(groups.get(record.payloadKind) ?? []), record]);
    }

    for (const [kind, group] of groups) {
      const target = BATCH_KINDS[kind];
      if (!target) continue;
      if (signal.aborted) break;

      const claims: Claim[] = [];
      const locked: string[] = [];
      try {
        for (const record of group) {
          const key = entityKey(record);
          if (this.lockedEntities.has(key)) {
            outcomes.push([record, 'deferred']);
            continue;
          }
          this.lockedEntities.add(key);
          locked.push(key);
          const claim = await this.claim(record);
          if (typeof claim === 'string') outcomes.push([record, claim]);
          else claims.push(claim);
        }
        if (claims.length === 0) continue;

        const bodies = claims.map((claim) =>
          claim.payload.kind === 'transaction'
            ? transactionBody(claim.record, claim.payload, claim.lookup)
            : (buildPushRequest(claim.record, claim.payload, claim.lookup).body ?? {})
        );
        const response = await this.remote.post(target.path, { [target.key]: bodies }, { signal });

        if (signal.aborted) {
          for (const claim of claims) outcomes.push([claim.record, await this.release(claim.record)]);
          continue;
        }

        const outcome = classifyRemoteResult(response, 'create');
        const parsed = response.ok ? batchResponseSchema.safeParse(response.value.data) : null;
        if (outcome !== 'success' || !parsed?.success) {
          const settled = outcome === 'success' ? 'transient' : outcome;
          const message = outcome === 'success' ? 'Batch response has no synced list' : failureMessage(response);
          for (const claim of claims) {
            outcomes.push([claim.record, await this.settle(claim, settled, message, null, null)]);
          }
          continue;
        }

        const confirmed = new Map(parsed.data.synced.map((entry) => [entry.localId, entry.id]));
        for (const claim of claims) {
          const serverId = confirmed.get(claim.record.entityId);
          outcomes.push([
            claim.record,
            serverId === undefined
              ? await this.settle(claim, 'transient', 'Not confirmed by batch sync', null, null)
              : await this.settle(claim, 'success', '', null, serverId),
          ]);
        }
        log.debug({ kind, sent: claims.length, confirmed: confirmed.size }, 'Batch sync finished');
      } catch (error) {
        log.error({ kind, err: errorMessage(error) }, 'Unexpected error in batch sync');
        for (const claim of claims) {
          if (!outcomes.some(([record]) => record.id === claim.record.id)) {
            outcomes.push([claim.record, await this.failUnexpected(claim.record.id, errorMessage(error))]);
          }
        }
      } finally {
        for (const key of locked) this.lockedEntities.delete(key);
      }
    }

    return outcomes;
  }
}
