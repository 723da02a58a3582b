import { InvalidTransitionError } from '@/lib/errors';
import {
  MUTATION_STATUSES,
  computeBackoffMinutes,
  entityKey,
  isReadyForRetry,
  isTerminal,
  isValidTransition,
  markConflict,
  markSynced,
  markSyncing,
  markTransientFailure,
  releaseInterrupted,
  resetForRetry,
  type MutationRecord,
} from '../mutation-record';

const NOW = new Date('2024-03-01T08:00:00.000Z');

function record(overrides: Partial<MutationRecord> = {}): MutationRecord {
  return {
    seq: 1,
    id: 'mut-1',
    entityType: 'customer',
    entityId: 7,
    entityServerId: null,
    operation: 'create',
    payloadKind: 'customer',
    payloadJson: '{}',
    status: 'pending',
    priority: 'normal',
    retryCount: 0,
    maxRetries: 3,
    lastAttemptAt: null,
    nextRetryAt: null,
    errorMessage: null,
    syncedAt: null,
    createdAt: NOW.toISOString(),
    updatedAt: NOW.toISOString(),
    ...overrides,
  };
}

describe('computeBackoffMinutes', () => {
  it('doubles from one minute and caps at sixty', () => {
    const delays = Array.from({ length: 11 }, (_, n) => computeBackoffMinutes(n));
    expect(delays).toEqual([1, 2, 4, 8, 16, 32, 60, 60, 60, 60, 60]);
  });

  it('never decreases', () => {
    for (let n = 1; n <= 10; n++) {
      expect(computeBackoffMinutes(n)).toBeGreaterThanOrEqual(computeBackoffMinutes(n - 1));
    }
  });
});

describe('transitions', () => {
  it('allows only the listed edges', () => {
    expect(isValidTransition('pending', 'syncing')).toBe(true);
    expect(isValidTransition('pending', 'synced')).toBe(false);
    expect(isValidTransition('syncing', 'conflict')).toBe(true);
    expect(isValidTransition('failed', 'pending')).toBe(true);
    expect(isValidTransition('failed', 'syncing')).toBe(false);
  });

  it('keeps Synced sticky', () => {
    for (const status of MUTATION_STATUSES) {
      expect(isValidTransition('synced', status)).toBe(false);
    }
    expect(isTerminal('synced')).toBe(true);
    expect(isTerminal('pending')).toBe(false);
  });

  it('stamps the attempt when syncing starts', () => {
    const syncing = markSyncing(record(), NOW);
    expect(syncing.status).toBe('syncing');
    expect(syncing.lastAttemptAt).toBe('2024-03-01T08:00:00.000Z');
  });

  it('refuses to sync a record twice', () => {
    const syncing = markSyncing(record(), NOW);
    expect(() => markSyncing(syncing, NOW)).toThrow(InvalidTransitionError);
  });

  it('keeps an existing server id when marking synced', () => {
    const syncing = markSyncing(record({ entityServerId: 'srv-1' }), NOW);
    const synced = markSynced(syncing, NOW, 'srv-2');
    expect(synced.entityServerId).toBe('srv-1');
    expect(synced.syncedAt).toBe('2024-03-01T08:00:00.000Z');
  });

  it('fills the server id when none is known', () => {
    const synced = markSynced(markSyncing(record(), NOW), NOW, 'srv-9');
    expect(synced.entityServerId).toBe('srv-9');
  });
});

describe('markTransientFailure', () => {
  it('schedules a retry with backoff from the new retry count', () => {
    const next = markTransientFailure(markSyncing(record(), NOW), 'HTTP 503', NOW);
    expect(next.status).toBe('pending');
    expect(next.retryCount).toBe(1);
    expect(next.nextRetryAt).toBe('2024-03-01T08:02:00.000Z');
    expect(next.errorMessage).toBe('HTTP 503');
  });

  it('fails terminally once the budget is spent', () => {
    const next = markTransientFailure(markSyncing(record({ retryCount: 2 }), NOW), 'timeout', NOW);
    expect(next.status).toBe('failed');
    expect(next.retryCount).toBe(3);
    expect(next.nextRetryAt).toBeNull();
  });
});

describe('markConflict', () => {
  it('does not consume retry budget', () => {
    const next = markConflict(markSyncing(record({ retryCount: 1 }), NOW), 'Duplicate phone', NOW);
    expect(next.status).toBe('conflict');
    expect(next.retryCount).toBe(1);
    expect(next.errorMessage).toBe('Duplicate phone');
  });
});

describe('releaseInterrupted', () => {
  it('returns a syncing record to pending without backoff', () => {
    const syncing = markSyncing(record({ retryCount: 1, nextRetryAt: '2024-03-01T07:00:00.000Z' }), NOW);
    const released = releaseInterrupted(syncing, NOW);
    expect(released.status).toBe('pending');
    expect(released.retryCount).toBe(1);
    expect(released.nextRetryAt).toBeNull();
  });

  it('rejects records that are not syncing', () => {
    expect(() => releaseInterrupted(record(), NOW)).toThrow(InvalidTransitionError);
  });
});

describe('resetForRetry', () => {
  it('zeroes the budget and clears the error', () => {
    const failed = record({ status: 'failed', retryCount: 3, errorMessage: 'timeout' });
    const reset = resetForRetry(failed, NOW);
    expect(reset.status).toBe('pending');
    expect(reset.retryCount).toBe(0);
    expect(reset.errorMessage).toBeNull();
  });

  it('is the only way out of conflict and nothing else', () => {
    expect(resetForRetry(record({ status: 'conflict' }), NOW).status).toBe('pending');
    expect(() => resetForRetry(record({ status: 'synced' }), NOW)).toThrow(InvalidTransitionError);
    expect(() => resetForRetry(record({ status: 'pending' }), NOW)).toThrow(InvalidTransitionError);
  });
});

describe('helpers', () => {
  it('waits for nextRetryAt', () => {
    const waiting = record({ nextRetryAt: '2024-03-01T08:05:00.000Z' });
    expect(isReadyForRetry(waiting, NOW)).toBe(false);
    expect(isReadyForRetry(waiting, new Date('2024-03-01T08:05:00.000Z'))).toBe(true);
    expect(isReadyForRetry(record(), NOW)).toBe(true);
  });

  it('keys records by entity', () => {
    expect(entityKey(record())).toBe('customer:7');
  });
});
