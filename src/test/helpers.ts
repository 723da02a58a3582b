/**
 * Shared fixtures: a throwaway ledger database per test, a controllable
 * clock and a scripted RemoteApi.
 */

import { DEFAULT_SYNC_CONFIG, type SyncConfig } from '@/config/env';
import { ok, type Failure } from '@/lib/errors';
import { OfflineEventBus } from '@/lib/realtime';
import type { OfflineDeps } from '@/lib/offline/context';
import { openLedgerDatabase, type LedgerDatabase } from '@/lib/offline/db';
import { sequenceAllocator, type Clock } from '@/lib/offline/ids';
import type { HttpMethod, RemoteApi, RemoteRequestOptions, RemoteResult } from '@/lib/offline/remote';

let databaseCounter = 0;

export const START = new Date('2024-03-01T08:00:00.000Z');

export interface TestClock {
  clock: Clock;
  set(date: Date): void;
  advanceMinutes(minutes: number): void;
}

export function createTestClock(start: Date = START): TestClock {
  let current = new Date(start.getTime());
  return {
    clock: () => new Date(current.getTime()),
    set: (date) => {
      current = new Date(date.getTime());
    },
    advanceMinutes: (minutes) => {
      current = new Date(current.getTime() + minutes * 60_000);
    },
  };
}

export interface TestContext {
  db: LedgerDatabase;
  deps: OfflineDeps;
  time: TestClock;
  bus: OfflineEventBus;
}

export function createTestContext(maxRetries = 3): TestContext {
  databaseCounter++;
  const db = openLedgerDatabase(`ledger-test-${process.pid}-${databaseCounter}`);
  const time = createTestClock();
  const bus = new OfflineEventBus();
  return {
    db,
    time,
    bus,
    deps: { db, clock: time.clock, ids: sequenceAllocator('mut'), bus, maxRetries },
  };
}

export async function destroyTestContext(context: TestContext): Promise<void> {
  context.bus.removeAllListeners();
  await context.db.delete();
}

export function testSyncConfig(overrides: Partial<SyncConfig> = {}): SyncConfig {
  return { ...DEFAULT_SYNC_CONFIG, ...overrides };
}

// ─── Remote ──────────────────────────────────────────────

export interface RemoteCall {
  method: HttpMethod;
  path: string;
  body: unknown;
  options: RemoteRequestOptions;
}

export type RemoteHandler = (call: RemoteCall) => RemoteResult | Promise<RemoteResult>;

export function success(data: unknown, statusCode = 200): RemoteResult {
  return ok({ success: true, statusCode, data, message: null });
}

export function failure(error: Failure): RemoteResult {
  return { ok: false, error };
}

/**
 * Records every call. Unhandled paths answer 200 with an empty list,
 * so pulls see no remote changes unless a test scripts them.
 */
export class FakeRemote implements RemoteApi {
  readonly calls: RemoteCall[] = [];
  private readonly routes: Array<{ method: HttpMethod; match: string | RegExp; handler: RemoteHandler }> = [];

  on(method: HttpMethod, match: string | RegExp, handler: RemoteHandler): this {
    this.routes.unshift({ method, match, handler });
    return this;
  }

  pushCalls(): RemoteCall[] {
    return this.calls.filter((call) => call.method !== 'GET');
  }

  get(path: string, options: RemoteRequestOptions = {}): Promise<RemoteResult> {
    return this.dispatch({ method: 'GET', path, body: undefined, options });
  }

  post(path: string, data?: unknown, options: RemoteRequestOptions = {}): Promise<RemoteResult> {
    return this.dispatch({ method: 'POST', path, body: data, options });
  }

  put(path: string, data?: unknown, options: RemoteRequestOptions = {}): Promise<RemoteResult> {
    return this.dispatch({ method: 'PUT', path, body: data, options });
  }

  patch(path: string, data?: unknown, options: RemoteRequestOptions = {}): Promise<RemoteResult> {
    return this.dispatch({ method: 'PATCH', path, body: data, options });
  }

  delete(path: string, options: RemoteRequestOptions = {}): Promise<RemoteResult> {
    return this.dispatch({ method: 'DELETE', path, body: undefined, options });
  }

  private async dispatch(call: RemoteCall): Promise<RemoteResult> {
    this.calls.push(call);
    const route = this.routes.find(
      (candidate) =>
        candidate.method === call.method &&
        (typeof candidate.match === 'string' ? candidate.match === call.path : candidate.match.test(call.path))
    );
    if (route) return route.handler(call);
    return success(call.method === 'GET' ? [] : {});
  }
}

/** Answers every Create with a sequential server id per collection. */
export function createdWithIds(prefix: string): RemoteHandler {
  let counter = 0;
  return () => {
    counter++;
    return success({ id: `${prefix}-${counter}` }, 201);
  };
}
