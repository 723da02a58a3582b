import { IDBKeyRange, indexedDB } from 'fake-indexeddb';
import { loadConfig } from '@/config/env';
import { NotFoundFailure, ValidationFailure } from '@/lib/errors';
import {
  createdWithIds,
  createTestContext,
  destroyTestContext,
  failure,
  FakeRemote,
  type TestContext,
} from '@/test/helpers';
import { createSyncApi, type SyncApi } from '../api';
import { openLedgerDatabase } from '../db';
import { sequenceAllocator } from '../ids';

describe('createSyncApi', () => {
  let ctx: TestContext;
  let remote: FakeRemote;
  let api: SyncApi;

  beforeEach(() => {
    ctx = createTestContext();
    remote = new FakeRemote();
    api = createSyncApi({
      config: loadConfig({ SYNC_MAX_RETRIES: '2' }),
      db: ctx.db,
      remote,
      clock: ctx.time.clock,
      ids: sequenceAllocator('rec'),
      bus: ctx.bus,
    });
  });

  afterEach(async () => {
    api.stop();
    await destroyTestContext(ctx);
  });

  it('works fully offline and counts what is waiting', async () => {
    const customer = await api.createCustomer({ name: 'Ravi', phone: '9845012345' });
    const paddy = await api.createInventoryItem({ type: 'paddy', variety: 'Sona' });
    if (!customer.ok || !paddy.ok) throw new Error('fixtures failed');

    await api.createBuyTransaction({
      customerLocalId: customer.value.localId,
      items: [{ inventoryItemLocalId: paddy.value.localId, quantity: 500, bags: 10, pricePerKg: 50 }],
    });

    expect(await api.getPendingSyncCount()).toBe(4);
    expect(remote.calls).toHaveLength(0);
    const [record] = await ctx.db.mutations.toArray();
    expect(record).toMatchObject({ id: 'rec-1', maxRetries: 2 });
  });

  it('lists records that need attention and lets them be retried', async () => {
    await api.createCustomer({ name: 'Ravi', phone: '9845012345' });
    remote.on('POST', '/customers', () => failure(new ValidationFailure('Phone already registered', { statusCode: 409 })));

    await api.syncNow();

    expect(await api.getSyncIssues()).toEqual([
      {
        recordId: 'rec-1',
        entityType: 'customer',
        entityId: 1,
        operation: 'create',
        status: 'conflict',
        message: 'Phone already registered',
        retryCount: 0,
        lastAttemptAt: '2024-03-01T08:00:00.000Z',
        createdAt: '2024-03-01T08:00:00.000Z',
      },
    ]);
    expect(api.getSyncState()).toMatchObject({ conflictCount: 1, pendingCount: 0 });

    const reset = await api.resetForRetry('rec-1');
    expect(reset).toEqual({ ok: true, value: undefined });
    expect(await api.getSyncIssues()).toEqual([]);

    remote.on('POST', '/customers', createdWithIds('cust'));
    const result = await api.syncNow();

    expect(result.succeeded).toBe(1);
    expect(await api.getPendingSyncCount()).toBe(0);
    expect((await ctx.db.customers.get(1))?._serverId).toBe('cust-1');
  });

  it('refuses to reset unknown or healthy records', async () => {
    await api.createCustomer({ name: 'Ravi', phone: '9845012345' });

    const missing = await api.resetForRetry('rec-404');
    const healthy = await api.resetForRetry('rec-1');

    expect(!missing.ok && missing.error).toBeInstanceOf(NotFoundFailure);
    expect(!healthy.ok && healthy.error).toBeInstanceOf(ValidationFailure);
    expect(!healthy.ok && healthy.error.message).toBe('Record rec-1 is pending, not failed or conflict');
  });

  it('lets a rejected create be dropped in favour of the remote', async () => {
    await api.createCustomer({ name: 'Ravi', phone: '9845012345' });
    remote.on('POST', '/customers', () => failure(new ValidationFailure('Phone already registered', { statusCode: 409 })));
    await api.syncNow();

    const resolved = await api.resolveConflict('rec-1', 'keep_server');

    expect(resolved).toEqual({ ok: true, value: undefined });
    expect(await api.getSyncIssues()).toEqual([]);
    expect(await api.searchCustomers('ravi')).toEqual([]);
  });

  it('answers read queries from the local ledger', async () => {
    const customer = await api.createCustomer({ name: 'Ravi', phone: '9845012345' });
    const paddy = await api.createInventoryItem({ type: 'paddy', variety: 'Sona', minQuantity: 100, openingQuantity: 40 });
    if (!customer.ok || !paddy.ok) throw new Error('fixtures failed');

    expect((await api.searchCustomers('9845')).map((row) => row.localId)).toEqual([customer.value.localId]);
    expect((await api.getLowStockItems()).map((row) => row.localId)).toEqual([paddy.value.localId]);
    expect((await api.getStockMovementHistory(paddy.value.localId)).map((row) => row.movementType)).toEqual(['initial']);
    expect(await api.getCustomerTransactions(customer.value.localId)).toEqual([]);
    expect(await api.getInventorySummary()).toMatchObject({ itemCount: 1, lowStockCount: 1, totalValue: 0 });
  });

  it('opens its own database through the IndexedDB it is given', async () => {
    const dbOptions = { indexedDB, IDBKeyRange };
    const standalone = createSyncApi({
      config: loadConfig({ LOCAL_DB_NAME: 'api-standalone-ledger' }),
      dbOptions,
      remote,
      clock: ctx.time.clock,
      ids: sequenceAllocator('own'),
      bus: ctx.bus,
    });

    const created = await standalone.createCustomer({ name: 'Ravi', phone: '9845012345' });

    expect(created.ok).toBe(true);
    const reopened = openLedgerDatabase('api-standalone-ledger', dbOptions);
    expect((await reopened.mutations.toArray()).map((record) => record.id)).toEqual(['own-1']);
    await reopened.delete();
  });

  it('reports sync state changes to subscribers', async () => {
    const seen: string[] = [];
    const unsubscribe = api.onSyncStateChange((state) => seen.push(`${state.status}:${state.pendingCount}`));
    await api.createCustomer({ name: 'Ravi', phone: '9845012345' });
    remote.on('POST', '/customers', createdWithIds('cust'));

    await api.syncNow();
    unsubscribe();
    await api.syncNow();

    expect(seen).toEqual(['online:0', 'syncing:0', 'online:0']);
  });
});
