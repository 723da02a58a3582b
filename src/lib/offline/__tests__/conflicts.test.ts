import { NotFoundFailure, ValidationFailure } from '@/lib/errors';
import { createTestContext, destroyTestContext, FakeRemote, START, success, type TestContext } from '@/test/helpers';
import {
  adjustStock,
  createBuyTransaction,
  createCustomer,
  createInventoryItem,
  updateCustomer,
  updateInventoryItem,
} from '../actions';
import { resolveConflict } from '../conflicts';
import { markConflict, markSyncing } from '../mutation-record';
import { findMutation, refreshEntitySyncStatus, saveMutation } from '../sync-queue';

const EARLIER = '2024-03-01T07:00:00.000Z';

describe('resolveConflict', () => {
  let ctx: TestContext;
  let remote: FakeRemote;

  beforeEach(() => {
    ctx = createTestContext();
    remote = new FakeRemote();
  });

  afterEach(async () => {
    await destroyTestContext(ctx);
  });

  /** Put a record where a rejected push leaves it. */
  async function rejectRecord(recordId: string, message = 'Phone already registered'): Promise<void> {
    const record = await findMutation(ctx.db, recordId);
    if (!record) throw new Error(`no record ${recordId}`);
    await saveMutation(ctx.db, markConflict(markSyncing(record, START), message, START));
    await refreshEntitySyncStatus(ctx.db, record.entityType, record.entityId, START);
  }

  async function syncedCustomer(): Promise<number> {
    return ctx.db.customers.add({
      name: 'Ravi',
      phone: '9845012345',
      type: 'farmer',
      balance: 0,
      totalPurchases: 0,
      totalSales: 0,
      _serverId: 'cust-1',
      _syncStatus: 'synced',
      _isDeleted: false,
      createdAt: EARLIER,
      updatedAt: EARLIER,
    });
  }

  // ─── Keep local ────────────────────────────────────────

  it('resends a rejected record with the entity as it is now', async () => {
    const created = await createCustomer(ctx.deps, { name: 'Ravi', phone: '9845012345' });
    if (!created.ok) throw new Error('create failed');
    await rejectRecord('mut-1');
    await updateCustomer(ctx.deps, created.value.localId, { phone: '9845099999' });

    const resolved = await resolveConflict(ctx.deps, remote, 'mut-1', 'keep_local');

    expect(resolved).toEqual({ ok: true, value: undefined });
    const record = await findMutation(ctx.db, 'mut-1');
    expect(record).toMatchObject({ status: 'pending', retryCount: 0, errorMessage: null, nextRetryAt: null });
    expect(JSON.parse(record?.payloadJson ?? '{}')).toEqual({
      kind: 'customer',
      name: 'Ravi',
      phone: '9845099999',
      address: null,
      type: 'farmer',
    });
    expect((await ctx.db.customers.get(created.value.localId))?._syncStatus).toBe('pending');
    expect(remote.calls).toHaveLength(0);
  });

  it('only resolves records that are in conflict', async () => {
    await createCustomer(ctx.deps, { name: 'Ravi', phone: '9845012345' });

    const pending = await resolveConflict(ctx.deps, remote, 'mut-1', 'keep_local');
    const missing = await resolveConflict(ctx.deps, remote, 'mut-404', 'keep_server');

    expect(!pending.ok && pending.error).toBeInstanceOf(ValidationFailure);
    expect(!pending.ok && pending.error.message).toBe('Record mut-1 is pending, not conflict');
    expect(!missing.ok && missing.error).toBeInstanceOf(NotFoundFailure);
  });

  // ─── Keep server ───────────────────────────────────────

  it('drops the local edit and takes the remote copy', async () => {
    const localId = await syncedCustomer();
    await updateCustomer(ctx.deps, localId, { name: 'Ravi Kumar' });
    await rejectRecord('mut-1', 'Edited elsewhere');
    remote.on('GET', '/customers/cust-1', () =>
      success({
        customer: { id: 'cust-1', name: 'Ravi K.', phone: '98450 12345', type: 'trader', balance: '100.00', updatedAt: EARLIER },
      })
    );

    const resolved = await resolveConflict(ctx.deps, remote, 'mut-1', 'keep_server');

    expect(resolved.ok).toBe(true);
    expect(await ctx.db.customers.get(localId)).toMatchObject({
      name: 'Ravi K.',
      phone: '9845012345',
      type: 'trader',
      balance: 100,
      _syncStatus: 'synced',
      updatedAt: EARLIER,
    });
    expect(await ctx.db.mutations.count()).toBe(0);
    expect(remote.calls.map((call) => call.path)).toEqual(['/customers/cust-1']);
  });

  it('removes an entity the remote never accepted', async () => {
    await createCustomer(ctx.deps, { name: 'Ravi', phone: '9845012345' });
    await rejectRecord('mut-1');

    const resolved = await resolveConflict(ctx.deps, remote, 'mut-1', 'keep_server');

    expect(resolved.ok).toBe(true);
    expect(await ctx.db.customers.count()).toBe(0);
    expect(await ctx.db.mutations.count()).toBe(0);
    expect(remote.calls).toHaveLength(0);
  });

  it('keeps a never-accepted customer that transactions point to', async () => {
    const customer = await createCustomer(ctx.deps, { name: 'Ravi', phone: '9845012345' });
    const paddy = await createInventoryItem(ctx.deps, { type: 'paddy', variety: 'Sona' });
    if (!customer.ok || !paddy.ok) throw new Error('fixtures failed');
    await createBuyTransaction(ctx.deps, {
      customerLocalId: customer.value.localId,
      items: [{ inventoryItemLocalId: paddy.value.localId, quantity: 100, pricePerKg: 30 }],
    });
    await rejectRecord('mut-1');

    const resolved = await resolveConflict(ctx.deps, remote, 'mut-1', 'keep_server');

    expect(resolved.ok).toBe(false);
    if (resolved.ok) return;
    expect(resolved.error.message).toBe('Customer has transactions; keep the local copy instead');
    expect(await ctx.db.customers.count()).toBe(1);
    expect((await findMutation(ctx.db, 'mut-1'))?.status).toBe('conflict');
  });

  it('takes the server copy only for customers and inventory items', async () => {
    const customer = await createCustomer(ctx.deps, { name: 'Ravi', phone: '9845012345' });
    const paddy = await createInventoryItem(ctx.deps, { type: 'paddy', variety: 'Sona' });
    if (!customer.ok || !paddy.ok) throw new Error('fixtures failed');
    await createBuyTransaction(ctx.deps, {
      customerLocalId: customer.value.localId,
      items: [{ inventoryItemLocalId: paddy.value.localId, quantity: 100, pricePerKg: 30 }],
    });
    await rejectRecord('mut-3', 'Duplicate transaction number');

    const resolved = await resolveConflict(ctx.deps, remote, 'mut-3', 'keep_server');

    expect(resolved.ok).toBe(false);
    if (resolved.ok) return;
    expect(resolved.error.message).toBe('Only customers and inventory items can take the server copy');
  });

  it('refuses the server copy while other changes to the item are unsynced', async () => {
    const localId = await ctx.db.inventoryItems.add({
      type: 'paddy',
      variety: 'Sona',
      currentQuantity: 0,
      currentBags: 0,
      averagePricePerKg: 0,
      minQuantity: 0,
      _serverId: 'item-1',
      _syncStatus: 'synced',
      _isDeleted: false,
      createdAt: EARLIER,
      updatedAt: EARLIER,
    });
    await updateInventoryItem(ctx.deps, localId, { minQuantity: 10 });
    await adjustStock(ctx.deps, localId, { newQuantity: 5, newBags: 0, reason: 'Found a bag' });
    await rejectRecord('mut-1', 'Edited elsewhere');
    remote.on('GET', '/inventory/item-1', () =>
      success({ item: { id: 'item-1', type: 'paddy', variety: 'Sona', currentQuantity: 0, updatedAt: EARLIER } })
    );

    const resolved = await resolveConflict(ctx.deps, remote, 'mut-1', 'keep_server');

    expect(resolved.ok).toBe(false);
    if (resolved.ok) return;
    expect(resolved.error.message).toBe(`inventory ${localId} has other unsynced changes`);
    expect((await ctx.db.inventoryItems.get(localId))?.currentQuantity).toBe(5);
    expect(await ctx.db.mutations.count()).toBe(2);
  });
});
