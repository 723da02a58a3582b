import { AuthFailure, ServerFailure } from '@/lib/errors';
import {
  createTestContext,
  destroyTestContext,
  failure,
  FakeRemote,
  START,
  success,
  type TestContext,
} from '@/test/helpers';
import type { LocalCustomer, LocalInventoryItem, NewRow } from '../db';
import type { NewMutationRecord } from '../mutation-record';
import { pullCursorKey, pullRemoteChanges } from '../pull';
import { verifyStockLedger } from '../stock-ledger';

const EARLIER = '2024-03-01T07:00:00.000Z';
const LATER = '2024-03-01T09:00:00.000Z';

function localCustomer(overrides: Partial<NewRow<LocalCustomer>> = {}): NewRow<LocalCustomer> {
  return {
    name: 'Ravi',
    phone: '9845012345',
    type: 'farmer',
    balance: -200,
    totalPurchases: 200,
    totalSales: 0,
    _serverId: 'cust-1',
    _syncStatus: 'synced',
    _isDeleted: false,
    createdAt: EARLIER,
    updatedAt: START.toISOString(),
    ...overrides,
  };
}

function localItem(overrides: Partial<NewRow<LocalInventoryItem>> = {}): NewRow<LocalInventoryItem> {
  return {
    type: 'rice',
    variety: 'Sona',
    currentQuantity: 0,
    currentBags: 0,
    averagePricePerKg: 0,
    minQuantity: 0,
    _serverId: 'item-1',
    _syncStatus: 'synced',
    _isDeleted: false,
    createdAt: EARLIER,
    updatedAt: START.toISOString(),
    ...overrides,
  };
}

function openRecord(overrides: Partial<NewMutationRecord>): NewMutationRecord {
  return {
    id: 'open-1',
    entityType: 'transaction',
    entityId: 99,
    entityServerId: null,
    operation: 'create',
    payloadKind: 'transaction',
    payloadJson: '{}',
    status: 'pending',
    priority: 'normal',
    retryCount: 0,
    maxRetries: 3,
    lastAttemptAt: null,
    nextRetryAt: null,
    errorMessage: null,
    syncedAt: null,
    createdAt: START.toISOString(),
    updatedAt: START.toISOString(),
    ...overrides,
  };
}

describe('pullRemoteChanges', () => {
  let ctx: TestContext;
  let remote: FakeRemote;

  beforeEach(() => {
    ctx = createTestContext();
    remote = new FakeRemote();
  });

  afterEach(async () => {
    await destroyTestContext(ctx);
  });

  // ─── Customers ─────────────────────────────────────────

  it('inserts unknown customers and moves the cursor', async () => {
    remote.on('GET', '/customers/updates', () =>
      success([
        {
          id: 42,
          name: 'Suma Rice Traders',
          phone: '+91 98450 54321',
          type: 'trader',
          balance: '1500.50',
          totalSales: '1500.50',
          updatedAt: EARLIER,
        },
      ])
    );

    const summary = await pullRemoteChanges(ctx.deps, remote);

    expect(summary).toEqual({ applied: 1, authRequired: false });
    const [customer] = await ctx.db.customers.toArray();
    expect(customer).toMatchObject({
      _serverId: '42',
      _syncStatus: 'synced',
      name: 'Suma Rice Traders',
      phone: '919845054321',
      balance: 1500.5,
      totalPurchases: 0,
      totalSales: 1500.5,
      updatedAt: EARLIER,
    });
    expect(await ctx.db.syncMeta.get(pullCursorKey('customers'))).toEqual({
      key: 'lastPullAt:customers',
      value: '2024-03-01T08:00:00.000Z',
    });
    expect(remote.calls.map((call) => call.path)).toEqual([
      '/customers/updates',
      '/inventory/updates',
      '/transactions/updates',
    ]);
  });

  it('asks only for changes since the last pull', async () => {
    await pullRemoteChanges(ctx.deps, remote);
    ctx.time.advanceMinutes(5);

    await pullRemoteChanges(ctx.deps, remote);

    expect(remote.calls[3]?.path).toBe('/customers/updates?since=2024-03-01T08%3A00%3A00.000Z');
  });

  it('keeps the newer side of an edit', async () => {
    const localId = await ctx.db.customers.add(localCustomer());
    remote.on('GET', '/customers/updates', () =>
      success({ customers: [{ id: 'cust-1', name: 'Old name', phone: '9845012345', updatedAt: EARLIER }] })
    );

    expect((await pullRemoteChanges(ctx.deps, remote)).applied).toBe(0);
    expect((await ctx.db.customers.get(localId))?.name).toBe('Ravi');

    remote.on('GET', /^\/customers\/updates/, () =>
      success({ data: [{ id: 'cust-1', name: 'Ravi Kumar', phone: '9845012345', balance: 300, updatedAt: LATER }] })
    );

    expect((await pullRemoteChanges(ctx.deps, remote)).applied).toBe(1);
    expect(await ctx.db.customers.get(localId)).toMatchObject({ name: 'Ravi Kumar', balance: 300, updatedAt: LATER });
  });

  it('never overwrites an entity with unconfirmed local changes', async () => {
    const localId = await ctx.db.customers.add(localCustomer({ _syncStatus: 'pending' }));
    await ctx.db.mutations.add(
      openRecord({ entityType: 'customer', entityId: localId, payloadKind: 'customer', operation: 'update' })
    );
    remote.on('GET', '/customers/updates', () =>
      success([{ id: 'cust-1', name: 'Remote name', phone: '9845012345', updatedAt: LATER }])
    );

    expect((await pullRemoteChanges(ctx.deps, remote)).applied).toBe(0);
    expect((await ctx.db.customers.get(localId))?.name).toBe('Ravi');
  });

  it('keeps local balances while transactions are still unconfirmed', async () => {
    const localId = await ctx.db.customers.add(localCustomer());
    await ctx.db.mutations.add(openRecord({}));
    remote.on('GET', '/customers/updates', () =>
      success([{ id: 'cust-1', name: 'Ravi K', phone: '9845012345', balance: 999, updatedAt: LATER }])
    );

    await pullRemoteChanges(ctx.deps, remote);

    expect(await ctx.db.customers.get(localId)).toMatchObject({ name: 'Ravi K', balance: -200, totalPurchases: 200 });
  });

  it('removes customers the remote deleted', async () => {
    const localId = await ctx.db.customers.add(localCustomer());
    remote.on('GET', '/customers/updates', () =>
      success([{ id: 'cust-1', name: 'Ravi', phone: '9845012345', isDeleted: true, updatedAt: LATER }])
    );

    await pullRemoteChanges(ctx.deps, remote);

    expect(await ctx.db.customers.get(localId)).toBeUndefined();
  });

  it('skips malformed rows and applies the rest', async () => {
    remote.on('GET', '/customers/updates', () =>
      success([
        { id: 'cust-1', phone: '9845012345', updatedAt: LATER },
        { id: 'cust-2', name: 'Suma', phone: '9845054321', updatedAt: LATER },
      ])
    );

    expect((await pullRemoteChanges(ctx.deps, remote)).applied).toBe(1);
    expect((await ctx.db.customers.toArray()).map((customer) => customer._serverId)).toEqual(['cust-2']);
  });

  // ─── Inventory ─────────────────────────────────────────

  it('brings a new item to the remote level through a reconcile movement', async () => {
    remote.on('GET', '/inventory/updates', () =>
      success({
        items: [
          {
            id: 'item-5',
            type: 'paddy',
            variety: 'Ponni',
            currentQuantity: '750.500',
            currentBags: 15,
            averagePricePerKg: '31.25',
            minQuantity: '100',
            updatedAt: EARLIER,
          },
        ],
      })
    );

    await pullRemoteChanges(ctx.deps, remote);

    const [item] = await ctx.db.inventoryItems.toArray();
    expect(item).toMatchObject({
      _serverId: 'item-5',
      currentQuantity: 750.5,
      currentBags: 15,
      averagePricePerKg: 31.25,
      minQuantity: 100,
      updatedAt: EARLIER,
    });
    const [movement] = await ctx.db.stockMovements.toArray();
    expect(movement).toMatchObject({
      movementType: 'remote_reconcile',
      quantityDelta: 750.5,
      bagsDelta: 15,
      notes: 'Remote level 750.5 kg',
    });
    expect((await verifyStockLedger(ctx.db, item?.localId ?? 0))?.consistent).toBe(true);
    expect(await ctx.db.mutations.count()).toBe(0);
  });

  it('skips an item with a negative stock level without holding back the cursor', async () => {
    remote.on('GET', '/inventory/updates', () =>
      success([
        { id: 'item-6', type: 'paddy', variety: 'Ponni', currentQuantity: -5, updatedAt: EARLIER },
        { id: 'item-7', type: 'paddy', variety: 'Sona', currentQuantity: 'not a number', updatedAt: EARLIER },
        { id: 'item-5', type: 'rice', variety: 'Sona', currentQuantity: 40, currentBags: 1, updatedAt: EARLIER },
      ])
    );

    const summary = await pullRemoteChanges(ctx.deps, remote);

    expect(summary).toEqual({ applied: 1, authRequired: false });
    const items = await ctx.db.inventoryItems.toArray();
    expect(items.map((item) => [item._serverId, item.currentQuantity])).toEqual([['item-5', 40]]);
    expect(await ctx.db.syncMeta.get(pullCursorKey('inventoryItems'))).toEqual({
      key: 'lastPullAt:inventoryItems',
      value: '2024-03-01T08:00:00.000Z',
    });
  });

  it('reconciles a known item by the difference only', async () => {
    const localId = await ctx.db.inventoryItems.add(localItem({ currentQuantity: 500, currentBags: 10 }));
    await ctx.db.stockMovements.add({
      inventoryItemLocalId: localId,
      movementType: 'initial',
      quantityDelta: 500,
      bagsDelta: 10,
      createdAt: EARLIER,
    });
    remote.on('GET', '/inventory/updates', () =>
      success([{ id: 'item-1', type: 'rice', variety: 'Sona', currentQuantity: 480, currentBags: 10, updatedAt: LATER }])
    );

    await pullRemoteChanges(ctx.deps, remote);

    const movements = await ctx.db.stockMovements.toArray();
    expect(movements[1]).toMatchObject({ movementType: 'remote_reconcile', quantityDelta: -20, bagsDelta: 0 });
    expect((await verifyStockLedger(ctx.db, localId))?.derivedQuantity).toBe(480);
  });

  // ─── Transactions ──────────────────────────────────────

  it('stores remote transactions whose references are known', async () => {
    const customerId = await ctx.db.customers.add(localCustomer());
    const itemId = await ctx.db.inventoryItems.add(localItem({ currentQuantity: 80 }));
    const remoteTransaction = {
      id: 'txn-7',
      transactionNumber: 'SELL-20240301-0007',
      type: 'sell',
      customerId: 'cust-1',
      customerName: 'Ravi',
      subtotal: '1100.00',
      totalAmount: '1100.00',
      paidAmount: '100',
      dueAmount: '1000',
      paymentStatus: 'partial',
      transactionDate: EARLIER,
      updatedAt: EARLIER,
      items: [
        {
          id: 'line-9',
          inventoryItemId: 'item-1',
          itemType: 'rice',
          variety: 'Sona',
          bags: 2,
          quantity: '20',
          pricePerKg: '55',
          totalAmount: '1100',
        },
      ],
    };
    remote.on('GET', '/transactions/updates', () =>
      success([remoteTransaction, { ...remoteTransaction, id: 'txn-8', customerId: 'cust-404' }])
    );

    expect((await pullRemoteChanges(ctx.deps, remote)).applied).toBe(1);

    const [transaction] = await ctx.db.transactions.toArray();
    expect(transaction).toMatchObject({
      _serverId: 'txn-7',
      customerLocalId: customerId,
      status: 'completed',
      totalAmount: 1100,
      dueAmount: 1000,
      paymentStatus: 'partial',
    });
    const [line] = await ctx.db.transactionItems.toArray();
    expect(line).toMatchObject({ _serverId: 'line-9', inventoryItemLocalId: itemId, quantity: 20, bags: 2 });
    expect((await ctx.db.inventoryItems.get(itemId))?.currentQuantity).toBe(80);
  });

  // ─── Failures ──────────────────────────────────────────

  it('stops at an expired session', async () => {
    remote.on('GET', '/customers/updates', () => failure(new AuthFailure()));

    expect(await pullRemoteChanges(ctx.deps, remote)).toEqual({ applied: 0, authRequired: true });
    expect(remote.calls).toHaveLength(1);
  });

  it('keeps the cursor of a collection that failed and moves on', async () => {
    remote.on('GET', '/customers/updates', () => failure(new ServerFailure('Bad gateway', 502)));

    await pullRemoteChanges(ctx.deps, remote);

    expect(remote.calls).toHaveLength(3);
    expect(await ctx.db.syncMeta.get(pullCursorKey('customers'))).toBeUndefined();
    expect((await ctx.db.syncMeta.get(pullCursorKey('inventoryItems')))?.value).toBe('2024-03-01T08:00:00.000Z');
  });
});
