import { createTestContext, destroyTestContext, type TestContext } from '@/test/helpers';
import {
  clearLocalDB,
  getEntitiesUpdatedAfter,
  getUnsyncedEntities,
  isSynced,
  type LocalCustomer,
  type NewRow,
  type SyncStatus,
} from '../db';

function customer(phone: string, status: SyncStatus, updatedAt: string): NewRow<LocalCustomer> {
  return {
    name: `Customer ${phone.slice(-2)}`,
    phone,
    type: 'farmer',
    balance: 0,
    totalPurchases: 0,
    totalSales: 0,
    _syncStatus: status,
    _isDeleted: false,
    createdAt: '2024-03-01T06:00:00.000Z',
    updatedAt,
  };
}

describe('ledger queries', () => {
  let ctx: TestContext;

  beforeEach(async () => {
    ctx = createTestContext();
    await ctx.db.customers.bulkAdd([
      customer('9845000001', 'synced', '2024-03-01T09:00:00.000Z'),
      customer('9845000002', 'conflict', '2024-03-01T07:00:00.000Z'),
      customer('9845000003', 'pending', '2024-03-01T08:00:00.000Z'),
      customer('9845000004', 'synced', '2024-03-01T10:00:00.000Z'),
    ]);
  });

  afterEach(async () => {
    await destroyTestContext(ctx);
  });

  it('tells synced rows apart', () => {
    expect(isSynced({ _syncStatus: 'synced' })).toBe(true);
    expect(isSynced({ _syncStatus: 'failed' })).toBe(false);
  });

  it('lists rows with unconfirmed changes in insertion order', async () => {
    const rows = await getUnsyncedEntities(ctx.db, 'customers');
    expect(rows.map((row) => row.phone)).toEqual(['9845000002', '9845000003']);
  });

  it('lists rows changed strictly after a timestamp, oldest first', async () => {
    const rows = await getEntitiesUpdatedAfter(ctx.db, 'customers', '2024-03-01T08:00:00.000Z');
    expect(rows.map((row) => row.phone)).toEqual(['9845000001', '9845000004']);
  });

  it('clears every table', async () => {
    await ctx.db.syncMeta.put({ key: 'lastPullAt:customers', value: '2024-03-01T08:00:00.000Z' });

    await clearLocalDB(ctx.db);

    expect(await ctx.db.customers.count()).toBe(0);
    expect(await ctx.db.syncMeta.count()).toBe(0);
  });
});
