/**
 * Read-side queries over the local ledger. Soft-deleted rows never appear.
 */

import type { TransactionView } from './actions';
import type { ItemType, LedgerDatabase, LocalCustomer, LocalInventoryItem, StockMovement } from './db';
import { roundMoney, roundQuantity } from './stock-ledger';

const SEARCH_LIMIT = 50;
const MOVEMENT_HISTORY_LIMIT = 100;

// ─── Customers ───────────────────────────────────────────

/**
 * Case-insensitive match on name, address or phone. A query containing
 * digits also matches phones regardless of spacing or punctuation.
 */
export async function searchCustomers(
  db: LedgerDatabase,
  query: string,
  limit = SEARCH_LIMIT
): Promise<LocalCustomer[]> {
  const needle = query.trim().toLowerCase();
  if (!needle) return [];
  const digits = needle.replace(/\D/g, '');

  const matches = await db.customers
    .filter(
      (customer) =>
        !customer._isDeleted &&
        (customer.name.toLowerCase().includes(needle) ||
          (customer.address ?? '').toLowerCase().includes(needle) ||
          (digits.length > 0 && customer.phone.includes(digits)))
    )
    .toArray();

  return matches.sort((a, b) => a.name.localeCompare(b.name)).slice(0, limit);
}

/** Newest first, each with its lines. Cancelled documents stay in the history. */
export async function getCustomerTransactions(
  db: LedgerDatabase,
  customerLocalId: number
): Promise<TransactionView[]> {
  const transactions = await db.transactions
    .where('customerLocalId')
    .equals(customerLocalId)
    .filter((transaction) => !transaction._isDeleted)
    .toArray();
  transactions.sort((a, b) => b.transactionDate.localeCompare(a.transactionDate) || b.localId - a.localId);

  const views: TransactionView[] = [];
  for (const transaction of transactions) {
    const items = await db.transactionItems.where('transactionLocalId').equals(transaction.localId).sortBy('localId');
    views.push({ transaction, items });
  }
  return views;
}

// ─── Inventory ───────────────────────────────────────────

export function isLowStock(item: Pick<LocalInventoryItem, 'currentQuantity' | 'minQuantity'>): boolean {
  return item.minQuantity > 0 && item.currentQuantity <= item.minQuantity;
}

/** Items at or below their minimum, emptiest first. Items without a minimum never qualify. */
export async function getLowStockItems(db: LedgerDatabase): Promise<LocalInventoryItem[]> {
  const items = await db.inventoryItems.filter((item) => !item._isDeleted && isLowStock(item)).toArray();
  return items.sort((a, b) => a.currentQuantity - b.currentQuantity || a.localId - b.localId);
}

/** Most recent movement first. */
export async function getStockMovementHistory(
  db: LedgerDatabase,
  inventoryItemLocalId: number,
  limit = MOVEMENT_HISTORY_LIMIT
): Promise<StockMovement[]> {
  const movements = await db.stockMovements
    .where('inventoryItemLocalId')
    .equals(inventoryItemLocalId)
    .reverse()
    .sortBy('localId');
  return movements.slice(0, limit);
}

export interface StockTotals {
  quantity: number;
  bags: number;
  /** quantity × averagePricePerKg, summed per item */
  value: number;
}

export interface InventorySummary {
  itemCount: number;
  lowStockCount: number;
  totalValue: number;
  byType: Record<ItemType, StockTotals>;
}

function emptyTotals(): StockTotals {
  return { quantity: 0, bags: 0, value: 0 };
}

export async function getInventorySummary(db: LedgerDatabase): Promise<InventorySummary> {
  const items = await db.inventoryItems.filter((item) => !item._isDeleted).toArray();

  const byType: Record<ItemType, StockTotals> = {
    paddy: emptyTotals(),
    rice: emptyTotals(),
    bran: emptyTotals(),
    husk: emptyTotals(),
  };
  let totalValue = 0;
  let lowStockCount = 0;

  for (const item of items) {
    const totals = byType[item.type];
    const value = roundMoney(item.currentQuantity * item.averagePricePerKg);
    totals.quantity = roundQuantity(totals.quantity + item.currentQuantity);
    totals.bags += item.currentBags;
    totals.value = roundMoney(totals.value + value);
    totalValue = roundMoney(totalValue + value);
    if (isLowStock(item)) lowStockCount++;
  }

  return { itemCount: items.length, lowStockCount, totalValue, byType };
}
