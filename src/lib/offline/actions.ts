/**
 * OFFLINE ACTIONS: Optimistic Local Mutations
 *
 * Each action:
 *   1. Validates its input (nothing is written on a validation failure)
 *   2. Writes the ledger rows and stock movements in one transaction
 *   3. Enqueues the mutation records that replay it, in that same transaction
 *   4. Returns the local state (no await on the remote)
 *
 * Callers use THESE functions, never the remote API directly.
 * The sync engine handles remote communication.
 */

import { z } from 'zod';
import {
  InsufficientStockFailure,
  NotFoundFailure,
  ValidationFailure,
  err,
  isFailure,
  ok,
  toFailure,
  type Result,
} from '@/lib/errors';
import { ledgerLogger as log } from '@/lib/logger';
import { withLedgerTransaction, type LedgerTx, type OfflineDeps } from './context';
import {
  CUSTOMER_TYPES,
  ITEM_TYPES,
  PAYMENT_METHODS,
  type LedgerDatabase,
  type LocalCustomer,
  type LocalInventoryItem,
  type LocalMillingRecord,
  type LocalPayment,
  type LocalTransaction,
  type LocalTransactionItem,
  type NewRow,
  type PaymentStatus,
  type TransactionType,
} from './db';
import {
  customerSnapshot,
  inventoryItemSnapshot,
  millingSnapshot,
  paymentSnapshot,
  transactionSnapshot,
} from './payloads';
import {
  assertBagsAvailable,
  findShortfalls,
  itemName,
  recordStockMovement,
  roundMoney,
  roundQuantity,
} from './stock-ledger';
import { enqueueMutation } from './sync-queue';

const MONEY_EPSILON = 0.005;

// ─── Helpers ─────────────────────────────────────────────

function validate<S extends z.ZodTypeAny>(schema: S, input: unknown): Result<z.output<S>, ValidationFailure> {
  const parsed = schema.safeParse(input);
  if (parsed.success) return ok(parsed.data);

  const [first] = parsed.error.issues;
  return err(
    new ValidationFailure(first ? first.message : 'Invalid input', {
      field: first ? first.path.join('.') : undefined,
      details: parsed.error.issues,
    })
  );
}

/** One unit of work; failures come back as values, never as throws. */
async function runOperation<T>(
  deps: OfflineDeps,
  operation: string,
  work: (tx: LedgerTx) => Promise<T>
): Promise<Result<T>> {
  try {
    return ok(await withLedgerTransaction(deps, work));
  } catch (error) {
    if (isFailure(error)) {
      log.info({ operation, code: error.code, reason: error.message }, 'Operation rejected');
      return err(error);
    }
    log.error({ err: error, operation }, 'Operation failed');
    return err(toFailure(error));
  }
}

export function normalizePhone(phone: string): string {
  return phone.replace(/\D/g, '');
}

async function getLiveCustomer(tx: LedgerTx, localId: number): Promise<LocalCustomer> {
  const customer = await tx.db.customers.get(localId);
  if (!customer || customer._isDeleted) throw new NotFoundFailure('Customer', localId);
  return customer;
}

async function getLiveItem(tx: LedgerTx, localId: number): Promise<LocalInventoryItem> {
  const item = await tx.db.inventoryItems.get(localId);
  if (!item || item._isDeleted) throw new NotFoundFailure('Inventory item', localId);
  return item;
}

async function getLiveItems(tx: LedgerTx, localIds: readonly number[]): Promise<Map<number, LocalInventoryItem>> {
  const items = new Map<number, LocalInventoryItem>();
  for (const localId of localIds) {
    if (!items.has(localId)) items.set(localId, await getLiveItem(tx, localId));
  }
  return items;
}

async function getLiveTransaction(tx: LedgerTx, localId: number): Promise<LocalTransaction> {
  const transaction = await tx.db.transactions.get(localId);
  if (!transaction || transaction._isDeleted) throw new NotFoundFailure('Transaction', localId);
  return transaction;
}

function derivePaymentStatus(totalAmount: number, paidAmount: number): PaymentStatus {
  if (paidAmount >= totalAmount - MONEY_EPSILON) return 'completed';
  if (paidAmount > 0) return 'partial';
  return 'pending';
}

// ─── Customer Actions ────────────────────────────────────

const phoneSchema = z
  .string()
  .transform(normalizePhone)
  .pipe(z.string().regex(/^\d{10,15}$/, 'Phone number must have 10 to 15 digits'));

const createCustomerSchema = z.object({
  name: z.string().trim().min(1, 'Name is required').max(100),
  phone: phoneSchema,
  address: z.string().trim().max(250).optional(),
  type: z.enum(CUSTOMER_TYPES).default('farmer'),
});

const updateCustomerSchema = z.object({
  name: z.string().trim().min(1, 'Name is required').max(100).optional(),
  phone: phoneSchema.optional(),
  address: z.string().trim().max(250).optional(),
  type: z.enum(CUSTOMER_TYPES).optional(),
});

export type CreateCustomerInput = z.input<typeof createCustomerSchema>;
export type UpdateCustomerInput = z.input<typeof updateCustomerSchema>;

async function assertUniquePhone(db: LedgerDatabase, phone: string, exceptLocalId?: number): Promise<void> {
  const duplicate = await db.customers
    .where('phone')
    .equals(phone)
    .filter((c) => !c._isDeleted && c.localId !== exceptLocalId)
    .first();
  if (duplicate) {
    throw new ValidationFailure('A customer with this phone number already exists', { field: 'phone' });
  }
}

export async function createCustomer(deps: OfflineDeps, input: CreateCustomerInput): Promise<Result<LocalCustomer>> {
  const parsed = validate(createCustomerSchema, input);
  if (!parsed.ok) return parsed;
  const data = parsed.value;

  return runOperation(deps, 'createCustomer', async (tx) => {
    await assertUniquePhone(tx.db, data.phone);

    const nowIso = tx.now.toISOString();
    const row: NewRow<LocalCustomer> = {
      name: data.name,
      phone: data.phone,
      address: data.address,
      type: data.type,
      balance: 0,
      totalPurchases: 0,
      totalSales: 0,
      _syncStatus: 'pending',
      _isDeleted: false,
      createdAt: nowIso,
      updatedAt: nowIso,
    };
    const localId = await tx.db.customers.add(row);
    const customer: LocalCustomer = { ...row, localId };

    await enqueueMutation(tx, {
      entityType: 'customer',
      entityId: localId,
      operation: 'create',
      payload: customerSnapshot(customer),
    });
    return customer;
  });
}

export async function updateCustomer(
  deps: OfflineDeps,
  localId: number,
  changes: UpdateCustomerInput
): Promise<Result<LocalCustomer>> {
  const parsed = validate(updateCustomerSchema, changes);
  if (!parsed.ok) return parsed;
  const data = parsed.value;

  return runOperation(deps, 'updateCustomer', async (tx) => {
    const existing = await getLiveCustomer(tx, localId);
    if (data.phone !== undefined && data.phone !== existing.phone) {
      await assertUniquePhone(tx.db, data.phone, localId);
    }

    const customer: LocalCustomer = {
      ...existing,
      name: data.name ?? existing.name,
      phone: data.phone ?? existing.phone,
      address: data.address ?? existing.address,
      type: data.type ?? existing.type,
      _syncStatus: 'pending',
      updatedAt: tx.now.toISOString(),
    };
    await tx.db.customers.put(customer);

    await enqueueMutation(tx, {
      entityType: 'customer',
      entityId: localId,
      operation: 'update',
      entityServerId: customer._serverId ?? null,
      payload: customerSnapshot(customer),
    });
    return customer;
  });
}

/** Soft delete; the row is removed once the remote confirms. */
export async function deleteCustomer(deps: OfflineDeps, localId: number): Promise<Result<LocalCustomer>> {
  return runOperation(deps, 'deleteCustomer', async (tx) => {
    const existing = await getLiveCustomer(tx, localId);
    if (Math.abs(existing.balance) > MONEY_EPSILON) {
      throw new ValidationFailure('Cannot delete a customer with an outstanding balance', { field: 'balance' });
    }

    const customer: LocalCustomer = {
      ...existing,
      _isDeleted: true,
      _syncStatus: 'pending',
      updatedAt: tx.now.toISOString(),
    };
    await tx.db.customers.put(customer);

    await enqueueMutation(tx, {
      entityType: 'customer',
      entityId: localId,
      operation: 'delete',
      entityServerId: customer._serverId ?? null,
      payload: customerSnapshot(customer),
    });
    return customer;
  });
}

// ─── Inventory Actions ───────────────────────────────────

const createItemSchema = z.object({
  type: z.enum(ITEM_TYPES),
  variety: z.string().trim().min(1, 'Variety is required').max(100),
  minQuantity: z.number().min(0).default(0),
  openingQuantity: z.number().min(0).default(0),
  openingBags: z.number().int().min(0).default(0),
  openingPricePerKg: z.number().min(0).default(0),
});

const updateItemSchema = z.object({
  variety: z.string().trim().min(1, 'Variety is required').max(100).optional(),
  minQuantity: z.number().min(0).optional(),
});

const adjustStockSchema = z.object({
  newQuantity: z.number().min(0, 'Quantity cannot be negative'),
  newBags: z.number().int().min(0, 'Bags cannot be negative'),
  reason: z.string().trim().min(1, 'A reason is required for stock adjustments'),
});

export type CreateInventoryItemInput = z.input<typeof createItemSchema>;
export type UpdateInventoryItemInput = z.input<typeof updateItemSchema>;
export type AdjustStockInput = z.input<typeof adjustStockSchema>;

async function assertUniqueVariety(
  db: LedgerDatabase,
  type: LocalInventoryItem['type'],
  variety: string,
  exceptLocalId?: number
): Promise<void> {
  const wanted = variety.toLowerCase();
  const duplicate = await db.inventoryItems
    .where('type')
    .equals(type)
    .filter((i) => !i._isDeleted && i.localId !== exceptLocalId && i.variety.toLowerCase() === wanted)
    .first();
  if (duplicate) {
    throw new ValidationFailure(`${variety} ${type} already exists`, { field: 'variety' });
  }
}

export async function createInventoryItem(
  deps: OfflineDeps,
  input: CreateInventoryItemInput
): Promise<Result<LocalInventoryItem>> {
  const parsed = validate(createItemSchema, input);
  if (!parsed.ok) return parsed;
  const data = parsed.value;

  return runOperation(deps, 'createInventoryItem', async (tx) => {
    await assertUniqueVariety(tx.db, data.type, data.variety);

    const nowIso = tx.now.toISOString();
    const row: NewRow<LocalInventoryItem> = {
      type: data.type,
      variety: data.variety,
      currentQuantity: 0,
      currentBags: 0,
      averagePricePerKg: 0,
      minQuantity: data.minQuantity,
      _syncStatus: 'pending',
      _isDeleted: false,
      createdAt: nowIso,
      updatedAt: nowIso,
    };
    const localId = await tx.db.inventoryItems.add(row);
    let item: LocalInventoryItem = { ...row, localId };

    await enqueueMutation(tx, {
      entityType: 'inventory',
      entityId: localId,
      operation: 'create',
      payload: inventoryItemSnapshot(item),
    });

    if (data.openingQuantity > 0 || data.openingBags > 0) {
      const applied = await recordStockMovement(tx, item, {
        movementType: 'initial',
        quantityDelta: data.openingQuantity,
        bagsDelta: data.openingBags,
        pricePerKg: data.openingPricePerKg,
        notes: 'Opening stock',
      });
      item = applied.item;
    }
    return item;
  });
}

export async function updateInventoryItem(
  deps: OfflineDeps,
  localId: number,
  changes: UpdateInventoryItemInput
): Promise<Result<LocalInventoryItem>> {
  const parsed = validate(updateItemSchema, changes);
  if (!parsed.ok) return parsed;
  const data = parsed.value;

  return runOperation(deps, 'updateInventoryItem', async (tx) => {
    const existing = await getLiveItem(tx, localId);
    if (data.variety !== undefined && data.variety.toLowerCase() !== existing.variety.toLowerCase()) {
      await assertUniqueVariety(tx.db, existing.type, data.variety, localId);
    }

    const item: LocalInventoryItem = {
      ...existing,
      variety: data.variety ?? existing.variety,
      minQuantity: data.minQuantity ?? existing.minQuantity,
      _syncStatus: 'pending',
      updatedAt: tx.now.toISOString(),
    };
    await tx.db.inventoryItems.put(item);

    await enqueueMutation(tx, {
      entityType: 'inventory',
      entityId: localId,
      operation: 'update',
      entityServerId: item._serverId ?? null,
      payload: inventoryItemSnapshot(item),
    });
    return item;
  });
}

/** Only an empty item can be deleted. */
export async function deleteInventoryItem(deps: OfflineDeps, localId: number): Promise<Result<LocalInventoryItem>> {
  return runOperation(deps, 'deleteInventoryItem', async (tx) => {
    const existing = await getLiveItem(tx, localId);
    if (existing.currentQuantity > 0) {
      throw new ValidationFailure(
        `Cannot delete ${existing.variety} ${existing.type} while ${existing.currentQuantity} kg remain in stock`,
        { field: 'currentQuantity' }
      );
    }

    const item: LocalInventoryItem = {
      ...existing,
      _isDeleted: true,
      _syncStatus: 'pending',
      updatedAt: tx.now.toISOString(),
    };
    await tx.db.inventoryItems.put(item);

    await enqueueMutation(tx, {
      entityType: 'inventory',
      entityId: localId,
      operation: 'delete',
      entityServerId: item._serverId ?? null,
      payload: inventoryItemSnapshot(item),
    });
    return item;
  });
}

/** Set stock to a counted level; the difference becomes an adjustment movement. */
export async function adjustStock(
  deps: OfflineDeps,
  localId: number,
  input: AdjustStockInput
): Promise<Result<LocalInventoryItem>> {
  const parsed = validate(adjustStockSchema, input);
  if (!parsed.ok) return parsed;
  const data = parsed.value;

  return runOperation(deps, 'adjustStock', async (tx) => {
    const item = await getLiveItem(tx, localId);
    const quantityDelta = roundQuantity(data.newQuantity - item.currentQuantity);
    const bagsDelta = data.newBags - item.currentBags;
    if (quantityDelta === 0 && bagsDelta === 0) {
      throw new ValidationFailure('Stock already matches the counted quantity', { field: 'newQuantity' });
    }

    const applied = await recordStockMovement(tx, item, {
      movementType: 'adjustment',
      quantityDelta,
      bagsDelta,
      referenceType: 'adjustment',
      notes: data.reason,
    });
    return applied.item;
  });
}

// ─── Transaction Actions ─────────────────────────────────

const transactionLineSchema = z.object({
  inventoryItemLocalId: z.number().int().positive(),
  quantity: z.number().positive('Quantity must be greater than zero'),
  bags: z.number().int().min(0).default(0),
  pricePerKg: z.number().min(0, 'Price cannot be negative'),
});

const createTransactionSchema = z.object({
  customerLocalId: z.number().int().positive(),
  items: z.array(transactionLineSchema).min(1, 'At least one item is required'),
  discount: z.number().min(0).default(0),
  paidAmount: z.number().min(0).default(0),
  paymentMethod: z.enum(PAYMENT_METHODS).optional(),
  notes: z.string().trim().max(500).optional(),
  transactionDate: z.string().datetime().optional(),
});

export type CreateTransactionInput = z.input<typeof createTransactionSchema>;
type TransactionLine = z.output<typeof transactionLineSchema>;

export interface TransactionView {
  transaction: LocalTransaction;
  items: LocalTransactionItem[];
}

interface TransactionTotals {
  lineTotals: number[];
  subtotal: number;
  totalAmount: number;
  paidAmount: number;
  dueAmount: number;
}

function computeTotals(lines: readonly TransactionLine[], discount: number, paidAmount: number): TransactionTotals {
  const lineTotals = lines.map((line) => roundMoney(line.quantity * line.pricePerKg));
  const subtotal = roundMoney(lineTotals.reduce((sum, total) => sum + total, 0));
  if (discount > subtotal + MONEY_EPSILON) {
    throw new ValidationFailure('Discount cannot exceed the subtotal', { field: 'discount' });
  }
  const totalAmount = roundMoney(subtotal - discount);
  if (paidAmount > totalAmount + MONEY_EPSILON) {
    throw new ValidationFailure('Paid amount cannot exceed the total amount', { field: 'paidAmount' });
  }
  return { lineTotals, subtotal, totalAmount, paidAmount, dueAmount: roundMoney(totalAmount - paidAmount) };
}

function formatDateKey(date: Date): string {
  return date.toISOString().slice(0, 10).replace(/-/g, '');
}

/** BUY-YYYYMMDD-NNNN / SELL-YYYYMMDD-NNNN, counting per day and type. */
export async function generateTransactionNumber(
  db: LedgerDatabase,
  type: TransactionType,
  date: Date
): Promise<string> {
  const prefix = `${type === 'buy' ? 'BUY' : 'SELL'}-${formatDateKey(date)}-`;
  const existing = await db.transactions.where('transactionNumber').startsWith(prefix).toArray();

  let highest = 0;
  for (const transaction of existing) {
    const sequence = Number.parseInt(transaction.transactionNumber.slice(prefix.length), 10);
    if (Number.isFinite(sequence) && sequence > highest) highest = sequence;
  }
  return `${prefix}${String(highest + 1).padStart(4, '0')}`;
}

async function createTransaction(
  deps: OfflineDeps,
  type: TransactionType,
  input: CreateTransactionInput
): Promise<Result<TransactionView>> {
  const parsed = validate(createTransactionSchema, input);
  if (!parsed.ok) return parsed;
  const data = parsed.value;
  const operation = type === 'buy' ? 'createBuyTransaction' : 'createSellTransaction';

  return runOperation(deps, operation, async (tx) => {
    const customer = await getLiveCustomer(tx, data.customerLocalId);
    const items = await getLiveItems(
      tx,
      data.items.map((line) => line.inventoryItemLocalId)
    );

    // Every line is checked before anything is written.
    if (type === 'sell') {
      const shortfalls = findShortfalls(data.items, items);
      if (shortfalls.length > 0) throw new InsufficientStockFailure(shortfalls);
      assertBagsAvailable(data.items, items);
    }
    const totals = computeTotals(data.items, data.discount, data.paidAmount);

    const nowIso = tx.now.toISOString();
    const row: NewRow<LocalTransaction> = {
      transactionNumber: await generateTransactionNumber(tx.db, type, tx.now),
      type,
      status: 'completed',
      customerLocalId: customer.localId,
      customerName: customer.name,
      subtotal: totals.subtotal,
      discount: data.discount,
      totalAmount: totals.totalAmount,
      paidAmount: totals.paidAmount,
      dueAmount: totals.dueAmount,
      paymentStatus: derivePaymentStatus(totals.totalAmount, totals.paidAmount),
      paymentMethod: data.paymentMethod,
      notes: data.notes,
      transactionDate: data.transactionDate ?? nowIso,
      _syncStatus: 'pending',
      _isDeleted: false,
      createdAt: nowIso,
      updatedAt: nowIso,
    };
    const localId = await tx.db.transactions.add(row);
    const transaction: LocalTransaction = { ...row, localId };

    const lines: LocalTransactionItem[] = [];
    for (const [index, line] of data.items.entries()) {
      const item = items.get(line.inventoryItemLocalId);
      if (!item) throw new NotFoundFailure('Inventory item', line.inventoryItemLocalId);
      const lineRow: NewRow<LocalTransactionItem> = {
        transactionLocalId: localId,
        inventoryItemLocalId: item.localId,
        itemType: item.type,
        variety: item.variety,
        bags: line.bags,
        quantity: line.quantity,
        pricePerKg: line.pricePerKg,
        totalAmount: totals.lineTotals[index] ?? 0,
      };
      const lineId = await tx.db.transactionItems.add(lineRow);
      lines.push({ ...lineRow, localId: lineId });
    }

    await enqueueMutation(tx, {
      entityType: 'transaction',
      entityId: localId,
      operation: 'create',
      payload: transactionSnapshot(transaction, lines),
    });

    for (const line of lines) {
      const item = items.get(line.inventoryItemLocalId);
      if (!item) throw new NotFoundFailure('Inventory item', line.inventoryItemLocalId);
      const applied = await recordStockMovement(tx, item, {
        movementType: type,
        quantityDelta: type === 'buy' ? line.quantity : -line.quantity,
        bagsDelta: type === 'buy' ? line.bags : -line.bags,
        pricePerKg: type === 'buy' ? line.pricePerKg : undefined,
        referenceType: 'transaction',
        referenceLocalId: localId,
      });
      items.set(item.localId, applied.item);
    }

    // Balances are aggregates the remote derives from transactions; kept current locally only.
    await tx.db.customers.put(
      type === 'buy'
        ? {
            ...customer,
            balance: roundMoney(customer.balance - totals.dueAmount),
            totalPurchases: roundMoney(customer.totalPurchases + totals.totalAmount),
          }
        : {
            ...customer,
            balance: roundMoney(customer.balance + totals.dueAmount),
            totalSales: roundMoney(customer.totalSales + totals.totalAmount),
          }
    );

    log.info(
      { transactionLocalId: localId, transactionNumber: transaction.transactionNumber, totalAmount: totals.totalAmount },
      'Transaction recorded'
    );
    return { transaction: { ...transaction, _syncStatus: 'pending' }, items: lines };
  });
}

/** Purchase from a customer: stock comes in, we owe them the due amount. */
export function createBuyTransaction(
  deps: OfflineDeps,
  input: CreateTransactionInput
): Promise<Result<TransactionView>> {
  return createTransaction(deps, 'buy', input);
}

/** Sale to a customer. Fails as a whole if any line lacks stock. */
export function createSellTransaction(
  deps: OfflineDeps,
  input: CreateTransactionInput
): Promise<Result<TransactionView>> {
  return createTransaction(deps, 'sell', input);
}

/**
 * Cancel with compensating movements that negate the ones the transaction
 * recorded, so a reversal restores exactly what was applied.
 * The cancellation is queued even if the transaction itself never synced.
 */
export async function cancelTransaction(
  deps: OfflineDeps,
  localId: number,
  reason: string
): Promise<Result<TransactionView>> {
  const parsedReason = validate(z.string().trim().min(1, 'A cancellation reason is required'), reason);
  if (!parsedReason.ok) return parsedReason;

  return runOperation(deps, 'cancelTransaction', async (tx) => {
    const existing = await getLiveTransaction(tx, localId);
    if (existing.status === 'cancelled') {
      throw new ValidationFailure('Transaction is already cancelled', { field: 'status' });
    }

    const lines = await tx.db.transactionItems.where('transactionLocalId').equals(localId).sortBy('localId');
    // Pulled transactions carry no local movements; their stock arrives through reconciliation.
    const recorded = await tx.db.stockMovements
      .where('[referenceType+referenceLocalId]')
      .equals(['transaction', localId])
      .sortBy('localId');
    const movements = recorded.filter((movement) => movement.movementType === existing.type);

    const items = new Map<number, LocalInventoryItem>();
    for (const movement of movements) {
      if (items.has(movement.inventoryItemLocalId)) continue;
      const item = await tx.db.inventoryItems.get(movement.inventoryItemLocalId);
      if (!item) throw new NotFoundFailure('Inventory item', movement.inventoryItemLocalId);
      if (item._isDeleted) {
        throw new ValidationFailure(`Cannot cancel: ${itemName(item)} has been deleted`, {
          field: 'inventoryItemLocalId',
        });
      }
      items.set(item.localId, item);
    }

    // Reversing a purchase takes the stock back out; it must still be there.
    if (existing.type === 'buy') {
      const shortfalls = findShortfalls(
        movements.map((movement) => ({
          inventoryItemLocalId: movement.inventoryItemLocalId,
          quantity: movement.quantityDelta,
        })),
        items
      );
      if (shortfalls.length > 0) throw new InsufficientStockFailure(shortfalls);
    }

    const transaction: LocalTransaction = {
      ...existing,
      status: 'cancelled',
      paymentStatus: 'cancelled',
      cancelReason: parsedReason.value,
      _syncStatus: 'pending',
      updatedAt: tx.now.toISOString(),
    };
    await tx.db.transactions.put(transaction);

    await enqueueMutation(tx, {
      entityType: 'transaction',
      entityId: localId,
      operation: 'update',
      priority: 'high',
      entityServerId: transaction._serverId ?? null,
      payload: { kind: 'transactionCancel', reason: parsedReason.value },
    });

    for (const movement of movements) {
      const item = items.get(movement.inventoryItemLocalId);
      if (!item) throw new NotFoundFailure('Inventory item', movement.inventoryItemLocalId);
      const applied = await recordStockMovement(tx, item, {
        movementType: existing.type === 'buy' ? 'buy_reversal' : 'sell_reversal',
        quantityDelta: -movement.quantityDelta,
        bagsDelta: -movement.bagsDelta,
        referenceType: 'transaction',
        referenceLocalId: localId,
        notes: parsedReason.value,
      });
      items.set(item.localId, applied.item);
    }

    const customer = await tx.db.customers.get(existing.customerLocalId);
    if (customer && !customer._isDeleted) {
      await tx.db.customers.put(
        existing.type === 'buy'
          ? {
              ...customer,
              balance: roundMoney(customer.balance + existing.dueAmount),
              totalPurchases: roundMoney(customer.totalPurchases - existing.totalAmount),
            }
          : {
              ...customer,
              balance: roundMoney(customer.balance - existing.dueAmount),
              totalSales: roundMoney(customer.totalSales - existing.totalAmount),
            }
      );
    }

    log.info({ transactionLocalId: localId, reason: parsedReason.value }, 'Transaction cancelled');
    return { transaction, items: lines };
  });
}

// ─── Payment Actions ─────────────────────────────────────

const paymentSchema = z.object({
  amount: z.number().positive('Payment amount must be greater than zero'),
  method: z.enum(PAYMENT_METHODS).default('cash'),
  notes: z.string().trim().max(500).optional(),
  paidAt: z.string().datetime().optional(),
});

export type AddPaymentInput = z.input<typeof paymentSchema>;

export interface PaymentView {
  payment: LocalPayment;
  transaction: LocalTransaction;
}

export async function addPayment(
  deps: OfflineDeps,
  transactionLocalId: number,
  input: AddPaymentInput
): Promise<Result<PaymentView>> {
  const parsed = validate(paymentSchema, input);
  if (!parsed.ok) return parsed;
  const data = parsed.value;

  return runOperation(deps, 'addPayment', async (tx) => {
    const existing = await getLiveTransaction(tx, transactionLocalId);
    if (existing.status === 'cancelled') {
      throw new ValidationFailure('Cannot add a payment to a cancelled transaction', { field: 'status' });
    }
    if (data.amount > existing.dueAmount + MONEY_EPSILON) {
      throw new ValidationFailure(`Payment exceeds the due amount of ${existing.dueAmount}`, { field: 'amount' });
    }

    const paidAmount = roundMoney(existing.paidAmount + data.amount);
    const dueAmount = roundMoney(existing.totalAmount - paidAmount);
    const nowIso = tx.now.toISOString();
    const transaction: LocalTransaction = {
      ...existing,
      paidAmount,
      dueAmount,
      paymentStatus: derivePaymentStatus(existing.totalAmount, paidAmount),
      updatedAt: nowIso,
    };
    await tx.db.transactions.put(transaction);

    const row: NewRow<LocalPayment> = {
      transactionLocalId,
      amount: data.amount,
      method: data.method,
      notes: data.notes,
      paidAt: data.paidAt ?? nowIso,
      _syncStatus: 'pending',
      _isDeleted: false,
      createdAt: nowIso,
      updatedAt: nowIso,
    };
    const paymentId = await tx.db.payments.add(row);
    const payment: LocalPayment = { ...row, localId: paymentId };

    await enqueueMutation(tx, {
      entityType: 'payment',
      entityId: paymentId,
      operation: 'create',
      payload: paymentSnapshot(payment),
    });

    // Buy: we paid them, we owe less. Sell: they paid us, they owe less.
    const customer = await tx.db.customers.get(existing.customerLocalId);
    if (customer && !customer._isDeleted) {
      const change = existing.type === 'buy' ? data.amount : -data.amount;
      await tx.db.customers.put({ ...customer, balance: roundMoney(customer.balance + change) });
    }

    return { payment, transaction };
  });
}

// ─── Milling Actions ─────────────────────────────────────

const millingSchema = z
  .object({
    paddyItemLocalId: z.number().int().positive(),
    riceItemLocalId: z.number().int().positive(),
    paddyQuantity: z.number().positive('Paddy quantity must be greater than zero'),
    paddyBags: z.number().int().min(0).default(0),
    riceQuantity: z.number().positive('Rice quantity must be greater than zero'),
    riceBags: z.number().int().min(0).default(0),
    notes: z.string().trim().max(500).optional(),
    milledAt: z.string().datetime().optional(),
  })
  .refine((m) => m.riceQuantity <= m.paddyQuantity, {
    message: 'Rice output cannot exceed paddy input',
    path: ['riceQuantity'],
  });

export type RecordMillingInput = z.input<typeof millingSchema>;

export interface MillingView {
  milling: LocalMillingRecord;
  paddyItem: LocalInventoryItem;
  riceItem: LocalInventoryItem;
  /** riceQuantity / paddyQuantity × 100 */
  efficiency: number;
}

/** Paddy out, rice in, wastage recorded; one unit of work. */
export async function recordMilling(deps: OfflineDeps, input: RecordMillingInput): Promise<Result<MillingView>> {
  const parsed = validate(millingSchema, input);
  if (!parsed.ok) return parsed;
  const data = parsed.value;

  return runOperation(deps, 'recordMilling', async (tx) => {
    const paddy = await getLiveItem(tx, data.paddyItemLocalId);
    const rice = await getLiveItem(tx, data.riceItemLocalId);
    if (paddy.type !== 'paddy') {
      throw new ValidationFailure('Milling input must be a paddy item', { field: 'paddyItemLocalId' });
    }
    if (rice.type !== 'rice') {
      throw new ValidationFailure('Milling output must be a rice item', { field: 'riceItemLocalId' });
    }

    const shortfalls = findShortfalls(
      [{ inventoryItemLocalId: paddy.localId, quantity: data.paddyQuantity }],
      new Map([[paddy.localId, paddy]])
    );
    if (shortfalls.length > 0) throw new InsufficientStockFailure(shortfalls);
    assertBagsAvailable([{ inventoryItemLocalId: paddy.localId, bags: data.paddyBags }], new Map([[paddy.localId, paddy]]));

    const nowIso = tx.now.toISOString();
    const row: NewRow<LocalMillingRecord> = {
      paddyItemLocalId: paddy.localId,
      riceItemLocalId: rice.localId,
      paddyQuantity: data.paddyQuantity,
      paddyBags: data.paddyBags,
      riceQuantity: data.riceQuantity,
      riceBags: data.riceBags,
      wastageQuantity: roundQuantity(data.paddyQuantity - data.riceQuantity),
      notes: data.notes,
      milledAt: data.milledAt ?? nowIso,
      _syncStatus: 'pending',
      _isDeleted: false,
      createdAt: nowIso,
      updatedAt: nowIso,
    };
    const millingId = await tx.db.millingRecords.add(row);
    const milling: LocalMillingRecord = { ...row, localId: millingId };

    await enqueueMutation(tx, {
      entityType: 'milling',
      entityId: millingId,
      operation: 'create',
      payload: millingSnapshot(milling),
    });

    // Rice carries the cost of the paddy that produced it.
    const riceCostPerKg =
      paddy.averagePricePerKg > 0
        ? roundMoney((data.paddyQuantity * paddy.averagePricePerKg) / data.riceQuantity)
        : undefined;

    const paddyOut = await recordStockMovement(tx, paddy, {
      movementType: 'milling_out',
      quantityDelta: -data.paddyQuantity,
      bagsDelta: -data.paddyBags,
      referenceType: 'milling',
      referenceLocalId: millingId,
    });
    const riceIn = await recordStockMovement(tx, rice, {
      movementType: 'milling_in',
      quantityDelta: data.riceQuantity,
      bagsDelta: data.riceBags,
      pricePerKg: riceCostPerKg,
      referenceType: 'milling',
      referenceLocalId: millingId,
    });

    const efficiency = roundMoney((data.riceQuantity / data.paddyQuantity) * 100);
    log.info({ millingLocalId: millingId, efficiency, wastageQuantity: milling.wastageQuantity }, 'Milling recorded');

    return { milling, paddyItem: paddyOut.item, riceItem: riceIn.item, efficiency };
  });
}
