/**
 * Mutation payloads: tagged union on `kind`.
 *
 * A payload is a by-value snapshot taken at enqueue time. It is validated
 * and serialized only at the queue boundary; everywhere else it is typed.
 */

import { z } from 'zod';
import { ValidationFailure, err, ok, type Result } from '@/lib/errors';
import {
  CUSTOMER_TYPES,
  ITEM_TYPES,
  MOVEMENT_TYPES,
  PAYMENT_METHODS,
  TRANSACTION_TYPES,
  type LedgerTable,
  type LocalCustomer,
  type LocalInventoryItem,
  type LocalMillingRecord,
  type LocalPayment,
  type LocalTransaction,
  type LocalTransactionItem,
} from './db';
import type { EntityType, Operation } from './mutation-record';

// ─── Schemas ─────────────────────────────────────────────

const optionalText = z.string().nullable();

export const customerPayloadSchema = z.object({
  kind: z.literal('customer'),
  name: z.string().min(1),
  phone: z.string(),
  address: optionalText,
  type: z.enum(CUSTOMER_TYPES),
});

export const inventoryItemPayloadSchema = z.object({
  kind: z.literal('inventoryItem'),
  type: z.enum(ITEM_TYPES),
  variety: z.string().min(1),
  minQuantity: z.number().min(0),
});

export const stockMovementPayloadSchema = z.object({
  kind: z.literal('stockMovement'),
  movementLocalId: z.number().int(),
  movementType: z.enum(MOVEMENT_TYPES),
  quantityDelta: z.number(),
  bagsDelta: z.number().int(),
  pricePerKg: z.number().nullable(),
  referenceType: z.enum(['transaction', 'milling', 'adjustment']).nullable(),
  referenceLocalId: z.number().int().nullable(),
  notes: optionalText,
});

export const transactionLinePayloadSchema = z.object({
  inventoryItemLocalId: z.number().int(),
  itemType: z.enum(ITEM_TYPES),
  variety: z.string(),
  bags: z.number().int().min(0),
  quantity: z.number().positive(),
  pricePerKg: z.number().min(0),
  totalAmount: z.number().min(0),
});

export const transactionPayloadSchema = z.object({
  kind: z.literal('transaction'),
  transactionNumber: z.string(),
  type: z.enum(TRANSACTION_TYPES),
  customerLocalId: z.number().int(),
  customerName: z.string(),
  subtotal: z.number(),
  discount: z.number(),
  totalAmount: z.number(),
  paidAmount: z.number(),
  dueAmount: z.number(),
  paymentMethod: z.enum(PAYMENT_METHODS).nullable(),
  notes: optionalText,
  transactionDate: z.string(),
  items: z.array(transactionLinePayloadSchema).min(1),
});

export const transactionCancelPayloadSchema = z.object({
  kind: z.literal('transactionCancel'),
  reason: z.string(),
});

export const paymentPayloadSchema = z.object({
  kind: z.literal('payment'),
  transactionLocalId: z.number().int(),
  amount: z.number().positive(),
  method: z.enum(PAYMENT_METHODS),
  notes: optionalText,
  paidAt: z.string(),
});

export const millingPayloadSchema = z.object({
  kind: z.literal('milling'),
  paddyItemLocalId: z.number().int(),
  riceItemLocalId: z.number().int(),
  paddyQuantity: z.number().positive(),
  paddyBags: z.number().int().min(0),
  riceQuantity: z.number().positive(),
  riceBags: z.number().int().min(0),
  wastageQuantity: z.number().min(0),
  notes: optionalText,
  milledAt: z.string(),
});

export const mutationPayloadSchema = z.discriminatedUnion('kind', [
  customerPayloadSchema,
  inventoryItemPayloadSchema,
  stockMovementPayloadSchema,
  transactionPayloadSchema,
  transactionCancelPayloadSchema,
  paymentPayloadSchema,
  millingPayloadSchema,
]);

export type CustomerPayload = z.infer<typeof customerPayloadSchema>;
export type InventoryItemPayload = z.infer<typeof inventoryItemPayloadSchema>;
export type StockMovementPayload = z.infer<typeof stockMovementPayloadSchema>;
export type TransactionPayload = z.infer<typeof transactionPayloadSchema>;
export type TransactionLinePayload = z.infer<typeof transactionLinePayloadSchema>;
export type TransactionCancelPayload = z.infer<typeof transactionCancelPayloadSchema>;
export type PaymentPayload = z.infer<typeof paymentPayloadSchema>;
export type MillingPayload = z.infer<typeof millingPayloadSchema>;
export type MutationPayload = z.infer<typeof mutationPayloadSchema>;
export type PayloadKind = MutationPayload['kind'];

// ─── Kind ↔ Entity ───────────────────────────────────────

export const PAYLOAD_ENTITY_TYPE: Record<PayloadKind, EntityType> = {
  customer: 'customer',
  inventoryItem: 'inventory',
  stockMovement: 'inventory',
  transaction: 'transaction',
  transactionCancel: 'transaction',
  payment: 'payment',
  milling: 'milling',
};

/** Only whole-entity snapshots may be merged into an earlier pending record. */
export const COALESCIBLE_KINDS: readonly PayloadKind[] = ['customer', 'inventoryItem'];

export const ENTITY_TABLE: Record<EntityType, LedgerTable | null> = {
  customer: 'customers',
  inventory: 'inventoryItems',
  transaction: 'transactions',
  payment: 'payments',
  milling: 'millingRecords',
  user: null,
};

// ─── Dependencies ────────────────────────────────────────

export interface EntityRef {
  table: LedgerTable;
  localId: number;
}

/**
 * Ledger entities whose serverId must be known before the payload can
 * be transmitted. Update and Delete always depend on the entity itself.
 */
export function payloadDependencies(
  payload: MutationPayload,
  operation: Operation,
  entityType: EntityType,
  entityId: number
): EntityRef[] {
  const refs: EntityRef[] = [];
  const ownTable = ENTITY_TABLE[entityType];
  if (operation !== 'create' && ownTable) {
    refs.push({ table: ownTable, localId: entityId });
  }

  switch (payload.kind) {
    case 'transaction':
      refs.push({ table: 'customers', localId: payload.customerLocalId });
      for (const line of payload.items) {
        refs.push({ table: 'inventoryItems', localId: line.inventoryItemLocalId });
      }
      break;
    case 'payment':
      refs.push({ table: 'transactions', localId: payload.transactionLocalId });
      break;
    case 'milling':
      refs.push({ table: 'inventoryItems', localId: payload.paddyItemLocalId });
      refs.push({ table: 'inventoryItems', localId: payload.riceItemLocalId });
      break;
    default:
      break;
  }

  const seen = new Set<string>();
  return refs.filter((ref) => {
    const key = `${ref.table}:${ref.localId}`;
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

// ─── Snapshots ───────────────────────────────────────────

export function customerSnapshot(customer: LocalCustomer): CustomerPayload {
  return {
    kind: 'customer',
    name: customer.name,
    phone: customer.phone,
    address: customer.address ?? null,
    type: customer.type,
  };
}

export function inventoryItemSnapshot(item: LocalInventoryItem): InventoryItemPayload {
  return {
    kind: 'inventoryItem',
    type: item.type,
    variety: item.variety,
    minQuantity: item.minQuantity,
  };
}

export function transactionSnapshot(
  transaction: LocalTransaction,
  lines: readonly LocalTransactionItem[]
): TransactionPayload {
  return {
    kind: 'transaction',
    transactionNumber: transaction.transactionNumber,
    type: transaction.type,
    customerLocalId: transaction.customerLocalId,
    customerName: transaction.customerName,
    subtotal: transaction.subtotal,
    discount: transaction.discount,
    totalAmount: transaction.totalAmount,
    paidAmount: transaction.paidAmount,
    dueAmount: transaction.dueAmount,
    paymentMethod: transaction.paymentMethod ?? null,
    notes: transaction.notes ?? null,
    transactionDate: transaction.transactionDate,
    items: lines.map((line) => ({
      inventoryItemLocalId: line.inventoryItemLocalId,
      itemType: line.itemType,
      variety: line.variety,
      bags: line.bags,
      quantity: line.quantity,
      pricePerKg: line.pricePerKg,
      totalAmount: line.totalAmount,
    })),
  };
}

export function paymentSnapshot(payment: LocalPayment): PaymentPayload {
  return {
    kind: 'payment',
    transactionLocalId: payment.transactionLocalId,
    amount: payment.amount,
    method: payment.method,
    notes: payment.notes ?? null,
    paidAt: payment.paidAt,
  };
}

export function millingSnapshot(record: LocalMillingRecord): MillingPayload {
  return {
    kind: 'milling',
    paddyItemLocalId: record.paddyItemLocalId,
    riceItemLocalId: record.riceItemLocalId,
    paddyQuantity: record.paddyQuantity,
    paddyBags: record.paddyBags,
    riceQuantity: record.riceQuantity,
    riceBags: record.riceBags,
    wastageQuantity: record.wastageQuantity,
    notes: record.notes ?? null,
    milledAt: record.milledAt,
  };
}

// ─── Serialization ───────────────────────────────────────

export function serializePayload(payload: MutationPayload): string {
  return JSON.stringify(mutationPayloadSchema.parse(payload));
}

export function parsePayload(json: string): Result<MutationPayload, ValidationFailure> {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    return err(new ValidationFailure('Stored payload is not valid JSON', { details: String(error) }));
  }

  const parsed = mutationPayloadSchema.safeParse(raw);
  if (!parsed.success) {
    return err(
      new ValidationFailure('Stored payload does not match its schema', {
        details: parsed.error.issues,
      })
    );
  }
  return ok(parsed.data);
}
