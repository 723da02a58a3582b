/**
 * INVENTORY STOCK LEDGER
 *
 * An item's currentQuantity / currentBags always equal the running sum of
 * its stock movements. Every stock change therefore goes through
 * applyStockMovement, which writes the movement row and the item together.
 *
 * averagePricePerKg is a weighted average, recomputed only on priced
 * stock-increasing movements.
 */

import { InsufficientStockFailure, ValidationFailure, type StockShortfall } from '@/lib/errors';
import { inventoryLogger as log } from '@/lib/logger';
import type { LedgerTx } from './context';
import type {
  LedgerDatabase,
  LocalInventoryItem,
  MovementReference,
  MovementType,
  StockMovement,
} from './db';
import { enqueueMutation } from './sync-queue';

const EPSILON = 1e-9;

// ─── Arithmetic ──────────────────────────────────────────

export function roundQuantity(value: number): number {
  return Math.round(value * 1000) / 1000;
}

export function roundMoney(value: number): number {
  return Math.round(value * 100) / 100;
}

export function calculateNewAveragePrice(
  currentQuantity: number,
  currentAverage: number,
  addedQuantity: number,
  addedPrice: number
): number {
  const totalQuantity = currentQuantity + addedQuantity;
  if (totalQuantity <= 0) return 0;
  return (currentQuantity * currentAverage + addedQuantity * addedPrice) / totalQuantity;
}

export interface StockLevel {
  currentQuantity: number;
  currentBags: number;
  averagePricePerKg: number;
}

export interface StockChange extends StockLevel {
  quantityDelta: number;
  /** Bags actually applied after clamping at zero. */
  bagsDelta: number;
}

/** Without a price the average is left as it is. */
export function applyIncrease(
  level: StockLevel,
  quantity: number,
  bags: number,
  pricePerKg: number | null = null
): StockChange {
  const currentQuantity = roundQuantity(level.currentQuantity + quantity);
  const currentBags = level.currentBags + bags;
  const averagePricePerKg =
    pricePerKg === null
      ? level.averagePricePerKg
      : calculateNewAveragePrice(level.currentQuantity, level.averagePricePerKg, quantity, pricePerKg);

  return {
    currentQuantity,
    currentBags,
    averagePricePerKg,
    quantityDelta: roundQuantity(currentQuantity - level.currentQuantity),
    bagsDelta: bags,
  };
}

/** Caller checks availability first; bags never go below zero. */
export function applyDecrease(level: StockLevel, quantity: number, bags: number): StockChange {
  const currentQuantity = roundQuantity(level.currentQuantity - quantity);
  const currentBags = Math.max(0, level.currentBags - bags);

  return {
    currentQuantity,
    currentBags,
    averagePricePerKg: level.averagePricePerKg,
    quantityDelta: roundQuantity(currentQuantity - level.currentQuantity),
    bagsDelta: currentBags - level.currentBags,
  };
}

export interface StockRequest {
  inventoryItemLocalId: number;
  quantity: number;
}

/**
 * Every item whose stock cannot cover the requested quantity.
 * Requests for the same item are summed first.
 */
export function findShortfalls(
  requests: readonly StockRequest[],
  items: ReadonlyMap<number, Pick<LocalInventoryItem, 'localId' | 'type' | 'variety' | 'currentQuantity'>>
): StockShortfall[] {
  const requested = new Map<number, number>();
  for (const request of requests) {
    requested.set(
      request.inventoryItemLocalId,
      roundQuantity((requested.get(request.inventoryItemLocalId) ?? 0) + request.quantity)
    );
  }

  const shortfalls: StockShortfall[] = [];
  for (const [localId, quantity] of requested) {
    const item = items.get(localId);
    const available = item?.currentQuantity ?? 0;
    if (quantity > available + EPSILON) {
      shortfalls.push({
        inventoryItemLocalId: localId,
        itemName: item ? itemName(item) : `#${localId}`,
        available,
        requested: quantity,
      });
    }
  }
  return shortfalls;
}

export interface BagRequest {
  inventoryItemLocalId: number;
  bags: number;
}

/** Bags are counted, not weighed: no request may take more bags than are on hand. */
export function assertBagsAvailable(
  requests: readonly BagRequest[],
  items: ReadonlyMap<number, Pick<LocalInventoryItem, 'localId' | 'type' | 'variety' | 'currentBags'>>
): void {
  const requested = new Map<number, number>();
  for (const request of requests) {
    requested.set(request.inventoryItemLocalId, (requested.get(request.inventoryItemLocalId) ?? 0) + request.bags);
  }

  for (const [localId, bags] of requested) {
    const item = items.get(localId);
    const available = item?.currentBags ?? 0;
    if (bags > available) {
      const name = item ? itemName(item) : `#${localId}`;
      throw new ValidationFailure(`Not enough bags of ${name}. Available: ${available}, requested: ${bags}`, {
        field: 'bags',
        details: { inventoryItemLocalId: localId, available, requested: bags },
      });
    }
  }
}

export function itemName(item: Pick<LocalInventoryItem, 'type' | 'variety'>): string {
  return `${item.variety} ${item.type}`;
}

/** Replay movements in order, rounding at each step exactly as the writes do. */
export function deriveStockFromMovements(
  movements: ReadonlyArray<Pick<StockMovement, 'quantityDelta' | 'bagsDelta'>>
): { quantity: number; bags: number } {
  let quantity = 0;
  let bags = 0;
  for (const movement of movements) {
    quantity = roundQuantity(quantity + movement.quantityDelta);
    bags += movement.bagsDelta;
  }
  return { quantity, bags };
}

// ─── Ledger Writes ───────────────────────────────────────

export interface MovementInput {
  movementType: MovementType;
  /** Signed: positive adds stock, negative removes it. */
  quantityDelta: number;
  bagsDelta: number;
  pricePerKg?: number;
  referenceType?: MovementReference;
  referenceLocalId?: number;
  notes?: string;
}

export interface AppliedMovement {
  item: LocalInventoryItem;
  movement: StockMovement;
}

/**
 * Write the movement row and the item's new level in the open transaction.
 * Throws InsufficientStockFailure instead of letting stock go negative.
 */
export async function applyStockMovement(
  tx: LedgerTx,
  item: LocalInventoryItem,
  input: MovementInput
): Promise<AppliedMovement> {
  let level: StockChange;
  if (input.quantityDelta < 0) {
    const requested = roundQuantity(-input.quantityDelta);
    if (requested > item.currentQuantity + EPSILON) {
      throw new InsufficientStockFailure([
        {
          inventoryItemLocalId: item.localId,
          itemName: itemName(item),
          available: item.currentQuantity,
          requested,
        },
      ]);
    }
    level = applyDecrease(item, requested, 0);
  } else {
    level = applyIncrease(item, input.quantityDelta, 0, input.pricePerKg ?? null);
  }

  // Bags move independently of weight and clamp at zero.
  const currentBags = Math.max(0, item.currentBags + input.bagsDelta);
  const change: StockChange = { ...level, currentBags, bagsDelta: currentBags - item.currentBags };

  const nowIso = tx.now.toISOString();
  const row: Omit<StockMovement, 'localId'> = {
    inventoryItemLocalId: item.localId,
    movementType: input.movementType,
    quantityDelta: change.quantityDelta,
    bagsDelta: change.bagsDelta,
    pricePerKg: input.pricePerKg,
    referenceType: input.referenceType,
    referenceLocalId: input.referenceLocalId,
    notes: input.notes,
    createdAt: nowIso,
  };
  const movementId = await tx.db.stockMovements.add(row);

  const updated: LocalInventoryItem = {
    ...item,
    currentQuantity: change.currentQuantity,
    currentBags: change.currentBags,
    averagePricePerKg: change.averagePricePerKg,
    updatedAt: nowIso,
  };
  await tx.db.inventoryItems.put(updated);

  if (change.quantityDelta < 0 && updated.currentQuantity <= updated.minQuantity) {
    const alert = {
      inventoryItemLocalId: updated.localId,
      itemName: itemName(updated),
      currentQuantity: updated.currentQuantity,
      minQuantity: updated.minQuantity,
    };
    log.warn(alert, 'Stock at or below minimum');
    tx.afterCommit(() => tx.bus.publish('inventory:alert', alert));
  }

  return { item: updated, movement: { ...row, localId: movementId } };
}

/**
 * Apply a movement and queue it for the remote. The remote only ever
 * changes stock through these records.
 */
export async function recordStockMovement(
  tx: LedgerTx,
  item: LocalInventoryItem,
  input: MovementInput
): Promise<AppliedMovement> {
  const applied = await applyStockMovement(tx, item, input);
  const { movement } = applied;

  await enqueueMutation(tx, {
    entityType: 'inventory',
    entityId: item.localId,
    operation: 'update',
    entityServerId: item._serverId ?? null,
    payload: {
      kind: 'stockMovement',
      movementLocalId: movement.localId,
      movementType: movement.movementType,
      quantityDelta: movement.quantityDelta,
      bagsDelta: movement.bagsDelta,
      pricePerKg: movement.pricePerKg ?? null,
      referenceType: movement.referenceType ?? null,
      referenceLocalId: movement.referenceLocalId ?? null,
      notes: movement.notes ?? null,
    },
  });

  log.debug(
    { itemLocalId: item.localId, movementType: movement.movementType, quantityDelta: movement.quantityDelta },
    'Stock movement recorded'
  );
  return applied;
}

// ─── Verification ────────────────────────────────────────

export interface StockLedgerCheck {
  consistent: boolean;
  itemQuantity: number;
  itemBags: number;
  derivedQuantity: number;
  derivedBags: number;
}

export async function verifyStockLedger(db: LedgerDatabase, itemLocalId: number): Promise<StockLedgerCheck | null> {
  const item = await db.inventoryItems.get(itemLocalId);
  if (!item) return null;

  const movements = await db.stockMovements.where('inventoryItemLocalId').equals(itemLocalId).sortBy('localId');
  const derived = deriveStockFromMovements(movements);

  return {
    consistent: derived.quantity === item.currentQuantity && derived.bags === item.currentBags,
    itemQuantity: item.currentQuantity,
    itemBags: item.currentBags,
    derivedQuantity: derived.quantity,
    derivedBags: derived.bags,
  };
}
