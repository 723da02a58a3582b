/**
 * REMOTE: The system of record, seen through a narrow interface
 *
 * The sync engine never touches HTTP directly. It builds a request from a
 * mutation record, hands it to a RemoteApi and classifies the Result.
 */

import {
  AuthFailure,
  CancelledFailure,
  NetworkFailure,
  NotFoundFailure,
  ServerFailure,
  SyncConflict,
  ValidationFailure,
  type Failure,
  type Result,
} from '@/lib/errors';
import type { LedgerTable } from './db';
import type { MutationRecord, Operation } from './mutation-record';
import type { MutationPayload } from './payloads';

// ─── Types ───────────────────────────────────────────────

export interface RemoteResponse<T = unknown> {
  success: boolean;
  statusCode: number;
  data: T;
  message: string | null;
}

export interface RemoteRequestOptions {
  signal?: AbortSignal;
  /** Sent as X-Client-Mutation-Id so the remote can drop duplicates. */
  clientMutationId?: string;
}

export type RemoteResult = Result<RemoteResponse, Failure>;

export interface RemoteApi {
  get(path: string, options?: RemoteRequestOptions): Promise<RemoteResult>;
  post(path: string, data?: unknown, options?: RemoteRequestOptions): Promise<RemoteResult>;
  put(path: string, data?: unknown, options?: RemoteRequestOptions): Promise<RemoteResult>;
  patch(path: string, data?: unknown, options?: RemoteRequestOptions): Promise<RemoteResult>;
  delete(path: string, options?: RemoteRequestOptions): Promise<RemoteResult>;
}

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

// ─── Endpoints ───────────────────────────────────────────

export const API_ENDPOINTS = {
  customers: '/customers',
  customersSync: '/customers/sync',
  customersUpdates: '/customers/updates',
  inventory: '/inventory',
  inventoryAddStock: '/inventory/add-stock',
  inventoryDeductStock: '/inventory/deduct-stock',
  inventoryMilling: '/inventory/milling',
  inventorySync: '/inventory/sync',
  inventoryUpdates: '/inventory/updates',
  transactions: '/transactions',
  transactionsSync: '/transactions/sync',
  transactionsUpdates: '/transactions/updates',
  customer: (id: string) => `/customers/${encodeURIComponent(id)}`,
  inventoryItem: (id: string) => `/inventory/${encodeURIComponent(id)}`,
  transactionCancel: (id: string) => `/transactions/${encodeURIComponent(id)}/cancel`,
  transactionPayments: (id: string) => `/transactions/${encodeURIComponent(id)}/payments`,
} as const;

export function withSince(path: string, since: string | null): string {
  return since ? `${path}?since=${encodeURIComponent(since)}` : path;
}

// ─── Classification ──────────────────────────────────────

export type SyncOutcome = 'success' | 'transient' | 'conflict' | 'auth';

export function classifyStatus(statusCode: number, operation: Operation): SyncOutcome {
  if (statusCode >= 200 && statusCode < 300) return 'success';
  if (statusCode === 401 || statusCode === 403) return 'auth';
  // Already gone: the delete achieved its goal.
  if (statusCode === 404) return operation === 'delete' ? 'success' : 'conflict';
  if (statusCode === 408 || statusCode === 429 || statusCode >= 500) return 'transient';
  if (statusCode >= 400) return 'conflict';
  return 'transient';
}

/**
 * Route a remote result to the state machine.
 * Semantic rejections become conflicts so an unchanged payload is never
 * retried; only connectivity and server faults consume retry budget.
 */
export function classifyRemoteResult(result: RemoteResult, operation: Operation): SyncOutcome {
  if (result.ok) {
    const outcome = classifyStatus(result.value.statusCode, operation);
    if (outcome === 'success' && !result.value.success && result.value.statusCode !== 404) {
      return 'conflict';
    }
    return outcome;
  }

  const failure = result.error;
  if (failure instanceof AuthFailure) return 'auth';
  if (failure instanceof NetworkFailure || failure instanceof CancelledFailure) return 'transient';
  if (failure instanceof NotFoundFailure) return operation === 'delete' ? 'success' : 'conflict';
  if (failure instanceof SyncConflict || failure instanceof ValidationFailure) return 'conflict';
  if (failure instanceof ServerFailure) {
    return failure.statusCode === null ? 'transient' : classifyStatus(failure.statusCode, operation);
  }
  return 'transient';
}

// ─── Push Requests ───────────────────────────────────────

export interface PushRequest {
  method: HttpMethod;
  path: string;
  body?: Record<string, unknown>;
}

/** serverId lookup for entities the payload depends on. */
export type ServerIdLookup = (table: LedgerTable, localId: number) => string | null;

function requireServerId(lookup: ServerIdLookup, table: LedgerTable, localId: number): string {
  const serverId = lookup(table, localId);
  if (serverId === null) {
    throw new ValidationFailure(`No server id for ${table} #${localId}`, { field: table });
  }
  return serverId;
}

/**
 * Map a record to its endpoint and body.
 * Every body carries clientMutationId so replays are recognisable.
 */
export function buildPushRequest(
  record: Pick<MutationRecord, 'id' | 'entityId' | 'operation'>,
  payload: MutationPayload,
  lookup: ServerIdLookup
): PushRequest {
  const base = { clientMutationId: record.id, localId: record.entityId };

  switch (payload.kind) {
    case 'customer': {
      const body = { ...base, name: payload.name, phone: payload.phone, address: payload.address, type: payload.type };
      if (record.operation === 'create') return { method: 'POST', path: API_ENDPOINTS.customers, body };
      const path = API_ENDPOINTS.customer(requireServerId(lookup, 'customers', record.entityId));
      return record.operation === 'delete' ? { method: 'DELETE', path } : { method: 'PUT', path, body };
    }

    case 'inventoryItem': {
      const body = { ...base, type: payload.type, variety: payload.variety, minQuantity: payload.minQuantity };
      if (record.operation === 'create') return { method: 'POST', path: API_ENDPOINTS.inventory, body };
      const path = API_ENDPOINTS.inventoryItem(requireServerId(lookup, 'inventoryItems', record.entityId));
      return record.operation === 'delete' ? { method: 'DELETE', path } : { method: 'PUT', path, body };
    }

    case 'stockMovement': {
      const adding = payload.quantityDelta > 0 || (payload.quantityDelta === 0 && payload.bagsDelta >= 0);
      const transactionId =
        payload.referenceType === 'transaction' && payload.referenceLocalId !== null
          ? lookup('transactions', payload.referenceLocalId)
          : null;
      return {
        method: 'POST',
        path: adding ? API_ENDPOINTS.inventoryAddStock : API_ENDPOINTS.inventoryDeductStock,
        body: {
          ...base,
          itemId: requireServerId(lookup, 'inventoryItems', record.entityId),
          quantity: Math.abs(payload.quantityDelta),
          bags: Math.abs(payload.bagsDelta),
          pricePerKg: payload.pricePerKg,
          movementType: payload.movementType,
          movementLocalId: payload.movementLocalId,
          transactionId,
          notes: payload.notes,
        },
      };
    }

    case 'transaction':
      return {
        method: 'POST',
        path: API_ENDPOINTS.transactions,
        body: transactionBody(record, payload, lookup),
      };

    case 'transactionCancel':
      return {
        method: 'POST',
        path: API_ENDPOINTS.transactionCancel(requireServerId(lookup, 'transactions', record.entityId)),
        body: { ...base, reason: payload.reason },
      };

    case 'payment':
      return {
        method: 'POST',
        path: API_ENDPOINTS.transactionPayments(requireServerId(lookup, 'transactions', payload.transactionLocalId)),
        body: { ...base, amount: payload.amount, method: payload.method, notes: payload.notes, paidAt: payload.paidAt },
      };

    case 'milling':
      return {
        method: 'POST',
        path: API_ENDPOINTS.inventoryMilling,
        body: {
          ...base,
          paddyItemId: requireServerId(lookup, 'inventoryItems', payload.paddyItemLocalId),
          riceItemId: requireServerId(lookup, 'inventoryItems', payload.riceItemLocalId),
          paddyQuantity: payload.paddyQuantity,
          paddyBags: payload.paddyBags,
          riceQuantity: payload.riceQuantity,
          riceBags: payload.riceBags,
          wastageQuantity: payload.wastageQuantity,
          notes: payload.notes,
          milledAt: payload.milledAt,
        },
      };
  }
}

export function transactionBody(
  record: Pick<MutationRecord, 'id' | 'entityId'>,
  payload: Extract<MutationPayload, { kind: 'transaction' }>,
  lookup: ServerIdLookup
): Record<string, unknown> {
  return {
    clientMutationId: record.id,
    localId: record.entityId,
    transactionNumber: payload.transactionNumber,
    type: payload.type,
    customerId: requireServerId(lookup, 'customers', payload.customerLocalId),
    customerName: payload.customerName,
    subtotal: payload.subtotal,
    discount: payload.discount,
    totalAmount: payload.totalAmount,
    paidAmount: payload.paidAmount,
    dueAmount: payload.dueAmount,
    paymentMethod: payload.paymentMethod,
    notes: payload.notes,
    transactionDate: payload.transactionDate,
    items: payload.items.map((line) => ({
      inventoryItemId: requireServerId(lookup, 'inventoryItems', line.inventoryItemLocalId),
      itemType: line.itemType,
      variety: line.variety,
      bags: line.bags,
      quantity: line.quantity,
      pricePerKg: line.pricePerKg,
      totalAmount: line.totalAmount,
    })),
  };
}

export function sendPushRequest(
  remote: RemoteApi,
  request: PushRequest,
  options: RemoteRequestOptions
): Promise<RemoteResult> {
  switch (request.method) {
    case 'GET':
      return remote.get(request.path, options);
    case 'POST':
      return remote.post(request.path, request.body, options);
    case 'PUT':
      return remote.put(request.path, request.body, options);
    case 'PATCH':
      return remote.patch(request.path, request.body, options);
    case 'DELETE':
      return remote.delete(request.path, options);
  }
}
