/**
 * Failure types shared by the domain layer and the sync engine.
 *
 * Domain operations return `Result` values instead of throwing; the remote
 * collaborator does the same. Only programming errors (an illegal state
 * transition, a broken configuration) are thrown.
 */

// ─── Result ──────────────────────────────────────────────

export type Result<T, E = Failure> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

// ─── Failures ────────────────────────────────────────────

/** Connectivity or timeout. Always transient. */
export class NetworkFailure extends Error {
  readonly name = 'NetworkFailure' as const;
  readonly code = 'NETWORK' as const;
  readonly timedOut: boolean;

  constructor(message = 'Network unavailable', options: { timedOut?: boolean; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.timedOut = options.timedOut ?? false;
    Object.setPrototypeOf(this, NetworkFailure.prototype);
  }
}

/** Expired or invalid session. The UI must re-authenticate. */
export class AuthFailure extends Error {
  readonly name = 'AuthFailure' as const;
  readonly code = 'AUTH' as const;
  readonly statusCode: number;

  constructor(message = 'Session expired', statusCode = 401) {
    super(message);
    this.statusCode = statusCode;
    Object.setPrototypeOf(this, AuthFailure.prototype);
  }
}

/** Local precondition or server-rejected payload. */
export class ValidationFailure extends Error {
  readonly name: 'ValidationFailure' | 'InsufficientStockFailure' = 'ValidationFailure';
  readonly code = 'VALIDATION' as const;
  readonly field: string | null;
  readonly details: unknown;
  readonly statusCode: number | null;

  constructor(
    message: string,
    options: { field?: string; details?: unknown; statusCode?: number } = {}
  ) {
    super(message);
    this.field = options.field ?? null;
    this.details = options.details ?? null;
    this.statusCode = options.statusCode ?? null;
    Object.setPrototypeOf(this, ValidationFailure.prototype);
  }
}

export interface StockShortfall {
  inventoryItemLocalId: number;
  itemName: string;
  available: number;
  requested: number;
}

export class InsufficientStockFailure extends ValidationFailure {
  override readonly name = 'InsufficientStockFailure' as const;
  readonly shortfalls: StockShortfall[];

  constructor(shortfalls: StockShortfall[]) {
    const first = shortfalls[0];
    super(
      first
        ? `Insufficient stock for ${first.itemName}. Available: ${first.available} kg, requested: ${first.requested} kg`
        : 'Insufficient stock',
      { field: 'quantity', details: shortfalls }
    );
    this.shortfalls = shortfalls;
    Object.setPrototypeOf(this, InsufficientStockFailure.prototype);
  }
}

export class NotFoundFailure extends Error {
  readonly name = 'NotFoundFailure' as const;
  readonly code = 'NOT_FOUND' as const;
  readonly resourceType: string;
  readonly resourceId: string | number | null;
  readonly statusCode: number | null;

  constructor(resourceType: string, resourceId: string | number | null = null, statusCode?: number) {
    super(`${resourceType} not found${resourceId != null ? `: ${resourceId}` : ''}`);
    this.resourceType = resourceType;
    this.resourceId = resourceId;
    this.statusCode = statusCode ?? null;
    Object.setPrototypeOf(this, NotFoundFailure.prototype);
  }
}

/** Unexpected 5xx or unparseable response. */
export class ServerFailure extends Error {
  readonly name = 'ServerFailure' as const;
  readonly code = 'SERVER' as const;
  readonly statusCode: number | null;

  constructor(message = 'Server error', statusCode: number | null = null) {
    super(message);
    this.statusCode = statusCode;
    Object.setPrototypeOf(this, ServerFailure.prototype);
  }
}

/** Semantic disagreement between local intent and remote state. */
export class SyncConflict extends Error {
  readonly name = 'SyncConflict' as const;
  readonly code = 'CONFLICT' as const;
  readonly statusCode: number | null;
  readonly reason: string;

  constructor(message: string, reason = 'conflict', statusCode: number | null = 409) {
    super(message);
    this.reason = reason;
    this.statusCode = statusCode;
    Object.setPrototypeOf(this, SyncConflict.prototype);
  }
}

/** The in-flight call was aborted locally (shutdown, explicit cancel). */
export class CancelledFailure extends Error {
  readonly name = 'CancelledFailure' as const;
  readonly code = 'CANCELLED' as const;

  constructor(message = 'Request cancelled') {
    super(message);
    Object.setPrototypeOf(this, CancelledFailure.prototype);
  }
}

export type Failure =
  | NetworkFailure
  | AuthFailure
  | ValidationFailure
  | NotFoundFailure
  | ServerFailure
  | SyncConflict
  | CancelledFailure;

// ─── Programming errors (thrown) ─────────────────────────

export class InvalidTransitionError extends Error {
  readonly name = 'InvalidTransitionError' as const;
  readonly from: string;
  readonly to: string;

  constructor(from: string, to: string, recordId: string) {
    super(`Invalid mutation transition ${from} → ${to} for record ${recordId}`);
    this.from = from;
    this.to = to;
    Object.setPrototypeOf(this, InvalidTransitionError.prototype);
  }
}

export class ConfigError extends Error {
  readonly name = 'ConfigError' as const;
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  - ${issues.join('\n  - ')}`);
    this.issues = issues;
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

// ─── Helpers ─────────────────────────────────────────────

export function isFailure(value: unknown): value is Failure {
  return (
    value instanceof NetworkFailure ||
    value instanceof AuthFailure ||
    value instanceof ValidationFailure ||
    value instanceof NotFoundFailure ||
    value instanceof ServerFailure ||
    value instanceof SyncConflict ||
    value instanceof CancelledFailure
  );
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return typeof error === 'string' ? error : 'Unknown error';
}

/**
 * Normalize anything caught into a Failure.
 * Unknown exceptions become ServerFailure so they are retried, not lost.
 */
export function toFailure(error: unknown): Failure {
  if (isFailure(error)) return error;
  return new ServerFailure(errorMessage(error));
}
