/**
 * Error taxonomy shared by the store, the services and the HTTP layer.
 *
 * Every error carries a stable `code` plus a small `context` object so the
 * presentation side can point at the offending field or entity.
 */

export class FarmError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "FarmError";
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

// ============================================
// VALIDATION
// ============================================

/** Caller-supplied data breaks a field constraint. */
export class ValidationError extends FarmError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "VALIDATION_ERROR", context);
    this.name = "ValidationError";
  }

  get field(): string | undefined {
    const field = this.context?.field;
    return typeof field === "string" ? field : undefined;
  }
}

export const ValidationErrors = {
  REQUIRED_FIELD: (field: string) => new ValidationError(`${field} is required`, { field }),

  INVALID_FIELD: (field: string, reason: string) =>
    new ValidationError(`Invalid ${field}: ${reason}`, { field, reason }),

  ALL_ZERO: (field: string) =>
    new ValidationError(`${field} must contain at least one non-zero value`, { field }),

  UNIT_MISMATCH: (item: string, expected: string, actual: string) =>
    new ValidationError(`${item} is stocked in ${expected}, not ${actual}`, {
      field: "unit",
      expected,
      actual,
    }),
};

// ============================================
// REFERENCES
// ============================================

/** A referenced client, worker, supply item or order does not exist. */
export class ReferentialError extends FarmError {
  constructor(entity: string, id: string) {
    super(`${entity} not found`, "NOT_FOUND", { entity, id });
    this.name = "ReferentialError";
  }
}

export const ReferentialErrors = {
  CLIENT_NOT_FOUND: (id: string) => new ReferentialError("Client", id),
  WORKER_NOT_FOUND: (id: string) => new ReferentialError("Worker", id),
  ORDER_NOT_FOUND: (id: string) => new ReferentialError("Order", id),
  SUPPLY_NOT_FOUND: (id: string) => new ReferentialError("Supply item", id),
};

// ============================================
// LIFECYCLE STATE
// ============================================

/** Operation attempted against an entity in the wrong lifecycle state. */
export class StateError extends FarmError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "INVALID_STATE", context);
    this.name = "StateError";
  }
}

export const StateErrors = {
  ORDER_NOT_PENDING: (orderId: string, status: string) =>
    new StateError("Order is not pending", { order_id: orderId, status }),

  CLIENT_INACTIVE: (clientId: string) =>
    new StateError("Client is inactive", { client_id: clientId }),

  WORKER_INACTIVE: (workerId: string) =>
    new StateError("Worker is inactive", { worker_id: workerId }),

  NO_ACTIVE_PRICE: () => new StateError("No active price schedule"),
};

// ============================================
// DERIVED STATE + STORAGE
// ============================================

/** A derived-state rule could not be applied; the transaction is rolled back. */
export class ConsistencyViolation extends FarmError {
  constructor(rule: string, message: string, context?: Record<string, unknown>) {
    super(message, "CONSISTENCY_VIOLATION", { rule, ...context });
    this.name = "ConsistencyViolation";
  }
}

/** Storage I/O or schema failure. Never retried. */
export class StoreError extends FarmError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "STORE_ERROR", context);
    this.name = "StoreError";
  }
}
