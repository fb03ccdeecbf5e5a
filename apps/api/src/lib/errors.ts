/**
 * Domain errors raised by the fulfillment services.
 * Each carries a stable `kind` and enough context for a caller to act,
 * independent of the HTTP layer that renders them.
 */
export type ErrorKind =
  | "validation"
  | "amount_mismatch"
  | "insufficient_stock"
  | "invalid_transition"
  | "not_found"
  | "unauthorized"
  | "forbidden"
  | "duplicate_sale"
  | "storage_failure";

export type ErrorContext = Record<string, string | number | null>;

export class DomainError extends Error {
  constructor(
    message: string,
    public readonly kind: ErrorKind,
    public readonly context: ErrorContext = {}
  ) {
    super(message);
    this.name = "DomainError";
  }
}

export class ValidationError extends DomainError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, "validation", context);
    this.name = "ValidationError";
  }
}

export class AmountMismatchError extends DomainError {
  constructor(orderId: string, expected: number, received: number) {
    super(`Payment amount ${received} does not match order total ${expected}`, "amount_mismatch", {
      orderId,
      expected,
      received
    });
    this.name = "AmountMismatchError";
  }
}

export class InsufficientStockError extends DomainError {
  constructor(
    public readonly productId: string,
    public readonly requested: number,
    public readonly available: number
  ) {
    super(`Insufficient stock for product ${productId}. Available: ${available}, requested: ${requested}.`, "insufficient_stock", {
      productId,
      requested,
      available
    });
    this.name = "InsufficientStockError";
  }
}

export class InvalidTransitionError extends DomainError {
  constructor(orderId: string, from: string, to: string, reason?: string) {
    super(reason ?? `Invalid transition from ${from} to ${to}`, "invalid_transition", { orderId, from, to });
    this.name = "InvalidTransitionError";
  }
}

export class NotFoundError extends DomainError {
  constructor(entity: string, id: string) {
    super(`${entity} not found`, "not_found", { entity, id });
    this.name = "NotFoundError";
  }
}

export class UnauthorizedError extends DomainError {
  constructor(message = "Authentication required") {
    super(message, "unauthorized");
    this.name = "UnauthorizedError";
  }
}

export class ForbiddenError extends DomainError {
  constructor(message = "Access denied") {
    super(message, "forbidden");
    this.name = "ForbiddenError";
  }
}

// Raised by the sales repository when the unique order index rejects an insert.
// SalesRecorder turns it into a read of the existing record.
export class DuplicateSaleError extends DomainError {
  constructor(orderId: string) {
    super(`A sale already exists for order ${orderId}`, "duplicate_sale", { orderId });
    this.name = "DuplicateSaleError";
  }
}

export class StorageFailureError extends DomainError {
  constructor(message = "Storage operation failed, please retry") {
    super(message, "storage_failure");
    this.name = "StorageFailureError";
  }
}

export function isDomainError(error: unknown): error is DomainError {
  return error instanceof DomainError;
}
