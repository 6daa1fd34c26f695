/**
 * Errors that cross the service boundary. The Fastify error handler turns any AppError into
 * `{ error: { code, message, details } }` with its statusCode.
 *
 * Parsing and matching never throw these: "no answer" is a decision tier, not an exception.
 */
export class AppError extends Error {
  readonly statusCode: number;
  readonly code: string;
  readonly details?: Record<string, unknown>;
  readonly retryable: boolean;

  constructor(params: {
    statusCode: number;
    code: string;
    message: string;
    details?: Record<string, unknown>;
    retryable?: boolean;
  }) {
    super(params.message);
    this.name = new.target.name;
    this.statusCode = params.statusCode;
    this.code = params.code;
    this.details = params.details;
    this.retryable = params.retryable ?? false;
  }
}

export class NotFoundError extends AppError {
  constructor(entity: string, id: string) {
    super({ statusCode: 404, code: 'NOT_FOUND', message: `${entity} not found: ${id}`, details: { entity, id } });
  }
}

export class InsufficientStockError extends AppError {
  constructor(details: { productId: string; requested: number; reservable: number; unit: string }) {
    super({
      statusCode: 409,
      code: 'INSUFFICIENT_STOCK',
      message: `Insufficient stock for ${details.productId}: requested ${details.requested}${details.unit}, reservable ${details.reservable}${details.unit}`,
      details,
    });
  }
}

export class ConcurrentReservationConflictError extends AppError {
  constructor(details: { productId: string; lotIds: string[] }) {
    super({
      statusCode: 409,
      code: 'STOCK_CHANGED',
      message: 'Stock changed, please reselect',
      details,
      retryable: true,
    });
  }
}

export class InvalidPricingContextError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({ statusCode: 500, code: 'INVALID_PRICING_CONTEXT', message, details });
  }
}

export class UnitMismatchError extends AppError {
  constructor(details: { productId: string; requestedUnit: string; productUnit: string }) {
    super({
      statusCode: 422,
      code: 'UNIT_MISMATCH',
      message: `Cannot express ${details.requestedUnit} in ${details.productUnit} for ${details.productId}`,
      details,
    });
  }
}

export class InvalidStateError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({ statusCode: 409, code: 'INVALID_STATE', message, details });
  }
}

export class CatalogIntegrityError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({ statusCode: 500, code: 'CATALOG_INTEGRITY', message, details });
  }
}

export class InvalidQuantityError extends AppError {
  constructor(details: { quantity: number; unit: string }) {
    super({
      statusCode: 422,
      code: 'INVALID_QUANTITY',
      message: `Quantity must be a positive number, got ${details.quantity}${details.unit}`,
      details,
    });
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({ statusCode: 400, code: 'VALIDATION_ERROR', message, details });
  }
}
