/**
 * Application error taxonomy
 * Every error a service raises on purpose extends AppError so handlers and
 * message consumers can map it without inspecting messages.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/**
 * Invalid input, rejected at the boundary with no state change
 */
export class ValidationError extends AppError {
  constructor(
    message: string,
    public readonly field?: string,
    public readonly value?: unknown
  ) {
    super(message, 'VALIDATION_ERROR', 400);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends AppError {
  constructor(
    public readonly entity: string,
    public readonly id: string
  ) {
    super(`${entity} not found: ${id}`, 'NOT_FOUND', 404);
    this.name = 'NotFoundError';
  }
}

export class AccessDeniedError extends AppError {
  constructor(message: string) {
    super(message, 'ACCESS_DENIED', 403);
    this.name = 'AccessDeniedError';
  }
}

/**
 * Business rejection: the warehouse cannot cover the quantity, nothing debited
 */
export class InsufficientStockError extends AppError {
  constructor(
    public readonly productId: string,
    public readonly requested: number,
    public readonly available: number
  ) {
    super(
      `Insufficient stock for product ${productId}: requested ${requested}, available ${available}`,
      'INSUFFICIENT_STOCK',
      409
    );
    this.name = 'InsufficientStockError';
  }
}

export class InvalidStateTransitionError extends AppError {
  constructor(
    public readonly entity: string,
    public readonly from: string,
    public readonly to: string
  ) {
    super(`${entity} cannot move from ${from} to ${to}`, 'INVALID_STATE_TRANSITION', 409);
    this.name = 'InvalidStateTransitionError';
  }
}

/**
 * Optimistic-lock retries exhausted
 */
export class ConcurrencyConflictError extends AppError {
  constructor(
    public readonly resource: string,
    public readonly attempts: number
  ) {
    super(
      `Concurrent modification of ${resource} after ${attempts} attempts`,
      'CONCURRENCY_CONFLICT',
      409
    );
    this.name = 'ConcurrencyConflictError';
  }
}

/**
 * A synchronous cross-service call exceeded its time budget.
 * Callers treat it as a failure requiring compensation.
 */
export class RemoteTimeoutError extends AppError {
  constructor(
    public readonly service: string,
    public readonly timeoutMs: number
  ) {
    super(`${service} did not respond within ${timeoutMs}ms`, 'REMOTE_TIMEOUT', 504);
    this.name = 'RemoteTimeoutError';
  }
}

/**
 * Message that can never be processed; dead-lettered, never retried
 */
export class MalformedMessageError extends AppError {
  constructor(message: string) {
    super(message, 'MALFORMED_MESSAGE', 422);
    this.name = 'MalformedMessageError';
  }
}

/**
 * Infrastructure failure expected to clear on redelivery
 */
export class TransientInfraError extends AppError {
  constructor(
    message: string,
    public readonly underlying?: unknown
  ) {
    super(message, 'TRANSIENT_INFRA_ERROR', 503);
    this.name = 'TransientInfraError';
  }
}

/**
 * A single compare-and-swap lost against a concurrent writer.
 * Retried by withOptimisticRetry; never surfaced to callers.
 */
export class VersionConflictError extends AppError {
  constructor(public readonly resource: string) {
    super(`Version conflict on ${resource}`, 'VERSION_CONFLICT', 409);
    this.name = 'VersionConflictError';
  }
}

/**
 * The idempotency record for a message already exists
 */
export class DuplicateMessageError extends AppError {
  constructor(
    public readonly messageId: string,
    public readonly consumerName: string
  ) {
    super(`Message ${messageId} already processed by ${consumerName}`, 'DUPLICATE_MESSAGE', 409);
    this.name = 'DuplicateMessageError';
  }
}

/**
 * Message of any thrown value, for logs
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
