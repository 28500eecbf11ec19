/**
 * Error taxonomy for the checkout service.
 *
 * Every error a route can surface extends AppError and carries the HTTP status
 * it maps to. The error middleware renders them as `{ error: message }`.
 */

export abstract class AppError extends Error {
  abstract readonly statusCode: number;
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  readonly statusCode = 400;
  readonly code = 'validation_error';
}

export class PricingViolation extends AppError {
  readonly statusCode = 422;
  readonly code = 'pricing_violation';
}

export type InventoryViolationReason = 'sold_out' | 'per_order_limit_exceeded' | 'sale_not_active';

export class InventoryViolation extends AppError {
  readonly statusCode = 422;
  readonly code = 'inventory_violation';

  constructor(
    readonly reason: InventoryViolationReason,
    message: string
  ) {
    super(message);
  }
}

export class NotFoundError extends AppError {
  readonly statusCode = 404;
  readonly code = 'not_found';
}

export class AccessDeniedError extends AppError {
  readonly statusCode = 403;
  readonly code = 'access_denied';
}

export class UnauthenticatedError extends AppError {
  readonly statusCode = 401;
  readonly code = 'unauthenticated';
}

/**
 * Any failure talking to the payment provider, including timeouts.
 * `operation` names the gateway call that failed.
 */
export class ProviderError extends AppError {
  readonly statusCode = 502;
  readonly code = 'provider_error';

  constructor(
    readonly operation: string,
    message: string
  ) {
    super(message);
  }
}

export class InvalidSignatureError extends AppError {
  readonly statusCode = 400;
  readonly code = 'invalid_signature';

  constructor(readonly detail: string) {
    super('Invalid signature format');
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
