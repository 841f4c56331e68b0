/**
 * Domain error taxonomy
 *
 * Every business-rule violation and store fault raised by core derives from DomainError.
 * The `kind` tells the presentation layer how to surface it; callers that need finer
 * control match on the concrete class.
 */

export type DomainErrorKind = 'not_found' | 'conflict' | 'validation' | 'store_failure';

export abstract class DomainError extends Error {
  abstract readonly kind: DomainErrorKind;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Lookup miss for an entity the caller named explicitly */
export class NotFoundError extends DomainError {
  readonly kind = 'not_found';
}

/** Business-rule violation; the message names the offending identity */
export class ConflictError extends DomainError {
  readonly kind = 'conflict';
}

/** Input rejected before any write */
export class ValidationError extends DomainError {
  readonly kind = 'validation';
}

/**
 * Store adapter fault. Never retried; the original error is kept as `cause`
 * and never exposed to callers outside the process.
 */
export class StoreFailureError extends DomainError {
  readonly kind = 'store_failure';
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super(`Store operation failed: ${operation}`, { cause });
    this.operation = operation;
  }
}

export class InvalidPaginationError extends ValidationError {}
