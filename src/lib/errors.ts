export type RepairErrorKind =
  | 'validation'
  | 'authorization'
  | 'not_found'
  | 'transition'
  | 'concurrency'
  | 'persistence';

export abstract class RepairEngineError extends Error {
  abstract readonly kind: RepairErrorKind;
  abstract readonly statusCode: number;
  readonly code: string;

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }

  get retryable(): boolean {
    return false;
  }
}

export class ValidationError extends RepairEngineError {
  readonly kind = 'validation' as const;
  readonly statusCode = 400;

  constructor(message: string, code = 'VALIDATION_ERROR') {
    super(message, code);
  }
}

export class AuthorizationError extends RepairEngineError {
  readonly kind = 'authorization' as const;
  readonly statusCode: number;

  constructor(message: string, code = 'AUTHORIZATION_ERROR', statusCode = 403) {
    super(message, code);
    this.statusCode = statusCode;
  }
}

export class NotFoundError extends RepairEngineError {
  readonly kind = 'not_found' as const;
  readonly statusCode = 404;

  constructor(message: string, code = 'NOT_FOUND') {
    super(message, code);
  }
}

export class TransitionError extends RepairEngineError {
  readonly kind = 'transition' as const;
  readonly statusCode = 409;

  constructor(
    message: string,
    readonly from: string,
    readonly to: string
  ) {
    super(message, 'ILLEGAL_REPAIR_TRANSITION');
  }
}

export class ConcurrencyError extends RepairEngineError {
  readonly kind = 'concurrency' as const;
  readonly statusCode = 409;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CONCURRENCY_CONFLICT', options);
  }

  override get retryable(): boolean {
    return true;
  }
}

export class PersistenceError extends RepairEngineError {
  readonly kind = 'persistence' as const;
  readonly statusCode = 500;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'PERSISTENCE_ERROR', options);
  }
}

export function isRepairEngineError(error: unknown): error is RepairEngineError {
  return error instanceof RepairEngineError;
}

const PG_CONCURRENCY_CODES = new Set([
  '55P03', // lock_not_available
  '40001', // serialization_failure
  '40P01' // deadlock_detected
]);

function readPgCode(error: unknown): string | null {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return null;
  }

  return typeof error.code === 'string' ? error.code : null;
}

/** Serialization failures and deadlocks; the whole transaction may be re-run. */
export function isSerializationConflict(error: unknown): boolean {
  const pgCode = readPgCode(error);
  return pgCode === '40001' || pgCode === '40P01';
}

/**
 * Normalizes anything thrown inside a unit of work. Domain errors pass through untouched;
 * storage failures are classified as retryable lock/serialization conflicts or as
 * persistence failures.
 */
export function toRepairEngineError(error: unknown): RepairEngineError {
  if (isRepairEngineError(error)) {
    return error;
  }

  const pgCode = readPgCode(error);
  if (pgCode && PG_CONCURRENCY_CODES.has(pgCode)) {
    return new ConcurrencyError('repair counter is locked by another submission; retry the request', {
      cause: error
    });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new PersistenceError(`repair storage failed: ${message}`, { cause: error });
}
