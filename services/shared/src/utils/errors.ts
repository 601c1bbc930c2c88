// Custom error classes for stock ledger business rules and infrastructure faults

export class DomainError extends Error {
     constructor(
          message: string,
          public readonly code: string,
          public readonly statusCode: number = 400
     ) {
          super(message);
          this.name = this.constructor.name;
          Error.captureStackTrace(this, this.constructor);
     }
}

export class LedgerNotFoundError extends DomainError {
     constructor(
          public readonly sku: string,
          public readonly variantSku?: string
     ) {
          super(
               variantSku
                    ? `No stock ledger entry for ${sku} variant ${variantSku}`
                    : `No stock ledger entry for ${sku}`,
               'LEDGER_NOT_FOUND',
               404
          );
     }
}

export class ReservationNotFoundError extends DomainError {
     constructor(public readonly reservationId: string) {
          super(`Reservation ${reservationId} not found`, 'RESERVATION_NOT_FOUND', 404);
     }
}

export class InsufficientStockError extends DomainError {
     constructor(
          message: string,
          public readonly sku: string,
          public readonly requested: number,
          public readonly available: number
     ) {
          super(message, 'INSUFFICIENT_STOCK', 409);
     }
}

export class OverReleaseError extends DomainError {
     constructor(
          message: string,
          public readonly requested: number,
          public readonly reserved: number
     ) {
          super(message, 'OVER_RELEASE', 409);
     }
}

/**
 * Raised when a release targets a reservation that has already been released or expired.
 * Callers racing the sweeper see this instead of a second credit.
 */
export class ReservationInactiveError extends DomainError {
     constructor(
          public readonly reservationId: string,
          public readonly status: string
     ) {
          super(`Reservation ${reservationId} is no longer active (${status})`, 'RESERVATION_INACTIVE', 409);
     }
}

export class ReservationMismatchError extends DomainError {
     constructor(
          public readonly reservationId: string,
          message: string = `Reservation ${reservationId} belongs to a different product key`
     ) {
          super(message, 'RESERVATION_MISMATCH', 409);
     }
}

export class StockConstraintError extends DomainError {
     constructor(message: string) {
          super(message, 'STOCK_CONSTRAINT_VIOLATION', 409);
     }
}

export class InvalidQuantityError extends DomainError {
     constructor(message: string) {
          super(message, 'INVALID_QUANTITY', 400);
     }
}

export class TransientError extends DomainError {
     public readonly retriable = true;

     constructor(
          message: string,
          code: string,
          public readonly originalError?: unknown
     ) {
          super(message, code, 503);
     }
}

export class ConcurrentModificationError extends TransientError {
     constructor(message: string = 'Stock record is being modified concurrently, retry later', originalError?: unknown) {
          super(message, 'CONCURRENT_MODIFICATION', originalError);
     }
}

export class PersistenceFailureError extends TransientError {
     constructor(message: string = 'Stock storage is unavailable, retry later', originalError?: unknown) {
          super(message, 'PERSISTENCE_FAILURE', originalError);
     }
}

/**
 * The connection dropped while COMMIT was in flight, so the transaction may have been
 * applied. Never retried automatically; callers reconcile by reading state back.
 */
export class CommitOutcomeUnknownError extends DomainError {
     constructor(
          message: string = 'Stock storage connection was lost during commit; the change may have been applied',
          public readonly originalError?: unknown
     ) {
          super(message, 'COMMIT_OUTCOME_UNKNOWN', 503);
     }
}
