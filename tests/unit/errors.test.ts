import {
     DomainError,
     LedgerNotFoundError,
     ReservationNotFoundError,
     InsufficientStockError,
     OverReleaseError,
     ReservationInactiveError,
     ReservationMismatchError,
     StockConstraintError,
     InvalidQuantityError,
     TransientError,
     ConcurrentModificationError,
     PersistenceFailureError,
     CommitOutcomeUnknownError,
} from '@stockledger/shared/src/utils/errors';

describe('Error Classes', () => {
     describe('DomainError', () => {
          it('should create a domain error with message and code', () => {
               const error = new DomainError('Test error', 'TEST_CODE');
               expect(error.message).toBe('Test error');
               expect(error.code).toBe('TEST_CODE');
               expect(error.statusCode).toBe(400);
               expect(error.name).toBe('DomainError');
               expect(error instanceof Error).toBe(true);
          });

          it('should accept custom status code', () => {
               const error = new DomainError('Test error', 'TEST_CODE', 500);
               expect(error.statusCode).toBe(500);
          });
     });

     describe('LedgerNotFoundError', () => {
          it('should describe a key without variant', () => {
               const error = new LedgerNotFoundError('BMW-F30-AC-001');
               expect(error.message).toBe('No stock ledger entry for BMW-F30-AC-001');
               expect(error.code).toBe('LEDGER_NOT_FOUND');
               expect(error.statusCode).toBe(404);
               expect(error.variantSku).toBeUndefined();
          });

          it('should describe a key with variant', () => {
               const error = new LedgerNotFoundError('AUDI-B8-HL-220', 'LEFT');
               expect(error.message).toBe('No stock ledger entry for AUDI-B8-HL-220 variant LEFT');
               expect(error.variantSku).toBe('LEFT');
          });
     });

     describe('ReservationNotFoundError', () => {
          it('should carry the reservation id', () => {
               const error = new ReservationNotFoundError('res-9');
               expect(error.message).toBe('Reservation res-9 not found');
               expect(error.code).toBe('RESERVATION_NOT_FOUND');
               expect(error.statusCode).toBe(404);
               expect(error.reservationId).toBe('res-9');
          });
     });

     describe('InsufficientStockError', () => {
          it('should create error with message and details', () => {
               const error = new InsufficientStockError('Insufficient stock for SKU-1', 'SKU-1', 10, 5);
               expect(error.code).toBe('INSUFFICIENT_STOCK');
               expect(error.statusCode).toBe(409);
               expect(error.sku).toBe('SKU-1');
               expect(error.requested).toBe(10);
               expect(error.available).toBe(5);
               expect(error.name).toBe('InsufficientStockError');
          });
     });

     describe('release errors', () => {
          it('should map over-release to 409', () => {
               const error = new OverReleaseError('too much', 8, 3);
               expect(error.code).toBe('OVER_RELEASE');
               expect(error.statusCode).toBe(409);
               expect(error.requested).toBe(8);
               expect(error.reserved).toBe(3);
          });

          it('should report the status of an inactive reservation', () => {
               const error = new ReservationInactiveError('res-1', 'EXPIRED');
               expect(error.message).toBe('Reservation res-1 is no longer active (EXPIRED)');
               expect(error.code).toBe('RESERVATION_INACTIVE');
               expect(error.statusCode).toBe(409);
          });

          it('should default the mismatch message', () => {
               const error = new ReservationMismatchError('res-2');
               expect(error.message).toBe('Reservation res-2 belongs to a different product key');
               expect(error.code).toBe('RESERVATION_MISMATCH');
          });
     });

     describe('StockConstraintError and InvalidQuantityError', () => {
          it('should use their codes and statuses', () => {
               expect(new StockConstraintError('x').code).toBe('STOCK_CONSTRAINT_VIOLATION');
               expect(new StockConstraintError('x').statusCode).toBe(409);
               expect(new InvalidQuantityError('x').code).toBe('INVALID_QUANTITY');
               expect(new InvalidQuantityError('x').statusCode).toBe(400);
          });
     });

     describe('transient errors', () => {
          it('should mark concurrent modification as retriable 503', () => {
               const original = new Error('deadlock detected');
               const error = new ConcurrentModificationError(undefined, original);
               expect(error).toBeInstanceOf(TransientError);
               expect(error).toBeInstanceOf(DomainError);
               expect(error.retriable).toBe(true);
               expect(error.statusCode).toBe(503);
               expect(error.code).toBe('CONCURRENT_MODIFICATION');
               expect(error.message).toBe('Stock record is being modified concurrently, retry later');
               expect(error.originalError).toBe(original);
          });

          it('should mark persistence failure as retriable 503', () => {
               const error = new PersistenceFailureError();
               expect(error.code).toBe('PERSISTENCE_FAILURE');
               expect(error.statusCode).toBe(503);
               expect(error.message).toBe('Stock storage is unavailable, retry later');
          });
     });

     describe('CommitOutcomeUnknownError', () => {
          it('should be a 503 that is not marked retriable', () => {
               const cause = new Error('read ECONNRESET');
               const error = new CommitOutcomeUnknownError(undefined, cause);
               expect(error.code).toBe('COMMIT_OUTCOME_UNKNOWN');
               expect(error.statusCode).toBe(503);
               expect(error).not.toBeInstanceOf(TransientError);
               expect(error.originalError).toBe(cause);
          });
     });
});
