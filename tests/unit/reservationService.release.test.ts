import { ReservationService, SWEEPER_ACTOR } from '@stockledger/shared/src/services/reservation-service';
import {
     InvalidQuantityError,
     LedgerNotFoundError,
     OverReleaseError,
     ReservationInactiveError,
     ReservationMismatchError,
     ReservationNotFoundError,
} from '@stockledger/shared/src/utils/errors';
import { InMemoryStockStore } from '../helpers/inMemoryStockStore';
import { createTestClock, sequentialIds, TestClock } from '../helpers/clock';

describe('ReservationService - Release Stock (Unit)', () => {
     let store: InMemoryStockStore;
     let clock: TestClock;
     let service: ReservationService;

     beforeEach(async () => {
          store = new InMemoryStockStore();
          clock = createTestClock('2026-03-01T10:00:00.000Z');
          service = new ReservationService(store, {
               defaultTtlMinutes: 30,
               clock: clock.now,
               generateId: sequentialIds(),
          });
          store.seedLedger({ sku: 'SKU-1' }, 20);

          // res-1: 2 units, res-2: 3 units, one minute apart
          await service.reserve({ sku: 'SKU-1', quantity: 2, holderId: 'cart-a' });
          clock.advance(60_000);
          await service.reserve({ sku: 'SKU-1', quantity: 3, holderId: 'cart-b' });
          clock.advance(60_000);
          store.movements.length = 0;
          store.events.length = 0;
     });

     describe('By reservation id', () => {
          it('should release the whole reservation', async () => {
               const result = await service.release({ sku: 'SKU-1', reservationId: 'res-2', reason: 'cart abandoned' });

               expect(result.releasedQuantity).toBe(3);
               expect(result.reservationIds).toEqual(['res-2']);
               expect(result.ledger).toMatchObject({ quantityAvailable: 18, quantityReserved: 2 });
               expect(store.reservations.get('res-2')).toMatchObject({
                    status: 'RELEASED',
                    releaseReason: 'cart abandoned',
                    releasedAt: new Date('2026-03-01T10:02:00.000Z'),
               });
               expect(store.reservations.get('res-1')?.status).toBe('ACTIVE');
          });

          it('should record a RELEASED movement attributed to the holder', async () => {
               await service.release({ sku: 'SKU-1', reservationId: 'res-2', reason: 'cart abandoned' });

               expect(store.movements).toEqual([
                    {
                         id: 3,
                         sku: 'SKU-1',
                         type: 'RELEASED',
                         quantityDelta: 3,
                         reason: 'cart abandoned',
                         referenceId: 'res-2',
                         actor: 'cart-b',
                         createdAt: new Date('2026-03-01T10:02:00.000Z'),
                    },
               ]);
               expect(store.events).toEqual([
                    {
                         type: 'StockReleased',
                         payload: {
                              reservationId: 'res-2',
                              sku: 'SKU-1',
                              variantSku: null,
                              quantity: 3,
                              status: 'RELEASED',
                              reason: 'cart abandoned',
                              timestamp: '2026-03-01T10:02:00.000Z',
                         },
                    },
               ]);
          });

          it('should accept the exact quantity and an explicit actor', async () => {
               await service.release({
                    sku: 'SKU-1',
                    reservationId: 'res-1',
                    quantity: 2,
                    reason: 'order cancelled',
                    actor: 'support-agent',
               });

               expect(store.movements[0].actor).toBe('support-agent');
          });

          it('should reject more than the reservation holds', async () => {
               await expect(
                    service.release({ sku: 'SKU-1', reservationId: 'res-1', quantity: 3, reason: 'x' })
               ).rejects.toBeInstanceOf(OverReleaseError);
          });

          it('should reject a partial release', async () => {
               await expect(
                    service.release({ sku: 'SKU-1', reservationId: 'res-2', quantity: 1, reason: 'x' })
               ).rejects.toBeInstanceOf(InvalidQuantityError);
               expect(store.ledger({ sku: 'SKU-1' })).toMatchObject({ quantityAvailable: 15, quantityReserved: 5 });
          });

          it('should fail for an unknown reservation', async () => {
               await expect(
                    service.release({ sku: 'SKU-1', reservationId: 'res-404', reason: 'x' })
               ).rejects.toBeInstanceOf(ReservationNotFoundError);
          });

          it('should fail when the reservation belongs to another product', async () => {
               store.seedLedger({ sku: 'SKU-2' }, 5);

               await expect(
                    service.release({ sku: 'SKU-2', reservationId: 'res-1', reason: 'x' })
               ).rejects.toThrow(new ReservationMismatchError('res-1', 'Reservation res-1 holds SKU-1, not SKU-2'));
               expect(store.reservations.get('res-1')?.status).toBe('ACTIVE');
          });

          it('should never credit a reservation twice', async () => {
               await service.release({ sku: 'SKU-1', reservationId: 'res-1', reason: 'first' });

               await expect(
                    service.release({ sku: 'SKU-1', reservationId: 'res-1', reason: 'second' })
               ).rejects.toThrow(new ReservationInactiveError('res-1', 'RELEASED'));
               expect(store.ledger({ sku: 'SKU-1' })).toMatchObject({ quantityAvailable: 17, quantityReserved: 3 });
          });
     });

     describe('By product key', () => {
          it('should release whole reservations oldest first', async () => {
               const result = await service.release({ sku: 'SKU-1', quantity: 2, reason: 'trim' });

               expect(result.reservationIds).toEqual(['res-1']);
               expect(result.ledger).toMatchObject({ quantityAvailable: 17, quantityReserved: 3 });
          });

          it('should release everything when no quantity is given', async () => {
               const result = await service.release({ sku: 'SKU-1', reason: 'session ended' });

               expect(result.releasedQuantity).toBe(5);
               expect(result.reservationIds).toEqual(['res-1', 'res-2']);
               expect(result.ledger).toMatchObject({ quantityAvailable: 20, quantityReserved: 0 });
               expect(store.movements.map((m) => m.quantityDelta)).toEqual([2, 3]);
               expect(store.activeReservedTotal({ sku: 'SKU-1' })).toBe(0);
          });

          it('should reject more than reserved', async () => {
               await expect(service.release({ sku: 'SKU-1', quantity: 6, reason: 'x' })).rejects.toBeInstanceOf(
                    OverReleaseError
               );
          });

          it('should reject a quantity that does not match whole reservations', async () => {
               await expect(service.release({ sku: 'SKU-1', quantity: 4, reason: 'x' })).rejects.toBeInstanceOf(
                    InvalidQuantityError
               );
               expect(store.ledger({ sku: 'SKU-1' })).toMatchObject({ quantityAvailable: 15, quantityReserved: 5 });
               expect(store.movements).toHaveLength(0);
          });

          it('should reject a release with nothing reserved', async () => {
               store.seedLedger({ sku: 'SKU-2' }, 5);
               await expect(service.release({ sku: 'SKU-2', reason: 'x' })).rejects.toBeInstanceOf(OverReleaseError);
          });

          it('should fail for an unknown product', async () => {
               await expect(service.release({ sku: 'UNKNOWN', reason: 'x' })).rejects.toBeInstanceOf(
                    LedgerNotFoundError
               );
          });

          it('should reject a non-positive quantity', async () => {
               await expect(service.release({ sku: 'SKU-1', quantity: 0, reason: 'x' })).rejects.toBeInstanceOf(
                    InvalidQuantityError
               );
          });

          it('should require a reason', async () => {
               await expect(service.release({ sku: 'SKU-1', reason: '' })).rejects.toThrow('reason is required');
          });
     });

     describe('expire', () => {
          it('should close the reservation as EXPIRED on behalf of the sweeper', async () => {
               const reservation = await service.getReservation('res-1');

               const result = await service.expire(reservation);

               expect(result.releasedQuantity).toBe(2);
               expect(store.reservations.get('res-1')).toMatchObject({ status: 'EXPIRED', releaseReason: 'expired' });
               expect(store.movements[0]).toMatchObject({ reason: 'expired', actor: SWEEPER_ACTOR, quantityDelta: 2 });
               expect(store.events[0].payload).toMatchObject({ status: 'EXPIRED' });
          });

          it('should refuse a reservation released in the meantime', async () => {
               const reservation = await service.getReservation('res-1');
               await service.release({ sku: 'SKU-1', reservationId: 'res-1', reason: 'checkout' });

               await expect(service.expire(reservation)).rejects.toBeInstanceOf(ReservationInactiveError);
               expect(store.ledger({ sku: 'SKU-1' })).toMatchObject({ quantityAvailable: 17, quantityReserved: 3 });
          });
     });
});
