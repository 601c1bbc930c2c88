import { ReservationService } from '@stockledger/shared/src/services/reservation-service';
import { MovementLog } from '@stockledger/shared/src/services/movement-log';
import { InMemoryStockStore } from '../helpers/inMemoryStockStore';
import { createTestClock, sequentialIds } from '../helpers/clock';

const SKU = 'BMW-F30-AC-001';

describe('Reservation lifecycle (Integration)', () => {
     let store: InMemoryStockStore;
     let movements: MovementLog;
     let service: ReservationService;

     beforeEach(() => {
          store = new InMemoryStockStore();
          const clock = createTestClock('2026-03-01T10:00:00.000Z');
          movements = new MovementLog(store);
          service = new ReservationService(store, {
               defaultTtlMinutes: 30,
               clock: clock.now,
               generateId: sequentialIds(),
               movementLog: movements,
          });
          store.seedLedger({ sku: SKU }, 20);
     });

     it('should reserve and release a cart hold back to the starting level', async () => {
          const reserved = await service.reserve({ sku: SKU, quantity: 5, holderId: 'user-1' });
          expect(reserved.remainingAvailable).toBe(15);
          await expect(service.getLedgerSnapshot({ sku: SKU })).resolves.toMatchObject({
               quantityAvailable: 15,
               quantityReserved: 5,
               totalQuantity: 20,
          });

          const released = await service.release({ sku: SKU, quantity: 5, reason: 'cart abandoned' });
          expect(released.reservationIds).toEqual([reserved.reservationId]);
          await expect(service.getLedgerSnapshot({ sku: SKU })).resolves.toMatchObject({
               quantityAvailable: 20,
               quantityReserved: 0,
          });

          const history = await movements.byProduct({ sku: SKU });
          expect(history.map((m) => [m.type, m.quantityDelta, m.referenceId])).toEqual([
               ['RELEASED', 5, 'res-1'],
               ['RESERVED', -5, 'res-1'],
          ]);
          await expect(movements.byReference('res-1')).resolves.toHaveLength(2);
          await expect(service.listActiveReservations('user-1')).resolves.toEqual([]);
     });

     it('should publish one outbox event per change in commit order', async () => {
          await service.reserve({ sku: SKU, quantity: 11, holderId: 'user-1' });
          await service.release({ sku: SKU, reservationId: 'res-1', reason: 'payment failed' });
          await service.adjustStock({ sku: SKU, newAvailable: 25, reason: 'goods received', actor: 'warehouse-1' });

          expect(store.events.map((e) => e.type)).toEqual([
               'StockReserved',
               'LowStockDetected',
               'StockReleased',
               'StockAdjusted',
          ]);
     });

     it('should write nothing when an operation fails', async () => {
          await expect(service.reserve({ sku: SKU, quantity: 21, holderId: 'user-1' })).rejects.toThrow();

          expect(store.ledger({ sku: SKU })).toMatchObject({ quantityAvailable: 20, quantityReserved: 0 });
          expect(store.reservations.size).toBe(0);
          expect(store.movements).toHaveLength(0);
          expect(store.events).toHaveLength(0);
     });
});
