import { FastifyInstance } from 'fastify';
import { buildAdminApi } from '../../services/admin-api/src/app';
import { ReservationService } from '@stockledger/shared/src/services/reservation-service';
import { InMemoryStockStore } from '../helpers/inMemoryStockStore';
import { createTestClock, sequentialIds, TestClock } from '../helpers/clock';

describe('Admin API (Integration)', () => {
     let store: InMemoryStockStore;
     let clock: TestClock;
     let app: FastifyInstance;

     beforeEach(async () => {
          store = new InMemoryStockStore();
          clock = createTestClock('2026-03-01T10:00:00.000Z');
          app = await buildAdminApi({
               store,
               port: 3100,
               checkReady: async () => true,
               clock: clock.now,
               logRequests: false,
          });
     });

     afterEach(async () => {
          await app.close();
     });

     describe('PUT /admin/inventory/:sku/stock', () => {
          it('should create and stock a new product', async () => {
               const response = await app.inject({
                    method: 'PUT',
                    url: '/admin/inventory/NEW-1/stock',
                    payload: { newAvailable: 12, reason: 'goods received', actor: 'warehouse-admin' },
               });

               expect(response.statusCode).toBe(200);
               expect(response.json()).toEqual({
                    sku: 'NEW-1',
                    variantSku: null,
                    exists: true,
                    quantityAvailable: 12,
                    quantityReserved: 0,
                    totalQuantity: 12,
                    minimumStockLevel: 5,
                    reorderPoint: 10,
                    inStock: true,
                    lowStock: false,
                    belowMinimum: false,
                    lastUpdated: '2026-03-01T10:00:00.000Z',
               });
               expect(store.movements[0]).toMatchObject({ type: 'INCOMING', quantityDelta: 12, actor: 'warehouse-admin' });
          });

          it('should answer 409 below the reserved quantity', async () => {
               store.seedLedger({ sku: 'SKU-1' }, 10, { quantityReserved: 6 });

               const response = await app.inject({
                    method: 'PUT',
                    url: '/admin/inventory/SKU-1/stock',
                    payload: { newAvailable: 5, reason: 'damage', actor: 'warehouse-admin' },
               });

               expect(response.statusCode).toBe(409);
               expect(response.json()).toEqual({
                    error: 'STOCK_CONSTRAINT_VIOLATION',
                    message: 'Cannot set available stock of SKU-1 to 5: 6 units are reserved',
               });
          });

          it('should reject a negative level', async () => {
               const response = await app.inject({
                    method: 'PUT',
                    url: '/admin/inventory/SKU-1/stock',
                    payload: { newAvailable: -3, reason: 'damage', actor: 'warehouse-admin' },
               });

               expect(response.statusCode).toBe(400);
               expect(response.json().error).toBe('VALIDATION_ERROR');
          });
     });

     describe('movements', () => {
          beforeEach(async () => {
               await app.inject({
                    method: 'PUT',
                    url: '/admin/inventory/SKU-1/stock',
                    payload: { newAvailable: 30, reason: 'goods received', actor: 'warehouse-admin', referenceId: 'PO-1' },
               });
               clock.advance(60_000);
               await app.inject({
                    method: 'PUT',
                    url: '/admin/inventory/SKU-1/stock',
                    payload: { newAvailable: 24, reason: 'stock-take', actor: 'auditor' },
               });
               clock.advance(60_000);
               await app.inject({
                    method: 'PUT',
                    url: '/admin/inventory/SKU-2/stock',
                    payload: { newAvailable: 7, reason: 'goods received', actor: 'warehouse-admin' },
               });
          });

          it('should list movements for a product newest first', async () => {
               const response = await app.inject({ method: 'GET', url: '/admin/movements?sku=SKU-1' });

               expect(response.statusCode).toBe(200);
               expect(response.json().movements).toEqual([
                    {
                         id: 2,
                         sku: 'SKU-1',
                         variantSku: null,
                         type: 'OUTGOING',
                         quantityDelta: -6,
                         reason: 'stock-take',
                         referenceId: null,
                         actor: 'auditor',
                         createdAt: '2026-03-01T10:01:00.000Z',
                    },
                    {
                         id: 1,
                         sku: 'SKU-1',
                         variantSku: null,
                         type: 'INCOMING',
                         quantityDelta: 30,
                         reason: 'goods received',
                         referenceId: 'PO-1',
                         actor: 'warehouse-admin',
                         createdAt: '2026-03-01T10:00:00.000Z',
                    },
               ]);
          });

          it('should combine filters and honour the limit', async () => {
               const byActor = await app.inject({ method: 'GET', url: '/admin/movements?actor=warehouse-admin&limit=1' });
               expect(byActor.json().movements.map((m: { id: number }) => m.id)).toEqual([3]);

               const byType = await app.inject({ method: 'GET', url: '/admin/movements?type=OUTGOING' });
               expect(byType.json().movements).toHaveLength(1);
          });

          it('should reject an unknown movement type', async () => {
               const response = await app.inject({ method: 'GET', url: '/admin/movements?type=STOLEN' });

               expect(response.statusCode).toBe(400);
          });

          it('should total movements per type over a window', async () => {
               const response = await app.inject({
                    method: 'GET',
                    url: '/admin/movements/statistics?from=2026-03-01T00:00:00.000Z&to=2026-03-02T00:00:00.000Z',
               });

               expect(response.statusCode).toBe(200);
               expect(response.json()).toEqual({
                    from: '2026-03-01T00:00:00.000Z',
                    to: '2026-03-02T00:00:00.000Z',
                    statistics: [
                         { type: 'INCOMING', count: 2, totalQuantity: 37 },
                         { type: 'OUTGOING', count: 1, totalQuantity: 6 },
                    ],
               });
          });

          it('should reject a reversed window', async () => {
               const response = await app.inject({
                    method: 'GET',
                    url: '/admin/movements/statistics?from=2026-03-02T00:00:00.000Z&to=2026-03-01T00:00:00.000Z',
               });

               expect(response.statusCode).toBe(400);
               expect(response.json()).toEqual({
                    error: 'INVALID_DATE_RANGE',
                    message: 'Date range start must not be after its end',
               });
          });
     });

     describe('POST /admin/reservations/sweep', () => {
          it('should expire overdue reservations', async () => {
               store.seedLedger({ sku: 'SKU-1' }, 10);
               const reservations = new ReservationService(store, { clock: clock.now, generateId: sequentialIds() });
               await reservations.reserve({ sku: 'SKU-1', quantity: 3, holderId: 'user-1', ttlMinutes: 5 });
               await reservations.reserve({ sku: 'SKU-1', quantity: 2, holderId: 'user-2', ttlMinutes: 60 });
               clock.advance(10 * 60_000);

               const response = await app.inject({ method: 'POST', url: '/admin/reservations/sweep' });

               expect(response.statusCode).toBe(200);
               expect(response.json()).toEqual({ scanned: 1, expired: 1, skipped: 0, failed: 0 });
               expect(store.ledger({ sku: 'SKU-1' })).toMatchObject({ quantityAvailable: 8, quantityReserved: 2 });
          });
     });
});
