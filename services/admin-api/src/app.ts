import { FastifyInstance } from 'fastify';
import { createServer } from '@stockledger/shared/src/http/server';
import { StockStore } from '@stockledger/shared/src/stores/stock-store';
import { ReservationService } from '@stockledger/shared/src/services/reservation-service';
import { MovementLog } from '@stockledger/shared/src/services/movement-log';
import { ExpirationSweeper } from '@stockledger/shared/src/services/expiration-sweeper';
import { registerAdminRoutes } from './routes/admin';

export interface AdminApiOptions {
     store: StockStore;
     port: number;
     checkReady: () => Promise<boolean>;
     clock?: () => Date;
     logRequests?: boolean;
}

export async function buildAdminApi(options: AdminApiOptions): Promise<FastifyInstance> {
     const movements = new MovementLog(options.store);
     const reservations = new ReservationService(options.store, {
          movementLog: movements,
          clock: options.clock,
     });
     const sweeper = new ExpirationSweeper(options.store, reservations, { clock: options.clock });

     const app = await createServer({
          title: 'Stock Ledger Admin API',
          description: 'Control-plane API for stock adjustments, movement audit and reservation expiry',
          port: options.port,
          tags: [{ name: 'inventory-admin', description: 'Stock administrative operations' }],
          checkReady: options.checkReady,
          logRequests: options.logRequests,
     });

     await app.register(registerAdminRoutes, {
          prefix: '/admin',
          reservations,
          movements,
          sweeper,
     });

     return app;
}
