import { FastifyInstance } from 'fastify';
import { createServer } from '@stockledger/shared/src/http/server';
import { StockStore } from '@stockledger/shared/src/stores/stock-store';
import { ReservationService } from '@stockledger/shared/src/services/reservation-service';
import { StockQueryService } from '@stockledger/shared/src/services/stock-query-service';
import { registerInventoryRoutes } from './routes/inventory';

export interface InventoryApiOptions {
    store: StockStore;
    port: number;
    checkReady: () => Promise<boolean>;
    reservationService?: ReservationService;
    logRequests?: boolean;
}

export async function buildInventoryApi(options: InventoryApiOptions): Promise<FastifyInstance> {
    const queries = new StockQueryService(options.store);
    const reservations =
        options.reservationService ??
        new ReservationService(options.store, { queryService: queries });

    const app = await createServer({
        title: 'Stock Ledger Inventory API',
        description: 'Order-path stock operations: reserve, release and availability queries',
        port: options.port,
        tags: [{ name: 'inventory', description: 'Stock reservation and query operations' }],
        checkReady: options.checkReady,
        logRequests: options.logRequests,
    });

    await app.register(registerInventoryRoutes, {
        prefix: '/inventory',
        reservations,
        queries,
    });

    return app;
}
