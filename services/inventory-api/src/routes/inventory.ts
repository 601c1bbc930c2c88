import { FastifyPluginAsync } from 'fastify';
import { ReservationService } from '@stockledger/shared/src/services/reservation-service';
import { StockQueryService } from '@stockledger/shared/src/services/stock-query-service';
import { sendError } from '@stockledger/shared/src/http/server';
import { serializeReservation, serializeSnapshot } from '@stockledger/shared/src/http/schemas';
import type { ProductKey } from '@stockledger/shared/src/types/inventory.types';
import {
    reserveStockSchema,
    releaseStockSchema,
    bulkQuerySchema,
    getStockSchema,
    checkAvailabilitySchema,
    getReservationSchema,
    listHolderReservationsSchema,
} from '../schemas/inventory.schemas';

export interface InventoryRoutesOptions {
    reservations: ReservationService;
    queries: StockQueryService;
}

interface ReserveBody extends ProductKey {
    quantity: number;
    holderId: string;
    ttlMinutes?: number;
    orderId?: string;
    source?: string;
}

interface ReleaseBody extends ProductKey {
    quantity?: number;
    reservationId?: string;
    reason: string;
}

export const registerInventoryRoutes: FastifyPluginAsync<InventoryRoutesOptions> = async (
    app,
    { reservations, queries }
) => {
    // Reserve stock for a holder
    app.post<{ Body: ReserveBody }>(
        '/reserve',
        { schema: reserveStockSchema },
        async (request, reply) => {
            try {
                const result = await reservations.reserve(request.body);

                return reply.code(201).send({
                    reservationId: result.reservationId,
                    remainingAvailable: result.remainingAvailable,
                    expiresAt: result.expiresAt.toISOString(),
                });
            } catch (error) {
                return sendError(request, reply, error, 'Failed to reserve stock');
            }
        }
    );

    // Release a reservation, or reservations of a product
    app.post<{ Body: ReleaseBody }>(
        '/release',
        { schema: releaseStockSchema },
        async (request, reply) => {
            try {
                const result = await reservations.release(request.body);

                return reply.code(200).send({
                    status: 'ok',
                    releasedQuantity: result.releasedQuantity,
                    reservationIds: result.reservationIds,
                });
            } catch (error) {
                return sendError(request, reply, error, 'Failed to release stock');
            }
        }
    );

    app.post<{ Body: { items: ProductKey[] } }>(
        '/bulk-query',
        { schema: bulkQuerySchema },
        async (request, reply) => {
            try {
                const snapshots = await queries.bulkQuery(request.body.items);
                return reply.send({ items: snapshots.map(serializeSnapshot) });
            } catch (error) {
                return sendError(request, reply, error, 'Failed to query stock');
            }
        }
    );

    app.get<{ Params: { reservationId: string } }>(
        '/reservations/:reservationId',
        { schema: getReservationSchema },
        async (request, reply) => {
            try {
                const reservation = await reservations.getReservation(request.params.reservationId);
                return reply.send(serializeReservation(reservation));
            } catch (error) {
                return sendError(request, reply, error, 'Failed to get reservation');
            }
        }
    );

    app.get<{ Params: { holderId: string } }>(
        '/holders/:holderId/reservations',
        { schema: listHolderReservationsSchema },
        async (request, reply) => {
            try {
                const active = await reservations.listActiveReservations(request.params.holderId);
                return reply.send({ reservations: active.map(serializeReservation) });
            } catch (error) {
                return sendError(request, reply, error, 'Failed to list reservations');
            }
        }
    );

    // Ledger snapshot for a SKU
    app.get<{ Params: { sku: string }; Querystring: { variantSku?: string } }>(
        '/:sku',
        { schema: getStockSchema },
        async (request, reply) => {
            try {
                const snapshot = await queries.query({
                    sku: request.params.sku,
                    variantSku: request.query.variantSku,
                });
                return reply.send(serializeSnapshot(snapshot));
            } catch (error) {
                return sendError(request, reply, error, 'Failed to get stock');
            }
        }
    );

    app.get<{
        Params: { sku: string };
        Querystring: { quantity: number; variantSku?: string };
    }>(
        '/:sku/available',
        { schema: checkAvailabilitySchema },
        async (request, reply) => {
            try {
                const available = await queries.isAvailable(
                    { sku: request.params.sku, variantSku: request.query.variantSku },
                    request.query.quantity
                );
                return reply.send({ available });
            } catch (error) {
                return sendError(request, reply, error, 'Failed to check availability');
            }
        }
    );
};
