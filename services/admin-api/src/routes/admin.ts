import { FastifyPluginAsync } from 'fastify';
import { ReservationService } from '@stockledger/shared/src/services/reservation-service';
import { MovementLog } from '@stockledger/shared/src/services/movement-log';
import { ExpirationSweeper } from '@stockledger/shared/src/services/expiration-sweeper';
import { sendError } from '@stockledger/shared/src/http/server';
import { serializeMovement, serializeSnapshot } from '@stockledger/shared/src/http/schemas';
import type { StockMovementType } from '@stockledger/shared/src/types/inventory.types';
import {
     adjustStockSchema,
     listMovementsSchema,
     movementStatisticsSchema,
     sweepReservationsSchema,
} from '../schemas/admin.schemas';

const STATISTICS_WINDOW_MS = 30 * 24 * 60 * 60 * 1000;

export interface AdminRoutesOptions {
     reservations: ReservationService;
     movements: MovementLog;
     sweeper: ExpirationSweeper;
}

interface AdjustBody {
     variantSku?: string;
     newAvailable: number;
     reason: string;
     actor: string;
     referenceId?: string;
     minimumStockLevel?: number;
     reorderPoint?: number;
}

interface MovementQuery {
     sku?: string;
     variantSku?: string;
     type?: StockMovementType;
     actor?: string;
     referenceId?: string;
     from?: string;
     to?: string;
     limit?: number;
}

function optionalDate(value: string | undefined): Date | undefined {
     return value === undefined ? undefined : new Date(value);
}

export const registerAdminRoutes: FastifyPluginAsync<AdminRoutesOptions> = async (
     app,
     { reservations, movements, sweeper }
) => {
     // Absolute stock adjustment
     app.put<{ Params: { sku: string }; Body: AdjustBody }>(
          '/inventory/:sku/stock',
          { schema: adjustStockSchema },
          async (request, reply) => {
               try {
                    const snapshot = await reservations.adjustStock({
                         ...request.body,
                         sku: request.params.sku,
                    });

                    request.log.info(
                         { sku: snapshot.sku, variantSku: snapshot.variantSku, actor: request.body.actor },
                         'Stock adjusted via admin API'
                    );

                    return reply.send(serializeSnapshot(snapshot));
               } catch (error) {
                    return sendError(request, reply, error, 'Failed to adjust stock');
               }
          }
     );

     app.get<{ Querystring: MovementQuery }>(
          '/movements',
          { schema: listMovementsSchema },
          async (request, reply) => {
               const query = request.query;

               try {
                    const found = await movements.search({
                         key: query.sku ? { sku: query.sku, variantSku: query.variantSku } : undefined,
                         type: query.type,
                         actor: query.actor,
                         referenceId: query.referenceId,
                         from: optionalDate(query.from),
                         to: optionalDate(query.to),
                         limit: query.limit,
                    });

                    return reply.send({ movements: found.map(serializeMovement) });
               } catch (error) {
                    return sendError(request, reply, error, 'Failed to search movements');
               }
          }
     );

     app.get<{ Querystring: { from?: string; to?: string } }>(
          '/movements/statistics',
          { schema: movementStatisticsSchema },
          async (request, reply) => {
               const to = optionalDate(request.query.to) ?? new Date();
               const from =
                    optionalDate(request.query.from) ?? new Date(to.getTime() - STATISTICS_WINDOW_MS);

               try {
                    const statistics = await movements.statistics(from, to);
                    return reply.send({
                         from: from.toISOString(),
                         to: to.toISOString(),
                         statistics,
                    });
               } catch (error) {
                    return sendError(request, reply, error, 'Failed to compute movement statistics');
               }
          }
     );

     // Manual expiration pass
     app.post(
          '/reservations/sweep',
          { schema: sweepReservationsSchema },
          async (request, reply) => {
               try {
                    const result = await sweeper.sweepOnce();
                    request.log.info(result, 'Manual expiration sweep completed');
                    return reply.send(result);
               } catch (error) {
                    return sendError(request, reply, error, 'Failed to sweep reservations');
               }
          }
     );
};
