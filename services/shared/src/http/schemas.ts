import { LedgerSnapshot, Reservation, StockMovement } from '../types/inventory.types';

// JSON shapes shared by both APIs. Dates leave as ISO strings.

export interface LedgerSnapshotBody {
     sku: string;
     variantSku: string | null;
     exists: boolean;
     quantityAvailable: number;
     quantityReserved: number;
     totalQuantity: number;
     minimumStockLevel: number;
     reorderPoint: number;
     inStock: boolean;
     lowStock: boolean;
     belowMinimum: boolean;
     lastUpdated: string | null;
}

export interface ReservationBody {
     reservationId: string;
     sku: string;
     variantSku: string | null;
     quantity: number;
     holderId: string;
     status: string;
     orderId: string | null;
     source: string | null;
     createdAt: string;
     expiresAt: string;
     releasedAt: string | null;
     releaseReason: string | null;
}

export interface MovementBody {
     id: number;
     sku: string;
     variantSku: string | null;
     type: string;
     quantityDelta: number;
     reason: string;
     referenceId: string | null;
     actor: string;
     createdAt: string;
}

export function serializeSnapshot(snapshot: LedgerSnapshot): LedgerSnapshotBody {
     return {
          ...snapshot,
          lastUpdated: snapshot.lastUpdated ? snapshot.lastUpdated.toISOString() : null,
     };
}

export function serializeReservation(reservation: Reservation): ReservationBody {
     return {
          reservationId: reservation.reservationId,
          sku: reservation.sku,
          variantSku: reservation.variantSku ?? null,
          quantity: reservation.quantity,
          holderId: reservation.holderId,
          status: reservation.status,
          orderId: reservation.orderId ?? null,
          source: reservation.source ?? null,
          createdAt: reservation.createdAt.toISOString(),
          expiresAt: reservation.expiresAt.toISOString(),
          releasedAt: reservation.releasedAt ? reservation.releasedAt.toISOString() : null,
          releaseReason: reservation.releaseReason ?? null,
     };
}

export function serializeMovement(movement: StockMovement): MovementBody {
     return {
          id: movement.id,
          sku: movement.sku,
          variantSku: movement.variantSku ?? null,
          type: movement.type,
          quantityDelta: movement.quantityDelta,
          reason: movement.reason,
          referenceId: movement.referenceId ?? null,
          actor: movement.actor,
          createdAt: movement.createdAt.toISOString(),
     };
}

export const errorResponseSchema = {
     type: 'object',
     properties: {
          error: { type: 'string', example: 'INSUFFICIENT_STOCK' },
          message: { type: 'string' },
     },
};

export const ledgerSnapshotSchema = {
     type: 'object',
     properties: {
          sku: { type: 'string', example: 'BMW-F30-AC-001' },
          variantSku: { type: 'string', nullable: true },
          exists: { type: 'boolean' },
          quantityAvailable: { type: 'integer', example: 15 },
          quantityReserved: { type: 'integer', example: 5 },
          totalQuantity: { type: 'integer', example: 20 },
          minimumStockLevel: { type: 'integer', example: 5 },
          reorderPoint: { type: 'integer', example: 10 },
          inStock: { type: 'boolean' },
          lowStock: { type: 'boolean' },
          belowMinimum: { type: 'boolean' },
          lastUpdated: { type: 'string', format: 'date-time', nullable: true },
     },
};

export const reservationSchema = {
     type: 'object',
     properties: {
          reservationId: { type: 'string', format: 'uuid' },
          sku: { type: 'string' },
          variantSku: { type: 'string', nullable: true },
          quantity: { type: 'integer' },
          holderId: { type: 'string' },
          status: { type: 'string', enum: ['ACTIVE', 'RELEASED', 'EXPIRED'] },
          orderId: { type: 'string', nullable: true },
          source: { type: 'string', nullable: true },
          createdAt: { type: 'string', format: 'date-time' },
          expiresAt: { type: 'string', format: 'date-time' },
          releasedAt: { type: 'string', format: 'date-time', nullable: true },
          releaseReason: { type: 'string', nullable: true },
     },
};

export const movementSchema = {
     type: 'object',
     properties: {
          id: { type: 'integer' },
          sku: { type: 'string' },
          variantSku: { type: 'string', nullable: true },
          type: { type: 'string', enum: ['INCOMING', 'OUTGOING', 'ADJUSTMENT', 'RESERVED', 'RELEASED'] },
          quantityDelta: { type: 'integer' },
          reason: { type: 'string' },
          referenceId: { type: 'string', nullable: true },
          actor: { type: 'string' },
          createdAt: { type: 'string', format: 'date-time' },
     },
};
