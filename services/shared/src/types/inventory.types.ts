// Type definitions for domain models

export interface ProductKey {
     sku: string;
     variantSku?: string;
}

export interface StockLedgerEntry extends ProductKey {
     quantityAvailable: number;
     quantityReserved: number;
     minimumStockLevel: number;
     reorderPoint: number;
     lastUpdated: Date;
}

export type ReservationStatus = 'ACTIVE' | 'RELEASED' | 'EXPIRED';

export interface Reservation extends ProductKey {
     reservationId: string;
     quantity: number;
     holderId: string;
     status: ReservationStatus;
     createdAt: Date;
     expiresAt: Date;
     orderId?: string;
     source?: string;
     releasedAt?: Date;
     releaseReason?: string;
}

export type StockMovementType = 'INCOMING' | 'OUTGOING' | 'ADJUSTMENT' | 'RESERVED' | 'RELEASED';

export const STOCK_MOVEMENT_TYPES: readonly StockMovementType[] = [
     'INCOMING',
     'OUTGOING',
     'ADJUSTMENT',
     'RESERVED',
     'RELEASED',
];

export interface NewStockMovement extends ProductKey {
     type: StockMovementType;
     quantityDelta: number;
     reason: string;
     referenceId?: string;
     actor: string;
}

export interface StockMovement extends NewStockMovement {
     id: number;
     createdAt: Date;
}

export interface MovementFilter {
     key?: ProductKey;
     type?: StockMovementType;
     actor?: string;
     referenceId?: string;
     from?: Date;
     to?: Date;
     limit?: number;
}

export interface MovementStatistic {
     type: StockMovementType;
     count: number;
     totalQuantity: number;
}

/** Consumer-facing view of a ledger entry. */
export interface LedgerSnapshot {
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
     lastUpdated: Date | null;
}

// Requests

export interface ReserveStockRequest extends ProductKey {
     quantity: number;
     holderId: string;
     ttlMinutes?: number;
     /** Overrides ttlMinutes; used for short holds. */
     ttlMs?: number;
     orderId?: string;
     source?: string;
}

export interface ReserveStockResult {
     reservationId: string;
     remainingAvailable: number;
     expiresAt: Date;
}

export interface ReleaseStockRequest extends ProductKey {
     quantity?: number;
     reservationId?: string;
     reason: string;
     actor?: string;
}

export interface ReleaseStockResult {
     releasedQuantity: number;
     reservationIds: string[];
     ledger: LedgerSnapshot;
}

export interface AdjustStockRequest extends ProductKey {
     newAvailable: number;
     reason: string;
     actor: string;
     referenceId?: string;
     minimumStockLevel?: number;
     reorderPoint?: number;
}

// Domain events

export type StockEventType = 'StockReserved' | 'StockReleased' | 'StockAdjusted' | 'LowStockDetected';

export interface StockReservedEvent {
     reservationId: string;
     sku: string;
     variantSku: string | null;
     quantity: number;
     holderId: string;
     orderId: string | null;
     expiresAt: string;
     timestamp: string;
}

export interface StockReleasedEvent {
     reservationId: string;
     sku: string;
     variantSku: string | null;
     quantity: number;
     status: ReservationStatus;
     reason: string;
     timestamp: string;
}

export interface StockAdjustedEvent {
     sku: string;
     variantSku: string | null;
     quantityDelta: number;
     newAvailable: number;
     reason: string;
     actor: string;
     timestamp: string;
}

export interface LowStockDetectedEvent {
     sku: string;
     variantSku: string | null;
     quantityAvailable: number;
     reorderPoint: number;
     minimumStockLevel: number;
     timestamp: string;
}

/** Position in the (expiresAt, reservationId) order of the expiry scan. */
export interface ExpiryCursor {
     expiresAt: Date;
     reservationId: string;
}

export interface SweepResult {
     scanned: number;
     expired: number;
     skipped: number;
     failed: number;
}
