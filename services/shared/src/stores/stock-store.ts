import {
     ExpiryCursor,
     MovementFilter,
     MovementStatistic,
     NewStockMovement,
     ProductKey,
     Reservation,
     ReservationStatus,
     StockEventType,
     StockLedgerEntry,
     StockMovement,
} from '../types/inventory.types';

export const DEFAULT_MOVEMENT_LIMIT = 100;
export const MAX_MOVEMENT_LIMIT = 1000;

export function resolveMovementLimit(limit?: number): number {
     if (limit === undefined || !Number.isInteger(limit) || limit < 1) {
          return DEFAULT_MOVEMENT_LIMIT;
     }
     return Math.min(limit, MAX_MOVEMENT_LIMIT);
}

/**
 * Work that runs inside one store transaction. Every lock* method holds its row
 * until the transaction ends, so a read-validate-write sequence is atomic per key.
 */
export interface StockTransaction {
     /** Locks and returns the ledger row, or null when the key has none. */
     lockLedger(key: ProductKey): Promise<StockLedgerEntry | null>;
     /** Inserts a zero-stock row when absent, then locks it. */
     lockOrCreateLedger(key: ProductKey, now: Date): Promise<StockLedgerEntry>;
     saveLedger(entry: StockLedgerEntry): Promise<StockLedgerEntry>;

     insertReservation(reservation: Reservation): Promise<void>;
     lockReservation(reservationId: string): Promise<Reservation | null>;
     lockActiveReservations(key: ProductKey): Promise<Reservation[]>;
     closeReservation(
          reservationId: string,
          status: Exclude<ReservationStatus, 'ACTIVE'>,
          reason: string,
          closedAt: Date
     ): Promise<void>;

     appendMovement(movement: NewStockMovement, createdAt: Date): Promise<StockMovement>;
     enqueueEvent(type: StockEventType, payload: object): Promise<void>;
}

/**
 * Durable home of the ledger, reservations, movements and outbox events.
 * Read methods run outside any transaction and never lock.
 */
export interface StockStore {
     transaction<T>(fn: (tx: StockTransaction) => Promise<T>): Promise<T>;

     findLedger(key: ProductKey): Promise<StockLedgerEntry | null>;
     findLedgers(keys: ProductKey[]): Promise<StockLedgerEntry[]>;

     findReservation(reservationId: string): Promise<Reservation | null>;
     findActiveReservationsByHolder(holderId: string): Promise<Reservation[]>;
     /** Expired active reservations ordered by (expiresAt, reservationId), strictly after `after` when given. */
     findExpiredReservations(now: Date, limit: number, after?: ExpiryCursor): Promise<Reservation[]>;

     findMovements(filter: MovementFilter): Promise<StockMovement[]>;
     movementStatistics(from: Date, to: Date): Promise<MovementStatistic[]>;
}
