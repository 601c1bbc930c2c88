import { Pool, PoolClient } from 'pg';
import { pool, withTransactionRetry } from '../db/client';
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
     StockMovementType,
} from '../types/inventory.types';
import { ReservationInactiveError } from '../utils/errors';
import { resolveMovementLimit, StockStore, StockTransaction } from './stock-store';

// Postgres stores "no variant" as '' so (sku, variant_sku) can be the primary key.
const NO_VARIANT = '';

export interface LedgerRow {
     sku: string;
     variant_sku: string;
     quantity_available: number;
     quantity_reserved: number;
     minimum_stock_level: number;
     reorder_point: number;
     last_updated: Date;
}

export interface ReservationRow {
     reservation_id: string;
     sku: string;
     variant_sku: string;
     quantity: number;
     holder_id: string;
     order_id: string | null;
     source: string | null;
     status: ReservationStatus;
     created_at: Date;
     expires_at: Date;
     released_at: Date | null;
     release_reason: string | null;
}

export interface MovementRow {
     id: string | number;
     sku: string;
     variant_sku: string;
     movement_type: StockMovementType;
     quantity_delta: number;
     reason: string;
     reference_id: string | null;
     actor: string;
     created_at: Date;
}

const LEDGER_COLUMNS = `sku, variant_sku, quantity_available, quantity_reserved,
       minimum_stock_level, reorder_point, last_updated`;

const RESERVATION_COLUMNS = `reservation_id, sku, variant_sku, quantity, holder_id, order_id, source,
       status, created_at, expires_at, released_at, release_reason`;

const MOVEMENT_COLUMNS = `id, sku, variant_sku, movement_type, quantity_delta, reason,
       reference_id, actor, created_at`;

function variantParam(key: ProductKey): string {
     return key.variantSku ?? NO_VARIANT;
}

function keyFromRow(row: { sku: string; variant_sku: string }): ProductKey {
     return row.variant_sku === NO_VARIANT
          ? { sku: row.sku }
          : { sku: row.sku, variantSku: row.variant_sku };
}

export function mapLedgerRow(row: LedgerRow): StockLedgerEntry {
     return {
          ...keyFromRow(row),
          quantityAvailable: row.quantity_available,
          quantityReserved: row.quantity_reserved,
          minimumStockLevel: row.minimum_stock_level,
          reorderPoint: row.reorder_point,
          lastUpdated: row.last_updated,
     };
}

export function mapReservationRow(row: ReservationRow): Reservation {
     return {
          ...keyFromRow(row),
          reservationId: row.reservation_id,
          quantity: row.quantity,
          holderId: row.holder_id,
          status: row.status,
          createdAt: row.created_at,
          expiresAt: row.expires_at,
          orderId: row.order_id || undefined,
          source: row.source || undefined,
          releasedAt: row.released_at || undefined,
          releaseReason: row.release_reason || undefined,
     };
}

export function mapMovementRow(row: MovementRow): StockMovement {
     return {
          ...keyFromRow(row),
          // PostgreSQL returns bigint as string
          id: parseInt(String(row.id), 10),
          type: row.movement_type,
          quantityDelta: row.quantity_delta,
          reason: row.reason,
          referenceId: row.reference_id || undefined,
          actor: row.actor,
          createdAt: row.created_at,
     };
}

export class PgStockTransaction implements StockTransaction {
     constructor(private readonly client: PoolClient) {}

     async lockLedger(key: ProductKey): Promise<StockLedgerEntry | null> {
          const { rows } = await this.client.query<LedgerRow>(
               `
      SELECT ${LEDGER_COLUMNS}
      FROM stock_ledger
      WHERE sku = $1 AND variant_sku = $2
      FOR UPDATE
    `,
               [key.sku, variantParam(key)]
          );

          return rows.length === 0 ? null : mapLedgerRow(rows[0]);
     }

     async lockOrCreateLedger(key: ProductKey, now: Date): Promise<StockLedgerEntry> {
          await this.client.query(
               `
      INSERT INTO stock_ledger (sku, variant_sku, last_updated)
      VALUES ($1, $2, $3)
      ON CONFLICT (sku, variant_sku) DO NOTHING
    `,
               [key.sku, variantParam(key), now]
          );

          const entry = await this.lockLedger(key);
          if (!entry) {
               throw new Error(`Stock ledger row for ${key.sku} vanished after insert`);
          }
          return entry;
     }

     async saveLedger(entry: StockLedgerEntry): Promise<StockLedgerEntry> {
          const { rows } = await this.client.query<LedgerRow>(
               `
      UPDATE stock_ledger
      SET quantity_available = $3,
          quantity_reserved = $4,
          minimum_stock_level = $5,
          reorder_point = $6,
          last_updated = $7
      WHERE sku = $1 AND variant_sku = $2
      RETURNING ${LEDGER_COLUMNS}
    `,
               [
                    entry.sku,
                    variantParam(entry),
                    entry.quantityAvailable,
                    entry.quantityReserved,
                    entry.minimumStockLevel,
                    entry.reorderPoint,
                    entry.lastUpdated,
               ]
          );

          if (rows.length === 0) {
               throw new Error(`Stock ledger row for ${entry.sku} not found on save`);
          }
          return mapLedgerRow(rows[0]);
     }

     async insertReservation(reservation: Reservation): Promise<void> {
          await this.client.query(
               `
      INSERT INTO stock_reservation (
        reservation_id,
        sku,
        variant_sku,
        quantity,
        holder_id,
        order_id,
        source,
        status,
        created_at,
        expires_at
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
    `,
               [
                    reservation.reservationId,
                    reservation.sku,
                    variantParam(reservation),
                    reservation.quantity,
                    reservation.holderId,
                    reservation.orderId ?? null,
                    reservation.source ?? null,
                    reservation.status,
                    reservation.createdAt,
                    reservation.expiresAt,
               ]
          );
     }

     async lockReservation(reservationId: string): Promise<Reservation | null> {
          const { rows } = await this.client.query<ReservationRow>(
               `
      SELECT ${RESERVATION_COLUMNS}
      FROM stock_reservation
      WHERE reservation_id = $1
      FOR UPDATE
    `,
               [reservationId]
          );

          return rows.length === 0 ? null : mapReservationRow(rows[0]);
     }

     async lockActiveReservations(key: ProductKey): Promise<Reservation[]> {
          const { rows } = await this.client.query<ReservationRow>(
               `
      SELECT ${RESERVATION_COLUMNS}
      FROM stock_reservation
      WHERE sku = $1 AND variant_sku = $2 AND status = 'ACTIVE'
      ORDER BY created_at, reservation_id
      FOR UPDATE
    `,
               [key.sku, variantParam(key)]
          );

          return rows.map(mapReservationRow);
     }

     async closeReservation(
          reservationId: string,
          status: Exclude<ReservationStatus, 'ACTIVE'>,
          reason: string,
          closedAt: Date
     ): Promise<void> {
          const result = await this.client.query(
               `
      UPDATE stock_reservation
      SET status = $2,
          release_reason = $3,
          released_at = $4
      WHERE reservation_id = $1 AND status = 'ACTIVE'
    `,
               [reservationId, status, reason, closedAt]
          );

          if (result.rowCount === 0) {
               throw new ReservationInactiveError(reservationId, 'INACTIVE');
          }
     }

     async appendMovement(movement: NewStockMovement, createdAt: Date): Promise<StockMovement> {
          const { rows } = await this.client.query<MovementRow>(
               `
      INSERT INTO stock_movement (
        sku,
        variant_sku,
        movement_type,
        quantity_delta,
        reason,
        reference_id,
        actor,
        created_at
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
      RETURNING ${MOVEMENT_COLUMNS}
    `,
               [
                    movement.sku,
                    variantParam(movement),
                    movement.type,
                    movement.quantityDelta,
                    movement.reason,
                    movement.referenceId ?? null,
                    movement.actor,
                    createdAt,
               ]
          );

          return mapMovementRow(rows[0]);
     }

     async enqueueEvent(type: StockEventType, payload: object): Promise<void> {
          await this.client.query(
               `
      INSERT INTO domain_event (type, payload)
      VALUES ($1, $2::jsonb)
    `,
               [type, JSON.stringify(payload)]
          );
     }
}

type TransactionRunner = <T>(fn: (client: PoolClient) => Promise<T>) => Promise<T>;

export class PgStockStore implements StockStore {
     constructor(
          private readonly db: Pool = pool,
          private readonly runInTransaction: TransactionRunner = (fn) => withTransactionRetry(fn)
     ) {}

     transaction<T>(fn: (tx: StockTransaction) => Promise<T>): Promise<T> {
          return this.runInTransaction((client) => fn(new PgStockTransaction(client)));
     }

     async findLedger(key: ProductKey): Promise<StockLedgerEntry | null> {
          const { rows } = await this.db.query<LedgerRow>(
               `
      SELECT ${LEDGER_COLUMNS}
      FROM stock_ledger
      WHERE sku = $1 AND variant_sku = $2
    `,
               [key.sku, variantParam(key)]
          );

          return rows.length === 0 ? null : mapLedgerRow(rows[0]);
     }

     async findLedgers(keys: ProductKey[]): Promise<StockLedgerEntry[]> {
          if (keys.length === 0) {
               return [];
          }

          const { rows } = await this.db.query<LedgerRow>(
               `
      SELECT l.sku, l.variant_sku, l.quantity_available, l.quantity_reserved,
             l.minimum_stock_level, l.reorder_point, l.last_updated
      FROM stock_ledger l
      JOIN unnest($1::text[], $2::text[]) AS k(sku, variant_sku)
        ON l.sku = k.sku AND l.variant_sku = k.variant_sku
    `,
               [keys.map((k) => k.sku), keys.map(variantParam)]
          );

          return rows.map(mapLedgerRow);
     }

     async findReservation(reservationId: string): Promise<Reservation | null> {
          const { rows } = await this.db.query<ReservationRow>(
               `
      SELECT ${RESERVATION_COLUMNS}
      FROM stock_reservation
      WHERE reservation_id = $1
    `,
               [reservationId]
          );

          return rows.length === 0 ? null : mapReservationRow(rows[0]);
     }

     async findActiveReservationsByHolder(holderId: string): Promise<Reservation[]> {
          const { rows } = await this.db.query<ReservationRow>(
               `
      SELECT ${RESERVATION_COLUMNS}
      FROM stock_reservation
      WHERE holder_id = $1 AND status = 'ACTIVE'
      ORDER BY created_at DESC
    `,
               [holderId]
          );

          return rows.map(mapReservationRow);
     }

     async findExpiredReservations(now: Date, limit: number, after?: ExpiryCursor): Promise<Reservation[]> {
          const params: unknown[] = [now, limit];
          let afterClause = '';
          if (after) {
               params.push(after.expiresAt, after.reservationId);
               afterClause = 'AND (expires_at, reservation_id) > ($3, $4)';
          }

          const { rows } = await this.db.query<ReservationRow>(
               `
      SELECT ${RESERVATION_COLUMNS}
      FROM stock_reservation
      WHERE status = 'ACTIVE' AND expires_at < $1 ${afterClause}
      ORDER BY expires_at, reservation_id
      LIMIT $2
    `,
               params
          );

          return rows.map(mapReservationRow);
     }

     async findMovements(filter: MovementFilter): Promise<StockMovement[]> {
          const conditions: string[] = [];
          const params: unknown[] = [];
          const add = (sql: string, value: unknown) => {
               params.push(value);
               conditions.push(sql.replace('?', `$${params.length}`));
          };

          if (filter.key) {
               add('sku = ?', filter.key.sku);
               add('variant_sku = ?', variantParam(filter.key));
          }
          if (filter.type) add('movement_type = ?', filter.type);
          if (filter.actor) add('actor = ?', filter.actor);
          if (filter.referenceId) add('reference_id = ?', filter.referenceId);
          if (filter.from) add('created_at >= ?', filter.from);
          if (filter.to) add('created_at <= ?', filter.to);

          const limit = resolveMovementLimit(filter.limit);
          params.push(limit);

          const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
          const { rows } = await this.db.query<MovementRow>(
               `
      SELECT ${MOVEMENT_COLUMNS}
      FROM stock_movement
      ${where}
      ORDER BY created_at DESC, id DESC
      LIMIT $${params.length}
    `,
               params
          );

          return rows.map(mapMovementRow);
     }

     async movementStatistics(from: Date, to: Date): Promise<MovementStatistic[]> {
          const { rows } = await this.db.query<{
               movement_type: StockMovementType;
               count: number;
               total_quantity: number;
          }>(
               `
      SELECT movement_type,
             COUNT(*)::int AS count,
             COALESCE(SUM(ABS(quantity_delta)), 0)::int AS total_quantity
      FROM stock_movement
      WHERE created_at BETWEEN $1 AND $2
      GROUP BY movement_type
      ORDER BY movement_type
    `,
               [from, to]
          );

          return rows.map((row) => ({
               type: row.movement_type,
               count: row.count,
               totalQuantity: row.total_quantity,
          }));
     }
}
