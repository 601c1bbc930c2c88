import { v4 as uuidv4 } from 'uuid';
import { StockStore, StockTransaction } from '../stores/stock-store';
import {
     AdjustStockRequest,
     LedgerSnapshot,
     LowStockDetectedEvent,
     ProductKey,
     ReleaseStockRequest,
     ReleaseStockResult,
     Reservation,
     ReservationStatus,
     ReserveStockRequest,
     ReserveStockResult,
     StockAdjustedEvent,
     StockLedgerEntry,
     StockReleasedEvent,
     StockReservedEvent,
} from '../types/inventory.types';
import {
     applyAdjust,
     applyRelease,
     applyReserve,
     assertPositiveQuantity,
     crossedIntoLowStock,
     describeKey,
     normalizeKey,
     sameKey,
     selectReservationsToRelease,
     toSnapshot,
} from '../domain/ledger-rules';
import {
     DomainError,
     InsufficientStockError,
     InvalidQuantityError,
     LedgerNotFoundError,
     OverReleaseError,
     ReservationInactiveError,
     ReservationMismatchError,
     ReservationNotFoundError,
} from '../utils/errors';
import { loadReservationConfig } from '../utils/config';
import { createChildLogger } from '../utils/logger';
import { MovementLog } from './movement-log';
import { StockQueryService } from './stock-query-service';

const log = createChildLogger({ component: 'reservation-service' });

export const SWEEPER_ACTOR = 'system:expiration-sweeper';
export const EXPIRED_REASON = 'expired';

export interface ReservationServiceOptions {
     defaultTtlMinutes?: number;
     clock?: () => Date;
     generateId?: () => string;
     movementLog?: MovementLog;
     queryService?: StockQueryService;
}

type TerminalStatus = Exclude<ReservationStatus, 'ACTIVE'>;

function requireText(value: string | undefined, field: string): string {
     const trimmed = value?.trim();
     if (!trimmed) {
          throw new DomainError(`${field} is required`, 'INVALID_REQUEST', 400);
     }
     return trimmed;
}

function requireKey(key: ProductKey): ProductKey {
     requireText(key.sku, 'sku');
     return normalizeKey(key);
}

/**
 * Owns every write to the stock ledger: time-bounded holds, their release and
 * absolute stock adjustments. Each operation is one store transaction holding the
 * ledger row lock for its key.
 */
export class ReservationService {
     private readonly defaultTtlMinutes: number;
     private readonly clock: () => Date;
     private readonly generateId: () => string;
     private readonly movements: MovementLog;
     private readonly queries: StockQueryService;

     constructor(
          private readonly store: StockStore,
          options: ReservationServiceOptions = {}
     ) {
          this.defaultTtlMinutes = options.defaultTtlMinutes ?? loadReservationConfig().defaultTtlMinutes;
          this.clock = options.clock ?? (() => new Date());
          this.generateId = options.generateId ?? uuidv4;
          this.movements = options.movementLog ?? new MovementLog(store);
          this.queries = options.queryService ?? new StockQueryService(store);
     }

     /**
      * Place a hold on stock for a holder
      */
     async reserve(request: ReserveStockRequest): Promise<ReserveStockResult> {
          const key = requireKey(request);
          const holderId = requireText(request.holderId, 'holderId');
          assertPositiveQuantity(request.quantity);

          const ttlMs = request.ttlMs ?? (request.ttlMinutes ?? this.defaultTtlMinutes) * 60_000;
          if (!Number.isFinite(ttlMs) || ttlMs <= 0) {
               throw new InvalidQuantityError(`Reservation TTL must be positive, got ${ttlMs}ms`);
          }

          log.info({ ...key, quantity: request.quantity, holderId }, 'Reserving stock');

          try {
               const result = await this.store.transaction(async (tx) => {
                    const now = this.clock();
                    const entry = await tx.lockLedger(key);
                    if (!entry) {
                         throw new LedgerNotFoundError(key.sku, key.variantSku);
                    }

                    const saved = await tx.saveLedger(applyReserve(entry, request.quantity, now));

                    const reservation: Reservation = {
                         ...key,
                         reservationId: this.generateId(),
                         quantity: request.quantity,
                         holderId,
                         status: 'ACTIVE',
                         createdAt: now,
                         expiresAt: new Date(now.getTime() + ttlMs),
                         orderId: request.orderId,
                         source: request.source,
                    };
                    await tx.insertReservation(reservation);

                    await this.movements.record(
                         tx,
                         {
                              ...key,
                              type: 'RESERVED',
                              quantityDelta: -request.quantity,
                              reason: `Stock reserved for ${holderId}`,
                              referenceId: reservation.reservationId,
                              actor: holderId,
                         },
                         now
                    );

                    const event: StockReservedEvent = {
                         reservationId: reservation.reservationId,
                         sku: key.sku,
                         variantSku: key.variantSku ?? null,
                         quantity: request.quantity,
                         holderId,
                         orderId: request.orderId ?? null,
                         expiresAt: reservation.expiresAt.toISOString(),
                         timestamp: now.toISOString(),
                    };
                    await tx.enqueueEvent('StockReserved', event);
                    await this.flagLowStock(tx, entry, saved, now);

                    return {
                         reservationId: reservation.reservationId,
                         remainingAvailable: saved.quantityAvailable,
                         expiresAt: reservation.expiresAt,
                    };
               });

               log.info(
                    { ...key, reservationId: result.reservationId, remainingAvailable: result.remainingAvailable },
                    'Stock reserved'
               );
               return result;
          } catch (error) {
               // Running out of stock is a normal outcome for callers, not a fault
               if (error instanceof InsufficientStockError) {
                    log.info(
                         { ...key, requested: error.requested, available: error.available },
                         'Reservation rejected: insufficient stock'
                    );
               }
               throw error;
          }
     }

     /**
      * Release a hold, either one reservation by id or whole reservations of a key, oldest first
      */
     async release(request: ReleaseStockRequest): Promise<ReleaseStockResult> {
          return this.performRelease(request, 'RELEASED');
     }

     /**
      * Release path used by the sweeper. Shares locking and validation with release(),
      * so a reservation released manually in the meantime fails with ReservationInactiveError.
      */
     async expire(reservation: Pick<Reservation, 'reservationId' | 'sku' | 'variantSku'>): Promise<ReleaseStockResult> {
          return this.performRelease(
               {
                    sku: reservation.sku,
                    variantSku: reservation.variantSku,
                    reservationId: reservation.reservationId,
                    reason: EXPIRED_REASON,
                    actor: SWEEPER_ACTOR,
               },
               'EXPIRED'
          );
     }

     private async performRelease(
          request: ReleaseStockRequest,
          status: TerminalStatus
     ): Promise<ReleaseStockResult> {
          const key = requireKey(request);
          const reason = requireText(request.reason, 'reason');
          if (request.quantity !== undefined) {
               assertPositiveQuantity(request.quantity);
          }

          log.info(
               { ...key, reservationId: request.reservationId, quantity: request.quantity, reason },
               'Releasing stock'
          );

          const result = await this.store.transaction(async (tx) => {
               const now = this.clock();
               const { entry, targets } = request.reservationId
                    ? await this.lockReservationTarget(tx, key, request.reservationId, request.quantity)
                    : await this.lockKeyTargets(tx, key, request.quantity);

               let updated = entry;
               for (const reservation of targets) {
                    updated = applyRelease(updated, reservation.quantity, now);
                    await tx.closeReservation(reservation.reservationId, status, reason, now);

                    await this.movements.record(
                         tx,
                         {
                              ...key,
                              type: 'RELEASED',
                              quantityDelta: reservation.quantity,
                              reason,
                              referenceId: reservation.reservationId,
                              actor: request.actor ?? reservation.holderId,
                         },
                         now
                    );

                    const event: StockReleasedEvent = {
                         reservationId: reservation.reservationId,
                         sku: key.sku,
                         variantSku: key.variantSku ?? null,
                         quantity: reservation.quantity,
                         status,
                         reason,
                         timestamp: now.toISOString(),
                    };
                    await tx.enqueueEvent('StockReleased', event);
               }

               const saved = await tx.saveLedger(updated);

               return {
                    releasedQuantity: targets.reduce((sum, r) => sum + r.quantity, 0),
                    reservationIds: targets.map((r) => r.reservationId),
                    ledger: toSnapshot(saved),
               };
          });

          log.info(
               { ...key, releasedQuantity: result.releasedQuantity, reservationIds: result.reservationIds, status },
               'Stock released'
          );
          return result;
     }

     // Lock order everywhere: reservation rows, then the ledger row.
     private async lockReservationTarget(
          tx: StockTransaction,
          key: ProductKey,
          reservationId: string,
          quantity: number | undefined
     ): Promise<{ entry: StockLedgerEntry; targets: Reservation[] }> {
          const reservation = await tx.lockReservation(reservationId);
          if (!reservation) {
               throw new ReservationNotFoundError(reservationId);
          }
          if (!sameKey(reservation, key)) {
               throw new ReservationMismatchError(
                    reservationId,
                    `Reservation ${reservationId} holds ${describeKey(reservation)}, not ${describeKey(key)}`
               );
          }
          if (reservation.status !== 'ACTIVE') {
               throw new ReservationInactiveError(reservationId, reservation.status);
          }

          const entry = await tx.lockLedger(key);
          if (!entry) {
               throw new LedgerNotFoundError(key.sku, key.variantSku);
          }

          if (quantity !== undefined) {
               if (quantity > reservation.quantity || quantity > entry.quantityReserved) {
                    throw new OverReleaseError(
                         `Cannot release ${quantity}: reservation ${reservationId} holds ${reservation.quantity}`,
                         quantity,
                         Math.min(reservation.quantity, entry.quantityReserved)
                    );
               }
               if (quantity < reservation.quantity) {
                    throw new InvalidQuantityError(
                         `Reservation ${reservationId} holds ${reservation.quantity}; partial release is not supported, release it and reserve again`
                    );
               }
          }

          return { entry, targets: [reservation] };
     }

     private async lockKeyTargets(
          tx: StockTransaction,
          key: ProductKey,
          quantity: number | undefined
     ): Promise<{ entry: StockLedgerEntry; targets: Reservation[] }> {
          const active = await tx.lockActiveReservations(key);
          const entry = await tx.lockLedger(key);
          if (!entry) {
               throw new LedgerNotFoundError(key.sku, key.variantSku);
          }
          return { entry, targets: selectReservationsToRelease(entry, active, quantity) };
     }

     /**
      * Set available stock to an absolute count (receiving, stock-takes, corrections)
      */
     async adjustStock(request: AdjustStockRequest): Promise<LedgerSnapshot> {
          const key = requireKey(request);
          const reason = requireText(request.reason, 'reason');
          const actor = requireText(request.actor, 'actor');

          log.info({ ...key, newAvailable: request.newAvailable, reason, actor }, 'Adjusting stock');

          const snapshot = await this.store.transaction(async (tx) => {
               const now = this.clock();
               const entry = await tx.lockOrCreateLedger(key, now);
               const plan = applyAdjust(entry, request.newAvailable, now, {
                    minimumStockLevel: request.minimumStockLevel,
                    reorderPoint: request.reorderPoint,
               });
               const saved = await tx.saveLedger(plan.entry);

               await this.movements.record(
                    tx,
                    {
                         ...key,
                         type: plan.movementType,
                         quantityDelta: plan.delta,
                         reason,
                         referenceId: request.referenceId,
                         actor,
                    },
                    now
               );

               const event: StockAdjustedEvent = {
                    sku: key.sku,
                    variantSku: key.variantSku ?? null,
                    quantityDelta: plan.delta,
                    newAvailable: saved.quantityAvailable,
                    reason,
                    actor,
                    timestamp: now.toISOString(),
               };
               await tx.enqueueEvent('StockAdjusted', event);
               await this.flagLowStock(tx, entry, saved, now);

               log.info(
                    { ...key, previousAvailable: entry.quantityAvailable, newAvailable: saved.quantityAvailable },
                    'Stock adjusted'
               );

               return toSnapshot(saved);
          });

          return snapshot;
     }

     isAvailable(key: ProductKey, quantity: number): Promise<boolean> {
          return this.queries.isAvailable(key, quantity);
     }

     getLedgerSnapshot(key: ProductKey): Promise<LedgerSnapshot> {
          return this.queries.query(key);
     }

     getLedgerSnapshots(keys: ProductKey[]): Promise<LedgerSnapshot[]> {
          return this.queries.bulkQuery(keys);
     }

     async getReservation(reservationId: string): Promise<Reservation> {
          const reservation = await this.store.findReservation(reservationId);
          if (!reservation) {
               throw new ReservationNotFoundError(reservationId);
          }
          return reservation;
     }

     async listActiveReservations(holderId: string): Promise<Reservation[]> {
          return this.store.findActiveReservationsByHolder(requireText(holderId, 'holderId'));
     }

     private async flagLowStock(
          tx: StockTransaction,
          before: StockLedgerEntry,
          after: StockLedgerEntry,
          now: Date
     ): Promise<void> {
          if (!crossedIntoLowStock(before, after)) {
               return;
          }

          const event: LowStockDetectedEvent = {
               sku: after.sku,
               variantSku: after.variantSku ?? null,
               quantityAvailable: after.quantityAvailable,
               reorderPoint: after.reorderPoint,
               minimumStockLevel: after.minimumStockLevel,
               timestamp: now.toISOString(),
          };
          await tx.enqueueEvent('LowStockDetected', event);

          log.warn(
               { sku: after.sku, variantSku: after.variantSku, quantityAvailable: after.quantityAvailable },
               'Stock fell to reorder point'
          );
     }
}
