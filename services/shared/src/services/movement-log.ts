import { StockStore, StockTransaction } from '../stores/stock-store';
import {
     MovementFilter,
     MovementStatistic,
     NewStockMovement,
     ProductKey,
     StockMovement,
     StockMovementType,
} from '../types/inventory.types';
import { normalizeKey } from '../domain/ledger-rules';
import { DomainError, InvalidQuantityError } from '../utils/errors';
import { createChildLogger } from '../utils/logger';

const log = createChildLogger({ component: 'movement-log' });

const SIGN_RULES: Record<StockMovementType, (delta: number) => boolean> = {
     INCOMING: (delta) => delta > 0,
     OUTGOING: (delta) => delta < 0,
     RESERVED: (delta) => delta < 0,
     RELEASED: (delta) => delta > 0,
     ADJUSTMENT: () => true,
};

/**
 * Append-only audit trail of ledger mutations. `record` is the only write path and it
 * always runs inside the caller's transaction.
 */
export class MovementLog {
     constructor(private readonly store: StockStore) {}

     async record(tx: StockTransaction, movement: NewStockMovement, now: Date = new Date()): Promise<StockMovement> {
          if (!Number.isInteger(movement.quantityDelta) || !SIGN_RULES[movement.type](movement.quantityDelta)) {
               throw new InvalidQuantityError(
                    `Quantity delta ${movement.quantityDelta} is not valid for a ${movement.type} movement`
               );
          }
          if (!movement.reason.trim()) {
               throw new DomainError('Stock movements require a reason', 'INVALID_MOVEMENT', 400);
          }

          const { sku, variantSku, ...details } = movement;
          const recorded = await tx.appendMovement({ ...details, ...normalizeKey({ sku, variantSku }) }, now);

          log.debug(
               {
                    sku: recorded.sku,
                    variantSku: recorded.variantSku,
                    type: recorded.type,
                    quantityDelta: recorded.quantityDelta,
                    referenceId: recorded.referenceId,
               },
               'Stock movement recorded'
          );

          return recorded;
     }

     byProduct(key: ProductKey, limit?: number): Promise<StockMovement[]> {
          return this.store.findMovements({ key: normalizeKey(key), limit });
     }

     byType(type: StockMovementType, limit?: number): Promise<StockMovement[]> {
          return this.store.findMovements({ type, limit });
     }

     async byDateRange(from: Date, to: Date, limit?: number): Promise<StockMovement[]> {
          assertRange(from, to);
          return this.store.findMovements({ from, to, limit });
     }

     byActor(actor: string, limit?: number): Promise<StockMovement[]> {
          return this.store.findMovements({ actor, limit });
     }

     byReference(referenceId: string, limit?: number): Promise<StockMovement[]> {
          return this.store.findMovements({ referenceId, limit });
     }

     async search(filter: MovementFilter): Promise<StockMovement[]> {
          if (filter.from && filter.to) {
               assertRange(filter.from, filter.to);
          }
          return this.store.findMovements({
               ...filter,
               key: filter.key ? normalizeKey(filter.key) : undefined,
          });
     }

     async statistics(from: Date, to: Date): Promise<MovementStatistic[]> {
          assertRange(from, to);
          return this.store.movementStatistics(from, to);
     }
}

function assertRange(from: Date, to: Date): void {
     if (Number.isNaN(from.getTime()) || Number.isNaN(to.getTime())) {
          throw new DomainError('Date range bounds must be valid dates', 'INVALID_DATE_RANGE', 400);
     }
     if (from.getTime() > to.getTime()) {
          throw new DomainError('Date range start must not be after its end', 'INVALID_DATE_RANGE', 400);
     }
}
