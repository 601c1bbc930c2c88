import {
     LedgerSnapshot,
     ProductKey,
     Reservation,
     StockLedgerEntry,
     StockMovementType,
} from '../types/inventory.types';
import {
     InsufficientStockError,
     InvalidQuantityError,
     OverReleaseError,
     StockConstraintError,
} from '../utils/errors';

// Pure ledger rules. Callers load the entry under a row lock, apply one of these
// and persist the returned copy; nothing here touches storage.

export const DEFAULT_MINIMUM_STOCK_LEVEL = 5;
export const DEFAULT_REORDER_POINT = 10;

export function normalizeKey(key: ProductKey): ProductKey {
     const sku = key.sku.trim();
     const variantSku = key.variantSku?.trim();
     return variantSku ? { sku, variantSku } : { sku };
}

export function keyId(key: ProductKey): string {
     return `${key.sku}::${key.variantSku ?? ''}`;
}

export function sameKey(a: ProductKey, b: ProductKey): boolean {
     return keyId(normalizeKey(a)) === keyId(normalizeKey(b));
}

export function describeKey(key: ProductKey): string {
     return key.variantSku ? `${key.sku} variant ${key.variantSku}` : key.sku;
}

export function assertPositiveQuantity(quantity: number, label: string = 'Quantity'): void {
     if (!Number.isInteger(quantity) || quantity <= 0) {
          throw new InvalidQuantityError(`${label} must be a positive integer, got ${quantity}`);
     }
}

export function assertNonNegativeQuantity(quantity: number, label: string = 'Quantity'): void {
     if (!Number.isInteger(quantity) || quantity < 0) {
          throw new InvalidQuantityError(`${label} must be a non-negative integer, got ${quantity}`);
     }
}

export function emptyLedgerEntry(key: ProductKey, now: Date): StockLedgerEntry {
     return {
          ...normalizeKey(key),
          quantityAvailable: 0,
          quantityReserved: 0,
          minimumStockLevel: DEFAULT_MINIMUM_STOCK_LEVEL,
          reorderPoint: DEFAULT_REORDER_POINT,
          lastUpdated: now,
     };
}

export function canReserve(entry: StockLedgerEntry | null, quantity: number): boolean {
     if (!entry || !Number.isInteger(quantity) || quantity <= 0) {
          return false;
     }
     return entry.quantityAvailable >= quantity;
}

export function applyReserve(entry: StockLedgerEntry, quantity: number, now: Date): StockLedgerEntry {
     assertPositiveQuantity(quantity);

     if (entry.quantityAvailable < quantity) {
          throw new InsufficientStockError(
               `Insufficient stock for ${describeKey(entry)}: requested ${quantity}, available ${entry.quantityAvailable}`,
               entry.sku,
               quantity,
               entry.quantityAvailable
          );
     }

     return {
          ...entry,
          quantityAvailable: entry.quantityAvailable - quantity,
          quantityReserved: entry.quantityReserved + quantity,
          lastUpdated: now,
     };
}

export function applyRelease(entry: StockLedgerEntry, quantity: number, now: Date): StockLedgerEntry {
     assertPositiveQuantity(quantity);

     if (quantity > entry.quantityReserved) {
          throw new OverReleaseError(
               `Cannot release ${quantity} of ${describeKey(entry)}: only ${entry.quantityReserved} reserved`,
               quantity,
               entry.quantityReserved
          );
     }

     return {
          ...entry,
          quantityAvailable: entry.quantityAvailable + quantity,
          quantityReserved: entry.quantityReserved - quantity,
          lastUpdated: now,
     };
}

export interface Thresholds {
     minimumStockLevel?: number;
     reorderPoint?: number;
}

export interface AdjustmentPlan {
     entry: StockLedgerEntry;
     delta: number;
     movementType: StockMovementType;
}

export function movementTypeForDelta(delta: number): StockMovementType {
     if (delta > 0) return 'INCOMING';
     if (delta < 0) return 'OUTGOING';
     return 'ADJUSTMENT';
}

/**
 * Sets available stock to an absolute value. Available may never drop below what is
 * already promised to holders.
 */
export function applyAdjust(
     entry: StockLedgerEntry,
     newAvailable: number,
     now: Date,
     thresholds: Thresholds = {}
): AdjustmentPlan {
     assertNonNegativeQuantity(newAvailable, 'New available quantity');
     if (thresholds.minimumStockLevel !== undefined) {
          assertNonNegativeQuantity(thresholds.minimumStockLevel, 'Minimum stock level');
     }
     if (thresholds.reorderPoint !== undefined) {
          assertNonNegativeQuantity(thresholds.reorderPoint, 'Reorder point');
     }

     if (newAvailable < entry.quantityReserved) {
          throw new StockConstraintError(
               `Cannot set available stock of ${describeKey(entry)} to ${newAvailable}: ${entry.quantityReserved} units are reserved`
          );
     }

     const delta = newAvailable - entry.quantityAvailable;

     return {
          entry: {
               ...entry,
               quantityAvailable: newAvailable,
               minimumStockLevel: thresholds.minimumStockLevel ?? entry.minimumStockLevel,
               reorderPoint: thresholds.reorderPoint ?? entry.reorderPoint,
               lastUpdated: now,
          },
          delta,
          movementType: movementTypeForDelta(delta),
     };
}

export function isLowStock(entry: StockLedgerEntry): boolean {
     return entry.quantityAvailable <= entry.reorderPoint;
}

/** True when a change moves the entry from healthy stock to at-or-below its reorder point. */
export function crossedIntoLowStock(before: StockLedgerEntry, after: StockLedgerEntry): boolean {
     return !isLowStock(before) && isLowStock(after);
}

export function toSnapshot(entry: StockLedgerEntry): LedgerSnapshot {
     return {
          sku: entry.sku,
          variantSku: entry.variantSku ?? null,
          exists: true,
          quantityAvailable: entry.quantityAvailable,
          quantityReserved: entry.quantityReserved,
          totalQuantity: entry.quantityAvailable + entry.quantityReserved,
          minimumStockLevel: entry.minimumStockLevel,
          reorderPoint: entry.reorderPoint,
          inStock: entry.quantityAvailable > 0,
          lowStock: isLowStock(entry),
          belowMinimum: entry.quantityAvailable < entry.minimumStockLevel,
          lastUpdated: entry.lastUpdated,
     };
}

export function emptySnapshot(key: ProductKey): LedgerSnapshot {
     const normalized = normalizeKey(key);
     return {
          sku: normalized.sku,
          variantSku: normalized.variantSku ?? null,
          exists: false,
          quantityAvailable: 0,
          quantityReserved: 0,
          totalQuantity: 0,
          minimumStockLevel: DEFAULT_MINIMUM_STOCK_LEVEL,
          reorderPoint: DEFAULT_REORDER_POINT,
          inStock: false,
          lowStock: true,
          belowMinimum: true,
          lastUpdated: null,
     };
}

/**
 * Picks which active reservations a key-level release consumes: whole reservations,
 * oldest first, until the requested quantity is met exactly.
 */
export function selectReservationsToRelease(
     entry: StockLedgerEntry,
     active: Reservation[],
     quantity?: number
): Reservation[] {
     if (quantity !== undefined) {
          assertPositiveQuantity(quantity);
          if (quantity > entry.quantityReserved) {
               throw new OverReleaseError(
                    `Cannot release ${quantity} of ${describeKey(entry)}: only ${entry.quantityReserved} reserved`,
                    quantity,
                    entry.quantityReserved
               );
          }
     }

     if (active.length === 0) {
          throw new OverReleaseError(
               `Cannot release ${describeKey(entry)}: no active reservations`,
               quantity ?? 0,
               entry.quantityReserved
          );
     }

     const ordered = [...active].sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
     if (quantity === undefined) {
          return ordered;
     }

     const selected: Reservation[] = [];
     let total = 0;
     for (const reservation of ordered) {
          if (total >= quantity) break;
          selected.push(reservation);
          total += reservation.quantity;
     }

     if (total !== quantity) {
          throw new InvalidQuantityError(
               `Cannot release ${quantity} of ${describeKey(entry)}: reservations are released whole, oldest first`
          );
     }

     return selected;
}
