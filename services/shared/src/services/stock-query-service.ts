import { StockStore } from '../stores/stock-store';
import { LedgerSnapshot, ProductKey } from '../types/inventory.types';
import { canReserve, emptySnapshot, keyId, normalizeKey, toSnapshot } from '../domain/ledger-rules';

/**
 * Read-only view of the ledger for cart, order and admin collaborators.
 */
export class StockQueryService {
     constructor(private readonly store: StockStore) {}

     async query(key: ProductKey): Promise<LedgerSnapshot> {
          const normalized = normalizeKey(key);
          const entry = await this.store.findLedger(normalized);
          return entry ? toSnapshot(entry) : emptySnapshot(normalized);
     }

     /**
      * One lookup for many keys. Results follow the input order; unknown keys come back
      * as empty snapshots.
      */
     async bulkQuery(keys: ProductKey[]): Promise<LedgerSnapshot[]> {
          const normalized = keys.map(normalizeKey);
          const unique = [...new Map(normalized.map((k) => [keyId(k), k])).values()];
          const entries = await this.store.findLedgers(unique);
          const byKey = new Map(entries.map((entry) => [keyId(entry), entry]));

          return normalized.map((key) => {
               const entry = byKey.get(keyId(key));
               return entry ? toSnapshot(entry) : emptySnapshot(key);
          });
     }

     async isAvailable(key: ProductKey, quantity: number): Promise<boolean> {
          if (!Number.isInteger(quantity) || quantity <= 0) {
               return false;
          }
          const entry = await this.store.findLedger(normalizeKey(key));
          return canReserve(entry, quantity);
     }
}
