import 'dotenv/config';
import { pool } from './client';
import { PgStockStore } from '../stores/pg-stock-store';
import { ReservationService } from '../services/reservation-service';
import { AdjustStockRequest } from '../types/inventory.types';
import { logger } from '../utils/logger';

const SEED_ACTOR = 'system:seed';

// Demo catalogue: brake, climate and lighting parts, some with variants
const SEED_STOCK: AdjustStockRequest[] = [
     { sku: 'BMW-F30-AC-001', newAvailable: 20, reason: 'Initial stock load', actor: SEED_ACTOR },
     {
          sku: 'BMW-F30-BRK-010',
          variantSku: 'FRONT',
          newAvailable: 40,
          reason: 'Initial stock load',
          actor: SEED_ACTOR,
     },
     {
          sku: 'BMW-F30-BRK-010',
          variantSku: 'REAR',
          newAvailable: 35,
          reason: 'Initial stock load',
          actor: SEED_ACTOR,
     },
     {
          sku: 'AUDI-B8-HL-220',
          variantSku: 'LEFT',
          newAvailable: 8,
          reason: 'Initial stock load',
          actor: SEED_ACTOR,
          minimumStockLevel: 2,
          reorderPoint: 4,
     },
     {
          sku: 'AUDI-B8-HL-220',
          variantSku: 'RIGHT',
          newAvailable: 3,
          reason: 'Initial stock load',
          actor: SEED_ACTOR,
          minimumStockLevel: 2,
          reorderPoint: 4,
     },
     { sku: 'VW-MK7-OIL-005', newAvailable: 150, reason: 'Initial stock load', actor: SEED_ACTOR },
];

async function seedDatabase() {
     const service = new ReservationService(new PgStockStore(pool));

     try {
          logger.info({ count: SEED_STOCK.length }, 'Seeding stock ledger');

          for (const request of SEED_STOCK) {
               const snapshot = await service.adjustStock(request);
               logger.info(
                    { sku: snapshot.sku, variantSku: snapshot.variantSku, available: snapshot.quantityAvailable },
                    'Seeded ledger entry'
               );
          }

          logger.info('Database seeding completed successfully');
     } catch (error) {
          logger.error({ error }, 'Seeding failed');
          throw error;
     } finally {
          await pool.end();
     }
}

// Run if executed directly
if (require.main === module) {
     seedDatabase().catch((err) => {
          logger.fatal({ err }, 'Seed error');
          process.exit(1);
     });
}

export { seedDatabase };
