// Must load before the shared modules read process.env
import 'dotenv/config';
import { closePool, pool } from '@stockledger/shared/src/db/client';
import { PgStockStore } from '@stockledger/shared/src/stores/pg-stock-store';
import { ReservationService } from '@stockledger/shared/src/services/reservation-service';
import { ExpirationSweeper } from '@stockledger/shared/src/services/expiration-sweeper';
import { loadSweeperConfig } from '@stockledger/shared/src/utils/config';
import { logger } from '@stockledger/shared/src/utils/logger';

async function main() {
     const store = new PgStockStore(pool);
     const sweeper = new ExpirationSweeper(store, new ReservationService(store), loadSweeperConfig());

     const shutdown = async () => {
          logger.info('Shutting down gracefully...');
          await sweeper.stop();
          await closePool();
          process.exit(0);
     };

     process.on('SIGINT', shutdown);
     process.on('SIGTERM', shutdown);

     sweeper.start();
}

main().catch((err) => {
     logger.fatal({ err }, 'Fatal error in reservation sweeper');
     process.exit(1);
});
