// Must load before the shared modules read process.env
import 'dotenv/config';
import { checkConnection, closePool, pool } from '@stockledger/shared/src/db/client';
import { PgStockStore } from '@stockledger/shared/src/stores/pg-stock-store';
import { startServer } from '@stockledger/shared/src/http/server';
import { intFromEnv } from '@stockledger/shared/src/utils/config';
import { logger } from '@stockledger/shared/src/utils/logger';
import { buildAdminApi } from './app';

const PORT = intFromEnv('ADMIN_API_PORT', 3100);
const HOST = process.env.ADMIN_API_HOST || '0.0.0.0';

async function main() {
     const app = await buildAdminApi({
          store: new PgStockStore(pool),
          port: PORT,
          checkReady: checkConnection,
     });

     await startServer(app, 'Admin API', PORT, HOST, closePool);
}

main().catch((err) => {
     logger.fatal({ err }, 'Fatal error in admin API');
     process.exit(1);
});
