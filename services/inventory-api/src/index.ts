// Must load before the shared modules read process.env
import 'dotenv/config';
import { checkConnection, closePool, pool } from '@stockledger/shared/src/db/client';
import { PgStockStore } from '@stockledger/shared/src/stores/pg-stock-store';
import { startServer } from '@stockledger/shared/src/http/server';
import { intFromEnv } from '@stockledger/shared/src/utils/config';
import { logger } from '@stockledger/shared/src/utils/logger';
import { buildInventoryApi } from './app';

const PORT = intFromEnv('INVENTORY_API_PORT', 3000);
const HOST = process.env.INVENTORY_API_HOST || '0.0.0.0';

async function main() {
    const app = await buildInventoryApi({
        store: new PgStockStore(pool),
        port: PORT,
        checkReady: checkConnection,
    });

    await startServer(app, 'Inventory API', PORT, HOST, closePool);
}

main().catch((err) => {
    logger.fatal({ err }, 'Fatal error in inventory API');
    process.exit(1);
});
