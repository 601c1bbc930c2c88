// Must load before the shared modules read process.env
import 'dotenv/config';
import { closePool, withTransaction } from '@stockledger/shared/src/db/client';
import { closeConnection, publishEvent } from '@stockledger/shared/src/messaging/client';
import { loadDispatcherConfig } from '@stockledger/shared/src/utils/config';
import { logger } from '@stockledger/shared/src/utils/logger';
import { EventDispatcher } from './dispatcher';

async function main() {
     const dispatcher = new EventDispatcher(
          (fn) => withTransaction(fn),
          publishEvent,
          loadDispatcherConfig()
     );

     // Graceful shutdown
     const shutdown = async () => {
          logger.info('Shutting down gracefully...');
          dispatcher.stop();
          await new Promise((resolve) => setTimeout(resolve, 1000));
          await closeConnection();
          await closePool();
          process.exit(0);
     };

     process.on('SIGINT', shutdown);
     process.on('SIGTERM', shutdown);

     await dispatcher.start();
}

main().catch((err) => {
     logger.fatal({ err }, 'Fatal error in event dispatcher');
     process.exit(1);
});
