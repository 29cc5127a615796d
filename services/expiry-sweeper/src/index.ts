import dotenv from 'dotenv';
import { createProductClient } from '@stockhold/shared/src/clients/product-client';
import { loadConfig } from '@stockhold/shared/src/config';
import { checkConnection, closePool } from '@stockhold/shared/src/db/client';
import { closeConnection } from '@stockhold/shared/src/messaging/client';
import { AmqpEventPublisher } from '@stockhold/shared/src/messaging/event-publisher';
import { PgTransactionManager } from '@stockhold/shared/src/repositories';
import { ExpirySweeper } from '@stockhold/shared/src/services/expiry-sweeper';
import { InventoryEngine } from '@stockhold/shared/src/services/inventory-engine';
import { logger } from '@stockhold/shared/src/utils/logger';

dotenv.config();

async function main() {
     const config = loadConfig();

     if (!(await checkConnection())) {
          throw new Error('Database is not reachable');
     }

     const engine = new InventoryEngine({
          transactions: new PgTransactionManager(),
          publisher: new AmqpEventPublisher(config.eventSource),
          productClient: createProductClient(),
          config,
     });
     const sweeper = new ExpirySweeper(engine, config);

     let shuttingDown = false;
     const shutdown = async (signal: string) => {
          if (shuttingDown) return;
          shuttingDown = true;

          logger.info({ signal }, 'Shutting down gracefully...');
          try {
               await sweeper.stop();
               await closeConnection();
               await closePool();
               process.exit(0);
          } catch (err) {
               logger.error({ err }, 'Error during shutdown');
               process.exit(1);
          }
     };

     process.on('SIGINT', () => void shutdown('SIGINT'));
     process.on('SIGTERM', () => void shutdown('SIGTERM'));

     sweeper.start();
}

main().catch((err) => {
     logger.error({ err }, 'Fatal error in expiry sweeper');
     process.exit(1);
});
