import dotenv from 'dotenv';
import { createProductClient } from '@stockhold/shared/src/clients/product-client';
import { loadConfig, readInt } from '@stockhold/shared/src/config';
import { closePool } from '@stockhold/shared/src/db/client';
import {
     closeConnection,
     ConsumeMessage,
     getChannel,
     INVENTORY_WORKER_QUEUE,
} from '@stockhold/shared/src/messaging/client';
import { AmqpEventPublisher } from '@stockhold/shared/src/messaging/event-publisher';
import { PgTransactionManager } from '@stockhold/shared/src/repositories';
import { InventoryEngine } from '@stockhold/shared/src/services/inventory-engine';
import { logger } from '@stockhold/shared/src/utils/logger';
import { createHandlerRegistry, dispatchMessage, HandlerRegistry } from './handlers';

dotenv.config();

const PREFETCH = readInt(process.env, 'AMQP_PREFETCH', 5);

class InventoryWorker {
     constructor(private readonly registry: HandlerRegistry) {}

     async start() {
          logger.info({ prefetch: PREFETCH, queue: INVENTORY_WORKER_QUEUE }, 'Starting inventory worker');

          const channel = await getChannel();
          await channel.prefetch(PREFETCH);

          await channel.consume(INVENTORY_WORKER_QUEUE, async (msg) => {
               if (!msg) return;

               try {
                    await this.processMessage(msg);
                    channel.ack(msg);
               } catch (error) {
                    logger.error(
                         { error, routingKey: msg.fields.routingKey },
                         'Failed to process inventory message'
                    );
                    channel.nack(msg, false, false); // Send to DLQ
               }
          });

          logger.info('Inventory worker started');
     }

     private async processMessage(msg: ConsumeMessage): Promise<void> {
          const routingKey = msg.fields.routingKey;
          const outcome = await dispatchMessage(this.registry, routingKey, msg.content.toString());

          logger.info({ routingKey, outcome, messageId: msg.properties.messageId }, 'Message handled');
     }
}

async function main() {
     const config = loadConfig();
     const publisher = new AmqpEventPublisher(config.eventSource);
     const engine = new InventoryEngine({
          transactions: new PgTransactionManager(),
          publisher,
          productClient: createProductClient(),
          config,
     });
     const worker = new InventoryWorker(createHandlerRegistry(engine, publisher));

     const shutdown = async (signal: string) => {
          logger.info({ signal }, 'Shutting down gracefully...');
          try {
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

     await worker.start();
}

main().catch((err) => {
     logger.error({ err }, 'Fatal error in inventory worker');
     process.exit(1);
});
