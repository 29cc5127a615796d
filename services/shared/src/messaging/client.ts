import * as amqplib from 'amqplib';
import type { Channel, ConsumeMessage, Options } from 'amqplib';
import { logger } from '../utils/logger';

type AmqpConnection = Awaited<ReturnType<typeof amqplib.connect>>;

let connection: AmqpConnection | null = null;
let channel: Promise<Channel> | null = null;

export const INVENTORY_EVENTS_EXCHANGE = 'inventory.events';
export const UPSTREAM_EVENTS_EXCHANGE = 'commerce.events';
export const DEAD_LETTER_EXCHANGE = 'dlx.inventory';
export const INVENTORY_WORKER_QUEUE = 'inventory.worker';
export const INVENTORY_WORKER_DLQ = 'dlq.inventory.worker';

export const UPSTREAM_ROUTING_KEYS = ['product.created', 'order.created', 'order.cancelled'];

async function connect(): Promise<AmqpConnection> {
     const url = process.env.AMQP_URL || 'amqp://localhost:5672';
     logger.info({ url: url.replace(/:[^:]*@/, ':****@') }, 'Connecting to RabbitMQ');

     const conn = await amqplib.connect(url);

     conn.on('error', (err) => {
          logger.error({ err }, 'RabbitMQ connection error');
     });

     conn.on('close', () => {
          logger.warn('RabbitMQ connection closed, will reconnect on next use');
          if (connection === conn) {
               connection = null;
               channel = null;
          }
     });

     logger.info('Connected to RabbitMQ');
     return conn;
}

async function setupTopology(ch: Channel): Promise<void> {
     await ch.assertExchange(INVENTORY_EVENTS_EXCHANGE, 'topic', { durable: true });
     await ch.assertExchange(UPSTREAM_EVENTS_EXCHANGE, 'topic', { durable: true });

     // Setup dead letter exchange
     await ch.assertExchange(DEAD_LETTER_EXCHANGE, 'topic', { durable: true });

     await ch.assertQueue(INVENTORY_WORKER_QUEUE, {
          durable: true,
          deadLetterExchange: DEAD_LETTER_EXCHANGE,
          deadLetterRoutingKey: INVENTORY_WORKER_DLQ,
     });
     await ch.assertQueue(INVENTORY_WORKER_DLQ, { durable: true });

     for (const routingKey of UPSTREAM_ROUTING_KEYS) {
          await ch.bindQueue(INVENTORY_WORKER_QUEUE, UPSTREAM_EVENTS_EXCHANGE, routingKey);
     }
     await ch.bindQueue(INVENTORY_WORKER_DLQ, DEAD_LETTER_EXCHANGE, INVENTORY_WORKER_DLQ);
}

async function openChannel(): Promise<Channel> {
     const conn = connection ?? (await connect());
     connection = conn;

     const ch = await conn.createChannel();
     ch.on('error', (err) => {
          logger.error({ err }, 'RabbitMQ channel error');
     });

     await setupTopology(ch);
     logger.info('RabbitMQ channel created and configured');

     return ch;
}

/**
 * Concurrent callers share one in-flight open. A failed open or a closed
 * channel is forgotten so the next call opens a new one.
 */
export function getChannel(): Promise<Channel> {
     if (channel) {
          return channel;
     }

     const opening = openChannel();
     channel = opening;

     const forget = () => {
          if (channel === opening) {
               channel = null;
          }
     };
     void opening.then(
          (ch) =>
               ch.on('close', () => {
                    logger.warn('RabbitMQ channel closed, will reopen on next use');
                    forget();
               }),
          forget
     );

     return opening;
}

export async function publishEvent(
     exchange: string,
     routingKey: string,
     payload: Record<string, unknown>,
     options: Options.Publish = {}
): Promise<void> {
     const ch = await getChannel();
     const content = Buffer.from(JSON.stringify(payload));

     const accepted = ch.publish(exchange, routingKey, content, {
          persistent: true,
          contentType: 'application/json',
          timestamp: Date.now(),
          ...options,
     });

     if (!accepted) {
          logger.warn({ exchange, routingKey }, 'RabbitMQ write buffer full, message queued locally');
     }
}

export async function closeConnection(): Promise<void> {
     const opening = channel;
     const conn = connection;
     channel = null;
     connection = null;

     if (opening) {
          const ch = await opening.catch(() => null);
          if (ch) {
               await ch.close();
          }
     }
     if (conn) {
          await conn.close();
     }
     logger.info('RabbitMQ connection closed');
}

export type { ConsumeMessage };
