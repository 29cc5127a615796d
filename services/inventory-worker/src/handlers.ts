import { z } from 'zod';
import { EventPublisher } from '@stockhold/shared/src/messaging/event-publisher';
import { InventoryEngine } from '@stockhold/shared/src/services/inventory-engine';
import {
     INVENTORY_EVENTS,
     OperationContext,
     ReserveResult,
     StockLine,
} from '@stockhold/shared/src/types/inventory.types';
import { DuplicateItemError, OrderAlreadyReservedError } from '@stockhold/shared/src/utils/errors';
import { createChildLogger } from '@stockhold/shared/src/utils/logger';

const logger = createChildLogger({ component: 'inventory-worker' });

/** processed: engine called; ignored: nothing to do; invalid: payload rejected. */
export type HandlerOutcome = 'processed' | 'ignored' | 'invalid';

export type UpstreamHandler = (
     data: Record<string, unknown>,
     context: OperationContext
) => Promise<HandlerOutcome>;

export type HandlerRegistry = Record<string, UpstreamHandler>;

export interface UpstreamMessage {
     data: Record<string, unknown>;
     correlationId?: string;
}

/** Upstream services send ids as strings or numbers. */
const identifier = z.union([z.string().trim().min(1), z.number().finite().transform(String)]);

const correlationId = z.string().min(1).optional().catch(undefined);

const envelopeSchema = z.object({
     data: z.record(z.unknown()),
     correlationid: correlationId,
     correlationId,
});

const bareMessageSchema = z.object({ correlationId }).passthrough();

export const orderLineSchema = z
     .object({
          sku: identifier.optional(),
          productId: identifier.optional(),
          quantity: z.number().int().positive().default(1),
     })
     .refine((line) => line.sku !== undefined || line.productId !== undefined, {
          message: 'sku or productId is required',
     });

export type OrderLine = z.infer<typeof orderLineSchema>;

export const productCreatedSchema = z.object({
     productId: identifier,
     sku: identifier.optional(),
     initialQuantity: z.number().int().nonnegative().optional(),
});

export const orderCreatedSchema = z.object({
     orderId: identifier,
     items: z.array(orderLineSchema).nonempty(),
});

export const orderCancelledSchema = z.object({
     orderId: identifier,
});

/**
 * Accepts a CloudEvents-style envelope (`data`, `correlationid`) or a bare
 * payload. Returns null when the body is not a JSON object.
 */
export function parseUpstreamMessage(content: string): UpstreamMessage | null {
     let body: unknown;
     try {
          body = JSON.parse(content);
     } catch (error) {
          logger.warn({ error }, 'Message body is not valid JSON');
          return null;
     }

     const envelope = envelopeSchema.safeParse(body);
     if (envelope.success) {
          return {
               data: envelope.data.data,
               correlationId: envelope.data.correlationid ?? envelope.data.correlationId,
          };
     }

     const bare = bareMessageSchema.safeParse(body);
     if (!bare.success) {
          return null;
     }
     return { data: bare.data, correlationId: bare.data.correlationId };
}

interface FailedLine {
     sku?: string;
     productId?: string;
     requested: number;
     available: number;
     error: 'ITEM_NOT_FOUND' | 'INSUFFICIENT_STOCK';
     failureReason: string;
}

export function createHandlerRegistry(
     engine: InventoryEngine,
     publisher: EventPublisher
): HandlerRegistry {
     async function publishFailure(
          orderId: string,
          failure: FailedLine,
          context: OperationContext
     ): Promise<void> {
          const published = await publisher.publish(
               INVENTORY_EVENTS.RESERVATION_FAILED,
               { orderId, ...failure, timestamp: new Date().toISOString() },
               context.correlationId
          );
          if (!published) {
               logger.warn({ orderId }, 'Reservation failure event was not published');
          }
     }

     /** Maps product lines to SKUs. Resolves to the first unknown product instead when there is one. */
     async function resolveLines(
          lines: OrderLine[]
     ): Promise<{ lines: StockLine[] } | { unknown: OrderLine & { productId: string } }> {
          const resolved: StockLine[] = [];
          for (const line of lines) {
               if (line.sku !== undefined) {
                    resolved.push({ sku: line.sku, quantity: line.quantity });
                    continue;
               }
               if (line.productId === undefined) {
                    continue;
               }

               const item = await engine.findItemByProductId(line.productId);
               if (!item) {
                    return { unknown: { ...line, productId: line.productId } };
               }
               resolved.push({ sku: item.sku, quantity: line.quantity });
          }
          return { lines: resolved };
     }

     return {
          'product.created': async (data, context) => {
               const parsed = productCreatedSchema.safeParse(data);
               if (!parsed.success) {
                    logger.warn({ issues: parsed.error.issues }, 'Invalid product.created payload');
                    return 'invalid';
               }
               const { productId, sku, initialQuantity } = parsed.data;

               const existing = await engine.findItemByProductId(productId);
               if (existing) {
                    logger.info({ productId, sku: existing.sku }, 'Inventory item already exists for product');
                    return 'ignored';
               }

               try {
                    await engine.createItem({ productId, sku, initialQuantity }, context);
               } catch (error) {
                    if (error instanceof DuplicateItemError) {
                         logger.info({ productId, sku: error.sku }, 'Inventory item already exists');
                         return 'ignored';
                    }
                    throw error;
               }
               return 'processed';
          },

          'order.created': async (data, context) => {
               const parsed = orderCreatedSchema.safeParse(data);
               if (!parsed.success) {
                    logger.warn({ issues: parsed.error.issues }, 'Invalid order.created payload');
                    return 'invalid';
               }
               const { orderId, items } = parsed.data;

               const resolution = await resolveLines(items);
               if ('unknown' in resolution) {
                    const { productId, quantity } = resolution.unknown;
                    logger.warn({ orderId, productId }, 'Reservation failed: unknown product');
                    await publishFailure(
                         orderId,
                         {
                              productId,
                              requested: quantity,
                              available: 0,
                              error: 'ITEM_NOT_FOUND',
                              failureReason: `No inventory item for product ${productId}`,
                         },
                         context
                    );
                    return 'processed';
               }

               let result: ReserveResult;
               try {
                    result = await engine.reserveOrder(orderId, resolution.lines, context);
               } catch (error) {
                    if (error instanceof OrderAlreadyReservedError) {
                         logger.info({ orderId, existing: error.existing }, 'Order already has reservations');
                         return 'ignored';
                    }
                    throw error;
               }

               if (!result.success) {
                    await publishFailure(
                         orderId,
                         {
                              sku: result.sku,
                              requested: result.requested,
                              available: result.available,
                              error: result.error,
                              failureReason: result.failureReason,
                         },
                         context
                    );
               }
               return 'processed';
          },

          'order.cancelled': async (data, context) => {
               const parsed = orderCancelledSchema.safeParse(data);
               if (!parsed.success) {
                    logger.warn({ issues: parsed.error.issues }, 'Invalid order.cancelled payload');
                    return 'invalid';
               }

               await engine.releaseOrder(parsed.data.orderId, 'order_cancelled', context);
               return 'processed';
          },
     };
}

export async function dispatchMessage(
     registry: HandlerRegistry,
     routingKey: string,
     content: string
): Promise<HandlerOutcome> {
     const handler = registry[routingKey];
     if (!handler) {
          logger.warn({ routingKey }, 'No handler for routing key');
          return 'ignored';
     }

     const message = parseUpstreamMessage(content);
     if (!message) {
          logger.warn({ routingKey }, 'Discarding unreadable message');
          return 'invalid';
     }

     return handler(message.data, {
          correlationId: message.correlationId,
          actor: 'inventory-worker',
     });
}
