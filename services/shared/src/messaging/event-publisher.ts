import { randomUUID } from 'crypto';
import { EventEnvelope, InventoryEventType } from '../types/inventory.types';
import { logger } from '../utils/logger';
import { INVENTORY_EVENTS_EXCHANGE, publishEvent } from './client';

export interface EventPublisher {
     /** Resolves to false when the event could not be handed to the broker. */
     publish(
          eventType: InventoryEventType,
          payload: Record<string, unknown>,
          correlationId?: string
     ): Promise<boolean>;
}

export function buildEventEnvelope(
     source: string,
     eventType: string,
     data: Record<string, unknown>,
     correlationId?: string,
     now: Date = new Date()
): EventEnvelope {
     return {
          specversion: '1.0',
          type: eventType,
          source,
          id: randomUUID(),
          time: now.toISOString(),
          datacontenttype: 'application/json',
          data,
          correlationid: correlationId ?? randomUUID(),
     };
}

export class AmqpEventPublisher implements EventPublisher {
     constructor(
          private readonly source: string = 'inventory-service',
          private readonly exchange: string = INVENTORY_EVENTS_EXCHANGE
     ) {}

     async publish(
          eventType: InventoryEventType,
          payload: Record<string, unknown>,
          correlationId?: string
     ): Promise<boolean> {
          const envelope = buildEventEnvelope(this.source, eventType, payload, correlationId);

          try {
               await publishEvent(this.exchange, eventType, { ...envelope }, {
                    messageId: envelope.id,
                    correlationId: envelope.correlationid,
                    type: eventType,
               });

               logger.info(
                    { eventType, eventId: envelope.id, correlationId: envelope.correlationid },
                    'Published event'
               );
               return true;
          } catch (error) {
               logger.error(
                    { error, eventType, correlationId: envelope.correlationid },
                    'Failed to publish event'
               );
               return false;
          }
     }
}
