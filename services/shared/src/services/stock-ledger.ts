import { InventoryTransaction } from '../repositories';
import {
     InventoryItem,
     InventoryItemView,
     LedgerOperation,
     MovementResult,
     MovementType,
     StockMovement,
} from '../types/inventory.types';
import { InsufficientStockError, ItemNotFoundError, ValidationError } from '../utils/errors';
import { createChildLogger } from '../utils/logger';

const logger = createChildLogger({ component: 'stock-ledger' });

export interface MovementCommand {
     sku: string;
     quantity: number;
     movementType: MovementType;
     reference?: string | null;
     reason?: string | null;
     actor?: string;
}

export type ReservedStockCommand = Omit<MovementCommand, 'movementType'>;

export interface StockLevels {
     quantityAvailable: number;
     quantityReserved: number;
}

export function validateQuantity(operation: LedgerOperation, quantity: number): void {
     if (!Number.isInteger(quantity)) {
          throw new ValidationError(`Quantity must be an integer, got ${quantity}`);
     }
     // ADJUSTMENT sets an absolute level, so zero is a legitimate target
     if (operation === 'ADJUSTMENT' ? quantity < 0 : quantity <= 0) {
          throw new ValidationError(
               operation === 'ADJUSTMENT'
                    ? `Adjustment target must not be negative, got ${quantity}`
                    : `Quantity must be positive for ${operation}, got ${quantity}`
          );
     }
}

/**
 * Pure quantity arithmetic for one ledger operation. Results that would go
 * negative are rejected rather than clamped.
 */
export function computeStockLevels(
     item: Pick<InventoryItem, 'sku' | 'quantityAvailable' | 'quantityReserved'>,
     operation: LedgerOperation,
     quantity: number
): StockLevels {
     validateQuantity(operation, quantity);

     const { sku, quantityAvailable: available, quantityReserved: reserved } = item;

     switch (operation) {
          case 'IN':
               return { quantityAvailable: available + quantity, quantityReserved: reserved };
          case 'OUT':
          case 'RESERVED':
               if (available < quantity) {
                    throw new InsufficientStockError(
                         `Insufficient stock for ${sku}: requested ${quantity}, available ${available}`,
                         sku,
                         quantity,
                         available
                    );
               }
               return operation === 'OUT'
                    ? { quantityAvailable: available - quantity, quantityReserved: reserved }
                    : {
                           quantityAvailable: available - quantity,
                           quantityReserved: reserved + quantity,
                      };
          case 'RELEASED':
          case 'CONFIRM_RESERVATION':
               if (reserved < quantity) {
                    throw new InsufficientStockError(
                         `Cannot take ${quantity} reserved units of ${sku}: only ${reserved} reserved`,
                         sku,
                         quantity,
                         reserved
                    );
               }
               return operation === 'RELEASED'
                    ? {
                           quantityAvailable: available + quantity,
                           quantityReserved: reserved - quantity,
                      }
                    : { quantityAvailable: available, quantityReserved: reserved - quantity };
          case 'ADJUSTMENT':
               return { quantityAvailable: quantity, quantityReserved: reserved };
     }
}

export function recordedMovementType(operation: LedgerOperation): MovementType {
     return operation === 'CONFIRM_RESERVATION' ? 'OUT' : operation;
}

export function describeStockLevel(item: InventoryItem): InventoryItemView {
     return {
          ...item,
          totalQuantity: item.quantityAvailable + item.quantityReserved,
          isLowStock: item.quantityAvailable <= item.reorderLevel,
          isOutOfStock: item.quantityAvailable === 0,
     };
}

export interface ThresholdCrossings {
     lowStock: boolean;
     outOfStock: boolean;
}

export function detectThresholdCrossings(
     previous: InventoryItem,
     current: InventoryItem
): ThresholdCrossings {
     return {
          lowStock:
               previous.quantityAvailable > current.reorderLevel &&
               current.quantityAvailable <= current.reorderLevel,
          outOfStock: previous.quantityAvailable > 0 && current.quantityAvailable === 0,
     };
}

/**
 * Owns per-SKU quantities and the movement history. Every call locks the item
 * row, applies the quantity change and appends exactly one movement through
 * the same transaction.
 */
export class StockLedger {
     async applyMovement(tx: InventoryTransaction, command: MovementCommand): Promise<MovementResult> {
          return this.apply(tx, command.movementType, command);
     }

     /**
      * Converts a hold into a permanent deduction: `reserved` drops by the
      * reservation quantity while `available`, already reduced when the hold
      * was placed, stays put. Recorded as an OUT movement.
      */
     async confirmReservedStock(
          tx: InventoryTransaction,
          command: ReservedStockCommand
     ): Promise<MovementResult> {
          return this.apply(tx, 'CONFIRM_RESERVATION', command);
     }

     async listMovements(
          tx: InventoryTransaction,
          sku: string,
          limit: number = 50
     ): Promise<StockMovement[]> {
          return tx.movements.listBySku(sku, limit);
     }

     private async apply(
          tx: InventoryTransaction,
          operation: LedgerOperation,
          command: ReservedStockCommand
     ): Promise<MovementResult> {
          const { sku, quantity } = command;

          validateQuantity(operation, quantity);

          const previous = await tx.items.findBySku(sku, { forUpdate: true });
          if (!previous) {
               throw new ItemNotFoundError(sku);
          }

          const levels = computeStockLevels(previous, operation, quantity);

          const item = await tx.items.updateQuantities(sku, {
               ...levels,
               restocked: operation === 'IN',
          });

          const movement = await tx.movements.insert({
               sku,
               movementType: recordedMovementType(operation),
               quantity,
               reference: command.reference ?? null,
               reason: command.reason ?? null,
               createdBy: command.actor ?? 'system',
          });

          logger.debug(
               {
                    sku,
                    operation,
                    quantity,
                    available: item.quantityAvailable,
                    reserved: item.quantityReserved,
               },
               'Ledger movement applied'
          );

          return { movement, item, previous };
     }
}
