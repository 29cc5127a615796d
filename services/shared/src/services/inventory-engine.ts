import { ProductMetadataClient } from '../clients/product-client';
import { InventoryConfig } from '../config';
import { EventPublisher } from '../messaging/event-publisher';
import { InventoryTransaction, TransactionManager } from '../repositories';
import {
     AvailabilityResult,
     BulkUpdateOperation,
     BulkUpdateResult,
     ConfirmResult,
     CreateItemInput,
     INVENTORY_EVENTS,
     InventoryEventType,
     InventoryItem,
     InventoryItemView,
     InventoryItemWithProduct,
     ItemAttributes,
     ItemFilter,
     MovementResult,
     MovementType,
     OperationContext,
     Page,
     PageOptions,
     ProductDetails,
     ReleaseReason,
     Reservation,
     ReservationFilter,
     ReserveResult,
     StockLine,
     StockMovement,
     StockStatistics,
     StockReleasedEvent,
     StockReservedEvent,
     StockUpdatedEvent,
} from '../types/inventory.types';
import {
     DomainError,
     InsufficientStockError,
     InvalidStateError,
     ItemNotFoundError,
     OrderAlreadyReservedError,
     OrderMismatchError,
     ProductServiceError,
     ReservationExpiredError,
     StorageError,
     ValidationError,
     errorMessage,
     isDomainError,
} from '../utils/errors';
import { createChildLogger } from '../utils/logger';
import { withTimeout } from '../utils/timeout';
import { ReservationStore, computeExpiry } from './reservation-store';
import { StockLedger, describeStockLevel, detectThresholdCrossings } from './stock-ledger';

const logger = createChildLogger({ component: 'inventory-engine' });

const HOUR_MS = 60 * 60 * 1000;

export const INITIAL_STOCK_REFERENCE = 'INITIAL_STOCK';

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

/** Movement types callers may book directly; RESERVED and RELEASED belong to the reservation flow. */
export const MANUAL_MOVEMENT_TYPES: readonly MovementType[] = ['IN', 'OUT', 'ADJUSTMENT'];

export type EngineConfig = Pick<
     InventoryConfig,
     | 'reservationTtlMinutes'
     | 'publishTimeoutMs'
     | 'productTimeoutMs'
     | 'defaultReorderLevel'
     | 'defaultMaxStock'
>;

const DEFAULT_ENGINE_CONFIG: EngineConfig = {
     reservationTtlMinutes: 30,
     publishTimeoutMs: 2000,
     productTimeoutMs: 2000,
     defaultReorderLevel: 10,
     defaultMaxStock: 1000,
};

export interface InventoryEngineDeps {
     transactions: TransactionManager;
     publisher: EventPublisher;
     productClient: ProductMetadataClient;
     config?: Partial<EngineConfig>;
     ledger?: StockLedger;
     reservations?: ReservationStore;
     now?: () => Date;
}

export interface AdjustStockInput {
     sku: string;
     quantity: number;
     movementType: MovementType;
     reference?: string | null;
     reason?: string | null;
}

interface HeldLine {
     reservation: Reservation;
     result: MovementResult;
}

interface PendingEvent {
     type: InventoryEventType;
     payload: Record<string, unknown>;
}

/**
 * `SKU-<productId>-<yyyymmddHHMMSS>` in UTC.
 */
export function generateSku(productId: string, now: Date): string {
     const stamp = now.toISOString().slice(0, 19).replace(/[-:T]/g, '');
     return `SKU-${productId}-${stamp}`;
}

function requireText(value: string, field: string): void {
     if (typeof value !== 'string' || value.trim() === '') {
          throw new ValidationError(`${field} is required`);
     }
}

function validateLines(lines: StockLine[]): void {
     if (lines.length === 0) {
          throw new ValidationError('At least one item is required');
     }
     for (const line of lines) {
          requireText(line.sku, 'sku');
          if (!Number.isInteger(line.quantity) || line.quantity <= 0) {
               throw new ValidationError(
                    `Quantity must be a positive integer for ${line.sku}, got ${line.quantity}`
               );
          }
     }
}

/**
 * Checks the attribute values an item would end up with after a patch.
 */
export function validateItemAttributes(
     attributes: Required<Omit<ItemAttributes, 'productId'>>
): void {
     const { reorderLevel, maxStock, costPerUnit } = attributes;

     if (!Number.isInteger(reorderLevel) || reorderLevel < 0) {
          throw new ValidationError(`reorderLevel must be a non-negative integer, got ${reorderLevel}`);
     }
     if (!Number.isInteger(maxStock) || maxStock < 0) {
          throw new ValidationError(`maxStock must be a non-negative integer, got ${maxStock}`);
     }
     if (maxStock < reorderLevel) {
          throw new ValidationError(
               `maxStock (${maxStock}) must not be lower than reorderLevel (${reorderLevel})`
          );
     }
     if (costPerUnit !== null && (!Number.isFinite(costPerUnit) || costPerUnit < 0)) {
          throw new ValidationError(`costPerUnit must be a non-negative number, got ${costPerUnit}`);
     }
}

function resolvePage(options: PageOptions): { limit: number; offset: number } {
     const limit = options.limit ?? DEFAULT_PAGE_SIZE;
     const offset = options.offset ?? 0;

     if (!Number.isInteger(limit) || limit <= 0 || limit > MAX_PAGE_SIZE) {
          throw new ValidationError(`limit must be an integer from 1 to ${MAX_PAGE_SIZE}, got ${limit}`);
     }
     if (!Number.isInteger(offset) || offset < 0) {
          throw new ValidationError(`offset must be a non-negative integer, got ${offset}`);
     }
     return { limit, offset };
}

function hasAttributeChanges(attributes: ItemAttributes): boolean {
     return (
          attributes.productId !== undefined ||
          attributes.reorderLevel !== undefined ||
          attributes.maxStock !== undefined ||
          attributes.costPerUnit !== undefined
     );
}

/**
 * Business operations over the stock ledger and reservation store. Each
 * mutating call runs in one transaction; events go out after commit and a
 * failed publish never affects the result.
 */
export class InventoryEngine {
     private readonly transactions: TransactionManager;
     private readonly publisher: EventPublisher;
     private readonly productClient: ProductMetadataClient;
     private readonly ledger: StockLedger;
     private readonly reservations: ReservationStore;
     private readonly config: EngineConfig;
     private readonly now: () => Date;

     constructor(deps: InventoryEngineDeps) {
          this.transactions = deps.transactions;
          this.publisher = deps.publisher;
          this.productClient = deps.productClient;
          this.ledger = deps.ledger ?? new StockLedger();
          this.reservations = deps.reservations ?? new ReservationStore();
          this.config = { ...DEFAULT_ENGINE_CONFIG, ...deps.config };
          this.now = deps.now ?? (() => new Date());
     }

     // Items

     async createItem(input: CreateItemInput, context: OperationContext = {}): Promise<InventoryItemView> {
          return this.run('createItem', async () => {
               requireText(input.productId, 'productId');

               const initialQuantity = input.initialQuantity ?? 0;
               if (!Number.isInteger(initialQuantity) || initialQuantity < 0) {
                    throw new ValidationError(
                         `initialQuantity must be a non-negative integer, got ${initialQuantity}`
                    );
               }

               const attributes = {
                    reorderLevel: input.reorderLevel ?? this.config.defaultReorderLevel,
                    maxStock: input.maxStock ?? this.config.defaultMaxStock,
                    costPerUnit: input.costPerUnit ?? null,
               };
               validateItemAttributes(attributes);

               const sku = input.sku ?? generateSku(input.productId, this.now());
               requireText(sku, 'sku');

               const item = await this.transactions.withTransaction(async (tx) => {
                    const created = await tx.items.insert({
                         sku,
                         productId: input.productId,
                         ...attributes,
                    });

                    if (initialQuantity === 0) {
                         return created;
                    }

                    const result = await this.ledger.applyMovement(tx, {
                         sku,
                         quantity: initialQuantity,
                         movementType: 'IN',
                         reference: INITIAL_STOCK_REFERENCE,
                         reason: 'Initial stock',
                         actor: context.actor,
                    });
                    return result.item;
               });

               logger.info(
                    { sku, productId: item.productId, quantityAvailable: item.quantityAvailable },
                    'Inventory item created'
               );

               await this.emit(
                    [
                         {
                              type: INVENTORY_EVENTS.CREATED,
                              payload: {
                                   sku: item.sku,
                                   productId: item.productId,
                                   quantityAvailable: item.quantityAvailable,
                                   reorderLevel: item.reorderLevel,
                                   maxStock: item.maxStock,
                                   timestamp: this.timestamp(),
                              },
                         },
                    ],
                    context
               );

               return describeStockLevel(item);
          });
     }

     async getItem(sku: string): Promise<InventoryItemView> {
          return this.run('getItem', async () => {
               const item = await this.transactions.withConnection((tx) => this.loadItem(tx, sku));
               return describeStockLevel(item);
          });
     }

     async findItemByProductId(productId: string): Promise<InventoryItemView | null> {
          return this.run('findItemByProductId', async () => {
               const item = await this.transactions.withConnection((tx) =>
                    tx.items.findByProductId(productId)
               );
               return item ? describeStockLevel(item) : null;
          });
     }

     async getItemWithProductDetails(sku: string): Promise<InventoryItemWithProduct> {
          const item = await this.getItem(sku);
          const productDetails = await this.fetchProductDetails(item.productId);
          return { ...item, productDetails };
     }

     async listLowStock(): Promise<InventoryItemView[]> {
          return this.run('listLowStock', async () => {
               const items = await this.transactions.withConnection((tx) => tx.items.listLowStock());
               return items.map(describeStockLevel);
          });
     }

     async listMovements(sku: string, limit: number = 50): Promise<StockMovement[]> {
          return this.run('listMovements', async () => {
               if (!Number.isInteger(limit) || limit <= 0) {
                    throw new ValidationError(`limit must be a positive integer, got ${limit}`);
               }
               return this.transactions.withConnection(async (tx) => {
                    await this.loadItem(tx, sku);
                    return this.ledger.listMovements(tx, sku, limit);
               });
          });
     }

     async searchItems(filter: ItemFilter = {}, options: PageOptions = {}): Promise<Page<InventoryItemView>> {
          return this.run('searchItems', async () => {
               const { limit, offset } = resolvePage(options);
               const found = await this.transactions.withConnection((tx) =>
                    tx.items.search(filter, limit, offset)
               );
               return { items: found.rows.map(describeStockLevel), total: found.total, limit, offset };
          });
     }

     async getStockStatistics(recentMovements: number = 10): Promise<StockStatistics> {
          return this.run('getStockStatistics', async () => {
               if (!Number.isInteger(recentMovements) || recentMovements < 0) {
                    throw new ValidationError(
                         `recentMovements must be a non-negative integer, got ${recentMovements}`
                    );
               }
               return this.transactions.withConnection(async (tx) => {
                    const totals = await tx.items.totals();
                    const movements =
                         recentMovements > 0 ? await tx.movements.listRecent(recentMovements) : [];
                    return { ...totals, recentMovements: movements };
               });
          });
     }

     async updateItem(sku: string, patch: ItemAttributes): Promise<InventoryItemView> {
          return this.run('updateItem', async () => {
               if (!hasAttributeChanges(patch)) {
                    throw new ValidationError('No item attributes to update');
               }

               const item = await this.transactions.withTransaction((tx) =>
                    this.applyAttributes(tx, sku, patch)
               );

               logger.info({ sku, patch }, 'Inventory item updated');
               return describeStockLevel(item);
          });
     }

     /**
      * Soft delete. The movement history keeps referencing the row, so items
      * are only ever deactivated.
      */
     async archiveItem(sku: string): Promise<InventoryItemView> {
          return this.run('archiveItem', async () => {
               const item = await this.transactions.withTransaction(async (tx) => {
                    const current = await this.loadItem(tx, sku, true);
                    if (!current.isActive) {
                         return current;
                    }

                    const pending = await tx.reservations.countPendingBySku(sku);
                    if (pending > 0) {
                         throw new InvalidStateError(
                              `Cannot archive ${sku}: ${pending} pending reservation(s)`
                         );
                    }

                    const archived = await tx.items.setActive(sku, false);
                    if (!archived) {
                         throw new ItemNotFoundError(sku);
                    }
                    return archived;
               });

               logger.info({ sku }, 'Inventory item archived');
               return describeStockLevel(item);
          });
     }

     // Stock

     async checkAvailability(lines: StockLine[]): Promise<AvailabilityResult> {
          return this.run('checkAvailability', async () => {
               validateLines(lines);

               const items = await this.transactions.withConnection((tx) =>
                    tx.items.findManyBySkus(lines.map((line) => line.sku))
               );
               const bySku = new Map(items.map((item) => [item.sku, item]));

               const results = lines.map((line) => {
                    const item = bySku.get(line.sku);
                    const availableQuantity = item && item.isActive ? item.quantityAvailable : 0;
                    return {
                         sku: line.sku,
                         available: availableQuantity >= line.quantity,
                         availableQuantity,
                         requestedQuantity: line.quantity,
                    };
               });

               return {
                    available: results.every((result) => result.available),
                    items: results,
               };
          });
     }

     async adjustStock(input: AdjustStockInput, context: OperationContext = {}): Promise<MovementResult> {
          return this.run('adjustStock', async () => {
               if (!MANUAL_MOVEMENT_TYPES.includes(input.movementType)) {
                    throw new ValidationError(
                         `Movement type ${input.movementType} is reserved for the reservation flow`
                    );
               }

               const result = await this.transactions.withTransaction(async (tx) => {
                    await this.loadActiveItem(tx, input.sku);
                    return this.ledger.applyMovement(tx, { ...input, actor: context.actor });
               });

               logger.info(
                    {
                         sku: input.sku,
                         movementType: input.movementType,
                         quantity: input.quantity,
                         quantityAvailable: result.item.quantityAvailable,
                    },
                    'Stock adjusted'
               );

               await this.emit(
                    [this.stockUpdatedEvent(result), ...this.thresholdAlerts(result)],
                    context
               );
               return result;
          });
     }

     /**
      * Each operation commits or fails on its own; one failure never undoes
      * the operations before it.
      */
     async bulkUpdate(
          operations: BulkUpdateOperation[],
          context: OperationContext = {}
     ): Promise<BulkUpdateResult[]> {
          const results: BulkUpdateResult[] = [];

          for (const operation of operations) {
               try {
                    const events = await this.transactions.withTransaction(async (tx) => {
                         const { sku, quantityAvailable, reason, ...attributes } = operation;
                         requireText(sku, 'sku');

                         if (quantityAvailable === undefined && !hasAttributeChanges(attributes)) {
                              throw new ValidationError('No fields to update');
                         }

                         if (hasAttributeChanges(attributes)) {
                              await this.applyAttributes(tx, sku, attributes);
                         }

                         if (quantityAvailable === undefined) {
                              return [];
                         }

                         await this.loadActiveItem(tx, sku);
                         const movement = await this.ledger.applyMovement(tx, {
                              sku,
                              quantity: quantityAvailable,
                              movementType: 'ADJUSTMENT',
                              reason: reason ?? 'Bulk update',
                              actor: context.actor,
                         });
                         return [this.stockUpdatedEvent(movement), ...this.thresholdAlerts(movement)];
                    });

                    await this.emit(events, context);
                    results.push({ sku: operation.sku, success: true });
               } catch (error) {
                    const failure = this.translate(error, 'bulkUpdate');
                    logger.warn(
                         { sku: operation.sku, code: failure.code, error: failure.message },
                         'Bulk update operation failed'
                    );
                    results.push({
                         sku: operation.sku,
                         success: false,
                         error: failure.message,
                         code: failure.code,
                    });
               }
          }

          logger.info(
               {
                    total: results.length,
                    succeeded: results.filter((result) => result.success).length,
               },
               'Bulk update completed'
          );
          return results;
     }

     // Reservations

     /**
      * All-or-nothing: every line is held in one transaction, and any line
      * that cannot be held rolls back the lines before it.
      */
     async reserve(
          orderId: string,
          lines: StockLine[],
          ttlMinutes: number = this.config.reservationTtlMinutes,
          context: OperationContext = {}
     ): Promise<ReserveResult> {
          return this.run<ReserveResult>('reserve', () =>
               this.holdLines(orderId, lines, ttlMinutes, context, false)
          );
     }

     /**
      * `reserve` for an order that may only ever be held once. Rejects with
      * OrderAlreadyReservedError when any reservation, in any status, exists
      * for the order; the check and the holds share one transaction.
      */
     async reserveOrder(
          orderId: string,
          lines: StockLine[],
          context: OperationContext = {}
     ): Promise<ReserveResult> {
          return this.run<ReserveResult>('reserveOrder', () =>
               this.holdLines(orderId, lines, this.config.reservationTtlMinutes, context, true)
          );
     }

     async confirmReservation(
          reservationId: string,
          orderId: string,
          context: OperationContext = {}
     ): Promise<Reservation> {
          return this.run('confirmReservation', () =>
               this.confirmOne(reservationId, orderId, context)
          );
     }

     /**
      * Confirms each reservation independently. Without `orderId`, every
      * reservation is checked against its own order.
      */
     async confirmReservations(
          reservationIds: string[],
          orderId?: string,
          context: OperationContext = {}
     ): Promise<ConfirmResult[]> {
          const results: ConfirmResult[] = [];

          for (const reservationId of reservationIds) {
               try {
                    await this.confirmOne(reservationId, orderId, context);
                    results.push({ reservationId, success: true });
               } catch (error) {
                    const failure = this.translate(error, 'confirmReservations');
                    results.push({
                         reservationId,
                         success: false,
                         error: failure.message,
                         code: failure.code,
                    });
               }
          }

          return results;
     }

     async cancelReservation(reservationId: string, context: OperationContext = {}): Promise<Reservation> {
          return this.run('cancelReservation', () =>
               this.releaseOne(reservationId, 'CANCELLED', 'cancelled', context)
          );
     }

     async releaseReservation(reservationId: string, context: OperationContext = {}): Promise<Reservation> {
          return this.run('releaseReservation', () =>
               this.releaseOne(reservationId, 'RELEASED', 'released', context)
          );
     }

     /**
      * Cancels every PENDING reservation of an order. Reservations already in
      * a terminal state are left alone.
      */
     async releaseOrder(
          orderId: string,
          reason: ReleaseReason = 'order_cancelled',
          context: OperationContext = {}
     ): Promise<Reservation[]> {
          return this.run('releaseOrder', async () => {
               requireText(orderId, 'orderId');

               const released = await this.transactions.withTransaction(async (tx) => {
                    const reservations = await this.reservations.listByOrder(tx, orderId, {
                         forUpdate: true,
                    });
                    const pending = reservations
                         .filter((reservation) => reservation.status === 'PENDING')
                         .sort((a, b) => a.sku.localeCompare(b.sku));

                    const results: HeldLine[] = [];
                    for (const reservation of pending) {
                         const cancelled = await this.reservations.updateStatus(
                              tx,
                              reservation.id,
                              'CANCELLED'
                         );
                         const result = await this.releaseStock(tx, cancelled, reason, context);
                         results.push({ reservation: cancelled, result });
                    }
                    return results;
               });

               logger.info({ orderId, releasedCount: released.length, reason }, 'Order released');

               await this.emit(
                    released.map(({ reservation, result }) =>
                         this.stockReleasedEvent(reservation, result, reason)
                    ),
                    context
               );
               return released.map(({ reservation }) => reservation);
          });
     }

     /**
      * Sweeper path. Resolves to null when the reservation has already left
      * PENDING or has not reached its expiry yet.
      */
     async expireReservation(
          reservationId: string,
          context: OperationContext = {}
     ): Promise<Reservation | null> {
          return this.run('expireReservation', async () => {
               const now = this.now();

               const outcome = await this.transactions.withTransaction(async (tx) => {
                    const reservation = await tx.reservations.findById(reservationId, {
                         forUpdate: true,
                    });
                    if (
                         !reservation ||
                         reservation.status !== 'PENDING' ||
                         now.getTime() < reservation.expiresAt.getTime()
                    ) {
                         return null;
                    }

                    const expired = await tx.reservations.transition(reservationId, 'PENDING', 'EXPIRED');
                    if (!expired) {
                         return null;
                    }

                    const result = await this.releaseStock(tx, expired, 'expired', context);
                    return { reservation: expired, result };
               });

               if (!outcome) {
                    logger.debug({ reservationId }, 'Reservation no longer eligible for expiry');
                    return null;
               }

               logger.info(
                    {
                         reservationId,
                         orderId: outcome.reservation.orderId,
                         sku: outcome.reservation.sku,
                         quantity: outcome.reservation.quantity,
                    },
                    'Reservation expired'
               );

               await this.emit(
                    [this.stockReleasedEvent(outcome.reservation, outcome.result, 'expired')],
                    context
               );
               return outcome.reservation;
          });
     }

     async findExpiredReservations(limit: number = 100): Promise<Reservation[]> {
          return this.run('findExpiredReservations', () =>
               this.transactions.withConnection((tx) =>
                    this.reservations.listExpired(tx, this.now(), limit)
               )
          );
     }

     async purgeTerminalReservations(olderThanHours: number): Promise<number> {
          return this.run('purgeTerminalReservations', async () => {
               if (!Number.isFinite(olderThanHours) || olderThanHours < 0) {
                    throw new ValidationError(
                         `olderThanHours must be a non-negative number, got ${olderThanHours}`
                    );
               }

               const cutoff = new Date(this.now().getTime() - olderThanHours * HOUR_MS);
               const purged = await this.transactions.withTransaction((tx) =>
                    this.reservations.purgeTerminal(tx, cutoff)
               );

               logger.info({ purged, cutoff: cutoff.toISOString() }, 'Terminal reservations purged');
               return purged;
          });
     }

     async getReservation(reservationId: string): Promise<Reservation> {
          return this.run('getReservation', () =>
               this.transactions.withConnection((tx) => this.reservations.getById(tx, reservationId))
          );
     }

     async listReservationsForOrder(orderId: string): Promise<Reservation[]> {
          return this.run('listReservationsForOrder', () =>
               this.transactions.withConnection((tx) => this.reservations.listByOrder(tx, orderId))
          );
     }

     async searchReservations(
          filter: ReservationFilter = {},
          options: PageOptions = {}
     ): Promise<Page<Reservation>> {
          return this.run('searchReservations', async () => {
               const { limit, offset } = resolvePage(options);
               const found = await this.transactions.withConnection((tx) =>
                    tx.reservations.search(filter, limit, offset)
               );
               return { items: found.rows, total: found.total, limit, offset };
          });
     }

     // Internals

     private async holdLines(
          orderId: string,
          lines: StockLine[],
          ttlMinutes: number,
          context: OperationContext,
          oncePerOrder: boolean
     ): Promise<ReserveResult> {
          requireText(orderId, 'orderId');
          validateLines(lines);

          const now = this.now();
          const expiresAt = computeExpiry(now, ttlMinutes);

          let held: HeldLine[];
          try {
               held = await this.transactions.withTransaction(async (tx) => {
                    if (oncePerOrder) {
                         await tx.reservations.lockOrder(orderId);
                         const existing = await tx.reservations.findByOrderId(orderId);
                         if (existing.length > 0) {
                              throw new OrderAlreadyReservedError(orderId, existing.length);
                         }
                    }

                    const locked = await tx.items.findManyBySkus(
                         lines.map((line) => line.sku),
                         { forUpdate: true }
                    );
                    const active = new Set(
                         locked.filter((item) => item.isActive).map((item) => item.sku)
                    );

                    const created: HeldLine[] = [];
                    for (const line of lines) {
                         if (!active.has(line.sku)) {
                              throw new ItemNotFoundError(line.sku);
                         }

                         const reservation = await this.reservations.create(tx, {
                              sku: line.sku,
                              orderId,
                              quantity: line.quantity,
                              ttlMinutes,
                              now,
                         });
                         const result = await this.ledger.applyMovement(tx, {
                              sku: line.sku,
                              quantity: line.quantity,
                              movementType: 'RESERVED',
                              reference: orderId,
                              reason: `Reservation ${reservation.id}`,
                              actor: context.actor,
                         });
                         created.push({ reservation, result });
                    }
                    return created;
               });
          } catch (error) {
               if (error instanceof ItemNotFoundError) {
                    logger.warn({ orderId, sku: error.sku }, 'Reservation failed: unknown SKU');
                    return {
                         success: false,
                         orderId,
                         error: 'ITEM_NOT_FOUND',
                         failureReason: error.message,
                         sku: error.sku,
                         requested: lines.find((line) => line.sku === error.sku)?.quantity ?? 0,
                         available: 0,
                    };
               }
               if (error instanceof InsufficientStockError) {
                    logger.warn(
                         {
                              orderId,
                              sku: error.sku,
                              requested: error.requested,
                              available: error.available,
                         },
                         'Reservation failed: insufficient stock'
                    );
                    return {
                         success: false,
                         orderId,
                         error: 'INSUFFICIENT_STOCK',
                         failureReason: error.message,
                         sku: error.sku,
                         requested: error.requested,
                         available: error.available,
                    };
               }
               throw error;
          }

          logger.info(
               { orderId, reservationCount: held.length, expiresAt: expiresAt.toISOString() },
               'Stock reserved'
          );

          const events: PendingEvent[] = [];
          for (const { reservation, result } of held) {
               events.push({
                    type: INVENTORY_EVENTS.STOCK_RESERVED,
                    payload: {
                         sku: reservation.sku,
                         productId: result.item.productId,
                         quantity: reservation.quantity,
                         orderId,
                         reservationId: reservation.id,
                         expiresAt: reservation.expiresAt.toISOString(),
                         timestamp: this.timestamp(),
                    } satisfies StockReservedEvent,
               });
               events.push(...this.thresholdAlerts(result));
          }
          await this.emit(events, context);

          return {
               success: true,
               orderId,
               reservations: held.map(({ reservation }) => reservation),
               expiresAt,
          };
     }

     private async confirmOne(
          reservationId: string,
          orderId: string | undefined,
          context: OperationContext
     ): Promise<Reservation> {
          const now = this.now();

          const { reservation, result } = await this.transactions.withTransaction(async (tx) => {
               const current = await this.reservations.getById(tx, reservationId, { forUpdate: true });

               if (current.status !== 'PENDING') {
                    throw new InvalidStateError(
                         `Reservation ${reservationId} is ${current.status}, expected PENDING`,
                         current.status
                    );
               }
               if (orderId !== undefined && current.orderId !== orderId) {
                    throw new OrderMismatchError(reservationId, current.orderId, orderId);
               }
               if (now.getTime() >= current.expiresAt.getTime()) {
                    throw new ReservationExpiredError(reservationId, current.expiresAt);
               }

               const confirmed = await this.reservations.updateStatus(tx, reservationId, 'CONFIRMED');
               const movement = await this.ledger.confirmReservedStock(tx, {
                    sku: confirmed.sku,
                    quantity: confirmed.quantity,
                    reference: confirmed.orderId,
                    reason: `Reservation ${reservationId} confirmed`,
                    actor: context.actor,
               });
               return { reservation: confirmed, result: movement };
          });

          logger.info(
               {
                    reservationId,
                    orderId: reservation.orderId,
                    sku: reservation.sku,
                    quantity: reservation.quantity,
               },
               'Reservation confirmed'
          );

          await this.emit([this.stockUpdatedEvent(result)], context);
          return reservation;
     }

     private async releaseOne(
          reservationId: string,
          status: 'CANCELLED' | 'RELEASED',
          reason: ReleaseReason,
          context: OperationContext
     ): Promise<Reservation> {
          const { reservation, result } = await this.transactions.withTransaction(async (tx) => {
               await this.reservations.getById(tx, reservationId, { forUpdate: true });
               const updated = await this.reservations.updateStatus(tx, reservationId, status);
               const movement = await this.releaseStock(tx, updated, reason, context);
               return { reservation: updated, result: movement };
          });

          logger.info(
               { reservationId, orderId: reservation.orderId, sku: reservation.sku, status },
               'Reservation released'
          );

          await this.emit([this.stockReleasedEvent(reservation, result, reason)], context);
          return reservation;
     }

     private releaseStock(
          tx: InventoryTransaction,
          reservation: Reservation,
          reason: ReleaseReason,
          context: OperationContext
     ): Promise<MovementResult> {
          return this.ledger.applyMovement(tx, {
               sku: reservation.sku,
               quantity: reservation.quantity,
               movementType: 'RELEASED',
               reference: reservation.orderId,
               reason: `Reservation ${reservation.id} ${reason}`,
               actor: context.actor,
          });
     }

     private async applyAttributes(
          tx: InventoryTransaction,
          sku: string,
          patch: ItemAttributes
     ): Promise<InventoryItem> {
          const current = await this.loadItem(tx, sku, true);

          if (patch.productId !== undefined) {
               requireText(patch.productId, 'productId');
          }
          validateItemAttributes({
               reorderLevel: patch.reorderLevel ?? current.reorderLevel,
               maxStock: patch.maxStock ?? current.maxStock,
               costPerUnit: patch.costPerUnit === undefined ? current.costPerUnit : patch.costPerUnit,
          });

          const updated = await tx.items.updateAttributes(sku, patch);
          if (!updated) {
               throw new ItemNotFoundError(sku);
          }
          return updated;
     }

     private async loadItem(
          tx: InventoryTransaction,
          sku: string,
          forUpdate: boolean = false
     ): Promise<InventoryItem> {
          const item = await tx.items.findBySku(sku, { forUpdate });
          if (!item) {
               throw new ItemNotFoundError(sku);
          }
          return item;
     }

     private async loadActiveItem(tx: InventoryTransaction, sku: string): Promise<InventoryItem> {
          const item = await this.loadItem(tx, sku, true);
          if (!item.isActive) {
               throw new InvalidStateError(`Inventory item ${sku} is archived`);
          }
          return item;
     }

     private async fetchProductDetails(productId: string): Promise<ProductDetails | null> {
          try {
               return await withTimeout(
                    this.productClient.getProductById(productId),
                    this.config.productTimeoutMs,
                    'Product lookup'
               );
          } catch (error) {
               logger.warn(
                    {
                         productId,
                         error: errorMessage(error),
                         retriable: error instanceof ProductServiceError && error.retriable,
                    },
                    'Product enrichment failed'
               );
               return null;
          }
     }

     private stockUpdatedEvent(result: MovementResult): PendingEvent {
          return {
               type: INVENTORY_EVENTS.STOCK_UPDATED,
               payload: {
                    sku: result.item.sku,
                    productId: result.item.productId,
                    movementType: result.movement.movementType,
                    quantity: result.movement.quantity,
                    quantityAvailable: result.item.quantityAvailable,
                    quantityReserved: result.item.quantityReserved,
                    reference: result.movement.reference,
                    timestamp: this.timestamp(),
               } satisfies StockUpdatedEvent,
          };
     }

     private stockReleasedEvent(
          reservation: Reservation,
          result: MovementResult,
          reason: ReleaseReason
     ): PendingEvent {
          return {
               type: INVENTORY_EVENTS.STOCK_RELEASED,
               payload: {
                    sku: reservation.sku,
                    productId: result.item.productId,
                    quantity: reservation.quantity,
                    orderId: reservation.orderId,
                    reservationId: reservation.id,
                    reason,
                    timestamp: this.timestamp(),
               } satisfies StockReleasedEvent,
          };
     }

     private thresholdAlerts(result: MovementResult): PendingEvent[] {
          const { item } = result;
          const crossings = detectThresholdCrossings(result.previous, item);
          const alerts: PendingEvent[] = [];

          if (crossings.lowStock) {
               alerts.push({
                    type: INVENTORY_EVENTS.LOW_STOCK,
                    payload: {
                         sku: item.sku,
                         productId: item.productId,
                         quantityAvailable: item.quantityAvailable,
                         reorderLevel: item.reorderLevel,
                         timestamp: this.timestamp(),
                    },
               });
          }
          if (crossings.outOfStock) {
               alerts.push({
                    type: INVENTORY_EVENTS.OUT_OF_STOCK,
                    payload: {
                         sku: item.sku,
                         productId: item.productId,
                         timestamp: this.timestamp(),
                    },
               });
          }
          return alerts;
     }

     /**
      * Publishes after commit. Each publish is bounded by `publishTimeoutMs`;
      * failures are logged and dropped.
      */
     private async emit(events: PendingEvent[], context: OperationContext): Promise<void> {
          await Promise.all(
               events.map(async (event) => {
                    try {
                         const published = await withTimeout(
                              this.publisher.publish(event.type, event.payload, context.correlationId),
                              this.config.publishTimeoutMs,
                              `Publishing ${event.type}`
                         );
                         if (!published) {
                              logger.warn({ eventType: event.type }, 'Event was not published');
                         }
                    } catch (error) {
                         logger.error({ error, eventType: event.type }, 'Event publish failed');
                    }
               })
          );
     }

     private timestamp(): string {
          return this.now().toISOString();
     }

     private translate(error: unknown, operation: string): DomainError {
          if (isDomainError(error)) {
               return error;
          }
          logger.error({ error, operation }, 'Inventory store failure');
          return new StorageError();
     }

     private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
          try {
               return await fn();
          } catch (error) {
               throw this.translate(error, operation);
          }
     }
}
