// Type definitions for domain models

export const MOVEMENT_TYPES = ['IN', 'OUT', 'RESERVED', 'RELEASED', 'ADJUSTMENT'] as const;
export type MovementType = (typeof MOVEMENT_TYPES)[number];

/**
 * Operations the ledger understands. CONFIRM_RESERVATION turns a hold into a
 * permanent deduction and is recorded as an OUT movement.
 */
export type LedgerOperation = MovementType | 'CONFIRM_RESERVATION';

export const RESERVATION_STATUSES = [
     'PENDING',
     'CONFIRMED',
     'RELEASED',
     'EXPIRED',
     'CANCELLED',
] as const;
export type ReservationStatus = (typeof RESERVATION_STATUSES)[number];
export type TerminalReservationStatus = Exclude<ReservationStatus, 'PENDING'>;

export interface InventoryItem {
     id: number;
     sku: string;
     productId: string;
     quantityAvailable: number;
     quantityReserved: number;
     reorderLevel: number;
     maxStock: number;
     costPerUnit: number | null;
     isActive: boolean;
     lastRestocked: Date | null;
     createdAt: Date;
     updatedAt: Date;
}

export interface InventoryItemView extends InventoryItem {
     totalQuantity: number;
     isLowStock: boolean;
     isOutOfStock: boolean;
}

export interface Reservation {
     id: string;
     orderId: string;
     sku: string;
     quantity: number;
     status: ReservationStatus;
     expiresAt: Date;
     createdAt: Date;
     updatedAt: Date;
}

export interface StockMovement {
     id: number;
     sku: string;
     movementType: MovementType;
     quantity: number;
     reference: string | null;
     reason: string | null;
     createdBy: string;
     createdAt: Date;
}

export interface StockLine {
     sku: string;
     quantity: number;
}

export interface OperationContext {
     correlationId?: string;
     actor?: string;
}

export interface AvailabilityLine {
     sku: string;
     available: boolean;
     availableQuantity: number;
     requestedQuantity: number;
}

export interface AvailabilityResult {
     available: boolean;
     items: AvailabilityLine[];
}

export type ReserveResult =
     | {
            success: true;
            orderId: string;
            reservations: Reservation[];
            expiresAt: Date;
       }
     | {
            success: false;
            orderId: string;
            error: 'ITEM_NOT_FOUND' | 'INSUFFICIENT_STOCK';
            failureReason: string;
            sku: string;
            requested: number;
            available: number;
       };

export interface MovementResult {
     movement: StockMovement;
     item: InventoryItem;
     previous: InventoryItem;
}

export interface CreateItemInput {
     sku?: string;
     productId: string;
     initialQuantity?: number;
     reorderLevel?: number;
     maxStock?: number;
     costPerUnit?: number | null;
}

export interface ItemAttributes {
     productId?: string;
     reorderLevel?: number;
     maxStock?: number;
     costPerUnit?: number | null;
}

export interface BulkUpdateOperation extends ItemAttributes {
     sku: string;
     quantityAvailable?: number;
     reason?: string;
}

export interface BulkUpdateResult {
     sku: string;
     success: boolean;
     error?: string;
     code?: string;
}

export interface ConfirmResult {
     reservationId: string;
     success: boolean;
     error?: string;
     code?: string;
}

export interface PageOptions {
     limit?: number;
     offset?: number;
}

export interface Page<T> {
     items: T[];
     total: number;
     limit: number;
     offset: number;
}

export interface ItemFilter {
     /** Case-insensitive substring of the SKU or the product id. */
     query?: string;
     productIds?: string[];
     isActive?: boolean;
     lowStock?: boolean;
     outOfStock?: boolean;
}

export interface ReservationFilter {
     orderId?: string;
     sku?: string;
     status?: ReservationStatus;
}

/** Totals over active items. Units and value count reserved stock, which is still on hand. */
export interface StockTotals {
     totalItems: number;
     lowStockCount: number;
     outOfStockCount: number;
     withStockCount: number;
     totalUnits: number;
     totalValue: number;
}

export interface StockStatistics extends StockTotals {
     recentMovements: StockMovement[];
}

export interface ProductDetails {
     id: string;
     name: string;
     sku?: string;
     price?: number;
     category?: string;
}

export interface InventoryItemWithProduct extends InventoryItemView {
     productDetails: ProductDetails | null;
}

// Domain events
export const INVENTORY_EVENTS = {
     CREATED: 'inventory.created',
     STOCK_UPDATED: 'inventory.stock.updated',
     STOCK_RESERVED: 'inventory.stock.reserved',
     STOCK_RELEASED: 'inventory.stock.released',
     LOW_STOCK: 'inventory.low.stock',
     OUT_OF_STOCK: 'inventory.out.of.stock',
     RESERVATION_FAILED: 'inventory.reservation.failed',
} as const;
export type InventoryEventType = (typeof INVENTORY_EVENTS)[keyof typeof INVENTORY_EVENTS];

export type ReleaseReason = 'cancelled' | 'released' | 'expired' | 'order_cancelled';

export interface StockReservedEvent {
     sku: string;
     productId: string;
     quantity: number;
     orderId: string;
     reservationId: string;
     expiresAt: string;
     timestamp: string;
}

export interface StockReleasedEvent {
     sku: string;
     productId: string;
     quantity: number;
     orderId: string;
     reservationId: string;
     reason: ReleaseReason;
     timestamp: string;
}

export interface StockUpdatedEvent {
     sku: string;
     productId: string;
     movementType: MovementType;
     quantity: number;
     quantityAvailable: number;
     quantityReserved: number;
     reference: string | null;
     timestamp: string;
}

export interface EventEnvelope<T = Record<string, unknown>> {
     specversion: '1.0';
     type: string;
     source: string;
     id: string;
     time: string;
     datacontenttype: 'application/json';
     data: T;
     correlationid: string;
}
