import { ProductMockClient } from '@stockhold/shared/src/clients/product-client';
import { InventoryEngine, generateSku } from '@stockhold/shared/src/services/inventory-engine';
import { INVENTORY_EVENTS, Reservation } from '@stockhold/shared/src/types/inventory.types';
import {
     DuplicateItemError,
     InvalidStateError,
     ItemNotFoundError,
     OrderAlreadyReservedError,
     OrderMismatchError,
     ReservationExpiredError,
     ReservationNotFoundError,
     StorageError,
     ValidationError,
} from '@stockhold/shared/src/utils/errors';
import { FakeClock, RecordingPublisher } from '../helpers/fakes';
import { MemoryInventoryStore } from '../helpers/memoryStore';

describe('InventoryEngine', () => {
     let clock: FakeClock;
     let store: MemoryInventoryStore;
     let publisher: RecordingPublisher;
     let products: ProductMockClient;
     let engine: InventoryEngine;

     beforeEach(() => {
          clock = new FakeClock();
          store = new MemoryInventoryStore(clock.now);
          publisher = new RecordingPublisher();
          products = new ProductMockClient();
          engine = new InventoryEngine({
               transactions: store,
               publisher,
               productClient: products,
               config: { publishTimeoutMs: 50 },
               now: clock.now,
          });
          store.seedItem({ sku: 'SKU-1', productId: 'prod-1', quantityAvailable: 100, reorderLevel: 10 });
     });

     async function reserveOne(quantity: number = 30, ttlMinutes: number = 30): Promise<Reservation> {
          const result = await engine.reserve('O1', [{ sku: 'SKU-1', quantity }], ttlMinutes);
          if (!result.success) {
               throw new Error(`reservation failed: ${result.failureReason}`);
          }
          return result.reservations[0];
     }

     describe('reservation lifecycle', () => {
          it('should hold stock for a new reservation', async () => {
               const result = await engine.reserve('O1', [{ sku: 'SKU-1', quantity: 30 }], 30);

               expect(result.success).toBe(true);
               if (!result.success) return;
               expect(result.reservations).toHaveLength(1);
               expect(result.reservations[0].status).toBe('PENDING');
               expect(result.expiresAt.toISOString()).toBe('2024-03-01T12:30:00.000Z');
               expect(store.item('SKU-1')).toMatchObject({ quantityAvailable: 70, quantityReserved: 30 });
               expect(store.movements('SKU-1').map((m) => [m.movementType, m.quantity])).toEqual([
                    ['RESERVED', 30],
               ]);
               expect(publisher.ofType(INVENTORY_EVENTS.STOCK_RESERVED)[0].payload).toMatchObject({
                    sku: 'SKU-1',
                    productId: 'prod-1',
                    quantity: 30,
                    orderId: 'O1',
                    reservationId: result.reservations[0].id,
                    expiresAt: '2024-03-01T12:30:00.000Z',
               });
          });

          it('should turn a hold into a deduction on confirm', async () => {
               const reservation = await reserveOne();

               const confirmed = await engine.confirmReservation(reservation.id, 'O1');

               expect(confirmed.status).toBe('CONFIRMED');
               expect(store.item('SKU-1')).toMatchObject({ quantityAvailable: 70, quantityReserved: 0 });
               const outs = store.movements('SKU-1').filter((m) => m.movementType === 'OUT');
               expect(outs).toHaveLength(1);
               expect(outs[0].quantity).toBe(30);
               expect(publisher.ofType(INVENTORY_EVENTS.STOCK_UPDATED)[0].payload).toMatchObject({
                    movementType: 'OUT',
                    quantity: 30,
                    quantityAvailable: 70,
                    quantityReserved: 0,
               });
          });

          it('should return stock on cancel', async () => {
               const reservation = await reserveOne();

               const cancelled = await engine.cancelReservation(reservation.id);

               expect(cancelled.status).toBe('CANCELLED');
               expect(store.item('SKU-1')).toMatchObject({ quantityAvailable: 100, quantityReserved: 0 });
               const released = store.movements('SKU-1').filter((m) => m.movementType === 'RELEASED');
               expect(released.map((m) => m.quantity)).toEqual([30]);
               expect(publisher.ofType(INVENTORY_EVENTS.STOCK_RELEASED)[0].payload).toMatchObject({
                    reservationId: reservation.id,
                    reason: 'cancelled',
               });
          });

          it('should return stock on an explicit release', async () => {
               const reservation = await reserveOne();

               const released = await engine.releaseReservation(reservation.id);

               expect(released.status).toBe('RELEASED');
               expect(store.item('SKU-1')).toMatchObject({ quantityAvailable: 100, quantityReserved: 0 });
          });

          it('should refuse a second terminal transition', async () => {
               const reservation = await reserveOne();
               await engine.confirmReservation(reservation.id, 'O1');

               await expect(engine.cancelReservation(reservation.id)).rejects.toThrow(InvalidStateError);
               await expect(engine.confirmReservation(reservation.id, 'O1')).rejects.toThrow(
                    `Reservation ${reservation.id} is CONFIRMED, expected PENDING`
               );
               expect(store.item('SKU-1')).toMatchObject({ quantityAvailable: 70, quantityReserved: 0 });
               expect(store.movements('SKU-1')).toHaveLength(2);
          });

          it('should reject confirmation for another order', async () => {
               const reservation = await reserveOne();

               await expect(engine.confirmReservation(reservation.id, 'O2')).rejects.toThrow(
                    OrderMismatchError
               );
               expect(store.reservation(reservation.id)?.status).toBe('PENDING');
          });

          it('should reject confirmation once the reservation has expired', async () => {
               const reservation = await reserveOne(30, 30);
               clock.advanceMinutes(30);

               await expect(engine.confirmReservation(reservation.id, 'O1')).rejects.toThrow(
                    ReservationExpiredError
               );
               expect(store.item('SKU-1')).toMatchObject({ quantityAvailable: 70, quantityReserved: 30 });
          });

          it('should raise ReservationNotFoundError for unknown ids', async () => {
               await expect(engine.confirmReservation('missing', 'O1')).rejects.toThrow(
                    ReservationNotFoundError
               );
               await expect(engine.getReservation('missing')).rejects.toThrow(ReservationNotFoundError);
          });
     });

     describe('reserve across several SKUs', () => {
          beforeEach(() => {
               store.seedItem({ sku: 'SKU-2', quantityAvailable: 5 });
          });

          it('should roll back earlier lines when a later line is short', async () => {
               const result = await engine.reserve('O1', [
                    { sku: 'SKU-1', quantity: 10 },
                    { sku: 'SKU-2', quantity: 6 },
               ]);

               expect(result).toEqual({
                    success: false,
                    orderId: 'O1',
                    error: 'INSUFFICIENT_STOCK',
                    failureReason: 'Insufficient stock for SKU-2: requested 6, available 5',
                    sku: 'SKU-2',
                    requested: 6,
                    available: 5,
               });
               expect(store.item('SKU-1')).toMatchObject({ quantityAvailable: 100, quantityReserved: 0 });
               expect(store.reservations()).toHaveLength(0);
               expect(store.movements()).toHaveLength(0);
               expect(publisher.events).toHaveLength(0);
          });

          it('should fail on unknown SKUs without holding anything', async () => {
               const result = await engine.reserve('O1', [
                    { sku: 'SKU-1', quantity: 10 },
                    { sku: 'SKU-404', quantity: 1 },
               ]);

               expect(result).toMatchObject({
                    success: false,
                    error: 'ITEM_NOT_FOUND',
                    sku: 'SKU-404',
                    requested: 1,
                    available: 0,
               });
               expect(store.item('SKU-1')?.quantityAvailable).toBe(100);
          });

          it('should share one expiry across the created reservations', async () => {
               const result = await engine.reserve(
                    'O1',
                    [
                         { sku: 'SKU-1', quantity: 10 },
                         { sku: 'SKU-2', quantity: 5 },
                    ],
                    15
               );

               expect(result.success).toBe(true);
               if (!result.success) return;
               expect(result.reservations.map((r) => r.expiresAt.toISOString())).toEqual([
                    '2024-03-01T12:15:00.000Z',
                    '2024-03-01T12:15:00.000Z',
               ]);
               expect(publisher.ofType(INVENTORY_EVENTS.OUT_OF_STOCK)[0].payload).toMatchObject({
                    sku: 'SKU-2',
               });
          });

          it('should validate input before touching the store', async () => {
               await expect(engine.reserve('O1', [])).rejects.toThrow(ValidationError);
               await expect(engine.reserve('O1', [{ sku: 'SKU-1', quantity: 0 }])).rejects.toThrow(
                    'Quantity must be a positive integer for SKU-1, got 0'
               );
               await expect(engine.reserve(' ', [{ sku: 'SKU-1', quantity: 1 }])).rejects.toThrow(
                    'orderId is required'
               );
               expect(store.commits).toBe(0);
          });
     });

     describe('order level operations', () => {
          it('should release every pending reservation of an order', async () => {
               store.seedItem({ sku: 'SKU-2', quantityAvailable: 20 });
               const result = await engine.reserve('O1', [
                    { sku: 'SKU-2', quantity: 5 },
                    { sku: 'SKU-1', quantity: 10 },
               ]);
               if (!result.success) throw new Error('reservation failed');
               await engine.confirmReservation(result.reservations[0].id, 'O1');

               const released = await engine.releaseOrder('O1');

               expect(released.map((r) => [r.sku, r.status])).toEqual([['SKU-1', 'CANCELLED']]);
               expect(store.item('SKU-1')).toMatchObject({ quantityAvailable: 100, quantityReserved: 0 });
               expect(store.item('SKU-2')).toMatchObject({ quantityAvailable: 15, quantityReserved: 0 });
               expect(publisher.ofType(INVENTORY_EVENTS.STOCK_RELEASED)[0].payload).toMatchObject({
                    reason: 'order_cancelled',
               });
          });

          it('should confirm several reservations with per-id results', async () => {
               const first = await reserveOne(10);
               const second = await reserveOne(10);
               await engine.cancelReservation(second.id);

               const results = await engine.confirmReservations([first.id, second.id, 'missing']);

               expect(results).toEqual([
                    { reservationId: first.id, success: true },
                    {
                         reservationId: second.id,
                         success: false,
                         error: `Reservation ${second.id} is CANCELLED, expected PENDING`,
                         code: 'INVALID_STATE',
                    },
                    {
                         reservationId: 'missing',
                         success: false,
                         error: 'Reservation missing not found',
                         code: 'RESERVATION_NOT_FOUND',
                    },
               ]);
               expect(store.item('SKU-1')).toMatchObject({ quantityAvailable: 90, quantityReserved: 0 });
          });

          it('should list the reservations of an order', async () => {
               await reserveOne(1);
               clock.advanceMinutes(1);
               await reserveOne(2);

               const reservations = await engine.listReservationsForOrder('O1');

               expect(reservations.map((r) => r.quantity)).toEqual([1, 2]);
          });

          it('should hold an order only once', async () => {
               const first = await engine.reserveOrder('O9', [{ sku: 'SKU-1', quantity: 5 }]);

               expect(first.success).toBe(true);
               await expect(
                    engine.reserveOrder('O9', [{ sku: 'SKU-1', quantity: 5 }])
               ).rejects.toThrow(OrderAlreadyReservedError);
               await expect(
                    engine.reserveOrder('O9', [{ sku: 'SKU-1', quantity: 5 }])
               ).rejects.toMatchObject({ code: 'ORDER_ALREADY_RESERVED', existing: 1 });
               expect(store.item('SKU-1')).toMatchObject({ quantityAvailable: 95, quantityReserved: 5 });
          });

          it('should still let reserve add holds to an order', async () => {
               await engine.reserveOrder('O9', [{ sku: 'SKU-1', quantity: 5 }]);

               await expect(
                    engine.reserve('O9', [{ sku: 'SKU-1', quantity: 5 }])
               ).resolves.toMatchObject({ success: true });
               expect(store.item('SKU-1')?.quantityReserved).toBe(10);
          });

          it('should search reservations by order, status and page', async () => {
               await reserveOne(1);
               clock.advanceMinutes(1);
               await engine.reserve('O2', [{ sku: 'SKU-1', quantity: 2 }]);
               clock.advanceMinutes(1);
               const cancelled = await reserveOne(3);
               await engine.cancelReservation(cancelled.id);

               const byOrder = await engine.searchReservations({ orderId: 'O1' });
               const pending = await engine.searchReservations({ status: 'PENDING' });
               const second = await engine.searchReservations({}, { limit: 1, offset: 1 });

               expect(byOrder.items.map((r) => [r.quantity, r.status])).toEqual([
                    [3, 'CANCELLED'],
                    [1, 'PENDING'],
               ]);
               expect(byOrder.total).toBe(2);
               expect(pending.items.map((r) => r.orderId)).toEqual(['O2', 'O1']);
               expect(second).toMatchObject({ total: 3, limit: 1, offset: 1 });
               expect(second.items.map((r) => r.quantity)).toEqual([2]);
          });
     });

     describe('expiry', () => {
          it('should expire a zero-TTL reservation on the next sweep and restore stock', async () => {
               const reservation = await reserveOne(30, 0);

               const due = await engine.findExpiredReservations();
               expect(due.map((r) => r.id)).toEqual([reservation.id]);

               const expired = await engine.expireReservation(reservation.id);

               expect(expired?.status).toBe('EXPIRED');
               expect(store.item('SKU-1')).toMatchObject({ quantityAvailable: 100, quantityReserved: 0 });
               expect(publisher.ofType(INVENTORY_EVENTS.STOCK_RELEASED)[0].payload).toMatchObject({
                    reason: 'expired',
               });
          });

          it('should leave reservations that are not yet due', async () => {
               const reservation = await reserveOne(30, 30);
               clock.advanceMinutes(29);

               await expect(engine.expireReservation(reservation.id)).resolves.toBeNull();
               expect(store.reservation(reservation.id)?.status).toBe('PENDING');
          });

          it('should not release a confirmed reservation', async () => {
               const reservation = await reserveOne(30, 30);
               await engine.confirmReservation(reservation.id, 'O1');
               clock.advanceMinutes(60);

               await expect(engine.expireReservation(reservation.id)).resolves.toBeNull();
               expect(store.item('SKU-1')).toMatchObject({ quantityAvailable: 70, quantityReserved: 0 });
          });

          it('should purge terminal reservations after the retention window', async () => {
               const reservation = await reserveOne(30, 0);
               await engine.expireReservation(reservation.id);

               await expect(engine.purgeTerminalReservations(24)).resolves.toBe(0);
               clock.advanceHours(24);
               clock.advanceMinutes(1);
               await expect(engine.purgeTerminalReservations(24)).resolves.toBe(1);
               await expect(engine.purgeTerminalReservations(-1)).rejects.toThrow(ValidationError);
          });
     });

     describe('stock adjustments', () => {
          it('should round-trip IN then OUT with two movements', async () => {
               await engine.adjustStock({ sku: 'SKU-1', quantity: 10, movementType: 'IN' });
               await engine.adjustStock({ sku: 'SKU-1', quantity: 10, movementType: 'OUT' });

               expect(store.item('SKU-1')?.quantityAvailable).toBe(100);
               expect(store.movements('SKU-1').map((m) => m.movementType)).toEqual(['IN', 'OUT']);
          });

          it('should reject OUT beyond available stock', async () => {
               await expect(
                    engine.adjustStock({ sku: 'SKU-1', quantity: 101, movementType: 'OUT' })
               ).rejects.toThrow('Insufficient stock for SKU-1: requested 101, available 100');
               expect(store.movements()).toHaveLength(0);
          });

          it('should keep RESERVED and RELEASED for the reservation flow', async () => {
               await expect(
                    engine.adjustStock({ sku: 'SKU-1', quantity: 1, movementType: 'RESERVED' })
               ).rejects.toThrow('Movement type RESERVED is reserved for the reservation flow');
          });

          it('should raise low-stock and out-of-stock alerts on crossing', async () => {
               await engine.adjustStock({ sku: 'SKU-1', quantity: 10, movementType: 'ADJUSTMENT' });
               expect(publisher.ofType(INVENTORY_EVENTS.LOW_STOCK)).toHaveLength(1);
               expect(publisher.ofType(INVENTORY_EVENTS.OUT_OF_STOCK)).toHaveLength(0);

               await engine.adjustStock({ sku: 'SKU-1', quantity: 10, movementType: 'OUT' });
               expect(publisher.ofType(INVENTORY_EVENTS.LOW_STOCK)).toHaveLength(1);
               expect(publisher.ofType(INVENTORY_EVENTS.OUT_OF_STOCK)).toHaveLength(1);
          });

          it('should record the actor and pass the correlation id', async () => {
               await engine.adjustStock(
                    { sku: 'SKU-1', quantity: 5, movementType: 'IN', reference: 'PO-7', reason: 'Restock' },
                    { actor: 'warehouse-ops', correlationId: 'corr-5' }
               );

               expect(store.movements('SKU-1')[0]).toMatchObject({
                    reference: 'PO-7',
                    reason: 'Restock',
                    createdBy: 'warehouse-ops',
               });
               expect(publisher.events[0].correlationId).toBe('corr-5');
          });
     });

     describe('bulkUpdate', () => {
          it('should apply operations independently', async () => {
               store.seedItem({ sku: 'SKU-2', quantityAvailable: 5, reorderLevel: 2, maxStock: 50 });

               const results = await engine.bulkUpdate([
                    { sku: 'SKU-1', quantityAvailable: 40, reason: 'Cycle count' },
                    { sku: 'SKU-404', quantityAvailable: 1 },
                    { sku: 'SKU-2', reorderLevel: 60 },
                    { sku: 'SKU-2', maxStock: 80, costPerUnit: 2.5 },
               ]);

               expect(results).toEqual([
                    { sku: 'SKU-1', success: true },
                    {
                         sku: 'SKU-404',
                         success: false,
                         error: 'Inventory item SKU-404 not found',
                         code: 'ITEM_NOT_FOUND',
                    },
                    {
                         sku: 'SKU-2',
                         success: false,
                         error: 'maxStock (50) must not be lower than reorderLevel (60)',
                         code: 'VALIDATION_ERROR',
                    },
                    { sku: 'SKU-2', success: true },
               ]);
               expect(store.item('SKU-1')?.quantityAvailable).toBe(40);
               expect(store.movements('SKU-1')[0]).toMatchObject({
                    movementType: 'ADJUSTMENT',
                    quantity: 40,
                    reason: 'Cycle count',
               });
               expect(store.item('SKU-2')).toMatchObject({ reorderLevel: 2, maxStock: 80, costPerUnit: 2.5 });
          });

          it('should report operations without changes', async () => {
               const [result] = await engine.bulkUpdate([{ sku: 'SKU-1' }]);

               expect(result).toEqual({
                    sku: 'SKU-1',
                    success: false,
                    error: 'No fields to update',
                    code: 'VALIDATION_ERROR',
               });
          });
     });

     describe('availability', () => {
          it('should report shortfalls per line', async () => {
               await expect(engine.checkAvailability([{ sku: 'SKU-1', quantity: 200 }])).resolves.toEqual({
                    available: false,
                    items: [
                         { sku: 'SKU-1', available: false, availableQuantity: 100, requestedQuantity: 200 },
                    ],
               });
          });

          it('should treat unknown SKUs as unavailable', async () => {
               const result = await engine.checkAvailability([
                    { sku: 'SKU-1', quantity: 100 },
                    { sku: 'SKU-404', quantity: 1 },
               ]);

               expect(result.available).toBe(false);
               expect(result.items.map((line) => line.available)).toEqual([true, false]);
               expect(result.items[1].availableQuantity).toBe(0);
               expect(store.commits).toBe(0);
          });
     });

     describe('items', () => {
          it('should create an item and book the initial stock', async () => {
               const item = await engine.createItem({ productId: 'prod-9', initialQuantity: 12 });

               expect(item.sku).toBe('SKU-prod-9-20240301120000');
               expect(item).toMatchObject({
                    quantityAvailable: 12,
                    reorderLevel: 10,
                    maxStock: 1000,
                    isLowStock: false,
                    totalQuantity: 12,
               });
               expect(store.movements(item.sku)[0]).toMatchObject({
                    movementType: 'IN',
                    quantity: 12,
                    reference: 'INITIAL_STOCK',
               });
               expect(publisher.ofType(INVENTORY_EVENTS.CREATED)[0].payload).toMatchObject({
                    sku: item.sku,
                    quantityAvailable: 12,
               });
          });

          it('should generate SKUs from the product id and UTC time', () => {
               expect(generateSku('p1', new Date('2024-12-31T23:59:58.000Z'))).toBe('SKU-p1-20241231235958');
          });

          it('should reject duplicate SKUs and inconsistent thresholds', async () => {
               await expect(engine.createItem({ sku: 'SKU-1', productId: 'prod-1' })).rejects.toThrow(
                    DuplicateItemError
               );
               await expect(
                    engine.createItem({ productId: 'prod-2', reorderLevel: 20, maxStock: 10 })
               ).rejects.toThrow('maxStock (10) must not be lower than reorderLevel (20)');
          });

          it('should enrich items with product details', async () => {
               products.register({ id: 'prod-1', name: 'Widget' });

               const item = await engine.getItemWithProductDetails('SKU-1');

               expect(item.productDetails).toEqual({ id: 'prod-1', name: 'Widget' });
               expect(item.totalQuantity).toBe(100);
          });

          it('should return null details when the product lookup fails', async () => {
               jest.spyOn(products, 'getProductById').mockRejectedValueOnce(new Error('timeout'));

               const item = await engine.getItemWithProductDetails('SKU-1');

               expect(item.productDetails).toBeNull();
          });

          it('should find items by product id', async () => {
               await expect(engine.findItemByProductId('prod-1')).resolves.toMatchObject({ sku: 'SKU-1' });
               await expect(engine.findItemByProductId('prod-404')).resolves.toBeNull();
          });

          it('should update attributes', async () => {
               const item = await engine.updateItem('SKU-1', { reorderLevel: 150, maxStock: 200 });

               expect(item).toMatchObject({ reorderLevel: 150, maxStock: 200, isLowStock: true });
               await expect(engine.updateItem('SKU-1', {})).rejects.toThrow('No item attributes to update');
               await expect(engine.updateItem('SKU-404', { maxStock: 1 })).rejects.toThrow(ItemNotFoundError);
          });

          it('should list low stock items', async () => {
               store.seedItem({ sku: 'SKU-LOW', quantityAvailable: 3, reorderLevel: 5 });
               store.seedItem({ sku: 'SKU-GONE', quantityAvailable: 0, isActive: false });

               const low = await engine.listLowStock();

               expect(low.map((item) => item.sku)).toEqual(['SKU-LOW']);
          });

          it('should list movements newest first and reject bad limits', async () => {
               await engine.adjustStock({ sku: 'SKU-1', quantity: 1, movementType: 'IN' });
               await engine.adjustStock({ sku: 'SKU-1', quantity: 2, movementType: 'OUT' });

               const movements = await engine.listMovements('SKU-1', 1);

               expect(movements.map((m) => m.movementType)).toEqual(['OUT']);
               await expect(engine.listMovements('SKU-1', 0)).rejects.toThrow(ValidationError);
               await expect(engine.listMovements('SKU-404')).rejects.toThrow(ItemNotFoundError);
          });

          it('should archive items without pending reservations', async () => {
               const reservation = await reserveOne(10);

               await expect(engine.archiveItem('SKU-1')).rejects.toThrow(
                    'Cannot archive SKU-1: 1 pending reservation(s)'
               );

               await engine.cancelReservation(reservation.id);
               const archived = await engine.archiveItem('SKU-1');

               expect(archived.isActive).toBe(false);
               await expect(
                    engine.adjustStock({ sku: 'SKU-1', quantity: 1, movementType: 'IN' })
               ).rejects.toThrow('Inventory item SKU-1 is archived');
               await expect(engine.reserve('O2', [{ sku: 'SKU-1', quantity: 1 }])).resolves.toMatchObject({
                    success: false,
                    error: 'ITEM_NOT_FOUND',
               });
          });
     });

     describe('search and statistics', () => {
          beforeEach(() => {
               store.seedItem({ sku: 'SKU-2', quantityAvailable: 20 });
               store.seedItem({ sku: 'WIDGET-9', productId: 'prod-widget', quantityAvailable: 0 });
               store.seedItem({ sku: 'SKU-OLD', isActive: false });
          });

          it('should match the query against SKU and product id', async () => {
               const bySku = await engine.searchItems({ query: 'widget' });
               const byProduct = await engine.searchItems({ query: 'PROD-1' });

               expect(bySku.items.map((item) => item.sku)).toEqual(['WIDGET-9']);
               expect(bySku.items[0]).toMatchObject({ isOutOfStock: true, totalQuantity: 0 });
               expect(byProduct.items.map((item) => item.sku)).toEqual(['SKU-1']);
          });

          it('should page through items in SKU order with the full count', async () => {
               const page = await engine.searchItems({}, { limit: 2 });

               expect(page.items.map((item) => item.sku)).toEqual(['SKU-1', 'SKU-2']);
               expect(page).toMatchObject({ total: 4, limit: 2, offset: 0 });
          });

          it('should filter by state flags', async () => {
               const archived = await engine.searchItems({ isActive: false });
               const empty = await engine.searchItems({ outOfStock: true, isActive: true });
               const low = await engine.searchItems({ lowStock: true, isActive: true });

               expect(archived.items.map((item) => item.sku)).toEqual(['SKU-OLD']);
               expect(empty.items.map((item) => item.sku)).toEqual(['WIDGET-9']);
               expect(low.items.map((item) => item.sku)).toEqual(['WIDGET-9']);
          });

          it('should reject page windows out of range', async () => {
               await expect(engine.searchItems({}, { limit: 0 })).rejects.toThrow(ValidationError);
               await expect(engine.searchItems({}, { limit: 101 })).rejects.toThrow(
                    'limit must be an integer from 1 to 100, got 101'
               );
               await expect(engine.searchReservations({}, { offset: -1 })).rejects.toThrow(
                    'offset must be a non-negative integer, got -1'
               );
          });

          it('should total stock and value over active items', async () => {
               store.seedItem({ sku: 'SKU-1', productId: 'prod-1', quantityAvailable: 100, costPerUnit: 1.5 });
               store.seedItem({ sku: 'SKU-2', quantityAvailable: 4, reorderLevel: 5, costPerUnit: 2.5 });
               store.seedItem({ sku: 'WIDGET-9', productId: 'prod-widget', costPerUnit: 10 });
               await reserveOne(10);
               clock.advanceMinutes(1);
               await engine.adjustStock({ sku: 'SKU-2', quantity: 1, movementType: 'OUT' });

               const stats = await engine.getStockStatistics(2);

               expect(stats).toMatchObject({
                    totalItems: 3,
                    lowStockCount: 2,
                    outOfStockCount: 1,
                    withStockCount: 2,
                    totalUnits: 103,
                    totalValue: 157.5,
               });
               expect(stats.recentMovements.map((m) => [m.sku, m.movementType])).toEqual([
                    ['SKU-2', 'OUT'],
                    ['SKU-1', 'RESERVED'],
               ]);
          });

          it('should skip movements when none are asked for', async () => {
               await expect(engine.getStockStatistics(0)).resolves.toMatchObject({ recentMovements: [] });
               await expect(engine.getStockStatistics(-1)).rejects.toThrow(ValidationError);
          });
     });

     describe('collaborator failures', () => {
          it('should keep committed state when publishing fails', async () => {
               publisher.result = new Error('broker down');

               const reservation = await reserveOne();

               expect(reservation.status).toBe('PENDING');
               expect(store.item('SKU-1')?.quantityReserved).toBe(30);
          });

          it('should not wait for a publisher that never answers', async () => {
               jest.spyOn(publisher, 'publish').mockReturnValue(new Promise<boolean>(() => undefined));

               const result = await engine.adjustStock({ sku: 'SKU-1', quantity: 1, movementType: 'IN' });

               expect(result.item.quantityAvailable).toBe(101);
          });

          it('should bound product lookups by their own timeout', async () => {
               products.register({ id: 'prod-1', name: 'Widget' });
               const lookup = products.getProductById.bind(products);
               jest.spyOn(products, 'getProductById').mockImplementation(
                    (productId) =>
                         new Promise((resolve) => {
                              setTimeout(() => resolve(lookup(productId)), 100);
                         })
               );

               const item = await engine.getItemWithProductDetails('SKU-1');

               expect(item.productDetails).toEqual({ id: 'prod-1', name: 'Widget' });
          });

          it('should drop product details that take longer than productTimeoutMs', async () => {
               const impatient = new InventoryEngine({
                    transactions: store,
                    publisher,
                    productClient: products,
                    config: { productTimeoutMs: 20 },
                    now: clock.now,
               });
               jest.spyOn(products, 'getProductById').mockReturnValue(
                    new Promise<null>(() => undefined)
               );

               const item = await impatient.getItemWithProductDetails('SKU-1');

               expect(item.productDetails).toBeNull();
          });

          it('should hide storage failures behind StorageError', async () => {
               store.failNext(new Error('connection terminated unexpectedly'));

               const failure = await engine.getItem('SKU-1').catch((error: unknown) => error);

               expect(failure).toBeInstanceOf(StorageError);
               expect(failure).toMatchObject({ message: 'Inventory store operation failed' });
          });
     });
});
