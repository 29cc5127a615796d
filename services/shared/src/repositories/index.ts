import { Pool, PoolClient } from 'pg';
import { pool, withConnection, withTransaction } from '../db/client';
import { InventoryItemRepository, PgInventoryItemRepository } from './inventory-item-repository';
import { PgReservationRepository, ReservationRepository } from './reservation-repository';
import { PgStockMovementRepository, StockMovementRepository } from './stock-movement-repository';

export * from './inventory-item-repository';
export * from './reservation-repository';
export * from './stock-movement-repository';

/**
 * The three repositories bound to one connection. Inside `withTransaction`
 * every read and write shares the same database transaction.
 */
export interface InventoryTransaction {
     items: InventoryItemRepository;
     reservations: ReservationRepository;
     movements: StockMovementRepository;
}

export interface TransactionManager {
     withTransaction<T>(fn: (tx: InventoryTransaction) => Promise<T>): Promise<T>;
     withConnection<T>(fn: (tx: InventoryTransaction) => Promise<T>): Promise<T>;
}

export function createPgTransaction(client: PoolClient): InventoryTransaction {
     return {
          items: new PgInventoryItemRepository(client),
          reservations: new PgReservationRepository(client),
          movements: new PgStockMovementRepository(client),
     };
}

export class PgTransactionManager implements TransactionManager {
     constructor(private readonly db: Pool = pool) {}

     withTransaction<T>(fn: (tx: InventoryTransaction) => Promise<T>): Promise<T> {
          return withTransaction((client) => fn(createPgTransaction(client)), this.db);
     }

     withConnection<T>(fn: (tx: InventoryTransaction) => Promise<T>): Promise<T> {
          return withConnection((client) => fn(createPgTransaction(client)), this.db);
     }
}
