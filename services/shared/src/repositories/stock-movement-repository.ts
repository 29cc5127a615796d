import { PoolClient } from 'pg';
import { MovementType, MOVEMENT_TYPES, StockMovement } from '../types/inventory.types';

export interface NewStockMovement {
     sku: string;
     movementType: MovementType;
     quantity: number;
     reference: string | null;
     reason: string | null;
     createdBy: string;
}

/** Append-only: movements are never updated or deleted. */
export interface StockMovementRepository {
     insert(movement: NewStockMovement): Promise<StockMovement>;
     listBySku(sku: string, limit: number): Promise<StockMovement[]>;
     listRecent(limit: number): Promise<StockMovement[]>;
}

export interface StockMovementRow {
     id: string | number;
     sku: string;
     movement_type: string;
     quantity: number;
     reference: string | null;
     reason: string | null;
     created_by: string;
     created_at: Date;
}

const MOVEMENT_COLUMNS = 'id, sku, movement_type, quantity, reference, reason, created_by, created_at';

export function parseMovementType(value: string): MovementType {
     const movementType = MOVEMENT_TYPES.find((candidate) => candidate === value);
     if (!movementType) {
          throw new Error(`Unknown movement type: ${value}`);
     }
     return movementType;
}

export function mapStockMovement(row: StockMovementRow): StockMovement {
     return {
          id: parseInt(String(row.id), 10),
          sku: row.sku,
          movementType: parseMovementType(row.movement_type),
          quantity: Number(row.quantity),
          reference: row.reference,
          reason: row.reason,
          createdBy: row.created_by,
          createdAt: row.created_at,
     };
}

export class PgStockMovementRepository implements StockMovementRepository {
     constructor(private readonly client: PoolClient) {}

     async insert(movement: NewStockMovement): Promise<StockMovement> {
          const { rows } = await this.client.query<StockMovementRow>(
               `
      INSERT INTO stock_movements (
        sku,
        movement_type,
        quantity,
        reference,
        reason,
        created_by
      ) VALUES ($1, $2, $3, $4, $5, $6)
      RETURNING ${MOVEMENT_COLUMNS}
    `,
               [
                    movement.sku,
                    movement.movementType,
                    movement.quantity,
                    movement.reference,
                    movement.reason,
                    movement.createdBy,
               ]
          );

          return mapStockMovement(rows[0]);
     }

     async listBySku(sku: string, limit: number): Promise<StockMovement[]> {
          const { rows } = await this.client.query<StockMovementRow>(
               `
      SELECT ${MOVEMENT_COLUMNS}
      FROM stock_movements
      WHERE sku = $1
      ORDER BY created_at DESC, id DESC
      LIMIT $2
    `,
               [sku, limit]
          );

          return rows.map(mapStockMovement);
     }

     async listRecent(limit: number): Promise<StockMovement[]> {
          const { rows } = await this.client.query<StockMovementRow>(
               `
      SELECT ${MOVEMENT_COLUMNS}
      FROM stock_movements
      ORDER BY created_at DESC, id DESC
      LIMIT $1
    `,
               [limit]
          );

          return rows.map(mapStockMovement);
     }
}
