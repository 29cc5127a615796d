import { PoolClient } from 'pg';
import { InventoryItem, ItemAttributes, ItemFilter, StockTotals } from '../types/inventory.types';
import { DuplicateItemError, hasPgErrorCode, pgConstraintName } from '../utils/errors';

export interface LockOptions {
     forUpdate?: boolean;
}

export interface NewInventoryItem {
     sku: string;
     productId: string;
     reorderLevel: number;
     maxStock: number;
     costPerUnit: number | null;
}

export interface SearchResult<T> {
     rows: T[];
     total: number;
}

export interface QuantityUpdate {
     quantityAvailable: number;
     quantityReserved: number;
     restocked: boolean;
}

export interface InventoryItemRepository {
     findBySku(sku: string, options?: LockOptions): Promise<InventoryItem | null>;
     /** Locks are taken in SKU order so concurrent multi-SKU reservations cannot deadlock. */
     findManyBySkus(skus: string[], options?: LockOptions): Promise<InventoryItem[]>;
     findByProductId(productId: string): Promise<InventoryItem | null>;
     insert(item: NewInventoryItem): Promise<InventoryItem>;
     updateQuantities(sku: string, update: QuantityUpdate): Promise<InventoryItem>;
     updateAttributes(sku: string, attributes: ItemAttributes): Promise<InventoryItem | null>;
     setActive(sku: string, isActive: boolean): Promise<InventoryItem | null>;
     listLowStock(): Promise<InventoryItem[]>;
     search(filter: ItemFilter, limit: number, offset: number): Promise<SearchResult<InventoryItem>>;
     totals(): Promise<StockTotals>;
}

// Database row type (snake_case from PostgreSQL; BIGINT and NUMERIC arrive as strings)
export interface InventoryItemRow {
     id: string | number;
     sku: string;
     product_id: string;
     quantity_available: number;
     quantity_reserved: number;
     reorder_level: number;
     max_stock: number;
     cost_per_unit: string | number | null;
     is_active: boolean;
     last_restocked: Date | null;
     created_at: Date;
     updated_at: Date;
}

const ITEM_COLUMNS = `
     id, sku, product_id, quantity_available, quantity_reserved, reorder_level,
     max_stock, cost_per_unit, is_active, last_restocked, created_at, updated_at
`;

const ATTRIBUTE_COLUMNS: ReadonlyArray<[keyof ItemAttributes, string]> = [
     ['productId', 'product_id'],
     ['reorderLevel', 'reorder_level'],
     ['maxStock', 'max_stock'],
     ['costPerUnit', 'cost_per_unit'],
];

export const PRODUCT_ID_UNIQUE_INDEX = 'uq_inventory_items_product_id';

interface StockTotalsRow {
     total_items: string;
     low_stock_count: string;
     out_of_stock_count: string;
     with_stock_count: string;
     total_units: string;
     total_value: string;
}

function duplicateItem(error: unknown, sku: string, productId: string | undefined): DuplicateItemError {
     return pgConstraintName(error) === PRODUCT_ID_UNIQUE_INDEX
          ? new DuplicateItemError(sku, productId)
          : new DuplicateItemError(sku);
}

function escapeLike(value: string): string {
     return value.replace(/[\\%_]/g, (match) => `\\${match}`);
}

function filterClause(filter: ItemFilter): { where: string; values: unknown[] } {
     const conditions: string[] = [];
     const values: unknown[] = [];

     if (filter.query !== undefined && filter.query.trim() !== '') {
          values.push(`%${escapeLike(filter.query.trim())}%`);
          conditions.push(`(sku ILIKE $${values.length} OR product_id ILIKE $${values.length})`);
     }
     if (filter.productIds !== undefined) {
          values.push(filter.productIds);
          conditions.push(`product_id = ANY($${values.length}::text[])`);
     }
     if (filter.isActive !== undefined) {
          values.push(filter.isActive);
          conditions.push(`is_active = $${values.length}`);
     }
     if (filter.lowStock) {
          conditions.push('quantity_available <= reorder_level');
     }
     if (filter.outOfStock) {
          conditions.push('quantity_available = 0');
     }

     return {
          where: conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '',
          values,
     };
}

export function mapInventoryItem(row: InventoryItemRow): InventoryItem {
     return {
          id: parseInt(String(row.id), 10),
          sku: row.sku,
          productId: row.product_id,
          quantityAvailable: Number(row.quantity_available),
          quantityReserved: Number(row.quantity_reserved),
          reorderLevel: Number(row.reorder_level),
          maxStock: Number(row.max_stock),
          costPerUnit: row.cost_per_unit === null ? null : Number(row.cost_per_unit),
          isActive: row.is_active,
          lastRestocked: row.last_restocked,
          createdAt: row.created_at,
          updatedAt: row.updated_at,
     };
}

export class PgInventoryItemRepository implements InventoryItemRepository {
     constructor(private readonly client: PoolClient) {}

     async findBySku(sku: string, options: LockOptions = {}): Promise<InventoryItem | null> {
          const { rows } = await this.client.query<InventoryItemRow>(
               `
      SELECT ${ITEM_COLUMNS}
      FROM inventory_items
      WHERE sku = $1
      ${options.forUpdate ? 'FOR UPDATE' : ''}
    `,
               [sku]
          );

          return rows.length > 0 ? mapInventoryItem(rows[0]) : null;
     }

     async findManyBySkus(skus: string[], options: LockOptions = {}): Promise<InventoryItem[]> {
          if (skus.length === 0) {
               return [];
          }

          const { rows } = await this.client.query<InventoryItemRow>(
               `
      SELECT ${ITEM_COLUMNS}
      FROM inventory_items
      WHERE sku = ANY($1::text[])
      ORDER BY sku
      ${options.forUpdate ? 'FOR UPDATE' : ''}
    `,
               [[...new Set(skus)].sort()]
          );

          return rows.map(mapInventoryItem);
     }

     async findByProductId(productId: string): Promise<InventoryItem | null> {
          const { rows } = await this.client.query<InventoryItemRow>(
               `
      SELECT ${ITEM_COLUMNS}
      FROM inventory_items
      WHERE product_id = $1
      ORDER BY created_at
      LIMIT 1
    `,
               [productId]
          );

          return rows.length > 0 ? mapInventoryItem(rows[0]) : null;
     }

     async insert(item: NewInventoryItem): Promise<InventoryItem> {
          try {
               const { rows } = await this.client.query<InventoryItemRow>(
                    `
        INSERT INTO inventory_items (
          sku,
          product_id,
          reorder_level,
          max_stock,
          cost_per_unit
        ) VALUES ($1, $2, $3, $4, $5)
        RETURNING ${ITEM_COLUMNS}
      `,
                    [item.sku, item.productId, item.reorderLevel, item.maxStock, item.costPerUnit]
               );

               return mapInventoryItem(rows[0]);
          } catch (error) {
               if (hasPgErrorCode(error, '23505')) {
                    throw duplicateItem(error, item.sku, item.productId);
               }
               throw error;
          }
     }

     async updateQuantities(sku: string, update: QuantityUpdate): Promise<InventoryItem> {
          const { rows } = await this.client.query<InventoryItemRow>(
               `
      UPDATE inventory_items
      SET quantity_available = $1,
          quantity_reserved = $2,
          last_restocked = CASE WHEN $3::boolean THEN NOW() ELSE last_restocked END,
          updated_at = NOW()
      WHERE sku = $4
      RETURNING ${ITEM_COLUMNS}
    `,
               [update.quantityAvailable, update.quantityReserved, update.restocked, sku]
          );

          return mapInventoryItem(rows[0]);
     }

     async updateAttributes(sku: string, attributes: ItemAttributes): Promise<InventoryItem | null> {
          const assignments: string[] = [];
          const values: Array<string | number | null> = [];

          for (const [key, column] of ATTRIBUTE_COLUMNS) {
               const value = attributes[key];
               if (value !== undefined) {
                    values.push(value);
                    assignments.push(`${column} = $${values.length}`);
               }
          }

          if (assignments.length === 0) {
               return this.findBySku(sku);
          }

          values.push(sku);
          try {
               const { rows } = await this.client.query<InventoryItemRow>(
                    `
        UPDATE inventory_items
        SET ${assignments.join(', ')},
            updated_at = NOW()
        WHERE sku = $${values.length}
        RETURNING ${ITEM_COLUMNS}
      `,
                    values
               );

               return rows.length > 0 ? mapInventoryItem(rows[0]) : null;
          } catch (error) {
               if (hasPgErrorCode(error, '23505')) {
                    throw duplicateItem(error, sku, attributes.productId);
               }
               throw error;
          }
     }

     async setActive(sku: string, isActive: boolean): Promise<InventoryItem | null> {
          const { rows } = await this.client.query<InventoryItemRow>(
               `
      UPDATE inventory_items
      SET is_active = $1,
          updated_at = NOW()
      WHERE sku = $2
      RETURNING ${ITEM_COLUMNS}
    `,
               [isActive, sku]
          );

          return rows.length > 0 ? mapInventoryItem(rows[0]) : null;
     }

     async listLowStock(): Promise<InventoryItem[]> {
          const { rows } = await this.client.query<InventoryItemRow>(
               `
      SELECT ${ITEM_COLUMNS}
      FROM inventory_items
      WHERE is_active AND quantity_available <= reorder_level
      ORDER BY quantity_available, sku
    `
          );

          return rows.map(mapInventoryItem);
     }

     async search(
          filter: ItemFilter,
          limit: number,
          offset: number
     ): Promise<SearchResult<InventoryItem>> {
          const { where, values } = filterClause(filter);

          const counted = await this.client.query<{ count: string }>(
               `SELECT COUNT(*) AS count FROM inventory_items ${where}`,
               values
          );
          const { rows } = await this.client.query<InventoryItemRow>(
               `
      SELECT ${ITEM_COLUMNS}
      FROM inventory_items
      ${where}
      ORDER BY sku
      LIMIT $${values.length + 1} OFFSET $${values.length + 2}
    `,
               [...values, limit, offset]
          );

          return { rows: rows.map(mapInventoryItem), total: parseInt(counted.rows[0].count, 10) };
     }

     async totals(): Promise<StockTotals> {
          const { rows } = await this.client.query<StockTotalsRow>(
               `
      SELECT
        COUNT(*) AS total_items,
        COUNT(*) FILTER (WHERE quantity_available <= reorder_level) AS low_stock_count,
        COUNT(*) FILTER (WHERE quantity_available = 0) AS out_of_stock_count,
        COUNT(*) FILTER (WHERE quantity_available > 0) AS with_stock_count,
        COALESCE(SUM(quantity_available + quantity_reserved), 0) AS total_units,
        COALESCE(SUM(cost_per_unit * (quantity_available + quantity_reserved)), 0) AS total_value
      FROM inventory_items
      WHERE is_active
    `
          );

          const row = rows[0];
          return {
               totalItems: parseInt(row.total_items, 10),
               lowStockCount: parseInt(row.low_stock_count, 10),
               outOfStockCount: parseInt(row.out_of_stock_count, 10),
               withStockCount: parseInt(row.with_stock_count, 10),
               totalUnits: parseInt(row.total_units, 10),
               totalValue: Number(row.total_value),
          };
     }
}
