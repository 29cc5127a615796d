import { PoolClient } from 'pg';
import {
     Reservation,
     ReservationFilter,
     ReservationStatus,
     RESERVATION_STATUSES,
     TerminalReservationStatus,
} from '../types/inventory.types';
import { hasPgErrorCode } from '../utils/errors';
import { LockOptions, SearchResult } from './inventory-item-repository';

export interface NewReservation {
     orderId: string;
     sku: string;
     quantity: number;
     expiresAt: Date;
}

export interface ReservationRepository {
     insert(reservation: NewReservation): Promise<Reservation>;
     findById(id: string, options?: LockOptions): Promise<Reservation | null>;
     findByOrderId(orderId: string, options?: LockOptions): Promise<Reservation[]>;
     /** Holds a per-order lock until the transaction ends, whether or not rows exist yet. */
     lockOrder(orderId: string): Promise<void>;
     search(filter: ReservationFilter, limit: number, offset: number): Promise<SearchResult<Reservation>>;
     countPendingBySku(sku: string): Promise<number>;
     /**
      * Compare-and-swap status change. Resolves to null when the row is gone or
      * no longer in `from`.
      */
     transition(
          id: string,
          from: ReservationStatus,
          to: TerminalReservationStatus
     ): Promise<Reservation | null>;
     findExpired(now: Date, limit: number): Promise<Reservation[]>;
     deleteTerminalBefore(
          statuses: TerminalReservationStatus[],
          cutoff: Date
     ): Promise<number>;
}

// Database row type (snake_case from PostgreSQL)
export interface ReservationRow {
     id: string;
     order_id: string;
     sku: string;
     quantity: number;
     status: string;
     expires_at: Date;
     created_at: Date;
     updated_at: Date;
}

const RESERVATION_COLUMNS = 'id, order_id, sku, quantity, status, expires_at, created_at, updated_at';

// Rows written by older producers use ACTIVE for the open state.
const OPEN_STATUSES = ['PENDING', 'ACTIVE'];

export function parseReservationStatus(value: string): ReservationStatus {
     if (value === 'ACTIVE') {
          return 'PENDING';
     }
     const status = RESERVATION_STATUSES.find((candidate) => candidate === value);
     if (!status) {
          throw new Error(`Unknown reservation status: ${value}`);
     }
     return status;
}

export function mapReservation(row: ReservationRow): Reservation {
     return {
          id: row.id,
          orderId: row.order_id,
          sku: row.sku,
          quantity: Number(row.quantity),
          status: parseReservationStatus(row.status),
          expiresAt: row.expires_at,
          createdAt: row.created_at,
          updatedAt: row.updated_at,
     };
}

function matchingStatuses(status: ReservationStatus): string[] {
     return status === 'PENDING' ? OPEN_STATUSES : [status];
}

// Ids are UUIDs; anything else is rejected by PostgreSQL with invalid_text_representation.
const INVALID_TEXT_REPRESENTATION = '22P02';

function filterClause(filter: ReservationFilter): { where: string; values: unknown[] } {
     const conditions: string[] = [];
     const values: unknown[] = [];

     if (filter.orderId !== undefined) {
          values.push(filter.orderId);
          conditions.push(`order_id = $${values.length}`);
     }
     if (filter.sku !== undefined) {
          values.push(filter.sku);
          conditions.push(`sku = $${values.length}`);
     }
     if (filter.status !== undefined) {
          values.push(matchingStatuses(filter.status));
          conditions.push(`status = ANY($${values.length}::text[])`);
     }

     return {
          where: conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '',
          values,
     };
}

export class PgReservationRepository implements ReservationRepository {
     constructor(private readonly client: PoolClient) {}

     async insert(reservation: NewReservation): Promise<Reservation> {
          const { rows } = await this.client.query<ReservationRow>(
               `
      INSERT INTO reservations (
        order_id,
        sku,
        quantity,
        status,
        expires_at
      ) VALUES ($1, $2, $3, 'PENDING', $4)
      RETURNING ${RESERVATION_COLUMNS}
    `,
               [reservation.orderId, reservation.sku, reservation.quantity, reservation.expiresAt]
          );

          return mapReservation(rows[0]);
     }

     async findById(id: string, options: LockOptions = {}): Promise<Reservation | null> {
          try {
               const { rows } = await this.client.query<ReservationRow>(
                    `
        SELECT ${RESERVATION_COLUMNS}
        FROM reservations
        WHERE id = $1
        ${options.forUpdate ? 'FOR UPDATE' : ''}
      `,
                    [id]
               );

               return rows.length > 0 ? mapReservation(rows[0]) : null;
          } catch (error) {
               if (hasPgErrorCode(error, INVALID_TEXT_REPRESENTATION)) {
                    return null;
               }
               throw error;
          }
     }

     async findByOrderId(orderId: string, options: LockOptions = {}): Promise<Reservation[]> {
          const { rows } = await this.client.query<ReservationRow>(
               `
      SELECT ${RESERVATION_COLUMNS}
      FROM reservations
      WHERE order_id = $1
      ORDER BY created_at, id
      ${options.forUpdate ? 'FOR UPDATE' : ''}
    `,
               [orderId]
          );

          return rows.map(mapReservation);
     }

     async lockOrder(orderId: string): Promise<void> {
          await this.client.query(`SELECT pg_advisory_xact_lock(hashtext('reservation-order:' || $1))`, [
               orderId,
          ]);
     }

     async search(
          filter: ReservationFilter,
          limit: number,
          offset: number
     ): Promise<SearchResult<Reservation>> {
          const { where, values } = filterClause(filter);

          const counted = await this.client.query<{ count: string }>(
               `SELECT COUNT(*) AS count FROM reservations ${where}`,
               values
          );
          const { rows } = await this.client.query<ReservationRow>(
               `
      SELECT ${RESERVATION_COLUMNS}
      FROM reservations
      ${where}
      ORDER BY created_at DESC, id
      LIMIT $${values.length + 1} OFFSET $${values.length + 2}
    `,
               [...values, limit, offset]
          );

          return { rows: rows.map(mapReservation), total: parseInt(counted.rows[0].count, 10) };
     }

     async countPendingBySku(sku: string): Promise<number> {
          const { rows } = await this.client.query<{ count: string }>(
               `
      SELECT COUNT(*) AS count
      FROM reservations
      WHERE sku = $1 AND status = ANY($2::text[])
    `,
               [sku, OPEN_STATUSES]
          );

          return parseInt(rows[0].count, 10);
     }

     async transition(
          id: string,
          from: ReservationStatus,
          to: TerminalReservationStatus
     ): Promise<Reservation | null> {
          try {
               const { rows } = await this.client.query<ReservationRow>(
                    `
        UPDATE reservations
        SET status = $3,
            updated_at = NOW()
        WHERE id = $1 AND status = ANY($2::text[])
        RETURNING ${RESERVATION_COLUMNS}
      `,
                    [id, matchingStatuses(from), to]
               );

               return rows.length > 0 ? mapReservation(rows[0]) : null;
          } catch (error) {
               if (hasPgErrorCode(error, INVALID_TEXT_REPRESENTATION)) {
                    return null;
               }
               throw error;
          }
     }

     async findExpired(now: Date, limit: number): Promise<Reservation[]> {
          const { rows } = await this.client.query<ReservationRow>(
               `
      SELECT ${RESERVATION_COLUMNS}
      FROM reservations
      WHERE status = ANY($1::text[]) AND expires_at <= $2
      ORDER BY expires_at
      LIMIT $3
    `,
               [OPEN_STATUSES, now, limit]
          );

          return rows.map(mapReservation);
     }

     async deleteTerminalBefore(
          statuses: TerminalReservationStatus[],
          cutoff: Date
     ): Promise<number> {
          const result = await this.client.query(
               `
      DELETE FROM reservations
      WHERE status = ANY($1::text[]) AND updated_at < $2
    `,
               [statuses, cutoff]
          );

          return result.rowCount ?? 0;
     }
}
