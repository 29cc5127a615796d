import { InventoryTransaction } from '../repositories';
import { Reservation, TerminalReservationStatus } from '../types/inventory.types';
import { InvalidStateError, ReservationNotFoundError, ValidationError } from '../utils/errors';

const MINUTE_MS = 60 * 1000;

export interface CreateReservationCommand {
     sku: string;
     orderId: string;
     quantity: number;
     ttlMinutes: number;
     now: Date;
}

export function computeExpiry(now: Date, ttlMinutes: number): Date {
     return new Date(now.getTime() + ttlMinutes * MINUTE_MS);
}

/**
 * Owns reservation records and their status transitions. Only PENDING
 * reservations may move, and each may move exactly once.
 */
export class ReservationStore {
     async create(tx: InventoryTransaction, command: CreateReservationCommand): Promise<Reservation> {
          if (!Number.isInteger(command.quantity) || command.quantity <= 0) {
               throw new ValidationError(
                    `Reservation quantity must be a positive integer, got ${command.quantity}`
               );
          }
          if (!Number.isFinite(command.ttlMinutes) || command.ttlMinutes < 0) {
               throw new ValidationError(
                    `Reservation TTL must be a non-negative number of minutes, got ${command.ttlMinutes}`
               );
          }

          return tx.reservations.insert({
               sku: command.sku,
               orderId: command.orderId,
               quantity: command.quantity,
               expiresAt: computeExpiry(command.now, command.ttlMinutes),
          });
     }

     async getById(
          tx: InventoryTransaction,
          id: string,
          options: { forUpdate?: boolean } = {}
     ): Promise<Reservation> {
          const reservation = await tx.reservations.findById(id, options);
          if (!reservation) {
               throw new ReservationNotFoundError(id);
          }
          return reservation;
     }

     async listByOrder(
          tx: InventoryTransaction,
          orderId: string,
          options: { forUpdate?: boolean } = {}
     ): Promise<Reservation[]> {
          return tx.reservations.findByOrderId(orderId, options);
     }

     /**
      * Moves a PENDING reservation into a terminal status. The update only
      * matches while the row is still PENDING, so of two racing callers exactly
      * one wins and the other gets InvalidStateError.
      */
     async updateStatus(
          tx: InventoryTransaction,
          id: string,
          newStatus: TerminalReservationStatus
     ): Promise<Reservation> {
          const updated = await tx.reservations.transition(id, 'PENDING', newStatus);
          if (updated) {
               return updated;
          }

          const current = await tx.reservations.findById(id);
          if (!current) {
               throw new ReservationNotFoundError(id);
          }
          throw new InvalidStateError(
               `Cannot move reservation ${id} from ${current.status} to ${newStatus}`,
               current.status
          );
     }

     async cancel(tx: InventoryTransaction, id: string): Promise<Reservation> {
          return this.updateStatus(tx, id, 'CANCELLED');
     }

     async listExpired(tx: InventoryTransaction, now: Date, limit: number = 100): Promise<Reservation[]> {
          return tx.reservations.findExpired(now, limit);
     }

     async purgeTerminal(
          tx: InventoryTransaction,
          olderThan: Date,
          statuses: TerminalReservationStatus[] = ['EXPIRED']
     ): Promise<number> {
          return tx.reservations.deleteTerminalBefore(statuses, olderThan);
     }
}
