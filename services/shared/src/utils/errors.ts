// Custom error classes for domain-specific errors

import type { ReservationStatus } from '../types/inventory.types';

export class DomainError extends Error {
     constructor(
          message: string,
          public readonly code: string,
          public readonly statusCode: number = 400
     ) {
          super(message);
          this.name = this.constructor.name;
          Error.captureStackTrace(this, this.constructor);
     }
}

export class ItemNotFoundError extends DomainError {
     constructor(public readonly sku: string) {
          super(`Inventory item ${sku} not found`, 'ITEM_NOT_FOUND', 404);
     }
}

export class ReservationNotFoundError extends DomainError {
     constructor(public readonly reservationId: string) {
          super(`Reservation ${reservationId} not found`, 'RESERVATION_NOT_FOUND', 404);
     }
}

export class InsufficientStockError extends DomainError {
     constructor(
          message: string,
          public readonly sku: string,
          public readonly requested: number,
          public readonly available: number
     ) {
          super(message, 'INSUFFICIENT_STOCK', 409);
     }
}

export class InvalidStateError extends DomainError {
     constructor(
          message: string,
          public readonly currentStatus?: ReservationStatus
     ) {
          super(message, 'INVALID_STATE', 409);
     }
}

export class OrderMismatchError extends DomainError {
     constructor(
          public readonly reservationId: string,
          public readonly expectedOrderId: string,
          public readonly actualOrderId: string
     ) {
          super(
               `Reservation ${reservationId} belongs to order ${expectedOrderId}, not ${actualOrderId}`,
               'ORDER_MISMATCH',
               409
          );
     }
}

export class OrderAlreadyReservedError extends DomainError {
     constructor(
          public readonly orderId: string,
          public readonly existing: number
     ) {
          super(`Order ${orderId} already holds ${existing} reservation(s)`, 'ORDER_ALREADY_RESERVED', 409);
     }
}

export class ReservationExpiredError extends DomainError {
     constructor(
          public readonly reservationId: string,
          public readonly expiresAt: Date
     ) {
          super(
               `Reservation ${reservationId} expired at ${expiresAt.toISOString()}`,
               'RESERVATION_EXPIRED',
               409
          );
     }
}

export class ValidationError extends DomainError {
     constructor(message: string) {
          super(message, 'VALIDATION_ERROR', 400);
     }
}

export class DuplicateItemError extends DomainError {
     constructor(
          public readonly sku: string,
          public readonly productId?: string
     ) {
          super(
               productId === undefined
                    ? `Inventory item ${sku} already exists`
                    : `An inventory item for product ${productId} already exists`,
               'DUPLICATE_ITEM',
               409
          );
     }
}

export class StorageError extends DomainError {
     constructor(message: string = 'Inventory store operation failed') {
          super(message, 'STORAGE_ERROR', 500);
     }
}

export class ConfigurationError extends DomainError {
     constructor(message: string) {
          super(message, 'CONFIGURATION_ERROR', 500);
     }
}

export class ProductServiceError extends Error {
     constructor(
          public readonly statusCode: number,
          message: string,
          public readonly retriable: boolean = false
     ) {
          super(message);
          this.name = 'ProductServiceError';

          // 429, 503, 504 are retriable
          if ([429, 503, 504].includes(statusCode)) {
               this.retriable = true;
          }
     }
}

export function isDomainError(error: unknown): error is DomainError {
     return error instanceof DomainError;
}

/**
 * PostgreSQL reports constraint violations with a SQLSTATE `code`.
 */
export function hasPgErrorCode(error: unknown, code: string): boolean {
     return (
          typeof error === 'object' &&
          error !== null &&
          'code' in error &&
          error.code === code
     );
}

export function pgConstraintName(error: unknown): string | undefined {
     if (
          typeof error === 'object' &&
          error !== null &&
          'constraint' in error &&
          typeof error.constraint === 'string'
     ) {
          return error.constraint;
     }
     return undefined;
}

export function errorMessage(error: unknown): string {
     return error instanceof Error ? error.message : 'Unknown error';
}
