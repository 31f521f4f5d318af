// Custom error classes for domain-specific errors

export class DomainError extends Error {
     constructor(
          message: string,
          public readonly code: string,
          public readonly statusCode: number = 400,
          public readonly details: Record<string, unknown> = {}
     ) {
          super(message);
          this.name = this.constructor.name;
          Error.captureStackTrace(this, this.constructor);
     }
}

export class ItemNotFoundError extends DomainError {
     constructor(public readonly itemId: number) {
          super(`Item ${itemId} not found`, 'ITEM_NOT_FOUND', 404, { itemId });
     }
}

export class LotNotFoundError extends DomainError {
     constructor(public readonly lotId: number) {
          super(`Lot ${lotId} not found`, 'LOT_NOT_FOUND', 404, { lotId });
     }
}

export class PurchaseNotFoundError extends DomainError {
     constructor(public readonly purchaseId: number) {
          super(`Purchase ${purchaseId} not found`, 'PURCHASE_NOT_FOUND', 404, { purchaseId });
     }
}

export class DuplicateItemNameError extends DomainError {
     constructor(public readonly itemName: string) {
          super(`Item with name "${itemName}" already exists`, 'DUPLICATE_ITEM_NAME', 409, {
               name: itemName,
          });
     }
}

export class DuplicateLotNumberError extends DomainError {
     constructor(public readonly lotNumber: string) {
          super(`Lot number ${lotNumber} already exists`, 'DUPLICATE_LOT_NUMBER', 409, {
               lotNumber,
          });
     }
}

export class InvalidQuantityError extends DomainError {
     constructor(message: string) {
          super(message, 'INVALID_QUANTITY', 400);
     }
}

export class InvalidLotDatesError extends DomainError {
     constructor(
          public readonly manufacturingDate: string,
          public readonly expiryDate: string
     ) {
          super(
               `Expiry date ${expiryDate} is before manufacturing date ${manufacturingDate}`,
               'INVALID_LOT_DATES',
               400,
               { manufacturingDate, expiryDate }
          );
     }
}

export class InsufficientLotQuantityError extends DomainError {
     constructor(
          public readonly lotId: number,
          public readonly requested: number,
          public readonly available: number
     ) {
          super(
               `Insufficient quantity in lot ${lotId}: requested ${requested}, available ${available}`,
               'INSUFFICIENT_LOT_QUANTITY',
               409,
               { lotId, requested, available }
          );
     }
}

export class InsufficientAggregateQuantityError extends DomainError {
     constructor(
          public readonly itemId: number,
          public readonly requested: number,
          public readonly available: number,
          public readonly shortfall: number
     ) {
          super(
               `Insufficient stock across lots for item ${itemId}: requested ${requested}, available ${available}, short by ${shortfall}`,
               'INSUFFICIENT_AGGREGATE_QUANTITY',
               409,
               { itemId, requested, available, shortfall }
          );
     }
}

export class ConcurrencyConflictError extends DomainError {
     public readonly retriable = true;

     constructor(
          message: string = 'Conflicting concurrent update, retry the operation',
          public readonly attempts: number = 1
     ) {
          super(message, 'CONCURRENCY_CONFLICT', 409, { attempts });
     }
}

// Infrastructure failure, kept outside the DomainError hierarchy
export class DatabaseUnavailableError extends Error {
     public readonly statusCode = 503;
     public readonly retriable = true;

     constructor(
          message: string,
          public readonly originalError?: unknown,
          /** Set when the connection dropped after COMMIT was sent */
          public readonly outcomeUnknown: boolean = false
     ) {
          super(message);
          this.name = 'DatabaseUnavailableError';
     }
}
