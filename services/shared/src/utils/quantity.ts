import Decimal from 'decimal.js';

// Quantities are persisted as NUMERIC(18,4)
export const QUANTITY_SCALE = 4;

// Fourteen integer digits fit in NUMERIC(18,4)
export const MAX_QUANTITY = 1e14;

export type QuantityInput = Decimal.Value;

/**
 * Parse a NUMERIC column value (pg returns these as strings) into a number.
 */
export function parseQuantity(value: string | number): number {
     return new Decimal(value).toNumber();
}

/**
 * Render a quantity for use as a NUMERIC query parameter.
 */
export function formatQuantity(value: QuantityInput): string {
     return new Decimal(value).toFixed(QUANTITY_SCALE);
}

/**
 * Returns an error message when the value cannot be stored as a quantity,
 * or null when it is acceptable.
 */
export function validateQuantity(value: number): string | null {
     if (!Number.isFinite(value)) {
          return `Quantity must be a finite number, got ${value}`;
     }
     if (Math.abs(value) >= MAX_QUANTITY) {
          return `Quantity ${value} is out of range, must be below ${MAX_QUANTITY}`;
     }
     if (new Decimal(value).decimalPlaces() > QUANTITY_SCALE) {
          return `Quantity ${value} has more than ${QUANTITY_SCALE} decimal places`;
     }
     return null;
}

export function sumQuantities(values: QuantityInput[]): Decimal {
     return values.reduce<Decimal>((sum, v) => sum.plus(v), new Decimal(0));
}
