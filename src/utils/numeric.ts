/**
 * Conversion of engine numeric containers into JSON-safe values.
 *
 * Non-finite floats become null: JSON has no NaN or Infinity.
 */

import type {
  IndexValue,
  NumericArrayLike,
  NumericMatrix,
  NumericScalar
} from '../types.js';

export type PortableNumber = number | null;

/**
 * Numeric scalar to a finite number or null. Booleans map to 1/0.
 */
export function toNumber(value: NumericScalar): PortableNumber {
  if (typeof value === 'boolean') return value ? 1 : 0;
  const numeric = typeof value === 'bigint' ? Number(value) : value;
  return Number.isFinite(numeric) ? numeric : null;
}

export function toNumberArray(values: NumericArrayLike): PortableNumber[] {
  const result: PortableNumber[] = new Array(values.length);
  for (let i = 0; i < values.length; i++) {
    result[i] = toNumber(values[i]);
  }
  return result;
}

export function toMatrix(rows: NumericMatrix): PortableNumber[][] {
  return rows.map(row => toNumberArray(row));
}

/**
 * Column `column` of a row-major matrix.
 */
export function columnOf(rows: NumericMatrix, column: number): PortableNumber[] {
  const result: PortableNumber[] = new Array(rows.length);
  for (let i = 0; i < rows.length; i++) {
    const row = rows[i];
    result[i] = column < row.length ? toNumber(row[column]) : null;
  }
  return result;
}

export function toIndexArray(values: readonly IndexValue[]): IndexValue[] {
  return values.map(value =>
    typeof value === 'number' && !Number.isFinite(value) ? String(value) : value
  );
}
