import { Decimal } from 'decimal.js';

// Ledger amounts are integers in the smallest unit and reach 19 digits,
// so keep precision well above that and never switch to exponent notation
// for values that fit.
Decimal.set({
  maxE: 9e15,
  minE: -9e15,
  modulo: Decimal.ROUND_HALF_UP,
  precision: 40,
  rounding: Decimal.ROUND_HALF_UP,
  toExpNeg: -7,
  toExpPos: 40,
});

/**
 * Try to parse a string or number to a Decimal
 */
export function tryParseDecimal(value: string | number | Decimal | undefined | null, out?: { value: Decimal }): boolean {
  if (value === undefined || value === null || value === '') {
    return false;
  }

  try {
    const decimal = new Decimal(value);
    if (!decimal.isFinite()) return false;
    if (out) out.value = decimal;
    return true;
  } catch {
    return false;
  }
}

/**
 * True for decimal strings such as "0", "0.05" or "12.5" (no sign, no exponent)
 */
export function isNonNegativeDecimalString(value: string): boolean {
  return /^\d+(\.\d+)?$/.test(value) && tryParseDecimal(value);
}

/**
 * True when the value is an integer with no fractional part and is not negative
 */
export function isNonNegativeInteger(decimal: Decimal): boolean {
  return decimal.isInteger() && !decimal.isNegative();
}
