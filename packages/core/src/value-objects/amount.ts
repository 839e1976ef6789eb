import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { isNonNegativeInteger, tryParseDecimal } from '../utils/decimal-utils.js';

/** Ledger balances are unsigned 64-bit integers */
export const MAX_AMOUNT = '18446744073709551615';

const maxAmount = new Decimal(MAX_AMOUNT);

/**
 * Amount value object
 *
 * A non-negative integer quantity expressed in the ledger's smallest currency
 * unit. Serializes as a plain integer string so values beyond
 * Number.MAX_SAFE_INTEGER survive the JSON wire format.
 */
export class Amount {
  /**
   * Create an Amount, throwing on negative, fractional or unparseable input
   */
  static create(value: string | number | bigint | Decimal): Amount {
    const result = Amount.tryCreate(value);
    if (result.isErr()) {
      throw result.error;
    }
    return result.value;
  }

  static tryCreate(value: string | number | bigint | Decimal): Result<Amount, Error> {
    if (typeof value === 'number' && Number.isInteger(value) && !Number.isSafeInteger(value)) {
      return err(new Error(`Amount ${String(value)} is outside the safe integer range; pass it as a string`));
    }

    const parsed = { value: new Decimal(0) };
    const raw = typeof value === 'bigint' ? value.toString() : value;

    if (!tryParseDecimal(raw, parsed)) {
      return err(new Error(`Invalid amount: ${String(value)}`));
    }
    if (!isNonNegativeInteger(parsed.value)) {
      return err(new Error(`Amount must be a non-negative integer, got ${parsed.value.toFixed()}`));
    }
    if (parsed.value.greaterThan(maxAmount)) {
      return err(new Error(`Amount exceeds the maximum of ${MAX_AMOUNT}, got ${parsed.value.toFixed()}`));
    }

    return ok(new Amount(parsed.value));
  }

  static zero(): Amount {
    return new Amount(new Decimal(0));
  }

  private readonly value: Decimal;

  private constructor(value: Decimal) {
    this.value = value;
  }

  equals(other: Amount): boolean {
    return this.value.equals(other.value);
  }

  lessThan(other: Amount): boolean {
    return this.value.lessThan(other.value);
  }

  isZero(): boolean {
    return this.value.isZero();
  }

  toString(): string {
    return this.value.toFixed();
  }

  /**
   * For JSON serialization
   */
  toJSON(): string {
    return this.toString();
  }
}
