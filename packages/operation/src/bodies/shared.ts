import { Amount, isValidPublicAddress, OperationValidationError, type OperationValidationCode } from '@quorumledger/core';
import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

export type CheckResult = Result<void, OperationValidationError>;

/**
 * Unsigned integer wire field (heights, counters, voting bounds). Values JSON
 * numbers cannot carry exactly are rejected instead of rounded.
 */
export const UintSchema = z.number().int().nonnegative().safe();

export const Base64Schema = z
  .string()
  .regex(/^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/, 'Must be base64 encoded');

export const ONE = Amount.create(1);

export function check(
  condition: boolean,
  code: OperationValidationCode,
  field: string,
  message: string
): CheckResult {
  return condition ? ok(undefined) : err(new OperationValidationError(code, message, field));
}

export function checkPublicAddress(value: string, field: string): CheckResult {
  return check(isValidPublicAddress(value), 'BAD_PUBLIC_ADDRESS', field, `${field} is not a valid public address`);
}

export function checkMinimumAmount(amount: Amount, minimum: Amount, field: string): CheckResult {
  return check(
    !amount.lessThan(minimum),
    'OPERATION_AMOUNT_UNDERFLOW',
    field,
    `${field} ${amount.toString()} is below the minimum of ${minimum.toString()}`
  );
}

export function checkNotEmpty(value: string | readonly unknown[], field: string): CheckResult {
  return check(value.length > 0, 'OPERATION_BODY_INSUFFICIENT', field, `${field} must not be empty`);
}

/**
 * System operations must credit the common account when one is configured.
 */
export function checkCommonAccount(target: string, commonAccountAddress: string | undefined): CheckResult {
  return check(
    commonAccountAddress === undefined || target === commonAccountAddress,
    'INVALID_OPERATION_FIELD',
    'target',
    'target must be the common account'
  );
}
