import { z } from 'zod';

/**
 * Closed set of operation discriminants. The string values are the wire tags
 * and are matched case-sensitively.
 */
export const OperationTypeSchema = z.enum([
  'create-account',
  'payment',
  'congress-voting',
  'congress-voting-result',
  'collect-tx-fee',
  'inflation',
  'unfreezing-request',
  'inflation-pf',
]);

export type OperationType = z.infer<typeof OperationTypeSchema>;

export const OPERATION_TYPES: readonly OperationType[] = OperationTypeSchema.options;

/**
 * Who submits each kind of operation. System operations are produced by the
 * block proposer and are never accepted from users.
 */
const OPERATION_ORIGIN: Record<OperationType, 'user' | 'system'> = {
  'create-account': 'user',
  payment: 'user',
  'congress-voting': 'user',
  'congress-voting-result': 'user',
  'collect-tx-fee': 'system',
  inflation: 'system',
  'unfreezing-request': 'user',
  'inflation-pf': 'user',
};

export function isValidOperationType(tag: string): tag is OperationType {
  return OperationTypeSchema.safeParse(tag).success;
}

/**
 * True for user-submitted operation kinds; false for system operations and for
 * any string outside the registered set.
 */
export function isNormalOperation(tag: string): boolean {
  return isValidOperationType(tag) && OPERATION_ORIGIN[tag] === 'user';
}
