import { UnknownOperationTypeError } from '@quorumledger/core';
import { getLogger } from '@quorumledger/logger';
import { err, ok, type Result } from 'neverthrow';

import type { Body } from './body.js';
import {
  CollectTxFee,
  CongressVoting,
  CongressVotingResult,
  CreateAccount,
  Inflation,
  InflationPF,
  Payment,
  UnfreezingRequest,
  type OperationBodyMap,
} from './bodies/index.js';
import { Operation } from './operation.js';
import { OPERATION_TYPES, type OperationType } from './operation-type.js';

const logger = getLogger('OperationFactory');

type BodyClass<B> = abstract new (...args: never[]) => B;

/**
 * Operation type → body class. Typed over every OperationType, so adding a
 * type without a class (or the reverse) fails to compile here.
 */
const BODY_VARIANTS: { readonly [K in OperationType]: BodyClass<OperationBodyMap[K]> } = {
  'create-account': CreateAccount,
  payment: Payment,
  'congress-voting': CongressVoting,
  'congress-voting-result': CongressVotingResult,
  'collect-tx-fee': CollectTxFee,
  inflation: Inflation,
  'unfreezing-request': UnfreezingRequest,
  'inflation-pf': InflationPF,
};

/**
 * Exact class match: subclasses and structurally similar objects are not
 * members of the registered set.
 */
export function isBodyOfType<T extends OperationType>(body: Body, type: T): body is OperationBodyMap[T] {
  const prototype: unknown = Object.getPrototypeOf(body);
  return prototype === BODY_VARIANTS[type].prototype;
}

export function resolveOperationType(body: Body): OperationType | undefined {
  return OPERATION_TYPES.find((type) => isBodyOfType(body, type));
}

/**
 * Wrap a body in an operation, inferring the header from the body's class.
 * Does not validate the body's fields; see `Operation.isWellFormed`.
 */
export function newOperation(body: Body): Result<Operation, UnknownOperationTypeError> {
  for (const type of OPERATION_TYPES) {
    if (isBodyOfType(body, type)) {
      return ok(new Operation(type, body));
    }
  }

  const constructor: unknown = Reflect.get(body, 'constructor');
  const variant = typeof constructor === 'function' ? constructor.name : 'unknown';
  logger.debug({ variant }, 'Rejected body of unregistered variant');
  return err(new UnknownOperationTypeError(variant));
}
