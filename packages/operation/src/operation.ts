import type { ConsensusConfig } from '@quorumledger/core';
import type { Result } from 'neverthrow';

import type { OperationBodyMap } from './bodies/index.js';
import type { OperationType } from './operation-type.js';

export interface Header<T extends OperationType = OperationType> {
  readonly type: T;
}

export interface OperationEnvelope<T extends OperationType = OperationType> {
  H: Header<T>;
  B: OperationBodyMap[T];
}

/**
 * A single ledger operation: a discriminant header plus the body it selects.
 *
 * Instances are frozen. Build them through `newOperation` or `decodeOperation`,
 * which guarantee that `header.type` names the class of `body`.
 */
export class Operation<T extends OperationType = OperationType> {
  readonly header: Header<T>;
  readonly body: OperationBodyMap[T];

  constructor(type: T, body: OperationBodyMap[T]) {
    this.header = Object.freeze({ type });
    this.body = body;
    Object.freeze(this);
  }

  get type(): T {
    return this.header.type;
  }

  /**
   * Consensus self-check of the body. The configuration is passed through
   * unchanged and the body's result is returned as is.
   */
  isWellFormed(config: ConsensusConfig): Result<void, Error> {
    return this.body.isWellFormed(config);
  }

  hasFee(): boolean {
    return this.body.hasFee();
  }

  toJSON(): OperationEnvelope<T> {
    return { H: this.header, B: this.body };
  }

  toString(): string {
    return JSON.stringify(this, undefined, 2);
  }
}

export function isOperationOfType<T extends OperationType>(operation: Operation, type: T): operation is Operation<T> {
  return operation.header.type === type;
}
