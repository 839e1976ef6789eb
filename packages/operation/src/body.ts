import { hasMethod, type Amount, type ConsensusConfig } from '@quorumledger/core';
import type { Result } from 'neverthrow';

export interface Body {
  /**
   * Check that the payload is self consistent.
   *
   * Used by the transaction checker and therefore part of consensus: the
   * result must depend only on the payload and `config`, never on ledger state.
   */
  isWellFormed(config: ConsensusConfig): Result<void, Error>;
  /** Whether the operation is charged the base fee */
  hasFee(): boolean;
}

/**
 * Addresses an account without necessarily moving value.
 */
export interface Targetable {
  targetAddress(): string;
}

/**
 * Moves `getAmount()` into `targetAddress()`.
 */
export interface Payable extends Body, Targetable {
  getAmount(): Amount;
}

export function isTargetable(body: Body): body is Body & Targetable {
  return hasMethod(body, 'targetAddress');
}

export function isPayable(body: Body): body is Payable {
  return isTargetable(body) && hasMethod(body, 'getAmount');
}
