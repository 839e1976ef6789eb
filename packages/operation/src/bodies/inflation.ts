import { AmountSchema, isNonNegativeDecimalString, type Amount, type ConsensusConfig } from '@quorumledger/core';
import { z } from 'zod';

import type { Payable } from '../body.js';

import type { BlockReference } from './collect-tx-fee.js';
import {
  check,
  checkCommonAccount,
  checkMinimumAmount,
  checkNotEmpty,
  checkPublicAddress,
  ONE,
  UintSchema,
  type CheckResult,
} from './shared.js';

export interface InflationProps extends BlockReference {
  target: string;
  amount: Amount;
  initialBalance: Amount;
  /** Per-block inflation ratio as a decimal string, e.g. "0.00000002" */
  ratio: string;
}

/**
 * System operation minting the per-block inflation into the common account.
 */
export class Inflation implements Payable {
  readonly target: string;
  readonly amount: Amount;
  readonly initialBalance: Amount;
  readonly ratio: string;
  readonly blockHeight: number;
  readonly blockHash: string;
  readonly totalTxs: number;
  readonly totalOps: number;

  constructor(props: InflationProps) {
    this.target = props.target;
    this.amount = props.amount;
    this.initialBalance = props.initialBalance;
    this.ratio = props.ratio;
    this.blockHeight = props.blockHeight;
    this.blockHash = props.blockHash;
    this.totalTxs = props.totalTxs;
    this.totalOps = props.totalOps;
  }

  isWellFormed(config: ConsensusConfig): CheckResult {
    return checkPublicAddress(this.target, 'target')
      .andThen(() => checkCommonAccount(this.target, config.commonAccountAddress))
      .andThen(() => checkNotEmpty(this.blockHash, 'block-hash'))
      .andThen(() => check(this.blockHeight >= 1, 'INVALID_OPERATION_FIELD', 'block-height', 'block-height must be at least 1'))
      .andThen(() =>
        check(
          isNonNegativeDecimalString(this.ratio),
          'INVALID_OPERATION_FIELD',
          'ratio',
          `ratio '${this.ratio}' is not a non-negative decimal`
        )
      )
      .andThen(() => checkMinimumAmount(this.initialBalance, ONE, 'initial_balance'));
  }

  hasFee(): boolean {
    return false;
  }

  targetAddress(): string {
    return this.target;
  }

  getAmount(): Amount {
    return this.amount;
  }

  toJSON(): {
    target: string;
    amount: string;
    initial_balance: string;
    ratio: string;
    'block-height': number;
    'block-hash': string;
    'total-txs': number;
    'total-ops': number;
  } {
    return {
      target: this.target,
      amount: this.amount.toString(),
      initial_balance: this.initialBalance.toString(),
      ratio: this.ratio,
      'block-height': this.blockHeight,
      'block-hash': this.blockHash,
      'total-txs': this.totalTxs,
      'total-ops': this.totalOps,
    };
  }
}

export const InflationSchema = z
  .object({
    target: z.string(),
    amount: AmountSchema,
    initial_balance: AmountSchema,
    ratio: z.string(),
    'block-height': UintSchema,
    'block-hash': z.string(),
    'total-txs': UintSchema,
    'total-ops': UintSchema,
  })
  .transform(
    (fields) =>
      new Inflation({
        target: fields.target,
        amount: fields.amount,
        initialBalance: fields.initial_balance,
        ratio: fields.ratio,
        blockHeight: fields['block-height'],
        blockHash: fields['block-hash'],
        totalTxs: fields['total-txs'],
        totalOps: fields['total-ops'],
      })
  );
