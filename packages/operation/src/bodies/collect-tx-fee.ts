import { AmountSchema, type Amount, type ConsensusConfig } from '@quorumledger/core';
import { z } from 'zod';

import type { Payable } from '../body.js';

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

export interface BlockReference {
  blockHeight: number;
  blockHash: string;
  /** Transactions in the ledger up to and including this block */
  totalTxs: number;
  /** Operations in the ledger up to and including this block */
  totalOps: number;
}

export interface CollectTxFeeProps extends BlockReference {
  target: string;
  amount: Amount;
  /** Number of transactions whose fees are collected */
  txs: number;
}

/**
 * System operation moving the fees of a block's transactions into the common
 * account. Not charged a fee itself.
 */
export class CollectTxFee implements Payable {
  readonly target: string;
  readonly amount: Amount;
  readonly txs: number;
  readonly blockHeight: number;
  readonly blockHash: string;
  readonly totalTxs: number;
  readonly totalOps: number;

  constructor(props: CollectTxFeeProps) {
    this.target = props.target;
    this.amount = props.amount;
    this.txs = props.txs;
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
        this.txs > 0
          ? checkMinimumAmount(this.amount, ONE, 'amount')
          : check(this.amount.isZero(), 'INVALID_OPERATION_FIELD', 'amount', 'amount must be 0 when no transactions are collected')
      );
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
    txs: number;
    'block-height': number;
    'block-hash': string;
    'total-txs': number;
    'total-ops': number;
  } {
    return {
      target: this.target,
      amount: this.amount.toString(),
      txs: this.txs,
      'block-height': this.blockHeight,
      'block-hash': this.blockHash,
      'total-txs': this.totalTxs,
      'total-ops': this.totalOps,
    };
  }
}

export const CollectTxFeeSchema = z
  .object({
    target: z.string(),
    amount: AmountSchema,
    txs: UintSchema,
    'block-height': UintSchema,
    'block-hash': z.string(),
    'total-txs': UintSchema,
    'total-ops': UintSchema,
  })
  .transform(
    (fields) =>
      new CollectTxFee({
        target: fields.target,
        amount: fields.amount,
        txs: fields.txs,
        blockHeight: fields['block-height'],
        blockHash: fields['block-hash'],
        totalTxs: fields['total-txs'],
        totalOps: fields['total-ops'],
      })
  );
