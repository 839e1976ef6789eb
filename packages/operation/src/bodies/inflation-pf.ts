import { AmountSchema, type Amount, type ConsensusConfig } from '@quorumledger/core';
import { z } from 'zod';

import type { Payable } from '../body.js';

import { checkMinimumAmount, checkNotEmpty, checkPublicAddress, ONE, type CheckResult } from './shared.js';

export interface InflationPFProps {
  fundingAddress: string;
  amount: Amount;
  /** Hash of the congress-voting-result that approved the funding */
  votingResult: string;
}

/**
 * Pays approved proposal funding out of the inflation pool.
 */
export class InflationPF implements Payable {
  readonly fundingAddress: string;
  readonly amount: Amount;
  readonly votingResult: string;

  constructor(props: InflationPFProps) {
    this.fundingAddress = props.fundingAddress;
    this.amount = props.amount;
    this.votingResult = props.votingResult;
  }

  isWellFormed(_config: ConsensusConfig): CheckResult {
    return checkPublicAddress(this.fundingAddress, 'funding_address')
      .andThen(() => checkMinimumAmount(this.amount, ONE, 'amount'))
      .andThen(() => checkNotEmpty(this.votingResult, 'voting_result'));
  }

  hasFee(): boolean {
    return false;
  }

  targetAddress(): string {
    return this.fundingAddress;
  }

  getAmount(): Amount {
    return this.amount;
  }

  toJSON(): { funding_address: string; amount: string; voting_result: string } {
    return {
      funding_address: this.fundingAddress,
      amount: this.amount.toString(),
      voting_result: this.votingResult,
    };
  }
}

export const InflationPFSchema = z
  .object({
    funding_address: z.string(),
    amount: AmountSchema,
    voting_result: z.string(),
  })
  .transform(
    (fields) =>
      new InflationPF({
        fundingAddress: fields.funding_address,
        amount: fields.amount,
        votingResult: fields.voting_result,
      })
  );
