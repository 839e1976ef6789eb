import { AmountSchema, type Amount, type ConsensusConfig } from '@quorumledger/core';
import { z } from 'zod';

import type { Body, Targetable } from '../body.js';

import {
  Base64Schema,
  check,
  checkMinimumAmount,
  checkNotEmpty,
  checkPublicAddress,
  ONE,
  UintSchema,
  type CheckResult,
} from './shared.js';

export interface VotingPeriod {
  /** First block height at which ballots are accepted */
  start: number;
  /** Last block height at which ballots are accepted */
  end: number;
}

export interface CongressVotingProps {
  /** Base64 encoded proposal contract */
  contract: string;
  voting: VotingPeriod;
  fundingAddress: string;
  amount: Amount;
}

/**
 * Opens a congress vote on a funding proposal.
 */
export class CongressVoting implements Body, Targetable {
  readonly contract: string;
  readonly voting: Readonly<VotingPeriod>;
  readonly fundingAddress: string;
  readonly amount: Amount;

  constructor(props: CongressVotingProps) {
    this.contract = props.contract;
    this.voting = { start: props.voting.start, end: props.voting.end };
    this.fundingAddress = props.fundingAddress;
    this.amount = props.amount;
  }

  isWellFormed(_config: ConsensusConfig): CheckResult {
    return checkNotEmpty(this.contract, 'contract')
      .andThen(() =>
        check(
          this.voting.start <= this.voting.end,
          'INVALID_OPERATION_FIELD',
          'voting',
          `voting period starts at ${String(this.voting.start)} after it ends at ${String(this.voting.end)}`
        )
      )
      .andThen(() => checkPublicAddress(this.fundingAddress, 'funding_address'))
      .andThen(() => checkMinimumAmount(this.amount, ONE, 'amount'));
  }

  hasFee(): boolean {
    return true;
  }

  targetAddress(): string {
    return this.fundingAddress;
  }

  toJSON(): { contract: string; voting: VotingPeriod; funding_address: string; amount: string } {
    return {
      contract: this.contract,
      voting: { start: this.voting.start, end: this.voting.end },
      funding_address: this.fundingAddress,
      amount: this.amount.toString(),
    };
  }
}

export const CongressVotingSchema = z
  .object({
    contract: Base64Schema,
    voting: z.object({
      start: UintSchema,
      end: UintSchema,
    }),
    funding_address: z.string(),
    amount: AmountSchema,
  })
  .transform(
    (fields) =>
      new CongressVoting({
        contract: fields.contract,
        voting: fields.voting,
        fundingAddress: fields.funding_address,
        amount: fields.amount,
      })
  );
