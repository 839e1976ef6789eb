import { AmountSchema, type Amount, type ConsensusConfig } from '@quorumledger/core';
import { z } from 'zod';

import type { Payable } from '../body.js';

import { checkMinimumAmount, checkPublicAddress, ONE, type CheckResult } from './shared.js';

export interface PaymentProps {
  target: string;
  amount: Amount;
}

export class Payment implements Payable {
  readonly target: string;
  readonly amount: Amount;

  constructor(props: PaymentProps) {
    this.target = props.target;
    this.amount = props.amount;
  }

  isWellFormed(_config: ConsensusConfig): CheckResult {
    return checkPublicAddress(this.target, 'target').andThen(() => checkMinimumAmount(this.amount, ONE, 'amount'));
  }

  hasFee(): boolean {
    return true;
  }

  targetAddress(): string {
    return this.target;
  }

  getAmount(): Amount {
    return this.amount;
  }

  toJSON(): { target: string; amount: string } {
    return { target: this.target, amount: this.amount.toString() };
  }
}

export const PaymentSchema = z
  .object({
    target: z.string(),
    amount: AmountSchema,
  })
  .transform((fields) => new Payment(fields));
