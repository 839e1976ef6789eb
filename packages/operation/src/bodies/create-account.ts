import { AmountSchema, type Amount, type ConsensusConfig } from '@quorumledger/core';
import { ok } from 'neverthrow';
import { z } from 'zod';

import type { Payable } from '../body.js';

import { checkMinimumAmount, checkPublicAddress, type CheckResult } from './shared.js';

export interface CreateAccountProps {
  target: string;
  amount: Amount;
  /** Account that will be allowed to unfreeze the new one */
  linked?: string | undefined;
}

/**
 * Funds a new account. The initial balance must cover the base reserve.
 */
export class CreateAccount implements Payable {
  readonly target: string;
  readonly amount: Amount;
  readonly linked: string | undefined;

  constructor(props: CreateAccountProps) {
    this.target = props.target;
    this.amount = props.amount;
    this.linked = props.linked;
  }

  isWellFormed(config: ConsensusConfig): CheckResult {
    return checkPublicAddress(this.target, 'target')
      .andThen(() => (this.linked === undefined ? ok(undefined) : checkPublicAddress(this.linked, 'linked')))
      .andThen(() => checkMinimumAmount(this.amount, config.baseReserve, 'amount'));
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

  toJSON(): { target: string; amount: string; linked?: string } {
    return {
      target: this.target,
      amount: this.amount.toString(),
      ...(this.linked !== undefined ? { linked: this.linked } : {}),
    };
  }
}

export const CreateAccountSchema = z
  .object({
    target: z.string(),
    amount: AmountSchema,
    linked: z.string().optional(),
  })
  .transform((fields) => new CreateAccount(fields));
