import type { ConsensusConfig } from '@quorumledger/core';
import { ok } from 'neverthrow';
import { z } from 'zod';

import type { Body } from '../body.js';

import type { CheckResult } from './shared.js';

/**
 * Asks to release a frozen account's balance. Carries no fields: the source
 * account of the transaction is the account being unfrozen.
 */
export class UnfreezingRequest implements Body {
  isWellFormed(_config: ConsensusConfig): CheckResult {
    return ok(undefined);
  }

  hasFee(): boolean {
    return true;
  }

  toJSON(): Record<string, never> {
    return {};
  }
}

// `null` decodes like an empty body; a missing body is still rejected.
export const UnfreezingRequestSchema = z
  .object({})
  .nullable()
  .transform(() => new UnfreezingRequest());
