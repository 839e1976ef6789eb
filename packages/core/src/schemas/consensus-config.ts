import { z } from 'zod';

import { PublicAddressSchema } from './address.js';
import { AmountSchema } from './amount.js';

/**
 * Consensus settings handed to every operation body's self-check.
 *
 * - baseReserve: minimum balance a newly created account must be funded with
 * - commonAccountAddress: when set, system operations (fee collection,
 *   inflation) must target this account
 */
export const ConsensusConfigSchema = z.object({
  baseReserve: AmountSchema,
  commonAccountAddress: PublicAddressSchema.optional(),
});

export type ConsensusConfig = z.infer<typeof ConsensusConfigSchema>;
