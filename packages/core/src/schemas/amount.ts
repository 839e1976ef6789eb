import { z } from 'zod';

import { Amount } from '../value-objects/amount.js';

// Amount schema - accepts an integer string, a non-negative safe integer number
// or an Amount instance, transforms to Amount. Wire payloads carry strings;
// numbers are accepted for hand-written fixtures and configuration.
export const AmountSchema = z
  .union([
    z.string().regex(/^\d+$/, 'Amount must be a non-negative integer string'),
    z.number().int().nonnegative().safe(),
    z.custom<Amount>((data) => data instanceof Amount, { message: `Input not instance of ${Amount.name}` }),
  ])
  .transform((val, ctx) => {
    if (val instanceof Amount) {
      return val;
    }

    const result = Amount.tryCreate(val);
    if (result.isErr()) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: result.error.message });
      return z.NEVER;
    }
    return result.value;
  });
