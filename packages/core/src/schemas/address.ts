import { z } from 'zod';

/**
 * Public account address: `G` followed by 55 base32 characters.
 */
export const PublicAddressSchema = z.string().regex(/^G[A-Z2-7]{55}$/, 'Invalid public address');

export function isValidPublicAddress(value: string): boolean {
  return PublicAddressSchema.safeParse(value).success;
}
