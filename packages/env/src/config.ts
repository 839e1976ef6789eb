import { ConfigurationError, ConsensusConfigSchema, PublicAddressSchema, type ConsensusConfig } from '@quorumledger/core';
import { getLogger } from '@quorumledger/logger';
import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

const logger = getLogger('env');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

/** Smallest balance a new account may be created with, in base units */
export const DEFAULT_BASE_RESERVE = '1000000';

const consensusEnvSchema = z.object({
  CONSENSUS_BASE_RESERVE: z
    .string()
    .trim()
    .regex(/^\d+$/, 'Must be a non-negative integer')
    .default(DEFAULT_BASE_RESERVE),
  CONSENSUS_COMMON_ACCOUNT_ADDRESS: z
    .string()
    .trim()
    .transform((val) => (val === '' ? undefined : val))
    .pipe(PublicAddressSchema.optional())
    .optional(),
});

type ValidatedEnv = z.infer<typeof envSchema>;

let validatedEnv: ValidatedEnv | undefined;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((e) => `${e.path.join('.')}: ${e.message}`);
}

/**
 * Validates NODE_ENV on first access and caches the result.
 * @throws ConfigurationError if validation fails
 */
function validateEnv(): ValidatedEnv {
  if (!validatedEnv) {
    const result = envSchema.safeParse(process.env);
    if (!result.success) {
      const violations = formatIssues(result.error);
      throw new ConfigurationError(`Environment validation failed:\n  - ${violations.join('\n  - ')}`, violations);
    }
    validatedEnv = result.data;
  }
  return validatedEnv;
}

/**
 * Get the current NODE_ENV value.
 */
export function getNodeEnv(): ValidatedEnv['NODE_ENV'] {
  return validateEnv().NODE_ENV;
}

export function isTest(): boolean {
  return getNodeEnv() === 'test';
}

/**
 * Build the consensus configuration handed to operation bodies.
 *
 * Reads CONSENSUS_BASE_RESERVE and CONSENSUS_COMMON_ACCOUNT_ADDRESS. Unlike
 * NODE_ENV this is not cached: callers load it once at startup and pass the
 * value down.
 */
export function loadConsensusConfig(env: NodeJS.ProcessEnv = process.env): Result<ConsensusConfig, ConfigurationError> {
  const parsedEnv = consensusEnvSchema.safeParse(env);
  if (!parsedEnv.success) {
    const violations = formatIssues(parsedEnv.error);
    logger.error({ violations }, 'Invalid consensus configuration');
    return err(new ConfigurationError(`Consensus configuration is invalid: ${violations.join('; ')}`, violations));
  }

  const parsedConfig = ConsensusConfigSchema.safeParse({
    baseReserve: parsedEnv.data.CONSENSUS_BASE_RESERVE,
    commonAccountAddress: parsedEnv.data.CONSENSUS_COMMON_ACCOUNT_ADDRESS,
  });
  if (!parsedConfig.success) {
    const violations = formatIssues(parsedConfig.error);
    return err(new ConfigurationError(`Consensus configuration is invalid: ${violations.join('; ')}`, violations));
  }

  logger.debug(
    {
      baseReserve: parsedConfig.data.baseReserve.toString(),
      commonAccountAddress: parsedConfig.data.commonAccountAddress ?? null,
    },
    'Loaded consensus configuration'
  );
  return ok(parsedConfig.data);
}
