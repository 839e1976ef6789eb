import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import type { ZodError, ZodType, ZodTypeDef } from 'zod';

import type { DecodeIssue } from '../errors/index.js';

/**
 * Validates an input against a Zod schema and returns a neverthrow Result.
 *
 * @param schema The Zod schema to validate against.
 * @param input The unknown input to validate.
 * @returns An Ok(T) with the parsed data if successful, otherwise an Err(ZodError).
 */
export function fromZod<T>(schema: ZodType<T, ZodTypeDef, unknown>, input: unknown): Result<T, ZodError> {
  const parsed = schema.safeParse(input);
  return parsed.success ? ok(parsed.data) : err(parsed.error);
}

/**
 * Flatten zod issues into path/message pairs for error payloads.
 */
export function toDecodeIssues(error: ZodError): DecodeIssue[] {
  return error.issues.map((issue) => ({ message: issue.message, path: issue.path }));
}

/**
 * One-line summary such as `amount: Expected number, received boolean; target: Required`
 */
export function formatZodIssues(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
