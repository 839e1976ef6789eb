import {
  formatZodIssues,
  fromZod,
  getErrorMessage,
  InvalidOperationError,
  OperationDecodeError,
  toDecodeIssues,
} from '@quorumledger/core';
import { getLogger } from '@quorumledger/logger';
import { err, ok, type Result } from 'neverthrow';
import { z, type ZodType, type ZodTypeDef } from 'zod';

import {
  CollectTxFeeSchema,
  CongressVotingResultSchema,
  CongressVotingSchema,
  CreateAccountSchema,
  InflationPFSchema,
  InflationSchema,
  PaymentSchema,
  UnfreezingRequestSchema,
  type OperationBodyMap,
} from './bodies/index.js';
import { Operation } from './operation.js';
import { resolveOperationType } from './operation-factory.js';
import { isValidOperationType, type OperationType } from './operation-type.js';

const logger = getLogger('OperationCodec');

type BodyDecoder<B> = ZodType<B, ZodTypeDef, unknown>;

/**
 * Operation type → body decoder. Like the factory table this is typed over
 * every OperationType, so a new type cannot be decoded until it is listed here.
 */
const BODY_DECODERS: { readonly [K in OperationType]: BodyDecoder<OperationBodyMap[K]> } = {
  'create-account': CreateAccountSchema,
  payment: PaymentSchema,
  'congress-voting': CongressVotingSchema,
  'congress-voting-result': CongressVotingResultSchema,
  'collect-tx-fee': CollectTxFeeSchema,
  inflation: InflationSchema,
  'unfreezing-request': UnfreezingRequestSchema,
  'inflation-pf': InflationPFSchema,
};

/**
 * First decode phase: the header is typed, the body is kept as an untyped
 * JSON tree until the tag picks its decoder.
 */
export const OperationEnvelopeSchema = z.object({
  H: z.object({
    type: z.string(),
  }),
  B: z.unknown(),
});

export type RawOperationEnvelope = z.infer<typeof OperationEnvelopeSchema>;

export type OperationCodecError = OperationDecodeError | InvalidOperationError;

/**
 * Serialize as `{"H":{"type":<tag>},"B":{<body fields>}}`.
 */
export function encodeOperation(operation: Operation): string {
  return JSON.stringify(operation);
}

export function encodeOperationToBytes(operation: Operation): Uint8Array {
  return new TextEncoder().encode(encodeOperation(operation));
}

/**
 * Envelope phase only. Fails on anything that is not JSON, not an object, or
 * lacks a string `H.type`.
 */
export function decodeEnvelope(data: string | Uint8Array): Result<RawOperationEnvelope, OperationDecodeError> {
  const text = typeof data === 'string' ? data : new TextDecoder().decode(data);

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    logger.debug({ error }, 'Operation envelope is not valid JSON');
    return err(new OperationDecodeError('envelope', `Malformed operation envelope: ${getErrorMessage(error)}`));
  }

  return fromZod(OperationEnvelopeSchema, parsed).mapErr((zodError) => {
    logger.debug({ issues: toDecodeIssues(zodError) }, 'Operation envelope has an invalid shape');
    return new OperationDecodeError(
      'envelope',
      `Malformed operation envelope: ${formatZodIssues(zodError)}`,
      toDecodeIssues(zodError)
    );
  });
}

/**
 * Dispatch phase: decode a raw body with the decoder registered for `type`.
 */
export function decodeOperationBody<T extends OperationType>(
  type: T,
  raw: unknown
): Result<OperationBodyMap[T], OperationDecodeError> {
  const decoder: BodyDecoder<OperationBodyMap[T]> = BODY_DECODERS[type];

  return fromZod(decoder, raw).mapErr((zodError) => {
    logger.debug({ type, issues: toDecodeIssues(zodError) }, 'Operation body does not match its type');
    return new OperationDecodeError(
      'body',
      `Malformed '${type}' operation body: ${formatZodIssues(zodError)}`,
      toDecodeIssues(zodError),
      { operationType: type }
    );
  });
}

/**
 * Two-phase decode. An unknown tag is rejected before the body is looked at;
 * on any failure no operation is produced.
 */
export function decodeOperation(data: string | Uint8Array): Result<Operation, OperationCodecError> {
  return decodeEnvelope(data).andThen((envelope): Result<Operation, OperationCodecError> => {
    const tag = envelope.H.type;
    if (!isValidOperationType(tag)) {
      logger.debug({ tag }, 'Rejected operation with unknown type');
      return err(new InvalidOperationError(tag));
    }

    return decodeOperationBody(tag, envelope.B).andThen((body): Result<Operation, OperationCodecError> => {
      // The decoder table is typed per tag; this guards the table's contents at runtime too.
      const resolved = resolveOperationType(body);
      if (resolved !== tag) {
        logger.error({ tag, resolved: resolved ?? null }, 'Decoder produced a body of the wrong class');
        return err(new InvalidOperationError(tag, `Decoded body is not a '${tag}' operation body`));
      }
      return ok(new Operation(tag, body));
    });
  });
}
