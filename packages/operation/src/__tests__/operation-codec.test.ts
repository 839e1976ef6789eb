import { Amount, InvalidOperationError, OperationDecodeError } from '@quorumledger/core';
import { afterEach, describe, expect, it, vi } from 'vitest';

import {
  CollectTxFeeSchema,
  CongressVotingResultSchema,
  CongressVotingSchema,
  CreateAccount,
  CreateAccountSchema,
  InflationPFSchema,
  InflationSchema,
  Payment,
  PaymentSchema,
  UnfreezingRequest,
  UnfreezingRequestSchema,
} from '../bodies/index.js';
import { isPayable, type Body } from '../body.js';
import {
  decodeEnvelope,
  decodeOperation,
  decodeOperationBody,
  encodeOperation,
  encodeOperationToBytes,
} from '../operation-codec.js';
import { newOperation } from '../operation-factory.js';
import { OPERATION_TYPES } from '../operation-type.js';
import type { Operation } from '../operation.js';

import { ALICE, BOB, COMMON_ACCOUNT, sampleBodies } from './test-utils.js';

function operationOf(body: Body): Operation {
  const result = newOperation(body);
  if (result.isErr()) {
    throw result.error;
  }
  return result.value;
}

describe('encodeOperation', () => {
  it('should wrap the body fields in an H/B envelope', () => {
    const operation = operationOf(new Payment({ target: BOB, amount: Amount.create(250) }));

    expect(encodeOperation(operation)).toBe(`{"H":{"type":"payment"},"B":{"target":"${BOB}","amount":"250"}}`);
  });

  it('should use each body wire layout', () => {
    const bodies = sampleBodies();

    expect(JSON.parse(encodeOperation(operationOf(bodies['collect-tx-fee'])))).toEqual({
      H: { type: 'collect-tx-fee' },
      B: {
        target: COMMON_ACCOUNT,
        amount: '30000',
        txs: 3,
        'block-height': 12,
        'block-hash': 'block-hash-12',
        'total-txs': 40,
        'total-ops': 55,
      },
    });
    expect(JSON.parse(encodeOperation(operationOf(bodies['congress-voting'])))).toEqual({
      H: { type: 'congress-voting' },
      B: {
        contract: 'ZnVuZCB0aGUgYnJpZGdl',
        voting: { start: 100, end: 200 },
        funding_address: ALICE,
        amount: '5000',
      },
    });
    expect(JSON.parse(encodeOperation(operationOf(bodies['inflation-pf'])))).toEqual({
      H: { type: 'inflation-pf' },
      B: { funding_address: ALICE, amount: '5000', voting_result: 'result-hash' },
    });
    expect(encodeOperation(operationOf(bodies['unfreezing-request']))).toBe(
      '{"H":{"type":"unfreezing-request"},"B":{}}'
    );
  });

  it('should omit an absent linked account', () => {
    const operation = operationOf(new CreateAccount({ target: BOB, amount: Amount.create(1000) }));

    expect(encodeOperation(operation)).toBe(`{"H":{"type":"create-account"},"B":{"target":"${BOB}","amount":"1000"}}`);
  });

  it('should encode to UTF-8 bytes', () => {
    const operation = operationOf(new Payment({ target: BOB, amount: Amount.create(1) }));

    expect(new TextDecoder().decode(encodeOperationToBytes(operation))).toBe(encodeOperation(operation));
  });
});

describe('decodeOperation', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should round-trip every operation type', () => {
    const bodies = sampleBodies();

    for (const type of OPERATION_TYPES) {
      const operation = operationOf(bodies[type]);
      const decoded = decodeOperation(encodeOperation(operation));

      expect(decoded.isOk()).toBe(true);
      if (decoded.isOk()) {
        expect(decoded.value).toEqual(operation);
        expect(decoded.value.body).toBeInstanceOf(bodies[type].constructor);
        expect(encodeOperation(decoded.value)).toBe(encodeOperation(operation));
      }
    }
  });

  it('should decode a payment scenario', () => {
    const encoded = encodeOperation(operationOf(new Payment({ target: 'GABC...', amount: Amount.create(100) })));

    const result = decodeOperation(encoded);

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      const { header, body } = result.value;
      expect(header.type).toBe('payment');
      expect(isPayable(body)).toBe(true);
      if (isPayable(body)) {
        expect(body.getAmount().equals(Amount.create(100))).toBe(true);
        expect(body.targetAddress()).toBe('GABC...');
      }
    }
  });

  it('should decode from bytes', () => {
    const bytes = new TextEncoder().encode(`{"H":{"type":"payment"},"B":{"target":"${BOB}","amount":"7"}}`);

    const result = decodeOperation(bytes);

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.body).toEqual(new Payment({ target: BOB, amount: Amount.create(7) }));
    }
  });

  it('should accept numeric amounts and ignore unknown body fields', () => {
    const result = decodeOperation(`{"H":{"type":"payment"},"B":{"target":"${BOB}","amount":7,"memo":"x"}}`);

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(encodeOperation(result.value)).toBe(`{"H":{"type":"payment"},"B":{"target":"${BOB}","amount":"7"}}`);
    }
  });

  it('should reject an unknown tag without decoding the body', () => {
    const decoders: { safeParse: (data: unknown) => unknown }[] = [
      CreateAccountSchema,
      PaymentSchema,
      CongressVotingSchema,
      CongressVotingResultSchema,
      CollectTxFeeSchema,
      InflationSchema,
      UnfreezingRequestSchema,
      InflationPFSchema,
    ];
    const spies = decoders.map((decoder) => vi.spyOn(decoder, 'safeParse'));

    const result = decodeOperation(`{"H":{"type":"transfer"},"B":{"target":"${BOB}","amount":"7"}}`);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toBeInstanceOf(InvalidOperationError);
      expect(result.error.code).toBe('INVALID_OPERATION');
      expect(result.error.message).toBe("Invalid operation type 'transfer'");
    }
    for (const spy of spies) {
      expect(spy).not.toHaveBeenCalled();
    }
  });

  it('should treat tags case-sensitively', () => {
    const result = decodeOperation(`{"H":{"type":"Payment"},"B":{"target":"${BOB}","amount":"7"}}`);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toBeInstanceOf(InvalidOperationError);
    }
  });

  it('should reject a body that does not match the tag', () => {
    const result = decodeOperation(`{"H":{"type":"payment"},"B":{"target":"${BOB}","amount":true}}`);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toBeInstanceOf(OperationDecodeError);
      if (result.error instanceof OperationDecodeError) {
        expect(result.error.phase).toBe('body');
        expect(result.error.operationType).toBe('payment');
        expect(result.error.issues.map((issue) => issue.path)).toEqual([['amount']]);
      }
    }
  });

  it('should reject a body decoded with another type layout', () => {
    const paymentBody = `{"target":"${BOB}","amount":"7"}`;

    const result = decodeOperation(`{"H":{"type":"inflation-pf"},"B":${paymentBody}}`);

    expect(result.isErr()).toBe(true);
    if (result.isErr() && result.error instanceof OperationDecodeError) {
      expect(result.error.phase).toBe('body');
      expect(result.error.message).toBe(
        "Malformed 'inflation-pf' operation body: funding_address: Required; voting_result: Required"
      );
    }
  });

  it('should reject negative and fractional amounts as structural errors', () => {
    for (const amount of ['"-1"', '"1.5"', '-1', '1.5']) {
      const result = decodeOperation(`{"H":{"type":"payment"},"B":{"target":"${BOB}","amount":${amount}}}`);

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error).toBeInstanceOf(OperationDecodeError);
      }
    }
  });

  it('should reject numbers that cannot be carried exactly', () => {
    const unsafeAmount = decodeOperation(`{"H":{"type":"payment"},"B":{"target":"${BOB}","amount":9007199254740993}}`);
    const collectTxFee = {
      target: COMMON_ACCOUNT,
      amount: '30000',
      txs: 3,
      'block-height': 12,
      'block-hash': 'block-hash-12',
      'total-txs': 40,
      'total-ops': 55,
    };
    const unsafeHeight = decodeOperation(
      JSON.stringify({ H: { type: 'collect-tx-fee' }, B: collectTxFee }).replace(
        '"block-height":12',
        '"block-height":18446744073709551615'
      )
    );

    for (const [result, path] of [
      [unsafeAmount, ['amount']],
      [unsafeHeight, ['block-height']],
    ] as const) {
      expect(result.isErr()).toBe(true);
      if (result.isErr() && result.error instanceof OperationDecodeError) {
        expect(result.error.phase).toBe('body');
        expect(result.error.issues.map((issue) => issue.path)).toEqual([path]);
      }
    }
  });

  it('should reject amounts above the unsigned 64-bit range', () => {
    const result = decodeOperation(
      `{"H":{"type":"payment"},"B":{"target":"${BOB}","amount":"${'9'.repeat(60)}"}}`
    );

    expect(result.isErr()).toBe(true);
    if (result.isErr() && result.error instanceof OperationDecodeError) {
      expect(result.error.phase).toBe('body');
      expect(result.error.issues).toEqual([
        { message: `Amount exceeds the maximum of 18446744073709551615, got ${'9'.repeat(60)}`, path: ['amount'] },
      ]);
    }
  });

  it('should keep the largest unsigned 64-bit amount exact', () => {
    const encoded = `{"H":{"type":"payment"},"B":{"target":"${BOB}","amount":"18446744073709551615"}}`;

    const result = decodeOperation(encoded);

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(encodeOperation(result.value)).toBe(encoded);
    }
  });

  it('should reject a decoded body whose class does not belong to the tag', () => {
    class ForwardedPayment extends Payment {}
    vi.spyOn(PaymentSchema, 'safeParse').mockReturnValueOnce({
      success: true,
      data: new ForwardedPayment({ target: BOB, amount: Amount.create(7) }),
    });

    const result = decodeOperation(`{"H":{"type":"payment"},"B":{"target":"${BOB}","amount":"7"}}`);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toBeInstanceOf(InvalidOperationError);
      expect(result.error.message).toBe("Decoded body is not a 'payment' operation body");
    }
  });

  it('should decode a null unfreezing request body as an empty one', () => {
    const result = decodeOperation('{"H":{"type":"unfreezing-request"},"B":null}');

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.body).toBeInstanceOf(UnfreezingRequest);
      expect(encodeOperation(result.value)).toBe('{"H":{"type":"unfreezing-request"},"B":{}}');
    }
  });

  it('should reject a missing unfreezing request body', () => {
    const result = decodeOperation('{"H":{"type":"unfreezing-request"}}');

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toBeInstanceOf(OperationDecodeError);
    }
  });

  it('should reject a missing body for a type with fields', () => {
    const result = decodeOperation('{"H":{"type":"payment"}}');

    expect(result.isErr()).toBe(true);
    if (result.isErr() && result.error instanceof OperationDecodeError) {
      expect(result.error.phase).toBe('body');
      expect(result.error.issues).toEqual([{ message: 'Required', path: [] }]);
    }
  });

  it('should reject malformed envelopes', () => {
    for (const input of ['not json', '[]', '"payment"', 'null', '{"B":{}}', '{"H":{"type":1},"B":{}}', '{"H":{}}']) {
      const result = decodeOperation(input);

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error).toBeInstanceOf(OperationDecodeError);
        if (result.error instanceof OperationDecodeError) {
          expect(result.error.phase).toBe('envelope');
        }
      }
    }
  });
});

describe('decodeEnvelope', () => {
  it('should keep the body as an untyped tree', () => {
    const result = decodeEnvelope('{"H":{"type":"anything"},"B":{"nested":[1,2]}}');

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value).toEqual({ H: { type: 'anything' }, B: { nested: [1, 2] } });
    }
  });

  it('should report JSON syntax errors', () => {
    const result = decodeEnvelope('{"H":');

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toMatch(/^Malformed operation envelope: /);
      expect(result.error.issues).toEqual([]);
    }
  });

  it('should point at the missing header', () => {
    const result = decodeEnvelope('{"B":{}}');

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe('Malformed operation envelope: H: Required');
    }
  });
});

describe('decodeOperationBody', () => {
  it('should decode a raw body for a known type', () => {
    const result = decodeOperationBody('inflation-pf', {
      funding_address: ALICE,
      amount: '5000',
      voting_result: 'result-hash',
    });

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.fundingAddress).toBe(ALICE);
      expect(result.value.votingResult).toBe('result-hash');
      expect(result.value.hasFee()).toBe(false);
    }
  });
});
