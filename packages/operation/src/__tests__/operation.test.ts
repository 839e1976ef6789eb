import { Amount, OperationValidationError } from '@quorumledger/core';
import { err, ok } from 'neverthrow';
import { afterEach, describe, expect, it, vi } from 'vitest';

import { Payment } from '../bodies/index.js';
import { newOperation } from '../operation-factory.js';
import { OPERATION_TYPES } from '../operation-type.js';
import { isOperationOfType, Operation } from '../operation.js';

import { BOB, sampleBodies, testConfig } from './test-utils.js';

describe('Operation', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should return the body result from isWellFormed with the config passed through', () => {
    const body = new Payment({ target: BOB, amount: Amount.create(10) });
    const failure = new OperationValidationError('INVALID_OPERATION_FIELD', 'stubbed failure', 'target');
    const isWellFormed = vi.spyOn(body, 'isWellFormed').mockReturnValue(err(failure));
    const operation = new Operation('payment', body);

    const result = operation.isWellFormed(testConfig);

    expect(isWellFormed).toHaveBeenCalledOnce();
    expect(isWellFormed).toHaveBeenCalledWith(testConfig);
    expect(isWellFormed.mock.calls[0]?.[0]).toBe(testConfig);
    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toBe(failure);
    }
  });

  it('should return success when the body reports success', () => {
    const body = new Payment({ target: 'anything', amount: Amount.zero() });
    vi.spyOn(body, 'isWellFormed').mockReturnValue(ok(undefined));

    expect(new Operation('payment', body).isWellFormed(testConfig).isOk()).toBe(true);
  });

  it('should return the body fee flag from hasFee', () => {
    const body = new Payment({ target: BOB, amount: Amount.create(10) });
    const hasFee = vi.spyOn(body, 'hasFee').mockReturnValueOnce(false).mockReturnValueOnce(true);
    const operation = new Operation('payment', body);

    expect(operation.hasFee()).toBe(false);
    expect(operation.hasFee()).toBe(true);
    expect(hasFee).toHaveBeenCalledTimes(2);
  });

  it('should delegate to every body variant', () => {
    const bodies = sampleBodies();
    const expectedFees = {
      'create-account': true,
      payment: true,
      'congress-voting': true,
      'congress-voting-result': true,
      'collect-tx-fee': false,
      inflation: false,
      'unfreezing-request': true,
      'inflation-pf': false,
    };

    for (const type of OPERATION_TYPES) {
      const result = newOperation(bodies[type]);
      expect(result.isOk()).toBe(true);
      if (result.isOk()) {
        expect(result.value.hasFee()).toBe(expectedFees[type]);
        expect(result.value.isWellFormed(testConfig).isOk()).toBe(true);
      }
    }
  });

  it('should be immutable', () => {
    const operation = new Operation('payment', new Payment({ target: BOB, amount: Amount.create(1) }));

    expect(Object.isFrozen(operation)).toBe(true);
    expect(Object.isFrozen(operation.header)).toBe(true);
  });

  it('should render as indented JSON', () => {
    const operation = new Operation('payment', new Payment({ target: BOB, amount: Amount.create(1) }));

    expect(operation.toString()).toBe(
      ['{', '  "H": {', '    "type": "payment"', '  },', '  "B": {', `    "target": "${BOB}",`, '    "amount": "1"', '  }', '}'].join(
        '\n'
      )
    );
  });

  it('should narrow by type', () => {
    const operation: Operation = new Operation('payment', new Payment({ target: BOB, amount: Amount.create(3) }));

    expect(isOperationOfType(operation, 'inflation')).toBe(false);
    expect(isOperationOfType(operation, 'payment')).toBe(true);
    if (isOperationOfType(operation, 'payment')) {
      expect(operation.body.getAmount().toString()).toBe('3');
      expect(operation.type).toBe('payment');
    }
  });
});
