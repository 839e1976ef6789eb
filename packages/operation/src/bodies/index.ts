import type { OperationType } from '../operation-type.js';

import type { CollectTxFee } from './collect-tx-fee.js';
import type { CongressVotingResult } from './congress-voting-result.js';
import type { CongressVoting } from './congress-voting.js';
import type { CreateAccount } from './create-account.js';
import type { InflationPF } from './inflation-pf.js';
import type { Inflation } from './inflation.js';
import type { Payment } from './payment.js';
import type { UnfreezingRequest } from './unfreezing-request.js';

export * from './collect-tx-fee.js';
export * from './congress-voting-result.js';
export * from './congress-voting.js';
export * from './create-account.js';
export * from './inflation-pf.js';
export * from './inflation.js';
export * from './payment.js';
export * from './unfreezing-request.js';

/**
 * Concrete body class carried by each operation type
 */
export interface OperationBodyMap {
  'create-account': CreateAccount;
  payment: Payment;
  'congress-voting': CongressVoting;
  'congress-voting-result': CongressVotingResult;
  'collect-tx-fee': CollectTxFee;
  inflation: Inflation;
  'unfreezing-request': UnfreezingRequest;
  'inflation-pf': InflationPF;
}

export type OperationBody = OperationBodyMap[OperationType];
