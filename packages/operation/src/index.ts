export * from './bodies/index.js';
export { isPayable, isTargetable, type Body, type Payable, type Targetable } from './body.js';
export { isOperationOfType, Operation, type Header, type OperationEnvelope } from './operation.js';
export {
  decodeEnvelope,
  decodeOperation,
  decodeOperationBody,
  encodeOperation,
  encodeOperationToBytes,
  OperationEnvelopeSchema,
  type OperationCodecError,
  type RawOperationEnvelope,
} from './operation-codec.js';
export { isBodyOfType, newOperation, resolveOperationType } from './operation-factory.js';
export {
  isNormalOperation,
  isValidOperationType,
  OPERATION_TYPES,
  OperationTypeSchema,
  type OperationType,
} from './operation-type.js';
