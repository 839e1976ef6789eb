/**
 * Error hierarchy for the operation model.
 *
 * Every error carries a stable code so callers (the consensus checker, API
 * handlers) can branch on the failure kind without matching on messages.
 */

export interface DomainErrorContext {
  additionalContext?: Record<string, unknown> | undefined;
  operationType?: string | undefined;
}

/**
 * Base domain error
 */
export abstract class DomainError extends Error {
  abstract readonly code: string;
  abstract readonly severity: 'error' | 'warning';

  readonly timestamp: string;
  readonly operationType?: string | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(message: string, context?: DomainErrorContext) {
    super(message);
    this.timestamp = new Date().toISOString();
    this.operationType = context?.operationType;
    this.context = context?.additionalContext;
    this.name = this.constructor.name;
  }

  toJSON() {
    return {
      code: this.code,
      context: this.context,
      message: this.message,
      name: this.name,
      operationType: this.operationType,
      severity: this.severity,
      timestamp: this.timestamp,
    };
  }
}

/**
 * Raised when a payload is not one of the registered operation body variants.
 */
export class UnknownOperationTypeError extends DomainError {
  readonly code = 'UNKNOWN_OPERATION_TYPE';
  readonly severity = 'error' as const;

  constructor(
    public readonly variant: string,
    context?: DomainErrorContext
  ) {
    super(`Unknown operation type for body variant '${variant}'`, context);
  }
}

/**
 * Raised when a decoded envelope names a tag outside the registered set,
 * or when a decoded body does not belong to the tag that selected its decoder.
 */
export class InvalidOperationError extends DomainError {
  readonly code = 'INVALID_OPERATION';
  readonly severity = 'error' as const;

  constructor(
    public readonly tag: string,
    message?: string,
    context?: DomainErrorContext
  ) {
    super(message ?? `Invalid operation type '${tag}'`, { ...context, operationType: tag });
  }
}

export type DecodePhase = 'envelope' | 'body';

export interface DecodeIssue {
  message: string;
  path: (string | number)[];
}

/**
 * Structural decode failure. `phase` tells whether the envelope itself or the
 * tag-selected body was malformed.
 */
export class OperationDecodeError extends DomainError {
  readonly code = 'OPERATION_DECODE_ERROR';
  readonly severity = 'error' as const;

  constructor(
    public readonly phase: DecodePhase,
    message: string,
    public readonly issues: DecodeIssue[] = [],
    context?: DomainErrorContext
  ) {
    super(message, context);
  }
}

export type OperationValidationCode =
  | 'BAD_PUBLIC_ADDRESS'
  | 'OPERATION_AMOUNT_UNDERFLOW'
  | 'OPERATION_BODY_INSUFFICIENT'
  | 'INVALID_OPERATION_FIELD';

/**
 * Consensus self-check failure reported by an operation body.
 */
export class OperationValidationError extends DomainError {
  readonly severity = 'error' as const;

  constructor(
    public readonly code: OperationValidationCode,
    message: string,
    public readonly field?: string | undefined,
    context?: DomainErrorContext
  ) {
    super(message, context);
  }
}

/**
 * Invalid configuration value (environment or consensus settings)
 */
export class ConfigurationError extends DomainError {
  readonly code = 'CONFIGURATION_ERROR';
  readonly severity = 'error' as const;

  constructor(
    message: string,
    public readonly violations: string[] = [],
    context?: DomainErrorContext
  ) {
    super(message, context);
  }
}
