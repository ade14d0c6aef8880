export type LedgerErrorCode = 'validation' | 'not_found' | 'invariant';

export class LedgerError extends Error {
  readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Rejected input, such as a non-positive amount or an empty wallet name */
export class ValidationError extends LedgerError {
  constructor(message: string) {
    super('validation', message);
  }
}

/** Unknown wallet or transaction. Core lookups return null instead; callers raise this. */
export class NotFoundError extends LedgerError {
  constructor(message: string) {
    super('not_found', message);
  }
}

/**
 * A transfer link that should exist does not.
 * This is a defect signal, never a user error.
 */
export class InvariantViolation extends LedgerError {
  constructor(message: string) {
    super('invariant', message);
  }
}
