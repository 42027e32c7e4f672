import type { FieldIssue } from './types';

export type ShaftCalcErrorCode = 'INVALID_INPUT' | 'DOMAIN_ERROR';

export class ShaftCalcError extends Error {
  readonly code: ShaftCalcErrorCode;

  constructor(code: ShaftCalcErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Raised when a raw field is missing, non-numeric or below its declared bound. */
export class InvalidInputError extends ShaftCalcError {
  readonly issues: FieldIssue[];

  constructor(issues: FieldIssue[]) {
    super('INVALID_INPUT', issues.map((i) => `${i.field}: ${i.message}`).join('; ') || 'Invalid input');
    this.issues = issues;
  }
}

export class DomainError extends ShaftCalcError {
  constructor(message: string) {
    super('DOMAIN_ERROR', message);
  }
}
