/**
 * DECISION ENGINE: Errors
 *
 * One class per rejection kind, plus the internal fault that wraps
 * anything the evaluator did not anticipate.
 */

// ════════════════════════════════════════════════════════════════════════════
// RULE CODES
// ════════════════════════════════════════════════════════════════════════════

const DECISION_RULE = {
  INVALID_IDENTITY_CODE: 'INVALID_IDENTITY_CODE',
  INVALID_LOAN_AMOUNT: 'INVALID_LOAN_AMOUNT',
  INVALID_LOAN_PERIOD: 'INVALID_LOAN_PERIOD',
  INVALID_AGE: 'INVALID_AGE',
  NO_VALID_LOAN: 'NO_VALID_LOAN',
  INTERNAL_FAULT: 'INTERNAL_FAULT'
} as const;

type DecisionRuleCode = typeof DECISION_RULE[keyof typeof DECISION_RULE];

/**
 * `rejection` covers the business outcomes; `fault` is a defect in the
 * evaluator or its inputs that no rule describes.
 */
type DecisionErrorKind = 'rejection' | 'fault';

// ════════════════════════════════════════════════════════════════════════════
// BASE CLASS
// ════════════════════════════════════════════════════════════════════════════

class DecisionError extends Error {
  constructor(
    message: string,
    public readonly code: DecisionRuleCode,
    public readonly kind: DecisionErrorKind,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'DecisionError';
  }
}

// ════════════════════════════════════════════════════════════════════════════
// REJECTIONS
// ════════════════════════════════════════════════════════════════════════════

class InvalidIdentityCodeError extends DecisionError {
  constructor(message = 'Invalid personal ID code.') {
    super(message, DECISION_RULE.INVALID_IDENTITY_CODE, 'rejection');
    this.name = 'InvalidIdentityCodeError';
  }
}

class InvalidLoanAmountError extends DecisionError {
  constructor(message: string) {
    super(message, DECISION_RULE.INVALID_LOAN_AMOUNT, 'rejection');
    this.name = 'InvalidLoanAmountError';
  }
}

class InvalidLoanPeriodError extends DecisionError {
  constructor(message: string) {
    super(message, DECISION_RULE.INVALID_LOAN_PERIOD, 'rejection');
    this.name = 'InvalidLoanPeriodError';
  }
}

class InvalidAgeError extends DecisionError {
  constructor(message: string) {
    super(message, DECISION_RULE.INVALID_AGE, 'rejection');
    this.name = 'InvalidAgeError';
  }
}

/**
 * Applicant has debt, or no period up to the maximum yields a passing score.
 */
class NoValidLoanError extends DecisionError {
  constructor(message: string) {
    super(message, DECISION_RULE.NO_VALID_LOAN, 'rejection');
    this.name = 'NoValidLoanError';
  }
}

// ════════════════════════════════════════════════════════════════════════════
// INTERNAL FAULT
// ════════════════════════════════════════════════════════════════════════════

class DecisionInternalError extends DecisionError {
  constructor(message: string, cause?: unknown) {
    super(message, DECISION_RULE.INTERNAL_FAULT, 'fault', { cause });
    this.name = 'DecisionInternalError';
  }
}

/**
 * Passes DecisionErrors through and wraps everything else as an internal
 * fault, so a stray exception never reads as a business rejection.
 */
function toDecisionError(error: unknown): DecisionError {
  if (error instanceof DecisionError) {
    return error;
  }
  const detail = error instanceof Error ? error.message : String(error);
  return new DecisionInternalError(`Unexpected evaluation failure: ${detail}`, error);
}

// ════════════════════════════════════════════════════════════════════════════
// EXPORTS
// ════════════════════════════════════════════════════════════════════════════

export {
  DECISION_RULE,
  DecisionRuleCode,
  DecisionErrorKind,
  DecisionError,
  InvalidIdentityCodeError,
  InvalidLoanAmountError,
  InvalidLoanPeriodError,
  InvalidAgeError,
  NoValidLoanError,
  DecisionInternalError,
  toDecisionError
};
