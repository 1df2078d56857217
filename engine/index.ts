/**
 * DECISION ENGINE
 *
 * Barrel export for the loan decision engine.
 */

export { evaluate } from './DecisionEngine';
export { CreditSegment, Decision, LoanEvaluator } from './EngineTypes';
export {
  LOAN_LIMITS,
  CREDIT_MODIFIERS,
  EXPECTED_LIFETIME,
  DEFAULT_EXPECTED_LIFETIME
} from './EngineConstants';
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
} from './EngineErrors';
export { segmentSelector, resolveSegment, birthDate, isValidIdentityCode } from './IdentityCode';
export { validateInputs } from './InputValidator';
export { checkAge, wholeYearsBetween, lifeExpectancy } from './AgeGate';
export { creditScore, findAlternativeLoan, scoreLoan } from './CreditScorer';
