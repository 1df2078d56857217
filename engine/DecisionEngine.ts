/**
 * DECISION ENGINE: Evaluator
 *
 * Single entry point for a loan decision. Stages run in a fixed order and
 * the first failure is the one reported:
 * 1. segment resolution (debt is rejected here)
 * 2. input validation (code, amount, period)
 * 3. age gate
 * 4. scoring, with the alternative-period search when needed
 *
 * Each call is one synchronous pass over its arguments and the constant
 * tables; the credit modifier lives only in this call's stack.
 */

import { Decision, LoanEvaluator } from './EngineTypes';
import { CREDIT_MODIFIERS } from './EngineConstants';
import { NoValidLoanError, toDecisionError } from './EngineErrors';
import { segmentSelector, resolveSegment, birthDate } from './IdentityCode';
import { validateInputs } from './InputValidator';
import { checkAge } from './AgeGate';
import { scoreLoan } from './CreditScorer';

function decide(
  identityCode: string,
  requestedAmount: number,
  requestedPeriod: number,
  country: string,
  today: Date
): Decision {
  const segment = resolveSegment(segmentSelector(identityCode));
  const creditModifier = CREDIT_MODIFIERS[segment];
  if (creditModifier === 0) {
    throw new NoValidLoanError('Loan denied due to existing debt.');
  }

  validateInputs(identityCode, requestedAmount, requestedPeriod);
  checkAge(birthDate(identityCode), requestedPeriod, country, today);

  return scoreLoan(creditModifier, requestedAmount, requestedPeriod);
}

/**
 * Evaluates a loan request.
 *
 * @param today - Reference date for the age gate (default: now)
 * @throws InvalidIdentityCodeError, InvalidLoanAmountError,
 * InvalidLoanPeriodError, InvalidAgeError or NoValidLoanError on rejection
 * @throws DecisionInternalError on any unanticipated failure
 */
const evaluate: LoanEvaluator = (
  identityCode,
  requestedAmount,
  requestedPeriod,
  country,
  today = new Date()
) => {
  try {
    return decide(identityCode, requestedAmount, requestedPeriod, country, today);
  } catch (error) {
    throw toDecisionError(error);
  }
};

export { evaluate };
