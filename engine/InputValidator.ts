/**
 * DECISION ENGINE: Input Validator
 *
 * Structural and range checks on the request, run before the age gate
 * and scoring. The first failing check wins:
 * 1. personal code
 * 2. loan amount
 * 3. loan period
 */

import { LOAN_LIMITS } from './EngineConstants';
import {
  InvalidIdentityCodeError,
  InvalidLoanAmountError,
  InvalidLoanPeriodError
} from './EngineErrors';
import { isValidIdentityCode } from './IdentityCode';

function isWithin(value: number, min: number, max: number): boolean {
  return Number.isInteger(value) && value >= min && value <= max;
}

/**
 * @throws InvalidIdentityCodeError if the code fails the format or checksum rule
 * @throws InvalidLoanAmountError if the amount is not an integer within bounds
 * @throws InvalidLoanPeriodError if the period is not an integer within bounds
 */
function validateInputs(code: string, loanAmount: number, loanPeriod: number): void {
  const {
    MINIMUM_LOAN_AMOUNT,
    MAXIMUM_LOAN_AMOUNT,
    MINIMUM_LOAN_PERIOD,
    MAXIMUM_LOAN_PERIOD
  } = LOAN_LIMITS;

  if (!isValidIdentityCode(code)) {
    throw new InvalidIdentityCodeError();
  }

  if (!isWithin(loanAmount, MINIMUM_LOAN_AMOUNT, MAXIMUM_LOAN_AMOUNT)) {
    throw new InvalidLoanAmountError(
      `Loan amount must be between €${MINIMUM_LOAN_AMOUNT} and €${MAXIMUM_LOAN_AMOUNT}.`
    );
  }

  if (!isWithin(loanPeriod, MINIMUM_LOAN_PERIOD, MAXIMUM_LOAN_PERIOD)) {
    throw new InvalidLoanPeriodError(
      `Loan period must be between ${MINIMUM_LOAN_PERIOD} and ${MAXIMUM_LOAN_PERIOD} months.`
    );
  }
}

export { validateInputs };
