/**
 * DECISION ENGINE: Credit Scorer
 *
 * Scores the requested terms and, when they fall short, looks for the
 * shortest longer period that the segment can support.
 *
 * The modifier is always passed in; nothing here keeps state between calls.
 */

import { Decision } from './EngineTypes';
import { LOAN_LIMITS } from './EngineConstants';
import { NoValidLoanError } from './EngineErrors';

/**
 * `(modifier / amount) * period / 10`. The operation order matters: the
 * boundary cases land exactly on the 0.1 threshold.
 */
function creditScore(creditModifier: number, loanAmount: number, loanPeriod: number): number {
  return (creditModifier / loanAmount) * loanPeriod / 10;
}

/**
 * Largest amount the modifier supports over the period, uncapped.
 */
function supportedAmount(creditModifier: number, loanPeriod: number): number {
  return creditModifier * loanPeriod;
}

/**
 * Walks periods after the requested one in ascending order; the first that
 * reaches the minimum amount and the score threshold wins.
 *
 * The amount returned here is not capped at MAXIMUM_LOAN_AMOUNT, unlike the
 * direct approval path.
 *
 * @throws NoValidLoanError if no period up to MAXIMUM_LOAN_PERIOD qualifies
 */
function findAlternativeLoan(creditModifier: number, requestedPeriod: number): Decision {
  const { MINIMUM_LOAN_AMOUNT, MAXIMUM_LOAN_PERIOD, CREDIT_SCORE_THRESHOLD } = LOAN_LIMITS;

  for (let period = requestedPeriod + 1; period <= MAXIMUM_LOAN_PERIOD; period++) {
    const amount = supportedAmount(creditModifier, period);
    if (
      amount >= MINIMUM_LOAN_AMOUNT &&
      creditScore(creditModifier, amount, period) >= CREDIT_SCORE_THRESHOLD
    ) {
      return { approvedAmount: amount, approvedPeriod: period };
    }
  }

  throw new NoValidLoanError('No valid loan found within the allowed period.');
}

/**
 * Approves the requested period when it scores, otherwise searches longer
 * periods. The modifier must be non-zero; debt is rejected upstream.
 */
function scoreLoan(creditModifier: number, requestedAmount: number, requestedPeriod: number): Decision {
  const score = creditScore(creditModifier, requestedAmount, requestedPeriod);

  if (score < LOAN_LIMITS.CREDIT_SCORE_THRESHOLD) {
    return findAlternativeLoan(creditModifier, requestedPeriod);
  }

  return {
    approvedAmount: Math.min(
      LOAN_LIMITS.MAXIMUM_LOAN_AMOUNT,
      supportedAmount(creditModifier, requestedPeriod)
    ),
    approvedPeriod: requestedPeriod
  };
}

export { creditScore, supportedAmount, findAlternativeLoan, scoreLoan };
