/**
 * DECISION ENGINE: Age Gate
 *
 * The applicant must be of age, and young enough that the loan ends
 * before the expected lifetime for their country.
 */

import {
  LOAN_LIMITS,
  EXPECTED_LIFETIME,
  DEFAULT_EXPECTED_LIFETIME
} from './EngineConstants';
import { InvalidAgeError, DecisionInternalError } from './EngineErrors';

// ════════════════════════════════════════════════════════════════════════════
// HELPERS
// ════════════════════════════════════════════════════════════════════════════

/**
 * Completed years between two dates, compared on UTC calendar fields.
 * Someone born on 29 February turns a year older on 1 March in common years.
 */
function wholeYearsBetween(from: Date, to: Date): number {
  let years = to.getUTCFullYear() - from.getUTCFullYear();

  const monthDiff = to.getUTCMonth() - from.getUTCMonth();
  if (monthDiff < 0 || (monthDiff === 0 && to.getUTCDate() < from.getUTCDate())) {
    years--;
  }

  return years;
}

/**
 * Expected lifetime for a country, case-insensitive. Unknown countries get
 * the default rather than an error.
 */
function lifeExpectancy(country: string): number {
  return EXPECTED_LIFETIME.get(country.toLowerCase()) ?? DEFAULT_EXPECTED_LIFETIME;
}

// ════════════════════════════════════════════════════════════════════════════
// GATE
// ════════════════════════════════════════════════════════════════════════════

/**
 * @throws InvalidAgeError if the applicant is underage, or older than the
 * country's expected lifetime minus the loan period in whole years
 */
function checkAge(birthDate: Date, loanPeriod: number, country: string, today: Date): void {
  if (Number.isNaN(today.getTime())) {
    throw new DecisionInternalError('Evaluation date is not a valid date.');
  }

  const age = wholeYearsBetween(birthDate, today);
  if (age < LOAN_LIMITS.MINIMUM_AGE) {
    throw new InvalidAgeError('Customer is underage and cannot receive a loan.');
  }

  const maxAcceptableAge = lifeExpectancy(country) - Math.floor(loanPeriod / 12);
  if (age > maxAcceptableAge) {
    throw new InvalidAgeError('Customer is too old to receive a loan for this period.');
  }
}

export { checkAge, wholeYearsBetween, lifeExpectancy };
