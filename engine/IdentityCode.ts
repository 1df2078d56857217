/**
 * DECISION ENGINE: Identity Code
 *
 * Reads the Estonian personal identification code (isikukood):
 *
 *   G YY MM DD SSS C
 *
 * G is the gender/century digit, YYMMDD the birth date, SSS a serial
 * number and C a modulo-11 check digit. The last four digits (SSS + C)
 * also select the applicant's credit segment.
 */

import { CreditSegment } from './EngineTypes';
import { SEGMENT_THRESHOLDS } from './EngineConstants';
import { InvalidIdentityCodeError } from './EngineErrors';

// ════════════════════════════════════════════════════════════════════════════
// FORMAT
// ════════════════════════════════════════════════════════════════════════════

const IDENTITY_CODE_PATTERN = /^\d{11}$/;
const SEGMENT_SELECTOR_PATTERN = /^\d{4}$/;

/**
 * Century base year by gender/century digit. Odd digits are male,
 * even digits female.
 */
const CENTURY_BASE: Readonly<Record<string, number>> = {
  '1': 1800,
  '2': 1800,
  '3': 1900,
  '4': 1900,
  '5': 2000,
  '6': 2000
};

const CHECKSUM_WEIGHTS_FIRST = [1, 2, 3, 4, 5, 6, 7, 8, 9, 1];
const CHECKSUM_WEIGHTS_SECOND = [3, 4, 5, 6, 7, 8, 9, 1, 2, 3];

// ════════════════════════════════════════════════════════════════════════════
// SEGMENT
// ════════════════════════════════════════════════════════════════════════════

/**
 * The last four characters of the code as an integer.
 *
 * @throws InvalidIdentityCodeError if there are fewer than four characters
 * or they are not all digits
 */
function segmentSelector(code: string): number {
  const tail = code.slice(-4);
  if (code.length < 4 || !SEGMENT_SELECTOR_PATTERN.test(tail)) {
    throw new InvalidIdentityCodeError();
  }
  return parseInt(tail, 10);
}

function resolveSegment(selector: number): CreditSegment {
  let resolved = CreditSegment.DEBT;
  for (const { from, segment } of SEGMENT_THRESHOLDS) {
    if (selector >= from) {
      resolved = segment;
    }
  }
  return resolved;
}

// ════════════════════════════════════════════════════════════════════════════
// BIRTH DATE
// ════════════════════════════════════════════════════════════════════════════

/**
 * Builds a UTC date, or returns null when the fields do not name a real day
 * (Date.UTC silently rolls 2023-02-30 over to March).
 */
function calendarDate(year: number, month: number, day: number): Date | null {
  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return date;
}

function readBirthDate(code: string): Date | null {
  const base = CENTURY_BASE[code.charAt(0)];
  if (base === undefined) return null;

  const fields = [code.slice(1, 3), code.slice(3, 5), code.slice(5, 7)];
  if (!fields.every(f => /^\d{2}$/.test(f))) return null;

  const [yy, mm, dd] = fields.map(f => parseInt(f, 10));
  return calendarDate(base + yy, mm, dd);
}

/**
 * Birth date encoded in the first seven digits, at UTC midnight.
 *
 * @throws InvalidIdentityCodeError on an unmapped century digit or a date
 * that does not exist
 */
function birthDate(code: string): Date {
  const date = readBirthDate(code);
  if (!date) {
    throw new InvalidIdentityCodeError('Invalid personal ID format.');
  }
  return date;
}

// ════════════════════════════════════════════════════════════════════════════
// CHECKSUM
// ════════════════════════════════════════════════════════════════════════════

function weightedRemainder(digits: number[], weights: number[]): number {
  let sum = 0;
  for (let i = 0; i < weights.length; i++) {
    sum += digits[i] * weights[i];
  }
  return sum % 11;
}

/**
 * Check digit for the first ten digits. A remainder of 10 retries with the
 * second weight set; a second 10 yields 0.
 */
function checkDigit(digits: number[]): number {
  const first = weightedRemainder(digits, CHECKSUM_WEIGHTS_FIRST);
  if (first < 10) return first;

  const second = weightedRemainder(digits, CHECKSUM_WEIGHTS_SECOND);
  return second < 10 ? second : 0;
}

function isValidIdentityCode(code: string): boolean {
  if (!IDENTITY_CODE_PATTERN.test(code)) return false;
  if (readBirthDate(code) === null) return false;

  const digits = code.split('').map(c => parseInt(c, 10));
  return checkDigit(digits) === digits[10];
}

// ════════════════════════════════════════════════════════════════════════════
// EXPORTS
// ════════════════════════════════════════════════════════════════════════════

export {
  segmentSelector,
  resolveSegment,
  birthDate,
  checkDigit,
  isValidIdentityCode
};
