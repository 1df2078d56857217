/**
 * DECISION ENGINE: Constants
 *
 * Static limits used by every evaluation. Read-only for the process lifetime.
 */

import { CreditSegment } from './EngineTypes';

// ════════════════════════════════════════════════════════════════════════════
// LOAN LIMITS
// ════════════════════════════════════════════════════════════════════════════

const LOAN_LIMITS = {
  MINIMUM_LOAN_AMOUNT: 2000,
  MAXIMUM_LOAN_AMOUNT: 10000,
  MINIMUM_LOAN_PERIOD: 12,
  MAXIMUM_LOAN_PERIOD: 48,
  MINIMUM_AGE: 18,
  CREDIT_SCORE_THRESHOLD: 0.1
} as const;

// ════════════════════════════════════════════════════════════════════════════
// SEGMENTS
// ════════════════════════════════════════════════════════════════════════════

const CREDIT_MODIFIERS: Readonly<Record<CreditSegment, number>> = {
  [CreditSegment.DEBT]: 0,
  [CreditSegment.SEGMENT_1]: 100,
  [CreditSegment.SEGMENT_2]: 300,
  [CreditSegment.SEGMENT_3]: 1000
};

/**
 * Lower bound (inclusive) of the segment selector for each segment,
 * in ascending order.
 */
const SEGMENT_THRESHOLDS: ReadonlyArray<{ from: number; segment: CreditSegment }> = [
  { from: 0, segment: CreditSegment.DEBT },
  { from: 2500, segment: CreditSegment.SEGMENT_1 },
  { from: 5000, segment: CreditSegment.SEGMENT_2 },
  { from: 7500, segment: CreditSegment.SEGMENT_3 }
];

// ════════════════════════════════════════════════════════════════════════════
// LIFE EXPECTANCY
// ════════════════════════════════════════════════════════════════════════════

/**
 * Expected lifetime in years, keyed by lowercase country name.
 */
const EXPECTED_LIFETIME: ReadonlyMap<string, number> = new Map([
  ['estonia', 78],
  ['latvia', 75],
  ['lithuania', 76]
]);

const DEFAULT_EXPECTED_LIFETIME = 82;

// ════════════════════════════════════════════════════════════════════════════
// EXPORTS
// ════════════════════════════════════════════════════════════════════════════

export {
  LOAN_LIMITS,
  CREDIT_MODIFIERS,
  SEGMENT_THRESHOLDS,
  EXPECTED_LIFETIME,
  DEFAULT_EXPECTED_LIFETIME
};
