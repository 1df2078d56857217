/**
 * DECISION ENGINE: Types
 *
 * Value types shared by the evaluator stages.
 */

// ════════════════════════════════════════════════════════════════════════════
// SEGMENTS
// ════════════════════════════════════════════════════════════════════════════

/**
 * Risk tier derived from the last four digits of the personal code.
 */
enum CreditSegment {
  DEBT = 'DEBT',
  SEGMENT_1 = 'SEGMENT_1',
  SEGMENT_2 = 'SEGMENT_2',
  SEGMENT_3 = 'SEGMENT_3'
}

// ════════════════════════════════════════════════════════════════════════════
// DECISION
// ════════════════════════════════════════════════════════════════════════════

/**
 * Approved loan terms. Rejections are thrown, never returned.
 */
interface Decision {
  /** Approved amount in euros */
  approvedAmount: number;

  /** Approved period in months */
  approvedPeriod: number;
}

/**
 * Signature of the evaluator, so callers can be handed a substitute.
 */
type LoanEvaluator = (
  identityCode: string,
  requestedAmount: number,
  requestedPeriod: number,
  country: string,
  today?: Date
) => Decision;

// ════════════════════════════════════════════════════════════════════════════
// EXPORTS
// ════════════════════════════════════════════════════════════════════════════

export { CreditSegment, Decision, LoanEvaluator };
