/**
 * LOAN GATEWAY: Loan Decision Routes
 *
 * Maps the engine's error taxonomy to HTTP statuses:
 * - validation rejections → 400
 * - no valid loan → 404
 * - anything else → 500
 */

import { FastifyError, FastifyPluginAsync } from 'fastify';
import {
  DECISION_RULE,
  DecisionError,
  DecisionRuleCode,
  LoanEvaluator,
  toDecisionError
} from '../../engine';

// ════════════════════════════════════════════════════════════════════════════
// TYPES
// ════════════════════════════════════════════════════════════════════════════

export interface DecisionRequest {
  personalCode: string;
  loanAmount: number;
  loanPeriod: number;
  country: string;
}

export interface DecisionResponse {
  approvedAmount: number | null;
  approvedPeriod: number | null;
  errorMessage: string | null;
}

export interface LoanRoutesOptions {
  evaluator: LoanEvaluator;
}

// ════════════════════════════════════════════════════════════════════════════
// HELPERS
// ════════════════════════════════════════════════════════════════════════════

const INVALID_BODY_MESSAGE = 'Invalid request body.';
const INTERNAL_ERROR_MESSAGE = 'An unexpected error occurred.';

const STATUS_BY_RULE: Readonly<Record<DecisionRuleCode, number>> = {
  [DECISION_RULE.INVALID_IDENTITY_CODE]: 400,
  [DECISION_RULE.INVALID_LOAN_AMOUNT]: 400,
  [DECISION_RULE.INVALID_LOAN_PERIOD]: 400,
  [DECISION_RULE.INVALID_AGE]: 400,
  [DECISION_RULE.NO_VALID_LOAN]: 404,
  [DECISION_RULE.INTERNAL_FAULT]: 500
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Returns the request when every field has the expected JSON type.
 * Range checks are the engine's job.
 */
export function parseDecisionRequest(body: unknown): DecisionRequest | null {
  if (!isRecord(body)) return null;

  const { personalCode, loanAmount, loanPeriod, country } = body;
  if (
    typeof personalCode !== 'string' ||
    typeof loanAmount !== 'number' || !Number.isInteger(loanAmount) ||
    typeof loanPeriod !== 'number' || !Number.isInteger(loanPeriod) ||
    typeof country !== 'string'
  ) {
    return null;
  }

  return { personalCode, loanAmount, loanPeriod, country };
}

export function statusCodeFor(error: DecisionError): number {
  return STATUS_BY_RULE[error.code];
}

/**
 * Keeps the first three characters, enough to tell century and birth year.
 */
export function maskPersonalCode(code: string): string {
  return code.slice(0, 3) + '*'.repeat(Math.max(code.length - 3, 0));
}

function rejection(errorMessage: string): DecisionResponse {
  return { approvedAmount: null, approvedPeriod: null, errorMessage };
}

/**
 * Content-type parser failures (malformed JSON, empty body, wrong media type).
 * The JSON parser flags a syntax error with status 400 but, depending on the
 * Fastify release, no FST_ERR_CTP_ code.
 */
function isBodyParseError(error: FastifyError): boolean {
  if (typeof error.code === 'string' && error.code.startsWith('FST_ERR_CTP_')) {
    return true;
  }
  return error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500;
}

// ════════════════════════════════════════════════════════════════════════════
// PLUGIN
// ════════════════════════════════════════════════════════════════════════════

export const loanRoutes: FastifyPluginAsync<LoanRoutesOptions> = async (app, opts) => {
  const { evaluator } = opts;

  // errors raised before the handler runs still answer in the decision shape
  app.setErrorHandler<FastifyError>(async (error, request, reply) => {
    if (isBodyParseError(error)) {
      request.log.warn({ code: error.code }, 'loan request body rejected');
      reply.code(error.statusCode ?? 400);
      return rejection(INVALID_BODY_MESSAGE);
    }

    request.log.error({ err: error }, 'loan request failed');
    reply.code(500);
    return rejection(INTERNAL_ERROR_MESSAGE);
  });

  /**
   * POST /loan/decision
   * Evaluates a loan request and returns the approved terms
   */
  app.post<{ Body: unknown }>('/decision', async (request, reply): Promise<DecisionResponse> => {
    const input = parseDecisionRequest(request.body);
    if (!input) {
      reply.code(400);
      return rejection(INVALID_BODY_MESSAGE);
    }

    const logContext = {
      personalCode: maskPersonalCode(input.personalCode),
      loanAmount: input.loanAmount,
      loanPeriod: input.loanPeriod,
      country: input.country
    };

    try {
      const decision = evaluator(input.personalCode, input.loanAmount, input.loanPeriod, input.country);
      request.log.info({ ...logContext, ...decision }, 'loan approved');

      return {
        approvedAmount: decision.approvedAmount,
        approvedPeriod: decision.approvedPeriod,
        errorMessage: null
      };
    } catch (error) {
      const decisionError = toDecisionError(error);
      reply.code(statusCodeFor(decisionError));

      if (decisionError.kind === 'fault') {
        request.log.error({ ...logContext, err: decisionError }, 'loan evaluation failed');
        return rejection(INTERNAL_ERROR_MESSAGE);
      }

      request.log.warn({ ...logContext, code: decisionError.code }, 'loan rejected');
      return rejection(decisionError.message);
    }
  });
};
