/**
 * LOAN GATEWAY: Application Factory
 *
 * Builds a configured Fastify instance. Kept apart from the entrypoint so
 * tests can drive it through inject().
 */

import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { IncomingMessage } from 'http';
import * as crypto from 'crypto';

import { GatewayConfig } from './GatewayConfig';
import { healthRoutes } from './routes/healthRoutes';
import { loanRoutes } from './routes/loanRoutes';
import { evaluate, LoanEvaluator } from '../engine';

// ════════════════════════════════════════════════════════════════════════════
// TYPES
// ════════════════════════════════════════════════════════════════════════════

export interface BuildAppOptions {
  config: GatewayConfig;

  /**
   * Evaluator behind POST /loan/decision (default: the decision engine)
   */
  evaluator?: LoanEvaluator;
}

// ════════════════════════════════════════════════════════════════════════════
// REQUEST ID
// ════════════════════════════════════════════════════════════════════════════

const REQUEST_ID_HEADER = 'x-request-id';
const MAX_REQUEST_ID_LENGTH = 64;

/**
 * Reuses the caller's X-Request-Id (alphanumerics, hyphens and underscores
 * only) or generates a UUID. Fastify binds the result to every request log
 * line as `reqId`, so a loan decision can be traced back to its caller.
 */
export function requestIdFrom(raw: IncomingMessage): string {
  const headerValue = raw.headers[REQUEST_ID_HEADER];

  if (typeof headerValue === 'string') {
    const sanitized = headerValue.replace(/[^a-zA-Z0-9\-_]/g, '').slice(0, MAX_REQUEST_ID_LENGTH);
    if (sanitized.length > 0) {
      return sanitized;
    }
  }

  return crypto.randomUUID();
}

// ════════════════════════════════════════════════════════════════════════════
// FACTORY
// ════════════════════════════════════════════════════════════════════════════

export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const { config, evaluator = evaluate } = options;

  const app = Fastify({
    logger: {
      level: config.logLevel
    },
    requestIdHeader: false,
    genReqId: requestIdFrom,
    disableRequestLogging: config.nodeEnv === 'test'
  });

  app.addHook('onRequest', async (request, reply) => {
    reply.header('X-Request-Id', request.id);
  });

  // ══════════════════════════════════════════════════════════════════════════
  // PLUGINS
  // ══════════════════════════════════════════════════════════════════════════

  // an array is matched entry by entry, so the wildcard has to go in alone
  await app.register(cors, {
    origin: config.corsOrigins.includes('*') ? '*' : config.corsOrigins,
    methods: ['GET', 'POST', 'OPTIONS']
  });

  // ══════════════════════════════════════════════════════════════════════════
  // ROUTES
  // ══════════════════════════════════════════════════════════════════════════

  await app.register(healthRoutes);
  await app.register(loanRoutes, { prefix: '/loan', evaluator });

  app.addHook('onClose', async () => {
    app.log.info('Loan gateway shutting down');
  });

  return app;
}
