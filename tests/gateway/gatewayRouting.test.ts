/**
 * LOAN GATEWAY: Routing tests
 *
 * Drives the Fastify app through inject(); no socket is opened.
 */

import { buildApp, GatewayConfig } from '../../gateway';
import {
  parseDecisionRequest,
  statusCodeFor,
  maskPersonalCode
} from '../../gateway/routes/loanRoutes';
import {
  evaluate,
  LoanEvaluator,
  InvalidAgeError,
  NoValidLoanError,
  DecisionInternalError
} from '../../engine';

// ════════════════════════════════════════════════════════════════════════════
// SETUP
// ════════════════════════════════════════════════════════════════════════════

const TODAY = new Date(Date.UTC(2026, 9, 19));

const testConfig: GatewayConfig = {
  port: 0,
  host: '127.0.0.1',
  corsOrigins: ['*'],
  nodeEnv: 'test',
  logLevel: 'error'
};

const pinnedEvaluator: LoanEvaluator = (code, amount, period, country) =>
  evaluate(code, amount, period, country, TODAY);

async function postDecision(payload: unknown, evaluator: LoanEvaluator = pinnedEvaluator) {
  const app = await buildApp({ config: testConfig, evaluator });
  try {
    const response = await app.inject({
      method: 'POST',
      url: '/loan/decision',
      payload: JSON.stringify(payload),
      headers: { 'content-type': 'application/json' }
    });
    return { statusCode: response.statusCode, body: JSON.parse(response.body) };
  } finally {
    await app.close();
  }
}

// ════════════════════════════════════════════════════════════════════════════
// HEALTH
// ════════════════════════════════════════════════════════════════════════════

describe('Health Routes', () => {
  test('GET /health returns 200', async () => {
    const app = await buildApp({ config: testConfig });

    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    const body = JSON.parse(response.body);
    expect(body.status).toBe('ok');
    expect(body.timestamp).toBeDefined();
    expect(body.uptime).toBeGreaterThanOrEqual(0);

    await app.close();
  });
});

// ════════════════════════════════════════════════════════════════════════════
// LOAN DECISION
// ════════════════════════════════════════════════════════════════════════════

describe('POST /loan/decision', () => {
  test('returns the approved terms', async () => {
    const { statusCode, body } = await postDecision({
      personalCode: '38411266610',
      loanAmount: 4000,
      loanPeriod: 12,
      country: 'Estonia'
    });

    expect(statusCode).toBe(200);
    expect(body).toEqual({ approvedAmount: 3900, approvedPeriod: 13, errorMessage: null });
  });

  test('uses the engine with the system clock by default', async () => {
    const app = await buildApp({ config: testConfig });

    const response = await app.inject({
      method: 'POST',
      url: '/loan/decision',
      payload: { personalCode: '38411266610', loanAmount: 2000, loanPeriod: 12, country: 'Estonia' }
    });

    expect(response.statusCode).toBe(200);
    expect(JSON.parse(response.body)).toEqual({
      approvedAmount: 3600,
      approvedPeriod: 12,
      errorMessage: null
    });

    await app.close();
  });

  test('maps a debtor to 404', async () => {
    const { statusCode, body } = await postDecision({
      personalCode: '37605030299',
      loanAmount: 4000,
      loanPeriod: 12,
      country: 'Estonia'
    });

    expect(statusCode).toBe(404);
    expect(body).toEqual({
      approvedAmount: null,
      approvedPeriod: null,
      errorMessage: 'Loan denied due to existing debt.'
    });
  });

  test('maps an invalid personal code to 400', async () => {
    const { statusCode, body } = await postDecision({
      personalCode: '12345678901',
      loanAmount: 4000,
      loanPeriod: 12,
      country: 'Estonia'
    });

    expect(statusCode).toBe(400);
    expect(body.errorMessage).toBe('Invalid personal ID code.');
  });

  test('maps an out-of-range amount to 400', async () => {
    const { statusCode, body } = await postDecision({
      personalCode: '50307172740',
      loanAmount: 10001,
      loanPeriod: 12,
      country: 'Estonia'
    });

    expect(statusCode).toBe(400);
    expect(body.errorMessage).toBe('Loan amount must be between €2000 and €10000.');
  });

  test('maps an out-of-range period to 400', async () => {
    const { statusCode, body } = await postDecision({
      personalCode: '50307172740',
      loanAmount: 4000,
      loanPeriod: 11,
      country: 'Estonia'
    });

    expect(statusCode).toBe(400);
    expect(body.errorMessage).toBe('Loan period must be between 12 and 48 months.');
  });

  test('maps an age rejection to 400', async () => {
    const { statusCode, body } = await postDecision({
      personalCode: '35006069515',
      loanAmount: 4000,
      loanPeriod: 36,
      country: 'Estonia'
    });

    expect(statusCode).toBe(400);
    expect(body.errorMessage).toBe('Customer is too old to receive a loan for this period.');
  });

  test('rejects a body with a missing field', async () => {
    const { statusCode, body } = await postDecision({
      personalCode: '50307172740',
      loanAmount: 4000,
      loanPeriod: 12
    });

    expect(statusCode).toBe(400);
    expect(body).toEqual({
      approvedAmount: null,
      approvedPeriod: null,
      errorMessage: 'Invalid request body.'
    });
  });

  test('rejects a body with a mistyped field', async () => {
    const { statusCode, body } = await postDecision({
      personalCode: '50307172740',
      loanAmount: '4000',
      loanPeriod: 12,
      country: 'Estonia'
    });

    expect(statusCode).toBe(400);
    expect(body.errorMessage).toBe('Invalid request body.');
  });

  test('answers malformed JSON in the decision shape', async () => {
    const app = await buildApp({ config: testConfig });

    const response = await app.inject({
      method: 'POST',
      url: '/loan/decision',
      payload: '{"personalCode":',
      headers: { 'content-type': 'application/json' }
    });

    expect(response.statusCode).toBe(400);
    expect(JSON.parse(response.body)).toEqual({
      approvedAmount: null,
      approvedPeriod: null,
      errorMessage: 'Invalid request body.'
    });

    await app.close();
  });

  test('answers an empty JSON body in the decision shape', async () => {
    const app = await buildApp({ config: testConfig });

    const response = await app.inject({
      method: 'POST',
      url: '/loan/decision',
      payload: '',
      headers: { 'content-type': 'application/json' }
    });

    expect(response.statusCode).toBe(400);
    expect(JSON.parse(response.body).errorMessage).toBe('Invalid request body.');

    await app.close();
  });

  test('hides unexpected failures behind a 500', async () => {
    const failing: LoanEvaluator = () => {
      throw new TypeError('segment table missing');
    };

    const { statusCode, body } = await postDecision(
      { personalCode: '50307172740', loanAmount: 4000, loanPeriod: 12, country: 'Estonia' },
      failing
    );

    expect(statusCode).toBe(500);
    expect(body).toEqual({
      approvedAmount: null,
      approvedPeriod: null,
      errorMessage: 'An unexpected error occurred.'
    });
  });
});

// ════════════════════════════════════════════════════════════════════════════
// REQUEST ID AND CORS
// ════════════════════════════════════════════════════════════════════════════

describe('Request ID', () => {
  test('echoes a sanitised X-Request-Id', async () => {
    const app = await buildApp({ config: testConfig });

    const response = await app.inject({
      method: 'GET',
      url: '/health',
      headers: { 'x-request-id': 'abc 123!' }
    });

    expect(response.headers['x-request-id']).toBe('abc123');

    await app.close();
  });

  test('tags a loan decision with the caller\'s request id', async () => {
    const app = await buildApp({ config: testConfig, evaluator: pinnedEvaluator });

    const response = await app.inject({
      method: 'POST',
      url: '/loan/decision',
      payload: { personalCode: '38411266610', loanAmount: 4000, loanPeriod: 12, country: 'Estonia' },
      headers: { 'x-request-id': 'loan-req_42' }
    });

    expect(response.statusCode).toBe(200);
    expect(response.headers['x-request-id']).toBe('loan-req_42');

    await app.close();
  });

  test('generates a UUID when none is sent', async () => {
    const app = await buildApp({ config: testConfig });

    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.headers['x-request-id']).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/
    );

    await app.close();
  });
});

describe('CORS', () => {
  test('allows any origin with the wildcard', async () => {
    const app = await buildApp({ config: testConfig });

    const response = await app.inject({
      method: 'GET',
      url: '/health',
      headers: { origin: 'http://example.test' }
    });

    expect(response.headers['access-control-allow-origin']).toBe('*');

    await app.close();
  });

  test('echoes a listed origin', async () => {
    const app = await buildApp({
      config: { ...testConfig, corsOrigins: ['http://localhost:5173'] }
    });

    const response = await app.inject({
      method: 'GET',
      url: '/health',
      headers: { origin: 'http://localhost:5173' }
    });

    expect(response.headers['access-control-allow-origin']).toBe('http://localhost:5173');

    await app.close();
  });
});

// ════════════════════════════════════════════════════════════════════════════
// HELPERS
// ════════════════════════════════════════════════════════════════════════════

describe('parseDecisionRequest', () => {
  test('accepts a well-typed body', () => {
    expect(
      parseDecisionRequest({ personalCode: 'x', loanAmount: 1, loanPeriod: 2, country: '' })
    ).toEqual({ personalCode: 'x', loanAmount: 1, loanPeriod: 2, country: '' });
  });

  test.each([
    null,
    [],
    'body',
    { personalCode: 1, loanAmount: 4000, loanPeriod: 12, country: 'Estonia' },
    { personalCode: 'x', loanAmount: 4000.5, loanPeriod: 12, country: 'Estonia' },
    { personalCode: 'x', loanAmount: 4000, loanPeriod: null, country: 'Estonia' }
  ])('rejects %p', (body) => {
    expect(parseDecisionRequest(body)).toBeNull();
  });
});

describe('statusCodeFor', () => {
  test('maps each kind to its status', () => {
    expect(statusCodeFor(new InvalidAgeError('too old'))).toBe(400);
    expect(statusCodeFor(new NoValidLoanError('none'))).toBe(404);
    expect(statusCodeFor(new DecisionInternalError('broken'))).toBe(500);
  });
});

describe('maskPersonalCode', () => {
  test('keeps only the first three characters', () => {
    expect(maskPersonalCode('37605030299')).toBe('376********');
    expect(maskPersonalCode('12')).toBe('12');
  });
});
