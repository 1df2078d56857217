/**
 * LOAN GATEWAY
 *
 * HTTP adapter over the decision engine.
 */

// Config
export { GatewayConfig, loadConfig, validateConfig, DEFAULT_CONFIG } from './GatewayConfig';

// App factory
export { buildApp, BuildAppOptions, requestIdFrom } from './app';

// Routes
export { healthRoutes } from './routes/healthRoutes';
export {
  loanRoutes,
  LoanRoutesOptions,
  DecisionRequest,
  DecisionResponse
} from './routes/loanRoutes';
