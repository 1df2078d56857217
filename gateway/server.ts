#!/usr/bin/env node
/**
 * LOAN GATEWAY: Server Entrypoint
 *
 * Usage:
 *   npm run build && npm start
 *
 * Environment variables:
 *   LOAN_GATEWAY_PORT          - HTTP port (default: 3000)
 *   LOAN_GATEWAY_HOST          - Bind address (default: 0.0.0.0)
 *   LOAN_GATEWAY_CORS_ORIGINS  - CORS origins (comma-separated, default: *)
 *   LOAN_GATEWAY_LOG_LEVEL     - Log level (default: info)
 *   NODE_ENV                   - development/production/test
 */

import { loadConfig, validateConfig } from './GatewayConfig';
import { buildApp } from './app';

async function main(): Promise<void> {
  const config = loadConfig();
  validateConfig(config);

  const app = await buildApp({ config });

  const shutdown = async (signal: string): Promise<void> => {
    app.log.info({ signal }, 'shutdown signal received');
    await app.close();
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  try {
    await app.listen({
      port: config.port,
      host: config.host
    });
    app.log.info(
      { env: config.nodeEnv, corsOrigins: config.corsOrigins },
      'loan gateway ready: GET /health, POST /loan/decision'
    );
  } catch (error) {
    app.log.fatal({ err: error }, 'failed to start server');
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
