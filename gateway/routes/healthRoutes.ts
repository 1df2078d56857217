/**
 * LOAN GATEWAY: Health Routes
 */

import { FastifyPluginAsync } from 'fastify';

interface HealthResponse {
  status: 'ok';
  timestamp: string;
  uptime: number;
}

const startTime = Date.now();

export const healthRoutes: FastifyPluginAsync = async (app) => {
  /**
   * GET /health
   * Liveness probe: 200 whenever the process is serving
   */
  app.get('/health', async (): Promise<HealthResponse> => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: Date.now() - startTime
    };
  });
};
