/**
 * Routes de santé
 */

import type { FastifyInstance } from 'fastify';
import { SERVICE_NAME, SERVICE_VERSION } from '../app.js';

export async function healthRoutes(fastify: FastifyInstance) {
  fastify.get('/', async () => {
    return { message: 'Calendar Aggregator API running' };
  });

  fastify.get('/health', async (request) => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      traceId: request.id,
      service: SERVICE_NAME,
      version: SERVICE_VERSION
    };
  });
}
