/**
 * Route d'export vers un tableur
 */

import type { FastifyInstance } from 'fastify';
import type { RoutesOptions } from './index.js';
import { exportToSheet } from '../services/notifications/sheetExportService.js';
import { serializeExportResult, transformExportRequest } from '../utils/transformers.js';

export async function exportRoutes(fastify: FastifyInstance, options: RoutesOptions) {
  const { store, fetchImpl, config, logger } = options.services;

  // POST /api/export-to-sheet
  fastify.post('/', async (request) => {
    const data = transformExportRequest(request.body);
    const result = await exportToSheet(data, {
      store,
      fetchImpl,
      timeoutMs: config.WEBHOOK_TIMEOUT_MS,
      logger
    });
    return serializeExportResult(result);
  });
}
