/**
 * Route d'envoi du planning par WhatsApp
 */

import type { FastifyInstance } from 'fastify';
import type { RoutesOptions } from './index.js';
import { sendSchedule } from '../services/notifications/whatsappService.js';
import { serializeWhatsAppResult, transformWhatsAppRequest } from '../utils/transformers.js';

export async function whatsappRoutes(fastify: FastifyInstance, options: RoutesOptions) {
  const { store, fetchImpl, config, logger } = options.services;

  // POST /api/whatsapp/send-schedule
  fastify.post('/send-schedule', async (request) => {
    const data = transformWhatsAppRequest(request.body);
    const result = await sendSchedule(data, {
      store,
      config: config.whatsapp,
      fetchImpl,
      timeoutMs: config.WEBHOOK_TIMEOUT_MS,
      logger
    });
    return serializeWhatsAppResult(result);
  });
}
