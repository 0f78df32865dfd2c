/**
 * Utilitaires pour la gestion CORS
 */

import type { FastifyReply } from 'fastify';

/**
 * Headers CORS par défaut
 */
export const corsHeaders = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Methods': 'GET, POST, PUT, DELETE, OPTIONS',
  'Access-Control-Allow-Headers': 'Content-Type, Authorization, X-Trace-Id',
  'Access-Control-Expose-Headers': 'X-Trace-Id',
  'Access-Control-Max-Age': '86400' // 24 heures
};

/**
 * Répond aux requêtes OPTIONS (CORS preflight)
 */
export function handleCors(reply: FastifyReply): FastifyReply {
  return reply.code(204).headers(corsHeaders).send();
}

/**
 * Ajoute les headers CORS à une réponse
 */
export function addCorsHeaders(reply: FastifyReply): void {
  reply.headers(corsHeaders);
}
