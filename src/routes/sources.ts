/**
 * Routes API des sources de calendrier (flux iCal des OTA)
 */

import type { FastifyInstance } from 'fastify';
import type { RoutesOptions } from './index.js';
import { sourcesQuerySchema } from '../types/schemas.js';
import { serializeSource, transformCreateSourceRequest, validateQuery } from '../utils/transformers.js';

export async function sourcesRoutes(fastify: FastifyInstance, options: RoutesOptions) {
  const { store } = options.services;

  // POST /api/sources - Enregistrer une source
  // 201 si créée, 200 si l'URL était déjà enregistrée pour cet hébergement
  fastify.post('/', async (request, reply) => {
    const data = transformCreateSourceRequest(request.body);
    const { source, created } = await store.createSource({
      listingId: data.listingId,
      name: data.name,
      url: data.url,
      sourceType: data.sourceType,
      color: data.color
    });

    return reply.status(created ? 201 : 200).send(serializeSource(source));
  });

  // GET /api/sources?listing_id= - Liste des sources
  fastify.get('/', async (request) => {
    const { listing_id: listingId } = validateQuery(sourcesQuerySchema, request.query);
    const sources = await store.findSources(listingId ? { listingId } : {});
    return sources.map(serializeSource);
  });
}
