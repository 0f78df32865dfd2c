/**
 * Route d'affichage des événements
 */

import type { FastifyInstance } from 'fastify';
import type { RoutesOptions } from './index.js';
import { parseIsoDate } from '../utils/dateUtils.js';
import { eventsQuerySchema } from '../types/schemas.js';
import { serializeEvent, validateQuery } from '../utils/transformers.js';

export async function eventsRoutes(fastify: FastifyInstance, options: RoutesOptions) {
  const { store } = options.services;

  // GET /api/events?start=&end=&listing_id=
  // Les bornes illisibles sont ignorées
  fastify.get('/', async (request) => {
    const { start, end, listing_id: listingId } = validateQuery(eventsQuerySchema, request.query);

    const events = await store.findEvents({
      start: start ? parseIsoDate(start) ?? undefined : undefined,
      end: end ? parseIsoDate(end) ?? undefined : undefined,
      listingId
    });

    return { events: events.map(serializeEvent) };
  });
}
