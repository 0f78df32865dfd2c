/**
 * Route de synchronisation des flux iCal
 */

import type { FastifyInstance } from 'fastify';
import type { RoutesOptions } from './index.js';
import { syncSources, type SyncScope } from '../services/ical/icalSyncService.js';
import { syncQuerySchema } from '../types/schemas.js';
import { serializeSyncSummary, validateQuery } from '../utils/transformers.js';

export async function syncRoutes(fastify: FastifyInstance, options: RoutesOptions) {
  const { store, fetcher, config, logger } = options.services;

  // POST /api/sync?source_id=&listing_id= - Synchronise une source, un hébergement ou tout
  fastify.post('/', async (request) => {
    const { source_id: sourceId, listing_id: listingId } = validateQuery(syncQuerySchema, request.query);

    const scope: SyncScope = sourceId
      ? { sourceId }
      : { listingId };

    const summary = await syncSources(scope, {
      store,
      fetcher,
      timeoutMs: config.FEED_FETCH_TIMEOUT_MS,
      logger
    });

    return serializeSyncSummary(summary);
  });
}
