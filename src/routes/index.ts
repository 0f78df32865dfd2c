/**
 * Agrégation des routes
 *
 * Ce fichier enregistre toutes les routes de l'application avec leurs préfixes.
 */

import type { FastifyInstance } from 'fastify';
import type { AppServices } from '../app.js';
import { healthRoutes } from './health.js';
import { listingsRoutes } from './listings.js';
import { sourcesRoutes } from './sources.js';
import { syncRoutes } from './sync.js';
import { eventsRoutes } from './events.js';
import { exportRoutes } from './export.js';
import { whatsappRoutes } from './whatsapp.js';

export interface RoutesOptions {
  services: AppServices;
}

/**
 * Enregistre toutes les routes de l'application
 *
 * @param fastify - Instance Fastify
 */
export async function registerRoutes(fastify: FastifyInstance, options: RoutesOptions) {
  const { services } = options;

  await fastify.register(healthRoutes);
  await fastify.register(listingsRoutes, { prefix: '/api/listings', services });
  await fastify.register(sourcesRoutes, { prefix: '/api/sources', services });
  await fastify.register(syncRoutes, { prefix: '/api/sync', services });
  await fastify.register(eventsRoutes, { prefix: '/api/events', services });
  await fastify.register(exportRoutes, { prefix: '/api/export-to-sheet', services });
  await fastify.register(whatsappRoutes, { prefix: '/api/whatsapp', services });
}
