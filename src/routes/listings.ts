/**
 * Routes API des hébergements
 */

import type { FastifyInstance } from 'fastify';
import type { RoutesOptions } from './index.js';
import { serializeListing, transformCreateListingRequest } from '../utils/transformers.js';

export async function listingsRoutes(fastify: FastifyInstance, options: RoutesOptions) {
  const { store } = options.services;

  // POST /api/listings - Créer un hébergement
  fastify.post('/', async (request, reply) => {
    const data = transformCreateListingRequest(request.body);
    const listing = await store.createListing({ name: data.name, color: data.color });
    return reply.status(201).send(serializeListing(listing));
  });

  // GET /api/listings - Liste des hébergements
  fastify.get('/', async () => {
    const listings = await store.listListings();
    return listings.map(serializeListing);
  });
}
