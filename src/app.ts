/**
 * Construction de l'application Fastify
 *
 * Les dépendances (stockage, téléchargement des flux, fetch sortant,
 * configuration) sont injectées pour permettre les tests sans réseau.
 */

import 'reflect-metadata';
import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';
import { randomUUID } from 'crypto';
import type { AppConfig } from './config/env.js';
import type { FeedFetcher } from './services/ical/feedFetcher.js';
import type { CalendarStore } from './services/storage/eventStore.js';
import { runWithTrace } from './services/correlationContext.js';
import { registerRoutes } from './routes/index.js';
import { addCorsHeaders, handleCors } from './utils/cors.js';
import { AppError } from './utils/errors.js';
import type { FetchFn } from './utils/http.js';
import type { Logger } from './utils/logger.js';

export interface AppServices {
  store: CalendarStore;
  fetcher: FeedFetcher;
  fetchImpl: FetchFn;
  config: AppConfig;
  logger?: Logger;
}

export interface BuildAppOptions {
  services: AppServices;
  logger?: FastifyServerOptions['logger'];
}

export const SERVICE_NAME = 'calendar-aggregator-backend';
export const SERVICE_VERSION = '1.0.0';

function hasStatusCode(error: unknown): error is { statusCode: number; message: string } {
  return typeof error === 'object' && error !== null
    && 'statusCode' in error && typeof error.statusCode === 'number'
    && 'message' in error && typeof error.message === 'string';
}

export function buildApp(options: BuildAppOptions): FastifyInstance {
  const fastify = Fastify({
    logger: options.logger ?? false,
    requestIdHeader: 'x-trace-id',
    genReqId: () => randomUUID()
  });

  fastify.addHook('onRequest', (request, reply, done) => {
    reply.header('x-trace-id', request.id);
    done();
  });

  // Le contexte est ouvert après le parsing du corps pour couvrir tout le handler
  fastify.addHook('preHandler', (request, reply, done) => {
    runWithTrace(() => done(), request.id);
  });

  fastify.addHook('onSend', (request, reply, payload, done) => {
    addCorsHeaders(reply);
    done(null, payload);
  });

  fastify.setErrorHandler((error, request, reply) => {
    const traceId = request.id;

    if (error instanceof AppError) {
      request.log.warn({ err: error }, error.message);
      return reply.status(error.statusCode).send({
        error: error.message,
        ...(error.details !== undefined && { details: error.details }),
        traceId
      });
    }

    // Erreurs Fastify côté client (JSON invalide, corps vide...)
    if (hasStatusCode(error) && error.statusCode >= 400 && error.statusCode < 500) {
      return reply.status(error.statusCode).send({ error: error.message, traceId });
    }

    request.log.error({ err: error }, 'Unhandled error');
    return reply.status(500).send({
      error: 'Internal Server Error',
      message: error instanceof Error ? error.message : 'Unknown error',
      traceId
    });
  });

  fastify.options('*', (request, reply) => handleCors(reply));

  fastify.register(registerRoutes, { services: options.services });

  return fastify;
}
