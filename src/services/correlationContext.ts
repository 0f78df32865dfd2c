/**
 * Contexte de requête (traceId, début du traitement) propagé
 * à travers les appels asynchrones
 */

import { AsyncLocalStorage } from 'async_hooks';
import { randomUUID } from 'crypto';

export interface RequestContext {
  traceId: string;
  startedAt: number;
}

const storage = new AsyncLocalStorage<RequestContext>();

/**
 * Exécute `fn` dans un contexte ; le traceId reçu en en-tête x-trace-id est réutilisé s'il existe
 */
export function runWithTrace<T>(fn: () => T, traceId: string = randomUUID()): T {
  return storage.run({ traceId, startedAt: Date.now() }, fn);
}

export function getTraceId(): string | undefined {
  return storage.getStore()?.traceId;
}

/**
 * Millisecondes écoulées depuis l'ouverture du contexte (undefined hors requête)
 */
export function getElapsedMs(now: number = Date.now()): number | undefined {
  const context = storage.getStore();
  return context ? now - context.startedAt : undefined;
}
