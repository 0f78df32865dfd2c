/**
 * Service de synchronisation iCal
 *
 * Chaque source est entièrement remplacée à chaque synchronisation :
 * téléchargement du flux, purge des événements de la source, puis insertion
 * du résultat du parsing. Pas de fusion avec l'état précédent.
 *
 * Les sources sont traitées une par une ; la première erreur de téléchargement
 * interrompt tout l'appel.
 */

import type { ICalendarSource, INewEvent, IParsedEvent, ISyncSummary } from '../../types/api.js';
import type { EventStore } from '../storage/eventStore.js';
import type { FeedFetcher } from './feedFetcher.js';
import { parseFeed } from './icalParser.js';
import { NotFoundError } from '../../utils/errors.js';
import { createLogger, type Logger } from '../../utils/logger.js';

/**
 * Périmètre d'une synchronisation : une source précise, les sources
 * d'un hébergement, ou toutes les sources
 */
export type SyncScope =
  | { sourceId: string }
  | { listingId?: string };

export interface SyncDependencies {
  store: EventStore;
  fetcher: FeedFetcher;
  timeoutMs: number;
  now?: () => Date;
  logger?: Logger;
}

/**
 * Rattache un événement parsé à sa source et à son hébergement
 */
export function toStoredEvent(event: IParsedEvent, source: ICalendarSource, now: Date): INewEvent {
  return {
    listingId: source.listingId,
    sourceId: source.id,
    uid: event.uid,
    title: event.title || source.name,
    start: event.start,
    end: event.end,
    allDay: event.allDay,
    location: event.location,
    description: event.description,
    status: event.status,
    rawUrl: source.url,
    createdAt: now,
    updatedAt: now
  };
}

async function resolveSources(scope: SyncScope, store: EventStore): Promise<ICalendarSource[]> {
  if ('sourceId' in scope) {
    const source = await store.findSourceById(scope.sourceId);
    if (!source) {
      throw new NotFoundError('Source not found');
    }
    return [source];
  }

  return store.findSources(scope.listingId !== undefined ? { listingId: scope.listingId } : {});
}

/**
 * Synchronise une source
 *
 * Le flux est téléchargé avant la purge : un échec ne vide pas la source.
 *
 * @returns nombre d'événements enregistrés
 */
export async function syncSource(source: ICalendarSource, deps: SyncDependencies): Promise<number> {
  const logger = deps.logger ?? createLogger();
  const now = deps.now ?? (() => new Date());

  let icalContent: string;
  try {
    icalContent = await deps.fetcher.fetch(source.url, deps.timeoutMs);
  } catch (error) {
    logger.error(`[iCalSync] Error fetching iCal for source ${source.id} (${source.url}):`, error);
    throw error;
  }

  const purged = await deps.store.deleteAllForSource(source.id);
  const events = parseFeed(icalContent);

  const stamp = now();
  const batch = events.map(event => toStoredEvent(event, source, stamp));
  if (batch.length > 0) {
    await deps.store.insertBatch(batch);
  }

  logger.info(`[iCalSync] Synced source ${source.id} (${source.name})`, {
    listingId: source.listingId,
    purged,
    saved: batch.length
  });

  return batch.length;
}

/**
 * Synchronise les sources du périmètre demandé
 *
 * @throws {NotFoundError} si la source demandée n'existe pas
 * @throws {FetchError} au premier flux indisponible
 */
export async function syncSources(scope: SyncScope, deps: SyncDependencies): Promise<ISyncSummary> {
  const sources = await resolveSources(scope, deps.store);

  let eventsSaved = 0;
  for (const source of sources) {
    eventsSaved += await syncSource(source, deps);
  }

  return {
    sourcesSynced: sources.length,
    eventsSaved
  };
}
