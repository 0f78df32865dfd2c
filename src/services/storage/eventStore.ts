/**
 * Contrats de persistance
 *
 * EventStore couvre ce dont la synchronisation a besoin ; CalendarStore
 * ajoute l'enregistrement des hébergements/sources et les requêtes d'affichage.
 */

import type {
  ICalendarSource,
  IEvent,
  IEventWithSource,
  IListing,
  INewEvent,
  SourceType
} from '../../types/api.js';

export interface SourceFilter {
  listingId?: string;
}

/**
 * Fenêtre d'affichage : start <= event.start et event.end <= end
 */
export interface EventQuery {
  start?: Date;
  end?: Date;
  listingId?: string;
}

/**
 * Événements qui chevauchent [from, to)
 */
export interface OverlapQuery {
  from: Date;
  to: Date;
  listingId?: string;
}

export interface NewListing {
  name: string;
  color?: string;
}

export interface NewSource {
  listingId: string;
  name: string;
  url: string;
  sourceType: SourceType;
  color?: string;
}

export interface CreateSourceResult {
  source: ICalendarSource;
  created: boolean; // false si l'URL était déjà enregistrée pour cet hébergement
}

export interface EventStore {
  /**
   * Supprime tous les événements d'une source
   * @returns nombre d'événements supprimés
   */
  deleteAllForSource(sourceId: string): Promise<number>;
  insertBatch(events: INewEvent[]): Promise<IEvent[]>;
  findSources(filter?: SourceFilter): Promise<ICalendarSource[]>;
  findSourceById(id: string): Promise<ICalendarSource | null>;
}

export interface CalendarStore extends EventStore {
  createListing(listing: NewListing): Promise<IListing>;
  listListings(): Promise<IListing[]>;
  findListingById(id: string): Promise<IListing | null>;
  createSource(source: NewSource): Promise<CreateSourceResult>;
  findEvents(query: EventQuery): Promise<IEventWithSource[]>;
  findEventsOverlapping(query: OverlapQuery): Promise<IEventWithSource[]>;
}
