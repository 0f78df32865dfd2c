/**
 * Stockage SQLite (better-sqlite3) des hébergements, sources et événements
 */

import Database from 'better-sqlite3';
import { randomUUID } from 'crypto';
import { mkdirSync, readFileSync } from 'fs';
import { dirname } from 'path';
import { fileURLToPath } from 'url';
import type {
  ICalendarSource,
  IEvent,
  IEventWithSource,
  IListing,
  INewEvent
} from '../../types/api.js';
import { SourceType } from '../../types/api.js';
import { NotFoundError } from '../../utils/errors.js';
import type {
  CalendarStore,
  CreateSourceResult,
  EventQuery,
  NewListing,
  NewSource,
  OverlapQuery,
  SourceFilter
} from './eventStore.js';

/**
 * Copié à côté de dist/ par le script de build
 */
export const SCHEMA_PATH = fileURLToPath(new URL('../../../schema.sql', import.meta.url));

interface ListingRow {
  id: string;
  name: string;
  color: string | null;
  created_at: string;
}

interface CalendarSourceRow {
  id: string;
  listing_id: string;
  name: string;
  url: string;
  source_type: string;
  color: string | null;
  created_at: string;
}

interface EventRow {
  id: string;
  listing_id: string;
  source_id: string;
  uid: string | null;
  title: string;
  start_at: string;
  end_at: string;
  all_day: number;
  location: string | null;
  description: string | null;
  status: string | null;
  raw_url: string | null;
  created_at: string;
  updated_at: string;
}

interface EventWithSourceRow extends EventRow {
  source_name: string | null;
  source_color: string | null;
}

interface EventInsertParams {
  id: string;
  listing_id: string;
  source_id: string;
  uid: string | null;
  title: string;
  start_at: string;
  end_at: string;
  all_day: number;
  location: string | null;
  description: string | null;
  status: string | null;
  raw_url: string;
  created_at: string;
  updated_at: string;
}

const EVENT_WITH_SOURCE_SELECT = `
  SELECT e.*, s.name AS source_name, COALESCE(s.color, l.color) AS source_color
  FROM events e
  LEFT JOIN calendar_sources s ON s.id = e.source_id
  LEFT JOIN listings l ON l.id = e.listing_id
`;

// Seul le type iCal est implémenté
function toSourceType(value: string): SourceType {
  if (value !== SourceType.Ical) {
    throw new Error(`Unsupported source type: ${value}`);
  }
  return SourceType.Ical;
}

function convertRowToListing(row: ListingRow): IListing {
  return {
    id: row.id,
    name: row.name,
    color: row.color,
    createdAt: row.created_at
  };
}

function convertRowToSource(row: CalendarSourceRow): ICalendarSource {
  return {
    id: row.id,
    listingId: row.listing_id,
    name: row.name,
    url: row.url,
    sourceType: toSourceType(row.source_type),
    color: row.color,
    createdAt: row.created_at
  };
}

function convertRowToEvent(row: EventRow): IEvent {
  return {
    id: row.id,
    listingId: row.listing_id,
    sourceId: row.source_id,
    uid: row.uid,
    title: row.title,
    start: new Date(row.start_at),
    end: new Date(row.end_at),
    allDay: row.all_day === 1,
    location: row.location,
    description: row.description,
    status: row.status,
    rawUrl: row.raw_url ?? '',
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at)
  };
}

function convertRowToEventWithSource(row: EventWithSourceRow): IEventWithSource {
  return {
    ...convertRowToEvent(row),
    sourceName: row.source_name,
    sourceColor: row.source_color
  };
}

/**
 * Ouvre la base et applique le schéma (idempotent)
 *
 * @param path - Chemin du fichier SQLite, ou ':memory:'
 */
export function openDatabase(path: string, schemaPath: string = SCHEMA_PATH): Database.Database {
  if (path !== ':memory:') {
    mkdirSync(dirname(path), { recursive: true });
  }

  const db = new Database(path);
  if (path !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  db.exec(readFileSync(schemaPath, 'utf-8'));

  return db;
}

export class SqliteCalendarStore implements CalendarStore {
  constructor(private readonly db: Database.Database) {}

  async createListing(listing: NewListing): Promise<IListing> {
    const row: ListingRow = {
      id: randomUUID(),
      name: listing.name,
      color: listing.color ?? null,
      created_at: new Date().toISOString()
    };

    this.db.prepare<ListingRow>(`
      INSERT INTO listings (id, name, color, created_at)
      VALUES (@id, @name, @color, @created_at)
    `).run(row);

    return convertRowToListing(row);
  }

  async listListings(): Promise<IListing[]> {
    const rows = this.db.prepare<[], ListingRow>(`
      SELECT * FROM listings ORDER BY created_at ASC, rowid ASC
    `).all();

    return rows.map(convertRowToListing);
  }

  async findListingById(id: string): Promise<IListing | null> {
    const row = this.db.prepare<[string], ListingRow>('SELECT * FROM listings WHERE id = ?').get(id);
    return row ? convertRowToListing(row) : null;
  }

  /**
   * Enregistre une source ; une URL déjà présente pour cet hébergement
   * renvoie la source existante
   */
  async createSource(source: NewSource): Promise<CreateSourceResult> {
    const listing = await this.findListingById(source.listingId);
    if (!listing) {
      throw new NotFoundError('Listing not found');
    }

    const existing = this.db.prepare<[string, string], CalendarSourceRow>(`
      SELECT * FROM calendar_sources WHERE listing_id = ? AND url = ?
    `).get(source.listingId, source.url);

    if (existing) {
      return { source: convertRowToSource(existing), created: false };
    }

    const row: CalendarSourceRow = {
      id: randomUUID(),
      listing_id: source.listingId,
      name: source.name,
      url: source.url,
      source_type: source.sourceType,
      color: source.color ?? null,
      created_at: new Date().toISOString()
    };

    this.db.prepare<CalendarSourceRow>(`
      INSERT INTO calendar_sources (id, listing_id, name, url, source_type, color, created_at)
      VALUES (@id, @listing_id, @name, @url, @source_type, @color, @created_at)
    `).run(row);

    return { source: convertRowToSource(row), created: true };
  }

  async findSources(filter: SourceFilter = {}): Promise<ICalendarSource[]> {
    const rows = filter.listingId !== undefined
      ? this.db.prepare<[string], CalendarSourceRow>(`
          SELECT * FROM calendar_sources WHERE listing_id = ? ORDER BY created_at ASC, rowid ASC
        `).all(filter.listingId)
      : this.db.prepare<[], CalendarSourceRow>(`
          SELECT * FROM calendar_sources ORDER BY created_at ASC, rowid ASC
        `).all();

    return rows.map(convertRowToSource);
  }

  async findSourceById(id: string): Promise<ICalendarSource | null> {
    const row = this.db.prepare<[string], CalendarSourceRow>('SELECT * FROM calendar_sources WHERE id = ?').get(id);
    return row ? convertRowToSource(row) : null;
  }

  async deleteAllForSource(sourceId: string): Promise<number> {
    const result = this.db.prepare<[string]>('DELETE FROM events WHERE source_id = ?').run(sourceId);
    return result.changes;
  }

  async insertBatch(events: INewEvent[]): Promise<IEvent[]> {
    const insert = this.db.prepare<EventInsertParams>(`
      INSERT INTO events (
        id, listing_id, source_id, uid, title, start_at, end_at, all_day,
        location, description, status, raw_url, created_at, updated_at
      ) VALUES (
        @id, @listing_id, @source_id, @uid, @title, @start_at, @end_at, @all_day,
        @location, @description, @status, @raw_url, @created_at, @updated_at
      )
    `);

    const insertAll = this.db.transaction((rows: EventInsertParams[]) => {
      for (const row of rows) {
        insert.run(row);
      }
    });

    const stored: IEvent[] = events.map(event => ({ ...event, id: randomUUID() }));
    insertAll(stored.map(event => ({
      id: event.id,
      listing_id: event.listingId,
      source_id: event.sourceId,
      uid: event.uid,
      title: event.title,
      start_at: event.start.toISOString(),
      end_at: event.end.toISOString(),
      all_day: event.allDay ? 1 : 0,
      location: event.location,
      description: event.description,
      status: event.status,
      raw_url: event.rawUrl,
      created_at: event.createdAt.toISOString(),
      updated_at: event.updatedAt.toISOString()
    })));

    return stored;
  }

  async findEvents(query: EventQuery): Promise<IEventWithSource[]> {
    const conditions: string[] = [];
    const params: string[] = [];

    if (query.start) {
      conditions.push('e.start_at >= ?');
      params.push(query.start.toISOString());
    }
    if (query.end) {
      conditions.push('e.end_at <= ?');
      params.push(query.end.toISOString());
    }
    if (query.listingId !== undefined) {
      conditions.push('e.listing_id = ?');
      params.push(query.listingId);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const rows = this.db.prepare<string[], EventWithSourceRow>(`
      ${EVENT_WITH_SOURCE_SELECT}
      ${where}
      ORDER BY e.start_at ASC, e.rowid ASC
    `).all(...params);

    return rows.map(convertRowToEventWithSource);
  }

  async findEventsOverlapping(query: OverlapQuery): Promise<IEventWithSource[]> {
    const conditions = ['e.start_at < ?', 'e.end_at > ?'];
    const params = [query.to.toISOString(), query.from.toISOString()];

    if (query.listingId !== undefined) {
      conditions.push('e.listing_id = ?');
      params.push(query.listingId);
    }

    const rows = this.db.prepare<string[], EventWithSourceRow>(`
      ${EVENT_WITH_SOURCE_SELECT}
      WHERE ${conditions.join(' AND ')}
      ORDER BY e.start_at ASC, e.rowid ASC
    `).all(...params);

    return rows.map(convertRowToEventWithSource);
  }
}
