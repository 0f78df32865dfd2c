/**
 * Tests du stockage SQLite
 */

import { describe, it, expect, beforeEach } from 'vitest';
import type { SqliteCalendarStore } from '../sqliteCalendarStore.js';
import type { ICalendarSource, IListing, INewEvent } from '../../../types/api.js';
import { SourceType } from '../../../types/api.js';
import { NotFoundError } from '../../../utils/errors.js';
import { createTestStore } from '../../../__tests__/helpers.js';

const CREATED = new Date('2024-01-01T00:00:00.000Z');

function newEvent(source: ICalendarSource, uid: string, start: string, end: string): INewEvent {
  return {
    listingId: source.listingId,
    sourceId: source.id,
    uid,
    title: `Stay ${uid}`,
    start: new Date(start),
    end: new Date(end),
    allDay: false,
    location: null,
    description: null,
    status: null,
    rawUrl: source.url,
    createdAt: CREATED,
    updatedAt: CREATED
  };
}

describe('SqliteCalendarStore', () => {
  let store: SqliteCalendarStore;
  let villa: IListing;
  let airbnb: ICalendarSource;

  beforeEach(async () => {
    store = createTestStore();
    villa = await store.createListing({ name: 'Villa Azul', color: '#ff8800' });
    airbnb = (await store.createSource({
      listingId: villa.id,
      name: 'Airbnb',
      url: 'https://airbnb.example.com/1.ics',
      sourceType: SourceType.Ical
    })).source;
  });

  describe('listings', () => {
    it('should create and list listings in creation order', async () => {
      const cottage = await store.createListing({ name: 'Cottage' });

      expect(cottage.color).toBeNull();
      expect(await store.listListings()).toEqual([villa, cottage]);
      expect(await store.findListingById(cottage.id)).toEqual(cottage);
      expect(await store.findListingById('missing')).toBeNull();
    });
  });

  describe('sources', () => {
    it('should create a source attached to its listing', async () => {
      expect(airbnb).toMatchObject({
        listingId: villa.id,
        name: 'Airbnb',
        url: 'https://airbnb.example.com/1.ics',
        sourceType: SourceType.Ical,
        color: null
      });
      expect(await store.findSourceById(airbnb.id)).toEqual(airbnb);
    });

    it('should return the existing source for a duplicate URL', async () => {
      const result = await store.createSource({
        listingId: villa.id,
        name: 'Airbnb again',
        url: 'https://airbnb.example.com/1.ics',
        sourceType: SourceType.Ical
      });

      expect(result.created).toBe(false);
      expect(result.source).toEqual(airbnb);
      expect(await store.findSources()).toHaveLength(1);
    });

    it('should accept the same URL on another listing', async () => {
      const cottage = await store.createListing({ name: 'Cottage' });
      const result = await store.createSource({
        listingId: cottage.id,
        name: 'Airbnb',
        url: 'https://airbnb.example.com/1.ics',
        sourceType: SourceType.Ical
      });

      expect(result.created).toBe(true);
      expect(await store.findSources({ listingId: cottage.id })).toEqual([result.source]);
      expect(await store.findSources()).toHaveLength(2);
    });

    it('should reject a source for an unknown listing', async () => {
      await expect(store.createSource({
        listingId: 'missing',
        name: 'Airbnb',
        url: 'https://airbnb.example.com/2.ics',
        sourceType: SourceType.Ical
      })).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('events', () => {
    it('should insert a batch and read it back with the source data', async () => {
      const [stored] = await store.insertBatch([
        newEvent(airbnb, 'a', '2024-01-15T14:00:00.000Z', '2024-01-18T10:00:00.000Z')
      ]);

      const events = await store.findEvents({});

      expect(events).toEqual([{ ...stored, sourceName: 'Airbnb', sourceColor: '#ff8800' }]);
    });

    it('should prefer the source color over the listing color', async () => {
      const booking = (await store.createSource({
        listingId: villa.id,
        name: 'Booking.com',
        url: 'https://booking.example.com/1.ics',
        sourceType: SourceType.Ical,
        color: '#003580'
      })).source;
      await store.insertBatch([newEvent(booking, 'b', '2024-01-15T00:00:00.000Z', '2024-01-16T00:00:00.000Z')]);

      const [event] = await store.findEvents({});
      expect(event.sourceColor).toBe('#003580');
    });

    it('should delete only the events of one source', async () => {
      const booking = (await store.createSource({
        listingId: villa.id,
        name: 'Booking.com',
        url: 'https://booking.example.com/1.ics',
        sourceType: SourceType.Ical
      })).source;
      await store.insertBatch([
        newEvent(airbnb, 'a1', '2024-01-15T00:00:00.000Z', '2024-01-16T00:00:00.000Z'),
        newEvent(airbnb, 'a2', '2024-01-17T00:00:00.000Z', '2024-01-18T00:00:00.000Z'),
        newEvent(booking, 'b1', '2024-01-19T00:00:00.000Z', '2024-01-20T00:00:00.000Z')
      ]);

      expect(await store.deleteAllForSource(airbnb.id)).toBe(2);
      expect(await store.deleteAllForSource(airbnb.id)).toBe(0);
      expect((await store.findEvents({})).map(event => event.uid)).toEqual(['b1']);
    });

    it('should order events by start', async () => {
      await store.insertBatch([
        newEvent(airbnb, 'late', '2024-03-01T00:00:00.000Z', '2024-03-02T00:00:00.000Z'),
        newEvent(airbnb, 'early', '2024-01-01T00:00:00.000Z', '2024-01-02T00:00:00.000Z'),
        newEvent(airbnb, 'middle', '2024-02-01T00:00:00.000Z', '2024-02-02T00:00:00.000Z')
      ]);

      expect((await store.findEvents({})).map(event => event.uid)).toEqual(['early', 'middle', 'late']);
    });

    it('should keep events fully inside the display window', async () => {
      await store.insertBatch([
        newEvent(airbnb, 'before', '2024-01-05T00:00:00.000Z', '2024-01-11T00:00:00.000Z'),
        newEvent(airbnb, 'inside', '2024-01-12T00:00:00.000Z', '2024-01-14T00:00:00.000Z'),
        newEvent(airbnb, 'edges', '2024-01-10T00:00:00.000Z', '2024-01-20T00:00:00.000Z'),
        newEvent(airbnb, 'after', '2024-01-18T00:00:00.000Z', '2024-01-22T00:00:00.000Z')
      ]);

      const events = await store.findEvents({
        start: new Date('2024-01-10T00:00:00.000Z'),
        end: new Date('2024-01-20T00:00:00.000Z')
      });

      expect(events.map(event => event.uid)).toEqual(['edges', 'inside']);
    });

    it('should filter events by listing', async () => {
      const cottage = await store.createListing({ name: 'Cottage' });
      const vrbo = (await store.createSource({
        listingId: cottage.id,
        name: 'Vrbo',
        url: 'https://vrbo.example.com/1.ics',
        sourceType: SourceType.Ical
      })).source;
      await store.insertBatch([
        newEvent(airbnb, 'villa', '2024-01-15T00:00:00.000Z', '2024-01-16T00:00:00.000Z'),
        newEvent(vrbo, 'cottage', '2024-01-15T00:00:00.000Z', '2024-01-16T00:00:00.000Z')
      ]);

      const events = await store.findEvents({ listingId: cottage.id });
      expect(events.map(event => event.uid)).toEqual(['cottage']);
      expect(events[0].sourceColor).toBeNull();
    });

    it('should find events overlapping a half-open range', async () => {
      await store.insertBatch([
        newEvent(airbnb, 'ends-at-from', '2024-01-08T00:00:00.000Z', '2024-01-10T00:00:00.000Z'),
        newEvent(airbnb, 'spans-from', '2024-01-09T00:00:00.000Z', '2024-01-11T00:00:00.000Z'),
        newEvent(airbnb, 'inside', '2024-01-12T00:00:00.000Z', '2024-01-13T00:00:00.000Z'),
        newEvent(airbnb, 'starts-at-to', '2024-01-17T00:00:00.000Z', '2024-01-19T00:00:00.000Z')
      ]);

      const events = await store.findEventsOverlapping({
        from: new Date('2024-01-10T00:00:00.000Z'),
        to: new Date('2024-01-17T00:00:00.000Z')
      });

      expect(events.map(event => event.uid)).toEqual(['spans-from', 'inside']);
    });

    it('should store nothing from a batch containing an invalid date', async () => {
      const valid = newEvent(airbnb, 'ok', '2024-01-15T00:00:00.000Z', '2024-01-16T00:00:00.000Z');
      const invalid = { ...newEvent(airbnb, 'bad', '2024-01-17T00:00:00.000Z', '2024-01-18T00:00:00.000Z'), start: new Date('invalid') };

      await expect(store.insertBatch([valid, invalid])).rejects.toThrow();
      expect(await store.findEvents({})).toEqual([]);
    });
  });
});
