/**
 * Tests des routes hébergements et sources
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { buildTestApp, type TestApp } from '../../__tests__/helpers.js';

describe('Listings & Sources Routes', () => {
  let ctx: TestApp;

  beforeEach(() => {
    ctx = buildTestApp();
  });

  afterEach(async () => {
    await ctx.app.close();
  });

  async function createListing(name = 'Villa Azul', color?: string): Promise<string> {
    const response = await ctx.app.inject({
      method: 'POST',
      url: '/api/listings',
      payload: { name, color }
    });
    return response.json().id;
  }

  describe('POST /api/listings', () => {
    it('should create a listing', async () => {
      const response = await ctx.app.inject({
        method: 'POST',
        url: '/api/listings',
        payload: { name: '  Villa Azul ', color: '#ff8800' }
      });

      expect(response.statusCode).toBe(201);
      const body = response.json();
      expect(body).toMatchObject({ name: 'Villa Azul', color: '#ff8800' });
      expect(typeof body.id).toBe('string');
      expect(typeof body.created_at).toBe('string');
    });

    it('should reject a listing without name', async () => {
      const response = await ctx.app.inject({
        method: 'POST',
        url: '/api/listings',
        payload: { color: '#ff8800' }
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({
        error: 'Invalid request body',
        details: ['name: Required']
      });
    });

    it('should reject malformed JSON', async () => {
      const response = await ctx.app.inject({
        method: 'POST',
        url: '/api/listings',
        headers: { 'content-type': 'application/json' },
        payload: '{"name":'
      });

      expect(response.statusCode).toBe(400);
      expect(typeof response.json().traceId).toBe('string');
    });
  });

  describe('GET /api/listings', () => {
    it('should list listings in creation order', async () => {
      const villaId = await createListing('Villa Azul');
      const cottageId = await createListing('Cottage');

      const response = await ctx.app.inject({ method: 'GET', url: '/api/listings' });

      expect(response.statusCode).toBe(200);
      expect(response.json().map((listing: { id: string }) => listing.id)).toEqual([villaId, cottageId]);
    });
  });

  describe('POST /api/sources', () => {
    it('should register a source with the iCal type by default', async () => {
      const listingId = await createListing();

      const response = await ctx.app.inject({
        method: 'POST',
        url: '/api/sources',
        payload: { listing_id: listingId, name: 'Airbnb', url: 'https://airbnb.example.com/1.ics' }
      });

      expect(response.statusCode).toBe(201);
      expect(response.json()).toMatchObject({
        listing_id: listingId,
        name: 'Airbnb',
        url: 'https://airbnb.example.com/1.ics',
        source_type: 'ical',
        color: null
      });
    });

    it('should return the existing source for a duplicate URL', async () => {
      const listingId = await createListing();
      const payload = { listing_id: listingId, name: 'Airbnb', url: 'https://airbnb.example.com/1.ics' };

      const first = await ctx.app.inject({ method: 'POST', url: '/api/sources', payload });
      const second = await ctx.app.inject({ method: 'POST', url: '/api/sources', payload: { ...payload, name: 'Other' } });

      expect(second.statusCode).toBe(200);
      expect(second.json()).toEqual(first.json());
    });

    it('should reject a non-http URL', async () => {
      const listingId = await createListing();

      const response = await ctx.app.inject({
        method: 'POST',
        url: '/api/sources',
        payload: { listing_id: listingId, name: 'Airbnb', url: 'ftp://airbnb.example.com/1.ics' }
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().details).toEqual(['url: Must be an http(s) URL']);
    });

    it('should reject an unsupported source type', async () => {
      const listingId = await createListing();

      const response = await ctx.app.inject({
        method: 'POST',
        url: '/api/sources',
        payload: { listing_id: listingId, name: 'Airbnb', url: 'https://airbnb.example.com/1.ics', source_type: 'caldav' }
      });

      expect(response.statusCode).toBe(400);
    });

    it('should answer 404 for an unknown listing', async () => {
      const response = await ctx.app.inject({
        method: 'POST',
        url: '/api/sources',
        payload: { listing_id: 'missing', name: 'Airbnb', url: 'https://airbnb.example.com/1.ics' }
      });

      expect(response.statusCode).toBe(404);
      expect(response.json().error).toBe('Listing not found');
    });
  });

  describe('GET /api/sources', () => {
    it('should filter sources by listing', async () => {
      const villaId = await createListing('Villa Azul');
      const cottageId = await createListing('Cottage');
      await ctx.app.inject({
        method: 'POST',
        url: '/api/sources',
        payload: { listing_id: villaId, name: 'Airbnb', url: 'https://airbnb.example.com/1.ics' }
      });
      await ctx.app.inject({
        method: 'POST',
        url: '/api/sources',
        payload: { listing_id: cottageId, name: 'Vrbo', url: 'https://vrbo.example.com/1.ics' }
      });

      const all = await ctx.app.inject({ method: 'GET', url: '/api/sources' });
      const cottage = await ctx.app.inject({ method: 'GET', url: `/api/sources?listing_id=${cottageId}` });

      expect(all.json()).toHaveLength(2);
      expect(cottage.json().map((source: { name: string }) => source.name)).toEqual(['Vrbo']);
    });

    it('should reject a repeated listing filter', async () => {
      const response = await ctx.app.inject({ method: 'GET', url: '/api/sources?listing_id=a&listing_id=b' });

      expect(response.statusCode).toBe(400);
      expect(response.json().details).toEqual(['listing_id: Expected string, received array']);
    });
  });
});
