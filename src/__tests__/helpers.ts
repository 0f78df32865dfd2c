/**
 * Helpers pour les tests
 */

import { vi } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildApp } from '../app.js';
import { loadConfig, type AppConfig } from '../config/env.js';
import type { FeedFetcher } from '../services/ical/feedFetcher.js';
import { SqliteCalendarStore, openDatabase } from '../services/storage/sqliteCalendarStore.js';
import type { FetchFn } from '../utils/http.js';
import { silentLogger } from '../utils/logger.js';

/**
 * Crée un stockage SQLite en mémoire avec le schéma appliqué
 */
export function createTestStore(): SqliteCalendarStore {
  return new SqliteCalendarStore(openDatabase(':memory:'));
}

export function createTestConfig(overrides: Record<string, string> = {}): AppConfig {
  return loadConfig({
    DATABASE_PATH: ':memory:',
    FEED_FETCH_TIMEOUT_MS: '1000',
    WEBHOOK_TIMEOUT_MS: '1000',
    ...overrides
  });
}

/**
 * Construit un document iCal à partir de blocs VEVENT (lignes sans BEGIN/END)
 */
export function icalDocument(...events: string[][]): string {
  const lines = ['BEGIN:VCALENDAR', 'VERSION:2.0', 'PRODID:-//Test//Feed//EN'];
  for (const properties of events) {
    lines.push('BEGIN:VEVENT', ...properties, 'END:VEVENT');
  }
  lines.push('END:VCALENDAR');
  return lines.join('\r\n');
}

/**
 * Fetcher en mémoire : URL -> contenu, ou erreur à lever
 */
export class FakeFeedFetcher implements FeedFetcher {
  readonly calls: string[] = [];

  constructor(private readonly feeds: Map<string, string | Error>) {}

  setFeed(url: string, content: string | Error): void {
    this.feeds.set(url, content);
  }

  async fetch(url: string): Promise<string> {
    this.calls.push(url);
    const content = this.feeds.get(url);
    if (content === undefined) {
      throw new Error(`No feed registered for ${url}`);
    }
    if (content instanceof Error) {
      throw content;
    }
    return content;
  }
}

/**
 * Mock de fetch qui renvoie toujours la même réponse
 */
export function mockFetch(status = 200, body = '{}') {
  return vi.fn<FetchFn>(async () => new Response(body, { status }));
}

export interface TestApp {
  app: FastifyInstance;
  store: SqliteCalendarStore;
  fetcher: FakeFeedFetcher;
  fetchImpl: ReturnType<typeof mockFetch>;
}

/**
 * Application complète sur une base en mémoire, sans réseau
 */
export function buildTestApp(options: { config?: Record<string, string>; fetchImpl?: ReturnType<typeof mockFetch> } = {}): TestApp {
  const store = createTestStore();
  const fetcher = new FakeFeedFetcher(new Map());
  const fetchImpl = options.fetchImpl ?? mockFetch();

  const app = buildApp({
    services: {
      store,
      fetcher,
      fetchImpl,
      config: createTestConfig(options.config),
      logger: silentLogger
    }
  });

  return { app, store, fetcher, fetchImpl };
}
