/**
 * Point d'entrée du serveur
 *
 * Charge la configuration, ouvre la base SQLite et démarre Fastify.
 */

import 'reflect-metadata';
import { buildApp } from './app.js';
import { loadConfig } from './config/env.js';
import { HttpFeedFetcher } from './services/ical/feedFetcher.js';
import { SqliteCalendarStore, openDatabase } from './services/storage/sqliteCalendarStore.js';
import { createLogger } from './utils/logger.js';

const config = loadConfig();
const db = openDatabase(config.DATABASE_PATH);

const app = buildApp({
  services: {
    store: new SqliteCalendarStore(db),
    fetcher: new HttpFeedFetcher(),
    fetchImpl: (input, init) => fetch(input, init),
    config,
    logger: createLogger()
  },
  logger: { level: config.LOG_LEVEL }
});

app.addHook('onClose', (instance, done) => {
  db.close();
  done();
});

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    app.log.info(`${signal} received, shutting down`);
    app.close().then(
      () => process.exit(0),
      (error: unknown) => {
        app.log.error({ err: error }, 'Error during shutdown');
        process.exit(1);
      }
    );
  });
}

try {
  await app.listen({ port: config.PORT, host: config.HOST });
} catch (error) {
  app.log.error({ err: error }, 'Failed to start server');
  process.exit(1);
}
