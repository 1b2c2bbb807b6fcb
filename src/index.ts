import { env } from './config/env';
import { closeDatabase, db, testConnection } from './config/database';
import { createApp } from './app';
import { logger } from './utils/logger';
import {
  CatalogResolver,
  ExerciseCandidateStore,
  FoodCandidateStore,
  FoodCatalogService,
  PostgresFoodRecordStore,
} from './services/catalog';

const exercises = new CatalogResolver(
  new ExerciseCandidateStore(db, { pageSize: env.CATALOG_PAGE_SIZE }),
  { name: 'exercises', snapshotTtlMs: env.CATALOG_SNAPSHOT_TTL_MS, maxCachedLocales: env.CATALOG_MAX_CACHED_LOCALES }
);
const foods = new CatalogResolver(
  new FoodCandidateStore(db, { pageSize: env.CATALOG_PAGE_SIZE }),
  { name: 'foods', snapshotTtlMs: env.CATALOG_SNAPSHOT_TTL_MS, maxCachedLocales: env.CATALOG_MAX_CACHED_LOCALES }
);

const foodCatalog = new FoodCatalogService(new PostgresFoodRecordStore(db), foods);

const app = createApp({ exercises, foods, foodCatalog });

const server = app.listen(env.PORT, '0.0.0.0', async () => {
  logger.info(`Server running on port ${env.PORT} in ${env.NODE_ENV} mode`);

  const connected = await testConnection();
  if (!connected) {
    logger.warn('Catalog store not reachable yet; searches will fail until it is');
  }
});

function shutdown(signal: string) {
  logger.info(`${signal} received, shutting down gracefully`);
  server.close(async () => {
    try {
      await closeDatabase();
      logger.info('Server closed');
      process.exit(0);
    } catch (error) {
      logger.error({ error }, 'Failed to close database');
      process.exit(1);
    }
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
