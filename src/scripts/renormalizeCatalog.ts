import { NORMALIZER_VERSION } from '../config/constants';
import { closeDatabase, db } from '../config/database';
import { CatalogIngestService } from '../services/catalog/ingest';
import { logger } from '../utils/logger';

async function renormalizeCatalog() {
  try {
    const summary = await new CatalogIngestService(db).renormalize();
    const total = Object.values(summary).reduce((sum, count) => sum + count, 0);

    console.log(`✓ Normalizer v${NORMALIZER_VERSION}: ${total} stored rows updated`);
    await closeDatabase();
    process.exit(0);
  } catch (error) {
    logger.error({ error }, 'Catalog renormalization failed');
    await closeDatabase();
    process.exit(1);
  }
}

void renormalizeCatalog();
