import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { closeDatabase, db } from '../config/database';
import { CatalogIngestService } from '../services/catalog/ingest';
import { parseCatalogSeed } from '../services/catalog/seed';
import { logger } from '../utils/logger';

const __dirname = dirname(fileURLToPath(import.meta.url));
const seedPath = resolve(process.argv[2] ?? resolve(__dirname, '../../data/catalog-seed.json'));

async function seedCatalog() {
  try {
    const raw = await readFile(seedPath, 'utf-8');
    const catalog = parseCatalogSeed(JSON.parse(raw));
    const summary = await new CatalogIngestService(db).seed(catalog);

    console.log(`✓ Seeded ${summary.exercises} exercises and ${summary.foods} foods from ${seedPath}`);
    await closeDatabase();
    process.exit(0);
  } catch (error) {
    logger.error({ error, seedPath }, 'Catalog seed failed');
    await closeDatabase();
    process.exit(1);
  }
}

void seedCatalog();
