import { closeDatabase, db } from '../config/database';
import { CatalogIngestService } from '../services/catalog/ingest';
import { logger } from '../utils/logger';

const TARGETS = ['exercise', 'food', 'exercise-alias', 'food-alias'] as const;
type Target = (typeof TARGETS)[number];

function isTarget(value: string | undefined): value is Target {
  return TARGETS.some((target) => target === value);
}

const [target, id] = process.argv.slice(2);

if (!isTarget(target) || !id) {
  console.error(`Usage: npm run catalog:deactivate -- <${TARGETS.join('|')}> <id>`);
  process.exit(1);
}

async function deactivate(kind: Target, entryId: string) {
  const ingest = new CatalogIngestService(db);

  try {
    switch (kind) {
      case 'exercise':
        await ingest.deactivateExercise(entryId);
        break;
      case 'food':
        await ingest.deactivateFood(entryId);
        break;
      case 'exercise-alias':
        await ingest.deactivateExerciseAlias(entryId);
        break;
      case 'food-alias':
        await ingest.deactivateFoodAlias(entryId);
        break;
    }

    console.log(`✓ Deactivated ${kind} ${entryId}`);
    await closeDatabase();
    process.exit(0);
  } catch (error) {
    logger.error({ error, kind, entryId }, 'Catalog deactivation failed');
    await closeDatabase();
    process.exit(1);
  }
}

void deactivate(target, id);
