/**
 * Catalog Ingest
 *
 * Write path for entities and aliases. Every raw text is stored next to its
 * normalized form so the resolver never normalizes stored rows at query time.
 */

import { asc, eq, gt } from 'drizzle-orm';
import type { Database } from '../../config/database';
import { DEFAULT_LOCALE } from '../../config/constants';
import {
  equipmentBrands,
  exerciseAliases,
  exercises,
  foodAliases,
  foods,
} from '../../models/schema';
import { withStoreErrors } from '../../utils/db';
import { NotFoundError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { normalizeText } from './normalize';
import type {
  CatalogSeed,
  ExerciseAliasSeed,
  ExerciseSeed,
  FoodAliasSeed,
  FoodSeed,
} from './seed';
import { paginateById } from './stores/paginate';

const RENORMALIZE_PAGE_SIZE = 500;

// ========== Row Builders ==========

export function buildBrandRow(brandName: string): typeof equipmentBrands.$inferInsert {
  return { brandName, brandNameNorm: normalizeText(brandName) };
}

export function buildExerciseRow(seed: ExerciseSeed): typeof exercises.$inferInsert {
  return {
    slug: seed.slug,
    displayName: seed.displayName,
    displayNameNorm: normalizeText(seed.displayName),
    kind: seed.kind,
    modality: seed.modality,
    movementPattern: seed.movementPattern ?? null,
    primaryMuscles: seed.primaryMuscles,
    secondaryMuscles: seed.secondaryMuscles,
    joints: seed.joints,
    equipmentRequired: seed.equipmentRequired,
    unilateral: seed.unilateral,
    defaultLog: seed.defaultLog,
    source: 'seed',
  };
}

export function buildExerciseAliasRow(
  exerciseId: string,
  seed: ExerciseAliasSeed,
  brandId: string | null
): typeof exerciseAliases.$inferInsert {
  return {
    exerciseId,
    alias: seed.alias,
    aliasNorm: normalizeText(seed.alias),
    locale: seed.locale ?? DEFAULT_LOCALE,
    brandId,
    modelName: seed.modelName ?? null,
    source: seed.source ?? 'seed',
    confidence: seed.confidence ?? null,
  };
}

export function buildFoodRow(seed: FoodSeed): typeof foods.$inferInsert {
  return {
    source: seed.source,
    sourceId: seed.sourceId,
    displayName: seed.displayName,
    displayNameNorm: normalizeText(seed.displayName),
    basis: seed.basis,
    brand: seed.brand ?? null,
    barcode: seed.barcode ?? null,
    kcal: seed.kcal ?? null,
    proteinG: seed.proteinG ?? null,
    carbsG: seed.carbsG ?? null,
    fatG: seed.fatG ?? null,
    isPublic: seed.isPublic,
  };
}

export function buildFoodAliasRow(foodId: string, seed: FoodAliasSeed): typeof foodAliases.$inferInsert {
  return {
    foodId,
    alias: seed.alias,
    aliasNorm: normalizeText(seed.alias),
    locale: seed.locale ?? DEFAULT_LOCALE,
    source: seed.source ?? 'seed',
    confidence: seed.confidence ?? null,
  };
}

/**
 * Columns a re-seed overwrites on an existing exercise. Curator-owned state
 * (active and public flags) is left as it is.
 */
export function buildExerciseUpdateSet(row: typeof exercises.$inferInsert): Partial<typeof exercises.$inferInsert> {
  return {
    displayName: row.displayName,
    displayNameNorm: row.displayNameNorm,
    kind: row.kind,
    modality: row.modality,
    movementPattern: row.movementPattern,
    primaryMuscles: row.primaryMuscles,
    secondaryMuscles: row.secondaryMuscles,
    joints: row.joints,
    equipmentRequired: row.equipmentRequired,
    unilateral: row.unilateral,
    defaultLog: row.defaultLog,
    updatedAt: new Date(),
  };
}

/**
 * Columns a re-seed overwrites on an existing food. Like exercises, the active
 * and public flags stay under curator control.
 */
export function buildFoodUpdateSet(row: typeof foods.$inferInsert): Partial<typeof foods.$inferInsert> {
  return {
    displayName: row.displayName,
    displayNameNorm: row.displayNameNorm,
    basis: row.basis,
    brand: row.brand,
    barcode: row.barcode,
    kcal: row.kcal,
    proteinG: row.proteinG,
    carbsG: row.carbsG,
    fatG: row.fatG,
    updatedAt: new Date(),
  };
}

// ========== Service ==========

export interface SeedSummary {
  brands: number;
  exercises: number;
  exerciseAliasesInserted: number;
  foods: number;
  foodAliasesInserted: number;
}

export interface RenormalizeSummary {
  equipmentBrands: number;
  exercises: number;
  exerciseAliases: number;
  foods: number;
  foodAliases: number;
}

export class CatalogIngestService {
  constructor(private db: Database) {}

  async upsertBrand(brandName: string): Promise<string> {
    const row = buildBrandRow(brandName);
    const [brand] = await withStoreErrors('brand upsert', () =>
      this.db
        .insert(equipmentBrands)
        .values(row)
        .onConflictDoUpdate({
          target: equipmentBrands.brandNameNorm,
          set: { brandName: row.brandName, updatedAt: new Date() },
        })
        .returning({ id: equipmentBrands.id })
        .execute()
    );
    return brand.id;
  }

  async upsertExercise(seed: ExerciseSeed): Promise<string> {
    const row = buildExerciseRow(seed);
    const [exercise] = await withStoreErrors('exercise upsert', () =>
      this.db
        .insert(exercises)
        .values(row)
        .onConflictDoUpdate({
          target: exercises.slug,
          set: buildExerciseUpdateSet(row),
        })
        .returning({ id: exercises.id })
        .execute()
    );
    return exercise.id;
  }

  /**
   * Insert an alias unless the same normalized text already exists for the
   * exercise and locale. Returns whether a row was inserted.
   */
  async addExerciseAlias(exerciseId: string, seed: ExerciseAliasSeed, brandId: string | null = null): Promise<boolean> {
    const inserted = await withStoreErrors('exercise alias insert', () =>
      this.db
        .insert(exerciseAliases)
        .values(buildExerciseAliasRow(exerciseId, seed, brandId))
        .onConflictDoNothing({
          target: [exerciseAliases.exerciseId, exerciseAliases.aliasNorm, exerciseAliases.locale],
        })
        .returning({ id: exerciseAliases.id })
        .execute()
    );
    return inserted.length > 0;
  }

  async upsertFood(seed: FoodSeed): Promise<string> {
    const row = buildFoodRow(seed);
    const [food] = await withStoreErrors('food upsert', () =>
      this.db
        .insert(foods)
        .values(row)
        .onConflictDoUpdate({
          target: [foods.source, foods.sourceId],
          set: buildFoodUpdateSet(row),
        })
        .returning({ id: foods.id })
        .execute()
    );
    return food.id;
  }

  async addFoodAlias(foodId: string, seed: FoodAliasSeed): Promise<boolean> {
    const inserted = await withStoreErrors('food alias insert', () =>
      this.db
        .insert(foodAliases)
        .values(buildFoodAliasRow(foodId, seed))
        .onConflictDoNothing({
          target: [foodAliases.foodId, foodAliases.aliasNorm, foodAliases.locale],
        })
        .returning({ id: foodAliases.id })
        .execute()
    );
    return inserted.length > 0;
  }

  async deactivateExercise(exerciseId: string): Promise<void> {
    const updated = await withStoreErrors('exercise deactivate', () =>
      this.db
        .update(exercises)
        .set({ isActive: false, updatedAt: new Date() })
        .where(eq(exercises.id, exerciseId))
        .returning({ id: exercises.id })
        .execute()
    );
    if (updated.length === 0) {
      throw new NotFoundError('Exercise not found');
    }
    logger.info({ exerciseId }, 'Exercise deactivated');
  }

  async deactivateFood(foodId: string): Promise<void> {
    const updated = await withStoreErrors('food deactivate', () =>
      this.db
        .update(foods)
        .set({ isActive: false, updatedAt: new Date() })
        .where(eq(foods.id, foodId))
        .returning({ id: foods.id })
        .execute()
    );
    if (updated.length === 0) {
      throw new NotFoundError('Food not found');
    }
    logger.info({ foodId }, 'Food deactivated');
  }

  async deactivateExerciseAlias(aliasId: string): Promise<void> {
    const updated = await withStoreErrors('exercise alias deactivate', () =>
      this.db
        .update(exerciseAliases)
        .set({ isActive: false, updatedAt: new Date() })
        .where(eq(exerciseAliases.id, aliasId))
        .returning({ id: exerciseAliases.id })
        .execute()
    );
    if (updated.length === 0) {
      throw new NotFoundError('Exercise alias not found');
    }
  }

  async deactivateFoodAlias(aliasId: string): Promise<void> {
    const updated = await withStoreErrors('food alias deactivate', () =>
      this.db
        .update(foodAliases)
        .set({ isActive: false, updatedAt: new Date() })
        .where(eq(foodAliases.id, aliasId))
        .returning({ id: foodAliases.id })
        .execute()
    );
    if (updated.length === 0) {
      throw new NotFoundError('Food alias not found');
    }
  }

  async seed(catalog: CatalogSeed): Promise<SeedSummary> {
    const summary: SeedSummary = {
      brands: 0,
      exercises: 0,
      exerciseAliasesInserted: 0,
      foods: 0,
      foodAliasesInserted: 0,
    };

    const brandIds = new Map<string, string>();
    const resolveBrand = async (name: string): Promise<string> => {
      const key = normalizeText(name);
      const existing = brandIds.get(key);
      if (existing) return existing;

      const id = await this.upsertBrand(name);
      brandIds.set(key, id);
      summary.brands++;
      return id;
    };

    for (const brand of catalog.brands) {
      await resolveBrand(brand);
    }

    for (const exercise of catalog.exercises) {
      const exerciseId = await this.upsertExercise(exercise);
      summary.exercises++;

      for (const alias of exercise.aliases) {
        const brandId = alias.brand ? await resolveBrand(alias.brand) : null;
        if (await this.addExerciseAlias(exerciseId, alias, brandId)) {
          summary.exerciseAliasesInserted++;
        }
      }
    }

    for (const food of catalog.foods) {
      const foodId = await this.upsertFood(food);
      summary.foods++;

      for (const alias of food.aliases) {
        if (await this.addFoodAlias(foodId, alias)) {
          summary.foodAliasesInserted++;
        }
      }
    }

    logger.info(summary, 'Catalog seed complete');
    return summary;
  }

  /**
   * Rewrite every stored normalized column that differs from the current
   * normalizeText output.
   */
  async renormalize(): Promise<RenormalizeSummary> {
    const summary: RenormalizeSummary = {
      equipmentBrands: await this.renormalizeTable(
        'equipment brands',
        (afterId, pageSize) =>
          this.db
            .select({ id: equipmentBrands.id, raw: equipmentBrands.brandName, norm: equipmentBrands.brandNameNorm })
            .from(equipmentBrands)
            .where(afterId ? gt(equipmentBrands.id, afterId) : undefined)
            .orderBy(asc(equipmentBrands.id))
            .limit(pageSize)
            .execute(),
        (id, norm) =>
          this.db
            .update(equipmentBrands)
            .set({ brandNameNorm: norm, updatedAt: new Date() })
            .where(eq(equipmentBrands.id, id))
            .execute()
      ),
      exercises: await this.renormalizeTable(
        'exercises',
        (afterId, pageSize) =>
          this.db
            .select({ id: exercises.id, raw: exercises.displayName, norm: exercises.displayNameNorm })
            .from(exercises)
            .where(afterId ? gt(exercises.id, afterId) : undefined)
            .orderBy(asc(exercises.id))
            .limit(pageSize)
            .execute(),
        (id, norm) =>
          this.db
            .update(exercises)
            .set({ displayNameNorm: norm, updatedAt: new Date() })
            .where(eq(exercises.id, id))
            .execute()
      ),
      exerciseAliases: await this.renormalizeTable(
        'exercise aliases',
        (afterId, pageSize) =>
          this.db
            .select({ id: exerciseAliases.id, raw: exerciseAliases.alias, norm: exerciseAliases.aliasNorm })
            .from(exerciseAliases)
            .where(afterId ? gt(exerciseAliases.id, afterId) : undefined)
            .orderBy(asc(exerciseAliases.id))
            .limit(pageSize)
            .execute(),
        (id, norm) =>
          this.db
            .update(exerciseAliases)
            .set({ aliasNorm: norm, updatedAt: new Date() })
            .where(eq(exerciseAliases.id, id))
            .execute()
      ),
      foods: await this.renormalizeTable(
        'foods',
        (afterId, pageSize) =>
          this.db
            .select({ id: foods.id, raw: foods.displayName, norm: foods.displayNameNorm })
            .from(foods)
            .where(afterId ? gt(foods.id, afterId) : undefined)
            .orderBy(asc(foods.id))
            .limit(pageSize)
            .execute(),
        (id, norm) =>
          this.db
            .update(foods)
            .set({ displayNameNorm: norm, updatedAt: new Date() })
            .where(eq(foods.id, id))
            .execute()
      ),
      foodAliases: await this.renormalizeTable(
        'food aliases',
        (afterId, pageSize) =>
          this.db
            .select({ id: foodAliases.id, raw: foodAliases.alias, norm: foodAliases.aliasNorm })
            .from(foodAliases)
            .where(afterId ? gt(foodAliases.id, afterId) : undefined)
            .orderBy(asc(foodAliases.id))
            .limit(pageSize)
            .execute(),
        (id, norm) =>
          this.db
            .update(foodAliases)
            .set({ aliasNorm: norm, updatedAt: new Date() })
            .where(eq(foodAliases.id, id))
            .execute()
      ),
    };

    logger.info(summary, 'Catalog renormalization complete');
    return summary;
  }

  private async renormalizeTable(
    table: string,
    fetchPage: (afterId: string | null, pageSize: number) => Promise<Array<{ id: string; raw: string; norm: string }>>,
    update: (id: string, norm: string) => Promise<unknown>
  ): Promise<number> {
    let updated = 0;
    const rows = paginateById(
      (afterId, pageSize) => withStoreErrors(`${table} renormalize read`, () => fetchPage(afterId, pageSize)),
      RENORMALIZE_PAGE_SIZE
    );

    for await (const row of rows) {
      const norm = normalizeText(row.raw);
      if (norm !== row.norm) {
        await withStoreErrors(`${table} renormalize write`, () => update(row.id, norm));
        updated++;
      }
    }

    logger.debug({ table, updated }, 'Renormalized table');
    return updated;
  }
}
