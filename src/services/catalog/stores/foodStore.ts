import { and, asc, eq, gt } from 'drizzle-orm';
import type { Database } from '../../../config/database';
import { foodAliases, foods } from '../../../models/schema';
import { isActive, withStoreErrors } from '../../../utils/db';
import type {
  AliasCandidate,
  CandidateStore,
  CanonicalCandidate,
  FoodSummary,
} from '../types';
import type { StoreOptions } from './exerciseStore';
import { paginateById } from './paginate';

export const foodSummaryColumns = {
  id: foods.id,
  displayName: foods.displayName,
  brand: foods.brand,
  barcode: foods.barcode,
  source: foods.source,
  basis: foods.basis,
  kcal: foods.kcal,
  proteinG: foods.proteinG,
  carbsG: foods.carbsG,
  fatG: foods.fatG,
};

export interface FoodStoreOptions extends StoreOptions {
  /** Restrict candidates to foods approved for public search. Defaults to true. */
  publicOnly?: boolean;
}

export class FoodCandidateStore implements CandidateStore<FoodSummary> {
  private publicOnly: boolean;

  constructor(
    private db: Database,
    private options: FoodStoreOptions
  ) {
    this.publicOnly = options.publicOnly ?? true;
  }

  async *canonicalCandidates(activeOnly: boolean): AsyncGenerator<CanonicalCandidate<FoodSummary>> {
    const rows = paginateById(
      (afterId, pageSize) =>
        withStoreErrors('food canonical read', () =>
          this.db
            .select({
              id: foods.id,
              displayNameNorm: foods.displayNameNorm,
              food: foodSummaryColumns,
            })
            .from(foods)
            .where(
              and(
                activeOnly ? isActive(foods.isActive) : undefined,
                this.publicOnly ? eq(foods.isPublic, true) : undefined,
                afterId ? gt(foods.id, afterId) : undefined
              )
            )
            .orderBy(asc(foods.id))
            .limit(pageSize)
            .execute()
        ),
      this.options.pageSize
    );

    for await (const row of rows) {
      yield {
        entity: row.food,
        normalizedName: row.displayNameNorm,
        rawName: row.food.displayName,
      };
    }
  }

  async *aliasCandidates(locale: string, activeOnly: boolean): AsyncGenerator<AliasCandidate<FoodSummary>> {
    const rows = paginateById(
      (afterId, pageSize) =>
        withStoreErrors('food alias read', () =>
          this.db
            .select({
              id: foodAliases.id,
              alias: foodAliases.alias,
              aliasNorm: foodAliases.aliasNorm,
              food: foodSummaryColumns,
            })
            .from(foodAliases)
            .innerJoin(foods, eq(foods.id, foodAliases.foodId))
            .where(
              and(
                eq(foodAliases.locale, locale),
                activeOnly ? isActive(foodAliases.isActive) : undefined,
                activeOnly ? isActive(foods.isActive) : undefined,
                this.publicOnly ? eq(foods.isPublic, true) : undefined,
                afterId ? gt(foodAliases.id, afterId) : undefined
              )
            )
            .orderBy(asc(foodAliases.id))
            .limit(pageSize)
            .execute()
        ),
      this.options.pageSize
    );

    for await (const row of rows) {
      yield {
        entity: row.food,
        normalizedAlias: row.aliasNorm,
        rawAlias: row.alias,
        brand: null,
        model: null,
      };
    }
  }
}
