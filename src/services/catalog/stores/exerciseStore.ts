import { and, asc, eq, gt } from 'drizzle-orm';
import type { Database } from '../../../config/database';
import { equipmentBrands, exerciseAliases, exercises } from '../../../models/schema';
import { isActive, withStoreErrors } from '../../../utils/db';
import type {
  AliasCandidate,
  CandidateStore,
  CanonicalCandidate,
  ExerciseSummary,
} from '../types';
import { paginateById } from './paginate';

const exerciseSummaryColumns = {
  id: exercises.id,
  displayName: exercises.displayName,
  slug: exercises.slug,
  kind: exercises.kind,
  modality: exercises.modality,
  movementPattern: exercises.movementPattern,
  primaryMuscles: exercises.primaryMuscles,
  secondaryMuscles: exercises.secondaryMuscles,
  joints: exercises.joints,
  equipmentRequired: exercises.equipmentRequired,
  unilateral: exercises.unilateral,
};

export interface StoreOptions {
  pageSize: number;
}

export class ExerciseCandidateStore implements CandidateStore<ExerciseSummary> {
  constructor(
    private db: Database,
    private options: StoreOptions
  ) {}

  async *canonicalCandidates(activeOnly: boolean): AsyncGenerator<CanonicalCandidate<ExerciseSummary>> {
    const rows = paginateById(
      (afterId, pageSize) =>
        withStoreErrors('exercise canonical read', () =>
          this.db
            .select({
              id: exercises.id,
              displayNameNorm: exercises.displayNameNorm,
              exercise: exerciseSummaryColumns,
            })
            .from(exercises)
            .where(
              and(
                activeOnly ? isActive(exercises.isActive) : undefined,
                afterId ? gt(exercises.id, afterId) : undefined
              )
            )
            .orderBy(asc(exercises.id))
            .limit(pageSize)
            .execute()
        ),
      this.options.pageSize
    );

    for await (const row of rows) {
      yield {
        entity: row.exercise,
        normalizedName: row.displayNameNorm,
        rawName: row.exercise.displayName,
      };
    }
  }

  async *aliasCandidates(locale: string, activeOnly: boolean): AsyncGenerator<AliasCandidate<ExerciseSummary>> {
    const rows = paginateById(
      (afterId, pageSize) =>
        withStoreErrors('exercise alias read', () =>
          this.db
            .select({
              id: exerciseAliases.id,
              alias: exerciseAliases.alias,
              aliasNorm: exerciseAliases.aliasNorm,
              modelName: exerciseAliases.modelName,
              brandName: equipmentBrands.brandName,
              exercise: exerciseSummaryColumns,
            })
            .from(exerciseAliases)
            .innerJoin(exercises, eq(exercises.id, exerciseAliases.exerciseId))
            .leftJoin(equipmentBrands, eq(equipmentBrands.id, exerciseAliases.brandId))
            .where(
              and(
                eq(exerciseAliases.locale, locale),
                activeOnly ? isActive(exerciseAliases.isActive) : undefined,
                activeOnly ? isActive(exercises.isActive) : undefined,
                afterId ? gt(exerciseAliases.id, afterId) : undefined
              )
            )
            .orderBy(asc(exerciseAliases.id))
            .limit(pageSize)
            .execute()
        ),
      this.options.pageSize
    );

    for await (const row of rows) {
      yield {
        entity: row.exercise,
        normalizedAlias: row.aliasNorm,
        rawAlias: row.alias,
        brand: row.brandName,
        model: row.modelName,
      };
    }
  }
}
