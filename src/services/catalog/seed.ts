import { z } from 'zod';
import {
  aliasSourceEnum,
  exerciseKindEnum,
  exerciseModalityEnum,
  foodBasisEnum,
  foodSourceEnum,
} from '../../models/schema';
import { BARCODE_PATTERN, MAX_LOCALE_LENGTH, MIN_LOCALE_LENGTH } from '../../config/constants';

const localeSchema = z.string().min(MIN_LOCALE_LENGTH).max(MAX_LOCALE_LENGTH);
const confidenceSchema = z.number().min(0).max(1);

export const exerciseAliasSeedSchema = z.object({
  alias: z.string().trim().min(1),
  locale: localeSchema.optional(),
  brand: z.string().trim().min(1).optional(),
  modelName: z.string().trim().min(1).optional(),
  source: z.enum(aliasSourceEnum.enumValues).optional(),
  confidence: confidenceSchema.optional(),
});

export const exerciseSeedSchema = z.object({
  slug: z.string().regex(/^[a-z0-9_]+$/, 'slug must be lower-case snake_case'),
  displayName: z.string().trim().min(1),
  kind: z.enum(exerciseKindEnum.enumValues),
  modality: z.enum(exerciseModalityEnum.enumValues),
  movementPattern: z.string().optional(),
  primaryMuscles: z.array(z.string()).default([]),
  secondaryMuscles: z.array(z.string()).default([]),
  joints: z.array(z.string()).default([]),
  equipmentRequired: z.array(z.string()).default([]),
  unilateral: z.boolean().default(false),
  defaultLog: z.record(z.unknown()).default({}),
  aliases: z.array(exerciseAliasSeedSchema).default([]),
});

export const foodAliasSeedSchema = z.object({
  alias: z.string().trim().min(1),
  locale: localeSchema.optional(),
  source: z.enum(aliasSourceEnum.enumValues).optional(),
  confidence: confidenceSchema.optional(),
});

const nutrientSchema = z.number().nonnegative().optional();

export const foodSeedSchema = z.object({
  source: z.enum(foodSourceEnum.enumValues),
  sourceId: z.string().min(1),
  displayName: z.string().trim().min(1),
  basis: z.enum(foodBasisEnum.enumValues),
  brand: z.string().optional(),
  barcode: z.string().regex(BARCODE_PATTERN, 'barcode must be 8-14 digits').optional(),
  kcal: nutrientSchema,
  proteinG: nutrientSchema,
  carbsG: nutrientSchema,
  fatG: nutrientSchema,
  isPublic: z.boolean().default(true),
  aliases: z.array(foodAliasSeedSchema).default([]),
});

export const catalogSeedSchema = z.object({
  brands: z.array(z.string().trim().min(1)).default([]),
  exercises: z.array(exerciseSeedSchema).default([]),
  foods: z.array(foodSeedSchema).default([]),
});

export type ExerciseAliasSeed = z.infer<typeof exerciseAliasSeedSchema>;
export type ExerciseSeed = z.infer<typeof exerciseSeedSchema>;
export type FoodAliasSeed = z.infer<typeof foodAliasSeedSchema>;
export type FoodSeed = z.infer<typeof foodSeedSchema>;
export type CatalogSeed = z.infer<typeof catalogSeedSchema>;

export function parseCatalogSeed(input: unknown): CatalogSeed {
  const result = catalogSeedSchema.safeParse(input);
  if (!result.success) {
    const errors = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Catalog seed validation failed:\n${errors.join('\n')}`);
  }
  return result.data;
}
