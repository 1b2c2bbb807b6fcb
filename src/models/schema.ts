import {
  pgTable,
  uuid,
  varchar,
  timestamp,
  boolean,
  pgEnum,
  index,
  uniqueIndex,
  text,
  jsonb,
  doublePrecision,
} from 'drizzle-orm/pg-core';
import { relations } from 'drizzle-orm';

export const exerciseKindEnum = pgEnum('exercise_kind', [
  'strength',
  'cardio',
  'mobility',
  'stretch',
  'skill',
  'other',
]);
export const exerciseModalityEnum = pgEnum('exercise_modality', [
  'free_weight',
  'machine_selectorized',
  'machine_plate_loaded',
  'cable',
  'smith',
  'bodyweight',
  'cardio_machine',
  'cardio_outdoor',
  'other',
]);
export const foodSourceEnum = pgEnum('food_source', ['usda_fdc', 'open_food_facts', 'user', 'manual', 'vendor']);
export const foodBasisEnum = pgEnum('food_basis', ['per_100g', 'per_serving', 'per_unit']);
export const aliasSourceEnum = pgEnum('alias_source', ['seed', 'user', 'import', 'llm']);

export const equipmentBrands = pgTable('equipment_brands', {
  id: uuid('id').defaultRandom().primaryKey(),
  brandName: text('brand_name').notNull(),
  brandNameNorm: text('brand_name_norm').notNull(),
  homepageUrl: text('homepage_url'),
  createdAt: timestamp('created_at').defaultNow().notNull(),
  updatedAt: timestamp('updated_at').defaultNow().notNull(),
}, (table) => ({
  uniqueNameNorm: uniqueIndex('equipment_brands_name_norm_unique').on(table.brandNameNorm),
}));

export const exercises = pgTable('exercises', {
  id: uuid('id').defaultRandom().primaryKey(),
  slug: varchar('slug', { length: 128 }).notNull().unique(),
  displayName: text('display_name').notNull(),
  displayNameNorm: text('display_name_norm').notNull(),
  kind: exerciseKindEnum('kind').notNull(),
  modality: exerciseModalityEnum('modality').notNull(),
  movementPattern: text('movement_pattern'),
  primaryMuscles: text('primary_muscles').array().default([]).notNull(),
  secondaryMuscles: text('secondary_muscles').array().default([]).notNull(),
  joints: text('joints').array().default([]).notNull(),
  equipmentRequired: text('equipment_required').array().default([]).notNull(),
  unilateral: boolean('unilateral').default(false).notNull(),
  isPublic: boolean('is_public').default(true).notNull(),
  isActive: boolean('is_active').default(true).notNull(),
  defaultLog: jsonb('default_log').default({}).notNull(),
  notes: text('notes'),
  source: text('source').default('seed').notNull(),
  createdAt: timestamp('created_at').defaultNow().notNull(),
  updatedAt: timestamp('updated_at').defaultNow().notNull(),
}, (table) => ({
  kindModalityIdx: index('exercises_kind_modality_idx').on(table.kind, table.modality),
  activeIdx: index('exercises_active_idx').on(table.isActive),
}));

export const exerciseAliases = pgTable('exercise_aliases', {
  id: uuid('id').defaultRandom().primaryKey(),
  exerciseId: uuid('exercise_id')
    .notNull()
    .references(() => exercises.id, { onDelete: 'cascade' }),
  alias: text('alias').notNull(),
  aliasNorm: text('alias_norm').notNull(),
  locale: varchar('locale', { length: 10 }).default('en').notNull(),
  brandId: uuid('brand_id').references(() => equipmentBrands.id),
  modelName: text('model_name'),
  source: aliasSourceEnum('source').default('user').notNull(),
  confidence: doublePrecision('confidence'),
  isActive: boolean('is_active').default(true).notNull(),
  createdAt: timestamp('created_at').defaultNow().notNull(),
  updatedAt: timestamp('updated_at').defaultNow().notNull(),
}, (table) => ({
  exerciseIdx: index('exercise_aliases_exercise_idx').on(table.exerciseId),
  localeIdx: index('exercise_aliases_locale_idx').on(table.locale),
  uniqueExerciseAliasLocale: uniqueIndex('exercise_aliases_exercise_alias_locale_unique')
    .on(table.exerciseId, table.aliasNorm, table.locale),
}));

export const foods = pgTable('foods', {
  id: uuid('id').defaultRandom().primaryKey(),
  displayName: text('display_name').notNull(),
  displayNameNorm: text('display_name_norm').notNull(),
  brand: text('brand'),
  barcode: varchar('barcode', { length: 32 }),
  source: foodSourceEnum('source').notNull(),
  sourceId: text('source_id'),
  basis: foodBasisEnum('basis').notNull(),
  servingSizeG: doublePrecision('serving_size_g'),
  kcal: doublePrecision('kcal'),
  proteinG: doublePrecision('protein_g'),
  carbsG: doublePrecision('carbs_g'),
  fatG: doublePrecision('fat_g'),
  fiberG: doublePrecision('fiber_g'),
  sugarG: doublePrecision('sugar_g'),
  sodiumMg: doublePrecision('sodium_mg'),
  isPublic: boolean('is_public').default(true).notNull(),
  isActive: boolean('is_active').default(true).notNull(),
  data: jsonb('data').default({}).notNull(),
  createdAt: timestamp('created_at').defaultNow().notNull(),
  updatedAt: timestamp('updated_at').defaultNow().notNull(),
}, (table) => ({
  uniqueSourceId: uniqueIndex('foods_source_source_id_unique').on(table.source, table.sourceId),
  barcodeIdx: index('foods_barcode_idx').on(table.barcode),
  activePublicIdx: index('foods_active_public_idx').on(table.isActive, table.isPublic),
}));

export const foodAliases = pgTable('food_aliases', {
  id: uuid('id').defaultRandom().primaryKey(),
  foodId: uuid('food_id')
    .notNull()
    .references(() => foods.id, { onDelete: 'cascade' }),
  alias: text('alias').notNull(),
  aliasNorm: text('alias_norm').notNull(),
  locale: varchar('locale', { length: 10 }).default('en').notNull(),
  source: aliasSourceEnum('source').default('user').notNull(),
  confidence: doublePrecision('confidence'),
  isActive: boolean('is_active').default(true).notNull(),
  createdAt: timestamp('created_at').defaultNow().notNull(),
  updatedAt: timestamp('updated_at').defaultNow().notNull(),
}, (table) => ({
  foodIdx: index('food_aliases_food_idx').on(table.foodId),
  localeIdx: index('food_aliases_locale_idx').on(table.locale),
  uniqueFoodAliasLocale: uniqueIndex('food_aliases_food_alias_locale_unique')
    .on(table.foodId, table.aliasNorm, table.locale),
}));

export const equipmentBrandsRelations = relations(equipmentBrands, ({ many }) => ({
  aliases: many(exerciseAliases),
}));

export const exercisesRelations = relations(exercises, ({ many }) => ({
  aliases: many(exerciseAliases),
}));

export const exerciseAliasesRelations = relations(exerciseAliases, ({ one }) => ({
  exercise: one(exercises, {
    fields: [exerciseAliases.exerciseId],
    references: [exercises.id],
  }),
  brand: one(equipmentBrands, {
    fields: [exerciseAliases.brandId],
    references: [equipmentBrands.id],
  }),
}));

export const foodsRelations = relations(foods, ({ many }) => ({
  aliases: many(foodAliases),
}));

export const foodAliasesRelations = relations(foodAliases, ({ one }) => ({
  food: one(foods, {
    fields: [foodAliases.foodId],
    references: [foods.id],
  }),
}));

export type ExerciseKind = (typeof exerciseKindEnum.enumValues)[number];
export type ExerciseModality = (typeof exerciseModalityEnum.enumValues)[number];
export type FoodSource = (typeof foodSourceEnum.enumValues)[number];
export type FoodBasis = (typeof foodBasisEnum.enumValues)[number];
export type AliasSource = (typeof aliasSourceEnum.enumValues)[number];
