import { beforeEach, describe, expect, test } from 'vitest';
import { createExercise, createFood, InMemoryCandidateStore, resetFactoryCounters } from '../../../__tests__/helpers';
import { InvalidArgumentError, InvalidQueryError } from '../../../utils/errors';
import { CatalogResolver, resolveMatches, validateResolveInput } from '../resolver';
import { indexAliases, indexCanonical } from '../snapshot';
import type { ExerciseSummary, FoodSummary } from '../types';

function createResolver<E extends ExerciseSummary | FoodSummary>(store: InMemoryCandidateStore<E>) {
  return new CatalogResolver(store, { name: 'test', snapshotTtlMs: 60_000 });
}

describe('validateResolveInput', () => {
  test('fills defaults', () => {
    expect(validateResolveInput('squat')).toEqual({
      query: 'squat',
      locale: 'en',
      maxResults: 25,
      minScore: 0,
    });
  });

  test('rejects empty and whitespace-only queries', () => {
    expect(() => validateResolveInput('')).toThrow(InvalidQueryError);
    expect(() => validateResolveInput('   \t')).toThrow(InvalidQueryError);
  });

  test('rejects queries that normalize to nothing', () => {
    expect(() => validateResolveInput('\u0301')).toThrow('Query has no searchable characters');
  });

  test('rejects out-of-range options', () => {
    expect(() => validateResolveInput('squat', { maxResults: 0 })).toThrow(InvalidArgumentError);
    expect(() => validateResolveInput('squat', { maxResults: 2.5 })).toThrow(InvalidArgumentError);
    expect(() => validateResolveInput('squat', { minScore: -0.1 })).toThrow(InvalidArgumentError);
    expect(() => validateResolveInput('squat', { minScore: 1.5 })).toThrow(InvalidArgumentError);
    expect(() => validateResolveInput('squat', { minScore: Number.NaN })).toThrow(InvalidArgumentError);
    expect(() => validateResolveInput('squat', { locale: ' ' })).toThrow('locale must be a non-empty string');
  });

  test('accepts boundary values', () => {
    expect(validateResolveInput('squat', { maxResults: 1, minScore: 1 })).toMatchObject({
      maxResults: 1,
      minScore: 1,
    });
  });
});

describe('CatalogResolver', () => {
  let store: InMemoryCandidateStore<ExerciseSummary>;

  beforeEach(() => {
    resetFactoryCounters();
    store = new InMemoryCandidateStore();
  });

  describe('matching', () => {
    test('exact canonical name scores 1 and ranks first', async () => {
      store.addEntity(createExercise('Barbell Back Squat'));
      const pulldown = store.addEntity(createExercise('Lat Pulldown'));
      store.addEntity(createExercise('Seated Cable Row'));

      const results = await createResolver(store).resolve('lat pulldown');

      expect(results[0]).toEqual({
        entity: pulldown,
        score: 1,
        matchedText: 'Lat Pulldown',
        matchedSource: 'canonical',
        brand: null,
        model: null,
      });
    });

    test('case, accents and extra whitespace do not lower the score', async () => {
      store.addEntity(createExercise('Lat Pulldown'));

      const results = await createResolver(store).resolve('  LÀT   PULLDOWN ');

      expect(results.map((r) => r.score)).toEqual([1]);
    });

    test('branded alias match carries brand and model', async () => {
      const press = store.addEntity(createExercise('Plate-Loaded Chest Press', { modality: 'machine_plate_loaded' }));
      store.addAlias({
        entity: press,
        alias: 'Hammer Strength Chest Press',
        brand: 'Hammer Strength',
        model: 'Iso-Lateral',
      });

      const [top] = await createResolver(store).resolve('hammer strength chest press');

      expect(top).toEqual({
        entity: press,
        score: 1,
        matchedText: 'Hammer Strength Chest Press',
        matchedSource: 'alias',
        brand: 'Hammer Strength',
        model: 'Iso-Lateral',
      });
    });

    test('canonical wins over an alias with the same score', async () => {
      const bridge = store.addEntity(createExercise('Glute Bridge'));
      store.addAlias({ entity: bridge, alias: 'GLUTE BRIDGE' });

      const results = await createResolver(store).resolve('glute bridge');

      expect(results).toHaveLength(1);
      expect(results[0].matchedSource).toBe('canonical');
      expect(results[0].matchedText).toBe('Glute Bridge');
    });

    test('returns each entity once, using its best alias', async () => {
      const pulldown = store.addEntity(createExercise('Lat Pulldown (Selectorized)'));
      store.addAlias({ entity: pulldown, alias: 'Lat Pull Down' });
      store.addAlias({ entity: pulldown, alias: 'Lat Pulldown' });
      store.addAlias({ entity: pulldown, alias: 'Pulldown Machine' });

      const results = await createResolver(store).resolve('lat pulldown');

      expect(results).toHaveLength(1);
      expect(results[0]).toMatchObject({ score: 1, matchedText: 'Lat Pulldown', matchedSource: 'alias' });
    });

    test('an alias shared by two entities returns both', async () => {
      const plate = store.addEntity(createExercise('Plate-Loaded Chest Press'));
      const selector = store.addEntity(createExercise('Selectorized Chest Press'));
      store.addAlias({ entity: selector, alias: 'Chest Press Machine' });
      store.addAlias({ entity: plate, alias: 'Chest Press Machine' });

      const results = await createResolver(store).resolve('chest press machine');

      expect(results.map((r) => [r.entity.displayName, r.score, r.matchedSource])).toEqual([
        ['Plate-Loaded Chest Press', 1, 'alias'],
        ['Selectorized Chest Press', 1, 'alias'],
      ]);
    });

    test('equal scores are ordered by display name', async () => {
      store.addEntity(createExercise('Row B'));
      store.addEntity(createExercise('Row A'));

      const results = await createResolver(store).resolve('row');

      expect(results.map((r) => r.entity.displayName)).toEqual(['Row A', 'Row B']);
      expect(results[0].score).toBeCloseTo(2 / 3, 10);
      expect(results[1].score).toBe(results[0].score);
    });

    test('maxResults bounds the result list', async () => {
      store.addEntity(createExercise('Row B'));
      store.addEntity(createExercise('Row A'));

      const results = await createResolver(store).resolve('row', { maxResults: 1 });

      expect(results.map((r) => r.entity.displayName)).toEqual(['Row A']);
    });

    test('minScore is inclusive', async () => {
      store.addEntity(createExercise('Cat'));
      store.addEntity(createExercise('Cat-Cow', { kind: 'mobility', modality: 'bodyweight' }));
      const resolver = createResolver(store);

      const strict = await resolver.resolve('cat', { minScore: 0.6 });
      const inclusive = await resolver.resolve('cat', { minScore: 0.5 });

      expect(strict.map((r) => r.entity.displayName)).toEqual(['Cat']);
      expect(inclusive.map((r) => [r.entity.displayName, r.score])).toEqual([
        ['Cat', 1],
        ['Cat-Cow', 0.5],
      ]);
    });

    test('unrelated query returns no results', async () => {
      store.addEntity(createExercise('Barbell Back Squat'));
      store.addEntity(createExercise('Treadmill Run', { kind: 'cardio', modality: 'cardio_machine' }));

      const results = await createResolver(store).resolve('zzzqqqxxx999', { minScore: 0.1 });

      expect(results).toEqual([]);
    });

    test('aliases are matched only in the requested locale', async () => {
      const squat = store.addEntity(createExercise('Barbell Back Squat'));
      store.addAlias({ entity: squat, alias: 'Sentadilla', locale: 'es' });
      const resolver = createResolver(store);

      const spanish = await resolver.resolve('sentadilla', { locale: 'es' });
      const english = await resolver.resolve('sentadilla', { minScore: 0.5 });

      expect(spanish.map((r) => [r.matchedText, r.score])).toEqual([['Sentadilla', 1]]);
      expect(english).toEqual([]);
    });

    test('inactive entities and aliases are skipped', async () => {
      const hang = store.addEntity(createExercise('Dead Hang'), false);
      store.addAlias({ entity: hang, alias: 'Bar Hang' });
      const bridge = store.addEntity(createExercise('Glute Bridge'));
      store.addAlias({ entity: bridge, alias: 'Hip Bridge', isActive: false });
      const resolver = createResolver(store);

      expect(await resolver.resolve('dead hang', { minScore: 0.5 })).toEqual([]);
      expect(await resolver.resolve('bar hang', { minScore: 0.5 })).toEqual([]);
      expect(await resolver.resolve('hip bridge', { minScore: 0.5 })).toEqual([]);
    });

    test('same input gives the same output', async () => {
      store.addEntity(createExercise('Row B'));
      store.addEntity(createExercise('Row A'));
      store.addEntity(createExercise('Seated Cable Row'));
      const resolver = createResolver(store);

      const first = await resolver.resolve('row');
      const second = await resolver.resolve('row');

      expect(second).toEqual(first);
    });

    test('rejects invalid input before reading the store', async () => {
      const resolver = createResolver(store);

      await expect(resolver.resolve('   ')).rejects.toBeInstanceOf(InvalidQueryError);
      await expect(resolver.resolve('squat', { maxResults: 0 })).rejects.toBeInstanceOf(InvalidArgumentError);
      expect(store.canonicalReads).toBe(0);
      expect(store.aliasReads).toEqual([]);
    });
  });

  describe('foods', () => {
    test('resolves foods through the same pipeline', async () => {
      const foods = new InMemoryCandidateStore<FoodSummary>();
      const egg = foods.addEntity(createFood('Egg, whole, raw', { kcal: 143 }));
      foods.addAlias({ entity: egg, alias: 'Egg' });
      foods.addEntity(createFood('Greek Yogurt'));

      const results = await createResolver(foods).resolve('egg');

      expect(results).toEqual([
        { entity: egg, score: 1, matchedText: 'Egg', matchedSource: 'alias', brand: null, model: null },
      ]);
    });
  });
});

describe('resolveMatches', () => {
  test('scores a prebuilt snapshot without a store', () => {
    resetFactoryCounters();
    const cat = createExercise('Cat');
    const cows = createExercise('Cat-Cow');
    const snapshot = {
      canonical: indexCanonical([
        { entity: cat, normalizedName: 'cat', rawName: 'Cat' },
        { entity: cows, normalizedName: 'cat-cow', rawName: 'Cat-Cow' },
      ]),
      aliases: indexAliases<ExerciseSummary>([]),
    };

    const results = resolveMatches(snapshot, { query: 'CAT', locale: 'en', maxResults: 5, minScore: 0 });

    expect(results.map((r) => [r.entity.id, r.score])).toEqual([
      [cat.id, 1],
      [cows.id, 0.5],
    ]);
  });
});
