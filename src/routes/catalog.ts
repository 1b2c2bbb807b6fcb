import { Router, type RequestHandler } from 'express';
import type {
  CatalogResolver,
  ExerciseSummary,
  FoodCatalogService,
  FoodSummary,
  MatchCandidate,
} from '../services/catalog';
import {
  approveFoodSchema,
  barcodeQuerySchema,
  parseInput,
  parseSearchQuery,
} from '../utils/validation';

export interface CatalogServices {
  exercises: CatalogResolver<ExerciseSummary>;
  foods: CatalogResolver<FoodSummary>;
  foodCatalog: FoodCatalogService;
}

export interface CatalogRouterMiddleware {
  searchLimiter: RequestHandler;
  requireAdmin: RequestHandler;
}

export function toExerciseResult(match: MatchCandidate<ExerciseSummary>) {
  const { entity } = match;
  return {
    entityId: entity.id,
    displayName: entity.displayName,
    slug: entity.slug,
    kind: entity.kind,
    modality: entity.modality,
    movementPattern: entity.movementPattern,
    primaryMuscles: entity.primaryMuscles,
    equipmentRequired: entity.equipmentRequired,
    score: match.score,
    matchedText: match.matchedText,
    matchedSource: match.matchedSource,
    brandName: match.brand,
    modelName: match.model,
  };
}

export function toFoodRecord(food: FoodSummary) {
  return {
    entityId: food.id,
    displayName: food.displayName,
    brand: food.brand,
    barcode: food.barcode,
    source: food.source,
    basis: food.basis,
    kcal: food.kcal,
    proteinG: food.proteinG,
    carbsG: food.carbsG,
    fatG: food.fatG,
  };
}

export function toFoodResult(match: MatchCandidate<FoodSummary>) {
  const { entity } = match;
  return {
    entityId: entity.id,
    displayName: entity.displayName,
    brand: entity.brand,
    barcode: entity.barcode,
    source: entity.source,
    basis: entity.basis,
    kcal: entity.kcal,
    proteinG: entity.proteinG,
    carbsG: entity.carbsG,
    fatG: entity.fatG,
    score: match.score,
    matchedText: match.matchedText,
    matchedSource: match.matchedSource,
  };
}

export function createCatalogRouter(services: CatalogServices, middleware: CatalogRouterMiddleware) {
  const { searchLimiter, requireAdmin } = middleware;
  const router = Router();

  router.get('/exercises/search', searchLimiter, async (req, res, next) => {
    try {
      const { q, locale, limit, min_score } = parseSearchQuery(req.query);
      const matches = await services.exercises.resolve(q, {
        locale,
        maxResults: limit,
        minScore: min_score,
      });
      const results = matches.map(toExerciseResult);

      res.json({ query: q, locale, results, count: results.length });
    } catch (error) {
      next(error);
    }
  });

  router.get('/foods/search', searchLimiter, async (req, res, next) => {
    try {
      const { q, locale, limit, min_score } = parseSearchQuery(req.query);
      const matches = await services.foods.resolve(q, {
        locale,
        maxResults: limit,
        minScore: min_score,
      });
      const results = matches.map(toFoodResult);

      res.json({ query: q, locale, results, count: results.length });
    } catch (error) {
      next(error);
    }
  });

  router.get('/foods/by_barcode', searchLimiter, async (req, res, next) => {
    try {
      const { barcode } = parseInput(barcodeQuerySchema, req.query);
      const food = await services.foodCatalog.findByBarcode(barcode);

      res.json(toFoodRecord(food));
    } catch (error) {
      next(error);
    }
  });

  router.post('/foods/approve', requireAdmin, async (req, res, next) => {
    try {
      const { foodId } = parseInput(approveFoodSchema, req.body);
      const food = await services.foodCatalog.approve(foodId);

      res.json({ ...toFoodRecord(food), isPublic: true });
    } catch (error) {
      next(error);
    }
  });

  router.get('/stats', (_req, res) => {
    res.json({
      exercises: services.exercises.getCacheStats(),
      foods: services.foods.getCacheStats(),
    });
  });

  return router;
}
