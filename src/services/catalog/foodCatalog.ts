/**
 * Direct food lookups that bypass fuzzy matching: barcode scans and curator
 * approval of foods for public search.
 */

import { NotFoundError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import type { FoodSummary } from './types';

export interface FoodRecordStore {
  /** First active food carrying this barcode, by id. */
  findActiveByBarcode(barcode: string): Promise<FoodSummary | null>;
  /** Sets the public flag; null when no food has this id. */
  markPublic(foodId: string): Promise<FoodSummary | null>;
}

export interface SearchCache {
  clearCache(): void;
}

export class FoodCatalogService {
  constructor(
    private records: FoodRecordStore,
    private searchCache: SearchCache
  ) {}

  async findByBarcode(barcode: string): Promise<FoodSummary> {
    const food = await this.records.findActiveByBarcode(barcode);
    if (!food) {
      throw new NotFoundError('No active food with this barcode', 'FOOD_NOT_FOUND');
    }
    return food;
  }

  /**
   * Make a food a search candidate. Cached search snapshots are dropped so
   * the food is searchable on the next request.
   */
  async approve(foodId: string): Promise<FoodSummary> {
    const food = await this.records.markPublic(foodId);
    if (!food) {
      throw new NotFoundError('Food not found', 'FOOD_NOT_FOUND');
    }

    this.searchCache.clearCache();
    logger.info({ foodId }, 'Food approved for public search');
    return food;
  }
}
