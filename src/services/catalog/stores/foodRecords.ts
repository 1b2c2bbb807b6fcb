import { and, asc, eq } from 'drizzle-orm';
import type { Database } from '../../../config/database';
import { foods } from '../../../models/schema';
import { isActive, withStoreErrors } from '../../../utils/db';
import type { FoodRecordStore } from '../foodCatalog';
import type { FoodSummary } from '../types';
import { foodSummaryColumns } from './foodStore';

export class PostgresFoodRecordStore implements FoodRecordStore {
  constructor(private db: Database) {}

  async findActiveByBarcode(barcode: string): Promise<FoodSummary | null> {
    const [food] = await withStoreErrors('food barcode lookup', () =>
      this.db
        .select(foodSummaryColumns)
        .from(foods)
        .where(and(eq(foods.barcode, barcode), isActive(foods.isActive)))
        .orderBy(asc(foods.id))
        .limit(1)
        .execute()
    );
    return food ?? null;
  }

  async markPublic(foodId: string): Promise<FoodSummary | null> {
    const [food] = await withStoreErrors('food approve', () =>
      this.db
        .update(foods)
        .set({ isPublic: true, updatedAt: new Date() })
        .where(eq(foods.id, foodId))
        .returning(foodSummaryColumns)
        .execute()
    );
    return food ?? null;
  }
}
