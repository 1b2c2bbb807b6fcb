import type { FoodRecordStore } from '../../services/catalog/foodCatalog';
import { normalizeText } from '../../services/catalog/normalize';
import { compareText } from '../../services/catalog/ranking';
import type {
  AliasCandidate,
  CandidateStore,
  CanonicalCandidate,
  CatalogEntity,
  FoodSummary,
} from '../../services/catalog/types';
import { StoreUnavailableError } from '../../utils/errors';

export interface AliasRecord<E extends CatalogEntity> {
  entity: E;
  alias: string;
  locale?: string;
  brand?: string | null;
  model?: string | null;
  isActive?: boolean;
}

interface EntityRecord<E extends CatalogEntity> {
  entity: E;
  isActive: boolean;
}

/**
 * Candidate store backed by arrays. Normalizes on insert the way the ingest
 * service does, and counts reads so tests can observe snapshot caching.
 */
export class InMemoryCandidateStore<E extends CatalogEntity> implements CandidateStore<E> {
  private entities: EntityRecord<E>[] = [];
  private aliases: Required<AliasRecord<E>>[] = [];

  canonicalReads = 0;
  aliasReads: string[] = [];
  failNextReads = 0;

  addEntity(entity: E, isActive = true): E {
    this.entities.push({ entity, isActive });
    return entity;
  }

  addAlias(record: AliasRecord<E>): void {
    this.aliases.push({
      entity: record.entity,
      alias: record.alias,
      locale: record.locale ?? 'en',
      brand: record.brand ?? null,
      model: record.model ?? null,
      isActive: record.isActive ?? true,
    });
  }

  private checkAvailable(): void {
    if (this.failNextReads > 0) {
      this.failNextReads--;
      throw new StoreUnavailableError('Catalog store unavailable during test read', new Error('ECONNREFUSED'));
    }
  }

  private isEntityActive(entity: E): boolean {
    return this.entities.some((record) => record.entity.id === entity.id && record.isActive);
  }

  protected isSearchable(_entity: E): boolean {
    return true;
  }

  protected allEntities(): E[] {
    return this.entities.map((record) => record.entity);
  }

  protected activeEntities(): E[] {
    return this.entities.filter((record) => record.isActive).map((record) => record.entity);
  }

  async *canonicalCandidates(activeOnly: boolean): AsyncGenerator<CanonicalCandidate<E>> {
    this.canonicalReads++;
    this.checkAvailable();

    for (const record of this.entities) {
      if (activeOnly && !record.isActive) continue;
      if (!this.isSearchable(record.entity)) continue;
      yield {
        entity: record.entity,
        normalizedName: normalizeText(record.entity.displayName),
        rawName: record.entity.displayName,
      };
    }
  }

  async *aliasCandidates(locale: string, activeOnly: boolean): AsyncGenerator<AliasCandidate<E>> {
    this.aliasReads.push(locale);
    this.checkAvailable();

    for (const record of this.aliases) {
      if (record.locale !== locale) continue;
      if (activeOnly && !(record.isActive && this.isEntityActive(record.entity))) continue;
      if (!this.isSearchable(record.entity)) continue;
      yield {
        entity: record.entity,
        normalizedAlias: normalizeText(record.alias),
        rawAlias: record.alias,
        brand: record.brand,
        model: record.model,
      };
    }
  }
}

/**
 * Food store that also answers barcode lookups and approvals, with the
 * public-only filter the Postgres food store applies.
 */
export class InMemoryFoodStore extends InMemoryCandidateStore<FoodSummary> implements FoodRecordStore {
  private privateIds = new Set<string>();

  addPrivateFood(food: FoodSummary): FoodSummary {
    this.privateIds.add(food.id);
    return this.addEntity(food);
  }

  protected isSearchable(food: FoodSummary): boolean {
    return !this.privateIds.has(food.id);
  }

  async findActiveByBarcode(barcode: string): Promise<FoodSummary | null> {
    const matches = this.activeEntities()
      .filter((food) => food.barcode === barcode)
      .sort((a, b) => compareText(a.id, b.id));
    return matches[0] ?? null;
  }

  async markPublic(foodId: string): Promise<FoodSummary | null> {
    const food = this.allEntities().find((entity) => entity.id === foodId);
    if (!food) return null;
    this.privateIds.delete(foodId);
    return food;
  }
}
