/**
 * Indexed candidate snapshots.
 *
 * A snapshot holds every candidate row of one source together with its
 * trigram blocking index. Snapshots are cached with a max age and a max entry
 * count (least recently used goes first); concurrent callers share a single
 * in-flight load and failed loads are not cached.
 */

import { buildTrigramIndex, getBlockingStats, type TrigramIndex } from './blocking';
import type { AliasCandidate, CanonicalCandidate, CatalogEntity } from './types';

export interface IndexedSource<R> {
  rows: R[];
  index: TrigramIndex;
}

export interface CatalogSnapshot<E extends CatalogEntity> {
  canonical: IndexedSource<CanonicalCandidate<E>>;
  aliases: IndexedSource<AliasCandidate<E>>;
}

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}

export function indexCanonical<E extends CatalogEntity>(
  rows: CanonicalCandidate<E>[]
): IndexedSource<CanonicalCandidate<E>> {
  return { rows, index: buildTrigramIndex(rows.map((row) => row.normalizedName)) };
}

export function indexAliases<E extends CatalogEntity>(
  rows: AliasCandidate<E>[]
): IndexedSource<AliasCandidate<E>> {
  return { rows, index: buildTrigramIndex(rows.map((row) => row.normalizedAlias)) };
}

interface CacheEntry<T> {
  value: T;
  fetchedAt: number;
}

export interface CacheEntryStats {
  key: string;
  ageMs: number;
  rowCount: number;
  trigramCount: number;
}

export class SnapshotCache<R> {
  private entries = new Map<string, CacheEntry<IndexedSource<R>>>();
  private inFlight = new Map<string, Promise<IndexedSource<R>>>();
  private generation = 0;

  constructor(
    private maxAgeMs: number,
    private maxEntries: number = Number.POSITIVE_INFINITY
  ) {}

  private isFresh(entry: CacheEntry<IndexedSource<R>>, now: number): boolean {
    return now - entry.fetchedAt < this.maxAgeMs;
  }

  async get(key: string, load: () => Promise<IndexedSource<R>>): Promise<IndexedSource<R>> {
    const entry = this.entries.get(key);
    if (entry) {
      this.entries.delete(key);
      if (this.isFresh(entry, Date.now())) {
        // Re-insert to mark as most recently used.
        this.entries.set(key, entry);
        return entry.value;
      }
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      return pending;
    }

    const generation = this.generation;
    const promise = load()
      .then((value) => {
        if (this.maxAgeMs > 0 && generation === this.generation) {
          this.store(key, value);
        }
        return value;
      })
      .finally(() => {
        this.inFlight.delete(key);
      });

    this.inFlight.set(key, promise);
    return promise;
  }

  private store(key: string, value: IndexedSource<R>): void {
    const now = Date.now();
    for (const [existingKey, existing] of this.entries) {
      if (!this.isFresh(existing, now)) {
        this.entries.delete(existingKey);
      }
    }

    this.entries.set(key, { value, fetchedAt: now });

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  clear(): void {
    this.generation++;
    this.entries.clear();
    this.inFlight.clear();
  }

  getStats(): CacheEntryStats[] {
    const now = Date.now();
    return [...this.entries.entries()].map(([key, entry]) => {
      const { rowCount, trigramCount } = getBlockingStats(entry.value.index);
      return { key, ageMs: now - entry.fetchedAt, rowCount, trigramCount };
    });
  }
}
