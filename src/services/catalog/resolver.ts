/**
 * Catalog Resolver
 *
 * Main entry point for catalog resolution.
 * Coordinates normalization, candidate loading, scoring, deduplication and ranking.
 */

import {
  DEFAULT_LOCALE,
  DEFAULT_MAX_CACHED_LOCALES,
  DEFAULT_MAX_RESULTS,
  DEFAULT_MIN_SCORE,
} from '../../config/constants';
import { InvalidArgumentError, InvalidQueryError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { getCandidatePositions } from './blocking';
import { normalizeText } from './normalize';
import { pickBestPerEntity, rankMatches } from './ranking';
import {
  collect,
  indexAliases,
  indexCanonical,
  SnapshotCache,
  type CacheEntryStats,
  type CatalogSnapshot,
  type IndexedSource,
} from './snapshot';
import { scoreProfiles, toTrigramProfile, type TrigramProfile } from './trigrams';
import type {
  AliasCandidate,
  CandidateStore,
  CanonicalCandidate,
  CatalogEntity,
  MatchCandidate,
  ResolveOptions,
  ResolveParams,
  Resolver,
} from './types';

const CANONICAL_CACHE_KEY = 'canonical';

/**
 * Check caller input and fill in defaults. Runs before any store access.
 */
export function validateResolveInput(rawQuery: string, options: ResolveOptions = {}): ResolveParams {
  if (typeof rawQuery !== 'string' || rawQuery.trim().length === 0) {
    throw new InvalidQueryError();
  }
  if (normalizeText(rawQuery).length === 0) {
    throw new InvalidQueryError('Query has no searchable characters');
  }

  const locale = options.locale ?? DEFAULT_LOCALE;
  const maxResults = options.maxResults ?? DEFAULT_MAX_RESULTS;
  const minScore = options.minScore ?? DEFAULT_MIN_SCORE;

  if (typeof locale !== 'string' || locale.trim().length === 0) {
    throw new InvalidArgumentError('locale must be a non-empty string');
  }
  if (!Number.isInteger(maxResults) || maxResults <= 0) {
    throw new InvalidArgumentError('maxResults must be a positive integer');
  }
  if (!Number.isFinite(minScore) || minScore < 0 || minScore > 1) {
    throw new InvalidArgumentError('minScore must be between 0 and 1');
  }

  return { query: rawQuery, locale, maxResults, minScore };
}

function scoreSource<R, E extends CatalogEntity>(
  source: IndexedSource<R>,
  query: TrigramProfile,
  minScore: number,
  toMatch: (row: R, score: number) => MatchCandidate<E>
): MatchCandidate<E>[] {
  const matches: MatchCandidate<E>[] = [];

  for (const position of getCandidatePositions(query, source.index)) {
    const score = scoreProfiles(query, source.index.profiles[position]);
    if (score > 0 && score >= minScore) {
      matches.push(toMatch(source.rows[position], score));
    }
  }

  return matches;
}

/**
 * Resolve a validated query against an indexed snapshot. Pure and deterministic.
 *
 * Flow:
 * 1. Normalize the query and extract its trigrams
 * 2. Score canonical and alias rows that pass the trigram prefilter
 * 3. Keep one match per entity, then rank and truncate
 */
export function resolveMatches<E extends CatalogEntity>(
  snapshot: CatalogSnapshot<E>,
  params: ResolveParams
): MatchCandidate<E>[] {
  const query = toTrigramProfile(normalizeText(params.query));

  const canonicalMatches = scoreSource(
    snapshot.canonical,
    query,
    params.minScore,
    (row: CanonicalCandidate<E>, score): MatchCandidate<E> => ({
      entity: row.entity,
      score,
      matchedText: row.rawName,
      matchedSource: 'canonical',
      brand: null,
      model: null,
    })
  );

  const aliasMatches = scoreSource(
    snapshot.aliases,
    query,
    params.minScore,
    (row: AliasCandidate<E>, score): MatchCandidate<E> => ({
      entity: row.entity,
      score,
      matchedText: row.rawAlias,
      matchedSource: 'alias',
      brand: row.brand,
      model: row.model,
    })
  );

  const deduplicated = pickBestPerEntity(canonicalMatches, aliasMatches);
  const results = rankMatches(deduplicated, params.maxResults);

  logger.debug(
    {
      query: query.text,
      locale: params.locale,
      canonicalMatches: canonicalMatches.length,
      aliasMatches: aliasMatches.length,
      entities: deduplicated.length,
      returned: results.length,
    },
    'Catalog resolution: Query scored'
  );

  return results;
}

export interface CatalogResolverOptions {
  /** Catalog name used in log lines. */
  name: string;
  /** Max snapshot age in milliseconds; 0 loads from the store on every call. */
  snapshotTtlMs: number;
  /** Alias snapshots kept at once, one per locale. */
  maxCachedLocales?: number;
}

export class CatalogResolver<E extends CatalogEntity> implements Resolver<E> {
  private canonicalCache: SnapshotCache<CanonicalCandidate<E>>;
  private aliasCache: SnapshotCache<AliasCandidate<E>>;

  constructor(
    private store: CandidateStore<E>,
    private options: CatalogResolverOptions
  ) {
    this.canonicalCache = new SnapshotCache(options.snapshotTtlMs, 1);
    this.aliasCache = new SnapshotCache(
      options.snapshotTtlMs,
      options.maxCachedLocales ?? DEFAULT_MAX_CACHED_LOCALES
    );
  }

  async resolve(rawQuery: string, options: ResolveOptions = {}): Promise<MatchCandidate<E>[]> {
    const params = validateResolveInput(rawQuery, options);
    const snapshot = await this.loadSnapshot(params.locale);
    return resolveMatches(snapshot, params);
  }

  private async loadSnapshot(locale: string): Promise<CatalogSnapshot<E>> {
    const [canonical, aliases] = await Promise.all([
      this.canonicalCache.get(CANONICAL_CACHE_KEY, async () => {
        const source = indexCanonical(await collect(this.store.canonicalCandidates(true)));
        logger.info(
          { catalog: this.options.name, rows: source.rows.length },
          'Catalog resolution: Canonical snapshot loaded'
        );
        return source;
      }),
      this.aliasCache.get(locale, async () => {
        const source = indexAliases(await collect(this.store.aliasCandidates(locale, true)));
        logger.info(
          { catalog: this.options.name, locale, rows: source.rows.length },
          'Catalog resolution: Alias snapshot loaded'
        );
        return source;
      }),
    ]);

    return { canonical, aliases };
  }

  clearCache(): void {
    this.canonicalCache.clear();
    this.aliasCache.clear();
  }

  getCacheStats(): { catalog: string; snapshotTtlMs: number; canonical: CacheEntryStats[]; aliases: CacheEntryStats[] } {
    return {
      catalog: this.options.name,
      snapshotTtlMs: this.options.snapshotTtlMs,
      canonical: this.canonicalCache.getStats(),
      aliases: this.aliasCache.getStats(),
    };
  }
}
