/**
 * Catalog Resolution Service
 *
 * Resolves free-text input ("hammer strength chest press", "greek yogurt") to
 * canonical exercise and food entities by trigram matching against canonical
 * names and aliases.
 *
 * Key features:
 * - Normalization shared by the write path and the query path
 * - Trigram blocking index as a prefilter before scoring
 * - One match per entity, canonical preferred over alias on ties
 * - Deterministic ranking (score, display name, id)
 */

// Types
export type {
  CatalogEntity,
  ExerciseSummary,
  FoodSummary,
  CanonicalCandidate,
  AliasCandidate,
  CandidateStore,
  MatchSource,
  MatchCandidate,
  ResolveOptions,
  ResolveParams,
  Resolver,
} from './types';

// Main resolver
export {
  CatalogResolver,
  resolveMatches,
  validateResolveInput,
  type CatalogResolverOptions,
} from './resolver';

// Normalization and scoring
export { normalizeText } from './normalize';
export {
  extractTrigrams,
  scoreProfiles,
  toTrigramProfile,
  trigramSimilarity,
  type TrigramProfile,
} from './trigrams';

// Blocking
export {
  buildTrigramIndex,
  getCandidatePositions,
  getBlockingStats,
  type TrigramIndex,
} from './blocking';

// Ranking
export {
  compareRanked,
  compareText,
  compareWithinEntity,
  pickBestPerEntity,
  rankMatches,
} from './ranking';

// Snapshots
export {
  SnapshotCache,
  collect,
  indexAliases,
  indexCanonical,
  type CatalogSnapshot,
  type IndexedSource,
} from './snapshot';

// Direct food lookups
export { FoodCatalogService, type FoodRecordStore, type SearchCache } from './foodCatalog';

// Stores
export { ExerciseCandidateStore, type StoreOptions } from './stores/exerciseStore';
export { FoodCandidateStore, type FoodStoreOptions } from './stores/foodStore';
export { PostgresFoodRecordStore } from './stores/foodRecords';
