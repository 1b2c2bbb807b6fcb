/**
 * Catalog Resolution Types
 *
 * Free-text input is resolved against two candidate sources per catalog:
 * the canonical entity names and the alias table.
 */

import type {
  ExerciseKind,
  ExerciseModality,
  FoodBasis,
  FoodSource,
} from '../../models/schema';

// ========== Entities ==========

export interface CatalogEntity {
  id: string;
  displayName: string;
}

export interface ExerciseSummary extends CatalogEntity {
  slug: string;
  kind: ExerciseKind;
  modality: ExerciseModality;
  movementPattern: string | null;
  primaryMuscles: string[];
  secondaryMuscles: string[];
  joints: string[];
  equipmentRequired: string[];
  unilateral: boolean;
}

export interface FoodSummary extends CatalogEntity {
  brand: string | null;
  barcode: string | null;
  source: FoodSource;
  basis: FoodBasis;
  kcal: number | null;
  proteinG: number | null;
  carbsG: number | null;
  fatG: number | null;
}

// ========== Candidate Store ==========

export interface CanonicalCandidate<E extends CatalogEntity> {
  entity: E;
  normalizedName: string;
  rawName: string;
}

export interface AliasCandidate<E extends CatalogEntity> {
  entity: E;
  normalizedAlias: string;
  rawAlias: string;
  brand: string | null;
  model: string | null;
}

/**
 * Read-only view over the canonical and alias tables of one catalog.
 * Rows arrive pre-normalized; the store holds no matching logic.
 */
export interface CandidateStore<E extends CatalogEntity> {
  canonicalCandidates(activeOnly: boolean): AsyncIterable<CanonicalCandidate<E>>;
  aliasCandidates(locale: string, activeOnly: boolean): AsyncIterable<AliasCandidate<E>>;
}

// ========== Matches ==========

export type MatchSource = 'canonical' | 'alias';

export interface MatchCandidate<E extends CatalogEntity> {
  entity: E;
  score: number;
  matchedText: string;
  matchedSource: MatchSource;
  brand: string | null;
  model: string | null;
}

export interface ResolveOptions {
  locale?: string;
  maxResults?: number;
  minScore?: number;
}

export interface ResolveParams {
  query: string;
  locale: string;
  maxResults: number;
  minScore: number;
}

export interface Resolver<E extends CatalogEntity> {
  resolve(rawQuery: string, options?: ResolveOptions): Promise<MatchCandidate<E>[]>;
}
