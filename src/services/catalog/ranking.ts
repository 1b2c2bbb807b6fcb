/**
 * Deduplication and ranking of scored matches.
 *
 * Canonical and alias matches are scored independently, then merged so that
 * each entity keeps exactly one match: highest score, then canonical over
 * alias, then the smaller matched text.
 */

import type { CatalogEntity, MatchCandidate, MatchSource } from './types';

const SOURCE_PRIORITY: Record<MatchSource, number> = {
  canonical: 0,
  alias: 1,
};

// Code-unit order, independent of the process locale.
export function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Orders two matches for the same entity; the smaller one wins.
 */
export function compareWithinEntity<E extends CatalogEntity>(
  a: MatchCandidate<E>,
  b: MatchCandidate<E>
): number {
  if (a.score !== b.score) return b.score - a.score;

  const sourceOrder = SOURCE_PRIORITY[a.matchedSource] - SOURCE_PRIORITY[b.matchedSource];
  if (sourceOrder !== 0) return sourceOrder;

  return compareText(a.matchedText, b.matchedText);
}

/**
 * Final result order: score descending, display name ascending, entity id ascending.
 */
export function compareRanked<E extends CatalogEntity>(
  a: MatchCandidate<E>,
  b: MatchCandidate<E>
): number {
  if (a.score !== b.score) return b.score - a.score;

  const nameOrder = compareText(a.entity.displayName, b.entity.displayName);
  if (nameOrder !== 0) return nameOrder;

  return compareText(a.entity.id, b.entity.id);
}

/**
 * Merge matches from both sources, keeping the best match per entity id.
 */
export function pickBestPerEntity<E extends CatalogEntity>(
  canonicalMatches: readonly MatchCandidate<E>[],
  aliasMatches: readonly MatchCandidate<E>[]
): MatchCandidate<E>[] {
  const best = new Map<string, MatchCandidate<E>>();

  for (const match of [...canonicalMatches, ...aliasMatches]) {
    const current = best.get(match.entity.id);
    if (!current || compareWithinEntity(match, current) < 0) {
      best.set(match.entity.id, match);
    }
  }

  return [...best.values()];
}

export function rankMatches<E extends CatalogEntity>(
  matches: readonly MatchCandidate<E>[],
  maxResults: number
): MatchCandidate<E>[] {
  return [...matches].sort(compareRanked).slice(0, maxResults);
}
