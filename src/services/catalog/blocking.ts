/**
 * Trigram Blocking for Candidate Prefiltering
 *
 * Reduces per-query scoring from every stored row to the rows that share at
 * least one trigram with the query. Rows are also indexed by their full
 * normalized text, so texts without trigrams (punctuation only) still reach
 * the scorer when they equal the query exactly.
 *
 * Blocking indices:
 * 1. Trigram index: "lat" → [row positions...]
 * 2. Exact text index: "lat pulldown" → [row positions...]
 */

import { toTrigramProfile, type TrigramProfile } from './trigrams';

export interface TrigramIndex {
  profiles: TrigramProfile[];
  byTrigram: Map<string, number[]>;
  byText: Map<string, number[]>;
}

function addPosition(map: Map<string, number[]>, key: string, position: number): void {
  const positions = map.get(key);
  if (positions) {
    positions.push(position);
  } else {
    map.set(key, [position]);
  }
}

/**
 * Build blocking indices over pre-normalized texts. Positions refer to the
 * order of `texts`.
 */
export function buildTrigramIndex(texts: readonly string[]): TrigramIndex {
  const index: TrigramIndex = {
    profiles: [],
    byTrigram: new Map(),
    byText: new Map(),
  };

  texts.forEach((text, position) => {
    const profile = toTrigramProfile(text);
    index.profiles.push(profile);

    for (const trigram of profile.trigrams) {
      addPosition(index.byTrigram, trigram, position);
    }
    addPosition(index.byText, text, position);
  });

  return index;
}

/**
 * Positions of every row that can score above zero against the query,
 * in ascending order.
 */
export function getCandidatePositions(query: TrigramProfile, index: TrigramIndex): number[] {
  const positions = new Set<number>();

  for (const trigram of query.trigrams) {
    const matches = index.byTrigram.get(trigram);
    if (matches) {
      for (const position of matches) {
        positions.add(position);
      }
    }
  }

  const exact = index.byText.get(query.text);
  if (exact) {
    for (const position of exact) {
      positions.add(position);
    }
  }

  return [...positions].sort((a, b) => a - b);
}

/**
 * Get blocking statistics for debugging.
 */
export function getBlockingStats(index: TrigramIndex): {
  rowCount: number;
  trigramCount: number;
  avgRowsPerTrigram: number;
} {
  let totalTrigramRows = 0;
  for (const positions of index.byTrigram.values()) {
    totalTrigramRows += positions.length;
  }

  return {
    rowCount: index.profiles.length,
    trigramCount: index.byTrigram.size,
    avgRowsPerTrigram:
      index.byTrigram.size > 0
        ? totalTrigramRows / index.byTrigram.size
        : 0,
  };
}
