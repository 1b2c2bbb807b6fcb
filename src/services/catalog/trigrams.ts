/**
 * Trigram similarity.
 *
 * Text is split into words (runs of letters and digits). Each word is padded
 * with two leading spaces and one trailing space, so a one-letter word still
 * yields two trigrams. The score is |shared| / |union| of the two trigram sets.
 */

const WORD_PATTERN = /[\p{L}\p{N}]+/gu;

export interface TrigramProfile {
  text: string;
  trigrams: Set<string>;
}

export function extractTrigrams(normalized: string): Set<string> {
  const trigrams = new Set<string>();

  for (const match of normalized.matchAll(WORD_PATTERN)) {
    const chars = Array.from(`  ${match[0]} `);
    for (let i = 0; i + 3 <= chars.length; i++) {
      trigrams.add(chars[i] + chars[i + 1] + chars[i + 2]);
    }
  }

  return trigrams;
}

export function toTrigramProfile(normalized: string): TrigramProfile {
  return { text: normalized, trigrams: extractTrigrams(normalized) };
}

/**
 * Jaccard overlap of two trigram sets. Identical texts always score 1, which
 * also covers two empty strings.
 */
export function scoreProfiles(query: TrigramProfile, candidate: TrigramProfile): number {
  if (query.text === candidate.text) return 1;
  if (query.trigrams.size === 0 || candidate.trigrams.size === 0) return 0;

  const [smaller, larger] =
    query.trigrams.size <= candidate.trigrams.size
      ? [query.trigrams, candidate.trigrams]
      : [candidate.trigrams, query.trigrams];

  let shared = 0;
  for (const trigram of smaller) {
    if (larger.has(trigram)) shared++;
  }

  const union = query.trigrams.size + candidate.trigrams.size - shared;
  return shared / union;
}

export function trigramSimilarity(normalizedQuery: string, normalizedCandidate: string): number {
  return scoreProfiles(toTrigramProfile(normalizedQuery), toTrigramProfile(normalizedCandidate));
}
