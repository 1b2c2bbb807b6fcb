/**
 * Text normalization shared by the write path (stored *_norm columns) and the
 * query path. Changing the output of this function requires bumping
 * NORMALIZER_VERSION and re-normalizing every stored row.
 */

// Non-spacing combining marks, which is where NFD puts Latin diacritics.
const COMBINING_MARKS = /\p{Mn}/gu;

export function normalizeText(text: string): string {
  return text
    .trim()
    .toLowerCase()
    .normalize('NFD')
    .replace(COMBINING_MARKS, '')
    .normalize('NFC')
    .trim();
}
