// Search defaults
const DEFAULT_LOCALE = 'en';
const DEFAULT_MAX_RESULTS = 25;
const MAX_RESULTS_CAP = 100;
const DEFAULT_MIN_SCORE = 0;

const DEFAULT_MAX_CACHED_LOCALES = 8;

const MIN_LOCALE_LENGTH = 2;
const MAX_LOCALE_LENGTH = 10;

const BARCODE_PATTERN = /^\d{8,14}$/;

// Bump when normalizeText changes; stored *_norm columns must then be rebuilt
// with `npm run catalog:renormalize`.
const NORMALIZER_VERSION = 1;

export {
  BARCODE_PATTERN,
  DEFAULT_LOCALE,
  DEFAULT_MAX_RESULTS,
  MAX_RESULTS_CAP,
  DEFAULT_MIN_SCORE,
  DEFAULT_MAX_CACHED_LOCALES,
  MIN_LOCALE_LENGTH,
  MAX_LOCALE_LENGTH,
  NORMALIZER_VERSION,
};
