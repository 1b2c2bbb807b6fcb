import { z } from 'zod';
import {
  BARCODE_PATTERN,
  DEFAULT_LOCALE,
  DEFAULT_MAX_RESULTS,
  DEFAULT_MIN_SCORE,
  MAX_LOCALE_LENGTH,
  MAX_RESULTS_CAP,
  MIN_LOCALE_LENGTH,
} from '../config/constants';
import { BadRequestError } from './errors';

// Query-string numbers arrive as strings; an empty value is an error, not 0.
function numericParam(schema: z.ZodNumber) {
  return z.string().trim().min(1, 'must not be empty').pipe(z.coerce.number().pipe(schema));
}

export const searchQuerySchema = z.object({
  q: z.string({ required_error: 'q is required', invalid_type_error: 'q must be a single string' }),
  locale: z.string().min(MIN_LOCALE_LENGTH).max(MAX_LOCALE_LENGTH).default(DEFAULT_LOCALE),
  limit: numericParam(z.number().int().min(1).max(MAX_RESULTS_CAP)).default(String(DEFAULT_MAX_RESULTS)),
  min_score: numericParam(z.number().min(0).max(1)).default(String(DEFAULT_MIN_SCORE)),
});

export const barcodeQuerySchema = z.object({
  barcode: z
    .string({ required_error: 'barcode is required', invalid_type_error: 'barcode must be a single string' })
    .transform((value) => value.replace(/\s+/g, ''))
    .pipe(z.string().regex(BARCODE_PATTERN, 'barcode must be 8-14 digits')),
});

export const approveFoodSchema = z.object({
  foodId: z.string({ required_error: 'foodId is required' }).uuid('foodId must be a UUID'),
});

export type SearchQuery = z.infer<typeof searchQuerySchema>;

export function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const message = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new BadRequestError(message, 'INVALID_INPUT');
  }
  return result.data;
}

/**
 * Parse search query-string parameters. The query text itself is checked by
 * the resolver, so a whitespace-only `q` passes here.
 */
export function parseSearchQuery(query: unknown): SearchQuery {
  return parseInput(searchQuerySchema, query);
}
