import { z } from 'zod';
import { QueryValidationError } from './errors.js';
import { COLORS, ORIENTATIONS, ColorFilter, Orientation, SearchQuery } from './types/image.js';

/**
 * Display labels offered by form-based front ends, mapped to the values the
 * search endpoint expects.
 */
export const ORIENTATION_LABELS: Readonly<Record<string, Orientation>> = {
  Any: 'any',
  Landscape: 'landscape',
  Portrait: 'portrait',
  Squarish: 'squarish',
};

export const COLOR_LABELS: Readonly<Record<string, ColorFilter>> = {
  Any: 'any',
  'Black and White': 'black_and_white',
  Black: 'black',
  White: 'white',
  Yellow: 'yellow',
  Orange: 'orange',
  Red: 'red',
  Purple: 'purple',
  Magenta: 'magenta',
  Green: 'green',
  Teal: 'teal',
  Blue: 'blue',
};

function fromLabel<T extends string>(value: string, wireValues: readonly T[], labels: Readonly<Record<string, T>>): string {
  const trimmed = value.trim();
  const wire = wireValues.find((v) => v === trimmed);
  if (wire) return wire;
  const label = Object.keys(labels).find((l) => l.toLowerCase() === trimmed.toLowerCase());
  return label ? labels[label] : trimmed;
}

/** Accepts a wire value ("squarish") or a display label ("Squarish"). */
export function normalizeOrientation(value: string): string {
  return fromLabel(value, ORIENTATIONS, ORIENTATION_LABELS);
}

/** Accepts a wire value ("black_and_white") or a display label ("Black and White"). */
export function normalizeColor(value: string): string {
  return fromLabel(value, COLORS, COLOR_LABELS);
}

export const SearchQuerySchema = z.object({
  term: z.string().trim().min(1, 'Search term must not be empty'),
  orientation: z.preprocess(
    (v) => (typeof v === 'string' ? normalizeOrientation(v) : v),
    z.enum(ORIENTATIONS).default('any')
  ),
  color: z.preprocess(
    (v) => (typeof v === 'string' ? normalizeColor(v) : v),
    z.enum(COLORS).default('any')
  ),
  minWidth: z.number().int('Minimum width must be an integer').min(0, 'Minimum width cannot be negative').default(0),
  minHeight: z.number().int('Minimum height must be an integer').min(0, 'Minimum height cannot be negative').default(0),
  maxResults: z.number().int('Maximum results must be an integer').min(1, 'Maximum results must be at least 1'),
});

export type SearchQueryInput = z.input<typeof SearchQuerySchema>;

/**
 * Validates caller input and returns a frozen SearchQuery.
 * Throws QueryValidationError listing every offending field.
 */
export function parseSearchQuery(input: unknown): SearchQuery {
  const parsed = SearchQuerySchema.safeParse(input);
  if (!parsed.success) {
    throw new QueryValidationError(
      parsed.error.issues.map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    );
  }
  return Object.freeze({ ...parsed.data });
}
