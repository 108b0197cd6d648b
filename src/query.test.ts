import { describe, it, expect } from 'vitest';
import { QueryValidationError } from './errors.js';
import { normalizeColor, normalizeOrientation, parseSearchQuery } from './query.js';

function issuesOf(input: unknown): string[] {
  try {
    parseSearchQuery(input);
  } catch (error) {
    if (error instanceof QueryValidationError) return error.issues;
    throw error;
  }
  throw new Error('expected parseSearchQuery to throw');
}

describe('parseSearchQuery', () => {
  it('fills defaults and trims the term', () => {
    const query = parseSearchQuery({ term: '  mountain lake ', maxResults: 5 });

    expect(query).toEqual({
      term: 'mountain lake',
      orientation: 'any',
      color: 'any',
      minWidth: 0,
      minHeight: 0,
      maxResults: 5,
    });
    expect(Object.isFrozen(query)).toBe(true);
  });

  it('accepts display labels as well as wire values', () => {
    const query = parseSearchQuery({
      term: 'city',
      orientation: 'Squarish',
      color: 'Black and White',
      minWidth: 1200,
      minHeight: 800,
      maxResults: 20,
    });

    expect(query.orientation).toBe('squarish');
    expect(query.color).toBe('black_and_white');
  });

  it('lists every invalid field', () => {
    const issues = issuesOf({ term: '   ', color: 'pink', maxResults: 0 });

    expect(issues).toHaveLength(3);
    expect(issues[0]).toBe('term: Search term must not be empty');
    expect(issues[1]).toMatch(/^color: Invalid enum value/);
    expect(issues[2]).toBe('maxResults: Maximum results must be at least 1');
  });

  it('rejects negative and fractional dimensions', () => {
    expect(issuesOf({ term: 'sky', minWidth: -1, minHeight: 10.5, maxResults: 3 })).toEqual([
      'minWidth: Minimum width cannot be negative',
      'minHeight: Minimum height must be an integer',
    ]);
  });

  it('requires a maximum result count', () => {
    expect(issuesOf({ term: 'sky' })).toEqual(['maxResults: Required']);
  });
});

describe('label normalization', () => {
  it('maps labels case-insensitively', () => {
    expect(normalizeOrientation('landscape')).toBe('landscape');
    expect(normalizeOrientation('PORTRAIT')).toBe('portrait');
    expect(normalizeColor('black and white')).toBe('black_and_white');
    expect(normalizeColor('Teal')).toBe('teal');
  });

  it('leaves unknown values for validation to reject', () => {
    expect(normalizeColor('chartreuse')).toBe('chartreuse');
  });
});
