import { describe, it, expect } from 'vitest';
import { candidateId, decodeCandidate } from './candidate.js';

const payload = {
  id: 'Xy12',
  urls: {
    raw: 'https://images.example.test/Xy12',
    full: 'https://images.example.test/Xy12?q=85',
    regular: 'https://images.example.test/Xy12?w=1080',
    small: 'https://images.example.test/Xy12?w=400',
  },
  width: 5184,
  height: 3456,
  color: '#262626',
  likes: 0,
  alt_description: 'green trees near lake',
  user: { name: 'Test Photographer' },
};

describe('candidateId', () => {
  it('reads string ids only', () => {
    expect(candidateId(payload)).toBe('Xy12');
    expect(candidateId({ id: 42 })).toBeNull();
    expect(candidateId({ id: '' })).toBeNull();
    expect(candidateId('Xy12')).toBeNull();
  });
});

describe('decodeCandidate', () => {
  it('keeps the three resolution variants and metadata', () => {
    const decoded = decodeCandidate(payload);

    expect(decoded).toEqual({
      ok: true,
      record: {
        id: 'Xy12',
        regularURL: 'https://images.example.test/Xy12?w=1080',
        fullURL: 'https://images.example.test/Xy12?q=85',
        rawURL: 'https://images.example.test/Xy12',
        width: 5184,
        height: 3456,
        altText: 'green trees near lake',
        color: '#262626',
        likes: 0,
      },
    });
  });

  it('defaults a missing alt description to an empty string', () => {
    const { alt_description: _alt, ...withoutAlt } = payload;
    const decoded = decodeCandidate(withoutAlt);

    expect(decoded.ok && decoded.record.altText).toBe('');
  });

  it('rejects a candidate missing a resolution variant', () => {
    const decoded = decodeCandidate({ ...payload, urls: { regular: payload.urls.regular, full: payload.urls.full } });

    expect(decoded).toEqual({ ok: false, reason: 'urls.raw: Required' });
  });

  it('rejects negative likes', () => {
    const decoded = decodeCandidate({ ...payload, likes: -1 });

    expect(decoded.ok).toBe(false);
    if (decoded.ok) return;
    expect(decoded.reason).toMatch(/^likes: /);
  });
});
