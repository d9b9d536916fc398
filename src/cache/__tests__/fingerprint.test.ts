import { describe, it, expect } from 'vitest';
import { canonicalJson, fingerprint, normalizeSetParam } from '../fingerprint.js';

describe('canonicalJson', () => {
  it('sorts object keys at every depth and keeps array order', () => {
    expect(canonicalJson({ b: 1, a: { d: [3, 1], c: null } })).toBe(
      '{"a":{"c":null,"d":[3,1]},"b":1}',
    );
  });
});

describe('normalizeSetParam', () => {
  it('splits comma lists, trims, deduplicates and sorts', () => {
    expect(normalizeSetParam('c, a,b,a,')).toEqual(['a', 'b', 'c']);
    expect(normalizeSetParam(['b,a', 'c', 'a'])).toEqual(['a', 'b', 'c']);
    expect(normalizeSetParam(42)).toEqual(['42']);
  });
});

describe('fingerprint', () => {
  it('prefixes the key with the operation name', () => {
    expect(fingerprint('get_video', { id: 'x' })).toMatch(/^get_video:[0-9a-f]{64}$/);
  });

  it('ignores parameter key order', () => {
    expect(fingerprint('search', { q: 'cats', limit: 10 })).toBe(
      fingerprint('search', { limit: 10, q: 'cats' }),
    );
  });

  it('treats set-valued params as sets', () => {
    const unordered = ['ids'];

    expect(fingerprint('get_videos', { ids: 'b,a,c' }, unordered)).toBe(
      fingerprint('get_videos', { ids: ['c', 'a', 'b', 'a'] }, unordered),
    );
  });

  it('keeps order significant for other list params', () => {
    expect(fingerprint('get_videos', { ids: ['a', 'b'] })).not.toBe(
      fingerprint('get_videos', { ids: ['b', 'a'] }),
    );
  });

  it('separates operations and values', () => {
    expect(fingerprint('get_video', { id: 'x' })).not.toBe(fingerprint('get_channel', { id: 'x' }));
    expect(fingerprint('get_video', { id: 'x' })).not.toBe(fingerprint('get_video', { id: 'y' }));
  });
});
