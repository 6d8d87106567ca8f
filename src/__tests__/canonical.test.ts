import { describe, it, expect } from '@jest/globals';
import {
  canonicalFilters,
  canonicalHash,
  canonicalJson,
  canonicalize,
  compactFilters,
} from '../shared/canonical.js';
import { ValidationError } from '../shared/errors.js';

describe('canonical encoding', () => {
  it('sorts keys recursively', () => {
    expect(canonicalJson({ b: 1, a: { d: [2, { z: 1, y: 2 }], c: 'x' } })).toBe(
      '{"a":{"c":"x","d":[2,{"y":2,"z":1}]},"b":1}',
    );
  });

  it('gives the same hash regardless of insertion order', () => {
    expect(canonicalHash({ x: 1, y: 2 })).toBe(canonicalHash({ y: 2, x: 1 }));
    expect(canonicalHash({ x: 1 })).toHaveLength(64);
  });

  it('drops undefined members and normalizes dates and negative zero', () => {
    const value = canonicalize({ a: undefined, d: new Date('2024-03-01T00:00:00Z'), z: -0 });
    expect(value).toEqual({ d: '2024-03-01T00:00:00.000Z', z: 0 });
  });

  it('rejects values without a stable encoding', () => {
    expect(() => canonicalize({ n: Number.NaN })).toThrow(ValidationError);
    expect(() => canonicalize({ f: () => 1 })).toThrow('Unsupported function at $.f');
    expect(() => canonicalize({ m: new Map() })).toThrow('Unsupported object at $.m');
    expect(() => canonicalize([1, 10n])).toThrow('Unsupported bigint at $[1]');
  });

  it('compacts null filters before hashing', () => {
    expect(compactFilters({ deal_id: 10, desk: null, book: undefined })).toEqual({ deal_id: 10 });
    expect(compactFilters(null)).toEqual({});
    expect(canonicalFilters({ symbol: 'BRENT', deal_id: 10, desk: null })).toEqual({
      deal_id: 10,
      symbol: 'BRENT',
    });
  });
});
