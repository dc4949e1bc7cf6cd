import { describe, it, expect } from 'vitest';
import { buildUrl, encodeQuery } from '../query-string.js';
import { CloudAIError } from '../../errors.js';

describe('encodeQuery', () => {
  it('encodes a single scalar', () => {
    expect(encodeQuery({ limit: 10 })).toBe('limit=10');
  });

  it('sorts keys', () => {
    expect(encodeQuery({ order: 'desc', after: 'msg_1', limit: 5 })).toBe('after=msg_1&limit=5&order=desc');
  });

  it('repeats the key for array values', () => {
    expect(encodeQuery({ include: ['a', 'b'] })).toBe('include=a&include=b');
  });

  it('skips undefined and null entries', () => {
    expect(encodeQuery({ after: undefined, limit: null, order: 'asc' })).toBe('order=asc');
    expect(encodeQuery({ collapsed: undefined })).toBe('');
  });

  it('percent-encodes keys and values', () => {
    expect(encodeQuery({ after: 'a b&c=d' })).toBe('after=a%20b%26c%3Dd');
  });

  it('writes booleans as true and false', () => {
    expect(encodeQuery({ collapsed: true })).toBe('collapsed=true');
    expect(encodeQuery({ collapsed: false })).toBe('collapsed=false');
  });

  it('rejects nested objects', () => {
    expect(() => encodeQuery({ filter: { a: 1 } })).toThrow(CloudAIError);
    expect(() => encodeQuery({ filter: { a: 1 } })).toThrow("Query parameter 'filter' cannot be encoded");
    expect(() => encodeQuery({ include: [{ a: 1 }] })).toThrow("Query parameter 'include' must contain only scalar values");
  });
});

describe('buildUrl', () => {
  it('appends the encoded query', () => {
    expect(buildUrl('https://api.test', '/items', { limit: 10 })).toBe('https://api.test/items?limit=10');
  });

  it('adds no question mark for an empty or absent query', () => {
    expect(buildUrl('https://api.test', '/items', {})).toBe('https://api.test/items');
    expect(buildUrl('https://api.test', '/items')).toBe('https://api.test/items');
    expect(buildUrl('https://api.test', '/items', { after: undefined })).toBe('https://api.test/items');
  });
});
