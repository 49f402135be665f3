import { describe, expect, it } from 'vitest';

import { parseJSONBObject, serializeForJSONB } from '../jsonb';

describe('serializeForJSONB', () => {
  it('returns the JSON text', () => {
    expect(serializeForJSONB({ post_id: '42', tags: ['a'] })).toBe('{"post_id":"42","tags":["a"]}');
  });

  it('rejects payloads over the size limit', () => {
    expect(() => serializeForJSONB({ text: 'x'.repeat(20) }, 16)).toThrow(
      'JSONB data exceeds maximum size of 16 bytes (got 31 bytes, 31 characters)'
    );
  });
});

describe('parseJSONBObject', () => {
  it('accepts parsed objects and JSON text', () => {
    expect(parseJSONBObject({ a: 1 })).toEqual({ a: 1 });
    expect(parseJSONBObject('{"a":1}')).toEqual({ a: 1 });
  });

  it('maps null to an empty object', () => {
    expect(parseJSONBObject(null)).toEqual({});
    expect(parseJSONBObject('null')).toEqual({});
  });

  it('rejects arrays and scalars', () => {
    expect(() => parseJSONBObject([1, 2])).toThrow('Expected a JSON object, got array');
    expect(() => parseJSONBObject('"text"')).toThrow('Expected a JSON object, got string');
  });
});
