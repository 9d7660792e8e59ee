// This test suite verifies that object members are returned as their exact source text.

import { describe, expect, it } from 'vitest';
import { readObjectMembers } from '../src/jsonrpc/raw-json.js';

describe('raw JSON members', () => {
  it('keeps number, string, and null spellings exactly as written', () => {
    const members = readObjectMembers('{"a":1.50,"b":"x\\"y","c":null,"d":-2e3}');

    expect(members.get('a')).toBe('1.50');
    expect(members.get('b')).toBe('"x\\"y"');
    expect(members.get('c')).toBe('null');
    expect(members.get('d')).toBe('-2e3');
  });

  it('returns nested containers including braces inside strings', () => {
    const text = '{ "params" : {"s":"}{][","list":[1,[2,{"x":3}]]} , "id":7 }';
    const members = readObjectMembers(text);

    expect(members.get('params')).toBe('{"s":"}{][","list":[1,[2,{"x":3}]]}');
    expect(members.get('id')).toBe('7');
  });

  it('decodes escaped member names', () => {
    const members = readObjectMembers('{"\\u0069d":"abc"}');

    expect(members.get('id')).toBe('"abc"');
  });

  it('lets the last duplicate key win', () => {
    expect(readObjectMembers('{"id":1,"id":2}').get('id')).toBe('2');
  });

  it('handles empty objects and surrounding whitespace', () => {
    expect(readObjectMembers(' \n{ }\t').size).toBe(0);
  });

  it('rejects non-object input', () => {
    expect(() => readObjectMembers('[1,2]')).toThrow('Expected a JSON object');
  });
});
