import { describe, expect, it } from 'vitest';
import { DecodeError } from '../../errors';
import type { JsonValue } from '../../types';
import {
  assertJsonValue,
  decodeRichest,
  decodeValue,
  encodeJson,
  encodeValue,
  hasUnsafeInteger,
  stringifyCanonical,
} from '.';

describe('stringifyCanonical', () => {
  it('matches JSON.stringify(_, null, 2) for ordinary objects', () => {
    expect(stringifyCanonical({ foo: 'bar' })).toBe('{\n  "foo": "bar"\n}');
  });

  it('sorts keys lexically at every depth, integer-like keys included', () => {
    const value: JsonValue = { b: 1, a: [1, { d: null, c: true }], '10': 'x', '9': 'y' };
    expect(stringifyCanonical(value)).toBe(
      '{\n  "10": "x",\n  "9": "y",\n  "a": [\n    1,\n    {\n      "c": true,\n      "d": null\n    }\n  ],\n  "b": 1\n}',
    );
  });

  it('renders empty containers inline', () => {
    expect(stringifyCanonical({})).toBe('{}');
    expect(stringifyCanonical([])).toBe('[]');
    expect(stringifyCanonical({ a: {} })).toBe('{\n  "a": {}\n}');
  });

  it('is stable across key insertion order', () => {
    expect(stringifyCanonical({ x: 1, y: 2 })).toBe(stringifyCanonical({ y: 2, x: 1 }));
  });
});

describe('encodeValue / encodeJson', () => {
  it('stores strings verbatim', () => {
    expect(encodeValue('hello string')).toBe('hello string');
    expect(encodeValue('42')).toBe('42');
  });

  it('stores non-strings as JSON text', () => {
    expect(encodeValue(42)).toBe('42');
    expect(encodeValue(42.5)).toBe('42.5');
    expect(encodeValue(true)).toBe('true');
    expect(encodeValue(null)).toBe('null');
    expect(encodeValue(['oops'])).toBe('[\n  "oops"\n]');
  });

  it('encodeJson quotes strings', () => {
    expect(encodeJson('hi')).toBe('"hi"');
  });
});

describe('decodeValue', () => {
  it('returns the raw text unless deserialization is requested', () => {
    expect(decodeValue('42', { key: 'foo' })).toBe('42');
    expect(decodeValue('42', { key: 'foo', deserializeJson: true })).toBe(42);
  });

  it('decodes null text to null', () => {
    expect(decodeValue('null', { key: 'n', deserializeJson: true })).toBeNull();
  });

  it('throws DecodeError naming the key on malformed JSON', () => {
    let caught: unknown;
    try {
      decodeValue('{bad', { key: 'cfg', deserializeJson: true });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(DecodeError);
    expect(caught).toMatchObject({
      key: 'cfg',
      message: expect.stringMatching(/^Cannot decode "cfg": malformed JSON/),
    });
  });

  it('round-trips every JSON value through encodeJson', () => {
    const values: JsonValue[] = [
      'hello',
      '',
      0,
      42,
      -3.25,
      true,
      false,
      null,
      [],
      ['oops', 1, [null]],
      {},
      { nested: { list: [1, 2, { deep: 'yes' }] }, flag: false },
    ];
    for (const v of values) {
      expect(decodeValue(encodeJson(v), { key: 'k', deserializeJson: true })).toEqual(v);
    }
  });

  it('keeps an own __proto__ member of parsed JSON', () => {
    const decoded = decodeValue('{"__proto__":{"x":1}}', { key: 'k', deserializeJson: true });
    expect(encodeValue(decoded)).toBe('{\n  "__proto__": {\n    "x": 1\n  }\n}');
  });

  it('round-trips non-strings through encodeValue and strings without deserialization', () => {
    const structured: JsonValue[] = [7, 1.5, true, null, [1, 'a'], { a: { b: [] } }];
    for (const v of structured) {
      expect(decodeValue(encodeValue(v), { key: 'k', deserializeJson: true })).toEqual(v);
    }
    expect(decodeValue(encodeValue('plain text'), { key: 'k' })).toBe('plain text');
  });
});

describe('decodeRichest', () => {
  it('falls back to the raw string when the text is not JSON', () => {
    expect(decodeRichest('hello string')).toBe('hello string');
  });

  it('parses structured and scalar JSON', () => {
    expect(decodeRichest('{"a":1}')).toEqual({ a: 1 });
    expect(decodeRichest('42.0')).toBe(42);
    expect(decodeRichest('false')).toBe(false);
    expect(decodeRichest('null')).toBeNull();
  });

  it('keeps a __proto__ key alongside the others', () => {
    expect(stringifyCanonical(decodeRichest('{"__proto__": 1, "a": 2}'))).toBe(
      '{\n  "__proto__": 1,\n  "a": 2\n}',
    );
  });

  it('keeps integer literals beyond the safe range as strings', () => {
    expect(decodeRichest('12345678901234567890')).toBe('12345678901234567890');
  });
});

describe('assertJsonValue', () => {
  it('rejects non-finite numbers', () => {
    expect(() => assertJsonValue('k', Number.POSITIVE_INFINITY)).toThrow(DecodeError);
    expect(() => assertJsonValue('k', Number.NaN)).toThrow(DecodeError);
  });

  it('accepts nested JSON', () => {
    expect(assertJsonValue('k', { a: [1, 'b', null] })).toEqual({ a: [1, 'b', null] });
  });

  it('returns the value it was given', () => {
    const value = { a: [1] };
    expect(assertJsonValue('k', value)).toBe(value);
  });

  it('rejects class instances and functions', () => {
    expect(() => assertJsonValue('k', new Date(0))).toThrow('Cannot decode "k": value is not JSON-representable');
    expect(() => assertJsonValue('k', [() => 1])).toThrow(DecodeError);
  });
});

describe('hasUnsafeInteger', () => {
  it('finds integers JSON.parse rounded at any depth', () => {
    expect(hasUnsafeInteger(JSON.parse('12345678901234567890'))).toBe(true);
    expect(hasUnsafeInteger({ ids: [1, JSON.parse('9007199254740993')] })).toBe(true);
  });

  it('accepts safe integers and fractions', () => {
    expect(hasUnsafeInteger(Number.MAX_SAFE_INTEGER)).toBe(false);
    expect(hasUnsafeInteger({ ratio: 0.5, name: '12345678901234567890' })).toBe(false);
  });
});
