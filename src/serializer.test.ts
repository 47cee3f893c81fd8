import { describe, it, expect } from 'vitest';
import { Serializer, quoteString } from './serializer';
import { Value, ValueType } from './types';

describe('Serializer', () => {
  const serializer = new Serializer();

  it('should write compact JSON', () => {
    const value: Value = {
      type: ValueType.OBJECT,
      entries: [
        {
          key: 'a',
          value: {
            type: ValueType.ARRAY,
            elements: [
              { type: ValueType.NUMBER, raw: '1', magnitude: { type: 'integer', value: 1n } },
              { type: ValueType.STRING, value: 'x' },
              { type: ValueType.NULL },
              { type: ValueType.BOOLEAN, value: true },
            ],
          },
        },
        { key: 'b', value: { type: ValueType.OBJECT, entries: [] } },
      ],
    };

    expect(serializer.serialize(value)).toBe('{"a":[1,"x",null,true],"b":{}}');
  });

  it('should keep entry order', () => {
    const value: Value = {
      type: ValueType.OBJECT,
      entries: [
        { key: 'z', value: { type: ValueType.NUMBER, raw: '1', magnitude: { type: 'integer', value: 1n } } },
        { key: 'a', value: { type: ValueType.BOOLEAN, value: false } },
      ],
    };

    expect(serializer.serialize(value)).toBe('{"z":1,"a":false}');
  });

  it('should write numbers from their magnitude, not their source text', () => {
    const value: Value = {
      type: ValueType.ARRAY,
      elements: [
        { type: ValueType.NUMBER, raw: '0x_ff', magnitude: { type: 'integer', value: 255n } },
        { type: ValueType.NUMBER, raw: '.5', magnitude: { type: 'float', value: 0.5 } },
        { type: ValueType.NUMBER, raw: '-0.0', magnitude: { type: 'float', value: -0 } },
      ],
    };

    expect(serializer.serialize(value)).toBe('[255,0.5,0]');
  });

  it('should escape keys like strings', () => {
    const value: Value = {
      type: ValueType.OBJECT,
      entries: [{ key: 'a"b', value: { type: ValueType.NULL } }],
    };

    expect(serializer.serialize(value)).toBe('{"a\\"b":null}');
  });

  describe('quoteString', () => {
    it('should escape quotes and backslashes', () => {
      expect(quoteString('He said "hi"')).toBe('"He said \\"hi\\""');
      expect(quoteString('C:\\dir')).toBe('"C:\\\\dir"');
    });

    it('should use short escapes for common control characters', () => {
      expect(quoteString('\b\f\n\r\t')).toBe('"\\b\\f\\n\\r\\t"');
    });

    it('should escape other control characters in lowercase hex', () => {
      expect(quoteString('a\u0001b\u001f')).toBe('"a\\u0001b\\u001f"');
    });

    it('should emit non-ASCII text as is', () => {
      expect(quoteString('café \u{1F600} \u007f')).toBe('"café \u{1F600} \u007f"');
    });

    it('should escape lone surrogates', () => {
      expect(quoteString('\ud800x')).toBe('"\\ud800x"');
      expect(quoteString('x\udc00')).toBe('"x\\udc00"');
      expect(quoteString('\udc00\ud800')).toBe('"\\udc00\\ud800"');
    });

    it('should leave single quotes and slashes alone', () => {
      expect(quoteString("it's a/b")).toBe('"it\'s a/b"');
    });
  });
});
