import { describe, it, expect } from 'vitest';
import {
  convert,
  toJSON,
  parse,
  parseDocument,
  stringify,
  validate,
  version,
  ConversionError,
  ErrorKind,
  ParseError,
  ValueType,
} from './index';

function json(source: string): string {
  const result = convert(source);
  if (!result.ok) {
    throw new Error(`conversion failed: ${result.error.toString()}`);
  }
  return result.json;
}

function failure(source: string): ConversionError {
  const result = convert(source);
  if (result.ok) {
    throw new Error(`expected ${JSON.stringify(source)} to fail, got ${result.json}`);
  }
  return result.error;
}

describe('qjson2json API', () => {
  describe('convert', () => {
    it('should convert lenient documents to strict JSON', () => {
      const source = [
        '# settings',
        '{',
        "  name: 'Ann',",
        '  tags: [',
        "    'x', // first",
        "    'y',",
        '  ],',
        '  /* flags */',
        '  active: yes',
        '}',
      ].join('\n');

      expect(json(source)).toBe('{"name":"Ann","tags":["x","y"],"active":true}');
    });

    it('should let the last duplicate key win', () => {
      expect(json('{a: 1, a: 2}')).toBe('{"a":2}');
      expect(json('{a: 1, b: 2, a: 3}')).toBe('{"a":3,"b":2}');
    });

    it('should normalize lenient numbers', () => {
      expect(json('.5')).toBe('0.5');
      expect(json('+3')).toBe('3');
      expect(json('007')).toBe('7');
      expect(json('[12345678901234567890, 0xFF, 0b11, 1_000, 1e2, -0.0]')).toBe(
        '[12345678901234567890,255,3,1000,100,0]'
      );
    });

    it('should requote single-quoted strings', () => {
      expect(json(String.raw`'He said \'hi\''`)).toBe(`"He said 'hi'"`);
    });

    it('should map literal aliases', () => {
      expect(json('[yes, No, OFF, on, Null]')).toBe('[true,false,false,true,null]');
    });

    it('should convert a braceless document with a multiline string', () => {
      const source = ['title: Notes', 'text:', '  `\\n', '  Hello', '  "World"`'].join('\n');

      expect(json(source)).toBe('{"title":"Notes","text":"Hello\\n\\"World\\""}');
    });

    it('should quote quoteless keys and values', () => {
      expect(json('{name: John Doe}')).toBe('{"name":"John Doe"}');
      expect(json('path: /usr/local/bin  # install dir\nnote: it\'s fine')).toBe(
        '{"path":"/usr/local/bin","note":"it\'s fine"}'
      );
      expect(json('{home town: Oslo, Yes: nope}')).toBe('{"home town":"Oslo","Yes":"nope"}');
    });

    it('should evaluate numeric expressions', () => {
      expect(json('a: 1 + 2')).toBe('{"a":3}');
      expect(json('[(1 + 2) * 3, 7 / 2, -7 % 3, 1.5 * 2, 0xF0 | 0x0F, 6 ^ 3, 2 * -3]')).toBe(
        '[9,3,-1,3,255,5,-6]'
      );
    });

    it('should convert durations to seconds', () => {
      expect(json('timeout: 2h')).toBe('{"timeout":7200}');
      expect(json('[1h30m, 1w, 1.5d, 90s, (1m + 1) * 2]')).toBe('[5400,604800,129600,90,122]');
    });

    it('should convert ISO date-times to epoch seconds', () => {
      expect(json('when: 2021-01-02T03:04:05Z')).toBe('{"when":1609556645}');
      expect(json('[1970-01-01T, 1970-01-01T00:00:01.500Z, 1970-01-01T01:00+01:00]')).toBe(
        '[0,1.5,0]'
      );
    });

    it('should report numeric expression errors', () => {
      expect(failure('a: 1 / 0')).toMatchObject({ kind: ErrorKind.DivisionByZero, column: 5 });
      expect(failure('a: (1 + 2')).toMatchObject({
        kind: ErrorKind.InvalidNumericExpression,
        column: 3,
      });
      expect(failure('a: 1 +')).toMatchObject({
        kind: ErrorKind.InvalidNumericExpression,
        column: 6,
      });
      expect(failure('a: 1 + ~1.5')).toMatchObject({
        kind: ErrorKind.OperandMustBeInteger,
        column: 7,
      });
      expect(failure('a: 2.5 % 2')).toMatchObject({
        kind: ErrorKind.OperandMustBeInteger,
        column: 7,
      });
      expect(failure('a: 1969-12-31T23:59:59Z')).toMatchObject({
        kind: ErrorKind.InvalidDateTime,
        column: 3,
      });
      expect(failure('a: 2021-13-01T')).toMatchObject({ kind: ErrorKind.InvalidDateTime });
    });

    it('should reach a fixed point on strict JSON', () => {
      const strict = '{"a":[1,2.5e10,-0.0,"\\u00e9\\n"],"b":{"c":null,"d":true}}';
      const once = json(strict);

      expect(once).toBe('{"a":[1,25000000000,0,"é\\n"],"b":{"c":null,"d":true}}');
      expect(json(once)).toBe(once);
    });

    it('should produce text JSON.parse accepts', () => {
      const output = json("{list: [1, 2, 3], nested: {ok: on}, 'key with space': '\\t'}");

      expect(JSON.parse(output)).toEqual({
        list: [1, 2, 3],
        nested: { ok: true },
        'key with space': '\t',
      });
    });

    it('should report the position of a missing value', () => {
      const error = failure('{a: }');

      expect(error).toBeInstanceOf(ParseError);
      expect(error.kind).toBe(ErrorKind.UnexpectedToken);
      expect(error.line).toBe(0);
      expect(error.column).toBe(4);
      expect(error.byteOffset).toBe(4);
    });

    it('should count byte offsets in UTF-8', () => {
      expect(failure('["é", "open]')).toMatchObject({
        kind: ErrorKind.UnterminatedString,
        offset: 6,
        byteOffset: 7,
        column: 6,
      });
    });

    it('should fail deep nesting with a depth error', () => {
      expect(failure('['.repeat(201)).kind).toBe(ErrorKind.MaxDepthExceeded);
      expect(failure('['.repeat(100000)).column).toBe(200);
    });

    it('should honor maxDepth', () => {
      expect(convert('[[1]]', { maxDepth: 1 })).toMatchObject({ ok: false });
      expect(convert('[[1]]', { maxDepth: 2 })).toEqual({ ok: true, json: '[[1]]' });
    });

    it('should rethrow option errors', () => {
      expect(() => convert('1', { maxDepth: 0 })).toThrow(RangeError);
    });

    it('should show the failing line in error text', () => {
      const error = failure('{\n  a: 1 +\n}');

      expect(error.toString()).toBe(
        'LexError: invalid numeric expression at line 2, column 9\n  a: 1 +\n        ^'
      );
      expect(error.toJSON()).toEqual({
        kind: ErrorKind.InvalidNumericExpression,
        line: 1,
        column: 8,
        byteOffset: 10,
        message: 'invalid numeric expression',
      });
    });

    it('should convert empty input to an empty object', () => {
      expect(json('')).toBe('{}');
      expect(json('  // nothing')).toBe('{}');
      expect(json('/* note */\n# more\n')).toBe('{}');
    });

    it('should report unscannable text after the document as trailing content', () => {
      expect(failure('[1] @')).toMatchObject({ kind: ErrorKind.TrailingContent, column: 4 });
      expect(failure('{} "open')).toMatchObject({ kind: ErrorKind.TrailingContent, column: 3 });
      expect(failure('[1] /* open')).toMatchObject({ kind: ErrorKind.TrailingContent, column: 4 });
    });
  });

  describe('toJSON', () => {
    it('should return strict JSON text', () => {
      expect(toJSON('[1, 2,]')).toBe('[1,2]');
    });

    it('should throw conversion errors', () => {
      expect(() => toJSON('[1,')).toThrow(ConversionError);
    });
  });

  describe('parse', () => {
    it('should return plain JavaScript values', () => {
      expect(parse("a: 1, b: 'two'")).toEqual({ a: 1, b: 'two' });
    });

    it('should pass the bigint option through', () => {
      expect(parse('[18446744073709551615]', { bigint: true })).toEqual([18446744073709551615n]);
    });
  });

  describe('parseDocument and stringify', () => {
    it('should round trip through the value tree', () => {
      const document = parseDocument('{x: [true]}');

      expect(document.type).toBe(ValueType.OBJECT);
      expect(stringify(document)).toBe('{"x":[true]}');
    });
  });

  describe('validate', () => {
    it('should accept valid documents', () => {
      expect(validate('{a: 1}')).toEqual({ valid: true });
    });

    it('should return the error for invalid documents', () => {
      const result = validate('{a: 1} x');

      expect(result.valid).toBe(false);
      expect(result.error?.kind).toBe(ErrorKind.TrailingContent);
    });
  });

  it('should report versions', () => {
    expect(version()).toBe('qjson2json: v0.1.0 syntax: v0.0.0');
  });
});
