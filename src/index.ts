/**
 * qjson2json - converts qjson, a human friendly JSON dialect, into strict JSON
 * Main API entry point
 */

import { Scanner } from './scanner';
import { Parser } from './parser';
import { Evaluator } from './evaluator';
import { Serializer } from './serializer';
import { ConversionError } from './errors';
import { Value, JsonValue, ParserOptions, EvaluatorOptions } from './types';

export const VERSION = '0.1.0';
export const SYNTAX_VERSION = '0.0.0';

export type ParseOptions = ParserOptions & EvaluatorOptions;

export type ConvertResult =
  | { ok: true; json: string }
  | { ok: false; error: ConversionError };

/**
 * Parse qjson text into a value tree
 */
export function parseDocument(source: string, options?: ParserOptions): Value {
  const scanner = new Scanner(source);
  const parser = new Parser(scanner, options);
  return parser.parse();
}

/**
 * Parse qjson text into a JavaScript value
 */
export function parse(source: string, options: ParseOptions = {}): JsonValue {
  const value = parseDocument(source, { maxDepth: options.maxDepth });
  const evaluator = new Evaluator({ bigint: options.bigint });
  return evaluator.evaluate(value);
}

/**
 * Serialize a value tree to strict JSON
 */
export function stringify(value: Value): string {
  const serializer = new Serializer();
  return serializer.serialize(value);
}

/**
 * Convert qjson text to strict JSON text, throwing ConversionError
 */
export function toJSON(source: string, options?: ParserOptions): string {
  const serializer = new Serializer();
  return serializer.serialize(parseDocument(source, options));
}

/**
 * Convert qjson text to strict JSON text
 */
export function convert(source: string, options?: ParserOptions): ConvertResult {
  try {
    return { ok: true, json: toJSON(source, options) };
  } catch (error) {
    if (error instanceof ConversionError) {
      return { ok: false, error };
    }
    throw error;
  }
}

/**
 * Validate qjson syntax
 */
export function validate(
  source: string,
  options?: ParserOptions
): { valid: boolean; error?: ConversionError } {
  const result = convert(source, options);
  return result.ok ? { valid: true } : { valid: false, error: result.error };
}

/**
 * Converter and syntax versions
 */
export function version(): string {
  return `qjson2json: v${VERSION} syntax: v${SYNTAX_VERSION}`;
}

// Re-export types and classes
export * from './types';
export * from './errors';
export { Scanner } from './scanner';
export { Parser, DEFAULT_MAX_DEPTH, MAX_DEPTH_LIMIT, resolveParserOptions } from './parser';
export type { TokenSource } from './parser';
export { Evaluator } from './evaluator';
export { Serializer, quoteString } from './serializer';
export { decodeNumberLiteral, formatNumber, readNumberLiteral } from './numbers';
export { evaluateExpression, isNumericExpression } from './expression';
export type { ExpressionResult } from './expression';
export type { LiteralMatch } from './numbers';
