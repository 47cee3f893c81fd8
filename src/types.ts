/**
 * Core qjson type definitions
 */

/**
 * Position in source text
 */
export interface Position {
  /** UTF-16 index into the source string */
  offset: number;
  /** UTF-8 byte offset */
  byteOffset: number;
  /** 0-based line */
  line: number;
  /** 0-based column, in code points */
  column: number;
}

/**
 * Token types for lexical analysis
 */
export enum TokenType {
  // Delimiters
  LEFT_BRACE = 'LEFT_BRACE', // {
  RIGHT_BRACE = 'RIGHT_BRACE', // }
  LEFT_BRACKET = 'LEFT_BRACKET', // [
  RIGHT_BRACKET = 'RIGHT_BRACKET', // ]
  COLON = 'COLON', // :
  COMMA = 'COMMA', // ,

  // Literals
  STRING = 'STRING',
  NUMBER = 'NUMBER',
  TRUE = 'TRUE',
  FALSE = 'FALSE',
  NULL = 'NULL',

  // Quoteless text shaped like an identifier; a string value or a key
  IDENTIFIER = 'IDENTIFIER',

  EOF = 'EOF',
}

/**
 * Decoded numeric value. Integer literals keep every digit.
 */
export type NumericMagnitude =
  | { type: 'integer'; value: bigint }
  | { type: 'float'; value: number };

interface TokenBase {
  /** Decoded text for strings, literal text otherwise */
  value: string;
  /** Source text of the token */
  raw: string;
  start: Position;
  end: Position;
}

export interface SimpleToken extends TokenBase {
  type: Exclude<TokenType, TokenType.NUMBER>;
}

export interface NumberToken extends TokenBase {
  type: TokenType.NUMBER;
  magnitude: NumericMagnitude;
}

/**
 * Token with position information for error reporting
 */
export type Token = SimpleToken | NumberToken;

/**
 * Value tree node types
 */
export enum ValueType {
  NULL = 'NULL',
  BOOLEAN = 'BOOLEAN',
  NUMBER = 'NUMBER',
  STRING = 'STRING',
  ARRAY = 'ARRAY',
  OBJECT = 'OBJECT',
}

interface ValueNode {
  type: ValueType;
  /** Start of the value in the source; absent on trees built in code */
  position?: Position;
}

export interface NullValue extends ValueNode {
  type: ValueType.NULL;
}

export interface BooleanValue extends ValueNode {
  type: ValueType.BOOLEAN;
  value: boolean;
}

export interface NumberValue extends ValueNode {
  type: ValueType.NUMBER;
  raw: string;
  magnitude: NumericMagnitude;
}

export interface StringValue extends ValueNode {
  type: ValueType.STRING;
  value: string;
}

export interface ArrayValue extends ValueNode {
  type: ValueType.ARRAY;
  elements: Value[];
}

export interface ObjectEntry {
  key: string;
  value: Value;
  /** Position of the first occurrence of the key */
  position?: Position;
}

export interface ObjectValue extends ValueNode {
  type: ValueType.OBJECT;
  entries: ObjectEntry[];
}

export type Value =
  | NullValue
  | BooleanValue
  | NumberValue
  | StringValue
  | ArrayValue
  | ObjectValue;

/**
 * Plain JavaScript form of a value tree
 */
export type JsonValue =
  | null
  | boolean
  | number
  | bigint
  | string
  | JsonArray
  | JsonObject;

export interface JsonArray extends Array<JsonValue> {}

export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * Parser options
 */
export interface ParserOptions {
  /** Maximum nesting depth of objects and arrays */
  maxDepth?: number;
}

/**
 * Evaluator options
 */
export interface EvaluatorOptions {
  /** Return integers outside the safe range as bigint */
  bigint?: boolean;
}
