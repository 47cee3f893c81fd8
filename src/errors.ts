/**
 * Conversion errors with source positions
 */

import { Position } from './types';

export enum ErrorKind {
  // Lexical
  UnexpectedCharacter = 'UnexpectedCharacter',
  UnterminatedString = 'UnterminatedString',
  UnterminatedComment = 'UnterminatedComment',
  InvalidEscape = 'InvalidEscape',
  InvalidNumberLiteral = 'InvalidNumberLiteral',
  InvalidMultilineString = 'InvalidMultilineString',
  InvalidNumericExpression = 'InvalidNumericExpression',
  OperandMustBeInteger = 'OperandMustBeInteger',
  DivisionByZero = 'DivisionByZero',
  InvalidDateTime = 'InvalidDateTime',

  // Structural
  UnexpectedToken = 'UnexpectedToken',
  UnexpectedEndOfInput = 'UnexpectedEndOfInput',
  TrailingContent = 'TrailingContent',
  MaxDepthExceeded = 'MaxDepthExceeded',
}

/**
 * Failures inside a quoteless number, located by index into its text
 */
export type NumberErrorKind =
  | ErrorKind.InvalidNumberLiteral
  | ErrorKind.InvalidNumericExpression
  | ErrorKind.OperandMustBeInteger
  | ErrorKind.DivisionByZero
  | ErrorKind.InvalidDateTime;

export type LexErrorKind =
  | ErrorKind.UnexpectedCharacter
  | ErrorKind.UnterminatedString
  | ErrorKind.UnterminatedComment
  | ErrorKind.InvalidEscape
  | ErrorKind.InvalidMultilineString
  | NumberErrorKind;

export type ParseErrorKind =
  | ErrorKind.UnexpectedToken
  | ErrorKind.UnexpectedEndOfInput
  | ErrorKind.TrailingContent
  | ErrorKind.MaxDepthExceeded;

export const ERROR_MESSAGES: Readonly<Record<ErrorKind, string>> = {
  [ErrorKind.UnexpectedCharacter]: 'unexpected character',
  [ErrorKind.UnterminatedString]: 'unterminated string',
  [ErrorKind.UnterminatedComment]: 'unclosed /*...*/ comment',
  [ErrorKind.InvalidEscape]: 'invalid escape sequence',
  [ErrorKind.InvalidNumberLiteral]: 'invalid number literal',
  [ErrorKind.InvalidMultilineString]: 'invalid multiline string',
  [ErrorKind.InvalidNumericExpression]: 'invalid numeric expression',
  [ErrorKind.OperandMustBeInteger]: 'operand must be an integer',
  [ErrorKind.DivisionByZero]: 'division by zero',
  [ErrorKind.InvalidDateTime]: 'invalid ISO date time',
  [ErrorKind.UnexpectedToken]: 'unexpected token',
  [ErrorKind.UnexpectedEndOfInput]: 'unexpected end of input',
  [ErrorKind.TrailingContent]: 'unexpected content after the document',
  [ErrorKind.MaxDepthExceeded]: 'too many nested objects or arrays',
};

/**
 * Serializable form handed to binding layers
 */
export interface ConversionErrorInfo {
  kind: ErrorKind;
  line: number;
  column: number;
  byteOffset: number;
  message: string;
}

/**
 * Conversion failure with context. Line and column are 0-based.
 */
export class ConversionError extends Error {
  public readonly kind: ErrorKind;
  public readonly line: number;
  public readonly column: number;
  public readonly byteOffset: number;
  public readonly offset: number;

  constructor(
    kind: ErrorKind,
    position: Position,
    public readonly source?: string
  ) {
    super(ERROR_MESSAGES[kind]);
    this.name = 'ConversionError';
    this.kind = kind;
    this.line = position.line;
    this.column = position.column;
    this.byteOffset = position.byteOffset;
    this.offset = position.offset;
    Object.setPrototypeOf(this, ConversionError.prototype);
  }

  public get position(): Position {
    return {
      offset: this.offset,
      byteOffset: this.byteOffset,
      line: this.line,
      column: this.column,
    };
  }

  public toString(): string {
    const location = `at line ${this.line + 1}, column ${this.column + 1}`;
    if (this.source !== undefined) {
      const lines = this.source.split('\n');
      const errorLine = (lines[this.line] ?? '').replace(/\r$/, '');
      const pointer = ' '.repeat(this.column) + '^';
      return `${this.name}: ${this.message} ${location}\n${errorLine}\n${pointer}`;
    }
    return `${this.name}: ${this.message} ${location}`;
  }

  public toJSON(): ConversionErrorInfo {
    return {
      kind: this.kind,
      line: this.line,
      column: this.column,
      byteOffset: this.byteOffset,
      message: this.message,
    };
  }
}

/**
 * Raised by the scanner
 */
export class LexError extends ConversionError {
  declare readonly kind: LexErrorKind;

  constructor(kind: LexErrorKind, position: Position, source?: string) {
    super(kind, position, source);
    this.name = 'LexError';
    Object.setPrototypeOf(this, LexError.prototype);
  }
}

/**
 * Raised by the parser
 */
export class ParseError extends ConversionError {
  declare readonly kind: ParseErrorKind;

  constructor(kind: ParseErrorKind, position: Position, source?: string) {
    super(kind, position, source);
    this.name = 'ParseError';
    Object.setPrototypeOf(this, ParseError.prototype);
  }
}
