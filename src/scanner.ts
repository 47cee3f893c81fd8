/**
 * qjson Scanner - single forward pass tokenization
 * Whitespace, line comments (// and #) and block comments are skipped.
 * Any other text up to a delimiter is one quoteless token.
 */

import { Position, SimpleToken, Token, TokenType } from './types';
import { ErrorKind, LexError, LexErrorKind } from './errors';
import { evaluateExpression, isNumericExpression } from './expression';

const LITERAL_WORDS = new Map<string, TokenType.TRUE | TokenType.FALSE | TokenType.NULL>([
  ['true', TokenType.TRUE],
  ['yes', TokenType.TRUE],
  ['on', TokenType.TRUE],
  ['false', TokenType.FALSE],
  ['no', TokenType.FALSE],
  ['off', TokenType.FALSE],
  ['null', TokenType.NULL],
]);

const DATE_AND_HOUR = /[0-9]{4}-[0-9]{2}-[0-9]{2}T[0-9]{2}$/;
const TIME_TAIL = /:[0-9]{2}(?::[0-9]{2}(?:\.[0-9]+)?)?(?:Z|[+-][0-9]{2}:[0-9]{2})?/y;

const PUNCTUATION: Readonly<Record<string, SimpleToken['type']>> = {
  '{': TokenType.LEFT_BRACE,
  '}': TokenType.RIGHT_BRACE,
  '[': TokenType.LEFT_BRACKET,
  ']': TokenType.RIGHT_BRACKET,
  ':': TokenType.COLON,
  ',': TokenType.COMMA,
};

export class Scanner {
  public readonly source: string;
  private position: number = 0;
  private byteOffset: number = 0;
  private line: number = 0;
  private column: number = 0;
  private lineStart: number = 0;

  constructor(source: string) {
    this.source = source;
  }

  /**
   * Tokenize entire source into token array, EOF included
   */
  public tokenize(): Token[] {
    return Array.from(this.tokens());
  }

  /**
   * Lazily yield tokens up to and including EOF
   */
  public *tokens(): Generator<Token, void, undefined> {
    for (;;) {
      const token = this.nextToken();
      yield token;
      if (token.type === TokenType.EOF) return;
    }
  }

  /**
   * Get next token from source. Keeps returning EOF at the end.
   */
  public nextToken(): Token {
    this.skipTrivia();

    const start = this.mark();
    if (this.isAtEnd()) {
      return this.createToken(TokenType.EOF, '', start);
    }

    const char = this.peek();

    if (Object.prototype.hasOwnProperty.call(PUNCTUATION, char)) {
      this.advance();
      return this.createToken(PUNCTUATION[char], char, start);
    }

    if (char === '"' || char === "'") {
      return this.scanQuotedString(char);
    }

    if (char === '`') {
      return this.scanMultilineString();
    }

    return this.scanQuoteless();
  }

  private skipTrivia(): void {
    while (!this.isAtEnd()) {
      const char = this.peek();

      if (
        char === ' ' ||
        char === '\t' ||
        char === '\n' ||
        char === '\r' ||
        char === '\u00a0' ||
        (char === '\ufeff' && this.position === 0)
      ) {
        this.advance();
        continue;
      }

      if (char === '#' || (char === '/' && this.peekNext() === '/')) {
        this.skipLineComment();
        continue;
      }

      if (char === '/' && this.peekNext() === '*') {
        this.skipBlockComment();
        continue;
      }

      return;
    }
  }

  /**
   * Skip to the end of the line, leaving the newline in place
   */
  private skipLineComment(): void {
    while (!this.isAtEnd() && this.peek() !== '\n') {
      this.advanceChecked();
    }
  }

  private skipBlockComment(): void {
    const start = this.mark();
    this.advance(); // /
    this.advance(); // *

    while (!this.isAtEnd()) {
      if (this.peek() === '*' && this.peekNext() === '/') {
        this.advance();
        this.advance();
        return;
      }
      this.advanceChecked();
    }

    throw this.error(ErrorKind.UnterminatedComment, start);
  }

  private scanQuotedString(quote: string): Token {
    const start = this.mark();
    this.advance(); // skip opening quote
    let value = '';

    for (;;) {
      if (this.isAtEnd()) {
        throw this.error(ErrorKind.UnterminatedString, start);
      }

      const char = this.peek();
      if (char === quote) {
        this.advance();
        break;
      }

      if (char === '\n' || char === '\r') {
        throw this.error(ErrorKind.UnterminatedString, start);
      }

      if (char === '\\') {
        value += this.scanEscape();
        continue;
      }

      if (char < ' ' && char !== '\t') {
        throw this.error(ErrorKind.UnexpectedCharacter, this.mark());
      }

      value += this.advanceChecked();
    }

    return this.createToken(TokenType.STRING, value, start);
  }

  private scanEscape(): string {
    const start = this.mark();
    this.advance(); // skip backslash

    // End of input: the caller reports the unterminated string
    if (this.isAtEnd()) return '';

    const char = this.peek();
    switch (char) {
      case '"':
      case "'":
      case '\\':
      case '/':
        this.advance();
        return char;
      case 'b':
        this.advance();
        return '\b';
      case 'f':
        this.advance();
        return '\f';
      case 'n':
        this.advance();
        return '\n';
      case 'r':
        this.advance();
        return '\r';
      case 't':
        this.advance();
        return '\t';
      case 'u':
        return this.scanUnicodeEscape(start);
      default:
        throw this.error(ErrorKind.InvalidEscape, start);
    }
  }

  /**
   * \uXXXX, pairing surrogates so the result is always well formed
   */
  private scanUnicodeEscape(start: Position): string {
    this.advance(); // skip u
    const code = this.readHexQuad(start);

    if (code >= 0xdc00 && code <= 0xdfff) {
      throw this.error(ErrorKind.InvalidEscape, start);
    }

    if (code >= 0xd800 && code <= 0xdbff) {
      const lowStart = this.mark();
      if (this.peek() !== '\\' || this.peekNext() !== 'u') {
        throw this.error(ErrorKind.InvalidEscape, start);
      }
      this.advance();
      this.advance();
      const low = this.readHexQuad(lowStart);
      if (low < 0xdc00 || low > 0xdfff) {
        throw this.error(ErrorKind.InvalidEscape, lowStart);
      }
      return String.fromCharCode(code, low);
    }

    return String.fromCharCode(code);
  }

  private readHexQuad(start: Position): number {
    let digits = '';
    for (let i = 0; i < 4; i++) {
      if (!isHexDigit(this.peek())) {
        throw this.error(ErrorKind.InvalidEscape, start);
      }
      digits += this.advance();
    }
    return parseInt(digits, 16);
  }

  /**
   * Backtick block. The backtick must open its line; the whitespace in
   * front of it is the margin every following line repeats.
   */
  private scanMultilineString(): Token {
    const start = this.mark();
    const margin = this.source.slice(this.lineStart, this.position);
    if (!/^[ \t\u00a0]*$/.test(margin)) {
      throw this.error(ErrorKind.InvalidMultilineString, start);
    }

    this.advance(); // skip `
    this.skipInlineWhitespace();

    let newline: string;
    if (this.source.startsWith('\\n', this.position)) {
      newline = '\n';
      this.advanceBy(2);
    } else if (this.source.startsWith('\\r\\n', this.position)) {
      newline = '\r\n';
      this.advanceBy(4);
    } else {
      throw this.error(ErrorKind.InvalidMultilineString, start);
    }

    this.skipInlineWhitespace();
    if (this.peek() === '#' || (this.peek() === '/' && this.peekNext() === '/')) {
      this.skipLineComment();
    }
    if (this.peek() === '\r' && this.peekNext() === '\n') {
      this.advance();
    }
    if (this.peek() !== '\n') {
      throw this.error(ErrorKind.InvalidMultilineString, start);
    }
    this.advance();
    this.expectMargin(margin);

    let value = '';
    for (;;) {
      if (this.isAtEnd()) {
        throw this.error(ErrorKind.UnterminatedString, start);
      }

      const char = this.peek();

      if (char === '\r' && this.peekNext() === '\n') {
        this.advance();
        continue;
      }

      if (char === '\n') {
        this.advance();
        value += newline;
        this.expectMargin(margin);
        continue;
      }

      if (char === '`') {
        this.advance();
        if (this.peek() === '\\') {
          this.advance();
          value += '`';
          continue;
        }
        break;
      }

      value += this.advanceChecked();
    }

    return this.createToken(TokenType.STRING, value, start);
  }

  private expectMargin(margin: string): void {
    for (const char of margin) {
      if (this.peek() !== char) {
        throw this.error(ErrorKind.InvalidMultilineString, this.mark());
      }
      this.advance();
    }
  }

  /**
   * A quoteless value or key: everything up to a delimiter, a comment or
   * the end of the line, minus trailing blanks. The run is then read as a
   * literal word, a numeric expression, an identifier or a plain string.
   */
  private scanQuoteless(): Token {
    const start = this.mark();
    let end = start;

    while (!this.isAtEnd()) {
      const char = this.peek();

      if (char === ' ' || char === '\t' || char === '\u00a0') {
        this.advance();
        continue;
      }

      if (this.isQuotelessStop(char)) {
        if (char !== ':' || !this.skipTimeOfDay(start)) break;
        end = this.mark();
        continue;
      }

      if (char < ' ') {
        throw this.error(ErrorKind.UnexpectedCharacter, this.mark());
      }

      this.advanceChecked();
      end = this.mark();
    }

    const text = this.source.slice(start.offset, end.offset);
    const literal = literalType(text);
    if (literal !== undefined) {
      return this.createToken(literal, text, start, end);
    }

    if (isNumericExpression(text)) {
      const result = evaluateExpression(text);
      if (!result.ok) {
        throw this.error(result.kind, positionWithin(start, text, result.index));
      }
      return {
        type: TokenType.NUMBER,
        value: text,
        raw: text,
        magnitude: result.magnitude,
        start,
        end,
      };
    }

    const type = isIdentifier(text) ? TokenType.IDENTIFIER : TokenType.STRING;
    return this.createToken(type, text, start, end);
  }

  private isQuotelessStop(char: string): boolean {
    switch (char) {
      case ',':
      case ':':
      case '{':
      case '}':
      case '[':
      case ']':
      case '#':
      case '\n':
      case '\r':
        return true;
      case '/':
        return this.peekNext() === '/' || this.peekNext() === '*';
      default:
        return false;
    }
  }

  /**
   * Colons inside the time of an ISO date-time belong to the run
   */
  private skipTimeOfDay(start: Position): boolean {
    if (!DATE_AND_HOUR.test(this.source.slice(start.offset, this.position))) {
      return false;
    }
    TIME_TAIL.lastIndex = this.position;
    const match = TIME_TAIL.exec(this.source);
    if (match === null) return false;
    this.advanceBy(match[0].length);
    return true;
  }

  private skipInlineWhitespace(): void {
    while (this.peek() === ' ' || this.peek() === '\t' || this.peek() === '\u00a0') {
      this.advance();
    }
  }

  /**
   * Current UTF-16 code unit, or '' at the end
   */
  private peek(): string {
    return this.source.charAt(this.position);
  }

  private peekNext(): string {
    return this.source.charAt(this.position + 1);
  }

  /**
   * Current code point as a string, or '' at the end
   */
  private peekChar(): string {
    const code = this.source.codePointAt(this.position);
    return code === undefined ? '' : String.fromCodePoint(code);
  }

  /**
   * Consume one code point, keeping line, column and byte offset current
   */
  private advance(): string {
    const char = this.peekChar();
    const code = char.codePointAt(0);
    if (code === undefined) return '';

    this.position += char.length;
    this.byteOffset += utf8Length(code);
    if (char === '\n') {
      this.line++;
      this.column = 0;
      this.lineStart = this.position;
    } else {
      this.column++;
    }
    return char;
  }

  private advanceBy(count: number): void {
    for (let i = 0; i < count; i++) {
      this.advance();
    }
  }

  /**
   * Consume one code point, rejecting unpaired surrogates
   */
  private advanceChecked(): string {
    if (isLoneSurrogate(this.peekChar())) {
      throw this.error(ErrorKind.UnexpectedCharacter, this.mark());
    }
    return this.advance();
  }

  private isAtEnd(): boolean {
    return this.position >= this.source.length;
  }

  private mark(): Position {
    return {
      offset: this.position,
      byteOffset: this.byteOffset,
      line: this.line,
      column: this.column,
    };
  }

  private createToken(
    type: SimpleToken['type'],
    value: string,
    start: Position,
    end: Position = this.mark()
  ): SimpleToken {
    return {
      type,
      value,
      raw: this.source.slice(start.offset, end.offset),
      start,
      end,
    };
  }

  private error(kind: LexErrorKind, position: Position): LexError {
    return new LexError(kind, position, this.source);
  }
}

/**
 * true/yes/on, false/no/off and null. The first letter takes either
 * case; the rest is all lower or all upper case.
 */
function literalType(text: string): TokenType.TRUE | TokenType.FALSE | TokenType.NULL | undefined {
  const type = LITERAL_WORDS.get(text.toLowerCase());
  if (type === undefined) return undefined;
  const rest = text.slice(1);
  if (rest !== rest.toLowerCase() && rest !== rest.toUpperCase()) return undefined;
  return type;
}

function isHexDigit(char: string): boolean {
  return char.length === 1 && /[0-9a-fA-F]/.test(char);
}

function isIdentifier(text: string): boolean {
  return /^[\p{L}_][\p{L}\p{N}_]*$/u.test(text);
}

function isLoneSurrogate(char: string): boolean {
  if (char.length !== 1) return false;
  const code = char.charCodeAt(0);
  return code >= 0xd800 && code <= 0xdfff;
}

function utf8Length(code: number): number {
  if (code < 0x80) return 1;
  if (code < 0x800) return 2;
  if (code < 0x10000) return 3;
  return 4;
}

/**
 * Position of `index` inside a quoteless run, which never spans lines
 */
function positionWithin(start: Position, text: string, index: number): Position {
  let byteOffset = start.byteOffset;
  let column = start.column;
  for (const char of text.slice(0, index)) {
    byteOffset += utf8Length(char.codePointAt(0) ?? 0);
    column++;
  }
  return { offset: start.offset + index, byteOffset, line: start.line, column };
}
