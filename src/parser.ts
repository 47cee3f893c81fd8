/**
 * qjson Parser - recursive descent over a lazy token source
 * Tolerates quoteless keys and values, optional and trailing commas, and
 * a braceless top-level object
 */

import {
  Token,
  TokenType,
  Value,
  ValueType,
  ArrayValue,
  ObjectValue,
  ObjectEntry,
  ParserOptions,
  Position,
} from './types';
import { ErrorKind, LexError, ParseError, ParseErrorKind } from './errors';

export const DEFAULT_MAX_DEPTH = 200;

/** Upper bound for maxDepth, keeping recursion well inside the call stack */
export const MAX_DEPTH_LIMIT = 1000;

/**
 * Anything that hands out tokens one at a time, ending with EOF
 */
export interface TokenSource {
  readonly source?: string;
  nextToken(): Token;
}

const KEY_TOKENS: ReadonlySet<TokenType> = new Set([
  TokenType.STRING,
  TokenType.IDENTIFIER,
  TokenType.TRUE,
  TokenType.FALSE,
  TokenType.NULL,
  TokenType.NUMBER,
]);

export function resolveParserOptions(options: ParserOptions = {}): Required<ParserOptions> {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  if (!Number.isInteger(maxDepth) || maxDepth < 1 || maxDepth > MAX_DEPTH_LIMIT) {
    throw new RangeError(
      `maxDepth must be an integer between 1 and ${MAX_DEPTH_LIMIT}, got ${maxDepth}`
    );
  }
  return { maxDepth };
}

export class Parser {
  private readonly tokens: TokenSource;
  private readonly options: Required<ParserOptions>;
  private current: Token | undefined;
  private lookahead: Token | undefined;
  private depth: number = 0;

  constructor(tokens: TokenSource, options: ParserOptions = {}) {
    this.tokens = tokens;
    this.options = resolveParserOptions(options);
  }

  /**
   * Parse exactly one document. Fails on the first error. A document with
   * nothing but blanks and comments is an empty object.
   */
  public parse(): Value {
    const first = this.peek();
    if (first.type === TokenType.EOF) {
      return { type: ValueType.OBJECT, entries: [], position: first.start };
    }

    const value = this.isMemberStart() ? this.parseBracelessObject() : this.parseValue();

    const trailing = this.afterValue(() => this.peek());
    if (trailing.type !== TokenType.EOF) {
      throw this.error(ErrorKind.TrailingContent, trailing);
    }

    return value;
  }

  /**
   * Read a token that follows a complete value. Anything there is
   * trailing content, including text that does not scan.
   */
  private afterValue(read: () => Token): Token {
    try {
      return read();
    } catch (error) {
      if (error instanceof LexError) {
        throw new ParseError(ErrorKind.TrailingContent, error.position, this.tokens.source);
      }
      throw error;
    }
  }

  private parseValue(): Value {
    const token = this.peek();

    switch (token.type) {
      case TokenType.LEFT_BRACE:
        return this.parseObject();

      case TokenType.LEFT_BRACKET:
        return this.parseArray();

      case TokenType.STRING:
      case TokenType.IDENTIFIER:
        this.advance();
        return { type: ValueType.STRING, value: token.value, position: token.start };

      case TokenType.NUMBER:
        this.advance();
        return {
          type: ValueType.NUMBER,
          raw: token.raw,
          magnitude: token.magnitude,
          position: token.start,
        };

      case TokenType.TRUE:
      case TokenType.FALSE:
        this.advance();
        return {
          type: ValueType.BOOLEAN,
          value: token.type === TokenType.TRUE,
          position: token.start,
        };

      case TokenType.NULL:
        this.advance();
        return { type: ValueType.NULL, position: token.start };

      default:
        throw this.unexpected(token);
    }
  }

  private parseObject(): ObjectValue {
    const open = this.advance(); // consume {
    this.enter(open);

    const entries = new ObjectEntries();
    this.parseMembers(entries, TokenType.RIGHT_BRACE);
    this.advance(); // consume }

    this.depth--;
    return { type: ValueType.OBJECT, entries: entries.toArray(), position: open.start };
  }

  /**
   * Top level `key: value` pairs without enclosing braces
   */
  private parseBracelessObject(): ObjectValue {
    const position = this.peek().start;
    const entries = new ObjectEntries();
    this.parseMembers(entries, TokenType.EOF);
    return { type: ValueType.OBJECT, entries: entries.toArray(), position };
  }

  /**
   * Members up to the closing token, which is left in place.
   * Commas between members are optional; one trailing comma is allowed.
   */
  private parseMembers(entries: ObjectEntries, closing: TokenType): void {
    while (!this.check(closing)) {
      this.parseMember(entries);
      this.match(TokenType.COMMA);
    }
  }

  private parseMember(entries: ObjectEntries): void {
    const keyToken = this.peek();
    if (!KEY_TOKENS.has(keyToken.type)) {
      throw this.unexpected(keyToken);
    }
    this.advance();

    const colon = this.peek();
    if (colon.type !== TokenType.COLON) {
      throw this.unexpected(colon);
    }
    this.advance();

    const value = this.parseValue();
    // Bare keys keep their source text, so `null:` is the key "null"
    const key = keyToken.type === TokenType.STRING ? keyToken.value : keyToken.raw;
    entries.set(key, value, keyToken.start);
  }

  private parseArray(): ArrayValue {
    const open = this.advance(); // consume [
    this.enter(open);

    const elements: Value[] = [];
    while (!this.check(TokenType.RIGHT_BRACKET)) {
      elements.push(this.parseValue());
      this.match(TokenType.COMMA);
    }
    this.advance(); // consume ]

    this.depth--;
    return { type: ValueType.ARRAY, elements, position: open.start };
  }

  /**
   * A key and a colon open a braceless object. A lone scalar may be the
   * whole document, so what follows it is read as trailing content.
   */
  private isMemberStart(): boolean {
    return (
      KEY_TOKENS.has(this.peek().type) &&
      this.afterValue(() => this.peekNext()).type === TokenType.COLON
    );
  }

  private enter(open: Token): void {
    if (this.depth >= this.options.maxDepth) {
      throw this.error(ErrorKind.MaxDepthExceeded, open);
    }
    this.depth++;
  }

  /**
   * True when the current token has the given type. Reaching the end of
   * input while looking for anything else is an error.
   */
  private check(type: TokenType): boolean {
    const token = this.peek();
    if (token.type === type) return true;
    if (token.type === TokenType.EOF) {
      throw this.error(ErrorKind.UnexpectedEndOfInput, token);
    }
    return false;
  }

  private match(type: TokenType): boolean {
    if (this.peek().type !== type) return false;
    this.advance();
    return true;
  }

  private peek(): Token {
    if (this.current === undefined) {
      this.current = this.tokens.nextToken();
    }
    return this.current;
  }

  private peekNext(): Token {
    this.peek();
    if (this.lookahead === undefined) {
      this.lookahead = this.tokens.nextToken();
    }
    return this.lookahead;
  }

  private advance(): Token {
    const token = this.peek();
    this.current = this.lookahead;
    this.lookahead = undefined;
    return token;
  }

  private unexpected(token: Token): ParseError {
    return token.type === TokenType.EOF
      ? this.error(ErrorKind.UnexpectedEndOfInput, token)
      : this.error(ErrorKind.UnexpectedToken, token);
  }

  private error(kind: ParseErrorKind, token: Token): ParseError {
    return new ParseError(kind, token.start, this.tokens.source);
  }
}

/**
 * Object members in first-seen key order. A repeated key replaces the
 * value but keeps its original slot.
 */
class ObjectEntries {
  private readonly entries: ObjectEntry[] = [];
  private readonly slots = new Map<string, number>();

  public set(key: string, value: Value, position: Position): void {
    const slot = this.slots.get(key);
    if (slot !== undefined) {
      this.entries[slot] = { ...this.entries[slot], value };
      return;
    }
    this.slots.set(key, this.entries.length);
    this.entries.push({ key, value, position });
  }

  public toArray(): ObjectEntry[] {
    return this.entries;
  }
}
