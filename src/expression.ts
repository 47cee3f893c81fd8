/**
 * Numeric expressions in quoteless values
 *
 * Operands are number literals and ISO date-times. Operators, loosest
 * first: `+ - | ^`; then `* / & %`; then the duration
 * suffixes `w d h m s`. Unary `+ - ~` bind tightest. Parentheses group.
 *
 * Integers stay exact as bigint; `/` and `%` truncate toward zero like
 * integer division. A float anywhere in `+ - * /` makes the result a
 * float. Bitwise operators and `%` take integers only. A duration turns
 * its left operand into seconds and adds the expression after it, so
 * `1h30m` is 5400.
 */

import { NumericMagnitude } from './types';
import { ErrorKind, NumberErrorKind } from './errors';
import { readNumberLiteral } from './numbers';

export type ExpressionResult =
  | { ok: true; magnitude: NumericMagnitude }
  | { ok: false; kind: NumberErrorKind; index: number };

type Operator = '+' | '-' | '*' | '/' | '%' | '^' | '&' | '|' | '~' | '(' | ')' | Unit;
type Unit = 'w' | 'd' | 'h' | 'm' | 's';

type ExpressionToken =
  | { kind: 'operand'; magnitude: NumericMagnitude; index: number }
  | { kind: 'operator'; operator: Operator; index: number }
  | { kind: 'end'; index: number };

const BINDING_POWER: Readonly<Record<Operator, number>> = {
  '+': 1,
  '-': 1,
  '|': 1,
  '^': 1,
  '~': 1,
  '*': 2,
  '/': 2,
  '&': 2,
  '%': 2,
  w: 4,
  d: 4,
  h: 4,
  m: 4,
  s: 4,
  '(': 0,
  ')': 0,
};

const UNARY_POWER = 5;
const DURATION_TAIL_POWER = 3;

const SECONDS: Readonly<Record<Unit, number>> = {
  w: 7 * 24 * 3600,
  d: 24 * 3600,
  h: 3600,
  m: 60,
  s: 1,
};

/**
 * Whether a quoteless run reads as a number: after any signs, blanks and
 * opening parentheses comes a digit, or a `.` and a digit.
 */
export function isNumericExpression(text: string): boolean {
  const match = /^[+\-( \t\u00a0]*/.exec(text);
  const rest = text.slice(match === null ? 0 : match[0].length);
  return /^(?:[0-9]|\.[0-9])/.test(rest);
}

/**
 * Evaluate a numeric expression. Failures carry the index of the
 * offending character in `text`.
 */
export function evaluateExpression(text: string): ExpressionResult {
  try {
    return { ok: true, magnitude: new ExpressionParser(text).evaluate() };
  } catch (error) {
    if (error instanceof ExpressionFailure) {
      return { ok: false, kind: error.kind, index: error.index };
    }
    throw error;
  }
}

class ExpressionFailure extends Error {
  constructor(
    public readonly kind: NumberErrorKind,
    public readonly index: number
  ) {
    super(kind);
    this.name = 'ExpressionFailure';
    Object.setPrototypeOf(this, ExpressionFailure.prototype);
  }
}

class ExpressionParser {
  private readonly text: string;
  private index: number = 0;
  private current: ExpressionToken;

  constructor(text: string) {
    this.text = text;
    this.current = this.readToken();
  }

  public evaluate(): NumericMagnitude {
    const result = this.expression(0);
    if (this.current.kind !== 'end') {
      throw this.fail(ErrorKind.InvalidNumericExpression, this.current.index);
    }
    if (result.type === 'float' && !Number.isFinite(result.value)) {
      throw this.fail(ErrorKind.InvalidNumericExpression, 0);
    }
    return result;
  }

  private expression(rightPower: number): NumericMagnitude {
    const token = this.advance();
    let left = this.prefix(token);

    for (;;) {
      const next = this.current;
      if (next.kind !== 'operator' || BINDING_POWER[next.operator] <= rightPower) {
        return left;
      }
      this.advance();
      left = this.infix(next.operator, next.index, left);
    }
  }

  private prefix(token: ExpressionToken): NumericMagnitude {
    if (token.kind === 'operand') return token.magnitude;
    if (token.kind === 'end') {
      throw this.fail(ErrorKind.InvalidNumericExpression, token.index);
    }

    switch (token.operator) {
      case '+':
        return this.expression(UNARY_POWER);
      case '-':
        return negate(this.expression(UNARY_POWER));
      case '~': {
        const operand = this.expression(UNARY_POWER);
        if (operand.type === 'float') {
          throw this.fail(ErrorKind.OperandMustBeInteger, token.index);
        }
        return { type: 'integer', value: ~operand.value };
      }
      case '(': {
        const inner = this.expression(0);
        if (this.current.kind !== 'operator' || this.current.operator !== ')') {
          throw this.fail(ErrorKind.InvalidNumericExpression, token.index);
        }
        this.advance();
        return inner;
      }
      default:
        throw this.fail(ErrorKind.InvalidNumericExpression, token.index);
    }
  }

  private infix(operator: Operator, index: number, left: NumericMagnitude): NumericMagnitude {
    switch (operator) {
      case 'w':
      case 'd':
      case 'h':
      case 'm':
      case 's':
        return this.duration(SECONDS[operator], left);
      case '+':
        return arithmetic(left, this.expression(1), (a, b) => a + b, (a, b) => a + b);
      case '-':
        return arithmetic(left, this.expression(1), (a, b) => a - b, (a, b) => a - b);
      case '*':
        return arithmetic(left, this.expression(2), (a, b) => a * b, (a, b) => a * b);
      case '/': {
        const right = this.expression(2);
        if (isZero(right)) throw this.fail(ErrorKind.DivisionByZero, index);
        return arithmetic(left, right, (a, b) => a / b, (a, b) => a / b);
      }
      case '%': {
        const right = this.expression(2);
        const [a, b] = this.integers(left, right, index);
        if (b === 0n) throw this.fail(ErrorKind.DivisionByZero, index);
        return { type: 'integer', value: a % b };
      }
      case '&':
        return this.bitwise(left, this.expression(2), index, (a, b) => a & b);
      case '|':
        return this.bitwise(left, this.expression(1), index, (a, b) => a | b);
      case '^':
        return this.bitwise(left, this.expression(1), index, (a, b) => a ^ b);
      default:
        // `~` is prefix only
        throw this.fail(ErrorKind.InvalidNumericExpression, index);
    }
  }

  /**
   * Seconds for `left` units, plus whatever follows up to a closing
   * parenthesis or the end
   */
  private duration(seconds: number, left: NumericMagnitude): NumericMagnitude {
    const value = toFloat(left) * seconds;
    const next = this.current;
    if (next.kind === 'end' || (next.kind === 'operator' && next.operator === ')')) {
      return { type: 'float', value };
    }
    const rest = this.expression(DURATION_TAIL_POWER);
    return { type: 'float', value: value + toFloat(rest) };
  }

  private bitwise(
    left: NumericMagnitude,
    right: NumericMagnitude,
    index: number,
    combine: (a: bigint, b: bigint) => bigint
  ): NumericMagnitude {
    const [a, b] = this.integers(left, right, index);
    return { type: 'integer', value: combine(a, b) };
  }

  private integers(left: NumericMagnitude, right: NumericMagnitude, index: number): [bigint, bigint] {
    if (left.type !== 'integer' || right.type !== 'integer') {
      throw this.fail(ErrorKind.OperandMustBeInteger, index);
    }
    return [left.value, right.value];
  }

  private advance(): ExpressionToken {
    const token = this.current;
    this.current = this.readToken();
    return token;
  }

  private readToken(): ExpressionToken {
    while (/[ \t\u00a0]/.test(this.text.charAt(this.index))) {
      this.index++;
    }

    const index = this.index;
    if (index >= this.text.length) {
      return { kind: 'end', index };
    }

    const char = this.text.charAt(index);
    if (isOperator(char)) {
      this.index++;
      return { kind: 'operator', operator: char, index };
    }

    const literal = readNumberLiteral(this.text, index);
    if (literal === undefined) {
      throw this.fail(ErrorKind.InvalidNumberLiteral, index);
    }
    if (!literal.ok) {
      throw this.fail(literal.kind, index);
    }
    this.index += literal.length;
    return { kind: 'operand', magnitude: literal.magnitude, index };
  }

  private fail(kind: NumberErrorKind, index: number): ExpressionFailure {
    return new ExpressionFailure(kind, index);
  }
}

function isOperator(char: string): char is Operator {
  return char.length === 1 && Object.prototype.hasOwnProperty.call(BINDING_POWER, char);
}

function arithmetic(
  left: NumericMagnitude,
  right: NumericMagnitude,
  integer: (a: bigint, b: bigint) => bigint,
  float: (a: number, b: number) => number
): NumericMagnitude {
  if (left.type === 'integer' && right.type === 'integer') {
    return { type: 'integer', value: integer(left.value, right.value) };
  }
  return { type: 'float', value: float(toFloat(left), toFloat(right)) };
}

function negate(operand: NumericMagnitude): NumericMagnitude {
  return operand.type === 'integer'
    ? { type: 'integer', value: -operand.value }
    : { type: 'float', value: -operand.value };
}

function isZero(operand: NumericMagnitude): boolean {
  return operand.type === 'integer' ? operand.value === 0n : operand.value === 0;
}

function toFloat(operand: NumericMagnitude): number {
  return operand.type === 'integer' ? Number(operand.value) : operand.value;
}
