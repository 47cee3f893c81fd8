/**
 * Numeric literal decoding, ISO date-time literals and canonical JSON
 * number formatting
 */

import { NumericMagnitude } from './types';
import { ErrorKind } from './errors';

const DIGITS = '[0-9]+(?:_[0-9]+)*';

const HEX_LITERAL = /^0[xX]_?[0-9a-fA-F]+(?:_[0-9a-fA-F]+)*$/;
const OCTAL_LITERAL = /^0[oO]_?[0-7]+(?:_[0-7]+)*$/;
const BINARY_LITERAL = /^0[bB]_?[01]+(?:_[01]+)*$/;
const INTEGER_LITERAL = new RegExp(`^${DIGITS}$`);
const DECIMAL_LITERAL = new RegExp(
  `^(?:${DIGITS}(?:\\.(?:${DIGITS})?)?|\\.${DIGITS})(?:[eE][+-]?${DIGITS})?$`
);

// Longest literal at a position; radix forms first so 0x1e is not 0
const LITERAL_SPAN = new RegExp(
  '0[xX]_?[0-9a-fA-F]+(?:_[0-9a-fA-F]+)*|0[oO]_?[0-7]+(?:_[0-7]+)*|0[bB]_?[01]+(?:_[01]+)*|' +
    `(?:${DIGITS}(?:\\.(?:${DIGITS})?)?|\\.${DIGITS})(?:[eE][+-]?${DIGITS})?`,
  'y'
);

const DATE_PREFIX = /[0-9]{4}-[0-9]{2}-[0-9]{2}T/y;
const DATE_TIME =
  /([0-9]{4})-([0-9]{2})-([0-9]{2})T(?:([0-9]{2}):([0-9]{2})(?::([0-9]{2})(?:\.([0-9]{6}|[0-9]{3}))?)?(?:Z|([+-])([0-9]{2}):([0-9]{2}))?)?/y;

// Duration units may follow a literal directly: 1h30m
const DURATION_UNITS = 'wdhms';

export type LiteralMatch =
  | { ok: true; magnitude: NumericMagnitude; length: number }
  | { ok: false; kind: ErrorKind.InvalidNumberLiteral | ErrorKind.InvalidDateTime };

/**
 * Decode a numeric literal. Returns undefined when the text is not a
 * valid literal or a decimal overflows.
 *
 * Integer forms (no fraction, no exponent, or a radix prefix) decode to
 * a bigint and keep every digit. Leading zeros are decimal: `007` is 7.
 */
export function decodeNumberLiteral(text: string): NumericMagnitude | undefined {
  const negative = text.startsWith('-');
  const body = negative || text.startsWith('+') ? text.slice(1) : text;
  const digits = body.replace(/_/g, '');

  if (
    HEX_LITERAL.test(body) ||
    OCTAL_LITERAL.test(body) ||
    BINARY_LITERAL.test(body) ||
    INTEGER_LITERAL.test(body)
  ) {
    const value = BigInt(digits);
    return { type: 'integer', value: negative ? -value : value };
  }

  if (!DECIMAL_LITERAL.test(body)) {
    return undefined;
  }

  const value = Number(digits);
  if (!Number.isFinite(value)) {
    return undefined;
  }
  return { type: 'float', value: negative ? -value : value };
}

/**
 * Read the number literal or ISO date-time starting at `index`. Returns
 * undefined when no literal starts there. A literal running straight into
 * letters, digits, `_` or `.` it cannot take is invalid as a whole.
 */
export function readNumberLiteral(text: string, index: number): LiteralMatch | undefined {
  DATE_PREFIX.lastIndex = index;
  if (DATE_PREFIX.test(text)) {
    return readDateTime(text, index);
  }

  LITERAL_SPAN.lastIndex = index;
  const match = LITERAL_SPAN.exec(text);
  if (match === null) return undefined;

  const span = match[0];
  const next = text.charAt(index + span.length);
  if (/[0-9A-Za-z_.]/.test(next) && !DURATION_UNITS.includes(next)) {
    return { ok: false, kind: ErrorKind.InvalidNumberLiteral };
  }

  const magnitude = decodeNumberLiteral(span);
  if (magnitude === undefined) {
    return { ok: false, kind: ErrorKind.InvalidNumberLiteral };
  }
  return { ok: true, magnitude, length: span.length };
}

/**
 * `YYYY-MM-DDT[HH:MM[:SS[.fff|.ffffff]]][Z|±HH:MM]` as seconds since the
 * Unix epoch. A missing zone is UTC.
 */
function readDateTime(text: string, index: number): LiteralMatch {
  DATE_TIME.lastIndex = index;
  const match = DATE_TIME.exec(text);
  const invalid: LiteralMatch = { ok: false, kind: ErrorKind.InvalidDateTime };
  if (match === null) return invalid;

  const end = index + match[0].length;
  if (/[0-9A-Za-z_.:]/.test(text.charAt(end))) return invalid;

  // Unmatched optional groups are undefined and take the defaults
  const [
    ,
    year,
    month,
    day,
    hour = '0',
    minute = '0',
    second = '0',
    fraction = '',
    sign = '+',
    offsetHour = '0',
    offsetMinute = '0',
  ] = match;
  const fields = {
    year: Number(year),
    month: Number(month),
    day: Number(day),
    hour: Number(hour),
    minute: Number(minute),
    second: Number(second),
    offsetHour: Number(offsetHour),
    offsetMinute: Number(offsetMinute),
  };
  const fractionValue = fraction === '' ? 0 : Number(`0.${fraction}`);

  if (
    fields.year < 1970 ||
    fields.month < 1 ||
    fields.month > 12 ||
    fields.day < 1 ||
    fields.day > 31 ||
    fields.hour > 24 ||
    (fields.hour === 24 && (fields.minute > 0 || fields.second > 0 || fractionValue > 0)) ||
    fields.minute > 59 ||
    fields.second > 60 ||
    fields.offsetHour > 15 ||
    fields.offsetMinute > 59
  ) {
    return invalid;
  }

  const utc =
    Date.UTC(fields.year, fields.month - 1, fields.day, fields.hour, fields.minute, fields.second) /
    1000;
  const offset = (fields.offsetHour * 3600 + fields.offsetMinute * 60) * (sign === '-' ? -1 : 1);

  return {
    ok: true,
    magnitude: { type: 'float', value: utc + fractionValue - offset },
    length: match[0].length,
  };
}

/**
 * Canonical JSON text of a magnitude
 */
export function formatNumber(magnitude: NumericMagnitude): string {
  if (magnitude.type === 'integer') {
    return magnitude.value.toString();
  }
  if (!Number.isFinite(magnitude.value)) {
    return 'null';
  }
  // String(-0) is already "0"
  return String(magnitude.value);
}
