/**
 * qjson Serializer - writes a value tree as compact strict JSON
 * Features:
 * - Deterministic output: entry order kept, no whitespace
 * - Non-ASCII text emitted as is, control characters escaped
 * - Numbers re-derived from their decoded magnitude
 */

import { Value, ValueType, ObjectEntry } from './types';
import { formatNumber } from './numbers';

const NAMED_ESCAPES: Readonly<Record<string, string>> = {
  '"': '\\"',
  '\\': '\\\\',
  '\b': '\\b',
  '\f': '\\f',
  '\n': '\\n',
  '\r': '\\r',
  '\t': '\\t',
};

export class Serializer {
  /**
   * Serialize a value tree. Never fails.
   */
  public serialize(value: Value): string {
    const out: string[] = [];
    this.write(value, out);
    return out.join('');
  }

  private write(value: Value, out: string[]): void {
    switch (value.type) {
      case ValueType.NULL:
        out.push('null');
        return;
      case ValueType.BOOLEAN:
        out.push(value.value ? 'true' : 'false');
        return;
      case ValueType.NUMBER:
        out.push(formatNumber(value.magnitude));
        return;
      case ValueType.STRING:
        out.push(quoteString(value.value));
        return;
      case ValueType.ARRAY:
        this.writeArray(value.elements, out);
        return;
      case ValueType.OBJECT:
        this.writeObject(value.entries, out);
        return;
    }
  }

  private writeArray(elements: Value[], out: string[]): void {
    out.push('[');
    elements.forEach((element, index) => {
      if (index > 0) out.push(',');
      this.write(element, out);
    });
    out.push(']');
  }

  private writeObject(entries: ObjectEntry[], out: string[]): void {
    out.push('{');
    entries.forEach((entry, index) => {
      if (index > 0) out.push(',');
      out.push(quoteString(entry.key), ':');
      this.write(entry.value, out);
    });
    out.push('}');
  }
}

/**
 * Quote a string as a JSON string literal
 */
export function quoteString(text: string): string {
  let result = '"';
  let plainStart = 0;

  for (let i = 0; i < text.length; i++) {
    const code = text.charCodeAt(i);
    let escaped: string | undefined;

    if (code === 0x22 || code === 0x5c || code < 0x20) {
      escaped = NAMED_ESCAPES[text[i]] ?? unicodeEscape(code);
    } else if (code >= 0xd800 && code <= 0xdbff) {
      const next = text.charCodeAt(i + 1);
      if (next >= 0xdc00 && next <= 0xdfff) {
        i++;
        continue;
      }
      escaped = unicodeEscape(code);
    } else if (code >= 0xdc00 && code <= 0xdfff) {
      escaped = unicodeEscape(code);
    }

    if (escaped !== undefined) {
      result += text.slice(plainStart, i) + escaped;
      plainStart = i + 1;
    }
  }

  return result + text.slice(plainStart) + '"';
}

function unicodeEscape(code: number): string {
  return '\\u' + code.toString(16).padStart(4, '0');
}
