/**
 * qjson Evaluator - converts value trees to JavaScript values
 */

import {
  Value,
  ValueType,
  ObjectValue,
  NumberValue,
  JsonValue,
  JsonObject,
  EvaluatorOptions,
} from './types';

export class Evaluator {
  private options: Required<EvaluatorOptions>;

  constructor(options: EvaluatorOptions = {}) {
    this.options = {
      bigint: options.bigint ?? false,
    };
  }

  /**
   * Evaluate a value tree to a plain JavaScript value
   */
  public evaluate(value: Value): JsonValue {
    switch (value.type) {
      case ValueType.NULL:
        return null;
      case ValueType.BOOLEAN:
      case ValueType.STRING:
        return value.value;
      case ValueType.NUMBER:
        return this.evaluateNumber(value);
      case ValueType.ARRAY:
        return value.elements.map(element => this.evaluate(element));
      case ValueType.OBJECT:
        return this.evaluateObject(value);
    }
  }

  private evaluateNumber(node: NumberValue): number | bigint {
    const { magnitude } = node;
    if (magnitude.type === 'float') {
      return magnitude.value;
    }
    const value = Number(magnitude.value);
    if (this.options.bigint && !Number.isSafeInteger(value)) {
      return magnitude.value;
    }
    return value;
  }

  private evaluateObject(node: ObjectValue): JsonObject {
    // fromEntries defines own properties, so "__proto__" stays a key
    return Object.fromEntries(
      node.entries.map((entry): [string, JsonValue] => [entry.key, this.evaluate(entry.value)])
    );
  }
}
