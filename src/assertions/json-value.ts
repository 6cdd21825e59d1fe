import { ParseError } from '../errors/step-errors';
import { JsonArray, JsonData, JsonObject, isEqualJson, parseJson, stableStringify } from '../utils/json';

export type JsonValue =
  | { kind: 'boolean'; value: boolean }
  | { kind: 'integer'; value: number }
  | { kind: 'float'; value: number }
  | { kind: 'string'; value: string }
  | { kind: 'array'; value: JsonArray }
  | { kind: 'object'; value: JsonObject }
  | { kind: 'null'; value: null };

export type JsonKind = JsonValue['kind'];

export const toJsonValue = (data: JsonData): JsonValue => {
  if (data === null) return { kind: 'null', value: null };
  if (typeof data === 'boolean') return { kind: 'boolean', value: data };
  if (typeof data === 'string') return { kind: 'string', value: data };
  if (typeof data === 'number') {
    return Number.isInteger(data) ? { kind: 'integer', value: data } : { kind: 'float', value: data };
  }
  if (Array.isArray(data)) return { kind: 'array', value: data };
  return { kind: 'object', value: data };
};

const TRUE_LITERALS = new Set(['1', 't', 'T', 'TRUE', 'true', 'True']);
const FALSE_LITERALS = new Set(['0', 'f', 'F', 'FALSE', 'false', 'False']);
const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

const invalidExpected = (expected: string, kind: JsonKind): ParseError => {
  return new ParseError(`cannot parse expected value "${expected}" as ${kind}`);
};

const parseBoolean = (expected: string): JsonValue => {
  if (TRUE_LITERALS.has(expected)) return { kind: 'boolean', value: true };
  if (FALSE_LITERALS.has(expected)) return { kind: 'boolean', value: false };
  throw invalidExpected(expected, 'boolean');
};

const parseInteger = (expected: string): JsonValue => {
  if (!INTEGER_PATTERN.test(expected)) throw invalidExpected(expected, 'integer');
  return { kind: 'integer', value: Number(expected) };
};

const parseFloatValue = (expected: string): JsonValue => {
  if (!FLOAT_PATTERN.test(expected)) throw invalidExpected(expected, 'float');
  return { kind: 'float', value: Number(expected) };
};

const parseDocument = (kind: 'array' | 'object') => (expected: string): JsonValue => {
  let parsed: JsonData;
  try {
    parsed = parseJson(expected, 'expected value');
  } catch {
    throw invalidExpected(expected, kind);
  }
  const value = toJsonValue(parsed);
  if (value.kind !== kind) throw invalidExpected(expected, kind);
  return value;
};

const parseNull = (expected: string): JsonValue => {
  if (expected !== 'null') throw invalidExpected(expected, 'null');
  return { kind: 'null', value: null };
};

/** The actual value's kind decides how the expected text is read. */
const EXPECTED_PARSERS: Record<JsonKind, (expected: string) => JsonValue> = {
  boolean: parseBoolean,
  integer: parseInteger,
  float: parseFloatValue,
  string: (expected) => ({ kind: 'string', value: expected }),
  array: parseDocument('array'),
  object: parseDocument('object'),
  null: parseNull,
};

export const coerceExpected = (expected: string, actual: JsonValue): JsonValue => {
  return EXPECTED_PARSERS[actual.kind](expected);
};

export const formatJsonValue = (value: JsonValue): string => {
  if (value.kind === 'string') return value.value;
  return stableStringify(value.value);
};

export const jsonValuesEqual = (left: JsonValue, right: JsonValue): boolean => {
  return isEqualJson(left.value, right.value);
};
