import { ParseError } from '../errors/step-errors';

export type JsonPrimitive = string | number | boolean | null;
export type JsonArray = JsonData[];
export type JsonObject = { [key: string]: JsonData };
export type JsonData = JsonPrimitive | JsonArray | JsonObject;

export const isJsonObject = (value: unknown): value is JsonObject => {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
};

/**
 * Serializes with object keys sorted so two structurally equal documents
 * always produce the same text.
 */
export const stableStringify = (value: unknown): string => {
  if (value === undefined) {
    return 'null';
  }

  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value);
  }

  if (Array.isArray(value)) {
    return `[${value.map((item) => stableStringify(item)).join(',')}]`;
  }

  const entries = Object.entries(value)
    .filter(([, val]) => val !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

  const body = entries
    .map(([key, val]) => `${JSON.stringify(key)}:${stableStringify(val)}`)
    .join(',');
  return `{${body}}`;
};

export const parseJson = (text: string, label = 'response body'): JsonData => {
  try {
    const parsed: JsonData = JSON.parse(text);
    return parsed;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ParseError(`${label} is not valid JSON: ${reason}`, error);
  }
};

export const isEqualJson = (left: JsonData, right: JsonData): boolean => {
  return stableStringify(left) === stableStringify(right);
};

// Strings are kept verbatim; everything else is written as compact JSON.
export const stringifyJsonValue = (value: unknown): string => {
  if (typeof value === 'string') {
    return value;
  }
  if (value === undefined) {
    return '';
  }
  return JSON.stringify(value);
};
