import { JSONPath } from 'jsonpath-plus';
import { ParseError, describeError } from '../errors/step-errors';
import { JsonData, parseJson } from '../utils/json';

export type JsonPathResult =
  | { resolved: true; value: JsonData }
  | { resolved: false };

const SLICE_SEGMENT = /^-?\d*:-?\d*(:-?\d*)?$/;

const isIndefiniteSegment = (segment: string): boolean => {
  return (
    segment === '*' ||
    segment === '..' ||
    segment.startsWith('?(') ||
    segment.includes(',') ||
    SLICE_SEGMENT.test(segment)
  );
};

const toSegments = (expression: string): string[] => {
  let segments: string[];
  try {
    segments = JSONPath.toPathArray(expression);
  } catch (error) {
    throw new ParseError(`invalid json path ${expression}: ${describeError(error)}`, error);
  }
  return segments[0] === '$' ? segments.slice(1) : segments;
};

const evaluate = (expression: string, document: JsonData): JsonData[] => {
  let matches: JsonData[] | undefined;
  try {
    matches = JSONPath<JsonData[] | undefined>({
      path: expression,
      json: document,
      wrap: true,
    });
  } catch (error) {
    throw new ParseError(`invalid json path ${expression}: ${describeError(error)}`, error);
  }
  return matches ?? [];
};

/**
 * Evaluates a JSON path. A definite path yields the selected value itself,
 * an indefinite one (wildcards, filters, unions, slices, `..`) the array of
 * matches, empty when nothing matches. A definite path that selects nothing
 * is unresolved, which is not the same as a path that selects `null`.
 */
export const queryJsonPath = (expression: string, document: JsonData): JsonPathResult => {
  const segments = toSegments(expression);
  const indefinite = segments.some(isIndefiniteSegment);

  // The evaluator returns nothing for a falsy document, so `0`, `false`,
  // `null` and `""` are queried here. A scalar root has no children.
  if (!document) {
    if (segments.length === 0) return { resolved: true, value: document };
    return indefinite ? { resolved: true, value: [] } : { resolved: false };
  }

  const matches = evaluate(expression, document);
  if (indefinite) {
    return { resolved: true, value: matches };
  }
  if (matches.length === 0) {
    return { resolved: false };
  }
  return { resolved: true, value: matches[0] };
};

/** Parses the body and evaluates the path, failing when nothing is selected. */
export const evaluateJsonPath = (expression: string, body: string): JsonData => {
  const document = parseJson(body);
  const result = queryJsonPath(expression, document);
  if (!result.resolved) {
    throw new ParseError(`json path ${expression} did not resolve to any value in the response`);
  }
  return result.value;
};
