import type { ApiContext } from '../context/api-context';
import { StepAssertionError } from '../errors/step-errors';
import { stringifyJsonValue } from '../utils/json';
import { evaluateJsonPath } from './json-path';
import { coerceExpected, formatJsonValue, jsonValuesEqual, toJsonValue } from './json-value';
import { compilePattern } from './response';

export const assertJsonPathValue = (context: ApiContext, expression: string, expectedText: string): void => {
  const response = context.requireResponse('json path value');
  const expectedRaw = context.scope.resolve(expectedText);
  const actual = toJsonValue(evaluateJsonPath(expression, response.body));
  const expected = coerceExpected(expectedRaw, actual);

  if (!jsonValuesEqual(expected, actual)) {
    throw new StepAssertionError(
      `expected json path ${expression} to have value ${formatJsonValue(expected)} but it is ${formatJsonValue(actual)}`,
      expected.value,
      actual.value
    );
  }
};

export const assertJsonPathMatches = (context: ApiContext, expression: string, pattern: string): void => {
  const response = context.requireResponse('json path match');
  const value = stringifyJsonValue(evaluateJsonPath(expression, response.body));
  const regex = compilePattern(pattern);

  if (!regex.test(value)) {
    throw new StepAssertionError(`${value} does not match: ${pattern}`, pattern, value);
  }
};

export const assertJsonPathPresent = (context: ApiContext, expression: string): void => {
  const response = context.requireResponse('json path present');
  const value = evaluateJsonPath(expression, response.body);

  if (value === null) {
    throw new StepAssertionError(`the json path ${expression} was not present in the response`, 'present', null);
  }
};

export const assertJsonPathCount = (context: ApiContext, expression: string, expectedCount: number): void => {
  const response = context.requireResponse('json path count');
  const value = evaluateJsonPath(expression, response.body);

  if (!Array.isArray(value)) {
    throw new StepAssertionError(
      `the json path ${expression} is not an array. Found ${stringifyJsonValue(value)}`,
      expectedCount,
      value
    );
  }

  if (value.length !== expectedCount) {
    throw new StepAssertionError(
      `the value ${stringifyJsonValue(value)} doesn't have count ${expectedCount} but ${value.length}`,
      expectedCount,
      value.length
    );
  }
};
