import type { ApiContext } from '../context/api-context';
import { StepAssertionError } from '../errors/step-errors';
import { evaluateJsonPath } from '../assertions/json-path';
import { readHeader } from '../assertions/response';
import { stringifyJsonValue } from '../utils/json';

export const storeLiteral = (context: ApiContext, key: string, value: string): void => {
  context.scope.store(key, value);
};

export const storeHeader = (context: ApiContext, name: string, key: string): void => {
  context.scope.store(key, readHeader(context, name, 'store response header'));
};

export const storeJsonPath = (context: ApiContext, expression: string, key: string): void => {
  const response = context.requireResponse('store body path');
  context.scope.store(key, stringifyJsonValue(evaluateJsonPath(expression, response.body)));
};

export const assertScopeValue = (context: ApiContext, key: string, expected: string): void => {
  const actual = context.scope.get(key);
  if (actual !== expected) {
    throw new StepAssertionError(
      `expected scope variable ${key} to have value ${expected}. actual : ${actual}`,
      expected,
      actual
    );
  }
};
