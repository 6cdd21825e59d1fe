import type { ApiContext } from '../context/api-context';
import { ParseError, StepAssertionError, describeError } from '../errors/step-errors';
import { isEqualJson, parseJson } from '../utils/json';

const trimNewlines = (value: string): string => value.replace(/^\n+|\n+$/g, '');

export const compilePattern = (pattern: string): RegExp => {
  try {
    return new RegExp(pattern);
  } catch (error) {
    throw new ParseError(`invalid pattern ${pattern}: ${describeError(error)}`, error);
  }
};

export const assertStatus = (context: ApiContext, expected: number): void => {
  const response = context.requireResponse('response code');
  if (response.status !== expected) {
    throw new StepAssertionError(
      `expected status code to be ${expected}, but actual is ${response.status}.\n Response body: ${response.body}`,
      expected,
      response.status
    );
  }
};

export const assertValidJson = (context: ApiContext): void => {
  const response = context.requireResponse('valid json');
  parseJson(response.body);
};

export const assertBodyMatchesJson = (context: ApiContext, document: string): void => {
  const response = context.requireResponse('match json');
  const actual = trimNewlines(response.body);
  const expected = context.scope.resolve(document);

  const actualJson = parseJson(actual);
  const expectedJson = parseJson(expected, 'expected document');

  if (!isEqualJson(actualJson, expectedJson)) {
    throw new StepAssertionError(`expected json ${expected}, does not match actual: ${actual}`, expected, actual);
  }
};

export const assertBodyContains = (context: ApiContext, text: string): void => {
  const response = context.requireResponse('body contains');
  const body = trimNewlines(response.body);
  const expected = context.scope.resolve(text);

  if (!body.includes(expected)) {
    throw new StepAssertionError(`${body} does not contain ${expected}`, expected, body);
  }
};

export const assertBodyMatches = (context: ApiContext, pattern: string): void => {
  const response = context.requireResponse('body matches');
  const regex = compilePattern(pattern);

  if (!regex.test(response.body)) {
    throw new StepAssertionError(`${response.body} does not match pattern: ${pattern}`, pattern, response.body);
  }
};

export const readHeader = (context: ApiContext, name: string, step: string): string => {
  const response = context.requireResponse(step);
  return response.headers.get(name) ?? '';
};

export const assertHeader = (context: ApiContext, name: string, value: string): void => {
  const actual = readHeader(context, name, 'response header');
  const expected = context.scope.resolve(value);

  if (actual !== expected) {
    throw new StepAssertionError(
      `expected header ${name} to have value ${expected}. actual : ${actual}`,
      expected,
      actual
    );
  }
};
