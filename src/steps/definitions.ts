import type { ApiContext } from '../context/api-context';
import { ParseError } from '../errors/step-errors';
import { assertJsonPathCount, assertJsonPathMatches, assertJsonPathPresent, assertJsonPathValue } from '../assertions/json-path-checks';
import {
  assertBodyContains,
  assertBodyMatches,
  assertBodyMatchesJson,
  assertHeader,
  assertStatus,
  assertValidJson,
} from '../assertions/response';
import { assertMatchesSchema } from '../assertions/schema';
import { executeRequest } from '../request/capture';
import { FormField } from '../request/types';
import { assertScopeValue, storeHeader, storeJsonPath, storeLiteral } from '../scope/capture';
import { sleep } from '../utils/sleep';
import { StepArgument, StepDefinition, StepMatch, TableLike } from './types';

const isTable = (value: StepArgument | undefined): value is TableLike => {
  return typeof value === 'object' && value !== null && typeof value.raw === 'function';
};

const text = (args: StepArgument[], index: number): string => {
  const value = args[index];
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  throw new ParseError(`step argument ${index + 1} must be text`);
};

const integer = (args: StepArgument[], index: number): number => {
  const value = args[index];
  if (typeof value === 'number' && Number.isInteger(value)) return value;
  if (typeof value === 'string' && /^\s*[+-]?\d+\s*$/.test(value)) return Number(value);
  throw new ParseError(`step argument ${index + 1} must be an integer, got ${String(value)}`);
};

const tableRows = (args: StepArgument[], index: number, columns: number): string[][] => {
  const value = args[index];
  if (!isTable(value)) {
    throw new ParseError(`step argument ${index + 1} must be a data table`);
  }

  const rows = value.raw();
  rows.forEach((row, rowIndex) => {
    if (row.length < columns) {
      throw new ParseError(`data table row ${rowIndex + 1} must have ${columns} cells, found ${row.length}`);
    }
  });
  return rows;
};

// Requests are bounded by the context's own `timeoutMs`, waits by their argument.
const NO_STEP_TIMEOUT = -1;

const toFormFields = (rows: string[][]): FormField[] => {
  return rows.map(([key, value, kind], rowIndex) => {
    if (kind !== 'text' && kind !== 'file') {
      throw new ParseError(`form body row ${rowIndex + 1} has unknown field type "${kind}" (expected text or file)`);
    }
    return { key, value, kind };
  });
};

export const API_STEP_DEFINITIONS: StepDefinition[] = [
  {
    keyword: 'Given',
    pattern: /^I set header "([^"]*)" with value "([^"]*)"$/,
    arity: 2,
    // Values set one at a time are stored as written, without scope substitution.
    run: (context, args) => context.setHeader(text(args, 0), text(args, 1)),
  },
  {
    keyword: 'Given',
    pattern: /^I set headers to:$/,
    arity: 1,
    run: (context, args) => {
      for (const [name, value] of tableRows(args, 0, 2)) {
        context.setHeader(name, context.scope.resolve(value));
      }
    },
  },
  {
    keyword: 'Given',
    pattern: /^I set query param "([^"]*)" with value "([^"]*)"$/,
    arity: 2,
    run: (context, args) => context.setQueryParam(text(args, 0), context.scope.resolve(text(args, 1))),
  },
  {
    keyword: 'Given',
    pattern: /^I set query params to:$/,
    arity: 1,
    run: (context, args) => {
      for (const [name, value] of tableRows(args, 0, 2)) {
        context.setQueryParam(name, context.scope.resolve(value));
      }
    },
  },
  {
    keyword: 'When',
    pattern: /^I send "([^"]*)" request to "([^"]*)" with form body::?$/,
    arity: 3,
    timeout: NO_STEP_TIMEOUT,
    run: async (context, args) => {
      await executeRequest(context, {
        method: text(args, 0),
        path: text(args, 1),
        body: { kind: 'form', fields: toFormFields(tableRows(args, 2, 3)) },
      });
    },
  },
  {
    keyword: 'When',
    pattern: /^I send "([^"]*)" request to "([^"]*)" with body:$/,
    arity: 3,
    timeout: NO_STEP_TIMEOUT,
    run: async (context, args) => {
      await executeRequest(context, {
        method: text(args, 0),
        path: text(args, 1),
        body: { kind: 'raw', content: text(args, 2) },
      });
    },
  },
  {
    keyword: 'When',
    pattern: /^I send "([^"]*)" request to "([^"]*)"$/,
    arity: 2,
    timeout: NO_STEP_TIMEOUT,
    run: async (context, args) => {
      await executeRequest(context, { method: text(args, 0), path: text(args, 1) });
    },
  },
  {
    keyword: 'Then',
    pattern: /^The response code should be (\d+)$/,
    arity: 1,
    run: (context, args) => assertStatus(context, integer(args, 0)),
  },
  {
    keyword: 'Then',
    pattern: /^The response should be a valid json$/,
    arity: 0,
    run: (context) => assertValidJson(context),
  },
  {
    keyword: 'Then',
    pattern: /^The response should match json:$/,
    arity: 1,
    run: (context, args) => assertBodyMatchesJson(context, text(args, 0)),
  },
  {
    keyword: 'Then',
    pattern: /^The response header "([^"]*)" should have value "?([^"]*)"?$/,
    arity: 2,
    run: (context, args) => assertHeader(context, text(args, 0), text(args, 1)),
  },
  {
    keyword: 'Then',
    pattern: /^The response should match json schema "([^"]*)"$/,
    arity: 1,
    run: (context, args) => assertMatchesSchema(context, text(args, 0)),
  },
  {
    keyword: 'Then',
    pattern: /^The json path "([^"]*)" should have value "([^"]*)"$/,
    arity: 2,
    run: (context, args) => assertJsonPathValue(context, text(args, 0), text(args, 1)),
  },
  {
    keyword: 'Then',
    pattern: /^The json path "([^"]*)" should match "([^"]*)"$/,
    arity: 2,
    run: (context, args) => assertJsonPathMatches(context, text(args, 0), text(args, 1)),
  },
  {
    keyword: 'Then',
    pattern: /^The json path "([^"]*)" should have count "([^"]*)"$/,
    arity: 2,
    run: (context, args) => assertJsonPathCount(context, text(args, 0), integer(args, 1)),
  },
  {
    keyword: 'Then',
    pattern: /^The json path "([^"]*)" should be present$/,
    arity: 1,
    run: (context, args) => assertJsonPathPresent(context, text(args, 0)),
  },
  {
    keyword: 'Then',
    pattern: /^The response body should contain "([^"]*)"$/,
    arity: 1,
    run: (context, args) => assertBodyContains(context, text(args, 0)),
  },
  {
    keyword: 'Then',
    pattern: /^The response body should match "([^"]*)"$/,
    arity: 1,
    run: (context, args) => assertBodyMatches(context, text(args, 0)),
  },
  {
    keyword: 'When',
    pattern: /^I wait for (\d+) seconds$/,
    arity: 1,
    timeout: NO_STEP_TIMEOUT,
    run: (_context, args) => sleep(integer(args, 0) * 1000),
  },
  {
    keyword: 'Given',
    pattern: /^I store data in scope variable "([^"]*)" with value "([^"]*)"$/,
    arity: 2,
    run: (context, args) => storeLiteral(context, text(args, 0), text(args, 1)),
  },
  {
    keyword: 'Then',
    pattern: /^I store the value of response header "([^"]*)" as "([^"]*)" in scenario scope$/,
    arity: 2,
    run: (context, args) => storeHeader(context, text(args, 0), text(args, 1)),
  },
  {
    keyword: 'Then',
    pattern: /^I store the value of body path "([^"]*)" as "([^"]*)" in scenario scope$/,
    arity: 2,
    run: (context, args) => storeJsonPath(context, text(args, 0), text(args, 1)),
  },
  {
    keyword: 'Then',
    pattern: /^The scope variable "([^"]*)" should have value "([^"]*)"$/,
    arity: 2,
    run: (context, args) => assertScopeValue(context, text(args, 0), text(args, 1)),
  },
];

export const findStepDefinition = (
  stepText: string,
  definitions: StepDefinition[] = API_STEP_DEFINITIONS
): StepMatch | undefined => {
  for (const definition of definitions) {
    const match = definition.pattern.exec(stepText);
    if (match) {
      return { definition, captures: match.slice(1) };
    }
  }
  return undefined;
};

/**
 * Runs one step phrase against the context without a BDD runner. The data
 * table or doc string, when the phrase takes one, is passed as `argument`.
 */
export const runStep = async (context: ApiContext, stepText: string, argument?: StepArgument): Promise<void> => {
  const found = findStepDefinition(stepText);
  if (!found) {
    throw new ParseError(`no step definition matches "${stepText}"`);
  }

  const args: StepArgument[] = argument === undefined ? found.captures : [...found.captures, argument];
  if (args.length !== found.definition.arity) {
    throw new ParseError(
      `step "${stepText}" takes ${found.definition.arity} arguments, received ${args.length}`
    );
  }

  await found.definition.run(context, args);
};
