import fs from 'node:fs/promises';
import Ajv, { ErrorObject, Options, Schema, SchemaObject } from 'ajv';
import Ajv2019 from 'ajv/dist/2019';
import Ajv2020 from 'ajv/dist/2020';
import type AjvCore from 'ajv/dist/core';
import draft06MetaSchema from 'ajv/dist/refs/json-schema-draft-06.json';
import AjvDraft04 from 'ajv-draft-04';
import type { ApiContext } from '../context/api-context';
import {
  ParseError,
  ResourceError,
  SchemaNotFoundError,
  SchemaValidationError,
  describeError,
} from '../errors/step-errors';
import { parseJson } from '../utils/json';

export const resolveSchemaPath = (schemasPath: string, relativePath: string): string => {
  const trimmed = relativePath.replace(/^\/+|\/+$/g, '');
  return `${schemasPath}/${trimmed}`;
};

export const formatSchemaErrors = (errors: ErrorObject[] | null | undefined): string[] => {
  if (!errors || errors.length === 0) {
    return ['(root): does not match the schema'];
  }

  return errors.map((error) => {
    const location = error.instancePath || '(root)';
    const detail = error.keyword === 'additionalProperties' && 'additionalProperty' in error.params
      ? ` "${String(error.params.additionalProperty)}"`
      : '';
    return `${location}: ${error.message ?? 'is invalid'}${detail}`;
  });
};

const readSchema = async (schemaPath: string): Promise<string> => {
  try {
    return await fs.readFile(schemaPath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new SchemaNotFoundError(schemaPath);
    }
    throw new ResourceError(`cannot open json schema file: ${describeError(error)}`, schemaPath, error);
  }
};

const isSchemaObject = (value: unknown): value is SchemaObject => {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
};

const toSchema = (schemaPath: string, schemaText: string): Schema => {
  const parsed: unknown = parseJson(schemaText, `json schema ${schemaPath}`);
  if (typeof parsed === 'boolean' || isSchemaObject(parsed)) {
    return parsed;
  }
  throw new ParseError(`json schema ${schemaPath} must be an object or a boolean`);
};

const AJV_OPTIONS: Options = { allErrors: true, strict: false };

/** Picks the validator for the draft named by `$schema`; draft-07 (with draft-06) otherwise. */
export const createValidator = (schema: Schema): AjvCore => {
  const dialect = typeof schema === 'object' && typeof schema.$schema === 'string' ? schema.$schema : '';

  if (dialect.includes('draft-04')) {
    return new AjvDraft04(AJV_OPTIONS);
  }
  if (dialect.includes('draft/2019-09')) {
    return new Ajv2019(AJV_OPTIONS);
  }
  if (dialect.includes('draft/2020-12')) {
    return new Ajv2020(AJV_OPTIONS);
  }

  const ajv = new Ajv(AJV_OPTIONS);
  ajv.addMetaSchema(draft06MetaSchema);
  return ajv;
};

const compileSchema = (schemaPath: string, schemaText: string) => {
  const schema = toSchema(schemaPath, schemaText);
  const ajv = createValidator(schema);
  try {
    return ajv.compile(schema);
  } catch (error) {
    throw new ParseError(`json schema ${schemaPath} cannot be compiled: ${describeError(error)}`, error);
  }
};

/**
 * Validates the last response body against `{schemasPath}/{relativePath}`.
 * The schema file is read on every call.
 */
export const assertMatchesSchema = async (context: ApiContext, relativePath: string): Promise<void> => {
  const response = context.requireResponse('json schema');
  const trimmed = relativePath.replace(/^\/+|\/+$/g, '');
  const schemaPath = resolveSchemaPath(context.schemasPath, trimmed);

  const schemaText = await readSchema(schemaPath);
  const validate = compileSchema(schemaPath, schemaText);
  const document = parseJson(response.body);

  if (!validate(document)) {
    throw new SchemaValidationError(trimmed, formatSchemaErrors(validate.errors), response.body);
  }
};
