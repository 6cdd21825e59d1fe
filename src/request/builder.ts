import fs from 'node:fs/promises';
import path from 'node:path';
import type { ApiContext } from '../context/api-context';
import { ParseError, ResourceError, describeError } from '../errors/step-errors';
import { FormField, FormSummary, PreparedRequest, RequestBody, RequestSpec } from './types';

const CONTENT_TYPE = 'Content-Type';

/** Sets a header, replacing any existing entry whose name differs only by case. */
export const setHeaderValue = (headers: Record<string, string>, name: string, value: string): void => {
  const lower = name.toLowerCase();
  for (const key of Object.keys(headers)) {
    if (key.toLowerCase() === lower) {
      delete headers[key];
    }
  }
  headers[name] = value;
};

export const buildUrl = (context: ApiContext, requestPath: string): string => {
  const raw = `${context.baseUrl}${context.scope.resolve(requestPath)}`;

  let url: URL;
  try {
    url = new URL(raw);
  } catch (error) {
    throw new ParseError(`invalid request URL ${raw}: ${describeError(error)}`, error);
  }

  if (context.queryParams.size === 0) {
    return url.toString();
  }

  for (const [name, value] of context.queryParams) {
    url.searchParams.append(name, value);
  }
  url.searchParams.sort();
  return url.toString();
};

const collectHeaders = (context: ApiContext): Record<string, string> => {
  const headers: Record<string, string> = {};
  for (const [name, value] of context.headers) {
    setHeaderValue(headers, name, value);
  }
  return headers;
};

const readUploadFile = async (filePath: string): Promise<Uint8Array> => {
  try {
    return await fs.readFile(filePath);
  } catch (error) {
    throw new ResourceError(`cannot open file ${filePath}: ${describeError(error)}`, filePath, error);
  }
};

type EncodedForm = {
  contentType: string;
  body: Uint8Array;
  summary: FormSummary;
};

/**
 * Encodes the rows in order. Text values and file paths are both
 * scope-resolved; file parts are named after the file's base name.
 */
export const encodeForm = async (context: ApiContext, fields: FormField[]): Promise<EncodedForm> => {
  const form = new FormData();
  const summary: FormSummary = { fields: 0, files: 0, parts: [] };

  for (const field of fields) {
    const value = context.scope.resolve(field.value);

    if (field.kind === 'text') {
      form.append(field.key, value);
      summary.fields += 1;
      summary.parts.push(`${field.key}=${value}`);
      continue;
    }

    const contents = await readUploadFile(value);
    const fileName = path.basename(value);
    form.append(field.key, new Blob([contents]), fileName);
    summary.files += 1;
    summary.parts.push(`${field.key}=@${fileName} (${contents.byteLength} bytes)`);
  }

  const encoded = new Response(form);
  const contentType = encoded.headers.get('content-type') ?? 'multipart/form-data';
  const body = new Uint8Array(await encoded.arrayBuffer());

  return { contentType, body, summary };
};

export const buildRequest = async (context: ApiContext, spec: RequestSpec): Promise<PreparedRequest> => {
  const method = spec.method.toUpperCase();
  const url = buildUrl(context, spec.path);
  const headers = collectHeaders(context);
  const body: RequestBody = spec.body ?? { kind: 'none' };

  switch (body.kind) {
    case 'none':
      return { method, url, headers, bodyKind: 'none' };
    case 'raw':
      return {
        method,
        url,
        headers,
        bodyKind: 'raw',
        body: context.scope.resolve(body.content),
      };
    case 'form': {
      const encoded = await encodeForm(context, body.fields);
      setHeaderValue(headers, CONTENT_TYPE, encoded.contentType);
      return {
        method,
        url,
        headers,
        bodyKind: 'form',
        body: encoded.body,
        formSummary: encoded.summary,
      };
    }
    default: {
      const exhaustive: never = body;
      return exhaustive;
    }
  }
};
