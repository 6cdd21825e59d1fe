import type { ApiContext } from '../context/api-context';
import { TransportError, describeError } from '../errors/step-errors';
import { buildRequest } from './builder';
import { CapturedResponse, PreparedRequest, RequestSpec } from './types';

const collectHeaders = (headers: Headers): Record<string, string> => {
  const result: Record<string, string> = {};
  headers.forEach((value, key) => {
    result[key] = value;
  });
  return result;
};

const debugBody = (request: PreparedRequest): string | undefined => {
  if (request.bodyKind === 'form' && request.formSummary) {
    const { fields, files, parts } = request.formSummary;
    return [`(form-data) ${fields} fields, ${files} files`, ...parts].join('\n');
  }
  if (typeof request.body === 'string') {
    return request.body;
  }
  return undefined;
};

const isAbortError = (error: unknown): boolean => {
  return error instanceof Error && error.name === 'AbortError';
};

/**
 * Sends a prepared request through the context's client and stores the
 * response snapshot as the context's last response. The body is read fully.
 */
export const sendRequest = async (context: ApiContext, request: PreparedRequest): Promise<CapturedResponse> => {
  context.recordRequest(request);
  context.eventLogger.emitEvent({
    event: 'request-sent',
    method: request.method,
    url: request.url,
    headers: request.headers,
    bodyKind: request.bodyKind,
    body: debugBody(request),
  });

  const timeoutMs = context.timeoutMs;
  const controller = timeoutMs ? new AbortController() : undefined;
  const timeoutHandle = controller ? setTimeout(() => controller.abort(), timeoutMs) : undefined;

  let captured: CapturedResponse;
  try {
    const response = await context.client(request.url, {
      method: request.method,
      headers: request.headers,
      body: request.body,
      signal: controller?.signal,
    });
    const body = await response.text();
    captured = Object.freeze({
      status: response.status,
      body,
      headers: new Headers(response.headers),
    });
  } catch (error) {
    const cause = isAbortError(error) ? new Error(`request timed out after ${timeoutMs}ms`, { cause: error }) : error;
    context.eventLogger.emitEvent({
      event: 'request-failed',
      method: request.method,
      url: request.url,
      message: describeError(cause),
    });
    throw new TransportError(request.method, request.url, cause);
  } finally {
    if (timeoutHandle) {
      clearTimeout(timeoutHandle);
    }
  }

  context.recordResponse(captured);
  context.eventLogger.emitEvent({
    event: 'response-received',
    method: request.method,
    url: request.url,
    status: captured.status,
    headers: collectHeaders(captured.headers),
    body: captured.body,
  });

  return captured;
};

export const executeRequest = async (context: ApiContext, spec: RequestSpec): Promise<CapturedResponse> => {
  const prepared = await buildRequest(context, spec);
  return sendRequest(context, prepared);
};
