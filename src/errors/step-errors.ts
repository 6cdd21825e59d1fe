export type StepErrorKind = 'precondition' | 'transport' | 'parse' | 'assertion' | 'resource' | 'config';

export abstract class StepError extends Error {
  abstract readonly kind: StepErrorKind;
}

export class NoResponseError extends StepError {
  readonly kind = 'precondition';

  constructor(step?: string) {
    super(
      step
        ? `no response has been captured yet; send a request before "${step}"`
        : 'no response has been captured yet; send a request first'
    );
    this.name = 'NoResponseError';
  }
}

export class TransportError extends StepError {
  readonly kind = 'transport';
  readonly method: string;
  readonly url: string;

  constructor(method: string, url: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${method} ${url} failed: ${reason}`, { cause });
    this.name = 'TransportError';
    this.method = method;
    this.url = url;
  }
}

export class ParseError extends StepError {
  readonly kind = 'parse';

  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'ParseError';
  }
}

export class StepAssertionError extends StepError {
  readonly kind = 'assertion';
  readonly expected: unknown;
  readonly actual: unknown;

  constructor(message: string, expected: unknown, actual: unknown) {
    super(message);
    this.name = 'StepAssertionError';
    this.expected = expected;
    this.actual = actual;
  }
}

export class SchemaValidationError extends StepAssertionError {
  readonly violations: string[];

  constructor(schema: string, violations: string[], body: string) {
    super(
      `the response is not valid according to the specified schema ${schema}\n ${violations.join('\n ')}`,
      schema,
      body
    );
    this.name = 'SchemaValidationError';
    this.violations = violations;
  }
}

export class ResourceError extends StepError {
  readonly kind = 'resource';
  readonly path: string;

  constructor(message: string, path: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'ResourceError';
    this.path = path;
  }
}

export class SchemaNotFoundError extends ResourceError {
  constructor(path: string) {
    super(`JSON schema file does not exist: ${path}`, path);
    this.name = 'SchemaNotFoundError';
  }
}

export type ConfigIssue = {
  field: string;
  message: string;
};

export class ConfigError extends StepError {
  readonly kind = 'config';
  readonly issues: ConfigIssue[];

  constructor(issues: ConfigIssue[]) {
    super(`Invalid api-steps options: ${issues.map((issue) => `${issue.field} ${issue.message}`).join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export const describeError = (error: unknown): string => {
  return error instanceof Error ? error.message : String(error);
};
