export { ApiContext, createApiContext } from './context/api-context';
export { DEFAULT_SCHEMAS_PATH, resolveConfig } from './config/config';
export { ScopeStore } from './scope/scope-store';
export { storeLiteral, storeHeader, storeJsonPath, assertScopeValue } from './scope/capture';
export { buildRequest, buildUrl } from './request/builder';
export { sendRequest, executeRequest } from './request/capture';
export {
  assertStatus,
  assertValidJson,
  assertBodyMatchesJson,
  assertBodyContains,
  assertBodyMatches,
  assertHeader,
} from './assertions/response';
export {
  assertJsonPathValue,
  assertJsonPathMatches,
  assertJsonPathPresent,
  assertJsonPathCount,
} from './assertions/json-path-checks';
export { queryJsonPath } from './assertions/json-path';
export { assertMatchesSchema } from './assertions/schema';
export { API_STEP_DEFINITIONS, findStepDefinition, runStep } from './steps/definitions';
export { registerApiSteps } from './steps/register';
export { createEventLogger, createNullEventLogger } from './logging/event-logger';
export {
  StepError,
  NoResponseError,
  TransportError,
  ParseError,
  StepAssertionError,
  SchemaValidationError,
  ResourceError,
  SchemaNotFoundError,
  ConfigError,
} from './errors/step-errors';
export type { ApiStepsOptions, ApiStepsConfig, FetchLike } from './config/config';
export type { CapturedResponse, PreparedRequest, RequestSpec, RequestBody, FormField } from './request/types';
export type { StepDefinition, StepArgument, TableLike } from './steps/types';
export type { CucumberRegistrar, RegisterOptions } from './steps/register';
export type { LogEvent, EventLogger, LogFormat } from './logging/event-logger';
export type { StepErrorKind, ConfigIssue } from './errors/step-errors';
export type { JsonValue } from './assertions/json-value';
