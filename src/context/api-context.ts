import { ApiStepsConfig, ApiStepsOptions, FetchLike, resolveConfig, validateConfig } from '../config/config';
import { ConfigError, NoResponseError } from '../errors/step-errors';
import { createEventLogger, createNullEventLogger, EventLogger } from '../logging/event-logger';
import { ScopeStore } from '../scope/scope-store';
import type { CapturedResponse, PreparedRequest } from '../request/types';

/**
 * Aggregate root shared by every step of a scenario: configuration, the HTTP
 * client, the header and query accumulators, the scope and the last exchange.
 */
export class ApiContext {
  public readonly scope = new ScopeStore();
  public readonly headers = new Map<string, string>();
  public readonly queryParams = new Map<string, string>();
  public readonly client: FetchLike;

  private config: ApiStepsConfig;
  private readonly customEventLogger?: EventLogger;
  private debugLogger: EventLogger;
  private lastRequestValue?: PreparedRequest;
  private lastResponseValue?: CapturedResponse;

  constructor(options: ApiStepsOptions) {
    this.config = resolveConfig(options);
    this.client = options.fetch ?? ((input, init) => fetch(input, init));
    this.customEventLogger = options.eventLogger;
    this.debugLogger = this.pickEventLogger();
  }

  public get baseUrl(): string {
    return this.config.baseUrl;
  }

  public get debug(): boolean {
    return this.config.debug;
  }

  public get schemasPath(): string {
    return this.config.schemasPath;
  }

  public get timeoutMs(): number | undefined {
    return this.config.timeoutMs;
  }

  public get eventLogger(): EventLogger {
    return this.debugLogger;
  }

  public get lastRequest(): PreparedRequest | undefined {
    return this.lastRequestValue;
  }

  public get lastResponse(): CapturedResponse | undefined {
    return this.lastResponseValue;
  }

  public withBaseUrl(baseUrl: string): this {
    return this.reconfigure({ ...this.config, baseUrl });
  }

  public withDebug(debug: boolean): this {
    return this.reconfigure({ ...this.config, debug });
  }

  public withSchemasPath(schemasPath: string): this {
    return this.reconfigure({ ...this.config, schemasPath });
  }

  public setHeader(name: string, value: string): void {
    this.headers.set(name, value);
  }

  public setQueryParam(name: string, value: string): void {
    this.queryParams.set(name, value);
  }

  public recordRequest(request: PreparedRequest): void {
    this.lastRequestValue = request;
  }

  public recordResponse(response: CapturedResponse): void {
    this.lastResponseValue = response;
  }

  public requireResponse(step?: string): CapturedResponse {
    if (!this.lastResponseValue) {
      throw new NoResponseError(step);
    }
    return this.lastResponseValue;
  }

  /**
   * Clears everything a scenario may have accumulated, scope included, so
   * that no header, parameter, response or variable leaks into the next one.
   */
  public reset(scenario?: string): void {
    this.headers.clear();
    this.queryParams.clear();
    this.scope.clear();
    this.lastRequestValue = undefined;
    this.lastResponseValue = undefined;
    this.debugLogger.emitEvent({ event: 'scenario-reset', scenario });
  }

  private reconfigure(next: ApiStepsConfig): this {
    const issues = validateConfig(next);
    if (issues.length > 0) {
      throw new ConfigError(issues);
    }
    this.config = next;
    this.debugLogger = this.pickEventLogger();
    return this;
  }

  private pickEventLogger(): EventLogger {
    if (!this.config.debug) {
      return createNullEventLogger();
    }
    return this.customEventLogger ?? createEventLogger({ format: 'pretty' });
  }
}

export const createApiContext = (options: ApiStepsOptions): ApiContext => new ApiContext(options);
