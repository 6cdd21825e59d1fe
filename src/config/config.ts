import { ConfigError, ConfigIssue } from '../errors/step-errors';
import type { EventLogger } from '../logging/event-logger';

export const DEFAULT_SCHEMAS_PATH = 'schemas';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type ApiStepsOptions = {
  baseUrl: string;
  debug?: boolean;
  schemasPath?: string;
  timeoutMs?: number;
  fetch?: FetchLike;
  eventLogger?: EventLogger;
};

export type ApiStepsConfig = {
  baseUrl: string;
  debug: boolean;
  schemasPath: string;
  timeoutMs?: number;
};

const isHttpUrl = (value: string): boolean => {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
};

export const validateConfig = (config: ApiStepsConfig): ConfigIssue[] => {
  const issues: ConfigIssue[] = [];

  if (typeof config.baseUrl !== 'string' || !isHttpUrl(config.baseUrl)) {
    issues.push({ field: 'baseUrl', message: 'must be an absolute http(s) URL' });
  }

  if (typeof config.schemasPath !== 'string' || config.schemasPath.trim().length === 0) {
    issues.push({ field: 'schemasPath', message: 'must be a non-empty path' });
  }

  if (config.timeoutMs !== undefined) {
    if (!Number.isInteger(config.timeoutMs) || config.timeoutMs <= 0) {
      issues.push({ field: 'timeoutMs', message: 'must be a positive integer' });
    }
  }

  return issues;
};

export const resolveConfig = (options: ApiStepsOptions): ApiStepsConfig => {
  const config: ApiStepsConfig = {
    baseUrl: options.baseUrl,
    debug: options.debug ?? false,
    schemasPath: options.schemasPath ?? DEFAULT_SCHEMAS_PATH,
    timeoutMs: options.timeoutMs,
  };

  const issues = validateConfig(config);
  if (issues.length > 0) {
    throw new ConfigError(issues);
  }

  return config;
};
