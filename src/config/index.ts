/**
 * Connector configuration: validation, defaults and environment overrides
 */

import * as dotenv from 'dotenv';
import type { ZodIssue } from 'zod';
import type { StreamSpec } from '../types';
import { ConfigurationError } from '../utils/errors';
import { Logger, LogLevel } from '../utils/logger';
import { ConnectorConfigSchema } from './schema';

// Load .env file if it exists
dotenv.config();

/** Overrides `api_token` from the config file */
export const API_TOKEN_ENV = 'CURSOR_EXTRACT_API_TOKEN';

/**
 * Validated configuration in the shape the engine uses
 */
export interface AppConfig {
  apiToken: string;
  startDate?: string;
  pageSize: number;
  interPageDelayMs: number;
  requestTimeoutMs: number;
  maxRetries: number;
  streams: StreamSpec[];
  logLevel: LogLevel;
}

function formatIssues(issues: ZodIssue[]): { message: string; fields: string[] } {
  const missing = issues
    .filter((issue) => issue.message === 'Required' || issue.message.endsWith('is required'))
    .map((issue) => issue.path.join('.'));

  const invalid = issues
    .filter((issue) => issue.message !== 'Required' && !issue.message.endsWith('is required'))
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);

  let message = 'Invalid configuration:';
  if (missing.length > 0) {
    message += `\nMissing required fields: ${missing.join(', ')}`;
  }
  if (invalid.length > 0) {
    message += `\nInvalid fields: ${invalid.join('; ')}`;
  }

  const fields = [...new Set(issues.map((issue) => issue.path.join('.')))];
  return { message, fields };
}

function withEnvironment(raw: unknown, env: NodeJS.ProcessEnv): unknown {
  const token = env[API_TOKEN_ENV];
  if (!token || typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return raw;
  }
  return { ...raw, api_token: token };
}

/**
 * Validate raw connector configuration (as read from JSON or YAML) and map it
 * to the engine's settings. Throws `ConfigurationError` before any request is
 * made.
 */
export function parseConnectorConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = ConnectorConfigSchema.safeParse(withEnvironment(raw, env));

  if (!result.success) {
    const { message, fields } = formatIssues(result.error.errors);
    throw new ConfigurationError(message, fields);
  }

  const parsed = result.data;

  return {
    apiToken: parsed.api_token,
    startDate: parsed.start_date,
    pageSize: parsed.page_size,
    interPageDelayMs: Math.round(parsed.inter_page_delay * 1000),
    requestTimeoutMs: Math.round(parsed.request_timeout * 1000),
    maxRetries: parsed.max_retries,
    streams: parsed.endpoints.map((endpoint) => ({
      name: endpoint.name,
      endpointUrl: endpoint.endpoint_url
    })),
    logLevel: Logger.parseLogLevel(env.LOG_LEVEL)
  };
}

/**
 * Validate configuration without throwing
 */
export function validateConfig(
  raw: unknown,
  env: NodeJS.ProcessEnv = process.env
): { valid: boolean; errors?: string[] } {
  try {
    parseConnectorConfig(raw, env);
    return { valid: true };
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return { valid: false, errors: [error.message, ...error.fields] };
    }
    throw error;
  }
}

export function redactSecret(secret: string): string {
  if (secret.length <= 8) {
    return '***';
  }
  return `${secret.substring(0, 4)}...${secret.substring(secret.length - 4)}`;
}

/**
 * Configuration as it may appear in logs
 */
export function describeConfig(config: AppConfig): Record<string, unknown> {
  return {
    ...config,
    apiToken: redactSecret(config.apiToken),
    logLevel: LogLevel[config.logLevel]
  };
}

export * from './schema';
