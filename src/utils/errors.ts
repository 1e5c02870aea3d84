/**
 * Custom error classes for the extraction engine
 */

import { randomUUID } from 'node:crypto';
import type { ResponseHeaders } from '../types';

const BODY_EXCERPT_LENGTH = 500;

/**
 * Trim a response body for inclusion in error context
 */
export function excerpt(body: string | undefined, length = BODY_EXCERPT_LENGTH): string | undefined {
  if (body === undefined) {
    return undefined;
  }
  return body.length > length ? `${body.slice(0, length)}…` : body;
}

/**
 * Base error class for all custom errors
 */
export class BaseError extends Error {
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;
  public readonly id: string;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.timestamp = new Date();
    this.context = context;
    this.id = randomUUID();
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      timestamp: this.timestamp,
      context: this.context,
      stack: this.stack
    };
  }
}

/**
 * Error thrown when configuration is invalid
 */
export class ConfigurationError extends BaseError {
  constructor(
    message: string,
    public readonly fields: string[] = []
  ) {
    super(`Configuration error: ${message}`, {
      fields
    });
  }
}

/**
 * Non-2xx response, before the retry policy has ruled on it
 */
export class HttpRequestError extends BaseError {
  public readonly body?: string;

  constructor(
    public readonly url: string,
    public readonly status: number,
    public readonly method: string,
    public readonly headers: ResponseHeaders,
    body?: string
  ) {
    const bodyExcerpt = excerpt(body);
    super(`HTTP ${method} ${url} failed with ${status}`, {
      url,
      status,
      method,
      body: bodyExcerpt
    });
    this.body = bodyExcerpt;
  }
}

/**
 * A failure the retry policy may recover from: a retryable status code or a
 * transport-level failure (timeout, reset, DNS) with no status at all.
 */
export class TransientApiError extends BaseError {
  constructor(
    message: string,
    public readonly url: string,
    public readonly status?: number,
    public readonly code?: string
  ) {
    super(message, { url, status, code });
  }
}

/**
 * Non-retryable response, or a retryable one after the attempt ceiling.
 */
export class FatalApiError extends BaseError {
  public readonly body?: string;

  constructor(
    message: string,
    public readonly url: string,
    public readonly status?: number,
    body?: string,
    public readonly retriesExhausted = false
  ) {
    const bodyExcerpt = excerpt(body);
    super(message, { url, status, body: bodyExcerpt, retriesExhausted });
    this.body = bodyExcerpt;
  }
}

/**
 * Response body that cannot be decoded, or decodes into the wrong shape.
 * Never retried: the same request would return the same payload.
 */
export class MalformedResponseError extends BaseError {
  public readonly body?: string;

  constructor(
    message: string,
    public readonly url: string,
    body?: string,
    public readonly reason?: string
  ) {
    const bodyExcerpt = excerpt(body);
    super(`Malformed response from ${url}: ${message}`, {
      url,
      reason,
      body: bodyExcerpt
    });
    this.body = bodyExcerpt;
  }
}

/**
 * Raised by the orchestrator when one or more streams failed
 */
export class SyncFailedError extends BaseError {
  constructor(public readonly failures: Record<string, Error>) {
    const names = Object.keys(failures);
    super(`Sync failed for ${names.length} stream(s): ${names.join(', ')}`, {
      failures: Object.fromEntries(
        Object.entries(failures).map(([name, error]) => [
          name,
          { name: error.name, message: error.message }
        ])
      )
    });
  }

  getSummary(): { total: number; byType: Record<string, number> } {
    const byType: Record<string, number> = {};
    Object.values(this.failures).forEach((error) => {
      byType[error.name] = (byType[error.name] || 0) + 1;
    });
    return { total: Object.keys(this.failures).length, byType };
  }
}

/**
 * Normalize anything thrown into an Error
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }

  // errors raised in another realm (Jest's module sandbox) fail instanceof
  if (typeof value === 'object' && value !== null && 'message' in value && typeof value.message === 'string') {
    const error = Object.assign(new Error(value.message), value);
    if ('name' in value && typeof value.name === 'string') {
      error.name = value.name;
    }
    return error;
  }

  return new Error(typeof value === 'string' ? value : JSON.stringify(value));
}
