import type { RetryPolicy } from '../connectors/types';
import type { ResponseHeaders, RetryDecision } from '../types';

export const RETRYABLE_STATUSES: ReadonlySet<number> = new Set([429, 500, 502, 503, 504]);
export const RATE_LIMIT_FALLBACK_SECONDS = 60;
export const DEFAULT_MAX_RETRIES = 5;

export function isRetryableStatus(statusCode: number): boolean {
  return RETRYABLE_STATUSES.has(statusCode);
}

/**
 * Case-insensitive header lookup
 */
export function getHeader(headers: ResponseHeaders, name: string): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted) {
      return value;
    }
  }
  return undefined;
}

/**
 * Parse `Retry-After` as delta-seconds or an HTTP date. Returns null when the
 * header is missing or unparseable.
 */
export function parseRetryAfterSeconds(value: string | undefined, nowMs: number): number | null {
  if (!value) {
    return null;
  }

  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return null;
  }

  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Number(trimmed);
  }

  const retryDateMs = Date.parse(trimmed);
  if (Number.isNaN(retryDateMs)) {
    return null;
  }

  return Math.max(0, Math.ceil((retryDateMs - nowMs) / 1000));
}

export function backoffSeconds(attempt: number): number {
  return 2 ** attempt;
}

export interface HttpRetryPolicyOptions {
  maxRetries?: number;
  now?: () => number;
}

/**
 * Retry rules for the source API.
 *
 * - 429: wait for `Retry-After`, or 60 seconds without a usable header
 * - 500/502/503/504 and transport failures: wait `2^attempt` seconds
 * - anything else: fatal at once
 *
 * `attempt` counts failed attempts of the same request, starting at 1. Past
 * `maxRetries` every failure is fatal, rate limits included.
 */
export class HttpRetryPolicy implements RetryPolicy {
  readonly maxRetries: number;
  private readonly now: () => number;

  constructor(options: HttpRetryPolicyOptions = {}) {
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.now = options.now ?? Date.now;
  }

  decide(statusCode: number | undefined, headers: ResponseHeaders, attempt: number): RetryDecision {
    if (statusCode !== undefined && !isRetryableStatus(statusCode)) {
      return { shouldRetry: false, reason: 'not-retryable' };
    }

    if (attempt > this.maxRetries) {
      return { shouldRetry: false, reason: 'retries-exhausted' };
    }

    if (statusCode === 429) {
      const retryAfter = parseRetryAfterSeconds(getHeader(headers, 'retry-after'), this.now());
      return {
        shouldRetry: true,
        waitSeconds: retryAfter ?? RATE_LIMIT_FALLBACK_SECONDS,
        reason: 'retryable'
      };
    }

    return { shouldRetry: true, waitSeconds: backoffSeconds(attempt), reason: 'retryable' };
  }
}

/**
 * Policy that never retries, for single-shot connection checks
 */
export class NoRetryPolicy implements RetryPolicy {
  decide(statusCode: number | undefined): RetryDecision {
    if (statusCode !== undefined && !isRetryableStatus(statusCode)) {
      return { shouldRetry: false, reason: 'not-retryable' };
    }
    return { shouldRetry: false, reason: 'retries-exhausted' };
  }
}
