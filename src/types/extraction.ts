/**
 * Value types flowing through one stream's extraction loop
 */

import type { RecordId } from './records';

// ============================================================================
// STREAM IDENTITY AND STATE
// ============================================================================

/**
 * One extraction target. Built from validated configuration and never
 * mutated afterwards.
 */
export interface StreamSpec {
  readonly name: string;
  readonly endpointUrl: string;
}

/**
 * Per-stream checkpoint. `highWaterMark` is the greatest `updatedAt` seen so
 * far, or null before anything has been seen and no start date is set.
 */
export interface SyncState {
  readonly highWaterMark: string | null;
}

/**
 * State as handed to and from the host between invocations
 */
export interface PersistedStreamState {
  updatedAt?: string;
}

export type PersistedSyncState = Record<string, PersistedStreamState>;

/**
 * Cursor for the next page. `lastId` is null on the first page.
 */
export interface PageCursor {
  readonly lastId: RecordId | null;
  readonly pageSize: number;
}

/**
 * Outcome of the Deciding step
 */
export type PageDecision = { kind: 'continue'; cursor: PageCursor } | { kind: 'done' };

// ============================================================================
// QUERY BODY
// ============================================================================

export interface FindQuery {
  $limit: number;
  $sort: { _id: 1 };
  updatedAt?: { $gte: string };
  _id?: { $gt: RecordId };
}

export interface QueryBody {
  $method: 'find';
  params: { query: FindQuery };
}

// ============================================================================
// RETRY
// ============================================================================

export type RetryReason = 'retryable' | 'not-retryable' | 'retries-exhausted';

export interface RetryDecision {
  shouldRetry: boolean;
  waitSeconds?: number;
  reason: RetryReason;
}

export type ResponseHeaders = Record<string, string | undefined>;

// ============================================================================
// SCHEMA
// ============================================================================

export type SchemaTypeName = 'null' | 'boolean' | 'integer' | 'number' | 'string' | 'array' | 'object';

export interface TypeDescriptor {
  type: SchemaTypeName | ['null', Exclude<SchemaTypeName, 'null'>];
  format?: 'date-time';
  items?: Record<string, never>;
  additionalProperties?: true;
}

export interface SchemaDocument {
  $schema: string;
  type: 'object';
  properties: Record<string, TypeDescriptor>;
  additionalProperties: true;
}
