import type {
  PageCursor,
  PageDecision,
  PersistedStreamState,
  QueryBody,
  ResponseHeaders,
  RetryDecision,
  SchemaDocument,
  SourceRecord,
  StreamSpec,
  SyncState
} from '../types';

/**
 * Raw HTTP response: the body stays text so it can be sanitized before
 * decoding.
 */
export interface TransportResponse {
  status: number;
  headers: ResponseHeaders;
  body: string;
}

/**
 * Sends one query. Resolves with any HTTP status; rejects with
 * `TransientApiError` for retryable transport failures and `FatalApiError`
 * for the rest.
 */
export interface PageTransport {
  post(url: string, body: QueryBody): Promise<TransportResponse>;
}

export interface Paginator {
  readonly pageSize: number;
  initial(): PageCursor;
  buildQuery(state: SyncState, cursor: PageCursor): QueryBody;
  next(cursor: PageCursor, records: readonly SourceRecord[], url: string): PageDecision;
}

export interface RetryPolicy {
  /** `statusCode` is undefined for transport failures */
  decide(statusCode: number | undefined, headers: ResponseHeaders, attempt: number): RetryDecision;
}

export interface SchemaSource {
  discover(records: readonly SourceRecord[]): SchemaDocument;
  fallback(): SchemaDocument;
}

/**
 * Downstream receiver owned by the host
 */
export interface RecordSink {
  emitRecord(stream: string, record: SourceRecord): void | Promise<void>;
  emitSchema?(stream: string, schema: SchemaDocument): void | Promise<void>;
  /** Called after every fully processed page */
  emitState?(stream: string, state: PersistedStreamState): void | Promise<void>;
}

/**
 * One extraction target with one implementation of each capability
 */
export interface ExtractionStream {
  readonly spec: StreamSpec;
  readonly paginator: Paginator;
  readonly retryPolicy: RetryPolicy;
  readonly schemaSource: SchemaSource;
  readonly transport: PageTransport;
}
