/**
 * Drives one stream end to end:
 * request → sanitize → decode → (discover schema) → emit → decide.
 *
 * Pages run strictly one after another since each query depends on the
 * previous page's last `_id`. An extractor holds no state between runs and
 * shares nothing with other extractors, so streams can run in parallel.
 */

import { z } from 'zod';
import type { ExtractionStream, RecordSink, TransportResponse } from '../connectors/types';
import {
  isJsonObject,
  type PageCursor,
  type QueryBody,
  type RetryDecision,
  type SchemaDocument,
  type SourceRecord,
  type SyncState
} from '../types';
import {
  FatalApiError,
  HttpRequestError,
  MalformedResponseError,
  TransientApiError,
  toError
} from '../utils/errors';
import { createSilentLogger, type Logger } from '../utils/logger';
import { StreamMetrics, type StreamMetricsSummary } from '../utils/metrics';
import { retry, sleep as defaultSleep, type RetryVerdict } from '../utils/retry';
import { sanitizeWithReport } from './sanitizer';
import { advanceSyncState, toPersistedState } from './sync-state';

const PageEnvelopeSchema = z
  .object({
    data: z.array(z.unknown()).nullish(),
    meta: z
      .object({
        total: z.number().optional(),
        count: z.number().optional()
      })
      .passthrough()
      .nullish()
  })
  .passthrough();

export interface StreamExtractorOptions {
  stream: ExtractionStream;
  /** Fixed wait before every page after the first */
  interPageDelayMs?: number;
  /** Stop after this many pages even if more are available */
  maxPages?: number;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export interface ExtractionRun {
  /** State the invocation starts from; its mark bounds every page's query */
  state: SyncState;
  sink: RecordSink;
  /** Checked between pages only */
  signal?: AbortSignal;
}

interface OutcomeBase {
  stream: string;
  /** State as of the last fully processed page */
  state: SyncState;
  schema: SchemaDocument;
  metrics: StreamMetricsSummary;
}

export type StreamOutcome =
  | (OutcomeBase & { status: 'done' })
  | (OutcomeBase & { status: 'cancelled' })
  | (OutcomeBase & { status: 'failed'; error: Error });

/**
 * Decode sanitized text into the page's records. Anything but a JSON object
 * with an array (or absent) `data` of objects is malformed.
 */
export function decodePage(text: string, url: string): SourceRecord[] {
  let payload: unknown;

  try {
    payload = JSON.parse(text);
  } catch (error) {
    throw new MalformedResponseError(`invalid JSON (${toError(error).message})`, url, text, 'invalid-json');
  }

  const envelope = PageEnvelopeSchema.safeParse(payload);
  if (!envelope.success) {
    const issues = envelope.error.errors.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new MalformedResponseError(issues.join('; '), url, text, 'unexpected-shape');
  }

  const items = envelope.data.data ?? [];
  const records: SourceRecord[] = [];

  items.forEach((item, index) => {
    if (!isJsonObject(item)) {
      throw new MalformedResponseError(`data[${index}] is not an object`, url, text, 'unexpected-shape');
    }
    records.push(item);
  });

  return records;
}

export class StreamExtractor {
  private readonly stream: ExtractionStream;
  private readonly interPageDelayMs: number;
  private readonly maxPages?: number;
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;

  constructor(options: StreamExtractorOptions) {
    this.stream = options.stream;
    this.interPageDelayMs = Math.max(0, options.interPageDelayMs ?? 0);
    this.maxPages = options.maxPages;
    this.logger = (options.logger ?? createSilentLogger()).child({ stream: options.stream.spec.name });
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  get name(): string {
    return this.stream.spec.name;
  }

  async run(run: ExtractionRun): Promise<StreamOutcome> {
    const { paginator, schemaSource, spec } = this.stream;
    const metrics = new StreamMetrics(spec.name, this.now);

    let committed = run.state;
    let schema: SchemaDocument | undefined;
    let cursor: PageCursor = paginator.initial();
    let pageNumber = 0;

    const outcome = (status: 'done' | 'cancelled'): StreamOutcome => {
      metrics.log(this.logger);
      return {
        status,
        stream: spec.name,
        state: committed,
        schema: schema ?? schemaSource.fallback(),
        metrics: metrics.getSummary()
      };
    };

    this.logger.info('Stream extraction started', {
      url: spec.endpointUrl,
      highWaterMark: run.state.highWaterMark,
      pageSize: paginator.pageSize
    });

    try {
      while (true) {
        if (run.signal?.aborted) {
          this.logger.info('Stream extraction cancelled', { pages: pageNumber });
          return outcome('cancelled');
        }

        pageNumber++;
        const query = paginator.buildQuery(run.state, cursor);
        const raw = await this.request(query, pageNumber, metrics);

        const { text, removed } = sanitizeWithReport(raw);
        if (removed > 0) {
          this.logger.warn('Removed null sequences from response', { page: pageNumber, removed });
        }

        const records = decodePage(text, spec.endpointUrl);

        if (schema === undefined) {
          schema = schemaSource.discover(records);
          await run.sink.emitSchema?.(spec.name, schema);
        }

        let working = committed;
        for (const record of records) {
          await run.sink.emitRecord(spec.name, record);
          working = advanceSyncState(working, record);
        }
        committed = working;

        metrics.trackPage(records.length, removed);
        await run.sink.emitState?.(spec.name, toPersistedState(committed));

        this.logger.debug('Page processed', {
          page: pageNumber,
          records: records.length,
          lastId: cursor.lastId,
          highWaterMark: committed.highWaterMark
        });

        // the next cursor is never derived past the page limit
        if (this.maxPages !== undefined && pageNumber >= this.maxPages) {
          this.logger.info('Stream extraction stopped at page limit', { pages: pageNumber });
          return outcome('done');
        }

        const decision = paginator.next(cursor, records, spec.endpointUrl);
        if (decision.kind === 'done') {
          this.logger.info('Stream extraction finished', { pages: pageNumber });
          return outcome('done');
        }

        cursor = decision.cursor;
        await this.sleep(this.interPageDelayMs);
      }
    } catch (caught) {
      const error = toError(caught);
      this.logger.error('Stream extraction failed', error, {
        page: pageNumber,
        highWaterMark: committed.highWaterMark
      });
      metrics.log(this.logger);

      return {
        status: 'failed',
        stream: spec.name,
        state: committed,
        schema: schema ?? schemaSource.fallback(),
        metrics: metrics.getSummary(),
        error
      };
    }
  }

  /**
   * Send one page's query until it succeeds. Retries resend the same body.
   */
  private async request(query: QueryBody, pageNumber: number, metrics: StreamMetrics): Promise<string> {
    const { transport, spec } = this.stream;
    const url = spec.endpointUrl;

    return retry(
      async () => {
        let response: TransportResponse;
        try {
          response = await transport.post(url, query);
        } catch (error) {
          metrics.trackRequest();
          throw error;
        }

        metrics.trackRequest(response.status);

        if (response.status >= 200 && response.status < 300) {
          return response.body;
        }

        throw new HttpRequestError(url, response.status, 'POST', response.headers, response.body);
      },
      {
        decide: (error, attempt) => this.decideRetry(error, attempt),
        onRetry: (attempt, error, delayMs) => {
          metrics.trackRetry(delayMs / 1000);
          this.logger.warn('Retrying request', {
            page: pageNumber,
            attempt,
            status: error instanceof HttpRequestError ? error.status : undefined,
            code: error instanceof TransientApiError ? error.code : undefined,
            waitSeconds: delayMs / 1000
          });
        },
        sleep: this.sleep
      }
    );
  }

  private decideRetry(error: unknown, attempt: number): RetryVerdict {
    const { retryPolicy, spec } = this.stream;

    if (error instanceof HttpRequestError) {
      const decision = retryPolicy.decide(error.status, error.headers, attempt);
      return toVerdict(
        decision,
        () =>
          new FatalApiError(
            decision.reason === 'retries-exhausted'
              ? `${error.message} after ${attempt} attempt(s)`
              : error.message,
            spec.endpointUrl,
            error.status,
            error.body,
            decision.reason === 'retries-exhausted'
          )
      );
    }

    if (error instanceof TransientApiError) {
      const decision = retryPolicy.decide(undefined, {}, attempt);
      return toVerdict(
        decision,
        () =>
          new FatalApiError(
            `${error.message} after ${attempt} attempt(s)`,
            spec.endpointUrl,
            undefined,
            undefined,
            decision.reason === 'retries-exhausted'
          )
      );
    }

    return { retry: false, error };
  }
}

function toVerdict(decision: RetryDecision, fatal: () => FatalApiError): RetryVerdict {
  if (decision.shouldRetry) {
    return { retry: true, delayMs: (decision.waitSeconds ?? 0) * 1000 };
  }
  return { retry: false, error: fatal() };
}
