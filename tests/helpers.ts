/**
 * Shared test doubles: a scripted transport, an in-memory sink and config
 * builders. Nothing here touches the network.
 */

import type { AppConfig } from '../src/config';
import type { PageTransport, RecordSink, TransportResponse } from '../src/connectors/types';
import type {
  PersistedStreamState,
  QueryBody,
  ResponseHeaders,
  SchemaDocument,
  SourceRecord
} from '../src/types';
import { LogLevel } from '../src/utils/logger';

export const TEST_TOKEN = 'test-secret';

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    apiToken: TEST_TOKEN,
    pageSize: 200,
    interPageDelayMs: 0,
    requestTimeoutMs: 60000,
    maxRetries: 5,
    streams: [{ name: 'users', endpointUrl: 'https://api.example.com/users' }],
    logLevel: LogLevel.ERROR,
    ...overrides
  };
}

/**
 * Records with string ids `from`..`to`, inclusive
 */
export function recordsWithIds(from: number, to: number): SourceRecord[] {
  const records: SourceRecord[] = [];
  for (let id = from; id <= to; id++) {
    records.push({ _id: String(id) });
  }
  return records;
}

export function pageReply(records: SourceRecord[], status = 200, headers: ResponseHeaders = {}): TransportResponse {
  return {
    status,
    headers,
    body: JSON.stringify({ data: records, meta: { total: records.length, count: records.length } })
  };
}

export function textReply(body: string, status = 200, headers: ResponseHeaders = {}): TransportResponse {
  return { status, headers, body };
}

export type ScriptedReply = TransportResponse | Error;

export interface RecordedRequest {
  url: string;
  body: QueryBody;
}

/**
 * Answers each request with the next scripted reply, or throws it when it is
 * an error
 */
export class ScriptedTransport implements PageTransport {
  readonly requests: RecordedRequest[] = [];
  private readonly replies: ScriptedReply[];

  constructor(replies: ScriptedReply[]) {
    this.replies = [...replies];
  }

  async post(url: string, body: QueryBody): Promise<TransportResponse> {
    this.requests.push({ url, body });
    const reply = this.replies.shift();

    if (reply === undefined) {
      throw new Error(`Unexpected request #${this.requests.length} to ${url}`);
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  }
}

export class MemorySink implements RecordSink {
  readonly records: Array<{ stream: string; record: SourceRecord }> = [];
  readonly schemas: Array<{ stream: string; schema: SchemaDocument }> = [];
  readonly states: Array<{ stream: string; state: PersistedStreamState }> = [];

  emitRecord(stream: string, record: SourceRecord): void {
    this.records.push({ stream, record });
  }

  emitSchema(stream: string, schema: SchemaDocument): void {
    this.schemas.push({ stream, schema });
  }

  emitState(stream: string, state: PersistedStreamState): void {
    this.states.push({ stream, state });
  }

  recordsFor(stream: string): SourceRecord[] {
    return this.records.filter((entry) => entry.stream === stream).map((entry) => entry.record);
  }
}

export const noWait = (): Promise<void> => Promise.resolve();
