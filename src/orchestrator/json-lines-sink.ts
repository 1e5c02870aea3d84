import type { RecordSink } from '../connectors/types';
import type { PersistedStreamState, SchemaDocument, SourceRecord } from '../types';

/**
 * Anything with a `write` method, such as `process.stdout`
 */
export interface LineWriter {
  write(chunk: string): unknown;
}

export type SinkMessage =
  | { type: 'RECORD'; stream: string; emittedAt: number; data: SourceRecord }
  | { type: 'SCHEMA'; stream: string; schema: SchemaDocument }
  | { type: 'STATE'; stream: string; state: PersistedStreamState };

/**
 * Writes one JSON message per line
 */
export class JsonLinesSink implements RecordSink {
  private written = 0;

  constructor(
    private readonly output: LineWriter,
    private readonly now: () => number = Date.now
  ) {}

  get recordsWritten(): number {
    return this.written;
  }

  emitRecord(stream: string, record: SourceRecord): void {
    this.written++;
    this.writeLine({ type: 'RECORD', stream, emittedAt: this.now(), data: record });
  }

  emitSchema(stream: string, schema: SchemaDocument): void {
    this.writeLine({ type: 'SCHEMA', stream, schema });
  }

  emitState(stream: string, state: PersistedStreamState): void {
    this.writeLine({ type: 'STATE', stream, state });
  }

  private writeLine(message: SinkMessage): void {
    this.output.write(`${JSON.stringify(message)}\n`);
  }
}
