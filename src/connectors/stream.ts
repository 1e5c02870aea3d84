import { decideNextPage, initialCursor } from '../extraction/page-cursor';
import { buildQuery } from '../extraction/query-builder';
import { FALLBACK_SCHEMA, inferSchema } from '../extraction/schema-inferencer';
import type {
  PageCursor,
  PageDecision,
  QueryBody,
  SchemaDocument,
  SourceRecord,
  SyncState
} from '../types';
import type { Paginator, SchemaSource } from './types';

const DEFAULT_SCHEMA_SAMPLE_SIZE = 10;

/**
 * `_id`-keyed cursor pagination over `find` queries
 */
export class CursorPaginator implements Paginator {
  constructor(readonly pageSize: number) {}

  initial(): PageCursor {
    return initialCursor(this.pageSize);
  }

  buildQuery(state: SyncState, cursor: PageCursor): QueryBody {
    return buildQuery(state, cursor, cursor.pageSize);
  }

  next(cursor: PageCursor, records: readonly SourceRecord[], url: string): PageDecision {
    return decideNextPage(cursor, records, url);
  }
}

/**
 * Infers the schema from the leading records of the first page and falls
 * back to a static document for empty streams
 */
export class InferredSchemaSource implements SchemaSource {
  constructor(
    private readonly staticSchema: SchemaDocument = FALLBACK_SCHEMA,
    private readonly sampleSize: number = DEFAULT_SCHEMA_SAMPLE_SIZE
  ) {}

  discover(records: readonly SourceRecord[]): SchemaDocument {
    return inferSchema(records.slice(0, Math.max(1, this.sampleSize)), this.staticSchema);
  }

  fallback(): SchemaDocument {
    return this.staticSchema;
  }
}
