import { MalformedResponseError } from '../utils/errors';
import { getRecordId, type PageCursor, type PageDecision, type SourceRecord } from '../types';

export function initialCursor(pageSize: number): PageCursor {
  return { lastId: null, pageSize };
}

/**
 * Decide whether another page follows. A short page ends pagination; a full
 * page continues from its last record's `_id`.
 */
export function decideNextPage(
  cursor: PageCursor,
  records: readonly SourceRecord[],
  url: string
): PageDecision {
  if (records.length < cursor.pageSize) {
    return { kind: 'done' };
  }

  const last = records[records.length - 1];
  const lastId = getRecordId(last);

  if (lastId === undefined) {
    throw new MalformedResponseError(
      'last record of a full page has no usable _id',
      url,
      undefined,
      'missing-id'
    );
  }

  if (lastId === cursor.lastId) {
    throw new MalformedResponseError(
      `cursor did not advance past _id ${String(lastId)}`,
      url,
      undefined,
      'cursor-stalled'
    );
  }

  return { kind: 'continue', cursor: { ...cursor, lastId } };
}
