import type { FindQuery, PageCursor, QueryBody, SyncState } from '../types';

/**
 * Build the POST body for one page.
 *
 * `syncState` must be the state the invocation started with. Raising the
 * `updatedAt` bound between pages while paging by `_id` would skip records
 * with an older `updatedAt` and a later `_id`.
 *
 * There is no `$skip`: offsets shift under concurrent inserts, the `_id`
 * cursor does not.
 */
export function buildQuery(syncState: SyncState, pageCursor: PageCursor, pageSize: number): QueryBody {
  const query: FindQuery = {
    $limit: pageSize,
    $sort: { _id: 1 }
  };

  if (syncState.highWaterMark) {
    query.updatedAt = { $gte: syncState.highWaterMark };
  }

  if (pageCursor.lastId !== null) {
    query._id = { $gt: pageCursor.lastId };
  }

  return {
    $method: 'find',
    params: { query }
  };
}
