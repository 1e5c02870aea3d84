import {
  getCursorValue,
  type PersistedStreamState,
  type SourceRecord,
  type SyncState
} from '../types';

export function emptySyncState(): SyncState {
  return { highWaterMark: null };
}

/**
 * Restore a stream's state: the persisted mark wins, then the configured
 * start date, then nothing.
 */
export function fromPersistedState(persisted: PersistedStreamState | undefined, startDate?: string): SyncState {
  const stored = persisted?.updatedAt;
  if (typeof stored === 'string' && stored.length > 0) {
    return { highWaterMark: stored };
  }
  return { highWaterMark: startDate ?? null };
}

export function toPersistedState(state: SyncState): PersistedStreamState {
  return state.highWaterMark === null ? {} : { updatedAt: state.highWaterMark };
}

/**
 * Order two timestamps: by instant when both parse, otherwise as strings
 */
export function compareTimestamps(left: string, right: string): number {
  const leftMs = Date.parse(left);
  const rightMs = Date.parse(right);

  if (!Number.isNaN(leftMs) && !Number.isNaN(rightMs)) {
    return Math.sign(leftMs - rightMs);
  }

  return left < right ? -1 : left > right ? 1 : 0;
}

/**
 * Raise the mark to the record's `updatedAt` if it is later. Never lowers it.
 */
export function advanceSyncState(state: SyncState, record: SourceRecord): SyncState {
  const candidate = getCursorValue(record);

  if (candidate === undefined) {
    return state;
  }

  if (state.highWaterMark === null || compareTimestamps(candidate, state.highWaterMark) > 0) {
    return { highWaterMark: candidate };
  }

  return state;
}
