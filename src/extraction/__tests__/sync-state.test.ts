import type { SourceRecord } from '../../types';
import {
  advanceSyncState,
  compareTimestamps,
  emptySyncState,
  fromPersistedState,
  toPersistedState
} from '../sync-state';

describe('sync state', () => {
  describe('fromPersistedState', () => {
    it('should prefer the persisted mark over the start date', () => {
      expect(fromPersistedState({ updatedAt: '2024-02-01T00:00:00Z' }, '2024-01-01')).toEqual({
        highWaterMark: '2024-02-01T00:00:00Z'
      });
    });

    it('should fall back to the start date', () => {
      expect(fromPersistedState(undefined, '2024-01-01')).toEqual({ highWaterMark: '2024-01-01' });
      expect(fromPersistedState({}, '2024-01-01')).toEqual({ highWaterMark: '2024-01-01' });
    });

    it('should start empty without either', () => {
      expect(fromPersistedState(undefined)).toEqual(emptySyncState());
    });
  });

  describe('toPersistedState', () => {
    it('should omit an absent mark', () => {
      expect(toPersistedState({ highWaterMark: null })).toEqual({});
      expect(toPersistedState({ highWaterMark: '2024-01-01T00:00:00Z' })).toEqual({
        updatedAt: '2024-01-01T00:00:00Z'
      });
    });
  });

  describe('compareTimestamps', () => {
    it('should compare instants across offsets', () => {
      expect(compareTimestamps('2024-01-01T02:00:00+02:00', '2024-01-01T00:00:00Z')).toBe(0);
      expect(compareTimestamps('2024-01-01T00:00:01Z', '2024-01-01T00:00:00Z')).toBe(1);
    });

    it('should compare unparseable values as strings', () => {
      expect(compareTimestamps('abc', 'abd')).toBe(-1);
    });
  });

  describe('advanceSyncState', () => {
    it('should raise the mark to a later updatedAt', () => {
      const state = advanceSyncState(emptySyncState(), { _id: '1', updatedAt: '2024-01-02T00:00:00Z' });

      expect(state).toEqual({ highWaterMark: '2024-01-02T00:00:00Z' });
    });

    it('should never lower the mark', () => {
      const records: SourceRecord[] = [
        { _id: '1', updatedAt: '2024-01-03T00:00:00Z' },
        { _id: '2', updatedAt: '2024-01-01T00:00:00Z' },
        { _id: '3' },
        { _id: '4', updatedAt: null },
        { _id: '5', updatedAt: '2024-01-02T00:00:00Z' }
      ];

      let state = emptySyncState();
      const marks: Array<string | null> = [];
      for (const record of records) {
        state = advanceSyncState(state, record);
        marks.push(state.highWaterMark);
      }

      expect(marks).toEqual(Array(5).fill('2024-01-03T00:00:00Z'));
    });

    it('should ignore records without updatedAt', () => {
      const start = { highWaterMark: '2024-01-01T00:00:00Z' };

      expect(advanceSyncState(start, { _id: '1' })).toBe(start);
    });
  });
});
