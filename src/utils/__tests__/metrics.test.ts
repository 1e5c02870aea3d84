/**
 * Unit tests for StreamMetrics
 */

import { type LogEntry, Logger, LogLevel } from '../logger';
import { StreamMetrics } from '../metrics';

describe('StreamMetrics', () => {
  let clock: number;
  let metrics: StreamMetrics;

  beforeEach(() => {
    clock = 1000;
    metrics = new StreamMetrics('users', () => clock);
  });

  it('should start empty', () => {
    expect(metrics.getSummary()).toEqual({
      stream: 'users',
      requests: 0,
      retries: 0,
      pages: 0,
      records: 0,
      nullSequencesRemoved: 0,
      totalWaitSeconds: 0,
      statusCodes: {},
      duration: 0
    });
  });

  it('should count requests by status', () => {
    metrics.trackRequest(200);
    metrics.trackRequest(503);
    metrics.trackRequest(200);
    metrics.trackRequest();

    const summary = metrics.getSummary();
    expect(summary.requests).toBe(4);
    expect(summary.statusCodes).toEqual({ '200': 2, '503': 1, transport: 1 });
  });

  it('should accumulate retries, pages and removals', () => {
    metrics.trackRetry(2);
    metrics.trackRetry(60);
    metrics.trackPage(500, 1);
    metrics.trackPage(200, 0);
    clock = 4500;

    const summary = metrics.getSummary();
    expect(summary.retries).toBe(2);
    expect(summary.totalWaitSeconds).toBe(62);
    expect(summary.pages).toBe(2);
    expect(summary.records).toBe(700);
    expect(summary.nullSequencesRemoved).toBe(1);
    expect(summary.duration).toBe(3500);
  });

  it('should log the summary at info level', () => {
    const entries: LogEntry[] = [];
    const logger = new Logger(LogLevel.INFO, {}, (entry) => entries.push(entry));

    metrics.trackPage(3, 0);
    metrics.log(logger);

    expect(entries).toHaveLength(1);
    expect(entries[0].message).toBe('Stream metrics');
    expect(entries[0].metadata).toMatchObject({ stream: 'users', pages: 1, records: 3 });
  });

  it('should keep instances independent', () => {
    const other = new StreamMetrics('orders', () => clock);

    metrics.trackPage(10, 0);

    expect(other.getSummary().records).toBe(0);
  });
});
