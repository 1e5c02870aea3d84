/**
 * Per-stream extraction metrics
 */

import type { Logger } from './logger';

export interface StreamMetricsSummary {
  stream: string;
  requests: number;
  retries: number;
  pages: number;
  records: number;
  nullSequencesRemoved: number;
  totalWaitSeconds: number;
  statusCodes: Record<string, number>;
  duration: number;
}

/**
 * Counters for one extraction run. Each extractor owns its own instance;
 * nothing here is shared between streams.
 */
export class StreamMetrics {
  private readonly startTime: number;
  private requests = 0;
  private retries = 0;
  private pages = 0;
  private records = 0;
  private nullSequencesRemoved = 0;
  private totalWaitSeconds = 0;
  private readonly statusCodes = new Map<string, number>();

  constructor(
    private readonly stream: string,
    private readonly now: () => number = Date.now
  ) {
    this.startTime = now();
  }

  trackRequest(status?: number): void {
    this.requests++;
    const key = status === undefined ? 'transport' : String(status);
    this.statusCodes.set(key, (this.statusCodes.get(key) || 0) + 1);
  }

  trackRetry(waitSeconds: number): void {
    this.retries++;
    this.totalWaitSeconds += waitSeconds;
  }

  trackPage(recordCount: number, removed: number): void {
    this.pages++;
    this.records += recordCount;
    this.nullSequencesRemoved += removed;
  }

  getSummary(): StreamMetricsSummary {
    return {
      stream: this.stream,
      requests: this.requests,
      retries: this.retries,
      pages: this.pages,
      records: this.records,
      nullSequencesRemoved: this.nullSequencesRemoved,
      totalWaitSeconds: this.totalWaitSeconds,
      statusCodes: Object.fromEntries(this.statusCodes),
      duration: this.now() - this.startTime
    };
  }

  log(logger: Logger): void {
    const summary = this.getSummary();
    logger.info('Stream metrics', { ...summary });
  }
}
