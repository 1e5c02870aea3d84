/**
 * SyncOrchestrator - Runs every configured stream and collects their state
 */

import type { AppConfig } from '../config';
import { createStream, type StreamOverrides } from '../connectors/factory';
import type { ExtractionStream, RecordSink } from '../connectors/types';
import { StreamExtractor, type StreamOutcome } from '../extraction/extraction-loop';
import { FALLBACK_SCHEMA } from '../extraction/schema-inferencer';
import { fromPersistedState, toPersistedState } from '../extraction/sync-state';
import type { PersistedSyncState, StreamSpec } from '../types';
import { ConfigurationError, SyncFailedError } from '../utils/errors';
import { createSilentLogger, type Logger } from '../utils/logger';
import { StreamMetrics } from '../utils/metrics';

export interface SyncOptions {
  /** Persisted state from the previous invocation */
  state?: PersistedSyncState;
  sink: RecordSink;
  signal?: AbortSignal;
  logger?: Logger;
  overrides?: StreamOverrides;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export interface SyncResult {
  success: boolean;
  outcomes: StreamOutcome[];
  /** Previous state with every stream's committed mark applied */
  state: PersistedSyncState;
  duration: number;
}

export class SyncOrchestrator {
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(
    private readonly config: AppConfig,
    private readonly options: SyncOptions
  ) {
    this.logger = options.logger ?? createSilentLogger();
    this.now = options.now ?? Date.now;
  }

  async run(): Promise<SyncResult> {
    const start = this.now();
    const previous = this.options.state ?? {};

    this.logger.info('Sync started', {
      streams: this.config.streams.map((spec) => spec.name),
      pageSize: this.config.pageSize
    });

    const outcomes = await Promise.all(
      this.config.streams.map((spec) => this.runStream(spec, previous))
    );

    const state: PersistedSyncState = { ...previous };
    for (const outcome of outcomes) {
      state[outcome.stream] = toPersistedState(outcome.state);
    }

    const failed = outcomes.filter((outcome) => outcome.status === 'failed');
    const result: SyncResult = {
      success: failed.length === 0,
      outcomes,
      state,
      duration: this.now() - start
    };

    this.logger.info('Sync finished', {
      success: result.success,
      failed: failed.map((outcome) => outcome.stream),
      records: outcomes.reduce((sum, outcome) => sum + outcome.metrics.records, 0),
      duration: result.duration
    });

    return result;
  }

  private async runStream(spec: StreamSpec, previous: PersistedSyncState): Promise<StreamOutcome> {
    const initial = fromPersistedState(previous[spec.name], this.config.startDate);

    let stream: ExtractionStream;
    try {
      stream = createStream(spec, this.config, this.options.overrides, this.logger);
    } catch (error) {
      if (!(error instanceof ConfigurationError)) {
        throw error;
      }
      this.logger.error('Stream configuration rejected', error, { stream: spec.name });
      return {
        status: 'failed',
        stream: spec.name,
        state: initial,
        schema: FALLBACK_SCHEMA,
        metrics: new StreamMetrics(spec.name, this.now).getSummary(),
        error
      };
    }

    const extractor = new StreamExtractor({
      stream,
      interPageDelayMs: this.config.interPageDelayMs,
      logger: this.logger,
      sleep: this.options.sleep,
      now: this.now
    });

    return extractor.run({
      state: initial,
      sink: this.options.sink,
      signal: this.options.signal
    });
  }
}

/**
 * Extract every configured stream concurrently. A failing stream does not
 * stop the others; its outcome carries the error.
 */
export function runSync(config: AppConfig, options: SyncOptions): Promise<SyncResult> {
  return new SyncOrchestrator(config, options).run();
}

export function assertSyncSucceeded(result: SyncResult): void {
  const failures: Record<string, Error> = {};

  for (const outcome of result.outcomes) {
    if (outcome.status === 'failed') {
      failures[outcome.stream] = outcome.error;
    }
  }

  if (Object.keys(failures).length > 0) {
    throw new SyncFailedError(failures);
  }
}
