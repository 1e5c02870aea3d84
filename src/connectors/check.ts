import type { AppConfig } from '../config';
import { StreamExtractor } from '../extraction/extraction-loop';
import { NoRetryPolicy } from '../extraction/retry-policy';
import { emptySyncState } from '../extraction/sync-state';
import { ConfigurationError } from '../utils/errors';
import { createSilentLogger, type Logger } from '../utils/logger';
import { createStream } from './factory';
import { CursorPaginator } from './stream';
import type { ExtractionStream, PageTransport } from './types';

export type ConnectionCheckResult = { ok: true } | { ok: false; message: string };

export interface ConnectionCheckOptions {
  transport?: PageTransport;
  logger?: Logger;
}

/**
 * Fetch a single one-record page from the first endpoint, without retries
 */
export async function checkConnection(
  config: AppConfig,
  options: ConnectionCheckOptions = {}
): Promise<ConnectionCheckResult> {
  const [first] = config.streams;
  if (!first) {
    return { ok: false, message: new ConfigurationError('no endpoints configured', ['endpoints']).message };
  }

  let stream: ExtractionStream;
  try {
    stream = createStream(first, config, {
      transport: options.transport,
      paginator: new CursorPaginator(1),
      retryPolicy: new NoRetryPolicy()
    });
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return { ok: false, message: error.message };
    }
    throw error;
  }

  const extractor = new StreamExtractor({
    stream,
    maxPages: 1,
    logger: options.logger ?? createSilentLogger()
  });

  const outcome = await extractor.run({
    state: emptySyncState(),
    sink: { emitRecord: () => undefined }
  });

  if (outcome.status === 'failed') {
    return { ok: false, message: outcome.error.message };
  }

  return { ok: true };
}
