import type { AppConfig } from '../config';
import { validateEndpointUrl, validateStreamName } from '../config/schema';
import { HttpRetryPolicy } from '../extraction/retry-policy';
import type { StreamSpec } from '../types';
import type { Logger } from '../utils/logger';
import { BearerAuthenticator } from './auth';
import { HttpPageTransport } from './http-transport';
import { CursorPaginator, InferredSchemaSource } from './stream';
import type { ExtractionStream, PageTransport, Paginator, RetryPolicy, SchemaSource } from './types';

/**
 * Replacement capabilities, used by the connection check and by tests
 */
export interface StreamOverrides {
  transport?: PageTransport;
  paginator?: Paginator;
  retryPolicy?: RetryPolicy;
  schemaSource?: SchemaSource;
}

/**
 * Validate a stream's identity and freeze it
 */
export function createStreamSpec(name: string, endpointUrl: string): StreamSpec {
  validateStreamName(name);
  validateEndpointUrl(endpointUrl);
  return Object.freeze({ name, endpointUrl });
}

/**
 * Compose one stream from its capabilities. Each stream gets its own
 * instances, so nothing mutable is shared between streams.
 */
export function createStream(
  spec: StreamSpec,
  config: AppConfig,
  overrides: StreamOverrides = {},
  logger?: Logger
): ExtractionStream {
  const transport =
    overrides.transport ??
    new HttpPageTransport({
      authenticator: new BearerAuthenticator(config.apiToken),
      timeoutMs: config.requestTimeoutMs,
      logger: logger?.child({ stream: spec.name })
    });

  return {
    spec: createStreamSpec(spec.name, spec.endpointUrl),
    paginator: overrides.paginator ?? new CursorPaginator(config.pageSize),
    retryPolicy: overrides.retryPolicy ?? new HttpRetryPolicy({ maxRetries: config.maxRetries }),
    schemaSource: overrides.schemaSource ?? new InferredSchemaSource(),
    transport
  };
}
