/**
 * Central export point for utility modules
 */

export {
  BaseError,
  ConfigurationError,
  excerpt,
  FatalApiError,
  HttpRequestError,
  MalformedResponseError,
  SyncFailedError,
  TransientApiError,
  toError
} from './errors';
export {
  createLogger,
  createSilentLogger,
  type LogContext,
  type LogEntry,
  Logger,
  LogLevel,
  type LogOutput
} from './logger';
export { StreamMetrics, type StreamMetricsSummary } from './metrics';
export { retry, type RetryConfig, type RetryVerdict, sleep } from './retry';
