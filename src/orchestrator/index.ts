/**
 * Central export point for orchestrator modules
 */

export { JsonLinesSink, type LineWriter, type SinkMessage } from './json-lines-sink';
export {
  assertSyncSucceeded,
  runSync,
  SyncOrchestrator,
  type SyncOptions,
  type SyncResult
} from './sync-orchestrator';
