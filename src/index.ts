#!/usr/bin/env node

/**
 * Command line entry point: `sync` writes RECORD, SCHEMA and STATE lines to
 * stdout, `check` verifies credentials against the first endpoint.
 */

import { parseArgs } from 'node:util';
import { describeConfig } from './config';
import { loadConfigFile, loadStateFile } from './config/yaml-loader';
import { checkConnection } from './connectors/check';
import { assertSyncSucceeded, JsonLinesSink, runSync } from './orchestrator';
import { ConfigurationError, toError } from './utils/errors';
import { createLogger, type Logger } from './utils/logger';

const USAGE = 'Usage: cursor-extract <sync|check> --config <file> [--state <file>]';

interface CliArguments {
  command: 'sync' | 'check';
  configPath: string;
  statePath?: string;
}

/**
 * Parse command line arguments (without the node binary and script path)
 */
export function parseCliArguments(argv: string[]): CliArguments {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      config: { type: 'string', short: 'c' },
      state: { type: 'string', short: 's' }
    }
  });

  const [command] = positionals;
  if (command !== 'sync' && command !== 'check') {
    throw new ConfigurationError(`unknown command ${JSON.stringify(command ?? '')}. ${USAGE}`, ['command']);
  }
  if (!values.config) {
    throw new ConfigurationError(`--config is required. ${USAGE}`, ['config']);
  }

  return { command, configPath: values.config, statePath: values.state };
}

async function sync(args: CliArguments, logger: Logger): Promise<void> {
  const config = await loadConfigFile(args.configPath);
  logger.setLogLevel(config.logLevel);
  logger.debug('Configuration loaded', describeConfig(config));

  const state = await loadStateFile(args.statePath);
  const controller = new AbortController();
  const stop = () => {
    logger.warn('Stopping after the current page');
    controller.abort();
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  try {
    const result = await runSync(config, {
      state,
      sink: new JsonLinesSink(process.stdout),
      signal: controller.signal,
      logger
    });
    assertSyncSucceeded(result);
  } finally {
    process.off('SIGINT', stop);
    process.off('SIGTERM', stop);
  }
}

async function check(args: CliArguments, logger: Logger): Promise<void> {
  const config = await loadConfigFile(args.configPath);
  const result = await checkConnection(config, { logger });
  process.stdout.write(`${JSON.stringify({ type: 'CONNECTION_STATUS', ...result })}\n`);
  if (!result.ok) {
    process.exitCode = 1;
  }
}

/**
 * Main execution function
 */
export async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  const logger = createLogger({ service: 'cursor-extract' });

  try {
    const args = parseCliArguments(argv);
    if (args.command === 'sync') {
      await sync(args, logger);
    } else {
      await check(args, logger);
    }
  } catch (caught) {
    logger.error('Fatal error', toError(caught));
    process.exitCode = 1;
  }
}

// Run if this is the main module
if (require.main === module) {
  void main();
}

export * from './config';
export { loadConfigFile, loadStateFile } from './config/yaml-loader';
export { BearerAuthenticator } from './connectors/auth';
export { checkConnection, type ConnectionCheckResult } from './connectors/check';
export { createStream, createStreamSpec, type StreamOverrides } from './connectors/factory';
export { HttpPageTransport } from './connectors/http-transport';
export { CursorPaginator, InferredSchemaSource } from './connectors/stream';
export * from './connectors/types';
export { decodePage, StreamExtractor, type StreamOutcome } from './extraction/extraction-loop';
export { decideNextPage, initialCursor } from './extraction/page-cursor';
export { buildQuery } from './extraction/query-builder';
export { HttpRetryPolicy, NoRetryPolicy } from './extraction/retry-policy';
export { sanitize, sanitizeWithReport } from './extraction/sanitizer';
export { FALLBACK_SCHEMA, inferSchema, inferType } from './extraction/schema-inferencer';
export { advanceSyncState, emptySyncState, fromPersistedState, toPersistedState } from './extraction/sync-state';
export * from './orchestrator';
export * from './types';
export * from './utils';
