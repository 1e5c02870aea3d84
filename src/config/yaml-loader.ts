import { promises as fs } from 'node:fs';
import * as YAML from 'yaml';
import type { PersistedSyncState } from '../types';
import { ConfigurationError, toError } from '../utils/errors';
import { type AppConfig, parseConnectorConfig } from './index';
import { PersistedSyncStateSchema } from './schema';

async function readYamlFile(filePath: string): Promise<unknown> {
  let contents: string;

  try {
    contents = await fs.readFile(filePath, 'utf-8');
  } catch (caught) {
    const error = toError(caught);
    if ('code' in error && error.code === 'ENOENT') {
      throw new ConfigurationError(`Missing file: ${filePath}`);
    }
    throw new ConfigurationError(`Failed to read file ${filePath}: ${error.message}`);
  }

  try {
    // YAML is a superset of JSON, so this reads both
    return YAML.parse(contents, { prettyErrors: true });
  } catch (error) {
    throw new ConfigurationError(`Failed to parse ${filePath}: ${toError(error).message}`);
  }
}

/**
 * Read and validate a connector configuration file (YAML or JSON)
 */
export async function loadConfigFile(filePath: string, env: NodeJS.ProcessEnv = process.env): Promise<AppConfig> {
  const raw = await readYamlFile(filePath);
  return parseConnectorConfig(raw, env);
}

/**
 * Read a persisted state file. A missing path means a first run.
 */
export async function loadStateFile(filePath?: string): Promise<PersistedSyncState> {
  if (!filePath) {
    return {};
  }

  const raw = await readYamlFile(filePath);
  if (raw === null || raw === undefined) {
    return {};
  }

  const result = PersistedSyncStateSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(`Invalid state in ${filePath}: ${result.error.message}`);
  }

  return result.data;
}
