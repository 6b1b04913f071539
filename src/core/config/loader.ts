import * as path from 'node:path';
import { ConfigSchema, type Config } from './schema.js';
import { loadYamlWithSchema } from '../../utils/yaml.js';
import { fileExists } from '../../utils/file-system.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';

const DEFAULT_CONFIG_PATH = '.refgraph.yaml';

/**
 * Default configuration values.
 * Used when no config file exists.
 */
export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

/**
 * Load configuration from a file.
 * Falls back to defaults if the file doesn't exist.
 */
export async function loadConfig(
  projectRoot: string,
  configPath?: string
): Promise<Config> {
  const fullPath = getConfigPath(projectRoot, configPath);

  if (!(await fileExists(fullPath))) {
    return getDefaultConfig();
  }

  try {
    // An empty file parses to null; treat it like an empty mapping
    const config = await loadYamlWithSchema(fullPath, ConfigSchema.nullable());
    return config ?? getDefaultConfig();
  } catch (error) {
    if (error instanceof Error) {
      throw new ConfigError(
        ErrorCodes.CONFIG_LOAD_ERROR,
        `Failed to load config from ${fullPath}: ${error.message}`,
        { path: fullPath, originalError: error.message }
      );
    }
    throw error;
  }
}

/**
 * Merge partial config with defaults.
 */
export function mergeConfig(partial: Partial<Config>): Config {
  return ConfigSchema.parse(partial);
}

/**
 * Get the config file path for a project.
 */
export function getConfigPath(projectRoot: string, configPath?: string): string {
  return path.resolve(projectRoot, configPath ?? DEFAULT_CONFIG_PATH);
}
