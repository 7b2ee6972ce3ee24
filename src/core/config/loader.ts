import * as path from 'node:path';
import { ConfigSchema, type Config, type ConfigInput } from './schema.js';
import { loadYamlWithSchema, formatZodError } from '../../utils/yaml.js';
import { fileExists } from '../../utils/file-system.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';

const DEFAULT_CONFIG_PATH = '.declarg/config.yaml';

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
  const fullPath = configPath
    ? path.resolve(projectRoot, configPath)
    : path.resolve(projectRoot, DEFAULT_CONFIG_PATH);

  if (!(await fileExists(fullPath))) {
    return getDefaultConfig();
  }

  try {
    return await loadYamlWithSchema(fullPath, ConfigSchema);
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
export function mergeConfig(partial: ConfigInput = {}): Config {
  const result = ConfigSchema.safeParse(partial);
  if (!result.success) {
    throw new ConfigError(
      ErrorCodes.INVALID_CONFIG,
      `Invalid configuration: ${formatZodError(result.error)}`,
      { errors: result.error.issues }
    );
  }
  return result.data;
}

/**
 * Get the expected config file path for a project.
 */
export function getConfigPath(projectRoot: string): string {
  return path.resolve(projectRoot, DEFAULT_CONFIG_PATH);
}
